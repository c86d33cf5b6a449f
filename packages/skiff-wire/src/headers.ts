// HTTP header collection.
//
// Header names are matched case-insensitively but keep the casing they were
// first added with, so encoded responses echo what the application wrote.

/** Read-only view of a header collection, handed to request consumers. */
export interface ReadonlyHttpHeaders extends Iterable<[string, string]> {
  get(name: string): string | null;
  getAll(name: string): string[];
  has(name: string): boolean;
  names(): string[];
  readonly size: number;
}

interface HeaderEntry {
  name: string;
  values: string[];
}

/**
 * Case-insensitive, multi-valued header collection.
 *
 * Iteration yields one `[name, value]` pair per value, in insertion order.
 */
export class HttpHeaders implements ReadonlyHttpHeaders {
  private entries = new Map<string, HeaderEntry>();

  constructor(init?: Iterable<[string, string]>) {
    if (init) {
      for (const [name, value] of init) {
        this.add(name, value);
      }
    }
  }

  /** First value for `name`, or null when absent. */
  get(name: string): string | null {
    const entry = this.entries.get(name.toLowerCase());
    return entry ? entry.values[0] : null;
  }

  getAll(name: string): string[] {
    const entry = this.entries.get(name.toLowerCase());
    return entry ? [...entry.values] : [];
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  /** Replace every value of `name` with a single value. */
  set(name: string, value: string | number): this {
    this.entries.set(name.toLowerCase(), { name, values: [String(value)] });
    return this;
  }

  /** Append a value, keeping existing ones. */
  add(name: string, value: string | number): this {
    const key = name.toLowerCase();
    const entry = this.entries.get(key);
    if (entry) {
      entry.values.push(String(value));
    } else {
      this.entries.set(key, { name, values: [String(value)] });
    }
    return this;
  }

  delete(name: string): boolean {
    return this.entries.delete(name.toLowerCase());
  }

  clear(): void {
    this.entries.clear();
  }

  /** Header names with their original casing. */
  names(): string[] {
    return [...this.entries.values()].map((e) => e.name);
  }

  /** Number of distinct header names. */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Whether any comma-separated token of `name` equals `token`
   * (case-insensitive). Used for `connection` and `transfer-encoding`.
   */
  containsToken(name: string, token: string): boolean {
    const wanted = token.toLowerCase();
    for (const value of this.getAll(name)) {
      for (const part of value.split(",")) {
        if (part.trim().toLowerCase() === wanted) return true;
      }
    }
    return false;
  }

  *[Symbol.iterator](): Iterator<[string, string]> {
    for (const entry of this.entries.values()) {
      for (const value of entry.values) {
        yield [entry.name, value];
      }
    }
  }
}

/** Well-known header names, lower-cased. */
export const HeaderNames = {
  CONNECTION: "connection",
  CONTENT_LENGTH: "content-length",
  CONTENT_TYPE: "content-type",
  TRANSFER_ENCODING: "transfer-encoding",
} as const;

/** `text/plain` with an explicit UTF-8 charset. */
export const PLAIN_TEXT_UTF8 = "text/plain;charset=UTF-8";

/**
 * Parse the content-length header.
 *
 * Returns `defaultValue` when the header is absent or not a non-negative
 * integer.
 */
export function getContentLength(headers: ReadonlyHttpHeaders, defaultValue: number): number {
  const raw = headers.get(HeaderNames.CONTENT_LENGTH);
  if (raw === null || !/^\d+$/.test(raw.trim())) {
    return defaultValue;
  }
  return Number(raw.trim());
}
