// Structured console logging.
//
// Warnings and errors always go to the console. Debug and info output is
// opt-in per namespace through the DEBUG environment variable, using the
// same pattern syntax as npm's debug package:
//
//   DEBUG=skiff:*            everything from skiff
//   DEBUG=skiff:connection   only the connection adapter
//   DEBUG=*,-skiff:tcp       everything except the TCP binding

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

/** Logger used throughout the engine. Injectable so embedders and tests can capture entries. */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  /** Namespace matched against the DEBUG patterns. Defaults to "skiff". */
  namespace?: string;
  /** Pattern list; defaults to `process.env.DEBUG`. */
  debug?: string;
}

/**
 * Check if a namespace is enabled by a pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string, patterns: string | undefined): boolean {
  if (!patterns) return false;

  let enabled = false;
  for (const pattern of patterns.split(/[\s,]+/).filter(Boolean)) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }
  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a console logger for `namespace`.
 *
 * Each entry is printed as `[namespace] message` followed by the metadata
 * object, when there is one, so it stays expandable in inspectors.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const namespace = options.namespace ?? "skiff";
  const verbose = isEnabled(namespace, options.debug ?? process.env.DEBUG);

  const emit = (sink: (...args: unknown[]) => void, message: string, meta?: LogMeta) => {
    const line = `[${namespace}] ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      sink(line, meta);
    } else {
      sink(line);
    }
  };

  return {
    debug: (message, meta) => {
      if (verbose) emit(console.debug, message, meta);
    },
    info: (message, meta) => {
      if (verbose) emit(console.info, message, meta);
    },
    warn: (message, meta) => emit(console.warn, message, meta),
    error: (message, meta) => emit(console.error, message, meta),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Metadata describing an error, including its cause chain's first link. */
export function errorMeta(error: unknown): LogMeta {
  if (error instanceof Error) {
    const meta: LogMeta = { error: { name: error.name, message: error.message, stack: error.stack } };
    if (error.cause instanceof Error) {
      meta.cause = { name: error.cause.name, message: error.cause.message };
    }
    return meta;
  }
  return { error };
}
