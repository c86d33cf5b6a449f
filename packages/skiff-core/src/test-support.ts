// In-memory transport and recording logger for tests.

import { HttpConnectionAdapter } from "./adapter.ts";
import type { Clock } from "./clock.ts";
import type { ServerConfig } from "./config.ts";
import type { Connection } from "./connection.ts";
import type { Application } from "./exchange.ts";
import type { LogLevel, LogMeta, Logger } from "./logging.ts";
import {
  type ConnectionTransport,
  type IdleTimeout,
  type SocketAddress,
  TransportEvents,
} from "./transport.ts";
import type { InboundMessage } from "@skiff/wire";

export interface LogEntry {
  level: LogLevel;
  message: string;
  meta?: LogMeta;
}

export class RecordingLogger implements Logger {
  entries: LogEntry[] = [];

  debug(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "debug", message, meta });
  }

  info(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "info", message, meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "warn", message, meta });
  }

  error(message: string, meta?: LogMeta): void {
    this.entries.push({ level: "error", message, meta });
  }

  /** Messages logged at `level`, in order. */
  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

class FakeIdleTimeout implements IdleTimeout {
  ms = 0;

  set(ms: number): void {
    this.ms = ms;
  }
}

export class FakeTransport implements ConnectionTransport {
  isActive = true;
  isWritable = true;
  remoteAddress: SocketAddress | null = { host: "127.0.0.1", port: 50123 };
  localAddress: SocketAddress | null = { host: "127.0.0.1", port: 8080 };
  idleTimeout = new FakeIdleTimeout();

  reads = 0;
  pauses = 0;
  flushes = 0;
  closes = 0;
  written: Uint8Array[] = [];
  /** When set, writes reject with this error. */
  writeError: Error | null = null;
  /** Called once by close(); the harness dispatches the close event from here. */
  onClose: (() => void) | null = null;

  read(): void {
    this.reads++;
  }

  pauseRead(): void {
    this.pauses++;
  }

  write(data: Uint8Array): Promise<void> {
    if (this.writeError) return Promise.reject(this.writeError);
    this.written.push(data);
    return Promise.resolve();
  }

  flush(): void {
    this.flushes++;
  }

  close(): void {
    if (!this.isActive) return;
    this.isActive = false;
    this.closes++;
    this.onClose?.();
  }

  /** Everything written so far, as latin1 text. */
  get output(): string {
    return Buffer.concat(this.written).toString("latin1");
  }
}

export interface Harness {
  adapter: HttpConnectionAdapter;
  transport: FakeTransport;
  connection: Connection;
  logger: RecordingLogger;
  deliver(...messages: InboundMessage[]): void;
}

/** An adapter wired to a fake transport, already opened. */
export function connect(
  application: Application,
  options: { config?: ServerConfig; clock?: Clock } = {},
): Harness {
  const logger = new RecordingLogger();
  const adapter = new HttpConnectionAdapter({ application, logger, ...options });
  const transport = new FakeTransport();
  const connection = adapter.connect(transport);
  transport.onClose = () => connection.dispatch(TransportEvents.close());
  connection.dispatch(TransportEvents.open());
  return {
    adapter,
    transport,
    connection,
    logger,
    deliver: (...messages) => {
      for (const message of messages) {
        connection.dispatch(TransportEvents.message(message));
      }
    },
  };
}

/** Wait until queued microtasks, and the promises they settle, have run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private time = 1_700_000_000_000) {}

  now(): number {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
  }
}
