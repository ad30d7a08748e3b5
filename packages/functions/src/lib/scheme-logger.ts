export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  msg: string;
  data?: Record<string, unknown>;
}

/** Anything with console-style methods: `console` or an Azure `InvocationContext`. */
export interface LogSink {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface SchemeLoggerOptions {
  sink?: LogSink;
  /** Forward debug entries to the sink. They are always recorded. */
  verbose?: boolean;
  maxEntries?: number;
}

/**
 * SchemeLogger records structured entries for one generation run and
 * forwards them to a sink.
 */
export class SchemeLogger {
  private readonly sink: LogSink;
  private readonly verbose: boolean;
  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(options: SchemeLoggerOptions = {}) {
    this.sink = options.sink ?? console;
    this.verbose = options.verbose ?? false;
    this.maxEntries = options.maxEntries || 200;
  }

  private addEntry(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
    };

    if (data && Object.keys(data).length > 0) {
      entry.data = data;
    }

    // Trim old entries if we hit max
    if (this.entries.length >= this.maxEntries) {
      this.entries.splice(0, Math.max(1, Math.floor(this.maxEntries * 0.2)));
    }

    this.entries.push(entry);
  }

  private forward(write: (...args: unknown[]) => void, prefix: string, msg: string, data?: Record<string, unknown>): void {
    if (data) {
      write(`${prefix} ${msg}`, data);
    } else {
      write(`${prefix} ${msg}`);
    }
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.addEntry("debug", msg, data);
    if (this.verbose) {
      this.forward((...args) => this.sink.log(...args), "[DEBUG]", msg, data);
    }
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.addEntry("info", msg, data);
    this.forward((...args) => this.sink.log(...args), "[INFO]", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.addEntry("warn", msg, data);
    this.forward((...args) => this.sink.warn(...args), "[WARN]", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.addEntry("error", msg, data);
    this.forward((...args) => this.sink.error(...args), "[ERROR]", msg, data);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }
}

/** Logger that records entries but writes nowhere. */
export function silentLogger(): SchemeLogger {
  const noop = () => undefined;
  return new SchemeLogger({ sink: { log: noop, warn: noop, error: noop } });
}
