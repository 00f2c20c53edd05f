import type { LogLevel, LogEntry } from "../types.js";
import type { LogSink } from "./sinks.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

export type Redactor = (key: string, value: unknown) => unknown;

export type LoggerOptions = {
  name?: string;
  level?: LogLevel;
  sinks?: LogSink[];
  redact?: Redactor;
  context?: Record<string, unknown>;
};

export class Logger {
  readonly name?: string;
  private level: LogLevel;
  private sinks: LogSink[];
  private redact?: Redactor;
  private baseContext: Record<string, unknown>;

  constructor(opts: LoggerOptions = {}) {
    this.name = opts.name;
    this.level = opts.level ?? "info";
    this.sinks = opts.sinks ?? [];
    this.redact = opts.redact;
    this.baseContext = { ...(opts.context ?? {}) };
  }

  /** Shares sinks and level with the parent; `name` replaces the parent's when given. */
  child(ctx: Record<string, unknown>, name?: string): Logger {
    return new Logger({
      name: name ?? this.name,
      level: this.level,
      sinks: this.sinks,
      redact: this.redact,
      context: { ...this.baseContext, ...ctx }
    });
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  isEnabled(level: LogLevel) {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private emit(level: LogLevel, msg: string, context?: Record<string, unknown>) {
    if (!this.isEnabled(level)) return;
    const merged: Record<string, unknown> = { ...this.baseContext, ...(context ?? {}) };
    if (this.redact) {
      for (const k of Object.keys(merged)) {
        merged[k] = this.redact(k, merged[k]);
      }
    }
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...(this.name ? { logger: this.name } : {}),
      context: Object.keys(merged).length ? merged : undefined
    };
    for (const s of this.sinks) s.write(entry);
  }

  trace(msg: string, ctx?: Record<string, unknown>) { this.emit("trace", msg, ctx); }
  debug(msg: string, ctx?: Record<string, unknown>) { this.emit("debug", msg, ctx); }
  info(msg: string, ctx?: Record<string, unknown>) { this.emit("info", msg, ctx); }
  warn(msg: string, ctx?: Record<string, unknown>) { this.emit("warn", msg, ctx); }
  error(msg: string, ctx?: Record<string, unknown>) { this.emit("error", msg, ctx); }
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  return new Logger(opts);
}

/** A logger with no sinks; every call is a no-op. */
export function silentLogger(): Logger {
  return new Logger({ sinks: [] });
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
