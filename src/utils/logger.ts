/**
 * Leveled, scoped logging for the narrator.
 *
 *   LOG_LEVEL=error|warn|info|debug|trace  (default: info)
 *   LOG_SCOPES=turn,compliance             (default: every scope)
 *   LOG_FORMAT=pretty|json                 (default: pretty)
 *
 *   LOG_LEVEL=debug LOG_SCOPES=turn,retrieval npm run dev
 */

import { cfg } from "../config/env.js";
import type { Config, LogLevel } from "../config/types.js";

export type { LogLevel };
export type LogScope =
  | "turn"
  | "validator"
  | "retrieval"
  | "extract"
  | "llm"
  | "narrative"
  | "compliance"
  | "state"
  | "db"
  | "server"
  | "boot"
  | "ingest";

export type LogFields = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: LogScope;
  message: string;
  data?: unknown;
}

export type LogSink = (level: LogLevel, line: string) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LEVEL_TAGS: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
};

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

function formatPretty(entry: LogEntry): string {
  const time = entry.timestamp.slice(11, 19); // HH:MM:SS
  const scope = entry.scope ? ` │ ${entry.scope}` : "";
  const data = entry.data === undefined ? "" : ` │ ${JSON.stringify(entry.data)}`;
  return `${time} [${LEVEL_TAGS[entry.level]}]${scope} ${entry.message}${data}`;
}

function isFields(value: unknown): value is LogFields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class Logger {
  private readonly threshold: number;
  private readonly scopes: ReadonlySet<string>;

  constructor(
    private readonly opts: Config["logging"],
    private readonly sink: LogSink = consoleSink,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.threshold = LOG_LEVELS[opts.level];
    this.scopes = new Set(opts.scopes ?? []);
  }

  /** Unscoped entries always pass the scope filter. */
  enabled(level: LogLevel, scope?: LogScope): boolean {
    if (LOG_LEVELS[level] < this.threshold) return false;
    return this.scopes.size === 0 || !scope || this.scopes.has(scope);
  }

  write(level: LogLevel, message: string, scope?: LogScope, data?: unknown): void {
    if (!this.enabled(level, scope)) return;
    const entry: LogEntry = { timestamp: this.now().toISOString(), level, scope, message, data };
    this.sink(level, this.opts.format === "json" ? JSON.stringify(entry) : formatPretty(entry));
  }

  trace(message: string, scope?: LogScope, data?: unknown): void {
    this.write("trace", message, scope, data);
  }

  debug(message: string, scope?: LogScope, data?: unknown): void {
    this.write("debug", message, scope, data);
  }

  info(message: string, scope?: LogScope, data?: unknown): void {
    this.write("info", message, scope, data);
  }

  warn(message: string, scope?: LogScope, data?: unknown): void {
    this.write("warn", message, scope, data);
  }

  error(message: string, scope?: LogScope, data?: unknown): void {
    this.write("error", message, scope, data);
  }

  /**
   * Usage: const turnLog = log.withScope("turn");
   *        turnLog.child({ sessionId }).warn("retrying")
   */
  withScope(scope: LogScope): ScopedLogger {
    return new ScopedLogger(this, scope);
  }
}

export class ScopedLogger {
  constructor(
    private readonly logger: Logger,
    private readonly scope: LogScope,
    private readonly bindings: LogFields = {},
  ) {}

  /** Same scope; `bindings` are merged into the data of every entry. */
  child(bindings: LogFields): ScopedLogger {
    return new ScopedLogger(this.logger, this.scope, { ...this.bindings, ...bindings });
  }

  private withBindings(data: unknown): unknown {
    if (Object.keys(this.bindings).length === 0) return data;
    if (data === undefined) return this.bindings;
    return isFields(data) ? { ...this.bindings, ...data } : { ...this.bindings, data };
  }

  trace(message: string, data?: unknown): void {
    this.logger.write("trace", message, this.scope, this.withBindings(data));
  }

  debug(message: string, data?: unknown): void {
    this.logger.write("debug", message, this.scope, this.withBindings(data));
  }

  info(message: string, data?: unknown): void {
    this.logger.write("info", message, this.scope, this.withBindings(data));
  }

  warn(message: string, data?: unknown): void {
    this.logger.write("warn", message, this.scope, this.withBindings(data));
  }

  error(message: string, data?: unknown): void {
    this.logger.write("error", message, this.scope, this.withBindings(data));
  }
}

export const log = new Logger(cfg.logging);
