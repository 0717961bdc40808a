/**
 * @module
 * Structured logging for mqproxy components.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@mqproxy/core';
 *
 * const log = createLogger({ name: 'rpc-requester', level: 'DEBUG' });
 *
 * log.info('reply queue declared', { queue: 'amq.gen-123' });
 * log.error('publish failed', error, { correlationId: '7' });
 *
 * const channelLog = log.child({ channel: 2 });
 * ```
 */

import { getEnv } from "./env.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogTransport } from "./transports/types.js";

export { ConsoleTransport, formatJsonLine, type ConsoleTransportOptions } from "./transports/console.js";
export type { LogTransport } from "./transports/types.js";

/**
 * Log level constants mapping level names to numeric values.
 * Lower values are more verbose; higher values are more severe.
 */
export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: 100,
} as const;

/** Log level name (TRACE, DEBUG, INFO, WARN, ERROR, FATAL, SILENT) */
export type LogLevelName = keyof typeof LogLevel;

/** Numeric log level value */
export type LogLevelValue = (typeof LogLevel)[LogLevelName];

/**
 * Error information included in log entries
 */
export interface ErrorInfo {
  name: string;
  message: string;
  stack: string | undefined;
}

/**
 * Structured log entry passed to transports
 */
export interface LogEntry {
  level: LogLevelName;
  levelValue: LogLevelValue;
  message: string;
  /** ISO 8601 timestamp, empty when timestamps are disabled */
  timestamp: string;
  context: Record<string, unknown> | undefined;
  error: ErrorInfo | undefined;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level (default: LOG_LEVEL env, then INFO) */
  level: LogLevelName | undefined;
  /** Logger name, added to every entry as `module` */
  name: string | undefined;
  /** Base context added to all logs */
  context: Record<string, unknown> | undefined;
  /** Custom transports (default: a single ConsoleTransport) */
  transports: LogTransport[] | undefined;
  /** Pretty print (only used by the default console transport) */
  pretty: boolean | undefined;
  /** Additional context keys to redact */
  redact: string[] | undefined;
  /** Timestamp source; `false` disables timestamps */
  timestamp: boolean | (() => string) | undefined;
}

const DEFAULT_REDACT_FIELDS = ["password", "secret", "token", "apiKey", "authorization"];

function isLevelName(value: string | undefined): value is LogLevelName {
  return value !== undefined && value in LogLevel;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Replace redacted keys, including dotted paths like "broker.password".
 */
function redact(obj: Record<string, unknown>, fields: string[]): Record<string, unknown> {
  const result = { ...obj };

  for (const field of fields) {
    const parts = field.split(".");
    const last = parts.pop();
    if (last === undefined) continue;

    let target: Record<string, unknown> | undefined = result;
    for (const part of parts) {
      const next: unknown = target[part];
      if (isRecord(next)) {
        const copy = { ...next };
        target[part] = copy;
        target = copy;
      } else {
        target = undefined;
        break;
      }
    }

    if (target && last in target) {
      target[last] = "[REDACTED]";
    }
  }

  return result;
}

/**
 * Structured logger with pluggable transports and redaction.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'rpc-server', level: 'DEBUG' });
 * logger.debug('delivery received', { deliveryTag: 4 });
 * ```
 */
export class Logger {
  private readonly levelName: LogLevelName;
  private readonly name: string | undefined;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];
  private readonly redactFields: string[];
  private readonly timestampFn: () => string;

  constructor(config: Partial<LoggerConfig> = {}) {
    const envLevel = getEnv("LOG_LEVEL")?.toUpperCase();
    this.levelName = config.level ?? (isLevelName(envLevel) ? envLevel : "INFO");
    this.name = config.name;
    this.context = config.context ?? {};
    this.transports = config.transports ?? [
      new ConsoleTransport(config.pretty !== undefined ? { pretty: config.pretty } : {}),
    ];
    this.redactFields = [...new Set([...DEFAULT_REDACT_FIELDS, ...(config.redact ?? [])])];

    if (config.timestamp === false) {
      this.timestampFn = () => "";
    } else if (typeof config.timestamp === "function") {
      this.timestampFn = config.timestamp;
    } else {
      this.timestampFn = () => new Date().toISOString();
    }
  }

  /** Current minimum level */
  get level(): LogLevelName {
    return this.levelName;
  }

  /**
   * Whether entries at `level` would reach the transports
   */
  isLevelEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= LogLevel[this.levelName];
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.levelName,
      name: this.name,
      context: { ...this.context, ...context },
      transports: this.transports,
      redact: this.redactFields,
      timestamp: this.timestampFn,
    });
  }

  private log(
    level: LogLevelName,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level) || level === "SILENT") return;

    const merged: Record<string, unknown> = { ...this.context };
    if (this.name) {
      merged["module"] = this.name;
    }
    const finalContext = redact({ ...merged, ...context }, this.redactFields);

    const entry: LogEntry = {
      level,
      levelValue: LogLevel[level],
      message,
      timestamp: this.timestampFn(),
      context: Object.keys(finalContext).length > 0 ? finalContext : undefined,
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
    };

    for (const transport of this.transports) {
      const pending = transport.log(entry);
      if (pending instanceof Promise) {
        pending.catch((err: unknown) => {
          console.error(`[logger] transport ${transport.name} failed:`, err);
        });
      }
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log("TRACE", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("DEBUG", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("INFO", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("WARN", message, context);
  }

  /**
   * Log an error. The second argument may be the Error or the context.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("ERROR", message, context, error);
    } else {
      this.log("ERROR", message, toContext(error, context));
    }
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("FATAL", message, context, error);
    } else {
      this.log("FATAL", message, toContext(error, context));
    }
  }
}

function toContext(
  value: unknown,
  context?: Record<string, unknown>
): Record<string, unknown> | undefined {
  if (value === undefined) return context;
  if (isRecord(value)) {
    return { ...value, ...context };
  }
  return { error: String(value), ...context };
}

/**
 * Create a new Logger instance
 */
export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config);
}

/**
 * Log anything that was thrown, Error or not.
 *
 * @example
 * ```typescript
 * try {
 *   await channel.close();
 * } catch (error) {
 *   logError(logger, error, 'channel close failed', { queue });
 * }
 * ```
 */
export function logError(
  log: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  if (error instanceof Error) {
    log.error(message, error, context);
  } else {
    log.error(message, { error: String(error), ...context });
  }
}
