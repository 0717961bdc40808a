/**
 * @mqproxy/core - Console Transport
 *
 * Default log transport. Pretty, colored lines in development;
 * one JSON object per line otherwise.
 *
 * @example
 * ```typescript
 * import { ConsoleTransport } from '@mqproxy/core';
 *
 * const transport = new ConsoleTransport({ pretty: false });
 * ```
 */

import { isDevelopment } from "../env.js";
import type { LogEntry, LogLevelName } from "../logger.js";
import type { LogTransport } from "./types.js";

/**
 * Console transport options
 */
export interface ConsoleTransportOptions {
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Enable ANSI colors (default: when stdout is a TTY) */
  colors?: boolean;
}

const LEVEL_COLORS: Record<LogLevelName, string> = {
  TRACE: "\x1b[90m",
  DEBUG: "\x1b[36m",
  INFO: "\x1b[32m",
  WARN: "\x1b[33m",
  ERROR: "\x1b[31m",
  FATAL: "\x1b[35m",
  SILENT: "",
};

const RESET = "\x1b[0m";

/**
 * Console transport
 */
export class ConsoleTransport implements LogTransport {
  readonly name = "console";

  private readonly pretty: boolean;
  private readonly colors: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.pretty = options.pretty ?? isDevelopment();
    this.colors = options.colors ?? process.stdout.isTTY === true;
  }

  log(entry: LogEntry): void {
    if (this.pretty) {
      this.logPretty(entry);
    } else {
      console.log(formatJsonLine(entry));
    }
  }

  private logPretty(entry: LogEntry): void {
    const { level, message, timestamp, context, error } = entry;

    const color = this.colors ? LEVEL_COLORS[level] : "";
    const reset = this.colors ? RESET : "";

    const timePart = timestamp.split("T")[1];
    const time = timePart ? timePart.slice(0, 12) : timestamp;

    let output = `${color}[${time}] ${level.padEnd(5)}${reset} ${message}`;
    if (context) {
      output += ` ${JSON.stringify(context)}`;
    }

    switch (level) {
      case "ERROR":
      case "FATAL":
        console.error(output);
        if (error?.stack) {
          console.error(error.stack);
        }
        break;
      case "WARN":
        console.warn(output);
        break;
      case "DEBUG":
      case "TRACE":
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }
}

/**
 * Render a log entry as a single JSON line (level, time, msg, context fields, err)
 */
export function formatJsonLine(entry: LogEntry): string {
  const output: Record<string, unknown> = {
    level: entry.level,
    time: entry.timestamp,
    msg: entry.message,
  };

  if (entry.context) {
    Object.assign(output, entry.context);
  }
  if (entry.error) {
    output["err"] = entry.error;
  }

  return JSON.stringify(output);
}
