/**
 * @mqproxy/core - Transport Types
 * Interface for log destinations
 */

import type { LogEntry } from "../logger.js";

/**
 * Log transport interface
 * Implement this to create custom log destinations
 */
export interface LogTransport {
  /** Transport name for identification */
  readonly name: string;

  /**
   * Log an entry
   * Can be sync or async - async transports should handle their own buffering
   */
  log(entry: LogEntry): void | Promise<void>;

  /**
   * Flush any buffered logs
   */
  flush?(): Promise<void>;
}
