/**
 * @module
 * Shared utilities for mqproxy packages: logging, environment access,
 * the base error class and id generation.
 *
 * @example
 * ```typescript
 * import { createLogger, getEnv, MqError, generateId } from '@mqproxy/core';
 *
 * const log = createLogger({ name: 'calculator' });
 * log.info('connecting', { host: getEnv('MQ_HOST', 'localhost') });
 * ```
 */

import { randomUUID } from "node:crypto";

// ============================================
// ENVIRONMENT
// ============================================

export { getEnv, getEnvNumber, getEnvBoolean, isDevelopment } from "./env.js";

// ============================================
// LOGGING
// ============================================

export {
  Logger,
  ConsoleTransport,
  LogLevel,
  createLogger,
  formatJsonLine,
  logError,
  type ConsoleTransportOptions,
  type ErrorInfo,
  type LogLevelName,
  type LogLevelValue,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
} from "./logger.js";

// ============================================
// ERRORS
// ============================================

export { MqError, ConfigError, describeError } from "./errors.js";

// ============================================
// UTILITY FUNCTIONS
// ============================================

/**
 * Generate a UUID v4.
 *
 * @example
 * ```typescript
 * const suffix = generateId(); // "550e8400-e29b-41d4-a716-446655440000"
 * ```
 */
export function generateId(): string {
  return randomUUID();
}

