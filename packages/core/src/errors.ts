/**
 * @module
 * Base error class shared by every mqproxy package.
 *
 * @example
 * ```typescript
 * import { MqError } from '@mqproxy/core';
 *
 * throw new MqError('Queue declaration failed', 'TOPOLOGY_ERROR', { queue: 'calculator' });
 * ```
 */

/**
 * Base error carrying a machine-readable code and optional details.
 */
export class MqError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown> | undefined;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "MqError";
    this.code = code;
    this.details = details ?? undefined;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/** Configuration could not be parsed or failed validation */
export class ConfigError extends MqError {
  constructor(message: string, public readonly problems: string[] = []) {
    super(message, "CONFIG_ERROR", problems.length > 0 ? { problems } : undefined);
    this.name = "ConfigError";
  }
}

/**
 * Render anything that was thrown as a one-line description.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
