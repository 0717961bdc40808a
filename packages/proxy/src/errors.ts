/**
 * @mqproxy/proxy - Errors
 */

import { MqError } from "@mqproxy/core";

/**
 * Base proxy error
 */
export class ProxyError extends MqError {
  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = "ProxyError";
  }
}

/**
 * Encoding a message failed locally
 */
export class SerializationError extends ProxyError {
  constructor(message: string, cause?: unknown) {
    super(message, "SERIALIZATION_ERROR", causeDetails(cause));
    this.name = "SerializationError";
  }
}

/**
 * Decoding a message body failed locally
 */
export class DeserializationError extends ProxyError {
  constructor(message: string, cause?: unknown) {
    super(message, "DESERIALIZATION_ERROR", causeDetails(cause));
    this.name = "DeserializationError";
  }
}

/**
 * Operation rejected because the owner is not connected. Nothing was published.
 */
export class NotConnectedError extends ProxyError {
  constructor(owner: string) {
    super(`${owner} is not connected`, "NOT_CONNECTED", { owner });
    this.name = "NotConnectedError";
  }
}

/**
 * The remote processor failed and replied with a failure payload
 */
export class RemoteProcessingError extends ProxyError {
  /** Description of the remote cause, as sent by the server */
  public readonly remoteCause: string;

  constructor(message: string, remoteCause: string) {
    super(message, "REMOTE_PROCESSING_FAILURE", { cause: remoteCause });
    this.name = "RemoteProcessingError";
    this.remoteCause = remoteCause;
  }
}

/**
 * The transport refused an operation
 */
export class TransportError extends ProxyError {
  constructor(message: string, cause?: unknown) {
    super(message, "TRANSPORT_ERROR", causeDetails(cause));
    this.name = "TransportError";
  }
}

/**
 * A proxy client call did not complete in time
 */
export class TimeoutError extends ProxyError {
  constructor(target: string, timeoutMs: number) {
    super(`Request to ${target} timed out after ${timeoutMs}ms`, "TIMEOUT", {
      target,
      timeout: timeoutMs,
    });
    this.name = "TimeoutError";
  }
}

function causeDetails(cause: unknown): Record<string, unknown> | undefined {
  if (cause === undefined) return undefined;
  return { cause: cause instanceof Error ? cause.message : String(cause) };
}

