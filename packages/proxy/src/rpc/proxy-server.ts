/**
 * @mqproxy/proxy - Proxy Server
 * Processors that decode requests, run an application handler and encode its result
 */

import { type } from "arktype";
import type { Logger } from "@mqproxy/core";
import { createLogger, describeError } from "@mqproxy/core";
import { createCodec, type EnvelopeCodec } from "../envelope.js";
import type { Serializer } from "../serialization/index.js";
import type { Delivery, Processor, ProcessResult } from "../types.js";

// ============================================================================
// SERVER FAILURE
// ============================================================================

/** Type name carried by failure replies */
export const SERVER_FAILURE_TYPE = "ServerFailure";

/**
 * Failure payload sent back when a handler throws
 */
export class ServerFailure {
  constructor(
    readonly message: string,
    readonly cause: string
  ) {}

  toJSON(): { message: string; cause: string } {
    return { message: this.message, cause: this.cause };
  }
}

/** Decoded shape of a failure reply */
export const serverFailureShape = type({
  message: "string",
  cause: "string",
});

// ============================================================================
// HANDLERS
// ============================================================================

/**
 * Context passed to proxy handlers
 */
export interface ProxyHandlerContext {
  /** Raw delivery */
  delivery: Delivery;
  /** Type name announced by the sender */
  typeName: string | undefined;
  /** Serializer the request was decoded with; the reply uses it too */
  serializer: Serializer;
  /** Logger bound to the request */
  logger: Logger;
}

/**
 * Application handler; returning `undefined` sends no reply
 */
export type ProxyHandler = (message: unknown, context: ProxyHandlerContext) => unknown;

export interface ProxyServerOptions {
  /** Codec (default: createCodec()) */
  codec?: EnvelopeCodec;
  /** Logger */
  logger?: Logger;
}

function decodeRequest(
  codec: EnvelopeCodec,
  delivery: Delivery,
  logger: Logger
): { message: unknown; context: ProxyHandlerContext } {
  const metadata = codec.fromProperties(delivery.properties);
  const { message, serializer } = codec.deserialize(delivery.body, metadata);
  return {
    message,
    context: {
      delivery,
      typeName: metadata.typeName,
      serializer,
      logger: logger.child({ correlationId: delivery.properties.correlationId ?? null }),
    },
  };
}

/**
 * Processor answering requests with the handler's result
 *
 * @example
 * ```typescript
 * const processor = createProxyServer(async (message) => {
 *   if (typeof message !== 'number') throw new Error('expected a number');
 *   return message * 2;
 * });
 * ```
 */
export function createProxyServer(handler: ProxyHandler, options: ProxyServerOptions = {}): Processor {
  const codec = options.codec ?? createCodec();
  const logger = options.logger ?? createLogger({ name: "proxy-server" });

  return {
    async process(delivery: Delivery): Promise<ProcessResult> {
      const { message, context } = decodeRequest(codec, delivery, logger);
      const result = await handler(message, context);
      if (result === undefined) {
        return {};
      }

      const envelope = codec.serialize(result, context.serializer);
      return { value: envelope.body, metadata: envelope.metadata };
    },

    onFailure(_delivery: Delivery, error: unknown): ProcessResult {
      const failure = new ServerFailure(
        error instanceof Error ? error.message : String(error),
        describeError(error)
      );
      const envelope = codec.serialize(failure, codec.registry.lookup("json"));
      return { value: envelope.body, metadata: envelope.metadata };
    },
  };
}

/**
 * Processor that runs the handler and never replies
 */
export function createSubscriberProcessor(handler: ProxyHandler, options: ProxyServerOptions = {}): Processor {
  const codec = options.codec ?? createCodec();
  const logger = options.logger ?? createLogger({ name: "subscriber" });

  return {
    async process(delivery: Delivery): Promise<ProcessResult> {
      const { message, context } = decodeRequest(codec, delivery, logger);
      await handler(message, context);
      return {};
    },

    onFailure(delivery: Delivery, error: unknown): ProcessResult {
      logger.error("subscriber failed", error, { correlationId: delivery.properties.correlationId ?? null });
      return {};
    },
  };
}
