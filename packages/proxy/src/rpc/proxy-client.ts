/**
 * @mqproxy/proxy - Proxy Client
 * Message-level request/response and fire-and-forget on top of the requester
 */

import { type } from "arktype";
import type { Logger } from "@mqproxy/core";
import { createLogger } from "@mqproxy/core";
import { createCodec, type EnvelopeCodec } from "../envelope.js";
import { ProxyError, RemoteProcessingError } from "../errors.js";
import { withTimeout } from "../resilience/timeout.js";
import type { Serializer } from "../serialization/index.js";
import type { Publish, RpcOutcome, UndeliveredOutcome } from "../types.js";
import { SERVER_FAILURE_TYPE, serverFailureShape } from "./proxy-server.js";
import type { RpcRequester } from "./requester.js";

/**
 * Reply to `ask`
 */
export type ProxyReply<T> = { kind: "response"; message: T } | UndeliveredOutcome;

export interface AskOptions {
  /** Per-call timeout in ms; 0 waits forever */
  timeout?: number;
}

export interface ProxyTarget {
  /** Exchange requests are published to */
  exchange: string;
  /** Routing key of requests */
  routingKey: string;
}

export interface ProxyPublisherOptions extends ProxyTarget {
  requester: RpcRequester;
  serializer: Serializer;
  codec?: EnvelopeCodec;
  /** Delivery mode, 1 transient or 2 persistent (default 1) */
  deliveryMode?: number;
  /** Ask the broker to return unroutable messages (default true) */
  mandatory?: boolean;
  immediate?: boolean;
  logger?: Logger;
}

export interface ProxyClientOptions extends ProxyPublisherOptions {
  /** Default timeout in ms (default 30000; 0 disables) */
  timeout?: number;
}

export type ProxySenderOptions = ProxyPublisherOptions;

export abstract class ProxyPublisher {
  protected readonly requester: RpcRequester;
  protected readonly serializer: Serializer;
  protected readonly codec: EnvelopeCodec;
  protected readonly target: ProxyTarget;
  protected readonly deliveryMode: number;
  protected readonly mandatory: boolean;
  protected readonly immediate: boolean;
  protected readonly logger: Logger;

  constructor(options: ProxyPublisherOptions, defaultName: string) {
    this.requester = options.requester;
    this.serializer = options.serializer;
    this.codec = options.codec ?? createCodec();
    this.target = { exchange: options.exchange, routingKey: options.routingKey };
    this.deliveryMode = options.deliveryMode ?? 1;
    this.mandatory = options.mandatory ?? true;
    this.immediate = options.immediate ?? false;
    this.logger = options.logger ?? createLogger({ name: `${defaultName}:${options.routingKey}` });
  }

  protected toPublish(message: unknown): Publish {
    const envelope = this.codec.serialize(message, this.serializer);
    return {
      exchange: this.target.exchange,
      routingKey: this.target.routingKey,
      body: envelope.body,
      properties: { ...this.codec.toProperties(envelope.metadata), deliveryMode: this.deliveryMode },
      mandatory: this.mandatory,
      immediate: this.immediate,
    };
  }
}

/**
 * Request/response proxy
 *
 * @example
 * ```typescript
 * const reply = await client.ask(21);
 * if (reply.kind === 'response') {
 *   console.log(reply.message); // 42
 * }
 * ```
 */
export class ProxyClient extends ProxyPublisher {
  private readonly timeout: number;

  constructor(options: ProxyClientOptions) {
    super(options, "proxy-client");
    this.timeout = options.timeout ?? 30_000;
  }

  /**
   * Send a request and wait for exactly one reply.
   * Pass `parse` to validate and type the decoded reply.
   *
   * @throws SerializationError, NotConnectedError, TimeoutError, RemoteProcessingError
   */
  ask<T>(message: unknown, options: AskOptions & { parse: (value: unknown) => T }): Promise<ProxyReply<T>>;
  ask(message: unknown, options?: AskOptions): Promise<ProxyReply<unknown>>;
  async ask(
    message: unknown,
    options: AskOptions & { parse?: (value: unknown) => unknown } = {}
  ): Promise<ProxyReply<unknown>> {
    const publish = this.toPublish(message);
    const timeout = options.timeout ?? this.timeout;

    const pending = this.requester.sendRequest([publish], 1);
    const outcome: RpcOutcome =
      timeout > 0
        ? await withTimeout(pending, timeout, `${this.target.exchange}/${this.target.routingKey}`)
        : await pending;

    if (outcome.kind === "undelivered") {
      this.logger.info("request undelivered", {
        replyCode: outcome.returned.replyCode,
        replyText: outcome.returned.replyText,
      });
      return outcome;
    }

    const delivery = outcome.deliveries[0];
    if (!delivery) {
      throw new ProxyError("Request completed without a reply", "EMPTY_RESPONSE");
    }

    const { message: decoded } = this.codec.decode(delivery.body, delivery.properties);
    // the type name only flags a candidate; the payload shape decides
    if (this.codec.fromProperties(delivery.properties).typeName === SERVER_FAILURE_TYPE) {
      const failure = serverFailureShape(decoded);
      if (!(failure instanceof type.errors)) {
        throw new RemoteProcessingError(failure.message, failure.cause);
      }
    }

    return { kind: "response", message: options.parse ? options.parse(decoded) : decoded };
  }
}

/**
 * Fire-and-forget proxy
 */
export class ProxySender extends ProxyPublisher {
  constructor(options: ProxySenderOptions) {
    super(options, "proxy-sender");
  }

  /**
   * Publish a message without waiting for any reply
   *
   * @throws SerializationError, NotConnectedError, TransportError
   */
  async tell(message: unknown): Promise<void> {
    await this.requester.sendRequest([this.toPublish(message)], 0);
  }
}
