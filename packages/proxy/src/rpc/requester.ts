/**
 * @mqproxy/proxy - RPC Requester
 * Publishes requests and correlates replies on a private reply queue
 */

import { logError } from "@mqproxy/core";
import { ChannelOwner, type ChannelOwnerOptions } from "../connection-state.js";
import { NotConnectedError, ProxyError, TransportError } from "../errors.js";
import type {
  BrokerChannel,
  ChannelParameters,
  Delivery,
  Publish,
  QueueParameters,
  ReturnedMessage,
  RpcOutcome,
} from "../types.js";
import { CorrelationTable } from "./correlation-table.js";

/**
 * Broker-named, exclusive, auto-deleted reply queue
 */
export const PRIVATE_REPLY_QUEUE: QueueParameters = {
  name: "",
  durable: false,
  autodelete: true,
  exclusive: true,
  passive: false,
};

export interface RpcRequesterOptions extends ChannelOwnerOptions {
  /**
   * Reply queue to declare and consume (default: private broker-named queue).
   * `false` declares none; such a requester can only send fire-and-forget requests.
   */
  replyQueue?: QueueParameters | false;
  /** Prefetch applied to the reply channel */
  channel?: ChannelParameters;
}

/**
 * RPC requester
 *
 * @example
 * ```typescript
 * const requester = new RpcRequester({ name: 'calculator-client' }).start(connection);
 * await requester.whenConnected();
 *
 * const outcome = await requester.sendRequest([publish], 1);
 * if (outcome.kind === 'response') {
 *   console.log(outcome.deliveries[0]?.body);
 * }
 * ```
 */
export class RpcRequester extends ChannelOwner {
  private readonly table = new CorrelationTable();
  private readonly replyQueue: QueueParameters | false;
  private readonly channelParams: ChannelParameters | undefined;
  private replyQueueName: string | null = null;
  private counter = 0;

  constructor(options: RpcRequesterOptions = {}) {
    super("rpc-requester", options);
    this.replyQueue = options.replyQueue ?? PRIVATE_REPLY_QUEUE;
    this.channelParams = options.channel;
  }

  /**
   * Requests still waiting for replies
   */
  get pendingCount(): number {
    return this.table.size;
  }

  /**
   * Name of the declared reply queue, while connected
   */
  get replyTo(): string | null {
    return this.isConnected ? this.replyQueueName : null;
  }

  /**
   * Publish one request made of one or more messages, all sharing a fresh
   * correlation id, and wait for `expected` replies.
   *
   * With `expected` 0 the messages are published without correlation and the
   * outcome resolves right away with no deliveries. A mandatory message the
   * broker cannot route resolves the whole request as undelivered.
   */
  sendRequest(publishes: Publish[], expected: number): Promise<RpcOutcome> {
    if (!Number.isInteger(expected) || expected < 0) {
      return Promise.reject(
        new ProxyError(`Expected reply count must be a non-negative integer, got ${expected}`, "INVALID_REQUEST")
      );
    }

    const channel = this.activeChannel;
    if (!channel) {
      return Promise.reject(new NotConnectedError(this.ownerName));
    }

    if (expected === 0) {
      try {
        for (const publish of publishes) {
          channel.publish(publish);
        }
      } catch (error) {
        return Promise.reject(new TransportError("Failed to publish request", error));
      }
      return Promise.resolve({ kind: "response", deliveries: [] });
    }

    const replyTo = this.replyQueueName;
    if (replyTo === null) {
      return Promise.reject(
        new ProxyError(`${this.ownerName} has no reply queue`, "INVALID_REQUEST", { expected })
      );
    }

    this.counter += 1;
    const correlationId = String(this.counter);

    return new Promise<RpcOutcome>((resolve, reject) => {
      this.table.add({ correlationId, expected, deliveries: [], resolve });

      try {
        for (const publish of publishes) {
          channel.publish({
            ...publish,
            properties: { ...publish.properties, correlationId, replyTo },
          });
        }
      } catch (error) {
        this.table.remove(correlationId);
        reject(new TransportError("Failed to publish request", error));
        return;
      }

      this.logger.debug("request sent", { correlationId, expected, messages: publishes.length });
    });
  }

  protected async onChannel(channel: BrokerChannel, generation: number): Promise<void> {
    if (this.channelParams) {
      await channel.prefetch(this.channelParams);
    }

    this.replyQueueName = null;
    channel.onReturn((returned) => {
      if (this.isCurrent(generation)) {
        this.handleReturn(returned);
      }
    });

    if (this.replyQueue !== false) {
      const queue = await channel.declareQueue(this.replyQueue);
      await channel.consume(queue, (delivery) => {
        if (this.isCurrent(generation)) {
          this.handleDelivery(channel, delivery);
        }
      });
      this.replyQueueName = queue;
    }

    this.dropPending("connected");
  }

  protected override onDisconnected(): void {
    this.dropPending("disconnected");
  }

  private handleDelivery(channel: BrokerChannel, delivery: Delivery): void {
    try {
      channel.ack(delivery.deliveryTag);
    } catch (error) {
      logError(this.logger, error, "failed to ack reply", { deliveryTag: delivery.deliveryTag });
    }

    const { correlationId } = delivery.properties;
    const match = this.table.addDelivery(correlationId, delivery);

    switch (match.status) {
      case "unknown":
        this.logger.warn("reply for unknown correlation id", { correlationId: correlationId ?? null });
        break;
      case "pending":
        this.logger.debug("partial reply", {
          correlationId,
          received: match.received,
          expected: match.expected,
        });
        break;
      case "complete":
        this.logger.debug("request complete", { correlationId });
        break;
    }
  }

  private handleReturn(returned: ReturnedMessage): void {
    const { correlationId } = returned.properties;
    if (this.table.markUndelivered(correlationId, returned)) {
      this.logger.info("request returned by broker", {
        correlationId,
        replyCode: returned.replyCode,
        replyText: returned.replyText,
      });
    } else {
      this.logger.debug("returned message without a pending request", {
        correlationId: correlationId ?? null,
      });
    }
  }

  private dropPending(reason: string): void {
    const dropped = this.table.clear();
    if (dropped > 0) {
      this.logger.warn(`dropped ${dropped} pending request(s)`, { reason });
    }
  }
}
