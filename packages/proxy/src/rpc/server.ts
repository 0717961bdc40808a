/**
 * @mqproxy/proxy - RPC Server Adapter
 * Consumes requests, drives a Processor and publishes its results as replies
 */

import { logError } from "@mqproxy/core";
import { ChannelOwner, type ChannelOwnerOptions } from "../connection-state.js";
import { createCodec, type EnvelopeCodec } from "../envelope.js";
import type {
  BrokerChannel,
  ChannelParameters,
  Delivery,
  ExchangeParameters,
  Processor,
  ProcessResult,
  QueueParameters,
} from "../types.js";

export interface RpcServerAdapterOptions extends ChannelOwnerOptions {
  /** Processing capability */
  processor: Processor;
  /** Exchange the queue is bound to */
  exchange: ExchangeParameters;
  /** Queue to consume from */
  queue: QueueParameters;
  /** Binding key */
  routingKey: string;
  /** Prefetch */
  channel?: ChannelParameters;
  /** Codec used to write reply metadata onto message properties */
  codec?: EnvelopeCodec;
}

/**
 * Exchanges that must not (or cannot) be declared by clients
 */
export function isBuiltInExchange(name: string): boolean {
  return name === "" || name.startsWith("amq.");
}

/**
 * RPC server adapter
 *
 * Deliveries are acked before processing, so a crash between ack and reply
 * loses the request.
 */
export class RpcServerAdapter extends ChannelOwner {
  private readonly processor: Processor;
  private readonly exchange: ExchangeParameters;
  private readonly queue: QueueParameters;
  private readonly routingKey: string;
  private readonly channelParams: ChannelParameters | undefined;
  private readonly codec: EnvelopeCodec;
  private queueName: string | null = null;
  private inFlight = 0;

  constructor(options: RpcServerAdapterOptions) {
    super(`rpc-server:${options.routingKey}`, options);
    this.processor = options.processor;
    this.exchange = options.exchange;
    this.queue = options.queue;
    this.routingKey = options.routingKey;
    this.channelParams = options.channel;
    this.codec = options.codec ?? createCodec();
  }

  /**
   * Actual name of the consumed queue, once declared
   */
  get consumedQueue(): string | null {
    return this.queueName;
  }

  /**
   * Deliveries currently being processed
   */
  get processing(): number {
    return this.inFlight;
  }

  protected async onChannel(channel: BrokerChannel, generation: number): Promise<void> {
    if (!isBuiltInExchange(this.exchange.name)) {
      await channel.declareExchange(this.exchange);
    }

    const queue = await channel.declareQueue(this.queue);
    if (this.exchange.name !== "") {
      await channel.bindQueue(queue, this.exchange.name, this.routingKey);
    }
    if (this.channelParams) {
      await channel.prefetch(this.channelParams);
    }

    await channel.consume(queue, (delivery) => {
      if (this.isCurrent(generation)) {
        this.handleDelivery(channel, delivery);
      }
    });
    this.queueName = queue;

    this.logger.debug("consuming", { queue, exchange: this.exchange.name, routingKey: this.routingKey });
  }

  private handleDelivery(channel: BrokerChannel, delivery: Delivery): void {
    try {
      channel.ack(delivery.deliveryTag);
    } catch (error) {
      logError(this.logger, error, "failed to ack request", { deliveryTag: delivery.deliveryTag });
    }

    this.inFlight++;
    this.dispatch(delivery)
      .catch((error: unknown) => {
        logError(this.logger, error, "request dispatch failed", {
          correlationId: delivery.properties.correlationId,
        });
      })
      .finally(() => {
        this.inFlight--;
      });
  }

  private async dispatch(delivery: Delivery): Promise<void> {
    let result: ProcessResult;
    try {
      result = await this.processor.process(delivery);
    } catch (error) {
      this.logger.warn("processing failed", {
        correlationId: delivery.properties.correlationId,
        error: error instanceof Error ? error.message : String(error),
      });
      try {
        result = this.processor.onFailure(delivery, error);
      } catch (failure) {
        logError(this.logger, failure, "failure handler threw, no reply sent", {
          correlationId: delivery.properties.correlationId,
        });
        return;
      }
    }

    this.reply(delivery, result);
  }

  private reply(delivery: Delivery, result: ProcessResult): void {
    const { correlationId, replyTo } = delivery.properties;

    if (result.value === undefined) {
      return;
    }
    if (!replyTo) {
      this.logger.debug("no replyTo on request, result dropped", { correlationId });
      return;
    }

    const channel = this.activeChannel;
    if (!channel) {
      this.logger.warn("not connected, reply dropped", { correlationId, replyTo });
      return;
    }

    channel.publish({
      exchange: "",
      routingKey: replyTo,
      body: result.value,
      properties: {
        ...(result.metadata ? this.codec.toProperties(result.metadata) : {}),
        correlationId,
      },
    });
  }
}
