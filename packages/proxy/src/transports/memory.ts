/**
 * @mqproxy/proxy - Memory Transport
 * In-process broker for development and testing
 */

import { TransportError } from "../errors.js";
import type {
  BrokerChannel,
  BrokerConnection,
  ChannelParameters,
  Delivery,
  ExchangeParameters,
  ExchangeType,
  MessageProperties,
  Publish,
  QueueParameters,
  ReturnedMessage,
  Unsubscribe,
} from "../types.js";

/**
 * A message sitting in a queue or awaiting ack
 */
export interface StoredMessage {
  exchange: string;
  routingKey: string;
  body: Uint8Array;
  properties: MessageProperties;
  redelivered: boolean;
}

interface Consumer {
  tag: string;
  channel: MemoryChannel;
  onDelivery: (delivery: Delivery) => void;
}

interface MemoryQueue {
  name: string;
  owner: MemoryConnection | null;
  autodelete: boolean;
  messages: StoredMessage[];
  consumers: Consumer[];
  next: number;
  hadConsumers: boolean;
}

interface Binding {
  queue: string;
  routingKey: string;
}

interface MemoryExchange {
  name: string;
  type: ExchangeType;
  bindings: Binding[];
}

/**
 * Record of a publish accepted by the broker
 */
export interface PublishedMessage {
  exchange: string;
  routingKey: string;
  properties: MessageProperties;
  mandatory: boolean;
  /** Queues the message was routed to */
  routedTo: string[];
}

/**
 * AMQP topic pattern match; `*` is one word, `#` zero or more
 */
export function topicMatches(pattern: string, routingKey: string): boolean {
  const match = (p: string[], k: string[]): boolean => {
    if (p.length === 0) return k.length === 0;
    const [head, ...rest] = p;
    if (head === "#") {
      for (let i = 0; i <= k.length; i++) {
        if (match(rest, k.slice(i))) return true;
      }
      return false;
    }
    if (k.length === 0) return false;
    return (head === "*" || head === k[0]) && match(rest, k.slice(1));
  };
  return match(pattern.split("."), routingKey === "" ? [] : routingKey.split("."));
}

/**
 * In-memory broker
 *
 * @example
 * ```typescript
 * const broker = new MemoryBroker();
 * const connection = broker.connect();
 *
 * const server = new RpcServerAdapter({ ... }).start(connection);
 * await server.whenConnected();
 *
 * connection.disconnect(); // owners drop to disconnected
 * connection.reconnect();
 * ```
 */
export class MemoryBroker {
  private readonly exchanges = new Map<string, MemoryExchange>();
  private readonly queues = new Map<string, MemoryQueue>();
  private queueCounter = 0;
  private consumerCounter = 0;

  /** Every publish the broker accepted, in order */
  readonly published: PublishedMessage[] = [];

  constructor() {
    this.addExchange("", "direct");
    this.addExchange("amq.direct", "direct");
    this.addExchange("amq.fanout", "fanout");
    this.addExchange("amq.topic", "topic");
  }

  /**
   * Open a connection; connected immediately unless `connected` is false
   */
  connect(options: { connected?: boolean } = {}): MemoryConnection {
    return new MemoryConnection(this, options.connected ?? true);
  }

  hasQueue(name: string): boolean {
    return this.queues.has(name);
  }

  hasExchange(name: string): boolean {
    return this.exchanges.has(name);
  }

  queueNames(): string[] {
    return [...this.queues.keys()];
  }

  /**
   * Messages waiting in a queue (not yet delivered)
   */
  messageCount(queue: string): number {
    return this.queues.get(queue)?.messages.length ?? 0;
  }

  consumerCount(queue: string): number {
    return this.queues.get(queue)?.consumers.length ?? 0;
  }

  // ==========================================================================
  // CHANNEL OPERATIONS
  // ==========================================================================

  /** @internal */
  declareExchange(params: ExchangeParameters): void {
    const existing = this.exchanges.get(params.name);
    if (params.passive) {
      if (!existing) {
        throw new TransportError(`NOT_FOUND - no exchange '${params.name}'`);
      }
      return;
    }
    if (existing) {
      if (existing.type !== params.type) {
        throw new TransportError(
          `PRECONDITION_FAILED - exchange '${params.name}' is ${existing.type}, not ${params.type}`
        );
      }
      return;
    }
    this.addExchange(params.name, params.type);
  }

  /** @internal */
  declareQueue(params: QueueParameters, connection: MemoryConnection): string {
    if (params.passive) {
      if (!this.queues.has(params.name)) {
        throw new TransportError(`NOT_FOUND - no queue '${params.name}'`);
      }
      return params.name;
    }

    const name = params.name === "" ? `amq.gen-${++this.queueCounter}` : params.name;
    const existing = this.queues.get(name);
    if (existing) {
      if (existing.owner && existing.owner !== connection) {
        throw new TransportError(`RESOURCE_LOCKED - queue '${name}' is exclusive to another connection`);
      }
      return name;
    }

    this.queues.set(name, {
      name,
      owner: params.exclusive ? connection : null,
      autodelete: params.autodelete,
      messages: [],
      consumers: [],
      next: 0,
      hadConsumers: false,
    });
    return name;
  }

  /** @internal */
  bindQueue(queue: string, exchange: string, routingKey: string): void {
    const target = this.exchanges.get(exchange);
    if (!target) {
      throw new TransportError(`NOT_FOUND - no exchange '${exchange}'`);
    }
    if (!this.queues.has(queue)) {
      throw new TransportError(`NOT_FOUND - no queue '${queue}'`);
    }
    if (!target.bindings.some((b) => b.queue === queue && b.routingKey === routingKey)) {
      target.bindings.push({ queue, routingKey });
    }
  }

  /** @internal */
  consume(queue: string, channel: MemoryChannel, onDelivery: (delivery: Delivery) => void): string {
    const target = this.queues.get(queue);
    if (!target) {
      throw new TransportError(`NOT_FOUND - no queue '${queue}'`);
    }
    if (target.owner && target.owner !== channel.connection) {
      throw new TransportError(`RESOURCE_LOCKED - queue '${queue}' is exclusive to another connection`);
    }

    const tag = `ctag-${++this.consumerCounter}`;
    target.consumers.push({ tag, channel, onDelivery });
    target.hadConsumers = true;
    this.schedule(queue);
    return tag;
  }

  /** @internal */
  publish(message: Publish, from: MemoryChannel): void {
    const exchange = this.exchanges.get(message.exchange);
    if (!exchange) {
      throw new TransportError(`NOT_FOUND - no exchange '${message.exchange}'`);
    }

    const properties: MessageProperties = { ...message.properties };
    const routedTo = this.route(exchange, message.routingKey);
    this.published.push({
      exchange: message.exchange,
      routingKey: message.routingKey,
      properties,
      mandatory: message.mandatory ?? false,
      routedTo,
    });

    if (routedTo.length === 0) {
      if (message.mandatory) {
        const returned: ReturnedMessage = {
          replyCode: 312,
          replyText: "NO_ROUTE",
          exchange: message.exchange,
          routingKey: message.routingKey,
          body: message.body,
          properties,
        };
        queueMicrotask(() => from.emitReturn(returned));
      }
      return;
    }

    for (const name of routedTo) {
      const queue = this.queues.get(name);
      if (!queue) continue;
      queue.messages.push({
        exchange: message.exchange,
        routingKey: message.routingKey,
        body: message.body,
        properties,
        redelivered: false,
      });
      this.schedule(name);
    }
  }

  /**
   * Put unacked messages back at the head of their queues
   * @internal
   */
  requeue(entries: Array<{ queue: string; message: StoredMessage }>): void {
    for (const { queue, message } of [...entries].reverse()) {
      const target = this.queues.get(queue);
      if (!target) continue;
      target.messages.unshift({ ...message, redelivered: true });
      this.schedule(queue);
    }
  }

  /** @internal */
  releaseChannel(channel: MemoryChannel): void {
    for (const queue of [...this.queues.values()]) {
      const before = queue.consumers.length;
      queue.consumers = queue.consumers.filter((c) => c.channel !== channel);
      if (queue.autodelete && queue.hadConsumers && before > 0 && queue.consumers.length === 0) {
        this.deleteQueue(queue.name);
      }
    }
  }

  /** @internal */
  releaseConnection(connection: MemoryConnection): void {
    for (const queue of [...this.queues.values()]) {
      if (queue.owner === connection) {
        this.deleteQueue(queue.name);
      }
    }
  }

  /** @internal */
  schedule(queue: string): void {
    queueMicrotask(() => this.dispatch(queue));
  }

  private addExchange(name: string, type: ExchangeType): void {
    this.exchanges.set(name, { name, type, bindings: [] });
  }

  private deleteQueue(name: string): void {
    this.queues.delete(name);
    for (const exchange of this.exchanges.values()) {
      exchange.bindings = exchange.bindings.filter((b) => b.queue !== name);
    }
  }

  private route(exchange: MemoryExchange, routingKey: string): string[] {
    // the default exchange reaches every queue under its own name
    if (exchange.name === "") {
      return this.queues.has(routingKey) ? [routingKey] : [];
    }

    const matched = exchange.bindings.filter((binding) => {
      switch (exchange.type) {
        case "fanout":
          return true;
        case "direct":
          return binding.routingKey === routingKey;
        case "topic":
          return topicMatches(binding.routingKey, routingKey);
        case "headers":
          return false;
      }
    });
    return [...new Set(matched.map((b) => b.queue))];
  }

  private dispatch(name: string): void {
    const queue = this.queues.get(name);
    if (!queue) return;

    while (queue.messages.length > 0) {
      const consumer = this.nextConsumer(queue);
      if (!consumer) return;

      const message = queue.messages.shift();
      if (!message) return;

      const deliveryTag = consumer.channel.track(name, message);
      consumer.onDelivery({
        deliveryTag,
        body: message.body,
        properties: { ...message.properties },
        exchange: message.exchange,
        routingKey: message.routingKey,
        redelivered: message.redelivered,
      });
    }
  }

  /**
   * Round-robin over consumers whose channel has prefetch room
   */
  private nextConsumer(queue: MemoryQueue): Consumer | undefined {
    const count = queue.consumers.length;
    for (let i = 0; i < count; i++) {
      const index = (queue.next + i) % count;
      const consumer = queue.consumers[index];
      if (consumer && consumer.channel.hasCapacity) {
        queue.next = (index + 1) % count;
        return consumer;
      }
    }
    return undefined;
  }
}

/**
 * Connection to a MemoryBroker with test controls for connectivity
 */
export class MemoryConnection implements BrokerConnection {
  private connected: boolean;
  private readonly channels = new Set<MemoryChannel>();
  private readonly connectedListeners = new Set<() => void>();
  private readonly disconnectedListeners = new Set<(error?: Error) => void>();

  constructor(
    private readonly broker: MemoryBroker,
    connected: boolean
  ) {
    this.connected = connected;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /** Open channels */
  get channelCount(): number {
    return this.channels.size;
  }

  async createChannel(): Promise<BrokerChannel> {
    if (!this.connected) {
      throw new TransportError("Connection is closed");
    }
    const channel = new MemoryChannel(this.broker, this);
    this.channels.add(channel);
    return channel;
  }

  onConnected(listener: () => void): Unsubscribe {
    this.connectedListeners.add(listener);
    return () => {
      this.connectedListeners.delete(listener);
    };
  }

  onDisconnected(listener: (error?: Error) => void): Unsubscribe {
    this.disconnectedListeners.add(listener);
    return () => {
      this.disconnectedListeners.delete(listener);
    };
  }

  /**
   * Drop the connection: channels close, exclusive queues go away,
   * unacked messages are requeued
   */
  disconnect(error?: Error): void {
    if (!this.connected) return;
    this.connected = false;

    for (const channel of [...this.channels]) {
      channel.release();
    }
    this.broker.releaseConnection(this);

    for (const listener of [...this.disconnectedListeners]) {
      listener(error);
    }
  }

  reconnect(): void {
    if (this.connected) return;
    this.connected = true;
    for (const listener of [...this.connectedListeners]) {
      listener();
    }
  }

  async close(): Promise<void> {
    this.disconnect();
  }

  /**
   * Close every open channel as the broker does after a channel-level error;
   * the connection stays up
   */
  closeChannels(error: Error): void {
    for (const channel of [...this.channels]) {
      channel.release(error);
    }
  }

  /** @internal */
  forget(channel: MemoryChannel): void {
    this.channels.delete(channel);
  }
}

/**
 * Channel on a MemoryConnection
 */
export class MemoryChannel implements BrokerChannel {
  private closed = false;
  private prefetchCount = 0;
  private nextTag = 0;
  private readonly unacked = new Map<number, { queue: string; message: StoredMessage }>();
  private readonly returnListeners = new Set<(returned: ReturnedMessage) => void>();
  private readonly closeListeners = new Set<(error?: Error) => void>();

  constructor(
    private readonly broker: MemoryBroker,
    readonly connection: MemoryConnection
  ) {}

  get isOpen(): boolean {
    return !this.closed;
  }

  /** Delivered but not yet acked */
  get unackedCount(): number {
    return this.unacked.size;
  }

  /** @internal */
  get hasCapacity(): boolean {
    return !this.closed && (this.prefetchCount === 0 || this.unacked.size < this.prefetchCount);
  }

  publish(message: Publish): void {
    this.ensureOpen();
    this.broker.publish(message, this);
  }

  async consume(queue: string, onDelivery: (delivery: Delivery) => void): Promise<string> {
    this.ensureOpen();
    return this.broker.consume(queue, this, onDelivery);
  }

  ack(deliveryTag: number): void {
    this.ensureOpen();
    const entry = this.unacked.get(deliveryTag);
    if (!entry) {
      throw new TransportError(`PRECONDITION_FAILED - unknown delivery tag ${deliveryTag}`);
    }
    this.unacked.delete(deliveryTag);
    this.broker.schedule(entry.queue);
  }

  async declareQueue(params: QueueParameters): Promise<string> {
    this.ensureOpen();
    return this.broker.declareQueue(params, this.connection);
  }

  async declareExchange(params: ExchangeParameters): Promise<void> {
    this.ensureOpen();
    this.broker.declareExchange(params);
  }

  async bindQueue(queue: string, exchange: string, routingKey: string): Promise<void> {
    this.ensureOpen();
    this.broker.bindQueue(queue, exchange, routingKey);
  }

  async prefetch(params: ChannelParameters): Promise<void> {
    this.ensureOpen();
    this.prefetchCount = params.qos;
  }

  onReturn(listener: (returned: ReturnedMessage) => void): Unsubscribe {
    this.returnListeners.add(listener);
    return () => {
      this.returnListeners.delete(listener);
    };
  }

  onClose(listener: (error?: Error) => void): Unsubscribe {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  async close(): Promise<void> {
    this.release();
  }

  /** @internal */
  track(queue: string, message: StoredMessage): number {
    const tag = ++this.nextTag;
    this.unacked.set(tag, { queue, message });
    return tag;
  }

  /** @internal */
  emitReturn(returned: ReturnedMessage): void {
    if (this.closed) return;
    for (const listener of [...this.returnListeners]) {
      listener(returned);
    }
  }

  /** @internal */
  release(error?: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.broker.releaseChannel(this);
    this.broker.requeue([...this.unacked.values()]);
    this.unacked.clear();
    this.returnListeners.clear();
    this.connection.forget(this);

    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) {
      listener(error);
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new TransportError("Channel is closed");
    }
  }
}
