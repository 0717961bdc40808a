/**
 * @mqproxy/proxy - Type Definitions
 * Broker-facing types shared by the requester, the server adapter and the transports
 */

// ============================================================================
// MESSAGES
// ============================================================================

/**
 * Message properties carried next to the body.
 * `contentEncoding` holds the serializer id and `contentType` the message type name.
 */
export interface MessageProperties {
  contentEncoding?: string | undefined;
  contentType?: string | undefined;
  correlationId?: string | undefined;
  replyTo?: string | undefined;
  /** 1 = transient, 2 = persistent */
  deliveryMode?: number | undefined;
}

/**
 * One outgoing message
 */
export interface Publish {
  exchange: string;
  routingKey: string;
  body: Uint8Array;
  properties?: MessageProperties | undefined;
  /** Ask the broker to return the message when no queue is bound */
  mandatory?: boolean | undefined;
  immediate?: boolean | undefined;
}

/**
 * One inbound message instance
 */
export interface Delivery {
  deliveryTag: number;
  body: Uint8Array;
  properties: MessageProperties;
  exchange?: string | undefined;
  routingKey?: string | undefined;
  redelivered?: boolean | undefined;
}

/**
 * Broker notice that a mandatory message could not be routed
 */
export interface ReturnedMessage {
  replyCode: number;
  replyText: string;
  exchange: string;
  routingKey: string;
  body: Uint8Array;
  properties: MessageProperties;
}

// ============================================================================
// TOPOLOGY
// ============================================================================

export type ExchangeType = "direct" | "fanout" | "topic" | "headers";

export interface ExchangeParameters {
  name: string;
  type: ExchangeType;
  durable: boolean;
  autodelete: boolean;
  /** Only check that the exchange exists */
  passive: boolean;
}

export interface QueueParameters {
  /** Empty name asks the broker for a generated one */
  name: string;
  durable: boolean;
  autodelete: boolean;
  exclusive: boolean;
  /** Only check that the queue exists */
  passive: boolean;
}

export interface ChannelParameters {
  /** Prefetch count */
  qos: number;
  /** Apply the prefetch to the whole channel instead of each consumer */
  global: boolean;
}

// ============================================================================
// TRANSPORT
// ============================================================================

/**
 * Unsubscribe function
 */
export type Unsubscribe = () => void;

/**
 * A channel exclusively owned by one requester or server adapter
 */
export interface BrokerChannel {
  publish(message: Publish): void;
  /** Start a manual-ack consumer; resolves with the consumer tag */
  consume(queue: string, onDelivery: (delivery: Delivery) => void): Promise<string>;
  ack(deliveryTag: number): void;
  /** Resolves with the actual queue name (broker generated for empty names) */
  declareQueue(params: QueueParameters): Promise<string>;
  declareExchange(params: ExchangeParameters): Promise<void>;
  bindQueue(queue: string, exchange: string, routingKey: string): Promise<void>;
  prefetch(params: ChannelParameters): Promise<void>;
  onReturn(listener: (returned: ReturnedMessage) => void): Unsubscribe;
  /** Fires once when the channel closes; `error` is set when the broker closed it */
  onClose(listener: (error?: Error) => void): Unsubscribe;
  close(): Promise<void>;
}

/**
 * Broker connection with connectivity notifications.
 * Reconnection, if any, is the connection's job; owners only follow the signals.
 */
export interface BrokerConnection {
  readonly isConnected: boolean;
  createChannel(): Promise<BrokerChannel>;
  onConnected(listener: () => void): Unsubscribe;
  onDisconnected(listener: (error?: Error) => void): Unsubscribe;
  close(): Promise<void>;
}

// ============================================================================
// PROCESSING
// ============================================================================

/**
 * Envelope metadata: which serializer wrote the body, and what it encodes
 */
export interface EnvelopeMetadata {
  serializerId: string;
  /** Diagnostic only, never used for routing */
  typeName: string;
}

/**
 * Result of processing one delivery.
 * A missing `value` suppresses the reply.
 */
export interface ProcessResult {
  value?: Uint8Array | undefined;
  metadata?: EnvelopeMetadata | undefined;
}

/**
 * Pluggable processing capability driven by the server adapter
 */
export interface Processor {
  process(delivery: Delivery): Promise<ProcessResult>;
  /**
   * Describe why processing failed, typically as an encoded failure payload
   */
  onFailure(delivery: Delivery, error: unknown): ProcessResult;
}

// ============================================================================
// OUTCOMES
// ============================================================================

/**
 * All expected replies arrived (empty for fire-and-forget requests)
 */
export interface ResponseOutcome {
  kind: "response";
  deliveries: Delivery[];
}

/**
 * The broker could not route the request
 */
export interface UndeliveredOutcome {
  kind: "undelivered";
  returned: ReturnedMessage;
}

export type RpcOutcome = ResponseOutcome | UndeliveredOutcome;

/**
 * Connection state of a channel owner
 */
export type ConnectionState = "disconnected" | "connected";
