/**
 * @module
 * Request/response over a fire-and-forget AMQP broker: correlation of replies,
 * connection-state gating and a server adapter that turns processors into replies.
 *
 * @example
 * ```typescript
 * import { AmqpConnection, ProxyFactory, amqpUrl, brokerConfigFromEnv, createProxyServer, jsonSerializer } from '@mqproxy/proxy';
 *
 * const connection = new AmqpConnection({ url: amqpUrl(brokerConfigFromEnv()) });
 * await connection.connect();
 *
 * const factory = new ProxyFactory({ connection });
 * await factory.rpcServer('calculator', createProxyServer((n) => Number(n) * 2));
 *
 * const client = await factory.rpcClient('calculator', jsonSerializer);
 * const reply = await client.ask(21);
 * ```
 */

// ============================================================================
// TYPES
// ============================================================================

export type {
  BrokerChannel,
  BrokerConnection,
  ChannelParameters,
  ConnectionState,
  Delivery,
  EnvelopeMetadata,
  ExchangeParameters,
  ExchangeType,
  MessageProperties,
  Processor,
  ProcessResult,
  Publish,
  QueueParameters,
  ResponseOutcome,
  ReturnedMessage,
  RpcOutcome,
  UndeliveredOutcome,
  Unsubscribe,
} from "./types.js";

// ============================================================================
// ERRORS
// ============================================================================

export {
  ProxyError,
  SerializationError,
  DeserializationError,
  NotConnectedError,
  RemoteProcessingError,
  TransportError,
  TimeoutError,
} from "./errors.js";

// ============================================================================
// SERIALIZATION
// ============================================================================

export {
  SerializerRegistry,
  createSerializerRegistry,
  createSerializer,
  jsonSerializer,
  msgpackSerializer,
  binarySerializer,
  msgpackEncode,
  msgpackDecode,
  type Serializer,
} from "./serialization/index.js";

export { EnvelopeCodec, createCodec, typeNameOf, type CodecOptions, type Envelope } from "./envelope.js";

// ============================================================================
// CORRELATION
// ============================================================================

export { ChannelOwner, type ChannelOwnerOptions } from "./connection-state.js";
export { CorrelationTable, type MatchResult, type PendingRequest } from "./rpc/correlation-table.js";
export { RpcRequester, PRIVATE_REPLY_QUEUE, type RpcRequesterOptions } from "./rpc/requester.js";
export { RpcServerAdapter, isBuiltInExchange, type RpcServerAdapterOptions } from "./rpc/server.js";

// ============================================================================
// PROXIES
// ============================================================================

export {
  ProxyClient,
  ProxySender,
  type AskOptions,
  type ProxyClientOptions,
  type ProxyReply,
  type ProxySenderOptions,
  type ProxyTarget,
} from "./rpc/proxy-client.js";

export {
  createProxyServer,
  createSubscriberProcessor,
  ServerFailure,
  SERVER_FAILURE_TYPE,
  type ProxyHandler,
  type ProxyHandlerContext,
  type ProxyServerOptions,
} from "./rpc/proxy-server.js";

export { ProxyFactory, type ClientOptions, type ProxyFactoryOptions } from "./factory.js";

// ============================================================================
// CONFIGURATION
// ============================================================================

export {
  proxyConfigSchema,
  parseProxyConfig,
  resolveEndpoint,
  brokerConfigFromEnv,
  amqpUrl,
  DEFAULT_BROKER_SETTINGS,
  type BrokerConfig,
  type EndpointConfig,
  type ProxyConfig,
  type ResolvedEndpoint,
} from "./config.js";

// ============================================================================
// TRANSPORTS
// ============================================================================

export { MemoryBroker, MemoryConnection, MemoryChannel, type PublishedMessage } from "./transports/memory.js";
export {
  AmqpConnection,
  AmqpChannel,
  redactUrl,
  type AmqpClientChannel,
  type AmqpClientConnection,
  type AmqpConnect,
  type AmqpConnectionOptions,
} from "./transports/amqp.js";
