/**
 * @mqproxy/proxy - Configuration
 * Broker settings and per-endpoint topology, validated with arktype
 */

import { type } from "arktype";
import { ConfigError, generateId, getEnv, getEnvBoolean, getEnvNumber } from "@mqproxy/core";
import type { ChannelParameters, ExchangeParameters, QueueParameters } from "./types.js";

// ============================================================================
// SCHEMAS
// ============================================================================

/** Exchange settings of an endpoint */
export const exchangeConfig = type({
  "name?": "string",
  "type?": "'direct' | 'fanout' | 'topic' | 'headers'",
  "durable?": "boolean",
  "autodelete?": "boolean",
  "passive?": "boolean",
});

/** Queue settings of an endpoint */
export const queueConfig = type({
  "name?": "string",
  "randomizeName?": "boolean",
  "durable?": "boolean",
  "autodelete?": "boolean",
  "exclusive?": "boolean",
  "passive?": "boolean",
});

/** Channel settings of an endpoint */
export const channelConfig = type({
  "qos?": "number >= 0",
  "global?": "boolean",
});

/** One named endpoint */
export const endpointConfig = type({
  "exchange?": exchangeConfig,
  "queue?": queueConfig,
  "channel?": channelConfig,
});

/** Broker connection settings */
export const brokerConfig = type({
  "host?": "string >= 1",
  "port?": "number > 0",
  "username?": "string",
  "password?": "string",
  "vhost?": "string",
  "reconnectDelay?": "number >= 0",
  "legacyEncodingSwap?": "boolean",
  "namespaceMappings?": { "[string]": "string" },
});

/** Whole proxy configuration */
export const proxyConfigSchema = type({
  "broker?": brokerConfig,
  "proxies?": { "[string]": endpointConfig },
});

export type ExchangeConfig = typeof exchangeConfig.infer;
export type QueueConfig = typeof queueConfig.infer;
export type ChannelConfig = typeof channelConfig.infer;
export type EndpointConfig = typeof endpointConfig.infer;
export type BrokerConfig = typeof brokerConfig.infer;
export type ProxyConfig = typeof proxyConfigSchema.infer;

/**
 * Validate a configuration object
 *
 * @throws ConfigError listing every problem found
 */
export function parseProxyConfig(input: unknown): ProxyConfig {
  const result = proxyConfigSchema(input);

  if (result instanceof type.errors) {
    const problems = result.map((e) => `${String(e.path) || "root"}: ${e.message}`);
    throw new ConfigError(`Invalid proxy configuration:\n${problems.join("\n")}`, problems);
  }

  return result;
}

// ============================================================================
// DEFAULTS
// ============================================================================

/**
 * Default broker settings (a local RabbitMQ with the guest account)
 */
export const DEFAULT_BROKER_SETTINGS: Required<Omit<BrokerConfig, "namespaceMappings">> = {
  host: "localhost",
  port: 5672,
  username: "guest",
  password: "guest",
  vhost: "/",
  reconnectDelay: 5000,
  legacyEncodingSwap: false,
};

/**
 * Topology for one endpoint, with every default applied
 */
export interface ResolvedEndpoint {
  name: string;
  exchange: ExchangeParameters;
  queue: QueueParameters;
  channel: ChannelParameters;
  routingKey: string;
}

/**
 * Resolve the topology of endpoint `name`.
 *
 * The exchange and queue are named after the endpoint unless configured.
 * With `randomizeName` (the default) the queue gets a fresh `-<uuid>` suffix
 * on every call.
 */
export function resolveEndpoint(config: ProxyConfig, name: string): ResolvedEndpoint {
  const endpoint = config.proxies?.[name] ?? {};
  const exchange = endpoint.exchange ?? {};
  const queue = endpoint.queue ?? {};
  const channel = endpoint.channel ?? {};

  const queueName = queue.name ?? name;
  const randomize = queue.randomizeName ?? true;

  return {
    name,
    exchange: {
      name: exchange.name ?? name,
      type: exchange.type ?? "fanout",
      durable: exchange.durable ?? true,
      autodelete: exchange.autodelete ?? false,
      passive: exchange.passive ?? false,
    },
    queue: {
      name: randomize ? `${queueName}-${generateId()}` : queueName,
      durable: queue.durable ?? true,
      autodelete: queue.autodelete ?? true,
      exclusive: queue.exclusive ?? false,
      passive: queue.passive ?? false,
    },
    channel: {
      qos: channel.qos ?? 1,
      global: channel.global ?? false,
    },
    routingKey: name,
  };
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

/**
 * Broker settings from MQ_* environment variables, over the defaults
 */
export function brokerConfigFromEnv(): BrokerConfig {
  return {
    host: getEnv("MQ_HOST", DEFAULT_BROKER_SETTINGS.host),
    port: getEnvNumber("MQ_PORT", DEFAULT_BROKER_SETTINGS.port),
    username: getEnv("MQ_USERNAME", DEFAULT_BROKER_SETTINGS.username),
    password: getEnv("MQ_PASSWORD", DEFAULT_BROKER_SETTINGS.password),
    vhost: getEnv("MQ_VHOST", DEFAULT_BROKER_SETTINGS.vhost),
    reconnectDelay: getEnvNumber("MQ_RECONNECT_DELAY", DEFAULT_BROKER_SETTINGS.reconnectDelay),
    legacyEncodingSwap: getEnvBoolean("MQ_LEGACY_ENCODING_SWAP", DEFAULT_BROKER_SETTINGS.legacyEncodingSwap),
  };
}

/**
 * amqp:// URL for broker settings
 */
export function amqpUrl(config: BrokerConfig = {}): string {
  const settings = { ...DEFAULT_BROKER_SETTINGS, ...config };
  const credentials = `${encodeURIComponent(settings.username)}:${encodeURIComponent(settings.password)}`;
  return `amqp://${credentials}@${settings.host}:${settings.port}/${encodeURIComponent(settings.vhost)}`;
}
