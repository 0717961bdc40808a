/**
 * @mqproxy/proxy - Proxy Factory
 * Builds named servers, clients, subscribers and publishers over one connection
 */

import type { Logger } from "@mqproxy/core";
import { createLogger } from "@mqproxy/core";
import { resolveEndpoint, type ProxyConfig, type ResolvedEndpoint } from "./config.js";
import type { ChannelOwner } from "./connection-state.js";
import { createCodec, type EnvelopeCodec } from "./envelope.js";
import { ProxyClient, ProxySender, type ProxyClientOptions } from "./rpc/proxy-client.js";
import { RpcRequester } from "./rpc/requester.js";
import { RpcServerAdapter } from "./rpc/server.js";
import type { Serializer } from "./serialization/index.js";
import type { BrokerConnection, Processor } from "./types.js";

export interface ProxyFactoryOptions {
  /** Broker connection shared by everything the factory builds */
  connection: BrokerConnection;
  /** Endpoint topology and codec flags */
  config?: ProxyConfig;
  /** Codec (default: built from `config.broker`) */
  codec?: EnvelopeCodec;
  /** Wait for each owner to connect before returning it (default true) */
  waitForConnection?: boolean;
  /** Logger */
  logger?: Logger;
}

export type ClientOptions = Pick<ProxyClientOptions, "timeout" | "mandatory" | "immediate" | "deliveryMode">;

/**
 * Proxy factory
 *
 * @example
 * ```typescript
 * const factory = new ProxyFactory({ connection, config });
 *
 * await factory.rpcServer('calculator', createProxyServer(double));
 * const client = await factory.rpcClient('calculator', jsonSerializer);
 *
 * const reply = await client.ask(21);
 * ```
 */
export class ProxyFactory {
  readonly codec: EnvelopeCodec;
  private readonly connection: BrokerConnection;
  private readonly config: ProxyConfig;
  private readonly waitForConnection: boolean;
  private readonly logger: Logger;
  private readonly owners: ChannelOwner[] = [];

  constructor(options: ProxyFactoryOptions) {
    this.connection = options.connection;
    this.config = options.config ?? {};
    this.waitForConnection = options.waitForConnection ?? true;
    this.logger = options.logger ?? createLogger({ name: "proxy-factory" });
    this.codec =
      options.codec ??
      createCodec({
        legacyEncodingSwap: this.config.broker?.legacyEncodingSwap ?? false,
        typeNameMappings: this.config.broker?.namespaceMappings ?? {},
      });
  }

  /**
   * Resolved topology of an endpoint (queue names are re-randomized per call)
   */
  endpoint(name: string): ResolvedEndpoint {
    return resolveEndpoint(this.config, name);
  }

  /**
   * Serve requests on endpoint `name`
   */
  async rpcServer(name: string, processor: Processor): Promise<RpcServerAdapter> {
    return this.serve(name, processor, `rpc-server:${name}`);
  }

  /**
   * Consume messages on endpoint `name` without replying
   */
  async subscriber(name: string, processor: Processor): Promise<RpcServerAdapter> {
    return this.serve(name, processor, `subscriber:${name}`);
  }

  /**
   * Request/response client for endpoint `name`
   */
  async rpcClient(name: string, serializer: Serializer, options: ClientOptions = {}): Promise<ProxyClient> {
    const endpoint = this.endpoint(name);
    const requester = await this.own(
      new RpcRequester({
        name: `rpc-client:${name}`,
        replyQueue: endpoint.queue,
        channel: endpoint.channel,
        logger: this.logger.child({ endpoint: name, role: "client" }),
      })
    );

    return new ProxyClient({
      ...options,
      requester,
      serializer,
      codec: this.codec,
      exchange: endpoint.exchange.name,
      routingKey: endpoint.routingKey,
      logger: this.logger.child({ endpoint: name, role: "client" }),
    });
  }

  /**
   * Fire-and-forget publisher for endpoint `name`
   */
  async publisher(name: string, serializer: Serializer, options: Omit<ClientOptions, "timeout"> = {}): Promise<ProxySender> {
    const endpoint = this.endpoint(name);
    const requester = await this.own(
      new RpcRequester({
        name: `publisher:${name}`,
        replyQueue: false,
        logger: this.logger.child({ endpoint: name, role: "publisher" }),
      })
    );

    return new ProxySender({
      ...options,
      requester,
      serializer,
      codec: this.codec,
      exchange: endpoint.exchange.name,
      routingKey: endpoint.routingKey,
      logger: this.logger.child({ endpoint: name, role: "publisher" }),
    });
  }

  /**
   * Stop everything this factory started
   */
  async close(): Promise<void> {
    const owners = this.owners.splice(0);
    await Promise.all(owners.map((owner) => owner.stop()));
  }

  private async serve(name: string, processor: Processor, ownerName: string): Promise<RpcServerAdapter> {
    const endpoint = this.endpoint(name);
    return this.own(
      new RpcServerAdapter({
        name: ownerName,
        processor,
        exchange: endpoint.exchange,
        queue: endpoint.queue,
        routingKey: endpoint.routingKey,
        channel: endpoint.channel,
        codec: this.codec,
        logger: this.logger.child({ endpoint: name, role: "server" }),
      })
    );
  }

  /**
   * Start `owner`; when its first setup fails it is stopped and the error rethrown
   */
  private async own<T extends ChannelOwner>(owner: T): Promise<T> {
    owner.start(this.connection);
    this.owners.push(owner);
    if (!this.waitForConnection) {
      return owner;
    }

    try {
      await owner.whenConnected();
    } catch (error) {
      const index = this.owners.indexOf(owner);
      if (index >= 0) {
        this.owners.splice(index, 1);
      }
      await owner.stop();
      throw error;
    }
    return owner;
  }
}
