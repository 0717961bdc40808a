/**
 * Calculator example
 *
 * Runs a doubling server and a client over one broker connection:
 * - request/response with `ask`, in JSON and MessagePack
 * - remote failures surfacing as RemoteProcessingError
 * - fire-and-forget notifications to a subscriber
 *
 * Uses RabbitMQ from the MQ_* variables, or the in-memory broker with MQ_TRANSPORT=memory.
 */

import { createLogger, getEnv } from "@mqproxy/core";
import {
  AmqpConnection,
  MemoryBroker,
  ProxyFactory,
  RemoteProcessingError,
  amqpUrl,
  brokerConfigFromEnv,
  createProxyServer,
  createSubscriberProcessor,
  jsonSerializer,
  msgpackSerializer,
  parseProxyConfig,
  type BrokerConnection,
} from "@mqproxy/proxy";

const logger = createLogger({ name: "calculator-example" });

const config = parseProxyConfig({
  broker: brokerConfigFromEnv(),
  proxies: {
    calculator: { exchange: { type: "direct" } },
    audit: { queue: { name: "calculator-audit", randomizeName: false } },
  },
});

async function openConnection(): Promise<BrokerConnection> {
  if (getEnv("MQ_TRANSPORT") === "memory") {
    return new MemoryBroker().connect();
  }
  const connection = new AmqpConnection({
    url: amqpUrl(config.broker),
    reconnectDelay: config.broker?.reconnectDelay,
    logger: logger.child({ component: "amqp" }),
  });
  await connection.connect();
  return connection;
}

async function main(): Promise<void> {
  const connection = await openConnection();
  const factory = new ProxyFactory({ connection, config, logger });

  // ==========================================================================
  // SERVERS
  // ==========================================================================

  await factory.rpcServer(
    "calculator",
    createProxyServer(
      (message) => {
        if (typeof message !== "number") {
          throw new TypeError(`expected a number, got ${typeof message}`);
        }
        return message * 2;
      },
      { codec: factory.codec, logger }
    )
  );

  await factory.subscriber(
    "audit",
    createSubscriberProcessor(
      (message, context) => {
        context.logger.info("audit entry", { entry: message });
      },
      { codec: factory.codec, logger }
    )
  );

  // ==========================================================================
  // CLIENTS
  // ==========================================================================

  const json = await factory.rpcClient("calculator", jsonSerializer, { timeout: 5000 });
  const binary = await factory.rpcClient("calculator", msgpackSerializer, { timeout: 5000 });
  const audit = await factory.publisher("audit", jsonSerializer);

  try {
    const doubled = await json.ask(21, {
      parse: (value) => (typeof value === "number" ? value : Number.NaN),
    });
    if (doubled.kind === "response") {
      logger.info("21 doubled", { result: doubled.message });
    }

    const packed = await binary.ask(1.5);
    logger.info("1.5 doubled over msgpack", { reply: packed });

    try {
      await json.ask("twenty-one");
    } catch (error) {
      if (!(error instanceof RemoteProcessingError)) throw error;
      logger.warn("server refused", { message: error.message, cause: error.remoteCause });
    }

    await audit.tell({ operation: "double", input: 21 });
  } finally {
    await factory.close();
    await connection.close();
  }
}

main().catch((error: unknown) => {
  logger.fatal("calculator example failed", error);
  process.exitCode = 1;
});
