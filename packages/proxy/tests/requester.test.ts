import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  MemoryBroker,
  NotConnectedError,
  ProxyError,
  RpcRequester,
  TransportError,
  type BrokerChannel,
  type Delivery,
  type MemoryConnection,
  type Publish,
} from "../src/index.js";
import { captureLogger, flush, silentLogger } from "./helpers.js";

const DURABLE_QUEUE = { durable: false, autodelete: false, exclusive: false, passive: false };

function request(routingKey: string, byte = 0): Publish {
  return { exchange: "", routingKey, body: new Uint8Array([byte]) };
}

/**
 * Consume `queue` and answer every request with the given bodies
 */
async function responder(
  connection: MemoryConnection,
  queue: string,
  replies: (delivery: Delivery) => Uint8Array[]
): Promise<BrokerChannel> {
  const channel = await connection.createChannel();
  await channel.declareQueue({ name: queue, ...DURABLE_QUEUE });
  await channel.consume(queue, (delivery) => {
    channel.ack(delivery.deliveryTag);
    for (const body of replies(delivery)) {
      channel.publish({
        exchange: "",
        routingKey: delivery.properties.replyTo ?? "",
        body,
        properties: { correlationId: delivery.properties.correlationId },
      });
    }
  });
  return channel;
}

describe("@mqproxy/proxy - RpcRequester", () => {
  let broker: MemoryBroker;
  let connection: MemoryConnection;
  let requester: RpcRequester;

  beforeEach(async () => {
    broker = new MemoryBroker();
    connection = broker.connect();
    requester = new RpcRequester({ logger: silentLogger() }).start(connection);
    await requester.whenConnected();
  });

  afterEach(async () => {
    await requester.stop();
  });

  describe("sendRequest", () => {
    it("should tag requests with increasing correlation ids and the reply queue", async () => {
      await responder(connection, "echo", (d) => [d.body]);

      await requester.sendRequest([request("echo", 1)], 1);
      await requester.sendRequest([request("echo", 2)], 1);

      expect(broker.published.filter((p) => p.routingKey === "echo").map((p) => p.properties)).toEqual([
        { correlationId: "1", replyTo: "amq.gen-1" },
        { correlationId: "2", replyTo: "amq.gen-1" },
      ]);
    });

    it("should resolve with the reply", async () => {
      await responder(connection, "echo", (d) => [d.body]);

      const outcome = await requester.sendRequest([request("echo", 42)], 1);

      expect(outcome.kind).toBe("response");
      if (outcome.kind !== "response") return;
      expect(outcome.deliveries).toHaveLength(1);
      expect(Array.from(outcome.deliveries[0]?.body ?? [])).toEqual([42]);
      expect(requester.pendingCount).toBe(0);
    });

    it("should aggregate several replies in arrival order", async () => {
      await responder(connection, "multi", () => [new Uint8Array([1]), new Uint8Array([2])]);

      const outcome = await requester.sendRequest([request("multi")], 2);

      if (outcome.kind !== "response") throw new Error("expected a response");
      expect(outcome.deliveries.map((d) => Array.from(d.body))).toEqual([[1], [2]]);
      expect(requester.pendingCount).toBe(0);
    });

    it("should publish every message of a request under one correlation id", async () => {
      await responder(connection, "echo", (d) => [d.body]);

      const outcome = await requester.sendRequest([request("echo", 1), request("echo", 2)], 2);

      if (outcome.kind !== "response") throw new Error("expected a response");
      expect(outcome.deliveries.map((d) => d.properties.correlationId)).toEqual(["1", "1"]);
    });

    it("should resolve fire-and-forget requests immediately", async () => {
      await responder(connection, "sink", () => []);

      const outcome = await requester.sendRequest([request("sink")], 0);

      expect(outcome).toEqual({ kind: "response", deliveries: [] });
      expect(requester.pendingCount).toBe(0);
      expect(broker.published[0]?.properties).toEqual({});
    });

    it("should resolve unroutable mandatory requests as undelivered", async () => {
      const outcome = await requester.sendRequest(
        [{ exchange: "amq.direct", routingKey: "nowhere", body: new Uint8Array([9]), mandatory: true }],
        1
      );

      expect(outcome.kind).toBe("undelivered");
      if (outcome.kind !== "undelivered") return;
      expect(outcome.returned).toMatchObject({
        replyCode: 312,
        replyText: "NO_ROUTE",
        exchange: "amq.direct",
        routingKey: "nowhere",
      });
      expect(outcome.returned.properties.correlationId).toBe("1");
      expect(requester.pendingCount).toBe(0);
    });

    it("should reject invalid reply counts without publishing", async () => {
      await expect(requester.sendRequest([request("echo")], -1)).rejects.toMatchObject({
        code: "INVALID_REQUEST",
      });
      await expect(requester.sendRequest([request("echo")], 1.5)).rejects.toBeInstanceOf(ProxyError);
      expect(broker.published).toHaveLength(0);
    });

    it("should reject with TransportError when the publish fails", async () => {
      const pending = requester.sendRequest([{ exchange: "missing", routingKey: "x", body: new Uint8Array() }], 1);

      await expect(pending).rejects.toBeInstanceOf(TransportError);
      expect(requester.pendingCount).toBe(0);
    });
  });

  describe("unmatched replies", () => {
    it("should ack and drop replies for unknown correlation ids", async () => {
      const { logger, transport } = captureLogger();
      const watched = new RpcRequester({ logger }).start(connection);
      await watched.whenConnected();

      const channel = await connection.createChannel();
      channel.publish({
        exchange: "",
        routingKey: watched.replyTo ?? "",
        body: new Uint8Array(),
        properties: { correlationId: "99" },
      });
      await flush();

      expect(transport.messages("WARN")).toEqual(["reply for unknown correlation id"]);
      expect(broker.messageCount(watched.replyTo ?? "")).toBe(0);
      await watched.stop();
    });
  });

  describe("connection state", () => {
    it("should clear pending requests on disconnect without resolving them", async () => {
      await responder(connection, "sink", () => []);
      let settled = false;
      requester.sendRequest([request("sink")], 1).then(
        () => (settled = true),
        () => (settled = true)
      );
      await flush();
      expect(requester.pendingCount).toBe(1);

      connection.disconnect();
      await flush();

      expect(requester.state).toBe("disconnected");
      expect(requester.pendingCount).toBe(0);
      expect(settled).toBe(false);
    });

    it("should reject with NotConnectedError while disconnected and publish nothing", async () => {
      connection.disconnect();
      const before = broker.published.length;

      await expect(requester.sendRequest([request("echo")], 1)).rejects.toBeInstanceOf(NotConnectedError);
      await expect(requester.sendRequest([request("echo")], 0)).rejects.toMatchObject({ code: "NOT_CONNECTED" });
      expect(broker.published).toHaveLength(before);
    });

    it("should resume after reconnect with a fresh reply queue and the next id", async () => {
      await responder(connection, "echo", (d) => [d.body]);
      await requester.sendRequest([request("echo")], 1);

      connection.disconnect();
      connection.reconnect();
      await requester.whenConnected();
      await responder(connection, "echo", (d) => [d.body]);

      const outcome = await requester.sendRequest([request("echo", 5)], 1);

      expect(outcome.kind).toBe("response");
      expect(broker.published.at(-2)?.properties).toEqual({ correlationId: "2", replyTo: "amq.gen-2" });
    });

    it("should stay disconnected when the connection drops during setup", async () => {
      const pending = new RpcRequester({ logger: silentLogger() }).start(connection);
      connection.disconnect();
      await flush();

      expect(pending.state).toBe("disconnected");

      connection.reconnect();
      await pending.whenConnected();
      expect(pending.state).toBe("connected");
      await pending.stop();
    });

    it("should set up a fresh channel when the broker closes the current one", async () => {
      const states: string[] = [];
      requester.onStateChange((state) => states.push(state));
      void requester.sendRequest([request("nobody-home")], 1);
      expect(requester.pendingCount).toBe(1);

      connection.closeChannels(new Error("PRECONDITION_FAILED - unknown delivery tag 9"));
      expect(requester.state).toBe("disconnected");
      expect(requester.pendingCount).toBe(0);
      await flush();

      expect(states).toEqual(["disconnected", "connected"]);
      expect(requester.replyTo).toBe("amq.gen-2");
      expect(broker.hasQueue("amq.gen-1")).toBe(false);
    });

    it("should reject connection waiters when stopped first", async () => {
      const idle = new RpcRequester({ logger: silentLogger() }).start(broker.connect({ connected: false }));
      const waiting = idle.whenConnected();

      await idle.stop();

      await expect(waiting).rejects.toBeInstanceOf(NotConnectedError);
    });

    it("should notify state listeners", async () => {
      const states: string[] = [];
      requester.onStateChange((state) => states.push(state));

      connection.disconnect();
      connection.reconnect();
      await requester.whenConnected();

      expect(states).toEqual(["disconnected", "connected"]);
    });
  });

  it("should only send fire-and-forget requests without a reply queue", async () => {
    const sender = new RpcRequester({ replyQueue: false, logger: silentLogger() }).start(connection);
    await sender.whenConnected();

    await expect(sender.sendRequest([request("echo")], 1)).rejects.toMatchObject({ code: "INVALID_REQUEST" });
    expect(sender.replyTo).toBeNull();
    await sender.stop();
  });
});
