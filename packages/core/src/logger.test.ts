import { describe, it, expect, beforeEach } from "vitest";
import { Logger, createLogger, logError, formatJsonLine, type LogEntry, type LogTransport } from "./logger.js";

class CaptureTransport implements LogTransport {
  readonly name = "capture";
  readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

describe("@mqproxy/core - Logger", () => {
  let transport: CaptureTransport;

  beforeEach(() => {
    transport = new CaptureTransport();
  });

  it("should drop entries below the configured level", () => {
    const log = createLogger({ level: "WARN", transports: [transport], timestamp: false });

    log.debug("hidden");
    log.info("hidden too");
    log.warn("shown");

    expect(transport.entries).toHaveLength(1);
    expect(transport.entries[0]?.message).toBe("shown");
    expect(transport.entries[0]?.levelValue).toBe(40);
  });

  it("should add the logger name as module", () => {
    const log = createLogger({ name: "rpc-requester", transports: [transport], timestamp: false });

    log.info("reply queue declared", { queue: "amq.gen-1" });

    expect(transport.entries[0]?.context).toEqual({ module: "rpc-requester", queue: "amq.gen-1" });
    expect(transport.entries[0]?.timestamp).toBe("");
  });

  it("should merge child context", () => {
    const log = new Logger({ name: "rpc-server", transports: [transport], timestamp: () => "t0" });
    const child = log.child({ queue: "calculator" }).child({ deliveryTag: 3 });

    child.info("delivery received");

    expect(transport.entries[0]?.context).toEqual({
      queue: "calculator",
      deliveryTag: 3,
      module: "rpc-server",
    });
    expect(transport.entries[0]?.timestamp).toBe("t0");
  });

  it("should keep the parent level in children", () => {
    const log = createLogger({ level: "ERROR", transports: [transport] });
    const child = log.child({ a: 1 });

    child.warn("hidden");

    expect(child.level).toBe("ERROR");
    expect(transport.entries).toHaveLength(0);
  });

  it("should redact default and custom fields", () => {
    const log = createLogger({ transports: [transport], redact: ["broker.password"], timestamp: false });

    log.info("connecting", { password: "test-secret", broker: { host: "localhost", password: "guest" } });

    expect(transport.entries[0]?.context).toEqual({
      password: "[REDACTED]",
      broker: { host: "localhost", password: "[REDACTED]" },
    });
  });

  it("should not mutate the caller's context when redacting", () => {
    const log = createLogger({ transports: [transport], redact: ["broker.password"] });
    const context = { broker: { password: "guest" } };

    log.info("connecting", context);

    expect(context.broker.password).toBe("guest");
  });

  it("should attach Error information", () => {
    const log = createLogger({ transports: [transport] });

    log.error("publish failed", new TypeError("channel closed"), { correlationId: "7" });

    const entry = transport.entries[0];
    expect(entry?.level).toBe("ERROR");
    expect(entry?.error?.name).toBe("TypeError");
    expect(entry?.error?.message).toBe("channel closed");
    expect(entry?.context).toEqual({ correlationId: "7" });
  });

  it("should treat a non-Error second argument as context", () => {
    const log = createLogger({ transports: [transport] });

    log.error("unexpected reply", { correlationId: "9" });

    expect(transport.entries[0]?.error).toBeUndefined();
    expect(transport.entries[0]?.context).toEqual({ correlationId: "9" });
  });

  it("logError should stringify non-Error values", () => {
    const log = createLogger({ transports: [transport] });

    logError(log, "socket hang up", "close failed", { queue: "q" });

    expect(transport.entries[0]?.context).toEqual({ error: "socket hang up", queue: "q" });
  });

  it("isLevelEnabled should follow the configured level", () => {
    const log = createLogger({ level: "INFO", transports: [transport] });
    expect(log.isLevelEnabled("DEBUG")).toBe(false);
    expect(log.isLevelEnabled("INFO")).toBe(true);
    expect(log.isLevelEnabled("FATAL")).toBe(true);
  });
});

describe("@mqproxy/core - formatJsonLine", () => {
  it("should flatten context into the JSON object", () => {
    const line = formatJsonLine({
      level: "INFO",
      levelValue: 30,
      message: "started",
      timestamp: "2024-01-01T00:00:00.000Z",
      context: { queue: "calculator" },
      error: undefined,
    });

    expect(line).toBe('{"level":"INFO","time":"2024-01-01T00:00:00.000Z","msg":"started","queue":"calculator"}');
  });
});
