import { describe, it, expect } from "vitest";
import {
  binarySerializer,
  createSerializerRegistry,
  jsonSerializer,
  msgpackDecode,
  msgpackEncode,
  msgpackSerializer,
} from "../src/index.js";

describe("@mqproxy/proxy - Serialization", () => {
  describe("SerializerRegistry", () => {
    it("should register the built-in serializers with json as default", () => {
      const registry = createSerializerRegistry();

      expect(registry.list()).toEqual(["json", "msgpack", "binary"]);
      expect(registry.defaultSerializer).toBe(jsonSerializer);
      expect(registry.nameOf(binarySerializer)).toBe("binary");
    });

    it("should fall back to the default on lookup misses", () => {
      const registry = createSerializerRegistry({}, "msgpack");

      expect(registry.lookup("json")).toBe(jsonSerializer);
      expect(registry.lookup("avro")).toBe(msgpackSerializer);
      expect(registry.lookup(undefined)).toBe(msgpackSerializer);
      expect(registry.has("avro")).toBe(false);
    });

    it("should refuse duplicate names", () => {
      const registry = createSerializerRegistry();

      expect(() => registry.register("json", msgpackSerializer)).toThrow("Serializer already registered: json");
    });

    it("should refuse an unknown default", () => {
      expect(() => createSerializerRegistry({}, "avro")).toThrow('Default serializer "avro" is not registered');
      expect(() => createSerializerRegistry().setDefault("avro")).toThrow("Serializer not registered: avro");
    });
  });

  describe("msgpack", () => {
    it("should use compact forms for small values", () => {
      expect(Array.from(msgpackEncode(5))).toEqual([0x05]);
      expect(Array.from(msgpackEncode(-1))).toEqual([0xff]);
      expect(Array.from(msgpackEncode("ab"))).toEqual([0xa2, 0x61, 0x62]);
      expect(Array.from(msgpackEncode([true, null]))).toEqual([0x92, 0xc3, 0xc0]);
      expect(Array.from(msgpackEncode({ a: 1 }))).toEqual([0x81, 0xa1, 0x61, 0x01]);
    });

    it("should encode wider integers", () => {
      expect(Array.from(msgpackEncode(300))).toEqual([0xcd, 0x01, 0x2c]);
      expect(Array.from(msgpackEncode(-200))).toEqual([0xd1, 0xff, 0x38]);
      expect(msgpackDecode(msgpackEncode(70000))).toBe(70000);
      expect(msgpackDecode(msgpackEncode(-70000))).toBe(-70000);
    });

    it("should skip undefined map values", () => {
      expect(msgpackDecode(msgpackEncode({ a: 1, b: undefined }))).toEqual({ a: 1 });
    });

    it("should reject truncated and trailing input", () => {
      expect(() => msgpackDecode(new Uint8Array([0xa3, 0x61]))).toThrow("Unexpected end of MessagePack buffer");
      expect(() => msgpackDecode(new Uint8Array([0x01, 0x02]))).toThrow("Trailing bytes after MessagePack value");
    });

    it("should reject unsupported values", () => {
      expect(() => msgpackEncode(() => 1)).toThrow("Cannot encode function as MessagePack");
    });
  });

  it("should refuse to encode non-bytes with the binary serializer", () => {
    expect(() => binarySerializer.encode("text")).toThrow(TypeError);
  });
});
