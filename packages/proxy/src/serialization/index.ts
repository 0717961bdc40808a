/**
 * @mqproxy/proxy - Serialization
 * Serializers and the name-based registry used by the envelope codec
 */

import { msgpackDecode, msgpackEncode } from "./msgpack.js";

export { msgpackEncode, msgpackDecode } from "./msgpack.js";

// ============================================================================
// SERIALIZER INTERFACE
// ============================================================================

/**
 * Serializer interface for encoding/decoding message bodies
 */
export interface Serializer {
  /** Encode data to bytes */
  encode(data: unknown): Uint8Array;
  /** Decode bytes to data */
  decode(raw: Uint8Array): unknown;
  /** Media type of the encoded bytes */
  mediaType: string;
}

// ============================================================================
// BUILT-IN SERIALIZERS
// ============================================================================

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * JSON serializer (default)
 */
export const jsonSerializer: Serializer = {
  encode(data: unknown): Uint8Array {
    const text = JSON.stringify(data);
    if (text === undefined) {
      throw new TypeError(`Cannot encode ${typeof data} as JSON`);
    }
    return utf8Encoder.encode(text);
  },

  decode(raw: Uint8Array): unknown {
    return JSON.parse(utf8Decoder.decode(raw));
  },

  mediaType: "application/json",
};

/**
 * MessagePack serializer
 */
export const msgpackSerializer: Serializer = {
  encode: msgpackEncode,
  decode: msgpackDecode,
  mediaType: "application/msgpack",
};

/**
 * Raw bytes serializer; bodies pass through untouched
 */
export const binarySerializer: Serializer = {
  encode(data: unknown): Uint8Array {
    if (data instanceof Uint8Array) return data;
    throw new TypeError("Binary serializer only encodes Uint8Array values");
  },

  decode(raw: Uint8Array): unknown {
    return raw;
  },

  mediaType: "application/octet-stream",
};

// ============================================================================
// SERIALIZER REGISTRY
// ============================================================================

/**
 * Name ↔ serializer lookup with a default used on lookup misses
 */
export class SerializerRegistry {
  private readonly byName = new Map<string, Serializer>();
  private readonly names = new Map<Serializer, string>();
  private defaultName: string;

  constructor(entries: Record<string, Serializer>, defaultName: string) {
    for (const [name, serializer] of Object.entries(entries)) {
      this.register(name, serializer);
    }
    if (!this.byName.has(defaultName)) {
      throw new Error(`Default serializer "${defaultName}" is not registered`);
    }
    this.defaultName = defaultName;
  }

  /**
   * Register a serializer under a name; a name can only be taken once
   */
  register(name: string, serializer: Serializer): this {
    if (this.byName.has(name)) {
      throw new Error(`Serializer already registered: ${name}`);
    }
    this.byName.set(name, serializer);
    if (!this.names.has(serializer)) {
      this.names.set(serializer, name);
    }
    return this;
  }

  /**
   * Resolve a serializer by name, falling back to the default
   */
  lookup(name: string | undefined): Serializer {
    if (name !== undefined) {
      const found = this.byName.get(name);
      if (found) return found;
    }
    return this.defaultSerializer;
  }

  /**
   * Whether `name` resolves without falling back
   */
  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Registered name of a serializer
   */
  nameOf(serializer: Serializer): string | undefined {
    return this.names.get(serializer);
  }

  get defaultSerializer(): Serializer {
    const serializer = this.byName.get(this.defaultName);
    if (!serializer) {
      throw new Error(`Default serializer "${this.defaultName}" is not registered`);
    }
    return serializer;
  }

  /**
   * Change the fallback serializer
   */
  setDefault(name: string): void {
    if (!this.byName.has(name)) {
      throw new Error(`Serializer not registered: ${name}`);
    }
    this.defaultName = name;
  }

  list(): string[] {
    return [...this.byName.keys()];
  }
}

/**
 * Create a registry with the built-in serializers (json, msgpack, binary).
 * JSON is the default.
 */
export function createSerializerRegistry(
  extra: Record<string, Serializer> = {},
  defaultName: string = "json"
): SerializerRegistry {
  return new SerializerRegistry(
    {
      json: jsonSerializer,
      msgpack: msgpackSerializer,
      binary: binarySerializer,
      ...extra,
    },
    defaultName
  );
}

/**
 * Create a custom serializer
 */
export function createSerializer(options: {
  encode: (data: unknown) => Uint8Array;
  decode: (raw: Uint8Array) => unknown;
  mediaType: string;
}): Serializer {
  return options;
}
