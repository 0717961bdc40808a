/**
 * @mqproxy/proxy - Envelope Codec
 *
 * Turns application messages into (body, metadata) envelopes and back.
 * On the wire the metadata travels in two message properties:
 * `contentEncoding` holds the serializer id, `contentType` the message type name.
 */

import type { EnvelopeMetadata, MessageProperties } from "./types.js";
import { createSerializerRegistry, type Serializer, type SerializerRegistry } from "./serialization/index.js";
import { DeserializationError, SerializationError } from "./errors.js";

/**
 * One serialized application message
 */
export interface Envelope {
  body: Uint8Array;
  metadata: EnvelopeMetadata;
}

export interface CodecOptions {
  /** Serializer registry (default: json, msgpack, binary; json fallback) */
  registry?: SerializerRegistry;
  /**
   * Swap `contentEncoding` and `contentType` on the wire, for peers that
   * still write the type name into `contentEncoding`
   */
  legacyEncodingSwap?: boolean;
  /** Type-name prefix rewrites applied on serialize, e.g. `{ "com.acme.": "acme." }` */
  typeNameMappings?: Record<string, string>;
}

/**
 * Runtime type name of a message, used as diagnostic metadata
 */
export function typeNameOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "Array";
  if (typeof value === "object") {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
  }
  return typeof value;
}

/**
 * Envelope codec bound to a serializer registry
 */
export class EnvelopeCodec {
  readonly registry: SerializerRegistry;
  private readonly legacyEncodingSwap: boolean;
  private readonly typeNameMappings: Array<[string, string]>;

  constructor(options: CodecOptions = {}) {
    this.registry = options.registry ?? createSerializerRegistry();
    this.legacyEncodingSwap = options.legacyEncodingSwap ?? false;
    this.typeNameMappings = Object.entries(options.typeNameMappings ?? {});
  }

  /**
   * Encode a message with the given serializer
   *
   * @throws SerializationError when the serializer is unregistered or encoding throws
   */
  serialize(message: unknown, serializer: Serializer): Envelope {
    const serializerId = this.registry.nameOf(serializer);
    if (serializerId === undefined) {
      throw new SerializationError("Serializer is not registered");
    }

    let body: Uint8Array;
    try {
      body = serializer.encode(message);
    } catch (error) {
      throw new SerializationError(`Failed to serialize ${typeNameOf(message)} with ${serializerId}`, error);
    }

    return {
      body,
      metadata: { serializerId, typeName: this.mapTypeName(typeNameOf(message)) },
    };
  }

  /**
   * Decode a body. Unknown or missing serializer ids fall back to the registry default.
   *
   * @throws DeserializationError when decoding throws
   */
  deserialize(
    body: Uint8Array,
    metadata: Partial<EnvelopeMetadata> | undefined
  ): { message: unknown; serializer: Serializer } {
    const serializer = this.registry.lookup(metadata?.serializerId);
    try {
      return { message: serializer.decode(body), serializer };
    } catch (error) {
      const name = this.registry.nameOf(serializer) ?? "unknown";
      throw new DeserializationError(
        `Failed to deserialize ${metadata?.typeName ?? "message"} with ${name}`,
        error
      );
    }
  }

  /**
   * Map envelope metadata onto wire message properties
   */
  toProperties(metadata: EnvelopeMetadata): MessageProperties {
    return this.legacyEncodingSwap
      ? { contentEncoding: metadata.typeName, contentType: metadata.serializerId }
      : { contentEncoding: metadata.serializerId, contentType: metadata.typeName };
  }

  /**
   * Read envelope metadata back from wire message properties
   */
  fromProperties(properties: MessageProperties): Partial<EnvelopeMetadata> {
    const { contentEncoding, contentType } = properties;
    return this.legacyEncodingSwap
      ? { serializerId: contentType, typeName: contentEncoding }
      : { serializerId: contentEncoding, typeName: contentType };
  }

  /**
   * Decode a body using the metadata found in its message properties
   */
  decode(body: Uint8Array, properties: MessageProperties): { message: unknown; serializer: Serializer } {
    return this.deserialize(body, this.fromProperties(properties));
  }

  private mapTypeName(typeName: string): string {
    for (const [from, to] of this.typeNameMappings) {
      if (typeName.startsWith(from)) {
        return to + typeName.slice(from.length);
      }
    }
    return typeName;
  }
}

/**
 * Create an envelope codec
 */
export function createCodec(options?: CodecOptions): EnvelopeCodec {
  return new EnvelopeCodec(options);
}
