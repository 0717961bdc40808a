/**
 * @mqproxy/proxy - MessagePack
 * Lightweight MessagePack encoder/decoder.
 * Supports nil, boolean, number, string, binary, array and map.
 */

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

class Writer {
  private readonly parts: Uint8Array[] = [];
  private size = 0;

  bytes(...values: number[]): void {
    this.push(Uint8Array.from(values));
  }

  push(part: Uint8Array): void {
    this.parts.push(part);
    this.size += part.length;
  }

  uint(prefix: number, value: number, width: 1 | 2 | 4): void {
    const buffer = new Uint8Array(1 + width);
    const view = new DataView(buffer.buffer);
    buffer[0] = prefix;
    if (width === 1) view.setUint8(1, value);
    else if (width === 2) view.setUint16(1, value);
    else view.setUint32(1, value);
    this.push(buffer);
  }

  int(prefix: number, value: number, width: 1 | 2 | 4): void {
    const buffer = new Uint8Array(1 + width);
    const view = new DataView(buffer.buffer);
    buffer[0] = prefix;
    if (width === 1) view.setInt8(1, value);
    else if (width === 2) view.setInt16(1, value);
    else view.setInt32(1, value);
    this.push(buffer);
  }

  float64(value: number): void {
    const buffer = new Uint8Array(9);
    buffer[0] = 0xcb;
    new DataView(buffer.buffer).setFloat64(1, value);
    this.push(buffer);
  }

  /**
   * Header for a sized value: fix form when `fixLimit` allows, else 8/16/32-bit length
   */
  header(len: number, fixBase: number | null, fixLimit: number, prefixes: [number | null, number, number]): void {
    const [p8, p16, p32] = prefixes;
    if (fixBase !== null && len <= fixLimit) this.bytes(fixBase | len);
    else if (p8 !== null && len <= 0xff) this.uint(p8, len, 1);
    else if (len <= 0xffff) this.uint(p16, len, 2);
    else this.uint(p32, len, 4);
  }

  finish(): Uint8Array {
    const result = new Uint8Array(this.size);
    let offset = 0;
    for (const part of this.parts) {
      result.set(part, offset);
      offset += part.length;
    }
    return result;
  }
}

function encodeNumber(writer: Writer, val: number): void {
  if (!Number.isInteger(val)) {
    writer.float64(val);
  } else if (val >= 0 && val <= 0x7f) {
    writer.bytes(val); // positive fixint
  } else if (val < 0 && val >= -32) {
    writer.bytes(val & 0xff); // negative fixint
  } else if (val >= 0 && val <= 0xff) {
    writer.uint(0xcc, val, 1);
  } else if (val >= 0 && val <= 0xffff) {
    writer.uint(0xcd, val, 2);
  } else if (val >= 0 && val <= 0xffffffff) {
    writer.uint(0xce, val, 4);
  } else if (val >= -0x80 && val <= 0x7f) {
    writer.int(0xd0, val, 1);
  } else if (val >= -0x8000 && val <= 0x7fff) {
    writer.int(0xd1, val, 2);
  } else if (val >= -0x80000000 && val <= 0x7fffffff) {
    writer.int(0xd2, val, 4);
  } else {
    writer.float64(val);
  }
}

function encodeValue(writer: Writer, val: unknown): void {
  if (val === null || val === undefined) {
    writer.bytes(0xc0);
  } else if (typeof val === "boolean") {
    writer.bytes(val ? 0xc3 : 0xc2);
  } else if (typeof val === "number") {
    encodeNumber(writer, val);
  } else if (typeof val === "string") {
    const encoded = textEncoder.encode(val);
    writer.header(encoded.length, 0xa0, 31, [0xd9, 0xda, 0xdb]);
    writer.push(encoded);
  } else if (val instanceof Uint8Array) {
    writer.header(val.length, null, 0, [0xc4, 0xc5, 0xc6]);
    writer.push(val);
  } else if (Array.isArray(val)) {
    writer.header(val.length, 0x90, 15, [null, 0xdc, 0xdd]);
    for (const item of val) {
      encodeValue(writer, item);
    }
  } else if (typeof val === "object") {
    const entries = Object.entries(val).filter(([, v]) => v !== undefined);
    writer.header(entries.length, 0x80, 15, [null, 0xde, 0xdf]);
    for (const [key, item] of entries) {
      encodeValue(writer, key);
      encodeValue(writer, item);
    }
  } else {
    throw new TypeError(`Cannot encode ${typeof val} as MessagePack`);
  }
}

/**
 * Encode a value as MessagePack
 */
export function msgpackEncode(value: unknown): Uint8Array {
  const writer = new Writer();
  encodeValue(writer, value);
  return writer.finish();
}

class Reader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly buffer: Uint8Array) {
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  get done(): boolean {
    return this.offset >= this.buffer.length;
  }

  private need(count: number): number {
    if (this.offset + count > this.buffer.length) {
      throw new RangeError("Unexpected end of MessagePack buffer");
    }
    const at = this.offset;
    this.offset += count;
    return at;
  }

  u8(): number {
    return this.view.getUint8(this.need(1));
  }
  u16(): number {
    return this.view.getUint16(this.need(2));
  }
  u32(): number {
    return this.view.getUint32(this.need(4));
  }
  i8(): number {
    return this.view.getInt8(this.need(1));
  }
  i16(): number {
    return this.view.getInt16(this.need(2));
  }
  i32(): number {
    return this.view.getInt32(this.need(4));
  }
  f32(): number {
    return this.view.getFloat32(this.need(4));
  }
  f64(): number {
    return this.view.getFloat64(this.need(8));
  }
  u64(): number {
    return Number(this.view.getBigUint64(this.need(8)));
  }
  i64(): number {
    return Number(this.view.getBigInt64(this.need(8)));
  }

  raw(len: number): Uint8Array {
    const at = this.need(len);
    return this.buffer.slice(at, at + len);
  }

  str(len: number): string {
    const at = this.need(len);
    return textDecoder.decode(this.buffer.subarray(at, at + len));
  }
}

function decodeArray(reader: Reader, len: number): unknown[] {
  const result: unknown[] = [];
  for (let i = 0; i < len; i++) {
    result.push(decodeValue(reader));
  }
  return result;
}

function decodeMap(reader: Reader, len: number): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (let i = 0; i < len; i++) {
    const key = decodeValue(reader);
    if (typeof key !== "string" && typeof key !== "number") {
      throw new TypeError("MessagePack map keys must be strings or numbers");
    }
    result[String(key)] = decodeValue(reader);
  }
  return result;
}

function decodeValue(reader: Reader): unknown {
  const byte = reader.u8();

  if (byte <= 0x7f) return byte;
  if (byte >= 0xe0) return byte - 0x100;
  if (byte <= 0x8f) return decodeMap(reader, byte & 0x0f);
  if (byte <= 0x9f) return decodeArray(reader, byte & 0x0f);
  if (byte <= 0xbf) return reader.str(byte & 0x1f);

  switch (byte) {
    case 0xc0:
      return null;
    case 0xc2:
      return false;
    case 0xc3:
      return true;
    case 0xc4:
      return reader.raw(reader.u8());
    case 0xc5:
      return reader.raw(reader.u16());
    case 0xc6:
      return reader.raw(reader.u32());
    case 0xca:
      return reader.f32();
    case 0xcb:
      return reader.f64();
    case 0xcc:
      return reader.u8();
    case 0xcd:
      return reader.u16();
    case 0xce:
      return reader.u32();
    case 0xcf:
      return reader.u64();
    case 0xd0:
      return reader.i8();
    case 0xd1:
      return reader.i16();
    case 0xd2:
      return reader.i32();
    case 0xd3:
      return reader.i64();
    case 0xd9:
      return reader.str(reader.u8());
    case 0xda:
      return reader.str(reader.u16());
    case 0xdb:
      return reader.str(reader.u32());
    case 0xdc:
      return decodeArray(reader, reader.u16());
    case 0xdd:
      return decodeArray(reader, reader.u32());
    case 0xde:
      return decodeMap(reader, reader.u16());
    case 0xdf:
      return decodeMap(reader, reader.u32());
    default:
      throw new TypeError(`Unknown MessagePack type: 0x${byte.toString(16)}`);
  }
}

/**
 * Decode a single MessagePack value; trailing bytes are an error
 */
export function msgpackDecode(buffer: Uint8Array): unknown {
  const reader = new Reader(buffer);
  const value = decodeValue(reader);
  if (!reader.done) {
    throw new RangeError("Trailing bytes after MessagePack value");
  }
  return value;
}
