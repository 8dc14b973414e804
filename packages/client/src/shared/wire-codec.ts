import { DecodeError } from "./errors.js";
import {
  createCommand,
  errorResponse,
  nilValue,
  normalizeResponse,
  type Command,
  type DynamicValue,
  type Response,
  type ResponseValue,
} from "./wire.js";

/**
 * Serializes commands and responses. The client only needs the first two
 * methods; the server half lets in-process servers speak the same format.
 */
export interface WireCodec {
  readonly name: string;
  encodeCommand(command: Command): Uint8Array;
  /** Never throws: malformed input becomes an error response. */
  decodeResponse(data: Uint8Array): Response;
  /** Throws `DecodeError` on malformed input. */
  decodeCommand(data: Uint8Array): Command;
  encodeResponse(response: Response): Uint8Array;
}

export function describeDecodeFailure(error: unknown): string {
  const reason = error instanceof Error ? error.message : String(error);
  return `Failed to decode response: ${reason}`;
}

const WIRE_MAGIC_1 = 0x44; // 'D'
const WIRE_MAGIC_2 = 0x57; // 'W'
const WIRE_VERSION = 1;
const HEADER_SIZE = 4;

const enum MessageType {
  Command = 1,
  Response = 2,
}

const enum ValueTag {
  Nil = 0,
  Int = 1,
  Str = 2,
  Float = 3,
  Bytes = 4,
  List = 5,
  StringMap = 6,
  Bool = 7,
  DynamicMap = 8,
}

const RESPONSE_FLAG_ERROR = 0x01;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

class WireWriter {
  private readonly parts: Uint8Array[] = [];
  private size = 0;

  u8(value: number): void {
    this.push(Uint8Array.of(value & 0xff));
  }

  u32(value: number): void {
    const out = new Uint8Array(4);
    new DataView(out.buffer).setUint32(0, value >>> 0);
    this.push(out);
  }

  i64(value: number): void {
    if (!Number.isSafeInteger(value)) {
      throw new Error(`Integer is not a safe integer: ${value}`);
    }
    const out = new Uint8Array(8);
    new DataView(out.buffer).setBigInt64(0, BigInt(value));
    this.push(out);
  }

  f64(value: number): void {
    const out = new Uint8Array(8);
    new DataView(out.buffer).setFloat64(0, value);
    this.push(out);
  }

  bytes(value: Uint8Array): void {
    this.u32(value.byteLength);
    this.push(value);
  }

  string(value: string): void {
    this.bytes(textEncoder.encode(value));
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.size);
    let offset = 0;
    for (const part of this.parts) {
      out.set(part, offset);
      offset += part.byteLength;
    }
    return out;
  }

  private push(part: Uint8Array): void {
    this.parts.push(part);
    this.size += part.byteLength;
  }
}

class WireReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get remaining(): number {
    return this.data.byteLength - this.offset;
  }

  u8(): number {
    this.ensure(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  i64(): number {
    this.ensure(8);
    const value = this.view.getBigInt64(this.offset);
    this.offset += 8;
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new DecodeError(`Integer out of range: ${value}`);
    }
    return Number(value);
  }

  f64(): number {
    this.ensure(8);
    const value = this.view.getFloat64(this.offset);
    this.offset += 8;
    return value;
  }

  bytes(): Uint8Array {
    const length = this.u32();
    this.ensure(length);
    const value = this.data.slice(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  string(): string {
    try {
      return textDecoder.decode(this.bytes());
    } catch (error) {
      if (error instanceof DecodeError) {
        throw error;
      }
      throw new DecodeError("Invalid UTF-8 string", { cause: error });
    }
  }

  /** Element counts are bounded by the bytes left, one byte per element at least. */
  count(): number {
    const count = this.u32();
    if (count > this.remaining) {
      throw new DecodeError(`Element count ${count} exceeds remaining ${this.remaining} bytes`);
    }
    return count;
  }

  private ensure(length: number): void {
    if (this.remaining < length) {
      throw new DecodeError(
        `Unexpected end of message: need ${length} bytes at offset ${this.offset}, have ${this.remaining}`
      );
    }
  }
}

function writeHeader(writer: WireWriter, type: MessageType): void {
  writer.u8(WIRE_MAGIC_1);
  writer.u8(WIRE_MAGIC_2);
  writer.u8(WIRE_VERSION);
  writer.u8(type);
}

function readHeader(reader: WireReader, expected: MessageType): void {
  if (reader.remaining < HEADER_SIZE) {
    throw new DecodeError(`Message shorter than the ${HEADER_SIZE} byte header`);
  }
  const magic1 = reader.u8();
  const magic2 = reader.u8();
  if (magic1 !== WIRE_MAGIC_1 || magic2 !== WIRE_MAGIC_2) {
    throw new DecodeError("Bad magic bytes");
  }
  const version = reader.u8();
  if (version !== WIRE_VERSION) {
    throw new DecodeError(`Unsupported wire version ${version}`);
  }
  const type = reader.u8();
  if (type !== expected) {
    throw new DecodeError(`Unexpected message type ${type}`);
  }
}

function writeDynamic(writer: WireWriter, value: DynamicValue): void {
  if (value === null) {
    writer.u8(ValueTag.Nil);
    return;
  }
  if (typeof value === "boolean") {
    writer.u8(ValueTag.Bool);
    writer.u8(value ? 1 : 0);
    return;
  }
  if (typeof value === "number") {
    if (Number.isSafeInteger(value)) {
      writer.u8(ValueTag.Int);
      writer.i64(value);
    } else {
      writer.u8(ValueTag.Float);
      writer.f64(value);
    }
    return;
  }
  if (typeof value === "string") {
    writer.u8(ValueTag.Str);
    writer.string(value);
    return;
  }
  if (value instanceof Uint8Array) {
    writer.u8(ValueTag.Bytes);
    writer.bytes(value);
    return;
  }
  if (Array.isArray(value)) {
    writer.u8(ValueTag.List);
    writer.u32(value.length);
    for (const item of value) {
      writeDynamic(writer, item);
    }
    return;
  }
  writeDynamicMap(writer, value);
}

function writeDynamicMap(writer: WireWriter, value: { [key: string]: DynamicValue }): void {
  const entries = Object.entries(value);
  writer.u8(ValueTag.DynamicMap);
  writer.u32(entries.length);
  for (const [key, item] of entries) {
    writer.string(key);
    writeDynamic(writer, item);
  }
}

function readDynamicMap(reader: WireReader): { [key: string]: DynamicValue } {
  const count = reader.count();
  const out: { [key: string]: DynamicValue } = {};
  for (let i = 0; i < count; i++) {
    const key = reader.string();
    out[key] = readDynamic(reader);
  }
  return out;
}

function readDynamic(reader: WireReader): DynamicValue {
  const tag = reader.u8();
  switch (tag) {
    case ValueTag.Nil:
      return null;
    case ValueTag.Bool:
      return reader.u8() !== 0;
    case ValueTag.Int:
      return reader.i64();
    case ValueTag.Float:
      return reader.f64();
    case ValueTag.Str:
      return reader.string();
    case ValueTag.Bytes:
      return reader.bytes();
    case ValueTag.List: {
      const count = reader.count();
      const items: DynamicValue[] = [];
      for (let i = 0; i < count; i++) {
        items.push(readDynamic(reader));
      }
      return items;
    }
    case ValueTag.DynamicMap:
      return readDynamicMap(reader);
    default:
      throw new DecodeError(`Unknown value tag ${tag}`);
  }
}

function writeValue(writer: WireWriter, value: ResponseValue): void {
  switch (value.kind) {
    case "nil":
      writer.u8(ValueTag.Nil);
      return;
    case "int":
      writer.u8(ValueTag.Int);
      writer.i64(value.value);
      return;
    case "str":
      writer.u8(ValueTag.Str);
      writer.string(value.value);
      return;
    case "float":
      writer.u8(ValueTag.Float);
      writer.f64(value.value);
      return;
    case "bytes":
      writer.u8(ValueTag.Bytes);
      writer.bytes(value.value);
      return;
    case "list":
      writeDynamic(writer, value.value);
      return;
    case "map": {
      const entries = Object.entries(value.value);
      writer.u8(ValueTag.StringMap);
      writer.u32(entries.length);
      for (const [key, item] of entries) {
        writer.string(key);
        writer.string(item);
      }
      return;
    }
  }
}

function readValue(reader: WireReader): ResponseValue {
  const tag = reader.u8();
  switch (tag) {
    case ValueTag.Nil:
      return nilValue();
    case ValueTag.Int:
      return { kind: "int", value: reader.i64() };
    case ValueTag.Str:
      return { kind: "str", value: reader.string() };
    case ValueTag.Float:
      return { kind: "float", value: reader.f64() };
    case ValueTag.Bytes:
      return { kind: "bytes", value: reader.bytes() };
    case ValueTag.List: {
      const count = reader.count();
      const items: DynamicValue[] = [];
      for (let i = 0; i < count; i++) {
        items.push(readDynamic(reader));
      }
      return { kind: "list", value: items };
    }
    case ValueTag.StringMap: {
      const count = reader.count();
      const out: Record<string, string> = {};
      for (let i = 0; i < count; i++) {
        const key = reader.string();
        out[key] = reader.string();
      }
      return { kind: "map", value: out };
    }
    default:
      throw new DecodeError(`Unknown response value tag ${tag}`);
  }
}

function ensureFullyRead(reader: WireReader): void {
  if (reader.remaining !== 0) {
    throw new DecodeError(`${reader.remaining} trailing bytes after message`);
  }
}

/**
 * Default codec: a fixed header followed by length-prefixed, tagged fields.
 *
 * Command:  header | str cmd | u32 argc | str arg...
 * Response: header | u8 flags | [str error] | value | dynamic map attributes
 */
export class TaggedBinaryCodec implements WireCodec {
  readonly name = "tagged-binary";

  encodeCommand(command: Command): Uint8Array {
    const writer = new WireWriter();
    writeHeader(writer, MessageType.Command);
    writer.string(command.cmd);
    writer.u32(command.args.length);
    for (const arg of command.args) {
      writer.string(arg);
    }
    return writer.finish();
  }

  decodeCommand(data: Uint8Array): Command {
    const reader = new WireReader(data);
    readHeader(reader, MessageType.Command);
    const cmd = reader.string();
    const count = reader.count();
    const args: string[] = [];
    for (let i = 0; i < count; i++) {
      args.push(reader.string());
    }
    ensureFullyRead(reader);
    return createCommand(cmd, args);
  }

  encodeResponse(response: Response): Uint8Array {
    const normalized = normalizeResponse(response);
    const writer = new WireWriter();
    writeHeader(writer, MessageType.Response);
    writer.u8(normalized.error !== null ? RESPONSE_FLAG_ERROR : 0);
    if (normalized.error !== null) {
      writer.string(normalized.error);
    }
    writeValue(writer, normalized.value);
    writeDynamicMap(writer, normalized.attributes);
    return writer.finish();
  }

  decodeResponse(data: Uint8Array): Response {
    try {
      const reader = new WireReader(data);
      readHeader(reader, MessageType.Response);
      const flags = reader.u8();
      const error = flags & RESPONSE_FLAG_ERROR ? reader.string() : null;
      const value = readValue(reader);
      const attributesTag = reader.u8();
      if (attributesTag !== ValueTag.DynamicMap) {
        throw new DecodeError(`Expected attribute map, got tag ${attributesTag}`);
      }
      const attributes = readDynamicMap(reader);
      ensureFullyRead(reader);
      return normalizeResponse({ error, value, attributes });
    } catch (error) {
      return errorResponse(describeDecodeFailure(error));
    }
  }
}
