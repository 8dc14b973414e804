import { z } from "zod";
import { DecodeError } from "./errors.js";
import { describeDecodeFailure, type WireCodec } from "./wire-codec.js";
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

// Inside dynamic values, byte strings travel as `{ "$bytes": "<base64>" }` and
// non-finite numbers as `{ "$float": "Infinity" }`. Map keys that start with
// `$` get one more `$` so an ordinary map never reads back as an envelope.
const BYTES_KEY = "$bytes";
const FLOAT_KEY = "$float";
const KEY_ESCAPE = "$";

const NonFiniteSchema = z.enum(["NaN", "Infinity", "-Infinity"]);
type NonFinite = z.infer<typeof NonFiniteSchema>;

type JsonDynamic =
  | null
  | boolean
  | number
  | string
  | JsonDynamic[]
  | { [key: string]: JsonDynamic };

const JsonDynamicSchema: z.ZodType<JsonDynamic> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonDynamicSchema),
    z.record(JsonDynamicSchema),
  ])
);

export const JsonCommandSchema = z
  .object({
    cmd: z.string().min(1),
    args: z.array(z.string()).default([]),
  })
  .strict();

export const JsonResponseValueSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("nil") }),
  z.object({ kind: z.literal("int"), value: z.number().int().safe() }),
  z.object({ kind: z.literal("str"), value: z.string() }),
  z.object({ kind: z.literal("float"), value: z.union([z.number(), NonFiniteSchema]) }),
  z.object({ kind: z.literal("bytes"), value: z.string() }),
  z.object({ kind: z.literal("list"), value: z.array(JsonDynamicSchema) }),
  z.object({ kind: z.literal("map"), value: z.record(z.string()) }),
]);

export const JsonResponseSchema = z
  .object({
    error: z.string().nullable().optional(),
    value: JsonResponseValueSchema.optional(),
    attrs: z.record(JsonDynamicSchema).optional(),
  })
  .strict();

type JsonResponseValue = z.infer<typeof JsonResponseValueSchema>;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

function fromBase64(value: string): Uint8Array {
  return new Uint8Array(Buffer.from(value, "base64"));
}

function nonFiniteName(value: number): NonFinite {
  if (Number.isNaN(value)) return "NaN";
  return value > 0 ? "Infinity" : "-Infinity";
}

function escapeKey(key: string): string {
  return key.startsWith(KEY_ESCAPE) ? `${KEY_ESCAPE}${key}` : key;
}

function unescapeKey(key: string): string {
  return key.startsWith(KEY_ESCAPE + KEY_ESCAPE) ? key.slice(KEY_ESCAPE.length) : key;
}

function readEnvelope(value: { [key: string]: JsonDynamic }): DynamicValue | undefined {
  const keys = Object.keys(value);
  if (keys.length !== 1) {
    return undefined;
  }
  const [key] = keys;
  const inner = value[key];
  if (key === BYTES_KEY && typeof inner === "string") {
    return fromBase64(inner);
  }
  if (key === FLOAT_KEY) {
    const parsed = NonFiniteSchema.safeParse(inner);
    return parsed.success ? Number(parsed.data) : undefined;
  }
  return undefined;
}

function toJsonDynamic(value: DynamicValue): JsonDynamic {
  if (value instanceof Uint8Array) {
    return { [BYTES_KEY]: toBase64(value) };
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return { [FLOAT_KEY]: nonFiniteName(value) };
  }
  if (Array.isArray(value)) {
    return value.map(toJsonDynamic);
  }
  if (value !== null && typeof value === "object") {
    return toJsonRecord(value);
  }
  return value;
}

function toJsonRecord(value: { [key: string]: DynamicValue }): { [key: string]: JsonDynamic } {
  const out: { [key: string]: JsonDynamic } = {};
  for (const [key, item] of Object.entries(value)) {
    out[escapeKey(key)] = toJsonDynamic(item);
  }
  return out;
}

function fromJsonDynamic(value: JsonDynamic): DynamicValue {
  if (Array.isArray(value)) {
    return value.map(fromJsonDynamic);
  }
  if (value !== null && typeof value === "object") {
    return readEnvelope(value) ?? fromJsonRecord(value);
  }
  return value;
}

function fromJsonRecord(value: { [key: string]: JsonDynamic }): { [key: string]: DynamicValue } {
  const out: { [key: string]: DynamicValue } = {};
  for (const [key, item] of Object.entries(value)) {
    out[unescapeKey(key)] = fromJsonDynamic(item);
  }
  return out;
}

function toJsonValue(value: ResponseValue): JsonResponseValue {
  switch (value.kind) {
    case "float":
      return {
        kind: "float",
        value: Number.isFinite(value.value) ? value.value : nonFiniteName(value.value),
      };
    case "bytes":
      return { kind: "bytes", value: toBase64(value.value) };
    case "list":
      return { kind: "list", value: value.value.map(toJsonDynamic) };
    default:
      return value;
  }
}

function fromJsonValue(value: JsonResponseValue): ResponseValue {
  switch (value.kind) {
    case "float":
      return { kind: "float", value: Number(value.value) };
    case "bytes":
      return { kind: "bytes", value: fromBase64(value.value) };
    case "list":
      return { kind: "list", value: value.value.map(fromJsonDynamic) };
    default:
      return value;
  }
}

function parseJson(data: Uint8Array): unknown {
  let text: string;
  try {
    text = textDecoder.decode(data);
  } catch (error) {
    throw new DecodeError("Invalid UTF-8 payload", { cause: error });
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError("Invalid JSON payload", { cause: error });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/** UTF-8 JSON codec, validated with zod on the way in. */
export class JsonWireCodec implements WireCodec {
  readonly name = "json";

  encodeCommand(command: Command): Uint8Array {
    return textEncoder.encode(JSON.stringify({ cmd: command.cmd, args: command.args }));
  }

  decodeCommand(data: Uint8Array): Command {
    const parsed = JsonCommandSchema.safeParse(parseJson(data));
    if (!parsed.success) {
      throw new DecodeError(`Invalid command: ${describeIssues(parsed.error)}`);
    }
    return createCommand(parsed.data.cmd, parsed.data.args);
  }

  encodeResponse(response: Response): Uint8Array {
    const normalized = normalizeResponse(response);
    return textEncoder.encode(
      JSON.stringify({
        error: normalized.error,
        value: toJsonValue(normalized.value),
        attrs: toJsonRecord(normalized.attributes),
      })
    );
  }

  decodeResponse(data: Uint8Array): Response {
    try {
      const parsed = JsonResponseSchema.safeParse(parseJson(data));
      if (!parsed.success) {
        throw new DecodeError(describeIssues(parsed.error));
      }
      return normalizeResponse({
        error: parsed.data.error ?? null,
        value: parsed.data.value ? fromJsonValue(parsed.data.value) : nilValue(),
        attributes: parsed.data.attrs ? fromJsonRecord(parsed.data.attrs) : {},
      });
    } catch (error) {
      return errorResponse(describeDecodeFailure(error));
    }
  }
}
