export type DynamicValue =
  | null
  | boolean
  | number
  | string
  | Uint8Array
  | DynamicValue[]
  | { [key: string]: DynamicValue };

export type ResponseValue =
  | { kind: "nil" }
  | { kind: "int"; value: number }
  | { kind: "str"; value: string }
  | { kind: "float"; value: number }
  | { kind: "bytes"; value: Uint8Array }
  | { kind: "list"; value: DynamicValue[] }
  | { kind: "map"; value: Record<string, string> };

export type ResponseValueKind = ResponseValue["kind"];

export type Command = {
  readonly cmd: string;
  readonly args: readonly string[];
};

export type Response = {
  error: string | null;
  value: ResponseValue;
  attributes: Record<string, DynamicValue>;
};

export type ChannelKind = "command" | "watch";

export const HANDSHAKE_COMMAND = "HANDSHAKE";

const NIL: ResponseValue = Object.freeze({ kind: "nil" });

export function createCommand(cmd: string, args: readonly string[] = []): Command {
  return Object.freeze({ cmd, args: Object.freeze([...args]) });
}

export function createHandshakeCommand(identity: string, channel: ChannelKind): Command {
  return createCommand(HANDSHAKE_COMMAND, [identity, channel]);
}

/**
 * Splits whitespace-delimited text into a command. Returns null for blank
 * input.
 */
export function parseCommandText(text: string): Command | null {
  const tokens = text.trim().split(/\s+/).filter((token) => token.length > 0);
  const [cmd, ...args] = tokens;
  if (!cmd) {
    return null;
  }
  return createCommand(cmd, args);
}

export function nilValue(): ResponseValue {
  return NIL;
}

export function valueResponse(
  value: ResponseValue,
  attributes: Record<string, DynamicValue> = {}
): Response {
  return { error: null, value, attributes };
}

export function errorResponse(
  error: string,
  attributes: Record<string, DynamicValue> = {}
): Response {
  return { error, value: NIL, attributes };
}

/** An error always wins over a value; the value of an error response is nil. */
export function normalizeResponse(response: Response): Response {
  if (response.error !== null && response.value.kind !== "nil") {
    return { ...response, value: NIL };
  }
  return response;
}

export function isNil(response: Response): boolean {
  return response.value.kind === "nil";
}

export function intValue(response: Response): number {
  return response.value.kind === "int" ? response.value.value : 0;
}

export function stringValue(response: Response): string {
  return response.value.kind === "str" ? response.value.value : "";
}

export function floatValue(response: Response): number {
  return response.value.kind === "float" ? response.value.value : 0;
}

export function bytesValue(response: Response): Uint8Array {
  return response.value.kind === "bytes" ? response.value.value : new Uint8Array(0);
}

export function listValue(response: Response): DynamicValue[] {
  return response.value.kind === "list" ? response.value.value : [];
}

export function stringMapValue(response: Response): Record<string, string> {
  return response.value.kind === "map" ? response.value.value : {};
}
