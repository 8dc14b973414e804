import { describe, expect, it } from "vitest";
import {
  bytesValue,
  createCommand,
  createHandshakeCommand,
  errorResponse,
  floatValue,
  intValue,
  isNil,
  listValue,
  nilValue,
  normalizeResponse,
  parseCommandText,
  stringMapValue,
  stringValue,
  valueResponse,
} from "./wire.js";

describe("response accessors", () => {
  it("return the value when the tag matches", () => {
    expect(intValue(valueResponse({ kind: "int", value: 7 }))).toBe(7);
    expect(stringValue(valueResponse({ kind: "str", value: "PONG" }))).toBe("PONG");
    expect(floatValue(valueResponse({ kind: "float", value: 0.5 }))).toBe(0.5);
    expect(Array.from(bytesValue(valueResponse({ kind: "bytes", value: new Uint8Array([1]) })))).toEqual([1]);
    expect(listValue(valueResponse({ kind: "list", value: ["a", 1] }))).toEqual(["a", 1]);
    expect(stringMapValue(valueResponse({ kind: "map", value: { a: "b" } }))).toEqual({ a: "b" });
    expect(isNil(valueResponse({ kind: "nil" }))).toBe(true);
    expect(isNil(valueResponse(nilValue()))).toBe(true);
  });

  it("fall back to zero values when the tag does not match", () => {
    const response = valueResponse({ kind: "str", value: "text" });
    expect(intValue(response)).toBe(0);
    expect(floatValue(response)).toBe(0);
    expect(bytesValue(response).byteLength).toBe(0);
    expect(listValue(response)).toEqual([]);
    expect(stringMapValue(response)).toEqual({});
    expect(isNil(response)).toBe(false);
    expect(stringValue(errorResponse("ERR"))).toBe("");
  });
});

describe("commands", () => {
  it("are frozen with default arguments", () => {
    const command = createCommand("PING");
    expect(command).toEqual({ cmd: "PING", args: [] });
    expect(Object.isFrozen(command)).toBe(true);
    expect(Object.isFrozen(command.args)).toBe(true);
  });

  it("copy the argument list", () => {
    const args = ["a"];
    const command = createCommand("GET", args);
    args.push("b");
    expect(command.args).toEqual(["a"]);
  });

  it("build the handshake with identity and channel kind", () => {
    expect(createHandshakeCommand("client-1", "watch")).toEqual({
      cmd: "HANDSHAKE",
      args: ["client-1", "watch"],
    });
  });

  it("parse whitespace-delimited text", () => {
    expect(parseCommandText("  SET   key \t value\n")).toEqual({
      cmd: "SET",
      args: ["key", "value"],
    });
    expect(parseCommandText("PING")).toEqual({ cmd: "PING", args: [] });
    expect(parseCommandText("   ")).toBeNull();
  });
});

describe("normalizeResponse", () => {
  it("clears the value of an error response", () => {
    expect(
      normalizeResponse({ error: "ERR", value: { kind: "int", value: 1 }, attributes: {} })
    ).toEqual(errorResponse("ERR"));
  });

  it("leaves well-formed responses untouched", () => {
    const response = valueResponse({ kind: "int", value: 1 });
    expect(normalizeResponse(response)).toBe(response);
  });
});
