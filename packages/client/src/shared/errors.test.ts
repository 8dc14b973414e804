import { describe, expect, test } from "vitest";
import {
  ConnectionError,
  DialFailedError,
  HandshakeFailedError,
  MessageTooLargeError,
  TransportError,
  classifyTransportError,
  describeTransportError,
  toTransportError,
} from "./errors.js";

function systemError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("transport error classification", () => {
  test("maps socket error codes to kinds", () => {
    expect(classifyTransportError(systemError("ECONNRESET", "read ECONNRESET"))).toBe("reset");
    expect(classifyTransportError(systemError("ECONNABORTED", "aborted"))).toBe("reset");
    expect(classifyTransportError(systemError("EPIPE", "write EPIPE"))).toBe("closed");
    expect(classifyTransportError(systemError("ERR_STREAM_DESTROYED", "destroyed"))).toBe("closed");
    expect(classifyTransportError(systemError("ETIMEDOUT", "timed out"))).toBe("timeout");
    expect(classifyTransportError(systemError("EACCES", "denied"))).toBe("io");
    expect(classifyTransportError(new Error("Broken pipe"))).toBe("io");
  });

  test("only closed and reset connections are recoverable", () => {
    expect(toTransportError(systemError("ECONNRESET", "reset")).recoverable).toBe(true);
    expect(toTransportError(systemError("EPIPE", "pipe")).recoverable).toBe(true);
    expect(toTransportError(systemError("ETIMEDOUT", "slow")).recoverable).toBe(false);
    expect(new MessageTooLargeError(10, 5).recoverable).toBe(false);
  });

  test("keeps the original error as the cause", () => {
    const original = systemError("EPIPE", "write EPIPE");
    const converted = toTransportError(original);
    expect(converted).toBeInstanceOf(TransportError);
    expect(converted.message).toBe("write EPIPE");
    expect(converted.cause).toBe(original);
    expect(toTransportError(converted)).toBe(converted);
  });

  test("describeTransportError returns normalized messages", () => {
    expect(describeTransportError(new Error("boom"))).toBe("boom");
    expect(describeTransportError({ message: " bad frame " })).toBe("bad frame");
    expect(describeTransportError("plain")).toBe("plain");
    expect(describeTransportError()).toBe("Transport error");
  });
});

describe("connection errors", () => {
  test("dial and handshake failures are connection errors", () => {
    const dial = new DialFailedError({ host: "db", port: 7379, reason: "refused" });
    expect(dial).toBeInstanceOf(ConnectionError);
    expect(dial.message).toBe("Failed to connect to db:7379: refused");
    expect(dial.name).toBe("DialFailedError");
    expect(new HandshakeFailedError("rejected")).toBeInstanceOf(ConnectionError);
  });
});
