import { describe, expect, it } from "vitest";
import { ConfigError } from "../shared/errors.js";
import { JsonWireCodec } from "../shared/json-codec.js";
import { createMockLogger } from "../test-utils/mock-logger.js";
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_IO_TIMEOUT_MS,
  resolveClientConfig,
  withCodec,
  withId,
  withLogger,
  withMaxMessageSize,
  withTimeouts,
} from "./client-options.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("resolveClientConfig", () => {
  it("fills in defaults and a random identity", () => {
    const logger = createMockLogger();
    const config = resolveClientConfig("localhost", 7379, [withLogger(logger)]);
    expect(config.host).toBe("localhost");
    expect(config.port).toBe(7379);
    expect(config.id).toMatch(UUID_PATTERN);
    expect(config.connectTimeoutMs).toBe(DEFAULT_CONNECT_TIMEOUT_MS);
    expect(config.ioTimeoutMs).toBe(DEFAULT_IO_TIMEOUT_MS);
    expect(config.maxMessageSize).toBe(32 * 1024 * 1024);
    expect(config.codec.name).toBe("tagged-binary");
    expect(config.logger).toBe(logger);
  });

  it("generates a different identity per client", () => {
    const logger = createMockLogger();
    const a = resolveClientConfig("localhost", 7379, [withLogger(logger)]);
    const b = resolveClientConfig("localhost", 7379, [withLogger(logger)]);
    expect(a.id).not.toBe(b.id);
  });

  it("applies options in order", () => {
    const codec = new JsonWireCodec();
    const config = resolveClientConfig("db", 7380, [
      withLogger(createMockLogger()),
      withId("first"),
      withId("client-7"),
      withTimeouts({ ioTimeoutMs: 250 }),
      withMaxMessageSize(1024),
      withCodec(codec),
    ]);
    expect(config.id).toBe("client-7");
    expect(config.ioTimeoutMs).toBe(250);
    expect(config.connectTimeoutMs).toBe(DEFAULT_CONNECT_TIMEOUT_MS);
    expect(config.maxMessageSize).toBe(1024);
    expect(config.codec).toBe(codec);
  });

  it("rejects invalid settings with every issue listed", () => {
    expect(() =>
      resolveClientConfig("db", 0, [withLogger(createMockLogger()), withId(" ")])
    ).toThrow(ConfigError);
    expect(() =>
      resolveClientConfig("db", 0, [withLogger(createMockLogger()), withId(" ")])
    ).toThrow(
      "Invalid client config: port: Number must be greater than or equal to 1; id: id must not be empty"
    );
  });
});
