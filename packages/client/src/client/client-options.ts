import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { createChildLogger, getRootLogger } from "../runtime/logger.js";
import { ConfigError } from "../shared/errors.js";
import { DEFAULT_MAX_MESSAGE_SIZE } from "../shared/framing.js";
import { TaggedBinaryCodec, type WireCodec } from "../shared/wire-codec.js";

export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const DEFAULT_IO_TIMEOUT_MS = 5000;

export const ClientConfigSchema = z
  .object({
    host: z.string().trim().min(1, "host is required"),
    port: z.number().int().min(1).max(65535),
    id: z.string().trim().min(1, "id must not be empty"),
    connectTimeoutMs: z.number().int().positive(),
    ioTimeoutMs: z.number().int().positive(),
    maxMessageSize: z.number().int().positive(),
  })
  .strict();

export type ClientSettings = z.infer<typeof ClientConfigSchema>;

export type ClientConfig = ClientSettings & {
  codec: WireCodec;
  logger: Logger;
};

/** Applied in order to the defaults before the configuration is validated. */
export type ClientOption = (config: ClientConfig) => void;

export function withId(id: string): ClientOption {
  return (config) => {
    config.id = id;
  };
}

export function withTimeouts(timeouts: {
  connectTimeoutMs?: number;
  ioTimeoutMs?: number;
}): ClientOption {
  return (config) => {
    config.connectTimeoutMs = timeouts.connectTimeoutMs ?? config.connectTimeoutMs;
    config.ioTimeoutMs = timeouts.ioTimeoutMs ?? config.ioTimeoutMs;
  };
}

export function withMaxMessageSize(bytes: number): ClientOption {
  return (config) => {
    config.maxMessageSize = bytes;
  };
}

export function withCodec(codec: WireCodec): ClientOption {
  return (config) => {
    config.codec = codec;
  };
}

export function withLogger(logger: Logger): ClientOption {
  return (config) => {
    config.logger = logger;
  };
}

export function resolveClientConfig(
  host: string,
  port: number,
  options: readonly ClientOption[] = []
): ClientConfig {
  const draft: ClientConfig = {
    host,
    port,
    id: uuidv4(),
    connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
    ioTimeoutMs: DEFAULT_IO_TIMEOUT_MS,
    maxMessageSize: DEFAULT_MAX_MESSAGE_SIZE,
    codec: new TaggedBinaryCodec(),
    logger: createChildLogger(getRootLogger(), "dicedb-client"),
  };
  for (const option of options) {
    option(draft);
  }

  const { codec, logger, ...settings } = draft;
  const parsed = ClientConfigSchema.safeParse(settings);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid client config: ${details}`);
  }
  return { ...parsed.data, codec, logger };
}
