/**
 * dicedb-client
 *
 * TypeScript client for DiceDB over TCP.
 *
 * - `DiceClient`: control channel with handshake, serialized commands and
 *   reconnect-once on dead connections
 * - `openWatch()`: second channel whose pushed events land in a `WatchQueue`
 * - `TaggedBinaryCodec` (default) and `JsonWireCodec`: swappable wire formats
 *
 * @example
 * ```typescript
 * import { DiceClient, stringValue } from "dicedb-client";
 *
 * const client = await DiceClient.connect("localhost", 7379);
 * const pong = await client.fireString("PING");
 * console.log(stringValue(pong));
 *
 * const watch = await client.openWatch();
 * await client.fireString("GET.WATCH k1");
 * for await (const event of watch.events) {
 *   console.log(event);
 * }
 * ```
 *
 * @packageDocumentation
 */

export {
  DiceClient,
  connectTo,
  getOrCreateClient,
} from "./client/client.js";
export {
  ClientConfigSchema,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_IO_TIMEOUT_MS,
  resolveClientConfig,
  withCodec,
  withId,
  withLogger,
  withMaxMessageSize,
  withTimeouts,
  type ClientConfig,
  type ClientOption,
  type ClientSettings,
  type Logger,
} from "./client/client-options.js";
export { WatchQueue } from "./client/watch-queue.js";
export type { WatchHandle } from "./client/watch-subscription.js";

export {
  ConfigError,
  ConnectionError,
  DecodeError,
  DialFailedError,
  HandshakeFailedError,
  MessageTooLargeError,
  TransportError,
  type TransportErrorKind,
} from "./shared/errors.js";
export { DEFAULT_MAX_MESSAGE_SIZE, FrameDecoder, encodeFrame } from "./shared/framing.js";
export { TaggedBinaryCodec, type WireCodec } from "./shared/wire-codec.js";
export { JsonWireCodec } from "./shared/json-codec.js";
export {
  DEFAULT_DICE_HOST,
  DEFAULT_DICE_PORT,
  parseHostPort,
  type HostPortParts,
} from "./shared/endpoints.js";
export {
  HANDSHAKE_COMMAND,
  bytesValue,
  createCommand,
  errorResponse,
  floatValue,
  intValue,
  isNil,
  listValue,
  nilValue,
  parseCommandText,
  stringMapValue,
  stringValue,
  valueResponse,
  type ChannelKind,
  type Command,
  type DynamicValue,
  type Response,
  type ResponseValue,
  type ResponseValueKind,
} from "./shared/wire.js";

export { createRootLogger, resolveLogConfig, type LogFormat, type LogLevel } from "./runtime/logger.js";
