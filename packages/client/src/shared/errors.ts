export type TransportErrorKind = "closed" | "reset" | "timeout" | "oversize" | "io";

/**
 * Raised when a session or watch channel cannot be established.
 * Construction and `openWatch` are the only places these escape the client.
 */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export class DialFailedError extends ConnectionError {
  readonly host: string;
  readonly port: number;

  constructor(params: { host: string; port: number; reason: string; cause?: unknown }) {
    super(`Failed to connect to ${params.host}:${params.port}: ${params.reason}`, {
      cause: params.cause,
    });
    this.name = "DialFailedError";
    this.host = params.host;
    this.port = params.port;
  }
}

export class HandshakeFailedError extends ConnectionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HandshakeFailedError";
  }
}

export class TransportError extends Error {
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.kind = kind;
  }

  /** Closed and reset sockets are worth one reconnect; nothing else is. */
  get recoverable(): boolean {
    return this.kind === "closed" || this.kind === "reset";
  }
}

export class MessageTooLargeError extends TransportError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super("oversize", `Message too large: ${size} bytes exceeds the ${limit} byte limit`);
    this.name = "MessageTooLargeError";
    this.size = size;
    this.limit = limit;
  }
}

export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readErrorCode(error: unknown): string | null {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return null;
  }
  return typeof error.code === "string" ? error.code : null;
}

export function describeTransportError(error?: unknown): string {
  if (!error) {
    return "Transport error";
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (typeof error === "object" && "message" in error) {
    if (typeof error.message === "string" && error.message.trim().length > 0) {
      return error.message.trim();
    }
  }
  return "Transport error";
}

export function classifyTransportError(error: unknown): TransportErrorKind {
  switch (readErrorCode(error)) {
    case "ECONNRESET":
    case "ECONNABORTED":
      return "reset";
    case "EPIPE":
    case "ERR_STREAM_DESTROYED":
    case "ERR_STREAM_WRITE_AFTER_END":
      return "closed";
    case "ETIMEDOUT":
      return "timeout";
    default:
      return "io";
  }
}

export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  return new TransportError(classifyTransportError(error), describeTransportError(error), {
    cause: error,
  });
}
