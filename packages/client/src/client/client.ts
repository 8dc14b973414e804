import { resolveDiceHost, resolveDicePort } from "../runtime/config.js";
import { parseHostPort, formatHostPort } from "../shared/endpoints.js";
import { ConnectionError, TransportError, toTransportError } from "../shared/errors.js";
import {
  errorResponse,
  parseCommandText,
  type Command,
  type Response,
} from "../shared/wire.js";
import { openChannel } from "./client-channel.js";
import {
  resolveClientConfig,
  withId,
  type ClientConfig,
  type ClientOption,
} from "./client-options.js";
import type { Connection } from "./client-transport.js";
import { SerialQueue } from "./serial-queue.js";
import { WatchSubscription, type WatchHandle } from "./watch-subscription.js";

type ExchangeResult =
  | { kind: "ok"; response: Response }
  | { kind: "failed"; failure: TransportError };

const MAX_RETRIES = 1;

/**
 * A session with one DiceDB server: a control connection for
 * request/response commands and, on demand, a second connection that the
 * server pushes watch events to. Both carry the same identity token.
 *
 * @example
 * ```typescript
 * const client = await DiceClient.connect("localhost", 7379);
 * const response = await client.fireString("PING");
 * console.log(stringValue(response)); // "PONG"
 * await client.close();
 * ```
 */
export class DiceClient {
  private readonly lock = new SerialQueue();
  private watch: WatchSubscription | null = null;
  private watchOpening: Promise<WatchHandle> | null = null;
  private closed = false;

  private constructor(
    private readonly config: ClientConfig,
    private connection: Connection | null
  ) {}

  /** Dials and handshakes the control channel. Throws `ConnectionError` on failure. */
  static async connect(host: string, port: number, ...options: ClientOption[]): Promise<DiceClient> {
    const config = resolveClientConfig(host, port, options);
    const connection = await openChannel(config, "command");
    config.logger.debug(
      { endpoint: formatHostPort(config.host, config.port), clientId: config.id },
      "Connected"
    );
    return new DiceClient(config, connection);
  }

  get id(): string {
    return this.config.id;
  }

  get host(): string {
    return this.config.host;
  }

  get port(): number {
    return this.config.port;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Sends one command and waits for its response. A dead connection is
   * re-dialed and re-handshaken once, then the command is retried once.
   * Failures come back as `Response.error`; this never rejects.
   */
  fire(command: Command): Promise<Response> {
    return this.lock.run(async () => {
      let retries = 0;
      for (;;) {
        if (this.closed) {
          return errorResponse("Client is closed");
        }
        const result = await this.exchange(command);
        if (result.kind === "ok") {
          return result.response;
        }

        const { failure } = result;
        if (this.closed || !failure.recoverable || retries >= MAX_RETRIES) {
          return errorResponse(failure.message);
        }
        retries += 1;
        if (!(await this.reconnect(failure))) {
          return errorResponse(failure.message);
        }
      }
    });
  }

  fireString(text: string): Promise<Response> {
    const command = parseCommandText(text);
    if (!command) {
      return Promise.resolve(errorResponse("Empty command"));
    }
    return this.fire(command);
  }

  /**
   * Opens the watch channel, or returns the handle of the one already
   * running. After the subscription terminates with an error a new call
   * opens a fresh one.
   */
  openWatch(): Promise<WatchHandle> {
    if (this.closed) {
      return Promise.reject(new ConnectionError("Client is closed"));
    }
    if (this.watch?.isActive) {
      return Promise.resolve(this.watch.handle);
    }
    if (this.watchOpening) {
      return this.watchOpening;
    }

    const opening = WatchSubscription.open({
      reopen: () => openChannel(this.config, "watch"),
      codec: this.config.codec,
      logger: this.config.logger,
    })
      .then(async (subscription) => {
        if (this.closed) {
          await subscription.stop();
          throw new ConnectionError("Client is closed");
        }
        this.watch = subscription;
        return subscription.handle;
      })
      .finally(() => {
        this.watchOpening = null;
      });
    this.watchOpening = opening;
    return opening;
  }

  /** Stops the watch loop and closes both connections. Safe to call repeatedly. */
  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.connection?.close();
      this.connection = null;
      this.config.logger.debug({ clientId: this.config.id }, "Client closed");
    }
    const watch = this.watch;
    this.watch = null;
    if (watch) {
      await watch.stop();
    }
  }

  private async exchange(command: Command): Promise<ExchangeResult> {
    const connection = this.connection;
    if (!connection) {
      return { kind: "failed", failure: new TransportError("closed", "Connection is closed") };
    }
    try {
      await connection.send(this.config.codec.encodeCommand(command));
      const frame = await connection.receive(this.config.ioTimeoutMs);
      return { kind: "ok", response: this.config.codec.decodeResponse(frame) };
    } catch (error) {
      return { kind: "failed", failure: toTransportError(error) };
    }
  }

  /** Runs inside `fire`, so it must not take the lock again. */
  private async reconnect(failure: TransportError): Promise<boolean> {
    this.config.logger.warn(
      { err: failure, endpoint: formatHostPort(this.config.host, this.config.port) },
      "Connection lost, reconnecting"
    );
    this.connection?.close();
    this.connection = null;
    try {
      const connection = await openChannel(this.config, "command");
      if (this.closed) {
        connection.close();
        return false;
      }
      this.connection = connection;
      return true;
    } catch (error) {
      this.config.logger.warn({ err: error }, "Reconnect failed");
      return false;
    }
  }
}

export function connectTo(endpoint: string, ...options: ClientOption[]): Promise<DiceClient> {
  const { host, port } = parseHostPort(endpoint);
  return DiceClient.connect(host, port, ...options);
}

/**
 * Returns `existing` while it is open. A closed client is replaced by a new
 * one at the same endpoint with the same identity; with no client the
 * endpoint comes from the arguments or `DICEDB_HOST` / `DICEDB_PORT`.
 */
export async function getOrCreateClient(
  existing?: DiceClient | null,
  endpoint: { host?: string; port?: number } = {},
  ...options: ClientOption[]
): Promise<DiceClient> {
  if (existing && !existing.isClosed) {
    return existing;
  }
  if (existing) {
    return DiceClient.connect(existing.host, existing.port, withId(existing.id), ...options);
  }
  return DiceClient.connect(
    endpoint.host ?? resolveDiceHost(),
    endpoint.port ?? resolveDicePort(),
    ...options
  );
}
