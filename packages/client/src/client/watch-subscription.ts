import { toTransportError, type TransportError } from "../shared/errors.js";
import type { WireCodec } from "../shared/wire-codec.js";
import { errorResponse, type Response } from "../shared/wire.js";
import type { Logger } from "./client-options.js";
import type { Connection } from "./client-transport.js";
import { WatchQueue } from "./watch-queue.js";

export type WatchHandle = {
  /** Aborted once the subscription has been stopped by the caller or the client. */
  readonly signal: AbortSignal;
  readonly events: WatchQueue<Response>;
  stop: () => Promise<void>;
};

export type WatchSubscriptionParams = {
  /** Dials and handshakes a fresh watch channel. */
  reopen: () => Promise<Connection>;
  codec: WireCodec;
  logger: Logger;
};

type ReadResult = { kind: "frame"; frame: Uint8Array } | { kind: "failed"; failure: TransportError };

/**
 * Owns the watch connection and the loop that moves pushed events into the
 * queue. The loop ends in one of two observable ways: the signal is aborted
 * (clean stop) or a terminal error response is queued (failure). The queue
 * is ended either way.
 */
export class WatchSubscription {
  readonly handle: WatchHandle;
  private readonly controller = new AbortController();
  private readonly events = new WatchQueue<Response>();
  private readonly loop: Promise<void>;

  private constructor(
    private connection: Connection,
    private readonly params: WatchSubscriptionParams
  ) {
    this.handle = {
      signal: this.controller.signal,
      events: this.events,
      stop: () => this.stop(),
    };
    this.loop = this.run();
  }

  static async open(params: WatchSubscriptionParams): Promise<WatchSubscription> {
    const connection = await params.reopen();
    params.logger.debug({ endpoint: connection.endpoint }, "Watch subscription opened");
    return new WatchSubscription(connection, params);
  }

  get isActive(): boolean {
    return !this.controller.signal.aborted && !this.events.isEnded;
  }

  stop(): Promise<void> {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
      this.connection.close();
    }
    return this.loop;
  }

  private async read(): Promise<ReadResult> {
    try {
      return { kind: "frame", frame: await this.connection.receive() };
    } catch (error) {
      return { kind: "failed", failure: toTransportError(error) };
    }
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;
    let reopenedWithoutFrame = false;

    while (!signal.aborted) {
      const result = await this.read();
      if (signal.aborted) {
        break;
      }

      if (result.kind === "frame") {
        reopenedWithoutFrame = false;
        this.events.push(this.params.codec.decodeResponse(result.frame));
        continue;
      }

      const { failure } = result;
      if (failure.recoverable && !reopenedWithoutFrame && (await this.reconnect(failure))) {
        reopenedWithoutFrame = true;
        continue;
      }
      if (signal.aborted) {
        break;
      }

      this.params.logger.warn({ err: failure }, "Watch subscription terminated");
      this.events.push(errorResponse(`Watch error: ${failure.message}`));
      this.events.end();
      return;
    }

    this.params.logger.debug({}, "Watch subscription stopped");
    this.events.end();
  }

  private async reconnect(failure: TransportError): Promise<boolean> {
    this.params.logger.warn({ err: failure }, "Watch connection lost, reconnecting");
    try {
      const connection = await this.params.reopen();
      if (this.controller.signal.aborted) {
        connection.close();
        return false;
      }
      this.connection.close();
      this.connection = connection;
      return true;
    } catch (error) {
      this.params.logger.warn({ err: error }, "Watch reconnect failed");
      return false;
    }
  }
}
