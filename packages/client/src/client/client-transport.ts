import net from "node:net";
import {
  DialFailedError,
  TransportError,
  describeTransportError,
  toTransportError,
} from "../shared/errors.js";
import { FrameDecoder, encodeFrame } from "../shared/framing.js";

export type ConnectionOptions = {
  host: string;
  port: number;
  connectTimeoutMs: number;
  maxMessageSize: number;
};

type PendingReceive = {
  resolve: (frame: Uint8Array) => void;
  reject: (error: TransportError) => void;
  timeoutHandle: ReturnType<typeof setTimeout> | null;
};

/**
 * One framed stream socket. Frames that arrive while nobody is waiting are
 * buffered in order; the first failure is sticky and closes the socket.
 */
export class Connection {
  private readonly decoder: FrameDecoder;
  private readonly frames: Uint8Array[] = [];
  private failure: TransportError | null = null;
  private pending: PendingReceive | null = null;

  private constructor(
    private readonly socket: net.Socket,
    private readonly options: ConnectionOptions
  ) {
    this.decoder = new FrameDecoder(options.maxMessageSize);
    socket.on("data", (chunk: Buffer) => this.handleData(chunk));
    socket.on("end", () => {
      this.fail(new TransportError("closed", "Connection closed by peer"));
    });
    socket.on("error", (error) => {
      this.fail(toTransportError(error));
    });
    socket.on("close", () => {
      this.fail(new TransportError("closed", "Connection closed"));
    });
  }

  static dial(options: ConnectionOptions): Promise<Connection> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: options.host, port: options.port });

      const timeoutHandle = setTimeout(() => {
        socket.destroy();
        reject(
          new DialFailedError({
            host: options.host,
            port: options.port,
            reason: `timed out after ${options.connectTimeoutMs}ms`,
          })
        );
      }, options.connectTimeoutMs);

      const onError = (error: Error) => {
        clearTimeout(timeoutHandle);
        socket.destroy();
        reject(
          new DialFailedError({
            host: options.host,
            port: options.port,
            reason: describeTransportError(error),
            cause: error,
          })
        );
      };

      socket.once("error", onError);
      socket.once("connect", () => {
        clearTimeout(timeoutHandle);
        socket.off("error", onError);
        socket.setNoDelay(true);
        resolve(new Connection(socket, options));
      });
    });
  }

  get isOpen(): boolean {
    return this.failure === null;
  }

  get endpoint(): string {
    return `${this.options.host}:${this.options.port}`;
  }

  send(payload: Uint8Array): Promise<void> {
    if (this.failure) {
      return Promise.reject(new TransportError("closed", "Connection is closed"));
    }
    let frame: Uint8Array;
    try {
      frame = encodeFrame(payload, this.options.maxMessageSize);
    } catch (error) {
      return Promise.reject(toTransportError(error));
    }
    return new Promise((resolve, reject) => {
      this.socket.write(frame, (error) => {
        if (error) {
          const failure = toTransportError(error);
          this.fail(failure);
          reject(failure);
          return;
        }
        resolve();
      });
    });
  }

  /**
   * Resolves with the next frame. A timeout fails the whole connection: a
   * response arriving late would otherwise be read as the reply to the next
   * request.
   */
  receive(timeoutMs?: number): Promise<Uint8Array> {
    const frame = this.frames.shift();
    if (frame) {
      return Promise.resolve(frame);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.pending) {
      return Promise.reject(new TransportError("io", "Connection already has a pending receive"));
    }
    return new Promise((resolve, reject) => {
      const timeoutHandle =
        timeoutMs === undefined
          ? null
          : setTimeout(() => {
              this.fail(
                new TransportError("timeout", `Timed out waiting for response after ${timeoutMs}ms`)
              );
            }, timeoutMs);
      this.pending = { resolve, reject, timeoutHandle };
    });
  }

  close(): void {
    this.fail(new TransportError("closed", "Connection closed by client"));
  }

  private handleData(chunk: Buffer): void {
    if (this.failure) {
      return;
    }
    let decoded: Uint8Array[];
    try {
      decoded = this.decoder.push(chunk);
    } catch (error) {
      this.fail(toTransportError(error));
      return;
    }
    for (const frame of decoded) {
      const pending = this.pending;
      if (pending) {
        this.pending = null;
        if (pending.timeoutHandle) {
          clearTimeout(pending.timeoutHandle);
        }
        pending.resolve(frame);
      } else {
        this.frames.push(frame);
      }
    }
    if (this.decoder.failure) {
      this.fail(this.decoder.failure);
    }
  }

  private fail(error: TransportError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    const pending = this.pending;
    this.pending = null;
    if (pending) {
      if (pending.timeoutHandle) {
        clearTimeout(pending.timeoutHandle);
      }
      pending.reject(error);
    }
    if (!this.socket.destroyed) {
      this.socket.destroy();
    }
  }
}
