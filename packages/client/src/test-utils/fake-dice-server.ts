import net from "node:net";
import { DecodeError } from "../shared/errors.js";
import { FrameDecoder, encodeFrame } from "../shared/framing.js";
import { TaggedBinaryCodec, type WireCodec } from "../shared/wire-codec.js";
import {
  HANDSHAKE_COMMAND,
  errorResponse,
  valueResponse,
  type ChannelKind,
  type Command,
  type Response,
} from "../shared/wire.js";

export type FakeConnection = {
  readonly id: number;
  channel: ChannelKind | null;
  identity: string | null;
  readonly commands: Command[];
  readonly errors: Error[];
  /** Set once the socket has fully closed on both sides. */
  disconnected: boolean;
  push: (response: Response) => void;
  /** Writes bytes as they are, without framing or encoding. */
  writeRaw: (bytes: Uint8Array) => void;
  /** Half-closes from the server side; the client sees a clean end of stream. */
  end: () => void;
  destroy: () => void;
};

export type FakeHandshake = {
  identity: string;
  channel: ChannelKind;
  accepted: boolean;
};

/** `null` means "never reply"; `undefined` falls through to the built-in commands. */
export type FakeReply = Response | null | undefined;

export type FakeCommandHandler = (
  command: Command,
  connection: FakeConnection
) => FakeReply | Promise<FakeReply>;

export type FakeDiceServerOptions = {
  codec?: WireCodec;
  handler?: FakeCommandHandler;
};

export type FakeDiceServer = {
  host: string;
  port: number;
  endpoint: string;
  connections: FakeConnection[];
  handshakes: FakeHandshake[];
  /** Commands that arrived while an earlier one on the same connection was unanswered. */
  overlaps: Command[];
  store: Map<string, string>;
  setHandler: (handler: FakeCommandHandler | null) => void;
  rejectHandshakes: (error: string | null) => void;
  connectionsFor: (channel: ChannelKind) => FakeConnection[];
  close: () => Promise<void>;
};

function isChannelKind(value: string | undefined): value is ChannelKind {
  return value === "command" || value === "watch";
}

/**
 * In-process DiceDB stand-in on 127.0.0.1. Speaks the framing and a codec,
 * answers PING/ECHO/GET/SET/DEL from memory and lets tests script
 * everything else.
 */
export async function startFakeDiceServer(
  options: FakeDiceServerOptions = {}
): Promise<FakeDiceServer> {
  const codec = options.codec ?? new TaggedBinaryCodec();
  const connections: FakeConnection[] = [];
  const handshakes: FakeHandshake[] = [];
  const overlaps: Command[] = [];
  const store = new Map<string, string>();
  const sockets = new Set<net.Socket>();
  let handler: FakeCommandHandler | null = options.handler ?? null;
  let handshakeError: string | null = null;
  let nextId = 1;

  const builtin = (command: Command, connection: FakeConnection): Response => {
    const [first, second] = command.args;
    switch (command.cmd.toUpperCase()) {
      case HANDSHAKE_COMMAND: {
        if (first === undefined || !isChannelKind(second)) {
          return errorResponse("ERR invalid handshake");
        }
        const accepted = handshakeError === null;
        handshakes.push({ identity: first, channel: second, accepted });
        if (handshakeError !== null) {
          return errorResponse(handshakeError);
        }
        connection.identity = first;
        connection.channel = second;
        return valueResponse({ kind: "str", value: "OK" });
      }
      case "PING":
        return valueResponse({ kind: "str", value: first ?? "PONG" });
      case "ECHO":
        return valueResponse({ kind: "str", value: command.args.join(" ") });
      case "SET":
        if (first === undefined || second === undefined) {
          return errorResponse("ERR wrong number of arguments for 'SET' command");
        }
        store.set(first, second);
        return valueResponse({ kind: "str", value: "OK" });
      case "GET": {
        const value = first === undefined ? undefined : store.get(first);
        return valueResponse(value === undefined ? { kind: "nil" } : { kind: "str", value });
      }
      case "DEL": {
        let removed = 0;
        for (const key of command.args) {
          if (store.delete(key)) removed += 1;
        }
        return valueResponse({ kind: "int", value: removed });
      }
      default:
        return errorResponse(`ERR unknown command '${command.cmd}'`);
    }
  };

  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));

    const decoder = new FrameDecoder();
    let closed = false;
    let outstanding = 0;
    let processing: Promise<void> = Promise.resolve();

    const write = (response: Response) => {
      if (closed || socket.destroyed) return;
      socket.write(encodeFrame(codec.encodeResponse(response)));
    };

    const connection: FakeConnection = {
      id: nextId++,
      channel: null,
      identity: null,
      commands: [],
      errors: [],
      disconnected: false,
      push: write,
      writeRaw: (bytes) => {
        if (closed || socket.destroyed) return;
        socket.write(bytes);
      },
      end: () => {
        closed = true;
        socket.end();
      },
      destroy: () => {
        closed = true;
        socket.destroy();
      },
    };
    connections.push(connection);
    socket.on("close", () => {
      connection.disconnected = true;
    });
    socket.on("error", (error) => {
      connection.errors.push(error);
    });

    const handle = async (frame: Uint8Array) => {
      let command: Command;
      try {
        command = codec.decodeCommand(frame);
      } catch (error) {
        outstanding -= 1;
        const message = error instanceof DecodeError ? error.message : String(error);
        write(errorResponse(`ERR malformed command: ${message}`));
        return;
      }
      connection.commands.push(command);
      let reply: FakeReply;
      if (command.cmd === HANDSHAKE_COMMAND) {
        reply = builtin(command, connection);
      } else {
        reply = handler ? await handler(command, connection) : undefined;
        if (reply === undefined) {
          reply = builtin(command, connection);
        }
      }
      if (reply === null) {
        return;
      }
      outstanding -= 1;
      write(reply);
    };

    socket.on("data", (chunk: Buffer) => {
      if (closed) return;
      let frames: Uint8Array[];
      try {
        frames = decoder.push(chunk);
      } catch (error) {
        connection.errors.push(error instanceof Error ? error : new Error(String(error)));
        connection.destroy();
        return;
      }
      for (const frame of frames) {
        if (outstanding > 0) {
          try {
            overlaps.push(codec.decodeCommand(frame));
          } catch (error) {
            connection.errors.push(error instanceof Error ? error : new Error(String(error)));
          }
        }
        outstanding += 1;
        processing = processing
          .then(() => handle(frame))
          .catch((error: unknown) => {
            connection.errors.push(error instanceof Error ? error : new Error(String(error)));
          });
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    throw new Error("Failed to acquire port");
  }

  return {
    host: "127.0.0.1",
    port: address.port,
    endpoint: `127.0.0.1:${address.port}`,
    connections,
    handshakes,
    overlaps,
    store,
    setHandler: (next) => {
      handler = next;
    },
    rejectHandshakes: (error) => {
      handshakeError = error;
    },
    connectionsFor: (channel) => connections.filter((connection) => connection.channel === channel),
    close: async () => {
      for (const socket of sockets) {
        socket.destroy();
      }
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}
