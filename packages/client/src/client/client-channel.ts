import { HandshakeFailedError, toTransportError } from "../shared/errors.js";
import { createHandshakeCommand, type ChannelKind } from "../shared/wire.js";
import type { ClientConfig } from "./client-options.js";
import { Connection } from "./client-transport.js";

/**
 * Dials the configured endpoint and tags the new socket with the client's
 * identity and channel kind. Used for the first connect and every reconnect.
 */
export async function openChannel(config: ClientConfig, kind: ChannelKind): Promise<Connection> {
  const connection = await Connection.dial({
    host: config.host,
    port: config.port,
    connectTimeoutMs: config.connectTimeoutMs,
    maxMessageSize: config.maxMessageSize,
  });

  let frame: Uint8Array;
  try {
    await connection.send(config.codec.encodeCommand(createHandshakeCommand(config.id, kind)));
    frame = await connection.receive(config.ioTimeoutMs);
  } catch (error) {
    connection.close();
    const failure = toTransportError(error);
    throw new HandshakeFailedError(
      `Could not complete the ${kind} handshake: ${failure.message}`,
      { cause: failure }
    );
  }

  const response = config.codec.decodeResponse(frame);
  if (response.error !== null) {
    connection.close();
    throw new HandshakeFailedError(`Could not complete the ${kind} handshake: ${response.error}`);
  }

  config.logger.debug(
    {
      endpoint: connection.endpoint,
      channel: kind,
      clientId: config.id,
      codec: config.codec.name,
    },
    "Channel handshake completed"
  );
  return connection;
}
