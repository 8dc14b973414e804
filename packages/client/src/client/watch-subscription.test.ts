import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { JsonWireCodec } from "../shared/json-codec.js";
import { errorResponse, stringValue, valueResponse, type Response } from "../shared/wire.js";
import { startFakeDiceServer, type FakeDiceServer } from "../test-utils/fake-dice-server.js";
import { createMockLogger } from "../test-utils/mock-logger.js";
import { DiceClient } from "./client.js";
import { withCodec, withLogger } from "./client-options.js";

function event(value: string) {
  return valueResponse({ kind: "str", value });
}

describe("watch subscription", () => {
  let server: FakeDiceServer;
  let client: DiceClient;

  beforeEach(async () => {
    server = await startFakeDiceServer();
    client = await DiceClient.connect(server.host, server.port, withLogger(createMockLogger()));
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  test("opens a second channel with the same identity", async () => {
    await client.openWatch();

    expect(server.handshakes).toEqual([
      { identity: client.id, channel: "command", accepted: true },
      { identity: client.id, channel: "watch", accepted: true },
    ]);
  });

  test("delivers pushed events in order", async () => {
    const watch = await client.openWatch();
    const [peer] = server.connectionsFor("watch");
    peer.push(event("E1"));
    peer.push(event("E2"));
    peer.push(event("E3"));

    expect(await watch.events.next()).toEqual({ value: event("E1"), done: false });
    expect(await watch.events.next()).toEqual({ value: event("E2"), done: false });
    expect(await watch.events.next()).toEqual({ value: event("E3"), done: false });
  });

  test("returns the running subscription to repeated and concurrent calls", async () => {
    const [first, second] = await Promise.all([client.openWatch(), client.openWatch()]);
    const third = await client.openWatch();

    expect(second).toBe(first);
    expect(third).toBe(first);
    expect(server.connectionsFor("watch")).toHaveLength(1);
  });

  test("keeps commands working while the watch is open", async () => {
    await client.openWatch();
    expect(stringValue(await client.fireString("PING"))).toBe("PONG");
  });

  test("queues a terminal error when the channel cannot be reopened", async () => {
    const watch = await client.openWatch();
    const [peer] = server.connectionsFor("watch");
    peer.push(event("E1"));
    expect(await watch.events.next()).toEqual({ value: event("E1"), done: false });

    server.rejectHandshakes("ERR not allowed");
    peer.end();

    expect(await watch.events.next()).toEqual({
      value: errorResponse("Watch error: Connection closed by peer"),
      done: false,
    });
    expect(await watch.events.next()).toEqual({ value: undefined, done: true });
    expect(watch.signal.aborted).toBe(false);
  });

  test("delivers every pushed event before the terminal error", async () => {
    const watch = await client.openWatch();
    const [peer] = server.connectionsFor("watch");
    server.rejectHandshakes("ERR not allowed");
    peer.push(event("E1"));
    peer.push(event("E2"));
    peer.push(event("E3"));
    peer.end();

    const seen: Response[] = [];
    for await (const entry of watch.events) {
      seen.push(entry);
    }

    expect(seen).toEqual([
      event("E1"),
      event("E2"),
      event("E3"),
      errorResponse("Watch error: Connection closed by peer"),
    ]);
  });

  test("opens a fresh subscription after the previous one failed", async () => {
    const failed = await client.openWatch();
    server.rejectHandshakes("ERR not allowed");
    server.connectionsFor("watch")[0].end();
    await vi.waitFor(() => expect(failed.events.isEnded).toBe(true));

    server.rejectHandshakes(null);
    const fresh = await client.openWatch();

    expect(fresh).not.toBe(failed);
    const live = () =>
      server.connectionsFor("watch").filter((connection) => !connection.disconnected);
    await vi.waitFor(() => expect(live()).toHaveLength(1));
    live()[0].push(event("again"));
    expect(await fresh.events.next()).toEqual({ value: event("again"), done: false });
  });

  test("reconnects once and keeps delivering events", async () => {
    const watch = await client.openWatch();
    server.connectionsFor("watch")[0].end();

    await vi.waitFor(() => expect(server.connectionsFor("watch")).toHaveLength(2));
    server.connectionsFor("watch")[1].push(event("E4"));

    expect(await watch.events.next()).toEqual({ value: event("E4"), done: false });
    expect(server.handshakes.filter((handshake) => handshake.channel === "watch")).toEqual([
      { identity: client.id, channel: "watch", accepted: true },
      { identity: client.id, channel: "watch", accepted: true },
    ]);
  });

  test("gives up when the reopened channel fails before any event", async () => {
    const watch = await client.openWatch();
    server.connectionsFor("watch")[0].end();
    await vi.waitFor(() => expect(server.connectionsFor("watch")).toHaveLength(2));
    server.connectionsFor("watch")[1].end();

    expect(await watch.events.next()).toEqual({
      value: errorResponse("Watch error: Connection closed by peer"),
      done: false,
    });
    expect(await watch.events.next()).toEqual({ value: undefined, done: true });
    expect(server.connectionsFor("watch")).toHaveLength(2);
  });

  test("stop aborts the signal and ends the queue", async () => {
    const watch = await client.openWatch();
    await watch.stop();

    expect(watch.signal.aborted).toBe(true);
    expect(await watch.events.next()).toEqual({ value: undefined, done: true });
  });

  test("closing the client stops the watch", async () => {
    const watch = await client.openWatch();
    await client.close();

    expect(watch.signal.aborted).toBe(true);
    expect(watch.events.isEnded).toBe(true);
  });
});

describe("watch subscription over the JSON codec", () => {
  test("carries commands, events and attributes", async () => {
    const codec = new JsonWireCodec();
    const server = await startFakeDiceServer({ codec });
    const client = await DiceClient.connect(
      server.host,
      server.port,
      withCodec(codec),
      withLogger(createMockLogger())
    );

    try {
      expect(stringValue(await client.fireString("SET k1 v1"))).toBe("OK");
      expect(stringValue(await client.fireString("GET k1"))).toBe("v1");

      const watch = await client.openWatch();
      const pushed = valueResponse(
        { kind: "str", value: "v2" },
        { fingerprint: 42, key: "k1" }
      );
      server.connectionsFor("watch")[0].push(pushed);
      expect(await watch.events.next()).toEqual({ value: pushed, done: false });
    } finally {
      await client.close();
      await server.close();
    }
  });
});
