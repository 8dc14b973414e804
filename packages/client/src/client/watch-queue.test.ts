import { describe, expect, it } from "vitest";
import { WatchQueue } from "./watch-queue.js";

describe("WatchQueue", () => {
  it("delivers pushed items in order", async () => {
    const queue = new WatchQueue<string>();
    queue.push("a");
    queue.push("b");
    expect(queue.size).toBe(2);
    expect(await queue.next()).toEqual({ value: "a", done: false });
    expect(await queue.next()).toEqual({ value: "b", done: false });
  });

  it("wakes a waiting consumer", async () => {
    const queue = new WatchQueue<number>();
    const pending = queue.next();
    queue.push(1);
    expect(await pending).toEqual({ value: 1, done: false });
    expect(queue.size).toBe(0);
  });

  it("lets buffered items drain after end", async () => {
    const queue = new WatchQueue<string>();
    queue.push("last");
    queue.end();
    queue.push("dropped");

    const seen: string[] = [];
    for await (const item of queue) {
      seen.push(item);
    }
    expect(seen).toEqual(["last"]);
    expect(queue.isEnded).toBe(true);
  });

  it("finishes waiting consumers on end", async () => {
    const queue = new WatchQueue<string>();
    const pending = queue.next();
    queue.end();
    expect(await pending).toEqual({ value: undefined, done: true });
  });

  it("drain takes everything buffered", () => {
    const queue = new WatchQueue<string>();
    queue.push("x");
    queue.push("y");
    expect(queue.drain()).toEqual(["x", "y"]);
    expect(queue.drain()).toEqual([]);
  });
});
