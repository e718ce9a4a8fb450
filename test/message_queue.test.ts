// test/message_queue.test.ts

import { describe, it, expect } from "vitest";
import { ConnectionClosedError, MessageQueue, QueueFullError } from "../src";

const owner = { host: "127.0.0.1", port: 9000 };

describe("MessageQueue", () => {
  it("should return items in push order", async () => {
    const queue = new MessageQueue<string>(owner, 10);
    queue.push("a");
    queue.push("b");
    queue.push("c");

    expect(queue.size).toBe(3);
    expect(await queue.shift()).toBe("a");
    expect(await queue.shift()).toBe("b");
    expect(await queue.shift()).toBe("c");
    expect(queue.size).toBe(0);
  });

  it("should wake a waiting receiver on push", async () => {
    const queue = new MessageQueue<string>(owner, 10);
    const next = queue.shift();
    queue.push("hello");

    expect(await next).toBe("hello");
    expect(queue.size).toBe(0);
  });

  it("should fail fast with QueueFullError at capacity", () => {
    const queue = new MessageQueue<string>(owner, 2);
    queue.push("a");
    queue.push("b");

    expect(() => queue.push("c")).toThrow(QueueFullError);
    expect(queue.size).toBe(2);
  });

  it("should not count items handed straight to a receiver", async () => {
    const queue = new MessageQueue<string>(owner, 1);
    const next = queue.shift();
    queue.push("a");
    queue.push("b");

    expect(() => queue.push("c")).toThrow(QueueFullError);
    expect(await next).toBe("a");
    expect(await queue.shift()).toBe("b");
  });

  it("should resolve pending receivers with undefined on close", async () => {
    const queue = new MessageQueue<string>(owner, 4);
    const first = queue.shift();
    const second = queue.shift();

    queue.close();

    expect(await first).toBeUndefined();
    expect(await second).toBeUndefined();
    expect(await queue.shift()).toBeUndefined();
  });

  it("should drop buffered items and reject pushes after close", async () => {
    const queue = new MessageQueue<string>(owner, 4);
    queue.push("a");
    queue.close();
    queue.close();

    expect(queue.closed).toBe(true);
    expect(queue.size).toBe(0);
    expect(await queue.shift()).toBeUndefined();
    expect(() => queue.push("b")).toThrow(ConnectionClosedError);
  });
});
