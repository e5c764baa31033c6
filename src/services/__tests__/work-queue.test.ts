import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CoalescingQueue, ExponentialBackoff } from "../work-queue";

describe("ExponentialBackoff", () => {
  it("doubles the delay per failure up to the maximum", () => {
    let backoff = new ExponentialBackoff<string>({ baseDelay: 5, maxDelay: 15 });

    expect([backoff.when("key"), backoff.when("key"), backoff.when("key"), backoff.when("key")]).toEqual([5, 10, 15, 15]);
    expect(backoff.retries("key")).toBe(4);
  });

  it("starts over after forget", () => {
    let backoff = new ExponentialBackoff<string>({ baseDelay: 5, maxDelay: 1000 });
    backoff.when("key");
    backoff.when("key");

    backoff.forget("key");

    expect(backoff.when("key")).toBe(5);
  });
});

describe("CoalescingQueue", () => {
  let queue: CoalescingQueue<string>;

  beforeEach(() => {
    queue = new CoalescingQueue(new ExponentialBackoff<string>({ baseDelay: 5, maxDelay: 1000 }));
  });

  afterEach(() => {
    queue.shutDown();
    vi.useRealTimers();
  });

  it("keeps one pending item per key", async () => {
    queue.add("key");
    queue.add("key");
    queue.add("other");

    expect(queue.length).toBe(2);
    expect(await queue.get()).toBe("key");
    expect(await queue.get()).toBe("other");
  });

  it("holds back a key added while it is processed until it is done", async () => {
    queue.add("key");
    let key = await queue.get();

    queue.add("key");
    queue.add("key");
    expect(queue.length).toBe(0);

    queue.done("key");
    expect(queue.length).toBe(1);
    expect(key).toBe("key");
  });

  it("drops a processed key that was not added again", async () => {
    queue.add("key");
    await queue.get();

    queue.done("key");

    expect(queue.length).toBe(0);
  });

  it("hands a key to a waiting consumer", async () => {
    let next = queue.get();

    queue.add("key");

    expect(await next).toBe("key");
    expect(queue.length).toBe(0);
  });

  it("adds rate limited keys after the backoff delay", async () => {
    vi.useFakeTimers();

    queue.addRateLimited("key");
    queue.addRateLimited("key");
    expect(queue.retries("key")).toBe(2);

    vi.advanceTimersByTime(4);
    expect(queue.length).toBe(0);

    vi.advanceTimersByTime(1);
    expect(queue.length).toBe(1);

    vi.advanceTimersByTime(5);
    expect(queue.length).toBe(1);
  });

  it("resets the backoff on forget", () => {
    queue.addRateLimited("key");

    queue.forget("key");

    expect(queue.retries("key")).toBe(0);
  });

  it("releases waiting consumers and pending timers on shut down", async () => {
    vi.useFakeTimers();
    let next = queue.get();
    queue.addRateLimited("key");

    queue.shutDown();

    expect(await next).toBeUndefined();
    expect(await queue.get()).toBeUndefined();
    expect(vi.getTimerCount()).toBe(0);
    queue.add("key");
    expect(queue.length).toBe(0);
  });
});
