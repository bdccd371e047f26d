import { backoffDelay, sleep } from "../backoff.js";
import { BoundedQueue } from "../BoundedQueue.js";

describe("backoffDelay", () => {
  test("doubles per attempt up to the cap", () => {
    const policy = { baseMs: 250, maxMs: 1500 };
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, policy))).toEqual([
      250, 500, 1000, 1500,
    ]);
  });
});

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("resolves true after the delay", async () => {
    vi.useFakeTimers();
    const done = sleep(100);
    await vi.advanceTimersByTimeAsync(100);
    await expect(done).resolves.toBe(true);
  });

  test("resolves false as soon as the signal aborts", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const done = sleep(10_000, controller.signal);
    controller.abort();
    await expect(done).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe("BoundedQueue", () => {
  test("evicts and returns the oldest item when full", () => {
    const queue = new BoundedQueue<number>(2);
    expect(queue.push(1)).toBeUndefined();
    expect(queue.push(2)).toBeUndefined();
    expect(queue.push(3)).toBe(1);
    expect(queue.shift()).toBe(2);
    expect(queue.shift()).toBe(3);
    expect(queue.shift()).toBeUndefined();
  });

  test("rejects a capacity below one", () => {
    expect(() => new BoundedQueue(0)).toThrow(RangeError);
  });
});
