/**
 * Unit tests for the keyed mutex and bounded parallel map
 *
 * In-process promises only; no timers beyond setImmediate
 */

import { describe, it, expect } from "vitest";
import { KeyedMutex, mapWithConcurrency } from "@/utils/concurrency";

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("should run work for the same key one at a time, in call order", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const first = mutex.runExclusive("pump", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = mutex.runExclusive("pump", async () => {
      events.push("second:start");
      return 2;
    });

    await flush();
    expect(events).toEqual(["first:start"]);
    expect(mutex.activeKeys).toBe(1);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second:start"]);
    expect(mutex.activeKeys).toBe(0);
  });

  it("should not order work for different keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const slow = mutex.runExclusive("pump", async () => {
      await gate.promise;
      events.push("pump");
    });
    const fast = mutex.runExclusive("valve", async () => {
      events.push("valve");
    });

    await fast;
    expect(events).toEqual(["valve"]);

    gate.resolve();
    await slow;
    expect(events).toEqual(["valve", "pump"]);
  });

  it("should release the key when a task throws", async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive("pump", async () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive("pump", () => "ran");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ran");
    expect(mutex.activeKeys).toBe(0);
  });
});

describe("mapWithConcurrency", () => {
  it("should keep input order", async () => {
    const results = await mapWithConcurrency([3, 1, 2], 2, async (n) => {
      for (let i = 0; i < n; i++) {
        await flush();
      }
      return n * 10;
    });
    expect(results).toEqual([30, 10, 20]);
  });

  it("should never exceed the concurrency limit", async () => {
    let active = 0;
    let maxActive = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await flush();
      active--;
    });

    expect(maxActive).toBe(2);
  });

  it("should reject with the first error and stop taking items", async () => {
    const seen: number[] = [];

    await expect(
      mapWithConcurrency([1, 2, 3], 1, async (n) => {
        seen.push(n);
        if (n === 2) {
          throw new Error("item 2 failed");
        }
        return n;
      }),
    ).rejects.toThrow("item 2 failed");
    expect(seen).toEqual([1, 2]);
  });

  it("should pass the item index", async () => {
    expect(
      await mapWithConcurrency(["a", "b"], 4, async (item, index) => `${index}:${item}`),
    ).toEqual(["0:a", "1:b"]);
  });

  it("should return an empty list for no items", async () => {
    expect(await mapWithConcurrency([], 3, async () => 1)).toEqual([]);
  });

  it("should reject a non-positive concurrency", async () => {
    await expect(mapWithConcurrency([1], 0, async (n) => n)).rejects.toThrow(
      "concurrency must be a positive integer",
    );
  });
});
