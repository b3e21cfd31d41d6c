import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "../src/utils/concurrency.js";
import { KeyedMutex } from "../src/utils/keyedMutex.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("mapWithConcurrency", () => {
  it("keeps input order and caps work in flight", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(ms);
      inFlight -= 1;
      return `${index}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:5", "2:20", "3:1", "4:10"]);
    expect(peak).toBe(2);
  });

  it("handles empty input and limits below one", async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
    await expect(mapWithConcurrency([1, 2], 0, async (value) => value * 2)).resolves.toEqual([2, 4]);
  });

  it("runs every item one at a time when the limit is not a finite number", async () => {
    const seen: number[] = [];
    const results = await mapWithConcurrency([1, 2, 3], Number.NaN, async (value) => {
      seen.push(value);
      return value + 1;
    });

    expect(results).toEqual([2, 3, 4]);
    expect(seen).toEqual([1, 2, 3]);
    await expect(mapWithConcurrency([5], Number.POSITIVE_INFINITY, async (value) => value)).resolves.toEqual([5]);
  });
});

describe("KeyedMutex", () => {
  it("runs sections for one key in call order", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive("a", async () => {
        events.push("first:start");
        await delay(10);
        events.push("first:end");
      }),
      mutex.runExclusive("a", async () => {
        events.push("second:start");
        events.push("second:end");
      }),
    ]);

    expect(events).toEqual(["first:start", "first:end", "second:start", "second:end"]);
    expect(mutex.isLocked("a")).toBe(false);
  });

  it("lets different keys overlap", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive("a", async () => {
        events.push("a:start");
        await delay(10);
        events.push("a:end");
      }),
      mutex.runExclusive("b", async () => {
        events.push("b:start");
        events.push("b:end");
      }),
    ]);

    expect(events.indexOf("b:end")).toBeLessThan(events.indexOf("a:end"));
  });

  it("releases the key when a section throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(mutex.runExclusive("a", async () => "next")).resolves.toBe("next");
  });
});
