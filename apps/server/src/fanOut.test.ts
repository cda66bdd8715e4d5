import { describe, expect, it } from "vitest";
import { fanOut } from "./fanOut.js";

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(new Error("cancelled"));
      },
      { once: true }
    );
  });
}

describe("fanOut", () => {
  it("places results by index regardless of completion order", async () => {
    const delays = [30, 5, 20, 0, 10];
    const completed: number[] = [];
    const results = await fanOut(
      delays,
      async (ms, index, signal) => {
        await delay(ms, signal);
        completed.push(index);
        return `slot-${index}`;
      },
      { concurrency: 5 }
    );

    expect(results).toEqual(["slot-0", "slot-1", "slot-2", "slot-3", "slot-4"]);
    expect(completed).not.toEqual([0, 1, 2, 3, 4]);
  });

  it("never exceeds the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;
    await fanOut(
      Array.from({ length: 12 }, (_, index) => index),
      async (_item, _index, signal) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await delay(2, signal);
        inFlight -= 1;
      },
      { concurrency: 3 }
    );

    expect(peak).toBe(3);
  });

  it("returns an empty array for no items", async () => {
    await expect(fanOut([], async () => 1, { concurrency: 4 })).resolves.toEqual([]);
  });

  it("rejects with the first failure and cancels siblings", async () => {
    const cancelled: number[] = [];
    const started: number[] = [];
    const run = fanOut(
      [0, 1, 2, 3, 4, 5],
      async (item, index, signal) => {
        started.push(index);
        if (item === 1) {
          await delay(5, signal);
          throw new Error("segment 1 failed");
        }
        try {
          await delay(200, signal);
        } catch (error) {
          cancelled.push(index);
          throw error;
        }
        return item;
      },
      { concurrency: 3 }
    );

    await expect(run).rejects.toThrow("segment 1 failed");
    expect(cancelled.sort()).toEqual([0, 2]);
    expect(started.sort()).toEqual([0, 1, 2]);
  });

  it("stops and rejects with the reason when the caller aborts", async () => {
    const controller = new AbortController();
    const run = fanOut(
      [0, 1, 2],
      async (_item, _index, signal) => {
        await delay(100, signal);
      },
      { concurrency: 2, signal: controller.signal }
    );
    controller.abort(new Error("client went away"));

    await expect(run).rejects.toThrow("client went away");
  });

  it("rejects immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("too late"));
    let calls = 0;
    await expect(
      fanOut(
        [1],
        async () => {
          calls += 1;
        },
        { concurrency: 1, signal: controller.signal }
      )
    ).rejects.toThrow("too late");
    expect(calls).toBe(0);
  });

  it("rejects a non-positive concurrency", async () => {
    await expect(fanOut([1], async () => 1, { concurrency: 0 })).rejects.toThrow(
      "concurrency must be a positive integer"
    );
  });
});
