import { describe, it, expect } from "vitest";
import { setTimeout as sleep } from "node:timers/promises";
import { parallel } from "../parallel.ts";

describe("parallel", () => {
  it("executes all factories and returns results in order", async () => {
    const results = await parallel(
      [
        () => Promise.resolve("a"),
        () => Promise.resolve("b"),
        () => Promise.resolve("c"),
      ],
      { delayMs: 0 },
    );
    expect(results).toHaveLength(3);
    expect(results[0]).toMatchObject({ ok: true, value: "a", index: 0 });
    expect(results[1]).toMatchObject({ ok: true, value: "b", index: 1 });
    expect(results[2]).toMatchObject({ ok: true, value: "c", index: 2 });
  });

  it("captures errors without throwing", async () => {
    const results = await parallel(
      [
        () => Promise.resolve("ok"),
        () => Promise.reject(new Error("boom")),
        () => Promise.resolve("also ok"),
      ],
      { delayMs: 0 },
    );
    expect(results[0]).toMatchObject({ ok: true, value: "ok" });
    expect(results[1]).toMatchObject({ ok: false });
    expect(results[2]).toMatchObject({ ok: true, value: "also ok" });
  });

  it("respects concurrency limit (does not exceed in-flight count)", async () => {
    let maxInFlight = 0;
    let inFlight = 0;

    const factories = Array.from({ length: 10 }, (_, i) => async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(10);
      inFlight--;
      return i;
    });

    await parallel(factories, { concurrency: 3, delayMs: 0 });
    expect(maxInFlight).toBeLessThanOrEqual(3);
  });

  it("reports every settled factory", async () => {
    const seen: [number, number][] = [];
    await parallel(
      [() => Promise.resolve(1), () => Promise.reject(new Error("x")), () => Promise.resolve(3)],
      { delayMs: 0, onSettled: (settled, total) => seen.push([settled, total]) },
    );
    expect(seen).toEqual([[1, 3], [2, 3], [3, 3]]);
  });

  it("stops launching once the signal aborts", async () => {
    const stop = new AbortController();
    const launched: number[] = [];
    const factories = Array.from({ length: 20 }, (_, i) => async () => {
      launched.push(i);
      if (i === 1) stop.abort(new Error("stopped"));
      return i;
    });

    const started = Date.now();
    const results = await parallel(factories, { concurrency: 1, delayMs: 50, signal: stop.signal });

    expect(launched).toEqual([0, 1]);
    expect(Date.now() - started).toBeLessThan(500);
    expect(results).toHaveLength(20);
    expect(results[1]).toMatchObject({ ok: true, value: 1 });
    expect(results[2]).toMatchObject({ ok: false, index: 2 });
    expect(results[19]).toMatchObject({ ok: false, index: 19 });
  });

  it("handles empty array", async () => {
    const results = await parallel([], { delayMs: 0 });
    expect(results).toHaveLength(0);
  });
});
