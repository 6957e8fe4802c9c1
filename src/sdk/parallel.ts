/**
 * parallel(): concurrent execution with built-in rate limiting.
 *
 * Runs N promise factories concurrently while spacing out launches. The
 * defaults (5 in flight, 100 ms apart) cap launches at about 600 per minute;
 * Asana answers bursts above its plan's limit with 429 and Retry-After.
 *
 * @example
 * const results = await parallel(
 *   projects.map((p) => () => countProjectTasks(client, p.gid)),
 *   { concurrency: 5 },
 * );
 */

import { setTimeout as sleep } from "node:timers/promises";

export type ParallelOpts = {
  /**
   * Maximum simultaneous in-flight promises.
   * Default: 5 (conservative for Asana API).
   */
  readonly concurrency?: number;
  /**
   * Minimum delay between launching each promise (ms).
   * Default: 100ms.
   */
  readonly delayMs?: number;
  /** Called after each factory settles, with the number settled so far. */
  readonly onSettled?: (settled: number, total: number) => void;
  /** Stops launching once aborted; factories already running still settle. */
  readonly signal?: AbortSignal;
};

export type ParallelResult<T> =
  | { readonly ok: true; readonly value: T; readonly index: number }
  | { readonly ok: false; readonly error: unknown; readonly index: number };

/**
 * Runs an array of promise factories with bounded concurrency and optional backpressure.
 *
 * Unlike Promise.all, this:
 *  1. Limits simultaneous in-flight promises to `concurrency`
 *  2. Adds `delayMs` between launching new tasks (rate-limit buffer)
 *  3. Never throws; returns ParallelResult<T>[] in input order
 *  4. Stops launching when `signal` aborts; factories never started come
 *     back failed with the signal's reason
 */
export async function parallel<T>(
  factories: readonly (() => Promise<T>)[],
  opts: ParallelOpts = {},
): Promise<ParallelResult<T>[]> {
  const concurrency = Math.max(1, opts.concurrency ?? 5);
  const delayMs = opts.delayMs ?? 100;

  const results: ParallelResult<T>[] = new Array(factories.length);
  let nextIndex = 0;
  let inFlight = 0;
  let settled = 0;

  async function runNext(): Promise<void> {
    if (nextIndex >= factories.length) return;
    const index = nextIndex++;
    inFlight++;

    const factory = factories[index];
    if (!factory) { inFlight--; return; }

    try {
      const value = await factory();
      results[index] = { ok: true, value, index };
    } catch (error) {
      results[index] = { ok: false, error, index };
    } finally {
      inFlight--;
      settled++;
      opts.onSettled?.(settled, factories.length);
    }
  }

  const queue: Promise<void>[] = [];

  const stopped = () => opts.signal?.aborted === true;

  for (let i = 0; i < factories.length && !stopped(); i += 1) {
    while (inFlight >= concurrency && !stopped()) {
      await sleep(10);
    }
    if (stopped()) break;
    queue.push(runNext());
    if (delayMs > 0 && i < factories.length - 1) await sleep(delayMs);
  }

  await Promise.all(queue);

  for (let index = nextIndex; index < factories.length; index += 1) {
    results[index] = { ok: false, error: opts.signal?.reason, index };
  }

  return results;
}
