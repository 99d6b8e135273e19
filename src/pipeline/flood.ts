import { setTimeout as sleep } from "node:timers/promises";
import type { Priority } from "./types";

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 5;

export type FloodOptions = {
  /** Delay before a priority 5 notification. */
  readonly minDelayMs: number;
  /** Delay before a priority 1 notification. */
  readonly maxDelayMs: number;
};

export type Clock = {
  readonly now: () => number;
  readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => sleep(ms, undefined, { signal }),
};

/**
 * Spacing required before a notification of the given priority. Linear in
 * priority: 5 maps to `minDelayMs`, 1 maps to `maxDelayMs`.
 */
export function floodDelayMs(priority: number, options: FloodOptions): number {
  const clamped = Math.min(
    MAX_PRIORITY,
    Math.max(MIN_PRIORITY, Math.round(priority)),
  );
  const span = Math.max(0, options.maxDelayMs - options.minDelayMs);
  const steps = MAX_PRIORITY - MIN_PRIORITY;

  return options.minDelayMs + Math.round((span * (MAX_PRIORITY - clamped)) / steps);
}

export type FloodGate = {
  /**
   * Resolves once a notification of `priority` may go out. Returns the time
   * waited. Rejects with an AbortError if `signal` fires while waiting.
   */
  readonly wait: (priority: Priority, signal?: AbortSignal) => Promise<number>;
  /** Marks a dispatch as started; the next wait is measured from here. */
  readonly markDispatched: () => void;
};

/**
 * Paces one stream of dispatches. The first dispatch goes out immediately;
 * each later one waits until `previous + floodDelayMs(priority)`.
 */
export function createFloodGate(
  options: FloodOptions,
  clock: Clock = systemClock,
): FloodGate {
  let lastDispatchAt: number | null = null;

  return {
    wait: async (priority, signal) => {
      signal?.throwIfAborted();
      if (lastDispatchAt === null) return 0;

      const readyAt = lastDispatchAt + floodDelayMs(priority, options);
      const waitMs = readyAt - clock.now();
      if (waitMs <= 0) return 0;

      await clock.sleep(waitMs, signal);
      return waitMs;
    },
    markDispatched: () => {
      lastDispatchAt = clock.now();
    },
  };
}
