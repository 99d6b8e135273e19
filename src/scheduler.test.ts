import { describe, it, expect, beforeEach, vi } from "vitest";
import pino from "pino";
import type { SyncReport } from "./pipeline/types";

const { schedule, stopTask } = vi.hoisted(() => ({
  schedule: vi.fn(),
  stopTask: vi.fn(),
}));

vi.mock("node-cron", () => ({ default: { schedule } }));

import { createSyncScheduler } from "./scheduler";

const logger = pino({ level: "silent" });

function makeReport(overrides?: Partial<SyncReport>): SyncReport {
  return {
    status: "completed",
    startedAt: new Date("2024-01-01T00:00:00Z"),
    finishedAt: new Date("2024-01-01T00:00:01Z"),
    error: null,
    groups: [],
    ...overrides,
  };
}

describe("createSyncScheduler", () => {
  let tick: (() => Promise<void>) | null;

  beforeEach(() => {
    vi.clearAllMocks();
    tick = null;
    schedule.mockImplementation((_expression: string, callback: () => Promise<void>) => {
      tick = callback;
      return { stop: stopTask };
    });
  });

  it("should register a cron task with the configured schedule", () => {
    createSyncScheduler(
      vi.fn().mockResolvedValue(makeReport()),
      { schedule: "*/5 * * * *", runOnStart: false },
      logger,
    );

    expect(schedule).toHaveBeenCalledWith("*/5 * * * *", expect.any(Function));
  });

  it("should run a cycle immediately when runOnStart is set", () => {
    const runCycle = vi.fn().mockResolvedValue(makeReport());

    createSyncScheduler(runCycle, { schedule: "*/5 * * * *", runOnStart: true }, logger);

    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it("should wait for the first tick when runOnStart is not set", async () => {
    const runCycle = vi.fn().mockResolvedValue(makeReport());

    createSyncScheduler(runCycle, { schedule: "*/5 * * * *", runOnStart: false }, logger);
    expect(runCycle).not.toHaveBeenCalled();

    await tick?.();
    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it("should skip a tick while the previous cycle is still running", async () => {
    let release: (report: SyncReport) => void = () => undefined;
    const runCycle = vi
      .fn()
      .mockImplementationOnce(
        () =>
          new Promise<SyncReport>((resolve) => {
            release = resolve;
          }),
      )
      .mockResolvedValue(makeReport());

    createSyncScheduler(runCycle, { schedule: "*/5 * * * *", runOnStart: false }, logger);

    const first = tick?.();
    const second = tick?.();
    expect(runCycle).toHaveBeenCalledTimes(1);

    release(makeReport());
    await first;
    await second;

    await tick?.();
    expect(runCycle).toHaveBeenCalledTimes(2);
  });

  it("should log and survive a cycle that rejects", async () => {
    const runCycle = vi
      .fn()
      .mockRejectedValueOnce(new Error("config directory missing"))
      .mockResolvedValue(makeReport());

    createSyncScheduler(runCycle, { schedule: "*/5 * * * *", runOnStart: false }, logger);

    await expect(tick?.()).resolves.toBeUndefined();
    await tick?.();
    expect(runCycle).toHaveBeenCalledTimes(2);
  });

  it("should stop the task and wait for the running cycle", async () => {
    let release: (report: SyncReport) => void = () => undefined;
    const runCycle = vi.fn(
      () =>
        new Promise<SyncReport>((resolve) => {
          release = resolve;
        }),
    );

    const scheduler = createSyncScheduler(
      runCycle,
      { schedule: "*/5 * * * *", runOnStart: true },
      logger,
    );

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });

    expect(stopTask).toHaveBeenCalledTimes(1);
    await Promise.resolve();
    expect(stopped).toBe(false);

    release(makeReport({ status: "cancelled" }));
    await stopping;
    expect(stopped).toBe(true);
  });
});
