import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { SyncReport } from "./pipeline/types";

export type SyncScheduler = {
  /** Stops future ticks and resolves once a running cycle has finished. */
  readonly stop: () => Promise<void>;
};

export type SchedulerOptions = {
  readonly schedule: string;
  readonly runOnStart: boolean;
};

/**
 * Runs `runCycle` on the cron schedule. A tick that arrives while the
 * previous cycle is still running is skipped. Errors escaping a cycle are
 * logged and the schedule carries on.
 */
export function createSyncScheduler(
  runCycle: () => Promise<SyncReport>,
  options: SchedulerOptions,
  logger: Logger,
): SyncScheduler {
  let running: Promise<void> | null = null;

  const tick = (): Promise<void> => {
    if (running) {
      logger.warn("previous sync cycle still running, skipping tick");
      return running;
    }

    running = runCycle()
      .then((report) => {
        if (report.status !== "completed") {
          logger.warn(
            { status: report.status, error: report.error },
            "sync cycle did not complete",
          );
        }
      })
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "sync cycle failed unexpectedly");
      })
      .finally(() => {
        running = null;
      });

    return running;
  };

  const task: ScheduledTask = cron.schedule(options.schedule, tick);

  if (options.runOnStart) {
    void tick();
  }

  return {
    stop: async () => {
      task.stop();
      if (running) await running;
    },
  };
}
