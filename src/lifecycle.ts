// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Represents an object with a stop method for graceful shutdown.
 */
export type Stoppable = {
  readonly stop: () => void | Promise<void>;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly closeDb: () => void;
  readonly logger: Logger;
  /** Aborted first, so a cycle waiting on the flood gate ends promptly. */
  readonly abortController?: AbortController;
};

/**
 * Registers SIGTERM and SIGINT signal handlers for graceful shutdown.
 *
 * - Guard against double-shutdown (re-entrant signal delivery)
 * - Cancels pending pacing waits, then stops schedulers and waits for the
 *   running cycle before closing the DB it writes to
 * - Wraps each cleanup step in try/catch to ensure all steps run
 * - Calls `process.exit(0)` after cleanup
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    deps.abortController?.abort();

    for (const scheduler of deps.schedulers) {
      try {
        await scheduler.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping scheduler");
      }
    }

    try {
      deps.closeDb();
      deps.logger.info("database connection closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error closing database");
    }

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}
