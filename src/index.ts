import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadFeedGroups, loadSettings } from "./config";
import type { Settings } from "./config";
import { createDatabase } from "./db";
import { createSqliteHistoryStore } from "./history";
import { createNtfySender, runSyncCycle } from "./pipeline";
import { createSyncScheduler } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("feed-relay starting");

  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.level = settings.logLevel;
  logger.info(
    {
      ntfyUrl: settings.ntfyUrl,
      configDir: settings.configDir,
      schedule: settings.syncSchedule,
      timeZone: settings.timeZone,
      authenticated: settings.ntfyToken !== undefined,
    },
    "settings loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(settings.dbPath));
  logger.info({ dbPath: settings.dbPath }, "history database ready");

  const store = createSqliteHistoryStore(db);
  const send = createNtfySender({
    baseUrl: settings.ntfyUrl,
    token: settings.ntfyToken,
    userAgent: settings.userAgent,
    timeoutMs: settings.requestTimeoutMs,
  });
  const abortController = new AbortController();
  const configDir = resolve(settings.configDir);

  const scheduler = createSyncScheduler(
    async () => {
      // Re-read every cycle so edits to the group files apply without a restart.
      const groups = loadFeedGroups(configDir, logger);
      return runSyncCycle(groups, {
        store,
        send,
        options: settings,
        logger,
        signal: abortController.signal,
      });
    },
    { schedule: settings.syncSchedule, runOnStart: settings.runOnStart },
    logger,
  );
  logger.info({ schedule: settings.syncSchedule }, "sync scheduler started");

  registerShutdownHandlers({
    schedulers: [scheduler],
    closeDb,
    logger,
    abortController,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
