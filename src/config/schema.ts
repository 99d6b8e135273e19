import cron from "node-cron";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

// Accepts 1-5 as a number or a numeric string.
const priorityValue = z.coerce
  .number()
  .pipe(
    z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]),
  );

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export const TOPIC_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export const feedSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  priority: priorityValue.default(3),
  icon: z.string().url().optional(),
  tags: z.array(z.string()).optional(),
});

export const feedGroupFileSchema = z.array(feedSourceSchema);

export const settingsSchema = z
  .object({
    CONFIG_DIR: z.string().min(1).default("configs"),
    NTFY_URL: z.string().url().default("https://ntfy.sh"),
    NTFY_TOKEN: z.string().optional(),
    DB_PATH: z.string().min(1).default("data/rss_history.db"),
    SYNC_SCHEDULE: z
      .string()
      .refine((value) => cron.validate(value), "invalid cron expression")
      .default("*/10 * * * *"),
    RUN_ON_START: booleanFlag.default("true"),
    USER_AGENT: z.string().min(1).default("FeedRelay/1.0 (RSS notification relay)"),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
    MAX_ENTRIES_PER_FEED: z.coerce.number().int().positive().default(3),
    DESCRIPTION_MAX_LENGTH: z.coerce.number().int().min(20).default(500),
    FLOOD_MIN_DELAY_MS: z.coerce.number().int().nonnegative().default(0),
    FLOOD_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(10000),
    FETCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
    MARKDOWN: booleanFlag.default("true"),
    TZ: z
      .string()
      .refine(isTimeZone, "unknown time zone")
      .default("UTC"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
  })
  .refine((env) => env.FLOOD_MAX_DELAY_MS >= env.FLOOD_MIN_DELAY_MS, {
    message: "must be greater than or equal to FLOOD_MIN_DELAY_MS",
    path: ["FLOOD_MAX_DELAY_MS"],
  })
  .transform((env) => ({
    configDir: env.CONFIG_DIR,
    ntfyUrl: env.NTFY_URL,
    ntfyToken: env.NTFY_TOKEN || undefined,
    dbPath: env.DB_PATH,
    syncSchedule: env.SYNC_SCHEDULE,
    runOnStart: env.RUN_ON_START,
    userAgent: env.USER_AGENT,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    maxEntriesPerFeed: env.MAX_ENTRIES_PER_FEED,
    descriptionMaxLength: env.DESCRIPTION_MAX_LENGTH,
    floodMinDelayMs: env.FLOOD_MIN_DELAY_MS,
    floodMaxDelayMs: env.FLOOD_MAX_DELAY_MS,
    fetchConcurrency: env.FETCH_CONCURRENCY,
    markdown: env.MARKDOWN,
    timeZone: env.TZ,
    logLevel: env.LOG_LEVEL,
  }));

export type Settings = z.output<typeof settingsSchema>;
