// pattern: Imperative Shell
import { readFileSync, readdirSync } from "node:fs";
import { extname, basename, join } from "node:path";
import type { Logger } from "pino";
import { parse } from "yaml";
import type { FeedGroup } from "../pipeline/types";
import { TOPIC_PATTERN, feedGroupFileSchema } from "./schema";

const GROUP_EXTENSIONS = new Set([".json", ".yaml", ".yml"]);

/**
 * Reads one feed-group file. JSON is valid YAML, so a single parser covers
 * both formats. The topic is the file name without its extension.
 */
export function loadFeedGroup(filePath: string): FeedGroup {
  const topic = basename(filePath, extname(filePath));
  if (!TOPIC_PATTERN.test(topic)) {
    throw new Error(
      `invalid topic name "${topic}" in ${filePath}: use letters, digits, "-" or "_" (max 64)`,
    );
  }

  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read feed group at ${filePath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse ${filePath}: ${message}`);
  }

  const result = feedGroupFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid feed group in ${filePath}:\n${issues}`);
  }

  return { topic, sources: result.data };
}

/**
 * Loads every feed-group file in `configDir`, in file name order. A file that
 * fails to load is logged and left out; the remaining groups still load.
 *
 * @throws Error when the directory itself cannot be read.
 */
export function loadFeedGroups(
  configDir: string,
  logger: Logger,
): Array<FeedGroup> {
  let files: Array<string>;
  try {
    files = readdirSync(configDir)
      .filter((name) => GROUP_EXTENSIONS.has(extname(name).toLowerCase()))
      .sort();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config directory ${configDir}: ${message}`);
  }

  const groups: Array<FeedGroup> = [];
  for (const file of files) {
    try {
      groups.push(loadFeedGroup(join(configDir, file)));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ file, error: message }, "feed group skipped");
    }
  }

  logger.info(
    {
      groupCount: groups.length,
      feedCount: groups.reduce((sum, group) => sum + group.sources.length, 0),
    },
    "feed groups loaded",
  );
  return groups;
}
