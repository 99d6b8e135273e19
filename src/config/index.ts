import { settingsSchema } from "./schema";
import type { Settings } from "./schema";

/**
 * Resolves settings from environment variables, applying defaults.
 *
 * @throws Error listing every invalid variable.
 */
export function loadSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Settings {
  const result = settingsSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid settings:\n${issues}`);
  }

  return result.data;
}

export { loadFeedGroup, loadFeedGroups } from "./feed-groups";
export type { Settings };
