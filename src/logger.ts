import pino from "pino";
import type { DestinationStream } from "pino";

/**
 * Creates a configured pino logger instance for structured JSON output.
 *
 * - Returns log level as string label (not numeric) for readability
 * - ISO 8601 timestamps
 * - Level from the argument, then `LOG_LEVEL`, then `info`
 * - Writes to stdout unless a destination is given
 */
export function createLogger(
  level?: string,
  destination?: DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
