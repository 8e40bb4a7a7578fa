import pino from "pino";

/**
 * Creates the structured JSON logger used for the whole run.
 *
 * - Level as a string label, ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaults to `info`
 * - Writes to stdout so the invoking scheduler captures the run log
 *
 * @param level - Optional override for the log level
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    name: "daily-news-digest",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
