import pino from "pino";

/**
 * Creates the pino logger shared by every briefing stage.
 *
 * - Level rendered as its label rather than the numeric value
 * - ISO 8601 timestamps
 * - Level taken from `LOG_LEVEL` when no override is given, `info` otherwise
 * - Plain JSON on stdout; the scheduler or container decides where it goes
 *
 * @param level - Explicit level, used by tests and one-off runs
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    name: "daily-briefing",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
