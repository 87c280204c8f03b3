/**
 * Structured logging and tracing integration.
 *
 * Provides a console logger with a fixed line format and log-level parsing.
 */
import { Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function renderMessage(message: unknown): string {
  const parts = Array.isArray(message) ? message : [message];
  return parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
}

/** `[HH:MM:SS.mmm] LEVEL message` on stdout. */
export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  console.log(`[${ts}] ${lvl} ${renderMessage(message)}`);
});

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}
