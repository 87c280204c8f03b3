/**
 * AutodiffConfig validation and merging.
 */
import { ConfigError } from "./errors.js";
import { defaultAutodiffConfig, type AutodiffConfig, type LogLevelName } from "./types.js";

const LOG_LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

function isLogLevelName(v: unknown): v is LogLevelName {
  return typeof v === "string" && LOG_LEVELS.some((l) => l === v);
}

/**
 * Merge a partial, untrusted record over the defaults, rejecting unknown keys
 * and ill-typed values.
 */
export function resolveAutodiffConfig(raw: Record<string, unknown>, base: AutodiffConfig = defaultAutodiffConfig): AutodiffConfig {
  for (const key of Object.keys(raw)) {
    if (!(key in defaultAutodiffConfig)) {
      throw new ConfigError({ message: `Unknown config key "${key}"` });
    }
  }

  let logLevel = base.logLevel;
  if (raw.logLevel !== undefined) {
    if (!isLogLevelName(raw.logLevel)) {
      throw new ConfigError({
        message: `logLevel must be one of ${LOG_LEVELS.join(", ")}, got ${JSON.stringify(raw.logLevel)}`,
      });
    }
    logLevel = raw.logLevel;
  }

  let traceBackward = base.traceBackward;
  if (raw.traceBackward !== undefined) {
    if (typeof raw.traceBackward !== "boolean") {
      throw new ConfigError({
        message: `traceBackward must be a boolean, got ${JSON.stringify(raw.traceBackward)}`,
      });
    }
    traceBackward = raw.traceBackward;
  }

  return { logLevel, traceBackward };
}
