/**
 * Effect layers for dependency injection.
 */
import { Effect, Layer, Logger } from "effect";
import { AutodiffConfigService, ConfigError, type AutodiffConfig } from "@revgrad/core";
import { loadAutodiffConfig } from "./config.js";
import { parseLogLevel, prettyLogger } from "./logging.js";

// ── Config Layer ───────────────────────────────────────────────────────────

export const ConfigFrom = (config: AutodiffConfig) =>
  Layer.succeed(AutodiffConfigService, config);

export const ConfigLive = (path?: string, env: Record<string, string | undefined> = process.env) =>
  Layer.effect(
    AutodiffConfigService,
    Effect.tryPromise({
      try: () => loadAutodiffConfig(path, env),
      catch: (cause) =>
        cause instanceof ConfigError ? cause : new ConfigError({ message: String(cause), cause }),
    }),
  );

// ── Logger Layer ───────────────────────────────────────────────────────────

/** Replace the default logger with the pretty one, filtered at the configured level. */
export const LoggerFrom = (config: AutodiffConfig) =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(parseLogLevel(config.logLevel)),
  );

/** Config plus a logger honouring it. */
export const RuntimeFrom = (config: AutodiffConfig) =>
  Layer.merge(ConfigFrom(config), LoggerFrom(config));
