/**
 * Load AutodiffConfig from a JSON file and the environment, merged over the
 * defaults. Environment wins over the file.
 */
import { readFile } from "node:fs/promises";
import {
  ConfigError,
  defaultAutodiffConfig,
  resolveAutodiffConfig,
  type AutodiffConfig,
} from "@revgrad/core";

export const ENV_LOG_LEVEL = "REVGRAD_LOG_LEVEL";
export const ENV_TRACE_BACKWARD = "REVGRAD_TRACE_BACKWARD";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Config overrides present in `env`. */
export function configFromEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const level = env[ENV_LOG_LEVEL];
  if (level !== undefined && level !== "") out.logLevel = level.toLowerCase();

  const trace = env[ENV_TRACE_BACKWARD];
  if (trace !== undefined && trace !== "") {
    if (trace === "1" || trace === "true") out.traceBackward = true;
    else if (trace === "0" || trace === "false") out.traceBackward = false;
    else throw new ConfigError({ message: `${ENV_TRACE_BACKWARD} must be true/false/1/0, got "${trace}"` });
  }
  return out;
}

export async function loadAutodiffConfig(
  path?: string,
  env: Record<string, string | undefined> = process.env,
): Promise<AutodiffConfig> {
  let config = defaultAutodiffConfig;

  if (path) {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (cause) {
      throw new ConfigError({ message: `Failed to read autodiff config at ${path}`, cause });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (cause) {
      throw new ConfigError({ message: `Failed to parse autodiff config at ${path}: invalid JSON`, cause });
    }
    if (!isRecord(parsed)) {
      throw new ConfigError({ message: `Autodiff config at ${path} must be a JSON object` });
    }
    config = resolveAutodiffConfig(parsed, config);
  }

  return resolveAutodiffConfig(configFromEnv(env), config);
}
