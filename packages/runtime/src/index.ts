export { ConfigFrom, ConfigLive, LoggerFrom, RuntimeFrom } from "./layers.js";
export { prettyLogger, parseLogLevel } from "./logging.js";
export { loadAutodiffConfig, configFromEnv, ENV_LOG_LEVEL, ENV_TRACE_BACKWARD } from "./config.js";
