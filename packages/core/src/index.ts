export {
  type PayloadKind,
  type KindsOf,
  type AutodiffConfig,
  type LogLevelName,
  describeValue,
  defaultAutodiffConfig,
} from "./types.js";
export {
  TypeMismatchError,
  ContractViolationError,
  ArityMismatchError,
  AutogradError,
  ConfigError,
  isEngineError,
  type ContractViolationReason,
  type EngineError,
} from "./errors.js";
export { type IdAllocator, AutodiffConfigService } from "./interfaces.js";
export { CounterIdAllocator, globalIds } from "./ids.js";
export { resolveAutodiffConfig } from "./config.js";
