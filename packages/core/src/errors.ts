/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class TypeMismatchError extends Data.TaggedError("TypeMismatchError")<{
  readonly message: string;
  readonly expected: string;
  readonly received: string;
  /** Operand index when the mismatch is on an input; absent for forward results. */
  readonly position?: number;
}> {}

export type ContractViolationReason =
  | "UnsavedContext"
  | "GradientOnFrozenContext"
  | "NonLeafAccumulation";

export class ContractViolationError extends Data.TaggedError("ContractViolationError")<{
  readonly message: string;
  readonly reason: ContractViolationReason;
}> {}

export class ArityMismatchError extends Data.TaggedError("ArityMismatchError")<{
  readonly message: string;
  readonly expected: number;
  readonly received: number;
}> {}

export class AutogradError extends Data.TaggedError("AutogradError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Everything the engine can fail with. */
export type EngineError = TypeMismatchError | ContractViolationError | ArityMismatchError;

export function isEngineError(e: unknown): e is EngineError {
  return (
    e instanceof TypeMismatchError ||
    e instanceof ContractViolationError ||
    e instanceof ArityMismatchError
  );
}
