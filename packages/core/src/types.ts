/**
 * Core types for the revgrad system.
 */

// ── Payload kinds ──────────────────────────────────────────────────────────

/**
 * Capability interface for one concrete payload type (scalar, tensor, ...).
 *
 * The engine never does arithmetic itself; every zero, seed and sum it needs
 * goes through the kind of the variable involved.
 */
export interface PayloadKind<T> {
  readonly name: string;
  is(value: unknown): value is T;
  /** Additive identity shaped like `like`. */
  zero(like: T): T;
  /** Multiplicative identity shaped like `like`; the default backward seed. */
  ones(like: T): T;
  add(a: T, b: T): T;
}

/** One kind per operand position of an operation. */
export type KindsOf<Args extends readonly unknown[]> = {
  readonly [K in keyof Args]: PayloadKind<Args[K]>;
};

/** Short runtime description of a value, for error messages. */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return `array(${value.length})`;
  if (ArrayBuffer.isView(value)) return value.constructor.name;
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

// ── Config ─────────────────────────────────────────────────────────────────
export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface AutodiffConfig {
  readonly logLevel: LogLevelName;
  /** Log one debug line per node processed by backwardEffect. */
  readonly traceBackward: boolean;
}

export const defaultAutodiffConfig: AutodiffConfig = {
  logLevel: "info",
  traceBackward: false,
};
