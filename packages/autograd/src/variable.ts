/**
 * Variable: one vertex of the computation graph.
 *
 * A variable wraps an immutable payload, an optional History describing the
 * operation that produced it, and a derivative accumulator. A variable with
 * no history is a leaf; only leaves receive derivatives during backward.
 */
import {
  ContractViolationError,
  globalIds,
  type IdAllocator,
  type PayloadKind,
} from "@revgrad/core";
import type { History } from "./history.js";
import { backpropagate } from "./backprop.js";

export interface VariableOptions<T> {
  readonly history?: History<T> | null;
  readonly name?: string;
  readonly requiresGrad?: boolean;
  /** Defaults to the process-wide allocator. */
  readonly ids?: IdAllocator;
}

export class Variable<T> {
  readonly id: number;
  readonly kind: PayloadKind<T>;
  readonly value: T;
  readonly history: History<T> | null;
  name: string;
  /** Marks a leaf as grad-tracked: operations on it record history. */
  requiresGrad: boolean;
  /** Number of times this variable has been consumed as an operand. */
  used = 0;
  private _derivative: T | null = null;

  constructor(kind: PayloadKind<T>, value: T, options: VariableOptions<T> = {}) {
    this.id = (options.ids ?? globalIds).next();
    this.kind = kind;
    this.value = value;
    this.history = options.history ?? null;
    this.name = options.name ?? `Variable${this.id}`;
    this.requiresGrad = options.requiresGrad ?? false;
  }

  get derivative(): T | null {
    return this._derivative;
  }

  /** Alias for `derivative`. */
  get grad(): T | null {
    return this._derivative;
  }

  isLeaf(): boolean {
    return this.history === null;
  }

  /** A leaf nobody asked gradients for. Never enters a backward pass. */
  isConstant(): boolean {
    return this.history === null && !this.requiresGrad;
  }

  requiresGrad_(flag = true): this {
    this.requiresGrad = flag;
    return this;
  }

  /**
   * Add `delta` to the derivative accumulated on this variable.
   * Only leaves accumulate; the first contribution starts from zero.
   */
  accumulateDerivative(delta: T): void {
    if (!this.isLeaf()) {
      throw new ContractViolationError({
        reason: "NonLeafAccumulation",
        message: `Only leaf variables accumulate derivatives; ${this.name} was produced by ${this.history?.operation.name}`,
      });
    }
    const current = this._derivative ?? this.zero();
    this._derivative = this.kind.add(current, delta);
  }

  zeroDerivative_(): void {
    this._derivative = this.zero();
  }

  /** Alias for `zeroDerivative_`. */
  zeroGrad_(): void {
    this.zeroDerivative_();
  }

  /**
   * Hook applied to every derivative headed for this variable, before it is
   * accumulated. Kinds that broadcast override it to reduce a gradient back
   * to this variable's shape.
   */
  expand(delta: T): T {
    return delta;
  }

  zero(): T {
    return this.kind.zero(this.value);
  }

  /**
   * Backpropagate from this variable into every reachable leaf.
   * @param seed - starting derivative, `kind.ones(value)` when omitted
   */
  backward(seed?: T): void {
    backpropagate(this, seed ?? this.kind.ones(this.value));
  }

  toString(): string {
    return `Variable(name=${this.name}, value=${String(this.value)}, derivative=${String(this._derivative)})`;
  }
}

export function isVariable(value: unknown): value is Variable<unknown> {
  return value instanceof Variable;
}
