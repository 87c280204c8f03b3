/**
 * History: how a variable came to be.
 */
import type { Context } from "./context.js";
import type { Variable } from "./variable.js";

/** One operand's share of an upstream derivative. */
export type Contribution = readonly [Variable<unknown>, unknown];

/** The slice of an operation that backward needs. */
export interface Differentiable<T> {
  readonly name: string;
  chainRule(ctx: Context, inputs: readonly unknown[], dOutput: T): Contribution[];
}

export class History<T> {
  readonly operation: Differentiable<T>;
  readonly ctx: Context;
  /** The operands exactly as passed to apply: variables and raw constants. */
  readonly inputs: readonly unknown[];

  constructor(operation: Differentiable<T>, ctx: Context, inputs: readonly unknown[]) {
    this.operation = operation;
    this.ctx = ctx;
    this.inputs = inputs;
  }

  backpropStep(dOutput: T): Contribution[] {
    return this.operation.chainRule(this.ctx, this.inputs, dOutput);
  }
}
