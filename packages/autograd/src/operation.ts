/**
 * Operation: the contract concrete differentiable functions implement.
 *
 * An operation is stateless. `apply` runs forward on raw payloads and, if any
 * operand needs gradients, records a History so that `chainRule` can later
 * turn an upstream derivative into per-operand contributions.
 */
import {
  ArityMismatchError,
  TypeMismatchError,
  describeValue,
  type KindsOf,
  type PayloadKind,
} from "@revgrad/core";
import { Context } from "./context.js";
import { History, type Contribution, type Differentiable } from "./history.js";
import { isVariable, type Variable } from "./variable.js";

/** Each operand position takes the raw payload or a variable wrapping it. */
export type OperandsOf<Args extends readonly unknown[]> = {
  readonly [K in keyof Args]: Args[K] | Variable<Args[K]>;
};

/** One derivative per operand, in operand order. */
export type Gradients<Args extends readonly unknown[]> = {
  readonly [K in keyof Args]: Args[K];
};

/** Not a variable, or a leaf nobody asked gradients for. */
export function isConstant(value: unknown): boolean {
  return !isVariable(value) || value.isConstant();
}

function conforms<Args extends readonly unknown[]>(
  raw: readonly unknown[],
  kinds: readonly PayloadKind<unknown>[],
): raw is Args {
  return raw.length === kinds.length && raw.every((v, i) => kinds[i].is(v));
}

export abstract class Operation<
  T,
  Args extends readonly unknown[],
  Saved extends readonly unknown[] = readonly unknown[],
  V extends Variable<T> = Variable<T>,
> implements Differentiable<T> {
  abstract readonly name: string;
  /** Kind of the forward result. */
  abstract readonly payload: PayloadKind<T>;
  /** Kind of each operand, in order. */
  abstract readonly inputs: KindsOf<Args> & readonly PayloadKind<unknown>[];

  abstract forward(ctx: Context<Saved>, ...inputs: Args): T;

  /** Must return exactly one derivative per operand of the matching forward call. */
  abstract backward(ctx: Context<Saved>, dOutput: T): Gradients<Args>;

  /** Wrap a forward result in the variable subtype of this payload. */
  abstract variable(raw: T, history: History<T> | null): V;

  apply(...operands: OperandsOf<Args>): V {
    const raw: unknown[] = [];
    const recorded: unknown[] = [];
    let needGrad = false;
    for (const operand of operands) {
      recorded.push(operand);
      if (isVariable(operand)) {
        if (!operand.isConstant()) needGrad = true;
        operand.used += 1;
        raw.push(operand.value);
      } else {
        raw.push(operand);
      }
    }

    const args: readonly unknown[] = raw;
    if (!conforms<Args>(args, this.inputs)) {
      throw this.inputMismatch(args);
    }

    const ctx = new Context<Saved>(!needGrad);
    const out = this.forward(ctx, ...args);
    if (!this.payload.is(out)) {
      throw new TypeMismatchError({
        expected: this.payload.name,
        received: describeValue(out),
        message: `${this.name}.forward returned ${describeValue(out)}, expected ${this.payload.name}`,
      });
    }

    const history = needGrad ? new History<T>(this, ctx, recorded) : null;
    return this.variable(out, history);
  }

  /**
   * Run backward for one recorded invocation and pair each non-constant
   * input with its (expanded) share of `dOutput`.
   */
  chainRule(ctx: Context<Saved>, inputs: readonly unknown[], dOutput: T): Contribution[] {
    const grads = this.backward(ctx, dOutput);
    if (grads.length !== inputs.length) {
      throw new ArityMismatchError({
        expected: inputs.length,
        received: grads.length,
        message: `${this.name}.backward returned ${grads.length} derivative(s) for ${inputs.length} input(s)`,
      });
    }

    const out: Contribution[] = [];
    for (let i = 0; i < inputs.length; i++) {
      const input = inputs[i];
      if (!isVariable(input) || input.isConstant()) continue;
      out.push([input, input.expand(grads[i])]);
    }
    return out;
  }

  private inputMismatch(raw: readonly unknown[]): TypeMismatchError {
    const kinds: readonly PayloadKind<unknown>[] = this.inputs;
    if (raw.length !== kinds.length) {
      return new TypeMismatchError({
        expected: `${kinds.length} operand(s)`,
        received: `${raw.length} operand(s)`,
        message: `${this.name} takes ${kinds.length} operand(s), got ${raw.length}`,
      });
    }
    const position = raw.findIndex((v, i) => !kinds[i].is(v));
    return new TypeMismatchError({
      position,
      expected: kinds[position].name,
      received: describeValue(raw[position]),
      message: `${this.name} operand ${position}: expected ${kinds[position].name}, got ${describeValue(raw[position])}`,
    });
  }
}
