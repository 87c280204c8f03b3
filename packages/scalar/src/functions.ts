/**
 * Scalar operations. Each is a stateless singleton; `apply` is the only way
 * to call one on variables.
 */
import type { KindsOf, PayloadKind } from "@revgrad/core";
import { Operation, type Context, type Gradients, type History } from "@revgrad/autograd";
import { scalarKind } from "./kind.js";
import { Scalar } from "./scalar.js";

const EPS = 1e-6;

type Unary = readonly [number];
type Binary = readonly [number, number];

const UNARY: KindsOf<Unary> & readonly PayloadKind<unknown>[] = [scalarKind];
const BINARY: KindsOf<Binary> & readonly PayloadKind<unknown>[] = [scalarKind, scalarKind];

export function sigmoidValue(x: number): number {
  return x >= 0 ? 1 / (1 + Math.exp(-x)) : Math.exp(x) / (1 + Math.exp(x));
}

export abstract class ScalarFunction<
  Args extends readonly number[],
  Saved extends readonly unknown[] = readonly unknown[],
> extends Operation<number, Args, Saved, Scalar> {
  readonly payload = scalarKind;

  variable(raw: number, history: History<number> | null): Scalar {
    return new Scalar(raw, { history });
  }
}

// ── Binary ────────────────────────────────────────────────────────────────

class AddFn extends ScalarFunction<Binary> {
  readonly name = "add";
  readonly inputs = BINARY;
  forward(_ctx: Context, a: number, b: number): number {
    return a + b;
  }
  backward(_ctx: Context, d: number): Gradients<Binary> {
    return [d, d];
  }
}

class MulFn extends ScalarFunction<Binary, readonly [number, number]> {
  readonly name = "mul";
  readonly inputs = BINARY;
  forward(ctx: Context<readonly [number, number]>, a: number, b: number): number {
    ctx.saveForBackward(a, b);
    return a * b;
  }
  backward(ctx: Context<readonly [number, number]>, d: number): Gradients<Binary> {
    const [a, b] = ctx.savedValues;
    return [b * d, a * d];
  }
}

class LTFn extends ScalarFunction<Binary> {
  readonly name = "lt";
  readonly inputs = BINARY;
  forward(_ctx: Context, a: number, b: number): number {
    return a < b ? 1 : 0;
  }
  backward(): Gradients<Binary> {
    return [0, 0];
  }
}

class EQFn extends ScalarFunction<Binary> {
  readonly name = "eq";
  readonly inputs = BINARY;
  forward(_ctx: Context, a: number, b: number): number {
    return a === b ? 1 : 0;
  }
  backward(): Gradients<Binary> {
    return [0, 0];
  }
}

// ── Unary ─────────────────────────────────────────────────────────────────

class NegFn extends ScalarFunction<Unary> {
  readonly name = "neg";
  readonly inputs = UNARY;
  forward(_ctx: Context, a: number): number {
    return -a;
  }
  backward(_ctx: Context, d: number): Gradients<Unary> {
    return [-d];
  }
}

class InvFn extends ScalarFunction<Unary, readonly [number]> {
  readonly name = "inv";
  readonly inputs = UNARY;
  forward(ctx: Context<readonly [number]>, a: number): number {
    ctx.saveForBackward(a);
    return 1 / a;
  }
  backward(ctx: Context<readonly [number]>, d: number): Gradients<Unary> {
    const [a] = ctx.savedValues;
    return [-d / (a * a)];
  }
}

class LogFn extends ScalarFunction<Unary, readonly [number]> {
  readonly name = "log";
  readonly inputs = UNARY;
  forward(ctx: Context<readonly [number]>, a: number): number {
    ctx.saveForBackward(a);
    return Math.log(a + EPS);
  }
  backward(ctx: Context<readonly [number]>, d: number): Gradients<Unary> {
    const [a] = ctx.savedValues;
    return [d / (a + EPS)];
  }
}

class ExpFn extends ScalarFunction<Unary, readonly [number]> {
  readonly name = "exp";
  readonly inputs = UNARY;
  forward(ctx: Context<readonly [number]>, a: number): number {
    const out = Math.exp(a);
    ctx.saveForBackward(out);
    return out;
  }
  backward(ctx: Context<readonly [number]>, d: number): Gradients<Unary> {
    const [out] = ctx.savedValues;
    return [d * out];
  }
}

class SigmoidFn extends ScalarFunction<Unary, readonly [number]> {
  readonly name = "sigmoid";
  readonly inputs = UNARY;
  forward(ctx: Context<readonly [number]>, a: number): number {
    const out = sigmoidValue(a);
    ctx.saveForBackward(out);
    return out;
  }
  backward(ctx: Context<readonly [number]>, d: number): Gradients<Unary> {
    const [s] = ctx.savedValues;
    return [d * s * (1 - s)];
  }
}

class ReLUFn extends ScalarFunction<Unary, readonly [number]> {
  readonly name = "relu";
  readonly inputs = UNARY;
  forward(ctx: Context<readonly [number]>, a: number): number {
    ctx.saveForBackward(a);
    return a > 0 ? a : 0;
  }
  backward(ctx: Context<readonly [number]>, d: number): Gradients<Unary> {
    const [a] = ctx.savedValues;
    return [a > 0 ? d : 0];
  }
}

class SquareFn extends ScalarFunction<Unary, readonly [number]> {
  readonly name = "square";
  readonly inputs = UNARY;
  forward(ctx: Context<readonly [number]>, a: number): number {
    ctx.saveForBackward(a);
    return a * a;
  }
  backward(ctx: Context<readonly [number]>, d: number): Gradients<Unary> {
    const [a] = ctx.savedValues;
    return [2 * a * d];
  }
}

export const Add = new AddFn();
export const Mul = new MulFn();
export const LT = new LTFn();
export const EQ = new EQFn();
export const Neg = new NegFn();
export const Inv = new InvFn();
export const Log = new LogFn();
export const Exp = new ExpFn();
export const Sigmoid = new SigmoidFn();
export const ReLU = new ReLUFn();
export const Square = new SquareFn();
