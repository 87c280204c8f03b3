/**
 * Minimal payload kinds and operations used to exercise the engine without
 * any concrete numeric package.
 */
import type { KindsOf, PayloadKind } from "@revgrad/core";
import { Operation, Variable, type Context, type Gradients, type History, type VariableOptions } from "@revgrad/autograd";

// ── Plain numbers ─────────────────────────────────────────────────────────

export const numberKind: PayloadKind<number> = {
  name: "number",
  is: (v: unknown): v is number => typeof v === "number",
  zero: () => 0,
  ones: () => 1,
  add: (a, b) => a + b,
};

export const integerKind: PayloadKind<number> = {
  ...numberKind,
  name: "integer",
  is: (v: unknown): v is number => Number.isInteger(v),
};

export function leaf(value: number, name?: string): Variable<number> {
  return new Variable(numberKind, value, { name, requiresGrad: true });
}

export function constant(value: number): Variable<number> {
  return new Variable(numberKind, value);
}

type One = readonly [number];
type Two = readonly [number, number];
const ONE: KindsOf<One> & readonly PayloadKind<unknown>[] = [numberKind];
const TWO: KindsOf<Two> & readonly PayloadKind<unknown>[] = [numberKind, numberKind];

abstract class NumberOp<Args extends readonly number[], Saved extends readonly unknown[] = readonly unknown[]>
  extends Operation<number, Args, Saved> {
  readonly payload: PayloadKind<number> = numberKind;

  variable(raw: number, history: History<number> | null): Variable<number> {
    return new Variable(numberKind, raw, { history });
  }
}

class SquareOp extends NumberOp<One, readonly [number]> {
  readonly name = "square";
  readonly inputs = ONE;
  /** Every context this op has been handed, newest last. */
  readonly contexts: Context<readonly [number]>[] = [];
  forward(ctx: Context<readonly [number]>, a: number): number {
    this.contexts.push(ctx);
    ctx.saveForBackward(a);
    return a * a;
  }
  backward(ctx: Context<readonly [number]>, d: number): Gradients<One> {
    const [a] = ctx.savedValues;
    return [2 * a * d];
  }
}

class DoubleOp extends NumberOp<One> {
  readonly name = "double";
  readonly inputs = ONE;
  forward(_ctx: Context, a: number): number {
    return 2 * a;
  }
  backward(_ctx: Context, d: number): Gradients<One> {
    return [2 * d];
  }
}

class AddOp extends NumberOp<Two> {
  readonly name = "add";
  readonly inputs = TWO;
  forward(_ctx: Context, a: number, b: number): number {
    return a + b;
  }
  backward(_ctx: Context, d: number): Gradients<Two> {
    return [d, d];
  }
}

class MulOp extends NumberOp<Two, readonly [number, number]> {
  readonly name = "mul";
  readonly inputs = TWO;
  forward(ctx: Context<readonly [number, number]>, a: number, b: number): number {
    ctx.saveForBackward(a, b);
    return a * b;
  }
  backward(ctx: Context<readonly [number, number]>, d: number): Gradients<Two> {
    const [a, b] = ctx.savedValues;
    return [b * d, a * d];
  }
}

/** Reads saved values it never stored. */
class ForgetfulOp extends NumberOp<One, readonly [number]> {
  readonly name = "forgetful";
  readonly inputs = ONE;
  forward(_ctx: Context<readonly [number]>, a: number): number {
    return a + 1;
  }
  backward(ctx: Context<readonly [number]>, d: number): Gradients<One> {
    const [a] = ctx.savedValues;
    return [a * d];
  }
}

/** Takes two operands but reports a single derivative. */
class ShortOp extends NumberOp<number[]> {
  readonly name = "short";
  readonly inputs = [numberKind, numberKind];
  forward(_ctx: Context, ...xs: number[]): number {
    return xs.reduce((s, x) => s + x, 0);
  }
  backward(_ctx: Context, d: number): Gradients<number[]> {
    return [d];
  }
}

/** Declares integer output but halves its operand. */
class HalveOp extends NumberOp<One> {
  readonly name = "halve";
  readonly inputs = [integerKind] as const;
  override readonly payload = integerKind;
  forward(_ctx: Context, a: number): number {
    return a / 2;
  }
  backward(_ctx: Context, d: number): Gradients<One> {
    return [d / 2];
  }
}

export const square = new SquareOp();
export const double = new DoubleOp();
export const add = new AddOp();
export const mul = new MulOp();
export const forgetful = new ForgetfulOp();
export const short = new ShortOp();
export const halve = new HalveOp();

// ── Vectors with length-1 broadcasting ────────────────────────────────────

export type Vec = readonly number[];

export const vecKind: PayloadKind<Vec> = {
  name: "vector",
  is: (v: unknown): v is Vec => Array.isArray(v) && v.every((x) => typeof x === "number"),
  zero: (like) => like.map(() => 0),
  ones: (like) => like.map(() => 1),
  add: (a, b) => a.map((x, i) => x + b[i]),
};

export class VecVariable extends Variable<Vec> {
  constructor(value: Vec, options: VariableOptions<Vec> = {}) {
    super(vecKind, value, options);
  }

  /** A broadcast length-1 vector gets the sum of the incoming gradient. */
  override expand(delta: Vec): Vec {
    if (this.value.length === 1 && delta.length !== 1) {
      return [delta.reduce((s, x) => s + x, 0)];
    }
    return delta;
  }
}

type VecPair = readonly [Vec, Vec];
type VecOne = readonly [Vec];

abstract class VecOp<Args extends readonly Vec[], Saved extends readonly unknown[] = readonly unknown[]>
  extends Operation<Vec, Args, Saved, VecVariable> {
  readonly payload = vecKind;

  variable(raw: Vec, history: History<Vec> | null): VecVariable {
    return new VecVariable(raw, { history });
  }
}

class BroadcastAddOp extends VecOp<VecPair> {
  readonly name = "broadcastAdd";
  readonly inputs: KindsOf<VecPair> & readonly PayloadKind<unknown>[] = [vecKind, vecKind];
  forward(_ctx: Context, a: Vec, b: Vec): Vec {
    const n = Math.max(a.length, b.length);
    return Array.from({ length: n }, (_, i) => a[a.length === 1 ? 0 : i] + b[b.length === 1 ? 0 : i]);
  }
  backward(_ctx: Context, d: Vec): Gradients<VecPair> {
    return [d, d];
  }
}

class SumOp extends VecOp<VecOne, readonly [number]> {
  readonly name = "sum";
  readonly inputs: KindsOf<VecOne> & readonly PayloadKind<unknown>[] = [vecKind];
  forward(ctx: Context<readonly [number]>, a: Vec): Vec {
    ctx.saveForBackward(a.length);
    return [a.reduce((s, x) => s + x, 0)];
  }
  backward(ctx: Context<readonly [number]>, d: Vec): Gradients<VecOne> {
    const [n] = ctx.savedValues;
    return [Array.from({ length: n }, () => d[0])];
  }
}

export const broadcastAdd = new BroadcastAddOp();
export const vsum = new SumOp();

/** The value `fn` throws; fails the test if it returns. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected a throw");
}
