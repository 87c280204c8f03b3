/**
 * Scalar: a Variable over plain numbers, with operator-style methods.
 */
import { Variable, type VariableOptions } from "@revgrad/autograd";
import { scalarKind } from "./kind.js";
import { Add, EQ, Exp, Inv, LT, Log, Mul, Neg, ReLU, Sigmoid, Square } from "./functions.js";

export type ScalarLike = Scalar | number;

export class Scalar extends Variable<number> {
  constructor(value: number, options: VariableOptions<number> = {}) {
    super(scalarKind, value, options);
  }

  /** A grad-tracked leaf. */
  static param(value: number, name?: string): Scalar {
    return new Scalar(value, { name, requiresGrad: true });
  }

  add(b: ScalarLike): Scalar {
    return Add.apply(this, b);
  }

  sub(b: ScalarLike): Scalar {
    return Add.apply(this, Neg.apply(b));
  }

  mul(b: ScalarLike): Scalar {
    return Mul.apply(this, b);
  }

  div(b: ScalarLike): Scalar {
    return Mul.apply(this, Inv.apply(b));
  }

  neg(): Scalar {
    return Neg.apply(this);
  }

  lt(b: ScalarLike): Scalar {
    return LT.apply(this, b);
  }

  gt(b: ScalarLike): Scalar {
    return LT.apply(b, this);
  }

  eq(b: ScalarLike): Scalar {
    return EQ.apply(this, b);
  }

  square(): Scalar {
    return Square.apply(this);
  }

  log(): Scalar {
    return Log.apply(this);
  }

  exp(): Scalar {
    return Exp.apply(this);
  }

  sigmoid(): Scalar {
    return Sigmoid.apply(this);
  }

  relu(): Scalar {
    return ReLU.apply(this);
  }
}
