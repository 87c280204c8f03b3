/**
 * Per-invocation scratch space handed to an operation's forward and backward.
 */
import { ContractViolationError } from "@revgrad/core";

export class Context<S extends readonly unknown[] = readonly unknown[]> {
  /** True when no operand of this invocation needs gradients. */
  readonly noGrad: boolean;
  private _saved: S | null = null;

  constructor(noGrad = false) {
    this.noGrad = noGrad;
  }

  /** Store values for backward. Ignored under noGrad; a later save replaces an earlier one. */
  saveForBackward(...values: S): void {
    if (this.noGrad) return;
    this._saved = values;
  }

  get savedValues(): S {
    if (this.noGrad) {
      throw new ContractViolationError({
        reason: "GradientOnFrozenContext",
        message: "Saved values are not kept when no operand requires grad",
      });
    }
    if (this._saved === null) {
      throw new ContractViolationError({
        reason: "UnsavedContext",
        message: "Nothing was saved for backward; did forward forget saveForBackward?",
      });
    }
    return this._saved;
  }

  /** Alias for `savedValues`. */
  get savedTensors(): S {
    return this.savedValues;
  }
}
