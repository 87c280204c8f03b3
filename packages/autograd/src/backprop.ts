/**
 * Reverse-mode backpropagation.
 *
 * The order is computed once up front: every node comes before all of its
 * inputs, so by the time a node is processed each of its consumers has
 * already added its share into the pending map. Contributions are always
 * added, never assigned, which is what keeps shared sub-expressions right.
 */
import type { Variable } from "./variable.js";
import { isVariable } from "./variable.js";

export interface BackwardStep {
  readonly node: Variable<unknown>;
  /** Total upstream derivative the node was processed with. */
  readonly derivative: unknown;
  readonly leaf: boolean;
}

export interface BackpropOptions {
  /** Called once per processed node, in processing order. */
  readonly onStep?: (step: BackwardStep) => void;
}

/**
 * Non-constant nodes reachable from `root`, root first, each node ahead of
 * all of its inputs. Explicit stack, so deep graphs do not exhaust the call
 * stack.
 */
export function topologicalSort(root: Variable<unknown>): Variable<unknown>[] {
  const order: Variable<unknown>[] = [];
  if (root.isConstant()) return order;

  const seen = new Set<number>();
  const stack: { node: Variable<unknown>; done: boolean }[] = [{ node: root, done: false }];

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { node } = frame;
    if (frame.done) {
      order.push(node);
      continue;
    }
    if (seen.has(node.id)) continue;
    seen.add(node.id);
    stack.push({ node, done: true });

    const inputs = node.history?.inputs ?? [];
    // Reverse so the first operand is expanded first.
    for (let i = inputs.length - 1; i >= 0; i--) {
      const input = inputs[i];
      if (isVariable(input) && !input.isConstant() && !seen.has(input.id)) {
        stack.push({ node: input, done: false });
      }
    }
  }

  return order.reverse();
}

/**
 * Propagate `seed` from `root` back to every reachable leaf, adding the
 * result into each leaf's derivative.
 */
export function backpropagate<T>(root: Variable<T>, seed: T, options: BackpropOptions = {}): void {
  const order = topologicalSort(root);
  const pending = new Map<number, unknown>([[root.id, seed]]);

  for (const node of order) {
    if (!pending.has(node.id)) continue;
    const derivative = pending.get(node.id);
    const history = node.history;
    options.onStep?.({ node, derivative, leaf: history === null });

    if (history === null) {
      node.accumulateDerivative(derivative);
      continue;
    }

    for (const [input, contribution] of history.backpropStep(derivative)) {
      const prior = pending.has(input.id) ? pending.get(input.id) : input.zero();
      pending.set(input.id, input.kind.add(prior, contribution));
    }
  }
}
