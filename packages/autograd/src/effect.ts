/**
 * Effect-facing entry points: typed failures, logging and a span around the
 * synchronous engine.
 */
import { Effect } from "effect";
import {
  AutodiffConfigService,
  AutogradError,
  isEngineError,
  type EngineError,
} from "@revgrad/core";
import { backpropagate, type BackwardStep } from "./backprop.js";
import type { Variable } from "./variable.js";

export interface BackwardReport {
  /** Nodes processed, leaves included. */
  readonly steps: number;
  /** Names of the leaves that received a derivative, in processing order. */
  readonly leaves: readonly string[];
}

export function backwardEffect<T>(
  root: Variable<T>,
  seed?: T,
): Effect.Effect<BackwardReport, EngineError | AutogradError, AutodiffConfigService> {
  return Effect.gen(function* () {
    const config = yield* AutodiffConfigService;
    const steps: BackwardStep[] = [];

    yield* Effect.try({
      try: () =>
        backpropagate(root, seed ?? root.kind.ones(root.value), {
          onStep: (step) => steps.push(step),
        }),
      catch: (cause) =>
        isEngineError(cause)
          ? cause
          : new AutogradError({ message: `backward from ${root.name} failed: ${String(cause)}`, cause }),
    });

    if (config.traceBackward) {
      for (const step of steps) {
        const kind = step.leaf ? "leaf" : step.node.history?.operation.name;
        yield* Effect.logDebug(`${step.node.name} (${kind}) <- ${String(step.derivative)}`);
      }
    }

    const leaves = steps.filter((s) => s.leaf).map((s) => s.node.name);
    yield* Effect.logInfo(`backward: ${steps.length} node(s), ${leaves.length} leaf(s)`);
    return { steps: steps.length, leaves };
  }).pipe(
    Effect.annotateLogs("root", root.name),
    Effect.withSpan("autograd.backward"),
  );
}
