export { Variable, isVariable, type VariableOptions } from "./variable.js";
export { Context } from "./context.js";
export { History, type Contribution, type Differentiable } from "./history.js";
export { Operation, isConstant, type OperandsOf, type Gradients } from "./operation.js";
export { topologicalSort, backpropagate, type BackwardStep, type BackpropOptions } from "./backprop.js";
export { backwardEffect, type BackwardReport } from "./effect.js";
