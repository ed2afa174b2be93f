export { Generator, GeneratorExample, buildSystemPrompt } from "./generator.js";
export type { GeneratorOptions } from "./generator.js";
export { Decision, buildDecisionSchema } from "./decision.js";
export type { DecisionOptions } from "./decision.js";
export { Branch } from "./branch.js";
export type { BranchOptions } from "./branch.js";
export { Action, actionSchema } from "./action.js";
export type { ActionOptions } from "./action.js";
export { Concat, LogicalAnd, LogicalOr } from "./ops.js";
export type { AlgebraOpOptions } from "./ops.js";
