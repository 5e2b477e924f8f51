export { PolicyEngine } from "./engine.js";
export type { PolicyEngineOptions } from "./engine.js";
export {
  ConditionRegistry,
  BUILTIN_CONDITION_TYPES,
  isBuiltinCondition,
} from "./conditions.js";
export type { ConditionPlugin, ConditionContext, ConditionResult } from "./conditions.js";
export {
  DEFAULT_THRESHOLDS,
  DEFAULT_BREAKPOINTS,
  createThresholdTable,
  lookupThreshold,
  tierForValue,
  tierRank,
  maxTier,
} from "./risk.js";
export { checkOrdering } from "./ordering.js";
export type { OrderingCheck } from "./ordering.js";
