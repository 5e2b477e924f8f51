import type {
  BuiltinCondition,
  CandidateEvent,
  CausalEvent,
  Condition,
  CustomCondition,
  PolicyLimits,
  RiskTier,
} from "../types.js";

export interface ConditionContext {
  /** Prior events of the candidate's scope, in append order */
  chain: readonly CausalEvent[];
  candidate: CandidateEvent;
  limits: PolicyLimits;
}

export interface ConditionResult {
  passed: boolean;
  reason: string;
  /** Raise the decision's tier without failing it. Built-ins never set this. */
  escalate_to?: RiskTier;
}

/** Plugin for custom condition kinds. */
export interface ConditionPlugin {
  /** The condition `type` as used in policy files. */
  type: string;
  /** Must be pure: same chain, candidate and parameters give the same result. */
  evaluate: (condition: CustomCondition, ctx: ConditionContext) => ConditionResult;
}

export const BUILTIN_CONDITION_TYPES: ReadonlySet<string> = new Set([
  "MaxDailyOutflow",
  "MinTimeBetweenActions",
  "NoConcurrentRequests",
  "MinVerificationCount",
  "AddressAllowlist",
]);

export function isBuiltinCondition(condition: Condition): condition is BuiltinCondition {
  return BUILTIN_CONDITION_TYPES.has(condition.type);
}

/**
 * Single dispatch point for condition kinds. The engine only ever calls
 * `evaluate`; adding a kind means registering a plugin here.
 */
export class ConditionRegistry {
  private plugins = new Map<string, ConditionPlugin>();

  register(plugin: ConditionPlugin): void {
    if (BUILTIN_CONDITION_TYPES.has(plugin.type)) {
      throw new Error(`Cannot override built-in condition '${plugin.type}'`);
    }
    this.plugins.set(plugin.type, plugin);
  }

  has(type: string): boolean {
    return BUILTIN_CONDITION_TYPES.has(type) || this.plugins.has(type);
  }

  evaluate(condition: Condition, ctx: ConditionContext): ConditionResult {
    if (isBuiltinCondition(condition)) {
      return evaluateBuiltin(condition, ctx);
    }
    const plugin = this.plugins.get(condition.type);
    // Unknown kind fails closed
    if (!plugin) {
      return { passed: false, reason: `Unknown condition type '${condition.type}'` };
    }
    return plugin.evaluate(condition, ctx);
  }
}

function evaluateBuiltin(condition: BuiltinCondition, ctx: ConditionContext): ConditionResult {
  switch (condition.type) {
    case "MaxDailyOutflow":
      return maxDailyOutflow(condition.cap, ctx);
    case "MinTimeBetweenActions":
      return minTimeBetweenActions(condition.action_type, condition.min_seconds, ctx);
    case "NoConcurrentRequests":
      return noConcurrentRequests(condition.window_seconds, ctx);
    case "MinVerificationCount":
      return minVerificationCount(
        condition.threshold_amount,
        condition.action_type,
        condition.required_count,
        ctx
      );
    case "AddressAllowlist":
      return addressAllowlist(condition.allowed_prefixes, condition.action_types, ctx);
  }
}

const OUTFLOW_TYPE = "SignatureRequest";

function maxDailyOutflow(cap: number, { chain, candidate, limits }: ConditionContext): ConditionResult {
  const now = candidate.timestamp;
  const windowStart = now - limits.daily_outflow_window_s * 1000;

  let total = 0;
  for (const event of chain) {
    if (event.event_type !== OUTFLOW_TYPE) continue;
    // Half-open window (now - window, now]
    if (event.timestamp <= windowStart || event.timestamp > now) continue;
    total += event.value ?? limits.nominal_value;
  }
  if (candidate.event_type === OUTFLOW_TYPE) {
    total += candidate.value ?? limits.nominal_value;
  }

  if (total > cap) {
    return {
      passed: false,
      reason: `Outflow ${total} in the last ${limits.daily_outflow_window_s}s exceeds cap ${cap}`,
    };
  }
  return { passed: true, reason: `Outflow ${total} within cap ${cap}` };
}

function minTimeBetweenActions(
  actionType: string,
  minSeconds: number,
  { chain, candidate }: ConditionContext
): ConditionResult {
  if (candidate.event_type !== actionType) {
    return { passed: true, reason: `${candidate.event_type} is not spaced by this condition` };
  }
  let last: CausalEvent | undefined;
  for (let i = chain.length - 1; i >= 0; i--) {
    if (chain[i].event_type === actionType) {
      last = chain[i];
      break;
    }
  }
  if (!last) {
    return { passed: true, reason: `No prior ${actionType}` };
  }

  const elapsedMs = candidate.timestamp - last.timestamp;
  if (elapsedMs < minSeconds * 1000) {
    return {
      passed: false,
      reason: `Only ${elapsedMs}ms since last ${actionType}; minimum is ${minSeconds}s`,
    };
  }
  return { passed: true, reason: `${elapsedMs}ms since last ${actionType}` };
}

function noConcurrentRequests(windowSeconds: number, { chain, candidate }: ConditionContext): ConditionResult {
  const now = candidate.timestamp;
  const windowStart = now - windowSeconds * 1000;

  // Open window (now - window, now)
  const concurrent = chain.find(
    (e) =>
      e.event_type !== candidate.event_type &&
      e.timestamp > windowStart &&
      e.timestamp < now
  );
  if (concurrent) {
    return {
      passed: false,
      reason: `${concurrent.event_type} at ${concurrent.timestamp} is within ${windowSeconds}s of this ${candidate.event_type}`,
    };
  }
  return { passed: true, reason: `No other action types within ${windowSeconds}s` };
}

function minVerificationCount(
  thresholdAmount: number,
  actionType: string,
  requiredCount: number,
  { chain, candidate }: ConditionContext
): ConditionResult {
  if (candidate.value === undefined || candidate.value < thresholdAmount) {
    return { passed: true, reason: `Value below ${thresholdAmount}; not applicable` };
  }

  const count = chain.filter((e) => e.event_type === actionType).length;
  if (count < requiredCount) {
    return {
      passed: false,
      reason: `${count} ${actionType} event(s) on record; ${requiredCount} required for value >= ${thresholdAmount}`,
    };
  }
  return { passed: true, reason: `${count} ${actionType} event(s) on record` };
}

function addressAllowlist(
  allowedPrefixes: string[],
  actionTypes: string[],
  { candidate }: ConditionContext
): ConditionResult {
  if (!actionTypes.includes(candidate.event_type)) {
    return { passed: true, reason: `${candidate.event_type} is not restricted` };
  }
  if (!candidate.recipient) {
    return { passed: false, reason: `${candidate.event_type} has no recipient` };
  }

  const recipient = candidate.recipient.toLowerCase();
  if (allowedPrefixes.some((prefix) => recipient.startsWith(prefix.toLowerCase()))) {
    return { passed: true, reason: "Recipient is allowlisted" };
  }
  return { passed: false, reason: "Recipient is not allowlisted" };
}
