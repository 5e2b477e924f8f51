import type {
  CandidateEvent,
  CausalEvent,
  EvaluationStep,
  Policy,
  PolicyDecision,
  RiskTier,
  ThresholdTable,
  ViolationDetail,
} from "../types.js";
import { computeEvaluationDigest } from "../hashing.js";
import { merkleRoot } from "../merkle.js";
import { ConditionRegistry } from "./conditions.js";
import type { ConditionPlugin } from "./conditions.js";
import { checkOrdering } from "./ordering.js";
import { createThresholdTable, lookupThreshold, maxTier, tierForValue } from "./risk.js";

export interface PolicyEngineOptions {
  registry?: ConditionRegistry;
  /** Injected at startup; never taken from proposals. */
  thresholds?: ThresholdTable;
}

/**
 * Evaluates a candidate against the history of its scope.
 *
 * Checks run in a fixed order: nonce monotonicity, temporal causality, then
 * the policy's conditions as declared. The first failure ends evaluation.
 * The risk tier is computed from the candidate's value independently of
 * the checks, so a failed decision still reports the tier it would need.
 */
export class PolicyEngine {
  private registry: ConditionRegistry;
  private thresholds: ThresholdTable;

  constructor(options?: PolicyEngineOptions) {
    this.registry = options?.registry ?? new ConditionRegistry();
    this.thresholds = createThresholdTable(options?.thresholds);
  }

  registerCondition(plugin: ConditionPlugin): void {
    this.registry.register(plugin);
  }

  supportsCondition(type: string): boolean {
    return this.registry.has(type);
  }

  evaluate(
    chain: readonly CausalEvent[],
    policy: Policy,
    candidate: CandidateEvent
  ): PolicyDecision {
    const steps: EvaluationStep[] = [];
    const valueTier = tierForValue(candidate.value, policy.risk);
    let riskTier: RiskTier = valueTier;

    const snapshotRoot = merkleRoot(chain.map((event) => event.event_hash));

    const decide = (violation?: ViolationDetail): PolicyDecision => {
      const outcome = {
        verdict: violation ? "FAIL" : "PASS",
        risk_tier: riskTier,
        required_threshold: lookupThreshold(this.thresholds, riskTier),
        evaluated_at_nonce: candidate.nonce,
        snapshot_root: snapshotRoot,
      } as const;
      const decision: PolicyDecision = {
        ...outcome,
        value_tier: valueTier,
        steps,
        evaluation_digest: computeEvaluationDigest(outcome),
      };
      if (violation) decision.violation = violation;
      return Object.freeze(decision);
    };

    const previous = chain.length > 0 ? chain[chain.length - 1] : undefined;

    // 1-2. Nonce monotonicity, then temporal causality with skew tolerance
    const ordering = checkOrdering(previous, candidate, policy.limits.skew_tolerance_ms);
    steps.push(...ordering.steps);
    if (ordering.violation) {
      return decide(ordering.violation);
    }

    // 3. Conditions, in declaration order, short-circuit on first failure
    const ctx = { chain, candidate, limits: policy.limits };
    for (const condition of policy.conditions) {
      const result = this.registry.evaluate(condition, ctx);
      steps.push({
        check: `${condition.type}:${condition.id}`,
        passed: result.passed,
        reason: result.reason,
      });

      if (result.escalate_to) {
        riskTier = maxTier(riskTier, result.escalate_to);
      }

      if (!result.passed) {
        return decide({
          rule: "condition",
          condition_id: condition.id,
          condition_type: condition.type,
          reason: `${condition.id}: ${result.reason}`,
        });
      }
    }

    return decide();
  }
}
