import type { CandidateEvent, CausalEvent, EvaluationStep, ViolationDetail } from "../types.js";

export interface OrderingCheck {
  steps: EvaluationStep[];
  violation?: ViolationDetail;
}

/**
 * Nonce monotonicity then temporal causality against the scope tail.
 * Shared by the logger (before append) and the engine (during evaluation).
 */
export function checkOrdering(
  previous: CausalEvent | null | undefined,
  candidate: Pick<CandidateEvent, "nonce" | "timestamp">,
  skewToleranceMs: number
): OrderingCheck {
  const steps: EvaluationStep[] = [];

  // Gaps are allowed, repeats and regressions are not
  if (previous && candidate.nonce <= previous.nonce) {
    const reason = `Nonce ${candidate.nonce} is not greater than previous nonce ${previous.nonce}`;
    steps.push({ check: "nonce_monotonicity", passed: false, reason });
    return { steps, violation: { rule: "nonce_monotonicity", reason } };
  }
  steps.push({
    check: "nonce_monotonicity",
    passed: true,
    reason: previous ? `Nonce ${candidate.nonce} > ${previous.nonce}` : "First event in scope",
  });

  if (previous && candidate.timestamp < previous.timestamp - skewToleranceMs) {
    const behind = previous.timestamp - candidate.timestamp;
    const reason = `Timestamp is ${behind}ms before the previous event; tolerance is ${skewToleranceMs}ms`;
    steps.push({ check: "temporal_causality", passed: false, reason });
    return { steps, violation: { rule: "temporal_causality", reason } };
  }
  steps.push({
    check: "temporal_causality",
    passed: true,
    reason: previous ? "Within skew tolerance" : "First event in scope",
  });

  return { steps };
}
