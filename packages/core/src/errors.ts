import type { ViolationDetail, ViolationRule } from "./types.js";

export type CausewayErrorCode =
  | "PAYLOAD_TOO_LARGE"
  | "RATE_LIMITED"
  | "INVALID_PROPOSAL"
  | "STORE_UNAVAILABLE"
  | "POLICY_VIOLATION"
  | "THRESHOLD_UNMET"
  | "UNAUTHORIZED"
  | "INVALID_ROOT";

/**
 * Base error for the pipeline. Every error carries a code so callers can
 * branch without parsing messages. Messages never echo payloads or keys.
 */
export class CausewayError extends Error {
  readonly code: CausewayErrorCode;

  constructor(message: string, code: CausewayErrorCode) {
    super(message);
    this.name = "CausewayError";
    this.code = code;
  }
}

/** Rejected at the gateway; never reaches the logger. */
export class AdmissionError extends CausewayError {
  readonly agentId: string | undefined;

  constructor(
    message: string,
    code: "PAYLOAD_TOO_LARGE" | "RATE_LIMITED" | "INVALID_PROPOSAL",
    agentId?: string
  ) {
    super(message, code);
    this.name = "AdmissionError";
    this.agentId = agentId;
  }
}

export class LogError extends CausewayError {
  /** Durability failures may be retried with backoff. */
  readonly retryable: boolean;

  constructor(
    message: string,
    code: "PAYLOAD_TOO_LARGE" | "STORE_UNAVAILABLE",
    options?: { cause?: unknown }
  ) {
    super(message, code);
    this.name = "LogError";
    this.retryable = code === "STORE_UNAVAILABLE";
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class PolicyViolation extends CausewayError {
  readonly rule: ViolationRule;
  readonly conditionId: string | undefined;
  readonly detail: ViolationDetail;

  constructor(detail: ViolationDetail) {
    super(detail.reason, "POLICY_VIOLATION");
    this.name = "PolicyViolation";
    this.rule = detail.rule;
    this.conditionId = detail.condition_id;
    this.detail = detail;
  }
}

/** Signature collection missed its deadline or came back short. */
export class ThresholdUnmet extends CausewayError {
  readonly required: number;
  readonly collected: number;

  constructor(required: number, collected: number, reason: string) {
    super(
      `Threshold unmet: ${collected}/${required} signatures (${reason})`,
      "THRESHOLD_UNMET"
    );
    this.name = "ThresholdUnmet";
    this.required = required;
    this.collected = collected;
  }
}

export class GovernanceError extends CausewayError {
  constructor(message: string, code: "UNAUTHORIZED" | "INVALID_ROOT") {
    super(message, code);
    this.name = "GovernanceError";
  }
}
