import { ZERO_DIGEST, computeBindingDigest } from "./hashing.js";
import {
  DEFAULT_BREAKPOINTS,
  createThresholdTable,
  lookupThreshold,
  maxTier,
  tierForValue,
} from "./policy/risk.js";
import type { ExecutionAuthorization, RiskBreakpoints, ThresholdTable } from "./types.js";

export interface VerificationOutcome {
  valid: boolean;
  reason?: string;
}

export interface ExecutionVerifierOptions {
  /** Key root currently registered through governance. */
  keyRoot: () => string;
  /** Value breakpoints of the active policy. */
  breakpoints?: () => RiskBreakpoints;
  thresholds?: ThresholdTable;
}

/**
 * In-process model of the checks the settlement contract runs before it
 * executes an authorized action.
 *
 * The tier an authorization claims is never trusted on its own: the amount
 * it commits to sets a floor, and the signer count is checked against
 * whichever of the two is higher.
 */
export class ExecutionVerifier {
  private keyRoot: () => string;
  private breakpoints: () => RiskBreakpoints;
  private thresholds: ThresholdTable;

  constructor(options: ExecutionVerifierOptions) {
    this.keyRoot = options.keyRoot;
    this.breakpoints = options.breakpoints ?? (() => DEFAULT_BREAKPOINTS);
    this.thresholds = createThresholdTable(options.thresholds);
  }

  verify(auth: ExecutionAuthorization): VerificationOutcome {
    if (auth.proof_root !== this.keyRoot()) {
      return { valid: false, reason: "Proof root does not match the registered key root" };
    }

    const tier = maxTier(auth.risk_tier, tierForValue(auth.amount, this.breakpoints()));
    const required = lookupThreshold(this.thresholds, tier);
    if (auth.signer_count < required) {
      return {
        valid: false,
        reason: `${auth.signer_count} signer(s); ${tier} requires ${required}`,
      };
    }

    if (auth.commitment.binding_digest === ZERO_DIGEST) {
      return { valid: false, reason: "Commitment digest is zero" };
    }

    const expected = computeBindingDigest(auth.amount, auth.commitment.nonce, auth.recipient);
    if (expected !== auth.commitment.binding_digest) {
      return { valid: false, reason: "Commitment does not match amount, nonce and recipient" };
    }

    return { valid: true };
  }
}
