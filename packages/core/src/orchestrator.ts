import { ThresholdUnmet } from "./errors.js";
import { buildCommitment } from "./hashing.js";
import { createThresholdTable, lookupThreshold } from "./policy/risk.js";
import type {
  CausalEvent,
  ExecutionAuthorization,
  PolicyDecision,
  RiskTier,
  SignatureBundle,
  SignatureCollectionRequest,
  ThresholdTable,
} from "./types.js";

/**
 * Reaches the validator set. Implementations should stop work when
 * `signal` aborts; the orchestrator has given up by then.
 */
export interface SignatureCollector {
  collect(request: SignatureCollectionRequest, signal: AbortSignal): Promise<SignatureBundle>;
}

export interface RiskOrchestratorOptions {
  collector: SignatureCollector;
  /** Current aggregate key root, read at request time. */
  keyRoot: () => string;
  /** Injected at startup; never taken from proposals. */
  thresholds?: ThresholdTable;
  deadlineMs?: number;
}

export class RiskOrchestrator {
  private collector: SignatureCollector;
  private keyRoot: () => string;
  private thresholds: ThresholdTable;
  private deadlineMs: number;

  constructor(options: RiskOrchestratorOptions) {
    this.collector = options.collector;
    this.keyRoot = options.keyRoot;
    this.thresholds = createThresholdTable(options.thresholds);
    this.deadlineMs = options.deadlineMs ?? 30_000;
  }

  requiredThreshold(tier: RiskTier): number {
    return lookupThreshold(this.thresholds, tier);
  }

  buildRequest(decision: PolicyDecision, event: CausalEvent): SignatureCollectionRequest {
    return {
      action_id: event.action_id,
      payload_digest: event.payload_digest,
      risk_tier: decision.risk_tier,
      // Looked up again here; the decision's copy is informational
      required_threshold: this.requiredThreshold(decision.risk_tier),
      commitment: buildCommitment(event.value ?? 0, event.nonce, event.recipient ?? ""),
      key_root: this.keyRoot(),
    };
  }

  /**
   * Collect signatures for a passed decision. Returns null for a failed one
   * without contacting the collector. Throws ThresholdUnmet on a missed
   * deadline, a failed collector or too few distinct signers.
   */
  async authorize(
    decision: PolicyDecision,
    event: CausalEvent,
    deadlineMs: number = this.deadlineMs
  ): Promise<ExecutionAuthorization | null> {
    if (decision.verdict !== "PASS") return null;

    const request = this.buildRequest(decision, event);
    const required = request.required_threshold;
    const bundle = await this.collectWithDeadline(request, deadlineMs);

    const signers = new Set(
      bundle.signatures
        .filter((s) => s.signer_id.length > 0 && s.signature.length > 0)
        .map((s) => s.signer_id)
    );
    if (signers.size < required) {
      throw new ThresholdUnmet(required, signers.size, "not enough distinct signers");
    }

    return {
      action_id: request.action_id,
      risk_tier: request.risk_tier,
      commitment: request.commitment,
      signer_count: signers.size,
      proof_root: request.key_root,
      amount: request.commitment.amount,
      recipient: request.commitment.recipient,
      aggregate_proof: bundle.aggregate_proof,
    };
  }

  private async collectWithDeadline(
    request: SignatureCollectionRequest,
    deadlineMs: number
  ): Promise<SignatureBundle> {
    const required = request.required_threshold;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ThresholdUnmet(required, 0, `deadline of ${deadlineMs}ms elapsed`));
      }, deadlineMs);
    });

    try {
      return await Promise.race([
        this.collector.collect(request, controller.signal).catch((err: unknown) => {
          if (err instanceof ThresholdUnmet) throw err;
          const unmet = new ThresholdUnmet(required, 0, "signature collector failed");
          unmet.cause = err;
          throw unmet;
        }),
        deadline,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
