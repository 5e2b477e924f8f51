import { MemoryAdapter } from "./adapters/memory.js";
import type { EventStoreAdapter } from "./adapters/types.js";
import { AuditTrail } from "./audit-trail.js";
import { CausalEventLogger } from "./causal-logger.js";
import { ThresholdUnmet } from "./errors.js";
import { ProposalGateway } from "./gateway.js";
import { GovernanceController } from "./governance.js";
import { RiskOrchestrator } from "./orchestrator.js";
import type { SignatureCollector } from "./orchestrator.js";
import { ConditionRegistry } from "./policy/conditions.js";
import type { ConditionPlugin } from "./policy/conditions.js";
import { PolicyEngine } from "./policy/engine.js";
import { createThresholdTable } from "./policy/risk.js";
import type { AuditSink } from "./sinks/types.js";
import { ExecutionVerifier } from "./verifier.js";
import type {
  CausalEvent,
  ChainStats,
  ChainVerificationResult,
  ExecutionAuthorization,
  InclusionReceipt,
  Policy,
  PolicyDecision,
  RiskTier,
} from "./types.js";

export interface CausewayOptions {
  /** Policy object (already parsed). */
  policy: Policy;
  /** Storage adapter: "memory" for built-in, or pass an EventStoreAdapter instance. */
  adapter?: "memory" | EventStoreAdapter;
  /** Sinks for the audit drain. */
  sinks?: AuditSink[];
  collector: SignatureCollector;
  governanceToken: string;
  /** Aggregate validator key root, 64 hex chars. */
  keyRoot: string;
  /** Signer counts per tier. Defaults to Low 2, Medium 3, High 5; may raise those, never lower them. */
  thresholds?: Record<RiskTier, number>;
  /** Custom condition kinds. */
  conditions?: ConditionPlugin[];
  now?: () => number;
}

export type SubmissionStatus = "rejected" | "authorized" | "abandoned";

type OutcomeKind = "policy_rejected" | "signatures_collected" | "threshold_unmet";

const OUTCOME_STATUS: Record<OutcomeKind, SubmissionStatus> = {
  policy_rejected: "rejected",
  signatures_collected: "authorized",
  threshold_unmet: "abandoned",
};

function isOutcomeKind(kind: string): kind is OutcomeKind {
  return kind in OUTCOME_STATUS;
}

export interface SubmissionResult {
  status: SubmissionStatus;
  action_id: string;
  event: CausalEvent;
  decision: PolicyDecision;
  /** True when the proposal was already on record */
  replayed: boolean;
  authorization?: ExecutionAuthorization;
  /** Why signature collection was abandoned */
  unmet?: ThresholdUnmet;
}

/**
 * Causeway SDK: the unified facade.
 *
 * ```typescript
 * const causeway = new Causeway({ policy, collector, governanceToken, keyRoot });
 * const result = await causeway.submit(rawProposal);
 * if (result.status === "authorized") { // hand result.authorization to the chain adapter }
 * ```
 *
 * Admission errors and ordering violations are thrown; nothing is
 * appended for them.
 */
export class Causeway {
  private adapter: EventStoreAdapter;
  private audit: AuditTrail;
  private gateway: ProposalGateway;
  private logger: CausalEventLogger;
  private engine: PolicyEngine;
  private orchestrator: RiskOrchestrator;
  private governance: GovernanceController;
  private verifier: ExecutionVerifier;
  private now: () => number;
  /** Submissions still in flight, by action_id. Settled entries are dropped. */
  private decisions = new Map<string, Promise<SubmissionResult>>();

  constructor(options: CausewayOptions) {
    const adapter =
      options.adapter === "memory" || options.adapter === undefined
        ? new MemoryAdapter()
        : options.adapter;
    const now = options.now ?? Date.now;
    const thresholds = createThresholdTable(options.thresholds);
    const policy = options.policy;

    const registry = new ConditionRegistry();
    for (const plugin of options.conditions ?? []) registry.register(plugin);

    this.adapter = adapter;
    this.now = now;
    this.audit = new AuditTrail(adapter, options.sinks);
    this.engine = new PolicyEngine({ registry, thresholds });
    this.gateway = new ProposalGateway({ limits: policy.limits, now });
    this.logger = new CausalEventLogger({
      store: adapter,
      audit: this.audit,
      granularity: policy.scope,
      limits: policy.limits,
      now,
    });

    this.assertEnforceable(policy);
    this.governance = new GovernanceController({
      token: options.governanceToken,
      keyRoot: options.keyRoot,
      policy,
      logger: this.logger,
      audit: this.audit,
      validatePolicy: (next) => this.assertEnforceable(next),
      onPolicySwap: (next) => {
        this.gateway.configure(next.limits);
        this.logger.configure(next.limits, next.scope);
      },
      now,
    });

    const keyRoot = () => this.governance.getKeyRoot();
    this.orchestrator = new RiskOrchestrator({
      collector: options.collector,
      keyRoot,
      thresholds,
      deadlineMs: policy.limits.signature_deadline_ms,
    });
    this.verifier = new ExecutionVerifier({
      keyRoot,
      breakpoints: () => this.governance.getPolicy().risk,
      thresholds,
    });
  }

  /** Run a raw proposal through admission, logging, evaluation and signing. */
  async submit(raw: unknown): Promise<SubmissionResult> {
    const admittedAt = this.now();
    const proposal = this.gateway.admit(raw, admittedAt);
    const policy = this.governance.getPolicy();
    const logged = await this.logger.log(proposal);

    if (!logged.replayed) {
      return this.track(logged.event, policy);
    }

    this.gateway.refund(proposal.agent_id, admittedAt);
    const earlier = this.decisions.get(logged.action_id);
    if (earlier) {
      return { ...(await earlier), replayed: true };
    }
    const outcome = this.recordedOutcome(logged.action_id);
    if (!outcome) {
      // Logged, but the earlier attempt failed before reaching an outcome
      return { ...(await this.track(logged.event, policy)), replayed: true };
    }
    return this.fromHistory(logged.event, policy, outcome);
  }

  private track(event: CausalEvent, policy: Readonly<Policy>): Promise<SubmissionResult> {
    const pending = this.process(event, policy);
    const settle = () => {
      this.decisions.delete(event.action_id);
    };
    this.decisions.set(event.action_id, pending);
    void pending.then(settle, settle);
    return pending;
  }

  private async process(event: CausalEvent, policy: Readonly<Policy>): Promise<SubmissionResult> {
    const decision = this.evaluateLogged(event, policy);
    const base = { action_id: event.action_id, event, decision, replayed: false };

    await this.audit.record({
      action_id: event.action_id,
      agent_id: event.agent_id,
      scope: event.scope,
      kind: decision.verdict === "PASS" ? "policy_passed" : "policy_rejected",
      detail: {
        verdict: decision.verdict,
        risk_tier: decision.risk_tier,
        required_threshold: decision.required_threshold,
        snapshot_root: decision.snapshot_root,
        evaluation_digest: decision.evaluation_digest,
        ...(decision.violation ? { violation: decision.violation } : {}),
      },
      timestamp: event.timestamp,
    });

    if (decision.verdict === "FAIL") {
      return { ...base, status: "rejected" };
    }

    try {
      const authorization = await this.orchestrator.authorize(
        decision,
        event,
        policy.limits.signature_deadline_ms
      );
      if (!authorization) return { ...base, status: "rejected" };

      await this.audit.record({
        action_id: event.action_id,
        agent_id: event.agent_id,
        scope: event.scope,
        kind: "signatures_collected",
        detail: {
          risk_tier: authorization.risk_tier,
          signer_count: authorization.signer_count,
          proof_root: authorization.proof_root,
          binding_digest: authorization.commitment.binding_digest,
        },
        timestamp: event.timestamp,
      });
      return { ...base, status: "authorized", authorization };
    } catch (err) {
      if (!(err instanceof ThresholdUnmet)) throw err;

      await this.audit.record({
        action_id: event.action_id,
        agent_id: event.agent_id,
        scope: event.scope,
        kind: "threshold_unmet",
        detail: { required: err.required, collected: err.collected, reason: err.message },
        timestamp: event.timestamp,
      });
      return { ...base, status: "abandoned", unmet: err };
    }
  }

  /** The audit kind that closed an action, if one was recorded. */
  private recordedOutcome(actionId: string): OutcomeKind | undefined {
    const records = this.adapter.getAuditRecords({ action_id: actionId });
    for (const record of records) {
      if (isOutcomeKind(record.kind)) return record.kind;
    }
    return undefined;
  }

  /**
   * Replay of an action settled by an earlier process. Evaluation is
   * deterministic over the same snapshot, so the decision is recomputed;
   * the outcome comes from the audit log.
   */
  private fromHistory(
    event: CausalEvent,
    policy: Readonly<Policy>,
    outcome: OutcomeKind
  ): SubmissionResult {
    const decision = this.evaluateLogged(event, policy);
    return {
      action_id: event.action_id,
      event,
      decision,
      replayed: true,
      status: OUTCOME_STATUS[outcome],
    };
  }

  /** Evaluate a logged event against its scope as it stood before the event. */
  evaluateLogged(event: CausalEvent, policy: Readonly<Policy> = this.governance.getPolicy()): PolicyDecision {
    const snapshot = this.adapter.getChain(event.scope, event.sequence);
    return this.engine.evaluate(snapshot, policy, event);
  }

  private assertEnforceable(policy: Policy): void {
    const unknown = policy.conditions.filter((c) => !this.engine.supportsCondition(c.type));
    if (unknown.length > 0) {
      throw new Error(
        `Policy '${policy.name}' uses unregistered condition types: ${unknown.map((c) => c.type).join(", ")}`
      );
    }
  }

  getGovernance(): GovernanceController {
    return this.governance;
  }

  getVerifier(): ExecutionVerifier {
    return this.verifier;
  }

  getOrchestrator(): RiskOrchestrator {
    return this.orchestrator;
  }

  /** Merkle root of a scope's history. */
  getScopeRoot(scope: string, beforeSequence?: number): string {
    return this.logger.getScopeRoot(scope, beforeSequence);
  }

  getInclusionProof(actionId: string): InclusionReceipt | null {
    return this.logger.getInclusionProof(actionId);
  }

  /** Get chain statistics. */
  getStats(): ChainStats {
    return this.adapter.getChainStats();
  }

  /** Verify chain integrity. */
  async verify(): Promise<ChainVerificationResult> {
    return this.adapter.verifyChain();
  }

  /** Get the underlying adapter (for advanced use). */
  getAdapter(): EventStoreAdapter {
    return this.adapter;
  }

  /** Flush sinks, then release the store. */
  async close(): Promise<void> {
    await this.audit.close();
    this.adapter.close();
  }
}
