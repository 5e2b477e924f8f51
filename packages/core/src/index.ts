export * from "./types.js";
export * from "./errors.js";
export {
  ZERO_DIGEST,
  sha256Hex,
  canonicalJson,
  computePayloadDigest,
  computeActionId,
  computeEventHash,
  computeBindingDigest,
  buildCommitment,
  computeEvaluationDigest,
} from "./hashing.js";

// Storage
export type { EventStoreAdapter, EventDraft } from "./adapters/index.js";
export {
  SqliteAdapter,
  MemoryAdapter,
  verifyEvents,
  verifyScopeRoot,
  computeStats,
  createAdapter,
  DEFAULT_DB_PATH,
} from "./adapters/index.js";
export { merkleRoot, inclusionProof, verifyInclusion, EMPTY_ROOT } from "./merkle.js";

// Pipeline
export { CausalEventLogger } from "./causal-logger.js";
export type { CausalEventLoggerOptions, LogOptions, LogResult } from "./causal-logger.js";
export { AuditTrail } from "./audit-trail.js";
export { ProposalGateway, SlidingWindowRateLimiter, parseProposal, RATE_WINDOW_MS } from "./gateway.js";
export type { GatewayLimits, ProposalGatewayOptions } from "./gateway.js";
export * from "./policy/index.js";
export { RiskOrchestrator } from "./orchestrator.js";
export type { RiskOrchestratorOptions, SignatureCollector } from "./orchestrator.js";
export { GovernanceController, GOVERNANCE_AGENT, assertKeyRoot } from "./governance.js";
export type { GovernanceControllerOptions, GovernanceOperation } from "./governance.js";
export { ExecutionVerifier } from "./verifier.js";
export type { ExecutionVerifierOptions, VerificationOutcome } from "./verifier.js";
export { loadPolicyConfig, loadPolicyFile, freezePolicy, DEFAULT_LIMITS } from "./policy-loader.js";

// SDK
export { Causeway } from "./causeway.js";
export type { CausewayOptions, SubmissionResult, SubmissionStatus } from "./causeway.js";

// Sinks
export type { AuditSink, AuditSeverity, SinkFilter, SinkPayload } from "./sinks/index.js";
export { StdoutSink, WebhookSink, createSinks, SEVERITY_BY_KIND, AUDIT_SEVERITIES, toSinkPayload } from "./sinks/index.js";
