// === Event Types ===

export const BUILTIN_EVENT_TYPES = [
  "SignatureRequest",
  "AddressVerification",
  "Proposal",
  "BalanceCheck",
  "WaitInterval",
  "PolicyQuery",
  "Governance",
] as const;

export type BuiltinEventType = (typeof BUILTIN_EVENT_TYPES)[number];

/** Extensible tagged kind: built-ins plus any custom, non-empty name. */
export type EventType = BuiltinEventType | (string & {});

/** Inbound proposal after gateway admission. Thresholds are never part of it. */
export interface Proposal {
  agent_id: string;
  event_type: EventType;
  nonce: number;
  /** Milliseconds since epoch. */
  timestamp: number;
  /** Raw action payload (e.g. serialized transaction). */
  payload: string;
  value?: number;
  recipient?: string;
}

export interface CausalEvent {
  /** Store-wide append position, 1-based */
  sequence: number;
  action_id: string;
  agent_id: string;
  scope: string;
  event_type: EventType;
  nonce: number;
  timestamp: number;
  /** SHA-256 of the raw payload */
  payload_digest: string;
  value?: number;
  recipient?: string;
  /** event_hash of the previous event in the same scope; null for genesis */
  prev_hash: string | null;
  event_hash: string;
}

/** What the engine evaluates: an appended event or one not yet logged. */
export type CandidateEvent = Pick<
  CausalEvent,
  "agent_id" | "event_type" | "nonce" | "timestamp"
> &
  Partial<Pick<CausalEvent, "value" | "recipient" | "action_id" | "payload_digest">>;

export type ScopeGranularity = "agent" | "global";

export const GOVERNANCE_SCOPE = "governance";
export const GLOBAL_SCOPE = "global";

// === Policy Types ===

export type RiskTier = "Low" | "Medium" | "High";

export const RISK_TIER_ORDER: readonly RiskTier[] = ["Low", "Medium", "High"];

export type ThresholdTable = Readonly<Record<RiskTier, number>>;

export interface MaxDailyOutflowCondition {
  type: "MaxDailyOutflow";
  id: string;
  cap: number;
}

export interface MinTimeBetweenActionsCondition {
  type: "MinTimeBetweenActions";
  id: string;
  action_type: EventType;
  min_seconds: number;
}

export interface NoConcurrentRequestsCondition {
  type: "NoConcurrentRequests";
  id: string;
  window_seconds: number;
}

export interface MinVerificationCountCondition {
  type: "MinVerificationCount";
  id: string;
  threshold_amount: number;
  action_type: EventType;
  required_count: number;
}

export interface AddressAllowlistCondition {
  type: "AddressAllowlist";
  id: string;
  allowed_prefixes: string[];
  action_types: EventType[];
}

/** Conditions registered at runtime carry their own parameters. */
export interface CustomCondition {
  type: string;
  id: string;
  [param: string]: unknown;
}

export type BuiltinCondition =
  | MaxDailyOutflowCondition
  | MinTimeBetweenActionsCondition
  | NoConcurrentRequestsCondition
  | MinVerificationCountCondition
  | AddressAllowlistCondition;

export type Condition = BuiltinCondition | CustomCondition;

export interface PolicyLimits {
  max_payload_bytes: number;
  max_proposals_per_minute: number;
  skew_tolerance_ms: number;
  daily_outflow_window_s: number;
  /** Outflow weight of a SignatureRequest that carries no value */
  nominal_value: number;
  signature_deadline_ms: number;
}

export interface RiskBreakpoints {
  /** Values at or above this are at least Medium */
  medium_at: number;
  /** Values at or above this are High regardless of conditions */
  high_at: number;
}

export interface SinkConfig {
  type: string;
  events?: string[];
  [key: string]: unknown;
}

export interface StorageConfig {
  adapter: string;
  [key: string]: unknown;
}

export interface Policy {
  version: string;
  name: string;
  description?: string;
  scope: ScopeGranularity;
  conditions: Condition[];
  limits: PolicyLimits;
  risk: RiskBreakpoints;
  sinks?: SinkConfig[];
  storage?: StorageConfig;
  extends?: string[];
}

// === Evaluation Types ===

export type Verdict = "PASS" | "FAIL";

export type ViolationRule =
  | "nonce_monotonicity"
  | "temporal_causality"
  | "condition";

export interface ViolationDetail {
  rule: ViolationRule;
  /** Set when rule is "condition" */
  condition_id?: string;
  condition_type?: string;
  reason: string;
}

export interface EvaluationStep {
  check: string;
  passed: boolean;
  reason: string;
}

export interface PolicyDecision {
  verdict: Verdict;
  violation?: ViolationDetail;
  risk_tier: RiskTier;
  /** Tier from the value breakpoints alone */
  value_tier: RiskTier;
  required_threshold: number;
  steps: EvaluationStep[];
  evaluated_at_nonce: number;
  /** Merkle root of the scope history the decision was made against */
  snapshot_root: string;
  /** Binds verdict, tier and nonce to `snapshot_root` */
  evaluation_digest: string;
}

// === Signature Collection Types ===

export interface Commitment {
  amount: number;
  nonce: number;
  recipient: string;
  /** SHA-256 over canonical {amount, nonce, recipient} */
  binding_digest: string;
}

export interface SignatureCollectionRequest {
  action_id: string;
  payload_digest: string;
  risk_tier: RiskTier;
  required_threshold: number;
  commitment: Commitment;
  key_root: string;
}

export interface ValidatorSignature {
  signer_id: string;
  signature: string;
}

export interface SignatureBundle {
  signatures: ValidatorSignature[];
  aggregate_proof: string;
}

export interface ExecutionAuthorization {
  action_id: string;
  risk_tier: RiskTier;
  commitment: Commitment;
  signer_count: number;
  proof_root: string;
  amount: number;
  recipient: string;
  aggregate_proof: string;
}

// === Audit Types ===

export type AuditKind =
  | "ordering_rejected"
  | "policy_passed"
  | "policy_rejected"
  | "signatures_collected"
  | "threshold_unmet"
  | "governance_rejected";

export const AUDIT_KINDS: readonly AuditKind[] = [
  "ordering_rejected",
  "policy_passed",
  "policy_rejected",
  "signatures_collected",
  "threshold_unmet",
  "governance_rejected",
];

export interface AuditRecord {
  id: number;
  action_id: string;
  agent_id: string;
  scope: string;
  kind: AuditKind;
  /** Free-form, JSON-serializable */
  detail: Record<string, unknown>;
  timestamp: number;
}

export type NewAuditRecord = Omit<AuditRecord, "id">;

export interface EventFilters {
  scope?: string;
  agent_id?: string;
  event_type?: EventType;
  /** Only events with sequence strictly below this */
  before_sequence?: number;
  limit?: number;
  offset?: number;
}

export interface AuditFilters {
  action_id?: string;
  agent_id?: string;
  kind?: AuditKind;
  limit?: number;
}

export interface ChainStats {
  total_events: number;
  scopes: number;
  agents: number;
  event_types: Record<string, number>;
  audit: Record<AuditKind, number>;
  first_event_timestamp?: number;
  last_event_timestamp?: number;
}

export interface ChainVerificationResult {
  valid: boolean;
  total_events: number;
  verified_events: number;
  broken_at_sequence?: number;
  broken_reason?: string;
  /** Hash of the verification result itself (provenance) */
  verification_hash: string;
  /** Merkle root per scope over the events that verified */
  scope_roots: Record<string, string>;
  stats: ChainStats;
}

export interface MerkleStep {
  hash: string;
  /** Which side the sibling sits on when the pair is hashed */
  side: "left" | "right";
}

export interface MerkleProof {
  leaf_index: number;
  leaf_count: number;
  siblings: MerkleStep[];
}

/** Proof that one event is part of its scope's history. */
export interface InclusionReceipt {
  action_id: string;
  scope: string;
  sequence: number;
  event_hash: string;
  root: string;
  proof: MerkleProof;
}
