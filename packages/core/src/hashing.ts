import { createHash } from "node:crypto";
import type { CausalEvent, Commitment, PolicyDecision } from "./types.js";

export const ZERO_DIGEST = "0".repeat(64);

export function sha256Hex(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

export function canonicalize(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) return value.map(canonicalize);
  if (typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, child] of entries) {
      sorted[key] = canonicalize(child);
    }
    return sorted;
  }
  return value;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function computePayloadDigest(payload: string): string {
  return sha256Hex(payload);
}

/** action_id = H(nonce || timestamp || agent_id || payload_digest) */
export function computeActionId(
  nonce: number,
  timestamp: number,
  agentId: string,
  payloadDigest: string
): string {
  return sha256Hex(JSON.stringify([nonce, timestamp, agentId, payloadDigest]));
}

export function computeEventHash(
  event: Omit<CausalEvent, "event_hash"> & { event_hash?: string }
): string {
  return sha256Hex(
    canonicalJson({
      action_id: event.action_id,
      agent_id: event.agent_id,
      event_type: event.event_type,
      nonce: event.nonce,
      payload_digest: event.payload_digest,
      prev_hash: event.prev_hash,
      recipient: event.recipient ?? null,
      scope: event.scope,
      sequence: event.sequence,
      timestamp: event.timestamp,
      value: event.value ?? null,
    })
  );
}

export function computeBindingDigest(
  amount: number,
  nonce: number,
  recipient: string
): string {
  return sha256Hex(canonicalJson({ amount, nonce, recipient }));
}

export function buildCommitment(
  amount: number,
  nonce: number,
  recipient: string
): Commitment {
  return {
    amount,
    nonce,
    recipient,
    binding_digest: computeBindingDigest(amount, nonce, recipient),
  };
}

/** Digest over what a decision concluded and the history it concluded it from. */
export function computeEvaluationDigest(
  decision: Pick<
    PolicyDecision,
    "verdict" | "risk_tier" | "required_threshold" | "evaluated_at_nonce" | "snapshot_root"
  >
): string {
  return sha256Hex(
    canonicalJson({
      evaluated_at_nonce: decision.evaluated_at_nonce,
      required_threshold: decision.required_threshold,
      risk_tier: decision.risk_tier,
      snapshot_root: decision.snapshot_root,
      verdict: decision.verdict,
    })
  );
}
