import { computeEventHash, sha256Hex } from "../hashing.js";
import { merkleRoot } from "../merkle.js";
import type {
  AuditKind,
  AuditRecord,
  CausalEvent,
  ChainStats,
  ChainVerificationResult,
} from "../types.js";

/**
 * Walk events in append order and check, per scope, that each event links
 * to its predecessor, that its stored hash recomputes, and that nonces only
 * move forward. Shared by every adapter so they agree on what "valid" means.
 */
export function verifyEvents(
  events: CausalEvent[],
  stats: ChainStats
): ChainVerificationResult {
  if (events.length === 0) {
    return {
      valid: true,
      total_events: 0,
      verified_events: 0,
      verification_hash: sha256Hex("EMPTY_CHAIN"),
      scope_roots: {},
      stats,
    };
  }

  const tails = new Map<string, CausalEvent>();
  const leaves = new Map<string, string[]>();
  let verifiedCount = 0;

  const scopeRoots = (): Record<string, string> =>
    Object.fromEntries([...leaves].map(([scope, hashes]) => [scope, merkleRoot(hashes)]));

  const broken = (event: CausalEvent, kind: string, reason: string): ChainVerificationResult => ({
    valid: false,
    total_events: events.length,
    verified_events: verifiedCount,
    broken_at_sequence: event.sequence,
    broken_reason: reason,
    verification_hash: sha256Hex(`BROKEN:${event.sequence}:${kind}`),
    scope_roots: scopeRoots(),
    stats,
  });

  for (const event of events) {
    const tail = tails.get(event.scope);
    const expectedPrev = tail ? tail.event_hash : null;

    if (event.prev_hash !== expectedPrev) {
      return broken(
        event,
        "linkage",
        `Chain linkage broken at event #${event.sequence} in scope '${event.scope}': expected prev_hash '${(expectedPrev ?? "null").slice(0, 12)}', got '${(event.prev_hash ?? "null").slice(0, 12)}'`
      );
    }

    const computed = computeEventHash(event);
    if (computed !== event.event_hash) {
      return broken(
        event,
        "hash",
        `Event hash mismatch at event #${event.sequence}: stored '${event.event_hash.slice(0, 12)}...', computed '${computed.slice(0, 12)}...'`
      );
    }

    if (tail && event.nonce <= tail.nonce) {
      return broken(
        event,
        "nonce",
        `Nonce regression at event #${event.sequence}: ${event.nonce} <= ${tail.nonce}`
      );
    }

    tails.set(event.scope, event);
    const scopeLeaves = leaves.get(event.scope);
    if (scopeLeaves) scopeLeaves.push(event.event_hash);
    else leaves.set(event.scope, [event.event_hash]);
    verifiedCount++;
  }

  const tailHashes = [...tails.keys()]
    .sort()
    .map((scope) => `${scope}=${tails.get(scope)?.event_hash ?? ""}`)
    .join(",");

  return {
    valid: true,
    total_events: events.length,
    verified_events: verifiedCount,
    verification_hash: sha256Hex(`VALID:${events.length}:${tailHashes}`),
    scope_roots: scopeRoots(),
    stats,
  };
}

/**
 * Check one scope's events, in order, against a root recorded earlier:
 * every link and hash must recompute and the Merkle root must match.
 */
export function verifyScopeRoot(events: readonly CausalEvent[], expectedRoot: string): boolean {
  let prev: string | null = null;
  for (const event of events) {
    if (event.prev_hash !== prev || computeEventHash(event) !== event.event_hash) return false;
    prev = event.event_hash;
  }
  return merkleRoot(events.map((event) => event.event_hash)) === expectedRoot;
}

export function computeStats(
  events: CausalEvent[],
  audit: AuditRecord[]
): ChainStats {
  const scopes = new Set<string>();
  const agents = new Set<string>();
  const eventTypes: Record<string, number> = {};
  const auditCounts: Record<AuditKind, number> = {
    ordering_rejected: 0,
    policy_passed: 0,
    policy_rejected: 0,
    signatures_collected: 0,
    threshold_unmet: 0,
    governance_rejected: 0,
  };

  for (const event of events) {
    scopes.add(event.scope);
    agents.add(event.agent_id);
    eventTypes[event.event_type] = (eventTypes[event.event_type] ?? 0) + 1;
  }
  for (const record of audit) {
    auditCounts[record.kind]++;
  }

  return {
    total_events: events.length,
    scopes: scopes.size,
    agents: agents.size,
    event_types: eventTypes,
    audit: auditCounts,
    first_event_timestamp: events[0]?.timestamp,
    last_event_timestamp: events[events.length - 1]?.timestamp,
  };
}
