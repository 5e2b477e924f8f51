import type { EventStoreAdapter } from "./adapters/types.js";
import { AuditTrail } from "./audit-trail.js";
import { LogError, PolicyViolation } from "./errors.js";
import { computeActionId, computePayloadDigest } from "./hashing.js";
import { inclusionProof, merkleRoot } from "./merkle.js";
import { checkOrdering } from "./policy/ordering.js";
import { GLOBAL_SCOPE } from "./types.js";
import type {
  CausalEvent,
  InclusionReceipt,
  PolicyLimits,
  Proposal,
  ScopeGranularity,
} from "./types.js";

export interface LogResult {
  action_id: string;
  event: CausalEvent;
  /** True when the action_id was already on record and nothing was appended */
  replayed: boolean;
}

export interface CausalEventLoggerOptions {
  store: EventStoreAdapter;
  /** Defaults to a trail over the same store with no sinks. */
  audit?: AuditTrail;
  granularity?: ScopeGranularity;
  limits?: Pick<PolicyLimits, "max_payload_bytes" | "skew_tolerance_ms">;
  /** Clock for audit timestamps. */
  now?: () => number;
}

export interface LogOptions {
  /** Append into this scope instead of the one derived from the agent. */
  scope?: string;
}

/**
 * Append-only, hash-chained record of every accepted action.
 *
 * Appends within a scope go through a single-writer queue; different scopes
 * proceed independently. An action_id is reserved synchronously, before any
 * await, so two concurrent submissions of the same proposal append once.
 */
export class CausalEventLogger {
  private store: EventStoreAdapter;
  private audit: AuditTrail;
  private granularity: ScopeGranularity;
  private maxPayloadBytes: number;
  private skewToleranceMs: number;
  private now: () => number;

  private queues = new Map<string, Promise<void>>();
  private inFlight = new Map<string, Promise<LogResult>>();

  constructor(options: CausalEventLoggerOptions) {
    this.store = options.store;
    this.audit = options.audit ?? new AuditTrail(options.store);
    this.granularity = options.granularity ?? "agent";
    this.maxPayloadBytes = options.limits?.max_payload_bytes ?? 4096;
    this.skewToleranceMs = options.limits?.skew_tolerance_ms ?? 500;
    this.now = options.now ?? Date.now;
  }

  /** Apply new limits and scope granularity, e.g. after a policy swap. */
  configure(
    limits: Pick<PolicyLimits, "max_payload_bytes" | "skew_tolerance_ms">,
    granularity: ScopeGranularity
  ): void {
    this.maxPayloadBytes = limits.max_payload_bytes;
    this.skewToleranceMs = limits.skew_tolerance_ms;
    this.granularity = granularity;
  }

  scopeFor(agentId: string): string {
    return this.granularity === "global" ? GLOBAL_SCOPE : agentId;
  }

  async log(proposal: Proposal, options?: LogOptions): Promise<LogResult> {
    const size = Buffer.byteLength(proposal.payload, "utf8");
    if (size > this.maxPayloadBytes) {
      throw new LogError(
        `Payload is ${size} bytes; limit is ${this.maxPayloadBytes}`,
        "PAYLOAD_TOO_LARGE"
      );
    }

    const payloadDigest = computePayloadDigest(proposal.payload);
    const actionId = computeActionId(
      proposal.nonce,
      proposal.timestamp,
      proposal.agent_id,
      payloadDigest
    );

    const pending = this.inFlight.get(actionId);
    if (pending) {
      const first = await pending;
      return { ...first, replayed: true };
    }

    const existing = this.readStore(() => this.store.getEventByActionId(actionId));
    if (existing) {
      return { action_id: actionId, event: existing, replayed: true };
    }

    const scope = options?.scope ?? this.scopeFor(proposal.agent_id);
    const task = this.enqueue(scope, () =>
      this.appendOrdered(scope, proposal, actionId, payloadDigest)
    );
    this.inFlight.set(actionId, task);
    try {
      return await task;
    } finally {
      this.inFlight.delete(actionId);
    }
  }

  /**
   * Append to a scope with the next nonce after its tail. Used for
   * internally generated events such as governance changes.
   */
  async logNext(
    scope: string,
    entry: Omit<Proposal, "nonce">
  ): Promise<LogResult> {
    return this.enqueue(scope, async () => {
      const tail = this.readStore(() => this.store.getScopeTail(scope));
      const proposal: Proposal = { ...entry, nonce: tail ? tail.nonce + 1 : 0 };
      const payloadDigest = computePayloadDigest(proposal.payload);
      const actionId = computeActionId(
        proposal.nonce,
        proposal.timestamp,
        proposal.agent_id,
        payloadDigest
      );
      return this.appendOrdered(scope, proposal, actionId, payloadDigest);
    });
  }

  private async appendOrdered(
    scope: string,
    proposal: Proposal,
    actionId: string,
    payloadDigest: string
  ): Promise<LogResult> {
    // Another writer may have appended this action while we queued
    const existing = this.readStore(() => this.store.getEventByActionId(actionId));
    if (existing) {
      return { action_id: actionId, event: existing, replayed: true };
    }

    const tail = this.readStore(() => this.store.getScopeTail(scope));
    const ordering = checkOrdering(tail, proposal, this.skewToleranceMs);
    if (ordering.violation) {
      await this.audit.record({
        action_id: actionId,
        agent_id: proposal.agent_id,
        scope,
        kind: "ordering_rejected",
        detail: {
          rule: ordering.violation.rule,
          reason: ordering.violation.reason,
          nonce: proposal.nonce,
          event_type: proposal.event_type,
        },
        timestamp: this.now(),
      });
      throw new PolicyViolation(ordering.violation);
    }

    let event: CausalEvent;
    try {
      event = await this.store.appendEvent({
        action_id: actionId,
        agent_id: proposal.agent_id,
        scope,
        event_type: proposal.event_type,
        nonce: proposal.nonce,
        timestamp: proposal.timestamp,
        payload_digest: payloadDigest,
        ...(proposal.value !== undefined ? { value: proposal.value } : {}),
        ...(proposal.recipient !== undefined ? { recipient: proposal.recipient } : {}),
      });
    } catch (err) {
      throw new LogError(`Event store append failed in scope '${scope}'`, "STORE_UNAVAILABLE", {
        cause: err,
      });
    }

    return { action_id: actionId, event, replayed: false };
  }

  /** Merkle root over a scope's events, or over those before `beforeSequence`. */
  getScopeRoot(scope: string, beforeSequence?: number): string {
    const chain = this.readStore(() => this.store.getChain(scope, beforeSequence));
    return merkleRoot(chain.map((event) => event.event_hash));
  }

  /** Prove a logged action against the current root of its scope. */
  getInclusionProof(actionId: string): InclusionReceipt | null {
    const event = this.readStore(() => this.store.getEventByActionId(actionId));
    if (!event) return null;

    const chain = this.readStore(() => this.store.getChain(event.scope));
    const hashes = chain.map((e) => e.event_hash);
    const proof = inclusionProof(
      hashes,
      chain.findIndex((e) => e.sequence === event.sequence)
    );
    if (!proof) return null;

    return {
      action_id: event.action_id,
      scope: event.scope,
      sequence: event.sequence,
      event_hash: event.event_hash,
      root: merkleRoot(hashes),
      proof,
    };
  }

  private readStore<T>(read: () => T): T {
    try {
      return read();
    } catch (err) {
      throw new LogError("Event store read failed", "STORE_UNAVAILABLE", { cause: err });
    }
  }

  /** Run `task` after every earlier task of the same scope has settled. */
  private enqueue<T>(scope: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(scope) ?? Promise.resolve();
    const result = previous.then(task);
    // The queue only tracks completion; failures reach the caller via `result`
    const settled = result.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(scope, settled);
    void settled.then(() => {
      if (this.queues.get(scope) === settled) this.queues.delete(scope);
    });
    return result;
  }
}
