import { AdmissionError } from "./errors.js";
import type { PolicyLimits, Proposal } from "./types.js";

/** One minute, the window `max_proposals_per_minute` is counted over. */
export const RATE_WINDOW_MS = 60_000;

/** Any field that looks like a signer threshold is refused outright. */
const THRESHOLD_FIELD = /threshold|quorum|required_signers/i;

/**
 * In-memory sliding window rate limiter keyed by agent.
 * The check and the record happen in one synchronous call, so two
 * concurrent admissions cannot both take the last slot.
 */
export class SlidingWindowRateLimiter {
  private admitted: Map<string, number[]> = new Map();
  private callCounter = 0;
  private readonly GC_INTERVAL = 100;
  private readonly windowMs: number;

  constructor(windowMs: number = RATE_WINDOW_MS) {
    this.windowMs = windowMs;
  }

  /** Records `now` and returns true when fewer than `limit` fall in [now - window, now]. */
  tryAcquire(agentId: string, limit: number, now: number): boolean {
    const recent = this.recent(agentId, now);
    if (recent.length >= limit) {
      this.admitted.set(agentId, recent);
      return false;
    }
    recent.push(now);
    this.admitted.set(agentId, recent);

    if (++this.callCounter % this.GC_INTERVAL === 0) {
      this.gc(now);
    }
    return true;
  }

  /** Give back the slot taken at `at`, if it is still held. */
  release(agentId: string, at: number): void {
    const timestamps = this.admitted.get(agentId);
    if (!timestamps) return;
    const i = timestamps.lastIndexOf(at);
    if (i !== -1) timestamps.splice(i, 1);
  }

  getCount(agentId: string, now: number): number {
    return this.recent(agentId, now).length;
  }

  reset(): void {
    this.admitted.clear();
  }

  private recent(agentId: string, now: number): number[] {
    const timestamps = this.admitted.get(agentId) ?? [];
    return timestamps.filter((t) => now - t <= this.windowMs);
  }

  private gc(now: number): void {
    for (const [key, timestamps] of this.admitted) {
      const recent = timestamps.filter((t) => now - t <= this.windowMs);
      if (recent.length === 0) this.admitted.delete(key);
      else this.admitted.set(key, recent);
    }
  }
}

export type GatewayLimits = Pick<PolicyLimits, "max_payload_bytes" | "max_proposals_per_minute">;

export interface ProposalGatewayOptions {
  limits?: GatewayLimits;
  limiter?: SlidingWindowRateLimiter;
  now?: () => number;
}

/**
 * Admission control in front of the logger. Validates the raw shape,
 * bounds the payload size and enforces the per-agent rate limit.
 */
export class ProposalGateway {
  private limits: GatewayLimits;
  private limiter: SlidingWindowRateLimiter;
  private now: () => number;

  constructor(options?: ProposalGatewayOptions) {
    this.limits = options?.limits ?? { max_payload_bytes: 4096, max_proposals_per_minute: 10 };
    this.limiter = options?.limiter ?? new SlidingWindowRateLimiter();
    this.now = options?.now ?? Date.now;
  }

  configure(limits: GatewayLimits): void {
    this.limits = limits;
  }

  admit(raw: unknown, now: number = this.now()): Proposal {
    const proposal = parseProposal(raw);

    const size = Buffer.byteLength(proposal.payload, "utf8");
    if (size > this.limits.max_payload_bytes) {
      throw new AdmissionError(
        `Payload is ${size} bytes; limit is ${this.limits.max_payload_bytes}`,
        "PAYLOAD_TOO_LARGE",
        proposal.agent_id
      );
    }

    if (!this.limiter.tryAcquire(proposal.agent_id, this.limits.max_proposals_per_minute, now)) {
      throw new AdmissionError(
        `Rate limit of ${this.limits.max_proposals_per_minute} proposals per minute exceeded`,
        "RATE_LIMITED",
        proposal.agent_id
      );
    }

    return proposal;
  }

  /**
   * Refund the slot taken by an admission that turned out to be a retry
   * of an action already on record. Only new actions count against the
   * per-minute limit.
   */
  refund(agentId: string, admittedAt: number): void {
    this.limiter.release(agentId, admittedAt);
  }
}

function invalid(message: string): AdmissionError {
  return new AdmissionError(message, "INVALID_PROPOSAL");
}

/** Validate an untrusted value into a Proposal. Unknown fields are dropped. */
export function parseProposal(raw: unknown): Proposal {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw invalid("Proposal must be an object");
  }
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

  const thresholdField = Object.keys(fields).find((key) => THRESHOLD_FIELD.test(key));
  if (thresholdField) {
    throw invalid(`Proposal must not carry '${thresholdField}'; thresholds are fixed by risk tier`);
  }

  const { agent_id, event_type, nonce, timestamp, payload, value, recipient } = fields;

  if (typeof agent_id !== "string" || agent_id.length === 0) {
    throw invalid("'agent_id' must be a non-empty string");
  }
  if (typeof event_type !== "string" || event_type.length === 0) {
    throw invalid("'event_type' must be a non-empty string");
  }
  if (typeof nonce !== "number" || !Number.isSafeInteger(nonce) || nonce < 0) {
    throw invalid("'nonce' must be a non-negative integer");
  }
  if (typeof timestamp !== "number" || !Number.isSafeInteger(timestamp) || timestamp < 0) {
    throw invalid("'timestamp' must be a non-negative integer of milliseconds");
  }
  if (typeof payload !== "string") {
    throw invalid("'payload' must be a string");
  }

  const proposal: Proposal = { agent_id, event_type, nonce, timestamp, payload };

  if (value !== undefined) {
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw invalid("'value' must be a non-negative number");
    }
    proposal.value = value;
  }
  if (recipient !== undefined) {
    if (typeof recipient !== "string" || recipient.length === 0) {
      throw invalid("'recipient' must be a non-empty string");
    }
    proposal.recipient = recipient;
  }

  return proposal;
}
