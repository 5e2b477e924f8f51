import type {
  AuditFilters,
  AuditRecord,
  CausalEvent,
  ChainStats,
  ChainVerificationResult,
  EventFilters,
  NewAuditRecord,
} from "../types.js";

/** Event fields supplied by the logger; the store fills in chain linkage. */
export type EventDraft = Omit<CausalEvent, "sequence" | "prev_hash" | "event_hash">;

/**
 * Storage backend for the causal event log and its side audit log.
 * Implement this to add new storage backends (Postgres, Turso, etc.).
 *
 * Appends are never issued concurrently for the same scope; the logger
 * serializes them. Reads may run at any time and see a prefix of history.
 */
export interface EventStoreAdapter {
  /** Append an event to the tail of its scope. Returns it with computed hashes. */
  appendEvent(draft: EventDraft): Promise<CausalEvent>;

  /** Append a record to the side audit log. */
  appendAudit(record: NewAuditRecord): Promise<AuditRecord>;

  /** Last event of a scope, or null for an empty scope. */
  getScopeTail(scope: string): CausalEvent | null;

  /** Events of a scope in append order, optionally bounded by sequence. */
  getChain(scope: string, beforeSequence?: number): CausalEvent[];

  /** Query events, newest first. */
  getEvents(filters?: EventFilters): CausalEvent[];

  getEventByActionId(actionId: string): CausalEvent | null;

  getEventBySequence(sequence: number): CausalEvent | null;

  /** Query audit records, newest first. */
  getAuditRecords(filters?: AuditFilters): AuditRecord[];

  /** Verify every scope's hash chain. */
  verifyChain(): Promise<ChainVerificationResult>;

  getChainStats(): ChainStats;

  getEventCount(): number;

  getLastSequence(): number;

  /** Close the adapter and release resources. */
  close(): void;
}
