import type { EventDraft, EventStoreAdapter } from "./types.js";
import type {
  AuditFilters,
  AuditRecord,
  CausalEvent,
  ChainStats,
  ChainVerificationResult,
  EventFilters,
  NewAuditRecord,
} from "../types.js";
import { computeEventHash } from "../hashing.js";
import { computeStats, verifyEvents } from "./chain-integrity.js";

/**
 * In-memory storage adapter. No persistence. Suitable for testing and
 * short-lived processes where audit durability is not required.
 *
 * Chain linkage is index-based: each event stores its predecessor's hash
 * inline, and scope tails are tracked by hash, never by object reference.
 */
export class MemoryAdapter implements EventStoreAdapter {
  private events: CausalEvent[] = [];
  private audit: AuditRecord[] = [];
  private byActionId = new Map<string, number>();
  private tails = new Map<string, number>();
  private sequence = 0;

  async appendEvent(draft: EventDraft): Promise<CausalEvent> {
    const tail = this.getScopeTail(draft.scope);
    const nextSequence = this.sequence + 1;

    const eventData = {
      ...draft,
      sequence: nextSequence,
      prev_hash: tail ? tail.event_hash : null,
    };
    const event: CausalEvent = Object.freeze({
      ...eventData,
      event_hash: computeEventHash(eventData),
    });

    const index = this.events.push(event) - 1;
    this.byActionId.set(event.action_id, index);
    this.tails.set(event.scope, index);
    this.sequence = nextSequence;

    return event;
  }

  async appendAudit(record: NewAuditRecord): Promise<AuditRecord> {
    const stored: AuditRecord = { ...record, id: this.audit.length + 1 };
    this.audit.push(stored);
    return stored;
  }

  getScopeTail(scope: string): CausalEvent | null {
    const index = this.tails.get(scope);
    return index === undefined ? null : this.events[index];
  }

  getChain(scope: string, beforeSequence?: number): CausalEvent[] {
    return this.events.filter(
      (e) =>
        e.scope === scope &&
        (beforeSequence === undefined || e.sequence < beforeSequence)
    );
  }

  getEvents(filters?: EventFilters): CausalEvent[] {
    let result = [...this.events];

    if (filters?.scope) {
      result = result.filter((e) => e.scope === filters.scope);
    }
    if (filters?.agent_id) {
      result = result.filter((e) => e.agent_id === filters.agent_id);
    }
    if (filters?.event_type) {
      result = result.filter((e) => e.event_type === filters.event_type);
    }
    if (filters?.before_sequence !== undefined) {
      const bound = filters.before_sequence;
      result = result.filter((e) => e.sequence < bound);
    }

    result.sort((a, b) => b.sequence - a.sequence);

    if (filters?.offset) {
      result = result.slice(filters.offset);
    }
    if (filters?.limit) {
      result = result.slice(0, filters.limit);
    }

    return result;
  }

  getEventByActionId(actionId: string): CausalEvent | null {
    const index = this.byActionId.get(actionId);
    return index === undefined ? null : this.events[index];
  }

  getEventBySequence(sequence: number): CausalEvent | null {
    return this.events.find((e) => e.sequence === sequence) ?? null;
  }

  getAuditRecords(filters?: AuditFilters): AuditRecord[] {
    let result = [...this.audit];

    if (filters?.action_id) {
      result = result.filter((r) => r.action_id === filters.action_id);
    }
    if (filters?.agent_id) {
      result = result.filter((r) => r.agent_id === filters.agent_id);
    }
    if (filters?.kind) {
      result = result.filter((r) => r.kind === filters.kind);
    }

    result.sort((a, b) => b.id - a.id);

    if (filters?.limit) {
      result = result.slice(0, filters.limit);
    }

    return result;
  }

  async verifyChain(): Promise<ChainVerificationResult> {
    return verifyEvents(this.events, this.getChainStats());
  }

  getChainStats(): ChainStats {
    return computeStats(this.events, this.audit);
  }

  getEventCount(): number {
    return this.events.length;
  }

  getLastSequence(): number {
    return this.sequence;
  }

  close(): void {
    // no-op
  }
}
