import type { EventStoreAdapter } from "./adapters/types.js";
import type { AuditSink } from "./sinks/types.js";
import type { AuditRecord, NewAuditRecord } from "./types.js";
import { LogError } from "./errors.js";

/**
 * Side log of decisions. Records are persisted in the store first, then
 * fanned out to sinks. A failing sink is reported on stderr and skipped.
 */
export class AuditTrail {
  private store: EventStoreAdapter;
  private sinks: AuditSink[];

  constructor(store: EventStoreAdapter, sinks: AuditSink[] = []) {
    this.store = store;
    this.sinks = sinks;
  }

  async record(entry: NewAuditRecord): Promise<AuditRecord> {
    let saved: AuditRecord;
    try {
      saved = await this.store.appendAudit(entry);
    } catch (err) {
      throw new LogError(`Audit append failed for ${entry.kind}`, "STORE_UNAVAILABLE", {
        cause: err,
      });
    }

    const results = await Promise.allSettled(this.sinks.map((sink) => sink.emit(saved)));
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        console.error(`[causeway] ${this.sinks[i].name} sink error: ${result.reason}`);
      }
    });

    return saved;
  }

  getSinks(): readonly AuditSink[] {
    return this.sinks;
  }

  async close(): Promise<void> {
    await Promise.allSettled(
      this.sinks.map(async (sink) => {
        if (sink.flush) await sink.flush();
        if (sink.close) await sink.close();
      })
    );
  }
}
