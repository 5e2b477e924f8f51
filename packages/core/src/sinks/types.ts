import type { AuditKind, AuditRecord } from "../types.js";

/**
 * A sink receives audit records and forwards them to external systems.
 * Implement this to add new log drains (webhook, S3, Kafka, etc.).
 */
export interface AuditSink {
  /** Human-readable name for diagnostics. */
  readonly name: string;

  /** Emit an audit record to the sink. */
  emit(record: AuditRecord): Promise<void>;

  /** Flush any buffered records. Called on graceful shutdown. */
  flush?(): Promise<void>;

  /** Release resources. */
  close?(): Promise<void>;
}

export type AuditSeverity = "info" | "warn" | "critical";

export const AUDIT_SEVERITIES: readonly AuditSeverity[] = ["info", "warn", "critical"];

/**
 * Outcomes that let an action through are info; refusals are warn.
 * Missed signer thresholds and rejected governance calls are critical.
 */
export const SEVERITY_BY_KIND: Readonly<Record<AuditKind, AuditSeverity>> = Object.freeze({
  policy_passed: "info",
  signatures_collected: "info",
  ordering_rejected: "warn",
  policy_rejected: "warn",
  threshold_unmet: "critical",
  governance_rejected: "critical",
});

export interface SinkFilter {
  /** Only emit records of these kinds. */
  events?: AuditKind[];
  /** Drop records below this severity. */
  minSeverity?: AuditSeverity;
}

/** Record shape sinks put on the wire. */
export type SinkPayload = AuditRecord & { severity: AuditSeverity };

export function toSinkPayload(record: AuditRecord): SinkPayload {
  return { ...record, severity: SEVERITY_BY_KIND[record.kind] };
}

export function createSinkFilter(filter: SinkFilter): (record: AuditRecord) => boolean {
  const kinds = filter.events ? new Set(filter.events) : undefined;
  const floor = AUDIT_SEVERITIES.indexOf(filter.minSeverity ?? "info");
  return (record) =>
    (!kinds || kinds.has(record.kind)) &&
    AUDIT_SEVERITIES.indexOf(SEVERITY_BY_KIND[record.kind]) >= floor;
}

export type { SinkConfig } from "../types.js";
