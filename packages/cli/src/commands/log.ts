import chalk from "chalk";
import { existsSync } from "node:fs";
import { AUDIT_KINDS, SqliteAdapter } from "@causeway/core";
import type { AuditKind, AuditRecord, CausalEvent } from "@causeway/core";
import { formatAuditKind } from "../utils/format.js";

export interface LogOptions {
  db: string;
  scope?: string;
  agent?: string;
  type?: string;
  audit?: boolean;
  kind?: string;
  limit: string;
}

export function logCommand(options: LogOptions): void {
  if (!existsSync(options.db)) {
    console.log(chalk.yellow("No event database found at: " + options.db));
    return;
  }

  const kind = options.kind === undefined ? undefined : AUDIT_KINDS.find((k) => k === options.kind);
  if (options.kind !== undefined && kind === undefined) {
    console.error(chalk.red(`Unknown audit kind: ${options.kind}. Use one of: ${AUDIT_KINDS.join(", ")}`));
    process.exitCode = 1;
    return;
  }

  const store = new SqliteAdapter(options.db);
  const limit = parseInt(options.limit, 10);

  if (options.audit) {
    const records = store.getAuditRecords({ agent_id: options.agent, kind, limit });
    printHeader("Audit Records", records.length);
    for (const record of records) printAuditRecord(record);
  } else {
    const events = store.getEvents({
      scope: options.scope,
      agent_id: options.agent,
      event_type: options.type,
      limit,
    });
    printHeader("Event Log", events.length);
    for (const event of events) {
      const latest = store.getAuditRecords({ action_id: event.action_id, limit: 1 });
      printEvent(event, latest[0]?.kind);
    }
  }

  console.log();
  store.close();
}

function printHeader(title: string, count: number): void {
  if (count === 0) {
    console.log(chalk.dim("  Nothing found matching filters."));
    return;
  }
  console.log(chalk.bold(`\n  Causeway ${title} (${count})`));
  console.log(chalk.dim("  " + "━".repeat(60)));
}

function printEvent(event: CausalEvent, outcome: AuditKind | undefined): void {
  const time = new Date(event.timestamp).toISOString();
  const value = event.value === undefined ? "-" : String(event.value);
  console.log(
    `  ${chalk.dim(time)}  #${String(event.sequence).padEnd(5)} ${formatAuditKind(outcome)}  ` +
      `${chalk.white(event.event_type.padEnd(20))} ${event.agent_id.padEnd(16)} ${value.padStart(10)}  ` +
      chalk.dim(event.event_hash.slice(0, 12))
  );
}

function printAuditRecord(record: AuditRecord): void {
  const time = new Date(record.timestamp).toISOString();
  console.log(`  ${chalk.dim(time)}  ${formatAuditKind(record.kind)}  ${record.agent_id.padEnd(16)} ${chalk.dim(record.action_id.slice(0, 12))}`);
  const violation = record.detail.violation;
  if (typeof violation === "object" && violation !== null) {
    const reason: unknown = Reflect.get(violation, "reason");
    if (typeof reason === "string") console.log(chalk.red(`           ${reason}`));
  }
  const reason = record.detail.reason;
  if (typeof reason === "string") console.log(chalk.dim(`           ${reason}`));
}
