import chalk from "chalk";
import { existsSync, writeFileSync } from "node:fs";
import { SqliteAdapter } from "@causeway/core";
import type { AuditRecord, CausalEvent } from "@causeway/core";
import { toCsv } from "../utils/format.js";

export const EVENT_COLUMNS = [
  "sequence",
  "action_id",
  "agent_id",
  "scope",
  "event_type",
  "nonce",
  "timestamp",
  "value",
  "recipient",
  "payload_digest",
  "prev_hash",
  "event_hash",
] as const satisfies readonly (keyof CausalEvent)[];

export const AUDIT_COLUMNS = [
  "id",
  "action_id",
  "agent_id",
  "scope",
  "kind",
  "detail",
  "timestamp",
] as const satisfies readonly (keyof AuditRecord)[];

export function exportCommand(options: {
  format: string;
  db: string;
  audit?: boolean;
  output?: string;
}): void {
  if (!existsSync(options.db)) {
    console.error(chalk.red("No event database found at: " + options.db));
    process.exitCode = 1;
    return;
  }
  if (options.format !== "json" && options.format !== "csv") {
    console.error(chalk.red(`Unknown format: ${options.format}. Use 'json' or 'csv'.`));
    process.exitCode = 1;
    return;
  }

  const store = new SqliteAdapter(options.db);
  // Oldest first, as appended
  const events = store.getEvents().reverse();
  const records = store.getAuditRecords().reverse();
  store.close();

  let content: string;
  let count: number;
  if (options.audit) {
    content = options.format === "json" ? JSON.stringify(records, null, 2) : toCsv(AUDIT_COLUMNS, records);
    count = records.length;
  } else {
    content = options.format === "json" ? JSON.stringify(events, null, 2) : toCsv(EVENT_COLUMNS, events);
    count = events.length;
  }

  if (options.output) {
    writeFileSync(options.output, content);
    console.error(chalk.green(`Exported ${count} ${options.audit ? "audit records" : "events"} to ${options.output}`));
  } else {
    console.log(content);
  }
}
