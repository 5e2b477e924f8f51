import chalk from "chalk";
import { existsSync } from "node:fs";
import { GOVERNANCE_SCOPE, PolicyEngine, SqliteAdapter, loadPolicyFile } from "@causeway/core";
import type { CausalEvent, EventStoreAdapter, Policy, Verdict } from "@causeway/core";
import { formatVerdict } from "../utils/format.js";

export interface ReplayChange {
  event: CausalEvent;
  recorded: Verdict;
  replayed: Verdict;
  reason?: string;
}

export interface ReplayReport {
  total: number;
  changes: ReplayChange[];
}

/**
 * Re-evaluate every recorded decision against another policy, each event
 * against its scope as it stood before the event.
 */
export function replayHistory(
  store: EventStoreAdapter,
  policy: Policy,
  engine: PolicyEngine = new PolicyEngine()
): ReplayReport {
  const events = store.getEvents().reverse();
  const changes: ReplayChange[] = [];
  let total = 0;

  for (const event of events) {
    if (event.scope === GOVERNANCE_SCOPE) continue;

    const recorded = recordedVerdict(store, event.action_id);
    if (!recorded) continue;
    total++;

    const decision = engine.evaluate(store.getChain(event.scope, event.sequence), policy, event);
    if (decision.verdict !== recorded) {
      changes.push({ event, recorded, replayed: decision.verdict, reason: decision.violation?.reason });
    }
  }

  return { total, changes };
}

function recordedVerdict(store: EventStoreAdapter, actionId: string): Verdict | undefined {
  for (const record of store.getAuditRecords({ action_id: actionId })) {
    if (record.kind === "policy_passed") return "PASS";
    if (record.kind === "policy_rejected") return "FAIL";
  }
  return undefined;
}

export function replayCommand(options: { config: string; db: string }): void {
  if (!existsSync(options.db)) {
    console.error(chalk.red("No event database found at: " + options.db));
    process.exitCode = 1;
    return;
  }

  const policy = loadPolicyFile(options.config);
  const store = new SqliteAdapter(options.db);
  const { total, changes } = replayHistory(store, policy);
  store.close();

  for (const change of changes) {
    const { event } = change;
    console.log(
      `  #${event.sequence} ${chalk.dim(`${event.scope} ${event.event_type}`)} ` +
        `${formatVerdict(change.recorded)} → ${formatVerdict(change.replayed)}` +
        (change.reason ? chalk.dim(` (${change.reason})`) : "")
    );
  }

  console.log();
  if (changes.length === 0) {
    console.log(chalk.green(`✓ No changes: all ${total} decisions hold under '${policy.name}'.`));
  } else {
    console.log(chalk.yellow(`⚠ ${changes.length}/${total} decisions would change under '${policy.name}'.`));
  }
}
