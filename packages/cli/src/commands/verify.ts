import chalk from "chalk";
import { existsSync } from "node:fs";
import { SqliteAdapter } from "@causeway/core";

export async function verifyCommand(options: { db: string; json?: boolean }): Promise<void> {
  if (!existsSync(options.db)) {
    if (options.json) {
      console.log(JSON.stringify({ valid: true, total_events: 0, message: "No event database found" }));
    } else {
      console.log(chalk.yellow("No event database found at: " + options.db));
      console.log("Run " + chalk.cyan("causeway init") + " to get started.");
    }
    return;
  }

  const store = new SqliteAdapter(options.db);
  const result = await store.verifyChain();

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    store.close();
    if (!result.valid) process.exitCode = 1;
    return;
  }

  console.log(chalk.bold("\n  Causeway History Verification"));
  console.log(chalk.dim("  " + "━".repeat(40)));

  const events = store.getEvents({ limit: 100 }).reverse();
  for (const event of events) {
    const broken = !result.valid && result.broken_at_sequence === event.sequence;
    const icon = broken ? chalk.red("✗") : chalk.green("✓");
    const seq = chalk.dim(`#${event.sequence.toString().padStart(4)}`);
    const link = event.prev_hash === null ? chalk.dim("[GENESIS]") : chalk.dim(`← ${event.prev_hash.slice(0, 8)}`);
    const hash = chalk.dim(event.event_hash.slice(0, 12) + "...");

    console.log(`  ${seq}  ${icon}  ${link.padEnd(22)}  ${event.scope.padEnd(16)} ${event.event_type.padEnd(20)} ${hash}`);
    if (broken) {
      console.log(chalk.red(`         ↑ CHAIN BROKEN: ${result.broken_reason}`));
    }
  }

  console.log(chalk.dim("  " + "━".repeat(40)));
  if (result.valid) {
    console.log(chalk.green(`\n  Result: VALID, ${result.verified_events} events verified`));
  } else {
    console.log(chalk.red(`\n  Result: INVALID, chain broken at event #${result.broken_at_sequence}`));
  }

  const s = result.stats;
  console.log(chalk.dim(`  Total: ${s.total_events} | Scopes: ${s.scopes} | Agents: ${s.agents}`));
  console.log(
    chalk.dim(
      `  Passed: ${s.audit.policy_passed} | Rejected: ${s.audit.policy_rejected} | ` +
        `Signed: ${s.audit.signatures_collected} | Unmet: ${s.audit.threshold_unmet}`
    )
  );
  for (const [scope, root] of Object.entries(result.scope_roots)) {
    console.log(chalk.dim(`  Root ${scope}: ${root.slice(0, 16)}...`));
  }
  console.log(chalk.dim(`  Verification hash: ${result.verification_hash.slice(0, 16)}...`));
  console.log();

  store.close();
  if (!result.valid) process.exitCode = 1;
}
