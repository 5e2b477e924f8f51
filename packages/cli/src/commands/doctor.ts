import chalk from "chalk";
import { existsSync } from "node:fs";
import { BUILTIN_CONDITION_TYPES, SqliteAdapter, assertKeyRoot, loadPolicyFile } from "@causeway/core";

export async function doctorCommand(options: { config: string; db: string }): Promise<void> {
  let hasErrors = false;

  try {
    const policy = loadPolicyFile(options.config);
    console.log(chalk.green("✓") + ` Policy: ${options.config} loaded (${policy.conditions.length} conditions)`);
    const custom = policy.conditions.filter((c) => !BUILTIN_CONDITION_TYPES.has(c.type));
    if (custom.length > 0) {
      console.log(chalk.yellow("○") + ` Policy: ${custom.length} custom condition(s) need plugins at runtime`);
    }
  } catch (err) {
    console.log(chalk.red("✗") + ` Policy: ${err instanceof Error ? err.message : String(err)}`);
    hasErrors = true;
  }

  if (existsSync(options.db)) {
    try {
      const store = new SqliteAdapter(options.db);
      console.log(chalk.green("✓") + ` Storage: SQLite connected (${store.getEventCount()} events)`);

      const verification = await store.verifyChain();
      if (verification.valid) {
        console.log(chalk.green("✓") + ` History: Integrity verified (${verification.verified_events} events)`);
      } else {
        console.log(chalk.red("✗") + ` History: ${verification.broken_reason}`);
        hasErrors = true;
      }

      store.close();
    } catch (err) {
      console.log(chalk.red("✗") + ` Storage: ${err instanceof Error ? err.message : String(err)}`);
      hasErrors = true;
    }
  } else {
    console.log(chalk.yellow("○") + ` Storage: No database at ${options.db} (will be created on first use)`);
  }

  const keyRoot = process.env.CAUSEWAY_KEY_ROOT;
  if (keyRoot === undefined) {
    console.log(chalk.yellow("○") + " Key root: CAUSEWAY_KEY_ROOT not set (pass --key-root to submit)");
  } else {
    try {
      assertKeyRoot(keyRoot);
      console.log(chalk.green("✓") + ` Key root: ${keyRoot.slice(0, 16)}...`);
    } catch (err) {
      console.log(chalk.red("✗") + ` Key root: ${err instanceof Error ? err.message : String(err)}`);
      hasErrors = true;
    }
  }

  if (process.env.CAUSEWAY_GOVERNANCE_TOKEN) {
    console.log(chalk.green("✓") + " Governance: token configured");
  } else {
    console.log(chalk.yellow("○") + " Governance: CAUSEWAY_GOVERNANCE_TOKEN not set (governance disabled)");
  }

  console.log();
  if (hasErrors) {
    console.log(chalk.red("Issues found. Fix the errors above."));
    process.exitCode = 1;
  } else {
    console.log(chalk.green("All checks passed."));
  }
}
