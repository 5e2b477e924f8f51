import chalk from "chalk";
import { BUILTIN_CONDITION_TYPES, isBuiltinCondition, loadPolicyFile } from "@causeway/core";

export function validateCommand(options: { config: string }): void {
  try {
    const policy = loadPolicyFile(options.config);

    console.log(chalk.green("✓") + ` ${options.config} is valid\n`);
    console.log(`  Name:       ${chalk.cyan(policy.name)}`);
    console.log(`  Version:    ${policy.version}`);
    console.log(`  Scope:      ${policy.scope}`);
    console.log(`  Risk:       Medium at ${policy.risk.medium_at}, High at ${policy.risk.high_at}`);
    console.log(`  Conditions: ${policy.conditions.length}`);

    const kinds: Record<string, number> = {};
    for (const condition of policy.conditions) {
      kinds[condition.type] = (kinds[condition.type] ?? 0) + 1;
    }
    for (const [kind, count] of Object.entries(kinds)) {
      const color = BUILTIN_CONDITION_TYPES.has(kind) ? chalk.green : chalk.magenta;
      console.log(`              ${color(kind)}: ${count}`);
    }

    console.log(`  Storage:    ${policy.storage?.adapter ?? "memory"}`);
    if (policy.sinks && policy.sinks.length > 0) {
      console.log(`  Sinks:      ${policy.sinks.length}`);
      for (const sink of policy.sinks) {
        console.log(`              ${chalk.blue(sink.type)}`);
      }
    }

    if (policy.extends && policy.extends.length > 0) {
      console.log(`  Extends:    ${policy.extends.join(", ")}`);
    }

    const warnings: string[] = [];

    const custom = policy.conditions.filter((c) => !BUILTIN_CONDITION_TYPES.has(c.type));
    for (const condition of custom) {
      warnings.push(`Condition "${condition.id}" (${condition.type}) needs a registered plugin or every proposal fails`);
    }

    for (const condition of policy.conditions.filter(isBuiltinCondition)) {
      if (condition.type === "AddressAllowlist" && condition.allowed_prefixes.length === 0) {
        warnings.push(`Condition "${condition.id}" has no allowed prefixes and rejects every restricted action`);
      }
      if (condition.type === "MaxDailyOutflow" && condition.cap < policy.risk.medium_at) {
        warnings.push(`Condition "${condition.id}" caps outflow below the Medium tier; Medium and High are unreachable`);
      }
    }

    if (warnings.length > 0) {
      console.log();
      for (const w of warnings) {
        console.log(chalk.yellow("⚠ ") + w);
      }
    }
  } catch (err) {
    console.error(chalk.red("✗") + ` Invalid policy: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}
