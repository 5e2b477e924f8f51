#!/usr/bin/env tsx
import { program } from "commander";
import { DEFAULT_DB_PATH } from "@causeway/core";
import { initCommand } from "./commands/init.js";
import { validateCommand } from "./commands/validate.js";
import { submitCommand } from "./commands/submit.js";
import { verifyCommand } from "./commands/verify.js";
import { logCommand } from "./commands/log.js";
import { exportCommand } from "./commands/export.js";
import { doctorCommand } from "./commands/doctor.js";
import { replayCommand } from "./commands/replay.js";

program
  .name("causeway")
  .description(
    "Policy gate between autonomous agents and threshold signers.\nCausal event log, risk-tiered signature thresholds and a tamper-evident history."
  )
  .version("0.1.0");

program
  .command("init")
  .description("Create a policy.yaml file and .causeway/ directory")
  .option("--force", "Overwrite existing policy.yaml")
  .action(initCommand);

program
  .command("validate")
  .description("Validate a policy file")
  .option("--config <path>", "Path to policy.yaml", "./policy.yaml")
  .action(validateCommand);

program
  .command("submit <file>")
  .description("Run a proposal (JSON file) through admission, logging, evaluation and signing")
  .option("--config <path>", "Path to policy.yaml", "./policy.yaml")
  .option("--db <path>", "Path to SQLite database (overrides the policy's storage)")
  .option("--key-root <hex>", "Registered validator key root (defaults to CAUSEWAY_KEY_ROOT)")
  .option("--signatures <path>", "Signature bundle (JSON) returned by the validators")
  .option("--json", "Output as JSON")
  .action(async (file: string, opts) => {
    await submitCommand(file, opts);
  });

program
  .command("verify")
  .description("Verify history integrity (hash chains per scope)")
  .option("--db <path>", "Path to SQLite database", DEFAULT_DB_PATH)
  .option("--json", "Output as JSON")
  .action(verifyCommand);

program
  .command("log")
  .description("Query the event log or the audit records")
  .option("--db <path>", "Path to SQLite database", DEFAULT_DB_PATH)
  .option("--scope <scope>", "Filter events by causal scope")
  .option("--agent <id>", "Filter by agent ID")
  .option("--type <event_type>", "Filter events by type")
  .option("--audit", "Show audit records instead of events")
  .option("--kind <kind>", "Filter audit records by kind")
  .option("--limit <n>", "Max results", "20")
  .action(logCommand);

program
  .command("export")
  .description("Export the event log or the audit records")
  .requiredOption("--format <format>", "Export format: json or csv")
  .option("--db <path>", "Path to SQLite database", DEFAULT_DB_PATH)
  .option("--audit", "Export audit records instead of events")
  .option("--output <path>", "Output file path (defaults to stdout)")
  .action(exportCommand);

program
  .command("replay")
  .description("Re-evaluate recorded decisions against another policy")
  .option("--config <path>", "Path to the new policy.yaml", "./policy.yaml")
  .option("--db <path>", "Path to SQLite database", DEFAULT_DB_PATH)
  .action(replayCommand);

program
  .command("doctor")
  .description("Check Causeway health: policy, database, history integrity, keys")
  .option("--config <path>", "Path to policy.yaml", "./policy.yaml")
  .option("--db <path>", "Path to SQLite database", DEFAULT_DB_PATH)
  .action(doctorCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
