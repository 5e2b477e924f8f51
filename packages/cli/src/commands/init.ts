import chalk from "chalk";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";

export const DEFAULT_POLICY = `# Causeway Policy Configuration
#
# Every proposal is logged first, then checked in order: nonce, timestamp,
# then the conditions below. The first failing condition rejects it.
# Signer thresholds are fixed per risk tier (Low 2, Medium 3, High 5) and
# cannot be set here.

version: "1"
name: "default"
scope: agent

limits:
  max_payload_bytes: 4096
  max_proposals_per_minute: 10
  skew_tolerance_ms: 500
  daily_outflow_window_s: 86400
  nominal_value: 1000
  signature_deadline_ms: 30000

risk:
  medium_at: 100
  high_at: 1000

conditions:
  # Cap total SignatureRequest value over the rolling window
  - id: daily-cap
    type: MaxDailyOutflow
    cap: 10000

  # At least a minute between two signature requests
  - id: request-cooldown
    type: MinTimeBetweenActions
    action_type: SignatureRequest
    min_seconds: 60

  # No other action type in the 30s around a request
  - id: no-interleaving
    type: NoConcurrentRequests
    window_seconds: 30

  # Large transfers need two address verifications on record
  - id: verify-large-transfers
    type: MinVerificationCount
    threshold_amount: 5000
    action_type: AddressVerification
    required_count: 2

  - id: known-recipients
    type: AddressAllowlist
    allowed_prefixes: ["0x"]

storage:
  adapter: sqlite
  path: ./.causeway/events.sqlite

sinks:
  - type: stdout
    events: [policy_rejected, threshold_unmet, governance_rejected]
`;

export function initCommand(options: { force?: boolean }): void {
  const configPath = "./policy.yaml";
  const dataDir = "./.causeway";

  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
    console.log(chalk.green("  Created .causeway/ directory"));
  }

  if (existsSync(configPath) && !options.force) {
    console.log(chalk.yellow("  policy.yaml already exists (use --force to overwrite)"));
  } else {
    writeFileSync(configPath, DEFAULT_POLICY);
    console.log(chalk.green("  Created policy.yaml with default conditions"));
  }

  const gitignorePath = "./.gitignore";
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, "utf-8");
    if (!content.includes(".causeway")) {
      writeFileSync(gitignorePath, content.trimEnd() + "\n.causeway/\n");
      console.log(chalk.green("  Added .causeway/ to .gitignore"));
    }
  }

  console.log();
  console.log(chalk.bold("Causeway initialized."));
  console.log();
  console.log("  Edit " + chalk.cyan("policy.yaml") + " to configure your conditions.");
  console.log("  Run " + chalk.cyan("causeway submit proposal.json") + " to run a proposal through the pipeline.");
  console.log("  Run " + chalk.cyan("causeway verify") + " to check history integrity.");
}
