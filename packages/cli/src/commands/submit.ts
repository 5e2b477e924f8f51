import chalk from "chalk";
import { randomBytes } from "node:crypto";
import { readFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  Causeway,
  CausewayError,
  SqliteAdapter,
  createAdapter,
  createSinks,
  loadPolicyFile,
} from "@causeway/core";
import type {
  EventStoreAdapter,
  SignatureBundle,
  SignatureCollector,
  SubmissionResult,
  ValidatorSignature,
} from "@causeway/core";
import { formatStatus, formatTier } from "../utils/format.js";

export interface SubmitOptions {
  config: string;
  db?: string;
  keyRoot?: string;
  signatures?: string;
  json?: boolean;
}

/**
 * Run one proposal file through the full pipeline against a persistent
 * store. Signatures come from a bundle file; without one, collection
 * yields nothing and any passing proposal is abandoned.
 */
export async function submitCommand(
  file: string,
  options: SubmitOptions
): Promise<SubmissionResult | undefined> {
  const keyRoot = options.keyRoot ?? process.env.CAUSEWAY_KEY_ROOT;
  if (!keyRoot) {
    console.error(chalk.red("✗") + " A key root is required (--key-root or CAUSEWAY_KEY_ROOT)");
    process.exitCode = 1;
    return undefined;
  }

  let raw: unknown;
  let bundle: SignatureBundle;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
    bundle = options.signatures
      ? parseSignatureBundle(JSON.parse(readFileSync(options.signatures, "utf-8")))
      : { signatures: [], aggregate_proof: "" };
  } catch (err) {
    console.error(chalk.red("✗") + ` ${errorMessage(err)}`);
    process.exitCode = 1;
    return undefined;
  }

  const policy = loadPolicyFile(options.config);
  const adapter: EventStoreAdapter = options.db
    ? new SqliteAdapter(options.db)
    : createAdapter(policy.storage ?? { adapter: "sqlite" }, dirname(options.config));
  const collector: SignatureCollector = { collect: async () => bundle };

  let causeway: Causeway | undefined;
  try {
    causeway = new Causeway({
      policy,
      adapter,
      sinks: createSinks(policy.sinks ?? []),
      collector,
      // Governance is not reachable from a one-shot submit
      governanceToken: process.env.CAUSEWAY_GOVERNANCE_TOKEN ?? randomBytes(32).toString("hex"),
      keyRoot,
    });

    const result = await causeway.submit(raw);
    if (options.json) {
      console.log(JSON.stringify(toJson(result), null, 2));
    } else {
      printResult(result);
    }
    if (result.status !== "authorized") process.exitCode = 1;
    return result;
  } catch (err) {
    if (!(err instanceof CausewayError)) throw err;
    if (options.json) {
      console.log(JSON.stringify({ error: err.code, message: err.message }, null, 2));
    } else {
      console.error(chalk.red("✗") + ` ${err.code}: ${err.message}`);
    }
    process.exitCode = 1;
    return undefined;
  } finally {
    if (causeway) {
      await causeway.close();
    } else {
      adapter.close();
    }
  }
}

export function parseSignatureBundle(value: unknown): SignatureBundle {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error("Signature bundle must be a JSON object");
  }
  const signatures: unknown = Reflect.get(value, "signatures");
  const aggregateProof: unknown = Reflect.get(value, "aggregate_proof");
  if (!Array.isArray(signatures)) {
    throw new Error("Signature bundle 'signatures' must be an array");
  }
  if (typeof aggregateProof !== "string") {
    throw new Error("Signature bundle 'aggregate_proof' must be a string");
  }
  return {
    signatures: signatures.map((entry: unknown, i): ValidatorSignature => {
      if (typeof entry !== "object" || entry === null) {
        throw new Error(`Signature #${i} must be an object`);
      }
      const signerId: unknown = Reflect.get(entry, "signer_id");
      const signature: unknown = Reflect.get(entry, "signature");
      if (typeof signerId !== "string" || typeof signature !== "string") {
        throw new Error(`Signature #${i} needs string 'signer_id' and 'signature'`);
      }
      return { signer_id: signerId, signature };
    }),
    aggregate_proof: aggregateProof,
  };
}

function toJson(result: SubmissionResult): Record<string, unknown> {
  return {
    status: result.status,
    action_id: result.action_id,
    replayed: result.replayed,
    sequence: result.event.sequence,
    scope: result.event.scope,
    decision: result.decision,
    ...(result.authorization ? { authorization: result.authorization } : {}),
    ...(result.unmet ? { unmet: result.unmet.message } : {}),
  };
}

function printResult(result: SubmissionResult): void {
  const { event, decision } = result;
  const replay = result.replayed ? chalk.dim(" (replayed)") : "";

  console.log();
  console.log(`  ${formatStatus(result.status)}${replay}  ${chalk.dim(result.action_id.slice(0, 12))}`);
  console.log(chalk.dim("  " + "━".repeat(60)));
  console.log(`  Event:    #${event.sequence} ${event.scope} ${event.event_type} nonce ${event.nonce}`);
  console.log(`  Tier:     ${formatTier(decision.risk_tier)} ${chalk.dim(`(${decision.required_threshold} signers)`)}`);

  for (const step of decision.steps) {
    const icon = step.passed ? chalk.green("✓") : chalk.red("✗");
    console.log(`            ${icon} ${step.check.padEnd(32)} ${chalk.dim(step.reason)}`);
  }

  if (result.authorization) {
    console.log(`  Signers:  ${result.authorization.signer_count}`);
    console.log(`  Binding:  ${chalk.dim(result.authorization.commitment.binding_digest.slice(0, 16))}`);
  }
  if (result.unmet) {
    console.log(chalk.yellow(`  ${result.unmet.message}`));
  }
  console.log();
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
