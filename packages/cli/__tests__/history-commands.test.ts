import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import Database from "better-sqlite3";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Causeway, SqliteAdapter, loadPolicyConfig, merkleRoot } from "@causeway/core";
import { verifyCommand } from "../src/commands/verify.js";
import { logCommand } from "../src/commands/log.js";
import { AUDIT_COLUMNS, exportCommand } from "../src/commands/export.js";
import { doctorCommand } from "../src/commands/doctor.js";
import { validateCommand } from "../src/commands/validate.js";

const KEY_ROOT = "ab".repeat(32);
const T = 1_700_000_000_000;
const OPEN_POLICY = 'version: "1"\nname: open\n';

let dir: string;
let db: string;

function printed(): string[] {
  return vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
}

function firstError(): string {
  return String(vi.mocked(console.error).mock.calls[0]?.[0]);
}

async function seed(): Promise<void> {
  const causeway = new Causeway({
    policy: loadPolicyConfig(OPEN_POLICY),
    adapter: new SqliteAdapter(db),
    collector: {
      collect: async () => ({
        signatures: [
          { signer_id: "v1", signature: "sig-1" },
          { signer_id: "v2", signature: "sig-2" },
        ],
        aggregate_proof: "proof",
      }),
    },
    governanceToken: "test-secret",
    keyRoot: KEY_ROOT,
  });
  for (const nonce of [1, 2]) {
    await causeway.submit({
      agent_id: "agent-1",
      event_type: "SignatureRequest",
      nonce,
      timestamp: T + nonce,
      payload: `transfer-${nonce}`,
      value: 50,
      recipient: "0xabc",
    });
  }
  await causeway.close();
}

function tamper(): void {
  const raw = new Database(db);
  raw.prepare("UPDATE events SET value = 999 WHERE sequence = 1").run();
  raw.close();
}

beforeEach(async () => {
  dir = mkdtempSync(join(tmpdir(), "causeway-history-"));
  db = join(dir, "events.sqlite");
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  await seed();
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  process.exitCode = undefined;
  rmSync(dir, { recursive: true, force: true });
});

describe("verifyCommand", () => {
  test("reports a valid history with its scope roots as JSON", async () => {
    await verifyCommand({ db, json: true });

    const result = JSON.parse(printed()[0]);
    const store = new SqliteAdapter(db);
    const root = merkleRoot(store.getChain("agent-1").map((e) => e.event_hash));
    store.close();

    expect(result.valid).toBe(true);
    expect(result.total_events).toBe(2);
    expect(result.scope_roots).toEqual({ "agent-1": root });
    expect(process.exitCode).toBeUndefined();
  });

  test("a tampered store fails with exit code 1", async () => {
    tamper();

    await verifyCommand({ db, json: true });

    const result = JSON.parse(printed()[0]);
    expect(result.valid).toBe(false);
    expect(result.broken_at_sequence).toBe(1);
    expect(process.exitCode).toBe(1);
  });

  test("the table view marks the broken event", async () => {
    tamper();

    await verifyCommand({ db });

    expect(printed().some((line) => line.includes("CHAIN BROKEN: Event hash mismatch at event #1"))).toBe(true);
    expect(process.exitCode).toBe(1);
  });

  test("a missing database is not an error", async () => {
    await verifyCommand({ db: join(dir, "none.sqlite"), json: true });

    expect(JSON.parse(printed()[0])).toEqual({
      valid: true,
      total_events: 0,
      message: "No event database found",
    });
    expect(process.exitCode).toBeUndefined();
  });
});

describe("logCommand", () => {
  test("lists events", () => {
    logCommand({ db, limit: "20" });
    expect(printed().some((line) => line.includes("Causeway Event Log (2)"))).toBe(true);
  });

  test("lists audit records of one kind", () => {
    logCommand({ db, limit: "20", audit: true, kind: "signatures_collected" });
    expect(printed().some((line) => line.includes("Causeway Audit Records (2)"))).toBe(true);
  });

  test("refuses an unknown audit kind", () => {
    logCommand({ db, limit: "20", audit: true, kind: "nope" });

    expect(firstError()).toContain("Unknown audit kind: nope");
    expect(process.exitCode).toBe(1);
  });
});

describe("exportCommand", () => {
  test("writes events oldest first as JSON", () => {
    const output = join(dir, "events.json");
    exportCommand({ db, format: "json", output });

    const events = JSON.parse(readFileSync(output, "utf-8"));
    expect(events.map((e: { sequence: number }) => e.sequence)).toEqual([1, 2]);
    expect(process.exitCode).toBeUndefined();
  });

  test("writes audit records as CSV", () => {
    const output = join(dir, "audit.csv");
    exportCommand({ db, format: "csv", audit: true, output });

    const lines = readFileSync(output, "utf-8").split("\n");
    expect(lines[0]).toBe(AUDIT_COLUMNS.join(","));
    // policy_passed and signatures_collected for each of the two events
    expect(lines).toHaveLength(5);
  });

  test("an unknown format exits 1 and writes nothing", () => {
    const output = join(dir, "out.xml");
    exportCommand({ db, format: "xml", output });

    expect(existsSync(output)).toBe(false);
    expect(process.exitCode).toBe(1);
  });

  test("a missing database exits 1", () => {
    exportCommand({ db: join(dir, "none.sqlite"), format: "json" });
    expect(process.exitCode).toBe(1);
  });
});

describe("doctorCommand", () => {
  beforeEach(() => {
    writeFileSync(join(dir, "policy.yaml"), OPEN_POLICY);
    vi.stubEnv("CAUSEWAY_KEY_ROOT", KEY_ROOT);
    vi.stubEnv("CAUSEWAY_GOVERNANCE_TOKEN", "test-secret");
  });

  test("passes on a healthy setup", async () => {
    await doctorCommand({ config: join(dir, "policy.yaml"), db });

    expect(printed().some((line) => line.includes("All checks passed."))).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  test("flags a tampered history", async () => {
    tamper();

    await doctorCommand({ config: join(dir, "policy.yaml"), db });

    expect(printed().some((line) => line.includes("Issues found. Fix the errors above."))).toBe(true);
    expect(process.exitCode).toBe(1);
  });

  test("flags a malformed key root", async () => {
    vi.stubEnv("CAUSEWAY_KEY_ROOT", "not-hex");

    await doctorCommand({ config: join(dir, "policy.yaml"), db });
    expect(process.exitCode).toBe(1);
  });
});

describe("validateCommand", () => {
  test("an invalid policy exits 1", () => {
    writeFileSync(join(dir, "bad.yaml"), 'version: "1"\nname: bad\nthresholds:\n  Low: 1\n');

    validateCommand({ config: join(dir, "bad.yaml") });

    expect(firstError()).toContain(
      "Invalid policy: policy.yaml: signer thresholds are fixed at startup and cannot be set by a policy"
    );
    expect(process.exitCode).toBe(1);
  });
});
