import { describe, expect, test, vi } from "vitest";
import { Causeway } from "../src/causeway.js";
import type { CausewayOptions } from "../src/causeway.js";
import { MemoryAdapter } from "../src/adapters/memory.js";
import { StdoutSink } from "../src/sinks/stdout.js";
import { AdmissionError, LogError, PolicyViolation } from "../src/errors.js";
import { loadPolicyConfig } from "../src/policy-loader.js";
import { buildCommitment, computeEvaluationDigest } from "../src/hashing.js";
import { verifyInclusion } from "../src/merkle.js";
import type { SignatureCollector } from "../src/orchestrator.js";
import type { AuditRecord, NewAuditRecord, SignatureBundle } from "../src/types.js";

const T = 1_700_000_000_000;
const KEY_ROOT = "ab".repeat(32);
const TOKEN = "test-secret";

const POLICY = `
version: "1"
name: treasury
conditions:
  - id: daily-cap
    type: MaxDailyOutflow
    cap: 1000
`;

function signers(n: number): SignatureBundle {
  return {
    signatures: Array.from({ length: n }, (_, i) => ({ signer_id: `v${i}`, signature: `sig-${i}` })),
    aggregate_proof: "proof",
  };
}

class FlakyAuditAdapter extends MemoryAdapter {
  failures = 1;

  override async appendAudit(record: NewAuditRecord): Promise<AuditRecord> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error("disk full");
    }
    return super.appendAudit(record);
  }
}

function setup(options: { signerCount?: number; yaml?: string } & Partial<CausewayOptions> = {}) {
  const collect = vi.fn(async () => signers(options.signerCount ?? 5));
  const collector: SignatureCollector = { collect };
  const lines: string[] = [];
  const causeway = new Causeway({
    policy: loadPolicyConfig(options.yaml ?? POLICY),
    collector,
    governanceToken: TOKEN,
    keyRoot: KEY_ROOT,
    sinks: [new StdoutSink({ writeFn: (line) => lines.push(line) })],
    now: () => T,
    ...options,
  });
  const kinds = () =>
    lines.map((line) => {
      const record: AuditRecord = JSON.parse(line);
      return record.kind;
    });
  return { causeway, collect, kinds };
}

function raw(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    agent_id: "agent-1",
    event_type: "SignatureRequest",
    nonce: 1,
    timestamp: T,
    payload: "transfer",
    value: 50,
    recipient: "0xabc",
    ...overrides,
  };
}

describe("Causeway SDK", () => {
  test("authorizes a passing proposal", async () => {
    const { causeway, collect, kinds } = setup();

    const result = await causeway.submit(raw());

    expect(result.status).toBe("authorized");
    expect(result.replayed).toBe(false);
    expect(result.decision.risk_tier).toBe("Low");
    expect(result.authorization?.signer_count).toBe(5);
    expect(collect).toHaveBeenCalledTimes(1);
    expect(kinds()).toEqual(["policy_passed", "signatures_collected"]);

    const auth = result.authorization;
    expect(auth && causeway.getVerifier().verify(auth)).toEqual({ valid: true });
  });

  test("rejects a policy violation but keeps the event in history", async () => {
    const { causeway, collect, kinds } = setup();

    const result = await causeway.submit(raw({ value: 1500 }));

    expect(result.status).toBe("rejected");
    expect(result.decision.violation?.condition_id).toBe("daily-cap");
    expect(result.decision.required_threshold).toBe(5);
    expect(collect).not.toHaveBeenCalled();
    expect(causeway.getAdapter().getEventCount()).toBe(1);
    expect(kinds()).toEqual(["policy_rejected"]);
  });

  test("abandons when too few validators sign", async () => {
    const { causeway, kinds } = setup({ signerCount: 1 });

    const result = await causeway.submit(raw());

    expect(result.status).toBe("abandoned");
    expect(result.unmet?.required).toBe(2);
    expect(result.unmet?.collected).toBe(1);
    expect(kinds()).toEqual(["policy_passed", "threshold_unmet"]);
  });

  test("a replayed proposal returns the earlier result without re-signing", async () => {
    const { causeway, collect } = setup();

    const first = await causeway.submit(raw());
    const again = await causeway.submit(raw());

    expect(again.replayed).toBe(true);
    expect(again.status).toBe(first.status);
    expect(again.action_id).toBe(first.action_id);
    expect(collect).toHaveBeenCalledTimes(1);
    expect(causeway.getAdapter().getEventCount()).toBe(1);
  });

  test("a replay seen by a fresh instance is answered from history", async () => {
    const adapter = new MemoryAdapter();
    const first = setup({ adapter });
    await first.causeway.submit(raw());

    const second = setup({ adapter });
    const again = await second.causeway.submit(raw());

    expect(again.replayed).toBe(true);
    expect(again.status).toBe("authorized");
    expect(second.collect).not.toHaveBeenCalled();
  });

  test("a retry after a failed audit append finishes the action", async () => {
    const adapter = new FlakyAuditAdapter();
    const { causeway, collect, kinds } = setup({ adapter });

    await expect(causeway.submit(raw())).rejects.toBeInstanceOf(LogError);
    const retried = await causeway.submit(raw());

    expect(retried.replayed).toBe(true);
    expect(retried.status).toBe("authorized");
    expect(collect).toHaveBeenCalledTimes(1);
    expect(kinds()).toEqual(["policy_passed", "signatures_collected"]);
    expect(adapter.getEventCount()).toBe(1);
  });

  test("settled submissions are not held in memory", async () => {
    const adapter = new MemoryAdapter();
    const { causeway, collect } = setup({ adapter });
    const first = await causeway.submit(raw());

    const reads = vi.spyOn(adapter, "getAuditRecords");
    const again = await causeway.submit(raw());

    expect(reads).toHaveBeenCalledWith({ action_id: first.action_id });
    expect(again.status).toBe("authorized");
    expect(again.replayed).toBe(true);
    expect(collect).toHaveBeenCalledTimes(1);
  });

  test("concurrent duplicates share one signing round", async () => {
    const { causeway, collect } = setup();

    const [first, second] = await Promise.all([causeway.submit(raw()), causeway.submit(raw())]);

    expect(first.status).toBe("authorized");
    expect(second.status).toBe("authorized");
    expect([first.replayed, second.replayed].sort()).toEqual([false, true]);
    expect(collect).toHaveBeenCalledTimes(1);
  });

  test("an abandoned action replays as abandoned", async () => {
    const { causeway, collect } = setup({ signerCount: 1 });

    await causeway.submit(raw());
    const again = await causeway.submit(raw());

    expect(again.status).toBe("abandoned");
    expect(collect).toHaveBeenCalledTimes(1);
  });

  test("evaluates against the history before the event only", async () => {
    const { causeway } = setup();

    await causeway.submit(raw({ nonce: 1, value: 600 }));
    const second = await causeway.submit(raw({ nonce: 2, value: 300, timestamp: T + 1 }));
    const third = await causeway.submit(raw({ nonce: 3, value: 300, timestamp: T + 2 }));

    expect(second.status).toBe("authorized");
    // 600 + 300 + 300 > 1000
    expect(third.status).toBe("rejected");
  });

  test("the 11th proposal in a minute never reaches the log", async () => {
    const { causeway } = setup({ yaml: 'version: "1"\nname: open\n' });

    for (let i = 1; i <= 10; i++) {
      await causeway.submit(raw({ nonce: i, timestamp: T + i }));
    }
    const error = await causeway.submit(raw({ nonce: 11, timestamp: T + 11 })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AdmissionError);
    expect(error instanceof AdmissionError && error.code).toBe("RATE_LIMITED");
    expect(causeway.getAdapter().getEventCount()).toBe(10);
  });

  test("replays of logged proposals do not use up the rate limit", async () => {
    const { causeway } = setup({ yaml: 'version: "1"\nname: open\n' });

    for (let i = 1; i <= 9; i++) {
      await causeway.submit(raw({ nonce: i, timestamp: T + i }));
    }
    const replay = await causeway.submit(raw({ nonce: 1, timestamp: T + 1 }));
    expect(replay.replayed).toBe(true);

    const tenth = await causeway.submit(raw({ nonce: 10, timestamp: T + 10 }));
    expect(tenth.replayed).toBe(false);

    const error = await causeway.submit(raw({ nonce: 11, timestamp: T + 11 })).catch((e: unknown) => e);
    expect(error instanceof AdmissionError && error.code).toBe("RATE_LIMITED");
    expect(causeway.getAdapter().getEventCount()).toBe(10);
  });

  test("ordering violations are thrown and not appended", async () => {
    const { causeway } = setup();

    await causeway.submit(raw({ nonce: 2 }));
    await expect(causeway.submit(raw({ nonce: 1, timestamp: T + 1 }))).rejects.toBeInstanceOf(PolicyViolation);
    expect(causeway.getAdapter().getEventCount()).toBe(1);
  });

  test("refuses policies with unregistered condition kinds", () => {
    expect(() =>
      setup({ yaml: 'version: "1"\nname: odd\nconditions:\n  - id: x\n    type: Mystery\n' })
    ).toThrow("Policy 'odd' uses unregistered condition types: Mystery");
  });

  test("refuses a threshold table below the fixed minimums", () => {
    expect(() => setup({ thresholds: { Low: 2, Medium: 3, High: 1 } })).toThrow(
      "Threshold for High (1) is below the fixed minimum (5)"
    );
  });

  test("a forged low tier on a large transfer fails verification", async () => {
    const { causeway } = setup({ signerCount: 2 });
    const result = await causeway.submit(raw({ value: 50 }));
    const auth = result.authorization;
    if (!auth) throw new Error("expected an authorization");
    expect(auth.risk_tier).toBe("Low");

    const forged = {
      ...auth,
      amount: 1_000_000,
      commitment: buildCommitment(1_000_000, auth.commitment.nonce, auth.recipient),
    };
    expect(causeway.getVerifier().verify(forged)).toEqual({
      valid: false,
      reason: "2 signer(s); High requires 5",
    });
  });

  test("verification follows the breakpoints of the active policy", async () => {
    const { causeway } = setup({ signerCount: 2 });
    const result = await causeway.submit(raw({ value: 50 }));
    const auth = result.authorization;
    if (!auth) throw new Error("expected an authorization");

    await causeway
      .getGovernance()
      .swapPolicy(TOKEN, loadPolicyConfig('version: "2"\nname: tight\nrisk:\n  medium_at: 10\n  high_at: 40\n'));

    expect(causeway.getVerifier().verify(auth)).toEqual({
      valid: false,
      reason: "2 signer(s); High requires 5",
    });
  });

  test("accepts custom condition plugins", async () => {
    const { causeway } = setup({
      yaml: 'version: "1"\nname: odd\nconditions:\n  - id: x\n    type: Mystery\n',
      conditions: [{ type: "Mystery", evaluate: () => ({ passed: false, reason: "never" }) }],
    });
    const result = await causeway.submit(raw());
    expect(result.status).toBe("rejected");
    expect(result.decision.violation?.reason).toBe("x: never");
  });

  test("policy swaps through governance apply to later proposals", async () => {
    const { causeway } = setup();
    const policy = loadPolicyConfig('version: "2"\nname: strict\nlimits:\n  max_payload_bytes: 4\n');

    await causeway.getGovernance().swapPolicy(TOKEN, policy);

    const error = await causeway.submit(raw()).catch((e: unknown) => e);
    expect(error instanceof AdmissionError && error.code).toBe("PAYLOAD_TOO_LARGE");
  });

  test("signatures are requested against the current key root", async () => {
    const { causeway, collect } = setup();
    const rotated = "cd".repeat(32);

    await causeway.getGovernance().updateKeyRoot(TOKEN, rotated);
    const result = await causeway.submit(raw());

    expect(result.authorization?.proof_root).toBe(rotated);
    expect(collect).toHaveBeenCalledTimes(1);
  });

  test("each decision is bound to the root of the history it saw", async () => {
    const { causeway } = setup();

    await causeway.submit(raw({ nonce: 1 }));
    const second = await causeway.submit(raw({ nonce: 2, timestamp: T + 1 }));
    const { decision, event } = second;

    expect(decision.snapshot_root).toBe(causeway.getScopeRoot("agent-1", event.sequence));
    expect(decision.evaluation_digest).toBe(computeEvaluationDigest(decision));

    const [passed] = causeway.getAdapter().getAuditRecords({ action_id: second.action_id, kind: "policy_passed" });
    expect(passed.detail.snapshot_root).toBe(decision.snapshot_root);
    expect(passed.detail.evaluation_digest).toBe(decision.evaluation_digest);

    const receipt = causeway.getInclusionProof(second.action_id);
    expect(receipt?.root).toBe(causeway.getScopeRoot("agent-1"));
    expect(receipt && verifyInclusion(event.event_hash, receipt.proof, receipt.root)).toBe(true);
  });

  test("history verifies after a mixed run", async () => {
    const { causeway } = setup();

    await causeway.submit(raw({ nonce: 1 }));
    await causeway.submit(raw({ agent_id: "agent-2", nonce: 1, value: 5000 }));
    await causeway.getGovernance().updateKeyRoot(TOKEN, "cd".repeat(32));

    const verification = await causeway.verify();
    expect(verification.valid).toBe(true);
    expect(verification.total_events).toBe(3);
    expect(causeway.getStats().scopes).toBe(3);
  });
});
