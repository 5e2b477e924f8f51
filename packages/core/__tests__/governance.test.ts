import { describe, expect, test } from "vitest";
import { GovernanceController } from "../src/governance.js";
import { AuditTrail } from "../src/audit-trail.js";
import { CausalEventLogger } from "../src/causal-logger.js";
import { MemoryAdapter } from "../src/adapters/memory.js";
import { GovernanceError } from "../src/errors.js";
import { DEFAULT_LIMITS } from "../src/policy-loader.js";
import { DEFAULT_BREAKPOINTS } from "../src/policy/risk.js";
import type { Policy } from "../src/types.js";

const TOKEN = "test-secret";
const ROOT_A = "aa".repeat(32);
const ROOT_B = "bb".repeat(32);
const T = 1_700_000_000_000;

const basePolicy: Policy = {
  version: "1",
  name: "base",
  scope: "agent",
  conditions: [],
  limits: { ...DEFAULT_LIMITS },
  risk: { ...DEFAULT_BREAKPOINTS },
};

function setup(overrides: { validatePolicy?: (p: Policy) => void } = {}) {
  const store = new MemoryAdapter();
  const audit = new AuditTrail(store);
  const logger = new CausalEventLogger({ store, audit });
  let clock = T;
  const swapped: string[] = [];
  const controller = new GovernanceController({
    token: TOKEN,
    keyRoot: ROOT_A,
    policy: basePolicy,
    logger,
    audit,
    onPolicySwap: (p) => swapped.push(p.name),
    now: () => clock++,
    ...overrides,
  });
  return { store, controller, swapped };
}

describe("GovernanceController", () => {
  test("rotates the key root and logs a governance event", async () => {
    const { store, controller } = setup();

    const event = await controller.updateKeyRoot(TOKEN, ROOT_B);

    expect(controller.getKeyRoot()).toBe(ROOT_B);
    expect(event.scope).toBe("governance");
    expect(event.event_type).toBe("Governance");
    expect(event.agent_id).toBe("governance");
    expect(store.getChain("governance")).toHaveLength(1);
  });

  test("rejects a wrong token and records the attempt", async () => {
    const { store, controller } = setup();

    const error = await controller.updateKeyRoot("wrong", ROOT_B).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GovernanceError);
    expect(error instanceof GovernanceError && error.code).toBe("UNAUTHORIZED");
    expect(controller.getKeyRoot()).toBe(ROOT_A);
    expect(store.getEventCount()).toBe(0);

    const audit = store.getAuditRecords({ kind: "governance_rejected" });
    expect(audit).toHaveLength(1);
    expect(audit[0].detail).toEqual({ operation: "update_key_root", reason: "invalid token" });
  });

  test.each([
    ["short", "ab"],
    ["uppercase", "AB".repeat(32)],
    ["zero", "0".repeat(64)],
  ])("rejects a %s key root", async (_label, root) => {
    const { controller } = setup();
    const error = await controller.updateKeyRoot(TOKEN, root).catch((e: unknown) => e);
    expect(error instanceof GovernanceError && error.code).toBe("INVALID_ROOT");
    expect(controller.getKeyRoot()).toBe(ROOT_A);
  });

  test("swaps the policy after logging it", async () => {
    const { store, controller, swapped } = setup();
    const next: Policy = { ...basePolicy, name: "tightened", version: "2" };

    const event = await controller.swapPolicy(TOKEN, next);

    expect(controller.getPolicy().name).toBe("tightened");
    expect(Object.isFrozen(controller.getPolicy())).toBe(true);
    expect(swapped).toEqual(["tightened"]);
    expect(store.getEventBySequence(event.sequence)?.scope).toBe("governance");
  });

  test("active policy is not affected by later edits to the input", async () => {
    const { controller } = setup();
    const next: Policy = { ...basePolicy, name: "copy", conditions: [] };

    await controller.swapPolicy(TOKEN, next);
    next.conditions.push({ type: "MaxDailyOutflow", id: "late", cap: 1 });

    expect(controller.getPolicy().conditions).toHaveLength(0);
  });

  test("policy validation failures leave the active policy in place", async () => {
    const { store, controller } = setup({
      validatePolicy: () => {
        throw new Error("unsupported");
      },
    });

    await expect(controller.swapPolicy(TOKEN, { ...basePolicy, name: "bad" })).rejects.toThrow("unsupported");
    expect(controller.getPolicy().name).toBe("base");
    expect(store.getEventCount()).toBe(0);
  });

  test("governance events form their own chain", async () => {
    const { store, controller } = setup();

    const first = await controller.updateKeyRoot(TOKEN, ROOT_B);
    const second = await controller.updateKeyRoot(TOKEN, ROOT_A);

    expect(second.prev_hash).toBe(first.event_hash);
    expect(second.nonce).toBe(first.nonce + 1);
    expect((await store.verifyChain()).valid).toBe(true);
  });
});
