import { describe, expect, test } from "vitest";
import { ConditionRegistry } from "../src/policy/conditions.js";
import type { ConditionContext } from "../src/policy/conditions.js";
import { DEFAULT_LIMITS } from "../src/policy-loader.js";
import { ZERO_DIGEST } from "../src/hashing.js";
import type { CandidateEvent, CausalEvent } from "../src/types.js";

const T = 1_700_000_000_000;
const registry = new ConditionRegistry();

function event(
  fields: Pick<CausalEvent, "event_type" | "nonce" | "timestamp"> & Partial<CausalEvent>
): CausalEvent {
  return {
    sequence: fields.nonce,
    action_id: `action-${fields.nonce}`,
    agent_id: "agent-1",
    scope: "agent-1",
    payload_digest: ZERO_DIGEST,
    prev_hash: null,
    event_hash: `hash-${fields.nonce}`,
    ...fields,
  };
}

function ctx(chain: CausalEvent[], candidate: Partial<CandidateEvent> = {}): ConditionContext {
  return {
    chain,
    candidate: {
      agent_id: "agent-1",
      event_type: "SignatureRequest",
      nonce: 100,
      timestamp: T,
      ...candidate,
    },
    limits: { ...DEFAULT_LIMITS },
  };
}

describe("MaxDailyOutflow", () => {
  const cap = { type: "MaxDailyOutflow" as const, id: "cap", cap: 1000 };

  test("counts events inside the window only", () => {
    const chain = [
      // Exactly 24h old: outside the half-open window
      event({ event_type: "SignatureRequest", nonce: 1, timestamp: T - 86_400_000, value: 900 }),
      event({ event_type: "SignatureRequest", nonce: 2, timestamp: T - 1000, value: 400 }),
    ];
    const result = registry.evaluate(cap, ctx(chain, { value: 600 }));
    expect(result).toEqual({ passed: true, reason: "Outflow 1000 within cap 1000" });
  });

  test("uses the nominal value when a request has none", () => {
    const chain = [event({ event_type: "SignatureRequest", nonce: 1, timestamp: T - 1000 })];
    const result = registry.evaluate(cap, ctx(chain, { value: 1 }));
    expect(result.passed).toBe(false);
    expect(result.reason).toBe("Outflow 1001 in the last 86400s exceeds cap 1000");
  });

  test("ignores other event types", () => {
    const chain = [event({ event_type: "BalanceCheck", nonce: 1, timestamp: T - 1000, value: 5000 })];
    expect(registry.evaluate(cap, ctx(chain, { value: 10 })).passed).toBe(true);
  });

  test("does not add the candidate when it is not a signature request", () => {
    const chain = [event({ event_type: "SignatureRequest", nonce: 1, timestamp: T - 1000, value: 1000 })];
    const result = registry.evaluate(cap, ctx(chain, { event_type: "Proposal", value: 5000 }));
    expect(result.passed).toBe(true);
  });
});

describe("MinTimeBetweenActions", () => {
  const spacing = {
    type: "MinTimeBetweenActions" as const,
    id: "spacing",
    action_type: "SignatureRequest",
    min_seconds: 60,
  };

  test("passes when no prior action exists", () => {
    expect(registry.evaluate(spacing, ctx([]))).toEqual({ passed: true, reason: "No prior SignatureRequest" });
  });

  test("fails when the last action is too recent", () => {
    const chain = [event({ event_type: "SignatureRequest", nonce: 1, timestamp: T - 59_000 })];
    expect(registry.evaluate(spacing, ctx(chain))).toEqual({
      passed: false,
      reason: "Only 59000ms since last SignatureRequest; minimum is 60s",
    });
  });

  test("passes at exactly the minimum", () => {
    const chain = [event({ event_type: "SignatureRequest", nonce: 1, timestamp: T - 60_000 })];
    expect(registry.evaluate(spacing, ctx(chain)).passed).toBe(true);
  });

  test("measures from the most recent matching event", () => {
    const chain = [
      event({ event_type: "SignatureRequest", nonce: 1, timestamp: T - 120_000 }),
      event({ event_type: "SignatureRequest", nonce: 2, timestamp: T - 10_000 }),
      event({ event_type: "BalanceCheck", nonce: 3, timestamp: T - 5_000 }),
    ];
    expect(registry.evaluate(spacing, ctx(chain)).passed).toBe(false);
  });

  test("does not hold back actions of another type", () => {
    const chain = [event({ event_type: "SignatureRequest", nonce: 1, timestamp: T - 10_000 })];
    expect(registry.evaluate(spacing, ctx(chain, { event_type: "AddressVerification" }))).toEqual({
      passed: true,
      reason: "AddressVerification is not spaced by this condition",
    });
  });
});

describe("NoConcurrentRequests", () => {
  const exclusive = { type: "NoConcurrentRequests" as const, id: "exclusive", window_seconds: 5 };

  test("fails when another type falls inside the open window", () => {
    const chain = [event({ event_type: "BalanceCheck", nonce: 1, timestamp: T - 4000 })];
    expect(registry.evaluate(exclusive, ctx(chain))).toEqual({
      passed: false,
      reason: `BalanceCheck at ${T - 4000} is within 5s of this SignatureRequest`,
    });
  });

  test("window bounds are exclusive", () => {
    const chain = [event({ event_type: "BalanceCheck", nonce: 1, timestamp: T - 5000 })];
    expect(registry.evaluate(exclusive, ctx(chain)).passed).toBe(true);
  });

  test("same type inside the window is allowed", () => {
    const chain = [event({ event_type: "SignatureRequest", nonce: 1, timestamp: T - 1000 })];
    expect(registry.evaluate(exclusive, ctx(chain)).passed).toBe(true);
  });
});

describe("MinVerificationCount", () => {
  const verify = {
    type: "MinVerificationCount" as const,
    id: "verify",
    threshold_amount: 500,
    action_type: "AddressVerification",
    required_count: 2,
  };

  test("does not apply below the threshold amount", () => {
    expect(registry.evaluate(verify, ctx([], { value: 499 }))).toEqual({
      passed: true,
      reason: "Value below 500; not applicable",
    });
  });

  test("does not apply without a value", () => {
    expect(registry.evaluate(verify, ctx([])).passed).toBe(true);
  });

  test("fails with too few verifications", () => {
    const chain = [event({ event_type: "AddressVerification", nonce: 1, timestamp: T - 1000 })];
    expect(registry.evaluate(verify, ctx(chain, { value: 500 }))).toEqual({
      passed: false,
      reason: "1 AddressVerification event(s) on record; 2 required for value >= 500",
    });
  });

  test("counts verifications across the whole chain", () => {
    const chain = [
      event({ event_type: "AddressVerification", nonce: 1, timestamp: T - 30 * 86_400_000 }),
      event({ event_type: "AddressVerification", nonce: 2, timestamp: T - 1000 }),
    ];
    expect(registry.evaluate(verify, ctx(chain, { value: 800 })).passed).toBe(true);
  });
});

describe("AddressAllowlist", () => {
  const allowlist = {
    type: "AddressAllowlist" as const,
    id: "allow",
    allowed_prefixes: ["0xABC"],
    action_types: ["SignatureRequest"],
  };

  test("matches prefixes case-insensitively", () => {
    expect(registry.evaluate(allowlist, ctx([], { recipient: "0xabc123" })).passed).toBe(true);
  });

  test("rejects other recipients", () => {
    expect(registry.evaluate(allowlist, ctx([], { recipient: "0xdef456" }))).toEqual({
      passed: false,
      reason: "Recipient is not allowlisted",
    });
  });

  test("rejects a restricted action without a recipient", () => {
    expect(registry.evaluate(allowlist, ctx([])).reason).toBe("SignatureRequest has no recipient");
  });

  test("ignores unrestricted action types", () => {
    expect(registry.evaluate(allowlist, ctx([], { event_type: "BalanceCheck" })).passed).toBe(true);
  });
});

describe("ConditionRegistry", () => {
  test("dispatches custom kinds to their plugin with parameters", () => {
    const custom = new ConditionRegistry();
    custom.register({
      type: "MaxValue",
      evaluate: (condition, { candidate }) => {
        const max = typeof condition.max === "number" ? condition.max : 0;
        return (candidate.value ?? 0) <= max
          ? { passed: true, reason: "under max" }
          : { passed: false, reason: "over max" };
      },
    });

    expect(custom.has("MaxValue")).toBe(true);
    expect(custom.evaluate({ type: "MaxValue", id: "m", max: 10 }, ctx([], { value: 11 }))).toEqual({
      passed: false,
      reason: "over max",
    });
  });
});
