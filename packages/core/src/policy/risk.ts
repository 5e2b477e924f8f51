import type { RiskBreakpoints, RiskTier, ThresholdTable } from "../types.js";
import { RISK_TIER_ORDER } from "../types.js";

/** Required signer count per tier. Not derived, not agent-controlled. */
export const DEFAULT_THRESHOLDS: ThresholdTable = Object.freeze({
  Low: 2,
  Medium: 3,
  High: 5,
});

export const DEFAULT_BREAKPOINTS: RiskBreakpoints = Object.freeze({
  medium_at: 100,
  high_at: 1000,
});

/**
 * Validate and freeze a threshold table supplied at startup.
 * Thresholds must be positive integers, must not decrease as tier rises,
 * and may only raise the fixed per-tier minimums, never lower them.
 */
export function createThresholdTable(
  table: ThresholdTable = DEFAULT_THRESHOLDS
): ThresholdTable {
  let previous = 0;
  for (const tier of RISK_TIER_ORDER) {
    const value = table[tier];
    if (!Number.isInteger(value) || value < 1) {
      throw new Error(`Threshold for ${tier} must be a positive integer, got ${value}`);
    }
    if (value < DEFAULT_THRESHOLDS[tier]) {
      throw new Error(
        `Threshold for ${tier} (${value}) is below the fixed minimum (${DEFAULT_THRESHOLDS[tier]})`
      );
    }
    if (value < previous) {
      throw new Error(`Threshold for ${tier} (${value}) is below the tier beneath it (${previous})`);
    }
    previous = value;
  }
  return Object.freeze({ Low: table.Low, Medium: table.Medium, High: table.High });
}

export function tierRank(tier: RiskTier): number {
  return RISK_TIER_ORDER.indexOf(tier);
}

export function maxTier(a: RiskTier, b: RiskTier): RiskTier {
  return tierRank(a) >= tierRank(b) ? a : b;
}

/** Baseline tier from the monetary value alone. No value means Low. */
export function tierForValue(
  value: number | undefined,
  breakpoints: RiskBreakpoints
): RiskTier {
  if (value === undefined) return "Low";
  if (value >= breakpoints.high_at) return "High";
  if (value >= breakpoints.medium_at) return "Medium";
  return "Low";
}

/** The one lookup from tier to signer count; every caller goes through it. */
export function lookupThreshold(table: ThresholdTable, tier: RiskTier): number {
  return table[tier];
}
