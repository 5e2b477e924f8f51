import chalk from "chalk";
import type { AuditKind, RiskTier, SubmissionStatus, Verdict } from "@causeway/core";

export function formatVerdict(verdict: Verdict): string {
  return verdict === "PASS" ? chalk.green("PASS") : chalk.red("FAIL");
}

export function formatTier(tier: RiskTier): string {
  switch (tier) {
    case "Low":
      return chalk.green("Low".padEnd(6));
    case "Medium":
      return chalk.yellow("Medium");
    case "High":
      return chalk.red("High".padEnd(6));
  }
}

export function formatStatus(status: SubmissionStatus): string {
  switch (status) {
    case "authorized":
      return chalk.green("AUTHORIZED");
    case "rejected":
      return chalk.red("REJECTED");
    case "abandoned":
      return chalk.yellow("ABANDONED");
  }
}

export function formatAuditKind(kind: AuditKind | undefined): string {
  switch (kind) {
    case "policy_passed":
    case "signatures_collected":
      return chalk.green(kind.padEnd(20));
    case "policy_rejected":
    case "ordering_rejected":
    case "governance_rejected":
      return chalk.red(kind.padEnd(20));
    case "threshold_unmet":
      return chalk.yellow(kind.padEnd(20));
    case undefined:
      return chalk.dim("-".padEnd(20));
  }
}

/** Quoted CSV, one row per record. Objects are embedded as JSON. */
export function toCsv<T>(headers: readonly (keyof T & string)[], rows: readonly T[]): string {
  const lines = rows.map((row) => headers.map((h) => csvCell(row[h])).join(","));
  return [headers.join(","), ...lines].join("\n");
}

function csvCell(value: unknown): string {
  if (value === undefined || value === null) return '""';
  if (typeof value === "object") return JSON.stringify(JSON.stringify(value));
  return JSON.stringify(value);
}
