import { parse } from "yaml";
import { readFileSync, existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type {
  Condition,
  Policy,
  PolicyLimits,
  RiskBreakpoints,
  SinkConfig,
  StorageConfig,
} from "./types.js";
import { BUILTIN_CONDITION_TYPES } from "./policy/conditions.js";
import { DEFAULT_BREAKPOINTS } from "./policy/risk.js";

export const DEFAULT_LIMITS: PolicyLimits = Object.freeze({
  max_payload_bytes: 4096,
  max_proposals_per_minute: 10,
  skew_tolerance_ms: 500,
  daily_outflow_window_s: 86_400,
  nominal_value: 1000,
  signature_deadline_ms: 30_000,
});

const VALID_SCOPES = new Set(["agent", "global"]);

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Replace ${VAR} and ${VAR:-default} patterns with environment variables.
 */
function interpolateEnvVars(content: string): string {
  return content.replace(/\$\{([^}]+)\}/g, (_match, expr: string) => {
    const [varName, ...defaultParts] = expr.split(":-");
    const defaultValue = defaultParts.join(":-");
    const envValue = process.env[varName.trim()];
    if (envValue !== undefined) return envValue;
    if (defaultParts.length > 0) return defaultValue;
    throw new Error(
      `policy.yaml: required environment variable '${varName.trim()}' is not set. ` +
      `Use \${${varName.trim()}:-default} to provide a default value.`
    );
  });
}

function requireNumber(
  raw: RawRecord,
  key: string,
  where: string,
  opts: { min?: number; integer?: boolean } = {}
): number {
  const value = raw[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`policy.yaml: ${where} requires numeric '${key}'`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new Error(`policy.yaml: ${where} '${key}' must be >= ${opts.min}, got ${value}`);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new Error(`policy.yaml: ${where} '${key}' must be an integer, got ${value}`);
  }
  return value;
}

function requireString(raw: RawRecord, key: string, where: string): string {
  const value = raw[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`policy.yaml: ${where} requires string '${key}'`);
  }
  return value;
}

function requireStringList(raw: RawRecord, key: string, where: string): string[] {
  const value = raw[key];
  if (!Array.isArray(value) || value.some((v) => typeof v !== "string" || v.length === 0)) {
    throw new Error(`policy.yaml: ${where} requires '${key}' as a list of strings`);
  }
  return value.map(String);
}

function parseCondition(raw: unknown, i: number): Condition {
  if (!isRecord(raw)) {
    throw new Error(`policy.yaml: condition #${i} must be a mapping`);
  }
  const type = raw.type;
  if (typeof type !== "string" || type.length === 0) {
    throw new Error(`policy.yaml: condition #${i} is missing 'type'`);
  }
  const id = typeof raw.id === "string" && raw.id.length > 0 ? raw.id : `condition-${i}`;
  const where = `condition '${id}' (${type})`;

  switch (type) {
    case "MaxDailyOutflow":
      return { type, id, cap: requireNumber(raw, "cap", where, { min: 0 }) };
    case "MinTimeBetweenActions":
      return {
        type,
        id,
        action_type: requireString(raw, "action_type", where),
        min_seconds: requireNumber(raw, "min_seconds", where, { min: 0 }),
      };
    case "NoConcurrentRequests":
      return {
        type,
        id,
        window_seconds: requireNumber(raw, "window_seconds", where, { min: 0 }),
      };
    case "MinVerificationCount":
      return {
        type,
        id,
        threshold_amount: requireNumber(raw, "threshold_amount", where, { min: 0 }),
        action_type:
          raw.action_type === undefined
            ? "AddressVerification"
            : requireString(raw, "action_type", where),
        required_count: requireNumber(raw, "required_count", where, { min: 0, integer: true }),
      };
    case "AddressAllowlist":
      return {
        type,
        id,
        allowed_prefixes: requireStringList(raw, "allowed_prefixes", where),
        action_types:
          raw.action_types === undefined
            ? ["SignatureRequest"]
            : requireStringList(raw, "action_types", where),
      };
    default:
      if (BUILTIN_CONDITION_TYPES.has(type)) {
        throw new Error(`policy.yaml: ${where} is not handled`);
      }
      // Custom kinds are resolved against registered plugins at evaluation
      return { ...raw, type, id };
  }
}

function parseLimits(raw: unknown): PolicyLimits {
  if (raw === undefined) return { ...DEFAULT_LIMITS };
  if (!isRecord(raw)) throw new Error("policy.yaml: 'limits' must be a mapping");

  const limits: PolicyLimits = { ...DEFAULT_LIMITS };
  for (const key of Object.keys(raw)) {
    if (!(key in DEFAULT_LIMITS)) {
      throw new Error(`policy.yaml: unknown limit '${key}'`);
    }
  }
  const read = (key: keyof PolicyLimits): number =>
    raw[key] === undefined
      ? DEFAULT_LIMITS[key]
      : requireNumber(raw, key, "limits", { min: 0 });

  limits.max_payload_bytes = read("max_payload_bytes");
  limits.max_proposals_per_minute = read("max_proposals_per_minute");
  limits.skew_tolerance_ms = read("skew_tolerance_ms");
  limits.daily_outflow_window_s = read("daily_outflow_window_s");
  limits.nominal_value = read("nominal_value");
  limits.signature_deadline_ms = read("signature_deadline_ms");
  return limits;
}

function parseRisk(raw: unknown): RiskBreakpoints {
  if (raw === undefined) return { ...DEFAULT_BREAKPOINTS };
  if (!isRecord(raw)) throw new Error("policy.yaml: 'risk' must be a mapping");

  const mediumAt =
    raw.medium_at === undefined
      ? DEFAULT_BREAKPOINTS.medium_at
      : requireNumber(raw, "medium_at", "risk", { min: 0 });
  const highAt =
    raw.high_at === undefined
      ? DEFAULT_BREAKPOINTS.high_at
      : requireNumber(raw, "high_at", "risk", { min: 0 });
  if (mediumAt > highAt) {
    throw new Error(`policy.yaml: risk.medium_at (${mediumAt}) exceeds risk.high_at (${highAt})`);
  }
  return { medium_at: mediumAt, high_at: highAt };
}

export function loadPolicyConfig(yamlContent: string): Policy {
  const interpolated = interpolateEnvVars(yamlContent);
  const raw: unknown = parse(interpolated);

  if (!isRecord(raw)) {
    throw new Error("policy.yaml: invalid YAML content");
  }
  if (raw.version === undefined || raw.version === null) {
    throw new Error("policy.yaml: 'version' is required");
  }
  if (typeof raw.name !== "string" || raw.name.length === 0) {
    throw new Error("policy.yaml: 'name' is required");
  }
  if ("thresholds" in raw || "threshold" in raw) {
    throw new Error(
      "policy.yaml: signer thresholds are fixed at startup and cannot be set by a policy"
    );
  }

  const scope = raw.scope ?? "agent";
  if (typeof scope !== "string" || !VALID_SCOPES.has(scope)) {
    throw new Error(`policy.yaml: invalid scope '${String(scope)}'. Must be one of: ${[...VALID_SCOPES].join(", ")}`);
  }

  const rawConditions = raw.conditions ?? [];
  if (!Array.isArray(rawConditions)) {
    throw new Error("policy.yaml: 'conditions' must be a list");
  }
  const seenIds = new Set<string>();
  const conditions = rawConditions.map((c: unknown, i: number) => {
    const condition = parseCondition(c, i);
    if (seenIds.has(condition.id)) {
      throw new Error(`policy.yaml: duplicate condition ID '${condition.id}' at condition #${i}`);
    }
    seenIds.add(condition.id);
    return condition;
  });

  const rawSinks = raw.sinks ?? [];
  if (!Array.isArray(rawSinks)) {
    throw new Error("policy.yaml: 'sinks' must be a list");
  }
  const sinks: SinkConfig[] = rawSinks.map((s: unknown, i: number) => {
    if (!isRecord(s)) throw new Error(`policy.yaml: sink #${i} must be a mapping`);
    return {
      ...s,
      type: String(s.type),
      events: Array.isArray(s.events) ? s.events.map(String) : undefined,
    };
  });

  let storage: StorageConfig | undefined;
  if (raw.storage !== undefined) {
    if (!isRecord(raw.storage)) throw new Error("policy.yaml: 'storage' must be a mapping");
    storage = { ...raw.storage, adapter: String(raw.storage.adapter) };
  }

  let extendsList: string[] | undefined;
  if (raw.extends !== undefined) {
    extendsList = requireStringList(raw, "extends", "policy");
  }

  return {
    version: String(raw.version),
    name: raw.name,
    description: typeof raw.description === "string" ? raw.description : undefined,
    scope: scope === "global" ? "global" : "agent",
    conditions,
    limits: parseLimits(raw.limits),
    risk: parseRisk(raw.risk),
    sinks,
    storage,
    extends: extendsList,
  };
}

export function loadPolicyFile(path: string): Policy {
  if (!existsSync(path)) {
    throw new Error(`policy.yaml not found at: ${path}`);
  }
  const config = loadPolicyConfig(readFileSync(path, "utf-8"));

  // Resolve extends relative to the policy file's directory
  if (config.extends && config.extends.length > 0) {
    const baseDir = dirname(resolve(path));
    const extended: Condition[] = [];

    for (const extPath of config.extends) {
      const extConfig = loadPolicyFile(resolve(baseDir, extPath));
      extended.push(...extConfig.conditions);
    }

    const ids = new Set(config.conditions.map((c) => c.id));
    for (const condition of extended) {
      if (ids.has(condition.id)) {
        throw new Error(`policy.yaml: condition ID '${condition.id}' is declared in both ${path} and an extended file`);
      }
      ids.add(condition.id);
    }

    // Extended conditions first, then local ones
    config.conditions = [...extended, ...config.conditions];
  }

  return config;
}

/** Deep-freeze a policy so nothing can change it during evaluation. */
export function freezePolicy(policy: Policy): Readonly<Policy> {
  const freeze = (value: unknown): void => {
    if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
    Object.freeze(value);
    for (const child of Object.values(value)) freeze(child);
  };
  freeze(policy);
  return policy;
}
