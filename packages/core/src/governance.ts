import { timingSafeEqual } from "node:crypto";
import type { AuditTrail } from "./audit-trail.js";
import type { CausalEventLogger } from "./causal-logger.js";
import { GovernanceError } from "./errors.js";
import { ZERO_DIGEST, canonicalJson, sha256Hex } from "./hashing.js";
import { freezePolicy } from "./policy-loader.js";
import { GOVERNANCE_SCOPE } from "./types.js";
import type { CausalEvent, Policy } from "./types.js";

export const GOVERNANCE_AGENT = "governance";

const KEY_ROOT_PATTERN = /^[0-9a-f]{64}$/;

export type GovernanceOperation = "update_key_root" | "swap_policy";

export interface GovernanceControllerOptions {
  token: string;
  keyRoot: string;
  policy: Policy;
  logger: CausalEventLogger;
  audit: AuditTrail;
  /** Throws when a policy cannot be enforced, e.g. an unregistered condition. */
  validatePolicy?: (policy: Policy) => void;
  /** Called after a swap is on record. */
  onPolicySwap?: (policy: Readonly<Policy>) => void;
  now?: () => number;
}

export function assertKeyRoot(root: string): void {
  if (!KEY_ROOT_PATTERN.test(root) || root === ZERO_DIGEST) {
    throw new GovernanceError("Key root must be 64 lowercase hex characters and non-zero", "INVALID_ROOT");
  }
}

/**
 * The only path that changes the key root or the active policy. Every
 * accepted change is logged as a Governance event before it takes effect.
 */
export class GovernanceController {
  private tokenDigest: Buffer;
  private keyRoot: string;
  private policy: Readonly<Policy>;
  private logger: CausalEventLogger;
  private audit: AuditTrail;
  private validatePolicy?: (policy: Policy) => void;
  private onPolicySwap?: (policy: Readonly<Policy>) => void;
  private now: () => number;

  constructor(options: GovernanceControllerOptions) {
    if (options.token.length === 0) {
      throw new GovernanceError("Governance token must not be empty", "UNAUTHORIZED");
    }
    assertKeyRoot(options.keyRoot);
    this.tokenDigest = digestToken(options.token);
    this.keyRoot = options.keyRoot;
    this.policy = freezePolicy(structuredClone(options.policy));
    this.logger = options.logger;
    this.audit = options.audit;
    this.validatePolicy = options.validatePolicy;
    this.onPolicySwap = options.onPolicySwap;
    this.now = options.now ?? Date.now;
  }

  getKeyRoot(): string {
    return this.keyRoot;
  }

  getPolicy(): Readonly<Policy> {
    return this.policy;
  }

  async updateKeyRoot(token: string, root: string): Promise<CausalEvent> {
    await this.authenticate(token, "update_key_root");
    assertKeyRoot(root);

    const event = await this.record({
      operation: "update_key_root",
      previous: this.keyRoot,
      key_root: root,
    });
    this.keyRoot = root;
    console.error(`[causeway] key root rotated at sequence ${event.sequence}`);
    return event;
  }

  async swapPolicy(token: string, policy: Policy): Promise<CausalEvent> {
    await this.authenticate(token, "swap_policy");
    this.validatePolicy?.(policy);

    const frozen = freezePolicy(structuredClone(policy));
    const event = await this.record({
      operation: "swap_policy",
      name: frozen.name,
      version: frozen.version,
      policy_digest: sha256Hex(canonicalJson(frozen)),
    });
    this.policy = frozen;
    this.onPolicySwap?.(frozen);
    console.error(`[causeway] policy '${frozen.name}' v${frozen.version} active from sequence ${event.sequence}`);
    return event;
  }

  private async authenticate(token: string, operation: GovernanceOperation): Promise<void> {
    if (timingSafeEqual(digestToken(token), this.tokenDigest)) return;

    await this.audit.record({
      action_id: `${GOVERNANCE_SCOPE}/${operation}`,
      agent_id: GOVERNANCE_AGENT,
      scope: GOVERNANCE_SCOPE,
      kind: "governance_rejected",
      detail: { operation, reason: "invalid token" },
      timestamp: this.now(),
    });
    throw new GovernanceError(`Unauthorized ${operation}`, "UNAUTHORIZED");
  }

  private async record(change: Record<string, unknown> & { operation: GovernanceOperation }): Promise<CausalEvent> {
    const result = await this.logger.logNext(GOVERNANCE_SCOPE, {
      agent_id: GOVERNANCE_AGENT,
      event_type: "Governance",
      timestamp: this.now(),
      payload: canonicalJson(change),
    });
    return result.event;
  }
}

/** Fixed-length digest so the comparison does not leak the token length. */
function digestToken(token: string): Buffer {
  return Buffer.from(sha256Hex(token), "hex");
}
