import { ZERO_DIGEST, sha256Hex } from "./hashing.js";
import type { MerkleProof, MerkleStep } from "./types.js";

/** Root of a scope with no events. */
export const EMPTY_ROOT = ZERO_DIGEST;

// Leaves and inner nodes hash under distinct prefixes
function hashLeaf(leaf: string): string {
  return sha256Hex(`leaf:${leaf}`);
}

function hashNode(left: string, right: string): string {
  return sha256Hex(`node:${left}:${right}`);
}

/** Pair up one level. An unpaired last node moves up unchanged. */
function nextLevel(level: string[]): string[] {
  const next: string[] = [];
  for (let i = 0; i < level.length; i += 2) {
    next.push(i + 1 < level.length ? hashNode(level[i], level[i + 1]) : level[i]);
  }
  return next;
}

/** Binary SHA-256 Merkle root over event hashes in append order. */
export function merkleRoot(leaves: readonly string[]): string {
  if (leaves.length === 0) return EMPTY_ROOT;
  let level = leaves.map(hashLeaf);
  while (level.length > 1) {
    level = nextLevel(level);
  }
  return level[0];
}

export function inclusionProof(leaves: readonly string[], index: number): MerkleProof | undefined {
  if (!Number.isInteger(index) || index < 0 || index >= leaves.length) return undefined;

  const siblings: MerkleStep[] = [];
  let level = leaves.map(hashLeaf);
  let position = index;
  while (level.length > 1) {
    const isRight = position % 2 === 1;
    const pair = isRight ? position - 1 : position + 1;
    if (pair < level.length) {
      siblings.push({ hash: level[pair], side: isRight ? "left" : "right" });
    }
    level = nextLevel(level);
    position = Math.floor(position / 2);
  }

  return { leaf_index: index, leaf_count: leaves.length, siblings };
}

export function verifyInclusion(leaf: string, proof: MerkleProof, root: string): boolean {
  let hash = hashLeaf(leaf);
  for (const step of proof.siblings) {
    hash = step.side === "left" ? hashNode(step.hash, hash) : hashNode(hash, step.hash);
  }
  return hash === root;
}
