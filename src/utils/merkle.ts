import { ErrorHandler } from '../errors/ErrorHandler';
import { hashToField } from './hash';
import { poseidonHashMany } from './poseidon';

/** Leaf value standing in for an empty slot */
export const ZERO_VALUE = hashToField('shieldpool');

export interface MerkleProof {
  leaf: bigint;
  /** Sibling hashes from leaf level upwards */
  elements: bigint[];
  /** Bit i set when the node at level i is a right child */
  indices: bigint;
  root: bigint;
}

export function hashLeftRight(left: bigint, right: bigint): bigint {
  return poseidonHashMany([left, right]);
}

const zeroCache = new Map<number, bigint[]>();

/**
 * Per-level empty-subtree hashes: zeros[0] is the empty leaf, zeros[i] = H(zeros[i-1], zeros[i-1]).
 * The returned array has depth + 1 entries; the last is the root of an empty tree.
 */
export function getZeroValues(depth: number): bigint[] {
  const cached = zeroCache.get(depth);
  if (cached) {
    return [...cached];
  }
  const zeros = [ZERO_VALUE];
  for (let level = 1; level <= depth; level++) {
    zeros.push(hashLeftRight(zeros[level - 1], zeros[level - 1]));
  }
  zeroCache.set(depth, zeros);
  return [...zeros];
}

/**
 * Builds every level of a tree of the given depth over leaves. Missing nodes are left out;
 * callers substitute zeros[level].
 */
export function buildLevels(leaves: bigint[], depth: number): bigint[][] {
  if (leaves.length > 2 ** depth) {
    throw ErrorHandler.createStateError('Too many leaves for tree depth', {
      leaves: leaves.length,
      depth
    });
  }
  const zeros = getZeroValues(depth);
  const levels: bigint[][] = [[...leaves]];
  for (let level = 0; level < depth; level++) {
    const current = levels[level];
    const next: bigint[] = [];
    for (let i = 0; i < current.length; i += 2) {
      const right = i + 1 < current.length ? current[i + 1] : zeros[level];
      next.push(hashLeftRight(current[i], right));
    }
    levels.push(next);
  }
  return levels;
}

/**
 * Root of a tree rebuilt from scratch over leaves
 */
export function computeRoot(leaves: bigint[], depth: number): bigint {
  if (leaves.length === 0) {
    return getZeroValues(depth)[depth];
  }
  return buildLevels(leaves, depth)[depth][0];
}

/**
 * Merkle proof for the leaf at index, using zero hashes for absent siblings
 */
export function generateMerkleProof(leaves: bigint[], index: number, depth: number): MerkleProof {
  if (index < 0 || index >= leaves.length) {
    throw ErrorHandler.createStateError('Leaf index out of range', { index, leaves: leaves.length });
  }
  return proofFromLevels(buildLevels(leaves, depth), index, depth);
}

export function proofFromLevels(levels: bigint[][], index: number, depth: number): MerkleProof {
  const zeros = getZeroValues(depth);
  const elements: bigint[] = [];
  let position = index;
  for (let level = 0; level < depth; level++) {
    const siblingPosition = position ^ 1;
    const nodes = levels[level];
    elements.push(siblingPosition < nodes.length ? nodes[siblingPosition] : zeros[level]);
    position >>= 1;
  }
  const root = levels[depth].length > 0 ? levels[depth][0] : zeros[depth];
  return { leaf: levels[0][index], elements, indices: BigInt(index), root };
}

/**
 * Folds the leaf upwards: bit 0 hashes (current, sibling), bit 1 hashes (sibling, current)
 */
export function validateMerkleProof(proof: MerkleProof): boolean {
  let current = proof.leaf;
  proof.elements.forEach((element, level) => {
    const isRight = (proof.indices >> BigInt(level)) & 1n;
    current = isRight === 1n ? hashLeftRight(element, current) : hashLeftRight(current, element);
  });
  return current === proof.root;
}
