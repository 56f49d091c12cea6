import { ErrorHandler } from '../errors/ErrorHandler';
import { getZeroValues, hashLeftRight, MerkleProof, proofFromLevels } from '../utils/merkle';

/**
 * Off-ledger mirror of the commitment accumulator, rebuilt from published events. Keeps every
 * node of every tree so it can produce inclusion proofs; new leaves rehash only their own
 * paths to the root.
 */
export class MerkleTreeClient {
  /** levels[0] holds the leaves, levels[depth] the root */
  private readonly trees: Map<number, bigint[][]> = new Map();
  private readonly zeros: bigint[];

  constructor(public readonly depth: number) {
    this.zeros = getZeroValues(depth);
  }

  /**
   * Records leaves published at (treeNumber, startPosition). Replaying an already-known range is
   * a no-op; a gap means events were missed.
   */
  insertLeaves(treeNumber: number, startPosition: number, hashes: bigint[]): void {
    const levels = this.trees.get(treeNumber) ?? Array.from({ length: this.depth + 1 }, (): bigint[] => []);
    const leaves = levels[0];
    if (startPosition > leaves.length) {
      throw ErrorHandler.createStateError('Missing leaves before insertion point', {
        treeNumber,
        startPosition,
        known: leaves.length
      });
    }
    if (startPosition + hashes.length > 2 ** this.depth) {
      throw ErrorHandler.createStateError('Batch exceeds tree capacity', { treeNumber, startPosition });
    }

    hashes.forEach((hash, i) => {
      const position = startPosition + i;
      if (position < leaves.length && leaves[position] !== hash) {
        throw ErrorHandler.createStateError('Conflicting leaf at position', { treeNumber, position });
      }
    });

    const firstNew = leaves.length;
    leaves.push(...hashes.slice(firstNew - startPosition));
    this.trees.set(treeNumber, levels);
    if (leaves.length > firstNew) {
      this.rehash(levels, firstNew);
    }
  }

  getLeafCount(treeNumber: number): number {
    return this.trees.get(treeNumber)?.[0].length ?? 0;
  }

  getTreeNumbers(): number[] {
    return [...this.trees.keys()].sort((a, b) => a - b);
  }

  getRoot(treeNumber: number): bigint {
    return this.trees.get(treeNumber)?.[this.depth][0] ?? this.zeros[this.depth];
  }

  /**
   * Inclusion proof for a leaf against the mirror's current root of its tree
   */
  getMerkleProof(treeNumber: number, leafIndex: number): MerkleProof {
    const levels = this.trees.get(treeNumber);
    if (!levels || leafIndex < 0 || leafIndex >= levels[0].length) {
      throw ErrorHandler.createStateError('Leaf index out of range', { treeNumber, leafIndex });
    }
    return proofFromLevels(levels, leafIndex, this.depth);
  }

  /**
   * Recomputes the parents of every leaf from `from` onwards, level by level
   */
  private rehash(levels: bigint[][], from: number): void {
    let start = from;
    for (let level = 0; level < this.depth; level++) {
      const current = levels[level];
      const next = levels[level + 1];
      const first = start >> 1;
      for (let parent = first; parent * 2 < current.length; parent++) {
        const right = parent * 2 + 1 < current.length ? current[parent * 2 + 1] : this.zeros[level];
        next[parent] = hashLeftRight(current[parent * 2], right);
      }
      start = first;
    }
  }
}
