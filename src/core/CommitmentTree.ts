import { ErrorHandler } from '../errors/ErrorHandler';
import { Logger } from '../utils/logger';
import { getZeroValues, hashLeftRight } from '../utils/merkle';
import { MAX_TREE_DEPTH } from '../config/ConfigurationManager';

export interface InsertionResult {
  treeNumber: number;
  startPosition: number;
}

export interface CommitmentTreeCheckpoint {
  treeNumber: number;
  nextLeafIndex: number;
  merkleRoot: bigint;
  filledSubTrees: bigint[];
  journalLength: number;
}

interface RootHistoryChange {
  kind: 'added' | 'retired';
  treeNumber: number;
  root: bigint;
}

export interface SerializedCommitmentTree {
  depth: number;
  treeNumber: number;
  nextLeafIndex: number;
  merkleRoot: string;
  filledSubTrees: string[];
  rootHistory: Record<string, string[]>;
}

/**
 * Append-only commitment accumulator. Only the rightmost filled node per level is kept, so an
 * insertion costs batch size times depth hashes. When a batch does not fit in the active tree
 * a fresh tree is started first; batches never span trees.
 *
 * Root history changes since the last commit are journaled, so a checkpoint holds only the
 * frontier and restoring one undoes just the journaled changes.
 */
export class CommitmentTree {
  public readonly depth: number;
  private readonly zeros: bigint[];
  private readonly emptyRoot: bigint;
  private readonly logger: Logger;

  private treeNumber = 0;
  private nextLeafIndex = 0;
  private merkleRoot: bigint;
  private filledSubTrees: bigint[];
  private rootHistory: Map<number, Set<bigint>> = new Map();
  private journal: RootHistoryChange[] = [];

  constructor(depth: number) {
    if (!Number.isInteger(depth) || depth < 1 || depth > MAX_TREE_DEPTH) {
      throw ErrorHandler.createFormatError('Invalid tree depth', { depth });
    }
    this.depth = depth;
    this.logger = Logger.getInstance();

    const zeros = getZeroValues(depth);
    this.emptyRoot = zeros[depth];
    this.zeros = zeros.slice(0, depth);
    this.filledSubTrees = [...this.zeros];
    this.merkleRoot = this.emptyRoot;
    this.rootHistory.set(0, new Set([this.emptyRoot]));
  }

  public get capacity(): number {
    return 2 ** this.depth;
  }

  public getTreeNumber(): number {
    return this.treeNumber;
  }

  public getNextLeafIndex(): number {
    return this.nextLeafIndex;
  }

  public getRoot(): bigint {
    return this.merkleRoot;
  }

  public getZeroValue(level: number): bigint {
    return this.zeros[level];
  }

  public getEmptyRoot(): bigint {
    return this.emptyRoot;
  }

  /**
   * Where a batch of count leaves would land, without inserting it
   */
  public peekInsertion(count: number): InsertionResult {
    if (count > this.capacity) {
      throw ErrorHandler.createStateError('Batch exceeds tree capacity', { count, capacity: this.capacity });
    }
    if (count > 0 && this.nextLeafIndex + count > this.capacity) {
      return { treeNumber: this.treeNumber + 1, startPosition: 0 };
    }
    return { treeNumber: this.treeNumber, startPosition: this.nextLeafIndex };
  }

  /**
   * Appends leaves contiguously and records the resulting root. An empty batch changes nothing.
   */
  public insertLeaves(leafHashes: bigint[]): InsertionResult {
    const placement = this.peekInsertion(leafHashes.length);
    let count = leafHashes.length;
    if (count === 0) {
      return placement;
    }

    if (placement.treeNumber !== this.treeNumber) {
      this.newTree();
    }

    const nodes = [...leafHashes];
    let levelInsertionIndex = this.nextLeafIndex;
    this.nextLeafIndex += count;

    for (let level = 0; level < this.depth; level++) {
      const nextLevelStartIndex = levelInsertionIndex >> 1;
      let nextLevelHashIndex = 0;
      let insertionElement = 0;

      // A batch starting on a right child pairs with the stored left sibling
      if (levelInsertionIndex % 2 === 1) {
        nodes[0] = hashLeftRight(this.filledSubTrees[level], nodes[0]);
        insertionElement = 1;
        levelInsertionIndex += 1;
      }

      for (; insertionElement < count; insertionElement += 2) {
        const right = insertionElement < count - 1 ? nodes[insertionElement + 1] : this.zeros[level];

        if (insertionElement === count - 1 || insertionElement === count - 2) {
          this.filledSubTrees[level] = nodes[insertionElement];
        }

        nextLevelHashIndex = (levelInsertionIndex >> 1) - nextLevelStartIndex;
        nodes[nextLevelHashIndex] = hashLeftRight(nodes[insertionElement], right);
        levelInsertionIndex += 2;
      }

      levelInsertionIndex = nextLevelStartIndex;
      count = nextLevelHashIndex + 1;
    }

    this.merkleRoot = nodes[0];
    this.recordRoot(this.treeNumber, this.merkleRoot);

    return placement;
  }

  public rootExists(treeNumber: number, root: bigint): boolean {
    return this.rootHistory.get(treeNumber)?.has(root) ?? false;
  }

  public getRootHistory(treeNumber: number): bigint[] {
    return [...(this.rootHistory.get(treeNumber) ?? [])];
  }

  /**
   * Removes a historical root. The current root of the active tree cannot be retired.
   */
  public retireRoot(treeNumber: number, root: bigint): void {
    if (treeNumber === this.treeNumber && root === this.merkleRoot) {
      throw ErrorHandler.createStateError('Cannot retire the current root', { treeNumber });
    }
    const history = this.rootHistory.get(treeNumber);
    if (!history || !history.delete(root)) {
      throw ErrorHandler.createStateError('Root not in history', { treeNumber, merkleRoot: root.toString() });
    }
    this.journal.push({ kind: 'retired', treeNumber, root });
  }

  public checkpoint(): CommitmentTreeCheckpoint {
    return {
      treeNumber: this.treeNumber,
      nextLeafIndex: this.nextLeafIndex,
      merkleRoot: this.merkleRoot,
      filledSubTrees: [...this.filledSubTrees],
      journalLength: this.journal.length
    };
  }

  public restore(checkpoint: CommitmentTreeCheckpoint): void {
    if (checkpoint.journalLength > this.journal.length || checkpoint.filledSubTrees.length !== this.depth) {
      throw ErrorHandler.createStateError('Tree checkpoint is no longer valid', { treeNumber: checkpoint.treeNumber });
    }
    while (this.journal.length > checkpoint.journalLength) {
      const change = this.journal.pop();
      if (!change) {
        break;
      }
      if (change.kind === 'added') {
        this.rootHistory.get(change.treeNumber)?.delete(change.root);
      } else {
        this.historyFor(change.treeNumber).add(change.root);
      }
    }
    this.treeNumber = checkpoint.treeNumber;
    this.nextLeafIndex = checkpoint.nextLeafIndex;
    this.merkleRoot = checkpoint.merkleRoot;
    this.filledSubTrees = [...checkpoint.filledSubTrees];
  }

  /**
   * Makes every change so far permanent; earlier checkpoints become invalid
   */
  public commit(): void {
    this.journal = [];
  }

  public toJSON(): SerializedCommitmentTree {
    const rootHistory: Record<string, string[]> = {};
    for (const [treeNumber, roots] of this.rootHistory) {
      rootHistory[treeNumber] = [...roots].map(root => root.toString());
    }
    return {
      depth: this.depth,
      treeNumber: this.treeNumber,
      nextLeafIndex: this.nextLeafIndex,
      merkleRoot: this.merkleRoot.toString(),
      filledSubTrees: this.filledSubTrees.map(node => node.toString()),
      rootHistory
    };
  }

  public static fromJSON(data: SerializedCommitmentTree): CommitmentTree {
    const tree = new CommitmentTree(data.depth);
    if (data.filledSubTrees.length !== data.depth || data.nextLeafIndex > tree.capacity) {
      throw ErrorHandler.createFormatError('Serialized tree does not match its depth', { depth: data.depth });
    }
    for (const [treeNumber, roots] of Object.entries(data.rootHistory)) {
      tree.rootHistory.set(Number(treeNumber), new Set(roots.map(root => BigInt(root))));
    }
    tree.treeNumber = data.treeNumber;
    tree.nextLeafIndex = data.nextLeafIndex;
    tree.merkleRoot = BigInt(data.merkleRoot);
    tree.filledSubTrees = data.filledSubTrees.map(node => BigInt(node));
    return tree;
  }

  private newTree(): void {
    this.treeNumber += 1;
    this.nextLeafIndex = 0;
    this.merkleRoot = this.emptyRoot;
    this.filledSubTrees = [...this.zeros];
    this.recordRoot(this.treeNumber, this.emptyRoot);
    this.logger.debug('Started new commitment tree', { treeNumber: this.treeNumber });
  }

  private recordRoot(treeNumber: number, root: bigint): void {
    const history = this.historyFor(treeNumber);
    if (!history.has(root)) {
      history.add(root);
      this.journal.push({ kind: 'added', treeNumber, root });
    }
  }

  private historyFor(treeNumber: number): Set<bigint> {
    let history = this.rootHistory.get(treeNumber);
    if (!history) {
      history = new Set();
      this.rootHistory.set(treeNumber, history);
    }
    return history;
  }
}
