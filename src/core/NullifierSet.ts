import { ErrorHandler } from '../errors/ErrorHandler';
import { assertInField } from '../utils/math';

export interface NullifierEntry {
  treeNumber: number;
  nullifier: bigint;
}

/** Position in the undo journal; see NullifierSet.checkpoint */
export type NullifierCheckpoint = number;

/**
 * Insert-only record of spent-note tags. Nullifiers are derived from the leaf index inside a
 * tree, so they are kept per tree number.
 *
 * Insertions since the last commit are journaled; restoring a checkpoint removes only those.
 */
export class NullifierSet {
  private trees: Map<number, Set<bigint>> = new Map();
  private journal: NullifierEntry[] = [];
  private count = 0;

  public has(treeNumber: number, nullifier: bigint): boolean {
    return this.trees.get(treeNumber)?.has(nullifier) ?? false;
  }

  public get size(): number {
    return this.count;
  }

  public insert(treeNumber: number, nullifier: bigint): void {
    this.insertBatch(treeNumber, [nullifier]);
  }

  /**
   * Checks entries against the set and against each other without inserting anything
   */
  public assertUnspent(entries: NullifierEntry[]): void {
    const batch = new Set<string>();
    for (const { treeNumber, nullifier } of entries) {
      assertInField(nullifier, 'nullifier');
      const id = `${treeNumber}:${nullifier}`;
      if (this.has(treeNumber, nullifier) || batch.has(id)) {
        throw ErrorHandler.createStateError('Nullifier already seen', {
          treeNumber,
          nullifier: nullifier.toString()
        });
      }
      batch.add(id);
    }
  }

  /**
   * Inserts every nullifier or none of them
   */
  public insertBatch(treeNumber: number, nullifiers: bigint[]): void {
    if (!Number.isInteger(treeNumber) || treeNumber < 0) {
      throw ErrorHandler.createFormatError('Invalid tree number', { treeNumber });
    }
    this.assertUnspent(nullifiers.map(nullifier => ({ treeNumber, nullifier })));

    let tree = this.trees.get(treeNumber);
    if (!tree) {
      tree = new Set();
      this.trees.set(treeNumber, tree);
    }
    for (const nullifier of nullifiers) {
      tree.add(nullifier);
      this.journal.push({ treeNumber, nullifier });
      this.count += 1;
    }
  }

  public checkpoint(): NullifierCheckpoint {
    return this.journal.length;
  }

  /**
   * Removes every nullifier inserted after the checkpoint
   */
  public restore(checkpoint: NullifierCheckpoint): void {
    if (!Number.isInteger(checkpoint) || checkpoint < 0 || checkpoint > this.journal.length) {
      throw ErrorHandler.createStateError('Nullifier checkpoint is no longer valid', { checkpoint });
    }
    while (this.journal.length > checkpoint) {
      const entry = this.journal.pop();
      if (entry && this.trees.get(entry.treeNumber)?.delete(entry.nullifier)) {
        this.count -= 1;
      }
    }
  }

  /**
   * Makes every insertion so far permanent; earlier checkpoints become invalid
   */
  public commit(): void {
    this.journal = [];
  }

  public toJSON(): Record<string, string[]> {
    const data: Record<string, string[]> = {};
    for (const [treeNumber, nullifiers] of this.trees) {
      if (nullifiers.size > 0) {
        data[treeNumber] = [...nullifiers].map(nullifier => nullifier.toString());
      }
    }
    return data;
  }

  public static fromJSON(data: Record<string, string[]>): NullifierSet {
    const set = new NullifierSet();
    for (const [treeNumber, nullifiers] of Object.entries(data)) {
      set.insertBatch(Number(treeNumber), nullifiers.map(value => BigInt(value)));
    }
    set.commit();
    return set;
  }
}
