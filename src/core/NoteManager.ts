import { ErrorHandler, ErrorType, ShieldPoolError } from '../errors/ErrorHandler';
import { NoteStatus, ShieldedNote, TokenData } from '../types/Note';
import { deserializeNote, SerializedNote, serializeNote, tokenKey } from '../utils/note';

export interface NoteFilter {
  status?: NoteStatus;
  token?: TokenData;
  treeNumber?: number;
  minAmount?: bigint;
  maxAmount?: bigint;
}

export interface TokenBalance {
  token: TokenData;
  balance: bigint;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isSerializedNote(value: unknown): value is SerializedNote {
  if (!isRecord(value) || !isRecord(value.token) || !Array.isArray(value.spendingPublicKey)) {
    return false;
  }
  const strings = ['nullifyingKey', 'masterPublicKey', 'random', 'value', 'commitment', 'nullifier'];
  return (
    strings.every(field => typeof value[field] === 'string') &&
    typeof value.treeNumber === 'number' &&
    typeof value.leafIndex === 'number' &&
    (value.status === 'spent' || value.status === 'unspent') &&
    (value.source === 'shield' || value.source === 'transact') &&
    typeof value.token.tokenType === 'number' &&
    typeof value.token.tokenAddress === 'string' &&
    typeof value.token.tokenSubID === 'string'
  );
}

function noteId(treeNumber: number, leafIndex: number): string {
  return `${treeNumber}:${leafIndex}`;
}

function nullifierId(treeNumber: number, nullifier: bigint): string {
  return `${treeNumber}:${nullifier}`;
}

/**
 * Owned notes indexed by ledger position, with spent tracking by nullifier.
 */
export class NoteManager {
  private notes: Map<string, ShieldedNote> = new Map();
  private byNullifier: Map<string, string> = new Map();

  /**
   * Adds a note. Re-adding a known position is ignored, so rescans are idempotent.
   */
  addNote(note: ShieldedNote): boolean {
    const id = noteId(note.treeNumber, note.leafIndex);
    if (this.notes.has(id)) {
      return false;
    }
    this.notes.set(id, { ...note });
    this.byNullifier.set(nullifierId(note.treeNumber, note.nullifier), id);
    return true;
  }

  getNote(treeNumber: number, leafIndex: number): ShieldedNote {
    const note = this.notes.get(noteId(treeNumber, leafIndex));
    if (!note) {
      throw new ShieldPoolError(
        'Note not found',
        ErrorType.NOTE_NOT_FOUND,
        { treeNumber, leafIndex },
        { action: 'Rescan events', description: 'No owned note is recorded at this position.' },
        false
      );
    }
    return { ...note };
  }

  getNotes(filter: NoteFilter = {}): ShieldedNote[] {
    const key = filter.token ? tokenKey(filter.token) : undefined;
    return [...this.notes.values()]
      .filter(note => {
        if (filter.status && note.status !== filter.status) return false;
        if (key !== undefined && tokenKey(note.token) !== key) return false;
        if (filter.treeNumber !== undefined && note.treeNumber !== filter.treeNumber) return false;
        if (filter.minAmount !== undefined && note.value < filter.minAmount) return false;
        if (filter.maxAmount !== undefined && note.value > filter.maxAmount) return false;
        return true;
      })
      .map(note => ({ ...note }));
  }

  getUnspentNotes(token?: TokenData): ShieldedNote[] {
    return this.getNotes({ status: 'unspent', token });
  }

  /**
   * Marks the note with this nullifier in the given tree as spent. Returns false for
   * nullifiers of other wallets.
   */
  markSpent(treeNumber: number, nullifier: bigint): boolean {
    const id = this.byNullifier.get(nullifierId(treeNumber, nullifier));
    const note = id ? this.notes.get(id) : undefined;
    if (!note || note.status === 'spent') {
      return false;
    }
    note.status = 'spent';
    return true;
  }

  getBalance(token: TokenData): bigint {
    return this.getUnspentNotes(token).reduce((sum, note) => sum + note.value, 0n);
  }

  getBalances(): TokenBalance[] {
    const balances = new Map<string, TokenBalance>();
    for (const note of this.getUnspentNotes()) {
      const key = tokenKey(note.token);
      const entry = balances.get(key) ?? { token: note.token, balance: 0n };
      entry.balance += note.value;
      balances.set(key, entry);
    }
    return [...balances.values()];
  }

  /**
   * Largest-first selection of unspent notes of one token inside a single tree. Picks the first
   * tree, by tree number, that can cover the amount.
   */
  selectNotes(token: TokenData, amount: bigint, maxInputs?: number): ShieldedNote[] {
    const unspent = this.getUnspentNotes(token);
    const trees = [...new Set(unspent.map(note => note.treeNumber))].sort((a, b) => a - b);

    for (const treeNumber of trees) {
      const candidates = unspent
        .filter(note => note.treeNumber === treeNumber)
        .sort((a, b) => (a.value === b.value ? a.leafIndex - b.leafIndex : a.value > b.value ? -1 : 1));

      const selected: ShieldedNote[] = [];
      let total = 0n;
      for (const note of candidates) {
        if (total >= amount || (maxInputs !== undefined && selected.length >= maxInputs)) {
          break;
        }
        selected.push(note);
        total += note.value;
      }
      if (total >= amount && selected.length > 0) {
        return selected;
      }
    }

    throw ErrorHandler.createInsufficientFundsError(amount.toString(), this.getBalance(token).toString(), {
      token: token.tokenAddress
    });
  }

  exportNotes(): string {
    return JSON.stringify([...this.notes.values()].map(serializeNote));
  }

  /**
   * Imports notes from exportNotes output. Every note's commitment is recomputed before it is
   * accepted. Returns the number of new notes.
   */
  importNotes(json: string): number {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      throw ErrorHandler.createFormatError('Invalid notes JSON', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
    if (!Array.isArray(parsed)) {
      throw ErrorHandler.createFormatError('Notes export must be an array');
    }

    const entries: unknown[] = parsed;
    const imported: ShieldedNote[] = [];
    for (const entry of entries) {
      if (!isSerializedNote(entry)) {
        throw ErrorHandler.createFormatError('Malformed note entry');
      }
      imported.push(deserializeNote(entry));
    }
    return imported.filter(note => this.addNote(note)).length;
  }

  clear(): void {
    this.notes = new Map();
    this.byNullifier = new Map();
  }
}
