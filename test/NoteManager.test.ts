import { NoteManager } from '../src/core/NoteManager';
import { ErrorType } from '../src/errors/ErrorHandler';
import { ShieldedNote, TokenData } from '../src/types/Note';
import { getMasterPublicKey, getNoteHash, getNullifier } from '../src/utils/note';
import { captureError } from './helpers/errors';
import { NFT, TOKEN } from './helpers/fixtures';

const spendingPublicKey: [bigint, bigint] = [1n, 2n];
const nullifyingKey = 3n;
const masterPublicKey = getMasterPublicKey(spendingPublicKey, nullifyingKey);

function makeNote(value: bigint, leafIndex: number, treeNumber: number = 0, token: TokenData = TOKEN): ShieldedNote {
    const base = {
        spendingPublicKey,
        nullifyingKey,
        masterPublicKey,
        random: '0x' + leafIndex.toString(16).padStart(2, '0').repeat(16),
        value,
        token
    };
    return {
        ...base,
        treeNumber,
        leafIndex,
        commitment: getNoteHash(base),
        nullifier: getNullifier(nullifyingKey, leafIndex),
        status: 'unspent',
        source: 'shield'
    };
}

describe('NoteManager', () => {
    let noteManager: NoteManager;

    beforeEach(() => {
        noteManager = new NoteManager();
    });

    describe('addNote', () => {
        it('should index notes by position', () => {
            const note = makeNote(100n, 0);
            expect(noteManager.addNote(note)).toBe(true);
            expect(noteManager.getNote(0, 0)).toEqual(note);
        });

        it('should ignore a position it already knows', () => {
            noteManager.addNote(makeNote(100n, 0));
            expect(noteManager.addNote(makeNote(100n, 0))).toBe(false);
            expect(noteManager.getNotes()).toHaveLength(1);
        });
    });

    describe('getNote', () => {
        it('should throw for an unknown position', () => {
            const error = captureError(() => noteManager.getNote(0, 9));
            expect(error.type).toBe(ErrorType.NOTE_NOT_FOUND);
            expect(error.message).toBe('Note not found');
            expect(error.context).toEqual({ treeNumber: 0, leafIndex: 9 });
        });

        it('should return copies', () => {
            noteManager.addNote(makeNote(100n, 0));
            noteManager.getNote(0, 0).status = 'spent';
            expect(noteManager.getNote(0, 0).status).toBe('unspent');
        });
    });

    describe('getNotes', () => {
        beforeEach(() => {
            noteManager.addNote(makeNote(100n, 0));
            noteManager.addNote(makeNote(300n, 1));
            noteManager.addNote(makeNote(200n, 0, 1));
            noteManager.addNote(makeNote(1n, 2, 0, NFT));
        });

        it('should filter by token, tree and amount', () => {
            expect(noteManager.getNotes({ token: TOKEN })).toHaveLength(3);
            expect(noteManager.getNotes({ token: NFT }).map(note => note.leafIndex)).toEqual([2]);
            expect(noteManager.getNotes({ treeNumber: 1 }).map(note => note.value)).toEqual([200n]);
            expect(noteManager.getNotes({ minAmount: 150n, maxAmount: 250n }).map(note => note.value)).toEqual([200n]);
        });

        it('should filter by status', () => {
            noteManager.markSpent(0, makeNote(300n, 1).nullifier);
            expect(noteManager.getNotes({ status: 'spent' }).map(note => note.value)).toEqual([300n]);
            expect(noteManager.getUnspentNotes(TOKEN).map(note => note.value)).toEqual([100n, 200n]);
        });

        it('should sum balances per token', () => {
            expect(noteManager.getBalance(TOKEN)).toBe(600n);
            expect(noteManager.getBalances()).toEqual([
                { token: TOKEN, balance: 600n },
                { token: NFT, balance: 1n }
            ]);
        });
    });

    describe('markSpent', () => {
        it('should mark a note once', () => {
            const note = makeNote(100n, 0);
            noteManager.addNote(note);
            expect(noteManager.markSpent(0, note.nullifier)).toBe(true);
            expect(noteManager.markSpent(0, note.nullifier)).toBe(false);
            expect(noteManager.getBalance(TOKEN)).toBe(0n);
        });

        it('should ignore nullifiers of other wallets', () => {
            expect(noteManager.markSpent(0, 12345n)).toBe(false);
        });

        it('should only mark the note in the named tree', () => {
            const first = makeNote(100n, 2, 0);
            const second = makeNote(200n, 2, 1);
            noteManager.addNote(first);
            noteManager.addNote(second);
            expect(second.nullifier).toBe(first.nullifier);

            expect(noteManager.markSpent(1, second.nullifier)).toBe(true);
            expect(noteManager.getNote(0, 2).status).toBe('unspent');
            expect(noteManager.getNote(1, 2).status).toBe('spent');
            expect(noteManager.getBalance(TOKEN)).toBe(100n);
        });
    });

    describe('selectNotes', () => {
        beforeEach(() => {
            noteManager.addNote(makeNote(100n, 0));
            noteManager.addNote(makeNote(300n, 1));
            noteManager.addNote(makeNote(200n, 2));
        });

        it('should pick the largest notes first', () => {
            expect(noteManager.selectNotes(TOKEN, 250n).map(note => note.value)).toEqual([300n]);
            expect(noteManager.selectNotes(TOKEN, 450n).map(note => note.value)).toEqual([300n, 200n]);
            expect(noteManager.selectNotes(TOKEN, 600n).map(note => note.value)).toEqual([300n, 200n, 100n]);
        });

        it('should break ties by leaf index', () => {
            noteManager.addNote(makeNote(300n, 3));
            expect(noteManager.selectNotes(TOKEN, 500n).map(note => note.leafIndex)).toEqual([1, 3]);
        });

        it('should report insufficient funds', () => {
            const error = captureError(() => noteManager.selectNotes(TOKEN, 601n));
            expect(error.type).toBe(ErrorType.INSUFFICIENT_FUNDS);
            expect(error.message).toBe('Insufficient funds. Required: 601, Available: 600');
        });

        it('should respect the input limit', () => {
            expect(() => noteManager.selectNotes(TOKEN, 350n, 1)).toThrow('Insufficient funds');
            expect(noteManager.selectNotes(TOKEN, 500n, 2).map(note => note.value)).toEqual([300n, 200n]);
        });

        it('should keep a selection inside one tree', () => {
            noteManager.addNote(makeNote(700n, 0, 1));
            expect(noteManager.selectNotes(TOKEN, 650n).map(note => [note.treeNumber, note.value])).toEqual([[1, 700n]]);
            expect(() => noteManager.selectNotes(TOKEN, 800n)).toThrow('Insufficient funds. Required: 800, Available: 1300');
        });

        it('should skip spent notes', () => {
            noteManager.markSpent(0, makeNote(300n, 1).nullifier);
            expect(noteManager.selectNotes(TOKEN, 250n).map(note => note.value)).toEqual([200n, 100n]);
        });
    });

    describe('exportNotes / importNotes', () => {
        it('should move notes between managers', () => {
            noteManager.addNote(makeNote(100n, 0));
            noteManager.addNote(makeNote(1n, 1, 0, NFT));
            noteManager.markSpent(0, makeNote(100n, 0).nullifier);

            const restored = new NoteManager();
            expect(restored.importNotes(noteManager.exportNotes())).toBe(2);
            expect(restored.getNote(0, 0).status).toBe('spent');
            expect(restored.getNote(0, 1)).toEqual(makeNote(1n, 1, 0, NFT));
            expect(restored.importNotes(noteManager.exportNotes())).toBe(0);
        });

        it('should reject malformed input', () => {
            expect(captureError(() => noteManager.importNotes('{')).message).toBe('Invalid notes JSON');
            expect(captureError(() => noteManager.importNotes('{}')).message).toBe('Notes export must be an array');
            expect(captureError(() => noteManager.importNotes('[{"value":"1"}]')).message).toBe('Malformed note entry');
        });

        it('should reject notes that do not match their commitment', () => {
            noteManager.addNote({ ...makeNote(100n, 0), commitment: 1n });
            expect(captureError(() => new NoteManager().importNotes(noteManager.exportNotes())).message).toBe(
                'Stored note does not match its commitment'
            );
        });
    });

    describe('clear', () => {
        it('should forget every note', () => {
            noteManager.addNote(makeNote(100n, 0));
            noteManager.clear();
            expect(noteManager.getNotes()).toEqual([]);
            expect(noteManager.markSpent(0, makeNote(100n, 0).nullifier)).toBe(false);
        });
    });
});
