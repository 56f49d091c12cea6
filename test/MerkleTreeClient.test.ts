import { CommitmentTree } from '../src/core/CommitmentTree';
import { MerkleTreeClient } from '../src/core/MerkleTreeClient';
import { ErrorType } from '../src/errors/ErrorHandler';
import { computeRoot, getZeroValues, validateMerkleProof } from '../src/utils/merkle';
import { captureError } from './helpers/errors';

const DEPTH = 3;

function leaves(from: number, count: number): bigint[] {
    return Array.from({ length: count }, (_, i) => BigInt(1000 + from + i));
}

describe('MerkleTreeClient', () => {
    let client: MerkleTreeClient;

    beforeEach(() => {
        client = new MerkleTreeClient(DEPTH);
    });

    it('should report the empty root for unknown trees', () => {
        expect(client.getLeafCount(0)).toBe(0);
        expect(client.getRoot(0)).toBe(getZeroValues(DEPTH)[DEPTH]);
        expect(client.getTreeNumbers()).toEqual([]);
    });

    it('should follow the ledger accumulator batch by batch', () => {
        const tree = new CommitmentTree(DEPTH);
        for (const count of [2, 1, 3]) {
            const batch = leaves(tree.getNextLeafIndex(), count);
            const { treeNumber, startPosition } = tree.insertLeaves(batch);
            client.insertLeaves(treeNumber, startPosition, batch);
            expect(client.getRoot(treeNumber)).toBe(tree.getRoot());
        }
        expect(client.getLeafCount(0)).toBe(6);
    });

    it('should match a full rebuild after every single-leaf and mixed batch', () => {
        const inserted: bigint[] = [];
        for (const count of [1, 1, 3, 1, 2]) {
            const batch = leaves(inserted.length, count);
            client.insertLeaves(0, inserted.length, batch);
            inserted.push(...batch);
            expect(client.getRoot(0)).toBe(computeRoot(inserted, DEPTH));
            inserted.forEach((leaf, index) => {
                const proof = client.getMerkleProof(0, index);
                expect(proof.leaf).toBe(leaf);
                expect(validateMerkleProof(proof)).toBe(true);
            });
        }
        expect(client.getLeafCount(0)).toBe(8);
    });

    it('should produce proofs against the current root', () => {
        client.insertLeaves(0, 0, leaves(0, 5));
        for (let index = 0; index < 5; index++) {
            const proof = client.getMerkleProof(0, index);
            expect(proof.leaf).toBe(BigInt(1000 + index));
            expect(proof.root).toBe(computeRoot(leaves(0, 5), DEPTH));
            expect(validateMerkleProof(proof)).toBe(true);
        }
    });

    it('should refresh proofs after new leaves land', () => {
        client.insertLeaves(0, 0, leaves(0, 1));
        const before = client.getMerkleProof(0, 0);
        client.insertLeaves(0, 1, leaves(1, 1));
        const after = client.getMerkleProof(0, 0);
        expect(after.root).not.toBe(before.root);
        expect(after.elements[0]).toBe(1001n);
        expect(validateMerkleProof(after)).toBe(true);
    });

    it('should keep trees apart', () => {
        client.insertLeaves(0, 0, leaves(0, 8));
        client.insertLeaves(1, 0, [7n]);
        expect(client.getTreeNumbers()).toEqual([0, 1]);
        expect(client.getRoot(1)).toBe(computeRoot([7n], DEPTH));
        expect(client.getMerkleProof(1, 0).indices).toBe(0n);
    });

    it('should accept replays of known ranges', () => {
        client.insertLeaves(0, 0, leaves(0, 3));
        client.insertLeaves(0, 1, leaves(1, 3));
        expect(client.getLeafCount(0)).toBe(4);
    });

    it('should reject gaps and conflicts', () => {
        client.insertLeaves(0, 0, leaves(0, 2));
        const gap = captureError(() => client.insertLeaves(0, 3, [1n]));
        expect(gap.type).toBe(ErrorType.STATE_ERROR);
        expect(gap.message).toBe('Missing leaves before insertion point');
        expect(gap.context.known).toBe(2);
        expect(captureError(() => client.insertLeaves(0, 1, [5n])).message).toBe('Conflicting leaf at position');
    });

    it('should reject batches past capacity', () => {
        expect(captureError(() => client.insertLeaves(0, 0, leaves(0, 9))).message).toBe('Batch exceeds tree capacity');
    });

    it('should reject proofs for unknown leaves', () => {
        client.insertLeaves(0, 0, leaves(0, 2));
        expect(captureError(() => client.getMerkleProof(0, 2)).message).toBe('Leaf index out of range');
        expect(captureError(() => client.getMerkleProof(4, 0)).context).toEqual({ treeNumber: 4, leafIndex: 0 });
    });
});
