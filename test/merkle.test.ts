import { hashToField } from '../src/utils/hash';
import {
    buildLevels,
    computeRoot,
    generateMerkleProof,
    getZeroValues,
    hashLeftRight,
    validateMerkleProof,
    ZERO_VALUE
} from '../src/utils/merkle';
import { poseidonHashMany } from '../src/utils/poseidon';

describe('Merkle Tree Utilities', () => {
    const [a, b, c] = [11n, 22n, 33n];

    describe('getZeroValues', () => {
        it('should chain empty-subtree hashes from the zero leaf', () => {
            const zeros = getZeroValues(2);
            expect(zeros).toHaveLength(3);
            expect(zeros[0]).toBe(ZERO_VALUE);
            expect(zeros[1]).toBe(hashLeftRight(ZERO_VALUE, ZERO_VALUE));
            expect(zeros[2]).toBe(hashLeftRight(zeros[1], zeros[1]));
        });

        it('should derive the zero leaf from a fixed tag', () => {
            expect(ZERO_VALUE).toBe(hashToField('shieldpool'));
        });

        it('should hand out copies of the cached values', () => {
            getZeroValues(3).pop();
            expect(getZeroValues(3)).toHaveLength(4);
        });
    });

    describe('hashLeftRight', () => {
        it('should be two-input poseidon', () => {
            expect(hashLeftRight(a, b)).toBe(poseidonHashMany([a, b]));
        });
    });

    describe('computeRoot', () => {
        it('should return the empty root for no leaves', () => {
            expect(computeRoot([], 2)).toBe(getZeroValues(2)[2]);
        });

        it('should pad missing leaves with zero values', () => {
            const zeros = getZeroValues(2);
            expect(computeRoot([a, b, c], 2)).toBe(hashLeftRight(hashLeftRight(a, b), hashLeftRight(c, zeros[0])));
        });

        it('should reject more leaves than the depth holds', () => {
            expect(() => buildLevels([a, b, c], 1)).toThrow('Too many leaves for tree depth');
        });
    });

    describe('generateMerkleProof', () => {
        it('should collect siblings from the leaf upwards', () => {
            const zeros = getZeroValues(2);
            const proof = generateMerkleProof([a, b, c], 2, 2);
            expect(proof.leaf).toBe(c);
            expect(proof.elements).toEqual([zeros[0], hashLeftRight(a, b)]);
            expect(proof.indices).toBe(2n);
            expect(proof.root).toBe(computeRoot([a, b, c], 2));
        });

        it('should produce proofs that validate for every leaf', () => {
            const leaves = [a, b, c, 44n, 55n];
            leaves.forEach((_, index) => {
                expect(validateMerkleProof(generateMerkleProof(leaves, index, 3))).toBe(true);
            });
        });

        it('should fail validation when an element or the index is changed', () => {
            const proof = generateMerkleProof([a, b, c], 1, 2);
            expect(validateMerkleProof({ ...proof, elements: [proof.elements[0] + 1n, proof.elements[1]] })).toBe(false);
            expect(validateMerkleProof({ ...proof, indices: 0n })).toBe(false);
            expect(validateMerkleProof({ ...proof, leaf: c })).toBe(false);
        });

        it('should reject an index without a leaf', () => {
            expect(() => generateMerkleProof([a], 1, 2)).toThrow('Leaf index out of range');
        });
    });
});
