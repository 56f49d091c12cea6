import {
  poseidon1,
  poseidon2,
  poseidon3,
  poseidon4,
  poseidon5,
  poseidon6,
  poseidon7,
  poseidon8,
  poseidon9,
  poseidon10,
  poseidon11,
  poseidon12,
  poseidon13,
  poseidon14,
  poseidon15,
  poseidon16
} from 'poseidon-lite';
import { ErrorHandler } from '../errors/ErrorHandler';
import { assertInField } from './math';

type PoseidonFn = (inputs: bigint[]) => bigint;

// Indexed by arity - 1
const POSEIDON_BY_ARITY: PoseidonFn[] = [
  poseidon1, poseidon2, poseidon3, poseidon4, poseidon5, poseidon6, poseidon7, poseidon8,
  poseidon9, poseidon10, poseidon11, poseidon12, poseidon13, poseidon14, poseidon15, poseidon16
];

export const MAX_POSEIDON_INPUTS = POSEIDON_BY_ARITY.length;

/**
 * Hashes a single input using Poseidon hash function
 * @param input Input value as a bigint
 * @returns Hashed value as a bigint
 */
export function poseidonHash(input: bigint): bigint {
    return poseidonHashMany([input]);
}

/**
 * Hashes 1 to 16 field elements with the circuit-compatible Poseidon of matching width.
 * Inputs outside the scalar field are rejected rather than reduced.
 * @param inputs Array of input values as bigints
 * @returns Hashed value as a bigint
 */
export function poseidonHashMany(inputs: bigint[]): bigint {
    const hashFn = POSEIDON_BY_ARITY[inputs.length - 1];
    if (inputs.length === 0 || !hashFn) {
        throw ErrorHandler.createFormatError(
            `Poseidon takes between 1 and ${MAX_POSEIDON_INPUTS} inputs`,
            { inputs: inputs.length }
        );
    }
    inputs.forEach((input, i) => assertInField(input, `poseidon input ${i}`));
    return hashFn(inputs);
}
