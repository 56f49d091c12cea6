import { ErrorHandler } from '../errors/ErrorHandler';
import { Fees } from '../types/Transaction';

/** Order of the BN254 scalar field; every circuit signal lives below it. */
export const SNARK_SCALAR_FIELD = BigInt(
  '21888242871839275222246405745257275088548364400416034343698204186575808495617'
);

/** BN254 base field modulus; proof and key coordinates live below it. */
export const SNARK_PRIME = BigInt(
  '21888242871839275222246405745257275088696311157297823662689037894645226208583'
);

export const BASIS_POINTS = 10000n;

/** Note values are 120-bit. */
export const MAX_NOTE_VALUE = (1n << 120n) - 1n;

/**
 * Non-negative remainder
 * @param a Dividend
 * @param m Modulus
 */
export function mod(a: bigint, m: bigint): bigint {
  const result = a % m;
  return result >= 0n ? result : result + m;
}

export function isInField(value: bigint, modulus: bigint = SNARK_SCALAR_FIELD): boolean {
  return value >= 0n && value < modulus;
}

/**
 * Throws a FormatError when value is not a canonical field element.
 * @param value Value to check
 * @param label Name used in the error context
 */
export function assertInField(value: bigint, label: string, modulus: bigint = SNARK_SCALAR_FIELD): void {
  if (!isInField(value, modulus)) {
    throw ErrorHandler.createFormatError(`${label} is not a valid field element`, {
      field: label,
      value: value.toString()
    });
  }
}

/**
 * Splits an amount into base and fee.
 *
 * Inclusive: the fee is taken out of the amount, base = amount * 10000 / (10000 + feeBP).
 * Exclusive: the fee is charged on top, base = amount and fee = amount * feeBP / 10000.
 */
export function getFee(amount: bigint, isInclusive: boolean, feeBP: number | bigint): Fees {
  const bp = BigInt(feeBP);
  if (amount < 0n || bp < 0n) {
    throw ErrorHandler.createFormatError('Fee inputs must be non-negative', {
      amount: amount.toString(),
      feeBP: bp.toString()
    });
  }

  if (isInclusive) {
    const base = (amount * BASIS_POINTS) / (BASIS_POINTS + bp);
    return { base, fee: amount - base };
  }

  return { base: amount, fee: (amount * bp) / BASIS_POINTS };
}
