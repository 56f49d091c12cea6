import { utils } from 'ethers';
import { ErrorHandler } from '../errors/ErrorHandler';
import { Hex } from '../types/Note';

export function hexToBytes(hex: Hex): Uint8Array {
  return utils.arrayify(hex);
}

export function bytesToHex(bytes: Uint8Array): Hex {
  return utils.hexlify(bytes);
}

/**
 * Big-endian fixed-width encoding
 * @param value Non-negative integer
 * @param length Output length in bytes
 */
export function bigIntToBytes(value: bigint, length: number): Uint8Array {
  if (value < 0n || value >= 1n << BigInt(length * 8)) {
    throw ErrorHandler.createFormatError(`Value does not fit in ${length} bytes`, {
      value: value.toString(),
      length
    });
  }
  return utils.arrayify('0x' + value.toString(16).padStart(length * 2, '0'));
}

export function bigIntToHex(value: bigint, length: number = 32): Hex {
  return utils.hexlify(bigIntToBytes(value, length));
}

export function bytesToBigInt(bytes: Uint8Array | Hex): bigint {
  const hex = typeof bytes === 'string' ? bytes : utils.hexlify(bytes);
  return hex === '0x' ? 0n : BigInt(hex);
}

/** XOR of two equal-length byte arrays */
export function xorBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length !== b.length) {
    throw ErrorHandler.createFormatError('Cannot xor byte arrays of different lengths', {
      left: a.length,
      right: b.length
    });
  }
  return a.map((byte, i) => byte ^ b[i]);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  return utils.concat(parts);
}

export function hexLength(hex: Hex): number {
  return utils.hexDataLength(hex);
}

/** Address as the uint256 stored in an unshield preimage's npk slot */
export function addressToBigInt(address: string): bigint {
  return BigInt(utils.getAddress(address));
}

export function bigIntToAddress(value: bigint): string {
  return utils.getAddress(bigIntToHex(value, 20));
}
