import { utils } from 'ethers';
import { Hex } from '../types/Note';
import { SNARK_SCALAR_FIELD } from './math';

type BytesInput = string | Uint8Array;

function toBytes(input: BytesInput): Uint8Array {
  return typeof input === 'string' && !utils.isHexString(input)
    ? utils.toUtf8Bytes(input)
    : utils.arrayify(input);
}

/**
 * Hashes a utf8 string, hex string or byte array using keccak256
 * @returns Hashed value in hex format
 */
export function keccak256(input: BytesInput): Hex {
  return utils.keccak256(toBytes(input));
}

export function sha256(input: BytesInput): Hex {
  return utils.sha256(toBytes(input));
}

export function sha512(input: BytesInput): Hex {
  return utils.sha512(toBytes(input));
}

/**
 * Hashes a string to a scalar field element
 * @param input String to hash
 */
export function hashToField(input: BytesInput): bigint {
  return BigInt(keccak256(input)) % SNARK_SCALAR_FIELD;
}
