import { ed25519 } from '@noble/curves/ed25519';
import { ErrorHandler } from '../errors/ErrorHandler';
import { bigIntToBytes, bytesToBigInt, hexToBytes } from './bytes';
import { sha256, sha512 } from './hash';

const CURVE_ORDER = ed25519.CURVE.n;

export interface BlindedKeys {
  blindedSenderViewingKey: Uint8Array;
  blindedReceiverViewingKey: Uint8Array;
}

export function getViewingPublicKey(privateKey: Uint8Array): Uint8Array {
  return ed25519.getPublicKey(privateKey);
}

/** Clamped ed25519 scalar of a viewing private key, reduced mod the group order */
export function getPrivateScalar(privateKey: Uint8Array): bigint {
  return ed25519.utils.getExtendedPublicKey(privateKey).scalar;
}

/**
 * Maps an arbitrary seed to a scalar in [1, n - 1] via sha512.
 */
export function seedToScalar(seed: Uint8Array): bigint {
  return (bytesToBigInt(sha512(seed)) % (CURVE_ORDER - 1n)) + 1n;
}

function toPoint(publicKey: Uint8Array) {
  try {
    return ed25519.ExtendedPoint.fromHex(publicKey);
  } catch (error) {
    throw ErrorHandler.createFormatError('Invalid viewing public key', {
      error: error instanceof Error ? error.message : String(error)
    });
  }
}

/**
 * Symmetric key shared between a private key holder and a counterparty public key:
 * sha256(publicKey * privateScalar).
 */
export function getSharedSymmetricKey(privateKey: Uint8Array, publicKey: Uint8Array): Uint8Array {
  const preimage = toPoint(publicKey).multiply(getPrivateScalar(privateKey)).toRawBytes();
  return hexToBytes(sha256(preimage));
}

/**
 * Blinds both viewing public keys with a scalar derived from sharedRandom XOR senderRandom.
 * Each random is left-padded to 32 bytes before combining.
 */
export function blindViewingKeys(
  senderViewingPublicKey: Uint8Array,
  receiverViewingPublicKey: Uint8Array,
  sharedRandom: Uint8Array,
  senderRandom: Uint8Array
): BlindedKeys {
  const finalRandom = bigIntToBytes(bytesToBigInt(sharedRandom) ^ bytesToBigInt(senderRandom), 32);
  const blindingScalar = seedToScalar(finalRandom);

  return {
    blindedSenderViewingKey: toPoint(senderViewingPublicKey).multiply(blindingScalar).toRawBytes(),
    blindedReceiverViewingKey: toPoint(receiverViewingPublicKey).multiply(blindingScalar).toRawBytes()
  };
}
