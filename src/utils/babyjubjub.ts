import { buildEddsa, Eddsa } from 'circomlibjs';
import { ErrorHandler } from '../errors/ErrorHandler';

export interface SpendingSignature {
  R8: [bigint, bigint];
  S: bigint;
}

let eddsaPromise: Promise<Eddsa> | null = null;

// The wasm field is built once and shared
function getEddsa(): Promise<Eddsa> {
  if (!eddsaPromise) {
    eddsaPromise = buildEddsa();
  }
  return eddsaPromise;
}

function assertPrivateKey(privateKey: Uint8Array): void {
  if (privateKey.length !== 32) {
    throw ErrorHandler.createFormatError('Spending key must be 32 bytes', { length: privateKey.length });
  }
}

/**
 * Derives the BabyJubJub spending public key
 * @param privateKey 32-byte spending key
 */
export async function getSpendingPublicKey(privateKey: Uint8Array): Promise<[bigint, bigint]> {
  assertPrivateKey(privateKey);
  const eddsa = await getEddsa();
  const [x, y] = eddsa.prv2pub(privateKey);
  return [eddsa.F.toObject(x), eddsa.F.toObject(y)];
}

/**
 * EdDSA-Poseidon signature over a single field element
 */
export async function signPoseidon(privateKey: Uint8Array, message: bigint): Promise<SpendingSignature> {
  assertPrivateKey(privateKey);
  const eddsa = await getEddsa();
  const signature = eddsa.signPoseidon(privateKey, eddsa.F.e(message));
  return {
    R8: [eddsa.F.toObject(signature.R8[0]), eddsa.F.toObject(signature.R8[1])],
    S: signature.S
  };
}

export async function verifyPoseidon(
  message: bigint,
  signature: SpendingSignature,
  publicKey: [bigint, bigint]
): Promise<boolean> {
  const eddsa = await getEddsa();
  return eddsa.verifyPoseidon(
    eddsa.F.e(message),
    { R8: [eddsa.F.e(signature.R8[0]), eddsa.F.e(signature.R8[1])], S: signature.S },
    [eddsa.F.e(publicKey[0]), eddsa.F.e(publicKey[1])]
  );
}
