/**
 * Type declarations for circomlibjs
 *
 * Only the BabyJubJub EdDSA surface used for spending keys is declared. Field elements
 * are the library's internal Montgomery byte representation.
 */

declare module 'circomlibjs' {
  /** Finite field over the BN254 scalar field */
  export interface BabyJubField {
    e(value: bigint | number | string): Uint8Array;
    toObject(element: Uint8Array): bigint;
  }

  export interface EddsaSignature {
    R8: [Uint8Array, Uint8Array];
    S: bigint;
  }

  export interface Eddsa {
    F: BabyJubField;
    prv2pub(privateKey: Uint8Array): [Uint8Array, Uint8Array];
    signPoseidon(privateKey: Uint8Array, message: Uint8Array): EddsaSignature;
    verifyPoseidon(message: Uint8Array, signature: EddsaSignature, publicKey: [Uint8Array, Uint8Array]): boolean;
  }

  export function buildEddsa(): Promise<Eddsa>;
}
