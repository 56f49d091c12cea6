/** Hex string with 0x prefix */
export type Hex = string;

export enum TokenType {
  ERC20 = 0,
  ERC721 = 1,
  ERC1155 = 2
}

export interface TokenData {
  tokenType: TokenType;
  tokenAddress: string;
  tokenSubID: bigint;
}

/**
 * Plaintext commitment inputs published on shield and unshield.
 * For an unshield the npk is the recipient address read as uint256.
 */
export interface CommitmentPreimage {
  npk: bigint;
  token: TokenData;
  value: bigint;
}

/**
 * Shield-path ciphertext. Only the note randomness is concealed; the bundle is
 * [iv || tag, encrypted random] and shieldKey is the depositor's ephemeral viewing public key.
 */
export interface ShieldCiphertext {
  encryptedBundle: Hex[];
  shieldKey: Hex;
}

/**
 * Transfer-path ciphertext: [iv || tag, mpk, random || value, token word, subID], each block
 * encrypted under the key shared through the blinded viewing keys.
 */
export interface CommitmentCiphertext {
  ciphertext: Hex[];
  blindedSenderViewingKey: Hex;
  blindedReceiverViewingKey: Hex;
  annotationData: Hex;
  memo: Hex;
}

/** Private note material; only its commitment ever reaches the ledger. */
export interface Note {
  spendingPublicKey: [bigint, bigint];
  nullifyingKey: bigint;
  masterPublicKey: bigint;
  random: Hex;
  value: bigint;
  token: TokenData;
  memo?: string;
}

export type NoteStatus = 'unspent' | 'spent';

/** A note owned by a wallet together with its ledger position. */
export interface ShieldedNote extends Note {
  treeNumber: number;
  leafIndex: number;
  commitment: bigint;
  nullifier: bigint;
  status: NoteStatus;
  source: 'shield' | 'transact';
}

export interface ShieldedAddress {
  masterPublicKey: bigint;
  viewingPublicKey: Hex;
}
