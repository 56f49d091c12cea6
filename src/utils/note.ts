import { utils } from 'ethers';
import { ErrorHandler } from '../errors/ErrorHandler';
import {
  CommitmentCiphertext,
  CommitmentPreimage,
  Hex,
  Note,
  ShieldCiphertext,
  ShieldedNote,
  TokenData,
  TokenType
} from '../types/Note';
import {
  bigIntToBytes,
  bytesToBigInt,
  bytesToHex,
  concatBytes,
  hexLength,
  hexToBytes
} from './bytes';
import { decryptBundle, decryptData, encryptBundle, encryptData, randomBytes } from './encryption';
import { keccak256, sha256 } from './hash';
import { Logger } from './logger';
import { blindViewingKeys, getSharedSymmetricKey, getViewingPublicKey } from './keyExchange';
import { MAX_NOTE_VALUE, SNARK_SCALAR_FIELD } from './math';
import { poseidonHashMany } from './poseidon';

export const NOTE_RANDOM_LENGTH = 16;
export const SENDER_RANDOM_LENGTH = 15;

const abiCoder = utils.defaultAbiCoder;

/**
 * Validates token data and returns it with a checksummed address.
 * Non-fungible tokens may carry any subID; ERC20 tokens must use subID 0.
 */
export function normalizeTokenData(token: TokenData): TokenData {
  const tokenType = parseTokenType(token.tokenType);
  if (!utils.isAddress(token.tokenAddress)) {
    throw ErrorHandler.createFormatError('Invalid token address', { token: token.tokenAddress });
  }
  if (token.tokenSubID < 0n || token.tokenSubID >= 1n << 256n) {
    throw ErrorHandler.createFormatError('Token subID out of range', { tokenSubID: token.tokenSubID.toString() });
  }
  if (tokenType === TokenType.ERC20 && token.tokenSubID !== 0n) {
    throw ErrorHandler.createFormatError('ERC20 tokens must have subID 0', { token: token.tokenAddress });
  }
  return {
    tokenType,
    tokenAddress: utils.getAddress(token.tokenAddress),
    tokenSubID: token.tokenSubID
  };
}

export function parseTokenType(value: number): TokenType {
  switch (value) {
    case TokenType.ERC20:
      return TokenType.ERC20;
    case TokenType.ERC721:
      return TokenType.ERC721;
    case TokenType.ERC1155:
      return TokenType.ERC1155;
    default:
      throw ErrorHandler.createFormatError('Unknown token type', { tokenType: value });
  }
}

/**
 * tokenID = address for fungible tokens, keccak256(abi.encode(type, address, subID)) mod field otherwise
 */
export function getTokenID(token: TokenData): bigint {
  const normalized = normalizeTokenData(token);
  if (normalized.tokenType === TokenType.ERC20) {
    return BigInt(normalized.tokenAddress);
  }
  const encoded = abiCoder.encode(
    ['uint8', 'address', 'uint256'],
    [normalized.tokenType, normalized.tokenAddress, normalized.tokenSubID]
  );
  return BigInt(keccak256(encoded)) % SNARK_SCALAR_FIELD;
}

export function tokenKey(token: TokenData): string {
  return getTokenID(token).toString(16);
}

export function getNullifyingKey(viewingPrivateKey: Uint8Array): bigint {
  return poseidonHashMany([bytesToBigInt(viewingPrivateKey) % SNARK_SCALAR_FIELD]);
}

export function getMasterPublicKey(spendingPublicKey: [bigint, bigint], nullifyingKey: bigint): bigint {
  return poseidonHashMany([spendingPublicKey[0], spendingPublicKey[1], nullifyingKey]);
}

export function getNotePublicKey(masterPublicKey: bigint, random: Hex): bigint {
  if (hexLength(random) !== NOTE_RANDOM_LENGTH) {
    throw ErrorHandler.createFormatError(`Note random must be ${NOTE_RANDOM_LENGTH} bytes`, { random });
  }
  return poseidonHashMany([masterPublicKey, bytesToBigInt(random)]);
}

export function assertNoteValue(value: bigint): void {
  if (value < 0n || value > MAX_NOTE_VALUE) {
    throw ErrorHandler.createFormatError('Note value out of range', { value: value.toString() });
  }
}

/**
 * commitment = poseidon(npk, tokenID, value)
 */
export function hashCommitment(preimage: CommitmentPreimage): bigint {
  assertNoteValue(preimage.value);
  return poseidonHashMany([preimage.npk, getTokenID(preimage.token), preimage.value]);
}

/**
 * nullifier = poseidon(nullifyingKey, leafIndex), with the index inside the note's tree.
 * Nullifiers are therefore only unique per tree.
 */
export function getNullifier(nullifyingKey: bigint, leafIndex: bigint | number): bigint {
  return poseidonHashMany([nullifyingKey, BigInt(leafIndex)]);
}

export function getNotePreimage(note: Note): CommitmentPreimage {
  return {
    npk: getNotePublicKey(note.masterPublicKey, note.random),
    token: note.token,
    value: note.value
  };
}

export function getNoteHash(note: Note): bigint {
  return hashCommitment(getNotePreimage(note));
}

/** Zeroed preimage used when a transaction does not unshield */
export function emptyPreimage(): CommitmentPreimage {
  return {
    npk: 0n,
    token: { tokenType: TokenType.ERC20, tokenAddress: utils.getAddress('0x' + '00'.repeat(20)), tokenSubID: 0n },
    value: 0n
  };
}

export function generateNoteRandom(): Hex {
  return bytesToHex(randomBytes(NOTE_RANDOM_LENGTH));
}

// Token identity packed into two 32-byte words: [type (1) | zero (11) | address (20)], [subID]
function encodeTokenWords(token: TokenData): [Uint8Array, Uint8Array] {
  const typeAndAddress = concatBytes(
    Uint8Array.of(token.tokenType),
    new Uint8Array(11),
    hexToBytes(token.tokenAddress)
  );
  return [typeAndAddress, bigIntToBytes(token.tokenSubID, 32)];
}

function decodeTokenWords(typeAndAddress: Uint8Array, subID: Uint8Array): TokenData {
  return normalizeTokenData({
    tokenType: parseTokenType(typeAndAddress[0]),
    tokenAddress: bytesToHex(typeAndAddress.slice(12)),
    tokenSubID: bytesToBigInt(subID)
  });
}

/**
 * Shield ciphertext: the note random encrypted under sha256(shieldKey * receiverViewing).
 * @param shieldPrivateKey Ephemeral key of the depositor, random when omitted
 */
export async function encryptShieldNote(
  random: Hex,
  receiverViewingPublicKey: Uint8Array,
  shieldPrivateKey: Uint8Array = randomBytes(32)
): Promise<ShieldCiphertext> {
  const sharedKey = getSharedSymmetricKey(shieldPrivateKey, receiverViewingPublicKey);
  const encryptedBundle = await encryptBundle([hexToBytes(random)], sharedKey);
  return {
    encryptedBundle,
    shieldKey: bytesToHex(getViewingPublicKey(shieldPrivateKey))
  };
}

/**
 * Recovers the note random from a shield ciphertext, or null if it was not addressed to
 * this viewing key.
 */
export async function decryptShieldNote(
  ciphertext: ShieldCiphertext,
  viewingPrivateKey: Uint8Array
): Promise<Hex | null> {
  try {
    const sharedKey = getSharedSymmetricKey(viewingPrivateKey, hexToBytes(ciphertext.shieldKey));
    const [random] = await decryptBundle(ciphertext.encryptedBundle, sharedKey);
    if (!random || random.length !== NOTE_RANDOM_LENGTH) {
      return null;
    }
    return bytesToHex(random);
  } catch {
    return null;
  }
}

export interface TransferNotePlaintext {
  masterPublicKey: bigint;
  random: Hex;
  value: bigint;
  token: TokenData;
  memo: string;
}

export interface EncryptTransferNoteParams {
  note: TransferNotePlaintext;
  senderViewingPrivateKey: Uint8Array;
  receiverViewingPublicKey: Uint8Array;
  senderRandom?: Uint8Array;
}

/**
 * Transfer ciphertext. The symmetric key is sha256(blindedReceiver * senderViewing), which the
 * receiver recomputes as sha256(blindedSender * receiverViewing). The note random is the
 * shared random.
 */
export async function encryptTransferNote(params: EncryptTransferNoteParams): Promise<CommitmentCiphertext> {
  const { note } = params;
  assertNoteValue(note.value);
  const senderRandom = params.senderRandom ?? randomBytes(SENDER_RANDOM_LENGTH);

  const blinded = blindViewingKeys(
    getViewingPublicKey(params.senderViewingPrivateKey),
    params.receiverViewingPublicKey,
    hexToBytes(note.random),
    senderRandom
  );
  const sharedKey = getSharedSymmetricKey(params.senderViewingPrivateKey, blinded.blindedReceiverViewingKey);

  const [typeAndAddress, subID] = encodeTokenWords(normalizeTokenData(note.token));
  const ciphertext = await encryptBundle(
    [
      bigIntToBytes(note.masterPublicKey, 32),
      concatBytes(hexToBytes(note.random), bigIntToBytes(note.value, 16)),
      typeAndAddress,
      subID
    ],
    sharedKey
  );

  // Only the sender can read the annotation; it keeps the sender random for later recovery
  const annotationKey = hexToBytes(sha256(params.senderViewingPrivateKey));

  return {
    ciphertext,
    blindedSenderViewingKey: bytesToHex(blinded.blindedSenderViewingKey),
    blindedReceiverViewingKey: bytesToHex(blinded.blindedReceiverViewingKey),
    annotationData: await encryptData(senderRandom, annotationKey),
    memo: await encryptData(utils.toUtf8Bytes(note.memo), sharedKey)
  };
}

async function decryptMemo(ciphertext: CommitmentCiphertext, sharedKey: Uint8Array): Promise<string> {
  try {
    return utils.toUtf8String(await decryptData(ciphertext.memo, sharedKey));
  } catch (error) {
    Logger.getInstance().warn('Dropping unreadable note memo', {
      error: error instanceof Error ? error.message : String(error)
    });
    return '';
  }
}

/**
 * Attempts to decrypt a transfer ciphertext as its receiver. Returns null when the key does
 * not match or the authenticated plaintext does not decode to a note. An unreadable memo is
 * replaced by an empty one.
 */
export async function decryptTransferNote(
  ciphertext: CommitmentCiphertext,
  viewingPrivateKey: Uint8Array
): Promise<TransferNotePlaintext | null> {
  let blocks: Uint8Array[];
  let sharedKey: Uint8Array;
  try {
    sharedKey = getSharedSymmetricKey(viewingPrivateKey, hexToBytes(ciphertext.blindedSenderViewingKey));
    blocks = await decryptBundle(ciphertext.ciphertext, sharedKey);
  } catch {
    return null;
  }

  if (blocks.length !== 4) {
    return null;
  }

  const [mpkBlock, randomValueBlock, typeAndAddress, subID] = blocks;
  let token: TokenData;
  try {
    token = decodeTokenWords(typeAndAddress, subID);
  } catch (error) {
    Logger.getInstance().warn('Decrypted note has malformed token data', {
      error: error instanceof Error ? error.message : String(error)
    });
    return null;
  }

  return {
    masterPublicKey: bytesToBigInt(mpkBlock),
    random: bytesToHex(randomValueBlock.slice(0, NOTE_RANDOM_LENGTH)),
    value: bytesToBigInt(randomValueBlock.slice(NOTE_RANDOM_LENGTH)),
    token,
    memo: await decryptMemo(ciphertext, sharedKey)
  };
}

/**
 * Recovers the sender random from a ciphertext the caller sent.
 */
export async function decryptAnnotation(
  ciphertext: CommitmentCiphertext,
  senderViewingPrivateKey: Uint8Array
): Promise<Uint8Array> {
  return decryptData(ciphertext.annotationData, hexToBytes(sha256(senderViewingPrivateKey)));
}

export interface SerializedNote {
  spendingPublicKey: [string, string];
  nullifyingKey: string;
  masterPublicKey: string;
  random: Hex;
  value: string;
  token: { tokenType: number; tokenAddress: string; tokenSubID: string };
  memo?: string;
  treeNumber: number;
  leafIndex: number;
  commitment: string;
  nullifier: string;
  status: ShieldedNote['status'];
  source: ShieldedNote['source'];
}

/**
 * Serializes a note for JSON storage, converting BigInt to string
 */
export function serializeNote(note: ShieldedNote): SerializedNote {
  return {
    spendingPublicKey: [note.spendingPublicKey[0].toString(), note.spendingPublicKey[1].toString()],
    nullifyingKey: note.nullifyingKey.toString(),
    masterPublicKey: note.masterPublicKey.toString(),
    random: note.random,
    value: note.value.toString(),
    token: {
      tokenType: note.token.tokenType,
      tokenAddress: note.token.tokenAddress,
      tokenSubID: note.token.tokenSubID.toString()
    },
    memo: note.memo,
    treeNumber: note.treeNumber,
    leafIndex: note.leafIndex,
    commitment: note.commitment.toString(),
    nullifier: note.nullifier.toString(),
    status: note.status,
    source: note.source
  };
}

/**
 * Deserializes a stored note and checks that its commitment matches its contents
 */
export function deserializeNote(data: SerializedNote): ShieldedNote {
  const note: ShieldedNote = {
    spendingPublicKey: [BigInt(data.spendingPublicKey[0]), BigInt(data.spendingPublicKey[1])],
    nullifyingKey: BigInt(data.nullifyingKey),
    masterPublicKey: BigInt(data.masterPublicKey),
    random: data.random,
    value: BigInt(data.value),
    token: normalizeTokenData({
      tokenType: data.token.tokenType,
      tokenAddress: data.token.tokenAddress,
      tokenSubID: BigInt(data.token.tokenSubID)
    }),
    memo: data.memo,
    treeNumber: data.treeNumber,
    leafIndex: data.leafIndex,
    commitment: BigInt(data.commitment),
    nullifier: BigInt(data.nullifier),
    status: data.status,
    source: data.source
  };

  if (getNoteHash(note) !== note.commitment) {
    throw ErrorHandler.createFormatError('Stored note does not match its commitment', {
      commitment: data.commitment
    });
  }
  return note;
}
