import { webcrypto } from 'crypto';
import * as nacl from 'tweetnacl';
import { ShieldPoolError, ErrorType } from '../errors/ErrorHandler';
import { Hex } from '../types/Note';
import { bytesToHex, concatBytes, hexToBytes } from './bytes';

const IV_LENGTH = 16;
const TAG_LENGTH = 16;

/**
 * Generates a random 32-byte key
 */
export function generateEncryptionKey(): Uint8Array {
  return nacl.randomBytes(32);
}

export function randomBytes(length: number): Uint8Array {
  return nacl.randomBytes(length);
}

async function importKey(key: Uint8Array, usage: 'encrypt' | 'decrypt') {
  if (key.length !== 32) {
    throw new ShieldPoolError(
      'AES-256-GCM requires a 32-byte key',
      usage === 'encrypt' ? ErrorType.FORMAT_ERROR : ErrorType.DECRYPTION_ERROR,
      { keyLength: key.length }
    );
  }
  return webcrypto.subtle.importKey('raw', key, { name: 'AES-GCM' }, false, [usage]);
}

/**
 * Encrypts a list of blocks with AES-256-GCM as one message.
 * @returns [iv || tag, ...encrypted blocks], each encrypted block the length of its plaintext
 */
export async function encryptBundle(blocks: Uint8Array[], key: Uint8Array): Promise<Hex[]> {
  const iv = nacl.randomBytes(IV_LENGTH);
  const cryptoKey = await importKey(key, 'encrypt');

  const sealed = new Uint8Array(
    await webcrypto.subtle.encrypt(
      { name: 'AES-GCM', iv, tagLength: TAG_LENGTH * 8 },
      cryptoKey,
      concatBytes(...blocks)
    )
  );

  const tag = sealed.slice(sealed.length - TAG_LENGTH);
  const encrypted: Hex[] = [];
  let offset = 0;
  for (const block of blocks) {
    encrypted.push(bytesToHex(sealed.slice(offset, offset + block.length)));
    offset += block.length;
  }

  return [bytesToHex(concatBytes(iv, tag)), ...encrypted];
}

/**
 * Decrypts a bundle produced by encryptBundle. Throws DECRYPTION_ERROR when the key is
 * wrong or any block was altered.
 */
export async function decryptBundle(bundle: Hex[], key: Uint8Array): Promise<Uint8Array[]> {
  if (bundle.length < 1) {
    throw new ShieldPoolError('Empty ciphertext bundle', ErrorType.DECRYPTION_ERROR);
  }

  const ivTag = hexToBytes(bundle[0]);
  if (ivTag.length !== IV_LENGTH + TAG_LENGTH) {
    throw new ShieldPoolError('Malformed iv/tag block', ErrorType.DECRYPTION_ERROR, {
      length: ivTag.length
    });
  }

  const iv = ivTag.slice(0, IV_LENGTH);
  const tag = ivTag.slice(IV_LENGTH);
  const blocks = bundle.slice(1).map(hexToBytes);
  const cryptoKey = await importKey(key, 'decrypt');

  let plaintext: Uint8Array;
  try {
    plaintext = new Uint8Array(
      await webcrypto.subtle.decrypt(
        { name: 'AES-GCM', iv, tagLength: TAG_LENGTH * 8 },
        cryptoKey,
        concatBytes(...blocks, tag)
      )
    );
  } catch (error) {
    throw new ShieldPoolError('Ciphertext authentication failed', ErrorType.DECRYPTION_ERROR, {
      error: error instanceof Error ? error.message : String(error)
    });
  }

  const result: Uint8Array[] = [];
  let offset = 0;
  for (const block of blocks) {
    result.push(plaintext.slice(offset, offset + block.length));
    offset += block.length;
  }
  return result;
}

/**
 * Encrypts a single byte string; output is iv || tag || ciphertext. Empty input encrypts to '0x'.
 */
export async function encryptData(data: Uint8Array, key: Uint8Array): Promise<Hex> {
  if (data.length === 0) {
    return '0x';
  }
  const [ivTag, encrypted] = await encryptBundle([data], key);
  return bytesToHex(concatBytes(hexToBytes(ivTag), hexToBytes(encrypted)));
}

export async function decryptData(ciphertext: Hex, key: Uint8Array): Promise<Uint8Array> {
  const bytes = hexToBytes(ciphertext);
  if (bytes.length === 0) {
    return new Uint8Array(0);
  }
  const ivTagLength = IV_LENGTH + TAG_LENGTH;
  const [data] = await decryptBundle(
    [bytesToHex(bytes.slice(0, ivTagLength)), bytesToHex(bytes.slice(ivTagLength))],
    key
  );
  return data;
}
