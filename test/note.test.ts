import { utils } from 'ethers';
import { poseidon1, poseidon2, poseidon3 } from 'poseidon-lite';
import { ErrorType } from '../src/errors/ErrorHandler';
import { ShieldedNote, TokenType } from '../src/types/Note';
import { bigIntToBytes, bytesToBigInt, bytesToHex, concatBytes, hexToBytes } from '../src/utils/bytes';
import { encryptBundle, encryptData } from '../src/utils/encryption';
import { getSharedSymmetricKey, getViewingPublicKey } from '../src/utils/keyExchange';
import { SNARK_SCALAR_FIELD } from '../src/utils/math';
import {
    decryptAnnotation,
    decryptShieldNote,
    decryptTransferNote,
    deserializeNote,
    emptyPreimage,
    encryptShieldNote,
    encryptTransferNote,
    generateNoteRandom,
    getMasterPublicKey,
    getNoteHash,
    getNotePublicKey,
    getNullifier,
    getNullifyingKey,
    getTokenID,
    hashCommitment,
    normalizeTokenData,
    parseTokenType,
    serializeNote
} from '../src/utils/note';
import { captureError } from './helpers/errors';
import { NFT, TOKEN } from './helpers/fixtures';

describe('Note Utilities', () => {
    const viewingKey = new Uint8Array(32).fill(2);
    const otherViewingKey = new Uint8Array(32).fill(12);
    const random = '0x' + '0a'.repeat(16);

    describe('token data', () => {
        it('should checksum token addresses', () => {
            const token = normalizeTokenData({ ...TOKEN, tokenAddress: '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd' });
            expect(token.tokenAddress).toBe(utils.getAddress('0xabcdefabcdefabcdefabcdefabcdefabcdefabcd'));
        });

        it('should reject malformed token data', () => {
            expect(captureError(() => normalizeTokenData({ ...TOKEN, tokenAddress: '0x1234' })).message).toBe(
                'Invalid token address'
            );
            expect(captureError(() => normalizeTokenData({ ...TOKEN, tokenSubID: 1n })).message).toBe(
                'ERC20 tokens must have subID 0'
            );
            expect(captureError(() => parseTokenType(5)).message).toBe('Unknown token type');
        });

        it('should use the address as the id of a fungible token', () => {
            expect(getTokenID(TOKEN)).toBe(BigInt(TOKEN.tokenAddress));
        });

        it('should hash the type, address and subID of a non-fungible token', () => {
            const encoded = utils.defaultAbiCoder.encode(
                ['uint8', 'address', 'uint256'],
                [TokenType.ERC721, NFT.tokenAddress, 7]
            );
            expect(getTokenID(NFT)).toBe(BigInt(utils.keccak256(encoded)) % SNARK_SCALAR_FIELD);
        });
    });

    describe('key derivation and hashing', () => {
        const spendingPublicKey: [bigint, bigint] = [1n, 2n];

        it('should derive the nullifying key from the viewing key', () => {
            expect(getNullifyingKey(viewingKey)).toBe(poseidon1([bytesToBigInt(viewingKey) % SNARK_SCALAR_FIELD]));
        });

        it('should derive master and note public keys', () => {
            const nullifyingKey = getNullifyingKey(viewingKey);
            const masterPublicKey = getMasterPublicKey(spendingPublicKey, nullifyingKey);
            expect(masterPublicKey).toBe(poseidon3([1n, 2n, nullifyingKey]));
            expect(getNotePublicKey(masterPublicKey, random)).toBe(poseidon2([masterPublicKey, BigInt(random)]));
        });

        it('should require a 16-byte note random', () => {
            expect(captureError(() => getNotePublicKey(1n, '0x' + '0a'.repeat(15))).message).toBe(
                'Note random must be 16 bytes'
            );
        });

        it('should commit to npk, token id and value', () => {
            const preimage = { npk: 99n, token: TOKEN, value: 500n };
            expect(hashCommitment(preimage)).toBe(poseidon3([99n, BigInt(TOKEN.tokenAddress), 500n]));
        });

        it('should reject values above 120 bits', () => {
            const error = captureError(() => hashCommitment({ npk: 1n, token: TOKEN, value: 1n << 120n }));
            expect(error.type).toBe(ErrorType.FORMAT_ERROR);
            expect(error.message).toBe('Note value out of range');
        });

        it('should derive nullifiers from the leaf position', () => {
            expect(getNullifier(7n, 5)).toBe(poseidon2([7n, 5n]));
            expect(getNullifier(7n, 5)).not.toBe(getNullifier(7n, 6));
        });

        it('should generate 16-byte randoms', () => {
            expect(generateNoteRandom()).toMatch(/^0x[0-9a-f]{32}$/);
        });

        it('should zero the empty preimage', () => {
            expect(emptyPreimage()).toEqual({
                npk: 0n,
                token: { tokenType: TokenType.ERC20, tokenAddress: '0x' + '00'.repeat(20), tokenSubID: 0n },
                value: 0n
            });
        });
    });

    describe('shield ciphertext', () => {
        it('should reveal the random to the receiver only', async () => {
            const ciphertext = await encryptShieldNote(random, getViewingPublicKey(viewingKey));
            expect(ciphertext.encryptedBundle).toHaveLength(2);
            expect(await decryptShieldNote(ciphertext, viewingKey)).toBe(random);
            expect(await decryptShieldNote(ciphertext, otherViewingKey)).toBeNull();
        });

        it('should publish the depositor key as the shield key', async () => {
            const shieldPrivateKey = new Uint8Array(32).fill(21);
            const ciphertext = await encryptShieldNote(random, getViewingPublicKey(viewingKey), shieldPrivateKey);
            expect(ciphertext.shieldKey).toBe(bytesToHex(getViewingPublicKey(shieldPrivateKey)));
        });
    });

    describe('transfer ciphertext', () => {
        const senderViewingKey = new Uint8Array(32).fill(30);
        const senderRandom = new Uint8Array(15).fill(31);
        const plaintext = { masterPublicKey: 123456789n, random, value: 4000n, token: NFT, memo: 'rent' };

        it('should decrypt for the receiver', async () => {
            const ciphertext = await encryptTransferNote({
                note: plaintext,
                senderViewingPrivateKey: senderViewingKey,
                receiverViewingPublicKey: getViewingPublicKey(viewingKey),
                senderRandom
            });
            expect(ciphertext.ciphertext).toHaveLength(5);
            expect(await decryptTransferNote(ciphertext, viewingKey)).toEqual(plaintext);
        });

        it('should return null for other viewing keys', async () => {
            const ciphertext = await encryptTransferNote({
                note: plaintext,
                senderViewingPrivateKey: senderViewingKey,
                receiverViewingPublicKey: getViewingPublicKey(viewingKey)
            });
            expect(await decryptTransferNote(ciphertext, otherViewingKey)).toBeNull();
        });

        it('should let the sender recover the sender random', async () => {
            const ciphertext = await encryptTransferNote({
                note: { ...plaintext, memo: '' },
                senderViewingPrivateKey: senderViewingKey,
                receiverViewingPublicKey: getViewingPublicKey(viewingKey),
                senderRandom
            });
            expect(ciphertext.memo).toBe('0x');
            expect(await decryptAnnotation(ciphertext, senderViewingKey)).toEqual(senderRandom);
        });

        it('should drop a memo that is not UTF-8', async () => {
            const ciphertext = await encryptTransferNote({
                note: plaintext,
                senderViewingPrivateKey: senderViewingKey,
                receiverViewingPublicKey: getViewingPublicKey(viewingKey)
            });
            const sharedKey = getSharedSymmetricKey(viewingKey, hexToBytes(ciphertext.blindedSenderViewingKey));
            const memo = await encryptData(Uint8Array.of(0xff, 0xfe, 0xfd), sharedKey);

            expect(await decryptTransferNote({ ...ciphertext, memo }, viewingKey)).toEqual({ ...plaintext, memo: '' });
        });

        it('should return null for an authenticated note with an unknown token type', async () => {
            const ciphertext = await encryptTransferNote({
                note: plaintext,
                senderViewingPrivateKey: senderViewingKey,
                receiverViewingPublicKey: getViewingPublicKey(viewingKey)
            });
            const sharedKey = getSharedSymmetricKey(viewingKey, hexToBytes(ciphertext.blindedSenderViewingKey));
            const bundle = await encryptBundle(
                [
                    bigIntToBytes(plaintext.masterPublicKey, 32),
                    concatBytes(hexToBytes(random), bigIntToBytes(plaintext.value, 16)),
                    concatBytes(Uint8Array.of(9), new Uint8Array(11), hexToBytes(NFT.tokenAddress)),
                    bigIntToBytes(NFT.tokenSubID, 32)
                ],
                sharedKey
            );

            expect(await decryptTransferNote({ ...ciphertext, ciphertext: bundle }, viewingKey)).toBeNull();
        });
    });

    describe('serialization', () => {
        const spendingPublicKey: [bigint, bigint] = [1n, 2n];
        const nullifyingKey = getNullifyingKey(viewingKey);
        const masterPublicKey = getMasterPublicKey(spendingPublicKey, nullifyingKey);
        const base = {
            spendingPublicKey,
            nullifyingKey,
            masterPublicKey,
            random,
            value: 250n,
            token: TOKEN
        };
        const note: ShieldedNote = {
            ...base,
            treeNumber: 0,
            leafIndex: 3,
            commitment: getNoteHash(base),
            nullifier: getNullifier(nullifyingKey, 3),
            status: 'unspent',
            source: 'shield'
        };

        it('should round trip through JSON', () => {
            const restored = deserializeNote(JSON.parse(JSON.stringify(serializeNote(note))));
            expect(restored).toEqual(note);
        });

        it('should reject a stored note whose value was changed', () => {
            const tampered = { ...serializeNote(note), value: '251' };
            expect(captureError(() => deserializeNote(tampered)).message).toBe('Stored note does not match its commitment');
        });
    });
});
