import {
    addressToBigInt,
    bigIntToAddress,
    bigIntToBytes,
    bigIntToHex,
    bytesToBigInt,
    bytesToHex,
    concatBytes,
    hexLength,
    hexToBytes,
    xorBytes
} from '../src/utils/bytes';

describe('Byte Utilities', () => {
    it('should encode integers big-endian at a fixed width', () => {
        expect(bigIntToHex(1n)).toBe('0x' + '00'.repeat(31) + '01');
        expect(bigIntToBytes(258n, 2)).toEqual(new Uint8Array([1, 2]));
    });

    it('should reject values wider than the requested length', () => {
        expect(() => bigIntToBytes(256n, 1)).toThrow('Value does not fit in 1 bytes');
        expect(() => bigIntToBytes(-1n, 32)).toThrow('Value does not fit in 32 bytes');
    });

    it('should decode bytes and hex to integers', () => {
        expect(bytesToBigInt('0x')).toBe(0n);
        expect(bytesToBigInt(new Uint8Array([1, 0]))).toBe(256n);
        expect(bytesToBigInt('0x0100')).toBe(256n);
    });

    it('should convert between hex and bytes', () => {
        expect(bytesToHex(new Uint8Array([0xde, 0xad]))).toBe('0xdead');
        expect(hexToBytes('0xdead')).toEqual(new Uint8Array([0xde, 0xad]));
        expect(hexLength('0x0102')).toBe(2);
    });

    it('should xor equal-length arrays', () => {
        expect(xorBytes(new Uint8Array([1, 2]), new Uint8Array([3, 3]))).toEqual(new Uint8Array([2, 1]));
        expect(() => xorBytes(new Uint8Array(1), new Uint8Array(2))).toThrow(
            'Cannot xor byte arrays of different lengths'
        );
    });

    it('should concatenate byte arrays', () => {
        expect(concatBytes(new Uint8Array([1]), new Uint8Array([2, 3]))).toEqual(new Uint8Array([1, 2, 3]));
    });

    it('should map addresses to and from the npk slot', () => {
        const address = '0x0000000000000000000000000000000000000010';
        expect(addressToBigInt(address)).toBe(16n);
        expect(bigIntToAddress(16n)).toBe(address);
    });
});
