import { OwnerAccessController } from '../../src/core/AccessController';
import { ShieldedPool, ShieldedPoolOptions } from '../../src/core/ShieldedPool';
import { ShieldedWallet } from '../../src/core/ShieldedWallet';
import { InMemoryTokenLedger } from '../../src/core/TokenLedger';
import { TokenData, TokenType } from '../../src/types/Note';
import { VerifyingKey } from '../../src/types/ZKProof';
import { ZKProver } from '../../src/zk/ZKProver';
import { createTestVerifyingKey, TrapdoorProvingBackend } from './trapdoorProver';

// Digit-only addresses are their own checksum form
export const OWNER = '0x1111111111111111111111111111111111111111';
export const ALICE = '0x2222222222222222222222222222222222222222';
export const BOB = '0x3333333333333333333333333333333333333333';
export const CAROL = '0x8888888888888888888888888888888888888888';
export const SUBMITTER = '0x1212121212121212121212121212121212121212';
export const TREASURY = '0x5555555555555555555555555555555555555555';
export const RELAY = '0x7777777777777777777777777777777777777777';
export const POOL = '0x9999999999999999999999999999999999999999';

export const CHAIN_ID = 31337n;
export const TEST_DEPTH = 4;

export const TOKEN: TokenData = {
    tokenType: TokenType.ERC20,
    tokenAddress: '0x4444444444444444444444444444444444444444',
    tokenSubID: 0n
};

export const NFT: TokenData = {
    tokenType: TokenType.ERC721,
    tokenAddress: '0x6666666666666666666666666666666666666666',
    tokenSubID: 7n
};

export function filledKey(byte: number): Uint8Array {
    return new Uint8Array(32).fill(byte);
}

let verifyingKey: VerifyingKey | null = null;

export function testVerifyingKey(): VerifyingKey {
    if (!verifyingKey) {
        verifyingKey = createTestVerifyingKey();
    }
    return verifyingKey;
}

export interface TestPool {
    pool: ShieldedPool;
    ledger: InMemoryTokenLedger;
}

/**
 * Pool with 25bp fees and the test key registered for every shape up to 3x3
 */
export async function createTestPool(options: Partial<ShieldedPoolOptions> = {}): Promise<TestPool> {
    const ledger = new InMemoryTokenLedger(POOL);
    const pool = new ShieldedPool({
        tokenAdapter: ledger,
        accessController: new OwnerAccessController([OWNER]),
        depth: TEST_DEPTH,
        fees: { shieldFeeBP: 25, unshieldFeeBP: 25, nftFee: 0n },
        treasury: TREASURY,
        chainId: CHAIN_ID,
        relayAddress: RELAY,
        ...options
    });
    for (let nullifiers = 1; nullifiers <= 3; nullifiers++) {
        for (let commitments = 1; commitments <= 3; commitments++) {
            await pool.setVerificationKey(OWNER, { nullifiers, commitments }, testVerifyingKey());
        }
    }
    return { pool, ledger };
}

export function createTestWallet(seed: number, depth: number = TEST_DEPTH): Promise<ShieldedWallet> {
    return ShieldedWallet.fromKeys(filledKey(seed), filledKey(seed + 100), {
        depth,
        chainId: CHAIN_ID,
        prover: new ZKProver(new TrapdoorProvingBackend())
    });
}
