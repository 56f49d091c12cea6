import { utils } from 'ethers';
import { ErrorHandler } from '../errors/ErrorHandler';
import { BoundParams, Transaction } from '../types/Transaction';
import { CircuitShape, G1Point, G2Point, VerifyingKey } from '../types/ZKProof';
import { bigIntToBytes, bytesToBigInt, concatBytes } from '../utils/bytes';
import { keccak256, sha256 } from '../utils/hash';
import { Logger } from '../utils/logger';
import { SNARK_SCALAR_FIELD } from '../utils/math';
import { assertVerifyingKeyCoordinates, verifyGroth16 } from './snark';

const BOUND_PARAMS_TYPE =
  'tuple(uint16 treeNumber, uint48 minGasPrice, uint8 unshield, uint64 chainID, address adaptContract, ' +
  'bytes32 adaptParams, tuple(bytes32[] ciphertext, bytes32 blindedSenderViewingKey, ' +
  'bytes32 blindedReceiverViewingKey, bytes annotationData, bytes memo)[] commitmentCiphertext)';

/**
 * Folds the bound parameters, including every output ciphertext, into one scalar:
 * keccak256(abi.encode(boundParams)) mod field.
 */
export function hashBoundParams(boundParams: BoundParams): bigint {
  let encoded: string;
  try {
    encoded = utils.defaultAbiCoder.encode(
      [BOUND_PARAMS_TYPE],
      [
        {
          treeNumber: boundParams.treeNumber,
          minGasPrice: boundParams.minGasPrice.toString(),
          unshield: boundParams.unshield,
          chainID: boundParams.chainID.toString(),
          adaptContract: boundParams.adaptContract,
          adaptParams: boundParams.adaptParams,
          commitmentCiphertext: boundParams.commitmentCiphertext.map(ciphertext => ({
            ciphertext: ciphertext.ciphertext,
            blindedSenderViewingKey: ciphertext.blindedSenderViewingKey,
            blindedReceiverViewingKey: ciphertext.blindedReceiverViewingKey,
            annotationData: ciphertext.annotationData,
            memo: ciphertext.memo
          }))
        }
      ]
    );
  } catch (error) {
    throw ErrorHandler.createFormatError('Bound parameters cannot be encoded', {
      error: error instanceof Error ? error.message : String(error)
    });
  }
  return BigInt(keccak256(encoded)) % SNARK_SCALAR_FIELD;
}

/**
 * The single public input: sha256(root || boundParamsHash || nullifiers || commitments) mod field,
 * each element a 32-byte big-endian word.
 */
export function hashPublicInputs(
  merkleRoot: bigint,
  boundParamsHash: bigint,
  nullifiers: bigint[],
  commitments: bigint[]
): bigint {
  const words = [merkleRoot, boundParamsHash, ...nullifiers, ...commitments].map(word => bigIntToBytes(word, 32));
  return bytesToBigInt(sha256(concatBytes(...words))) % SNARK_SCALAR_FIELD;
}

export function getTransactionInputsHash(transaction: Transaction): bigint {
  return hashPublicInputs(
    transaction.merkleRoot,
    hashBoundParams(transaction.boundParams),
    transaction.nullifiers,
    transaction.commitments
  );
}

export function shapeOf(transaction: Pick<Transaction, 'nullifiers' | 'commitments'>): CircuitShape {
  return { nullifiers: transaction.nullifiers.length, commitments: transaction.commitments.length };
}

export interface RegisteredKey {
  shape: CircuitShape;
  key: VerifyingKey;
}

type SerializedG1 = [string, string];
type SerializedG2 = [[string, string], [string, string]];

export interface SerializedVerifyingKey {
  nullifiers: number;
  commitments: number;
  artifactsIPFSHash?: string;
  alpha1: SerializedG1;
  beta2: SerializedG2;
  gamma2: SerializedG2;
  delta2: SerializedG2;
  ic: SerializedG1[];
}

const g1ToJSON = (point: G1Point): SerializedG1 => [point.x.toString(), point.y.toString()];
const g2ToJSON = (point: G2Point): SerializedG2 => [
  [point.x[0].toString(), point.x[1].toString()],
  [point.y[0].toString(), point.y[1].toString()]
];
const g1FromJSON = ([x, y]: SerializedG1): G1Point => ({ x: BigInt(x), y: BigInt(y) });
const g2FromJSON = ([x, y]: SerializedG2): G2Point => ({
  x: [BigInt(x[0]), BigInt(x[1])],
  y: [BigInt(y[0]), BigInt(y[1])]
});

/**
 * Two-level (nullifier count -> commitment count -> key) registry. Starts empty; a missing
 * shape is a StateError, never a default key.
 */
export class VerifyingKeyRegistry {
  private readonly keys: Map<number, Map<number, VerifyingKey>> = new Map();

  public set(shape: CircuitShape, key: VerifyingKey): void {
    if (!Number.isInteger(shape.nullifiers) || !Number.isInteger(shape.commitments) ||
        shape.nullifiers < 1 || shape.commitments < 1) {
      throw ErrorHandler.createFormatError('Invalid circuit shape', { ...shape });
    }
    if (key.ic.length !== 2) {
      throw ErrorHandler.createFormatError('Verifying key must take exactly one public input', {
        icLength: key.ic.length
      });
    }
    assertVerifyingKeyCoordinates(key);

    let byCommitments = this.keys.get(shape.nullifiers);
    if (!byCommitments) {
      byCommitments = new Map();
      this.keys.set(shape.nullifiers, byCommitments);
    }
    byCommitments.set(shape.commitments, key);
  }

  public has(shape: CircuitShape): boolean {
    return this.keys.get(shape.nullifiers)?.has(shape.commitments) ?? false;
  }

  public get(shape: CircuitShape): VerifyingKey {
    const key = this.keys.get(shape.nullifiers)?.get(shape.commitments);
    if (!key) {
      throw ErrorHandler.createStateError('Verifying key not set for circuit shape', { ...shape });
    }
    return key;
  }

  public remove(shape: CircuitShape): boolean {
    return this.keys.get(shape.nullifiers)?.delete(shape.commitments) ?? false;
  }

  public entries(): RegisteredKey[] {
    const result: RegisteredKey[] = [];
    for (const [nullifiers, byCommitments] of this.keys) {
      for (const [commitments, key] of byCommitments) {
        result.push({ shape: { nullifiers, commitments }, key });
      }
    }
    return result;
  }

  public toJSON(): SerializedVerifyingKey[] {
    return this.entries().map(({ shape, key }) => ({
      nullifiers: shape.nullifiers,
      commitments: shape.commitments,
      artifactsIPFSHash: key.artifactsIPFSHash,
      alpha1: g1ToJSON(key.alpha1),
      beta2: g2ToJSON(key.beta2),
      gamma2: g2ToJSON(key.gamma2),
      delta2: g2ToJSON(key.delta2),
      ic: key.ic.map(g1ToJSON)
    }));
  }

  public static fromJSON(data: SerializedVerifyingKey[]): VerifyingKeyRegistry {
    const registry = new VerifyingKeyRegistry();
    for (const entry of data) {
      registry.set(
        { nullifiers: entry.nullifiers, commitments: entry.commitments },
        {
          artifactsIPFSHash: entry.artifactsIPFSHash,
          alpha1: g1FromJSON(entry.alpha1),
          beta2: g2FromJSON(entry.beta2),
          gamma2: g2FromJSON(entry.gamma2),
          delta2: g2FromJSON(entry.delta2),
          ic: entry.ic.map(g1FromJSON)
        }
      );
    }
    return registry;
  }
}

/**
 * Verifies transaction proofs against the shape-selected key.
 */
export class Verifier {
  private readonly logger = Logger.getInstance();

  constructor(public readonly registry: VerifyingKeyRegistry = new VerifyingKeyRegistry()) {}

  /**
   * Re-derives the public input from the submitted fields and runs the pairing check.
   * Throws StateError for an unconfigured shape, FormatError for malformed points.
   */
  public verify(transaction: Transaction): boolean {
    const shape = shapeOf(transaction);
    const key = this.registry.get(shape);
    const publicInput = getTransactionInputsHash(transaction);
    const valid = verifyGroth16(key, transaction.proof, [publicInput]);
    this.logger.debug('Proof verification', { ...shape, valid });
    return valid;
  }
}
