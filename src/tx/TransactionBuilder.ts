import { constants } from 'ethers';
import { ErrorHandler } from '../errors/ErrorHandler';
import { CommitmentCiphertext, CommitmentPreimage, Hex, ShieldedNote } from '../types/Note';
import { BoundParams, Transaction, UnshieldType } from '../types/Transaction';
import { CircuitShape, CircuitWitness } from '../types/ZKProof';
import { signPoseidon } from '../utils/babyjubjub';
import { bytesToBigInt } from '../utils/bytes';
import { Logger } from '../utils/logger';
import { MerkleProof } from '../utils/merkle';
import { emptyPreimage, getTokenID, hashCommitment, tokenKey } from '../utils/note';
import { MAX_POSEIDON_INPUTS, poseidonHashMany } from '../utils/poseidon';
import { hashBoundParams, hashPublicInputs } from '../zk/Verifier';
import { ZKProver } from '../zk/ZKProver';

export interface TransactionInput {
  note: ShieldedNote;
  merkleProof: MerkleProof;
}

export interface TransactionOutput {
  preimage: CommitmentPreimage;
  ciphertext: CommitmentCiphertext;
}

export interface TransactionRequest {
  spendingKey: Uint8Array;
  treeNumber: number;
  merkleRoot: bigint;
  inputs: TransactionInput[];
  outputs: TransactionOutput[];
  unshield?: { preimage: CommitmentPreimage; type: UnshieldType.NORMAL | UnshieldType.REDIRECT };
  chainID: bigint;
  minGasPrice?: bigint;
  adaptContract?: string;
  adaptParams?: Hex;
  overrideOutput?: string;
}

/**
 * Message signed by the spending key: poseidon(root, boundParamsHash, ...nullifiers, ...commitments)
 */
export function getSignatureMessage(
  merkleRoot: bigint,
  boundParamsHash: bigint,
  nullifiers: bigint[],
  commitments: bigint[]
): bigint {
  const inputs = [merkleRoot, boundParamsHash, ...nullifiers, ...commitments];
  if (inputs.length > MAX_POSEIDON_INPUTS) {
    throw ErrorHandler.createFormatError('Too many notes for one transaction', {
      nullifiers: nullifiers.length,
      commitments: commitments.length
    });
  }
  return poseidonHashMany(inputs);
}

/**
 * Assembles a transaction from already-selected notes: bound parameters, signature, witness
 * and proof.
 */
export class TransactionBuilder {
  private readonly logger = Logger.getInstance();

  constructor(private readonly prover: ZKProver) {}

  async build(request: TransactionRequest): Promise<Transaction> {
    const { inputs, outputs } = request;
    if (inputs.length === 0) {
      throw ErrorHandler.createFormatError('A transaction needs at least one input note');
    }
    if (outputs.length === 0 && !request.unshield) {
      throw ErrorHandler.createFormatError('A transaction needs at least one output');
    }

    const token = inputs[0].note.token;
    const key = tokenKey(token);
    for (const { note, merkleProof } of inputs) {
      if (tokenKey(note.token) !== key || note.treeNumber !== request.treeNumber) {
        throw ErrorHandler.createFormatError('Inputs must share one token and one tree', {
          treeNumber: note.treeNumber
        });
      }
      if (merkleProof.root !== request.merkleRoot || merkleProof.leaf !== note.commitment) {
        throw ErrorHandler.createStateError('Merkle proof does not match the note and root', {
          treeNumber: note.treeNumber
        });
      }
    }
    const mismatched = [...outputs.map(output => output.preimage), ...(request.unshield ? [request.unshield.preimage] : [])]
      .find(preimage => tokenKey(preimage.token) !== key);
    if (mismatched) {
      throw ErrorHandler.createFormatError('Outputs must use the input token', { token: mismatched.token.tokenAddress });
    }

    const nullifyingKey = inputs[0].note.nullifyingKey;
    const spendingPublicKey = inputs[0].note.spendingPublicKey;
    const nullifiers = inputs.map(({ note }) => note.nullifier);
    const outputPreimages = outputs.map(output => output.preimage);
    if (request.unshield) {
      outputPreimages.push(request.unshield.preimage);
    }
    const commitments = outputPreimages.map(hashCommitment);

    const valueIn = inputs.reduce((sum, { note }) => sum + note.value, 0n);
    const valueOut = outputPreimages.reduce((sum, preimage) => sum + preimage.value, 0n);
    if (valueIn !== valueOut) {
      throw ErrorHandler.createFormatError('Input and output values do not balance', {
        valueIn: valueIn.toString(),
        valueOut: valueOut.toString()
      });
    }

    const boundParams: BoundParams = {
      treeNumber: request.treeNumber,
      minGasPrice: request.minGasPrice ?? 0n,
      unshield: request.unshield ? request.unshield.type : UnshieldType.NONE,
      chainID: request.chainID,
      adaptContract: request.adaptContract ?? constants.AddressZero,
      adaptParams: request.adaptParams ?? constants.HashZero,
      commitmentCiphertext: outputs.map(output => output.ciphertext)
    };
    const boundParamsHash = hashBoundParams(boundParams);

    const message = getSignatureMessage(request.merkleRoot, boundParamsHash, nullifiers, commitments);
    const signature = await signPoseidon(request.spendingKey, message);

    const witness: CircuitWitness = {
      merkleRoot: request.merkleRoot,
      boundParamsHash,
      nullifiers,
      commitmentsOut: commitments,
      token: getTokenID(token),
      publicKey: spendingPublicKey,
      signature: [signature.R8[0], signature.R8[1], signature.S],
      randomIn: inputs.map(({ note }) => bytesToBigInt(note.random)),
      valueIn: inputs.map(({ note }) => note.value),
      pathElements: inputs.map(({ merkleProof }) => merkleProof.elements),
      leavesIndices: inputs.map(({ merkleProof }) => merkleProof.indices),
      nullifyingKey,
      npkOut: outputPreimages.map(preimage => preimage.npk),
      valueOut: outputPreimages.map(preimage => preimage.value)
    };

    const shape: CircuitShape = { nullifiers: nullifiers.length, commitments: commitments.length };
    const publicInput = hashPublicInputs(request.merkleRoot, boundParamsHash, nullifiers, commitments);
    const { proof } = await this.prover.generateProof(shape, witness, publicInput);

    this.logger.debug('Transaction built', { ...shape, unshield: boundParams.unshield });

    return {
      proof,
      merkleRoot: request.merkleRoot,
      nullifiers,
      commitments,
      boundParams,
      unshieldPreimage: request.unshield ? request.unshield.preimage : emptyPreimage(),
      overrideOutput: request.overrideOutput
    };
  }
}
