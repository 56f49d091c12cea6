import { CommitmentCiphertext, CommitmentPreimage, Hex, ShieldCiphertext, TokenData } from './Note';
import { SnarkProof } from './ZKProof';

export enum UnshieldType {
  NONE = 0,
  NORMAL = 1,
  REDIRECT = 2
}

export interface BoundParams {
  treeNumber: number;
  minGasPrice: bigint;
  unshield: UnshieldType;
  chainID: bigint;
  adaptContract: string;
  adaptParams: Hex;
  commitmentCiphertext: CommitmentCiphertext[];
}

export interface Transaction {
  proof: SnarkProof;
  merkleRoot: bigint;
  nullifiers: bigint[];
  commitments: bigint[];
  boundParams: BoundParams;
  unshieldPreimage: CommitmentPreimage;
  overrideOutput?: string;
}

export interface ShieldRequest {
  preimage: CommitmentPreimage;
  ciphertext: ShieldCiphertext;
}

/** Ledger-level call context; `gasPrice` is the price the submission actually pays. */
export interface CallContext {
  caller: string;
  gasPrice?: bigint;
}

export type RelayCall =
  | { kind: 'shield'; requests: ShieldRequest[] }
  | { kind: 'transfer'; token: TokenData; to: string; value: bigint };

export interface ActionData {
  random: Hex;
  requireSuccess: boolean;
  calls: RelayCall[];
}

export interface RelayCallResult {
  index: number;
  success: boolean;
  error?: string;
}

export interface Fees {
  base: bigint;
  fee: bigint;
}
