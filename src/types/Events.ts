import { CommitmentCiphertext, CommitmentPreimage, ShieldCiphertext, TokenData } from './Note';

export interface ShieldEvent {
  type: 'shield';
  treeNumber: number;
  startPosition: number;
  commitments: CommitmentPreimage[];
  shieldCiphertext: ShieldCiphertext[];
  fees: bigint[];
}

export interface TransactEvent {
  type: 'transact';
  treeNumber: number;
  startPosition: number;
  hashes: bigint[];
  ciphertext: CommitmentCiphertext[];
}

export interface NullifiedEvent {
  type: 'nullified';
  treeNumber: number;
  nullifier: bigint[];
}

export interface UnshieldEvent {
  type: 'unshield';
  to: string;
  token: TokenData;
  amount: bigint;
  fee: bigint;
}

export interface FeeChangeEvent {
  type: 'fee_change';
  shieldFeeBP: number;
  unshieldFeeBP: number;
  nftFee: bigint;
}

export type LedgerEvent = ShieldEvent | TransactEvent | NullifiedEvent | UnshieldEvent | FeeChangeEvent;

export type LedgerEventType = LedgerEvent['type'];

/** An event as recorded in the log, with its global sequence number. */
export interface RecordedEvent<E extends LedgerEvent = LedgerEvent> {
  sequence: number;
  event: E;
}
