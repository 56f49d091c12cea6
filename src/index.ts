// Ledger
export { ShieldedPool } from './core/ShieldedPool';
export type {
  EstimateRequest,
  FeeSettings,
  PoolState,
  RelayResult,
  ShieldedPoolOptions,
  TokenAmount
} from './core/ShieldedPool';
export { CommitmentTree } from './core/CommitmentTree';
export type { CommitmentTreeCheckpoint, InsertionResult, SerializedCommitmentTree } from './core/CommitmentTree';
export { NullifierSet } from './core/NullifierSet';
export type { NullifierCheckpoint, NullifierEntry } from './core/NullifierSet';
export { InMemoryTokenLedger } from './core/TokenLedger';
export type { TokenTransferAdapter } from './core/TokenLedger';
export { OwnerAccessController } from './core/AccessController';
export type { AccessController, GovernedAction } from './core/AccessController';

// Wallet
export { ShieldedWallet } from './core/ShieldedWallet';
export type { ShieldedWalletOptions, SubmissionOptions, TransferParams, UnshieldParams } from './core/ShieldedWallet';
export { NoteManager } from './core/NoteManager';
export type { NoteFilter, TokenBalance } from './core/NoteManager';
export { MerkleTreeClient } from './core/MerkleTreeClient';
export { TransactionBuilder, getSignatureMessage } from './tx/TransactionBuilder';

// Proofs
export { Verifier, VerifyingKeyRegistry, hashBoundParams, hashPublicInputs, getTransactionInputsHash } from './zk/Verifier';
export { verifyGroth16, verifyingKeyFromSnarkjs, proofFromSnarkjs } from './zk/snark';
export { ZKProver, SnarkjsProvingBackend } from './zk/ZKProver';

// Events
export { EventMonitor } from './events/EventMonitor';

// Types
export * from './types/Note';
export * from './types/Transaction';
export * from './types/ZKProof';
export * from './types/Events';

// Utilities
export * from './utils/note';
export * from './utils/merkle';
export { getAdaptParams, encodeActionData } from './utils/abi';
export { getFee, SNARK_SCALAR_FIELD, SNARK_PRIME } from './utils/math';
export { poseidonHash, poseidonHashMany } from './utils/poseidon';
export { getSpendingPublicKey, signPoseidon, verifyPoseidon } from './utils/babyjubjub';
export { getViewingPublicKey, getSharedSymmetricKey, blindViewingKeys } from './utils/keyExchange';

// Errors, config and logging
export { ShieldPoolError, ErrorHandler, ErrorType } from './errors/ErrorHandler';
export type { ErrorContext, ErrorRecovery } from './errors/ErrorHandler';
export { ConfigurationManager } from './config/ConfigurationManager';
export type { PoolConfig } from './config/ConfigurationManager';
export { Logger, LogLevel } from './utils/logger';
