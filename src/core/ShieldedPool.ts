import { constants, utils } from 'ethers';
import { ConfigurationManager, MAX_FEE_BP } from '../config/ConfigurationManager';
import { ErrorHandler, ShieldPoolError } from '../errors/ErrorHandler';
import { EventMonitor } from '../events/EventMonitor';
import { LedgerEvent, NullifiedEvent, UnshieldEvent } from '../types/Events';
import { CommitmentPreimage, TokenData, TokenType } from '../types/Note';
import {
  ActionData,
  CallContext,
  Fees,
  RelayCall,
  RelayCallResult,
  ShieldRequest,
  Transaction,
  UnshieldType
} from '../types/Transaction';
import { CircuitShape, VerifyingKey } from '../types/ZKProof';
import { assertActionData, getAdaptParams } from '../utils/abi';
import { bigIntToAddress, hexLength } from '../utils/bytes';
import { Logger } from '../utils/logger';
import { assertInField, getFee, MAX_NOTE_VALUE } from '../utils/math';
import { hashCommitment, normalizeTokenData, tokenKey } from '../utils/note';
import { SerializedVerifyingKey, shapeOf, Verifier, VerifyingKeyRegistry } from '../zk/Verifier';
import { assertProofCoordinates } from '../zk/snark';
import { AccessController, GovernedAction } from './AccessController';
import { CommitmentTree, CommitmentTreeCheckpoint, SerializedCommitmentTree } from './CommitmentTree';
import { NullifierCheckpoint, NullifierSet } from './NullifierSet';
import { TokenTransferAdapter } from './TokenLedger';

export const POOL_STATE_SCHEMA_VERSION = 1;

export interface FeeSettings {
  shieldFeeBP: number;
  unshieldFeeBP: number;
  nftFee: bigint;
}

export interface ShieldedPoolOptions {
  tokenAdapter: TokenTransferAdapter;
  accessController: AccessController;
  events?: EventMonitor;
  verifier?: Verifier;
  depth?: number;
  fees?: Partial<FeeSettings>;
  treasury?: string;
  chainId?: bigint;
  relayAddress?: string;
}

export interface SerializedToken {
  tokenType: number;
  tokenAddress: string;
  tokenSubID: string;
}

/** Versioned snapshot of everything the ledger persists */
export interface PoolState {
  schemaVersion: number;
  tree: SerializedCommitmentTree;
  /** Spent nullifiers keyed by tree number */
  nullifiers: Record<string, string[]>;
  fees: { shieldFeeBP: number; unshieldFeeBP: number; nftFee: string };
  treasury: string;
  chainId: string;
  relayAddress: string;
  verifyingKeys: SerializedVerifyingKey[];
  blocklist: SerializedToken[];
}

export type EstimateRequest =
  | { kind: 'shield'; requests: ShieldRequest[] }
  | { kind: 'transact'; transactions: Transaction[] }
  | { kind: 'relay'; transactions: Transaction[]; actionData: ActionData };

export interface TokenAmount {
  token: TokenData;
  amount: bigint;
}

export interface RelayResult {
  calls: RelayCallResult[];
  returned: TokenAmount[];
}

type Holdings = Map<string, TokenAmount>;

interface ExecutionContext {
  caller: string;
  gasPrice: bigint;
  verifyProofs: boolean;
  events: LedgerEvent[];
  /** Set only for the transact step and follow-up calls of a relay batch */
  holdings?: Holdings;
}

interface PoolCheckpoint {
  tree: CommitmentTreeCheckpoint;
  nullifiers: NullifierCheckpoint;
  tokenAdapter?: unknown;
}

interface UnshieldPlan {
  to: string;
  token: TokenData;
  fees: Fees;
}

function toAddress(address: string, label: string): string {
  if (!utils.isAddress(address)) {
    throw ErrorHandler.createFormatError(`Invalid ${label} address`, { address });
  }
  return utils.getAddress(address);
}

function sameAddress(a: string, b: string): boolean {
  return utils.isAddress(a) && utils.isAddress(b) && utils.getAddress(a) === utils.getAddress(b);
}

function assertFeeSettings(fees: FeeSettings): void {
  for (const [name, bp] of [['shieldFeeBP', fees.shieldFeeBP], ['unshieldFeeBP', fees.unshieldFeeBP]] as const) {
    if (!Number.isInteger(bp) || bp < 0 || bp > MAX_FEE_BP) {
      throw ErrorHandler.createFormatError(`${name} must be an integer between 0 and ${MAX_FEE_BP}`, { [name]: bp });
    }
  }
  if (fees.nftFee < 0n) {
    throw ErrorHandler.createFormatError('nftFee must be non-negative', { nftFee: fees.nftFee.toString() });
  }
}

function serializeToken(token: TokenData): SerializedToken {
  return { tokenType: token.tokenType, tokenAddress: token.tokenAddress, tokenSubID: token.tokenSubID.toString() };
}

/**
 * The transaction validator. Owns the commitment accumulator and nullifier set and is the only
 * code that mutates them.
 *
 * Every entry point is serialized through a single promise chain and runs inside a checkpointed
 * section: any error restores the accumulator, nullifier set and (when it supports it) the
 * token adapter, and the batch's events are dropped. Events reach the EventMonitor only after
 * the section commits. Checkpoints are journal positions, so a rollback costs what the batch
 * changed rather than the size of the ledger.
 */
export class ShieldedPool {
  public readonly events: EventMonitor;
  public readonly verifier: Verifier;

  private tree: CommitmentTree;
  private nullifiers: NullifierSet = new NullifierSet();
  private readonly tokenAdapter: TokenTransferAdapter;
  private readonly accessController: AccessController;
  private readonly logger = Logger.getInstance();

  private fees: FeeSettings;
  private treasury: string;
  private readonly chainId: bigint;
  private readonly relayAddress: string;
  private readonly blocklist: Map<string, TokenData> = new Map();

  private queue: Promise<void> = Promise.resolve();

  constructor(options: ShieldedPoolOptions) {
    const config = ConfigurationManager.getInstance().getConfig();

    this.tokenAdapter = options.tokenAdapter;
    this.accessController = options.accessController;
    this.events = options.events ?? new EventMonitor();
    this.verifier = options.verifier ?? new Verifier();
    this.tree = new CommitmentTree(options.depth ?? config.merkle.depth);

    this.fees = {
      shieldFeeBP: options.fees?.shieldFeeBP ?? config.fees.shieldFeeBP,
      unshieldFeeBP: options.fees?.unshieldFeeBP ?? config.fees.unshieldFeeBP,
      nftFee: options.fees?.nftFee ?? BigInt(config.fees.nftFee)
    };
    assertFeeSettings(this.fees);
    this.treasury = toAddress(options.treasury ?? config.fees.treasury, 'treasury');
    this.chainId = options.chainId ?? BigInt(config.ledger.chainId);
    this.relayAddress = toAddress(options.relayAddress ?? config.ledger.relayAddress, 'relay');
  }

  // Read-only views

  public getDepth(): number {
    return this.tree.depth;
  }

  public getTreeNumber(): number {
    return this.tree.getTreeNumber();
  }

  public getNextLeafIndex(): number {
    return this.tree.getNextLeafIndex();
  }

  public getMerkleRoot(): bigint {
    return this.tree.getRoot();
  }

  public rootExists(treeNumber: number, root: bigint): boolean {
    return this.tree.rootExists(treeNumber, root);
  }

  public isNullifierSpent(treeNumber: number, nullifier: bigint): boolean {
    return this.nullifiers.has(treeNumber, nullifier);
  }

  public getFees(): FeeSettings {
    return { ...this.fees };
  }

  public getTreasury(): string {
    return this.treasury;
  }

  public getChainId(): bigint {
    return this.chainId;
  }

  public getRelayAddress(): string {
    return this.relayAddress;
  }

  public isBlocklisted(token: TokenData): boolean {
    return this.blocklist.has(tokenKey(token));
  }

  public getVerificationKey(shape: CircuitShape): VerifyingKey {
    return this.verifier.registry.get(shape);
  }

  // Entry points

  /**
   * Deposits public tokens: pulls each value in, takes the shield fee and appends one
   * commitment per request.
   */
  public async shield(ctx: CallContext, requests: ShieldRequest[]): Promise<LedgerEvent[]> {
    return this.exclusive(async () => {
      const { events } = await this.atomically('shield', ctx, true, exec => this.shieldInternal(exec, requests, 'caller'));
      return events;
    });
  }

  /**
   * Verifies and applies a batch of private transfers and unshields. The whole batch is
   * applied or none of it.
   */
  public async transact(ctx: CallContext, transactions: Transaction[]): Promise<LedgerEvent[]> {
    return this.exclusive(async () => {
      const { events } = await this.atomically('transact', ctx, true, exec => this.transactInternal(exec, transactions));
      return events;
    });
  }

  /**
   * Runs a transact batch as the relay and then its follow-up calls. Each transaction must be
   * locked to the relay and bound to the action data through adaptParams. Whatever the calls
   * leave in relay holdings is returned to the caller.
   *
   * The holdings live only for the duration of the batch and only its own call loop can spend
   * them; there is no way to issue a relay call from outside.
   */
  public async relay(ctx: CallContext, transactions: Transaction[], actionData: ActionData): Promise<RelayResult> {
    return this.exclusive(async () => {
      const { result } = await this.atomically('relay', ctx, true, exec =>
        this.relayInternal(exec, transactions, actionData)
      );
      return result;
    });
  }

  /**
   * Dry-runs an entry point with proof verification bypassed and returns the events it would
   * emit. State, including the token adapter, is always rolled back, so the adapter must
   * support checkpoint and restore.
   */
  public async estimate(ctx: CallContext, request: EstimateRequest): Promise<LedgerEvent[]> {
    if (!this.tokenAdapter.checkpoint || !this.tokenAdapter.restore) {
      throw ErrorHandler.createStateError('Estimation needs a token adapter that can be rolled back', {
        operation: 'estimate'
      });
    }
    return this.exclusive(async () => {
      const { events } = await this.atomically('estimate', ctx, false, async exec => {
        switch (request.kind) {
          case 'shield':
            await this.shieldInternal(exec, request.requests, 'caller');
            return;
          case 'transact':
            await this.transactInternal(exec, request.transactions);
            return;
          case 'relay':
            await this.relayInternal(exec, request.transactions, request.actionData);
            return;
        }
      });
      return events;
    });
  }

  // Governance

  public async changeFees(caller: string, fees: FeeSettings): Promise<void> {
    assertFeeSettings(fees);
    await this.governed(caller, 'changeFees', exec => {
      const current = this.fees;
      if (
        current.shieldFeeBP === fees.shieldFeeBP &&
        current.unshieldFeeBP === fees.unshieldFeeBP &&
        current.nftFee === fees.nftFee
      ) {
        return;
      }
      this.fees = { ...fees };
      exec.events.push({ type: 'fee_change', ...fees });
    });
  }

  public async changeTreasury(caller: string, treasury: string): Promise<void> {
    const address = toAddress(treasury, 'treasury');
    await this.governed(caller, 'changeTreasury', () => {
      this.treasury = address;
    });
  }

  public async setVerificationKey(caller: string, shape: CircuitShape, key: VerifyingKey): Promise<void> {
    await this.governed(caller, 'setVerificationKey', () => this.verifier.registry.set(shape, key));
  }

  public async removeVerificationKey(caller: string, shape: CircuitShape): Promise<void> {
    await this.governed(caller, 'removeVerificationKey', () => {
      if (!this.verifier.registry.remove(shape)) {
        throw ErrorHandler.createStateError('Verifying key not set for circuit shape', { ...shape });
      }
    });
  }

  public async retireRoot(caller: string, treeNumber: number, root: bigint): Promise<void> {
    await this.governed(caller, 'retireRoot', () => this.tree.retireRoot(treeNumber, root));
  }

  public async addToBlocklist(caller: string, token: TokenData): Promise<void> {
    const normalized = normalizeTokenData(token);
    await this.governed(caller, 'updateBlocklist', () => {
      this.blocklist.set(tokenKey(normalized), normalized);
    });
  }

  public async removeFromBlocklist(caller: string, token: TokenData): Promise<void> {
    const normalized = normalizeTokenData(token);
    await this.governed(caller, 'updateBlocklist', () => {
      this.blocklist.delete(tokenKey(normalized));
    });
  }

  // Persistence

  public exportState(): PoolState {
    return {
      schemaVersion: POOL_STATE_SCHEMA_VERSION,
      tree: this.tree.toJSON(),
      nullifiers: this.nullifiers.toJSON(),
      fees: {
        shieldFeeBP: this.fees.shieldFeeBP,
        unshieldFeeBP: this.fees.unshieldFeeBP,
        nftFee: this.fees.nftFee.toString()
      },
      treasury: this.treasury,
      chainId: this.chainId.toString(),
      relayAddress: this.relayAddress,
      verifyingKeys: this.verifier.registry.toJSON(),
      blocklist: [...this.blocklist.values()].map(serializeToken)
    };
  }

  /**
   * Rebuilds a pool from exported state. Older schema versions would be migrated here; any
   * version this code does not know is rejected.
   */
  public static fromState(
    state: PoolState,
    options: Pick<ShieldedPoolOptions, 'tokenAdapter' | 'accessController' | 'events'>
  ): ShieldedPool {
    if (state.schemaVersion !== POOL_STATE_SCHEMA_VERSION) {
      throw ErrorHandler.createFormatError('Unsupported pool state schema version', {
        schemaVersion: state.schemaVersion
      });
    }

    const pool = new ShieldedPool({
      ...options,
      verifier: new Verifier(VerifyingKeyRegistry.fromJSON(state.verifyingKeys)),
      depth: state.tree.depth,
      fees: {
        shieldFeeBP: state.fees.shieldFeeBP,
        unshieldFeeBP: state.fees.unshieldFeeBP,
        nftFee: BigInt(state.fees.nftFee)
      },
      treasury: state.treasury,
      chainId: BigInt(state.chainId),
      relayAddress: state.relayAddress
    });
    pool.tree = CommitmentTree.fromJSON(state.tree);
    pool.nullifiers = NullifierSet.fromJSON(state.nullifiers);
    for (const token of state.blocklist) {
      const normalized = normalizeTokenData({
        tokenType: token.tokenType,
        tokenAddress: token.tokenAddress,
        tokenSubID: BigInt(token.tokenSubID)
      });
      pool.blocklist.set(tokenKey(normalized), normalized);
    }
    return pool;
  }

  // Batch execution

  private async shieldInternal(
    exec: ExecutionContext,
    requests: ShieldRequest[],
    source: 'caller' | 'holdings'
  ): Promise<void> {
    if (requests.length === 0) {
      return;
    }

    const preimages: CommitmentPreimage[] = [];
    const fees: Fees[] = [];
    for (const request of requests) {
      const token = this.assertTokenAllowed(request.preimage.token);
      const { value, npk } = request.preimage;
      if (value <= 0n || value > MAX_NOTE_VALUE) {
        throw ErrorHandler.createFormatError('Shield value out of range', { value: value.toString() });
      }
      if (token.tokenType === TokenType.ERC721 && value !== 1n) {
        throw ErrorHandler.createFormatError('Non-fungible notes must have value 1', { token: token.tokenAddress });
      }
      assertInField(npk, 'npk');
      const { encryptedBundle, shieldKey } = request.ciphertext;
      if (encryptedBundle.length === 0 || !utils.isHexString(shieldKey) || hexLength(shieldKey) !== 32) {
        throw ErrorHandler.createFormatError('Malformed shield ciphertext');
      }

      const split = this.computeFee(token, value, this.fees.shieldFeeBP);
      preimages.push({ npk, token, value: split.base });
      fees.push(split);
    }

    this.tree.peekInsertion(preimages.length);

    for (const [i, preimage] of preimages.entries()) {
      const amount = requests[i].preimage.value;
      if (source === 'caller') {
        await this.pullIn(exec.caller, preimage.token, amount);
      } else {
        this.takeFromHoldings(exec, preimage.token, amount);
      }
    }

    const placement = this.tree.insertLeaves(preimages.map(hashCommitment));
    this.logger.debug('Shield fees computed', { count: fees.length, shieldFeeBP: this.fees.shieldFeeBP });

    for (const [i, preimage] of preimages.entries()) {
      if (fees[i].fee > 0n) {
        await this.pushOut(this.treasury, preimage.token, fees[i].fee);
      }
    }

    exec.events.push({
      type: 'shield',
      treeNumber: placement.treeNumber,
      startPosition: placement.startPosition,
      commitments: preimages,
      shieldCiphertext: requests.map(request => request.ciphertext),
      fees: fees.map(split => split.fee)
    });
  }

  private async transactInternal(exec: ExecutionContext, transactions: Transaction[]): Promise<void> {
    if (transactions.length === 0) {
      return;
    }

    // Validation: nothing below mutates state
    const unshields = transactions.map(transaction => this.validateTransaction(exec, transaction));
    this.nullifiers.assertUnspent(
      transactions.flatMap(transaction =>
        transaction.nullifiers.map(nullifier => ({ treeNumber: transaction.boundParams.treeNumber, nullifier }))
      )
    );

    const hashes: bigint[] = [];
    const ciphertext = transactions.flatMap(transaction => transaction.boundParams.commitmentCiphertext);
    for (const transaction of transactions) {
      const outputs = transaction.boundParams.unshield === UnshieldType.NONE
        ? transaction.commitments
        : transaction.commitments.slice(0, -1);
      hashes.push(...outputs);
    }
    this.tree.peekInsertion(hashes.length);

    // Mutation
    for (const transaction of transactions) {
      this.nullifiers.insertBatch(transaction.boundParams.treeNumber, transaction.nullifiers);
      const nullified: NullifiedEvent = {
        type: 'nullified',
        treeNumber: transaction.boundParams.treeNumber,
        nullifier: [...transaction.nullifiers]
      };
      exec.events.push(nullified);
    }

    if (hashes.length > 0) {
      const placement = this.tree.insertLeaves(hashes);
      exec.events.push({
        type: 'transact',
        treeNumber: placement.treeNumber,
        startPosition: placement.startPosition,
        hashes,
        ciphertext
      });
    }

    for (const plan of unshields) {
      if (!plan) {
        continue;
      }
      if (plan.to === this.relayAddress && exec.holdings) {
        this.addToHoldings(exec.holdings, plan.token, plan.fees.base);
      } else {
        await this.pushOut(plan.to, plan.token, plan.fees.base);
      }
      if (plan.fees.fee > 0n) {
        await this.pushOut(this.treasury, plan.token, plan.fees.fee);
      }
      const unshield: UnshieldEvent = {
        type: 'unshield',
        to: plan.to,
        token: plan.token,
        amount: plan.fees.base,
        fee: plan.fees.fee
      };
      exec.events.push(unshield);
    }
  }

  private validateTransaction(exec: ExecutionContext, transaction: Transaction): UnshieldPlan | null {
    const { boundParams } = transaction;

    if (boundParams.minGasPrice > exec.gasPrice) {
      throw ErrorHandler.createStateError('Gas price too low', {
        minGasPrice: boundParams.minGasPrice.toString(),
        gasPrice: exec.gasPrice.toString()
      });
    }

    const adaptContract = toAddress(boundParams.adaptContract, 'adapt contract');
    if (adaptContract !== constants.AddressZero && !sameAddress(adaptContract, exec.caller)) {
      throw ErrorHandler.createAuthorizationError('Invalid adapt contract as sender', {
        caller: exec.caller,
        adaptContract
      });
    }

    if (boundParams.chainID !== this.chainId) {
      throw ErrorHandler.createStateError('ChainID mismatch', { chainID: boundParams.chainID.toString() });
    }

    if (transaction.nullifiers.length === 0 || transaction.commitments.length === 0) {
      throw ErrorHandler.createFormatError('Transactions need at least one nullifier and one commitment', {
        ...shapeOf(transaction)
      });
    }
    assertInField(transaction.merkleRoot, 'merkleRoot');
    transaction.nullifiers.forEach((nullifier, i) => assertInField(nullifier, `nullifiers[${i}]`));
    transaction.commitments.forEach((commitment, i) => assertInField(commitment, `commitments[${i}]`));
    assertProofCoordinates(transaction.proof);

    if (!this.tree.rootExists(boundParams.treeNumber, transaction.merkleRoot)) {
      throw ErrorHandler.createStateError('Invalid Merkle Root', {
        treeNumber: boundParams.treeNumber,
        merkleRoot: transaction.merkleRoot.toString()
      });
    }

    const expectedCiphertexts = boundParams.unshield === UnshieldType.NONE
      ? transaction.commitments.length
      : transaction.commitments.length - 1;
    if (boundParams.commitmentCiphertext.length !== expectedCiphertexts) {
      throw ErrorHandler.createFormatError('Invalid note ciphertext array length', {
        expected: expectedCiphertexts,
        actual: boundParams.commitmentCiphertext.length
      });
    }

    const plan = this.planUnshield(exec, transaction);

    if (exec.verifyProofs && !this.verifier.verify(transaction)) {
      throw ErrorHandler.createProofError('Invalid Snark Proof', { ...shapeOf(transaction) });
    }

    return plan;
  }

  private planUnshield(exec: ExecutionContext, transaction: Transaction): UnshieldPlan | null {
    const { unshield } = transaction.boundParams;
    if (unshield === UnshieldType.NONE) {
      return null;
    }
    if (unshield !== UnshieldType.NORMAL && unshield !== UnshieldType.REDIRECT) {
      throw ErrorHandler.createFormatError('Unknown unshield type', { unshield });
    }

    const preimage = transaction.unshieldPreimage;
    const lastCommitment = transaction.commitments[transaction.commitments.length - 1];
    if (hashCommitment(preimage) !== lastCommitment) {
      throw ErrorHandler.createFormatError('Invalid Withdraw Note', { commitment: lastCommitment.toString() });
    }

    const token = this.assertTokenAllowed(preimage.token);
    if (token.tokenType === TokenType.ERC721 && preimage.value !== 1n) {
      throw ErrorHandler.createFormatError('Non-fungible notes must have value 1', { token: token.tokenAddress });
    }

    const originalRecipient = bigIntToAddress(preimage.npk);
    let to = originalRecipient;
    if (transaction.overrideOutput !== undefined && !sameAddress(transaction.overrideOutput, originalRecipient)) {
      if (unshield !== UnshieldType.REDIRECT) {
        throw ErrorHandler.createAuthorizationError("Can't override destination address", {
          caller: exec.caller
        });
      }
      if (!sameAddress(exec.caller, originalRecipient)) {
        throw ErrorHandler.createAuthorizationError("Can't override destination address", {
          caller: exec.caller
        });
      }
      to = toAddress(transaction.overrideOutput, 'override');
    }

    return { to, token, fees: this.computeFee(token, preimage.value, this.fees.unshieldFeeBP) };
  }

  private async relayInternal(exec: ExecutionContext, transactions: Transaction[], actionData: ActionData): Promise<RelayResult> {
    assertActionData(actionData);
    const adaptParams = getAdaptParams(transactions, actionData).toLowerCase();
    for (const transaction of transactions) {
      if (!sameAddress(transaction.boundParams.adaptContract, this.relayAddress)) {
        throw ErrorHandler.createAuthorizationError('Transaction is not locked to the relay', {
          adaptContract: transaction.boundParams.adaptContract
        });
      }
      if (transaction.boundParams.adaptParams.toLowerCase() !== adaptParams) {
        throw ErrorHandler.createAuthorizationError('Invalid adapt params', { operation: 'relay' });
      }
    }

    const holdings: Holdings = new Map();
    const relayExec: ExecutionContext = { ...exec, caller: this.relayAddress, holdings };
    const calls: RelayCallResult[] = [];
    await this.transactInternal(relayExec, transactions);

    for (const [index, call] of actionData.calls.entries()) {
      if (actionData.requireSuccess) {
        await this.runRelayCall(relayExec, call);
        calls.push({ index, success: true });
        continue;
      }

      const checkpoint = this.checkpoint();
      const held = this.copyHoldings(holdings);
      const eventCount = relayExec.events.length;
      try {
        await this.runRelayCall(relayExec, call);
        calls.push({ index, success: true });
      } catch (error) {
        this.rollback(checkpoint);
        holdings.clear();
        held.forEach((holding, key) => holdings.set(key, holding));
        relayExec.events.length = eventCount;
        const handled = ErrorHandler.getInstance().handleError(error, { operation: 'relayCall', index });
        calls.push({ index, success: false, error: handled.message });
      }
    }

    const returned: TokenAmount[] = [];
    for (const holding of holdings.values()) {
      if (holding.amount > 0n) {
        await this.pushOut(exec.caller, holding.token, holding.amount);
        returned.push({ ...holding });
      }
    }
    holdings.clear();

    return { calls, returned };
  }

  /**
   * A single follow-up call, spending from the batch's own holdings
   */
  private async runRelayCall(exec: ExecutionContext, call: RelayCall): Promise<void> {
    switch (call.kind) {
      case 'shield':
        await this.shieldInternal(exec, call.requests, 'holdings');
        return;
      case 'transfer': {
        const token = normalizeTokenData(call.token);
        const held = exec.holdings?.get(tokenKey(token))?.amount ?? 0n;
        const amount = call.value === 0n ? held : call.value;
        this.takeFromHoldings(exec, token, amount);
        await this.pushOut(toAddress(call.to, 'recipient'), token, amount);
        return;
      }
    }
  }

  // Helpers

  private computeFee(token: TokenData, value: bigint, feeBP: number): Fees {
    if (token.tokenType === TokenType.ERC721) {
      return { base: value, fee: 0n };
    }
    return getFee(value, true, feeBP);
  }

  private assertTokenAllowed(token: TokenData): TokenData {
    const normalized = normalizeTokenData(token);
    if (this.blocklist.has(tokenKey(normalized))) {
      throw ErrorHandler.createAuthorizationError('Unsupported Token', { token: normalized.tokenAddress });
    }
    return normalized;
  }

  private addToHoldings(holdings: Holdings, token: TokenData, amount: bigint): void {
    const key = tokenKey(token);
    const current = holdings.get(key)?.amount ?? 0n;
    holdings.set(key, { token, amount: current + amount });
  }

  private takeFromHoldings(exec: ExecutionContext, token: TokenData, amount: bigint): void {
    const { holdings } = exec;
    if (!holdings) {
      throw ErrorHandler.createAuthorizationError('Relay holdings are only available inside a relay batch', {
        operation: 'relayCall'
      });
    }
    const key = tokenKey(token);
    const current = holdings.get(key)?.amount ?? 0n;
    if (amount < 0n || current < amount) {
      throw ErrorHandler.createTransferError('Insufficient relay balance', {
        token: token.tokenAddress,
        required: amount.toString(),
        available: current.toString()
      });
    }
    holdings.set(key, { token, amount: current - amount });
  }

  private async pullIn(from: string, token: TokenData, amount: bigint): Promise<void> {
    let received: bigint;
    try {
      received = await this.tokenAdapter.pullIn(from, token, amount);
    } catch (error) {
      throw this.asTransferError(error, from, token);
    }
    if (received !== amount) {
      throw ErrorHandler.createTransferError('Received amount does not match transfer amount', {
        caller: from,
        token: token.tokenAddress,
        expected: amount.toString(),
        received: received.toString()
      });
    }
  }

  private async pushOut(to: string, token: TokenData, amount: bigint): Promise<void> {
    try {
      await this.tokenAdapter.pushOut(to, token, amount);
    } catch (error) {
      throw this.asTransferError(error, to, token);
    }
  }

  private asTransferError(error: unknown, counterparty: string, token: TokenData): ShieldPoolError {
    if (ShieldPoolError.isShieldPoolError(error)) {
      return error;
    }
    return ErrorHandler.createTransferError(error instanceof Error ? error.message : 'Token transfer failed', {
      caller: counterparty,
      token: token.tokenAddress
    });
  }

  private copyHoldings(holdings: Holdings): Holdings {
    const copy: Holdings = new Map();
    holdings.forEach((holding, key) => copy.set(key, { ...holding }));
    return copy;
  }

  private checkpoint(): PoolCheckpoint {
    return {
      tree: this.tree.checkpoint(),
      nullifiers: this.nullifiers.checkpoint(),
      tokenAdapter: this.tokenAdapter.checkpoint ? this.tokenAdapter.checkpoint() : undefined
    };
  }

  private rollback(checkpoint: PoolCheckpoint): void {
    this.tree.restore(checkpoint.tree);
    this.nullifiers.restore(checkpoint.nullifiers);
    if (this.tokenAdapter.restore && checkpoint.tokenAdapter !== undefined) {
      this.tokenAdapter.restore(checkpoint.tokenAdapter);
    }
  }

  private commitJournals(): void {
    this.tree.commit();
    this.nullifiers.commit();
    if (this.tokenAdapter.commit) {
      this.tokenAdapter.commit();
    }
  }

  /**
   * Runs body against a checkpoint. On success the events are published when `commit` is set;
   * otherwise, and on any error, state is rolled back.
   */
  private async atomically<T>(
    operation: string,
    ctx: CallContext,
    commit: boolean,
    body: (exec: ExecutionContext) => Promise<T>
  ): Promise<{ result: T; events: LedgerEvent[] }> {
    const exec: ExecutionContext = {
      caller: toAddress(ctx.caller, 'caller'),
      gasPrice: ctx.gasPrice ?? 0n,
      verifyProofs: commit,
      events: []
    };
    const checkpoint = this.checkpoint();

    let result: T;
    try {
      result = await body(exec);
    } catch (error) {
      this.rollback(checkpoint);
      const handled = ErrorHandler.getInstance().handleError(error, { operation });
      this.logger.warn('Batch rejected', { operation, type: handled.type, correlationId: handled.correlationId });
      throw handled;
    }

    if (!commit) {
      this.rollback(checkpoint);
      return { result, events: exec.events };
    }

    this.commitJournals();
    this.events.publish(exec.events);
    this.logger.info(`${operation} committed`, {
      operation,
      treeNumber: this.tree.getTreeNumber(),
      nextLeafIndex: this.tree.getNextLeafIndex(),
      events: exec.events.length
    });
    return { result, events: exec.events };
  }

  private async governed(
    caller: string,
    action: GovernedAction,
    body: (exec: ExecutionContext) => void
  ): Promise<void> {
    await this.exclusive(async () => {
      if (!this.accessController.isAuthorized(caller, action)) {
        throw ErrorHandler.getInstance().handleError(
          ErrorHandler.createAuthorizationError('Caller is not authorized', { caller, operation: action })
        );
      }
      await this.atomically(action, { caller }, true, async exec => body(exec));
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
