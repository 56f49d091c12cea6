import { ErrorHandler } from '../errors/ErrorHandler';
import { EventMonitor } from '../events/EventMonitor';
import { RecordedEvent, ShieldEvent, TransactEvent } from '../types/Events';
import { Hex, Note, ShieldedAddress, ShieldedNote, TokenData } from '../types/Note';
import { ActionData, ShieldRequest, Transaction, UnshieldType } from '../types/Transaction';
import { getAdaptParams } from '../utils/abi';
import { getSpendingPublicKey } from '../utils/babyjubjub';
import { addressToBigInt, bytesToHex, hexToBytes } from '../utils/bytes';
import { getViewingPublicKey } from '../utils/keyExchange';
import { Logger } from '../utils/logger';
import { MAX_NOTE_VALUE } from '../utils/math';
import {
  decryptShieldNote,
  decryptTransferNote,
  encryptShieldNote,
  encryptTransferNote,
  generateNoteRandom,
  getMasterPublicKey,
  getNoteHash,
  getNotePublicKey,
  getNullifier,
  getNullifyingKey,
  hashCommitment,
  normalizeTokenData,
  tokenKey
} from '../utils/note';
import { TransactionBuilder, TransactionOutput } from '../tx/TransactionBuilder';
import { ZKProver } from '../zk/ZKProver';
import { MerkleTreeClient } from './MerkleTreeClient';
import { NoteManager, TokenBalance } from './NoteManager';

export interface ShieldedWalletOptions {
  depth: number;
  chainId: bigint;
  prover: ZKProver;
}

export interface TransferParams {
  to: ShieldedAddress;
  token: TokenData;
  value: bigint;
  memo?: string;
}

export interface UnshieldParams {
  to: string;
  token: TokenData;
  value: bigint;
  /** Allows the recipient to redirect the withdrawal at submission time */
  allowOverride?: boolean;
}

export interface SubmissionOptions {
  minGasPrice?: bigint;
  adaptContract?: string;
  /** Locks a single-transaction relay batch to its follow-up calls */
  relay?: { address: string; actionData: ActionData };
}

/**
 * Off-ledger wallet: holds the spending and viewing keys, mirrors the accumulator from ledger
 * events, recovers owned notes and builds proven transactions.
 */
export class ShieldedWallet {
  public readonly notes = new NoteManager();
  public readonly merkleTree: MerkleTreeClient;

  public readonly nullifyingKey: bigint;
  public readonly masterPublicKey: bigint;

  private readonly builder: TransactionBuilder;
  private readonly logger = Logger.getInstance();
  private cursor = 0;

  private constructor(
    private readonly spendingKey: Uint8Array,
    private readonly viewingKey: Uint8Array,
    private readonly spendingPublicKey: [bigint, bigint],
    private readonly options: ShieldedWalletOptions
  ) {
    this.nullifyingKey = getNullifyingKey(viewingKey);
    this.masterPublicKey = getMasterPublicKey(spendingPublicKey, this.nullifyingKey);
    this.merkleTree = new MerkleTreeClient(options.depth);
    this.builder = new TransactionBuilder(options.prover);
  }

  static async fromKeys(
    spendingKey: Uint8Array,
    viewingKey: Uint8Array,
    options: ShieldedWalletOptions
  ): Promise<ShieldedWallet> {
    if (viewingKey.length !== 32) {
      throw ErrorHandler.createFormatError('Viewing key must be 32 bytes', { length: viewingKey.length });
    }
    const spendingPublicKey = await getSpendingPublicKey(spendingKey);
    return new ShieldedWallet(spendingKey, viewingKey, spendingPublicKey, options);
  }

  getAddress(): ShieldedAddress {
    return {
      masterPublicKey: this.masterPublicKey,
      viewingPublicKey: bytesToHex(getViewingPublicKey(this.viewingKey))
    };
  }

  /**
   * Builds a deposit for a recipient. The depositor needs no wallet; this is a convenience for
   * shielding to any address.
   */
  static async createShieldRequest(
    recipient: ShieldedAddress,
    token: TokenData,
    value: bigint,
    shieldPrivateKey?: Uint8Array
  ): Promise<ShieldRequest> {
    const random = generateNoteRandom();
    return {
      preimage: {
        npk: getNotePublicKey(recipient.masterPublicKey, random),
        token: normalizeTokenData(token),
        value
      },
      ciphertext: await encryptShieldNote(random, hexToBytes(recipient.viewingPublicKey), shieldPrivateKey)
    };
  }

  /**
   * Consumes ledger events from the last cursor. Returns the number of newly recovered notes.
   */
  async scan(events: EventMonitor): Promise<number> {
    let found = 0;
    for (const recorded of events.getEvents(this.cursor)) {
      found += await this.processEvent(recorded);
      this.cursor = recorded.sequence + 1;
    }
    if (found > 0) {
      this.logger.info('Wallet scan recovered notes', { count: found, cursor: this.cursor });
    }
    return found;
  }

  getBalance(token: TokenData): bigint {
    return this.notes.getBalance(token);
  }

  getBalances(): TokenBalance[] {
    return this.notes.getBalances();
  }

  async buildTransfer(params: TransferParams, options: SubmissionOptions = {}): Promise<Transaction> {
    return this.buildTransfers([params], options);
  }

  /**
   * Pays several recipients of one token from a single set of inputs, with change back to this
   * wallet as the last output.
   */
  async buildTransfers(transfers: TransferParams[], options: SubmissionOptions = {}): Promise<Transaction> {
    if (transfers.length === 0) {
      throw ErrorHandler.createFormatError('At least one transfer is required');
    }
    const token = normalizeTokenData(transfers[0].token);
    if (transfers.some(params => tokenKey(params.token) !== tokenKey(token))) {
      throw ErrorHandler.createFormatError('Transfers in one transaction must share a token');
    }
    const total = transfers.reduce((sum, params) => sum + params.value, 0n);
    const selected = this.notes.selectNotes(token, total);
    const change = selected.reduce((sum, note) => sum + note.value, 0n) - total;

    const outputs: TransactionOutput[] = [];
    for (const params of transfers) {
      outputs.push(await this.createOutput(params.to, token, params.value, params.memo ?? ''));
    }
    if (change > 0n) {
      outputs.push(await this.createOutput(this.getAddress(), token, change, ''));
    }
    return this.buildFromNotes(selected, outputs, null, options);
  }

  async buildUnshield(params: UnshieldParams, options: SubmissionOptions = {}): Promise<Transaction> {
    const token = normalizeTokenData(params.token);
    const selected = this.notes.selectNotes(token, params.value);
    const change = selected.reduce((sum, note) => sum + note.value, 0n) - params.value;

    const outputs: TransactionOutput[] = [];
    if (change > 0n) {
      outputs.push(await this.createOutput(this.getAddress(), token, change, ''));
    }
    return this.buildFromNotes(
      selected,
      outputs,
      {
        preimage: { npk: addressToBigInt(params.to), token, value: params.value },
        type: params.allowOverride ? UnshieldType.REDIRECT : UnshieldType.NORMAL
      },
      options
    );
  }

  private async buildFromNotes(
    selected: ShieldedNote[],
    outputs: TransactionOutput[],
    unshield: { preimage: Transaction['unshieldPreimage']; type: UnshieldType.NORMAL | UnshieldType.REDIRECT } | null,
    options: SubmissionOptions
  ): Promise<Transaction> {
    const treeNumber = selected[0].treeNumber;
    const inputs = selected.map(note => ({
      note,
      merkleProof: this.merkleTree.getMerkleProof(treeNumber, note.leafIndex)
    }));

    let adaptContract = options.adaptContract;
    let adaptParams: Hex | undefined;
    if (options.relay) {
      adaptContract = options.relay.address;
      adaptParams = getAdaptParams([{ nullifiers: selected.map(note => note.nullifier) }], options.relay.actionData);
    }

    return this.builder.build({
      spendingKey: this.spendingKey,
      treeNumber,
      merkleRoot: this.merkleTree.getRoot(treeNumber),
      inputs,
      outputs,
      unshield: unshield ?? undefined,
      chainID: this.options.chainId,
      minGasPrice: options.minGasPrice,
      adaptContract,
      adaptParams
    });
  }

  private async createOutput(
    recipient: ShieldedAddress,
    token: TokenData,
    value: bigint,
    memo: string
  ): Promise<TransactionOutput> {
    const random = generateNoteRandom();
    const ciphertext = await encryptTransferNote({
      note: { masterPublicKey: recipient.masterPublicKey, random, value, token, memo },
      senderViewingPrivateKey: this.viewingKey,
      receiverViewingPublicKey: hexToBytes(recipient.viewingPublicKey)
    });
    return {
      preimage: { npk: getNotePublicKey(recipient.masterPublicKey, random), token, value },
      ciphertext
    };
  }

  private async processEvent(recorded: RecordedEvent): Promise<number> {
    const { event } = recorded;
    switch (event.type) {
      case 'shield':
        return this.processShield(event);
      case 'transact':
        return this.processTransact(event);
      case 'nullified':
        event.nullifier.forEach(nullifier => this.notes.markSpent(event.treeNumber, nullifier));
        return 0;
      default:
        return 0;
    }
  }

  private async processShield(event: ShieldEvent): Promise<number> {
    this.merkleTree.insertLeaves(event.treeNumber, event.startPosition, event.commitments.map(hashCommitment));

    let found = 0;
    for (const [i, preimage] of event.commitments.entries()) {
      const random = await decryptShieldNote(event.shieldCiphertext[i], this.viewingKey);
      if (!random || getNotePublicKey(this.masterPublicKey, random) !== preimage.npk) {
        continue;
      }
      const added = this.addOwnedNote(
        { ...this.keyMaterial(), random, value: preimage.value, token: preimage.token },
        event.treeNumber,
        event.startPosition + i,
        'shield'
      );
      if (added) found += 1;
    }
    return found;
  }

  private async processTransact(event: TransactEvent): Promise<number> {
    this.merkleTree.insertLeaves(event.treeNumber, event.startPosition, event.hashes);

    let found = 0;
    for (const [i, ciphertext] of event.ciphertext.entries()) {
      const plaintext = await decryptTransferNote(ciphertext, this.viewingKey);
      if (!plaintext || plaintext.masterPublicKey !== this.masterPublicKey) {
        continue;
      }
      const note: Note = {
        ...this.keyMaterial(),
        random: plaintext.random,
        value: plaintext.value,
        token: plaintext.token,
        memo: plaintext.memo || undefined
      };
      if (plaintext.value > MAX_NOTE_VALUE || getNoteHash(note) !== event.hashes[i]) {
        this.logger.warn('Decrypted note does not match its commitment', { treeNumber: event.treeNumber });
        continue;
      }
      if (this.addOwnedNote(note, event.treeNumber, event.startPosition + i, 'transact')) {
        found += 1;
      }
    }
    return found;
  }

  private keyMaterial(): Pick<Note, 'spendingPublicKey' | 'nullifyingKey' | 'masterPublicKey'> {
    return {
      spendingPublicKey: this.spendingPublicKey,
      nullifyingKey: this.nullifyingKey,
      masterPublicKey: this.masterPublicKey
    };
  }

  private addOwnedNote(note: Note, treeNumber: number, leafIndex: number, source: ShieldedNote['source']): boolean {
    return this.notes.addNote({
      ...note,
      treeNumber,
      leafIndex,
      commitment: getNoteHash(note),
      nullifier: getNullifier(note.nullifyingKey, leafIndex),
      status: 'unspent',
      source
    });
  }
}
