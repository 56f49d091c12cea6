import { utils } from 'ethers';
import { ErrorHandler } from '../errors/ErrorHandler';
import { TokenData, TokenType } from '../types/Note';
import { normalizeTokenData, tokenKey } from '../utils/note';

/**
 * Moves plaintext tokens in and out of the pool. The pool only needs success or failure and,
 * for pull-ins, the balance delta it actually received.
 */
export interface TokenTransferAdapter {
  /** Moves amount from `from` into the pool; resolves to the amount actually received */
  pullIn(from: string, token: TokenData, amount: bigint): Promise<bigint>;
  pushOut(to: string, token: TokenData, amount: bigint): Promise<void>;
  /** Marks the current state; the pool restores it when a batch fails */
  checkpoint?(): unknown;
  restore?(checkpoint: unknown): void;
  /** Called once the outermost batch commits; earlier checkpoints become invalid */
  commit?(): void;
}

type Balances = Map<string, Map<string, bigint>>;

interface BalanceChange {
  owner: string;
  key: string;
  previous: bigint | undefined;
}

function ownerKey(address: string): string {
  if (!utils.isAddress(address)) {
    throw ErrorHandler.createFormatError('Invalid address', { address });
  }
  return utils.getAddress(address);
}

/**
 * In-memory public token balances. NFTs are tracked as a balance of 0 or 1 per subID.
 * Every balance write since the last commit is journaled with its previous value.
 */
export class InMemoryTokenLedger implements TokenTransferAdapter {
  private balances: Balances = new Map();
  private journal: BalanceChange[] = [];

  constructor(public readonly poolAddress: string) {}

  mint(to: string, token: TokenData, amount: bigint): void {
    this.credit(ownerKey(to), normalizeTokenData(token), amount);
  }

  balanceOf(owner: string, token: TokenData): bigint {
    return this.balances.get(ownerKey(owner))?.get(tokenKey(token)) ?? 0n;
  }

  async pullIn(from: string, token: TokenData, amount: bigint): Promise<bigint> {
    this.move(ownerKey(from), ownerKey(this.poolAddress), normalizeTokenData(token), amount);
    return amount;
  }

  async pushOut(to: string, token: TokenData, amount: bigint): Promise<void> {
    this.move(ownerKey(this.poolAddress), ownerKey(to), normalizeTokenData(token), amount);
  }

  checkpoint(): number {
    return this.journal.length;
  }

  restore(checkpoint: unknown): void {
    if (typeof checkpoint !== 'number' || !Number.isInteger(checkpoint) || checkpoint < 0 || checkpoint > this.journal.length) {
      throw ErrorHandler.createStateError('Invalid token ledger checkpoint');
    }
    while (this.journal.length > checkpoint) {
      const change = this.journal.pop();
      if (!change) {
        break;
      }
      const tokens = this.balances.get(change.owner);
      if (change.previous === undefined) {
        tokens?.delete(change.key);
      } else {
        tokens?.set(change.key, change.previous);
      }
    }
  }

  commit(): void {
    this.journal = [];
  }

  private move(from: string, to: string, token: TokenData, amount: bigint): void {
    if (amount < 0n) {
      throw ErrorHandler.createTransferError('Negative transfer amount', { amount: amount.toString() });
    }
    if (token.tokenType === TokenType.ERC721 && amount > 1n) {
      throw ErrorHandler.createTransferError('Non-fungible transfer amount must be 0 or 1', {
        token: token.tokenAddress
      });
    }
    const key = tokenKey(token);
    const available = this.balances.get(from)?.get(key) ?? 0n;
    if (available < amount) {
      throw ErrorHandler.createTransferError('Insufficient token balance', {
        caller: from,
        token: token.tokenAddress,
        required: amount.toString(),
        available: available.toString()
      });
    }
    this.debit(from, key, amount);
    this.credit(to, token, amount);
  }

  private credit(owner: string, token: TokenData, amount: bigint): void {
    const key = tokenKey(token);
    this.write(owner, key, (this.balances.get(owner)?.get(key) ?? 0n) + amount);
  }

  private debit(owner: string, key: string, amount: bigint): void {
    this.write(owner, key, (this.balances.get(owner)?.get(key) ?? 0n) - amount);
  }

  private write(owner: string, key: string, balance: bigint): void {
    let tokens = this.balances.get(owner);
    if (!tokens) {
      tokens = new Map();
      this.balances.set(owner, tokens);
    }
    this.journal.push({ owner, key, previous: tokens.get(key) });
    tokens.set(key, balance);
  }
}
