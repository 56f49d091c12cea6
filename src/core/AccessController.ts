import { utils } from 'ethers';
import { ErrorHandler } from '../errors/ErrorHandler';

export type GovernedAction =
  | 'changeFees'
  | 'changeTreasury'
  | 'setVerificationKey'
  | 'removeVerificationKey'
  | 'retireRoot'
  | 'updateBlocklist';

/**
 * Opaque authorization check consulted before every governed setting change
 */
export interface AccessController {
  isAuthorized(caller: string, action: GovernedAction): boolean;
}

/**
 * Grants every governed action to a fixed set of owners
 */
export class OwnerAccessController implements AccessController {
  private readonly owners: Set<string>;

  constructor(owners: string[]) {
    this.owners = new Set(owners.map(owner => {
      if (!utils.isAddress(owner)) {
        throw ErrorHandler.createFormatError('Invalid owner address', { caller: owner });
      }
      return utils.getAddress(owner);
    }));
  }

  isAuthorized(caller: string): boolean {
    return utils.isAddress(caller) && this.owners.has(utils.getAddress(caller));
  }
}
