import { utils } from 'ethers';
import { ErrorHandler } from '../errors/ErrorHandler';
import { TokenData } from '../types/Note';
import { ActionData, RelayCall, Transaction } from '../types/Transaction';
import { bigIntToHex, hexLength } from './bytes';
import { keccak256 } from './hash';

const abiCoder = utils.defaultAbiCoder;

export const RELAY_RANDOM_LENGTH = 31;

const TOKEN_DATA_TYPE = 'tuple(uint8 tokenType, address tokenAddress, uint256 tokenSubID)';

const SHIELD_REQUESTS_TYPE =
  `tuple(tuple(uint256 npk, ${TOKEN_DATA_TYPE} token, uint120 value) preimage, ` +
  'tuple(bytes[] encryptedBundle, bytes32 shieldKey) ciphertext)[]';

const ACTION_DATA_TYPE = 'tuple(bytes31 random, bool requireSuccess, tuple(uint8 kind, bytes data)[] calls)';

enum RelayCallKind {
  SHIELD = 0,
  TRANSFER = 1
}

function encodeToken(token: TokenData): { tokenType: number; tokenAddress: string; tokenSubID: string } {
  return {
    tokenType: token.tokenType,
    tokenAddress: token.tokenAddress,
    tokenSubID: token.tokenSubID.toString()
  };
}

export function encodeRelayCall(call: RelayCall): { kind: number; data: string } {
  switch (call.kind) {
    case 'shield':
      return {
        kind: RelayCallKind.SHIELD,
        data: abiCoder.encode(
          [SHIELD_REQUESTS_TYPE],
          [
            call.requests.map(request => ({
              preimage: {
                npk: request.preimage.npk.toString(),
                token: encodeToken(request.preimage.token),
                value: request.preimage.value.toString()
              },
              ciphertext: {
                encryptedBundle: request.ciphertext.encryptedBundle,
                shieldKey: request.ciphertext.shieldKey
              }
            }))
          ]
        )
      };
    case 'transfer':
      return {
        kind: RelayCallKind.TRANSFER,
        data: abiCoder.encode(
          [TOKEN_DATA_TYPE, 'address', 'uint256'],
          [encodeToken(call.token), call.to, call.value.toString()]
        )
      };
  }
}

export function assertActionData(actionData: ActionData): void {
  if (!utils.isHexString(actionData.random) || hexLength(actionData.random) !== RELAY_RANDOM_LENGTH) {
    throw ErrorHandler.createFormatError(`Relay random must be ${RELAY_RANDOM_LENGTH} bytes`, {
      random: actionData.random
    });
  }
}

export function encodeActionData(actionData: ActionData): string {
  assertActionData(actionData);
  try {
    return abiCoder.encode(
      [ACTION_DATA_TYPE],
      [
        {
          random: actionData.random,
          requireSuccess: actionData.requireSuccess,
          calls: actionData.calls.map(encodeRelayCall)
        }
      ]
    );
  } catch (error) {
    throw ErrorHandler.createFormatError('Relay calls cannot be encoded', {
      error: error instanceof Error ? error.message : String(error)
    });
  }
}

/**
 * Binds a relay batch to its follow-up calls:
 * keccak256(abi.encode(nullifiers per transaction, transaction count, actionData)).
 */
export function getAdaptParams(
  transactions: Array<Pick<Transaction, 'nullifiers'>>,
  actionData: ActionData
): string {
  const nullifiers = transactions.map(transaction => transaction.nullifiers.map(nullifier => bigIntToHex(nullifier, 32)));
  return keccak256(
    abiCoder.encode(
      ['bytes32[][]', 'uint256', 'bytes'],
      [nullifiers, transactions.length, encodeActionData(actionData)]
    )
  );
}
