import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../utils/logger';

export enum ErrorType {
  // Ledger rejections; each aborts the enclosing batch
  FORMAT_ERROR = 'FORMAT_ERROR',
  STATE_ERROR = 'STATE_ERROR',
  AUTHORIZATION_ERROR = 'AUTHORIZATION_ERROR',
  PROOF_ERROR = 'PROOF_ERROR',
  TRANSFER_ERROR = 'TRANSFER_ERROR',

  // Wallet and prover errors
  PROOF_GENERATION_FAILED = 'PROOF_GENERATION_FAILED',
  DECRYPTION_ERROR = 'DECRYPTION_ERROR',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  NOTE_NOT_FOUND = 'NOTE_NOT_FOUND',

  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // Unknown errors
  UNKNOWN_ERROR = 'UNKNOWN_ERROR'
}

export interface ErrorContext {
  operation?: string;
  treeNumber?: number;
  nullifier?: string;
  merkleRoot?: string;
  caller?: string;
  token?: string;
  timestamp?: number;
  [key: string]: unknown;
}

export interface ErrorRecovery {
  action: string;
  description: string;
}

export class ShieldPoolError extends Error {
  public readonly code: string;
  public readonly type: ErrorType;
  public readonly context: ErrorContext;
  public readonly recovery: ErrorRecovery | null;
  public readonly retryable: boolean;
  public readonly timestamp: number;
  public readonly correlationId: string;

  constructor(
    message: string,
    type: ErrorType,
    context: ErrorContext = {},
    recovery: ErrorRecovery | null = null,
    retryable: boolean = false
  ) {
    super(message);
    this.name = 'ShieldPoolError';
    this.code = type;
    this.type = type;
    this.context = context;
    this.recovery = recovery;
    this.retryable = retryable;
    this.timestamp = Date.now();
    this.correlationId = uuidv4();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ShieldPoolError);
    }
  }

  public toJSON(): object {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      type: this.type,
      context: this.context,
      recovery: this.recovery,
      retryable: this.retryable,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
      stack: this.stack
    };
  }

  public static isShieldPoolError(error: unknown): error is ShieldPoolError {
    return error instanceof ShieldPoolError;
  }
}

export type ErrorListener = (error: ShieldPoolError) => void;

export class ErrorHandler {
  private static instance: ErrorHandler;
  private errorListeners: ErrorListener[] = [];
  private errorCounts: Map<ErrorType, number> = new Map();

  private constructor() {}

  public static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler();
    }
    return ErrorHandler.instance;
  }

  /**
   * Normalises any thrown value to a ShieldPoolError, records it and notifies listeners.
   * The returned error keeps the original type; only the context is merged.
   */
  public handleError(error: unknown, context: ErrorContext = {}): ShieldPoolError {
    let handled: ShieldPoolError;

    if (ShieldPoolError.isShieldPoolError(error)) {
      handled = Object.keys(context).length === 0
        ? error
        : new ShieldPoolError(
            error.message,
            error.type,
            { ...error.context, ...context },
            error.recovery,
            error.retryable
          );
    } else {
      const message = error instanceof Error ? error.message : String(error);
      handled = new ShieldPoolError(
        message,
        ErrorType.UNKNOWN_ERROR,
        { ...context, originalError: error instanceof Error ? error.name : typeof error },
        {
          action: 'Check logs for details',
          description: 'An unexpected error occurred.'
        },
        false
      );
    }

    this.incrementErrorCount(handled.type);
    this.notifyListeners(handled);
    this.logError(handled);

    return handled;
  }

  public addErrorListener(listener: ErrorListener): void {
    this.errorListeners.push(listener);
  }

  public removeErrorListener(listener: ErrorListener): void {
    const index = this.errorListeners.indexOf(listener);
    if (index > -1) {
      this.errorListeners.splice(index, 1);
    }
  }

  public getErrorStats(): { [key in ErrorType]?: number } {
    const stats: { [key in ErrorType]?: number } = {};
    for (const [type, count] of this.errorCounts.entries()) {
      stats[type] = count;
    }
    return stats;
  }

  public resetErrorCounts(): void {
    this.errorCounts.clear();
  }

  private incrementErrorCount(type: ErrorType): void {
    const currentCount = this.errorCounts.get(type) || 0;
    this.errorCounts.set(type, currentCount + 1);
  }

  private notifyListeners(error: ShieldPoolError): void {
    for (const listener of this.errorListeners) {
      try {
        listener(error);
      } catch (listenerError) {
        Logger.getInstance().error('Error in error listener', {
          error: listenerError instanceof Error ? listenerError.message : String(listenerError)
        });
      }
    }
  }

  private logError(error: ShieldPoolError): void {
    Logger.getInstance().warn(`${error.type}: ${error.message}`, {
      correlationId: error.correlationId,
      context: error.context
    });
  }

  // Factory methods for the ledger taxonomy
  public static createFormatError(message: string, context: ErrorContext = {}): ShieldPoolError {
    return new ShieldPoolError(
      message,
      ErrorType.FORMAT_ERROR,
      context,
      {
        action: 'Correct the input and resubmit',
        description: 'A value is malformed or outside its allowed range.'
      },
      false
    );
  }

  public static createStateError(message: string, context: ErrorContext = {}): ShieldPoolError {
    return new ShieldPoolError(
      message,
      ErrorType.STATE_ERROR,
      context,
      {
        action: 'Resync ledger state and rebuild the transaction',
        description: 'The transaction conflicts with current ledger state.'
      },
      false
    );
  }

  public static createAuthorizationError(message: string, context: ErrorContext = {}): ShieldPoolError {
    return new ShieldPoolError(
      message,
      ErrorType.AUTHORIZATION_ERROR,
      context,
      {
        action: 'Submit from the authorized caller',
        description: 'The caller is not permitted to perform this operation.'
      },
      false
    );
  }

  public static createProofError(message: string, context: ErrorContext = {}): ShieldPoolError {
    return new ShieldPoolError(
      message,
      ErrorType.PROOF_ERROR,
      context,
      {
        action: 'Regenerate the proof against current inputs',
        description: 'The zero-knowledge proof did not verify.'
      },
      false
    );
  }

  public static createTransferError(message: string, context: ErrorContext = {}): ShieldPoolError {
    return new ShieldPoolError(
      message,
      ErrorType.TRANSFER_ERROR,
      context,
      {
        action: 'Check token balance and allowance',
        description: 'The underlying token movement failed.'
      },
      false
    );
  }

  public static createProofGenerationError(message: string, context: ErrorContext = {}): ShieldPoolError {
    return new ShieldPoolError(
      message,
      ErrorType.PROOF_GENERATION_FAILED,
      context,
      {
        action: 'Check circuit artifacts and inputs and retry',
        description: 'Failed to generate zero-knowledge proof.'
      },
      true
    );
  }

  public static createInsufficientFundsError(required: string, available: string, context: ErrorContext = {}): ShieldPoolError {
    return new ShieldPoolError(
      `Insufficient funds. Required: ${required}, Available: ${available}`,
      ErrorType.INSUFFICIENT_FUNDS,
      { ...context, required, available },
      {
        action: 'Shield more value or wait for incoming notes',
        description: 'Spendable shielded balance is below the requested amount.'
      },
      false
    );
  }
}
