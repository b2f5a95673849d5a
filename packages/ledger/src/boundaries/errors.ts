/**
 * Ledger Error Taxonomy
 *
 * Every failure aborts the whole call and leaves no partial state behind.
 * The category tells the relayer whether resubmitting can ever help:
 * stale intents and liquidity shortfalls may succeed with a fresh intent
 * later, validation and signature failures never will.
 */

export type ErrorCategory =
  | 'validation'
  | 'authorization'
  | 'credit_state'
  | 'liquidity'
  | 'transfer'
  | 'bridge'
  | 'arithmetic'
  | 'guard';

export type ValidationCode =
  | 'AMOUNT_OUT_OF_RANGE'
  | 'EXPIRY_OUT_OF_RANGE'
  | 'CHAIN_NOT_SUPPORTED'
  | 'INVALID_PRICE'
  | 'INVALID_UNITS'
  | 'INVALID_RECIPIENT'
  | 'INVALID_ADDRESS'
  | 'INVALID_AMOUNT'
  | 'INVALID_PAYLOAD'
  | 'MALFORMED_INTENT';

export type AuthorizationCode =
  | 'NOT_RELAYER'
  | 'NOT_OWNER'
  | 'INVALID_SIGNATURE'
  | 'STALE_INTENT'
  | 'INTENT_REPLAYED';

export type CreditStateCode =
  | 'UNKNOWN_CREDIT'
  | 'CREDIT_INACTIVE'
  | 'CREDIT_EXPIRED'
  | 'CREDIT_NOT_EXPIRED'
  | 'INSUFFICIENT_UNITS'
  | 'NO_SAVINGS';

export type LiquidityCode = 'INSUFFICIENT_LIQUIDITY';

export type TransferCode = 'TOKEN_TRANSFER_FAILED';

export type BridgeCode =
  | 'BRIDGE_NOT_CONFIGURED'
  | 'EMPTY_BRIDGE_PAYLOAD'
  | 'BRIDGE_CALL_FAILED';

export type ArithmeticCode = 'OVERFLOW' | 'UNDERFLOW' | 'DIVISION_BY_ZERO' | 'OUT_OF_RANGE';

export type GuardCode = 'PAUSED' | 'NOT_PAUSED' | 'REENTRANT_CALL';

export type LedgerErrorCode =
  | ValidationCode
  | AuthorizationCode
  | CreditStateCode
  | LiquidityCode
  | TransferCode
  | BridgeCode
  | ArithmeticCode
  | GuardCode;

// =============================================================================
// BASE CLASS
// =============================================================================

export abstract class LedgerError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(
    public readonly code: LedgerErrorCode,
    message: string
  ) {
    super(message);
  }
}

// =============================================================================
// CATEGORIES
// =============================================================================

export class LedgerValidationError extends LedgerError {
  readonly category = 'validation';

  constructor(code: ValidationCode, message: string) {
    super(code, message);
    this.name = 'LedgerValidationError';
  }
}

export class AuthorizationError extends LedgerError {
  readonly category = 'authorization';

  constructor(code: AuthorizationCode, message: string) {
    super(code, message);
    this.name = 'AuthorizationError';
  }
}

export class CreditStateError extends LedgerError {
  readonly category = 'credit_state';

  constructor(code: CreditStateCode, message: string) {
    super(code, message);
    this.name = 'CreditStateError';
  }
}

export class LiquidityError extends LedgerError {
  readonly category = 'liquidity';

  constructor(
    public readonly required: bigint,
    public readonly available: bigint
  ) {
    super('INSUFFICIENT_LIQUIDITY', `Ledger balance ${available} is below required payout ${required}`);
    this.name = 'LiquidityError';
  }
}

export class TransferFailedError extends LedgerError {
  readonly category = 'transfer';

  constructor(message: string) {
    super('TOKEN_TRANSFER_FAILED', message);
    this.name = 'TransferFailedError';
  }
}

export class BridgeError extends LedgerError {
  readonly category = 'bridge';

  constructor(code: BridgeCode, message: string) {
    super(code, message);
    this.name = 'BridgeError';
  }
}

export class ArithmeticError extends LedgerError {
  readonly category = 'arithmetic';

  constructor(code: ArithmeticCode, message: string) {
    super(code, message);
    this.name = 'ArithmeticError';
  }
}

export class GuardError extends LedgerError {
  readonly category = 'guard';

  constructor(code: GuardCode, message: string) {
    super(code, message);
    this.name = 'GuardError';
  }
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
