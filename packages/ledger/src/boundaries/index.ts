/**
 * Ledger Boundaries Module
 *
 * Exports the error taxonomy, guards, and assertions that enforce ledger invariants.
 */

// Type-only exports
export type {
  ErrorCategory,
  LedgerErrorCode,
  ValidationCode,
  AuthorizationCode,
  CreditStateCode,
  LiquidityCode,
  TransferCode,
  BridgeCode,
  ArithmeticCode,
  GuardCode,
} from './errors.js';

// Value exports
export {
  LedgerError,
  LedgerValidationError,
  AuthorizationError,
  CreditStateError,
  LiquidityError,
  TransferFailedError,
  BridgeError,
  ArithmeticError,
  GuardError,
  ConfigError,
  isLedgerError,
} from './errors.js';

export {
  InvariantViolation,
  assertIssuable,
  assertCreditUpdate,
} from './invariants.js';

export {
  ReentrancyGuard,
  assertOwner,
  assertRelayer,
  assertNotPaused,
  assertPaused,
  sameAddress,
} from './guards.js';
