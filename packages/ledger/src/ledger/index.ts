/**
 * Gas Credit Ledger Module
 */

// Type-only exports
export type {
  GasCredit,
  ChainGasPrice,
  LedgerSettings,
  PurchaseIntent,
  RedeemIntent,
  TransferRequest,
  RefundRequest,
  SettlementMode,
  PurchaseResult,
  RedemptionResult,
  RefundResult,
  ActiveCreditsValue,
} from './types.js';
export type {
  LedgerEvent,
  LedgerEventType,
  LedgerEventRecord,
  LedgerEventHandler,
  LedgerEventSink,
  Queryable,
} from './events.js';
export type { LedgerStore } from './persistence.js';
export type { GasCreditLedgerConfig, GasCreditLedgerDeps } from './credit-ledger.js';

// Value exports
export * from './constants.js';
export { EMPTY_CHAIN_GAS_PRICE } from './types.js';
export {
  CreditStatus,
  VALID_TRANSITIONS,
  creditStatus,
  isValidTransition,
  isTerminalStatus,
  hasExpired,
} from './credit-state.js';
export {
  LoggerEventSink,
  WebhookEventSink,
  PostgresEventSink,
  FanOutEventSink,
} from './events.js';
export { InMemoryLedgerStore } from './persistence.js';
export {
  GasCreditLedger,
  createGasCreditLedger,
  createLedgerSettings,
} from './credit-ledger.js';
