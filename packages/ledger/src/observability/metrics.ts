/**
 * Metrics Interface
 *
 * Write-only signals for observability.
 *
 * HARD CONSTRAINT: The ledger must NEVER read metrics or act on them.
 * Metrics are purely for external monitoring.
 *
 * Default implementation is no-op.
 * Production can inject Prometheus, StatsD, etc.
 */

import type { SettlementMode } from '../ledger/types.js';
import { bigintReplacer } from '../utils/serialization.js';

export type LedgerOperation =
  | 'purchase'
  | 'redeem'
  | 'transfer'
  | 'claimExpiredRefund'
  | 'fund'
  | 'emergencyWithdraw'
  | 'setRelayer'
  | 'setBridgeAggregator'
  | 'setFeeRecipient'
  | 'setChainSupport'
  | 'transferOwnership'
  | 'pause'
  | 'unpause';

// =============================================================================
// METRICS INTERFACE
// =============================================================================

/**
 * Write-only metrics sink.
 *
 * All methods are fire-and-forget.
 * Implementations must never throw.
 */
export interface LedgerMetrics {
  /**
   * Operation committed.
   */
  operationCompleted(operation: LedgerOperation, durationMs: number): void;

  /**
   * Operation aborted and rolled back.
   */
  operationRejected(operation: LedgerOperation, errorCode: string): void;

  /**
   * Savings paid out on redemption.
   */
  settlementPaid(mode: SettlementMode, amount: bigint): void;

  /**
   * Expired credit refunded.
   */
  refundPaid(amount: bigint, fee: bigint): void;
}

// =============================================================================
// NO-OP IMPLEMENTATION (Default)
// =============================================================================

export class NoOpMetrics implements LedgerMetrics {
  operationCompleted(_operation: LedgerOperation, _durationMs: number): void {}
  operationRejected(_operation: LedgerOperation, _errorCode: string): void {}
  settlementPaid(_mode: SettlementMode, _amount: bigint): void {}
  refundPaid(_amount: bigint, _fee: bigint): void {}
}

// =============================================================================
// CONSOLE METRICS (for development)
// =============================================================================

/**
 * Logs all metrics to console with timestamps.
 */
export class ConsoleMetrics implements LedgerMetrics {
  private log(category: string, event: string, data: Record<string, unknown>): void {
    console.log(JSON.stringify({
      timestamp: new Date().toISOString(),
      category,
      event,
      ...data,
    }, bigintReplacer));
  }

  operationCompleted(operation: LedgerOperation, durationMs: number): void {
    this.log('operation', 'completed', { operation, durationMs });
  }

  operationRejected(operation: LedgerOperation, errorCode: string): void {
    this.log('operation', 'rejected', { operation, errorCode });
  }

  settlementPaid(mode: SettlementMode, amount: bigint): void {
    this.log('payout', 'settlement', { mode, amount });
  }

  refundPaid(amount: bigint, fee: bigint): void {
    this.log('payout', 'refund', { amount, fee });
  }
}
