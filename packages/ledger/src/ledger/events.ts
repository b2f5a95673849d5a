/**
 * Ledger Events
 *
 * Records emitted for off-chain indexing. Buffered during an operation and
 * delivered only after the operation commits.
 *
 * Sinks:
 * - LoggerEventSink (development)
 * - WebhookEventSink (POST to an indexer)
 * - PostgresEventSink (ledger_events table)
 * - FanOutEventSink (several of the above)
 */

import type { SettlementMode } from './types.js';
import type { Logger } from '../utils/logger.js';
import { bigintReplacer, toJsonSafe } from '../utils/serialization.js';

// ═══════════════════════════════════════════════════════════════════════════
// EVENT TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type LedgerEvent =
  | {
      type: 'CreditPurchased';
      account: string;
      creditId: number;
      amount: bigint;
      fee: bigint;
      netAmount: bigint;
      gasUnits: bigint;
      lockedPriceGwei: bigint;
      targetChain: string;
      expiry: number;
    }
  | {
      type: 'CreditRedeemed';
      account: string;
      creditId: number;
      unitsUsed: bigint;
      savedAmount: bigint;
      currentPriceGwei: bigint;
      settlement: SettlementMode;
    }
  | {
      type: 'CreditTransferred';
      from: string;
      to: string;
      fromCreditId: number;
      toCreditId: number;
      units: bigint;
      usdcBasis: bigint;
    }
  | {
      type: 'ExpiredRefundClaimed';
      account: string;
      creditId: number;
      refund: bigint;
      fee: bigint;
    }
  | { type: 'ChainSupportUpdated'; chain: string; supported: boolean }
  | { type: 'RelayerUpdated'; previous: string; current: string }
  | { type: 'BridgeAggregatorUpdated'; previous: string; current: string }
  | { type: 'FeeRecipientUpdated'; previous: string; current: string }
  | { type: 'OwnershipTransferred'; previous: string; current: string }
  | { type: 'Paused'; by: string }
  | { type: 'Unpaused'; by: string }
  | { type: 'FundsAdded'; from: string; amount: bigint }
  | { type: 'EmergencyWithdrawal'; to: string; amount: bigint };

export type LedgerEventType = LedgerEvent['type'];

export type LedgerEventRecord = LedgerEvent & {
  id: string;
  /** Ledger clock, unix seconds */
  emittedAt: number;
};

export type LedgerEventHandler = (record: LedgerEventRecord) => void;

export interface LedgerEventSink {
  emit(record: LedgerEventRecord): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════════
// SINKS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Writes every record to the structured log.
 */
export class LoggerEventSink implements LedgerEventSink {
  constructor(private readonly logger: Logger) {}

  async emit(record: LedgerEventRecord): Promise<void> {
    this.logger.info({ event: toJsonSafe(record) }, `[EVENT] ${record.type}`);
  }
}

/**
 * Webhook event sink
 */
export class WebhookEventSink implements LedgerEventSink {
  constructor(
    private readonly webhookUrl: string,
    private readonly logger: Logger,
    private readonly fetchFn: typeof fetch = fetch,
  ) {}

  async emit(record: LedgerEventRecord): Promise<void> {
    try {
      const response = await this.fetchFn(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ type: record.type, payload: record }, bigintReplacer),
      });
      if (!response.ok) {
        this.logger.error(
          { eventId: record.id, status: response.status },
          `[Webhook] Indexer rejected ${record.type}`
        );
      }
    } catch (error) {
      this.logger.error({ eventId: record.id, error }, `[Webhook] Failed to emit ${record.type}`);
    }
  }
}

/**
 * Anything that can run a parameterised query; `pg.Pool` and `pg.Client`
 * both qualify.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

/**
 * PostgreSQL event sink
 *
 * ```sql
 * CREATE TABLE ledger_events (
 *   id UUID PRIMARY KEY,
 *   type TEXT NOT NULL,
 *   payload JSONB NOT NULL,
 *   emitted_at TIMESTAMPTZ NOT NULL
 * );
 * ```
 */
export class PostgresEventSink implements LedgerEventSink {
  constructor(
    private readonly db: Queryable,
    private readonly logger: Logger,
  ) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(
      `CREATE TABLE IF NOT EXISTS ledger_events (
        id UUID PRIMARY KEY,
        type TEXT NOT NULL,
        payload JSONB NOT NULL,
        emitted_at TIMESTAMPTZ NOT NULL
      )`
    );
    await this.db.query(
      'CREATE INDEX IF NOT EXISTS idx_ledger_events_type ON ledger_events(type)'
    );
  }

  async emit(record: LedgerEventRecord): Promise<void> {
    try {
      await this.db.query(
        'INSERT INTO ledger_events (id, type, payload, emitted_at) VALUES ($1, $2, $3, to_timestamp($4)) ON CONFLICT (id) DO NOTHING',
        [record.id, record.type, JSON.stringify(record, bigintReplacer), record.emittedAt]
      );
    } catch (error) {
      this.logger.error({ eventId: record.id, error }, `[Postgres] Failed to store ${record.type}`);
    }
  }
}

export class FanOutEventSink implements LedgerEventSink {
  constructor(private readonly sinks: LedgerEventSink[]) {}

  async emit(record: LedgerEventRecord): Promise<void> {
    for (const sink of this.sinks) {
      await sink.emit(record);
    }
  }
}
