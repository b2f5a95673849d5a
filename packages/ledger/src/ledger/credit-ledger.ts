/**
 * Gas Credit Ledger
 *
 * Users prepay stablecoin to lock a gas price on a destination chain and
 * later redeem the upside, in cash or bridged to that chain.
 *
 * Entry points:
 * - purchase / redeem: relayer only, authorized by the user's intent signature
 * - transfer / claimExpiredRefund: called directly by the credit owner, or
 *   relayed with the owner's signed request
 * - settings, pause, emergency withdrawal: owner only
 * - fund: anyone
 *
 * Top-level calls queue on the ledger's own executor and run one at a time.
 * A call made from inside a running call (a bridge aggregator or token
 * calling back) skips the queue: guarded entry points refuse it, unguarded
 * ones join the running call's atomic unit. Any failure restores the store
 * and the in-process token and discards the call's events.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { v4 as uuidv4 } from 'uuid';
import { ZeroAddress, getAddress, isAddress } from 'ethers';
import {
  AuthorizationError,
  ConfigError,
  CreditStateError,
  LedgerValidationError,
  LiquidityError,
  TransferFailedError,
  isLedgerError,
} from '../boundaries/errors.js';
import {
  ReentrancyGuard,
  assertNotPaused,
  assertOwner,
  assertPaused,
  assertRelayer,
  sameAddress,
} from '../boundaries/guards.js';
import { assertCreditUpdate, assertIssuable } from '../boundaries/invariants.js';
import { AtomicUnit, type Checkpointable } from '../execution/atomic.js';
import { SystemClock, type Clock } from '../execution/clock.js';
import { SerialExecutor } from '../execution/serial-executor.js';
import { BridgeAdapter, type BridgeTransport } from '../adapters/bridge-adapter.js';
import type { Stablecoin } from '../adapters/stablecoin.js';
import { EcdsaIntentVerifier, assertSignedBy, type IntentVerifier } from '../intents/verifier.js';
import {
  hashPurchaseIntent,
  hashRedeemIntent,
  hashRefundRequest,
  hashTransferRequest,
} from '../intents/hashing.js';
import {
  calculateGasUnits,
  calculateProportionalCost,
  calculateRefund,
  calculateSavings,
} from '../math/fixed-point.js';
import { NoOpMetrics, type LedgerMetrics, type LedgerOperation } from '../observability/metrics.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  INTENT_VALIDITY_SECONDS,
  MAX_EXPIRY_DAYS,
  MAX_FEE_BPS,
  MAX_PURCHASE,
  MIN_EXPIRY_DAYS,
  MIN_PURCHASE,
  PURCHASE_FEE_BPS,
  REFUND_FEE_BPS,
  SECONDS_PER_DAY,
} from './constants.js';
import { CreditStatus, creditStatus } from './credit-state.js';
import type {
  LedgerEvent,
  LedgerEventHandler,
  LedgerEventRecord,
  LedgerEventSink,
} from './events.js';
import { InMemoryLedgerStore, type LedgerStore } from './persistence.js';
import {
  EMPTY_CHAIN_GAS_PRICE,
  type ActiveCreditsValue,
  type ChainGasPrice,
  type GasCredit,
  type LedgerSettings,
  type PurchaseIntent,
  type PurchaseResult,
  type RedeemIntent,
  type RedemptionResult,
  type RefundRequest,
  type RefundResult,
  type TransferRequest,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export interface GasCreditLedgerConfig {
  /** The ledger's own account on the stablecoin */
  address: string;
  owner: string;
  relayer: string;
  feeRecipient: string;
  /** Omit to start with bridge settlement disabled */
  bridgeAggregator?: string;
  supportedChains?: string[];
  purchaseFeeBps?: number;
  refundFeeBps?: number;
}

export interface GasCreditLedgerDeps {
  address: string;
  store: LedgerStore;
  stablecoin: Stablecoin;
  bridgeTransport: BridgeTransport;
  verifier?: IntentVerifier;
  clock?: Clock;
  eventSink?: LedgerEventSink;
  logger?: Logger;
  metrics?: LedgerMetrics;
}

type GuardMode = 'guarded' | 'unguarded';

// ═══════════════════════════════════════════════════════════════════════════
// LEDGER
// ═══════════════════════════════════════════════════════════════════════════

export class GasCreditLedger {
  readonly address: string;

  private store: LedgerStore;
  private stablecoin: Stablecoin;
  private bridge: BridgeAdapter;
  private verifier: IntentVerifier;
  private clock: Clock;
  private eventSink: LedgerEventSink | null;
  private logger: Logger;
  private metrics: LedgerMetrics;

  private atomic: AtomicUnit;
  private guard = new ReentrancyGuard();
  private executor = new SerialExecutor();
  /** Set for the duration of a running call; marks nested calls */
  private callContext = new AsyncLocalStorage<LedgerOperation>();
  private eventHandlers: LedgerEventHandler[] = [];

  constructor(deps: GasCreditLedgerDeps) {
    this.address = requireConfigAddress('address', deps.address);
    this.store = deps.store;
    this.stablecoin = deps.stablecoin;
    this.verifier = deps.verifier ?? new EcdsaIntentVerifier();
    this.clock = deps.clock ?? new SystemClock();
    this.eventSink = deps.eventSink ?? null;
    this.logger = deps.logger ?? createLogger();
    this.metrics = deps.metrics ?? new NoOpMetrics();
    this.bridge = new BridgeAdapter(
      this.address,
      deps.stablecoin,
      deps.bridgeTransport,
      this.logger.child({ component: 'bridge' }),
    );

    const participants: Checkpointable[] = [];
    for (const candidate of [deps.store, deps.stablecoin]) {
      if (isCheckpointable(candidate)) participants.push(candidate);
    }
    this.atomic = new AtomicUnit(participants, this.logger.child({ component: 'atomic' }));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // RELAYED OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Buy a price-locked credit on behalf of `intent.account`.
   *
   * Pulls `amount` from the account, forwards the fee, and appends an
   * ACTIVE credit holding the net amount's worth of gas units.
   */
  async purchase(sender: string, intent: PurchaseIntent, signature: string): Promise<PurchaseResult> {
    return this.execute('purchase', 'guarded', async () => {
      const settings = await this.store.getSettings();
      assertNotPaused(settings);
      assertRelayer(settings, sender);

      const account = requireAddress('account', intent.account);
      assertWholeNumbers({
        expiryDays: intent.expiryDays,
        timestamp: intent.timestamp,
      });
      assertNonNegative({
        amount: intent.amount,
        priceGwei: intent.priceGwei,
        nativePriceUsdc: intent.nativePriceUsdc,
      });
      this.assertFresh(intent.timestamp);

      const digest = hashPurchaseIntent(intent);
      assertSignedBy(this.verifier, digest, signature, account);
      await this.consumeIntent(digest, intent.timestamp);

      if (intent.amount < MIN_PURCHASE || intent.amount > MAX_PURCHASE) {
        throw new LedgerValidationError(
          'AMOUNT_OUT_OF_RANGE',
          `amount ${intent.amount} outside [${MIN_PURCHASE}, ${MAX_PURCHASE}]`,
        );
      }
      if (intent.expiryDays < MIN_EXPIRY_DAYS || intent.expiryDays > MAX_EXPIRY_DAYS) {
        throw new LedgerValidationError(
          'EXPIRY_OUT_OF_RANGE',
          `expiry of ${intent.expiryDays} days outside [${MIN_EXPIRY_DAYS}, ${MAX_EXPIRY_DAYS}]`,
        );
      }
      if (!(await this.store.isChainSupported(intent.targetChain))) {
        throw new LedgerValidationError('CHAIN_NOT_SUPPORTED', `chain ${intent.targetChain} is not supported`);
      }
      if (intent.priceGwei === 0n || intent.nativePriceUsdc === 0n) {
        throw new LedgerValidationError('INVALID_PRICE', 'prices must be greater than zero');
      }

      const quote = calculateGasUnits(
        intent.amount,
        settings.purchaseFeeBps,
        intent.priceGwei,
        intent.nativePriceUsdc,
      );
      if (quote.units === 0n) {
        throw new LedgerValidationError('INVALID_UNITS', 'purchase would mint zero gas units');
      }

      await this.pull(account, intent.amount);
      if (quote.fee > 0n) {
        await this.pay(settings.feeRecipient, quote.fee);
      }

      const now = this.clock.now();
      const credit: GasCredit = {
        lockedPriceGwei: intent.priceGwei,
        gasUnits: quote.units,
        remainingGasUnits: quote.units,
        expiry: now + intent.expiryDays * SECONDS_PER_DAY,
        purchaseTimestamp: now,
        isActive: true,
        usdcPaid: quote.netAmount,
        targetChain: intent.targetChain,
      };
      assertIssuable(credit);
      const creditId = await this.store.appendCredit(account, credit);

      this.emit({
        type: 'CreditPurchased',
        account,
        creditId,
        amount: intent.amount,
        fee: quote.fee,
        netAmount: quote.netAmount,
        gasUnits: quote.units,
        lockedPriceGwei: intent.priceGwei,
        targetChain: intent.targetChain,
        expiry: credit.expiry,
      });

      return {
        creditId,
        netAmount: quote.netAmount,
        fee: quote.fee,
        gasUnits: quote.units,
        expiry: credit.expiry,
      };
    });
  }

  /**
   * Redeem the price upside on part of a credit.
   *
   * Savings are paid in full or not at all; a shortfall in the ledger's
   * balance is a hard reject.
   */
  async redeem(sender: string, intent: RedeemIntent, signature: string): Promise<RedemptionResult> {
    return this.execute('redeem', 'guarded', async () => {
      const settings = await this.store.getSettings();
      assertNotPaused(settings);
      assertRelayer(settings, sender);

      const account = requireAddress('account', intent.account);
      assertWholeNumbers({
        creditId: intent.creditId,
        timestamp: intent.timestamp,
      });
      assertNonNegative({
        unitsToUse: intent.unitsToUse,
        currentPriceGwei: intent.currentPriceGwei,
        nativePriceUsdc: intent.nativePriceUsdc,
      });
      this.assertFresh(intent.timestamp);

      const digest = hashRedeemIntent(intent);
      assertSignedBy(this.verifier, digest, signature, account);
      await this.consumeIntent(digest, intent.timestamp);

      const now = this.clock.now();
      const credit = await this.requireCredit(account, intent.creditId);
      this.assertUsable(credit, now);
      this.assertUnits(credit, intent.unitsToUse);

      if (intent.currentPriceGwei <= credit.lockedPriceGwei) {
        throw new CreditStateError(
          'NO_SAVINGS',
          `current price ${intent.currentPriceGwei} does not exceed locked price ${credit.lockedPriceGwei}`,
        );
      }
      const savedAmount = calculateSavings(
        intent.currentPriceGwei,
        credit.lockedPriceGwei,
        intent.unitsToUse,
        intent.nativePriceUsdc,
      );
      if (savedAmount === 0n) {
        throw new CreditStateError('NO_SAVINGS', 'savings round down to zero');
      }
      await this.requireLiquidity(savedAmount);

      const remainingGasUnits = credit.remainingGasUnits - intent.unitsToUse;
      await this.writeCredit(account, intent.creditId, credit, {
        ...credit,
        remainingGasUnits,
        isActive: remainingGasUnits > 0n,
      }, now);

      const settlement = intent.cashSettlement ? 'cash' : 'bridge';
      if (intent.cashSettlement) {
        await this.pay(account, savedAmount);
      } else {
        await this.bridge.bridge(settings.bridgeAggregator, {
          amount: savedAmount,
          payload: intent.bridgePayload,
          targetChain: credit.targetChain,
        });
      }

      this.emit({
        type: 'CreditRedeemed',
        account,
        creditId: intent.creditId,
        unitsUsed: intent.unitsToUse,
        savedAmount,
        currentPriceGwei: intent.currentPriceGwei,
        settlement,
      });
      this.atomic.afterCommit(async () => {
        this.metrics.settlementPaid(settlement, savedAmount);
      });

      return { savedAmount, remainingGasUnits, settlement };
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // SELF-SERVICE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Move `unitsToTransfer` of the caller's credit into a new credit for
   * `recipient`. The recipient's cost basis is taken from the source's
   * original totals. No stablecoin moves.
   *
   * @returns the recipient's new credit id
   */
  async transfer(sender: string, creditId: number, recipient: string, unitsToTransfer: bigint): Promise<number> {
    return this.execute('transfer', 'unguarded', async () => {
      const settings = await this.store.getSettings();
      assertNotPaused(settings);

      const from = requireAddress('sender', sender);
      return this.moveUnits(from, creditId, recipient, unitsToTransfer);
    });
  }

  /**
   * Transfer submitted by the relayer under the owner's signed request.
   */
  async relayTransfer(sender: string, request: TransferRequest, signature: string): Promise<number> {
    return this.execute('transfer', 'unguarded', async () => {
      const settings = await this.store.getSettings();
      assertNotPaused(settings);
      assertRelayer(settings, sender);

      const account = requireAddress('account', request.account);
      assertWholeNumbers({ creditId: request.creditId, timestamp: request.timestamp });
      assertNonNegative({ units: request.units });
      this.assertFresh(request.timestamp);

      const digest = hashTransferRequest(request);
      assertSignedBy(this.verifier, digest, signature, account);
      await this.consumeIntent(digest, request.timestamp);

      return this.moveUnits(account, request.creditId, request.recipient, request.units);
    });
  }

  /**
   * Refund the unused share of an expired credit, less the refund fee.
   * Callable while paused so users can always exit.
   */
  async claimExpiredRefund(sender: string, creditId: number): Promise<RefundResult> {
    return this.execute('claimExpiredRefund', 'guarded', async () => {
      const owner = requireAddress('sender', sender);
      return this.refundExpired(owner, creditId);
    });
  }

  /**
   * Refund claim submitted by the relayer under the owner's signed request.
   * Accepted while paused, like the direct claim.
   */
  async relayRefundClaim(sender: string, request: RefundRequest, signature: string): Promise<RefundResult> {
    return this.execute('claimExpiredRefund', 'guarded', async () => {
      const settings = await this.store.getSettings();
      assertRelayer(settings, sender);

      const account = requireAddress('account', request.account);
      assertWholeNumbers({ creditId: request.creditId, timestamp: request.timestamp });
      this.assertFresh(request.timestamp);

      const digest = hashRefundRequest(request);
      assertSignedBy(this.verifier, digest, signature, account);
      await this.consumeIntent(digest, request.timestamp);

      return this.refundExpired(account, request.creditId);
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // ADMINISTRATION
  // ═══════════════════════════════════════════════════════════════════════════

  async setRelayer(sender: string, relayer: string): Promise<void> {
    await this.updateSettings('setRelayer', sender, (settings) => {
      const current = requireNonZeroAddress('relayer', relayer);
      this.emit({ type: 'RelayerUpdated', previous: settings.relayer, current });
      return { ...settings, relayer: current };
    });
  }

  /**
   * The zero address disables bridge settlement.
   */
  async setBridgeAggregator(sender: string, aggregator: string): Promise<void> {
    await this.updateSettings('setBridgeAggregator', sender, (settings) => {
      const current = requireAddress('aggregator', aggregator);
      this.emit({ type: 'BridgeAggregatorUpdated', previous: settings.bridgeAggregator, current });
      return { ...settings, bridgeAggregator: current };
    });
  }

  async setFeeRecipient(sender: string, feeRecipient: string): Promise<void> {
    await this.updateSettings('setFeeRecipient', sender, (settings) => {
      const current = requireNonZeroAddress('feeRecipient', feeRecipient);
      this.emit({ type: 'FeeRecipientUpdated', previous: settings.feeRecipient, current });
      return { ...settings, feeRecipient: current };
    });
  }

  async transferOwnership(sender: string, newOwner: string): Promise<void> {
    await this.updateSettings('transferOwnership', sender, (settings) => {
      const current = requireNonZeroAddress('owner', newOwner);
      this.emit({ type: 'OwnershipTransferred', previous: settings.owner, current });
      return { ...settings, owner: current };
    });
  }

  async pause(sender: string): Promise<void> {
    await this.updateSettings('pause', sender, (settings) => {
      assertNotPaused(settings);
      this.emit({ type: 'Paused', by: getAddress(sender) });
      return { ...settings, paused: true };
    });
  }

  async unpause(sender: string): Promise<void> {
    await this.updateSettings('unpause', sender, (settings) => {
      assertPaused(settings);
      this.emit({ type: 'Unpaused', by: getAddress(sender) });
      return { ...settings, paused: false };
    });
  }

  async setChainSupport(sender: string, chain: string, supported: boolean): Promise<void> {
    await this.execute('setChainSupport', 'unguarded', async () => {
      const settings = await this.store.getSettings();
      assertOwner(settings, sender);
      if (chain.trim() === '') {
        throw new LedgerValidationError('CHAIN_NOT_SUPPORTED', 'chain identifier must not be empty');
      }
      await this.store.setChainSupported(chain, supported);
      this.emit({ type: 'ChainSupportUpdated', chain, supported });
    });
  }

  /**
   * Pay the whole ledger balance to the owner. Only while paused.
   *
   * @returns the amount withdrawn
   */
  async emergencyWithdraw(sender: string): Promise<bigint> {
    return this.execute('emergencyWithdraw', 'guarded', async () => {
      const settings = await this.store.getSettings();
      assertOwner(settings, sender);
      assertPaused(settings);

      const balance = await this.stablecoin.balanceOf(this.address);
      if (balance > 0n) {
        await this.pay(settings.owner, balance);
      }
      this.emit({ type: 'EmergencyWithdrawal', to: settings.owner, amount: balance });
      return balance;
    });
  }

  /**
   * Add stablecoin to the ledger's payout balance. Grants no credit.
   */
  async fund(sender: string, amount: bigint): Promise<void> {
    await this.execute('fund', 'unguarded', async () => {
      const from = requireAddress('sender', sender);
      if (amount <= 0n) {
        throw new LedgerValidationError('INVALID_AMOUNT', 'funding amount must be greater than zero');
      }
      await this.pull(from, amount);
      this.emit({ type: 'FundsAdded', from, amount });
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════════

  async getCredits(account: string): Promise<GasCredit[]> {
    const owner = requireAddress('account', account);
    return this.read(() => this.store.getCredits(owner));
  }

  async getCredit(account: string, creditId: number): Promise<GasCredit> {
    const owner = requireAddress('account', account);
    return this.read(() => this.requireCredit(owner, creditId));
  }

  async getCreditCount(account: string): Promise<number> {
    const owner = requireAddress('account', account);
    return this.read(() => this.store.countCredits(owner));
  }

  async getCreditStatus(account: string, creditId: number): Promise<CreditStatus> {
    return creditStatus(await this.getCredit(account, creditId), this.clock.now());
  }

  /**
   * Remaining units across active, unexpired credits and the stablecoin
   * basis backing them.
   */
  async getActiveCreditsValue(account: string): Promise<ActiveCreditsValue> {
    const now = this.clock.now();
    let totalGasUnits = 0n;
    let totalUsdcValue = 0n;
    for (const credit of await this.getCredits(account)) {
      if (!credit.isActive || now >= credit.expiry) continue;
      totalGasUnits += credit.remainingGasUnits;
      totalUsdcValue += calculateProportionalCost(credit.usdcPaid, credit.remainingGasUnits, credit.gasUnits);
    }
    return { totalGasUnits, totalUsdcValue };
  }

  async getLedgerBalance(): Promise<bigint> {
    return this.read(() => this.stablecoin.balanceOf(this.address));
  }

  async getChainGasPrice(chain: string): Promise<ChainGasPrice> {
    const price = await this.read(() => this.store.getChainGasPrice(chain));
    return price ?? { ...EMPTY_CHAIN_GAS_PRICE };
  }

  async isChainSupported(chain: string): Promise<boolean> {
    return this.read(() => this.store.isChainSupported(chain));
  }

  async listSupportedChains(): Promise<string[]> {
    return this.read(() => this.store.listSupportedChains());
  }

  async getSettings(): Promise<LedgerSettings> {
    return this.read(() => this.store.getSettings());
  }

  /** Calls queued or running */
  pendingOperations(): number {
    return this.executor.pending();
  }

  /** Resolves once every call queued so far has settled. */
  async drain(): Promise<void> {
    await this.executor.drain();
  }

  /**
   * Subscribe to committed events.
   *
   * @returns unsubscribe function
   */
  onEvent(handler: LedgerEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      this.eventHandlers = this.eventHandlers.filter((h) => h !== handler);
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Queue a top-level call, or run a nested one in place.
   */
  private async execute<T>(
    operation: LedgerOperation,
    mode: GuardMode,
    body: () => Promise<T>,
  ): Promise<T> {
    if (this.callContext.getStore() !== undefined) {
      return this.perform(operation, mode, body);
    }
    return this.executor.run(() =>
      this.callContext.run(operation, () => this.perform(operation, mode, body))
    );
  }

  /**
   * Reads see committed state only, except from inside a running call.
   */
  private async read<T>(query: () => Promise<T>): Promise<T> {
    if (this.callContext.getStore() !== undefined) {
      return query();
    }
    return this.executor.run(query);
  }

  private async perform<T>(
    operation: LedgerOperation,
    mode: GuardMode,
    body: () => Promise<T>,
  ): Promise<T> {
    const started = Date.now();
    const unit = () => this.atomic.run(body);
    try {
      const result = mode === 'guarded'
        ? await this.guard.run(operation, unit)
        : await unit();
      this.observe(() => this.metrics.operationCompleted(operation, Date.now() - started));
      return result;
    } catch (error) {
      const code = isLedgerError(error) ? error.code : error instanceof Error ? error.name : 'UNKNOWN';
      this.observe(() => this.metrics.operationRejected(operation, code));
      this.logger.warn(
        {
          operation,
          code,
          category: isLedgerError(error) ? error.category : undefined,
          error,
        },
        'Operation rejected'
      );
      throw error;
    }
  }

  private observe(record: () => void): void {
    try {
      record();
    } catch (error) {
      this.logger.error({ error }, 'Metrics sink error');
    }
  }

  private async updateSettings(
    operation: LedgerOperation,
    sender: string,
    change: (settings: LedgerSettings) => LedgerSettings,
  ): Promise<void> {
    await this.execute(operation, 'unguarded', async () => {
      const settings = await this.store.getSettings();
      assertOwner(settings, sender);
      await this.store.saveSettings(change(settings));
    });
  }

  private assertFresh(timestamp: number): void {
    const now = this.clock.now();
    if (timestamp > now) {
      throw new AuthorizationError('STALE_INTENT', `intent timestamp ${timestamp} is in the future`);
    }
    if (now - timestamp > INTENT_VALIDITY_SECONDS) {
      throw new AuthorizationError(
        'STALE_INTENT',
        `intent is ${now - timestamp}s old, limit is ${INTENT_VALIDITY_SECONDS}s`,
      );
    }
  }

  /**
   * Digests older than the freshness window are pruned on the way: their
   * intents would be rejected as stale before reaching this check.
   */
  private async consumeIntent(digest: string, timestamp: number): Promise<void> {
    await this.store.pruneConsumedIntents(this.clock.now() - INTENT_VALIDITY_SECONDS);
    if (await this.store.hasConsumedIntent(digest)) {
      throw new AuthorizationError('INTENT_REPLAYED', `intent ${digest} was already executed`);
    }
    await this.store.consumeIntent(digest, timestamp);
  }

  private async moveUnits(from: string, creditId: number, recipient: string, units: bigint): Promise<number> {
    if (!isAddress(recipient) || getAddress(recipient) === ZeroAddress || sameAddress(recipient, from)) {
      throw new LedgerValidationError('INVALID_RECIPIENT', `cannot transfer to ${recipient}`);
    }
    const to = getAddress(recipient);
    assertWholeNumbers({ creditId });

    const now = this.clock.now();
    const credit = await this.requireCredit(from, creditId);
    this.assertUsable(credit, now);
    this.assertUnits(credit, units);

    const usdcBasis = calculateProportionalCost(credit.usdcPaid, units, credit.gasUnits);
    const remainingGasUnits = credit.remainingGasUnits - units;
    await this.writeCredit(from, creditId, credit, {
      ...credit,
      remainingGasUnits,
      isActive: remainingGasUnits > 0n,
    }, now);

    const issued: GasCredit = {
      lockedPriceGwei: credit.lockedPriceGwei,
      gasUnits: units,
      remainingGasUnits: units,
      expiry: credit.expiry,
      purchaseTimestamp: now,
      isActive: true,
      usdcPaid: usdcBasis,
      targetChain: credit.targetChain,
    };
    assertIssuable(issued);
    const toCreditId = await this.store.appendCredit(to, issued);

    this.emit({
      type: 'CreditTransferred',
      from,
      to,
      fromCreditId: creditId,
      toCreditId,
      units,
      usdcBasis,
    });

    return toCreditId;
  }

  private async refundExpired(owner: string, creditId: number): Promise<RefundResult> {
    const settings = await this.store.getSettings();
    assertWholeNumbers({ creditId });

    const now = this.clock.now();
    const credit = await this.requireCredit(owner, creditId);
    if (!credit.isActive) {
      throw new CreditStateError('CREDIT_INACTIVE', `credit ${creditId} is no longer active`);
    }
    if (now < credit.expiry) {
      throw new CreditStateError('CREDIT_NOT_EXPIRED', `credit ${creditId} expires at ${credit.expiry}`);
    }

    // Deactivate before any external call.
    await this.writeCredit(owner, creditId, credit, { ...credit, isActive: false }, now);

    const { refund, fee } = calculateRefund(
      credit.usdcPaid,
      credit.remainingGasUnits,
      credit.gasUnits,
      settings.refundFeeBps,
    );
    await this.requireLiquidity(refund + fee);

    if (refund > 0n) {
      await this.pay(owner, refund);
    }
    if (fee > 0n) {
      await this.pay(settings.feeRecipient, fee);
    }

    this.emit({ type: 'ExpiredRefundClaimed', account: owner, creditId, refund, fee });
    this.atomic.afterCommit(async () => {
      this.metrics.refundPaid(refund, fee);
    });

    return { refund, fee };
  }

  private async requireCredit(account: string, creditId: number): Promise<GasCredit> {
    const credit = await this.store.getCredit(account, creditId);
    if (!credit) {
      throw new CreditStateError('UNKNOWN_CREDIT', `credit ${creditId} does not exist for ${account}`);
    }
    return credit;
  }

  private assertUsable(credit: GasCredit, now: number): void {
    if (!credit.isActive) {
      throw new CreditStateError('CREDIT_INACTIVE', 'credit is no longer active');
    }
    if (now >= credit.expiry) {
      throw new CreditStateError('CREDIT_EXPIRED', `credit expired at ${credit.expiry}`);
    }
  }

  private assertUnits(credit: GasCredit, units: bigint): void {
    if (units <= 0n) {
      throw new LedgerValidationError('INVALID_UNITS', 'units must be greater than zero');
    }
    if (units > credit.remainingGasUnits) {
      throw new CreditStateError(
        'INSUFFICIENT_UNITS',
        `requested ${units} units, ${credit.remainingGasUnits} remaining`,
      );
    }
  }

  private async writeCredit(
    account: string,
    creditId: number,
    before: GasCredit,
    after: GasCredit,
    now: number,
  ): Promise<void> {
    assertCreditUpdate(before, after, now);
    await this.store.updateCredit(account, creditId, after);
  }

  private async requireLiquidity(required: bigint): Promise<void> {
    const available = await this.stablecoin.balanceOf(this.address);
    if (available < required) {
      throw new LiquidityError(required, available);
    }
  }

  private async pull(from: string, amount: bigint): Promise<void> {
    const ok = await this.stablecoin.transferFrom(this.address, from, this.address, amount);
    if (!ok) {
      throw new TransferFailedError(`transferFrom ${from} of ${amount} failed`);
    }
  }

  private async pay(to: string, amount: bigint): Promise<void> {
    const ok = await this.stablecoin.transfer(this.address, to, amount);
    if (!ok) {
      throw new TransferFailedError(`transfer of ${amount} to ${to} failed`);
    }
  }

  private emit(event: LedgerEvent): void {
    const record: LedgerEventRecord = { ...event, id: uuidv4(), emittedAt: this.clock.now() };
    this.atomic.afterCommit(() => this.deliver(record));
  }

  /**
   * Subscribers run outside the call context: a ledger call they start
   * queues behind the current one instead of counting as nested.
   */
  private async deliver(record: LedgerEventRecord): Promise<void> {
    for (const handler of this.eventHandlers) {
      try {
        this.callContext.exit(() => handler(record));
      } catch (error) {
        this.logger.error({ eventId: record.id, error }, 'Event handler error');
      }
    }
    if (!this.eventSink) return;
    try {
      await this.eventSink.emit(record);
    } catch (error) {
      this.logger.error({ eventId: record.id, error }, `Failed to deliver ${record.type}`);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Validate configuration and build the initial settings.
 */
export function createLedgerSettings(config: GasCreditLedgerConfig): LedgerSettings {
  return {
    owner: requireConfigAddress('owner', config.owner, { nonZero: true }),
    relayer: requireConfigAddress('relayer', config.relayer, { nonZero: true }),
    feeRecipient: requireConfigAddress('feeRecipient', config.feeRecipient, { nonZero: true }),
    bridgeAggregator: config.bridgeAggregator
      ? requireConfigAddress('bridgeAggregator', config.bridgeAggregator)
      : ZeroAddress,
    paused: false,
    purchaseFeeBps: requireFeeBps('purchaseFeeBps', config.purchaseFeeBps ?? PURCHASE_FEE_BPS),
    refundFeeBps: requireFeeBps('refundFeeBps', config.refundFeeBps ?? REFUND_FEE_BPS),
  };
}

/**
 * Ledger backed by an in-memory store seeded from `config`.
 */
export function createGasCreditLedger(
  config: GasCreditLedgerConfig,
  deps: Omit<GasCreditLedgerDeps, 'address' | 'store'>,
): GasCreditLedger {
  const store = new InMemoryLedgerStore(createLedgerSettings(config), config.supportedChains ?? []);
  return new GasCreditLedger({ ...deps, address: config.address, store });
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function isCheckpointable(value: unknown): value is Checkpointable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'checkpoint' in value &&
    typeof value.checkpoint === 'function'
  );
}

function requireAddress(field: string, value: string): string {
  if (!isAddress(value)) {
    throw new LedgerValidationError('INVALID_ADDRESS', `${field} is not a valid address: ${value}`);
  }
  return getAddress(value);
}

function requireNonZeroAddress(field: string, value: string): string {
  const address = requireAddress(field, value);
  if (address === ZeroAddress) {
    throw new LedgerValidationError('INVALID_ADDRESS', `${field} must not be the zero address`);
  }
  return address;
}

function requireConfigAddress(field: string, value: string, options: { nonZero?: boolean } = {}): string {
  if (!isAddress(value)) {
    throw new ConfigError(field, `not a valid address: ${value}`);
  }
  const address = getAddress(value);
  if (options.nonZero && address === ZeroAddress) {
    throw new ConfigError(field, 'must not be the zero address');
  }
  return address;
}

function requireFeeBps(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > MAX_FEE_BPS) {
    throw new ConfigError(field, `fee rate must be an integer in [0, ${MAX_FEE_BPS}], got ${value}`);
  }
  return value;
}

function assertWholeNumbers(fields: Record<string, number>): void {
  for (const [name, value] of Object.entries(fields)) {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new LedgerValidationError('MALFORMED_INTENT', `${name} must be a non-negative integer`);
    }
  }
}

function assertNonNegative(fields: Record<string, bigint>): void {
  for (const [name, value] of Object.entries(fields)) {
    if (value < 0n) {
      throw new LedgerValidationError('MALFORMED_INTENT', `${name} must not be negative`);
    }
  }
}
