/**
 * HTTP API Routes
 *
 * Relayer-facing surface. Thin controllers: validate input, call the ledger
 * (which queues calls itself), map the result to snake_case JSON.
 * Amounts travel as decimal strings.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { getAddress, isAddress } from 'ethers';
import type { GasCreditLedger } from '../ledger/credit-ledger.js';
import { creditStatus, type CreditStatus } from '../ledger/credit-state.js';
import type {
  ChainGasPrice,
  GasCredit,
  PurchaseIntent,
  RedeemIntent,
  RefundRequest,
  TransferRequest,
} from '../ledger/types.js';
import type { ErrorCategory } from '../boundaries/errors.js';
import { isLedgerError } from '../boundaries/errors.js';
import { InvariantViolation } from '../boundaries/invariants.js';
import type { Logger } from '../utils/logger.js';

// =============================================================================
// REQUEST/RESPONSE TYPES
// =============================================================================

interface CreditResponse {
  credit_id: number;
  status: CreditStatus;
  locked_price_gwei: string;
  gas_units: string;
  remaining_gas_units: string;
  expiry: number;
  purchase_timestamp: number;
  is_active: boolean;
  usdc_paid: string;
  target_chain: string;
}

export interface RouteOptions {
  /** Address the service submits intents as */
  relayer: string;
  /** Unix seconds, for credit status */
  now: () => number;
}

// =============================================================================
// VALIDATION
// =============================================================================

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

function validateAddress(value: unknown, fieldName: string): string {
  if (typeof value !== 'string' || !isAddress(value)) {
    throw new RequestValidationError(`${fieldName} must be a 20-byte hex address`);
  }
  return getAddress(value);
}

function validateHex(value: unknown, fieldName: string): string {
  if (typeof value !== 'string' || !/^0x([0-9a-fA-F]{2})*$/.test(value)) {
    throw new RequestValidationError(`${fieldName} must be 0x-prefixed hex`);
  }
  return value;
}

function validateUint(value: unknown, fieldName: string): bigint {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^[0-9]+$/.test(value)) {
    return BigInt(value);
  }
  throw new RequestValidationError(`${fieldName} must be a non-negative integer or decimal string`);
}

function validateNonNegativeInteger(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new RequestValidationError(`${fieldName} must be a non-negative integer`);
  }
  return value;
}

function validateNonEmptyString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new RequestValidationError(`${fieldName} must be a non-empty string`);
  }
  return value;
}

function validateBoolean(value: unknown, fieldName: string): boolean {
  if (typeof value !== 'boolean') {
    throw new RequestValidationError(`${fieldName} must be a boolean`);
  }
  return value;
}

function validateCreditId(value: string): number {
  if (!/^[0-9]+$/.test(value)) {
    throw new RequestValidationError('credit id must be a non-negative integer');
  }
  return validateNonNegativeInteger(Number(value), 'credit id');
}

function requireBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new RequestValidationError('request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

export function parsePurchaseIntent(body: Record<string, unknown>): { intent: PurchaseIntent; signature: string } {
  return {
    intent: {
      account: validateAddress(body.account, 'account'),
      amount: validateUint(body.amount, 'amount'),
      targetChain: validateNonEmptyString(body.target_chain, 'target_chain'),
      expiryDays: validateNonNegativeInteger(body.expiry_days, 'expiry_days'),
      priceGwei: validateUint(body.price_gwei, 'price_gwei'),
      nativePriceUsdc: validateUint(body.native_price_usdc, 'native_price_usdc'),
      timestamp: validateNonNegativeInteger(body.timestamp, 'timestamp'),
    },
    signature: validateHex(body.signature, 'signature'),
  };
}

export function parseRedeemIntent(body: Record<string, unknown>): { intent: RedeemIntent; signature: string } {
  return {
    intent: {
      account: validateAddress(body.account, 'account'),
      creditId: validateNonNegativeInteger(body.credit_id, 'credit_id'),
      unitsToUse: validateUint(body.units_to_use, 'units_to_use'),
      currentPriceGwei: validateUint(body.current_price_gwei, 'current_price_gwei'),
      nativePriceUsdc: validateUint(body.native_price_usdc, 'native_price_usdc'),
      timestamp: validateNonNegativeInteger(body.timestamp, 'timestamp'),
      bridgePayload: body.bridge_payload === undefined ? '0x' : validateHex(body.bridge_payload, 'bridge_payload'),
      cashSettlement: validateBoolean(body.cash_settlement, 'cash_settlement'),
    },
    signature: validateHex(body.signature, 'signature'),
  };
}

export function parseTransferRequest(body: Record<string, unknown>): { request: TransferRequest; signature: string } {
  return {
    request: {
      account: validateAddress(body.account, 'account'),
      creditId: validateNonNegativeInteger(body.credit_id, 'credit_id'),
      recipient: validateAddress(body.recipient, 'recipient'),
      units: validateUint(body.units, 'units'),
      timestamp: validateNonNegativeInteger(body.timestamp, 'timestamp'),
    },
    signature: validateHex(body.signature, 'signature'),
  };
}

export function parseRefundRequest(body: Record<string, unknown>): { request: RefundRequest; signature: string } {
  return {
    request: {
      account: validateAddress(body.account, 'account'),
      creditId: validateNonNegativeInteger(body.credit_id, 'credit_id'),
      timestamp: validateNonNegativeInteger(body.timestamp, 'timestamp'),
    },
    signature: validateHex(body.signature, 'signature'),
  };
}

// =============================================================================
// ROUTE FACTORY
// =============================================================================

export function createRoutes(
  ledger: GasCreditLedger,
  options: RouteOptions,
  logger: Logger
): Router {
  const router = Router();

  // ===========================================================================
  // POST /intents/purchase
  // Submit a signed purchase intent
  // ===========================================================================
  router.post(
    '/intents/purchase',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { intent, signature } = parsePurchaseIntent(requireBody(req));

        const result = await ledger.purchase(options.relayer, intent, signature);

        logger.info(
          { account: intent.account, creditId: result.creditId, targetChain: intent.targetChain },
          'Credit purchased'
        );

        res.status(201).json({
          credit_id: result.creditId,
          net_amount: result.netAmount.toString(),
          fee: result.fee.toString(),
          gas_units: result.gasUnits.toString(),
          expiry: result.expiry,
        });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /intents/redeem
  // Submit a signed redemption intent
  // ===========================================================================
  router.post(
    '/intents/redeem',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { intent, signature } = parseRedeemIntent(requireBody(req));

        const result = await ledger.redeem(options.relayer, intent, signature);

        logger.info(
          { account: intent.account, creditId: intent.creditId, settlement: result.settlement },
          'Credit redeemed'
        );

        res.json({
          saved_amount: result.savedAmount.toString(),
          remaining_gas_units: result.remainingGasUnits.toString(),
          settlement: result.settlement,
        });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /intents/transfer
  // Move units of a credit under the owner's signed request
  // ===========================================================================
  router.post(
    '/intents/transfer',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { request, signature } = parseTransferRequest(requireBody(req));

        const toCreditId = await ledger.relayTransfer(options.relayer, request, signature);

        logger.info(
          { account: request.account, creditId: request.creditId, recipient: request.recipient, toCreditId },
          'Credit transferred'
        );

        res.status(201).json({
          recipient: request.recipient,
          credit_id: toCreditId,
          units: request.units.toString(),
        });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /intents/refund
  // Claim an expired credit's refund under the owner's signed request
  // ===========================================================================
  router.post(
    '/intents/refund',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { request, signature } = parseRefundRequest(requireBody(req));

        const result = await ledger.relayRefundClaim(options.relayer, request, signature);

        logger.info({ account: request.account, creditId: request.creditId }, 'Expired credit refunded');

        res.json({
          refund: result.refund.toString(),
          fee: result.fee.toString(),
        });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // GET /accounts/:account/credits
  // ===========================================================================
  router.get(
    '/accounts/:account/credits',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const account = validateAddress(req.params.account, 'account');
        const credits = await ledger.getCredits(account);
        const now = options.now();

        res.json({
          account,
          credits: credits.map((credit, id) => toCreditResponse(id, credit, now)),
          count: credits.length,
        });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // GET /accounts/:account/credits/:id
  // ===========================================================================
  router.get(
    '/accounts/:account/credits/:id',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const account = validateAddress(req.params.account, 'account');
        const creditId = validateCreditId(req.params.id);
        const credit = await ledger.getCredit(account, creditId);

        res.json(toCreditResponse(creditId, credit, options.now()));
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // GET /accounts/:account/summary
  // ===========================================================================
  router.get(
    '/accounts/:account/summary',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const account = validateAddress(req.params.account, 'account');
        const [count, value] = await Promise.all([
          ledger.getCreditCount(account),
          ledger.getActiveCreditsValue(account),
        ]);

        res.json({
          account,
          credit_count: count,
          active_gas_units: value.totalGasUnits.toString(),
          active_usdc_value: value.totalUsdcValue.toString(),
        });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // GET /chains/:chain
  // ===========================================================================
  router.get(
    '/chains/:chain',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const chain = req.params.chain;
        const [supported, price] = await Promise.all([
          ledger.isChainSupported(chain),
          ledger.getChainGasPrice(chain),
        ]);

        res.json({ chain, supported, price: toPriceResponse(price) });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // GET /ledger
  // Settings and live balance
  // ===========================================================================
  router.get(
    '/ledger',
    async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const [settings, balance, chains] = await Promise.all([
          ledger.getSettings(),
          ledger.getLedgerBalance(),
          ledger.listSupportedChains(),
        ]);

        res.json({
          address: ledger.address,
          balance: balance.toString(),
          paused: settings.paused,
          owner: settings.owner,
          relayer: settings.relayer,
          fee_recipient: settings.feeRecipient,
          bridge_aggregator: settings.bridgeAggregator,
          purchase_fee_bps: settings.purchaseFeeBps,
          refund_fee_bps: settings.refundFeeBps,
          supported_chains: chains,
        });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // Health check
  // ===========================================================================
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', pending: ledger.pendingOperations(), timestamp: Date.now() });
  });

  return router;
}

// =============================================================================
// RESPONSE MAPPING
// =============================================================================

function toCreditResponse(creditId: number, credit: GasCredit, now: number): CreditResponse {
  return {
    credit_id: creditId,
    status: creditStatus(credit, now),
    locked_price_gwei: credit.lockedPriceGwei.toString(),
    gas_units: credit.gasUnits.toString(),
    remaining_gas_units: credit.remainingGasUnits.toString(),
    expiry: credit.expiry,
    purchase_timestamp: credit.purchaseTimestamp,
    is_active: credit.isActive,
    usdc_paid: credit.usdcPaid.toString(),
    target_chain: credit.targetChain,
  };
}

function toPriceResponse(price: ChainGasPrice) {
  return {
    price_gwei: price.priceGwei.toString(),
    last_update: price.lastUpdate,
    volatility_24h: price.volatility24h.toString(),
    high_24h: price.high24h.toString(),
    low_24h: price.low24h.toString(),
  };
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  validation: 400,
  authorization: 403,
  credit_state: 409,
  guard: 423,
  liquidity: 503,
  transfer: 502,
  bridge: 502,
  arithmetic: 422,
};

export function httpStatusFor(error: unknown): number {
  if (error instanceof RequestValidationError) return 400;
  if (isLedgerError(error)) {
    return error.code === 'UNKNOWN_CREDIT' ? 404 : STATUS_BY_CATEGORY[error.category];
  }
  return 500;
}

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RequestValidationError) {
      res.status(400).json({ error: err.message });
      return;
    }

    if (isLedgerError(err)) {
      res.status(httpStatusFor(err)).json({
        error: err.message,
        code: err.code,
        category: err.category,
      });
      return;
    }

    // body-parser marks malformed JSON with type 'entity.parse.failed'
    if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    if (err instanceof InvariantViolation) {
      logger.error({ error: err, invariant: err.invariant }, 'Ledger invariant violated');
    } else {
      logger.error({ error: err }, 'Unhandled error');
    }
    res.status(500).json({ error: 'Internal server error' });
  };
}
