/**
 * Gas Credit Ledger Types
 */

// ═══════════════════════════════════════════════════════════════════════════
// CREDITS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A prepaid, price-locked allotment of gas units.
 *
 * Owned by exactly one account; its id is its index in the owner's list.
 */
export interface GasCredit {
  /** Destination-chain gas price at purchase, fixed for life */
  lockedPriceGwei: bigint;
  /** Units granted at issuance (18 decimals) */
  gasUnits: bigint;
  /** Never increases; 0 ≤ remaining ≤ gasUnits */
  remainingGasUnits: bigint;
  /** Unix seconds */
  expiry: number;
  /** Unix seconds */
  purchaseTimestamp: number;
  isActive: boolean;
  /** Net stablecoin backing the credit after the purchase fee */
  usdcPaid: bigint;
  targetChain: string;
}

/**
 * Informational per-chain price snapshot. Read-only; nothing writes it.
 */
export interface ChainGasPrice {
  priceGwei: bigint;
  lastUpdate: number;
  volatility24h: bigint;
  high24h: bigint;
  low24h: bigint;
}

export const EMPTY_CHAIN_GAS_PRICE: ChainGasPrice = Object.freeze({
  priceGwei: 0n,
  lastUpdate: 0,
  volatility24h: 0n,
  high24h: 0n,
  low24h: 0n,
});

// ═══════════════════════════════════════════════════════════════════════════
// LEDGER SETTINGS
// ═══════════════════════════════════════════════════════════════════════════

export interface LedgerSettings {
  owner: string;
  relayer: string;
  feeRecipient: string;
  /** Zero address when bridge settlement is disabled */
  bridgeAggregator: string;
  paused: boolean;
  purchaseFeeBps: number;
  refundFeeBps: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// INTENTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Signed by the buyer, submitted by the relayer.
 */
export interface PurchaseIntent {
  account: string;
  /** Gross stablecoin amount, fee included */
  amount: bigint;
  targetChain: string;
  expiryDays: number;
  priceGwei: bigint;
  /** Native asset price in stablecoin, 6 decimals */
  nativePriceUsdc: bigint;
  /** Unix seconds at signing */
  timestamp: number;
}

export type SettlementMode = 'cash' | 'bridge';

/**
 * Signed by the credit owner, submitted by the relayer.
 * The signature covers keccak256(bridgePayload), not the payload itself.
 */
export interface RedeemIntent {
  account: string;
  creditId: number;
  unitsToUse: bigint;
  currentPriceGwei: bigint;
  nativePriceUsdc: bigint;
  timestamp: number;
  /** Hex calldata for the bridge aggregator; may be `0x` for cash */
  bridgePayload: string;
  cashSettlement: boolean;
}

/**
 * Signed by the credit owner so a relayer can move units on their behalf.
 */
export interface TransferRequest {
  account: string;
  creditId: number;
  recipient: string;
  units: bigint;
  timestamp: number;
}

/**
 * Signed by the credit owner so a relayer can claim an expired refund for
 * them. Accepted while the ledger is paused.
 */
export interface RefundRequest {
  account: string;
  creditId: number;
  timestamp: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

export interface PurchaseResult {
  creditId: number;
  netAmount: bigint;
  fee: bigint;
  gasUnits: bigint;
  expiry: number;
}

export interface RedemptionResult {
  savedAmount: bigint;
  remainingGasUnits: bigint;
  settlement: SettlementMode;
}

export interface RefundResult {
  refund: bigint;
  fee: bigint;
}

export interface ActiveCreditsValue {
  totalGasUnits: bigint;
  totalUsdcValue: bigint;
}
