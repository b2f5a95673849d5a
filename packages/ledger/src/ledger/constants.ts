/**
 * Ledger constants.
 *
 * Stablecoin amounts use 6 decimals, destination prices are whole gwei,
 * the native-asset reference price is stablecoin at 6 decimals, and gas
 * units carry 18 decimals of internal precision.
 */

export const STABLECOIN_DECIMALS = 6;

/** 10 stablecoin */
export const MIN_PURCHASE = 10_000_000n;

/** 100,000 stablecoin */
export const MAX_PURCHASE = 100_000_000_000n;

export const MIN_EXPIRY_DAYS = 7;
export const MAX_EXPIRY_DAYS = 365;

/** Intents older than this are rejected. */
export const INTENT_VALIDITY_SECONDS = 5 * 60;

/** 0.5% */
export const PURCHASE_FEE_BPS = 50;

/** 1% */
export const REFUND_FEE_BPS = 100;

/** 10%, upper bound for any configured fee rate */
export const MAX_FEE_BPS = 1_000;

export const BPS_DENOMINATOR = 10_000n;

/** Aligns 6-decimal stablecoin with 18-decimal units. */
export const UNIT_SCALE = 10n ** 15n;

/** Decimals of the native-asset reference price. */
export const PRICE_SCALE = 10n ** 6n;

export const SECONDS_PER_DAY = 86_400;
