/**
 * Fixed-Point Ledger Math
 *
 * Pure conversions between stablecoin amounts (6 decimals), destination gas
 * prices (gwei), the native-asset reference price (stablecoin, 6 decimals)
 * and gas units (18 decimals).
 *
 * All values are uint256. Division truncates. The order of multiplication
 * and division below is part of the contract: reordering changes the
 * rounding and therefore the number of units a purchase mints.
 */

import { MaxUint256 } from 'ethers';
import { ArithmeticError } from '../boundaries/errors.js';
import { BPS_DENOMINATOR, PRICE_SCALE, UNIT_SCALE } from '../ledger/constants.js';

export interface GasUnitQuote {
  netAmount: bigint;
  fee: bigint;
  units: bigint;
}

export interface RefundQuote {
  refund: bigint;
  fee: bigint;
}

// =============================================================================
// CHECKED uint256 ARITHMETIC
// =============================================================================

export function assertUint256(name: string, value: bigint): bigint {
  if (value < 0n || value > MaxUint256) {
    throw new ArithmeticError('OUT_OF_RANGE', `${name} is outside the uint256 range`);
  }
  return value;
}

export function mul(a: bigint, b: bigint): bigint {
  const product = a * b;
  if (product > MaxUint256) {
    throw new ArithmeticError('OVERFLOW', `uint256 overflow in ${a} * ${b}`);
  }
  return product;
}

export function sub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new ArithmeticError('UNDERFLOW', `uint256 underflow in ${a} - ${b}`);
  }
  return a - b;
}

export function div(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new ArithmeticError('DIVISION_BY_ZERO', `division of ${a} by zero`);
  }
  return a / b;
}

function bps(feeBps: number | bigint): bigint {
  return assertUint256('feeBps', BigInt(feeBps));
}

// =============================================================================
// CONVERSIONS
// =============================================================================

/**
 * Split a gross purchase into fee and net, and convert the net amount into
 * gas units at the given price.
 *
 * units = net * 1e15 / ((priceGwei * nativePriceUsdc) / 1e6)
 */
export function calculateGasUnits(
  amount: bigint,
  feeBps: number | bigint,
  priceGwei: bigint,
  nativePriceUsdc: bigint,
): GasUnitQuote {
  assertUint256('amount', amount);
  assertUint256('priceGwei', priceGwei);
  assertUint256('nativePriceUsdc', nativePriceUsdc);

  const fee = div(mul(amount, bps(feeBps)), BPS_DENOMINATOR);
  const netAmount = sub(amount, fee);
  const pricePerUnit = div(mul(priceGwei, nativePriceUsdc), PRICE_SCALE);
  const units = div(mul(netAmount, UNIT_SCALE), pricePerUnit);

  return { netAmount, fee, units };
}

/**
 * Stablecoin value of the price move on `unitsUsed`.
 * Callers must check `currentPriceGwei > lockedPriceGwei` first.
 */
export function calculateSavings(
  currentPriceGwei: bigint,
  lockedPriceGwei: bigint,
  unitsUsed: bigint,
  nativePriceUsdc: bigint,
): bigint {
  assertUint256('currentPriceGwei', currentPriceGwei);
  assertUint256('lockedPriceGwei', lockedPriceGwei);
  assertUint256('unitsUsed', unitsUsed);
  assertUint256('nativePriceUsdc', nativePriceUsdc);

  if (currentPriceGwei <= lockedPriceGwei) {
    throw new ArithmeticError(
      'UNDERFLOW',
      `current price ${currentPriceGwei} does not exceed locked price ${lockedPriceGwei}`,
    );
  }

  const priceDelta = currentPriceGwei - lockedPriceGwei;
  return div(mul(mul(priceDelta, unitsUsed), nativePriceUsdc), UNIT_SCALE * PRICE_SCALE);
}

/**
 * Share of `paidAmount` backing `units` out of `totalUnits`.
 */
export function calculateProportionalCost(
  paidAmount: bigint,
  units: bigint,
  totalUnits: bigint,
): bigint {
  assertUint256('paidAmount', paidAmount);
  assertUint256('units', units);
  assertUint256('totalUnits', totalUnits);
  return div(mul(paidAmount, units), totalUnits);
}

/**
 * Refund owed for the unused part of a credit, less the refund fee.
 */
export function calculateRefund(
  paidAmount: bigint,
  remainingUnits: bigint,
  totalUnits: bigint,
  feeBps: number | bigint,
): RefundQuote {
  const proportional = calculateProportionalCost(paidAmount, remainingUnits, totalUnits);
  const fee = div(mul(proportional, bps(feeBps)), BPS_DENOMINATOR);
  return { refund: sub(proportional, fee), fee };
}
