/**
 * Fixed-Point Math Tests
 *
 * Proves:
 * - Unit, savings, cost-basis and refund formulas truncate in the documented order
 * - uint256 overflow, underflow and division by zero are arithmetic errors
 */

import { describe, it, expect } from 'vitest';
import { MaxUint256 } from 'ethers';
import {
  assertUint256,
  calculateGasUnits,
  calculateProportionalCost,
  calculateRefund,
  calculateSavings,
  div,
  mul,
  sub,
} from '../../src/math/fixed-point.js';
import { ArithmeticError } from '../../src/boundaries/errors.js';

describe('calculateGasUnits', () => {
  it('should split the fee and convert the net amount', () => {
    expect(calculateGasUnits(100_000_000n, 50, 20n, 3_000_000_000n)).toEqual({
      netAmount: 99_500_000n,
      fee: 500_000n,
      units: 1_658_333_333_333_333_333n,
    });
  });

  it('should accept a bigint fee rate', () => {
    expect(calculateGasUnits(100_000_000n, 50n, 20n, 3_000_000_000n).fee).toBe(500_000n);
  });

  it('should truncate the fee', () => {
    // 10_000_001 * 50 / 10_000 = 50_000.005
    const quote = calculateGasUnits(10_000_001n, 50, 1n, 1_000_000n);
    expect(quote.fee).toBe(50_000n);
    expect(quote.netAmount).toBe(9_950_001n);
    expect(quote.units).toBe(9_950_001n * 10n ** 15n);
  });

  it('should charge nothing at a zero fee rate', () => {
    const quote = calculateGasUnits(100_000_000n, 0, 20n, 3_000_000_000n);
    expect(quote.fee).toBe(0n);
    expect(quote.units).toBe(1_666_666_666_666_666_666n);
  });

  it('should fail when the unit price truncates to zero', () => {
    // 1 gwei * 0.5 stablecoin / 1e6 = 0
    expect(() => calculateGasUnits(100_000_000n, 50, 1n, 500_000n)).toThrow(ArithmeticError);
  });

  it('should reject negative inputs', () => {
    expect(() => calculateGasUnits(-1n, 50, 20n, 3_000_000_000n)).toThrowError(/amount is outside the uint256 range/);
  });
});

describe('calculateSavings', () => {
  it('should value the price move on the used units', () => {
    expect(calculateSavings(30n, 20n, 10n ** 18n, 3_000_000_000n)).toBe(30_000_000n);
    expect(calculateSavings(30n, 20n, 1_658_333_333_333_333_333n, 3_000_000_000n)).toBe(49_749_999n);
  });

  it('should truncate tiny savings to zero', () => {
    expect(calculateSavings(21n, 20n, 1n, 3_000_000_000n)).toBe(0n);
  });

  it('should refuse a price that has not risen', () => {
    expect(() => calculateSavings(20n, 20n, 1n, 1n)).toThrow(ArithmeticError);
    expect(() => calculateSavings(10n, 20n, 1n, 1n)).toThrowError(
      'current price 10 does not exceed locked price 20'
    );
  });
});

describe('calculateProportionalCost', () => {
  it('should take the share of the paid amount', () => {
    expect(calculateProportionalCost(99_500_000n, 10n ** 18n, 1_658_333_333_333_333_333n)).toBe(60_000_000n);
    expect(calculateProportionalCost(100n, 1n, 3n)).toBe(33n);
  });

  it('should fail on zero total units', () => {
    expect(() => calculateProportionalCost(100n, 1n, 0n)).toThrowError(/division of 100 by zero/);
  });
});

describe('calculateRefund', () => {
  it('should refund the remaining share less the fee', () => {
    expect(calculateRefund(99_500_000n, 1_658_333_333_333_333_333n, 1_658_333_333_333_333_333n, 100)).toEqual({
      refund: 98_505_000n,
      fee: 995_000n,
    });
  });

  it('should refund the remaining share after partial use', () => {
    expect(calculateRefund(99_500_000n, 658_333_333_333_333_333n, 1_658_333_333_333_333_333n, 100)).toEqual({
      refund: 39_105_000n,
      fee: 394_999n,
    });
  });

  it('should refund nothing when nothing remains', () => {
    expect(calculateRefund(1_000n, 0n, 10n, 100)).toEqual({ refund: 0n, fee: 0n });
  });
});

describe('checked arithmetic', () => {
  it('should detect uint256 overflow', () => {
    expect(() => mul(MaxUint256, 2n)).toThrowError(/uint256 overflow/);
    expect(mul(MaxUint256, 1n)).toBe(MaxUint256);
  });

  it('should detect underflow', () => {
    expect(() => sub(1n, 2n)).toThrowError('uint256 underflow in 1 - 2');
    expect(sub(2n, 2n)).toBe(0n);
  });

  it('should detect division by zero', () => {
    expect(() => div(1n, 0n)).toThrow(ArithmeticError);
    expect(div(7n, 2n)).toBe(3n);
  });

  it('should bound values to uint256', () => {
    expect(() => assertUint256('x', MaxUint256 + 1n)).toThrowError('x is outside the uint256 range');
    expect(assertUint256('x', 0n)).toBe(0n);
  });
});
