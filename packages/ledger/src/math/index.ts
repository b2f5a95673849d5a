/**
 * Math Module
 */

export type { GasUnitQuote, RefundQuote } from './fixed-point.js';

export {
  calculateGasUnits,
  calculateSavings,
  calculateProportionalCost,
  calculateRefund,
  assertUint256,
  mul,
  sub,
  div,
} from './fixed-point.js';
