/**
 * Ledger Invariants
 *
 * Runtime checks on every credit write. If one of these throws, an
 * operation tried to produce a state the lifecycle does not allow:
 *
 * 1. 0 ≤ remainingGasUnits ≤ gasUnits
 * 2. remainingGasUnits never increases
 * 3. An inactive credit never becomes active again
 * 4. No credit is active with zero remaining units
 * 5. Issuance fields (gasUnits, price, expiry, basis, chain) are immutable
 */

import type { GasCredit } from '../ledger/types.js';
import { creditStatus, isValidTransition } from '../ledger/credit-state.js';

/**
 * Invariant violation error.
 * If this is thrown, a non-negotiable constraint was violated.
 */
export class InvariantViolation extends Error {
  constructor(
    public readonly invariant: string,
    public readonly details: string
  ) {
    super(`INVARIANT VIOLATION: ${invariant}: ${details}`);
    this.name = 'InvariantViolation';
  }
}

/**
 * Checks a freshly issued credit.
 */
export function assertIssuable(credit: GasCredit): void {
  if (credit.gasUnits <= 0n) {
    throw new InvariantViolation('POSITIVE_UNITS', 'a credit must be issued with gasUnits > 0');
  }
  if (credit.remainingGasUnits !== credit.gasUnits) {
    throw new InvariantViolation('FULL_ISSUANCE', 'remainingGasUnits must equal gasUnits at issuance');
  }
  if (!credit.isActive) {
    throw new InvariantViolation('ACTIVE_ISSUANCE', 'a credit must be active at issuance');
  }
  if (credit.expiry <= credit.purchaseTimestamp) {
    throw new InvariantViolation('EXPIRY_AFTER_PURCHASE', 'expiry must be after purchaseTimestamp');
  }
}

/**
 * Checks an update of an existing credit.
 */
export function assertCreditUpdate(before: GasCredit, after: GasCredit, now: number): void {
  if (
    after.gasUnits !== before.gasUnits ||
    after.lockedPriceGwei !== before.lockedPriceGwei ||
    after.expiry !== before.expiry ||
    after.purchaseTimestamp !== before.purchaseTimestamp ||
    after.usdcPaid !== before.usdcPaid ||
    after.targetChain !== before.targetChain
  ) {
    throw new InvariantViolation('IMMUTABLE_ISSUANCE', 'issuance fields of a credit cannot change');
  }
  if (after.remainingGasUnits < 0n || after.remainingGasUnits > after.gasUnits) {
    throw new InvariantViolation('REMAINING_BOUNDS', `remaining ${after.remainingGasUnits} outside [0, ${after.gasUnits}]`);
  }
  if (after.remainingGasUnits > before.remainingGasUnits) {
    throw new InvariantViolation('MONOTONIC_REMAINING', 'remainingGasUnits cannot increase');
  }
  if (!before.isActive && after.isActive) {
    throw new InvariantViolation('NO_REACTIVATION', 'an inactive credit cannot be reactivated');
  }
  if (after.isActive && after.remainingGasUnits === 0n) {
    throw new InvariantViolation('EXHAUSTED_IS_INACTIVE', 'a credit with zero remaining units must be inactive');
  }

  const from = creditStatus(before, now);
  const to = creditStatus(after, now);
  if (!isValidTransition(from, to)) {
    throw new InvariantViolation('CREDIT_TRANSITION', `${from} → ${to} is not a valid transition`);
  }
}
