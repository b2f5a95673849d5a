/**
 * Credit Lifecycle
 *
 *   ACTIVE ──redeem/transfer──► PARTIALLY_USED ──► EXHAUSTED
 *     │                              │
 *     └────────── expiry ────────────┴──► EXPIRED_UNCLAIMED ──claim──► REFUND_CLAIMED
 *
 * Status is derived from the stored record and the clock; nothing stores it.
 * EXHAUSTED and REFUND_CLAIMED are terminal.
 */

import type { GasCredit } from './types.js';

export enum CreditStatus {
  ACTIVE = 'ACTIVE',
  PARTIALLY_USED = 'PARTIALLY_USED',
  EXHAUSTED = 'EXHAUSTED',
  EXPIRED_UNCLAIMED = 'EXPIRED_UNCLAIMED',
  REFUND_CLAIMED = 'REFUND_CLAIMED',
}

export const VALID_TRANSITIONS: Readonly<Record<CreditStatus, readonly CreditStatus[]>> = {
  [CreditStatus.ACTIVE]: [
    CreditStatus.PARTIALLY_USED,
    CreditStatus.EXHAUSTED,
    CreditStatus.EXPIRED_UNCLAIMED,
  ],
  [CreditStatus.PARTIALLY_USED]: [
    CreditStatus.PARTIALLY_USED,
    CreditStatus.EXHAUSTED,
    CreditStatus.EXPIRED_UNCLAIMED,
  ],
  [CreditStatus.EXPIRED_UNCLAIMED]: [CreditStatus.REFUND_CLAIMED],
  [CreditStatus.EXHAUSTED]: [],
  [CreditStatus.REFUND_CLAIMED]: [],
};

export function creditStatus(credit: GasCredit, now: number): CreditStatus {
  if (!credit.isActive) {
    return credit.remainingGasUnits === 0n
      ? CreditStatus.EXHAUSTED
      : CreditStatus.REFUND_CLAIMED;
  }
  if (now >= credit.expiry) {
    return CreditStatus.EXPIRED_UNCLAIMED;
  }
  return credit.remainingGasUnits < credit.gasUnits
    ? CreditStatus.PARTIALLY_USED
    : CreditStatus.ACTIVE;
}

export function isValidTransition(from: CreditStatus, to: CreditStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: CreditStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

export function hasExpired(credit: GasCredit, now: number): boolean {
  return now >= credit.expiry;
}
