/**
 * Access, Pause and Reentrancy Guards
 *
 * Owner-gated settings, relayer-gated intent submission, a global pause
 * for the relayer and self-service paths, and a reentrancy lock for calls
 * that hand control to an external collaborator mid-mutation.
 */

import { getAddress } from 'ethers';
import { AuthorizationError, GuardError } from './errors.js';
import type { LedgerSettings } from '../ledger/types.js';

export function sameAddress(a: string, b: string): boolean {
  return getAddress(a) === getAddress(b);
}

export function assertOwner(settings: LedgerSettings, sender: string): void {
  if (!sameAddress(settings.owner, sender)) {
    throw new AuthorizationError('NOT_OWNER', `${sender} is not the ledger owner`);
  }
}

export function assertRelayer(settings: LedgerSettings, sender: string): void {
  if (!sameAddress(settings.relayer, sender)) {
    throw new AuthorizationError('NOT_RELAYER', `${sender} is not the designated relayer`);
  }
}

export function assertNotPaused(settings: LedgerSettings): void {
  if (settings.paused) {
    throw new GuardError('PAUSED', 'ledger is paused');
  }
}

export function assertPaused(settings: LedgerSettings): void {
  if (!settings.paused) {
    throw new GuardError('NOT_PAUSED', 'ledger is not paused');
  }
}

// =============================================================================
// REENTRANCY
// =============================================================================

/**
 * Single lock shared by every guarded entry point.
 * A nested entry fails immediately instead of waiting.
 */
export class ReentrancyGuard {
  private holder: string | null = null;

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.holder !== null) {
      throw new GuardError(
        'REENTRANT_CALL',
        `${operation} entered while ${this.holder} is in progress`
      );
    }
    this.holder = operation;
    try {
      return await fn();
    } finally {
      this.holder = null;
    }
  }

  isEntered(): boolean {
    return this.holder !== null;
  }
}
