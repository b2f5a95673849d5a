/**
 * Stablecoin Collaborator
 *
 * ERC-20 semantics with the caller made explicit (there is no msg.sender
 * in-process). Implementations report failure by returning `false`; the
 * ledger checks every boolean.
 */

import { getAddress } from 'ethers';
import { UndoLog } from '../execution/atomic.js';
import type { Checkpointable, Savepoint } from '../execution/atomic.js';

export interface Stablecoin {
  balanceOf(account: string): Promise<bigint>;
  allowance(owner: string, spender: string): Promise<bigint>;
  /** Move `amount` from `from` (the caller) to `to`. */
  transfer(from: string, to: string, amount: bigint): Promise<boolean>;
  /** `spender` moves `amount` from `from` to `to` against its allowance. */
  transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<boolean>;
  /** `owner` (the caller) lets `spender` move up to `amount`. */
  approve(owner: string, spender: string, amount: bigint): Promise<boolean>;
}

// ═══════════════════════════════════════════════════════════════════════════
// IN-MEMORY TOKEN
// ═══════════════════════════════════════════════════════════════════════════

/**
 * In-process stablecoin. Non-reverting: insufficient balance or allowance
 * returns `false`. Checkpointable so it rolls back with the ledger.
 */
export class InMemoryStablecoin implements Stablecoin, Checkpointable {
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();
  private undo = new UndoLog();

  async balanceOf(account: string): Promise<bigint> {
    return this.balances.get(key(account)) ?? 0n;
  }

  async allowance(owner: string, spender: string): Promise<bigint> {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  async transfer(from: string, to: string, amount: bigint): Promise<boolean> {
    return this.move(from, to, amount);
  }

  async transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<boolean> {
    const slot = allowanceKey(from, spender);
    const allowed = this.allowances.get(slot) ?? 0n;
    if (amount < 0n || allowed < amount) {
      return false;
    }
    if (!this.move(from, to, amount)) {
      return false;
    }
    this.write(this.allowances, slot, allowed - amount);
    return true;
  }

  async approve(owner: string, spender: string, amount: bigint): Promise<boolean> {
    if (amount < 0n) {
      return false;
    }
    this.write(this.allowances, allowanceKey(owner, spender), amount);
    return true;
  }

  /**
   * Credit `account` with new tokens (funding test and dev accounts).
   */
  mint(account: string, amount: bigint): void {
    const k = key(account);
    this.write(this.balances, k, (this.balances.get(k) ?? 0n) + amount);
  }

  totalSupply(): bigint {
    let total = 0n;
    for (const balance of this.balances.values()) {
      total += balance;
    }
    return total;
  }

  checkpoint(): Savepoint {
    return this.undo.checkpoint();
  }

  private move(from: string, to: string, amount: bigint): boolean {
    const fromKey = key(from);
    const toKey = key(to);
    const balance = this.balances.get(fromKey) ?? 0n;
    if (amount < 0n || balance < amount) {
      return false;
    }
    this.write(this.balances, fromKey, balance - amount);
    this.write(this.balances, toKey, (this.balances.get(toKey) ?? 0n) + amount);
    return true;
  }

  private write(slots: Map<string, bigint>, slot: string, value: bigint): void {
    const previous = slots.get(slot);
    slots.set(slot, value);
    this.undo.record(() => {
      if (previous === undefined) {
        slots.delete(slot);
      } else {
        slots.set(slot, previous);
      }
    });
  }
}

function key(account: string): string {
  return getAddress(account);
}

function allowanceKey(owner: string, spender: string): string {
  return `${getAddress(owner)}:${getAddress(spender)}`;
}
