/**
 * Ledger Store
 *
 * Explicit home for all ledger state:
 * - Per-account credit arenas (index = credit id, append-only)
 * - Chain allow-list and price snapshots
 * - Relayer / owner / fee / bridge settings and the pause flag
 * - Digests of intents already executed
 *
 * Only the ledger's operations write here.
 */

import { getAddress } from 'ethers';
import { UndoLog } from '../execution/atomic.js';
import type { Checkpointable, Savepoint } from '../execution/atomic.js';
import type { ChainGasPrice, GasCredit, LedgerSettings } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// STORE INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

export interface LedgerStore {
  getSettings(): Promise<LedgerSettings>;
  saveSettings(settings: LedgerSettings): Promise<void>;

  /** All credits of `account`, in id order */
  getCredits(account: string): Promise<GasCredit[]>;

  /** Credit by id, or null if the id was never assigned */
  getCredit(account: string, creditId: number): Promise<GasCredit | null>;

  countCredits(account: string): Promise<number>;

  /** Append and return the new credit's id */
  appendCredit(account: string, credit: GasCredit): Promise<number>;

  /** Overwrite an existing credit (id must exist) */
  updateCredit(account: string, creditId: number, credit: GasCredit): Promise<void>;

  isChainSupported(chain: string): Promise<boolean>;
  setChainSupported(chain: string, supported: boolean): Promise<void>;
  listSupportedChains(): Promise<string[]>;

  getChainGasPrice(chain: string): Promise<ChainGasPrice | null>;

  hasConsumedIntent(digest: string): Promise<boolean>;

  /** Record `digest` as executed, stamped with its intent's timestamp */
  consumeIntent(digest: string, timestamp: number): Promise<void>;

  /**
   * Forget digests stamped before `before`. Intents that old fail the
   * freshness check, so their digests no longer guard anything.
   * Returns how many were dropped.
   */
  pruneConsumedIntents(before: number): Promise<number>;
}

// ═══════════════════════════════════════════════════════════════════════════
// IN-MEMORY STORE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * In-memory store. Records are cloned on the way in and out so callers
 * cannot mutate ledger state behind the store's back.
 *
 * Every write records its inverse in an undo log while a savepoint is open,
 * so rolling back a unit touches only what the unit wrote.
 */
export class InMemoryLedgerStore implements LedgerStore, Checkpointable {
  private settings: LedgerSettings;
  private credits = new Map<string, GasCredit[]>();
  private chains: Set<string>;
  private prices = new Map<string, ChainGasPrice>();
  private consumedIntents = new Map<string, number>();
  private undo = new UndoLog();

  constructor(settings: LedgerSettings, supportedChains: Iterable<string> = []) {
    this.settings = { ...settings };
    this.chains = new Set(supportedChains);
  }

  async getSettings(): Promise<LedgerSettings> {
    return { ...this.settings };
  }

  async saveSettings(settings: LedgerSettings): Promise<void> {
    const previous = this.settings;
    this.settings = { ...settings };
    this.undo.record(() => {
      this.settings = previous;
    });
  }

  async getCredits(account: string): Promise<GasCredit[]> {
    return this.arena(account).map((credit) => ({ ...credit }));
  }

  async getCredit(account: string, creditId: number): Promise<GasCredit | null> {
    const credit = this.arena(account)[creditId];
    return credit ? { ...credit } : null;
  }

  async countCredits(account: string): Promise<number> {
    return this.arena(account).length;
  }

  async appendCredit(account: string, credit: GasCredit): Promise<number> {
    const owner = getAddress(account);
    const existing = this.credits.get(owner);
    const arena = existing ?? [];
    arena.push({ ...credit });
    this.credits.set(owner, arena);
    this.undo.record(() => {
      arena.pop();
      if (!existing) {
        this.credits.delete(owner);
      }
    });
    return arena.length - 1;
  }

  async updateCredit(account: string, creditId: number, credit: GasCredit): Promise<void> {
    const arena = this.arena(account);
    if (!Number.isInteger(creditId) || creditId < 0 || creditId >= arena.length) {
      throw new Error(`Credit not found: ${account}#${creditId}`);
    }
    const previous = arena[creditId];
    arena[creditId] = { ...credit };
    this.undo.record(() => {
      arena[creditId] = previous;
    });
  }

  async isChainSupported(chain: string): Promise<boolean> {
    return this.chains.has(chain);
  }

  async setChainSupported(chain: string, supported: boolean): Promise<void> {
    const was = this.chains.has(chain);
    if (supported) {
      this.chains.add(chain);
    } else {
      this.chains.delete(chain);
    }
    this.undo.record(() => {
      if (was) {
        this.chains.add(chain);
      } else {
        this.chains.delete(chain);
      }
    });
  }

  async listSupportedChains(): Promise<string[]> {
    return Array.from(this.chains).sort();
  }

  async getChainGasPrice(chain: string): Promise<ChainGasPrice | null> {
    const price = this.prices.get(chain);
    return price ? { ...price } : null;
  }

  async hasConsumedIntent(digest: string): Promise<boolean> {
    return this.consumedIntents.has(digest.toLowerCase());
  }

  async consumeIntent(digest: string, timestamp: number): Promise<void> {
    const k = digest.toLowerCase();
    const previous = this.consumedIntents.get(k);
    this.consumedIntents.set(k, timestamp);
    this.undo.record(() => {
      if (previous === undefined) {
        this.consumedIntents.delete(k);
      } else {
        this.consumedIntents.set(k, previous);
      }
    });
  }

  async pruneConsumedIntents(before: number): Promise<number> {
    const dropped: Array<[string, number]> = [];
    for (const [k, timestamp] of this.consumedIntents) {
      if (timestamp < before) {
        dropped.push([k, timestamp]);
      }
    }
    for (const [k] of dropped) {
      this.consumedIntents.delete(k);
    }
    if (dropped.length > 0) {
      this.undo.record(() => {
        for (const [k, timestamp] of dropped) {
          this.consumedIntents.set(k, timestamp);
        }
      });
    }
    return dropped.length;
  }

  /** Digests currently held */
  consumedIntentCount(): number {
    return this.consumedIntents.size;
  }

  checkpoint(): Savepoint {
    return this.undo.checkpoint();
  }

  private arena(account: string): GasCredit[] {
    return this.credits.get(getAddress(account)) ?? [];
  }
}
