/**
 * Atomic Units
 *
 * Every mutating ledger call is whole-or-nothing. Participants open a
 * savepoint at the start of a unit; if the unit throws, every savepoint is
 * rolled back (newest first) and the error propagates unchanged. On success
 * the savepoints are released.
 *
 * Units nest. A nested unit that fails rolls back only its own changes;
 * deferred work (event delivery, payout metrics) runs once, after the
 * outermost unit commits, and is discarded with any unit that fails.
 */

import type { Logger } from '../utils/logger.js';

export type Rollback = () => void;

export interface Savepoint {
  rollback(): void;
  release(): void;
}

export interface Checkpointable {
  checkpoint(): Savepoint;
}

export type CommitTask = () => Promise<void>;

export class AtomicUnit {
  private participants: Checkpointable[];
  private logger: Logger | null;
  private depth = 0;
  private deferred: CommitTask[] = [];

  constructor(participants: Checkpointable[] = [], logger?: Logger) {
    this.participants = [...participants];
    this.logger = logger ?? null;
  }

  enlist(participant: Checkpointable): void {
    this.participants.push(participant);
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const savepoints = this.participants.map((p) => p.checkpoint());
    const deferredMark = this.deferred.length;

    this.depth++;
    let result: T;
    try {
      result = await fn();
    } catch (error) {
      for (const savepoint of [...savepoints].reverse()) {
        savepoint.rollback();
      }
      this.deferred.length = deferredMark;
      throw error;
    } finally {
      this.depth--;
    }

    for (const savepoint of [...savepoints].reverse()) {
      savepoint.release();
    }
    if (this.depth === 0) {
      await this.flush();
    }
    return result;
  }

  /**
   * Queue work for after the outermost unit commits.
   * Outside any unit the task runs on the next flush.
   */
  afterCommit(task: CommitTask): void {
    this.deferred.push(task);
  }

  inProgress(): boolean {
    return this.depth > 0;
  }

  /**
   * The unit has already committed; a failing task is logged and the
   * remaining tasks still run.
   */
  private async flush(): Promise<void> {
    const tasks = this.deferred;
    this.deferred = [];
    for (const task of tasks) {
      try {
        await task();
      } catch (error) {
        this.logger?.error({ error }, 'Post-commit task failed');
      }
    }
  }
}

// =============================================================================
// UNDO LOG
// =============================================================================

/**
 * Records an inverse for every write made while a savepoint is open.
 *
 * Rolling back replays the inverses newest first down to the savepoint's
 * mark. Once the last open savepoint is released the log is cleared, so a
 * unit costs what it writes, not what the participant holds.
 */
export class UndoLog implements Checkpointable {
  private entries: Rollback[] = [];
  private open = 0;

  /** Register the inverse of a write. Ignored outside any savepoint. */
  record(undo: Rollback): void {
    if (this.open > 0) {
      this.entries.push(undo);
    }
  }

  checkpoint(): Savepoint {
    const mark = this.entries.length;
    this.open++;
    let settled = false;

    const close = () => {
      settled = true;
      this.open--;
      if (this.open === 0) {
        this.entries = [];
      }
    };

    return {
      rollback: () => {
        if (settled) return;
        for (let i = this.entries.length - 1; i >= mark; i--) {
          this.entries[i]();
        }
        this.entries.length = mark;
        close();
      },
      release: () => {
        if (settled) return;
        close();
      },
    };
  }

  /** Inverses currently held */
  size(): number {
    return this.entries.length;
  }
}
