/**
 * Serial Executor
 *
 * Invariant: at most one top-level ledger call in flight.
 *
 * Callers (the HTTP surface) queue operations here; each one runs to
 * completion, committed or rolled back, before the next starts. Nested
 * calls from collaborators do NOT go through the queue; they hit the
 * reentrancy guard and fail immediately.
 */

export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(task);
    // The chain continues whether the task succeeded or not; the caller
    // observes the outcome through `result`.
    this.tail = result.then(
      () => { this.queued--; },
      () => { this.queued--; },
    );
    return result;
  }

  /** Operations queued or running. */
  pending(): number {
    return this.queued;
  }

  /** Resolves once everything queued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }
}
