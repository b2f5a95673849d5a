/**
 * Execution Module
 */

// Type-only exports
export type { Checkpointable, Rollback, Savepoint, CommitTask } from './atomic.js';
export type { Clock } from './clock.js';

// Value exports
export { AtomicUnit, UndoLog } from './atomic.js';
export { SerialExecutor } from './serial-executor.js';
export { SystemClock, ManualClock } from './clock.js';
