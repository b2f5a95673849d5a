/**
 * Observability Module
 */

// Type-only exports
export type { LedgerMetrics, LedgerOperation } from './metrics.js';

// Value exports
export { NoOpMetrics, ConsoleMetrics } from './metrics.js';
