/**
 * @gas-futures/ledger
 *
 * Prepaid, price-locked gas credits settled in a stablecoin.
 */

export * from './ledger/index.js';
export * from './math/index.js';
export * from './intents/index.js';
export * from './boundaries/index.js';
export * from './execution/index.js';
export * from './adapters/index.js';
export * from './observability/index.js';
export * from './utils/index.js';
export * from './http/index.js';
