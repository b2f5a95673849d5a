/**
 * Adapters
 *
 * External collaborators of the ledger: the stablecoin and the bridge
 * aggregator.
 */

export type { Stablecoin } from './stablecoin.js';
export { InMemoryStablecoin } from './stablecoin.js';

export type {
  BridgeTransport,
  BridgeRequest,
  BridgeReceipt,
  BridgeCall,
  BridgeHandler,
} from './bridge-adapter.js';
export { BridgeAdapter, InMemoryBridgeNetwork } from './bridge-adapter.js';

export type { ChainAccount, ContractCall, SentTransaction } from './ethers-chain.js';
export { ERC20_ABI, Erc20Stablecoin, EthersBridgeTransport } from './ethers-chain.js';
