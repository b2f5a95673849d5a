/**
 * Bridge Adapter
 *
 * Non-cash redemptions pay out through an external cross-chain aggregator:
 * 1. Approve the aggregator to pull the payout from the ledger
 * 2. Invoke it with the user's opaque calldata
 * 3. Require success
 *
 * The adapter runs inside the redemption's atomic unit, so a failed call
 * rolls back the allowance along with everything else.
 */

import { ZeroAddress, getAddress, isAddress, isHexString } from 'ethers';
import { BridgeError, TransferFailedError } from '../boundaries/errors.js';
import type { Logger } from '../utils/logger.js';
import type { Stablecoin } from './stablecoin.js';

/**
 * Opaque call into a contract address. Only success/failure is observable.
 */
export interface BridgeTransport {
  call(from: string, target: string, calldata: string): Promise<boolean>;
}

export interface BridgeRequest {
  amount: bigint;
  payload: string;
  targetChain: string;
}

export interface BridgeReceipt {
  aggregator: string;
  amount: bigint;
  targetChain: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// ADAPTER
// ═══════════════════════════════════════════════════════════════════════════

export class BridgeAdapter {
  constructor(
    private readonly ledgerAddress: string,
    private readonly stablecoin: Stablecoin,
    private readonly transport: BridgeTransport,
    private readonly logger: Logger,
  ) {}

  async bridge(aggregator: string | null, request: BridgeRequest): Promise<BridgeReceipt> {
    if (!aggregator || !isAddress(aggregator) || getAddress(aggregator) === ZeroAddress) {
      throw new BridgeError('BRIDGE_NOT_CONFIGURED', 'no bridge aggregator is configured');
    }
    if (!isHexString(request.payload) || request.payload === '0x') {
      throw new BridgeError('EMPTY_BRIDGE_PAYLOAD', 'bridge payload is empty');
    }

    const approved = await this.stablecoin.approve(this.ledgerAddress, aggregator, request.amount);
    if (!approved) {
      throw new TransferFailedError(`approve of ${request.amount} for bridge aggregator ${aggregator} failed`);
    }

    let succeeded: boolean;
    try {
      succeeded = await this.transport.call(this.ledgerAddress, aggregator, request.payload);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BridgeError('BRIDGE_CALL_FAILED', `bridge aggregator call reverted: ${reason}`);
    }
    if (!succeeded) {
      throw new BridgeError('BRIDGE_CALL_FAILED', 'bridge aggregator reported failure');
    }

    this.logger.info(
      { aggregator, amount: request.amount, targetChain: request.targetChain },
      'Bridge payout dispatched'
    );

    return { aggregator, amount: request.amount, targetChain: request.targetChain };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// IN-PROCESS NETWORK
// ═══════════════════════════════════════════════════════════════════════════

export interface BridgeCall {
  from: string;
  target: string;
  calldata: string;
}

export type BridgeHandler = (call: BridgeCall) => Promise<boolean> | boolean;

/**
 * Routes opaque calls to handlers registered per aggregator address.
 * A call to an address with no handler fails, as a call to an address
 * without code would.
 */
export class InMemoryBridgeNetwork implements BridgeTransport {
  private handlers: Map<string, BridgeHandler> = new Map();

  register(address: string, handler: BridgeHandler): void {
    this.handlers.set(getAddress(address), handler);
  }

  unregister(address: string): void {
    this.handlers.delete(getAddress(address));
  }

  async call(from: string, target: string, calldata: string): Promise<boolean> {
    const handler = this.handlers.get(getAddress(target));
    if (!handler) {
      return false;
    }
    return handler({ from, target, calldata });
  }
}
