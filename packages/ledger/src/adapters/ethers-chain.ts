/**
 * On-chain collaborators - ethers.js implementation
 *
 * The ERC-20 stablecoin moves the real token from the ledger's own wallet. The wallet can only
 * sign for itself, so any call naming another account as the caller
 * returns `false` without touching the chain.
 *
 * Every write is checked with a static call first (tokens that return
 * `false` instead of reverting are caught there), then sent and awaited
 * for `confirmations` blocks. A revert, a failed send or a receipt with
 * status 0 all report `false`.
 *
 * Unlike the in-process token, mined transfers are not undone when the
 * ledger rolls back a call.
 */

import { Interface, getBigInt } from 'ethers';
import { sameAddress } from '../boundaries/guards.js';
import type { Logger } from '../utils/logger.js';
import type { Stablecoin } from './stablecoin.js';
import type { BridgeTransport } from './bridge-adapter.js';

export const ERC20_ABI = [
  'function balanceOf(address account) view returns (uint256)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'function transfer(address to, uint256 amount) returns (bool)',
  'function transferFrom(address from, address to, uint256 amount) returns (bool)',
  'function approve(address spender, uint256 amount) returns (bool)',
];

export interface ContractCall {
  to: string;
  data: string;
}

export interface SentTransaction {
  hash: string;
  wait(confirms?: number): Promise<{ status: number | null } | null>;
}

/**
 * The slice of an ethers `Signer` the chain adapters use. A `Wallet`
 * connected to a provider satisfies it.
 */
export interface ChainAccount {
  getAddress(): Promise<string>;
  call(tx: ContractCall): Promise<string>;
  sendTransaction(tx: ContractCall): Promise<SentTransaction>;
}

type TokenWrite = 'transfer' | 'transferFrom' | 'approve';

// =============================================================================
// ERC-20 STABLECOIN
// =============================================================================

export class Erc20Stablecoin implements Stablecoin {
  private iface = new Interface(ERC20_ABI);

  constructor(
    private readonly tokenAddress: string,
    private readonly account: ChainAccount,
    private readonly logger: Logger,
    private readonly confirmations: number = 1,
  ) {}

  async balanceOf(account: string): Promise<bigint> {
    return this.read('balanceOf', [account]);
  }

  async allowance(owner: string, spender: string): Promise<bigint> {
    return this.read('allowance', [owner, spender]);
  }

  async transfer(from: string, to: string, amount: bigint): Promise<boolean> {
    if (!(await this.signsFor(from))) return false;
    return this.write('transfer', [to, amount]);
  }

  async transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<boolean> {
    if (!(await this.signsFor(spender))) return false;
    return this.write('transferFrom', [from, to, amount]);
  }

  async approve(owner: string, spender: string, amount: bigint): Promise<boolean> {
    if (!(await this.signsFor(owner))) return false;
    return this.write('approve', [spender, amount]);
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async signsFor(caller: string): Promise<boolean> {
    return sameAddress(caller, await this.account.getAddress());
  }

  private async read(method: 'balanceOf' | 'allowance', args: string[]): Promise<bigint> {
    const data = this.iface.encodeFunctionData(method, args);
    const result = await this.account.call({ to: this.tokenAddress, data });
    return getBigInt(this.iface.decodeFunctionResult(method, result)[0]);
  }

  private async write(method: TokenWrite, args: Array<string | bigint>): Promise<boolean> {
    if (args.some((arg) => typeof arg === 'bigint' && arg < 0n)) {
      return false;
    }

    const tx = { to: this.tokenAddress, data: this.iface.encodeFunctionData(method, args) };
    try {
      const preview = this.iface.decodeFunctionResult(method, await this.account.call(tx));
      if (preview[0] !== true) {
        this.logger.warn({ method, token: this.tokenAddress }, 'Token call would return false');
        return false;
      }

      const response = await this.account.sendTransaction(tx);
      const receipt = await response.wait(this.confirmations);
      const confirmed = receipt?.status === 1;
      if (!confirmed) {
        this.logger.warn({ method, txHash: response.hash }, 'Token transaction reverted');
      }
      return confirmed;
    } catch (error) {
      this.logger.warn({ method, token: this.tokenAddress, error }, 'Token transaction failed');
      return false;
    }
  }
}

// =============================================================================
// ETHERS BRIDGE TRANSPORT
// =============================================================================

/**
 * Sends the user's opaque calldata to the aggregator from the ledger's
 * wallet. Send failures propagate so the bridge adapter can report them.
 */
export class EthersBridgeTransport implements BridgeTransport {
  constructor(
    private readonly account: ChainAccount,
    private readonly logger: Logger,
    private readonly confirmations: number = 1,
  ) {}

  async call(from: string, target: string, calldata: string): Promise<boolean> {
    if (!sameAddress(from, await this.account.getAddress())) {
      return false;
    }

    const response = await this.account.sendTransaction({ to: target, data: calldata });
    const receipt = await response.wait(this.confirmations);
    this.logger.info({ target, txHash: response.hash, status: receipt?.status }, 'Bridge call mined');
    return receipt?.status === 1;
  }
}
