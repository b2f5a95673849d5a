/**
 * Ethers Chain Adapter Tests
 *
 * Proves:
 * - Token reads decode the contract's return data
 * - Writes are previewed, sent from the ledger wallet and confirmed by receipt
 * - Calls for another account, previews returning false, reverts and send
 *   failures all report false
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Interface } from 'ethers';
import {
  ERC20_ABI,
  Erc20Stablecoin,
  EthersBridgeTransport,
  type ChainAccount,
  type ContractCall,
  type SentTransaction,
} from '../../src/adapters/ethers-chain.js';
import { createLogger } from '../../src/utils/logger.js';

const LEDGER = '0x1000000000000000000000000000000000000001';
const TOKEN = '0x7000000000000000000000000000000000000007';
const USER = '0xa000000000000000000000000000000000000001';
const AGGREGATOR = '0x5000000000000000000000000000000000000005';

const erc20 = new Interface(ERC20_ABI);

class FakeAccount implements ChainAccount {
  sent: ContractCall[] = [];
  calls: ContractCall[] = [];
  answer: (tx: ContractCall) => string = () => erc20.encodeFunctionResult('transfer', [true]);
  status: number | null = 1;
  sendError: Error | undefined;

  async getAddress(): Promise<string> {
    return LEDGER;
  }

  async call(tx: ContractCall): Promise<string> {
    this.calls.push(tx);
    return this.answer(tx);
  }

  async sendTransaction(tx: ContractCall): Promise<SentTransaction> {
    if (this.sendError) {
      throw this.sendError;
    }
    this.sent.push(tx);
    const status = this.status;
    return { hash: '0x' + 'ab'.repeat(32), wait: async () => ({ status }) };
  }
}

describe('Erc20Stablecoin', () => {
  let account: FakeAccount;
  let token: Erc20Stablecoin;
  let logs: string[];

  beforeEach(() => {
    account = new FakeAccount();
    logs = [];
    token = new Erc20Stablecoin(TOKEN, account, createLogger({ write: (line) => logs.push(line) }));
  });

  it('should decode balances read from the token', async () => {
    account.answer = () => erc20.encodeFunctionResult('balanceOf', [123_456n]);

    expect(await token.balanceOf(USER)).toBe(123_456n);
    expect(account.calls).toEqual([{ to: TOKEN, data: erc20.encodeFunctionData('balanceOf', [USER]) }]);
  });

  it('should send a previewed transfer from the ledger wallet', async () => {
    const ok = await token.transfer(LEDGER, USER, 30_000_000n);

    const data = erc20.encodeFunctionData('transfer', [USER, 30_000_000n]);
    expect(ok).toBe(true);
    expect(account.calls).toEqual([{ to: TOKEN, data }]);
    expect(account.sent).toEqual([{ to: TOKEN, data }]);
  });

  it('should refuse to move funds for an account it cannot sign for', async () => {
    expect(await token.transfer(USER, LEDGER, 1n)).toBe(false);
    expect(await token.approve(USER, AGGREGATOR, 1n)).toBe(false);
    expect(account.calls).toEqual([]);
    expect(account.sent).toEqual([]);
  });

  it('should refuse negative amounts without calling the chain', async () => {
    expect(await token.transfer(LEDGER, USER, -1n)).toBe(false);
    expect(account.calls).toEqual([]);
  });

  it('should not send when the preview returns false', async () => {
    account.answer = () => erc20.encodeFunctionResult('approve', [false]);

    expect(await token.approve(LEDGER, AGGREGATOR, 5n)).toBe(false);
    expect(account.sent).toEqual([]);
    expect(JSON.parse(logs[0])).toMatchObject({ level: 'warn', message: 'Token call would return false', method: 'approve' });
  });

  it('should report a reverted receipt as false', async () => {
    account.status = 0;

    expect(await token.transferFrom(LEDGER, USER, LEDGER, 10n)).toBe(false);
    expect(account.sent).toHaveLength(1);
    expect(JSON.parse(logs[0])).toMatchObject({ message: 'Token transaction reverted', method: 'transferFrom' });
  });

  it('should report a failed send as false and log it', async () => {
    account.sendError = new Error('nonce too low');

    expect(await token.transfer(LEDGER, USER, 10n)).toBe(false);
    const entry = JSON.parse(logs[0]);
    expect(entry).toMatchObject({ level: 'warn', message: 'Token transaction failed', method: 'transfer' });
    expect(entry.error.message).toBe('nonce too low');
  });
});

describe('EthersBridgeTransport', () => {
  let account: FakeAccount;
  let transport: EthersBridgeTransport;
  let logs: string[];

  beforeEach(() => {
    account = new FakeAccount();
    logs = [];
    transport = new EthersBridgeTransport(account, createLogger({ write: (line) => logs.push(line) }), 2);
  });

  it('should send the payload to the aggregator and confirm it', async () => {
    expect(await transport.call(LEDGER, AGGREGATOR, '0xdeadbeef')).toBe(true);
    expect(account.sent).toEqual([{ to: AGGREGATOR, data: '0xdeadbeef' }]);
    expect(JSON.parse(logs[0])).toMatchObject({ message: 'Bridge call mined', target: AGGREGATOR, status: 1 });
  });

  it('should report a reverted bridge call as false', async () => {
    account.status = 0;

    expect(await transport.call(LEDGER, AGGREGATOR, '0x01')).toBe(false);
  });

  it('should refuse calls from another account', async () => {
    expect(await transport.call(USER, AGGREGATOR, '0x01')).toBe(false);
    expect(account.sent).toEqual([]);
  });

  it('should let send failures propagate', async () => {
    account.sendError = new Error('insufficient funds for gas');

    await expect(transport.call(LEDGER, AGGREGATOR, '0x01')).rejects.toThrow('insufficient funds for gas');
  });
});
