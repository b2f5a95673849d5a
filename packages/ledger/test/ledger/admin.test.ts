/**
 * Administration Tests
 *
 * Proves:
 * - Settings change only through the owner
 * - Zero addresses are refused except for the bridge aggregator
 * - Pause / unpause toggle strictly
 * - Emergency withdrawal drains the ledger to the owner, only while paused
 * - Anyone can fund the payout balance
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ZeroAddress } from 'ethers';
import { ConfigError } from '../../src/boundaries/errors.js';
import { createLedgerSettings } from '../../src/ledger/credit-ledger.js';
import { PURCHASE_FEE_BPS, REFUND_FEE_BPS } from '../../src/ledger/constants.js';
import {
  AGGREGATOR,
  DEFAULT_NET,
  FEE_RECIPIENT,
  LEDGER,
  NOW,
  OWNER,
  RELAYER,
  STRANGER,
  buyDefaultCredit,
  createHarness,
  fundAccount,
  type Harness,
} from './harness.js';

const NEW_ADDRESS = '0x7000000000000000000000000000000000000007';

describe('administration', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('settings', () => {
    it('should start from the configured settings', async () => {
      expect(await h.ledger.getSettings()).toEqual({
        owner: OWNER,
        relayer: RELAYER,
        feeRecipient: FEE_RECIPIENT,
        bridgeAggregator: AGGREGATOR,
        paused: false,
        purchaseFeeBps: PURCHASE_FEE_BPS,
        refundFeeBps: REFUND_FEE_BPS,
      });
    });

    it('should update the relayer and record the previous one', async () => {
      await h.ledger.setRelayer(OWNER, NEW_ADDRESS);

      expect((await h.ledger.getSettings()).relayer).toBe(NEW_ADDRESS);
      expect(h.sink.records[0]).toMatchObject({
        type: 'RelayerUpdated',
        previous: RELAYER,
        current: NEW_ADDRESS,
      });
    });

    it('should hand intent submission to the new relayer', async () => {
      await h.ledger.setRelayer(OWNER, STRANGER);

      await expect(buyDefaultCredit(h)).rejects.toMatchObject({ code: 'NOT_RELAYER' });
    });

    it('should update the fee recipient and the bridge aggregator', async () => {
      await h.ledger.setFeeRecipient(OWNER, NEW_ADDRESS);
      await h.ledger.setBridgeAggregator(OWNER, ZeroAddress);

      const settings = await h.ledger.getSettings();
      expect(settings.feeRecipient).toBe(NEW_ADDRESS);
      expect(settings.bridgeAggregator).toBe(ZeroAddress);
      expect(h.sink.types()).toEqual(['FeeRecipientUpdated', 'BridgeAggregatorUpdated']);
    });

    it('should refuse the zero address for relayer, fee recipient and owner', async () => {
      await expect(h.ledger.setRelayer(OWNER, ZeroAddress))
        .rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
      await expect(h.ledger.setFeeRecipient(OWNER, ZeroAddress))
        .rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
      await expect(h.ledger.transferOwnership(OWNER, ZeroAddress))
        .rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
      expect(h.sink.records).toEqual([]);
    });

    it('should refuse malformed addresses', async () => {
      await expect(h.ledger.setBridgeAggregator(OWNER, '0x1234'))
        .rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
    });

    it('should reject every setting change from non-owners', async () => {
      await expect(h.ledger.setRelayer(STRANGER, NEW_ADDRESS)).rejects.toMatchObject({ code: 'NOT_OWNER' });
      await expect(h.ledger.setFeeRecipient(RELAYER, NEW_ADDRESS)).rejects.toMatchObject({ code: 'NOT_OWNER' });
      await expect(h.ledger.setBridgeAggregator(STRANGER, NEW_ADDRESS)).rejects.toMatchObject({ code: 'NOT_OWNER' });
      await expect(h.ledger.setChainSupport(STRANGER, 'base', true)).rejects.toMatchObject({ code: 'NOT_OWNER' });
      await expect(h.ledger.transferOwnership(STRANGER, STRANGER)).rejects.toMatchObject({ code: 'NOT_OWNER' });
      await expect(h.ledger.pause(STRANGER)).rejects.toMatchObject({ code: 'NOT_OWNER' });
      await expect(h.ledger.emergencyWithdraw(STRANGER)).rejects.toMatchObject({ code: 'NOT_OWNER' });
    });

    it('should transfer ownership', async () => {
      await h.ledger.transferOwnership(OWNER, NEW_ADDRESS);

      await expect(h.ledger.pause(OWNER)).rejects.toMatchObject({ code: 'NOT_OWNER' });
      await h.ledger.pause(NEW_ADDRESS);
      expect((await h.ledger.getSettings()).paused).toBe(true);
      expect(h.sink.records[0]).toMatchObject({
        type: 'OwnershipTransferred',
        previous: OWNER,
        current: NEW_ADDRESS,
      });
    });
  });

  describe('chain support', () => {
    it('should add and remove chains', async () => {
      await h.ledger.setChainSupport(OWNER, 'base', true);
      expect(await h.ledger.isChainSupported('base')).toBe(true);
      expect(await h.ledger.listSupportedChains()).toEqual(['arbitrum', 'base', 'ethereum']);

      await h.ledger.setChainSupport(OWNER, 'ethereum', false);
      expect(await h.ledger.isChainSupported('ethereum')).toBe(false);
      await expect(buyDefaultCredit(h)).rejects.toMatchObject({ code: 'CHAIN_NOT_SUPPORTED' });

      expect(h.sink.records.map((r) => r.type === 'ChainSupportUpdated' && [r.chain, r.supported])).toEqual([
        ['base', true],
        ['ethereum', false],
      ]);
    });

    it('should keep existing credits usable after their chain is removed', async () => {
      await buyDefaultCredit(h);
      await h.ledger.setChainSupport(OWNER, 'ethereum', false);

      const credit = await h.ledger.getCredit(h.user.address, 0);
      expect(credit.isActive).toBe(true);
      await h.ledger.transfer(h.user.address, 0, STRANGER, 1n);
      expect((await h.ledger.getCredit(STRANGER, 0)).targetChain).toBe('ethereum');
    });

    it('should reject an empty chain identifier', async () => {
      await expect(h.ledger.setChainSupport(OWNER, '  ', true))
        .rejects.toMatchObject({ code: 'CHAIN_NOT_SUPPORTED' });
    });

    it('should return a zeroed price snapshot for any chain', async () => {
      expect(await h.ledger.getChainGasPrice('ethereum')).toEqual({
        priceGwei: 0n,
        lastUpdate: 0,
        volatility24h: 0n,
        high24h: 0n,
        low24h: 0n,
      });
    });
  });

  describe('pause', () => {
    it('should toggle strictly', async () => {
      await expect(h.ledger.unpause(OWNER)).rejects.toMatchObject({ code: 'NOT_PAUSED' });

      await h.ledger.pause(OWNER);
      await expect(h.ledger.pause(OWNER)).rejects.toMatchObject({ code: 'PAUSED' });

      await h.ledger.unpause(OWNER);
      expect((await h.ledger.getSettings()).paused).toBe(false);
      expect(h.sink.records.map((r) => r.type)).toEqual(['Paused', 'Unpaused']);
      expect(h.sink.records[0]).toMatchObject({ by: OWNER });
    });

    it('should allow purchases again after unpausing', async () => {
      await h.ledger.pause(OWNER);
      await h.ledger.unpause(OWNER);

      const result = await buyDefaultCredit(h);
      expect(result.creditId).toBe(0);
    });
  });

  describe('emergencyWithdraw', () => {
    it('should require the ledger to be paused', async () => {
      await expect(h.ledger.emergencyWithdraw(OWNER)).rejects.toMatchObject({ code: 'NOT_PAUSED' });
    });

    it('should pay the whole balance to the owner', async () => {
      await buyDefaultCredit(h);
      await h.ledger.pause(OWNER);

      const withdrawn = await h.ledger.emergencyWithdraw(OWNER);

      expect(withdrawn).toBe(DEFAULT_NET);
      expect(await h.token.balanceOf(OWNER)).toBe(DEFAULT_NET);
      expect(await h.ledger.getLedgerBalance()).toBe(0n);
      expect(h.sink.records[h.sink.records.length - 1]).toMatchObject({
        type: 'EmergencyWithdrawal',
        to: OWNER,
        amount: DEFAULT_NET,
      });
    });

    it('should succeed on an empty ledger', async () => {
      await h.ledger.pause(OWNER);

      expect(await h.ledger.emergencyWithdraw(OWNER)).toBe(0n);
    });
  });

  describe('fund', () => {
    it('should pull stablecoin into the ledger without granting credit', async () => {
      await fundAccount(h, STRANGER, 5_000_000n);
      await h.ledger.fund(STRANGER, 5_000_000n);

      expect(await h.ledger.getLedgerBalance()).toBe(5_000_000n);
      expect(await h.token.balanceOf(STRANGER)).toBe(0n);
      expect(await h.ledger.getCreditCount(STRANGER)).toBe(0);
      expect(h.sink.records[0]).toMatchObject({ type: 'FundsAdded', from: STRANGER, amount: 5_000_000n, emittedAt: NOW });
    });

    it('should work while paused', async () => {
      await h.ledger.pause(OWNER);
      await fundAccount(h, STRANGER, 1n);

      await h.ledger.fund(STRANGER, 1n);
      expect(await h.token.balanceOf(LEDGER)).toBe(1n);
    });

    it('should reject a zero amount', async () => {
      await expect(h.ledger.fund(STRANGER, 0n)).rejects.toMatchObject({ code: 'INVALID_AMOUNT' });
    });

    it('should reject when the funder has no allowance', async () => {
      h.token.mint(STRANGER, 10n);

      await expect(h.ledger.fund(STRANGER, 10n)).rejects.toMatchObject({ code: 'TOKEN_TRANSFER_FAILED' });
      expect(await h.token.balanceOf(STRANGER)).toBe(10n);
    });
  });

  describe('configuration', () => {
    const base = { address: LEDGER, owner: OWNER, relayer: RELAYER, feeRecipient: FEE_RECIPIENT };

    it('should default fee rates and disable bridging', () => {
      expect(createLedgerSettings(base)).toEqual({
        owner: OWNER,
        relayer: RELAYER,
        feeRecipient: FEE_RECIPIENT,
        bridgeAggregator: ZeroAddress,
        paused: false,
        purchaseFeeBps: 50,
        refundFeeBps: 100,
      });
    });

    it('should reject fee rates above the ceiling', () => {
      expect(() => createLedgerSettings({ ...base, purchaseFeeBps: 1_001 })).toThrow(ConfigError);
      expect(() => createLedgerSettings({ ...base, refundFeeBps: -1 })).toThrow(
        'refundFeeBps: fee rate must be an integer in [0, 1000], got -1'
      );
      expect(createLedgerSettings({ ...base, purchaseFeeBps: 1_000 }).purchaseFeeBps).toBe(1_000);
    });

    it('should reject a zero owner', () => {
      expect(() => createLedgerSettings({ ...base, owner: ZeroAddress })).toThrow(
        'owner: must not be the zero address'
      );
    });
  });
});
