/**
 * Redemption Tests
 *
 * Proves:
 * - Savings = (current − locked) × units × native price, paid in full or not at all
 * - Cash goes to the account; bridge settlement approves and calls the aggregator
 * - Exhausting a credit deactivates it
 * - A failed payout restores the credit, the token and the intent
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ZeroAddress } from 'ethers';
import { BridgeError, LiquidityError } from '../../src/boundaries/errors.js';
import { CreditStatus } from '../../src/ledger/credit-state.js';
import {
  AGGREGATOR,
  DEFAULT_EXPIRY,
  DEFAULT_NET,
  DEFAULT_UNITS,
  LEDGER,
  NOW,
  ONE_UNIT,
  OWNER,
  RELAYER,
  STRANGER,
  buyDefaultCredit,
  createHarness,
  fundAccount,
  signedRedeem,
  type Harness,
} from './harness.js';

describe('redeem', () => {
  let h: Harness;

  beforeEach(async () => {
    h = createHarness();
    await buyDefaultCredit(h);
  });

  describe('cash settlement', () => {
    it('should pay the price difference on the redeemed units', async () => {
      const signed = await signedRedeem(h);
      const result = await h.ledger.redeem(RELAYER, signed.intent, signed.signature);

      expect(result).toEqual({
        savedAmount: 30_000_000n,
        remainingGasUnits: 658_333_333_333_333_333n,
        settlement: 'cash',
      });
      expect(await h.token.balanceOf(h.user.address)).toBe(930_000_000n);
      expect(await h.ledger.getLedgerBalance()).toBe(69_500_000n);
    });

    it('should leave a partially used credit active', async () => {
      const signed = await signedRedeem(h);
      await h.ledger.redeem(RELAYER, signed.intent, signed.signature);

      const credit = await h.ledger.getCredit(h.user.address, 0);
      expect(credit.isActive).toBe(true);
      expect(credit.remainingGasUnits).toBe(658_333_333_333_333_333n);
      expect(credit.gasUnits).toBe(DEFAULT_UNITS);
      expect(await h.ledger.getCreditStatus(h.user.address, 0)).toBe(CreditStatus.PARTIALLY_USED);
    });

    it('should deactivate a credit once every unit is used', async () => {
      const signed = await signedRedeem(h, { unitsToUse: DEFAULT_UNITS });
      const result = await h.ledger.redeem(RELAYER, signed.intent, signed.signature);

      expect(result.savedAmount).toBe(49_749_999n);
      expect(result.remainingGasUnits).toBe(0n);
      expect(await h.ledger.getCreditStatus(h.user.address, 0)).toBe(CreditStatus.EXHAUSTED);

      const again = await signedRedeem(h, { timestamp: NOW - 1 });
      await expect(h.ledger.redeem(RELAYER, again.intent, again.signature))
        .rejects.toMatchObject({ code: 'CREDIT_INACTIVE' });
    });

    it('should emit CreditRedeemed and record the payout', async () => {
      const signed = await signedRedeem(h);
      await h.ledger.redeem(RELAYER, signed.intent, signed.signature);

      expect(h.sink.types()).toEqual(['CreditPurchased', 'CreditRedeemed']);
      expect(h.sink.records[1]).toMatchObject({
        type: 'CreditRedeemed',
        account: h.user.address,
        creditId: 0,
        unitsUsed: ONE_UNIT,
        savedAmount: 30_000_000n,
        currentPriceGwei: 30n,
        settlement: 'cash',
      });
      expect(h.metrics.settlements).toEqual([{ mode: 'cash', amount: 30_000_000n }]);
    });
  });

  describe('bridge settlement', () => {
    it('should approve the aggregator and forward the payload', async () => {
      const signed = await signedRedeem(h, { cashSettlement: false, bridgePayload: '0xdeadbeef' });
      const result = await h.ledger.redeem(RELAYER, signed.intent, signed.signature);

      expect(result.settlement).toBe('bridge');
      expect(h.bridgeCalls).toEqual([{ from: LEDGER, target: AGGREGATOR, calldata: '0xdeadbeef' }]);
      expect(await h.token.allowance(LEDGER, AGGREGATOR)).toBe(30_000_000n);
      expect(await h.token.balanceOf(h.user.address)).toBe(900_000_000n);
    });

    it('should let the aggregator pull the approved payout', async () => {
      h.network.register(AGGREGATOR, async () =>
        h.token.transferFrom(AGGREGATOR, LEDGER, AGGREGATOR, 30_000_000n)
      );
      const signed = await signedRedeem(h, { cashSettlement: false, bridgePayload: '0x01' });
      await h.ledger.redeem(RELAYER, signed.intent, signed.signature);

      expect(await h.token.balanceOf(AGGREGATOR)).toBe(30_000_000n);
      expect(await h.ledger.getLedgerBalance()).toBe(69_500_000n);
      expect(await h.token.allowance(LEDGER, AGGREGATOR)).toBe(0n);
    });

    it('should reject an empty payload', async () => {
      const signed = await signedRedeem(h, { cashSettlement: false, bridgePayload: '0x' });

      await expect(h.ledger.redeem(RELAYER, signed.intent, signed.signature))
        .rejects.toMatchObject({ code: 'EMPTY_BRIDGE_PAYLOAD' });
      expect((await h.ledger.getCredit(h.user.address, 0)).remainingGasUnits).toBe(DEFAULT_UNITS);
    });

    it('should reject when bridging is disabled', async () => {
      await h.ledger.setBridgeAggregator(OWNER, ZeroAddress);
      const signed = await signedRedeem(h, { cashSettlement: false, bridgePayload: '0x01' });

      await expect(h.ledger.redeem(RELAYER, signed.intent, signed.signature))
        .rejects.toMatchObject({ code: 'BRIDGE_NOT_CONFIGURED' });
    });

    it('should roll back everything when the aggregator call fails', async () => {
      h.network.register(AGGREGATOR, () => false);
      const signed = await signedRedeem(h, { cashSettlement: false, bridgePayload: '0x01' });

      await expect(h.ledger.redeem(RELAYER, signed.intent, signed.signature))
        .rejects.toBeInstanceOf(BridgeError);

      expect(await h.token.allowance(LEDGER, AGGREGATOR)).toBe(0n);
      expect((await h.ledger.getCredit(h.user.address, 0)).remainingGasUnits).toBe(DEFAULT_UNITS);
      expect(h.sink.types()).toEqual(['CreditPurchased']);

      // The intent was not consumed
      h.network.register(AGGREGATOR, () => true);
      const result = await h.ledger.redeem(RELAYER, signed.intent, signed.signature);
      expect(result.savedAmount).toBe(30_000_000n);
    });

    it('should wrap a throwing aggregator as a failed call', async () => {
      h.network.register(AGGREGATOR, () => {
        throw new Error('out of gas');
      });
      const signed = await signedRedeem(h, { cashSettlement: false, bridgePayload: '0x01' });

      await expect(h.ledger.redeem(RELAYER, signed.intent, signed.signature))
        .rejects.toMatchObject({
          code: 'BRIDGE_CALL_FAILED',
          message: 'bridge aggregator call reverted: out of gas',
        });
    });

    it('should bind the signature to the payload', async () => {
      const signed = await signedRedeem(h, { cashSettlement: false, bridgePayload: '0x01' });
      const swapped = { ...signed.intent, bridgePayload: '0x02' };

      await expect(h.ledger.redeem(RELAYER, swapped, signed.signature))
        .rejects.toMatchObject({ code: 'INVALID_SIGNATURE' });
    });
  });

  describe('rejections', () => {
    it('should reject when the price has not risen', async () => {
      const equal = await signedRedeem(h, { currentPriceGwei: 20n });
      await expect(h.ledger.redeem(RELAYER, equal.intent, equal.signature))
        .rejects.toMatchObject({ code: 'NO_SAVINGS' });

      const lower = await signedRedeem(h, { currentPriceGwei: 10n });
      await expect(h.ledger.redeem(RELAYER, lower.intent, lower.signature))
        .rejects.toMatchObject({ code: 'NO_SAVINGS' });
    });

    it('should reject savings that round down to zero', async () => {
      const signed = await signedRedeem(h, { unitsToUse: 1n, currentPriceGwei: 21n });

      await expect(h.ledger.redeem(RELAYER, signed.intent, signed.signature))
        .rejects.toMatchObject({ code: 'NO_SAVINGS' });
    });

    it('should reject zero and excessive unit counts', async () => {
      const zero = await signedRedeem(h, { unitsToUse: 0n });
      await expect(h.ledger.redeem(RELAYER, zero.intent, zero.signature))
        .rejects.toMatchObject({ code: 'INVALID_UNITS' });

      const tooMany = await signedRedeem(h, { unitsToUse: DEFAULT_UNITS + 1n });
      await expect(h.ledger.redeem(RELAYER, tooMany.intent, tooMany.signature))
        .rejects.toMatchObject({ code: 'INSUFFICIENT_UNITS' });
    });

    it('should leave balances, units and events untouched when units run short', async () => {
      const tooMany = await signedRedeem(h, { unitsToUse: DEFAULT_UNITS + 1n });

      await expect(h.ledger.redeem(RELAYER, tooMany.intent, tooMany.signature))
        .rejects.toMatchObject({ code: 'INSUFFICIENT_UNITS' });

      expect(await h.ledger.getLedgerBalance()).toBe(DEFAULT_NET);
      expect(await h.token.balanceOf(h.user.address)).toBe(900_000_000n);
      expect((await h.ledger.getCredit(h.user.address, 0)).remainingGasUnits).toBe(DEFAULT_UNITS);
      expect(h.sink.types()).toEqual(['CreditPurchased']);
      expect(h.metrics.settlements).toEqual([]);
    });

    it('should reject an expired credit', async () => {
      h.clock.set(DEFAULT_EXPIRY);
      const signed = await signedRedeem(h, { timestamp: DEFAULT_EXPIRY });

      await expect(h.ledger.redeem(RELAYER, signed.intent, signed.signature))
        .rejects.toMatchObject({ code: 'CREDIT_EXPIRED' });
    });

    it('should reject an unknown credit id', async () => {
      const signed = await signedRedeem(h, { creditId: 5 });

      await expect(h.ledger.redeem(RELAYER, signed.intent, signed.signature))
        .rejects.toMatchObject({ code: 'UNKNOWN_CREDIT' });
    });

    it('should reject a payout the ledger cannot cover, then pay once funded', async () => {
      const signed = await signedRedeem(h, { unitsToUse: DEFAULT_UNITS, currentPriceGwei: 200n });

      const error = await h.ledger.redeem(RELAYER, signed.intent, signed.signature).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(LiquidityError);
      expect(error).toMatchObject({ required: 895_499_999n, available: DEFAULT_NET });

      await fundAccount(h, STRANGER, 1_000_000_000n);
      await h.ledger.fund(STRANGER, 800_000_000n);

      const result = await h.ledger.redeem(RELAYER, signed.intent, signed.signature);
      expect(result.savedAmount).toBe(895_499_999n);
      expect(await h.ledger.getLedgerBalance()).toBe(DEFAULT_NET + 800_000_000n - 895_499_999n);
    });

    it('should reject while paused and from non-relayers', async () => {
      const signed = await signedRedeem(h);

      await expect(h.ledger.redeem(STRANGER, signed.intent, signed.signature))
        .rejects.toMatchObject({ code: 'NOT_RELAYER' });

      await h.ledger.pause(OWNER);
      await expect(h.ledger.redeem(RELAYER, signed.intent, signed.signature))
        .rejects.toMatchObject({ code: 'PAUSED' });
    });

    it('should reject a replayed redemption', async () => {
      const signed = await signedRedeem(h);
      await h.ledger.redeem(RELAYER, signed.intent, signed.signature);

      await expect(h.ledger.redeem(RELAYER, signed.intent, signed.signature))
        .rejects.toMatchObject({ code: 'INTENT_REPLAYED' });
    });
  });
});
