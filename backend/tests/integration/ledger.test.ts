/**
 * Transaction Manager Integration Tests
 *
 * Earn/spend through the in-memory ledger: balances, rows, rejections.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createTestEconomy, fundedAccount, type TestEconomy } from '../helpers';

describe('TransactionManager', () => {
  let t: TestEconomy;

  beforeEach(async () => {
    t = await createTestEconomy();
  });

  describe('Accounts', () => {
    it('should register with zero balances and the initial speed', async () => {
      const result = await t.economy.transactions.registerAccount('reader-1');
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toMatchObject({
        id: 'reader-1',
        accumulated_xp: 0,
        spendable_xp: 0,
        current_wpm: 200,
        max_wpm: 225,
        spending_frozen: false,
        frozen_reason: null,
      });
    });

    it('should return the existing account on re-registration', async () => {
      await fundedAccount(t.economy, 'reader-1', 300);
      const again = await t.economy.transactions.registerAccount('reader-1');
      expect(again.success && again.data.spendable_xp).toBe(300);
    });

    it('should report NOT_FOUND for an unknown account', async () => {
      const result = await t.economy.transactions.getBalance('ghost');
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('NOT_FOUND');
    });
  });

  describe('Earn', () => {
    it('should raise both balances and write one EARN row', async () => {
      await fundedAccount(t.economy, 'reader-1', 0);
      const result = await t.economy.transactions.earn('reader-1', 120, 'quiz_completion', 'Quiz reward');
      expect(result.success).toBe(true);
      if (!result.success) return;

      expect(result.data).toMatchObject({
        account_id: 'reader-1',
        type: 'EARN',
        amount: 120,
        source: 'quiz_completion',
        balance_after: 120,
        request_id: null,
      });

      const balance = await t.economy.transactions.getBalance('reader-1');
      expect(balance).toEqual({ success: true, data: { accumulated_xp: 120, spendable_xp: 120, level: 2 } });
    });

    it.each([0, -10, 2.5])('should reject amount %s without writing', async (amount) => {
      await fundedAccount(t.economy, 'reader-1', 0);
      const result = await t.economy.transactions.earn('reader-1', amount, 'quiz_completion', 'Bad');
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(await t.store.listTransactions('reader-1')).toHaveLength(0);
    });
  });

  describe('Spend', () => {
    it('should lower only the spendable balance and store a negative amount', async () => {
      await fundedAccount(t.economy, 'reader-1', 500);
      const result = await t.economy.transactions.spend('reader-1', 200, 'feature_purchase', 'Theme');
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.amount).toBe(-200);
      expect(result.data.balance_after).toBe(300);

      const account = await t.store.getAccount('reader-1');
      expect(account?.spendable_xp).toBe(300);
      expect(account?.accumulated_xp).toBe(500);
    });

    it('should reject an overspend with the exact shortfall and write nothing', async () => {
      await fundedAccount(t.economy, 'reader-1', 80);
      const result = await t.economy.transactions.spend('reader-1', 100, 'comment_post', 'Comment');

      expect(result).toEqual({
        success: false,
        error: {
          code: 'INSUFFICIENT_XP',
          message: 'Insufficient XP: need 100, have 80 (short by 20)',
          details: { required: 100, available: 80, shortfall: 20 },
        },
      });
      expect(await t.store.listTransactions('reader-1')).toHaveLength(1);
      expect((await t.store.getAccount('reader-1'))?.spendable_xp).toBe(80);
    });

    it('should allow spending the balance down to exactly zero', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      const result = await t.economy.transactions.spend('reader-1', 100, 'comment_post', 'Comment');
      expect(result.success && result.data.balance_after).toBe(0);
    });

    it('should reject spends on a frozen account', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      await t.economy.monitoring.freezeAccount('reader-1', 'manual review');
      const result = await t.economy.transactions.spend('reader-1', 10, 'interaction_given', 'Bronze');
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('ACCOUNT_FROZEN');
    });

    it('should still allow earning on a frozen account', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      await t.economy.monitoring.freezeAccount('reader-1', 'manual review');
      const result = await t.economy.transactions.earn('reader-1', 10, 'quiz_completion', 'Quiz');
      expect(result.success).toBe(true);
    });
  });

  describe('Request ids', () => {
    it('should refuse a request id replayed for a different operation', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      const first = await t.economy.transactions.spend('reader-1', 30, 'comment_post', 'Comment', {
        requestId: 'req-1',
      });
      expect(first.success).toBe(true);

      const otherPurpose = await t.economy.transactions.spend('reader-1', 30, 'interaction_given', 'Gold', {
        requestId: 'req-1',
      });
      const otherAmount = await t.economy.transactions.spend('reader-1', 50, 'comment_post', 'Comment', {
        requestId: 'req-1',
      });
      const otherType = await t.economy.transactions.earn('reader-1', 30, 'quiz_completion', 'Quiz', {
        requestId: 'req-1',
      });

      for (const [result, mismatched] of [
        [otherPurpose, ['source']],
        [otherAmount, ['amount']],
        [otherType, ['type', 'source', 'amount']],
      ] as const) {
        expect(result.success).toBe(false);
        if (result.success) continue;
        expect(result.error.code).toBe('VALIDATION_ERROR');
        expect(result.error.message).toBe('Request id reused for a different operation');
        expect(result.error.details?.mismatched).toEqual(mismatched);
      }

      expect(await t.store.listTransactions('reader-1')).toHaveLength(2);
      expect((await t.store.getAccount('reader-1'))?.spendable_xp).toBe(70);
    });

    it('should write to the trimmed account id', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);

      const earned = await t.economy.transactions.earn(' reader-1 ', 10, 'quiz_completion', 'Quiz');
      const spent = await t.economy.transactions.spend('reader-1 ', 30, 'comment_post', 'Comment');
      expect(earned.success && earned.data.account_id).toBe('reader-1');
      expect(spent.success && spent.data.balance_after).toBe(80);

      const history = await t.economy.transactions.getTransactionHistory(' reader-1');
      expect(history.success && history.data).toHaveLength(3);
    });
  });

  describe('Cancellation', () => {
    it('should write nothing when the caller aborted', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      const controller = new AbortController();
      controller.abort();

      const result = await t.economy.transactions.spend('reader-1', 10, 'comment_post', 'Comment', {
        signal: controller.signal,
      });

      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('ABORTED');
      expect(await t.store.listTransactions('reader-1')).toHaveLength(1);
    });
  });

  describe('History', () => {
    it('should list newest first with type filter and limit', async () => {
      await fundedAccount(t.economy, 'reader-1', 500);
      await t.economy.transactions.spend('reader-1', 10, 'interaction_given', 'One');
      await t.economy.transactions.spend('reader-1', 20, 'interaction_given', 'Two');

      const all = await t.economy.transactions.getTransactionHistory('reader-1');
      expect(all.success && all.data.map((row) => row.amount)).toEqual([-20, -10, 500]);

      const spends = await t.economy.transactions.getTransactionHistory('reader-1', { type: 'SPEND', limit: 1 });
      expect(spends.success && spends.data.map((row) => row.amount)).toEqual([-20]);
    });
  });
});
