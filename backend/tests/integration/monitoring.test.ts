/**
 * Ledger Monitoring Integration Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createTestEconomy, fundedAccount, type TestEconomy } from '../helpers';

describe('LedgerMonitoringService', () => {
  let t: TestEconomy;

  beforeEach(async () => {
    t = await createTestEconomy();
  });

  describe('auditAccount', () => {
    it('should report nothing for a consistent account', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      await t.economy.transactions.spend('reader-1', 30, 'comment_post', 'Comment');

      const result = await t.economy.monitoring.auditAccount('reader-1');
      expect(result).toEqual({
        success: true,
        data: { account_id: 'reader-1', findings: [], frozen: false, newly_frozen: false },
      });
    });

    it('should flag balance drift and freeze spending', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      t.store.corruptBalances('reader-1', { spendable_xp: 150 });

      const result = await t.economy.monitoring.auditAccount('reader-1');
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.findings.map((f) => [f.kind, f.severity])).toEqual([['BALANCE_DRIFT', 'critical']]);
      expect(result.data.findings[0]?.details).toEqual({ stored: 150, ledger: 100, drift: 50, transactions: 1 });
      expect(result.data).toMatchObject({ frozen: true, newly_frozen: true });

      const spend = await t.economy.transactions.spend('reader-1', 10, 'comment_post', 'Comment');
      expect(spend.success).toBe(false);
      if (!spend.success) expect(spend.error.code).toBe('ACCOUNT_FROZEN');

      const flags = await t.economy.monitoring.listFlags('reader-1');
      expect(flags.success && flags.data.map((f) => f.kind)).toEqual(['BALANCE_DRIFT']);
    });

    it('should flag a negative balance and accumulated drift', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      t.store.corruptBalances('reader-1', { spendable_xp: -5, accumulated_xp: 90 });

      const result = await t.economy.monitoring.auditAccount('reader-1');
      expect(result.success && result.data.findings.map((f) => f.kind)).toEqual([
        'NEGATIVE_BALANCE',
        'BALANCE_DRIFT',
        'ACCUMULATED_DRIFT',
      ]);
    });

    it('should not freeze twice', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      t.store.corruptBalances('reader-1', { spendable_xp: 150 });

      await t.economy.monitoring.auditAccount('reader-1');
      const second = await t.economy.monitoring.auditAccount('reader-1');
      expect(second.success && second.data).toMatchObject({ frozen: true, newly_frozen: false });
    });

    it('should only flag when freezing is disabled', async () => {
      const lenient = await createTestEconomy({ monitoring: { freezeOnViolation: false } });
      await fundedAccount(lenient.economy, 'reader-1', 100);
      lenient.store.corruptBalances('reader-1', { spendable_xp: 150 });

      const result = await lenient.economy.monitoring.auditAccount('reader-1');
      expect(result.success && result.data).toMatchObject({ frozen: false, newly_frozen: false });
      expect(result.success && result.data.findings).toHaveLength(1);
    });

    it('should flag XP velocity for review without freezing', async () => {
      const strict = await createTestEconomy({ monitoring: { velocityThresholdXp: 1000 } });
      await fundedAccount(strict.economy, 'reader-1', 1500);

      const result = await strict.economy.monitoring.auditAccount('reader-1');
      expect(result.success && result.data.findings.map((f) => [f.kind, f.severity, f.details])).toEqual([
        ['XP_VELOCITY', 'warning', { earned: 1500, windowMs: 3_600_000, threshold: 1000 }],
      ]);
      expect(result.success && result.data.frozen).toBe(false);
    });

    it('should flag a burst of transactions for review', async () => {
      const strict = await createTestEconomy({ monitoring: { maxTransactionsPerMinute: 2 } });
      await fundedAccount(strict.economy, 'reader-1', 100);
      await strict.economy.transactions.spend('reader-1', 10, 'comment_post', 'Comment');
      await strict.economy.transactions.spend('reader-1', 10, 'comment_post', 'Comment');

      const result = await strict.economy.monitoring.auditAccount('reader-1');
      expect(result.success && result.data.findings.map((f) => [f.kind, f.severity, f.details])).toEqual([
        ['TRANSACTION_BURST', 'warning', { transactions: 3, windowMs: 60_000, threshold: 2 }],
      ]);
      expect(result.success && result.data.frozen).toBe(false);
    });

    it('should flag a burst of purchases for review', async () => {
      const strict = await createTestEconomy({ monitoring: { maxPurchasesPerDay: 0 } });
      await fundedAccount(strict.economy, 'reader-1', 100);
      await strict.economy.features.purchaseFeature('reader-1', 'font_opensans');

      const result = await strict.economy.monitoring.auditAccount('reader-1');
      expect(result.success && result.data.findings.map((f) => [f.kind, f.severity, f.details])).toEqual([
        ['PURCHASE_BURST', 'warning', { purchases: 1, windowMs: 86_400_000, threshold: 0 }],
      ]);
      expect(result.success && result.data.frozen).toBe(false);
    });

    it('should flag a single large transaction for review', async () => {
      const strict = await createTestEconomy({ monitoring: { largeTransactionXp: 500 } });
      await fundedAccount(strict.economy, 'reader-1', 600);
      await strict.economy.transactions.spend('reader-1', 100, 'comment_post', 'Comment');
      const [funding] = await strict.store.listTransactions('reader-1', { type: 'EARN' });

      const result = await strict.economy.monitoring.auditAccount('reader-1');
      expect(result.success && result.data.findings.map((f) => [f.kind, f.severity, f.details])).toEqual([
        ['LARGE_TRANSACTION', 'warning', { transactionIds: [funding?.id], largest: 600, threshold: 500 }],
      ]);
      expect(result.success && result.data.frozen).toBe(false);
    });

    it('should flag a balance above the ceiling for review', async () => {
      const strict = await createTestEconomy({ monitoring: { balanceCeilingXp: 50 } });
      await fundedAccount(strict.economy, 'reader-1', 100);

      const result = await strict.economy.monitoring.auditAccount('reader-1');
      expect(result.success && result.data.findings.map((f) => [f.kind, f.severity, f.details])).toEqual([
        ['BALANCE_CEILING', 'warning', { spendable_xp: 100, threshold: 50 }],
      ]);
      expect(result.success && result.data).toMatchObject({ frozen: false, newly_frozen: false });

      const spend = await strict.economy.transactions.spend('reader-1', 10, 'comment_post', 'Comment');
      expect(spend.success).toBe(true);
    });

    it('should report an unknown account as NOT_FOUND', async () => {
      const result = await t.economy.monitoring.auditAccount('ghost');
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('NOT_FOUND');
    });
  });

  describe('Freezing', () => {
    it('should freeze and unfreeze without touching balances', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);

      const frozen = await t.economy.monitoring.freezeAccount('reader-1', 'Chargeback review');
      expect(frozen.success && frozen.data).toMatchObject({
        spending_frozen: true,
        frozen_reason: 'Chargeback review',
        spendable_xp: 100,
      });

      const thawed = await t.economy.monitoring.unfreezeAccount('reader-1');
      expect(thawed.success && thawed.data).toMatchObject({ spending_frozen: false, frozen_reason: null, spendable_xp: 100 });

      const spend = await t.economy.transactions.spend('reader-1', 10, 'comment_post', 'Comment');
      expect(spend.success).toBe(true);
    });

    it('should require a reason', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      const result = await t.economy.monitoring.freezeAccount('reader-1', '   ');
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('runAudit', () => {
    it('should summarize every account', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      await fundedAccount(t.economy, 'reader-2', 100);
      await fundedAccount(t.economy, 'reader-3', 0);
      t.store.corruptBalances('reader-2', { spendable_xp: 99 });

      const result = await t.economy.monitoring.runAudit();
      expect(result).toEqual({
        success: true,
        data: { accounts_checked: 3, accounts_flagged: 1, findings: 1, frozen_accounts: 1, errors: 0 },
      });
    });
  });

  describe('getEconomyMetrics', () => {
    it('should total recent activity', async () => {
      await fundedAccount(t.economy, 'reader-1', 100);
      await fundedAccount(t.economy, 'reader-2', 50);
      await t.economy.transactions.spend('reader-1', 30, 'comment_post', 'Comment');

      const since = new Date(Date.now() - 60_000);
      const result = await t.economy.monitoring.getEconomyMetrics(since);
      expect(result).toEqual({
        success: true,
        data: {
          xp_earned: 150,
          xp_spent: 30,
          transactions: 3,
          active_accounts: 2,
          feature_purchases: 0,
          since,
          net_xp: 120,
        },
      });
    });
  });
});
