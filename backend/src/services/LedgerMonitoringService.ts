/**
 * LedgerMonitoringService v1.0.0
 *
 * Detective checks over the ledger. Never blocks a user request, never
 * corrects a balance.
 *
 * - NEGATIVE_BALANCE   spendable_xp < 0
 * - BALANCE_DRIFT      sum(amount) != spendable_xp
 * - ACCUMULATED_DRIFT  sum(EARN amount) != accumulated_xp
 * - XP_VELOCITY        XP earned in the rolling window above threshold
 * - TRANSACTION_BURST  more ledger rows in the last minute than allowed
 * - PURCHASE_BURST     more feature purchases in the last day than allowed
 * - LARGE_TRANSACTION  a single row in the velocity window above threshold
 * - BALANCE_CEILING    spendable_xp above the ceiling
 *
 * Findings are logged, counted and stored as account_flags. The three
 * invariant findings freeze spending when freezeOnViolation is set; the
 * rest only flag for review.
 */

import { ulid } from 'ulidx';
import { economyConfig, type EconomyConfig } from '../config';
import { failure } from '../lib/errors/error-handler';
import { InvariantViolationError, NotFoundError } from '../lib/errors';
import { accountIdSchema, descriptionSchema, parseOrThrow } from '../lib/validators';
import { monitorLogger } from '../logger';
import { frozenAccounts, ledgerAuditRunsTotal, ledgerFlagsTotal } from '../monitoring/metrics';
import type { EconomyStats, LedgerStore } from '../repositories';
import type { Account, AccountFlag, AccountFlagKind, FlagSeverity, ServiceResult } from '../types';
import type { TransactionManager } from './TransactionManager';

export interface AuditReport {
  account_id: string;
  findings: AccountFlag[];
  frozen: boolean;
  newly_frozen: boolean;
}

export interface AuditSummary {
  accounts_checked: number;
  accounts_flagged: number;
  findings: number;
  frozen_accounts: number;
  errors: number;
}

export interface EconomyMetrics extends EconomyStats {
  since: Date;
  net_xp: number;
}

interface Finding {
  kind: AccountFlagKind;
  severity: FlagSeverity;
  details: Record<string, unknown>;
}

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

const INVARIANT_KINDS: readonly AccountFlagKind[] = ['NEGATIVE_BALANCE', 'BALANCE_DRIFT', 'ACCUMULATED_DRIFT'];

export class LedgerMonitoringService {
  constructor(
    private readonly store: LedgerStore,
    private readonly transactions: TransactionManager,
    private readonly config: EconomyConfig = economyConfig
  ) {}

  async auditAccount(accountId: string): Promise<ServiceResult<AuditReport>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      return { success: true, data: await this.audit(id) };
    } catch (error) {
      return failure(error);
    }
  }

  async runAudit(): Promise<ServiceResult<AuditSummary>> {
    try {
      const ids = await this.store.listAccountIds();
      const summary: AuditSummary = {
        accounts_checked: 0,
        accounts_flagged: 0,
        findings: 0,
        frozen_accounts: 0,
        errors: 0,
      };

      for (const id of ids) {
        try {
          const report = await this.audit(id);
          summary.accounts_checked++;
          summary.findings += report.findings.length;
          if (report.findings.length > 0) summary.accounts_flagged++;
          if (report.frozen) summary.frozen_accounts++;
        } catch (error) {
          summary.errors++;
          monitorLogger.error({ accountId: id, err: error }, 'Account audit failed');
        }
      }

      ledgerAuditRunsTotal.inc();
      frozenAccounts.set(summary.frozen_accounts);
      monitorLogger.info(summary, 'Ledger audit complete');
      return { success: true, data: summary };
    } catch (error) {
      return failure(error);
    }
  }

  async freezeAccount(accountId: string, reason: string): Promise<ServiceResult<Account>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      const why = parseOrThrow(descriptionSchema, reason, 'reason');
      const account = await this.transactions.runExclusive(id, async (tx) => {
        await tx.setSpendingFrozen(true, why);
        return tx.getAccount();
      });
      monitorLogger.warn({ accountId: id, reason: why }, 'Account spending frozen manually');
      return { success: true, data: account };
    } catch (error) {
      return failure(error);
    }
  }

  /**
   * Lift a freeze after review. Balances are left exactly as they are.
   */
  async unfreezeAccount(accountId: string): Promise<ServiceResult<Account>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      const account = await this.transactions.runExclusive(id, async (tx) => {
        await tx.setSpendingFrozen(false, null);
        return tx.getAccount();
      });
      monitorLogger.info({ accountId: id }, 'Account spending unfrozen');
      return { success: true, data: account };
    } catch (error) {
      return failure(error);
    }
  }

  async listFlags(accountId?: string): Promise<ServiceResult<AccountFlag[]>> {
    try {
      const id = accountId === undefined ? undefined : parseOrThrow(accountIdSchema, accountId, 'accountId');
      return { success: true, data: await this.store.listFlags(id) };
    } catch (error) {
      return failure(error);
    }
  }

  async getEconomyMetrics(since: Date): Promise<ServiceResult<EconomyMetrics>> {
    try {
      const stats = await this.store.getEconomyStats(since);
      return { success: true, data: { ...stats, since, net_xp: stats.xp_earned - stats.xp_spent } };
    } catch (error) {
      return failure(error);
    }
  }

  // ==========================================================================
  // CHECKS
  // ==========================================================================

  /**
   * Reads run under the account lock so an in-flight mutation cannot show
   * up as drift.
   */
  private async audit(accountId: string): Promise<AuditReport> {
    const { findings, account, newlyFrozen } = await this.transactions.runExclusive(accountId, async (tx) => {
      const current = await tx.getAccount();
      const checks = await this.check(current);

      const violated = checks.some((f) => INVARIANT_KINDS.includes(f.kind));
      const freeze = violated && this.config.monitoring.freezeOnViolation && !current.spending_frozen;
      if (freeze) {
        await tx.setSpendingFrozen(true, `Ledger audit: ${checks.map((f) => f.kind).join(', ')}`);
      }
      return { findings: checks, account: await tx.getAccount(), newlyFrozen: freeze };
    });

    const createdAt = new Date();
    const flags: AccountFlag[] = findings.map((finding) => ({
      id: ulid(),
      account_id: accountId,
      kind: finding.kind,
      severity: finding.severity,
      details: finding.details,
      created_at: createdAt,
    }));

    for (const flag of flags) {
      await this.store.insertFlag(flag);
      ledgerFlagsTotal.inc({ kind: flag.kind, severity: flag.severity });
      if (flag.severity === 'critical') {
        const violation = new InvariantViolationError(`${flag.kind} on account ${accountId}`, flag.details);
        monitorLogger.error({ accountId, kind: flag.kind, details: flag.details, err: violation }, 'Ledger invariant violated');
      } else {
        monitorLogger.warn({ accountId, kind: flag.kind, details: flag.details }, 'Account flagged for review');
      }
    }

    if (newlyFrozen) {
      monitorLogger.warn({ accountId, reason: account.frozen_reason }, 'Account spending frozen pending review');
    }

    return {
      account_id: accountId,
      findings: flags,
      frozen: account.spending_frozen,
      newly_frozen: newlyFrozen,
    };
  }

  private async check(account: Account): Promise<Finding[]> {
    const findings: Finding[] = [];
    const totals = await this.store.getTransactionTotals(account.id);

    if (account.spendable_xp < 0) {
      findings.push({
        kind: 'NEGATIVE_BALANCE',
        severity: 'critical',
        details: { spendable_xp: account.spendable_xp },
      });
    }

    if (totals.net !== account.spendable_xp) {
      findings.push({
        kind: 'BALANCE_DRIFT',
        severity: 'critical',
        details: {
          stored: account.spendable_xp,
          ledger: totals.net,
          drift: account.spendable_xp - totals.net,
          transactions: totals.count,
        },
      });
    }

    if (totals.earned !== account.accumulated_xp) {
      findings.push({
        kind: 'ACCUMULATED_DRIFT',
        severity: 'critical',
        details: {
          stored: account.accumulated_xp,
          ledger: totals.earned,
          drift: account.accumulated_xp - totals.earned,
        },
      });
    }

    findings.push(...(await this.checkActivity(account)));
    return findings;
  }

  /**
   * Review-only anomalies over recent activity.
   */
  private async checkActivity(account: Account): Promise<Finding[]> {
    const findings: Finding[] = [];
    const {
      velocityWindowMs,
      velocityThresholdXp,
      maxTransactionsPerMinute,
      maxPurchasesPerDay,
      largeTransactionXp,
      balanceCeilingXp,
    } = this.config.monitoring;
    const now = Date.now();

    const windowStart = new Date(now - velocityWindowMs);
    const earned = await this.store.sumEarnedSince(account.id, windowStart);
    if (earned > velocityThresholdXp) {
      findings.push({
        kind: 'XP_VELOCITY',
        severity: 'warning',
        details: { earned, windowMs: velocityWindowMs, threshold: velocityThresholdXp },
      });
    }

    const lastMinute = await this.store.listTransactions(account.id, { since: new Date(now - MINUTE_MS) });
    if (lastMinute.length > maxTransactionsPerMinute) {
      findings.push({
        kind: 'TRANSACTION_BURST',
        severity: 'warning',
        details: { transactions: lastMinute.length, windowMs: MINUTE_MS, threshold: maxTransactionsPerMinute },
      });
    }

    const dayStart = now - DAY_MS;
    const purchases = (await this.store.listPurchases(account.id)).filter(
      (p) => p.created_at.getTime() >= dayStart
    );
    if (purchases.length > maxPurchasesPerDay) {
      findings.push({
        kind: 'PURCHASE_BURST',
        severity: 'warning',
        details: { purchases: purchases.length, windowMs: DAY_MS, threshold: maxPurchasesPerDay },
      });
    }

    const large = (await this.store.listTransactions(account.id, { since: windowStart })).filter(
      (t) => Math.abs(t.amount) > largeTransactionXp
    );
    if (large.length > 0) {
      findings.push({
        kind: 'LARGE_TRANSACTION',
        severity: 'warning',
        details: {
          transactionIds: large.map((t) => t.id),
          largest: Math.max(...large.map((t) => Math.abs(t.amount))),
          threshold: largeTransactionXp,
        },
      });
    }

    if (account.spendable_xp > balanceCeilingXp) {
      findings.push({
        kind: 'BALANCE_CEILING',
        severity: 'warning',
        details: { spendable_xp: account.spendable_xp, threshold: balanceCeilingXp },
      });
    }

    return findings;
  }
}
