/**
 * PostgreSQL ledger store.
 *
 * Each critical section is one transaction that takes the account row with
 * SELECT ... FOR UPDATE under a transaction-local lock_timeout. Lock waits
 * that time out, serialization failures and deadlocks surface as
 * TransientConflictError for the caller's retry loop.
 *
 * @see backend/database/schema.sql
 */

import {
  db,
  isLedgerImmutabilityViolation,
  isLockConflict,
  isUniqueViolation,
  type Database,
  type QueryFn,
} from '../db';
import { InvariantViolationError, NotFoundError, TransientConflictError } from '../lib/errors';
import { dbLogger } from '../logger';
import type {
  Account,
  AccountFlag,
  CommentAuthorizationRecord,
  CommentInteraction,
  FeatureCatalog,
  FeaturePurchase,
  QuizAttempt,
  XPTransaction,
} from '../types';
import type {
  EconomyStats,
  LedgerStore,
  LedgerTx,
  NewAccount,
  SpeedUpdate,
  TransactionQuery,
  TransactionTotals,
} from './LedgerStore';

export interface PostgresLedgerStoreOptions {
  lockTimeoutMs: number;
}

type DatabaseClient = Pick<Database, 'query' | 'transaction' | 'close'>;

const TRANSACTION_COLUMNS =
  'id, account_id, type, amount, source, description, balance_after, request_id, quiz_attempt_id, comment_id, feature_purchase_ref, created_at';

class PostgresLedgerTx implements LedgerTx {
  constructor(
    private readonly query: QueryFn,
    private account: Account
  ) {}

  get accountId(): string {
    return this.account.id;
  }

  async getAccount(): Promise<Account> {
    return { ...this.account };
  }

  async saveBalances(balances: { spendable_xp: number; accumulated_xp: number }): Promise<void> {
    const result = await this.query<Account>(
      `UPDATE accounts
       SET spendable_xp = $2, accumulated_xp = $3, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [this.accountId, balances.spendable_xp, balances.accumulated_xp]
    );
    this.refresh(result.rows[0]);
  }

  async updateSpeed(update: SpeedUpdate): Promise<void> {
    const result = await this.query<Account>(
      `UPDATE accounts
       SET current_wpm = COALESCE($2, current_wpm), max_wpm = COALESCE($3, max_wpm), updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [this.accountId, update.current_wpm ?? null, update.max_wpm ?? null]
    );
    this.refresh(result.rows[0]);
  }

  async setSpendingFrozen(frozen: boolean, reason: string | null): Promise<void> {
    const result = await this.query<Account>(
      `UPDATE accounts
       SET spending_frozen = $2, frozen_reason = $3, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [this.accountId, frozen, frozen ? reason : null]
    );
    this.refresh(result.rows[0]);
  }

  async findTransaction(transactionId: string): Promise<XPTransaction | null> {
    const result = await this.query<XPTransaction>(
      `SELECT ${TRANSACTION_COLUMNS} FROM xp_transactions WHERE account_id = $1 AND id = $2`,
      [this.accountId, transactionId]
    );
    return result.rows[0] ?? null;
  }

  async findTransactionByRequestId(requestId: string): Promise<XPTransaction | null> {
    const result = await this.query<XPTransaction>(
      `SELECT ${TRANSACTION_COLUMNS} FROM xp_transactions WHERE account_id = $1 AND request_id = $2`,
      [this.accountId, requestId]
    );
    return result.rows[0] ?? null;
  }

  async insertTransaction(t: XPTransaction): Promise<void> {
    await this.query(
      `INSERT INTO xp_transactions (${TRANSACTION_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
      [
        t.id,
        t.account_id,
        t.type,
        t.amount,
        t.source,
        t.description,
        t.balance_after,
        t.request_id,
        t.quiz_attempt_id,
        t.comment_id,
        t.feature_purchase_ref,
        t.created_at,
      ]
    );
  }

  async listQuizAttempts(contentId: string): Promise<QuizAttempt[]> {
    const result = await this.query<QuizAttempt>(
      `SELECT * FROM quiz_attempts WHERE account_id = $1 AND content_id = $2 ORDER BY attempt_number ASC`,
      [this.accountId, contentId]
    );
    return result.rows;
  }

  async insertQuizAttempt(a: QuizAttempt): Promise<void> {
    await this.query(
      `INSERT INTO quiz_attempts
         (id, account_id, content_id, attempt_number, score_pct, wpm_used, xp_awarded, is_perfect, passed, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [a.id, a.account_id, a.content_id, a.attempt_number, a.score_pct, a.wpm_used, a.xp_awarded, a.is_perfect, a.passed, a.created_at]
    );
  }

  async getOwnedFeatureIds(): Promise<Set<string>> {
    const result = await this.query<{ feature_id: string }>(
      `SELECT feature_id FROM feature_purchases WHERE account_id = $1`,
      [this.accountId]
    );
    return new Set(result.rows.map((row) => row.feature_id));
  }

  async insertPurchase(p: FeaturePurchase): Promise<void> {
    await this.query(
      `INSERT INTO feature_purchases (id, account_id, feature_id, cost_paid, transaction_id, bundle_id, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [p.id, p.account_id, p.feature_id, p.cost_paid, p.transaction_id, p.bundle_id, p.created_at]
    );
  }

  async getCommentCredits(contentId: string): Promise<number> {
    const result = await this.query<{ credits: number }>(
      `SELECT credits FROM comment_credits WHERE account_id = $1 AND content_id = $2`,
      [this.accountId, contentId]
    );
    return result.rows[0]?.credits ?? 0;
  }

  async adjustCommentCredits(contentId: string, delta: number): Promise<void> {
    await this.query(
      `INSERT INTO comment_credits (account_id, content_id, credits)
       VALUES ($1, $2, $3)
       ON CONFLICT (account_id, content_id)
       DO UPDATE SET credits = comment_credits.credits + EXCLUDED.credits`,
      [this.accountId, contentId, delta]
    );
  }

  async findCommentAuthorization(commentId: string): Promise<CommentAuthorizationRecord | null> {
    const result = await this.query<CommentAuthorizationRecord>(
      `SELECT * FROM comment_authorizations WHERE account_id = $1 AND comment_id = $2`,
      [this.accountId, commentId]
    );
    return result.rows[0] ?? null;
  }

  async findCommentAuthorizationByRequestId(requestId: string): Promise<CommentAuthorizationRecord | null> {
    const result = await this.query<CommentAuthorizationRecord>(
      `SELECT * FROM comment_authorizations WHERE account_id = $1 AND request_id = $2`,
      [this.accountId, requestId]
    );
    return result.rows[0] ?? null;
  }

  async insertCommentAuthorization(a: CommentAuthorizationRecord): Promise<void> {
    await this.query(
      `INSERT INTO comment_authorizations
         (id, account_id, comment_id, content_id, is_reply, free, cost, transaction_id, request_id, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [a.id, a.account_id, a.comment_id, a.content_id, a.is_reply, a.free, a.cost, a.transaction_id, a.request_id, a.created_at]
    );
  }

  async findInteraction(commentId: string): Promise<CommentInteraction | null> {
    const result = await this.query<CommentInteraction>(
      `SELECT * FROM comment_interactions WHERE account_id = $1 AND comment_id = $2`,
      [this.accountId, commentId]
    );
    return result.rows[0] ?? null;
  }

  async insertInteraction(i: CommentInteraction): Promise<void> {
    await this.query(
      `INSERT INTO comment_interactions
         (id, account_id, comment_id, comment_author_id, interaction, cost, transaction_id, request_id, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [i.id, i.account_id, i.comment_id, i.comment_author_id, i.interaction, i.cost, i.transaction_id, i.request_id, i.created_at]
    );
  }

  private refresh(row: Account | undefined): void {
    if (!row) {
      throw new NotFoundError(`Account with id '${this.accountId}' not found`);
    }
    this.account = row;
  }
}

export class PostgresLedgerStore implements LedgerStore {
  readonly driver = 'postgres' as const;

  constructor(
    private readonly options: PostgresLedgerStoreOptions,
    private readonly database: DatabaseClient = db
  ) {}

  async createAccount(account: NewAccount): Promise<Account> {
    await this.database.query(
      `INSERT INTO accounts (id, current_wpm, max_wpm)
       VALUES ($1, $2, $3)
       ON CONFLICT (id) DO NOTHING`,
      [account.id, account.current_wpm, account.max_wpm]
    );
    const stored = await this.getAccount(account.id);
    if (!stored) {
      throw new NotFoundError(`Account with id '${account.id}' not found`);
    }
    return stored;
  }

  async withAccountLock<T>(accountId: string, fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    try {
      return await this.database.transaction(async (query) => {
        await query(`SELECT set_config('lock_timeout', $1, true)`, [`${this.options.lockTimeoutMs}ms`]);
        const locked = await query<Account>(`SELECT * FROM accounts WHERE id = $1 FOR UPDATE`, [accountId]);
        const account = locked.rows[0];
        if (!account) {
          throw new NotFoundError(`Account with id '${accountId}' not found`);
        }
        return fn(new PostgresLedgerTx(query, account));
      });
    } catch (error) {
      if (isLockConflict(error)) {
        dbLogger.warn({ accountId, code: error.code }, 'Account lock conflict');
        throw new TransientConflictError(`Account ${accountId} is locked by another request`);
      }
      // A concurrent writer won a unique index race; a retry reads its row.
      if (isUniqueViolation(error)) {
        dbLogger.warn({ accountId, constraint: error.constraint }, 'Unique constraint race on ledger write');
        throw new TransientConflictError(`Concurrent write on account ${accountId}`);
      }
      if (isLedgerImmutabilityViolation(error)) {
        throw new InvariantViolationError(`Attempted to rewrite ledger history for account ${accountId}`, {
          accountId,
          detail: error.message,
        });
      }
      throw error;
    }
  }

  async getAccount(accountId: string): Promise<Account | null> {
    const result = await this.database.query<Account>(`SELECT * FROM accounts WHERE id = $1`, [accountId]);
    return result.rows[0] ?? null;
  }

  async listAccountIds(): Promise<string[]> {
    const result = await this.database.query<{ id: string }>(`SELECT id FROM accounts ORDER BY created_at ASC`);
    return result.rows.map((row) => row.id);
  }

  async listTransactions(accountId: string, query: TransactionQuery = {}): Promise<XPTransaction[]> {
    const result = await this.database.query<XPTransaction>(
      `SELECT ${TRANSACTION_COLUMNS} FROM xp_transactions
       WHERE account_id = $1
         AND ($2::text IS NULL OR type = $2)
         AND ($3::timestamptz IS NULL OR created_at >= $3)
       ORDER BY created_at DESC, id DESC
       LIMIT $4`,
      [accountId, query.type ?? null, query.since ?? null, query.limit ?? null]
    );
    return result.rows;
  }

  async getTransactionTotals(accountId: string): Promise<TransactionTotals> {
    const result = await this.database.query<{ net: string; earned: string; count: string }>(
      `SELECT COALESCE(SUM(amount), 0)::bigint AS net,
              COALESCE(SUM(amount) FILTER (WHERE type = 'EARN'), 0)::bigint AS earned,
              COUNT(*)::bigint AS count
       FROM xp_transactions WHERE account_id = $1`,
      [accountId]
    );
    const row = result.rows[0];
    return {
      net: Number(row?.net ?? 0),
      earned: Number(row?.earned ?? 0),
      count: Number(row?.count ?? 0),
    };
  }

  async sumEarnedSince(accountId: string, since: Date): Promise<number> {
    const result = await this.database.query<{ total: string }>(
      `SELECT COALESCE(SUM(amount), 0)::bigint AS total
       FROM xp_transactions
       WHERE account_id = $1 AND type = 'EARN' AND created_at >= $2`,
      [accountId, since]
    );
    return Number(result.rows[0]?.total ?? 0);
  }

  async listQuizAttempts(accountId: string, contentId?: string): Promise<QuizAttempt[]> {
    const result = await this.database.query<QuizAttempt>(
      `SELECT * FROM quiz_attempts
       WHERE account_id = $1 AND ($2::text IS NULL OR content_id = $2)
       ORDER BY created_at ASC, attempt_number ASC`,
      [accountId, contentId ?? null]
    );
    return result.rows;
  }

  async listPurchases(accountId: string): Promise<FeaturePurchase[]> {
    const result = await this.database.query<FeaturePurchase>(
      `SELECT * FROM feature_purchases WHERE account_id = $1 ORDER BY created_at ASC`,
      [accountId]
    );
    return result.rows;
  }

  async getCommentCredits(accountId: string, contentId: string): Promise<number> {
    const result = await this.database.query<{ credits: number }>(
      `SELECT credits FROM comment_credits WHERE account_id = $1 AND content_id = $2`,
      [accountId, contentId]
    );
    return result.rows[0]?.credits ?? 0;
  }

  async syncCatalog(catalog: FeatureCatalog): Promise<void> {
    await this.database.transaction(async (query) => {
      for (const bundle of catalog.bundles) {
        await query(
          `INSERT INTO feature_bundles (id, name, description, price, feature_ids)
           VALUES ($1, $2, $3, $4, $5)
           ON CONFLICT (id) DO UPDATE
           SET name = EXCLUDED.name, description = EXCLUDED.description,
               price = EXCLUDED.price, feature_ids = EXCLUDED.feature_ids`,
          [bundle.id, bundle.name, bundle.description, bundle.price, bundle.feature_ids]
        );
      }
      for (const feature of catalog.features) {
        await query(
          `INSERT INTO feature_catalog (id, name, description, price, category, bundle_ids, prerequisites)
           VALUES ($1, $2, $3, $4, $5, $6, $7)
           ON CONFLICT (id) DO UPDATE
           SET name = EXCLUDED.name, description = EXCLUDED.description, price = EXCLUDED.price,
               category = EXCLUDED.category, bundle_ids = EXCLUDED.bundle_ids,
               prerequisites = EXCLUDED.prerequisites`,
          [feature.id, feature.name, feature.description, feature.price, feature.category, feature.bundle_ids, feature.prerequisites]
        );
      }
    });
    dbLogger.info({ features: catalog.features.length, bundles: catalog.bundles.length }, 'Feature catalog synced');
  }

  async insertFlag(flag: AccountFlag): Promise<void> {
    await this.database.query(
      `INSERT INTO account_flags (id, account_id, kind, severity, details, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [flag.id, flag.account_id, flag.kind, flag.severity, JSON.stringify(flag.details), flag.created_at]
    );
  }

  async listFlags(accountId?: string): Promise<AccountFlag[]> {
    const result = await this.database.query<AccountFlag>(
      `SELECT * FROM account_flags
       WHERE ($1::text IS NULL OR account_id = $1)
       ORDER BY created_at DESC`,
      [accountId ?? null]
    );
    return result.rows;
  }

  async getEconomyStats(since: Date): Promise<EconomyStats> {
    const result = await this.database.query<{
      xp_earned: string;
      xp_spent: string;
      transactions: string;
      active_accounts: string;
      feature_purchases: string;
    }>(
      `SELECT
         COALESCE(SUM(amount) FILTER (WHERE type = 'EARN'), 0)::bigint AS xp_earned,
         COALESCE(-SUM(amount) FILTER (WHERE type = 'SPEND'), 0)::bigint AS xp_spent,
         COUNT(*)::bigint AS transactions,
         COUNT(DISTINCT account_id)::bigint AS active_accounts,
         (SELECT COUNT(*) FROM feature_purchases WHERE created_at >= $1)::bigint AS feature_purchases
       FROM xp_transactions
       WHERE created_at >= $1`,
      [since]
    );
    const row = result.rows[0];
    return {
      xp_earned: Number(row?.xp_earned ?? 0),
      xp_spent: Number(row?.xp_spent ?? 0),
      transactions: Number(row?.transactions ?? 0),
      active_accounts: Number(row?.active_accounts ?? 0),
      feature_purchases: Number(row?.feature_purchases ?? 0),
    };
  }

  async close(): Promise<void> {
    await this.database.close();
  }
}
