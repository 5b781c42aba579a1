/**
 * In-process ledger store.
 *
 * Used for local runs (LEDGER_STORE=memory) and as the test stand-in for
 * Postgres. Per-account critical sections are serialized by a KeyedMutex;
 * writes are staged on the tx and applied only when the callback resolves,
 * so a thrown error leaves the store untouched.
 */

import { KeyedMutex } from '../lib/mutex';
import { InternalError, NotFoundError } from '../lib/errors';
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

export interface MemoryLedgerStoreOptions {
  lockTimeoutMs?: number;
}

function creditKey(accountId: string, contentId: string): string {
  return `${accountId}:${contentId}`;
}

class MemoryLedgerTx implements LedgerTx {
  readonly transactions: XPTransaction[] = [];
  readonly attempts: QuizAttempt[] = [];
  readonly purchases: FeaturePurchase[] = [];
  readonly creditDeltas = new Map<string, number>();
  readonly authorizations: CommentAuthorizationRecord[] = [];
  readonly interactions: CommentInteraction[] = [];
  dirty = false;

  constructor(
    private readonly store: MemoryLedgerStore,
    public readonly account: Account
  ) {}

  get accountId(): string {
    return this.account.id;
  }

  async getAccount(): Promise<Account> {
    return { ...this.account };
  }

  async saveBalances(balances: { spendable_xp: number; accumulated_xp: number }): Promise<void> {
    this.account.spendable_xp = balances.spendable_xp;
    this.account.accumulated_xp = balances.accumulated_xp;
    this.touch();
  }

  async updateSpeed(update: SpeedUpdate): Promise<void> {
    if (update.current_wpm !== undefined) this.account.current_wpm = update.current_wpm;
    if (update.max_wpm !== undefined) this.account.max_wpm = update.max_wpm;
    this.touch();
  }

  async setSpendingFrozen(frozen: boolean, reason: string | null): Promise<void> {
    this.account.spending_frozen = frozen;
    this.account.frozen_reason = frozen ? reason : null;
    this.touch();
  }

  async findTransaction(transactionId: string): Promise<XPTransaction | null> {
    const staged = this.transactions.find((t) => t.id === transactionId);
    return staged ? { ...staged } : this.store.findCommitted(this.accountId, 'transactions', (t) => t.id === transactionId);
  }

  async findTransactionByRequestId(requestId: string): Promise<XPTransaction | null> {
    const staged = this.transactions.find((t) => t.request_id === requestId);
    return staged ? { ...staged } : this.store.findCommitted(this.accountId, 'transactions', (t) => t.request_id === requestId);
  }

  async insertTransaction(transaction: XPTransaction): Promise<void> {
    if (transaction.request_id && (await this.findTransactionByRequestId(transaction.request_id))) {
      throw new InternalError(`Duplicate request id ${transaction.request_id} for account ${this.accountId}`);
    }
    this.transactions.push({ ...transaction });
  }

  async listQuizAttempts(contentId: string): Promise<QuizAttempt[]> {
    const committed = await this.store.listQuizAttempts(this.accountId, contentId);
    return [...committed, ...this.attempts.filter((a) => a.content_id === contentId)];
  }

  async insertQuizAttempt(attempt: QuizAttempt): Promise<void> {
    this.attempts.push({ ...attempt });
  }

  async getOwnedFeatureIds(): Promise<Set<string>> {
    const committed = await this.store.listPurchases(this.accountId);
    return new Set([...committed, ...this.purchases].map((p) => p.feature_id));
  }

  async insertPurchase(purchase: FeaturePurchase): Promise<void> {
    if (!this.store.isKnownFeature(purchase.feature_id)) {
      throw new InternalError(`Feature ${purchase.feature_id} is not in the synced catalog`);
    }
    const owned = await this.getOwnedFeatureIds();
    if (owned.has(purchase.feature_id)) {
      throw new InternalError(`Duplicate purchase of ${purchase.feature_id} for account ${this.accountId}`);
    }
    this.purchases.push({ ...purchase });
  }

  async getCommentCredits(contentId: string): Promise<number> {
    const committed = await this.store.getCommentCredits(this.accountId, contentId);
    return committed + (this.creditDeltas.get(contentId) ?? 0);
  }

  async adjustCommentCredits(contentId: string, delta: number): Promise<void> {
    const next = (await this.getCommentCredits(contentId)) + delta;
    if (next < 0) {
      throw new InternalError(`Comment credits for ${contentId} would go negative`);
    }
    this.creditDeltas.set(contentId, (this.creditDeltas.get(contentId) ?? 0) + delta);
  }

  async findCommentAuthorization(commentId: string): Promise<CommentAuthorizationRecord | null> {
    const staged = this.authorizations.find((a) => a.comment_id === commentId);
    return staged
      ? { ...staged }
      : this.store.findCommitted(this.accountId, 'authorizations', (a) => a.comment_id === commentId);
  }

  async findCommentAuthorizationByRequestId(requestId: string): Promise<CommentAuthorizationRecord | null> {
    const staged = this.authorizations.find((a) => a.request_id === requestId);
    return staged
      ? { ...staged }
      : this.store.findCommitted(this.accountId, 'authorizations', (a) => a.request_id === requestId);
  }

  async insertCommentAuthorization(record: CommentAuthorizationRecord): Promise<void> {
    const duplicate =
      (await this.findCommentAuthorization(record.comment_id)) ??
      (record.request_id ? await this.findCommentAuthorizationByRequestId(record.request_id) : null);
    if (duplicate) {
      throw new InternalError(`Duplicate authorization for comment ${record.comment_id} on account ${this.accountId}`);
    }
    this.authorizations.push({ ...record });
  }

  async findInteraction(commentId: string): Promise<CommentInteraction | null> {
    const staged = this.interactions.find((i) => i.comment_id === commentId);
    return staged
      ? { ...staged }
      : this.store.findCommitted(this.accountId, 'interactions', (i) => i.comment_id === commentId);
  }

  async insertInteraction(interaction: CommentInteraction): Promise<void> {
    if (await this.findInteraction(interaction.comment_id)) {
      throw new InternalError(`Duplicate interaction on comment ${interaction.comment_id} for account ${this.accountId}`);
    }
    this.interactions.push({ ...interaction });
  }

  private touch(): void {
    this.dirty = true;
    this.account.updated_at = new Date();
  }
}

interface CommittedRows {
  transactions: XPTransaction;
  authorizations: CommentAuthorizationRecord;
  interactions: CommentInteraction;
}

export class MemoryLedgerStore implements LedgerStore {
  readonly driver = 'memory' as const;

  private readonly accounts = new Map<string, Account>();
  private readonly transactions: XPTransaction[] = [];
  private readonly attempts: QuizAttempt[] = [];
  private readonly purchases: FeaturePurchase[] = [];
  private readonly credits = new Map<string, number>();
  private readonly authorizations: CommentAuthorizationRecord[] = [];
  private readonly interactions: CommentInteraction[] = [];
  private readonly flags: AccountFlag[] = [];
  private readonly catalogFeatureIds = new Set<string>();
  private readonly mutex = new KeyedMutex();
  private readonly lockTimeoutMs: number;

  constructor(options: MemoryLedgerStoreOptions = {}) {
    this.lockTimeoutMs = options.lockTimeoutMs ?? 2000;
  }

  async createAccount(account: NewAccount): Promise<Account> {
    const existing = this.accounts.get(account.id);
    if (existing) return { ...existing };

    const now = new Date();
    const row: Account = {
      id: account.id,
      accumulated_xp: 0,
      spendable_xp: 0,
      current_wpm: account.current_wpm,
      max_wpm: account.max_wpm,
      spending_frozen: false,
      frozen_reason: null,
      created_at: now,
      updated_at: now,
    };
    this.accounts.set(row.id, row);
    return { ...row };
  }

  async withAccountLock<T>(accountId: string, fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(`account:${accountId}`, this.lockTimeoutMs, async () => {
      const account = this.accounts.get(accountId);
      if (!account) {
        throw new NotFoundError(`Account with id '${accountId}' not found`);
      }

      const tx = new MemoryLedgerTx(this, { ...account });
      const result = await fn(tx);
      this.commit(tx);
      return result;
    });
  }

  async getAccount(accountId: string): Promise<Account | null> {
    const account = this.accounts.get(accountId);
    return account ? { ...account } : null;
  }

  async listAccountIds(): Promise<string[]> {
    return [...this.accounts.keys()];
  }

  async listTransactions(accountId: string, query: TransactionQuery = {}): Promise<XPTransaction[]> {
    const since = query.since;
    const rows = this.transactions
      .filter((t) => t.account_id === accountId)
      .filter((t) => (query.type ? t.type === query.type : true))
      .filter((t) => (since ? t.created_at.getTime() >= since.getTime() : true))
      .reverse();
    return (query.limit !== undefined ? rows.slice(0, query.limit) : rows).map((t) => ({ ...t }));
  }

  async getTransactionTotals(accountId: string): Promise<TransactionTotals> {
    let net = 0;
    let earned = 0;
    let count = 0;
    for (const t of this.transactions) {
      if (t.account_id !== accountId) continue;
      net += t.amount;
      if (t.type === 'EARN') earned += t.amount;
      count++;
    }
    return { net, earned, count };
  }

  async sumEarnedSince(accountId: string, since: Date): Promise<number> {
    const rows = await this.listTransactions(accountId, { type: 'EARN', since });
    return rows.reduce((sum, t) => sum + t.amount, 0);
  }

  async listQuizAttempts(accountId: string, contentId?: string): Promise<QuizAttempt[]> {
    return this.attempts
      .filter((a) => a.account_id === accountId && (contentId === undefined || a.content_id === contentId))
      .map((a) => ({ ...a }));
  }

  async listPurchases(accountId: string): Promise<FeaturePurchase[]> {
    return this.purchases.filter((p) => p.account_id === accountId).map((p) => ({ ...p }));
  }

  async getCommentCredits(accountId: string, contentId: string): Promise<number> {
    return this.credits.get(creditKey(accountId, contentId)) ?? 0;
  }

  async syncCatalog(catalog: FeatureCatalog): Promise<void> {
    for (const feature of catalog.features) {
      this.catalogFeatureIds.add(feature.id);
    }
  }

  /** Mirrors the feature_purchases -> feature_catalog foreign key once a catalog is synced. */
  isKnownFeature(featureId: string): boolean {
    return this.catalogFeatureIds.size === 0 || this.catalogFeatureIds.has(featureId);
  }

  async insertFlag(flag: AccountFlag): Promise<void> {
    this.flags.push({ ...flag });
  }

  async listFlags(accountId?: string): Promise<AccountFlag[]> {
    return this.flags.filter((f) => accountId === undefined || f.account_id === accountId).map((f) => ({ ...f }));
  }

  async getEconomyStats(since: Date): Promise<EconomyStats> {
    const recent = this.transactions.filter((t) => t.created_at.getTime() >= since.getTime());
    return {
      xp_earned: recent.filter((t) => t.type === 'EARN').reduce((sum, t) => sum + t.amount, 0),
      xp_spent: recent.filter((t) => t.type === 'SPEND').reduce((sum, t) => sum - t.amount, 0),
      transactions: recent.length,
      active_accounts: new Set(recent.map((t) => t.account_id)).size,
      feature_purchases: this.purchases.filter((p) => p.created_at.getTime() >= since.getTime()).length,
    };
  }

  async close(): Promise<void> {
    // nothing to release
  }

  findCommitted<K extends keyof CommittedRows>(
    accountId: string,
    table: K,
    match: (row: CommittedRows[K]) => boolean
  ): CommittedRows[K] | null {
    const rows: CommittedRows[K][] = this.committedRows(table);
    const row = rows.find((r) => r.account_id === accountId && match(r));
    return row ? { ...row } : null;
  }

  /**
   * Bypasses the Transaction Manager. Tests use it to fabricate drift that
   * monitoring must detect.
   */
  corruptBalances(accountId: string, balances: Partial<Pick<Account, 'spendable_xp' | 'accumulated_xp'>>): void {
    const account = this.accounts.get(accountId);
    if (!account) throw new NotFoundError(`Account with id '${accountId}' not found`);
    Object.assign(account, balances);
  }

  private committedRows<K extends keyof CommittedRows>(table: K): CommittedRows[K][] {
    const tables: { [T in keyof CommittedRows]: CommittedRows[T][] } = {
      transactions: this.transactions,
      authorizations: this.authorizations,
      interactions: this.interactions,
    };
    return tables[table];
  }

  private commit(tx: MemoryLedgerTx): void {
    if (tx.dirty) {
      this.accounts.set(tx.account.id, { ...tx.account });
    }
    this.transactions.push(...tx.transactions);
    this.attempts.push(...tx.attempts);
    this.purchases.push(...tx.purchases);
    this.authorizations.push(...tx.authorizations);
    this.interactions.push(...tx.interactions);
    for (const [contentId, delta] of tx.creditDeltas) {
      const key = creditKey(tx.accountId, contentId);
      this.credits.set(key, (this.credits.get(key) ?? 0) + delta);
    }
  }
}
