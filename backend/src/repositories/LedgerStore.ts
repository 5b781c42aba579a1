/**
 * Ledger Store contract.
 *
 * Every balance mutation happens inside `withAccountLock`, which linearizes
 * work per account and commits all writes made through the LedgerTx
 * together, or none of them. Reads outside a lock are snapshot reads used by
 * queries and monitoring.
 */

import type {
  Account,
  AccountFlag,
  CommentAuthorizationRecord,
  CommentInteraction,
  FeatureCatalog,
  FeaturePurchase,
  QuizAttempt,
  TransactionType,
  XPTransaction,
} from '../types';

export interface NewAccount {
  id: string;
  current_wpm: number;
  max_wpm: number;
}

export interface SpeedUpdate {
  current_wpm?: number;
  max_wpm?: number;
}

export interface TransactionQuery {
  type?: TransactionType;
  limit?: number;
  since?: Date;
}

export interface TransactionTotals {
  /** sum(amount) over all rows */
  net: number;
  /** sum(amount) over EARN rows */
  earned: number;
  count: number;
}

export interface EconomyStats {
  xp_earned: number;
  xp_spent: number;
  transactions: number;
  active_accounts: number;
  feature_purchases: number;
}

/**
 * Handle passed to a critical section. `account` is the locked row as of
 * lock acquisition; writes are visible to later reads through the same tx.
 */
export interface LedgerTx {
  readonly accountId: string;
  getAccount(): Promise<Account>;
  saveBalances(balances: { spendable_xp: number; accumulated_xp: number }): Promise<void>;
  updateSpeed(update: SpeedUpdate): Promise<void>;
  setSpendingFrozen(frozen: boolean, reason: string | null): Promise<void>;

  findTransaction(transactionId: string): Promise<XPTransaction | null>;
  findTransactionByRequestId(requestId: string): Promise<XPTransaction | null>;
  insertTransaction(transaction: XPTransaction): Promise<void>;

  listQuizAttempts(contentId: string): Promise<QuizAttempt[]>;
  insertQuizAttempt(attempt: QuizAttempt): Promise<void>;

  getOwnedFeatureIds(): Promise<Set<string>>;
  insertPurchase(purchase: FeaturePurchase): Promise<void>;

  getCommentCredits(contentId: string): Promise<number>;
  adjustCommentCredits(contentId: string, delta: number): Promise<void>;

  /** Unique per (account, comment) and per (account, request id). */
  findCommentAuthorization(commentId: string): Promise<CommentAuthorizationRecord | null>;
  findCommentAuthorizationByRequestId(requestId: string): Promise<CommentAuthorizationRecord | null>;
  insertCommentAuthorization(record: CommentAuthorizationRecord): Promise<void>;

  /** Interactions this account gave; unique per (account, comment). */
  findInteraction(commentId: string): Promise<CommentInteraction | null>;
  insertInteraction(interaction: CommentInteraction): Promise<void>;
}

export interface LedgerStore {
  readonly driver: 'postgres' | 'memory';

  /** Insert if absent; returns the stored row either way. */
  createAccount(account: NewAccount): Promise<Account>;

  /**
   * Run `fn` holding the account's lock. Throws NotFoundError for an unknown
   * account and TransientConflictError when the lock cannot be taken in time.
   */
  withAccountLock<T>(accountId: string, fn: (tx: LedgerTx) => Promise<T>): Promise<T>;

  getAccount(accountId: string): Promise<Account | null>;
  listAccountIds(): Promise<string[]>;

  /** Newest first. */
  listTransactions(accountId: string, query?: TransactionQuery): Promise<XPTransaction[]>;
  getTransactionTotals(accountId: string): Promise<TransactionTotals>;
  sumEarnedSince(accountId: string, since: Date): Promise<number>;

  /** Oldest first. */
  listQuizAttempts(accountId: string, contentId?: string): Promise<QuizAttempt[]>;
  listPurchases(accountId: string): Promise<FeaturePurchase[]>;
  getCommentCredits(accountId: string, contentId: string): Promise<number>;

  syncCatalog(catalog: FeatureCatalog): Promise<void>;

  insertFlag(flag: AccountFlag): Promise<void>;
  listFlags(accountId?: string): Promise<AccountFlag[]>;

  getEconomyStats(since: Date): Promise<EconomyStats>;

  close(): Promise<void>;
}
