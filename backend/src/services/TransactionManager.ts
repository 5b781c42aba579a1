/**
 * TransactionManager v1.0.0
 *
 * The only code path that mutates account balances.
 *
 * - earn:  +amount to accumulated_xp and spendable_xp, EARN row, amount > 0
 * - spend: -amount from spendable_xp only, SPEND row stored negative
 *
 * Every mutation runs inside LedgerStore.withAccountLock, so two spends on
 * one account never validate against the same balance. Lock contention is
 * retried with backoff and then surfaces as TRANSIENT_CONFLICT.
 *
 * A `requestId` makes a mutation idempotent per account: a replay returns
 * the original row and changes nothing. The replayed row must describe the
 * same operation (type, source, amount, comment); anything else is a
 * ValidationError.
 */

import { ulid } from 'ulidx';
import { economyConfig, type EconomyConfig } from '../config';
import { withRetry } from '../lib/db/retry';
import { failure } from '../lib/errors/error-handler';
import {
  AbortedError,
  AccountFrozenError,
  AppError,
  InsufficientXPError,
  NotFoundError,
  ValidationError,
} from '../lib/errors';
import {
  accountIdSchema,
  descriptionSchema,
  earnSourceSchema,
  parseOrThrow,
  spendPurposeSchema,
  transactionHistorySchema,
  xpAmountSchema,
  type TransactionHistoryInput,
} from '../lib/validators';
import { ledgerLogger } from '../logger';
import {
  ledgerOperationDuration,
  ledgerRejectionsTotal,
  xpAmountTotal,
  xpTransactionsTotal,
} from '../monitoring/metrics';
import type { LedgerStore, LedgerTx } from '../repositories';
import type {
  Account,
  Balance,
  EarnSource,
  ServiceResult,
  SpendPurpose,
  TransactionRefs,
  XPTransaction,
} from '../types';
import { calculateLevel } from './XPCalculationEngine';

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new AbortedError(operation);
  }
}

function refColumns(refs: TransactionRefs): Pick<
  XPTransaction,
  'request_id' | 'quiz_attempt_id' | 'comment_id' | 'feature_purchase_ref'
> {
  return {
    request_id: refs.requestId ?? null,
    quiz_attempt_id: refs.quizAttemptId ?? null,
    comment_id: refs.commentId ?? null,
    feature_purchase_ref: refs.featurePurchaseRef ?? null,
  };
}

type ReplayKey = Pick<XPTransaction, 'type' | 'source' | 'amount' | 'comment_id'>;

const REPLAY_FIELDS = ['type', 'source', 'amount', 'comment_id'] as const;

/**
 * A request id replays only the operation it was first used for.
 */
export function assertSameOperation(replay: XPTransaction, expected: ReplayKey): void {
  const mismatched = REPLAY_FIELDS.filter((field) => replay[field] !== expected[field]);
  if (mismatched.length > 0) {
    throw new ValidationError('Request id reused for a different operation', {
      requestId: replay.request_id,
      transactionId: replay.id,
      mismatched,
    });
  }
}

export class TransactionManager {
  constructor(
    private readonly store: LedgerStore,
    private readonly config: EconomyConfig = economyConfig
  ) {}

  // ==========================================================================
  // CRITICAL SECTIONS
  // ==========================================================================

  /**
   * Run `fn` holding the account lock, retrying lock conflicts. Throws
   * AppErrors; all writes made through `tx` commit together or not at all.
   */
  async runExclusive<T>(accountId: string, fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    const end = ledgerOperationDuration.startTimer();
    try {
      const result = await withRetry(() => this.store.withAccountLock(accountId, fn), {
        maxRetries: this.config.ledger.maxRetries,
        baseDelay: this.config.ledger.retryBaseDelayMs,
        maxDelay: this.config.ledger.retryMaxDelayMs,
      });
      end({ outcome: 'committed' });
      return result;
    } catch (error) {
      end({ outcome: 'rolled_back' });
      if (error instanceof AppError) {
        ledgerRejectionsTotal.inc({ code: error.code });
      }
      throw error;
    }
  }

  /**
   * Earn inside an open critical section.
   */
  async earnInTx(
    tx: LedgerTx,
    amount: number,
    source: EarnSource,
    description: string,
    refs: TransactionRefs = {}
  ): Promise<XPTransaction> {
    if (refs.requestId) {
      const replay = await tx.findTransactionByRequestId(refs.requestId);
      if (replay) {
        assertSameOperation(replay, { type: 'EARN', source, amount, comment_id: refs.commentId ?? null });
        ledgerLogger.info({ accountId: tx.accountId, requestId: refs.requestId }, 'Replayed earn request');
        return replay;
      }
    }

    throwIfAborted(refs.signal, 'earn');

    const account = await tx.getAccount();
    const spendable = account.spendable_xp + amount;
    const accumulated = account.accumulated_xp + amount;

    const transaction: XPTransaction = {
      id: ulid(),
      account_id: tx.accountId,
      type: 'EARN',
      amount,
      source,
      description,
      balance_after: spendable,
      ...refColumns(refs),
      created_at: new Date(),
    };

    await tx.saveBalances({ spendable_xp: spendable, accumulated_xp: accumulated });
    await tx.insertTransaction(transaction);

    xpTransactionsTotal.inc({ type: 'EARN', source });
    xpAmountTotal.inc({ type: 'EARN' }, amount);
    ledgerLogger.info(
      { accountId: tx.accountId, transactionId: transaction.id, amount, source, balanceAfter: spendable },
      'XP earned'
    );
    return transaction;
  }

  /**
   * Spend inside an open critical section. Throws InsufficientXPError or
   * AccountFrozenError without writing anything.
   */
  async spendInTx(
    tx: LedgerTx,
    amount: number,
    purpose: SpendPurpose,
    description: string,
    refs: TransactionRefs = {}
  ): Promise<XPTransaction> {
    if (refs.requestId) {
      const replay = await tx.findTransactionByRequestId(refs.requestId);
      if (replay) {
        assertSameOperation(replay, {
          type: 'SPEND',
          source: purpose,
          amount: -amount,
          comment_id: refs.commentId ?? null,
        });
        ledgerLogger.info({ accountId: tx.accountId, requestId: refs.requestId }, 'Replayed spend request');
        return replay;
      }
    }

    throwIfAborted(refs.signal, 'spend');

    const account = await tx.getAccount();
    if (account.spending_frozen) {
      throw new AccountFrozenError(account.id, account.frozen_reason);
    }
    if (account.spendable_xp < amount) {
      throw new InsufficientXPError(amount, account.spendable_xp);
    }

    const spendable = account.spendable_xp - amount;
    const transaction: XPTransaction = {
      id: ulid(),
      account_id: tx.accountId,
      type: 'SPEND',
      amount: -amount,
      source: purpose,
      description,
      balance_after: spendable,
      ...refColumns(refs),
      created_at: new Date(),
    };

    await tx.saveBalances({ spendable_xp: spendable, accumulated_xp: account.accumulated_xp });
    await tx.insertTransaction(transaction);

    xpTransactionsTotal.inc({ type: 'SPEND', source: purpose });
    xpAmountTotal.inc({ type: 'SPEND' }, amount);
    ledgerLogger.info(
      { accountId: tx.accountId, transactionId: transaction.id, amount, purpose, balanceAfter: spendable },
      'XP spent'
    );
    return transaction;
  }

  // ==========================================================================
  // PUBLIC OPERATIONS
  // ==========================================================================

  async registerAccount(accountId: string): Promise<ServiceResult<Account>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      const account = await this.store.createAccount({
        id,
        current_wpm: this.config.speed.initialCurrentWpm,
        max_wpm: this.config.speed.initialMaxWpm,
      });
      ledgerLogger.info({ accountId: id }, 'Account registered');
      return { success: true, data: account };
    } catch (error) {
      return failure(error);
    }
  }

  async earn(
    accountId: string,
    amount: number,
    source: EarnSource,
    description: string,
    refs: TransactionRefs = {}
  ): Promise<ServiceResult<XPTransaction>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      parseOrThrow(xpAmountSchema, amount, 'amount');
      parseOrThrow(earnSourceSchema, source, 'source');
      parseOrThrow(descriptionSchema, description, 'description');
      throwIfAborted(refs.signal, 'earn');

      const transaction = await this.runExclusive(id, (tx) =>
        this.earnInTx(tx, amount, source, description, refs)
      );
      return { success: true, data: transaction };
    } catch (error) {
      return failure(error);
    }
  }

  async spend(
    accountId: string,
    amount: number,
    purpose: SpendPurpose,
    description: string,
    refs: TransactionRefs = {}
  ): Promise<ServiceResult<XPTransaction>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      parseOrThrow(xpAmountSchema, amount, 'amount');
      parseOrThrow(spendPurposeSchema, purpose, 'purpose');
      parseOrThrow(descriptionSchema, description, 'description');
      throwIfAborted(refs.signal, 'spend');

      const transaction = await this.runExclusive(id, (tx) =>
        this.spendInTx(tx, amount, purpose, description, refs)
      );
      return { success: true, data: transaction };
    } catch (error) {
      return failure(error);
    }
  }

  async getBalance(accountId: string): Promise<ServiceResult<Balance>> {
    try {
      const account = await this.requireAccount(accountId);
      return {
        success: true,
        data: {
          accumulated_xp: account.accumulated_xp,
          spendable_xp: account.spendable_xp,
          level: calculateLevel(account.accumulated_xp),
        },
      };
    } catch (error) {
      return failure(error);
    }
  }

  async getAccount(accountId: string): Promise<ServiceResult<Account>> {
    try {
      return { success: true, data: await this.requireAccount(accountId) };
    } catch (error) {
      return failure(error);
    }
  }

  /**
   * Newest first.
   */
  async getTransactionHistory(
    accountId: string,
    query: TransactionHistoryInput = {}
  ): Promise<ServiceResult<XPTransaction[]>> {
    try {
      const account = await this.requireAccount(accountId);
      const { type, limit } = parseOrThrow(transactionHistorySchema, query, 'history query');
      const rows = await this.store.listTransactions(account.id, { type, limit });
      return { success: true, data: rows };
    } catch (error) {
      return failure(error);
    }
  }

  private async requireAccount(accountId: string): Promise<Account> {
    const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
    const account = await this.store.getAccount(id);
    if (!account) {
      throw new NotFoundError(`Account with id '${id}' not found`);
    }
    return account;
  }
}
