/**
 * SpeedProgressionService v1.0.0
 *
 * Reading speed ratchet.
 *
 * - current_wpm may be set anywhere in (0, max_wpm], free of charge.
 * - max_wpm rises by ratchetStepWpm only on a first attempt, read at exactly
 *   max_wpm, with a perfect score. The progression bonus is its own EARN row.
 * - Retries never ratchet.
 */

import { z } from 'zod';
import { economyConfig, type EconomyConfig } from '../config';
import { failure } from '../lib/errors/error-handler';
import { NotFoundError, ValidationError } from '../lib/errors';
import { accountIdSchema, parseOrThrow, wpmSchema } from '../lib/validators';
import { quizLogger } from '../logger';
import type { LedgerStore, LedgerTx } from '../repositories';
import type { Account, ServiceResult, TransactionRefs, XPTransaction } from '../types';
import type { TransactionManager } from './TransactionManager';

export interface RatchetInput {
  attemptNumber: number;
  wpmUsed: number;
  scorePct: number;
}

export interface ProgressionOutcome {
  previous_max_wpm: number;
  max_wpm: number;
  bonus_transaction: XPTransaction;
}

export interface SpeedProfile {
  current_wpm: number;
  max_wpm: number;
  /** max_wpm after the next qualifying attempt */
  next_max_wpm: number;
}

export function qualifiesForRatchet(input: RatchetInput, maxWpm: number): boolean {
  return input.attemptNumber === 1 && input.wpmUsed === maxWpm && input.scorePct === 100;
}

export class SpeedProgressionService {
  constructor(
    private readonly store: LedgerStore,
    private readonly transactions: TransactionManager,
    private readonly config: EconomyConfig = economyConfig
  ) {}

  /**
   * Inside an open critical section: raise max_wpm and earn the progression
   * bonus when the attempt qualifies. Returns null otherwise.
   */
  async applyRatchetInTx(
    tx: LedgerTx,
    input: RatchetInput,
    refs: TransactionRefs = {}
  ): Promise<ProgressionOutcome | null> {
    const account = await tx.getAccount();
    if (!qualifiesForRatchet(input, account.max_wpm)) {
      return null;
    }

    const nextMax = account.max_wpm + this.config.speed.ratchetStepWpm;
    await tx.updateSpeed({ max_wpm: nextMax });

    const bonus = await this.transactions.earnInTx(
      tx,
      this.config.speed.progressionBonusXp,
      'speed_progression',
      `Speed progression: max ${account.max_wpm} -> ${nextMax} WPM`,
      refs
    );

    quizLogger.info(
      { accountId: tx.accountId, previousMax: account.max_wpm, maxWpm: nextMax, bonus: bonus.amount },
      'Reading speed ratcheted'
    );

    return { previous_max_wpm: account.max_wpm, max_wpm: nextMax, bonus_transaction: bonus };
  }

  async setCurrentWpm(accountId: string, wpm: number): Promise<ServiceResult<Account>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      parseOrThrow(wpmSchema, wpm, 'wpm');

      const account = await this.transactions.runExclusive(id, async (tx) => {
        const current = await tx.getAccount();
        if (wpm > current.max_wpm) {
          throw new ValidationError(`WPM ${wpm} exceeds unlocked maximum ${current.max_wpm}`, {
            wpm,
            maxWpm: current.max_wpm,
          });
        }
        await tx.updateSpeed({ current_wpm: wpm });
        return tx.getAccount();
      });

      quizLogger.debug({ accountId: id, wpm }, 'Current WPM updated');
      return { success: true, data: account };
    } catch (error) {
      return failure(error);
    }
  }

  async getSpeedProfile(accountId: string): Promise<ServiceResult<SpeedProfile>> {
    try {
      const account = await this.requireAccount(accountId);
      return {
        success: true,
        data: {
          current_wpm: account.current_wpm,
          max_wpm: account.max_wpm,
          next_max_wpm: account.max_wpm + this.config.speed.ratchetStepWpm,
        },
      };
    } catch (error) {
      return failure(error);
    }
  }

  /**
   * After failed quizzes, back off from the last WPM that passed:
   * max(last_passed - min(failed * step, maxReduction), floor).
   */
  async getRecommendedWpm(accountId: string, failedAttempts: number): Promise<ServiceResult<number>> {
    try {
      const account = await this.requireAccount(accountId);
      const failed = parseOrThrow(z.number().int().nonnegative(), failedAttempts, 'failedAttempts');
      const { recommendationStepWpm, maxRecommendationReductionWpm, minRecommendedWpm, initialCurrentWpm } =
        this.config.speed;

      const attempts = await this.store.listQuizAttempts(account.id);
      const lastPassed = [...attempts].reverse().find((a) => a.passed);
      const base = lastPassed?.wpm_used ?? initialCurrentWpm;

      const reduction = Math.min(failed * recommendationStepWpm, maxRecommendationReductionWpm);
      return { success: true, data: Math.max(base - reduction, minRecommendedWpm) };
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
