/**
 * QuizAttemptService v1.0.0
 *
 * Records graded quiz attempts and pays for them. One account critical
 * section covers: attempt numbering, the attempt row, the reward EARN,
 * the free-comment credit for a perfect score, and the speed ratchet.
 * Either all of it commits or none of it does.
 *
 * Speeds above the account's unlocked maximum are recorded and paid like
 * any other; only an exact hit on the maximum can ratchet it.
 *
 * Content metrics and async grades come from collaborators and are awaited
 * with a bounded timeout before the lock is taken, so a timeout never
 * leaves partial ledger state.
 */

import { ulid } from 'ulidx';
import { economyConfig, type EconomyConfig } from '../config';
import { failure } from '../lib/errors/error-handler';
import { withTimeout } from '../lib/timeout';
import {
  accountIdSchema,
  contentIdSchema,
  contentMetricsSchema,
  parseOrThrow,
  quizGradeSchema,
  scorePctSchema,
  wpmSchema,
} from '../lib/validators';
import { quizLogger } from '../logger';
import type { LedgerStore } from '../repositories';
import type { ContentMetrics, QuizAttempt, QuizGrade, ServiceResult, XPTransaction } from '../types';
import type { ProgressionOutcome, SpeedProgressionService } from './SpeedProgressionService';
import { calculateReward, selectLengthMetric, type RewardResult } from './XPCalculationEngine';
import { throwIfAborted, type TransactionManager } from './TransactionManager';

/**
 * Content subsystem (read-only).
 */
export interface ContentMetricsProvider {
  getMetrics(contentId: string): Promise<ContentMetrics>;
}

export interface QuizAttemptOptions {
  signal?: AbortSignal;
}

export interface QuizAttemptOutcome {
  attempt: QuizAttempt;
  reward: RewardResult;
  reward_transaction: XPTransaction | null;
  progression: ProgressionOutcome | null;
  free_comment_granted: boolean;
}

export class QuizAttemptService {
  constructor(
    private readonly store: LedgerStore,
    private readonly transactions: TransactionManager,
    private readonly speed: SpeedProgressionService,
    private readonly content: ContentMetricsProvider,
    private readonly config: EconomyConfig = economyConfig
  ) {}

  async recordQuizAttempt(
    accountId: string,
    contentId: string,
    scorePct: number,
    wpmUsed: number,
    options: QuizAttemptOptions = {}
  ): Promise<ServiceResult<QuizAttemptOutcome>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      const content = parseOrThrow(contentIdSchema, contentId, 'contentId');
      parseOrThrow(scorePctSchema, scorePct, 'scorePct');
      parseOrThrow(wpmSchema, wpmUsed, 'wpmUsed');

      const metrics = parseOrThrow(
        contentMetricsSchema,
        await withTimeout(this.content.getMetrics(content), this.config.external.timeoutMs, 'content metrics lookup'),
        'content metrics'
      );
      throwIfAborted(options.signal, 'quiz attempt');

      const outcome = await this.transactions.runExclusive(id, async (tx) => {
        const previous = await tx.listQuizAttempts(content);
        const attemptNumber = previous.length + 1;

        const reward = calculateReward(
          {
            lengthMetric: selectLengthMetric(metrics, this.config.xp.lengthMetric),
            readingLevel: metrics.reading_level,
            scorePct,
            wpmUsed,
            attemptNumber,
          },
          this.config.xp
        );

        throwIfAborted(options.signal, 'quiz attempt');

        const attempt: QuizAttempt = {
          id: ulid(),
          account_id: id,
          content_id: content,
          attempt_number: attemptNumber,
          score_pct: scorePct,
          wpm_used: wpmUsed,
          xp_awarded: reward.xp_awarded,
          is_perfect: reward.perfect,
          passed: reward.passed,
          created_at: new Date(),
        };
        await tx.insertQuizAttempt(attempt);

        const rewardTransaction =
          reward.xp_awarded > 0
            ? await this.transactions.earnInTx(
                tx,
                reward.xp_awarded,
                'quiz_completion',
                `Quiz on ${content}, attempt ${attemptNumber} (${scorePct}%)`,
                { quizAttemptId: attempt.id }
              )
            : null;

        if (reward.perfect) {
          await tx.adjustCommentCredits(content, 1);
        }

        const progression = await this.speed.applyRatchetInTx(
          tx,
          { attemptNumber, wpmUsed, scorePct },
          { quizAttemptId: attempt.id }
        );

        return {
          attempt,
          reward,
          reward_transaction: rewardTransaction,
          progression,
          free_comment_granted: reward.perfect,
        };
      });

      quizLogger.info(
        {
          accountId: id,
          contentId: content,
          attemptNumber: outcome.attempt.attempt_number,
          xpAwarded: outcome.reward.xp_awarded,
          passed: outcome.reward.passed,
          ratcheted: outcome.progression !== null,
        },
        'Quiz attempt recorded'
      );

      return { success: true, data: outcome };
    } catch (error) {
      return failure(error);
    }
  }

  /**
   * Await an asynchronously graded result, bounded by the external timeout,
   * then record it. A timeout writes nothing.
   */
  async recordGradedAttempt(
    accountId: string,
    contentId: string,
    pendingGrade: Promise<QuizGrade>,
    options: QuizAttemptOptions = {}
  ): Promise<ServiceResult<QuizAttemptOutcome>> {
    try {
      const grade = parseOrThrow(
        quizGradeSchema,
        await withTimeout(pendingGrade, this.config.external.timeoutMs, 'quiz grading'),
        'quiz grade'
      );
      return this.recordQuizAttempt(accountId, contentId, grade.score_pct, grade.wpm_used, options);
    } catch (error) {
      quizLogger.warn({ accountId, contentId, err: error }, 'Graded attempt not recorded');
      return failure(error);
    }
  }

  /**
   * Oldest first.
   */
  async getAttemptHistory(accountId: string, contentId?: string): Promise<ServiceResult<QuizAttempt[]>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      const content = contentId === undefined ? undefined : parseOrThrow(contentIdSchema, contentId, 'contentId');
      return { success: true, data: await this.store.listQuizAttempts(id, content) };
    } catch (error) {
      return failure(error);
    }
  }

  async hasPassed(accountId: string, contentId: string): Promise<boolean> {
    const attempts = await this.store.listQuizAttempts(accountId, contentId);
    return attempts.some((a) => a.passed);
  }
}
