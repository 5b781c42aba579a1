/**
 * Quiz Attempt Integration Tests
 *
 * Attempt numbering, rewards, perfect-score credits, the speed ratchet and
 * collaborator timeouts, end to end through the in-memory ledger.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createEconomy } from '../../src/economy';
import { MemoryLedgerStore } from '../../src/repositories';
import {
  FakeContentProvider,
  HangingContentProvider,
  createTestEconomy,
  fundedAccount,
  testConfig,
  type TestEconomy,
} from '../helpers';

const ARTICLE = { word_count: 1000, letter_count: 5000, reading_level: 8 };

describe('QuizAttemptService', () => {
  let t: TestEconomy;

  beforeEach(async () => {
    t = await createTestEconomy();
    t.content.set('article-1', ARTICLE);
    await fundedAccount(t.economy, 'reader-1', 0);
  });

  describe('Rewards', () => {
    it('should pay a perfect first attempt at max speed and ratchet the speed', async () => {
      const result = await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 100, 225);
      expect(result.success).toBe(true);
      if (!result.success) return;

      const { attempt, reward, reward_transaction, progression, free_comment_granted } = result.data;
      expect(attempt).toMatchObject({ attempt_number: 1, score_pct: 100, wpm_used: 225, xp_awarded: 900, is_perfect: true, passed: true });
      expect(reward.xp_awarded).toBe(900);
      expect(reward_transaction).toMatchObject({ amount: 900, source: 'quiz_completion', quiz_attempt_id: attempt.id });
      expect(progression).toMatchObject({ previous_max_wpm: 225, max_wpm: 250 });
      expect(progression?.bonus_transaction).toMatchObject({ amount: 50, source: 'speed_progression', balance_after: 950 });
      expect(free_comment_granted).toBe(true);

      const account = await t.store.getAccount('reader-1');
      expect(account).toMatchObject({ accumulated_xp: 950, spendable_xp: 950, max_wpm: 250, current_wpm: 200 });
      expect(await t.store.getCommentCredits('reader-1', 'article-1')).toBe(1);
    });

    it('should award exactly 1000 XP at the 250 WPM baseline', async () => {
      const wide = await createTestEconomy({ speed: { initialMaxWpm: 300 } });
      wide.content.set('article-1', ARTICLE);
      await fundedAccount(wide.economy, 'reader-2', 0);

      const result = await wide.economy.quizzes.recordQuizAttempt('reader-2', 'article-1', 100, 250);
      expect(result.success && result.data.reward.xp_awarded).toBe(1000);
      expect(result.success && result.data.progression).toBeNull();
      expect((await wide.store.getAccount('reader-2'))?.spendable_xp).toBe(1000);
    });

    it('should record a failed attempt without paying', async () => {
      const result = await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 50, 200);
      expect(result.success).toBe(true);
      if (!result.success) return;

      expect(result.data.attempt).toMatchObject({ attempt_number: 1, passed: false, xp_awarded: 0, is_perfect: false });
      expect(result.data.reward_transaction).toBeNull();
      expect(result.data.progression).toBeNull();
      expect(await t.store.listTransactions('reader-1')).toHaveLength(0);
      expect(await t.economy.quizzes.hasPassed('reader-1', 'article-1')).toBe(false);
    });

    it('should number attempts per content and halve rewards on retries', async () => {
      const first = await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 80, 200);
      const second = await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 100, 225);

      expect(first.success && first.data.attempt.attempt_number).toBe(1);
      expect(first.success && first.data.reward.xp_awarded).toBe(512);
      expect(second.success && second.data.attempt.attempt_number).toBe(2);
      expect(second.success && second.data.reward.xp_awarded).toBe(450);
      // retries never ratchet
      expect(second.success && second.data.progression).toBeNull();
      expect((await t.store.getAccount('reader-1'))?.max_wpm).toBe(225);
    });

    it('should number attempts on different content independently', async () => {
      t.content.set('article-2', { word_count: 100, letter_count: 450, reading_level: 5 });
      await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 70, 200);
      const other = await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-2', 70, 200);
      expect(other.success && other.data.attempt.attempt_number).toBe(1);
    });

    it('should not ratchet a perfect first attempt below max speed', async () => {
      const result = await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 100, 200);
      expect(result.success && result.data.progression).toBeNull();
      expect(result.success && result.data.free_comment_granted).toBe(true);
    });

    it('should pay a speed above the unlocked maximum without ratcheting', async () => {
      const result = await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 100, 250);
      expect(result.success).toBe(true);
      if (!result.success) return;

      // 1000 * (250/250 * 0.8) = 800, perfect bonus 200
      expect(result.data.attempt).toMatchObject({ attempt_number: 1, wpm_used: 250, xp_awarded: 1000, passed: true });
      expect(result.data.progression).toBeNull();
      expect(result.data.free_comment_granted).toBe(true);
      expect(await t.store.getAccount('reader-1')).toMatchObject({ spendable_xp: 1000, max_wpm: 225 });
    });

    it('should trim padded ids before recording', async () => {
      const result = await t.economy.quizzes.recordQuizAttempt(' reader-1 ', ' article-1 ', 80, 200);
      expect(result.success && result.data.attempt).toMatchObject({ account_id: 'reader-1', content_id: 'article-1' });
      expect((await t.store.getAccount('reader-1'))?.spendable_xp).toBe(512);
    });

    it('should use letter counts when the deployment measures letters', async () => {
      const letters = await createTestEconomy({ xp: { lengthMetric: 'letters' } });
      letters.content.set('article-1', ARTICLE);
      await fundedAccount(letters.economy, 'reader-3', 0);

      const result = await letters.economy.quizzes.recordQuizAttempt('reader-3', 'article-1', 100, 200);
      // 5000 * (200/250 * 0.8) = 3200, perfect bonus 800
      expect(result.success && result.data.reward.xp_awarded).toBe(4000);
    });
  });

  describe('Rejections', () => {
    it('should report unknown content as NOT_FOUND', async () => {
      const result = await t.economy.quizzes.recordQuizAttempt('reader-1', 'missing', 90, 200);
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('NOT_FOUND');
    });

    it('should reject an out-of-range score before calling the content service', async () => {
      const result = await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 120, 200);
      expect(result.success).toBe(false);
      expect(t.content.calls).toBe(0);
    });

    it('should write nothing when the request was aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const result = await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 100, 225, {
        signal: controller.signal,
      });
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('ABORTED');
      expect(await t.store.listQuizAttempts('reader-1')).toHaveLength(0);
      expect((await t.store.getAccount('reader-1'))?.max_wpm).toBe(225);
    });
  });

  describe('Collaborator timeouts', () => {
    it('should time out a hanging content lookup without touching the ledger', async () => {
      const store = new MemoryLedgerStore({ lockTimeoutMs: 1000 });
      const economy = await createEconomy({
        store,
        content: new HangingContentProvider(),
        config: testConfig({ external: { timeoutMs: 20 } }),
      });
      await fundedAccount(economy, 'reader-1', 0);

      const result = await economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 100, 225);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('EXTERNAL_TIMEOUT');
        expect(result.error.message).toBe('content metrics lookup timed out after 20ms');
      }
      expect(await store.listQuizAttempts('reader-1')).toHaveLength(0);
    });

    it('should record an asynchronously graded attempt', async () => {
      const grade = Promise.resolve({ score_pct: 100, wpm_used: 225 });
      const result = await t.economy.quizzes.recordGradedAttempt('reader-1', 'article-1', grade);
      expect(result.success && result.data.reward.xp_awarded).toBe(900);
    });

    it('should time out a grade that never arrives', async () => {
      const quick = await createTestEconomy({ external: { timeoutMs: 20 } }, new FakeContentProvider().set('article-1', ARTICLE));
      await fundedAccount(quick.economy, 'reader-1', 0);

      const result = await quick.economy.quizzes.recordGradedAttempt(
        'reader-1',
        'article-1',
        new Promise(() => undefined)
      );
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.message).toBe('quiz grading timed out after 20ms');
      expect(await quick.store.listQuizAttempts('reader-1')).toHaveLength(0);
    });
  });

  describe('History', () => {
    it('should list attempts oldest first and report a pass', async () => {
      await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 40, 200);
      await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 90, 200);

      const history = await t.economy.quizzes.getAttemptHistory('reader-1', 'article-1');
      expect(history.success && history.data.map((a) => [a.attempt_number, a.passed])).toEqual([
        [1, false],
        [2, true],
      ]);
      expect(await t.economy.quizzes.hasPassed('reader-1', 'article-1')).toBe(true);
    });
  });
});

describe('SpeedProgressionService', () => {
  let t: TestEconomy;

  beforeEach(async () => {
    t = await createTestEconomy();
    t.content.set('article-1', ARTICLE);
    await fundedAccount(t.economy, 'reader-1', 0);
  });

  it('should let a reader pick any speed up to the maximum', async () => {
    const ok = await t.economy.speed.setCurrentWpm('reader-1', 225);
    expect(ok.success && ok.data.current_wpm).toBe(225);

    const tooFast = await t.economy.speed.setCurrentWpm('reader-1', 226);
    expect(tooFast.success).toBe(false);
    if (!tooFast.success) expect(tooFast.error.code).toBe('VALIDATION_ERROR');
  });

  it('should report the next maximum', async () => {
    await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 100, 225);
    const profile = await t.economy.speed.getSpeedProfile('reader-1');
    expect(profile).toEqual({ success: true, data: { current_wpm: 200, max_wpm: 250, next_max_wpm: 275 } });
  });

  it('should back off from the last passing speed after failures', async () => {
    await t.economy.quizzes.recordQuizAttempt('reader-1', 'article-1', 100, 225);

    const twoFailures = await t.economy.speed.getRecommendedWpm('reader-1', 2);
    expect(twoFailures).toEqual({ success: true, data: 175 });

    const manyFailures = await t.economy.speed.getRecommendedWpm('reader-1', 10);
    expect(manyFailures).toEqual({ success: true, data: 125 });
  });

  it('should never recommend below the floor', async () => {
    const result = await t.economy.speed.getRecommendedWpm('reader-1', 5);
    expect(result).toEqual({ success: true, data: 100 });
  });
});
