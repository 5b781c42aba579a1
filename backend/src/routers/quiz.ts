/**
 * Quiz Router
 *
 * Records graded attempts. Grading itself happens upstream; this router
 * receives the score and the WPM the text was read at.
 */

import { z } from 'zod';
import { router, protectedProcedure, publicProcedure } from '../trpc';
import { unwrapOrThrow } from '../lib/errors/error-handler';
import { contentIdSchema, rewardInputSchema, scorePctSchema, wpmSchema } from '../lib/validators';

export const quizRouter = router({
  submit: protectedProcedure
    .input(z.object({
      contentId: contentIdSchema,
      scorePct: scorePctSchema,
      wpmUsed: wpmSchema,
    }))
    .mutation(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.quizzes.recordQuizAttempt(
        ctx.accountId,
        input.contentId,
        input.scorePct,
        input.wpmUsed,
        { signal: ctx.signal }
      ))
    ),

  history: protectedProcedure
    .input(z.object({ contentId: contentIdSchema.optional() }).optional())
    .query(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.quizzes.getAttemptHistory(ctx.accountId, input?.contentId))
    ),

  hasPassed: protectedProcedure
    .input(z.object({ contentId: contentIdSchema }))
    .query(async ({ ctx, input }) => ({
      passed: await ctx.economy.quizzes.hasPassed(ctx.accountId, input.contentId),
    })),

  /**
   * Pure calculation, nothing is written.
   */
  previewReward: publicProcedure
    .input(rewardInputSchema)
    .query(({ ctx, input }) => unwrapOrThrow(ctx.economy.calculateReward(input))),
});
