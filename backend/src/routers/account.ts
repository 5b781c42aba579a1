/**
 * Account Router
 *
 * Balances, ledger history and reading speed for the calling account.
 */

import { z } from 'zod';
import { router, protectedProcedure } from '../trpc';
import { unwrapOrThrow } from '../lib/errors/error-handler';
import { transactionHistorySchema, wpmSchema } from '../lib/validators';

export const accountRouter = router({
  /**
   * Idempotent: registering twice returns the existing account.
   */
  register: protectedProcedure
    .mutation(async ({ ctx }) =>
      unwrapOrThrow(await ctx.economy.transactions.registerAccount(ctx.accountId))
    ),

  me: protectedProcedure
    .query(async ({ ctx }) =>
      unwrapOrThrow(await ctx.economy.transactions.getAccount(ctx.accountId))
    ),

  balance: protectedProcedure
    .query(async ({ ctx }) =>
      unwrapOrThrow(await ctx.economy.transactions.getBalance(ctx.accountId))
    ),

  history: protectedProcedure
    .input(transactionHistorySchema.optional())
    .query(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.transactions.getTransactionHistory(ctx.accountId, input ?? {}))
    ),

  speedProfile: protectedProcedure
    .query(async ({ ctx }) =>
      unwrapOrThrow(await ctx.economy.speed.getSpeedProfile(ctx.accountId))
    ),

  setCurrentWpm: protectedProcedure
    .input(z.object({ wpm: wpmSchema }))
    .mutation(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.speed.setCurrentWpm(ctx.accountId, input.wpm))
    ),

  recommendedWpm: protectedProcedure
    .input(z.object({ failedAttempts: z.number().int().min(0).max(100) }))
    .query(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.speed.getRecommendedWpm(ctx.accountId, input.failedAttempts))
    ),
});
