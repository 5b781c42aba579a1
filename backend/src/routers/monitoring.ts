/**
 * Monitoring Router (operators only)
 *
 * Ledger audits, flag review, spending freezes and manual adjustments.
 */

import { TRPCError } from '@trpc/server';
import { z } from 'zod';
import { config } from '../config';
import { enqueueAccountAudit } from '../jobs/queues';
import { router, adminProcedure } from '../trpc';
import { unwrapOrThrow } from '../lib/errors/error-handler';
import { accountIdSchema, descriptionSchema, requestIdSchema, xpAmountSchema } from '../lib/validators';

const HOUR_MS = 60 * 60 * 1000;

export const monitoringRouter = router({
  auditAccount: adminProcedure
    .input(z.object({ accountId: accountIdSchema }))
    .mutation(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.monitoring.auditAccount(input.accountId))
    ),

  /**
   * Hand the audit to the worker process instead of running it inline.
   */
  queueAccountAudit: adminProcedure
    .input(z.object({ accountId: accountIdSchema }))
    .mutation(async ({ input }) => {
      if (!config.redis.url) {
        throw new TRPCError({
          code: 'PRECONDITION_FAILED',
          message: 'Background jobs are not configured (REDIS_URL)',
        });
      }
      return { jobId: await enqueueAccountAudit(input.accountId) };
    }),

  runAudit: adminProcedure
    .mutation(async ({ ctx }) =>
      unwrapOrThrow(await ctx.economy.monitoring.runAudit())
    ),

  flags: adminProcedure
    .input(z.object({ accountId: accountIdSchema.optional() }).optional())
    .query(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.monitoring.listFlags(input?.accountId))
    ),

  freeze: adminProcedure
    .input(z.object({ accountId: accountIdSchema, reason: descriptionSchema }))
    .mutation(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.monitoring.freezeAccount(input.accountId, input.reason))
    ),

  unfreeze: adminProcedure
    .input(z.object({ accountId: accountIdSchema }))
    .mutation(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.monitoring.unfreezeAccount(input.accountId))
    ),

  economyMetrics: adminProcedure
    .input(z.object({ sinceHours: z.number().int().min(1).max(24 * 365).default(24) }).optional())
    .query(async ({ ctx, input }) => {
      const since = new Date(Date.now() - (input?.sinceHours ?? 24) * HOUR_MS);
      return unwrapOrThrow(await ctx.economy.monitoring.getEconomyMetrics(since));
    }),

  /**
   * Credit XP by hand. Goes through the ledger like any other earn.
   */
  grantXP: adminProcedure
    .input(z.object({
      accountId: accountIdSchema,
      amount: xpAmountSchema,
      description: descriptionSchema,
      requestId: requestIdSchema.optional(),
    }))
    .mutation(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.transactions.earn(
        input.accountId,
        input.amount,
        'admin_adjustment',
        input.description,
        { requestId: input.requestId, signal: ctx.signal }
      ))
    ),
});
