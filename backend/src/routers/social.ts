/**
 * Social Router
 *
 * Comment authorization and paid interactions. Clients pass a requestId
 * so a retried call never charges twice.
 */

import { z } from 'zod';
import { router, protectedProcedure, publicProcedure } from '../trpc';
import { unwrapOrThrow } from '../lib/errors/error-handler';
import {
  accountIdSchema,
  commentIdSchema,
  contentIdSchema,
  interactionKindSchema,
  requestIdSchema,
} from '../lib/validators';

export const socialRouter = router({
  costs: publicProcedure
    .query(({ ctx }) => ctx.economy.social.getInteractionCosts()),

  authorizeComment: protectedProcedure
    .input(z.object({
      contentId: contentIdSchema,
      commentId: commentIdSchema,
      isReply: z.boolean().default(false),
      requestId: requestIdSchema.optional(),
    }))
    .mutation(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.social.authorizeComment(
        { ...input, accountId: ctx.accountId },
        ctx.signal
      ))
    ),

  interact: protectedProcedure
    .input(z.object({
      commentId: commentIdSchema,
      commentAuthorId: accountIdSchema,
      interaction: interactionKindSchema,
      requestId: requestIdSchema.optional(),
    }))
    .mutation(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.social.recordInteraction(
        { ...input, actorId: ctx.accountId },
        ctx.signal
      ))
    ),

  canAffordComment: protectedProcedure
    .input(z.object({ contentId: contentIdSchema, isReply: z.boolean().default(false) }))
    .query(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.social.canAffordComment(ctx.accountId, input.contentId, input.isReply))
    ),

  canAffordInteraction: protectedProcedure
    .input(z.object({ interaction: interactionKindSchema }))
    .query(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.social.canAffordInteraction(ctx.accountId, input.interaction))
    ),

  summary: protectedProcedure
    .query(async ({ ctx }) =>
      unwrapOrThrow(await ctx.economy.social.getSocialSummary(ctx.accountId))
    ),
});
