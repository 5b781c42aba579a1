/**
 * Features Router
 *
 * Premium feature catalog and XP purchases.
 */

import { z } from 'zod';
import { router, protectedProcedure, publicProcedure } from '../trpc';
import { unwrapOrThrow } from '../lib/errors/error-handler';

const featureId = z.string().trim().min(1).max(64);

export const featuresRouter = router({
  catalog: publicProcedure
    .query(({ ctx }) => ({
      features: ctx.economy.catalog.listFeatures(),
      bundles: ctx.economy.catalog.listBundles(),
    })),

  list: protectedProcedure
    .query(async ({ ctx }) =>
      unwrapOrThrow(await ctx.economy.features.listFeatures(ctx.accountId))
    ),

  bundles: protectedProcedure
    .query(async ({ ctx }) =>
      unwrapOrThrow(await ctx.economy.features.listBundles(ctx.accountId))
    ),

  owned: protectedProcedure
    .query(async ({ ctx }) =>
      unwrapOrThrow(await ctx.economy.features.getPurchases(ctx.accountId))
    ),

  owns: protectedProcedure
    .input(z.object({ featureId }))
    .query(async ({ ctx, input }) => ({
      owned: unwrapOrThrow(await ctx.economy.features.ownsFeature(ctx.accountId, input.featureId)),
    })),

  chunkingProgression: protectedProcedure
    .query(async ({ ctx }) =>
      unwrapOrThrow(await ctx.economy.features.getChunkingProgression(ctx.accountId))
    ),

  purchase: protectedProcedure
    .input(z.object({ featureId }))
    .mutation(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.features.purchaseFeature(ctx.accountId, input.featureId, { signal: ctx.signal }))
    ),

  purchaseBundle: protectedProcedure
    .input(z.object({ bundleId: featureId }))
    .mutation(async ({ ctx, input }) =>
      unwrapOrThrow(await ctx.economy.features.purchaseBundle(ctx.accountId, input.bundleId, { signal: ctx.signal }))
    ),
});
