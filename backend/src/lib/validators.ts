import { z } from 'zod';
import { ValidationError } from './errors';

const identifier = z.string().trim().min(1).max(128);

export const accountIdSchema = identifier;
export const contentIdSchema = identifier;
export const commentIdSchema = identifier;
export const requestIdSchema = identifier;
export const featureIdSchema = z.string().regex(/^[a-z0-9_]+$/).max(64);

export const xpAmountSchema = z.number().int().positive().max(1_000_000_000);
export const descriptionSchema = z.string().trim().min(1).max(500);

export const earnSourceSchema = z.enum([
  'quiz_completion',
  'speed_progression',
  'interaction_received',
  'admin_adjustment',
]);

export const spendPurposeSchema = z.enum([
  'comment_post',
  'comment_reply',
  'interaction_given',
  'report_filed',
  'feature_purchase',
  'bundle_purchase',
]);

export const scorePctSchema = z.number().finite().min(0).max(100);
export const wpmSchema = z.number().int().positive().max(5000);

export const rewardInputSchema = z.object({
  lengthMetric: z.number().finite().nonnegative(),
  readingLevel: z.number().finite().nonnegative(),
  scorePct: scorePctSchema,
  wpmUsed: z.number().finite().positive(),
  attemptNumber: z.number().int().min(1),
});

export const contentMetricsSchema = z.object({
  word_count: z.number().int().nonnegative(),
  letter_count: z.number().int().nonnegative(),
  reading_level: z.number().finite().nonnegative(),
});

export const quizGradeSchema = z.object({
  score_pct: scorePctSchema,
  wpm_used: wpmSchema,
});

export const interactionKindSchema = z.enum([
  'BRONZE',
  'SILVER',
  'GOLD',
  'REPORT_TROLL',
  'REPORT_BAD',
  'REPORT_SEVERE',
]);

export const authorizeCommentSchema = z.object({
  accountId: accountIdSchema,
  contentId: contentIdSchema,
  commentId: commentIdSchema,
  isReply: z.boolean().default(false),
  requestId: requestIdSchema.optional(),
});

export const recordInteractionSchema = z.object({
  actorId: accountIdSchema,
  commentId: commentIdSchema,
  commentAuthorId: accountIdSchema,
  interaction: interactionKindSchema,
  requestId: requestIdSchema.optional(),
});

export const transactionHistorySchema = z.object({
  type: z.enum(['EARN', 'SPEND']).optional(),
  limit: z.number().int().min(1).max(500).default(50),
});

// ============================================================================
// FEATURE CATALOG FILE
// ============================================================================

export const featureCatalogSchema = z
  .object({
    features: z.array(
      z.object({
        id: featureIdSchema,
        name: z.string().min(1),
        description: z.string().default(''),
        price: xpAmountSchema,
        category: z.enum(['fonts', 'chunking', 'smart_features', 'themes']),
        bundle_ids: z.array(featureIdSchema).default([]),
        prerequisites: z.array(featureIdSchema).default([]),
      })
    ),
    bundles: z.array(
      z.object({
        id: featureIdSchema,
        name: z.string().min(1),
        description: z.string().default(''),
        price: xpAmountSchema,
        feature_ids: z.array(featureIdSchema).min(1),
      })
    ),
  })
  .superRefine((catalog, ctx) => {
    const featureIds = new Set(catalog.features.map((f) => f.id));
    if (featureIds.size !== catalog.features.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Duplicate feature id', path: ['features'] });
    }
    catalog.bundles.forEach((bundle, index) => {
      for (const featureId of bundle.feature_ids) {
        if (!featureIds.has(featureId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Bundle references unknown feature '${featureId}'`,
            path: ['bundles', index, 'feature_ids'],
          });
        }
      }
    });
    catalog.features.forEach((feature, index) => {
      for (const prerequisite of feature.prerequisites) {
        if (!featureIds.has(prerequisite)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown prerequisite '${prerequisite}'`,
            path: ['features', index, 'prerequisites'],
          });
        }
      }
    });
  });

export type RewardInput = z.infer<typeof rewardInputSchema>;
export type AuthorizeCommentInput = z.input<typeof authorizeCommentSchema>;
export type RecordInteractionInput = z.infer<typeof recordInteractionSchema>;
export type TransactionHistoryInput = z.input<typeof transactionHistorySchema>;

/**
 * Parse or throw a ValidationError carrying the zod issues.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string = 'input'): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const message = result.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : label}: ${issue.message}`)
    .join('; ');
  throw new ValidationError(`Invalid ${label}: ${message}`, { issues: result.error.issues });
}
