/**
 * Economy Services Index
 *
 * Every service mutates balances only through the TransactionManager, inside
 * one account critical section per operation.
 */

export { TransactionManager, throwIfAborted } from './TransactionManager';
export {
  calculateReward,
  calculateLevel,
  selectLengthMetric,
  applyRate,
  LEVEL_THRESHOLDS,
  type RewardResult,
  type RewardBreakdown,
} from './XPCalculationEngine';
export { SpeedProgressionService, qualifiesForRatchet, type SpeedProfile, type ProgressionOutcome } from './SpeedProgressionService';
export {
  QuizAttemptService,
  type ContentMetricsProvider,
  type QuizAttemptOutcome,
  type QuizAttemptOptions,
} from './QuizAttemptService';
export { HttpContentMetricsProvider } from './ContentMetricsClient';
export {
  SocialInteractionService,
  isPositiveInteraction,
  type Affordability,
  type CommentAuthorization,
  type InteractionOutcome,
  type SocialSummary,
} from './SocialInteractionService';
export {
  PremiumFeatureStore,
  allocateBundleCost,
  effectiveBundlePrice,
  type BundleListing,
  type ChunkingProgression,
  type FeatureListing,
} from './PremiumFeatureStore';
export {
  LedgerMonitoringService,
  type AuditReport,
  type AuditSummary,
  type EconomyMetrics,
} from './LedgerMonitoringService';
