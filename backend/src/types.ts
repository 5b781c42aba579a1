/**
 * XP Economy Type Definitions v1.0.0
 *
 * Row types mirror backend/database/schema.sql column for column.
 * Any drift between types and schema is a bug.
 */

// ============================================================================
// ENUMS (Match CHECK constraints in schema.sql)
// ============================================================================

export type TransactionType = 'EARN' | 'SPEND';

export type EarnSource =
  | 'quiz_completion'
  | 'speed_progression'
  | 'interaction_received'
  | 'admin_adjustment';

export type SpendPurpose =
  | 'comment_post'
  | 'comment_reply'
  | 'interaction_given'
  | 'report_filed'
  | 'feature_purchase'
  | 'bundle_purchase';

export type TransactionCategory = EarnSource | SpendPurpose;

export type PositiveInteraction = 'BRONZE' | 'SILVER' | 'GOLD';
export type ReportInteraction = 'REPORT_TROLL' | 'REPORT_BAD' | 'REPORT_SEVERE';
export type InteractionKind = PositiveInteraction | ReportInteraction;

export const POSITIVE_INTERACTIONS: readonly PositiveInteraction[] = ['BRONZE', 'SILVER', 'GOLD'];

export type FeatureCategory = 'fonts' | 'chunking' | 'smart_features' | 'themes';

export type LengthMetric = 'words' | 'letters';

export type AccountFlagKind =
  | 'NEGATIVE_BALANCE'
  | 'BALANCE_DRIFT'
  | 'ACCUMULATED_DRIFT'
  | 'XP_VELOCITY'
  | 'TRANSACTION_BURST'
  | 'PURCHASE_BURST'
  | 'LARGE_TRANSACTION'
  | 'BALANCE_CEILING';

export type FlagSeverity = 'critical' | 'warning';

// ============================================================================
// CORE DOMAIN TYPES
// ============================================================================

export interface Account {
  id: string;
  accumulated_xp: number;
  spendable_xp: number;
  current_wpm: number;
  max_wpm: number;
  spending_frozen: boolean;
  frozen_reason: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface XPTransaction {
  id: string; // ULID
  account_id: string;
  type: TransactionType;
  amount: number; // positive for EARN, negative for SPEND
  source: TransactionCategory;
  description: string;
  balance_after: number;
  request_id: string | null;
  quiz_attempt_id: string | null;
  comment_id: string | null;
  feature_purchase_ref: string | null;
  created_at: Date;
}

export interface QuizAttempt {
  id: string;
  account_id: string;
  content_id: string;
  attempt_number: number;
  score_pct: number;
  wpm_used: number;
  xp_awarded: number;
  is_perfect: boolean;
  passed: boolean;
  created_at: Date;
}

export interface FeaturePurchase {
  id: string;
  account_id: string;
  feature_id: string;
  cost_paid: number;
  transaction_id: string;
  bundle_id: string | null;
  created_at: Date;
}

/**
 * One row per comment the account was allowed to post. A free row spent a
 * perfect-score credit instead of XP.
 */
export interface CommentAuthorizationRecord {
  id: string;
  account_id: string;
  comment_id: string;
  content_id: string;
  is_reply: boolean;
  free: boolean;
  cost: number;
  transaction_id: string | null;
  request_id: string | null;
  created_at: Date;
}

/**
 * At most one per (actor, comment).
 */
export interface CommentInteraction {
  id: string;
  account_id: string;
  comment_id: string;
  comment_author_id: string;
  interaction: InteractionKind;
  cost: number;
  transaction_id: string;
  request_id: string | null;
  created_at: Date;
}

export interface FeatureCatalogEntry {
  id: string;
  name: string;
  description: string;
  price: number;
  category: FeatureCategory;
  bundle_ids: string[];
  prerequisites: string[];
}

export interface FeatureBundle {
  id: string;
  name: string;
  description: string;
  price: number;
  feature_ids: string[];
}

export interface FeatureCatalog {
  features: FeatureCatalogEntry[];
  bundles: FeatureBundle[];
}

export interface AccountFlag {
  id: string;
  account_id: string;
  kind: AccountFlagKind;
  severity: FlagSeverity;
  details: Record<string, unknown>;
  created_at: Date;
}

/**
 * Content metrics supplied by the content subsystem (read-only input).
 */
export interface ContentMetrics {
  word_count: number;
  letter_count: number;
  reading_level: number;
}

/**
 * Result of an externally graded quiz.
 */
export interface QuizGrade {
  score_pct: number;
  wpm_used: number;
}

// ============================================================================
// SERVICE OUTPUTS
// ============================================================================

export interface Balance {
  accumulated_xp: number;
  spendable_xp: number;
  level: number;
}

export interface TransactionRefs {
  requestId?: string;
  quizAttemptId?: string;
  commentId?: string;
  featurePurchaseRef?: string;
  signal?: AbortSignal;
}

// ============================================================================
// SERVICE RESULT TYPE
// ============================================================================

export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: ServiceError };

export interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// ERROR CODES CATALOG
//
// Frontend uses code for programmatic handling, message for user display.
// ============================================================================

export const ErrorCodes = {
  // --- Ledger --------------------------------------------------------------
  INSUFFICIENT_XP: 'INSUFFICIENT_XP',
  ALREADY_OWNED: 'ALREADY_OWNED',
  DUPLICATE_INTERACTION: 'DUPLICATE_INTERACTION',
  TRANSIENT_CONFLICT: 'TRANSIENT_CONFLICT',
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
  ACCOUNT_FROZEN: 'ACCOUNT_FROZEN',

  // --- Social / store -------------------------------------------------------
  COMMENT_LOCKED: 'COMMENT_LOCKED',
  FEATURE_NOT_FOUND: 'FEATURE_NOT_FOUND',

  // --- Collaborators ----------------------------------------------------------
  EXTERNAL_TIMEOUT: 'EXTERNAL_TIMEOUT',
  ABORTED: 'ABORTED',

  // --- General -------------------------------------------------------------
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status for each error code (used by the API layer).
 */
export const ErrorHttpStatus: Record<ErrorCode, number> = {
  [ErrorCodes.INSUFFICIENT_XP]: 402,
  [ErrorCodes.ALREADY_OWNED]: 409,
  [ErrorCodes.DUPLICATE_INTERACTION]: 409,
  [ErrorCodes.TRANSIENT_CONFLICT]: 503,
  [ErrorCodes.INVARIANT_VIOLATION]: 500,
  [ErrorCodes.ACCOUNT_FROZEN]: 423,
  [ErrorCodes.COMMENT_LOCKED]: 403,
  [ErrorCodes.FEATURE_NOT_FOUND]: 404,
  [ErrorCodes.EXTERNAL_TIMEOUT]: 504,
  [ErrorCodes.ABORTED]: 499,
  [ErrorCodes.VALIDATION_ERROR]: 400,
  [ErrorCodes.NOT_FOUND]: 404,
  [ErrorCodes.INTERNAL_ERROR]: 500,
};
