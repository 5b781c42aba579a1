/**
 * Economy Backend Configuration v1.0.0
 *
 * Centralized configuration for the XP economy services.
 * Every tunable (costs, bonuses, thresholds) lives here so pricing
 * adjustments never require a code change.
 */

import 'dotenv/config';
import type { InteractionKind } from './types';

function intFromEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseLengthMetric(raw: string | undefined): 'words' | 'letters' {
  return raw === 'letters' ? 'letters' : 'words';
}

function parseStoreDriver(raw: string | undefined): 'postgres' | 'memory' {
  return raw === 'memory' ? 'memory' : 'postgres';
}

export const config = {
  // Database (PostgreSQL)
  database: {
    url: process.env.DATABASE_URL || '',
    maxConnections: intFromEnv('DATABASE_MAX_CONNECTIONS', 10),
    // Per-statement lock wait inside an account critical section
    lockTimeoutMs: intFromEnv('LEDGER_LOCK_TIMEOUT_MS', 2000),
  },

  // Ledger store driver: postgres in every deployed env, memory for local runs
  ledger: {
    driver: parseStoreDriver(process.env.LEDGER_STORE),
    // Bounded retry for lock contention before TRANSIENT_CONFLICT surfaces
    maxRetries: intFromEnv('LEDGER_MAX_RETRIES', 3),
    retryBaseDelayMs: intFromEnv('LEDGER_RETRY_BASE_DELAY_MS', 25),
    retryMaxDelayMs: intFromEnv('LEDGER_RETRY_MAX_DELAY_MS', 500),
  },

  // Job queues (BullMQ over ioredis)
  redis: {
    url: process.env.REDIS_URL || '',
  },

  // XP earning
  xp: {
    // One canonical reward base per deployment. Never mixed.
    lengthMetric: parseLengthMetric(process.env.XP_LENGTH_METRIC),
    passThresholdPct: 60,
    baselineWpm: 250,
    perfectBonusRate: '0.25',
    diminishingBase: '0.5',
  },

  // Reading speed progression
  speed: {
    initialCurrentWpm: intFromEnv('SPEED_INITIAL_CURRENT_WPM', 200),
    initialMaxWpm: intFromEnv('SPEED_INITIAL_MAX_WPM', 225),
    ratchetStepWpm: intFromEnv('SPEED_RATCHET_STEP_WPM', 25),
    progressionBonusXp: intFromEnv('SPEED_PROGRESSION_BONUS_XP', 50),
    recommendationStepWpm: 25,
    maxRecommendationReductionWpm: 100,
    minRecommendedWpm: 100,
  },

  // Social interaction pricing
  social: {
    commentCost: intFromEnv('SOCIAL_COMMENT_COST', 100),
    replyCost: intFromEnv('SOCIAL_REPLY_COST', 50),
    interactionCosts: {
      BRONZE: intFromEnv('SOCIAL_BRONZE_COST', 5),
      SILVER: intFromEnv('SOCIAL_SILVER_COST', 15),
      GOLD: intFromEnv('SOCIAL_GOLD_COST', 30),
      REPORT_TROLL: intFromEnv('SOCIAL_REPORT_TROLL_COST', 5),
      REPORT_BAD: intFromEnv('SOCIAL_REPORT_BAD_COST', 15),
      REPORT_SEVERE: intFromEnv('SOCIAL_REPORT_SEVERE_COST', 30),
    },
    authorRewardRate: '0.5',
  },

  // Monitoring (detective only)
  monitoring: {
    velocityWindowMs: intFromEnv('MONITOR_VELOCITY_WINDOW_MS', 60 * 60 * 1000),
    velocityThresholdXp: intFromEnv('MONITOR_VELOCITY_THRESHOLD_XP', 5000),
    // Review-only anomaly thresholds; never block or freeze
    maxTransactionsPerMinute: intFromEnv('MONITOR_MAX_TRANSACTIONS_PER_MINUTE', 10),
    maxPurchasesPerDay: intFromEnv('MONITOR_MAX_PURCHASES_PER_DAY', 20),
    largeTransactionXp: intFromEnv('MONITOR_LARGE_TRANSACTION_XP', 5000),
    balanceCeilingXp: intFromEnv('MONITOR_BALANCE_CEILING_XP', 100_000),
    freezeOnViolation: process.env.MONITOR_FREEZE_ON_VIOLATION !== 'false',
    auditEveryMs: intFromEnv('MONITOR_AUDIT_EVERY_MS', 15 * 60 * 1000),
  },

  // Collaborators (content metrics, async quiz grading)
  external: {
    timeoutMs: intFromEnv('EXTERNAL_TIMEOUT_MS', 5000),
    contentServiceUrl: process.env.CONTENT_SERVICE_URL || 'http://localhost:4000',
  },

  // Application
  app: {
    port: parseInt(process.env.PORT || '3000', 10),
    env: process.env.NODE_ENV || 'development',
    isDevelopment: process.env.NODE_ENV === 'development',
    isProduction: process.env.NODE_ENV === 'production',
    isTest: process.env.NODE_ENV === 'test' || process.env.VITEST === 'true',
    allowedOrigins: (process.env.ALLOWED_ORIGINS || '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  },
} as const;

export type AppConfig = typeof config;

// Widened shapes so tests and alternate deployments can inject their own tunables.

export interface XPFormulaConfig {
  lengthMetric: 'words' | 'letters';
  passThresholdPct: number;
  baselineWpm: number;
  perfectBonusRate: string;
  diminishingBase: string;
}

export interface SpeedConfig {
  initialCurrentWpm: number;
  initialMaxWpm: number;
  ratchetStepWpm: number;
  progressionBonusXp: number;
  recommendationStepWpm: number;
  maxRecommendationReductionWpm: number;
  minRecommendedWpm: number;
}

export interface SocialConfig {
  commentCost: number;
  replyCost: number;
  interactionCosts: Record<InteractionKind, number>;
  authorRewardRate: string;
}

export interface MonitoringConfig {
  velocityWindowMs: number;
  velocityThresholdXp: number;
  maxTransactionsPerMinute: number;
  maxPurchasesPerDay: number;
  largeTransactionXp: number;
  balanceCeilingXp: number;
  freezeOnViolation: boolean;
  auditEveryMs: number;
}

export interface EconomyConfig {
  xp: XPFormulaConfig;
  speed: SpeedConfig;
  social: SocialConfig;
  monitoring: MonitoringConfig;
  external: { timeoutMs: number };
  ledger: { maxRetries: number; retryBaseDelayMs: number; retryMaxDelayMs: number };
}

export const economyConfig: EconomyConfig = config;
