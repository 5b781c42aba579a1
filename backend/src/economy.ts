/**
 * Economy composition root.
 *
 * Wires one LedgerStore into every service. The API server, the worker and
 * the tests all build their economy here.
 */

import { economyConfig, type EconomyConfig } from './config';
import { failure } from './lib/errors/error-handler';
import { storeLogger } from './logger';
import {
  FeatureCatalogIndex,
  createLedgerStore,
  loadFeatureCatalog,
  type LedgerStore,
} from './repositories';
import {
  LedgerMonitoringService,
  PremiumFeatureStore,
  QuizAttemptService,
  SocialInteractionService,
  SpeedProgressionService,
  TransactionManager,
  calculateReward,
  type ContentMetricsProvider,
  type RewardResult,
} from './services';
import type { RewardInput } from './lib/validators';
import type { FeatureCatalog, ServiceResult } from './types';

export interface EconomyOptions {
  store?: LedgerStore;
  content: ContentMetricsProvider;
  config?: EconomyConfig;
  catalog?: FeatureCatalog;
  /** Upsert the catalog into the store before serving purchases. */
  syncCatalog?: boolean;
}

export interface Economy {
  store: LedgerStore;
  config: EconomyConfig;
  catalog: FeatureCatalogIndex;
  transactions: TransactionManager;
  speed: SpeedProgressionService;
  quizzes: QuizAttemptService;
  social: SocialInteractionService;
  features: PremiumFeatureStore;
  monitoring: LedgerMonitoringService;
  calculateReward(input: RewardInput): ServiceResult<RewardResult>;
  close(): Promise<void>;
}

export async function createEconomy(options: EconomyOptions): Promise<Economy> {
  const store = options.store ?? createLedgerStore();
  const config = options.config ?? economyConfig;
  const catalog = new FeatureCatalogIndex(options.catalog ?? loadFeatureCatalog());

  if (options.syncCatalog ?? true) {
    await store.syncCatalog(catalog.catalog);
  }

  const transactions = new TransactionManager(store, config);
  const speed = new SpeedProgressionService(store, transactions, config);
  const quizzes = new QuizAttemptService(store, transactions, speed, options.content, config);
  const social = new SocialInteractionService(store, transactions, config);
  const features = new PremiumFeatureStore(store, transactions, catalog);
  const monitoring = new LedgerMonitoringService(store, transactions, config);

  storeLogger.info(
    { driver: store.driver, features: catalog.listFeatures().length, lengthMetric: config.xp.lengthMetric },
    'Economy initialized'
  );

  return {
    store,
    config,
    catalog,
    transactions,
    speed,
    quizzes,
    social,
    features,
    monitoring,
    calculateReward(input: RewardInput): ServiceResult<RewardResult> {
      try {
        return { success: true, data: calculateReward(input, config.xp) };
      } catch (error) {
        return failure(error);
      }
    },
    close: () => store.close(),
  };
}
