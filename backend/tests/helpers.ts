/**
 * Shared fixtures: an in-memory economy with a scripted content provider.
 */

import { economyConfig, type EconomyConfig } from '../src/config';
import { createEconomy, type Economy } from '../src/economy';
import { NotFoundError } from '../src/lib/errors';
import { MemoryLedgerStore } from '../src/repositories';
import type { ContentMetricsProvider } from '../src/services/QuizAttemptService';
import type { ContentMetrics } from '../src/types';

export class FakeContentProvider implements ContentMetricsProvider {
  private readonly metrics = new Map<string, ContentMetrics>();
  calls = 0;

  set(contentId: string, metrics: ContentMetrics): this {
    this.metrics.set(contentId, metrics);
    return this;
  }

  async getMetrics(contentId: string): Promise<ContentMetrics> {
    this.calls++;
    const metrics = this.metrics.get(contentId);
    if (!metrics) {
      throw new NotFoundError(`Content with id '${contentId}' not found`);
    }
    return metrics;
  }
}

/** Never settles; exercises collaborator timeouts. */
export class HangingContentProvider implements ContentMetricsProvider {
  getMetrics(): Promise<ContentMetrics> {
    return new Promise<ContentMetrics>(() => undefined);
  }
}

export interface ConfigOverrides {
  xp?: Partial<EconomyConfig['xp']>;
  speed?: Partial<EconomyConfig['speed']>;
  social?: Partial<EconomyConfig['social']>;
  monitoring?: Partial<EconomyConfig['monitoring']>;
  external?: Partial<EconomyConfig['external']>;
  ledger?: Partial<EconomyConfig['ledger']>;
}

export function testConfig(overrides: ConfigOverrides = {}): EconomyConfig {
  return {
    xp: { ...economyConfig.xp, lengthMetric: 'words', ...overrides.xp },
    speed: { ...economyConfig.speed, ...overrides.speed },
    social: { ...economyConfig.social, ...overrides.social },
    monitoring: { ...economyConfig.monitoring, ...overrides.monitoring },
    external: { ...economyConfig.external, timeoutMs: 200, ...overrides.external },
    ledger: { ...economyConfig.ledger, retryBaseDelayMs: 1, retryMaxDelayMs: 5, ...overrides.ledger },
  };
}

export interface TestEconomy {
  economy: Economy;
  store: MemoryLedgerStore;
  content: FakeContentProvider;
}

export async function createTestEconomy(
  overrides: ConfigOverrides = {},
  content: FakeContentProvider = new FakeContentProvider()
): Promise<TestEconomy> {
  const store = new MemoryLedgerStore({ lockTimeoutMs: 1000 });
  const economy = await createEconomy({ store, content, config: testConfig(overrides) });
  return { economy, store, content };
}

/**
 * Register an account and credit it through the ledger.
 */
export async function fundedAccount(economy: Economy, accountId: string, xp: number): Promise<void> {
  const registered = await economy.transactions.registerAccount(accountId);
  if (!registered.success) throw new Error(registered.error.message);
  if (xp > 0) {
    const earned = await economy.transactions.earn(accountId, xp, 'admin_adjustment', 'Test funding');
    if (!earned.success) throw new Error(earned.error.message);
  }
}
