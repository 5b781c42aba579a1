/**
 * HTTP Application Tests
 *
 * Drives the Hono app through app.request(); nothing listens on a port.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import { createApp } from '../../src/app';
import type { RequestIdVariables } from '../../src/middleware/request-id';
import { createTestEconomy, fundedAccount, type TestEconomy } from '../helpers';

describe('HTTP app', () => {
  let t: TestEconomy;
  let app: Hono<{ Variables: RequestIdVariables }>;

  beforeEach(async () => {
    t = await createTestEconomy();
    app = createApp(t.economy);
  });

  it('should answer liveness checks', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', ledger: 'memory', environment: 'test' });
  });

  it('should echo a caller-supplied request id', async () => {
    const res = await app.request('/health', { headers: { 'X-Request-Id': 'req-from-gateway' } });
    expect(res.headers.get('x-request-id')).toBe('req-from-gateway');
  });

  it('should set security headers', async () => {
    const res = await app.request('/health');
    expect(res.headers.get('x-frame-options')).toBe('DENY');
    expect(res.headers.get('x-content-type-options')).toBe('nosniff');
  });

  it('should resolve the account from the gateway header', async () => {
    await fundedAccount(t.economy, 'reader-1', 120);

    const res = await app.request('/trpc/account.balance', { headers: { 'X-Account-Id': 'reader-1' } });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ result: { data: { accumulated_xp: 120, spendable_xp: 120, level: 2 } } });
  });

  it('should reject account calls without the header', async () => {
    const res = await app.request('/trpc/account.balance');
    expect(res.status).toBe(401);
  });

  it('should run mutations over POST', async () => {
    await fundedAccount(t.economy, 'reader-1', 100);

    const res = await app.request('/trpc/features.purchase', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Account-Id': 'reader-1' },
      body: JSON.stringify({ featureId: 'theme_sepia' }),
    });
    expect(res.status).toBe(200);
    expect((await t.store.getAccount('reader-1'))?.spendable_xp).toBe(60);
  });

  it('should expose Prometheus metrics', async () => {
    const res = await app.request('/metrics');
    expect(res.status).toBe(200);
    expect(await res.text()).toContain('# TYPE');
  });
});
