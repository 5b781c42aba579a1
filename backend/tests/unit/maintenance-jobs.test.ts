/**
 * Maintenance Job Processor Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createMaintenanceProcessor, type MaintenanceJob } from '../../src/jobs/ledger-audit-worker';
import { MaintenanceJobs } from '../../src/jobs/queues';
import { createTestEconomy, fundedAccount, type TestEconomy } from '../helpers';

function job(name: string, data: unknown = {}): MaintenanceJob {
  return { id: `job-${name}`, name, data };
}

describe('createMaintenanceProcessor', () => {
  let t: TestEconomy;

  beforeEach(async () => {
    t = await createTestEconomy();
    await fundedAccount(t.economy, 'reader-1', 100);
    await fundedAccount(t.economy, 'reader-2', 100);
  });

  it('should run the full ledger audit', async () => {
    t.store.corruptBalances('reader-2', { spendable_xp: 90 });
    const run = createMaintenanceProcessor(t.economy);

    expect(await run(job(MaintenanceJobs.LEDGER_AUDIT))).toEqual({
      accounts_checked: 2,
      accounts_flagged: 1,
      findings: 1,
      frozen_accounts: 1,
      errors: 0,
    });
  });

  it('should audit a single account', async () => {
    const run = createMaintenanceProcessor(t.economy);
    const report = await run(job(MaintenanceJobs.ACCOUNT_AUDIT, { accountId: 'reader-1' }));
    expect(report).toEqual({ account_id: 'reader-1', findings: [], frozen: false, newly_frozen: false });
  });

  it('should fail an account audit with a bad payload', async () => {
    const run = createMaintenanceProcessor(t.economy);
    await expect(run(job(MaintenanceJobs.ACCOUNT_AUDIT, { account: 'reader-1' }))).rejects.toThrow(
      /^Invalid account audit payload/
    );
  });

  it('should fail an account audit for an unknown account', async () => {
    const run = createMaintenanceProcessor(t.economy);
    await expect(run(job(MaintenanceJobs.ACCOUNT_AUDIT, { accountId: 'ghost' }))).rejects.toThrow(
      "Account audit failed: Account with id 'ghost' not found"
    );
  });

  it('should reject unknown job types', async () => {
    const run = createMaintenanceProcessor(t.economy);
    await expect(run(job('reindex'))).rejects.toThrow('Unknown maintenance job type: reindex');
  });
});
