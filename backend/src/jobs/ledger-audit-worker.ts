/**
 * Ledger Audit Worker
 *
 * Runs the detective ledger checks off the request path. A failed audit
 * throws so BullMQ records the failure and retries it.
 */

import type { Job } from 'bullmq';
import { z } from 'zod';
import type { Economy } from '../economy';
import { accountIdSchema } from '../lib/validators';
import { workerLogger } from '../logger';
import type { AuditReport, AuditSummary } from '../services/LedgerMonitoringService';
import { MaintenanceJobs } from './queues';

const log = workerLogger.child({ worker: 'ledger-audit' });

const accountAuditPayload = z.object({ accountId: accountIdSchema });

export type MaintenanceJobResult = AuditSummary | AuditReport;

/** The slice of a BullMQ job the processor reads. */
export type MaintenanceJob = Pick<Job, 'id' | 'name' | 'data'>;

export function createMaintenanceProcessor(economy: Economy) {
  return async function processMaintenanceJob(job: MaintenanceJob): Promise<MaintenanceJobResult> {
    switch (job.name) {
      case MaintenanceJobs.LEDGER_AUDIT: {
        const result = await economy.monitoring.runAudit();
        if (!result.success) {
          throw new Error(`Ledger audit failed: ${result.error.message}`);
        }
        log.info({ jobId: job.id, ...result.data }, 'Scheduled ledger audit finished');
        return result.data;
      }

      case MaintenanceJobs.ACCOUNT_AUDIT: {
        const payload = accountAuditPayload.safeParse(job.data);
        if (!payload.success) {
          throw new Error(`Invalid account audit payload: ${payload.error.message}`);
        }
        const result = await economy.monitoring.auditAccount(payload.data.accountId);
        if (!result.success) {
          throw new Error(`Account audit failed: ${result.error.message}`);
        }
        log.info(
          { jobId: job.id, accountId: payload.data.accountId, findings: result.data.findings.length },
          'Account audit finished'
        );
        return result.data;
      }

      default:
        throw new Error(`Unknown maintenance job type: ${job.name}`);
    }
  };
}
