/**
 * Worker Runtime
 *
 * Dedicated long-lived process for background jobs. Registers the
 * maintenance worker and the repeatable ledger audit.
 *
 * Run with: `tsx backend/src/jobs/workers.ts`
 */

import { config } from '../config';
import { createEconomy } from '../economy';
import { GracefulShutdown } from '../lib/shutdown';
import { workerLogger } from '../logger';
import { HttpContentMetricsProvider } from '../services';
import { closeQueues, createWorker, scheduleLedgerAudit } from './queues';
import { createMaintenanceProcessor, type MaintenanceJobResult } from './ledger-audit-worker';

async function startWorkers(): Promise<void> {
  workerLogger.info('Starting worker runtime');

  const economy = await createEconomy({
    content: new HttpContentMetricsProvider(config.external.contentServiceUrl),
  });

  const maintenance = createWorker<unknown, MaintenanceJobResult>(
    'maintenance',
    createMaintenanceProcessor(economy),
    { concurrency: 1 } // One audit at a time
  );

  maintenance.on('failed', (job, err) => {
    workerLogger.error({ jobId: job?.id, jobName: job?.name, err }, 'Maintenance job failed');
  });

  await scheduleLedgerAudit();

  const shutdown = new GracefulShutdown();
  shutdown.register('maintenanceWorker', 10, () => maintenance.close());
  shutdown.register('queues', 20, closeQueues);
  shutdown.register('economy', 30, () => economy.close());
  shutdown.setup();

  workerLogger.info({ auditEveryMs: config.monitoring.auditEveryMs }, 'Worker runtime started');
}

startWorkers().catch((err) => {
  workerLogger.fatal({ err }, 'Fatal error starting workers');
  process.exit(1);
});
