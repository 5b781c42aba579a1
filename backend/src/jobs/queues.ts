/**
 * BullMQ Queue Configuration
 *
 * One failure domain: `maintenance`, which carries the periodic ledger
 * audit and on-demand single-account audits. Handlers are idempotent by
 * construction (an audit only reads balances and appends flags), so
 * at-least-once delivery is safe.
 */

import { Queue, Worker, type Job, type QueueOptions, type WorkerOptions } from 'bullmq';
import { Redis } from 'ioredis';
import { config } from '../config';

// ============================================================================
// REDIS CONNECTION
// ============================================================================

/**
 * BullMQ requires an ioredis connection with maxRetriesPerRequest = null
 * for blocking worker commands.
 */
function createRedisConnection(): Redis {
  if (!config.redis.url) {
    throw new Error('Redis configuration missing (REDIS_URL required for BullMQ)');
  }

  return new Redis(config.redis.url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

// ============================================================================
// QUEUE DEFINITIONS
// ============================================================================

export type QueueName = 'maintenance';

export const MaintenanceJobs = {
  LEDGER_AUDIT: 'ledger_audit',
  ACCOUNT_AUDIT: 'account_audit',
} as const;

export type MaintenanceJobName = (typeof MaintenanceJobs)[keyof typeof MaintenanceJobs];

interface QueueConfig {
  name: QueueName;
  defaultJobOptions: QueueOptions['defaultJobOptions'];
}

export const QUEUE_CONFIGS: Record<QueueName, QueueConfig> = {
  maintenance: {
    name: 'maintenance',
    defaultJobOptions: {
      attempts: 2,
      backoff: {
        type: 'fixed',
        delay: 60000, // 1 minute fixed delay
      },
      removeOnComplete: {
        age: 24 * 60 * 60, // Keep completed jobs for 24 hours
        count: 100,
      },
      removeOnFail: {
        age: 7 * 24 * 60 * 60, // Keep failed jobs for 7 days
      },
    },
  },
};

// ============================================================================
// QUEUE FACTORY
// ============================================================================

const queueInstances = new Map<QueueName, Queue>();

/**
 * Get or create a BullMQ queue, one instance per name
 */
export function getQueue(queueName: QueueName): Queue {
  const existing = queueInstances.get(queueName);
  if (existing) {
    return existing;
  }

  const queue = new Queue(queueName, {
    connection: createRedisConnection(),
    defaultJobOptions: QUEUE_CONFIGS[queueName].defaultJobOptions,
  });

  queueInstances.set(queueName, queue);
  return queue;
}

/**
 * Register the repeatable full-ledger audit. Re-registering with the same
 * jobId and interval is a no-op in BullMQ.
 */
export async function scheduleLedgerAudit(everyMs: number = config.monitoring.auditEveryMs): Promise<void> {
  await getQueue('maintenance').add(
    MaintenanceJobs.LEDGER_AUDIT,
    {},
    { repeat: { every: everyMs }, jobId: MaintenanceJobs.LEDGER_AUDIT }
  );
}

export async function enqueueAccountAudit(accountId: string): Promise<string | undefined> {
  const job = await getQueue('maintenance').add(MaintenanceJobs.ACCOUNT_AUDIT, { accountId });
  return job.id;
}

export async function closeQueues(): Promise<void> {
  await Promise.all([...queueInstances.values()].map((queue) => queue.close()));
  queueInstances.clear();
}

// ============================================================================
// WORKER FACTORY
// ============================================================================

/**
 * Create a BullMQ worker for a queue.
 * Workers run in their own process (workers.ts), never in the API server.
 */
export function createWorker<T, R>(
  queueName: QueueName,
  processor: (job: Job<T, R>) => Promise<R>,
  options?: Partial<WorkerOptions>
): Worker<T, R> {
  return new Worker<T, R>(queueName, processor, {
    connection: createRedisConnection(),
    ...options,
  });
}
