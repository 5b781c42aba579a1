import type { Env, Hono } from 'hono';
import { Registry, Histogram, Counter, Gauge, collectDefaultMetrics } from 'prom-client';

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [registry],
});

const xpTransactionsTotal = new Counter({
  name: 'xp_transactions_total',
  help: 'Committed ledger transactions',
  labelNames: ['type', 'source'],
  registers: [registry],
});

const xpAmountTotal = new Counter({
  name: 'xp_amount_total',
  help: 'Absolute XP moved by committed transactions',
  labelNames: ['type'],
  registers: [registry],
});

const ledgerOperationDuration = new Histogram({
  name: 'ledger_operation_duration_seconds',
  help: 'Duration of account critical sections including retries',
  labelNames: ['outcome'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 2.5],
  registers: [registry],
});

const ledgerRejectionsTotal = new Counter({
  name: 'ledger_rejections_total',
  help: 'Economy operations rejected, by error code',
  labelNames: ['code'],
  registers: [registry],
});

const ledgerFlagsTotal = new Counter({
  name: 'ledger_flags_total',
  help: 'Monitoring findings raised, by kind',
  labelNames: ['kind', 'severity'],
  registers: [registry],
});

const ledgerAuditRunsTotal = new Counter({
  name: 'ledger_audit_runs_total',
  help: 'Completed ledger audit sweeps',
  registers: [registry],
});

const frozenAccounts = new Gauge({
  name: 'ledger_frozen_accounts',
  help: 'Accounts with spending frozen as of the last audit sweep',
  registers: [registry],
});

function createMetricsEndpoint<E extends Env>(app: Hono<E>): void {
  app.get('/metrics', async (c) => {
    const metrics = await registry.metrics();
    return c.text(metrics, 200, {
      'Content-Type': registry.contentType,
    });
  });
}

export {
  registry,
  httpRequestDuration,
  httpRequestsTotal,
  xpTransactionsTotal,
  xpAmountTotal,
  ledgerOperationDuration,
  ledgerRejectionsTotal,
  ledgerFlagsTotal,
  ledgerAuditRunsTotal,
  frozenAccounts,
  createMetricsEndpoint,
};
