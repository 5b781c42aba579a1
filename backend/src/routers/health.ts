/**
 * Health Router
 *
 * System health and status endpoints
 */

import { router, publicProcedure } from '../trpc';
import { db } from '../db';
import { config } from '../config';

export const healthRouter = router({
  /**
   * Basic health check
   */
  ping: publicProcedure
    .query(() => ({ status: 'ok', timestamp: new Date().toISOString() })),

  /**
   * Full system health check. The memory ledger has no database to check.
   */
  status: publicProcedure
    .query(async ({ ctx }) => {
      const driver = ctx.economy.store.driver;
      const dbHealth = driver === 'postgres' ? await db.healthCheck() : null;

      return {
        status: dbHealth === null || dbHealth.connected ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        services: {
          ledger: { driver },
          database: dbHealth,
          redis: { configured: !!config.redis.url },
        },
        environment: config.app.env,
      };
    }),
});
