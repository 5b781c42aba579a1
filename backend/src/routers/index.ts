/**
 * App Router
 *
 * Main tRPC router combining all domain routers
 */

import { router } from '../trpc';
import { accountRouter } from './account';
import { quizRouter } from './quiz';
import { socialRouter } from './social';
import { featuresRouter } from './features';
import { monitoringRouter } from './monitoring';
import { healthRouter } from './health';

export const appRouter = router({
  account: accountRouter,
  quiz: quizRouter,
  social: socialRouter,
  features: featuresRouter,
  monitoring: monitoringRouter,
  health: healthRouter,
});

export type AppRouter = typeof appRouter;
