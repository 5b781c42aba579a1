/**
 * tRPC setup
 *
 * Identity is resolved upstream by the gateway and forwarded as headers:
 * `x-account-id` for the caller, `x-account-role: admin` for operators.
 * This service trusts those headers and never sees credentials.
 */

import { initTRPC, TRPCError } from '@trpc/server';
import type { Economy } from './economy';
import { accountIdSchema } from './lib/validators';
import { logger } from './logger';

const log = logger.child({ module: 'trpc' });

// ============================================================================
// CONTEXT
// ============================================================================

export interface Context extends Record<string, unknown> {
  accountId: string | null;
  isAdmin: boolean;
  economy: Economy;
  signal?: AbortSignal;
}

export function createContextFactory(economy: Economy) {
  return (opts: { req: Request; resHeaders: Headers }): Context => {
    // @hono/trpc-server passes a Web API Request: headers need .get()
    const rawAccountId = opts.req.headers.get('x-account-id');
    const parsed = rawAccountId === null ? null : accountIdSchema.safeParse(rawAccountId);

    if (parsed && !parsed.success) {
      log.warn('Ignoring malformed x-account-id header');
    }

    return {
      accountId: parsed?.success ? parsed.data : null,
      isAdmin: opts.req.headers.get('x-account-role') === 'admin',
      economy,
      signal: opts.req.signal,
    };
  };
}

// ============================================================================
// TRPC INITIALIZATION
// ============================================================================

const t = initTRPC.context<Context>().create({
  errorFormatter: ({ shape }) => ({
    ...shape,
    data: {
      ...shape.data,
      // Strip stack traces to prevent information leakage
      stack: undefined,
    },
  }),
});

export const router = t.router;
export const publicProcedure = t.procedure;
export const createCallerFactory = t.createCallerFactory;

// Middleware: require an account
const isAuthenticated = t.middleware(async ({ ctx, next }) => {
  if (!ctx.accountId) {
    throw new TRPCError({
      code: 'UNAUTHORIZED',
      message: 'Authentication required',
    });
  }
  return next({ ctx: { ...ctx, accountId: ctx.accountId } });
});

export const protectedProcedure = t.procedure.use(isAuthenticated);

// Middleware: require operator role
const isAdmin = t.middleware(async ({ ctx, next }) => {
  if (!ctx.isAdmin) {
    throw new TRPCError({
      code: 'FORBIDDEN',
      message: 'Admin access required',
    });
  }
  return next({ ctx });
});

export const adminProcedure = t.procedure.use(isAdmin);
