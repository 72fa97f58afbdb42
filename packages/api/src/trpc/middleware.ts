// tRPC middleware for domain errors and authentication

import { baseProcedure, middleware, TRPCError } from './index.js';
import { toTRPCError } from './errors.js';

/**
 * Middleware that turns runtime errors into tRPC errors with a matching code.
 *
 * Resolver errors reach here already wrapped as INTERNAL_SERVER_ERROR with
 * the original as `cause`.
 */
const mapsDomainErrors = middleware(async ({ next }) => {
  const result = await next();

  if (!result.ok) {
    const mapped = toTRPCError(result.error.cause);
    if (mapped) throw mapped;
  }

  return result;
});

/**
 * Middleware that requires authentication.
 *
 * Ensures ctx.auth is not null and passes the authenticated context
 * to downstream procedures.
 */
const isAuthenticated = middleware(async ({ ctx, next }) => {
  if (!ctx.auth) {
    throw new TRPCError({
      code: 'UNAUTHORIZED',
      message: 'Authentication required',
    });
  }

  return next({
    ctx: {
      ...ctx,
      // Narrow the type to indicate auth is definitely set
      auth: ctx.auth,
    },
  });
});

/**
 * Public procedure - no auth required (reads).
 */
export const publicProcedure = baseProcedure.use(mapsDomainErrors);

/**
 * Protected procedure - requires authentication (writes).
 */
export const protectedProcedure = publicProcedure.use(isAuthenticated);
