// tRPC initialization
//
// Sets up tRPC with the superjson transformer so that snapshots (Maps) and
// Dates survive the wire.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import type { Context } from './context.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        // Include the error code for client-side handling
        code: error.code,
      },
    };
  },
});

export const router = t.router;

/**
 * Base procedure. Domain errors thrown by the runtime are mapped to tRPC
 * error codes; see `./errors.ts`.
 */
export const baseProcedure = t.procedure;

export const middleware = t.middleware;

export const createCallerFactory = t.createCallerFactory;

export { TRPCError };
