// Root router
//
// Usage from a client:
// ```ts
// const snapshot = await trpc.revisions.asOf.query({ at: '2024-01-01T00:00:00.000Z' });
// const { revision } = await trpc.revisions.insert.mutate({ payload: { fullName: 'Ada Lovelace' } });
// ```

import { router } from '../index.js';
import { revisionsRouter } from './revisions.js';

export const appRouter = router({
  revisions: revisionsRouter,
});

/**
 * Export the router type for client-side type inference.
 */
export type AppRouter = typeof appRouter;
