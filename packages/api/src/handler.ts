// tRPC HTTP handler
//
// Serves every procedure under /api/trpc/* through the fetch adapter, so it
// runs under any server that speaks the Fetch API Request/Response types.

import { fetchRequestHandler } from '@trpc/server/adapters/fetch';
import type { ApiConfig } from './config.js';
import type { Services } from './services.js';
import { createContext } from './trpc/context.js';
import { appRouter } from './trpc/routers/index.js';

export const TRPC_ENDPOINT = '/api/trpc';

export type RequestHandler = (req: Request) => Promise<Response>;

/**
 * Create a handler for tRPC requests.
 *
 * The path after the endpoint names the procedure, e.g.
 * /api/trpc/revisions.asOf becomes "revisions.asOf".
 */
export function createRequestHandler(
  services: Services,
  config: Pick<ApiConfig, 'mode'>
): RequestHandler {
  return (req) =>
    fetchRequestHandler({
      endpoint: TRPC_ENDPOINT,
      req,
      router: appRouter,
      createContext: () => createContext({ req, services, config }),
      onError({ error, path }) {
        const data = { path, code: error.code, message: error.message };
        if (error.code === 'INTERNAL_SERVER_ERROR') {
          services.logger.error('tRPC request failed', data);
        } else {
          services.logger.debug('tRPC request rejected', data);
        }
      },
    });
}
