// tRPC request context
//
// Creates the context available to all tRPC procedures: the shared services
// plus the caller's authentication.

import type { AuthContext } from '../auth/index.js';
import { getAuthFromRequest } from '../auth/index.js';
import type { ApiConfig } from '../config.js';
import type { Services } from '../services.js';

/**
 * Context available to all tRPC procedures.
 */
export type Context = Omit<Services, 'close'> & {
  /** Authentication context (null if not authenticated) */
  auth: AuthContext | null;
};

export type CreateContextOptions = {
  req: Request;
  services: Services;
  config: Pick<ApiConfig, 'mode'>;
};

/**
 * Create the tRPC context for a request.
 */
export function createContext(opts: CreateContextOptions): Context {
  const { req, services, config } = opts;

  const authResult = getAuthFromRequest(req, config.mode);
  const auth = authResult.success ? authResult.auth : null;

  return {
    repos: services.repos,
    facade: services.facade,
    view: services.view,
    attribution: services.attribution,
    logger: services.logger,
    auth,
  };
}
