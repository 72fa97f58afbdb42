// Development mode authentication
//
// Outside production every request is treated as coming from a default
// actor, unless it names one in the `x-actor-id` header. Production has no
// authentication scheme yet and rejects every write.

import type { ApiConfig } from '../config.js';
import type { AuthContext, AuthResult } from './types.js';

/**
 * Default actor ID for development.
 */
export const DEV_ACTOR_ID = 'dev-user';

export const ACTOR_HEADER = 'x-actor-id';

/**
 * Default auth context for development.
 */
export const DEV_AUTH: AuthContext = {
  actorId: DEV_ACTOR_ID,
};

/**
 * Extract authentication context from a request.
 */
export function getAuthFromRequest(req: Request, mode: ApiConfig['mode']): AuthResult {
  if (mode === 'production') {
    return {
      success: false,
      error: 'Authentication required. Production auth not yet implemented.',
    };
  }

  const actorId = req.headers.get(ACTOR_HEADER)?.trim();
  return { success: true, auth: actorId ? { actorId } : DEV_AUTH };
}
