export { getAuthFromRequest, DEV_AUTH, DEV_ACTOR_ID, ACTOR_HEADER } from './dev-auth.js';
export type { AuthContext, AuthResult } from './types.js';
