// Authentication context types for the API layer

/**
 * Authentication context available in API requests.
 *
 * Identifies who is writing, so the mutation facade can attribute the
 * revisions it opens and closes. In development mode this is a fixed dev
 * user.
 */
export type AuthContext = {
  /** The authenticated caller's ID, recorded as the attribution actor */
  actorId: string;
};

/**
 * Result of an authentication check.
 */
export type AuthResult =
  | { success: true; auth: AuthContext }
  | { success: false; error: string };
