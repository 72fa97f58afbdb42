// Attribution types - who opened or closed a revision

import type { RevisionId, Timestamp } from './common.js';

/**
 * The party responsible for a change.
 *
 * The log itself never requires an actor; attribution is recorded by an
 * optional hook after the change has been committed.
 */
export type Actor = {
  /**
   * Opaque actor identifier (user, service account, import job, ...)
   */
  id: string;

  /**
   * How the change was made
   */
  method?: 'api' | 'bulk' | 'manual' | 'system';
};

/**
 * A single attribution record.
 */
export type AttributionEvent = {
  kind: 'opened' | 'closed';
  revisionId: RevisionId;
  actor: Actor;
  recordedAt: Timestamp;
};
