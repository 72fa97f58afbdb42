// Mutation facade types

import type { Actor, EntityId, Payload, Revision, Timestamp } from '@revlog/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
} from '@revlog/repositories';
import type { AttributionHook } from '../attribution/index.js';
import type { Clock } from '../clock.js';
import type { Logger } from '../logging/index.js';

/**
 * What to do when an insert names an entity that already has an active
 * revision.
 *
 * - `allow-as-update`: the insert supersedes the active revision
 * - `reject`: the insert fails with DuplicateIdentifierError
 */
export type DuplicateIdentifierPolicy = 'allow-as-update' | 'reject';

/**
 * Whether an update may move an entity's state to a different entity ID.
 */
export type IdentityChangePolicy = 'allow' | 'reject';

export type MutationFacadeConfig = {
  onDuplicateIdentifier?: DuplicateIdentifierPolicy;
  identityChange?: IdentityChangePolicy;

  /** Run each operation in a transaction when the context supports it */
  transactionsEnabled?: boolean;

  /** Source of "now" for default `addedAt` values, deletes and policy checks */
  now?: Clock;
};

export type MutationFacadeOptions = {
  /** Repository context (must support transactions for per-entity locking) */
  repos: RepositoryContext | TransactionalRepositoryContext;

  /** Receives who opened and closed revisions, after commit */
  attribution?: AttributionHook;

  logger?: Logger;

  config?: MutationFacadeConfig;
};

/**
 * A logical write. `addedAt` defaults to now; `entityId` is assigned by the
 * identity allocator when omitted.
 */
export type RevisionInput = {
  entityId?: EntityId;
  addedAt?: Timestamp | Date;
  payload: Payload;
};

export type MutationOptions = {
  /** Forwarded to the attribution hook; no attribution is recorded without it */
  actor?: Actor;
};

/**
 * How attribution is delivered for a bulk insert.
 *
 * - `per-row`: one callback per opened or closed revision
 * - `batch`: one `onBatch` call after commit (per-row callbacks if the hook
 *   has no `onBatch`)
 * - `skip`: no attribution
 */
export type BulkAttributionMode = 'per-row' | 'batch' | 'skip';

export type InsertManyOptions = MutationOptions & {
  attribution?: BulkAttributionMode;
};

export type MutationResult = {
  /** The appended revision, including any bound it received on the way in */
  revision: Revision;

  /** Other revisions whose interval was narrowed by this write */
  closed: Revision[];
};
