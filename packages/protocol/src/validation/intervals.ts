// Interval Utilities
//
// Ordering and visibility rules for revisions of one entity.

import type { Timestamp } from '../types/common.js';
import type { Revision } from '../types/revisions.js';
import { compareTimestamps } from './timestamps.js';

type Ordered = Pick<Revision, 'revisionId' | 'addedAt'>;

/**
 * Total order over revisions of the same entity: `addedAt` ascending, ties
 * broken by `revisionId` ascending.
 */
export function compareRevisions(a: Ordered, b: Ordered): number {
  const byTime = compareTimestamps(a.addedAt, b.addedAt);
  if (byTime !== 0) return byTime;
  return a.revisionId - b.revisionId;
}

/**
 * True when `a` comes strictly before `b` in the revision order.
 */
export function precedes(a: Ordered, b: Ordered): boolean {
  return compareRevisions(a, b) < 0;
}

/**
 * True when the revision's interval `[addedAt, removedAt)` contains `at`.
 * A zero-length interval contains no instant.
 */
export function isActiveAt(revision: Pick<Revision, 'addedAt' | 'removedAt'>, at: Timestamp): boolean {
  if (compareTimestamps(revision.addedAt, at) > 0) return false;
  return revision.removedAt === undefined || compareTimestamps(revision.removedAt, at) > 0;
}

/**
 * True when two intervals share at least one instant.
 */
export function intervalsOverlap(
  a: Pick<Revision, 'addedAt' | 'removedAt'>,
  b: Pick<Revision, 'addedAt' | 'removedAt'>
): boolean {
  const aEndsAfterBStarts = a.removedAt === undefined || compareTimestamps(a.removedAt, b.addedAt) > 0;
  const bEndsAfterAStarts = b.removedAt === undefined || compareTimestamps(b.removedAt, a.addedAt) > 0;
  const aNonEmpty = a.removedAt === undefined || compareTimestamps(a.removedAt, a.addedAt) > 0;
  const bNonEmpty = b.removedAt === undefined || compareTimestamps(b.removedAt, b.addedAt) > 0;
  return aNonEmpty && bNonEmpty && aEndsAfterBStarts && bEndsAfterAStarts;
}

/**
 * Sort revisions into timeline order (see `compareRevisions`).
 * Returns a new array.
 */
export function sortByTimeline<T extends Ordered>(revisions: readonly T[]): T[] {
  return [...revisions].sort(compareRevisions);
}
