// Supersession
//
// After a revision is appended, earlier revisions of the same entity whose
// interval reaches past the new revision's start are narrowed. Each
// revision's `removedAt` converges to the earliest `addedAt` among the
// revisions that follow it in timeline order (`addedAt`, then `revisionId`),
// or stays unset when nothing follows it.
//
// Bounds only ever move earlier. A future-dated revision therefore takes
// effect on its own when its instant arrives, and a later append with an
// earlier `addedAt` is closed against it in turn.

import { compareTimestamps, minTimestamp, sortByTimeline } from '@revlog/protocol';
import type { Revision, Timestamp } from '@revlog/protocol';
import type { RevisionRepository } from '@revlog/repositories';

/**
 * Whether `revision` may need a tighter bound after `appended` was added.
 *
 * Revisions that start after `appended`, or already end at or before its
 * start, are not affected by it.
 */
export function isClosingCandidate(revision: Revision, appended: Revision): boolean {
  if (compareTimestamps(revision.addedAt, appended.addedAt) > 0) return false;
  return (
    revision.removedAt === undefined ||
    compareTimestamps(revision.removedAt, appended.addedAt) > 0
  );
}

/**
 * The bound each revision of one entity should carry, in timeline order.
 *
 * Pure; used by `resolveSupersession` and for checking a stored timeline.
 */
export function computeBounds(
  revisions: readonly Revision[]
): Array<{ revision: Revision; removedAt: Timestamp | undefined }> {
  const timeline = sortByTimeline(revisions);

  return timeline.map((revision, index) => {
    // In timeline order the next revision has the smallest addedAt of all successors
    const successor = timeline[index + 1];
    return {
      revision,
      removedAt: minTimestamp(revision.removedAt, successor?.addedAt),
    };
  });
}

/**
 * Narrow the intervals of revisions superseded by `appended`.
 *
 * Must run in the same transaction as the append, under the entity's lock.
 * Idempotent: running it again for the same revision changes nothing.
 *
 * @returns The revisions whose `removedAt` changed, with their new bound.
 *   May include `appended` itself when a future-dated revision of the same
 *   entity already exists.
 */
export async function resolveSupersession(
  log: RevisionRepository,
  appended: Revision
): Promise<Revision[]> {
  const revisions = await log.revisionsOf(appended.entityId);
  const closed: Revision[] = [];

  for (const { revision, removedAt } of computeBounds(revisions)) {
    if (!isClosingCandidate(revision, appended)) continue;
    if (removedAt === undefined || removedAt === revision.removedAt) continue;

    closed.push(await log.setRemoved(revision.revisionId, removedAt));
  }

  return closed;
}
