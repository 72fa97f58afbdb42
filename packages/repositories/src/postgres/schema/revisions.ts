import { sql } from 'drizzle-orm';
import { pgTable, pgSequence, integer, timestamp, jsonb, index, check } from 'drizzle-orm/pg-core';
import type { Payload } from '@revlog/protocol';

/**
 * Source of revision IDs. Sequences are atomic across concurrent sessions,
 * so IDs stay unique and increasing without any application-side lock.
 */
export const revisionIdSequence = pgSequence('revision_id_seq', {
  startWith: 1,
  increment: 1,
});

/**
 * Revisions table - the append-only log.
 *
 * Rows are never deleted. `removed_at` is the only column updated after
 * insert; the CHECK constraints mirror the checks made in application code.
 */
export const revisions = pgTable(
  'revisions',
  {
    revisionId: integer('revision_id').primaryKey(),
    entityId: integer('entity_id').notNull(),
    addedAt: timestamp('added_at', { withTimezone: true, precision: 3 }).notNull(),
    removedAt: timestamp('removed_at', { withTimezone: true, precision: 3 }),
    payload: jsonb('payload').$type<Payload>().notNull(),
  },
  (table) => [
    index('revisions_entity_idx').on(table.entityId),
    index('revisions_entity_added_idx').on(table.entityId, table.addedAt),
    index('revisions_removed_idx').on(table.removedAt),
    check('revisions_entity_le_revision', sql`${table.entityId} <= ${table.revisionId}`),
    check('revisions_added_le_removed', sql`${table.addedAt} <= ${table.removedAt}`),
  ]
);
