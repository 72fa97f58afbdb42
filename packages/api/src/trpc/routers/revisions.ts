// Revisions router - writes through the mutation facade, point-in-time reads

import { z } from 'zod';
import type { Actor } from '@revlog/protocol';
import { requireTimestamp } from '@revlog/runtime';
import { router, TRPCError } from '../index.js';
import { publicProcedure, protectedProcedure } from '../middleware.js';

const EntityIdSchema = z.number().int().positive();

// Exact parsing happens in the runtime so every entry point reports the same errors
const TimestampSchema = z.union([z.string(), z.date()]);

const PayloadSchema = z.record(z.unknown());

const RevisionInputSchema = z.object({
  entityId: EntityIdSchema.optional(),
  addedAt: TimestampSchema.optional(),
  payload: PayloadSchema,
});

function actorOf(auth: { actorId: string }, method: Actor['method']): Actor {
  return { id: auth.actorId, method };
}

export const revisionsRouter = router({
  /**
   * Get a revision by ID.
   */
  get: publicProcedure
    .input(z.object({ revisionId: z.number().int().positive() }))
    .query(async ({ ctx, input }) => {
      const revision = await ctx.repos.revisions.get(input.revisionId);
      if (!revision) {
        throw new TRPCError({
          code: 'NOT_FOUND',
          message: `Revision not found: ${input.revisionId}`,
        });
      }
      return revision;
    }),

  /**
   * List revisions in append order.
   */
  list: publicProcedure
    .input(
      z.object({
        entityId: EntityIdSchema.optional(),
        since: TimestampSchema.optional(),
        until: TimestampSchema.optional(),
        limit: z.number().int().min(1).max(100).default(50),
        offset: z.number().int().min(0).default(0),
      })
    )
    .query(async ({ ctx, input }) => {
      const { since, until, ...rest } = input;
      return ctx.repos.revisions.list({
        ...rest,
        since: since === undefined ? undefined : requireTimestamp(since, 'since'),
        until: until === undefined ? undefined : requireTimestamp(until, 'until'),
      });
    }),

  /**
   * Every revision of an entity in timeline order.
   */
  history: publicProcedure
    .input(z.object({ entityId: EntityIdSchema }))
    .query(async ({ ctx, input }) => {
      return ctx.view.history(input.entityId);
    }),

  /**
   * State of every entity at an instant (default: now).
   */
  asOf: publicProcedure
    .input(z.object({ at: TimestampSchema.optional() }))
    .query(async ({ ctx, input }) => {
      return ctx.view.asOf(input.at);
    }),

  /**
   * State of one entity at an instant, or null.
   */
  entityAsOf: publicProcedure
    .input(z.object({ entityId: EntityIdSchema, at: TimestampSchema.optional() }))
    .query(async ({ ctx, input }) => {
      return ctx.view.asOf(input.at, input.entityId);
    }),

  /**
   * Who opened and who last closed a revision.
   */
  attribution: publicProcedure
    .input(z.object({ revisionId: z.number().int().positive() }))
    .query(async ({ ctx, input }) => {
      const [openedBy, closedBy] = await Promise.all([
        ctx.attribution.openedBy(input.revisionId),
        ctx.attribution.closedBy(input.revisionId),
      ]);
      return { openedBy, closedBy };
    }),

  /**
   * Insert a revision. An explicit entityId with an active revision replaces
   * it, unless the server rejects duplicate identifiers.
   */
  insert: protectedProcedure.input(RevisionInputSchema).mutation(async ({ ctx, input }) => {
    return ctx.facade.insert(input, { actor: actorOf(ctx.auth, 'api') });
  }),

  /**
   * Replace an entity's state, optionally moving it to a new entity ID.
   */
  update: protectedProcedure
    .input(RevisionInputSchema.extend({ oldEntityId: EntityIdSchema }))
    .mutation(async ({ ctx, input }) => {
      const { oldEntityId, ...revision } = input;
      return ctx.facade.update(oldEntityId, revision, { actor: actorOf(ctx.auth, 'api') });
    }),

  /**
   * Close an entity's active revision. Returns null when nothing was active.
   */
  delete: protectedProcedure
    .input(z.object({ entityId: EntityIdSchema }))
    .mutation(async ({ ctx, input }) => {
      return ctx.facade.delete(input.entityId, { actor: actorOf(ctx.auth, 'api') });
    }),

  /**
   * Bulk insert in one transaction.
   */
  insertMany: protectedProcedure
    .input(
      z.object({
        rows: z.array(RevisionInputSchema).min(1).max(1000),
        attribution: z.enum(['per-row', 'batch', 'skip']).default('batch'),
      })
    )
    .mutation(async ({ ctx, input }) => {
      return ctx.facade.insertMany(input.rows, {
        actor: actorOf(ctx.auth, 'bulk'),
        attribution: input.attribution,
      });
    }),
});
