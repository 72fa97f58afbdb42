// Tests for the revisions router, called in process through a caller

import { describe, it, expect, beforeEach } from 'vitest';
import { memory } from '@revlog/repositories';
import { createManualClock, silentLogger } from '@revlog/runtime';
import type { ManualClock } from '@revlog/runtime';
import type { AuthContext } from '../../auth/index.js';
import { loadConfig } from '../../config.js';
import { createServices } from '../../services.js';
import type { Services } from '../../services.js';
import { createContext } from '../context.js';
import { createCallerFactory } from '../index.js';
import { appRouter } from './index.js';

const T0 = '2024-01-01T00:00:00.000Z';
const T1 = '2024-01-02T00:00:00.000Z';

const createCaller = createCallerFactory(appRouter);

describe('revisions router', () => {
  let clock: ManualClock;
  let services: Services;

  function setup(env: Record<string, string> = {}): void {
    clock = createManualClock(T0);
    services = createServices(loadConfig(env), {
      repos: memory.createInMemoryRepositoryContext(),
      logger: silentLogger,
      now: clock.now,
    });
  }

  function caller(auth: AuthContext | null = { actorId: 'alice' }) {
    const req = new Request('http://localhost/api/trpc');
    return createCaller({ ...createContext({ req, services, config: { mode: 'test' } }), auth });
  }

  beforeEach(() => setup());

  describe('writes', () => {
    it('inserts and attributes to the caller', async () => {
      const result = await caller().revisions.insert({ payload: { name: 'Ada' } });

      expect(result).toEqual({
        revision: { revisionId: 1, entityId: 1, addedAt: T0, removedAt: undefined, payload: { name: 'Ada' } },
        closed: [],
      });
      expect(await caller().revisions.attribution({ revisionId: 1 })).toEqual({
        openedBy: { id: 'alice', method: 'api' },
        closedBy: null,
      });
    });

    it('requires authentication', async () => {
      await expect(caller(null).revisions.insert({ payload: {} })).rejects.toMatchObject({
        code: 'UNAUTHORIZED',
      });
    });

    it('updates and reads back both states', async () => {
      await caller().revisions.insert({ payload: { name: 'Ada' } });
      clock.set(T1);
      const result = await caller({ actorId: 'bob' }).revisions.update({
        oldEntityId: 1,
        payload: { name: 'Ada King' },
      });

      expect(result.closed.map((r) => [r.revisionId, r.removedAt])).toEqual([[1, T1]]);
      expect(await caller().revisions.asOf({ at: T0 })).toEqual(new Map([[1, { name: 'Ada' }]]));
      expect(await caller().revisions.asOf({})).toEqual(new Map([[1, { name: 'Ada King' }]]));
      expect(await caller().revisions.entityAsOf({ entityId: 1, at: new Date(T0) })).toEqual({
        name: 'Ada',
      });
      expect(await caller().revisions.attribution({ revisionId: 1 })).toEqual({
        openedBy: { id: 'alice', method: 'api' },
        closedBy: { id: 'bob', method: 'api' },
      });
    });

    it('deletes', async () => {
      await caller().revisions.insert({ payload: { name: 'Ada' } });
      clock.set(T1);

      const closed = await caller().revisions.delete({ entityId: 1 });

      expect(closed).toMatchObject({ revisionId: 1, removedAt: T1 });
      expect(await caller().revisions.entityAsOf({ entityId: 1 })).toBeNull();
      expect(await caller().revisions.delete({ entityId: 1 })).toBeNull();
    });

    it('bulk inserts as a bulk actor', async () => {
      const results = await caller().revisions.insertMany({
        rows: [{ payload: { name: 'Ada' } }, { entityId: 1, addedAt: T1, payload: { name: 'Ada King' } }],
      });

      expect(results.map((r) => r.revision.revisionId)).toEqual([1, 2]);
      expect(await services.attribution.openedBy(2)).toEqual({ id: 'alice', method: 'bulk' });
      expect(await services.attribution.closedBy(1)).toEqual({ id: 'alice', method: 'bulk' });
    });
  });

  describe('reads', () => {
    beforeEach(async () => {
      await caller().revisions.insert({ payload: { name: 'Ada' } });
      await caller().revisions.insert({ payload: { name: 'Grace' } });
      await caller().revisions.insert({ entityId: 1, addedAt: T1, payload: { name: 'Ada King' } });
    });

    it('gets a revision', async () => {
      expect(await caller().revisions.get({ revisionId: 3 })).toMatchObject({
        entityId: 1,
        addedAt: T1,
      });
    });

    it('lists with filters', async () => {
      const revisions = await caller().revisions.list({ entityId: 1 });
      expect(revisions.map((r) => r.revisionId)).toEqual([1, 3]);

      const page = await caller().revisions.list({ limit: 1, offset: 1 });
      expect(page.map((r) => r.revisionId)).toEqual([2]);
    });

    it('lists by addedAt bounds', async () => {
      const later = await caller().revisions.list({ since: new Date(T1) });
      expect(later.map((r) => r.revisionId)).toEqual([3]);

      const earlier = await caller().revisions.list({ until: '2024-01-01T00:00:00Z' });
      expect(earlier.map((r) => r.revisionId)).toEqual([1, 2]);
    });

    it('rejects an invalid list bound', async () => {
      await expect(caller().revisions.list({ since: 'not-a-date' })).rejects.toMatchObject({
        code: 'BAD_REQUEST',
        message: 'Invalid timestamp: not-a-date',
      });
    });

    it('returns history in timeline order', async () => {
      const history = await caller().revisions.history({ entityId: 1 });
      expect(history.map((r) => [r.revisionId, r.removedAt])).toEqual([
        [1, T1],
        [3, undefined],
      ]);
    });
  });

  describe('errors', () => {
    it('maps validation errors to BAD_REQUEST', async () => {
      await expect(
        caller().revisions.insert({ addedAt: 'someday', payload: {} })
      ).rejects.toMatchObject({ code: 'BAD_REQUEST', message: 'Invalid timestamp: someday' });
      await expect(caller().revisions.insert({ entityId: 0, payload: {} })).rejects.toMatchObject({
        code: 'BAD_REQUEST',
      });
    });

    it('maps constraint violations to BAD_REQUEST', async () => {
      await expect(caller().revisions.insert({ entityId: 5, payload: {} })).rejects.toMatchObject({
        code: 'BAD_REQUEST',
        message: 'Entity ID 5 does not name an existing revision',
      });
    });

    it('maps a missing revision to NOT_FOUND', async () => {
      await expect(caller().revisions.get({ revisionId: 9 })).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });

    it('maps policy rejections to CONFLICT', async () => {
      setup({ REVLOG_ON_DUPLICATE_IDENTIFIER: 'reject', REVLOG_IDENTITY_CHANGE: 'reject' });
      await caller().revisions.insert({ payload: {} });

      await expect(caller().revisions.insert({ entityId: 1, payload: {} })).rejects.toMatchObject({
        code: 'CONFLICT',
      });
      await expect(
        caller().revisions.update({ oldEntityId: 1, entityId: 2, payload: {} })
      ).rejects.toMatchObject({ code: 'CONFLICT' });
    });

    it('maps integrity errors to INTERNAL_SERVER_ERROR', async () => {
      await services.repos.revisions.append({ addedAt: T0, payload: {} });
      await services.repos.revisions.append({ entityId: 1, addedAt: T0, payload: {} });

      await expect(caller().revisions.asOf({ at: T0 })).rejects.toMatchObject({
        code: 'INTERNAL_SERVER_ERROR',
        message: `Entity 1 has 2 active revisions at ${T0}: 1, 2`,
      });
    });
  });
});
