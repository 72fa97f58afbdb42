// Tests for point-in-time queries

import { describe, it, expect, beforeEach } from 'vitest';
import { memory } from '@revlog/repositories';
import { SnapshotView } from './view.js';
import { IntegrityError, ValidationError } from '../errors.js';

const T0 = '2024-01-01T00:00:00.000Z';
const T1 = '2024-01-02T00:00:00.000Z';
const T2 = '2024-01-03T00:00:00.000Z';
const NOON_T0 = '2024-01-01T12:00:00.000Z';

describe('SnapshotView', () => {
  let repos: memory.InMemoryRepositoryContext;
  let view: SnapshotView;

  beforeEach(async () => {
    repos = memory.createInMemoryRepositoryContext();
    view = new SnapshotView({ repos, now: () => NOON_T0 });

    // Entity 1: "draft" for [T0, T1), "final" from T1
    await repos.revisions.append({ addedAt: T0, removedAt: T1, payload: { title: 'draft' } });
    // Entity 2: visible [T0, T2)
    await repos.revisions.append({ addedAt: T0, removedAt: T2, payload: { title: 'other' } });
    await repos.revisions.append({ entityId: 1, addedAt: T1, payload: { title: 'final' } });
    // Entity 4: scheduled for T2
    await repos.revisions.append({ addedAt: T2, payload: { title: 'scheduled' } });
  });

  describe('asOf', () => {
    it('defaults to the clock', async () => {
      const snapshot = await view.asOf();

      expect(snapshot).toEqual(
        new Map([
          [1, { title: 'draft' }],
          [2, { title: 'other' }],
        ])
      );
    });

    it('answers past and future instants', async () => {
      expect(await view.asOf('2023-12-31T00:00:00.000Z')).toEqual(new Map());
      expect(await view.asOf(T2)).toEqual(
        new Map([
          [1, { title: 'final' }],
          [4, { title: 'scheduled' }],
        ])
      );
    });

    it('accepts Date instances', async () => {
      const snapshot = await view.asOf(new Date(T1));
      expect([...snapshot.keys()]).toEqual([1, 2]);
    });

    it('returns a single payload for one entity', async () => {
      expect(await view.asOf(T0, 1)).toEqual({ title: 'draft' });
      expect(await view.asOf(T1, 1)).toEqual({ title: 'final' });
      expect(await view.asOf(undefined, 1)).toEqual({ title: 'draft' });
    });

    it('returns null for an entity without visible state', async () => {
      expect(await view.asOf(T2, 2)).toBeNull();
      expect(await view.asOf(T0, 99)).toBeNull();
    });

    it('rejects invalid instants', async () => {
      await expect(view.asOf('yesterday-ish')).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects invalid entity IDs', async () => {
      await expect(view.asOf(T0, 0)).rejects.toMatchObject({ field: 'entityId' });
    });
  });

  describe('revisionAt', () => {
    it('returns the full revision', async () => {
      expect(await view.revisionAt(T1, 1)).toEqual({
        revisionId: 3,
        entityId: 1,
        addedAt: T1,
        removedAt: undefined,
        payload: { title: 'final' },
      });
    });
  });

  describe('revisionsAsOf', () => {
    it('lists active revisions ordered by entity', async () => {
      const revisions = await view.revisionsAsOf(T1);
      expect(revisions.map((r) => r.revisionId)).toEqual([3, 2]);
    });
  });

  describe('integrity', () => {
    it('reports two active revisions for one entity', async () => {
      // Appended without supersession, as a writer without the entity lock would
      await repos.revisions.append({ entityId: 4, addedAt: T2, payload: { title: 'racing' } });

      const attempt = view.asOf(T2);
      await expect(attempt).rejects.toBeInstanceOf(IntegrityError);
      await expect(attempt).rejects.toMatchObject({ entityId: 4, at: T2, revisionIds: [4, 5] });
    });

    it('reports it for single-entity queries too', async () => {
      await repos.revisions.append({ entityId: 4, addedAt: T2, payload: {} });

      await expect(view.revisionAt(T2, 4)).rejects.toBeInstanceOf(IntegrityError);
    });
  });

  describe('history', () => {
    it('returns every revision of an entity in timeline order', async () => {
      await repos.revisions.append({ entityId: 1, addedAt: T0, removedAt: T0, payload: { title: 'typo' } });

      const history = await view.history(1);
      expect(history.map((r) => [r.revisionId, r.payload.title])).toEqual([
        [1, 'draft'],
        [5, 'typo'],
        [3, 'final'],
      ]);
    });
  });
});
