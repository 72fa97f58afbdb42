// Tests for attribution dispatch and the in-memory store

import { describe, it, expect, vi } from 'vitest';
import type { AttributionEvent } from '@revlog/protocol';
import { createInMemoryAttributionStore, dispatchBatch, dispatchEach } from './hook.js';
import type { AttributionHook } from './hook.js';

const AT = '2024-01-01T00:00:00.000Z';
const alice = { id: 'alice' };
const importer = { id: 'import-job', method: 'bulk' as const };

function event(kind: AttributionEvent['kind'], revisionId: number, actor = alice): AttributionEvent {
  return { kind, revisionId, actor, recordedAt: AT };
}

describe('dispatchEach', () => {
  it('routes events to the matching callback in order', async () => {
    const calls: string[] = [];
    const hook: AttributionHook = {
      onRevisionOpened: (id, actor) => {
        calls.push(`opened ${id} by ${actor.id}`);
      },
      onRevisionClosed: (id, actor) => {
        calls.push(`closed ${id} by ${actor.id}`);
      },
    };

    await dispatchEach(hook, [event('opened', 2), event('closed', 1)]);

    expect(calls).toEqual(['opened 2 by alice', 'closed 1 by alice']);
  });
});

describe('dispatchBatch', () => {
  it('prefers onBatch', async () => {
    const hook = {
      onRevisionOpened: vi.fn(),
      onRevisionClosed: vi.fn(),
      onBatch: vi.fn(),
    };
    const events = [event('opened', 1), event('opened', 2)];

    await dispatchBatch(hook, events);

    expect(hook.onBatch).toHaveBeenCalledTimes(1);
    expect(hook.onBatch).toHaveBeenCalledWith(events);
    expect(hook.onRevisionOpened).not.toHaveBeenCalled();
  });

  it('falls back to per-event callbacks', async () => {
    const hook = { onRevisionOpened: vi.fn(), onRevisionClosed: vi.fn() };

    await dispatchBatch(hook, [event('opened', 1), event('closed', 0)]);

    expect(hook.onRevisionOpened).toHaveBeenCalledWith(1, alice);
    expect(hook.onRevisionClosed).toHaveBeenCalledWith(0, alice);
  });

  it('does nothing for an empty batch', async () => {
    const hook = { onRevisionOpened: vi.fn(), onRevisionClosed: vi.fn(), onBatch: vi.fn() };

    await dispatchBatch(hook, []);

    expect(hook.onBatch).not.toHaveBeenCalled();
  });
});

describe('createInMemoryAttributionStore', () => {
  it('answers who opened and closed a revision', async () => {
    const store = createInMemoryAttributionStore({ now: () => AT });
    await store.onRevisionOpened(1, alice);
    await store.onRevisionClosed(1, importer);

    expect(await store.openedBy(1)).toEqual(alice);
    expect(await store.closedBy(1)).toEqual(importer);
    expect(await store.closedBy(2)).toBeNull();
  });

  it('reports the most recent closer', async () => {
    const store = createInMemoryAttributionStore();
    await store.onRevisionClosed(1, alice);
    await store.onRevisionClosed(1, importer);

    expect(await store.closedBy(1)).toEqual(importer);
  });

  it('stores batches as given', async () => {
    const store = createInMemoryAttributionStore();
    await store.onBatch?.([event('opened', 1, importer), event('opened', 2, importer)]);

    expect(await store.query({ actorId: 'import-job' })).toEqual([
      event('opened', 1, importer),
      event('opened', 2, importer),
    ]);
  });

  it('filters and paginates queries', async () => {
    const store = createInMemoryAttributionStore({ now: () => AT });
    await store.onRevisionOpened(1, alice);
    await store.onRevisionOpened(2, alice);
    await store.onRevisionClosed(1, alice);

    expect(await store.query({ kind: 'opened', offset: 1 })).toEqual([event('opened', 2)]);
    expect(await store.query({ revisionId: 1 })).toEqual([event('opened', 1), event('closed', 1)]);
    expect(await store.query({ limit: 1 })).toEqual([event('opened', 1)]);
  });
});
