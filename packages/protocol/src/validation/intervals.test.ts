// Tests for interval ordering and visibility

import { describe, it, expect } from 'vitest';
import type { Revision } from '../types/revisions.js';
import {
  compareRevisions,
  precedes,
  isActiveAt,
  intervalsOverlap,
  sortByTimeline,
} from './intervals.js';

function rev(revisionId: number, addedAt: string, removedAt?: string): Revision {
  return { revisionId, entityId: 1, addedAt, removedAt, payload: {} };
}

const T0 = '2024-01-01T00:00:00.000Z';
const T1 = '2024-01-02T00:00:00.000Z';
const T2 = '2024-01-03T00:00:00.000Z';

describe('precedes', () => {
  it('orders by addedAt first', () => {
    expect(precedes(rev(5, T0), rev(2, T1))).toBe(true);
    expect(precedes(rev(2, T1), rev(5, T0))).toBe(false);
  });

  it('breaks ties by revisionId', () => {
    expect(precedes(rev(1, T0), rev(2, T0))).toBe(true);
    expect(precedes(rev(2, T0), rev(1, T0))).toBe(false);
  });

  it('is irreflexive', () => {
    const r = rev(1, T0);
    expect(precedes(r, r)).toBe(false);
    expect(compareRevisions(r, r)).toBe(0);
  });
});

describe('isActiveAt', () => {
  it('includes the start and excludes the end', () => {
    const r = rev(1, T0, T1);
    expect(isActiveAt(r, T0)).toBe(true);
    expect(isActiveAt(r, '2024-01-01T12:00:00.000Z')).toBe(true);
    expect(isActiveAt(r, T1)).toBe(false);
    expect(isActiveAt(r, '2023-12-31T00:00:00.000Z')).toBe(false);
  });

  it('treats an unset end as open', () => {
    expect(isActiveAt(rev(1, T0), '2999-01-01T00:00:00.000Z')).toBe(true);
  });

  it('never shows a zero-length interval', () => {
    expect(isActiveAt(rev(1, T0, T0), T0)).toBe(false);
  });
});

describe('intervalsOverlap', () => {
  it('adjacent intervals do not overlap', () => {
    expect(intervalsOverlap(rev(1, T0, T1), rev(2, T1))).toBe(false);
  });

  it('open intervals overlap anything later', () => {
    expect(intervalsOverlap(rev(1, T0), rev(2, T2))).toBe(true);
  });

  it('zero-length intervals overlap nothing', () => {
    expect(intervalsOverlap(rev(1, T1, T1), rev(2, T0))).toBe(false);
  });
});

describe('sortByTimeline', () => {
  it('sorts without mutating the input', () => {
    const input = [rev(3, T1), rev(2, T0), rev(1, T0)];
    const sorted = sortByTimeline(input);

    expect(sorted.map((r) => r.revisionId)).toEqual([1, 2, 3]);
    expect(input.map((r) => r.revisionId)).toEqual([3, 2, 1]);
  });
});
