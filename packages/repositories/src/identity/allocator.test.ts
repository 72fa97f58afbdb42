// Tests for entity identity allocation

import { describe, it, expect } from 'vitest';
import { revisionIdentityAllocator } from './allocator.js';

describe('revisionIdentityAllocator', () => {
  it('uses the revision ID when no entity ID is given', () => {
    expect(revisionIdentityAllocator.assign(undefined, 42)).toBe(42);
  });

  it('returns an explicit entity ID unchanged', () => {
    expect(revisionIdentityAllocator.assign(7, 42)).toBe(7);
  });

  it('does not reject explicit IDs that are already in use', () => {
    expect(revisionIdentityAllocator.assign(7, 43)).toBe(7);
    expect(revisionIdentityAllocator.assign(7, 44)).toBe(7);
  });

  it('gives distinct entities for distinct revisions', () => {
    const ids = [1, 2, 3, 4].map((rev) => revisionIdentityAllocator.assign(undefined, rev));
    expect(new Set(ids).size).toBe(4);
  });
});
