// Tests for the in-memory identity store

import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryIdentityStore, type InMemoryIdentityStore } from './index.js';

describe('InMemoryIdentityStore', () => {
  let store: InMemoryIdentityStore;

  beforeEach(() => {
    store = createInMemoryIdentityStore();
  });

  it('should record an identifier once per category', () => {
    expect(store.add('weapon', 6n)).toBe(true);
    expect(store.add('weapon', 6n)).toBe(false);
    expect(store.count('weapon')).toBe(1);
  });

  it('should keep categories independent', () => {
    store.add('weapon', 6n);

    expect(store.has('weapon', 6n)).toBe(true);
    expect(store.has('backpack', 6n)).toBe(false);
    expect(store.add('backpack', 6n)).toBe(true);
  });

  it('should list identifiers in recording order', () => {
    store.add('armor', 11n);
    store.add('armor', 3n);
    store.add('armor', 7n);

    expect(store.list('armor')).toEqual([11n, 3n, 7n]);
  });

  it('should report empty categories', () => {
    expect(store.count('purse')).toBe(0);
    expect(store.list('purse')).toEqual([]);
    expect(store.has('purse', 0n)).toBe(false);
  });

  it('should forget everything on clear', () => {
    store.add('weapon', 6n);
    store.add('armor', 7n);
    store.clear();

    expect(store.count('weapon')).toBe(0);
    expect(store._data.size).toBe(0);
  });
});
