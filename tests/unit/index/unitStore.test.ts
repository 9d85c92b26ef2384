import { describe, it, expect } from 'vitest';
import { UnitStore } from '../../../src/index/unitStore.js';

describe('UnitStore', () => {
  it('keeps first-insertion order when a unit is replaced', () => {
    const store = new UnitStore();
    store.put({ id: 'a', text: 'one', metadata: {} });
    store.put({ id: 'b', text: 'two', metadata: {} });
    store.put({ id: 'a', text: 'uno', metadata: {} });

    expect(store.ids()).toEqual(['a', 'b']);
    expect(store.get('a')?.text).toBe('uno');
    expect(store.size).toBe(2);
  });

  it('stores frozen copies', () => {
    const store = new UnitStore();
    const metadata = { source: 'a.md' };
    store.put({ id: 'a', text: 'one', metadata });
    metadata.source = 'changed.md';

    const unit = store.get('a');
    expect(unit?.metadata).toEqual({ source: 'a.md' });
    expect(Object.isFrozen(unit)).toBe(true);
    expect(Object.isFrozen(unit?.metadata)).toBe(true);
  });

  it('deletes and clears', () => {
    const store = new UnitStore();
    store.put({ id: 'a', text: 'one', metadata: {} });
    expect(store.delete('a')).toBe(true);
    expect(store.has('a')).toBe(false);
    store.put({ id: 'b', text: 'two', metadata: {} });
    store.clear();
    expect(store.all()).toEqual([]);
  });
});
