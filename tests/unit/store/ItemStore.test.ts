/**
 * @file ItemStore.test.ts
 * @module tests/unit/store/ItemStore
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Unit tests for the item store and its stage transitions.
 */

import { ItemStore } from '../../../src/store/ItemStore.js';
import { StructuralError } from '../../../src/shared/errors.js';
import { makeItem } from '../../setup.js';

describe('ItemStore', () => {
  let store: ItemStore;

  beforeEach(() => {
    store = new ItemStore();
  });

  describe('population', () => {
    it('should start in the populating stage', () => {
      expect(store.getStage()).toBe('populating');
    });

    it('should look up items and references by UID', () => {
      store.addItem(makeItem({ uid: 'Game.Player', type: 'Class' }));
      store.addReference({ uid: 'System.String', name: 'string' });

      expect(store.getItem('Game.Player')?.name).toBe('Player');
      expect(store.hasItem('Game.Player')).toBe(true);
      expect(store.hasItem('Game.Enemy')).toBe(false);
      expect(store.getReference('System.String')).toEqual({ uid: 'System.String', name: 'string' });
      expect(store.itemCount).toBe(1);
      expect(store.referenceCount).toBe(1);
    });

    it('should replace an item added twice', () => {
      store.addItem(makeItem({ uid: 'Game.Player', type: 'Class', summary: 'First.' }));
      store.addItem(makeItem({ uid: 'Game.Player', type: 'Class', summary: 'Second.' }));

      expect(store.itemCount).toBe(1);
      expect(store.getItem('Game.Player')?.summary).toBe('Second.');
    });

    it('should sort items by ordinal UID', () => {
      for (const uid of ['Game.player', 'Game.Player', 'Audio', 'Game']) {
        store.addItem(makeItem({ uid, type: 'Class' }));
      }

      expect(store.getSortedItems().map(item => item.uid)).toEqual([
        'Audio',
        'Game',
        'Game.Player',
        'Game.player',
      ]);
    });

    it('should filter items by type', () => {
      store.addItem(makeItem({ uid: 'Game', type: 'Namespace' }));
      store.addItem(makeItem({ uid: 'Game.Player', type: 'Class' }));
      store.addItem(makeItem({ uid: 'Game.Mode', type: 'Enum' }));

      expect(store.getItemsOfType('Class').map(item => item.uid)).toEqual(['Game.Player']);
      expect(store.getItemsOfType('Struct')).toEqual([]);
    });
  });

  describe('finalize', () => {
    it('should assign short UIDs and case suffixes', () => {
      const upper = makeItem({ uid: 'Game.Foo', type: 'Class' });
      const lower = makeItem({ uid: 'Game.foo', type: 'Class' });
      const jump = makeItem({ uid: 'Game.Foo.Jump', type: 'Method', overload: 'Game.Foo.Jump*' });
      store.addItem(upper);
      store.addItem(lower);
      store.addItem(jump);

      store.finalize();

      expect(store.getStage()).toBe('disambiguated');
      expect(store.caseSuffixFor(upper)).toBe('0');
      expect(store.caseSuffixFor(lower)).toBe('1');
      expect(store.caseSuffixFor(jump)).toBe('');
      expect(jump.shortUid).toBe('Game.Foo.Jump');
      expect(store.shortUidFor(upper)).toBe('Game.Foo');
    });

    it('should reject derived identifiers before finalizing', () => {
      const item = makeItem({ uid: 'Game.Player', type: 'Class' });
      store.addItem(item);

      expect(() => store.caseSuffixFor(item)).toThrow(StructuralError);
      expect(() => store.shortUidFor(item)).toThrow(
        'Cannot compute short UIDs before the item store is finalized'
      );
    });

    it('should reject new items once finalized', () => {
      store.finalize();

      expect(() => store.addItem(makeItem({ uid: 'Late', type: 'Class' }))).toThrow(
        'Cannot add items while the item store is disambiguated (expected populating)'
      );
      expect(() => store.addReference({ uid: 'Late' })).toThrow(StructuralError);
    });

    it('should not finalize twice', () => {
      store.finalize();

      expect(() => store.finalize()).toThrow(StructuralError);
    });
  });

  describe('freeze', () => {
    it('should move a finalized store to frozen', () => {
      store.finalize();
      store.freeze();

      expect(store.getStage()).toBe('frozen');
    });

    it('should refuse to freeze a store still being populated', () => {
      expect(() => store.freeze()).toThrow(
        'Cannot freeze while the item store is populating (expected disambiguated)'
      );
    });

    it('should keep serving case suffixes once frozen', () => {
      const item = makeItem({ uid: 'Game', type: 'Namespace' });
      store.addItem(item);
      store.finalize();
      store.freeze();

      expect(store.caseSuffixFor(item)).toBe('');
    });
  });
});
