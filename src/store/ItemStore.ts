/**
 * @file ItemStore.ts
 * @module store/ItemStore
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Holds the item graph and external references for one run.
 */

import type { Item, ItemType, Reference } from '../model/types.js';
import { StructuralError } from '../shared/errors.js';
import { compareOrdinal, disambiguate } from './UidDisambiguator.js';

/**
 * Lifecycle stage of a store.
 *
 * - `populating`: items and references may be added
 * - `disambiguated`: derived identifiers are known; text fields may be merged
 * - `frozen`: read-only, used while rendering
 */
export type StoreStage = 'populating' | 'disambiguated' | 'frozen';

/**
 * The full graph of documented items and the references they mention.
 *
 * Derived identifiers (short UIDs, case suffixes) need every item to be
 * present, so they are computed once by {@link ItemStore.finalize} and
 * never per item.
 *
 * @example
 * ```typescript
 * const store = new ItemStore();
 * store.addItem(item);
 * store.addReference({ uid: 'System.String', name: 'String' });
 * store.finalize();
 * store.caseSuffixFor(item); // '' unless another UID differs only by case
 * ```
 */
export class ItemStore {
  private items = new Map<string, Item>();
  private references = new Map<string, Reference>();
  private caseSuffixes = new Map<string, string>();
  private stage: StoreStage = 'populating';

  /**
   * Add or replace an item. Only valid while populating.
   */
  addItem(item: Item): void {
    this.assertStage('populating', 'add items');
    this.items.set(item.uid, item);
  }

  /**
   * Add or replace a reference. Only valid while populating.
   */
  addReference(reference: Reference): void {
    this.assertStage('populating', 'add references');
    this.references.set(reference.uid, reference);
  }

  getItem(uid: string): Item | undefined {
    return this.items.get(uid);
  }

  hasItem(uid: string): boolean {
    return this.items.has(uid);
  }

  getReference(uid: string): Reference | undefined {
    return this.references.get(uid);
  }

  /**
   * All items, in insertion order.
   */
  getItems(): Item[] {
    return [...this.items.values()];
  }

  /**
   * All items sorted by ordinal UID.
   */
  getSortedItems(): Item[] {
    return this.getItems().sort((a, b) => compareOrdinal(a.uid, b.uid));
  }

  getItemsOfType(type: ItemType): Item[] {
    return this.getItems().filter(item => item.type === type);
  }

  get itemCount(): number {
    return this.items.size;
  }

  get referenceCount(): number {
    return this.references.size;
  }

  getStage(): StoreStage {
    return this.stage;
  }

  /**
   * End population and compute derived identifiers for every item.
   */
  finalize(): void {
    this.assertStage('populating', 'finalize');

    const { shortUids, caseSuffixes } = disambiguate(this.items.values());
    for (const item of this.items.values()) {
      item.shortUid = shortUids.get(item.uid);
    }
    this.caseSuffixes = caseSuffixes;
    this.stage = 'disambiguated';
  }

  /**
   * Make the store read-only for rendering.
   */
  freeze(): void {
    this.assertStage('disambiguated', 'freeze');
    this.stage = 'frozen';
  }

  /**
   * Suffix that separates UIDs which differ only by letter case.
   */
  caseSuffixFor(item: Item): string {
    this.assertFinalized('compute case suffixes');
    return this.caseSuffixes.get(item.uid) ?? '';
  }

  /**
   * Short UID of an item, falling back to its full UID.
   */
  shortUidFor(item: Item): string {
    this.assertFinalized('compute short UIDs');
    return item.shortUid ?? item.uid;
  }

  /**
   * Throw unless the store is in the given stage.
   */
  assertStage(expected: StoreStage, action: string): void {
    if (this.stage !== expected) {
      throw new StructuralError(
        `Cannot ${action} while the item store is ${this.stage} (expected ${expected})`
      );
    }
  }

  private assertFinalized(action: string): void {
    if (this.stage === 'populating') {
      throw new StructuralError(`Cannot ${action} before the item store is finalized`);
    }
  }
}
