/**
 * @file setup.ts
 * @module tests/setup
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Shared fixture paths and builders for items and stores.
 */

import { mkdirSync, rmSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import type { Item, Reference } from '../src/model/types.js';
import { ItemStore } from '../src/store/ItemStore.js';

// Fixture paths
export const FIXTURES_DIR = resolve(__dirname, 'fixtures');
export const METADATA_DIR = resolve(FIXTURES_DIR, 'metadata');
export const OVERWRITES_DIR = resolve(FIXTURES_DIR, 'overwrites');
export const COLLISION_DIR = resolve(FIXTURES_DIR, 'collision');

type ItemInit = Partial<Item> & Pick<Item, 'uid' | 'type'>;

/**
 * Build an item with empty collections, named after the last UID segment.
 */
export function makeItem(init: ItemInit): Item {
  return {
    name: init.uid.split('.').pop() ?? init.uid,
    children: [],
    inheritedMembers: [],
    example: [],
    exceptions: [],
    attributes: [],
    assemblies: [],
    seeAlso: [],
    doNotDocument: false,
    ...init,
  };
}

/**
 * Populate a store and finalize it.
 */
export function makeStore(items: Item[], references: Reference[] = []): ItemStore {
  const store = new ItemStore();
  for (const item of items) {
    store.addItem(item);
  }
  for (const reference of references) {
    store.addReference(reference);
  }
  store.finalize();
  return store;
}

/**
 * Create an empty scratch directory under the OS temp dir.
 */
export function makeTempDir(label: string): string {
  const dir = join(tmpdir(), `docfx2md-${label}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
