/**
 * @file PathResolver.ts
 * @module writer/PathResolver
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Maps items to unique relative output paths.
 */

import type { Item } from '../model/types.js';
import { isMemberType } from '../model/types.js';
import type { ItemStore } from '../store/ItemStore.js';
import { StructuralError } from '../shared/errors.js';

/**
 * Replace characters that identifiers use as markers but paths should not
 * carry: `#` becomes `_` and generic-arity backticks become `-`.
 */
export function normalizePath(path: string): string {
  return path.replace(/#/g, '_').replace(/`/g, '-');
}

/**
 * Resolves the output location of every item in a finalized store.
 *
 * Paths carry no file extension. Types and namespaces get a directory with
 * an `_index` page; members are pages inside their declaring type's
 * directory.
 *
 * @example
 * ```typescript
 * const resolver = new PathResolver(store);
 * resolver.pathForItem(store.getItem('Game.Player')!);     // "Player/_index"
 * resolver.outputPathFor(store.getItem('Game.Player')!);   // "Game/Player/_index"
 * ```
 */
export class PathResolver {
  private store: ItemStore;

  constructor(store: ItemStore) {
    this.store = store;
  }

  /**
   * Path of an item relative to its namespace directory (or to the output
   * root, for namespaces).
   */
  pathForItem(item: Item): string {
    const caseSuffix = this.store.caseSuffixFor(item);
    let path: string;

    if (item.type === 'Namespace') {
      path = `${item.uid}${caseSuffix}/_index`;
    } else if (isMemberType(item.type)) {
      const parent = this.requireTypeParent(item);
      path = `${this.stripNamespacePrefix(parent)}/${this.store.shortUidFor(item)}${caseSuffix}`;
    } else {
      path = `${this.stripNamespacePrefix(item)}${caseSuffix}/_index`;
    }

    return normalizePath(path);
  }

  /**
   * Path of an item's document relative to the output root.
   */
  outputPathFor(item: Item): string {
    const path = this.pathForItem(item);
    if (item.type === 'Namespace' || !item.namespace) {
      return path;
    }
    return normalizePath(`${this.namespaceDirectory(item.namespace)}/${path}`);
  }

  /**
   * Remove a single leading `"<namespace>."` from an item's UID.
   */
  stripNamespacePrefix(item: Item): string {
    if (item.namespace === undefined) {
      return item.uid;
    }
    const prefix = `${item.namespace}.`;
    return item.uid.startsWith(prefix) ? item.uid.slice(prefix.length) : item.uid;
  }

  /**
   * Directory of a namespace, matching the directory of its own page.
   */
  private namespaceDirectory(namespaceUid: string): string {
    const namespace = this.store.getItem(namespaceUid);
    if (!namespace) {
      return namespaceUid;
    }
    return namespaceUid + this.store.caseSuffixFor(namespace);
  }

  private requireTypeParent(item: Item): Item {
    const parent = item.parent === undefined ? undefined : this.store.getItem(item.parent);
    if (!parent) {
      throw new StructuralError(
        `Parent of item ${item.uid} (a ${item.type}) is not in the item store`
      );
    }
    if (parent.type === 'Namespace') {
      throw new StructuralError(
        `Parent of item ${item.uid} (a ${item.type}) is a namespace; members must belong to a type`
      );
    }
    return parent;
  }
}
