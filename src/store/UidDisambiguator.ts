/**
 * @file UidDisambiguator.ts
 * @module store/UidDisambiguator
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Whole-store computation of short UIDs and case-collision suffixes.
 */

import type { Item } from '../model/types.js';

/**
 * Derived identifiers for every item in a store, keyed by UID.
 */
export interface Disambiguation {
  shortUids: Map<string, string>;
  caseSuffixes: Map<string, string>;
}

/**
 * Ordinal (UTF-16 code unit) comparison, independent of locale.
 */
export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function groupBy<K>(items: Iterable<Item>, key: (item: Item) => K): Map<K, Item[]> {
  const groups = new Map<K, Item[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

/**
 * Compute the short UID of every item.
 *
 * An item whose overload key is held by no other item collapses onto that
 * key with trailing `*` markers removed. Items sharing an overload key, and
 * items with no overload key at all, keep their full UID.
 */
export function computeShortUids(items: Iterable<Item>): Map<string, string> {
  const list = [...items];
  const byOverload = groupBy(list, item => item.overload);
  const shortUids = new Map<string, string>();

  for (const item of list) {
    const overload = item.overload;
    if (overload !== undefined && byOverload.get(overload)?.length === 1) {
      shortUids.set(item.uid, overload.replace(/\*+$/, ''));
    } else {
      shortUids.set(item.uid, item.uid);
    }
  }

  return shortUids;
}

/**
 * Compute the case-collision suffix of every item.
 *
 * Items whose UIDs are equal once lowercased are ranked by ordinal UID and
 * receive their zero-based rank; an item with no such sibling gets `''`.
 */
export function computeCaseSuffixes(items: Iterable<Item>): Map<string, string> {
  const groups = groupBy(items, item => item.uid.toLowerCase());
  const suffixes = new Map<string, string>();

  for (const group of groups.values()) {
    if (group.length === 1) {
      suffixes.set(group[0].uid, '');
      continue;
    }
    const ranked = group.map(item => item.uid).sort(compareOrdinal);
    ranked.forEach((uid, index) => suffixes.set(uid, String(index)));
  }

  return suffixes;
}

export function disambiguate(items: Iterable<Item>): Disambiguation {
  const list = [...items];
  return {
    shortUids: computeShortUids(list),
    caseSuffixes: computeCaseSuffixes(list),
  };
}
