/**
 * @file OverwriteMerger.ts
 * @module overwrite/OverwriteMerger
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Applies overwrite records to items using a fixed per-field merge table.
 */

import type { Item, OverwriteRecord } from '../model/types.js';
import type { ItemStore } from '../store/ItemStore.js';
import type { Logger } from '../shared/logger.js';
import { consoleLogger } from '../shared/logger.js';
import { isBlank } from '../shared/utils/text.js';
import type { OverwriteDocument } from './OverwriteParser.js';

type TextField = 'id' | 'name' | 'nameWithType' | 'fullName' | 'summary' | 'remarks';
type IgnoredField =
  | 'uid'
  | 'type'
  | 'example'
  | 'overload'
  | 'namespace'
  | 'parent'
  | 'source'
  | 'syntax';

export type MergeRule =
  | { field: TextField; strategy: 'replace' }
  | { field: IgnoredField; strategy: 'ignore' };

/**
 * How each field of an overwrite record affects the target item, in the
 * order the fields are applied.
 *
 * Only text fields are replaced. Identity and placement fields are
 * ignored: paths and short UIDs were computed from them before any
 * overwrite is applied. Lists and nested structures are never merged.
 */
export const MERGE_TABLE: readonly MergeRule[] = [
  { field: 'uid', strategy: 'ignore' },
  { field: 'type', strategy: 'ignore' },
  { field: 'id', strategy: 'replace' },
  { field: 'name', strategy: 'replace' },
  { field: 'nameWithType', strategy: 'replace' },
  { field: 'fullName', strategy: 'replace' },
  { field: 'summary', strategy: 'replace' },
  { field: 'remarks', strategy: 'replace' },
  { field: 'example', strategy: 'ignore' },
  { field: 'overload', strategy: 'ignore' },
  { field: 'namespace', strategy: 'ignore' },
  { field: 'parent', strategy: 'ignore' },
  { field: 'source', strategy: 'ignore' },
  { field: 'syntax', strategy: 'ignore' },
];

export interface MergerOptions {
  logger?: Logger;
  /** Log every field that is applied */
  verbose?: boolean;
}

export interface MergeSummary {
  /** Documents merged into an existing item */
  applied: number;
  /** Documents whose UID matched no item */
  skipped: number;
}

/**
 * Merges externally authored partial items into a disambiguated store.
 *
 * @example
 * ```typescript
 * const merger = new OverwriteMerger(store);
 * const docs = findOverwriteFiles('./overwrites').map(readOverwriteFile);
 * const { applied, skipped } = merger.applyAll(docs);
 * ```
 */
export class OverwriteMerger {
  private store: ItemStore;
  private logger: Logger;
  private verbose: boolean;

  constructor(store: ItemStore, options: MergerOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? consoleLogger;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Merge one document into the item with the same UID.
   * @returns false (after a warning) when no such item exists
   */
  apply(document: OverwriteDocument): boolean {
    this.store.assertStage('disambiguated', 'merge overwrites');

    const { record, source } = document;
    const item = this.store.getItem(record.uid);
    if (!item) {
      this.logger.warn(
        `WARNING: Overwrite file ${source} overwrites item ${record.uid}, but no such item exists in the documentation`
      );
      return false;
    }

    for (const rule of MERGE_TABLE) {
      this.applyRule(rule, record, item);
    }
    return true;
  }

  applyAll(documents: Iterable<OverwriteDocument>): MergeSummary {
    const summary: MergeSummary = { applied: 0, skipped: 0 };
    for (const document of documents) {
      if (this.apply(document)) {
        summary.applied++;
      } else {
        summary.skipped++;
      }
    }
    return summary;
  }

  private applyRule(rule: MergeRule, record: OverwriteRecord, item: Item): void {
    switch (rule.strategy) {
      case 'replace': {
        const value = record[rule.field];
        if (value !== undefined && !isBlank(value)) {
          item[rule.field] = value;
          this.trace(item.uid, rule.field, value);
        }
        break;
      }
      case 'ignore':
        break;
    }
  }

  private trace(uid: string, field: string, value: string): void {
    if (this.verbose) {
      this.logger.log(`${uid} ${field} => ${value}`);
    }
  }
}
