/**
 * @file MetadataLoader.ts
 * @module loader/MetadataLoader
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Reads DocFX managed-reference YAML into an item store.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import * as YAML from 'yaml';
import type { z } from 'zod';
import type { Item, Reference } from '../model/types.js';
import type { RawItem, TocEntry } from '../model/schema.js';
import { itemCollectionSchema, tocSchema } from '../model/schema.js';
import type { ItemStore } from '../store/ItemStore.js';
import { MetadataFormatError, MissingInputError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { consoleLogger } from '../shared/logger.js';

/**
 * Name of the root index that lists every documented namespace.
 */
export const TOC_FILE = 'toc.yml';

export interface LoaderOptions {
  logger?: Logger;
  verbose?: boolean;
}

/**
 * Counts from one load.
 */
export interface LoadStats {
  filesRead: number;
  items: number;
  references: number;
}

/**
 * File name of the YAML document describing a UID.
 */
export function metadataFileName(uid: string): string {
  return uid.replace(/`/g, '-') + '.yml';
}

/**
 * Convert a validated YAML item into the store's item shape.
 */
export function toItem(raw: RawItem): Item {
  return {
    uid: raw.uid,
    id: raw.id,
    type: raw.type,
    name: raw.name ?? raw.id ?? raw.uid,
    nameWithType: raw.nameWithType,
    fullName: raw.fullName,
    namespace: raw.namespace,
    parent: raw.parent,
    children: raw.children,
    inheritedMembers: raw.inheritedMembers,
    overload: raw.overload,
    summary: raw.summary,
    remarks: raw.remarks,
    example: raw.example,
    syntax: raw.syntax,
    exceptions: raw.exceptions,
    attributes: raw.attributes,
    source: raw.source,
    assemblies: raw.assemblies,
    seeAlso: raw.seealso.map(entry => entry.linkId),
    doNotDocument: raw.doNotDocument,
  };
}

/**
 * Populates an {@link ItemStore} from a directory of DocFX metadata.
 *
 * `toc.yml` names each namespace and its children; every one of those UIDs
 * has its own YAML file holding its items and the references they use.
 *
 * @example
 * ```typescript
 * const loader = new MetadataLoader('./obj/api');
 * const stats = loader.loadInto(store);
 * console.log(`${stats.items} items from ${stats.filesRead} files`);
 * ```
 */
export class MetadataLoader {
  private inputDir: string;
  private logger: Logger;
  private verbose: boolean;

  constructor(inputDir: string, options: LoaderOptions = {}) {
    this.inputDir = inputDir;
    this.logger = options.logger ?? consoleLogger;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Read and validate the root index.
   */
  loadToc(): TocEntry[] {
    if (!existsSync(this.inputDir) || !statSync(this.inputDir).isDirectory()) {
      throw new MissingInputError(this.inputDir, 'Input directory');
    }
    return this.readDocument(TOC_FILE, tocSchema);
  }

  /**
   * Load every item and reference named by the root index into the store.
   * @param store - A store that is still populating
   */
  loadInto(store: ItemStore): LoadStats {
    const stats: LoadStats = { filesRead: 0, items: 0, references: 0 };

    for (const entry of this.loadToc()) {
      const uids = [...entry.items.map(child => child.uid), entry.uid];

      for (const uid of uids) {
        const fileName = metadataFileName(uid);
        if (this.verbose) {
          this.logger.log(`Reading ${fileName}`);
        }
        const collection = this.readDocument(fileName, itemCollectionSchema);
        stats.filesRead++;

        for (const raw of collection.items) {
          store.addItem(toItem(raw));
          stats.items++;
        }
        for (const raw of collection.references) {
          const reference: Reference = { uid: raw.uid, name: raw.name };
          store.addReference(reference);
          stats.references++;
        }
      }
    }

    return stats;
  }

  private readDocument<T extends z.ZodTypeAny>(fileName: string, schema: T): z.output<T> {
    const filePath = join(this.inputDir, fileName);
    if (!existsSync(filePath)) {
      throw new MissingInputError(filePath, 'Metadata file');
    }

    let data: unknown;
    try {
      data = YAML.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new MetadataFormatError(fileName, detail);
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new MetadataFormatError(fileName, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return result.data;
  }
}
