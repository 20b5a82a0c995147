/**
 * @file DocfxConverter.ts
 * @module converter/DocfxConverter
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Runs the ordered load, disambiguate, merge and render pipeline.
 */

import { existsSync } from 'node:fs';
import { MetadataLoader } from '../loader/MetadataLoader.js';
import { ItemStore } from '../store/ItemStore.js';
import { OverwriteMerger } from '../overwrite/OverwriteMerger.js';
import type { MergeSummary } from '../overwrite/OverwriteMerger.js';
import { findOverwriteFiles, readOverwriteFile } from '../overwrite/OverwriteParser.js';
import { PathResolver } from '../writer/PathResolver.js';
import { FileWriter } from '../writer/FileWriter.js';
import { ReferenceLinker } from '../linker/ReferenceLinker.js';
import { MarkdownGenerator } from '../generator/MarkdownGenerator.js';
import type { Logger } from '../shared/logger.js';
import { consoleLogger } from '../shared/logger.js';
import type { ConverterOptions, ConversionResult } from './types.js';

/**
 * Converts a directory of DocFX metadata into markdown documents.
 *
 * The stages run strictly in order, because each one reads state the
 * previous one completes:
 * 1. load every item and reference into the store
 * 2. compute short UIDs and case suffixes over the whole store
 * 3. merge overwrite documents
 * 4. freeze the store and write one document per item, then the index
 *
 * Any fatal error aborts the run; documents already written stay on disk.
 *
 * @example
 * ```typescript
 * const converter = new DocfxConverter();
 * const result = converter.convert({ inputDir: './obj/api', outputDir: './content/api' });
 * console.log(`${result.documents} documents in ${result.elapsedMs}ms`);
 * ```
 */
export class DocfxConverter {
  /**
   * Run a full conversion.
   * @param options - Conversion options
   * @returns Conversion result with statistics
   */
  convert(options: ConverterOptions): ConversionResult {
    const startTime = Date.now();
    const logger = options.logger ?? consoleLogger;
    const verbose = options.verbose ?? false;

    const store = new ItemStore();
    const loadStats = new MetadataLoader(options.inputDir, { logger, verbose }).loadInto(store);
    store.finalize();

    const merge = this.applyOverwrites(store, options, logger);
    store.freeze();

    const pathResolver = new PathResolver(store);
    const linker = new ReferenceLinker({
      store,
      pathResolver,
      authorities: options.authorities,
      linkStyle: options.linkStyle,
      linkBase: options.linkBase,
    });
    const generator = new MarkdownGenerator(store, linker, { codeLanguage: options.codeLanguage });
    const writer = new FileWriter(options.outputDir);

    let documents = 0;
    for (const item of store.getSortedItems()) {
      if (item.doNotDocument) continue;
      documents++;

      const outputPath = pathResolver.outputPathFor(item);
      if (verbose) {
        logger.log(`Writing ${outputPath}.md`);
      }
      writer.writeDocument(outputPath, generator.generate(item, documents));
    }

    const namespaces = store.getSortedItems().filter(item => item.type === 'Namespace');
    writer.writeDocument('_index', generator.generateIndex(namespaces));

    return {
      items: loadStats.items,
      references: loadStats.references,
      documents,
      overwritesApplied: merge.applied,
      overwritesSkipped: merge.skipped,
      writeStats: writer.getStats(),
      elapsedMs: Date.now() - startTime,
    };
  }

  private applyOverwrites(store: ItemStore, options: ConverterOptions, logger: Logger): MergeSummary {
    const dir = options.overwriteDir;
    if (dir === undefined) {
      return { applied: 0, skipped: 0 };
    }
    if (!existsSync(dir)) {
      logger.warn(`WARNING: Overwrite directory ${dir} does not exist; no overwrites applied`);
      return { applied: 0, skipped: 0 };
    }

    const documents = findOverwriteFiles(dir).map(readOverwriteFile);
    const merger = new OverwriteMerger(store, { logger, verbose: options.verbose });
    return merger.applyAll(documents);
  }
}
