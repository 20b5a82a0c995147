#!/usr/bin/env node

/**
 * @file index.ts
 * @module index
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview CLI entry point for converting DocFX metadata to Markdown.
 */

/**
 * @example
 * ```bash
 * # Convert metadata to markdown
 * docfx2md ./obj/api -o ./content/api
 *
 * # Apply overwrite files and use plain markdown links
 * docfx2md ./obj/api -o ./content/api --overwrites ./docs/overwrites --link-style markdown
 *
 * # Show what the metadata contains
 * docfx2md info ./obj/api
 * ```
 */

import { resolve } from 'node:path';

import { InvalidArgumentError, program } from 'commander';

import { DocfxConverter } from './converter/DocfxConverter.js';
import { MetadataLoader } from './loader/MetadataLoader.js';
import { loadAuthorityTable } from './linker/authorities.js';
import type { LinkStyle } from './linker/ReferenceLinker.js';
import { ITEM_TYPES } from './model/types.js';
import { ItemStore } from './store/ItemStore.js';
import { ConversionError } from './shared/errors.js';

/**
 * Command-line options for the convert command.
 */
interface ConvertOptions {
    /** Output directory path */
    output: string;
    /** Overwrite file directory */
    overwrites?: string;
    /** JSON file replacing the default authority table */
    authorities?: string;
    linkStyle: LinkStyle;
    linkBase: string;
    codeLanguage: string;
    /** Enable verbose output */
    verbose?: boolean;
}

function parseLinkStyle(value: string): LinkStyle {
    if (value === 'hugo' || value === 'markdown') {
        return value;
    }
    throw new InvalidArgumentError('Expected "hugo" or "markdown".');
}

/**
 * CLI entry point.
 */
async function main() {
    program
        .name('docfx2md')
        .description('Convert DocFX managed-reference metadata to Markdown')
        .version('1.0.0')
        .argument('<input>', 'Directory containing toc.yml and the metadata YAML files')
        .option('-o, --output <dir>', 'Output directory', './output')
        .option('--overwrites <dir>', 'Directory of overwrite files to merge into the metadata')
        .option('--authorities <file>', 'JSON table of external documentation authorities')
        .option('--link-style <style>', 'Internal link style (hugo, markdown)', parseLinkStyle, 'hugo')
        .option('--link-base <path>', 'Site path the output directory is published under', '/api')
        .option('--code-language <lang>', 'Language tag for declaration code blocks', 'csharp')
        .option('-v, --verbose', 'Enable verbose output')
        .action(convert);

    program
        .command('info')
        .description('Show item counts per type')
        .argument('<input>', 'Directory containing toc.yml and the metadata YAML files')
        .action(showInfo);

    await program.parseAsync();
}

/**
 * Convert a metadata directory to markdown files.
 *
 * @param inputDir - Directory containing toc.yml
 * @param options - Conversion options
 */
function convert(inputDir: string, options: ConvertOptions) {
    const resolvedInput = resolve(inputDir);
    const outputDir = resolve(options.output);

    console.log(`Converting metadata: ${resolvedInput}`);
    console.log(`Output directory: ${outputDir}`);

    const converter = new DocfxConverter();
    const result = converter.convert({
        inputDir: resolvedInput,
        outputDir,
        overwriteDir: options.overwrites ? resolve(options.overwrites) : undefined,
        verbose: options.verbose,
        linkStyle: options.linkStyle,
        linkBase: options.linkBase,
        codeLanguage: options.codeLanguage,
        authorities: options.authorities ? loadAuthorityTable(resolve(options.authorities)) : undefined,
    });

    console.log('\n=== Conversion Complete ===');
    console.log(`Time: ${(result.elapsedMs / 1000).toFixed(1)}s`);
    console.log(`Items: ${result.items.toLocaleString()}`);
    console.log(`References: ${result.references.toLocaleString()}`);
    console.log(`Overwrites applied: ${result.overwritesApplied} (skipped: ${result.overwritesSkipped})`);
    console.log(`Documents written: ${result.documents.toLocaleString()} (+ index)`);
    console.log(`Directories created: ${result.writeStats.directoriesCreated}`);
    console.log(`Total size: ${(result.writeStats.bytesWritten / 1024).toFixed(1)} KB`);
}

/**
 * Show the item and reference counts of a metadata directory.
 *
 * @param inputDir - Directory containing toc.yml
 */
function showInfo(inputDir: string) {
    const resolvedInput = resolve(inputDir);
    const store = new ItemStore();
    const stats = new MetadataLoader(resolvedInput).loadInto(store);

    console.log(`Metadata: ${resolvedInput}`);
    console.log(`Files read: ${stats.filesRead}`);
    console.log(`Items: ${store.itemCount.toLocaleString()}`);
    console.log(`References: ${store.referenceCount.toLocaleString()}`);
    console.log('');
    console.log('Item types:');
    for (const type of ITEM_TYPES) {
        const count = store.getItemsOfType(type).length;
        if (count > 0) {
            console.log(`  ${type}: ${count.toLocaleString()}`);
        }
    }
}

main().catch((error: unknown) => {
    if (error instanceof ConversionError) {
        console.error(`Error: ${error.message}`);
    } else {
        console.error(error);
    }
    process.exitCode = 1;
});
