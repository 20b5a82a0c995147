/**
 * @file types.ts
 * @module converter/types
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Type definitions for the metadata-to-markdown converter.
 */

import type { AuthorityRule } from '../linker/authorities.js';
import type { LinkStyle } from '../linker/ReferenceLinker.js';
import type { Logger } from '../shared/logger.js';
import type { WriteStats } from '../writer/FileWriter.js';

export type { WriteStats };

/**
 * Configuration options for a conversion run.
 */
export interface ConverterOptions {
  /** Directory holding `toc.yml` and the per-UID YAML files */
  inputDir: string;
  /** Output directory for generated files */
  outputDir: string;
  /** Directory searched recursively for overwrite `.md` files */
  overwriteDir?: string;
  /** Enable verbose logging */
  verbose?: boolean;
  /** How internal links are written (default `hugo`) */
  linkStyle?: LinkStyle;
  /** Site path of the output directory (default `/api`) */
  linkBase?: string;
  /** Language tag for declaration code blocks (default `csharp`) */
  codeLanguage?: string;
  /** External documentation authorities (default: .NET and Unity) */
  authorities?: AuthorityRule[];
  logger?: Logger;
}

/**
 * Result of a conversion run.
 */
export interface ConversionResult {
  /** Items loaded into the store */
  items: number;
  /** References loaded into the store */
  references: number;
  /** Item documents written, not counting the index */
  documents: number;
  /** Overwrite documents merged into an item */
  overwritesApplied: number;
  /** Overwrite documents whose UID matched no item */
  overwritesSkipped: number;
  /** File write statistics */
  writeStats: WriteStats;
  /** Time taken in milliseconds */
  elapsedMs: number;
}
