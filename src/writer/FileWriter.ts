/**
 * @file FileWriter.ts
 * @module writer/FileWriter
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Writes markdown documents to the output directory with statistics tracking.
 */

import { mkdirSync, writeFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { WrittenPathRegistry } from './WrittenPathRegistry.js';

/**
 * Statistics about write operations.
 */
export interface WriteStats {
  /** Total number of files written */
  filesWritten: number;
  /** Total number of directories created */
  directoriesCreated: number;
  /** Total bytes written across all files */
  bytesWritten: number;
}

/**
 * Writes documents below an output directory, at most once per path.
 *
 * Every document path is claimed in a {@link WrittenPathRegistry} before
 * anything is written, so a second document resolving to the same file
 * (compared case-insensitively) aborts the run and is never written.
 *
 * @example
 * ```typescript
 * const writer = new FileWriter('./content/api');
 * writer.writeDocument('Game/Player/_index', markdown);
 * console.log(writer.getStats());
 * // { filesWritten: 1, directoriesCreated: 2, bytesWritten: 1234 }
 * ```
 */
export class FileWriter {
  private outputDir: string;
  private registry: WrittenPathRegistry;
  private stats: WriteStats = {
    filesWritten: 0,
    directoriesCreated: 0,
    bytesWritten: 0,
  };
  private createdDirs: Set<string> = new Set();

  /**
   * @param outputDir - Base directory for all output files
   * @param registry - Shared record of claimed paths
   */
  constructor(outputDir: string, registry: WrittenPathRegistry = new WrittenPathRegistry()) {
    this.outputDir = outputDir;
    this.registry = registry;
  }

  /**
   * Write a markdown document.
   * @param relativePath - Resolved output path without extension
   * @param content - Markdown content to write
   * @returns Full path to the written file
   * @throws PathCollisionError if the path was already written in this run
   */
  writeDocument(relativePath: string, content: string): string {
    const fileName = `${relativePath}.md`;
    this.registry.claim(fileName);

    const filePath = join(this.outputDir, fileName);
    this.writeFile(filePath, content);
    return filePath;
  }

  /**
   * Write arbitrary file to the file system, creating parent directories.
   *
   * @param filePath - Full path to the output file
   * @param content - Content to write
   */
  writeFile(filePath: string, content: string): void {
    const dir = dirname(filePath);

    if (!this.createdDirs.has(dir)) {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        this.stats.directoriesCreated++;
      }
      this.createdDirs.add(dir);
    }

    writeFileSync(filePath, content, 'utf-8');
    this.stats.filesWritten++;
    this.stats.bytesWritten += Buffer.byteLength(content, 'utf-8');
  }

  getOutputDir(): string {
    return this.outputDir;
  }

  /**
   * Get write statistics.
   * @returns Copy of the current write statistics
   */
  getStats(): WriteStats {
    return { ...this.stats };
  }
}
