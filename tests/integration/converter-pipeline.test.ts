/**
 * @file converter-pipeline.test.ts
 * @module tests/integration/converter-pipeline
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview End-to-end tests running the converter over fixture metadata.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DocfxConverter } from '../../src/converter/DocfxConverter.js';
import { PathCollisionError } from '../../src/shared/errors.js';
import type { Logger } from '../../src/shared/logger.js';
import { COLLISION_DIR, METADATA_DIR, OVERWRITES_DIR, makeTempDir, removeDir } from '../setup.js';

function mockLogger(): jest.Mocked<Logger> {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('Converter pipeline', () => {
  let outputDir: string;
  let logger: jest.Mocked<Logger>;

  beforeEach(() => {
    outputDir = makeTempDir('pipeline');
    logger = mockLogger();
  });

  afterEach(() => {
    removeDir(outputDir);
  });

  function read(relativePath: string): string {
    return readFileSync(join(outputDir, relativePath), 'utf-8');
  }

  describe('fixture metadata with overwrites', () => {
    it('should write one document per item plus the index', () => {
      const result = new DocfxConverter().convert({
        inputDir: METADATA_DIR,
        outputDir,
        overwriteDir: OVERWRITES_DIR,
        logger,
      });

      expect(result.items).toBe(7);
      expect(result.references).toBe(8);
      expect(result.documents).toBe(7);
      expect(result.overwritesApplied).toBe(2);
      expect(result.overwritesSkipped).toBe(1);
      expect(result.writeStats.filesWritten).toBe(8);

      for (const path of [
        '_index.md',
        'Game/_index.md',
        'Game/Inventory-1/_index.md',
        'Game/Player/_index.md',
        'Game/Player/Game.Player.Health.md',
        'Game/Player/Game.Player.Move(System.Int32).md',
        'Game/Player/Game.Player.Move(System.Single).md',
        'Game/Player/Game.Player.Name.md',
      ]) {
        expect(existsSync(join(outputDir, path))).toBe(true);
      }
    });

    it('should warn once about the overwrite with no matching item', () => {
      new DocfxConverter().convert({ inputDir: METADATA_DIR, outputDir, overwriteDir: OVERWRITES_DIR, logger });

      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        `WARNING: Overwrite file ${join(OVERWRITES_DIR, 'Missing.md')} overwrites item Missing.Thing, but no such item exists in the documentation`
      );
    });

    it('should render merged overwrite content', () => {
      new DocfxConverter().convert({ inputDir: METADATA_DIR, outputDir, overwriteDir: OVERWRITES_DIR, logger });

      const player = read('Game/Player/_index.md');
      expect(player).toContain('\n\nThe **hero** of the game.\n\n');
      expect(player).toContain(
        'Defined in [src/Player.cs](https://github.com/example/game/blob/main/src/Player.cs#L10), line 10.'
      );

      const health = read('Game/Player/Game.Player.Health.md');
      expect(health).toContain('## Remarks\n\nHealth never drops below zero.');
      expect(health).not.toContain('## Example');
    });

    it('should link parameter types to external documentation', () => {
      new DocfxConverter().convert({ inputDir: METADATA_DIR, outputDir, logger });

      expect(read('Game/Player/Game.Player.Move(System.Int32).md')).toContain(
        '|[`Int32`](https://docs.microsoft.com/dotnet/api/System.Int32) steps|Number of steps.|'
      );
    });

    it('should list namespaces and incomplete items in the index', () => {
      new DocfxConverter().convert({ inputDir: METADATA_DIR, outputDir, logger });

      const index = read('_index.md');
      expect(index).toContain('|[Game]({{<ref "/api/Game/_index.md">}})||');
      expect(index.endsWith(
        '## Items Needing Work\n\n* [`Player.Move(Single)`]({{<ref "/api/Game/Player/Game.Player.Move(System.Single).md">}})\n'
      )).toBe(true);
    });

    it('should resolve the class summary cross reference without overwrites', () => {
      new DocfxConverter().convert({ inputDir: METADATA_DIR, outputDir, logger });

      expect(read('Game/Player/_index.md')).toContain(
        'A player in the [`Game`]({{<ref "/api/Game/_index.md">}}) world.'
      );
    });

    it('should write plain markdown links under a custom base', () => {
      new DocfxConverter().convert({
        inputDir: METADATA_DIR,
        outputDir,
        logger,
        linkStyle: 'markdown',
        linkBase: '/reference',
      });

      expect(read('_index.md')).toContain('|[Game](/reference/Game/_index.md)||');
    });

    it('should log each document when verbose', () => {
      new DocfxConverter().convert({ inputDir: METADATA_DIR, outputDir, logger, verbose: true });

      expect(logger.log).toHaveBeenCalledWith('Writing Game/Player/Game.Player.Move(System.Int32).md');
      expect(logger.log).toHaveBeenCalledWith('Reading Game.Player.yml');
    });

    it('should warn and continue when the overwrite directory is missing', () => {
      const missing = join(outputDir, 'no-overwrites');
      const result = new DocfxConverter().convert({ inputDir: METADATA_DIR, outputDir, overwriteDir: missing, logger });

      expect(result.overwritesApplied).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(
        `WARNING: Overwrite directory ${missing} does not exist; no overwrites applied`
      );
    });
  });

  describe('path collisions', () => {
    it('should abort on the first colliding path', () => {
      const convert = () => new DocfxConverter().convert({ inputDir: COLLISION_DIR, outputDir, logger });

      expect(convert).toThrow(PathCollisionError);
      expect(convert).toThrow('Ns/Widget/_index.md has already been written to');
    });

    it('should keep documents written before the collision and write nothing after it', () => {
      expect(() => new DocfxConverter().convert({ inputDir: COLLISION_DIR, outputDir, logger })).toThrow(
        PathCollisionError
      );

      expect(read('Ns/Widget/_index.md')).toContain('The widget.');
      expect(existsSync(join(outputDir, 'Ns/_index.md'))).toBe(true);
      expect(existsSync(join(outputDir, '_index.md'))).toBe(false);
    });
  });
});
