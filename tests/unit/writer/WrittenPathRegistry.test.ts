/**
 * @file WrittenPathRegistry.test.ts
 * @module tests/unit/writer/WrittenPathRegistry
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Unit tests for case-insensitive path claims.
 */

import { WrittenPathRegistry } from '../../../src/writer/WrittenPathRegistry.js';
import { PathCollisionError } from '../../../src/shared/errors.js';

describe('WrittenPathRegistry', () => {
  it('should record claimed paths', () => {
    const registry = new WrittenPathRegistry();
    registry.claim('Game/_index.md');
    registry.claim('Game/Player/_index.md');

    expect(registry.size).toBe(2);
    expect(registry.has('game/player/_INDEX.md')).toBe(true);
    expect(registry.has('Game/Enemy/_index.md')).toBe(false);
  });

  it('should reject a path differing only by case', () => {
    const registry = new WrittenPathRegistry();
    registry.claim('Ns/Widget/_index.md');

    expect(() => registry.claim('ns/widget/_index.md')).toThrow(PathCollisionError);
    expect(registry.size).toBe(1);
  });

  it('should report the colliding path', () => {
    const registry = new WrittenPathRegistry();
    registry.claim('Ns/_index.md');

    try {
      registry.claim('Ns/_index.md');
      throw new Error('expected a collision');
    } catch (error) {
      expect(error).toBeInstanceOf(PathCollisionError);
      if (error instanceof PathCollisionError) {
        expect(error.path).toBe('Ns/_index.md');
        expect(error.code).toBe('PATH_COLLISION');
        expect(error.message).toBe('Ns/_index.md has already been written to');
      }
    }
  });
});
