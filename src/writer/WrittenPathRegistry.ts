/**
 * @file WrittenPathRegistry.ts
 * @module writer/WrittenPathRegistry
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Case-insensitive record of output paths claimed during a run.
 */

import { PathCollisionError } from '../shared/errors.js';

/**
 * Tracks every path written in a run so that no two documents land on the
 * same file, even on a case-insensitive file system.
 */
export class WrittenPathRegistry {
  private claimed = new Set<string>();

  /**
   * Claim a path, throwing {@link PathCollisionError} if it (or a path
   * differing only by case) was claimed before.
   */
  claim(path: string): void {
    const key = path.toLowerCase();
    if (this.claimed.has(key)) {
      throw new PathCollisionError(path);
    }
    this.claimed.add(key);
  }

  has(path: string): boolean {
    return this.claimed.has(path.toLowerCase());
  }

  get size(): number {
    return this.claimed.size;
  }
}
