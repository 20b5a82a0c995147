/**
 * @file logger.ts
 * @module shared/logger
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Console-shaped logger accepted by pipeline components.
 */

/**
 * The subset of `console` the converter writes to.
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export const consoleLogger: Logger = console;
