/**
 * @file text.ts
 * @module utils/text
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Text helpers for embedding metadata strings in markdown.
 */

import * as cheerio from 'cheerio';

/**
 * Decode HTML entities (`&lt;`, `&amp;`, `&#39;` ...) without interpreting
 * any tags in the text.
 *
 * The text is parsed as the content of a `<textarea>`, whose contents the
 * HTML parser treats as raw text with entity references. The leading
 * newline keeps the parser from eating one that belongs to the text.
 * Line endings come back as `\n` whether or not the text has entities,
 * since the parser normalizes them.
 *
 * @param text - Text that may contain entity references
 * @returns Text with entities replaced by the characters they stand for
 */
export function decodeHtmlEntities(text: string): string {
  const normalized = text.replace(/\r\n?/g, '\n');
  if (!normalized.includes('&')) {
    return normalized;
  }
  const escaped = normalized.replace(/<\/textarea/gi, '&lt;/textarea');
  const $ = cheerio.load(`<textarea>\n${escaped}</textarea>`);
  return $('textarea').text();
}

/**
 * Make a string safe to place in a single table cell.
 */
export function formatForTable(input: string | undefined): string {
  if (input === undefined) {
    return '';
  }
  return input.replace(/\n/g, ' ');
}

/**
 * True for undefined, empty and whitespace-only strings.
 */
export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}
