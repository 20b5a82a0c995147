/**
 * @file text.test.ts
 * @module tests/unit/shared/text
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Unit tests for text helpers.
 */

import { decodeHtmlEntities, formatForTable, isBlank } from '../../../src/shared/utils/text.js';

describe('text utilities', () => {
  describe('decodeHtmlEntities', () => {
    it('should decode named and numeric entities', () => {
      expect(decodeHtmlEntities('List&lt;T&gt; &amp; more')).toBe('List<T> & more');
      expect(decodeHtmlEntities('it&#39;s')).toBe("it's");
    });

    it('should return text without entities unchanged', () => {
      expect(decodeHtmlEntities('<b>bold</b>')).toBe('<b>bold</b>');
    });

    it('should keep markup and leading newlines', () => {
      expect(decodeHtmlEntities('\n<code>a &amp;&amp; b</code>')).toBe('\n<code>a && b</code>');
    });

    it('should normalize line endings with or without entities', () => {
      expect(decodeHtmlEntities('one\r\ntwo')).toBe('one\ntwo');
      expect(decodeHtmlEntities('one &amp;\r\ntwo')).toBe('one &\ntwo');
    });
  });

  describe('formatForTable', () => {
    it('should flatten line breaks', () => {
      expect(formatForTable('first\nsecond')).toBe('first second');
    });

    it('should turn absent text into an empty string', () => {
      expect(formatForTable(undefined)).toBe('');
    });
  });

  describe('isBlank', () => {
    it('should treat whitespace-only text as blank', () => {
      expect(isBlank(undefined)).toBe(true);
      expect(isBlank(' \n\t')).toBe(true);
      expect(isBlank('x')).toBe(false);
    });
  });
});
