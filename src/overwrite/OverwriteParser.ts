/**
 * @file OverwriteParser.ts
 * @module overwrite/OverwriteParser
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Parses overwrite documents: a YAML header followed by a markdown body.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as YAML from 'yaml';
import { z } from 'zod';
import type { OverwriteRecord } from '../model/types.js';
import { scalarText } from '../model/schema.js';
import { MissingInputError, OverwriteFormatError, OverwriteValidationError } from '../shared/errors.js';
import { isBlank } from '../shared/utils/text.js';
import { compareOrdinal } from '../store/UidDisambiguator.js';

/**
 * Header value meaning "use the markdown body here".
 */
export const CONTENT_MARKER = '*content';

/**
 * `*content` is a YAML alias to an anchor that does not exist, so it is
 * swapped for this plain scalar before the header is parsed.
 */
export const CONTENT_PLACEHOLDER = '__content__';

const HEADER_DELIMITER = '---';

/**
 * A parsed overwrite document and where it came from.
 */
export interface OverwriteDocument {
  source: string;
  record: OverwriteRecord;
}

const overwriteHeaderSchema = z.object({
  uid: scalarText,
  id: scalarText,
  name: scalarText,
  nameWithType: scalarText,
  fullName: scalarText,
  summary: scalarText,
  remarks: scalarText,
  example: z
    .array(scalarText)
    .nullish()
    .transform(list => list?.filter((entry): entry is string => entry !== undefined)),
  type: scalarText,
  overload: scalarText,
  namespace: scalarText,
  parent: scalarText,
});

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Parse the text of an overwrite document.
 *
 * @param text - Full document text
 * @param source - Name of the document, used in error messages
 * @returns The partial item described by the header, with `*content`
 *   fields replaced by the body
 * @throws OverwriteFormatError if the header is missing, unterminated or not valid YAML
 * @throws OverwriteValidationError if the header has no UID
 */
export function parseOverwrite(text: string, source: string): OverwriteRecord {
  const lines = splitLines(text);

  if (lines[0] !== HEADER_DELIMITER) {
    throw new OverwriteFormatError(source, `Expected '${HEADER_DELIMITER}' on the first line`);
  }

  const header: string[] = [];
  let index = 1;
  while (lines[index] !== HEADER_DELIMITER) {
    if (index >= lines.length) {
      throw new OverwriteFormatError(source, 'Unexpected end of file');
    }
    header.push(lines[index].split(CONTENT_MARKER).join(CONTENT_PLACEHOLDER));
    index++;
  }

  const body = lines.slice(index + 1).join('\n');

  let parsed: unknown;
  try {
    parsed = YAML.parse(header.join('\n'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new OverwriteFormatError(source, `Invalid YAML header (${detail})`);
  }

  const result = overwriteHeaderSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.') || 'header';
    throw new OverwriteFormatError(source, `Invalid header field '${field}' (${issue.message})`);
  }

  const { uid, ...fields } = result.data;
  if (uid === undefined || isBlank(uid)) {
    throw new OverwriteValidationError(source, 'does not specify a UID');
  }

  return applyContent({ uid, ...fields }, body);
}

/**
 * Replace every field holding the content placeholder with the body text.
 */
function applyContent(record: OverwriteRecord, body: string): OverwriteRecord {
  const resolve = (value: string | undefined) => (value === CONTENT_PLACEHOLDER ? body : value);

  return {
    ...record,
    id: resolve(record.id),
    name: resolve(record.name),
    nameWithType: resolve(record.nameWithType),
    fullName: resolve(record.fullName),
    summary: resolve(record.summary),
    remarks: resolve(record.remarks),
    example: record.example?.map(entry => (entry === CONTENT_PLACEHOLDER ? body : entry)),
  };
}

/**
 * Read and parse one overwrite file.
 */
export function readOverwriteFile(filePath: string): OverwriteDocument {
  const text = readFileSync(filePath, 'utf-8');
  return { source: filePath, record: parseOverwrite(text, filePath) };
}

/**
 * Find all markdown files below a directory, in ordinal path order.
 *
 * @param dir - Overwrite directory
 * @returns Absolute paths to `.md` files
 */
export function findOverwriteFiles(dir: string): string[] {
  if (!existsSync(dir)) {
    throw new MissingInputError(dir, 'Overwrite directory');
  }

  const files: string[] = [];
  const stack: string[] = [dir];

  while (stack.length > 0) {
    const currentDir = stack.pop();
    if (currentDir === undefined) break;

    for (const entry of readdirSync(currentDir, { withFileTypes: true })) {
      const fullPath = join(currentDir, entry.name);
      if (entry.isDirectory()) {
        stack.push(fullPath);
      } else if (entry.name.endsWith('.md')) {
        files.push(fullPath);
      }
    }
  }

  return files.sort(compareOrdinal);
}
