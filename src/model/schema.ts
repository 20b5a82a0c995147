/**
 * @file schema.ts
 * @module model/schema
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview zod schemas for the YAML metadata documents.
 */

import { z } from 'zod';
import { ITEM_TYPES } from './types.js';

/**
 * Any YAML scalar as a string; null and missing values become undefined.
 */
export const scalarText = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform(value => (value === null || value === undefined ? undefined : String(value)));

const textList = z
  .array(scalarText)
  .nullish()
  .transform(list => (list ?? []).filter((entry): entry is string => entry !== undefined));

function listOf<T extends z.ZodTypeAny>(schema: T) {
  return z
    .array(schema)
    .nullish()
    .transform(list => list ?? []);
}

/**
 * One entry of `toc.yml`.
 */
export const tocEntrySchema = z.object({
  uid: z.string(),
  name: scalarText,
  items: listOf(z.object({ uid: z.string(), name: scalarText })),
});

export const tocSchema = z.array(tocEntrySchema);

const syntaxSchema = z.object({
  content: scalarText,
  parameters: listOf(
    z.object({ id: z.string(), type: scalarText, description: scalarText })
  ),
  typeParameters: listOf(z.object({ id: z.string(), description: scalarText })),
  return: z
    .object({ type: scalarText, description: scalarText })
    .nullish()
    .transform(value => value ?? undefined),
  remarks: scalarText,
});

const sourceSchema = z.object({
  path: scalarText,
  startLine: z.number().int().nullish().transform(value => value ?? undefined),
  remote: z
    .object({ path: scalarText, branch: scalarText, repo: scalarText })
    .nullish()
    .transform(value => value ?? undefined),
});

/**
 * An item as DocFX writes it to a managed-reference YAML file.
 */
export const rawItemSchema = z.object({
  uid: z.string().min(1),
  id: scalarText,
  type: z.enum(ITEM_TYPES),
  name: scalarText,
  nameWithType: scalarText,
  fullName: scalarText,
  namespace: scalarText,
  parent: scalarText,
  children: textList,
  inheritedMembers: textList,
  overload: scalarText,
  summary: scalarText,
  remarks: scalarText,
  example: textList,
  syntax: syntaxSchema.nullish().transform(value => value ?? undefined),
  exceptions: listOf(z.object({ type: z.string(), description: scalarText })),
  attributes: listOf(
    z.object({
      type: z.string(),
      arguments: listOf(z.object({ type: scalarText, value: scalarText })),
    })
  ),
  source: sourceSchema.nullish().transform(value => value ?? undefined),
  assemblies: textList,
  seealso: listOf(z.object({ linkId: z.string() })),
  doNotDocument: z.boolean().nullish().transform(value => value ?? false),
});

export const rawReferenceSchema = z.object({
  uid: z.string().min(1),
  name: scalarText,
});

/**
 * Contents of one per-UID YAML file.
 */
export const itemCollectionSchema = z.object({
  items: listOf(rawItemSchema),
  references: listOf(rawReferenceSchema),
});

export type TocEntry = z.infer<typeof tocEntrySchema>;
export type RawItem = z.infer<typeof rawItemSchema>;
export type ItemCollection = z.infer<typeof itemCollectionSchema>;
