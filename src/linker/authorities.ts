/**
 * @file authorities.ts
 * @module linker/authorities
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Ordered table of external documentation authorities.
 */

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, MissingInputError } from '../shared/errors.js';

/**
 * An external documentation source, matched by identifier prefix.
 */
export interface AuthorityRule {
  /** Identifier prefix, including the trailing dot (e.g. `"System."`) */
  prefix: string;
  /** Leading dotted segments removed before the identifier enters the URL */
  segmentsToStrip: number;
  /** URL with an `{id}` placeholder */
  urlTemplate: string;
  /** Short display names for specific UIDs (e.g. `System.String` -> `string`) */
  aliases?: Record<string, string>;
}

/**
 * Maps UIDs like "System.String" to the keyword a C# reader expects.
 */
export const BUILT_IN_TYPE_ALIASES: Record<string, string> = {
  'System.String': 'string',
  'System.Boolean': 'bool',
  'System.Single': 'float',
  'System.Double': 'double',
};

export const DEFAULT_AUTHORITIES: AuthorityRule[] = [
  {
    prefix: 'System.',
    segmentsToStrip: 0,
    urlTemplate: 'https://docs.microsoft.com/dotnet/api/{id}',
    aliases: BUILT_IN_TYPE_ALIASES,
  },
  {
    // Links to the uGUI manual rather than its API pages
    prefix: 'UnityEngine.UI.',
    segmentsToStrip: 2,
    urlTemplate: 'https://docs.unity3d.com/Packages/com.unity.ugui@1.0/manual/script-{id}.html',
  },
  {
    prefix: 'UnityEngine.',
    segmentsToStrip: 1,
    urlTemplate: 'https://docs.unity3d.com/ScriptReference/{id}.html',
  },
];

/**
 * Return the rules ordered longest prefix first, keeping table order among
 * prefixes of equal length, so a nested authority wins over its parent.
 */
export function orderBySpecificity(rules: readonly AuthorityRule[]): AuthorityRule[] {
  return rules
    .map((rule, index) => ({ rule, index }))
    .sort((a, b) => b.rule.prefix.length - a.rule.prefix.length || a.index - b.index)
    .map(entry => entry.rule);
}

/**
 * Build the URL of an identifier (parameter list already removed) under a rule.
 */
export function buildAuthorityUrl(rule: AuthorityRule, identifier: string): string {
  const docsId = identifier.split('.').slice(rule.segmentsToStrip).join('.');
  return rule.urlTemplate.split('{id}').join(docsId);
}

const authorityTableSchema = z.array(
  z.object({
    prefix: z.string().min(1),
    segmentsToStrip: z.number().int().min(0),
    urlTemplate: z.string().includes('{id}'),
    aliases: z.record(z.string()).optional(),
  })
);

/**
 * Validate a parsed JSON authority table.
 */
export function parseAuthorityTable(data: unknown, source: string): AuthorityRule[] {
  const result = authorityTableSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(source, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Read an authority table from a JSON file.
 */
export function loadAuthorityTable(filePath: string): AuthorityRule[] {
  if (!existsSync(filePath)) {
    throw new MissingInputError(filePath, 'Authority table');
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(filePath, detail);
  }
  return parseAuthorityTable(data, filePath);
}
