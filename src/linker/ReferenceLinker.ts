/**
 * @file ReferenceLinker.ts
 * @module linker/ReferenceLinker
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Resolves identifiers to internal or external markdown links.
 */

import type { Item } from '../model/types.js';
import type { ItemStore } from '../store/ItemStore.js';
import type { PathResolver } from '../writer/PathResolver.js';
import { decodeHtmlEntities, formatForTable } from '../shared/utils/text.js';
import type { AuthorityRule } from './authorities.js';
import { DEFAULT_AUTHORITIES, buildAuthorityUrl, orderBySpecificity } from './authorities.js';

/**
 * How links to internal documents are written.
 * - `hugo`: a `ref` shortcode, checked by Hugo at build time
 * - `markdown`: a plain site-absolute path
 */
export type LinkStyle = 'hugo' | 'markdown';

export interface ReferenceLinkerOptions {
  store: ItemStore;
  pathResolver: PathResolver;
  /** External authorities; defaults to {@link DEFAULT_AUTHORITIES} */
  authorities?: readonly AuthorityRule[];
  linkStyle?: LinkStyle;
  /** Site path under which the output directory is published (default `/api`) */
  linkBase?: string;
}

const ARRAY_SUFFIX = /(?:\[\])+$/;
const PARAMETER_LIST = /\(.*\)$/;
const XREF_ELEMENT = /<xref\s[^>]*?href="([^"]*)"[^>]*?(?:\/>|>\s*<\/xref>)/g;

/**
 * Turns identifiers into formatted references.
 *
 * Resolution order for an identifier:
 * 1. an item in the store links to that item's document
 * 2. an identifier claimed by an authority links to the external docs
 * 3. a known reference renders as code using its name
 * 4. anything else renders as code using the identifier itself
 *
 * @example
 * ```typescript
 * const linker = new ReferenceLinker({ store, pathResolver });
 * linker.linkToType('System.String[]');
 * // "[`string[]`](https://docs.microsoft.com/dotnet/api/System.String)"
 * ```
 */
export class ReferenceLinker {
  private store: ItemStore;
  private pathResolver: PathResolver;
  private authorities: AuthorityRule[];
  private linkStyle: LinkStyle;
  private linkBase: string;

  constructor(options: ReferenceLinkerOptions) {
    this.store = options.store;
    this.pathResolver = options.pathResolver;
    this.authorities = orderBySpecificity(options.authorities ?? DEFAULT_AUTHORITIES);
    this.linkStyle = options.linkStyle ?? 'hugo';
    this.linkBase = (options.linkBase ?? '/api').replace(/\/+$/, '');
  }

  /**
   * Format a reference to the given identifier.
   * @param identifier - UID, optionally ending in one or more `[]` or a parameter list
   * @returns Markdown link, or inline code when nothing can be linked
   */
  linkToType(identifier: string): string {
    // Jagged arrays keep every rank in the display text
    const arraySuffix = ARRAY_SUFFIX.exec(identifier)?.[0] ?? '';
    const uid = identifier.slice(0, identifier.length - arraySuffix.length);

    const item = this.store.getItem(uid);
    if (item) {
      return `[\`${formatForTable(item.name)}${arraySuffix}\`](${this.linkTarget(item)})`;
    }

    const authority = this.matchAuthority(uid);
    if (authority) {
      const linkUid = uid.replace(PARAMETER_LIST, '');
      const url = buildAuthorityUrl(authority, linkUid);
      const aliases = authority.aliases;
      const display = aliases && Object.hasOwn(aliases, uid) ? aliases[uid] : lastSegment(linkUid);
      return `[\`${formatForTable(display)}${arraySuffix}\`](${url})`;
    }

    const reference = this.store.getReference(uid);
    if (reference) {
      return `\`${reference.name ?? reference.uid}${arraySuffix}\``;
    }

    return `\`${uid}${arraySuffix}\``;
  }

  /**
   * Link target for an internal item's document.
   */
  linkTarget(item: Item): string {
    const path = `${this.linkBase}/${this.pathResolver.outputPathFor(item)}.md`;
    return this.linkStyle === 'hugo' ? `{{<ref "${path}">}}` : path;
  }

  /**
   * Find the most specific authority whose prefix the identifier starts with.
   */
  matchAuthority(identifier: string): AuthorityRule | undefined {
    return this.authorities.find(rule => identifier.startsWith(rule.prefix));
  }

  /**
   * Whether an external authority documents this identifier.
   */
  isExternal(identifier: string): boolean {
    return this.matchAuthority(identifier) !== undefined;
  }

  /**
   * Rewrite the cross references embedded in a text field.
   *
   * Turns `{{|` and `|}}` into Hugo shortcode delimiters, decodes HTML
   * entities, and replaces each `<xref href="...">` element with the
   * output of {@link linkToType}.
   */
  formatCrossReferences(text: string | undefined): string {
    if (!text) {
      return '';
    }

    const withShortcodes = text.replace(/\{\{\|/g, '{{<').replace(/\|\}\}/g, '>}}');
    const decoded = decodeHtmlEntities(withShortcodes);

    return decoded.replace(XREF_ELEMENT, (_match, href: string) =>
      this.linkToType(href.replace(/%2c/gi, ','))
    );
  }
}

function lastSegment(identifier: string): string {
  const parts = identifier.split('.');
  return parts[parts.length - 1];
}
