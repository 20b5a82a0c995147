/**
 * @file MarkdownGenerator.ts
 * @module generator/MarkdownGenerator
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Renders namespace, item and index pages as Hugo markdown.
 */

import * as YAML from 'yaml';
import type { Item, ItemType, SourceLocation, Syntax } from '../model/types.js';
import { OBSOLETE_ATTRIBUTE, PLURAL_ITEM_TYPES } from '../model/types.js';
import type { ItemStore } from '../store/ItemStore.js';
import type { ReferenceLinker } from '../linker/ReferenceLinker.js';
import { formatForTable, isBlank } from '../shared/utils/text.js';

/**
 * Menu identifier of the root API page.
 */
export const ROOT_MENU_ID = 'api';

const RETURNABLE_TYPES: ReadonlySet<ItemType> = new Set<ItemType>(['Method', 'Operator', 'Delegate']);
const SEE_ALSO_SIGNATURE_TYPES: ReadonlySet<ItemType> = new Set<ItemType>(['Property', 'Field']);

export interface GeneratorOptions {
  /** Language tag of fenced declaration blocks (default `csharp`) */
  codeLanguage?: string;
}

/**
 * Display title of an item: its declaring type plus its own short name,
 * without the namespace or parameter list.
 * e.g., "Game.Player.Move(System.Int32)" -> "Player.Move"
 */
export function displayName(item: Item): string {
  const fullName = item.fullName ?? item.name;
  const shortName = fullName.replace(/\(.*\)$/, '').split('.').pop() ?? fullName;
  const joined = item.parent ? `${item.parent}.${shortName}` : shortName;

  if (item.namespace && joined.startsWith(`${item.namespace}.`)) {
    return joined.slice(item.namespace.length + 1);
  }
  return joined;
}

/**
 * Convert an SSH or HTTPS clone URL to the repository's web address,
 * assuming GitHub-style hosting conventions.
 * e.g., "git@github.com:org/repo.git" -> "https://github.com/org/repo"
 */
export function repositoryWebUrl(repo: string): string {
  return repo
    .replace(/^.*?@/, 'https://')
    .replace(/^(https:\/\/[^/:]*):/, '$1/')
    .replace(/\.git$/, '');
}

/**
 * Link to the line an item is declared on, if its remote is known.
 */
export function sourceUrl(source: SourceLocation): string | undefined {
  const remote = source.remote;
  if (!remote?.repo) {
    return undefined;
  }
  let url = `${repositoryWebUrl(remote.repo)}/blob/${remote.branch ?? 'main'}/${remote.path ?? source.path ?? ''}`;
  if (source.startLine !== undefined) {
    url += `#L${source.startLine + 1}`;
  }
  return url;
}

function frontMatter(data: Record<string, unknown>): string {
  return `---\n${YAML.stringify(data, { lineWidth: 0 })}---`;
}

function table(headers: [string, string], rows: string[]): string {
  return [`|${headers[0]}|${headers[1]}|`, '|:---|:---|', ...rows].join('\n');
}

/**
 * Generates markdown documents for the items of a frozen store.
 *
 * Every page starts with Hugo front matter whose menu entries mirror the
 * item hierarchy; all cross references go through the {@link ReferenceLinker}.
 *
 * @example
 * ```typescript
 * const generator = new MarkdownGenerator(store, linker);
 * const markdown = generator.generate(item, 1);
 * ```
 */
export class MarkdownGenerator {
  private store: ItemStore;
  private linker: ReferenceLinker;
  private codeLanguage: string;

  constructor(store: ItemStore, linker: ReferenceLinker, options: GeneratorOptions = {}) {
    this.store = store;
    this.linker = linker;
    this.codeLanguage = options.codeLanguage ?? 'csharp';
  }

  /**
   * Render the page of any item.
   * @param item - Item to render
   * @param weight - 1-based position used to order menu entries
   */
  generate(item: Item, weight: number): string {
    return item.type === 'Namespace'
      ? this.generateNamespace(item, weight)
      : this.generateItem(item, weight);
  }

  generateNamespace(item: Item, weight: number): string {
    const sections: string[] = [];

    sections.push(
      frontMatter({
        title: `${item.name} Namespace`,
        draft: false,
        toc: true,
        hide_contents: true,
        menu: {
          docs: {
            parent: ROOT_MENU_ID,
            identifier: this.menuId(item),
            title: item.name,
            weight,
          },
        },
      })
    );

    if (!isBlank(item.summary)) {
      sections.push(this.linker.formatCrossReferences(item.summary));
    }

    const declared = item.children.filter(uid => !item.inheritedMembers.includes(uid));
    sections.push(...this.renderChildTables(declared, false));

    return sections.join('\n\n') + '\n';
  }

  generateItem(item: Item, weight: number): string {
    const sections: string[] = [];
    const parent = item.parent === undefined ? undefined : this.store.getItem(item.parent);

    sections.push(
      frontMatter({
        title: `${displayName(item)} ${item.type}`,
        draft: false,
        toc: true,
        hide_contents: true,
        menu: {
          docs: {
            identifier: this.menuId(item),
            parent: parent ? this.menuId(parent) : ROOT_MENU_ID,
            title: item.name,
            weight,
          },
        },
      })
    );

    sections.push(this.renderMetadata(item, parent));

    const obsolete = item.attributes.find(attribute => attribute.type === OBSOLETE_ATTRIBUTE);
    if (obsolete) {
      const message = obsolete.arguments[0]?.value;
      const note = `This ${item.type.toLowerCase()} is **obsolete** and may be removed from a future version.`;
      sections.push(['{{<note>}}', message ? `${note} ${message}` : note, '{{</note>}}'].join('\n'));
    }

    if (!isBlank(item.summary)) {
      sections.push(this.linker.formatCrossReferences(item.summary));
    }

    if (item.syntax?.content) {
      sections.push(['```' + this.codeLanguage, item.syntax.content, '```'].join('\n'));
    }

    if (!isBlank(item.remarks)) {
      sections.push('## Remarks', this.linker.formatCrossReferences(item.remarks));
    }

    if (item.example.length > 0) {
      sections.push(item.example.length === 1 ? '## Example' : '## Examples');
      for (const example of item.example) {
        sections.push(this.linker.formatCrossReferences(example));
      }
    }

    if (item.syntax) {
      sections.push(...this.renderSyntax(item, item.syntax));
    }

    sections.push(...this.renderChildTables(item.children, true));

    if (item.exceptions.length > 0) {
      const rows = item.exceptions.map(
        exception =>
          `|${this.linker.linkToType(exception.type)}|${formatForTable(this.linker.formatCrossReferences(exception.description))}|`
      );
      sections.push('## Exceptions', table(['Exception', 'Description'], rows));
    }

    const seeAlso = this.seeAlsoIds(item);
    if (seeAlso.length > 0) {
      const lines = seeAlso.map(uid => {
        const target = this.store.getItem(uid);
        const link = `* ${this.linker.linkToType(uid)}`;
        return target && !isBlank(target.summary)
          ? `${link}: ${this.linker.formatCrossReferences(target.summary)}`
          : link;
      });
      sections.push('## See Also', lines.join('\n'));
    }

    if (item.source?.path) {
      const url = sourceUrl(item.source);
      const location = url ? `[${item.source.path}](${url})` : item.source.path;
      const line = item.source.startLine !== undefined ? `, line ${item.source.startLine + 1}` : '';
      sections.push('## Source', `Defined in ${location}${line}.`);
    }

    return sections.join('\n\n') + '\n';
  }

  /**
   * Render the root index: every namespace, then the items whose
   * documentation is incomplete.
   */
  generateIndex(namespaces: Item[]): string {
    const sections: string[] = [];

    sections.push(
      frontMatter({
        title: 'API Documentation',
        draft: false,
        toc: true,
        hide_contents: true,
        menu: { docs: { identifier: ROOT_MENU_ID } },
      })
    );

    const rows = namespaces.map(
      namespace =>
        `|[${namespace.id ?? namespace.name}](${this.linker.linkTarget(namespace)})|${formatForTable(this.linker.formatCrossReferences(namespace.summary))}|`
    );
    sections.push(table(['Namespace', 'Description'], rows));

    const needingWork = this.store.getSortedItems().filter(item => this.needsWork(item));
    if (needingWork.length > 0) {
      const lines = needingWork.map(
        item => `* [\`${item.nameWithType ?? item.name}\`](${this.linker.linkTarget(item)})`
      );
      sections.push('## Items Needing Work', lines.join('\n'));
    }

    return sections.join('\n\n') + '\n';
  }

  /**
   * Whether a non-namespace item lacks a summary, a parameter description
   * or, for methods, a return description.
   */
  needsWork(item: Item): boolean {
    if (item.type === 'Namespace') {
      return false;
    }
    if (isBlank(item.summary)) {
      return true;
    }
    const syntax = item.syntax;
    if (syntax?.parameters.some(parameter => isBlank(parameter.description))) {
      return true;
    }
    return item.type === 'Method' && syntax?.return !== undefined && isBlank(syntax.return.description);
  }

  private menuId(item: Item): string {
    return `${ROOT_MENU_ID}.${item.uid}${this.store.caseSuffixFor(item)}`;
  }

  private renderMetadata(item: Item, parent: Item | undefined): string {
    const metadata: string[] = [];

    if (parent && parent.type !== 'Namespace') {
      metadata.push(`Parent: ${this.linker.linkToType(parent.uid)}`);
    }
    if (item.namespace) {
      metadata.push(`Namespace: ${this.linker.linkToType(item.namespace)}`);
    }
    if (item.assemblies.length > 0) {
      metadata.push(`Assembly: ${item.assemblies.map(assembly => `${assembly}.dll`).join(', ')}`);
    }

    return ['<div class="class-metadata">', metadata.join(', '), '</div>'].join('\n\n');
  }

  private renderSyntax(item: Item, syntax: Syntax): string[] {
    const sections: string[] = [];

    if (syntax.typeParameters.length > 0) {
      const rows = syntax.typeParameters.map(
        parameter =>
          `|${parameter.id}|${formatForTable(this.linker.formatCrossReferences(parameter.description))}|`
      );
      sections.push('## Type Parameters', table(['Type Parameter', 'Description'], rows));
    }

    if (syntax.parameters.length > 0) {
      const rows = syntax.parameters.map(parameter => {
        const name = parameter.type
          ? `${this.linker.linkToType(parameter.type)} ${parameter.id}`
          : parameter.id;
        return `|${name}|${formatForTable(this.linker.formatCrossReferences(parameter.description))}|`;
      });
      sections.push('## Parameters', table(['Parameter', 'Description'], rows));
    }

    // Properties have a "return" too, but it is their type, not a result
    if (syntax.return?.type && RETURNABLE_TYPES.has(item.type)) {
      const link = this.linker.linkToType(syntax.return.type);
      sections.push(
        '## Return Type',
        isBlank(syntax.return.description)
          ? link
          : `${link}: ${this.linker.formatCrossReferences(syntax.return.description)}`
      );
    }

    if (!isBlank(syntax.remarks)) {
      sections.push(this.linker.formatCrossReferences(syntax.remarks));
    }

    return sections;
  }

  /**
   * One table per child kind, in order of each kind's first appearance.
   */
  private renderChildTables(childUids: string[], flagObsolete: boolean): string[] {
    const groups = new Map<ItemType, Item[]>();
    for (const uid of childUids) {
      const child = this.store.getItem(uid);
      if (!child) continue;
      const group = groups.get(child.type);
      if (group) {
        group.push(child);
      } else {
        groups.set(child.type, [child]);
      }
    }

    const sections: string[] = [];
    for (const [type, children] of groups) {
      const rows = children.map(child => {
        let description = formatForTable(this.linker.formatCrossReferences(child.summary));
        if (flagObsolete && child.attributes.some(attribute => attribute.type === OBSOLETE_ATTRIBUTE)) {
          description = description ? `*Obsolete*: ${description}` : '*Obsolete*';
        }
        return `|[${formatForTable(child.name)}](${this.linker.linkTarget(child)})|${description}|`;
      });
      sections.push(`## ${PLURAL_ITEM_TYPES[type]}`, table(['Name', 'Description'], rows));
    }
    return sections;
  }

  /**
   * Authored see-also entries, plus for fields and properties the internal
   * types in their signature, without duplicates or the item itself.
   */
  private seeAlsoIds(item: Item): string[] {
    const ids = [...item.seeAlso];

    if (item.syntax && SEE_ALSO_SIGNATURE_TYPES.has(item.type)) {
      const signatureTypes = [
        ...item.syntax.parameters.map(parameter => parameter.type),
        item.syntax.return?.type,
      ];
      for (const uid of signatureTypes) {
        if (uid === undefined) continue;
        const target = this.store.getItem(uid);
        if (target && target.type !== 'Namespace' && !this.linker.isExternal(uid)) {
          ids.push(uid);
        }
      }
    }

    return [...new Set(ids)].filter(uid => uid !== item.uid);
  }
}
