/**
 * @file types.ts
 * @module model/types
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Type definitions for documentable items and external references.
 */

/**
 * The closed set of item kinds found in managed-reference metadata.
 */
export const ITEM_TYPES = [
  'Namespace',
  'Enum',
  'Field',
  'Method',
  'Class',
  'Struct',
  'Constructor',
  'Property',
  'Delegate',
  'Operator',
  'Interface',
] as const;

export type ItemType = (typeof ITEM_TYPES)[number];

/**
 * Kinds that are documented on a page beneath their declaring type.
 */
export const MEMBER_TYPES: ReadonlySet<ItemType> = new Set<ItemType>([
  'Constructor',
  'Field',
  'Method',
  'Operator',
  'Property',
]);

/**
 * English plural headings used when grouping children by kind.
 */
export const PLURAL_ITEM_TYPES: Record<ItemType, string> = {
  Namespace: 'Namespaces',
  Enum: 'Enums',
  Field: 'Fields',
  Method: 'Methods',
  Class: 'Classes',
  Struct: 'Structs',
  Constructor: 'Constructors',
  Property: 'Properties',
  Delegate: 'Delegates',
  Operator: 'Operators',
  Interface: 'Interfaces',
};

/**
 * Attribute type that marks an item as deprecated.
 */
export const OBSOLETE_ATTRIBUTE = 'System.ObsoleteAttribute';

export interface SyntaxParameter {
  id: string;
  type?: string;
  description?: string;
}

export interface SyntaxTypeParameter {
  id: string;
  description?: string;
}

export interface SyntaxReturn {
  type?: string;
  description?: string;
}

/**
 * Declaration details of an item.
 */
export interface Syntax {
  /** Raw signature text */
  content?: string;
  parameters: SyntaxParameter[];
  typeParameters: SyntaxTypeParameter[];
  return?: SyntaxReturn;
  remarks?: string;
}

export interface ItemException {
  type: string;
  description?: string;
}

export interface AttributeArgument {
  type?: string;
  value?: string;
}

/**
 * An annotation (e.g. `[Obsolete]`) applied to an item.
 */
export interface ItemAttribute {
  type: string;
  arguments: AttributeArgument[];
}

/**
 * Remote repository coordinates for an item's source.
 */
export interface RemoteSource {
  path?: string;
  branch?: string;
  repo?: string;
}

/**
 * Where an item is declared in the documented code base.
 */
export interface SourceLocation {
  path?: string;
  /** Zero-based line of the declaration */
  startLine?: number;
  remote?: RemoteSource;
}

/**
 * An internally documented entity.
 */
export interface Item {
  uid: string;
  id?: string;
  type: ItemType;
  name: string;
  nameWithType?: string;
  fullName?: string;
  /** UID of the containing namespace; absent for root namespaces */
  namespace?: string;
  /** UID of the declaring item; absent at namespace roots */
  parent?: string;
  children: string[];
  /** Subset of children inherited from base types */
  inheritedMembers: string[];
  /** Key shared by overloaded siblings */
  overload?: string;
  summary?: string;
  remarks?: string;
  example: string[];
  syntax?: Syntax;
  exceptions: ItemException[];
  attributes: ItemAttribute[];
  source?: SourceLocation;
  assemblies: string[];
  /** UIDs of authored see-also references */
  seeAlso: string[];
  /** Collapsed identifier, assigned once the whole store is known */
  shortUid?: string;
  doNotDocument: boolean;
}

/**
 * An externally observed entity with no managed documentation.
 */
export interface Reference {
  uid: string;
  name?: string;
}

/**
 * Externally authored partial item, keyed by UID.
 */
export interface OverwriteRecord {
  uid: string;
  id?: string;
  name?: string;
  nameWithType?: string;
  fullName?: string;
  summary?: string;
  remarks?: string;
  example?: string[];
  type?: string;
  overload?: string;
  namespace?: string;
  parent?: string;
}

/**
 * Whether an item kind is rendered beneath its declaring type.
 */
export function isMemberType(type: ItemType): boolean {
  return MEMBER_TYPES.has(type);
}
