/**
 * Catalog record model
 *
 * Every entry is one API declaration. `kind` is the discriminant; each variant
 * keeps its own ordered field/member/parameter list exactly as stored.
 */

export type Category = 'Nt' | 'Win32';

export interface StructField {
  readonly name: string;
  readonly type: string;
}

export interface EnumMember {
  readonly name: string;
  /** Explicit initializer, or null when the member takes the implicit value */
  readonly init: number | null;
}

interface EntryBase {
  readonly category: Category;
  readonly name: string;
}

export interface FunctionEntry extends EntryBase {
  readonly kind: 'function';
  readonly returnType: string;
  readonly parameters: readonly string[];
  readonly description: string;
}

export interface TypedefEntry extends EntryBase {
  readonly kind: 'typedef';
  /** Tokens of the aliased type expression, e.g. `['struct', '_FOO', '*']` */
  readonly tokens: readonly string[];
}

export interface DefineEntry extends EntryBase {
  readonly kind: 'define';
  readonly value: string;
}

export interface StructEntry extends EntryBase {
  readonly kind: 'struct';
  readonly fields: readonly StructField[];
}

export interface UnionEntry extends EntryBase {
  readonly kind: 'union';
  readonly fields: readonly StructField[];
}

export interface EnumEntry extends EntryBase {
  readonly kind: 'enum';
  readonly members: readonly EnumMember[];
}

export type CatalogEntry =
  | FunctionEntry
  | TypedefEntry
  | DefineEntry
  | StructEntry
  | UnionEntry
  | EnumEntry;

export type EntryKind = CatalogEntry['kind'];

/** Narrow a catalog entry union to a single kind */
export type EntryOfKind<K extends EntryKind> = Extract<CatalogEntry, { kind: K }>;

export function entryName(entry: CatalogEntry): string {
  return entry.name;
}

/**
 * Exhaustiveness guard for switches over `kind`.
 * Adding a variant makes every switch that reaches this call fail to compile.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled catalog entry: ${JSON.stringify(value)}`);
}
