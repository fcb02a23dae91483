/**
 * @ntdocs/catalog - record model and catalog loading
 *
 * @packageDocumentation
 */

export type {
  Category,
  StructField,
  EnumMember,
  FunctionEntry,
  TypedefEntry,
  DefineEntry,
  StructEntry,
  UnionEntry,
  EnumEntry,
  CatalogEntry,
  EntryKind,
  EntryOfKind,
} from './types';
export { entryName, assertNever } from './types';

export { Catalog } from './catalog';

export {
  CategorySchema,
  StructFieldSchema,
  EnumFieldSchema,
  StoredEntrySchema,
  CatalogEntrySchema,
  toCatalogEntry,
} from './schema';
export type { StoredEntry } from './schema';

export { parseCatalog, loadCatalog } from './loader';
export type { LoadCatalogOptions } from './loader';

export { resolveCatalogPath, getBundledCatalogPaths, CATALOG_ENV_VAR, CATALOG_FILE } from './paths';

export type { Logger } from './logger';
export { noopLogger, createConsoleLogger } from './logger';

export {
  CatalogError,
  CatalogNotFoundError,
  CatalogParseError,
  MalformedEntryError,
} from './errors';
