/**
 * Typed error classes for catalog loading
 */

export class CatalogError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'CatalogError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class CatalogNotFoundError extends CatalogError {
  public readonly searchedPaths: readonly string[];

  constructor(searchedPaths: readonly string[]) {
    super(
      searchedPaths.length === 1
        ? `Catalog file not found: ${searchedPaths[0]}`
        : `Catalog file not found (searched: ${searchedPaths.join(', ')})`,
      'CATALOG_NOT_FOUND',
    );
    this.name = 'CatalogNotFoundError';
    this.searchedPaths = searchedPaths;
  }
}

export class CatalogParseError extends CatalogError {
  public readonly source?: string;

  constructor(message: string, source?: string) {
    super(source ? `${message} (${source})` : message, 'CATALOG_PARSE_ERROR');
    this.name = 'CatalogParseError';
    this.source = source;
  }
}

export class MalformedEntryError extends CatalogError {
  public readonly index: number;
  public readonly issues: readonly string[];

  constructor(index: number, issues: readonly string[]) {
    super(`Malformed catalog entry at index ${index}: ${issues.join('; ')}`, 'MALFORMED_ENTRY');
    this.name = 'MalformedEntryError';
    this.index = index;
    this.issues = issues;
  }
}
