/**
 * Catalog loader
 *
 * Validates stored records and builds the immutable Catalog. Malformed records
 * fail the whole load; the engine assumes a well-formed catalog afterwards.
 */

import * as fs from 'node:fs';
import type { ZodIssue } from 'zod';
import { Catalog } from './catalog';
import { CatalogEntrySchema } from './schema';
import type { CatalogEntry } from './types';
import { CatalogNotFoundError, CatalogParseError, MalformedEntryError } from './errors';
import { noopLogger, type Logger } from './logger';

export interface LoadCatalogOptions {
  logger?: Logger;
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

/**
 * Build a Catalog from already-decoded JSON.
 */
export function parseCatalog(raw: unknown, options: LoadCatalogOptions = {}): Catalog {
  const log = options.logger ?? noopLogger;

  if (!Array.isArray(raw)) {
    throw new CatalogParseError('Catalog must be a JSON array of entries');
  }

  const entries: CatalogEntry[] = [];
  const seen = new Set<string>();
  const warned = new Set<string>();

  raw.forEach((item: unknown, index) => {
    const result = CatalogEntrySchema.safeParse(item);
    if (!result.success) {
      throw new MalformedEntryError(index, result.error.issues.map(formatIssue));
    }
    const entry = result.data;
    if (seen.has(entry.name) && !warned.has(entry.name)) {
      warned.add(entry.name);
      log.warn(`Duplicate entry name "${entry.name}"`);
    }
    seen.add(entry.name);
    entries.push(entry);
  });

  return new Catalog(entries);
}

/**
 * Read and parse a catalog JSON file.
 */
export function loadCatalog(filePath: string, options: LoadCatalogOptions = {}): Catalog {
  const log = options.logger ?? noopLogger;

  if (!fs.existsSync(filePath)) {
    throw new CatalogNotFoundError([filePath]);
  }

  const text = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new CatalogParseError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`, filePath);
  }

  const catalog = parseCatalog(raw, options);
  log.debug(`Loaded ${catalog.size} entries from ${filePath}`);
  return catalog;
}
