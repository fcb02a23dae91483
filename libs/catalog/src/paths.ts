/**
 * Catalog file location
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { CatalogNotFoundError } from './errors';

export const CATALOG_ENV_VAR = 'NTDOCS_CATALOG';
export const CATALOG_FILE = 'catalog.json';

/**
 * Candidate locations of the bundled catalog.
 */
export function getBundledCatalogPaths(): string[] {
  return [
    // Running from sources (libs/catalog/src)
    path.join(__dirname, '..', 'data', CATALOG_FILE),
    // Relative to build output (dist/catalog/src)
    path.join(__dirname, '../../../libs/catalog/data', CATALOG_FILE),
  ];
}

/**
 * Resolve which catalog file to load.
 * An explicit path wins, then NTDOCS_CATALOG, then the bundled catalog.
 */
export function resolveCatalogPath(override?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (override) return path.resolve(override);

  const fromEnv = env[CATALOG_ENV_VAR];
  if (fromEnv) return path.resolve(fromEnv);

  const candidates = getBundledCatalogPaths();
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      return path.resolve(p);
    }
  }

  throw new CatalogNotFoundError(candidates);
}
