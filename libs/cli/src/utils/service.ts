/**
 * Build the DocsService from CLI options.
 */

import { loadCatalog, resolveCatalogPath, type Logger } from '@ntdocs/catalog';
import { DocsService } from '@ntdocs/engine';

export interface ServiceOptions {
  /** Catalog file; falls back to NTDOCS_CATALOG, then the bundled catalog */
  catalog?: string;
}

export function createDocsService(options: ServiceOptions, logger: Logger): DocsService {
  const catalogPath = resolveCatalogPath(options.catalog);
  logger.debug(`Using catalog ${catalogPath}`);
  return new DocsService(loadCatalog(catalogPath, { logger }));
}
