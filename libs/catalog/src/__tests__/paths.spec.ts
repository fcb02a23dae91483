/**
 * Catalog path resolution tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { resolveCatalogPath, getBundledCatalogPaths, CATALOG_ENV_VAR } from '../paths';

describe('resolveCatalogPath', () => {
  it('prefers an explicit path', () => {
    const env = { [CATALOG_ENV_VAR]: '/from/env.json' };
    expect(resolveCatalogPath('/explicit/catalog.json', env)).toBe(path.resolve('/explicit/catalog.json'));
  });

  it('resolves relative overrides against the working directory', () => {
    expect(resolveCatalogPath('my-catalog.json', {})).toBe(path.join(process.cwd(), 'my-catalog.json'));
  });

  it('falls back to the environment variable', () => {
    const env = { [CATALOG_ENV_VAR]: '/from/env.json' };
    expect(resolveCatalogPath(undefined, env)).toBe(path.resolve('/from/env.json'));
  });

  it('falls back to the bundled catalog', () => {
    const resolved = resolveCatalogPath(undefined, {});
    expect(resolved).toBe(path.resolve(getBundledCatalogPaths()[0]));
    expect(fs.existsSync(resolved)).toBe(true);
  });
});
