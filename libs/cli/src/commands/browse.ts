/**
 * Interactive browser
 *
 * Full-screen fuzzy search over the catalog, rendered with ink.
 */

import React from 'react';
import { render } from 'ink';
import type { DocsService } from '@ntdocs/engine';
import { BrowserApp } from '../browser/index.js';

export async function runBrowser(service: DocsService): Promise<number> {
  const { waitUntilExit } = render(React.createElement(BrowserApp, { service }));
  await waitUntilExit();
  return 0;
}
