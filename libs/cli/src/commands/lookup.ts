/**
 * Direct lookup
 *
 * Resolves a typed name to the single best entry and prints its definition.
 */

import type { DocsService } from '@ntdocs/engine';
import type { Output } from '../utils/output.js';

export interface LookupOptions {
  /** Print the raw declaration instead of the annotated form */
  raw?: boolean;
}

/**
 * Print the best match for `query`. Returns the process exit code.
 */
export function runLookup(service: DocsService, query: string, options: LookupOptions, output: Output): number {
  const entry = service.resolve(query);
  if (!entry) {
    output.err(`Error: no entry matching \`${query}\` found.`);
    return 1;
  }

  output.out(options.raw ? service.raw(entry) : service.pretty(entry));
  return 0;
}
