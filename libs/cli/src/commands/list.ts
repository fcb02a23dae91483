/**
 * Print every entry name, one per line, in catalog order.
 */

import type { DocsService } from '@ntdocs/engine';
import type { Output } from '../utils/output.js';

export function runList(service: DocsService, output: Output): number {
  for (const name of service.list()) {
    output.out(name);
  }
  return 0;
}
