/**
 * CLI utilities
 */

export { copyToClipboard, ClipboardError } from './clipboard.js';
export type { ExecFileFn } from './clipboard.js';
export { consoleOutput } from './output.js';
export type { Output } from './output.js';
export { createDocsService } from './service.js';
export type { ServiceOptions } from './service.js';
