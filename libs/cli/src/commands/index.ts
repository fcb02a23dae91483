/**
 * CLI Commands
 */

export { runLookup } from './lookup.js';
export type { LookupOptions } from './lookup.js';
export { runList } from './list.js';
export { runBrowser } from './browse.js';
