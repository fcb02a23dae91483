/**
 * ntdocs CLI Library
 *
 * Program factory, commands and the interactive browser, for embedding or
 * extending the CLI.
 *
 * @packageDocumentation
 */

export { createProgram, VERSION } from './program.js';
export type { ProgramOptions, ProgramDeps } from './program.js';

export * from './commands/index.js';
export * from './browser/index.js';
export * from './utils/index.js';
