#!/usr/bin/env node
/**
 * ntdocs CLI
 *
 * Browse a catalog of NT and Win32 API declarations by approximate name.
 *
 * @example
 * ```bash
 * # Interactive browser
 * ntdocs
 *
 * # Annotated definition of the best match
 * ntdocs NtClose
 *
 * # Raw declaration only
 * ntdocs --raw MAX_PATH
 * ```
 */

import { createProgram } from './program.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
