/**
 * ntdocs program definition
 *
 * One root command: a name argument looks an entry up, --list prints every
 * name, and no argument opens the interactive browser.
 */

import { Command } from 'commander';
import { createConsoleLogger, type Logger } from '@ntdocs/catalog';
import type { DocsService } from '@ntdocs/engine';
import { runBrowser, runList, runLookup } from './commands/index.js';
import { consoleOutput, type Output } from './utils/output.js';
import { createDocsService, type ServiceOptions } from './utils/service.js';

export const VERSION = '0.1.0';

export interface ProgramOptions {
  raw?: boolean;
  list?: boolean;
  catalog?: string;
  verbose?: boolean;
}

export interface ProgramDeps {
  output?: Output;
  createService?: (options: ServiceOptions, logger: Logger) => DocsService;
  createLogger?: (options: { verbose?: boolean }) => Logger;
  browse?: (service: DocsService) => Promise<number>;
}

/**
 * Create and configure the CLI program. The exit code is left in `process.exitCode`.
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const output = deps.output ?? consoleOutput;
  const createService = deps.createService ?? createDocsService;
  const createLogger = deps.createLogger ?? createConsoleLogger;
  const browse = deps.browse ?? runBrowser;

  const program = new Command();

  program
    .name('ntdocs')
    .description('Fuzzy lookup of NT and Win32 API declarations')
    .version(VERSION, '-V, --version', 'Output the version number')
    .argument('[name]', 'Entry name to look up (fuzzy)')
    .option('-r, --raw', 'Print the raw declaration only')
    .option('--list', 'Print every entry name')
    .option('--catalog <path>', 'Catalog JSON file (default: $NTDOCS_CATALOG or the bundled catalog)')
    .option('--verbose', 'Log catalog loading details to stderr')
    .addHelpText(
      'after',
      `
Examples:
  $ ntdocs                      Open the interactive browser
  $ ntdocs NtCreateFile         Show the annotated definition
  $ ntdocs -r MAXPATH           Print the raw declaration of the best match
  $ ntdocs --list               List every entry name
`
    )
    .action(async (name: string | undefined, options: ProgramOptions) => {
      const logger = createLogger({ verbose: options.verbose });
      const service = createService({ catalog: options.catalog }, logger);

      if (options.list) {
        process.exitCode = runList(service, output);
      } else if (name !== undefined) {
        process.exitCode = runLookup(service, name, { raw: options.raw }, output);
      } else {
        process.exitCode = await browse(service);
      }
    });

  return program;
}
