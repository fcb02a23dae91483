/**
 * Program wiring tests
 */

import type { DocsService } from '@ntdocs/engine';
import { noopLogger, CatalogNotFoundError } from '@ntdocs/catalog';
import { createProgram } from '../program';
import { createRecordingOutput, createTestService } from './helpers';

describe('createProgram', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  function setup() {
    const recording = createRecordingOutput();
    const service = createTestService();
    const browse = jest.fn(async (_service: DocsService) => 0);
    const createService = jest.fn(() => service);
    const program = createProgram({
      output: recording.output,
      createService,
      createLogger: () => noopLogger,
      browse,
    });
    program.exitOverride();
    return { ...recording, service, browse, createService, program };
  }

  it('looks up a name', async () => {
    const { program, stdout, browse } = setup();

    await program.parseAsync(['MAXPATH', '--raw'], { from: 'user' });

    expect(stdout).toEqual(['#define MAX_PATH 260']);
    expect(process.exitCode).toBe(0);
    expect(browse).not.toHaveBeenCalled();
  });

  it('accepts the short raw flag before the name', async () => {
    const { program, stdout } = setup();

    await program.parseAsync(['-r', 'NtClose'], { from: 'user' });

    expect(stdout).toEqual(['NTSTATUS NtClose(HANDLE Handle);']);
  });

  it('sets exit code 1 when nothing matches', async () => {
    const { program, stderr } = setup();

    await program.parseAsync(['zzz'], { from: 'user' });

    expect(stderr).toEqual(['Error: no entry matching `zzz` found.']);
    expect(process.exitCode).toBe(1);
  });

  it('lists names with --list', async () => {
    const { program, stdout } = setup();

    await program.parseAsync(['--list'], { from: 'user' });

    expect(stdout).toEqual(['NtClose', 'MAX_PATH', 'CLIENT_ID', 'CLIENT_ID']);
  });

  it('opens the browser without a name', async () => {
    const { program, browse, service } = setup();

    await program.parseAsync([], { from: 'user' });

    expect(browse).toHaveBeenCalledWith(service);
    expect(process.exitCode).toBe(0);
  });

  it('passes the catalog option through', async () => {
    const { program, createService } = setup();

    await program.parseAsync(['--catalog', '/tmp/custom.json', '--list'], { from: 'user' });

    expect(createService).toHaveBeenCalledWith({ catalog: '/tmp/custom.json' }, noopLogger);
  });

  it('propagates catalog loading errors', async () => {
    const program = createProgram({
      output: createRecordingOutput().output,
      createService: () => {
        throw new CatalogNotFoundError(['/missing.json']);
      },
      createLogger: () => noopLogger,
    });
    program.exitOverride();

    await expect(program.parseAsync(['--list'], { from: 'user' })).rejects.toThrow(
      'Catalog file not found: /missing.json',
    );
  });
});
