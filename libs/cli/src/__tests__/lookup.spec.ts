/**
 * Lookup + list command tests
 */

import { DocsService } from '@ntdocs/engine';
import { Catalog } from '@ntdocs/catalog';
import { runLookup } from '../commands/lookup';
import { runList } from '../commands/list';
import { createRecordingOutput, createTestService } from './helpers';

describe('runLookup', () => {
  it('prints the pretty definition of the best match', () => {
    const { output, stdout, stderr } = createRecordingOutput();

    const code = runLookup(createTestService(), 'NtClose', {}, output);

    expect(code).toBe(0);
    expect(stderr).toEqual([]);
    expect(stdout).toEqual([
      'Category: Nt\n\nFunction `NtClose`\nSignature: NTSTATUS NtClose(HANDLE Handle);\n\nDescription:\nCloses an object handle.\n',
    ]);
  });

  it('prints the raw definition with raw set', () => {
    const { output, stdout } = createRecordingOutput();

    const code = runLookup(createTestService(), 'MAXPATH', { raw: true }, output);

    expect(code).toBe(0);
    expect(stdout).toEqual(['#define MAX_PATH 260']);
  });

  it('resolves struct aliases through the catalog', () => {
    const { output, stdout } = createRecordingOutput();
    const service = createTestService();

    // Struct first, so it wins the tie with the same-named typedef
    runLookup(new DocsService(new Catalog(service.catalog.entries.slice(2, 4).reverse())), 'CLIENT_ID', { raw: true }, output);

    expect(stdout).toEqual([
      'typedef struct _CLIENT_ID {\n    HANDLE UniqueProcess;\n    HANDLE UniqueThread;\n} CLIENT_ID, *PCLIENT_ID;',
    ]);
  });

  it('reports no match and exits with 1', () => {
    const { output, stdout, stderr } = createRecordingOutput();

    const code = runLookup(createTestService(), 'zzz', {}, output);

    expect(code).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(['Error: no entry matching `zzz` found.']);
  });
});

describe('runList', () => {
  it('prints names in catalog order', () => {
    const { output, stdout } = createRecordingOutput();

    expect(runList(createTestService(), output)).toBe(0);
    expect(stdout).toEqual(['NtClose', 'MAX_PATH', 'CLIENT_ID', 'CLIENT_ID']);
  });
});
