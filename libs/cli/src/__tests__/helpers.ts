/**
 * Shared test helpers for CLI specs
 */

import { Catalog, parseCatalog } from '@ntdocs/catalog';
import { DocsService } from '@ntdocs/engine';
import type { Output } from '../utils/output';

export function createRecordingOutput() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const output: Output = {
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
  };
  return { output, stdout, stderr };
}

export function createTestCatalog(): Catalog {
  return parseCatalog([
    { type: 'Function', category: 'NT', name: 'NtClose', return_type: 'NTSTATUS', parameters: ['HANDLE Handle'], description: 'Closes an object handle.' },
    { type: 'Define', category: 'Win32 API', name: 'MAX_PATH', value: '260' },
    { type: 'Typedef', category: 'NT', name: 'CLIENT_ID', typedef: ['struct', '_CLIENT_ID'] },
    { type: 'Struct', category: 'NT', name: 'CLIENT_ID', fields: [{ name: 'UniqueProcess', type: 'HANDLE' }, { name: 'UniqueThread', type: 'HANDLE' }] },
  ]);
}

export function createTestService(): DocsService {
  return new DocsService(createTestCatalog());
}
