/**
 * Shared entry builders for engine tests
 */

import type {
  Category,
  DefineEntry,
  EnumEntry,
  EnumMember,
  FunctionEntry,
  StructEntry,
  StructField,
  TypedefEntry,
  UnionEntry,
} from '@ntdocs/catalog';

export function fn(name: string, overrides: Partial<Omit<FunctionEntry, 'kind'>> = {}): FunctionEntry {
  return {
    kind: 'function',
    category: 'Nt',
    name,
    returnType: 'NTSTATUS',
    parameters: [],
    description: '',
    ...overrides,
  };
}

export function typedef(name: string, tokens: string[], category: Category = 'Nt'): TypedefEntry {
  return { kind: 'typedef', category, name, tokens };
}

export function define(name: string, value: string, category: Category = 'Win32'): DefineEntry {
  return { kind: 'define', category, name, value };
}

export function struct(name: string, fields: StructField[], category: Category = 'Nt'): StructEntry {
  return { kind: 'struct', category, name, fields };
}

export function union(name: string, fields: StructField[], category: Category = 'Win32'): UnionEntry {
  return { kind: 'union', category, name, fields };
}

export function enumOf(name: string, members: EnumMember[], category: Category = 'Nt'): EnumEntry {
  return { kind: 'enum', category, name, members };
}
