/**
 * Definition synthesis
 *
 * Rebuilds a source-level declaration from an entry's structured fields.
 * Pure: the catalog is only read, for struct alias lookups.
 */

import { assertNever } from '@ntdocs/catalog';
import type {
  Catalog,
  CatalogEntry,
  EnumMember,
  FunctionEntry,
  StructEntry,
  StructField,
} from '@ntdocs/catalog';

const INDENT = '    ';

function functionSignature(entry: FunctionEntry): string {
  return `${entry.returnType} ${entry.name}(${entry.parameters.join(', ')});`;
}

function fieldLines(fields: readonly StructField[]): string {
  return fields.map((f) => `${INDENT}${f.type} ${f.name};\n`).join('');
}

function enumLine(member: EnumMember): string {
  return member.init === null
    ? `${INDENT}${member.name},\n`
    : `${INDENT}${member.name} = ${member.init},\n`;
}

/**
 * Name a struct is exposed under.
 *
 * The first typedef (catalog order) with a token equal to, or ending with, the
 * struct's name supplies the alias. Otherwise one leading underscore is dropped.
 */
export function resolveStructAlias(struct: StructEntry, catalog: Catalog): string {
  const alias = catalog
    .typedefs()
    .find((td) => td.tokens.some((t) => t === struct.name || t.endsWith(struct.name)));

  if (alias) return alias.name;
  return struct.name.startsWith('_') ? struct.name.slice(1) : struct.name;
}

/**
 * Terse declaration, e.g. `#define MAX_PATH 260`.
 */
export function rawDefinition(entry: CatalogEntry, catalog: Catalog): string {
  switch (entry.kind) {
    case 'function':
      return functionSignature(entry);
    case 'define':
      return `#define ${entry.name} ${entry.value}`;
    case 'typedef':
      return `typedef ${entry.tokens.join(' ')} ${entry.name};`;
    case 'struct': {
      const alias = resolveStructAlias(entry, catalog);
      return `typedef struct _${entry.name} {\n${fieldLines(entry.fields)}} ${alias}, *P${alias};`;
    }
    case 'union':
      return `union ${entry.name} {\n${fieldLines(entry.fields)}};`;
    case 'enum':
      return `enum {\n${entry.members.map(enumLine).join('')}};`;
    default:
      return assertNever(entry);
  }
}

/**
 * Annotated multi-line rendering for display: category header, a kind-labelled
 * title, then the declaration (and description for functions).
 */
export function prettyDefinition(entry: CatalogEntry, catalog: Catalog): string {
  const header = `Category: ${entry.category}\n\n`;

  switch (entry.kind) {
    case 'function':
      return (
        header +
        `Function \`${entry.name}\`\n` +
        `Signature: ${functionSignature(entry)}\n\n` +
        `Description:\n${entry.description}\n`
      );
    case 'define':
      return `${header}Define \`${entry.name}\`\n\n${rawDefinition(entry, catalog)}\n`;
    case 'typedef':
      return `${header}Typedef \`${entry.name}\`\n\n${rawDefinition(entry, catalog)}\n`;
    case 'struct':
      return `${header}Struct \`${entry.name}\`\n\n${rawDefinition(entry, catalog)}\n`;
    case 'union':
      return `${header}Union \`${entry.name}\`\n\n${rawDefinition(entry, catalog)}\n`;
    case 'enum':
      return `${header}Enum\n\n${rawDefinition(entry, catalog)}\n`;
    default:
      return assertNever(entry);
  }
}
