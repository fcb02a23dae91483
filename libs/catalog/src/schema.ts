/**
 * Zod schemas for the stored catalog format
 *
 * Stored records are tagged by `type` and use snake_case field names; they are
 * converted to the `CatalogEntry` model on parse.
 */

import { z } from 'zod';
import type { Category, CatalogEntry } from './types';

const CATEGORY_ALIASES: Readonly<Record<string, Category>> = {
  nt: 'Nt',
  'nt native api': 'Nt',
  win32: 'Win32',
  'win32 api': 'Win32',
};

/**
 * Category accepts any casing of the known spellings ("NT", "Nt", "NT Native API", ...)
 */
export const CategorySchema = z.string().transform((value, ctx): Category => {
  const category = CATEGORY_ALIASES[value.trim().toLowerCase()];
  if (!category) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown category "${value}"` });
    return z.NEVER;
  }
  return category;
});

export const StructFieldSchema = z.object({
  name: z.string(),
  type: z.string(),
});

export const EnumFieldSchema = z.object({
  name: z.string().min(1),
  init: z.number().int().nonnegative().safe().nullish(),
});

const name = z.string().min(1);

export const StoredEntrySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('Function'),
    category: CategorySchema,
    name,
    return_type: z.string(),
    parameters: z.array(z.string()),
    description: z.string(),
  }),
  z.object({
    type: z.literal('Typedef'),
    category: CategorySchema,
    name,
    typedef: z.array(z.string()),
  }),
  z.object({
    type: z.literal('Define'),
    category: CategorySchema,
    name,
    value: z.string(),
  }),
  z.object({
    type: z.literal('Struct'),
    category: CategorySchema,
    name,
    fields: z.array(StructFieldSchema),
  }),
  z.object({
    type: z.literal('Union'),
    category: CategorySchema,
    name,
    fields: z.array(StructFieldSchema),
  }),
  z.object({
    type: z.literal('Enum'),
    category: CategorySchema,
    name,
    fields: z.array(EnumFieldSchema),
  }),
]);

export type StoredEntry = z.infer<typeof StoredEntrySchema>;

export function toCatalogEntry(stored: StoredEntry): CatalogEntry {
  const { category, name } = stored;
  switch (stored.type) {
    case 'Function':
      return {
        kind: 'function',
        category,
        name,
        returnType: stored.return_type,
        parameters: stored.parameters,
        description: stored.description,
      };
    case 'Typedef':
      return { kind: 'typedef', category, name, tokens: stored.typedef };
    case 'Define':
      return { kind: 'define', category, name, value: stored.value };
    case 'Struct':
      return { kind: 'struct', category, name, fields: stored.fields };
    case 'Union':
      return { kind: 'union', category, name, fields: stored.fields };
    case 'Enum':
      return {
        kind: 'enum',
        category,
        name,
        members: stored.fields.map((f) => ({ name: f.name, init: f.init ?? null })),
      };
  }
}

export const CatalogEntrySchema = StoredEntrySchema.transform(toCatalogEntry);
