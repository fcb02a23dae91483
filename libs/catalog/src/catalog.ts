/**
 * Catalog - immutable, shared handle over the loaded entries.
 *
 * Built once at startup and passed explicitly to every query and synthesis call.
 */

import type { CatalogEntry, TypedefEntry } from './types';

function freezeEntry(entry: CatalogEntry): CatalogEntry {
  switch (entry.kind) {
    case 'function':
      return Object.freeze({ ...entry, parameters: Object.freeze([...entry.parameters]) });
    case 'typedef':
      return Object.freeze({ ...entry, tokens: Object.freeze([...entry.tokens]) });
    case 'define':
      return Object.freeze({ ...entry });
    case 'struct':
    case 'union':
      return Object.freeze({
        ...entry,
        fields: Object.freeze(entry.fields.map((f) => Object.freeze({ ...f }))),
      });
    case 'enum':
      return Object.freeze({
        ...entry,
        members: Object.freeze(entry.members.map((m) => Object.freeze({ ...m }))),
      });
  }
}

export class Catalog {
  readonly entries: readonly CatalogEntry[];
  private readonly typedefEntries: readonly TypedefEntry[];

  constructor(entries: Iterable<CatalogEntry>) {
    this.entries = Object.freeze(Array.from(entries, freezeEntry));
    this.typedefEntries = Object.freeze(
      this.entries.filter((e): e is TypedefEntry => e.kind === 'typedef'),
    );
  }

  static empty(): Catalog {
    return new Catalog([]);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Entry names in catalog order */
  names(): string[] {
    return this.entries.map((e) => e.name);
  }

  /** Typedef entries in catalog order, for alias lookups */
  typedefs(): readonly TypedefEntry[] {
    return this.typedefEntries;
  }
}
