/**
 * Schema - relation name → ordered attribute names.
 *
 * Seeded by the caller and extended by definition and assignment statements
 * while one batch is compiled. Names are stored lower-cased, matching the
 * identifiers the lexer produces.
 */

import { RelationReferenceError } from '../errors.js';

export type SchemaRecord = Record<string, string[]>;

export class Schema {
  private readonly relations = new Map<string, string[]>();

  constructor(initial: SchemaRecord = {}) {
    for (const [name, attributes] of Object.entries(initial)) {
      this.add(name, attributes);
    }
  }

  contains(name: string): boolean {
    return this.relations.has(name.toLowerCase());
  }

  /** Attribute names of a relation; the caller owns the returned array */
  getAttributes(name: string): string[] {
    const attributes = this.relations.get(name.toLowerCase());
    if (!attributes) {
      throw new RelationReferenceError(`Relation '${name}' not found in schema.`);
    }
    return [...attributes];
  }

  add(name: string, attributes: readonly string[]): void {
    const key = name.toLowerCase();
    if (this.relations.has(key)) {
      throw new RelationReferenceError(`Relation '${name}' already exists.`);
    }
    this.relations.set(key, attributes.map(attribute => attribute.toLowerCase()));
  }

  get names(): string[] {
    return [...this.relations.keys()];
  }

  toRecord(): SchemaRecord {
    const record: SchemaRecord = {};
    for (const [name, attributes] of this.relations) {
      record[name] = [...attributes];
    }
    return record;
  }
}
