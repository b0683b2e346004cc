/**
 * Attribute List
 *
 * An ordered list of attributes, each tagged with the relation that owns it.
 * Lists are immutable: merge, trim and rename return new lists.
 *
 * Examples:
 *   new AttributeList(['a1', 'a2'], 'alpha').toString()  → 'alpha.a1, alpha.a2'
 *   alpha.trim(['a2'])                                  → [alpha.a2]
 *   AttributeList.merge(alpha, beta)                    → [alpha.a1, alpha.a2, beta.b1]
 */

import { AttributeReferenceError, InputError } from '../errors.js';

export interface Attribute {
  readonly name: string;
  /** owning relation, or null for the output of a set operator */
  readonly prefix: string | null;
}

export function prefixedName(attribute: Attribute): string {
  return attribute.prefix ? `${attribute.prefix}.${attribute.name}` : attribute.name;
}

export class AttributeList {
  readonly entries: readonly Attribute[];

  constructor(names: readonly string[], prefix: string | null);
  constructor(entries: readonly Attribute[]);
  constructor(source: ReadonlyArray<string | Attribute>, prefix: string | null = null) {
    this.entries = source.map(item => (typeof item === 'string' ? { name: item, prefix } : item));
  }

  static fromEntries(entries: readonly Attribute[]): AttributeList {
    return new AttributeList(entries);
  }

  /** Concatenate two lists; each attribute keeps its owning relation */
  static merge(left: AttributeList, right: AttributeList): AttributeList {
    return AttributeList.fromEntries([...left.entries, ...right.entries]);
  }

  get length(): number {
    return this.entries.length;
  }

  get names(): string[] {
    return this.entries.map(entry => entry.name);
  }

  get prefixed(): string[] {
    return this.entries.map(prefixedName);
  }

  /**
   * Keep only the referenced attributes, in reference order. A reference
   * named twice is kept once.
   */
  trim(references: readonly string[]): AttributeList {
    const kept: Attribute[] = [];
    for (const reference of references) {
      const attribute = this.resolve(reference);
      if (!kept.includes(attribute)) kept.push(attribute);
    }
    return AttributeList.fromEntries(kept);
  }

  /**
   * Tag every attribute with `relation`. When `names` is non-empty it
   * replaces the attribute names positionally.
   */
  rename(names: readonly string[], relation: string | null): AttributeList {
    if (names.length > 0 && names.length !== this.entries.length) {
      throw new InputError(
        `Renaming requires naming all attributes: expected ${this.entries.length}, got ${names.length}.`
      );
    }
    const renamed = names.length > 0 ? [...names] : this.names;
    return new AttributeList(renamed, relation);
  }

  /** Fail unless every reference resolves to exactly one attribute */
  validate(references: readonly string[]): void {
    for (const reference of references) {
      this.resolve(reference);
    }
  }

  has(reference: string): boolean {
    return this.matches(reference).length === 1;
  }

  equals(other: AttributeList): boolean {
    return (
      this.entries.length === other.entries.length &&
      this.entries.every(
        (entry, i) => entry.name === other.entries[i].name && entry.prefix === other.entries[i].prefix
      )
    );
  }

  toString(): string {
    return this.prefixed.join(', ');
  }

  private resolve(reference: string): Attribute {
    const matches = this.matches(reference);
    if (matches.length === 0) {
      throw new AttributeReferenceError(`Attribute '${reference}' not found in [${this.toString()}].`);
    }
    if (matches.length > 1) {
      throw new AttributeReferenceError(`Attribute reference '${reference}' is ambiguous in [${this.toString()}].`);
    }
    return matches[0];
  }

  private matches(reference: string): Attribute[] {
    const dot = reference.indexOf('.');
    if (dot === -1) {
      return this.entries.filter(entry => entry.name === reference);
    }
    const prefix = reference.slice(0, dot);
    const name = reference.slice(dot + 1);
    return this.entries.filter(entry => entry.prefix === prefix && entry.name === name);
  }
}
