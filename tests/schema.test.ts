/**
 * Schema and Attribute List Tests
 */

import { describe, it, expect } from 'vitest';
import { Schema } from '../packages/compiler/schema.js';
import { AttributeList } from '../packages/compiler/attribute-list.js';
import { loadSchema } from '../packages/compiler/tree-builder.js';
import { AttributeReferenceError, InputError, RelationReferenceError } from '../packages/errors.js';

describe('Schema', () => {
  it('looks up relations case-insensitively', () => {
    const schema = new Schema({ Alpha: ['A1', 'a2'] });
    expect(schema.contains('alpha')).toBe(true);
    expect(schema.contains('ALPHA')).toBe(true);
    expect(schema.getAttributes('alpha')).toEqual(['a1', 'a2']);
  });

  it('returns copies of attribute lists', () => {
    const schema = new Schema({ alpha: ['a1'] });
    schema.getAttributes('alpha').push('a2');
    expect(schema.getAttributes('alpha')).toEqual(['a1']);
  });

  it('fails on unknown relations', () => {
    const schema = new Schema();
    expect(() => schema.getAttributes('alpha')).toThrow(RelationReferenceError);
    expect(() => schema.getAttributes('alpha')).toThrow("Relation 'alpha' not found in schema.");
  });

  it('refuses to add a relation twice', () => {
    const schema = new Schema({ alpha: ['a1'] });
    expect(() => schema.add('ALPHA', ['b1'])).toThrow("Relation 'ALPHA' already exists.");
  });

  it('round-trips through a record without sharing arrays', () => {
    const record = { alpha: ['a1', 'a2'], beta: ['b1'] };
    const schema = new Schema(record);
    schema.add('gamma', ['c1']);
    expect(schema.names).toEqual(['alpha', 'beta', 'gamma']);
    expect(schema.toRecord()).toEqual({ alpha: ['a1', 'a2'], beta: ['b1'], gamma: ['c1'] });
    expect(record).toEqual({ alpha: ['a1', 'a2'], beta: ['b1'] });
  });
});

describe('loadSchema', () => {
  it('reads definitions into a record', () => {
    expect(loadSchema('alpha(a1, a2);\nbeta(b1);')).toEqual({ alpha: ['a1', 'a2'], beta: ['b1'] });
  });

  it('rejects statements other than definitions', () => {
    expect(() => loadSchema('alpha(a1); alpha;')).toThrow(InputError);
  });

  it('rejects duplicate definitions', () => {
    expect(() => loadSchema('alpha(a1); alpha(a2);')).toThrow(RelationReferenceError);
  });
});

describe('AttributeList', () => {
  const alpha = new AttributeList(['a1', 'a2'], 'alpha');
  const beta = new AttributeList(['a1', 'b2'], 'beta');

  it('formats prefixed names', () => {
    expect(alpha.toString()).toBe('alpha.a1, alpha.a2');
    expect(new AttributeList(['a1'], null).toString()).toBe('a1');
  });

  it('merges lists keeping each owner', () => {
    const merged = AttributeList.merge(alpha, beta);
    expect(merged.prefixed).toEqual(['alpha.a1', 'alpha.a2', 'beta.a1', 'beta.b2']);
    expect(merged.names).toEqual(['a1', 'a2', 'a1', 'b2']);
  });

  it('trims to the references in reference order', () => {
    expect(alpha.trim(['a2', 'alpha.a1', 'a2']).prefixed).toEqual(['alpha.a2', 'alpha.a1']);
  });

  it('fails to trim an unknown attribute', () => {
    expect(() => alpha.trim(['x'])).toThrow(AttributeReferenceError);
    expect(() => alpha.trim(['x'])).toThrow("Attribute 'x' not found in [alpha.a1, alpha.a2].");
    expect(() => alpha.trim(['beta.a1'])).toThrow(AttributeReferenceError);
  });

  it('renames the owner and optionally the attributes', () => {
    expect(alpha.rename([], 'gamma').toString()).toBe('gamma.a1, gamma.a2');
    expect(alpha.rename(['x', 'y'], 'gamma').toString()).toBe('gamma.x, gamma.y');
  });

  it('requires a full set of names when renaming attributes', () => {
    expect(() => alpha.rename(['x'], 'gamma')).toThrow(InputError);
    expect(() => alpha.rename(['x'], 'gamma')).toThrow('Renaming requires naming all attributes: expected 2, got 1.');
  });

  it('distinguishes unknown from ambiguous references', () => {
    const merged = AttributeList.merge(alpha, beta);
    expect(() => merged.validate(['a1'])).toThrow("Attribute reference 'a1' is ambiguous in [alpha.a1, alpha.a2, beta.a1, beta.b2].");
    expect(() => merged.validate(['beta.a1', 'a2', 'b2'])).not.toThrow();
    expect(merged.has('a1')).toBe(false);
    expect(merged.has('alpha.a1')).toBe(true);
    expect(merged.has('c1')).toBe(false);
  });

  it('compares by names and owners', () => {
    expect(alpha.equals(new AttributeList(['a1', 'a2'], 'alpha'))).toBe(true);
    expect(alpha.equals(new AttributeList(['a1', 'a2'], 'beta'))).toBe(false);
    expect(alpha.equals(alpha.trim(['a1']))).toBe(false);
  });
});
