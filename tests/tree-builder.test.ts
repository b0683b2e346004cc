/**
 * Tree Builder Tests
 *
 * Schema checks applied while syntax trees are built.
 */

import { describe, it, expect } from 'vitest';
import { Grammar } from '../packages/parser/index.js';
import { Schema } from '../packages/compiler/schema.js';
import { buildTrees } from '../packages/compiler/tree-builder.js';
import { assignNode, nodesEqual, postOrder, printSyntaxTree, relationNode } from '../packages/compiler/nodes.js';
import type { AstNode } from '../packages/compiler/nodes.js';
import { AttributeReferenceError, InputError, RelationReferenceError } from '../packages/errors.js';

const grammar = new Grammar({ dialect: 'dependency' });

function freshSchema(): Schema {
  return new Schema({
    alpha: ['a1', 'a2', 'a3'],
    beta: ['b1', 'b2'],
    gamma: ['a1', 'c1'],
  });
}

function build(source: string, schema: Schema = freshSchema()): AstNode[] {
  return buildTrees(grammar.parse(source), schema);
}

function buildOne(source: string): AstNode {
  const [root] = build(source);
  return root;
}

describe('relations', () => {
  it('takes attributes from the schema', () => {
    const root = buildOne('alpha;');
    expect(root.nodeType).toBe('relation');
    expect(root.name).toBe('alpha');
    expect(root.attributes.prefixed).toEqual(['alpha.a1', 'alpha.a2', 'alpha.a3']);
  });

  it('fails on unknown relations', () => {
    expect(() => build('omega;')).toThrow(RelationReferenceError);
  });
});

describe('unary operators', () => {
  it('project trims to the listed attributes', () => {
    const root = buildOne(String.raw`\project_{a2, a1} alpha;`);
    expect(root.nodeType).toBe('project');
    expect(root.name).toBe('alpha');
    expect(root.attributes.prefixed).toEqual(['alpha.a2', 'alpha.a1']);
  });

  it('project fails on attributes the child lacks', () => {
    expect(() => build(String.raw`\project_{b1} alpha;`)).toThrow(AttributeReferenceError);
  });

  it('select keeps the child attributes', () => {
    const root = buildOne(String.raw`\select_{a1 = 5} alpha;`);
    expect(root.nodeType).toBe('select');
    expect(root.name).toBe('alpha');
    expect(root.attributes.prefixed).toEqual(['alpha.a1', 'alpha.a2', 'alpha.a3']);
  });

  it('select validates condition references', () => {
    expect(() => build(String.raw`\select_{b1 = 5} alpha;`)).toThrow(AttributeReferenceError);
    expect(() => build(String.raw`\select_{beta.a1 = 5} alpha;`)).toThrow(AttributeReferenceError);
    expect(() => build(String.raw`\select_{alpha.a1 = 'x'} alpha;`)).not.toThrow();
  });

  it('rename with a new name retags every attribute', () => {
    const root = buildOne(String.raw`\rename_{apex} alpha;`);
    expect(root.name).toBe('apex');
    expect(root.attributes.prefixed).toEqual(['apex.a1', 'apex.a2', 'apex.a3']);
  });

  it('rename with attributes only keeps the relation name', () => {
    const root = buildOne(String.raw`\rename_{(x, y, z)} alpha;`);
    expect(root.name).toBe('alpha');
    expect(root.attributes.prefixed).toEqual(['alpha.x', 'alpha.y', 'alpha.z']);
  });

  it('rename refuses names already in the schema', () => {
    expect(() => build(String.raw`\rename_{beta} alpha;`)).toThrow(RelationReferenceError);
  });

  it('rename requires every attribute to be named', () => {
    expect(() => build(String.raw`\rename_{apex(x, y)} alpha;`)).toThrow(InputError);
  });
});

describe('assignment and definition', () => {
  it('registers an assigned relation for later statements', () => {
    const schema = freshSchema();
    const [assign, reference] = build('new_alpha := alpha; new_alpha;', schema);
    expect(assign.nodeType).toBe('assign');
    expect(assign.attributes.prefixed).toEqual(['new_alpha.a1', 'new_alpha.a2', 'new_alpha.a3']);
    expect(reference.nodeType).toBe('relation');
    expect(reference.attributes.prefixed).toEqual(['new_alpha.a1', 'new_alpha.a2', 'new_alpha.a3']);
    expect(schema.getAttributes('new_alpha')).toEqual(['a1', 'a2', 'a3']);
  });

  it('renames attributes on assignment', () => {
    const schema = freshSchema();
    build(String.raw`pair(x, y) := \project_{a1, a2} alpha;`, schema);
    expect(schema.getAttributes('pair')).toEqual(['x', 'y']);
  });

  it('requires every attribute to be named on assignment', () => {
    expect(() => build('pair(x, y) := alpha;')).toThrow(InputError);
    expect(() => build('pair(x, y) := alpha;')).toThrow(
      'Assignment requires naming all attributes: expected 3, got 2.'
    );
  });

  it('requires a name on assignment', () => {
    const schema = freshSchema();
    expect(() => assignNode(relationNode('alpha', schema), '', [], schema)).toThrow(InputError);
    expect(() => assignNode(relationNode('alpha', schema), '', [], schema)).toThrow(
      'Name is required for assignment.'
    );
    expect(schema.contains('')).toBe(false);
  });

  it('refuses to assign to an existing name', () => {
    expect(() => build('alpha := beta;')).toThrow(RelationReferenceError);
  });

  it('registers definitions', () => {
    const schema = freshSchema();
    const [definition, reference] = build('delta(d1, d2); delta;', schema);
    expect(definition.nodeType).toBe('definition');
    expect(reference.attributes.prefixed).toEqual(['delta.d1', 'delta.d2']);
  });

  it('refuses to redefine a relation', () => {
    expect(() => build('alpha(x);')).toThrow(RelationReferenceError);
  });
});

describe('joins', () => {
  it('refuses a relation joined with itself', () => {
    expect(() => build(String.raw`alpha \join alpha;`)).toThrow(RelationReferenceError);
    expect(() => build(String.raw`alpha \natural_join \select_{a1 = 1} alpha;`)).toThrow(RelationReferenceError);
  });

  it('accepts a self-join through rename', () => {
    const root = buildOne(String.raw`alpha \join \rename_{other} alpha;`);
    expect(root.attributes).toHaveLength(6);
  });

  it('cross join concatenates attributes and has no name', () => {
    const root = buildOne(String.raw`alpha \join beta;`);
    expect(root.nodeType).toBe('crossJoin');
    expect(root.name).toBeNull();
    expect(root.attributes.prefixed).toEqual(['alpha.a1', 'alpha.a2', 'alpha.a3', 'beta.b1', 'beta.b2']);
  });

  it('natural join keeps a shared attribute once, from the left', () => {
    const root = buildOne(String.raw`alpha \natural_join gamma;`);
    expect(root.attributes).toHaveLength(3 + 2 - 1);
    expect(root.attributes.prefixed).toEqual(['alpha.a1', 'alpha.a2', 'alpha.a3', 'gamma.c1']);
  });

  it('theta join validates its condition against both sides', () => {
    expect(buildOne(String.raw`alpha \join_{a1 = b1} beta;`).nodeType).toBe('thetaJoin');
    expect(() => build(String.raw`alpha \join_{a1 = c1} beta;`)).toThrow(AttributeReferenceError);
    expect(() => build(String.raw`alpha \theta_join_{a1 = c1} gamma;`)).toThrow(
      "Attribute reference 'a1' is ambiguous in [alpha.a1, alpha.a2, alpha.a3, gamma.a1, gamma.c1]."
    );
  });

  it('outer joins accept qualified references', () => {
    const root = buildOne(String.raw`alpha \left_outer_join_{alpha.a1 = gamma.a1} gamma;`);
    expect(root.nodeType).toBe('leftOuterJoin');
    expect(root.attributes).toHaveLength(5);
  });
});

describe('set operators', () => {
  it('requires identical attribute names', () => {
    expect(() => build(String.raw`alpha \union beta;`)).toThrow(InputError);
    expect(() => build(String.raw`\project_{a2, a1} alpha \union \project_{a1, c1} gamma;`)).toThrow(InputError);
  });

  it('applies the same check to difference and intersect', () => {
    expect(() => build(String.raw`alpha \difference beta;`)).toThrow(
      'Set operations require identical relation schemas: (a1, a2, a3) vs (b1, b2).'
    );
    expect(() => build(String.raw`\project_{a1} alpha \intersect \project_{c1} gamma;`)).toThrow(InputError);
  });

  it('produces unowned attributes', () => {
    const root = buildOne(String.raw`\project_{a1} alpha \intersect \project_{a1} gamma;`);
    expect(root.nodeType).toBe('intersect');
    expect(root.name).toBeNull();
    expect(root.attributes.prefixed).toEqual(['a1']);
  });

  it('compares names, not owners', () => {
    const root = buildOne(String.raw`alpha \difference \rename_{other} alpha;`);
    expect(root.attributes.prefixed).toEqual(['a1', 'a2', 'a3']);
  });
});

describe('dependencies', () => {
  it('validates primary key attributes', () => {
    const root = buildOne('pk_{a1, a2} alpha;');
    expect(root.nodeType).toBe('primaryKey');
    if (root.nodeType === 'primaryKey') {
      expect(root.relationName).toBe('alpha');
      expect(root.references).toEqual(['a1', 'a2']);
    }
    expect(() => build('pk_{b1} alpha;')).toThrow(AttributeReferenceError);
    expect(() => build('pk_{a1} omega;')).toThrow(RelationReferenceError);
  });

  it('validates functional dependency attributes against a filtered relation', () => {
    const root = buildOne(String.raw`fd_{a1, a2} \select_{a3 > 0} alpha;`);
    expect(root.nodeType).toBe('functionalDependency');
    if (root.nodeType === 'functionalDependency') {
      expect(root.relationName).toBe('alpha');
      expect(root.child.nodeType).toBe('select');
    }
    expect(() => build('mvd_{a1, b1} alpha;')).toThrow(AttributeReferenceError);
    expect(() => build(String.raw`fd_{a1, a2} \select_{b1 > 0} alpha;`)).toThrow(AttributeReferenceError);
  });

  it('validates each inclusion reference against its own side', () => {
    const root = buildOne('inc=_{a1, b1} (alpha, beta);');
    expect(root.nodeType).toBe('inclusionEquivalence');
    if (root.nodeType === 'inclusionEquivalence') {
      expect(root.relationNames).toEqual(['alpha', 'beta']);
    }
    expect(root.attributes.prefixed).toEqual(['alpha.a1', 'beta.b1']);
    expect(() => build('inc⊆_{b1, a1} (alpha, beta);')).toThrow(AttributeReferenceError);
  });
});

describe('batches', () => {
  it('stops at the first failing statement', () => {
    const schema = freshSchema();
    expect(() => build(String.raw`delta(d1); alpha \join alpha; epsilon(e1);`, schema)).toThrow(
      RelationReferenceError
    );
    expect(schema.contains('delta')).toBe(true);
    expect(schema.contains('epsilon')).toBe(false);
  });
});

describe('tree utilities', () => {
  it('walks children before parents', () => {
    const root = buildOne(String.raw`\project_{a1} (alpha \join beta);`);
    expect(postOrder(root).map(node => node.nodeType)).toEqual(['relation', 'relation', 'crossJoin', 'project']);
    expect(postOrder(root).map(node => node.name)).toEqual(['alpha', 'beta', null, null]);
  });

  it('compares trees structurally', () => {
    const source = String.raw`\select_{a1 = 1} alpha \join beta;`;
    expect(nodesEqual(buildOne(source), buildOne(source))).toBe(true);
    expect(nodesEqual(buildOne(source), buildOne(String.raw`\select_{a1 = 2} alpha \join beta;`))).toBe(false);
    expect(nodesEqual(buildOne(source), buildOne(String.raw`alpha \join beta;`))).toBe(false);
  });

  it('prints one indented line per node', () => {
    expect(printSyntaxTree(buildOne(String.raw`\project_{a1} \select_{a2 = 5} alpha;`))).toBe(
      [
        'PROJECT alpha [alpha.a1]',
        '  SELECT alpha (a2 = 5) [alpha.a1, alpha.a2, alpha.a3]',
        '    RELATION alpha [alpha.a1, alpha.a2, alpha.a3]',
      ].join('\n')
    );
  });

  it('prints dependency references', () => {
    expect(printSyntaxTree(buildOne('pk_{a1} alpha;'))).toBe(
      ['PK {a1} [alpha.a1]', '  RELATION alpha [alpha.a1, alpha.a2, alpha.a3]'].join('\n')
    );
  });
});
