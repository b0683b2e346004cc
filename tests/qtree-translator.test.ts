/**
 * QTree Translator Tests
 */

import { describe, it, expect } from 'vitest';
import { Grammar } from '../packages/parser/index.js';
import { Schema } from '../packages/compiler/schema.js';
import { buildTrees } from '../packages/compiler/tree-builder.js';
import { translateToQtree } from '../packages/translator/qtree-translator.js';

const grammar = new Grammar({ dialect: 'dependency' });

function qtree(source: string): string[] {
  const schema = new Schema({
    alpha: ['a1', 'a2', 'a3'],
    alpha_copy: ['a1', 'a2', 'a3'],
    beta: ['b1', 'b2'],
    gamma: ['a1', 'c1'],
  });
  return translateToQtree(buildTrees(grammar.parse(source), schema));
}

function isBalanced(tree: string): boolean {
  let depth = 0;
  for (const char of tree) {
    if (char === '[') depth++;
    if (char === ']') depth--;
    if (depth < 0) return false;
  }
  return depth === 0;
}

describe('relations and unary operators', () => {
  it('renders a relation as a leaf', () => {
    expect(qtree('alpha;')).toEqual([String.raw`\Tree[.$alpha$ ]`]);
  });

  it('escapes underscores in names', () => {
    expect(qtree('alpha_copy;')).toEqual([String.raw`\Tree[.$alpha\_copy$ ]`]);
  });

  it('renders project with a thin-space list', () => {
    expect(qtree(String.raw`\project_{a1, a2} alpha;`)).toEqual([
      String.raw`\Tree[.$\pi_{a1,\,a2}$ [.$alpha$ ] ]`,
    ]);
  });

  it('renders select with its condition', () => {
    expect(qtree(String.raw`\select_{a1 = 5 and a2 <> 'x'} alpha;`)).toEqual([
      String.raw`\Tree[.$\sigma_{((a1 = 5) \land (a2 \neq 'x'))}$ [.$alpha$ ] ]`,
    ]);
  });

  it('renders rename with the new name and attributes', () => {
    expect(qtree(String.raw`\rename_{apex(x, y, z)} alpha;`)).toEqual([
      String.raw`\Tree[.$\rho_{apex(x,\,y,\,z)}$ [.$alpha$ ] ]`,
    ]);
  });

  it('renders assignment and definition', () => {
    expect(qtree('new_alpha := alpha; delta(d1, d2);')).toEqual([
      String.raw`\Tree[.$new\_alpha(a1,\,a2,\,a3)$ [.$alpha$ ] ]`,
      String.raw`\Tree[.$delta(d1,\,d2)$ ]`,
    ]);
  });
});

describe('binary operators', () => {
  it('renders joins', () => {
    expect(qtree(String.raw`alpha \join beta; alpha \join_{a1 = b1} beta; alpha \natural_join gamma;`)).toEqual([
      String.raw`\Tree[.$\times$ [.$alpha$ ] [.$beta$ ] ]`,
      String.raw`\Tree[.$\bowtie_{(a1 = b1)}$ [.$alpha$ ] [.$beta$ ] ]`,
      String.raw`\Tree[.$\bowtie$ [.$alpha$ ] [.$gamma$ ] ]`,
    ]);
  });

  it('renders outer joins', () => {
    expect(qtree(String.raw`alpha \left_outer_join_{a1 = b1} beta;`)).toEqual([
      String.raw`\Tree[.$\leftouterjoin_{(a1 = b1)}$ [.$alpha$ ] [.$beta$ ] ]`,
    ]);
    expect(qtree(String.raw`alpha \full_outer_join_{a1 = b1} beta;`)).toEqual([
      String.raw`\Tree[.$\fullouterjoin_{(a1 = b1)}$ [.$alpha$ ] [.$beta$ ] ]`,
    ]);
  });

  it('renders set operators', () => {
    expect(
      qtree(String.raw`alpha \union alpha_copy; alpha \difference alpha_copy; alpha \intersect alpha_copy;`)
    ).toEqual([
      String.raw`\Tree[.$\cup$ [.$alpha$ ] [.$alpha\_copy$ ] ]`,
      String.raw`\Tree[.$-$ [.$alpha$ ] [.$alpha\_copy$ ] ]`,
      String.raw`\Tree[.$\cap$ [.$alpha$ ] [.$alpha\_copy$ ] ]`,
    ]);
  });

  it('nests subtrees', () => {
    expect(qtree(String.raw`\project_{b1} (alpha \join beta);`)).toEqual([
      String.raw`\Tree[.$\pi_{b1}$ [.$\times$ [.$alpha$ ] [.$beta$ ] ] ]`,
    ]);
  });
});

describe('dependencies', () => {
  it('renders a primary key', () => {
    expect(qtree('pk_{a1, a2} alpha;')).toEqual([String.raw`\Tree[.$\text{pk}_{a1,\,a2}(alpha)$ ]`]);
  });

  it('renders functional and multivalued dependencies', () => {
    expect(qtree(String.raw`fd_{a1, a2} alpha; mvd_{a1, a2} \select_{a3 > 0} alpha;`)).toEqual([
      String.raw`\Tree[.$alpha : a1 \rightarrow a2$ ]`,
      String.raw`\Tree[.$\sigma_{(a3 > 0)}(alpha) : a1 \twoheadrightarrow a2$ ]`,
    ]);
  });

  it('renders inclusion dependencies', () => {
    expect(qtree('inc=_{a1, b1} (alpha, beta); inc⊆_{a1, b1} (alpha, beta);')).toEqual([
      String.raw`\Tree[.$alpha[a1] \equiv beta[b1]$ ]`,
      String.raw`\Tree[.$alpha[a1] \subseteq beta[b1]$ ]`,
    ]);
  });
});

describe('structure', () => {
  it('produces one balanced tree per statement', () => {
    const source = String.raw`
      delta(d1);
      \project_{a1} \select_{a2 = 1 or not a3 = 2} alpha;
      (alpha \join beta) \union (alpha_copy \join beta);
      \rename_{(x, y)} (\project_{a1} alpha \natural_join gamma);
      pk_{a1} alpha;
    `;
    const trees = qtree(source);
    expect(trees).toHaveLength(5);
    for (const tree of trees) {
      expect(tree.startsWith('\\Tree[')).toBe(true);
      expect(isBalanced(tree)).toBe(true);
    }
  });
});
