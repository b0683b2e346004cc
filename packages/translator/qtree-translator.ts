/**
 * QTree Translator
 *
 * Renders syntax trees as LaTeX qtree diagrams. Each node becomes
 * `[.$label$ children ]` and every tree starts with `\Tree`.
 *
 * Examples:
 *   alpha;                   → \Tree[.$alpha$ ]
 *   \project_{a1} alpha;     → \Tree[.$\pi_{a1}$ [.$alpha$ ] ]
 *   alpha \join beta;        → \Tree[.$\times$ [.$alpha$ ] [.$beta$ ] ]
 */

import { conditionToLatex, escapeLatex } from '../compiler/condition.js';
import type {
  AssignNode,
  AstNode,
  AttributeDependencyNode,
  ConditionalJoinNode,
  DefinitionNode,
  DependencyTarget,
  InclusionNode,
  JoinNode,
  PrimaryKeyNode,
  ProjectNode,
  RelationNode,
  RenameNode,
  SelectNode,
  SetOperatorNode,
} from '../compiler/nodes.js';
import { BaseTranslator } from './base-translator.js';

// ---
// LATEX OPERATORS
// ---

export const LATEX_OPERATORS = {
  select: '\\sigma',
  project: '\\pi',
  rename: '\\rho',
  crossJoin: '\\times',
  naturalJoin: '\\bowtie',
  thetaJoin: '\\bowtie',
  fullOuterJoin: '\\fullouterjoin',
  leftOuterJoin: '\\leftouterjoin',
  rightOuterJoin: '\\rightouterjoin',
  union: '\\cup',
  difference: '-',
  intersect: '\\cap',
  primaryKey: '\\text{pk}',
  multivaluedDependency: '\\twoheadrightarrow',
  functionalDependency: '\\rightarrow',
  inclusionEquivalence: '\\equiv',
  inclusionSubsumption: '\\subseteq',
} as const;

const LIST_SEPARATOR = ',\\,';

function latexList(names: readonly string[]): string {
  return names.map(escapeLatex).join(LIST_SEPARATOR);
}

function leaf(label: string): string {
  return `[.$${label}$ ]`;
}

function branch(label: string, ...children: string[]): string {
  return `[.$${label}$ ${children.join(' ')} ]`;
}

// ---
// TRANSLATOR
// ---

export class QtreeTranslator extends BaseTranslator<string> {
  protected relation(node: RelationNode): string {
    return leaf(escapeLatex(node.name));
  }

  protected definition(node: DefinitionNode): string {
    return leaf(`${escapeLatex(node.name)}(${latexList(node.attributes.names)})`);
  }

  protected select(node: SelectNode): string {
    return branch(`${LATEX_OPERATORS.select}_{${conditionToLatex(node.conditions)}}`, this.translate(node.child));
  }

  protected project(node: ProjectNode): string {
    return branch(`${LATEX_OPERATORS.project}_{${latexList(node.attributes.names)}}`, this.translate(node.child));
  }

  protected rename(node: RenameNode): string {
    const name = node.name ? escapeLatex(node.name) : '';
    return branch(
      `${LATEX_OPERATORS.rename}_{${name}(${latexList(node.attributes.names)})}`,
      this.translate(node.child)
    );
  }

  protected assign(node: AssignNode): string {
    return branch(`${escapeLatex(node.name)}(${latexList(node.attributes.names)})`, this.translate(node.child));
  }

  protected crossJoin(node: JoinNode): string {
    return this.binary(node, LATEX_OPERATORS.crossJoin);
  }

  protected naturalJoin(node: JoinNode): string {
    return this.binary(node, LATEX_OPERATORS.naturalJoin);
  }

  protected thetaJoin(node: ConditionalJoinNode): string {
    return this.conditionalJoin(node);
  }

  protected fullOuterJoin(node: ConditionalJoinNode): string {
    return this.conditionalJoin(node);
  }

  protected leftOuterJoin(node: ConditionalJoinNode): string {
    return this.conditionalJoin(node);
  }

  protected rightOuterJoin(node: ConditionalJoinNode): string {
    return this.conditionalJoin(node);
  }

  protected union(node: SetOperatorNode): string {
    return this.binary(node, LATEX_OPERATORS.union);
  }

  protected difference(node: SetOperatorNode): string {
    return this.binary(node, LATEX_OPERATORS.difference);
  }

  protected intersect(node: SetOperatorNode): string {
    return this.binary(node, LATEX_OPERATORS.intersect);
  }

  protected primaryKey(node: PrimaryKeyNode): string {
    return leaf(`${LATEX_OPERATORS.primaryKey}_{${latexList(node.references)}}(${escapeLatex(node.relationName)})`);
  }

  protected multivaluedDependency(node: AttributeDependencyNode): string {
    return this.attributeDependency(node);
  }

  protected functionalDependency(node: AttributeDependencyNode): string {
    return this.attributeDependency(node);
  }

  protected inclusionEquivalence(node: InclusionNode): string {
    return this.inclusion(node);
  }

  protected inclusionSubsumption(node: InclusionNode): string {
    return this.inclusion(node);
  }

  // --- helpers ---

  private binary(node: JoinNode | SetOperatorNode, operator: string): string {
    return branch(operator, this.translate(node.left), this.translate(node.right));
  }

  private conditionalJoin(node: ConditionalJoinNode): string {
    return branch(
      `${LATEX_OPERATORS[node.nodeType]}_{${conditionToLatex(node.conditions)}}`,
      this.translate(node.left),
      this.translate(node.right)
    );
  }

  /** A relation, or `\sigma_{cond}(r)` for a filtered one */
  private target(target: DependencyTarget): string {
    if (target.nodeType === 'relation') {
      return escapeLatex(target.name);
    }
    return `${LATEX_OPERATORS.select}_{${conditionToLatex(target.conditions)}}(${escapeLatex(target.name ?? '')})`;
  }

  private attributeDependency(node: AttributeDependencyNode): string {
    const [from, to] = node.references;
    return leaf(
      `${this.target(node.child)} : ${escapeLatex(from)} ${LATEX_OPERATORS[node.nodeType]} ${escapeLatex(to)}`
    );
  }

  private inclusion(node: InclusionNode): string {
    const [leftReference, rightReference] = node.references;
    return leaf(
      `${this.target(node.left)}[${escapeLatex(leftReference)}] ${LATEX_OPERATORS[node.nodeType]} ` +
        `${this.target(node.right)}[${escapeLatex(rightReference)}]`
    );
  }
}

/** One `\Tree` string per root */
export function translateToQtree(roots: readonly AstNode[]): string[] {
  const translator = new QtreeTranslator();
  return roots.map(root => `\\Tree${translator.translate(root)}`);
}
