/**
 * Relational Algebra Syntax Tree
 *
 * One discriminated union over every operator, plus constructor functions
 * that enforce the rules of the algebra against a Schema. A node is never
 * modified after its constructor returns; the only mutable state touched
 * during construction is the Schema (definitions and assignments).
 *
 * Examples:
 *   alpha                  → RelationNode(alpha)
 *   \project_{a1} alpha    → ProjectNode(child: RelationNode(alpha))
 *   alpha \join beta       → CrossJoinNode(left: alpha, right: beta)
 */

import { InputError, RelationReferenceError } from '../errors.js';
import { AttributeList } from './attribute-list.js';
import {
  attributeReferences,
  conditionToSql,
  conditionsEqual,
} from './condition.js';
import type { Condition } from './condition.js';
import type { Schema } from './schema.js';

// ---
// NODE TYPES
// ---

export type AstNode =
  | RelationNode
  | DefinitionNode
  | SelectNode
  | ProjectNode
  | RenameNode
  | AssignNode
  | JoinNode
  | ConditionalJoinNode
  | SetOperatorNode
  | PrimaryKeyNode
  | AttributeDependencyNode
  | InclusionNode;

export type NodeType = AstNode['nodeType'];

interface NodeBase {
  /** relation name; unary nodes inherit their child's, joins and set operators have none */
  readonly name: string | null;
  readonly attributes: AttributeList;
}

/** A relation from the schema */
export interface RelationNode extends NodeBase {
  readonly nodeType: 'relation';
  readonly name: string;
}

/** alpha(a1, a2); - adds alpha to the schema */
export interface DefinitionNode extends NodeBase {
  readonly nodeType: 'definition';
  readonly name: string;
}

export interface SelectNode extends NodeBase {
  readonly nodeType: 'select';
  readonly child: AstNode;
  readonly conditions: Condition;
}

export interface ProjectNode extends NodeBase {
  readonly nodeType: 'project';
  readonly child: AstNode;
}

export interface RenameNode extends NodeBase {
  readonly nodeType: 'rename';
  readonly child: AstNode;
}

/** name := expr; - adds name to the schema */
export interface AssignNode extends NodeBase {
  readonly nodeType: 'assign';
  readonly name: string;
  readonly child: AstNode;
}

export interface JoinNode extends NodeBase {
  readonly nodeType: 'crossJoin' | 'naturalJoin';
  readonly name: null;
  readonly left: AstNode;
  readonly right: AstNode;
}

export type ConditionalJoinType = 'thetaJoin' | 'fullOuterJoin' | 'leftOuterJoin' | 'rightOuterJoin';

export interface ConditionalJoinNode extends NodeBase {
  readonly nodeType: ConditionalJoinType;
  readonly name: null;
  readonly left: AstNode;
  readonly right: AstNode;
  readonly conditions: Condition;
}

export type SetOperatorType = 'union' | 'difference' | 'intersect';

export interface SetOperatorNode extends NodeBase {
  readonly nodeType: SetOperatorType;
  readonly name: null;
  readonly left: AstNode;
  readonly right: AstNode;
}

// ---
// DEPENDENCY NODES
// ---

/** A dependency applies to a relation or to a select over one */
export type DependencyTarget = RelationNode | SelectNode;

/** pk_{a1, a2} alpha; */
export interface PrimaryKeyNode extends NodeBase {
  readonly nodeType: 'primaryKey';
  readonly name: null;
  readonly relationName: string;
  readonly references: string[];
  readonly child: RelationNode;
}

/** mvd_{a1, a2} alpha; or fd_{a1, a2} \select_{a3 > 0} alpha; */
export interface AttributeDependencyNode extends NodeBase {
  readonly nodeType: 'multivaluedDependency' | 'functionalDependency';
  readonly name: null;
  readonly relationName: string;
  readonly references: [string, string];
  readonly child: DependencyTarget;
}

/** inc=_{a1, b1} (alpha, beta); or inc⊆_{a1, b1} (alpha, beta); */
export interface InclusionNode extends NodeBase {
  readonly nodeType: 'inclusionEquivalence' | 'inclusionSubsumption';
  readonly name: null;
  readonly relationNames: [string, string];
  readonly references: [string, string];
  readonly left: DependencyTarget;
  readonly right: DependencyTarget;
}

// ---
// CONSTRUCTORS
// ---

export function relationNode(name: string, schema: Schema): RelationNode {
  return {
    nodeType: 'relation',
    name,
    attributes: new AttributeList(schema.getAttributes(name), name),
  };
}

export function definitionNode(name: string, attributes: readonly string[], schema: Schema): DefinitionNode {
  const node: DefinitionNode = {
    nodeType: 'definition',
    name,
    attributes: new AttributeList(attributes, name),
  };
  schema.add(name, node.attributes.names);
  return node;
}

export function selectNode(child: AstNode, conditions: Condition): SelectNode {
  child.attributes.validate(attributeReferences(conditions));
  return {
    nodeType: 'select',
    name: child.name,
    attributes: child.attributes,
    child,
    conditions,
  };
}

export function projectNode(child: AstNode, references: readonly string[]): ProjectNode {
  return {
    nodeType: 'project',
    name: child.name,
    attributes: child.attributes.trim(references),
    child,
  };
}

/**
 * Rename the relation, its attributes, or both. An explicit new name must
 * not already name a relation in the schema.
 */
export function renameNode(
  child: AstNode,
  name: string | null,
  attributes: readonly string[],
  schema: Schema
): RenameNode {
  if (name && schema.contains(name)) {
    throw new RelationReferenceError(`Relation '${name}' already exists.`);
  }
  const newName = name || child.name;
  return {
    nodeType: 'rename',
    name: newName,
    attributes: child.attributes.rename(attributes, newName),
    child,
  };
}

export function assignNode(
  child: AstNode,
  name: string,
  attributes: readonly string[],
  schema: Schema
): AssignNode {
  if (!name) {
    throw new InputError('Name is required for assignment.');
  }
  if (attributes.length > 0 && attributes.length !== child.attributes.length) {
    throw new InputError(
      `Assignment requires naming all attributes: expected ${child.attributes.length}, got ${attributes.length}.`
    );
  }
  const node: AssignNode = {
    nodeType: 'assign',
    name,
    attributes: child.attributes.rename(attributes, name),
    child,
  };
  schema.add(name, node.attributes.names);
  return node;
}

function checkJoinable(left: AstNode, right: AstNode): void {
  if (left.name && right.name && left.name === right.name) {
    throw new RelationReferenceError(`Ambiguous relation reference: '${left.name}' appears on both sides of a join.`);
  }
}

export function crossJoinNode(left: AstNode, right: AstNode): JoinNode {
  checkJoinable(left, right);
  return {
    nodeType: 'crossJoin',
    name: null,
    attributes: AttributeList.merge(left.attributes, right.attributes),
    left,
    right,
  };
}

/** Right-side attributes sharing a name with a left-side attribute are dropped */
export function naturalJoinNode(left: AstNode, right: AstNode): JoinNode {
  checkJoinable(left, right);
  const leftNames = new Set(left.attributes.names);
  const rightOnly = right.attributes.entries.filter(entry => !leftNames.has(entry.name));
  return {
    nodeType: 'naturalJoin',
    name: null,
    attributes: AttributeList.fromEntries([...left.attributes.entries, ...rightOnly]),
    left,
    right,
  };
}

export function conditionalJoinNode(
  nodeType: ConditionalJoinType,
  left: AstNode,
  right: AstNode,
  conditions: Condition
): ConditionalJoinNode {
  checkJoinable(left, right);
  const attributes = AttributeList.merge(left.attributes, right.attributes);
  attributes.validate(attributeReferences(conditions));
  return { nodeType, name: null, attributes, left, right, conditions };
}

export function setOperatorNode(nodeType: SetOperatorType, left: AstNode, right: AstNode): SetOperatorNode {
  const names = left.attributes.names;
  const rightNames = right.attributes.names;
  if (names.length !== rightNames.length || names.some((name, i) => name !== rightNames[i])) {
    throw new InputError(
      `Set operations require identical relation schemas: (${names.join(', ')}) vs (${rightNames.join(', ')}).`
    );
  }
  return {
    nodeType,
    name: null,
    attributes: new AttributeList(names, null),
    left,
    right,
  };
}

export function primaryKeyNode(child: RelationNode, references: readonly string[]): PrimaryKeyNode {
  return {
    nodeType: 'primaryKey',
    name: null,
    relationName: child.name,
    references: [...references],
    attributes: child.attributes.trim(references),
    child,
  };
}

function targetRelation(target: DependencyTarget): string {
  return target.nodeType === 'relation' ? target.name : (target.name ?? '');
}

export function attributeDependencyNode(
  nodeType: AttributeDependencyNode['nodeType'],
  references: [string, string],
  child: DependencyTarget
): AttributeDependencyNode {
  return {
    nodeType,
    name: null,
    relationName: targetRelation(child),
    references,
    attributes: child.attributes.trim(references),
    child,
  };
}

/** The first reference belongs to the left relation, the second to the right */
export function inclusionNode(
  nodeType: InclusionNode['nodeType'],
  references: [string, string],
  left: DependencyTarget,
  right: DependencyTarget
): InclusionNode {
  const [leftReference, rightReference] = references;
  return {
    nodeType,
    name: null,
    relationNames: [targetRelation(left), targetRelation(right)],
    references,
    attributes: AttributeList.merge(left.attributes.trim([leftReference]), right.attributes.trim([rightReference])),
    left,
    right,
  };
}

// ---
// TREE UTILITIES
// ---

/** Direct children, left to right */
export function childrenOf(node: AstNode): AstNode[] {
  switch (node.nodeType) {
    case 'relation':
    case 'definition':
      return [];
    case 'select':
    case 'project':
    case 'rename':
    case 'assign':
    case 'primaryKey':
    case 'multivaluedDependency':
    case 'functionalDependency':
      return [node.child];
    case 'crossJoin':
    case 'naturalJoin':
    case 'thetaJoin':
    case 'fullOuterJoin':
    case 'leftOuterJoin':
    case 'rightOuterJoin':
    case 'union':
    case 'difference':
    case 'intersect':
    case 'inclusionEquivalence':
    case 'inclusionSubsumption':
      return [node.left, node.right];
  }
}

/** Children before parents, left subtree before right */
export function postOrder(node: AstNode): AstNode[] {
  return [...childrenOf(node).flatMap(postOrder), node];
}

function conditionsOf(node: AstNode): Condition | null {
  switch (node.nodeType) {
    case 'select':
    case 'thetaJoin':
    case 'fullOuterJoin':
    case 'leftOuterJoin':
    case 'rightOuterJoin':
      return node.conditions;
    default:
      return null;
  }
}

function referencesOf(node: AstNode): readonly string[] {
  switch (node.nodeType) {
    case 'primaryKey':
    case 'multivaluedDependency':
    case 'functionalDependency':
    case 'inclusionEquivalence':
    case 'inclusionSubsumption':
      return node.references;
    default:
      return [];
  }
}

/** Structural equality: operator, name, attributes, parameters and children */
export function nodesEqual(a: AstNode, b: AstNode): boolean {
  if (a.nodeType !== b.nodeType || a.name !== b.name) return false;
  if (!a.attributes.equals(b.attributes)) return false;

  const conditionsA = conditionsOf(a);
  const conditionsB = conditionsOf(b);
  if (conditionsA && conditionsB) {
    if (!conditionsEqual(conditionsA, conditionsB)) return false;
  } else if (conditionsA || conditionsB) {
    return false;
  }

  const referencesA = referencesOf(a);
  const referencesB = referencesOf(b);
  if (referencesA.length !== referencesB.length || referencesA.some((ref, i) => ref !== referencesB[i])) {
    return false;
  }

  const childrenA = childrenOf(a);
  const childrenB = childrenOf(b);
  return childrenA.length === childrenB.length && childrenA.every((child, i) => nodesEqual(child, childrenB[i]));
}

const NODE_LABELS: Record<NodeType, string> = {
  relation: 'RELATION',
  definition: 'DEFINITION',
  select: 'SELECT',
  project: 'PROJECT',
  rename: 'RENAME',
  assign: 'ASSIGN',
  crossJoin: 'CROSS JOIN',
  naturalJoin: 'NATURAL JOIN',
  thetaJoin: 'THETA JOIN',
  fullOuterJoin: 'FULL OUTER JOIN',
  leftOuterJoin: 'LEFT OUTER JOIN',
  rightOuterJoin: 'RIGHT OUTER JOIN',
  union: 'UNION',
  difference: 'DIFFERENCE',
  intersect: 'INTERSECT',
  primaryKey: 'PK',
  multivaluedDependency: 'MVD',
  functionalDependency: 'FD',
  inclusionEquivalence: 'INC=',
  inclusionSubsumption: 'INC⊆',
};

/**
 * Print a tree for debugging.
 */
export function printSyntaxTree(node: AstNode, indent: string = ''): string {
  let line = `${indent}${NODE_LABELS[node.nodeType]}`;
  if (node.name) line += ` ${node.name}`;

  const conditions = conditionsOf(node);
  if (conditions) line += ` ${conditionToSql(conditions)}`;

  const references = referencesOf(node);
  if (references.length > 0) line += ` {${references.join(', ')}}`;

  line += ` [${node.attributes.toString()}]`;

  const lines = [line];
  for (const child of childrenOf(node)) {
    lines.push(printSyntaxTree(child, indent + '  '));
  }
  return lines.join('\n');
}
