/**
 * compiler package
 *
 * pipeline: ParsedStatement[] → (Schema) → AstNode[]
 */

// schema
export { Schema } from './schema.js';
export type { SchemaRecord } from './schema.js';

// attribute lists
export { AttributeList, prefixedName } from './attribute-list.js';
export type { Attribute } from './attribute-list.js';

// conditions
export {
  identity,
  unary,
  binary,
  fromParsedCondition,
  attributeReferences,
  conditionsEqual,
  conditionToSql,
  conditionToLatex,
  escapeLatex,
} from './condition.js';
export type {
  Condition,
  IdentityCondition,
  OperandKind,
  UnaryCondition,
  BinaryCondition,
  UnaryConditionOperator,
  BinaryConditionOperator,
} from './condition.js';

// syntax tree
export {
  relationNode,
  definitionNode,
  selectNode,
  projectNode,
  renameNode,
  assignNode,
  crossJoinNode,
  naturalJoinNode,
  conditionalJoinNode,
  setOperatorNode,
  primaryKeyNode,
  attributeDependencyNode,
  inclusionNode,
  childrenOf,
  postOrder,
  nodesEqual,
  printSyntaxTree,
} from './nodes.js';
export type {
  AstNode,
  NodeType,
  RelationNode,
  DefinitionNode,
  SelectNode,
  ProjectNode,
  RenameNode,
  AssignNode,
  JoinNode,
  ConditionalJoinNode,
  ConditionalJoinType,
  SetOperatorNode,
  SetOperatorType,
  DependencyTarget,
  PrimaryKeyNode,
  AttributeDependencyNode,
  InclusionNode,
} from './nodes.js';

// tree builder
export { buildTree, buildTrees, loadSchema } from './tree-builder.js';
