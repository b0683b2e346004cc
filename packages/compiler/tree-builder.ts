/**
 * Tree Builder
 *
 * Walks parse results and builds schema-checked syntax trees. Statements of
 * one batch share a Schema, so a relation defined or assigned by an earlier
 * statement is visible to the later ones.
 *
 * Example:
 *   new_alpha := alpha; new_alpha;
 *   → [ASSIGN new_alpha (RELATION alpha), RELATION new_alpha]
 */

import { Grammar } from '../parser/grammar.js';
import type { GrammarOptions } from '../parser/grammar.js';
import type {
  ChainLink,
  ParsedCondition,
  ParsedExpression,
  ParsedStatement,
  RelationSelection,
} from '../parser/parse-result.js';
import { InputError } from '../errors.js';
import { fromParsedCondition } from './condition.js';
import type { Condition } from './condition.js';
import {
  assignNode,
  attributeDependencyNode,
  conditionalJoinNode,
  crossJoinNode,
  definitionNode,
  inclusionNode,
  naturalJoinNode,
  primaryKeyNode,
  projectNode,
  relationNode,
  renameNode,
  selectNode,
  setOperatorNode,
} from './nodes.js';
import type { AstNode, DependencyTarget } from './nodes.js';
import { Schema } from './schema.js';
import type { SchemaRecord } from './schema.js';

// ---
// STATEMENTS
// ---

export function buildTree(statement: ParsedStatement, schema: Schema): AstNode {
  switch (statement.type) {
    case 'definition':
      return definitionNode(statement.name, statement.attributes, schema);

    case 'assignment':
      return assignNode(buildExpression(statement.expression, schema), statement.name, statement.attributes, schema);

    case 'expression':
      return buildExpression(statement.expression, schema);

    case 'primaryKey':
      return primaryKeyNode(relationNode(statement.relation, schema), statement.attributes);

    case 'multivaluedDependency':
    case 'functionalDependency':
      return attributeDependencyNode(statement.type, statement.attributes, buildTarget(statement.target, schema));

    case 'inclusionEquivalence':
    case 'inclusionSubsumption': {
      const [left, right] = statement.targets;
      return inclusionNode(
        statement.type,
        statement.attributes,
        buildTarget(left, schema),
        buildTarget(right, schema)
      );
    }
  }
}

/**
 * Build every statement in order. The first failure aborts the batch; the
 * schema keeps whatever earlier statements registered.
 */
export function buildTrees(statements: readonly ParsedStatement[], schema: Schema): AstNode[] {
  return statements.map(statement => buildTree(statement, schema));
}

// ---
// EXPRESSIONS
// ---

function buildExpression(expression: ParsedExpression, schema: Schema): AstNode {
  switch (expression.type) {
    case 'relation':
      return relationNode(expression.name, schema);

    case 'select':
      return selectNode(buildExpression(expression.operand, schema), buildCondition(expression.conditions));

    case 'project':
      return projectNode(buildExpression(expression.operand, schema), expression.attributes);

    case 'rename':
      return renameNode(buildExpression(expression.operand, schema), expression.name, expression.attributes, schema);

    case 'chain':
      return expression.links.reduce<AstNode>(
        (left, link) => buildLink(left, link, schema),
        buildExpression(expression.head, schema)
      );
  }
}

function buildLink(left: AstNode, link: ChainLink, schema: Schema): AstNode {
  const right = buildExpression(link.operand, schema);

  switch (link.operator) {
    case 'crossJoin':
      return crossJoinNode(left, right);
    case 'naturalJoin':
      return naturalJoinNode(left, right);
    case 'thetaJoin':
    case 'fullOuterJoin':
    case 'leftOuterJoin':
    case 'rightOuterJoin':
      return conditionalJoinNode(link.operator, left, right, requireConditions(link));
    case 'union':
    case 'difference':
    case 'intersect':
      return setOperatorNode(link.operator, left, right);
  }
}

function requireConditions(link: ChainLink): Condition {
  if (!link.conditions) {
    throw new InputError(`Join operator '${link.operator}' requires a condition.`);
  }
  return buildCondition(link.conditions);
}

function buildCondition(conditions: ParsedCondition): Condition {
  return fromParsedCondition(conditions);
}

function buildTarget(target: RelationSelection, schema: Schema): DependencyTarget {
  const relation = relationNode(target.relation, schema);
  return target.conditions ? selectNode(relation, buildCondition(target.conditions)) : relation;
}

// ---
// SCHEMA FILES
// ---

/**
 * Read definition statements into a schema record.
 *
 * @example
 * loadSchema('alpha(a1, a2); beta(b1);')
 * // → { alpha: ['a1', 'a2'], beta: ['b1'] }
 */
export function loadSchema(text: string, options: GrammarOptions = {}): SchemaRecord {
  const schema = new Schema();
  for (const statement of new Grammar(options).parse(text)) {
    if (statement.type !== 'definition') {
      throw new InputError(`Schema files may only contain relation definitions, found '${statement.type}'.`);
    }
    schema.add(statement.name, statement.attributes);
  }
  return schema.toRecord();
}
