/**
 * Condition AST
 *
 * Predicates used by select, theta/outer joins and filtered dependencies.
 * Every binary application renders fully parenthesized in both targets.
 *
 * Example:
 *   a1 = 5 and not defined(a2)
 *   → binary(and, binary(=, a1, 5), unary(not, unary(defined, a2)))
 *   → SQL:   ((a1 = 5) AND NOT a2 IS NOT NULL)
 *   → LaTeX: ((a1 = 5) \land \neg \text{defined}(a2))
 */

import type { ComparisonOperator, ParsedCondition, ParsedOperand } from '../parser/parse-result.js';

// ---
// CONDITION NODES
// ---

export type UnaryConditionOperator = 'not' | 'defined';

export type BinaryConditionOperator = 'and' | 'or' | ComparisonOperator;

export type Condition = IdentityCondition | UnaryCondition | BinaryCondition;

export type OperandKind = ParsedOperand['kind'];

/** An attribute reference, string literal or number, kept as written */
export interface IdentityCondition {
  readonly nodeType: 'identity';
  readonly kind: OperandKind;
  readonly text: string;
}

export interface UnaryCondition {
  readonly nodeType: 'unary';
  readonly op: UnaryConditionOperator;
  readonly child: Condition;
}

export interface BinaryCondition {
  readonly nodeType: 'binary';
  readonly op: BinaryConditionOperator;
  readonly left: Condition;
  readonly right: Condition;
}

export function identity(text: string, kind: OperandKind = 'attribute'): IdentityCondition {
  return { nodeType: 'identity', kind, text };
}

export function unary(op: UnaryConditionOperator, child: Condition): UnaryCondition {
  return { nodeType: 'unary', op, child };
}

export function binary(op: BinaryConditionOperator, left: Condition, right: Condition): BinaryCondition {
  return { nodeType: 'binary', op, left, right };
}

function fromOperand(operand: ParsedOperand): IdentityCondition {
  return identity(operand.text, operand.kind);
}

export function fromParsedCondition(parsed: ParsedCondition): Condition {
  switch (parsed.type) {
    case 'comparison':
      return binary(parsed.operator, fromOperand(parsed.left), fromOperand(parsed.right));
    case 'logical':
      return binary(parsed.operator, fromParsedCondition(parsed.left), fromParsedCondition(parsed.right));
    case 'not':
      return unary('not', fromParsedCondition(parsed.operand));
    case 'defined':
      return unary('defined', fromOperand(parsed.operand));
  }
}

// ---
// QUERIES
// ---

/** Attribute references in left-to-right order */
export function attributeReferences(condition: Condition): string[] {
  switch (condition.nodeType) {
    case 'identity':
      return condition.kind === 'attribute' ? [condition.text] : [];
    case 'unary':
      return attributeReferences(condition.child);
    case 'binary':
      return [...attributeReferences(condition.left), ...attributeReferences(condition.right)];
  }
}

export function conditionsEqual(a: Condition, b: Condition): boolean {
  switch (a.nodeType) {
    case 'identity':
      return b.nodeType === 'identity' && a.kind === b.kind && a.text === b.text;
    case 'unary':
      return b.nodeType === 'unary' && a.op === b.op && conditionsEqual(a.child, b.child);
    case 'binary':
      return (
        b.nodeType === 'binary' &&
        a.op === b.op &&
        conditionsEqual(a.left, b.left) &&
        conditionsEqual(a.right, b.right)
      );
  }
}

// ---
// RENDERING
// ---

const SQL_OPERATORS: Record<BinaryConditionOperator, string> = {
  and: 'AND',
  or: 'OR',
  '=': '=',
  '<>': '<>',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
};

const LATEX_OPERATORS: Record<BinaryConditionOperator, string> = {
  and: '\\land',
  or: '\\lor',
  '=': '=',
  '<>': '\\neq',
  '<': '<',
  '<=': '\\leq',
  '>': '>',
  '>=': '\\geq',
};

export function conditionToSql(condition: Condition): string {
  switch (condition.nodeType) {
    case 'identity':
      return condition.text;
    case 'unary':
      return condition.op === 'not'
        ? `NOT ${conditionToSql(condition.child)}`
        : `${conditionToSql(condition.child)} IS NOT NULL`;
    case 'binary':
      return `(${conditionToSql(condition.left)} ${SQL_OPERATORS[condition.op]} ${conditionToSql(condition.right)})`;
  }
}

export function escapeLatex(text: string): string {
  return text.replace(/_/g, '\\_');
}

export function conditionToLatex(condition: Condition): string {
  switch (condition.nodeType) {
    case 'identity':
      return escapeLatex(condition.text);
    case 'unary':
      return condition.op === 'not'
        ? `\\neg ${conditionToLatex(condition.child)}`
        : `\\text{defined}(${conditionToLatex(condition.child)})`;
    case 'binary':
      return `(${conditionToLatex(condition.left)} ${LATEX_OPERATORS[condition.op]} ${conditionToLatex(condition.right)})`;
  }
}
