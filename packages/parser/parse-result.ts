/**
 * Parse Result Type Definitions
 *
 * These types represent the parsed structure of relational algebra
 * statements before any schema checks. Identifiers are already lower-cased
 * and string literals already use single quotes.
 */

// ---
// STATEMENTS
// ---

export type ParsedStatement =
  | DefinitionStatement
  | AssignmentStatement
  | ExpressionStatement
  | PrimaryKeyStatement
  | AttributeDependencyStatement
  | InclusionStatement;

/**
 * Declares a relation and its attributes.
 * Example: alpha(a1, a2, a3);
 */
export interface DefinitionStatement {
  type: 'definition';
  name: string;
  attributes: string[];
}

/**
 * Stores the result of an expression under a new name.
 * Example: new_alpha(a, b) := \project_{a1, a2} alpha;
 */
export interface AssignmentStatement {
  type: 'assignment';
  name: string;
  /** empty when the attribute names are inherited from the expression */
  attributes: string[];
  expression: ParsedExpression;
}

export interface ExpressionStatement {
  type: 'expression';
  expression: ParsedExpression;
}

// ---
// DEPENDENCY STATEMENTS
// ---

/** Example: pk_{a1, a2} alpha; */
export interface PrimaryKeyStatement {
  type: 'primaryKey';
  attributes: string[];
  relation: string;
}

/**
 * A relation, optionally filtered by a select.
 * Example: \select_{a1 = 5} alpha
 */
export interface RelationSelection {
  relation: string;
  conditions: ParsedCondition | null;
}

/** Example: fd_{a1, a2} alpha; or mvd_{a1, a2} \select_{a3 > 1} alpha; */
export interface AttributeDependencyStatement {
  type: 'multivaluedDependency' | 'functionalDependency';
  attributes: [string, string];
  target: RelationSelection;
}

/** Example: inc=_{a1, b1} (alpha, beta); */
export interface InclusionStatement {
  type: 'inclusionEquivalence' | 'inclusionSubsumption';
  attributes: [string, string];
  targets: [RelationSelection, RelationSelection];
}

// ---
// EXPRESSIONS
// ---

export type ParsedExpression =
  | RelationExpression
  | SelectExpression
  | ProjectExpression
  | RenameExpression
  | ChainExpression;

export interface RelationExpression {
  type: 'relation';
  name: string;
}

export interface SelectExpression {
  type: 'select';
  conditions: ParsedCondition;
  operand: ParsedExpression;
}

export interface ProjectExpression {
  type: 'project';
  /** attribute references, possibly qualified (alpha.a1) */
  attributes: string[];
  operand: ParsedExpression;
}

/**
 * Rename forms:
 * - \rename_{apex} alpha            (name only)
 * - \rename_{apex(a, b)} alpha      (name and attributes)
 * - \rename_{(a, b)} alpha          (attributes only)
 */
export interface RenameExpression {
  type: 'rename';
  name: string | null;
  attributes: string[];
  operand: ParsedExpression;
}

export type BinaryOperator =
  | 'crossJoin'
  | 'naturalJoin'
  | 'thetaJoin'
  | 'fullOuterJoin'
  | 'leftOuterJoin'
  | 'rightOuterJoin'
  | 'intersect'
  | 'union'
  | 'difference';

export interface ChainLink {
  operator: BinaryOperator;
  /** join condition; only theta and outer joins carry one */
  conditions: ParsedCondition | null;
  operand: ParsedExpression;
}

/**
 * A left-associative run of binary operators at one precedence level.
 * `alpha \join beta \join gamma` is head=alpha, links=[beta, gamma].
 */
export interface ChainExpression {
  type: 'chain';
  head: ParsedExpression;
  links: ChainLink[];
}

// ---
// CONDITIONS
// ---

export type ComparisonOperator = '=' | '<>' | '<' | '<=' | '>' | '>=';

export type LogicalOperator = 'and' | 'or';

export interface ParsedOperand {
  kind: 'attribute' | 'string' | 'number';
  text: string;
}

export type ParsedCondition =
  | ComparisonCondition
  | NotCondition
  | DefinedCondition
  | LogicalCondition;

export interface ComparisonCondition {
  type: 'comparison';
  operator: ComparisonOperator;
  left: ParsedOperand;
  right: ParsedOperand;
}

export interface NotCondition {
  type: 'not';
  operand: ParsedCondition;
}

export interface DefinedCondition {
  type: 'defined';
  operand: ParsedOperand;
}

export interface LogicalCondition {
  type: 'logical';
  operator: LogicalOperator;
  left: ParsedCondition;
  right: ParsedCondition;
}
