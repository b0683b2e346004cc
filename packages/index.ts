/**
 * relalg - Relational Algebra Compiler
 *
 * Compiles relational algebra statements to SQL (bag or set semantics)
 * and to LaTeX qtree diagrams.
 *
 * @example
 * ```typescript
 * import { createRelalg } from 'relalg';
 *
 * const relalg = createRelalg({ dialect: 'extended' });
 * const schema = { alpha: ['a1', 'a2'], beta: ['b1'] };
 *
 * relalg.toSql('\\project_{a1} alpha;', schema);
 * // → ['SELECT DISTINCT alpha.a1 FROM alpha']
 *
 * relalg.toQtree('alpha \\join beta;', schema);
 * // → ['\\Tree[.$\\times$ [.$alpha$ ] [.$beta$ ] ]']
 * ```
 */

// parser
export { parse, Grammar, createGrammar, DEFAULT_SYNTAX, DIALECTS, resolveSyntax } from './parser/index.js';
export type {
  ParsedStatement,
  ParsedExpression,
  ParsedCondition,
  GrammarOptions,
  Dialect,
  SyntaxConfig,
  SyntaxKey,
} from './parser/index.js';

// compiler
export {
  Schema,
  AttributeList,
  buildTree,
  buildTrees,
  loadSchema,
  postOrder,
  nodesEqual,
  printSyntaxTree,
  conditionToSql,
  conditionToLatex,
} from './compiler/index.js';
export type { AstNode, NodeType, Condition, SchemaRecord, Attribute } from './compiler/index.js';

// translator
export {
  BaseTranslator,
  SqlQuery,
  SqlTranslator,
  SetSqlTranslator,
  QtreeTranslator,
  translateToSql,
  translateToQtree,
} from './translator/index.js';
export type { SqlStatement, SqlTranslateOptions } from './translator/index.js';

// errors
export {
  RelalgError,
  RelalgSyntaxError,
  RelationReferenceError,
  AttributeReferenceError,
  InputError,
  TranslationError,
  isUserError,
} from './errors.js';
export type { SourcePosition } from './errors.js';

// --- internal imports ---

import { Grammar } from './parser/index.js';
import type { Dialect, DependencySyntax, ParsedStatement } from './parser/index.js';
import { Schema, buildTrees } from './compiler/index.js';
import type { AstNode, SchemaRecord } from './compiler/index.js';
import { translateToQtree, translateToSql } from './translator/index.js';

/**
 * Options for creating a Relalg instance
 */
export interface RelalgOptions {
  /** operator set accepted by the grammar (default: 'dependency') */
  dialect?: Dialect;

  /**
   * Replacement literals for individual tokens.
   * @example { projectOp: '\\pi', selectOp: '\\sigma' }
   */
  syntax?: Partial<DependencySyntax>;

  /** default semantics for toSql (default: false, set semantics) */
  bagSemantics?: boolean;
}

export interface ToSqlOptions {
  /** overrides the instance default */
  bagSemantics?: boolean;
}

/**
 * A schema record is copied for each call; a Schema instance is used as
 * is, so definitions and assignments carry over to later calls.
 */
export type SchemaInput = SchemaRecord | Schema;

/**
 * High-level API: parse, build syntax trees, translate.
 */
export class Relalg {
  private readonly grammar: Grammar;
  private readonly bagSemantics: boolean;

  constructor(options: RelalgOptions = {}) {
    this.grammar = new Grammar({
      dialect: options.dialect ?? 'dependency',
      syntax: options.syntax,
    });
    this.bagSemantics = options.bagSemantics ?? false;
  }

  /** parse statements without schema checks */
  parse(source: string): ParsedStatement[] {
    return this.grammar.parse(source);
  }

  /** parse and build schema-checked syntax trees */
  toSyntaxTree(source: string, schema: SchemaInput = {}): AstNode[] {
    return buildTrees(this.parse(source), toSchema(schema));
  }

  /** compile to SQL, one statement per tree that has a SQL form */
  toSql(source: string, schema: SchemaInput = {}, options: ToSqlOptions = {}): string[] {
    const roots = this.toSyntaxTree(source, schema);
    return translateToSql(roots, { bagSemantics: options.bagSemantics ?? this.bagSemantics });
  }

  /** compile to LaTeX qtree, one diagram per statement */
  toQtree(source: string, schema: SchemaInput = {}): string[] {
    return translateToQtree(this.toSyntaxTree(source, schema));
  }
}

function toSchema(schema: SchemaInput): Schema {
  return schema instanceof Schema ? schema : new Schema(schema);
}

/**
 * Create a Relalg instance.
 */
export function createRelalg(options: RelalgOptions = {}): Relalg {
  return new Relalg(options);
}
