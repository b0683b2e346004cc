/**
 * SQL Translator
 *
 * Builds one SQL statement per syntax tree. Queries are assembled from
 * blocks (prefix, select, from, where) so that a parent node can extend its
 * child's query instead of wrapping it.
 *
 * Examples (set semantics):
 *   \project_{a1} alpha;             → SELECT DISTINCT alpha.a1 FROM alpha
 *   \select_{a1 = 5} alpha;          → SELECT DISTINCT alpha.a1, alpha.a2 FROM alpha WHERE (a1 = 5)
 *   alpha \union beta;               → SELECT DISTINCT a1, a2 FROM (... UNION ...) AS _t1
 *   pk_{a1} alpha;                   → ALTER TABLE alpha ADD PRIMARY KEY (a1)
 */

import { TranslationError } from '../errors.js';
import { conditionToSql } from '../compiler/condition.js';
import type {
  AssignNode,
  AstNode,
  AttributeDependencyNode,
  ConditionalJoinNode,
  DefinitionNode,
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
// SQL STATEMENTS
// ---

export interface SqlStatement {
  toSql(): string;
}

export interface SqlQueryBlocks {
  select: string;
  from: string;
  where: string;
  prefix: string;
}

export class SqlQuery implements SqlStatement {
  readonly select: string;
  readonly from: string;
  readonly where: string;
  readonly prefix: string;
  /** SELECT DISTINCT under set semantics */
  readonly distinct: boolean;

  constructor(blocks: Partial<SqlQueryBlocks> & Pick<SqlQueryBlocks, 'from'>, distinct: boolean = false) {
    this.select = blocks.select ?? '';
    this.from = blocks.from;
    this.where = blocks.where ?? '';
    this.prefix = blocks.prefix ?? '';
    this.distinct = distinct;
  }

  with(changes: Partial<SqlQueryBlocks>): SqlQuery {
    return new SqlQuery({ ...this.blocks(), ...changes }, this.distinct);
  }

  toSql(): string {
    let sql = this.select
      ? `${this.prefix}SELECT ${this.distinct ? 'DISTINCT ' : ''}${this.select} FROM ${this.from}`
      : `${this.prefix}${this.from}`;
    if (this.where) {
      sql += ` WHERE ${this.where}`;
    }
    return sql;
  }

  private blocks(): SqlQueryBlocks {
    return { select: this.select, from: this.from, where: this.where, prefix: this.prefix };
  }
}

export class AlterTableStatement implements SqlStatement {
  constructor(
    readonly table: string,
    readonly action: string,
    readonly columns: readonly string[]
  ) {}

  toSql(): string {
    return `ALTER TABLE ${this.table} ${this.action} (${this.columns.join(', ')})`;
  }
}

// ---
// TRANSLATORS
// ---

const JOIN_KEYWORDS: Record<JoinNode['nodeType'] | ConditionalJoinNode['nodeType'], string> = {
  crossJoin: 'CROSS JOIN',
  naturalJoin: 'NATURAL JOIN',
  thetaJoin: 'JOIN',
  fullOuterJoin: 'FULL OUTER JOIN',
  leftOuterJoin: 'LEFT OUTER JOIN',
  rightOuterJoin: 'RIGHT OUTER JOIN',
};

const SET_KEYWORDS: Record<SetOperatorNode['nodeType'], string> = {
  union: 'UNION',
  difference: 'EXCEPT',
  intersect: 'INTERSECT',
};

/** Node types whose FROM block can be inlined into an enclosing join */
const INLINE_JOIN_SIDES = new Set<AstNode['nodeType']>([
  'relation',
  'crossJoin',
  'naturalJoin',
  'thetaJoin',
  'fullOuterJoin',
  'leftOuterJoin',
  'rightOuterJoin',
]);

/**
 * Bag semantics: no DISTINCT, and set operators keep duplicates (ALL).
 * Definitions and every dependency except primary keys translate to null.
 */
export class SqlTranslator extends BaseTranslator<SqlStatement | null> {
  private readonly temporaryNames = new WeakMap<AstNode, string>();
  private temporaryCount = 0;

  protected get distinct(): boolean {
    return false;
  }

  protected setKeyword(node: SetOperatorNode): string {
    return `${SET_KEYWORDS[node.nodeType]} ALL`;
  }

  protected createQuery(blocks: Partial<SqlQueryBlocks> & Pick<SqlQueryBlocks, 'from'>): SqlQuery {
    return new SqlQuery(blocks, this.distinct);
  }

  /** Translate a node that must produce a query */
  protected query(node: AstNode): SqlQuery {
    const result = this.translate(node);
    if (!(result instanceof SqlQuery)) {
      throw new TranslationError(`Node type '${node.nodeType}' does not produce a query.`);
    }
    return result;
  }

  /** The node's own name, or a generated `_t<n>` stable for this translator */
  protected temporaryName(node: AstNode): string {
    if (node.name) return node.name;
    let name = this.temporaryNames.get(node);
    if (!name) {
      this.temporaryCount += 1;
      name = `_t${this.temporaryCount}`;
      this.temporaryNames.set(node, name);
    }
    return name;
  }

  protected relation(node: RelationNode): SqlStatement {
    return this.createQuery({ select: node.attributes.toString(), from: node.name });
  }

  protected definition(_node: DefinitionNode): null {
    return null;
  }

  protected select(node: SelectNode): SqlStatement {
    const child = this.query(node.child);
    const condition = conditionToSql(node.conditions);
    return child.with({
      where: child.where ? `(${child.where}) AND (${condition})` : condition,
      select: child.select || node.attributes.toString(),
    });
  }

  protected project(node: ProjectNode): SqlStatement {
    return this.query(node.child).with({ select: node.attributes.toString() });
  }

  protected rename(node: RenameNode): SqlStatement {
    const child = this.query(node.child);
    const from = `(${child.toSql()}) AS ${this.temporaryName(node)}(${node.attributes.names.join(', ')})`;
    return this.createQuery({ select: node.attributes.toString(), from });
  }

  protected assign(node: AssignNode): SqlStatement {
    return this.query(node.child).with({
      prefix: `CREATE TEMPORARY TABLE ${node.name}(${node.attributes.names.join(', ')}) AS `,
    });
  }

  protected crossJoin(node: JoinNode): SqlStatement {
    return this.join(node, null);
  }

  protected naturalJoin(node: JoinNode): SqlStatement {
    return this.join(node, null);
  }

  protected thetaJoin(node: ConditionalJoinNode): SqlStatement {
    return this.join(node, conditionToSql(node.conditions));
  }

  protected fullOuterJoin(node: ConditionalJoinNode): SqlStatement {
    return this.join(node, conditionToSql(node.conditions));
  }

  protected leftOuterJoin(node: ConditionalJoinNode): SqlStatement {
    return this.join(node, conditionToSql(node.conditions));
  }

  protected rightOuterJoin(node: ConditionalJoinNode): SqlStatement {
    return this.join(node, conditionToSql(node.conditions));
  }

  protected union(node: SetOperatorNode): SqlStatement {
    return this.setOperation(node);
  }

  protected difference(node: SetOperatorNode): SqlStatement {
    return this.setOperation(node);
  }

  protected intersect(node: SetOperatorNode): SqlStatement {
    return this.setOperation(node);
  }

  protected primaryKey(node: PrimaryKeyNode): SqlStatement {
    return new AlterTableStatement(node.relationName, 'ADD PRIMARY KEY', node.references);
  }

  protected multivaluedDependency(_node: AttributeDependencyNode): null {
    return null;
  }

  protected functionalDependency(_node: AttributeDependencyNode): null {
    return null;
  }

  protected inclusionEquivalence(_node: InclusionNode): null {
    return null;
  }

  protected inclusionSubsumption(_node: InclusionNode): null {
    return null;
  }

  // --- helpers ---

  private joinSide(node: AstNode): string {
    const query = this.query(node);
    if (INLINE_JOIN_SIDES.has(node.nodeType)) {
      return query.from;
    }
    return `(${query.toSql()}) AS ${this.temporaryName(node)}`;
  }

  private join(node: JoinNode | ConditionalJoinNode, condition: string | null): SqlStatement {
    let from = `${this.joinSide(node.left)} ${JOIN_KEYWORDS[node.nodeType]} ${this.joinSide(node.right)}`;
    if (condition) {
      from += ` ON ${condition}`;
    }
    return this.createQuery({ select: node.attributes.toString(), from });
  }

  private setOperation(node: SetOperatorNode): SqlStatement {
    const left = this.query(node.left).toSql();
    const right = this.query(node.right).toSql();
    const from = `(${left} ${this.setKeyword(node)} ${right}) AS ${this.temporaryName(node)}`;
    return this.createQuery({ select: node.attributes.toString(), from });
  }
}

/** Set semantics: SELECT DISTINCT, and set operators drop duplicates */
export class SetSqlTranslator extends SqlTranslator {
  protected override get distinct(): boolean {
    return true;
  }

  protected override setKeyword(node: SetOperatorNode): string {
    return SET_KEYWORDS[node.nodeType];
  }
}

export interface SqlTranslateOptions {
  /** keep duplicates (default: false, set semantics) */
  bagSemantics?: boolean;
}

/**
 * Translate syntax trees into SQL, one statement per tree. Trees without a
 * SQL form (definitions, non-key dependencies) are skipped.
 */
export function translateToSql(roots: readonly AstNode[], options: SqlTranslateOptions = {}): string[] {
  const translator = options.bagSemantics ? new SqlTranslator() : new SetSqlTranslator();
  const statements: string[] = [];
  for (const root of roots) {
    const statement = translator.translate(root);
    if (statement) {
      statements.push(statement.toSql());
    }
  }
  return statements;
}
