/**
 * translator package
 *
 * AstNode[] → SQL statements or LaTeX qtree diagrams
 */

export { BaseTranslator } from './base-translator.js';

export {
  SqlQuery,
  AlterTableStatement,
  SqlTranslator,
  SetSqlTranslator,
  translateToSql,
} from './sql-translator.js';
export type { SqlStatement, SqlQueryBlocks, SqlTranslateOptions } from './sql-translator.js';

export { QtreeTranslator, LATEX_OPERATORS, translateToQtree } from './qtree-translator.js';
