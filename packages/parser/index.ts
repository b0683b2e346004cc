/**
 * Relational Algebra Parser - Unified Entry Point
 *
 * Provides a unified interface for parsing relational algebra statements.
 */

import { Grammar } from './grammar.js';
import type { GrammarOptions } from './grammar.js';
import type { ParsedStatement } from './parse-result.js';

/**
 * Parse `;`-terminated statements with a one-off grammar.
 *
 * @param input - The relational algebra source to parse
 * @param options - Dialect and syntax overrides (default: extended dialect)
 */
export function parse(input: string, options: GrammarOptions = {}): ParsedStatement[] {
  return new Grammar(options).parse(input);
}

// Re-export types
export * from './parse-result.js';

export { Grammar, createGrammar, buildTokens } from './grammar.js';
export type { GrammarOptions, GrammarTokens } from './grammar.js';
export {
  DEFAULT_SYNTAX,
  DIALECTS,
  activeSyntaxKeys,
  dialectFeatures,
  resolveSyntax,
} from './syntax.js';
export type {
  BaseSyntax,
  ConditionSyntax,
  CoreSyntax,
  ExtendedSyntax,
  DependencySyntax,
  ThreeValuedSyntax,
  SyntaxConfig,
  SyntaxKey,
  Dialect,
  DialectFeatures,
} from './syntax.js';
