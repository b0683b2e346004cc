/**
 * Syntax Configuration
 *
 * Maps every token of the relational algebra language to the literal the
 * lexer recognizes. The tables are layered the same way the dialects are:
 * core → extended → dependency, and core → three-valued logic.
 */

import { InputError } from '../errors.js';

// ---
// SYNTAX TABLES
// ---

/** Punctuation shared by every dialect */
export interface BaseSyntax {
  terminator: string;
  delim: string;
  paramsStart: string;
  paramsStop: string;
  parenLeft: string;
  parenRight: string;
}

/** Logical and comparison operators used inside `_{...}` condition blocks */
export interface ConditionSyntax extends BaseSyntax {
  notOp: string;
  andOp: string;
  orOp: string;
  equalOp: string;
  notEqualOp: string;
  notEqualAltOp: string;
  lessThanOp: string;
  lessThanEqualOp: string;
  greaterThanOp: string;
  greaterThanEqualOp: string;
}

export interface CoreSyntax extends ConditionSyntax {
  projectOp: string;
  renameOp: string;
  selectOp: string;
  assignOp: string;
  joinOp: string;
  differenceOp: string;
  unionOp: string;
}

export interface ExtendedSyntax extends CoreSyntax {
  thetaJoinOp: string;
  naturalJoinOp: string;
  fullOuterJoinOp: string;
  leftOuterJoinOp: string;
  rightOuterJoinOp: string;
  intersectOp: string;
  definedOp: string;
}

export interface DependencySyntax extends ExtendedSyntax {
  pkOp: string;
  mvdOp: string;
  fdOp: string;
  incEquivOp: string;
  incSubsetOp: string;
}

export interface ThreeValuedSyntax extends CoreSyntax {
  definedOp: string;
}

/** The full table; a dialect only activates the entries it needs. */
export type SyntaxConfig = Readonly<DependencySyntax>;

export type SyntaxKey = keyof DependencySyntax;

export const DEFAULT_SYNTAX: SyntaxConfig = Object.freeze({
  terminator: ';',
  delim: ',',
  paramsStart: '_{',
  paramsStop: '}',
  parenLeft: '(',
  parenRight: ')',

  notOp: 'not',
  andOp: 'and',
  orOp: 'or',
  equalOp: '=',
  notEqualOp: '!=',
  notEqualAltOp: '<>',
  lessThanOp: '<',
  lessThanEqualOp: '<=',
  greaterThanOp: '>',
  greaterThanEqualOp: '>=',

  projectOp: '\\project',
  renameOp: '\\rename',
  selectOp: '\\select',
  assignOp: ':=',
  joinOp: '\\join',
  differenceOp: '\\difference',
  unionOp: '\\union',

  thetaJoinOp: '\\theta_join',
  naturalJoinOp: '\\natural_join',
  fullOuterJoinOp: '\\full_outer_join',
  leftOuterJoinOp: '\\left_outer_join',
  rightOuterJoinOp: '\\right_outer_join',
  intersectOp: '\\intersect',
  definedOp: 'defined',

  pkOp: 'pk',
  mvdOp: 'mvd',
  fdOp: 'fd',
  incEquivOp: 'inc=',
  incSubsetOp: 'inc⊆',
});

// ---
// DIALECTS
// ---

export type Dialect = 'core' | 'extended' | 'dependency' | 'threeValued';

export const DIALECTS: readonly Dialect[] = ['core', 'extended', 'dependency', 'threeValued'];

export interface DialectFeatures {
  /** natural, theta and outer joins, plus `\join_{cond}` */
  extendedJoins: boolean;
  intersect: boolean;
  defined: boolean;
  dependencies: boolean;
}

const DIALECT_FEATURES: Record<Dialect, DialectFeatures> = {
  core: { extendedJoins: false, intersect: false, defined: false, dependencies: false },
  extended: { extendedJoins: true, intersect: true, defined: true, dependencies: false },
  dependency: { extendedJoins: true, intersect: true, defined: true, dependencies: true },
  threeValued: { extendedJoins: false, intersect: false, defined: true, dependencies: false },
};

export function dialectFeatures(dialect: Dialect): DialectFeatures {
  return DIALECT_FEATURES[dialect];
}

const CORE_KEYS: readonly SyntaxKey[] = [
  'terminator', 'delim', 'paramsStart', 'paramsStop', 'parenLeft', 'parenRight',
  'notOp', 'andOp', 'orOp',
  'equalOp', 'notEqualOp', 'notEqualAltOp',
  'lessThanOp', 'lessThanEqualOp', 'greaterThanOp', 'greaterThanEqualOp',
  'projectOp', 'renameOp', 'selectOp', 'assignOp', 'joinOp', 'differenceOp', 'unionOp',
];

const EXTENDED_JOIN_KEYS: readonly SyntaxKey[] = [
  'thetaJoinOp', 'naturalJoinOp', 'fullOuterJoinOp', 'leftOuterJoinOp', 'rightOuterJoinOp',
];

const DEPENDENCY_KEYS: readonly SyntaxKey[] = ['pkOp', 'mvdOp', 'fdOp', 'incEquivOp', 'incSubsetOp'];

/** Syntax entries a dialect's lexer recognizes */
export function activeSyntaxKeys(dialect: Dialect): SyntaxKey[] {
  const features = dialectFeatures(dialect);
  const keys = [...CORE_KEYS];
  if (features.extendedJoins) keys.push(...EXTENDED_JOIN_KEYS);
  if (features.intersect) keys.push('intersectOp');
  if (features.defined) keys.push('definedOp');
  if (features.dependencies) keys.push(...DEPENDENCY_KEYS);
  return keys;
}

/**
 * Merge caller overrides over the defaults and check that every literal the
 * dialect uses is non-empty and unique.
 */
export function resolveSyntax(
  overrides: Partial<DependencySyntax> = {},
  dialect: Dialect = 'dependency'
): SyntaxConfig {
  const syntax: DependencySyntax = { ...DEFAULT_SYNTAX };
  for (const key of Object.keys(overrides)) {
    if (!isSyntaxKey(key)) {
      throw new InputError(`Unknown syntax entry '${key}'.`);
    }
    const value = overrides[key];
    if (value !== undefined) syntax[key] = value;
  }

  const seen = new Map<string, SyntaxKey>();
  for (const key of activeSyntaxKeys(dialect)) {
    const literal = syntax[key];
    if (literal.trim() === '') {
      throw new InputError(`Syntax entry '${key}' must not be empty.`);
    }
    const previous = seen.get(literal.toLowerCase());
    if (previous) {
      throw new InputError(`Syntax entries '${previous}' and '${key}' share the literal '${literal}'.`);
    }
    seen.set(literal.toLowerCase(), key);
  }

  return Object.freeze(syntax);
}

function isSyntaxKey(key: string): key is SyntaxKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SYNTAX, key);
}
