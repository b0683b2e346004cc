/**
 * Relational Algebra Parser using Chevrotain
 *
 * Tokens are built per grammar instance from a Syntax Configuration, so
 * every operator literal can be overridden. The lexer only knows the tokens
 * of the selected dialect; anything else fails to lex.
 */

import { createToken, Lexer, CstParser } from 'chevrotain';
import type { CstElement, CstNode, IToken, TokenType } from 'chevrotain';
import { RelalgSyntaxError } from '../errors.js';
import type { SourcePosition } from '../errors.js';
import {
  activeSyntaxKeys,
  dialectFeatures,
  resolveSyntax,
} from './syntax.js';
import type {
  Dialect,
  DialectFeatures,
  DependencySyntax,
  SyntaxConfig,
  SyntaxKey,
} from './syntax.js';
import type {
  BinaryOperator,
  ChainExpression,
  ComparisonOperator,
  ParsedCondition,
  ParsedExpression,
  ParsedOperand,
  ParsedStatement,
  RelationSelection,
} from './parse-result.js';

// ---
// TOKEN DEFINITIONS
// ---

const IDENT_CHAR = '[a-zA-Z0-9_]';

// Word boundary helper - matches when NOT followed by identifier chars
const WB = `(?!${IDENT_CHAR})`;

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function endsInWordChar(literal: string): boolean {
  return /[a-zA-Z0-9_]$/.test(literal);
}

function literalToken(name: string, literal: string, lookahead = ''): TokenType {
  const flags = /[a-zA-Z]/.test(literal) ? 'i' : '';
  return createToken({ name, pattern: new RegExp(`${escapeRegExp(literal)}${lookahead}`, flags) });
}

export interface GrammarTokens {
  /** every token the parser knows, including ones the dialect never lexes */
  vocabulary: TokenType[];
  /** tokens of the active dialect, in matching order */
  lexerDefinition: TokenType[];

  Terminator: TokenType;
  Delim: TokenType;
  ParamsStart: TokenType;
  ParamsStop: TokenType;
  LParen: TokenType;
  RParen: TokenType;
  Assign: TokenType;

  Project: TokenType;
  Rename: TokenType;
  Select: TokenType;
  Join: TokenType;
  Difference: TokenType;
  Union: TokenType;
  ThetaJoin: TokenType;
  NaturalJoin: TokenType;
  FullOuterJoin: TokenType;
  LeftOuterJoin: TokenType;
  RightOuterJoin: TokenType;
  Intersect: TokenType;

  Not: TokenType;
  And: TokenType;
  Or: TokenType;
  Defined: TokenType;
  Comparison: TokenType;

  PrimaryKey: TokenType;
  Multivalued: TokenType;
  Functional: TokenType;
  InclusionEquivalence: TokenType;
  InclusionSubsumption: TokenType;

  StringLiteral: TokenType;
  NumberLiteral: TokenType;
  QualifiedIdentifier: TokenType;
  Identifier: TokenType;

  comparisonOperators: Map<TokenType, ComparisonOperator>;
}

export function buildTokens(syntax: SyntaxConfig, dialect: Dialect): GrammarTokens {
  const params = escapeRegExp(syntax.paramsStart);
  const parenLeft = escapeRegExp(syntax.parenLeft);

  // Operators may be followed directly by a parameter block: \project_{...}
  const operatorBoundary = (literal: string) =>
    endsInWordChar(literal) ? `(?:(?=${params})|${WB})` : '';
  const wordBoundary = (literal: string) => (endsInWordChar(literal) ? WB : '');

  const operator = (name: string, key: SyntaxKey) =>
    literalToken(name, syntax[key], operatorBoundary(syntax[key]));
  const word = (name: string, key: SyntaxKey) =>
    literalToken(name, syntax[key], wordBoundary(syntax[key]));
  // Dependency keywords only count when a parameter block follows
  const dependency = (name: string, key: SyntaxKey) =>
    literalToken(name, syntax[key], `(?=${params})`);

  const Comparison = createToken({ name: 'Comparison', pattern: Lexer.NA });
  const comparison = (name: string, key: SyntaxKey) =>
    createToken({
      name,
      pattern: new RegExp(`${escapeRegExp(syntax[key])}${wordBoundary(syntax[key])}`, 'i'),
      categories: [Comparison],
    });

  const byKey: Record<SyntaxKey, TokenType> = {
    terminator: word('Terminator', 'terminator'),
    delim: word('Delim', 'delim'),
    paramsStart: word('ParamsStart', 'paramsStart'),
    paramsStop: word('ParamsStop', 'paramsStop'),
    parenLeft: word('LParen', 'parenLeft'),
    parenRight: word('RParen', 'parenRight'),

    notOp: word('Not', 'notOp'),
    andOp: word('And', 'andOp'),
    orOp: word('Or', 'orOp'),
    equalOp: comparison('Equal', 'equalOp'),
    notEqualOp: comparison('NotEqual', 'notEqualOp'),
    notEqualAltOp: comparison('NotEqualAlt', 'notEqualAltOp'),
    lessThanOp: comparison('LessThan', 'lessThanOp'),
    lessThanEqualOp: comparison('LessThanEqual', 'lessThanEqualOp'),
    greaterThanOp: comparison('GreaterThan', 'greaterThanOp'),
    greaterThanEqualOp: comparison('GreaterThanEqual', 'greaterThanEqualOp'),

    projectOp: operator('Project', 'projectOp'),
    renameOp: operator('Rename', 'renameOp'),
    selectOp: operator('Select', 'selectOp'),
    assignOp: word('Assign', 'assignOp'),
    joinOp: operator('Join', 'joinOp'),
    differenceOp: operator('Difference', 'differenceOp'),
    unionOp: operator('Union', 'unionOp'),

    thetaJoinOp: operator('ThetaJoin', 'thetaJoinOp'),
    naturalJoinOp: operator('NaturalJoin', 'naturalJoinOp'),
    fullOuterJoinOp: operator('FullOuterJoin', 'fullOuterJoinOp'),
    leftOuterJoinOp: operator('LeftOuterJoin', 'leftOuterJoinOp'),
    rightOuterJoinOp: operator('RightOuterJoin', 'rightOuterJoinOp'),
    intersectOp: operator('Intersect', 'intersectOp'),
    definedOp: literalToken('Defined', syntax.definedOp, `(?=\\s*${parenLeft})`),

    pkOp: dependency('PrimaryKey', 'pkOp'),
    mvdOp: dependency('Multivalued', 'mvdOp'),
    fdOp: dependency('Functional', 'fdOp'),
    incEquivOp: dependency('InclusionEquivalence', 'incEquivOp'),
    incSubsetOp: dependency('InclusionSubsumption', 'incSubsetOp'),
  };

  const WhiteSpace = createToken({
    name: 'WhiteSpace',
    pattern: /\s+/,
    group: Lexer.SKIPPED,
    line_breaks: true,
  });
  const StringLiteral = createToken({ name: 'StringLiteral', pattern: /"[^"]*"|'[^']*'/ });
  const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /[-+]?[0-9]*\.?[0-9]+/ });
  const QualifiedIdentifier = createToken({
    name: 'QualifiedIdentifier',
    pattern: /[a-zA-Z][a-zA-Z0-9_]*\.[a-zA-Z][a-zA-Z0-9_]*/,
  });
  // Identifier comes after all keywords
  const Identifier = createToken({ name: 'Identifier', pattern: /[a-zA-Z][a-zA-Z0-9_]*/ });

  // Token order matters! Longer literals first so no literal is shadowed by its prefix
  const active = activeSyntaxKeys(dialect)
    .map((key, index) => ({ key, index }))
    .sort((a, b) => syntax[b.key].length - syntax[a.key].length || a.index - b.index)
    .map(({ key }) => byKey[key]);

  const lexerDefinition = [
    WhiteSpace,
    ...active,
    StringLiteral,
    NumberLiteral,
    QualifiedIdentifier,
    Identifier,
  ];

  const comparisonOperators = new Map<TokenType, ComparisonOperator>([
    [byKey.equalOp, '='],
    [byKey.notEqualOp, '<>'],
    [byKey.notEqualAltOp, '<>'],
    [byKey.lessThanOp, '<'],
    [byKey.lessThanEqualOp, '<='],
    [byKey.greaterThanOp, '>'],
    [byKey.greaterThanEqualOp, '>='],
  ]);

  return {
    vocabulary: [WhiteSpace, Comparison, ...Object.values(byKey), StringLiteral, NumberLiteral, QualifiedIdentifier, Identifier],
    lexerDefinition,
    Terminator: byKey.terminator,
    Delim: byKey.delim,
    ParamsStart: byKey.paramsStart,
    ParamsStop: byKey.paramsStop,
    LParen: byKey.parenLeft,
    RParen: byKey.parenRight,
    Assign: byKey.assignOp,
    Project: byKey.projectOp,
    Rename: byKey.renameOp,
    Select: byKey.selectOp,
    Join: byKey.joinOp,
    Difference: byKey.differenceOp,
    Union: byKey.unionOp,
    ThetaJoin: byKey.thetaJoinOp,
    NaturalJoin: byKey.naturalJoinOp,
    FullOuterJoin: byKey.fullOuterJoinOp,
    LeftOuterJoin: byKey.leftOuterJoinOp,
    RightOuterJoin: byKey.rightOuterJoinOp,
    Intersect: byKey.intersectOp,
    Not: byKey.notOp,
    And: byKey.andOp,
    Or: byKey.orOp,
    Defined: byKey.definedOp,
    Comparison,
    PrimaryKey: byKey.pkOp,
    Multivalued: byKey.mvdOp,
    Functional: byKey.fdOp,
    InclusionEquivalence: byKey.incEquivOp,
    InclusionSubsumption: byKey.incSubsetOp,
    StringLiteral,
    NumberLiteral,
    QualifiedIdentifier,
    Identifier,
    comparisonOperators,
  };
}

// ---
// PARSER
// ---

class RelalgParser extends CstParser {
  private readonly t: GrammarTokens;
  private readonly features: DialectFeatures;

  constructor(tokens: GrammarTokens, features: DialectFeatures) {
    super(tokens.vocabulary, { maxLookahead: 3 });
    this.t = tokens;
    this.features = features;
    this.performSelfAnalysis();
  }

  // Main entry point: one or more terminated statements
  public statements = this.RULE('statements', () => {
    this.AT_LEAST_ONE(() => {
      this.SUBRULE(this.statement, { LABEL: 'statements' });
    });
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.dependency, { LABEL: 'dependency' }) },
      // name(a, b); or name(a, b) := expr;
      { ALT: () => this.SUBRULE(this.declaration, { LABEL: 'declaration' }) },
      // name := expr;
      { ALT: () => this.SUBRULE(this.assignment, { LABEL: 'assignment' }) },
      { ALT: () => this.SUBRULE(this.expression, { LABEL: 'expression' }) },
    ]);
    this.CONSUME(this.t.Terminator);
  });

  private declaration = this.RULE('declaration', () => {
    this.CONSUME(this.t.Identifier, { LABEL: 'name' });
    this.CONSUME(this.t.LParen);
    this.SUBRULE(this.nameList, { LABEL: 'attributes' });
    this.CONSUME(this.t.RParen);
    this.OPTION(() => {
      this.CONSUME(this.t.Assign);
      this.SUBRULE(this.expression, { LABEL: 'expression' });
    });
  });

  private assignment = this.RULE('assignment', () => {
    this.CONSUME(this.t.Identifier, { LABEL: 'name' });
    this.CONSUME(this.t.Assign);
    this.SUBRULE(this.expression, { LABEL: 'expression' });
  });

  private nameList = this.RULE('nameList', () => {
    this.AT_LEAST_ONE_SEP({
      SEP: this.t.Delim,
      DEF: () => this.CONSUME(this.t.Identifier, { LABEL: 'names' }),
    });
  });

  private attributeList = this.RULE('attributeList', () => {
    this.AT_LEAST_ONE_SEP({
      SEP: this.t.Delim,
      DEF: () => this.SUBRULE(this.attributeReference, { LABEL: 'references' }),
    });
  });

  private attributeReference = this.RULE('attributeReference', () => {
    this.OR([
      { ALT: () => this.CONSUME(this.t.QualifiedIdentifier, { LABEL: 'reference' }) },
      { ALT: () => this.CONSUME(this.t.Identifier, { LABEL: 'reference' }) },
    ]);
  });

  // Loosest level: union and difference
  public expression = this.RULE('expression', () => {
    this.SUBRULE(this.setTerm, { LABEL: 'head' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(this.t.Union, { LABEL: 'operators' }) },
        { ALT: () => this.CONSUME(this.t.Difference, { LABEL: 'operators' }) },
      ]);
      this.SUBRULE2(this.setTerm, { LABEL: 'operands' });
    });
  });

  private setTerm = this.RULE('setTerm', () => {
    this.SUBRULE(this.joinTerm, { LABEL: 'head' });
    this.MANY(() => {
      this.CONSUME(this.t.Intersect, { LABEL: 'operators' });
      this.SUBRULE2(this.joinTerm, { LABEL: 'operands' });
    });
  });

  private joinTerm = this.RULE('joinTerm', () => {
    this.SUBRULE(this.unary, { LABEL: 'head' });
    this.MANY(() => {
      this.SUBRULE(this.joinOperator, { LABEL: 'operators' });
      this.SUBRULE2(this.unary, { LABEL: 'operands' });
    });
  });

  private joinOperator = this.RULE('joinOperator', () => {
    this.OR([
      {
        // \join is a cross join; \join_{cond} is shorthand for a theta join
        ALT: () => {
          this.CONSUME(this.t.Join, { LABEL: 'operator' });
          this.OPTION({
            GATE: () => this.features.extendedJoins,
            DEF: () => this.SUBRULE(this.conditionBlock, { LABEL: 'conditions' }),
          });
        },
      },
      { ALT: () => this.CONSUME(this.t.NaturalJoin, { LABEL: 'operator' }) },
      {
        ALT: () => {
          this.CONSUME(this.t.ThetaJoin, { LABEL: 'operator' });
          this.SUBRULE2(this.conditionBlock, { LABEL: 'conditions' });
        },
      },
      {
        ALT: () => {
          this.CONSUME(this.t.FullOuterJoin, { LABEL: 'operator' });
          this.SUBRULE3(this.conditionBlock, { LABEL: 'conditions' });
        },
      },
      {
        ALT: () => {
          this.CONSUME(this.t.LeftOuterJoin, { LABEL: 'operator' });
          this.SUBRULE4(this.conditionBlock, { LABEL: 'conditions' });
        },
      },
      {
        ALT: () => {
          this.CONSUME(this.t.RightOuterJoin, { LABEL: 'operator' });
          this.SUBRULE5(this.conditionBlock, { LABEL: 'conditions' });
        },
      },
    ]);
  });

  // Tightest level: select, project and rename apply to the next operand
  private unary = this.RULE('unary', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(this.t.Select, { LABEL: 'select' });
          this.SUBRULE(this.conditionBlock, { LABEL: 'conditions' });
          this.SUBRULE(this.unary, { LABEL: 'operand' });
        },
      },
      {
        ALT: () => {
          this.CONSUME(this.t.Project, { LABEL: 'project' });
          this.SUBRULE(this.attributeBlock, { LABEL: 'attributes' });
          this.SUBRULE2(this.unary, { LABEL: 'operand' });
        },
      },
      {
        ALT: () => {
          this.CONSUME(this.t.Rename, { LABEL: 'rename' });
          this.SUBRULE(this.renameBlock, { LABEL: 'renaming' });
          this.SUBRULE3(this.unary, { LABEL: 'operand' });
        },
      },
      { ALT: () => this.SUBRULE(this.primary, { LABEL: 'primary' }) },
    ]);
  });

  private primary = this.RULE('primary', () => {
    this.OR([
      { ALT: () => this.CONSUME(this.t.Identifier, { LABEL: 'relation' }) },
      {
        ALT: () => {
          this.CONSUME(this.t.LParen);
          this.SUBRULE(this.expression, { LABEL: 'expression' });
          this.CONSUME(this.t.RParen);
        },
      },
    ]);
  });

  // _{ conditions }
  private conditionBlock = this.RULE('conditionBlock', () => {
    this.CONSUME(this.t.ParamsStart);
    this.SUBRULE(this.conditions, { LABEL: 'conditions' });
    this.CONSUME(this.t.ParamsStop);
  });

  // _{ a1, alpha.a2 }
  private attributeBlock = this.RULE('attributeBlock', () => {
    this.CONSUME(this.t.ParamsStart);
    this.SUBRULE(this.attributeList, { LABEL: 'attributes' });
    this.CONSUME(this.t.ParamsStop);
  });

  // _{ name }, _{ name(a, b) } or _{ (a, b) }
  private renameBlock = this.RULE('renameBlock', () => {
    this.CONSUME(this.t.ParamsStart);
    this.OR([
      {
        ALT: () => {
          this.CONSUME(this.t.Identifier, { LABEL: 'name' });
          this.OPTION(() => {
            this.CONSUME(this.t.LParen);
            this.SUBRULE(this.nameList, { LABEL: 'attributes' });
            this.CONSUME(this.t.RParen);
          });
        },
      },
      {
        ALT: () => {
          this.CONSUME2(this.t.LParen);
          this.SUBRULE2(this.nameList, { LABEL: 'attributes' });
          this.CONSUME2(this.t.RParen);
        },
      },
    ]);
    this.CONSUME(this.t.ParamsStop);
  });

  // ---
  // CONDITIONS (not > and > or)
  // ---

  public conditions = this.RULE('conditions', () => {
    this.SUBRULE(this.conjunction, { LABEL: 'head' });
    this.MANY(() => {
      this.CONSUME(this.t.Or);
      this.SUBRULE2(this.conjunction, { LABEL: 'operands' });
    });
  });

  private conjunction = this.RULE('conjunction', () => {
    this.SUBRULE(this.negation, { LABEL: 'head' });
    this.MANY(() => {
      this.CONSUME(this.t.And);
      this.SUBRULE2(this.negation, { LABEL: 'operands' });
    });
  });

  private negation = this.RULE('negation', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(this.t.Not, { LABEL: 'not' });
          this.SUBRULE(this.negation, { LABEL: 'operand' });
        },
      },
      { ALT: () => this.SUBRULE(this.condition, { LABEL: 'condition' }) },
    ]);
  });

  private condition = this.RULE('condition', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(this.t.LParen);
          this.SUBRULE(this.conditions, { LABEL: 'group' });
          this.CONSUME(this.t.RParen);
        },
      },
      {
        ALT: () => {
          this.CONSUME(this.t.Defined, { LABEL: 'defined' });
          this.CONSUME2(this.t.LParen);
          this.SUBRULE(this.operand, { LABEL: 'operands' });
          this.CONSUME2(this.t.RParen);
        },
      },
      {
        ALT: () => {
          this.SUBRULE2(this.operand, { LABEL: 'operands' });
          this.CONSUME(this.t.Comparison, { LABEL: 'comparison' });
          this.SUBRULE3(this.operand, { LABEL: 'operands' });
        },
      },
    ]);
  });

  private operand = this.RULE('operand', () => {
    this.OR([
      { ALT: () => this.CONSUME(this.t.QualifiedIdentifier, { LABEL: 'attribute' }) },
      { ALT: () => this.CONSUME(this.t.Identifier, { LABEL: 'attribute' }) },
      { ALT: () => this.CONSUME(this.t.StringLiteral, { LABEL: 'string' }) },
      { ALT: () => this.CONSUME(this.t.NumberLiteral, { LABEL: 'number' }) },
    ]);
  });

  // ---
  // DEPENDENCIES
  // ---

  private dependency = this.RULE('dependency', () => {
    this.OR([
      {
        // pk_{a1, a2} alpha
        ALT: () => {
          this.CONSUME(this.t.PrimaryKey, { LABEL: 'operator' });
          this.SUBRULE(this.nameBlock, { LABEL: 'attributes' });
          this.CONSUME(this.t.Identifier, { LABEL: 'relation' });
        },
      },
      {
        // mvd_{a1, a2} alpha
        ALT: () => {
          this.CONSUME(this.t.Multivalued, { LABEL: 'operator' });
          this.SUBRULE(this.pairBlock, { LABEL: 'attributes' });
          this.SUBRULE(this.selectOrRelation, { LABEL: 'targets' });
        },
      },
      {
        ALT: () => {
          this.CONSUME(this.t.Functional, { LABEL: 'operator' });
          this.SUBRULE2(this.pairBlock, { LABEL: 'attributes' });
          this.SUBRULE2(this.selectOrRelation, { LABEL: 'targets' });
        },
      },
      {
        // inc=_{a1, b1} (alpha, beta)
        ALT: () => {
          this.CONSUME(this.t.InclusionEquivalence, { LABEL: 'operator' });
          this.SUBRULE3(this.pairBlock, { LABEL: 'attributes' });
          this.SUBRULE(this.relationPair, { LABEL: 'pair' });
        },
      },
      {
        ALT: () => {
          this.CONSUME(this.t.InclusionSubsumption, { LABEL: 'operator' });
          this.SUBRULE4(this.pairBlock, { LABEL: 'attributes' });
          this.SUBRULE2(this.relationPair, { LABEL: 'pair' });
        },
      },
    ]);
  });

  private nameBlock = this.RULE('nameBlock', () => {
    this.CONSUME(this.t.ParamsStart);
    this.SUBRULE(this.nameList, { LABEL: 'names' });
    this.CONSUME(this.t.ParamsStop);
  });

  private pairBlock = this.RULE('pairBlock', () => {
    this.CONSUME(this.t.ParamsStart);
    this.CONSUME(this.t.Identifier, { LABEL: 'names' });
    this.CONSUME(this.t.Delim);
    this.CONSUME2(this.t.Identifier, { LABEL: 'names' });
    this.CONSUME(this.t.ParamsStop);
  });

  private relationPair = this.RULE('relationPair', () => {
    this.CONSUME(this.t.LParen);
    this.SUBRULE(this.selectOrRelation, { LABEL: 'targets' });
    this.CONSUME(this.t.Delim);
    this.SUBRULE2(this.selectOrRelation, { LABEL: 'targets' });
    this.CONSUME(this.t.RParen);
  });

  private selectOrRelation = this.RULE('selectOrRelation', () => {
    this.OPTION(() => {
      this.CONSUME(this.t.Select);
      this.SUBRULE(this.conditionBlock, { LABEL: 'conditions' });
    });
    this.CONSUME(this.t.Identifier, { LABEL: 'relation' });
  });
}

// ---
// CST TO PARSE RESULT
// ---

function isToken(element: CstElement): element is IToken {
  return 'image' in element;
}

function isNode(element: CstElement): element is CstNode {
  return 'children' in element;
}

function childNodes(node: CstNode, label: string): CstNode[] {
  return (node.children[label] ?? []).filter(isNode);
}

function childTokens(node: CstNode, label: string): IToken[] {
  return (node.children[label] ?? []).filter(isToken);
}

function optionalNode(node: CstNode, label: string): CstNode | undefined {
  return childNodes(node, label)[0];
}

function optionalToken(node: CstNode, label: string): IToken | undefined {
  return childTokens(node, label)[0];
}

function requiredNode(node: CstNode, label: string): CstNode {
  const child = optionalNode(node, label);
  if (!child) throw new Error(`Unexpected ${node.name} structure: missing ${label}`);
  return child;
}

function requiredToken(node: CstNode, label: string): IToken {
  const token = optionalToken(node, label);
  if (!token) throw new Error(`Unexpected ${node.name} structure: missing ${label}`);
  return token;
}

function identifier(token: IToken): string {
  return token.image.toLowerCase();
}

function pair<T>(items: T[], what: string): [T, T] {
  const [first, second] = items;
  if (items.length !== 2 || first === undefined || second === undefined) {
    throw new Error(`Expected two ${what}, got ${items.length}`);
  }
  return [first, second];
}

class CstConverter {
  constructor(private readonly tokens: GrammarTokens) {}

  statements(node: CstNode): ParsedStatement[] {
    return childNodes(node, 'statements').map(statement => this.statement(statement));
  }

  statement(node: CstNode): ParsedStatement {
    const dependency = optionalNode(node, 'dependency');
    if (dependency) return this.dependency(dependency);

    const declaration = optionalNode(node, 'declaration');
    if (declaration) {
      const name = identifier(requiredToken(declaration, 'name'));
      const attributes = this.nameList(requiredNode(declaration, 'attributes'));
      const expression = optionalNode(declaration, 'expression');
      if (expression) {
        return { type: 'assignment', name, attributes, expression: this.expression(expression) };
      }
      return { type: 'definition', name, attributes };
    }

    const assignment = optionalNode(node, 'assignment');
    if (assignment) {
      return {
        type: 'assignment',
        name: identifier(requiredToken(assignment, 'name')),
        attributes: [],
        expression: this.expression(requiredNode(assignment, 'expression')),
      };
    }

    return { type: 'expression', expression: this.expression(requiredNode(node, 'expression')) };
  }

  nameList(node: CstNode): string[] {
    return childTokens(node, 'names').map(identifier);
  }

  attributeList(node: CstNode): string[] {
    return childNodes(node, 'references').map(ref => identifier(requiredToken(ref, 'reference')));
  }

  // ---
  // EXPRESSIONS
  // ---

  expression(node: CstNode): ParsedExpression {
    const operators = childTokens(node, 'operators').map((token): BinaryOperator =>
      token.tokenType === this.tokens.Union ? 'union' : 'difference'
    );
    return this.chain(
      this.setTerm(requiredNode(node, 'head')),
      operators.map(operator => ({ operator, conditions: null })),
      childNodes(node, 'operands').map(operand => this.setTerm(operand))
    );
  }

  setTerm(node: CstNode): ParsedExpression {
    const operators = childTokens(node, 'operators').map(() => ({
      operator: 'intersect' as const,
      conditions: null,
    }));
    return this.chain(
      this.joinTerm(requiredNode(node, 'head')),
      operators,
      childNodes(node, 'operands').map(operand => this.joinTerm(operand))
    );
  }

  joinTerm(node: CstNode): ParsedExpression {
    return this.chain(
      this.unary(requiredNode(node, 'head')),
      childNodes(node, 'operators').map(op => this.joinOperator(op)),
      childNodes(node, 'operands').map(operand => this.unary(operand))
    );
  }

  joinOperator(node: CstNode): { operator: BinaryOperator; conditions: ParsedCondition | null } {
    const token = requiredToken(node, 'operator');
    const block = optionalNode(node, 'conditions');
    const conditions = block ? this.conditionBlock(block) : null;
    const t = this.tokens;

    switch (token.tokenType) {
      case t.Join:
        return { operator: conditions ? 'thetaJoin' : 'crossJoin', conditions };
      case t.NaturalJoin:
        return { operator: 'naturalJoin', conditions: null };
      case t.ThetaJoin:
        return { operator: 'thetaJoin', conditions };
      case t.FullOuterJoin:
        return { operator: 'fullOuterJoin', conditions };
      case t.LeftOuterJoin:
        return { operator: 'leftOuterJoin', conditions };
      case t.RightOuterJoin:
        return { operator: 'rightOuterJoin', conditions };
      default:
        throw new Error(`Unknown join operator: ${token.image}`);
    }
  }

  private chain(
    head: ParsedExpression,
    operators: { operator: BinaryOperator; conditions: ParsedCondition | null }[],
    operands: ParsedExpression[]
  ): ParsedExpression {
    if (operators.length === 0) return head;
    if (operators.length !== operands.length) {
      throw new Error('Unexpected chain structure: operators and operands differ in count');
    }
    const chain: ChainExpression = {
      type: 'chain',
      head,
      links: operators.map((op, i) => ({ ...op, operand: operands[i] })),
    };
    return chain;
  }

  unary(node: CstNode): ParsedExpression {
    const primary = optionalNode(node, 'primary');
    if (primary) return this.primary(primary);

    const operand = this.unary(requiredNode(node, 'operand'));
    if (optionalToken(node, 'select')) {
      return { type: 'select', conditions: this.conditionBlock(requiredNode(node, 'conditions')), operand };
    }
    if (optionalToken(node, 'project')) {
      const block = requiredNode(node, 'attributes');
      return { type: 'project', attributes: this.attributeList(requiredNode(block, 'attributes')), operand };
    }

    const renaming = requiredNode(node, 'renaming');
    const name = optionalToken(renaming, 'name');
    const attributes = optionalNode(renaming, 'attributes');
    return {
      type: 'rename',
      name: name ? identifier(name) : null,
      attributes: attributes ? this.nameList(attributes) : [],
      operand,
    };
  }

  primary(node: CstNode): ParsedExpression {
    const relation = optionalToken(node, 'relation');
    if (relation) return { type: 'relation', name: identifier(relation) };
    return this.expression(requiredNode(node, 'expression'));
  }

  // ---
  // CONDITIONS
  // ---

  conditionBlock(node: CstNode): ParsedCondition {
    return this.conditions(requiredNode(node, 'conditions'));
  }

  conditions(node: CstNode): ParsedCondition {
    return childNodes(node, 'operands').reduce<ParsedCondition>(
      (left, operand) => ({ type: 'logical', operator: 'or', left, right: this.conjunction(operand) }),
      this.conjunction(requiredNode(node, 'head'))
    );
  }

  conjunction(node: CstNode): ParsedCondition {
    return childNodes(node, 'operands').reduce<ParsedCondition>(
      (left, operand) => ({ type: 'logical', operator: 'and', left, right: this.negation(operand) }),
      this.negation(requiredNode(node, 'head'))
    );
  }

  negation(node: CstNode): ParsedCondition {
    if (optionalToken(node, 'not')) {
      return { type: 'not', operand: this.negation(requiredNode(node, 'operand')) };
    }
    return this.condition(requiredNode(node, 'condition'));
  }

  condition(node: CstNode): ParsedCondition {
    const group = optionalNode(node, 'group');
    if (group) return this.conditions(group);

    const operands = childNodes(node, 'operands').map(operand => this.operand(operand));
    if (optionalToken(node, 'defined')) {
      const [operand] = operands;
      if (!operand) throw new Error('Unexpected condition structure: defined without operand');
      return { type: 'defined', operand };
    }

    const token = requiredToken(node, 'comparison');
    const operator = this.tokens.comparisonOperators.get(token.tokenType);
    if (!operator) throw new Error(`Unknown comparison operator: ${token.image}`);
    const [left, right] = pair(operands, 'comparison operands');
    return { type: 'comparison', operator, left, right };
  }

  operand(node: CstNode): ParsedOperand {
    const attribute = optionalToken(node, 'attribute');
    if (attribute) return { kind: 'attribute', text: identifier(attribute) };
    const text = optionalToken(node, 'string');
    if (text) return { kind: 'string', text: `'${text.image.slice(1, -1)}'` };
    return { kind: 'number', text: requiredToken(node, 'number').image };
  }

  // ---
  // DEPENDENCIES
  // ---

  dependency(node: CstNode): ParsedStatement {
    const operator = requiredToken(node, 'operator');
    const attributesNode = requiredNode(node, 'attributes');
    const t = this.tokens;

    if (operator.tokenType === t.PrimaryKey) {
      return {
        type: 'primaryKey',
        attributes: this.nameList(requiredNode(attributesNode, 'names')),
        relation: identifier(requiredToken(node, 'relation')),
      };
    }

    const attributes = pair(childTokens(attributesNode, 'names').map(identifier), 'attributes');

    if (operator.tokenType === t.Multivalued || operator.tokenType === t.Functional) {
      return {
        type: operator.tokenType === t.Multivalued ? 'multivaluedDependency' : 'functionalDependency',
        attributes,
        target: this.selectOrRelation(requiredNode(node, 'targets')),
      };
    }

    const targets = pair(
      childNodes(requiredNode(node, 'pair'), 'targets').map(target => this.selectOrRelation(target)),
      'relations'
    );
    return {
      type: operator.tokenType === t.InclusionEquivalence ? 'inclusionEquivalence' : 'inclusionSubsumption',
      attributes,
      targets,
    };
  }

  selectOrRelation(node: CstNode): RelationSelection {
    const block = optionalNode(node, 'conditions');
    return {
      relation: identifier(requiredToken(node, 'relation')),
      conditions: block ? this.conditionBlock(block) : null,
    };
  }
}

// ---
// PUBLIC API
// ---

export interface GrammarOptions {
  /** default: 'extended' */
  dialect?: Dialect;
  /** literal overrides layered over the default syntax */
  syntax?: Partial<DependencySyntax>;
}

/**
 * A lexer, parser and converter for one dialect and syntax. Instances are
 * independent; nothing is shared between grammars.
 */
export class Grammar {
  readonly dialect: Dialect;
  readonly syntax: SyntaxConfig;
  private readonly tokens: GrammarTokens;
  private readonly lexer: Lexer;
  private readonly parser: RelalgParser;
  private readonly converter: CstConverter;

  constructor(options: GrammarOptions = {}) {
    this.dialect = options.dialect ?? 'extended';
    this.syntax = resolveSyntax(options.syntax, this.dialect);
    this.tokens = buildTokens(this.syntax, this.dialect);
    this.lexer = new Lexer(this.tokens.lexerDefinition);
    this.parser = new RelalgParser(this.tokens, dialectFeatures(this.dialect));
    this.converter = new CstConverter(this.tokens);
  }

  /** Parse `;`-terminated statements */
  parse(source: string): ParsedStatement[] {
    return this.converter.statements(this.run(source, () => this.parser.statements()));
  }

  /** Parse a bare condition, as written inside `_{...}` */
  parseCondition(source: string): ParsedCondition {
    return this.converter.conditions(this.run(source, () => this.parser.conditions()));
  }

  /** Parse a bare expression without a terminator */
  parseExpression(source: string): ParsedExpression {
    return this.converter.expression(this.run(source, () => this.parser.expression()));
  }

  private run(source: string, entry: () => CstNode): CstNode {
    // Lexing
    const lexResult = this.lexer.tokenize(source);
    if (lexResult.errors.length > 0) {
      const [first] = lexResult.errors;
      throw new RelalgSyntaxError(
        `Lexer errors: ${lexResult.errors.map(e => e.message).join(', ')}`,
        first && first.line !== undefined && first.column !== undefined
          ? { line: first.line, column: first.column }
          : null
      );
    }

    // Parsing
    this.parser.input = lexResult.tokens;
    const cst = entry();

    if (this.parser.errors.length > 0) {
      const [first] = this.parser.errors;
      throw new RelalgSyntaxError(
        `Parser errors: ${this.parser.errors.map(e => e.message).join(', ')}`,
        first ? tokenPosition(first.token) : null
      );
    }

    return cst;
  }
}

function tokenPosition(token: IToken): SourcePosition | null {
  const { startLine, startColumn } = token;
  if (startLine === undefined || startColumn === undefined) return null;
  if (Number.isNaN(startLine) || Number.isNaN(startColumn)) return null;
  return { line: startLine, column: startColumn };
}

export function createGrammar(options: GrammarOptions = {}): Grammar {
  return new Grammar(options);
}
