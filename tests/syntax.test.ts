/**
 * Syntax Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SYNTAX,
  activeSyntaxKeys,
  dialectFeatures,
  resolveSyntax,
} from '../packages/parser/syntax.js';
import { InputError } from '../packages/errors.js';

describe('resolveSyntax', () => {
  it('returns the defaults when nothing is overridden', () => {
    const syntax = resolveSyntax();
    expect(syntax).toEqual(DEFAULT_SYNTAX);
    expect(Object.isFrozen(syntax)).toBe(true);
  });

  it('layers overrides over the defaults', () => {
    const syntax = resolveSyntax({ projectOp: '\\pi', selectOp: '\\sigma' });
    expect(syntax.projectOp).toBe('\\pi');
    expect(syntax.selectOp).toBe('\\sigma');
    expect(syntax.renameOp).toBe('\\rename');
  });

  it('rejects unknown entries', () => {
    expect(() => resolveSyntax(JSON.parse('{"bogusOp": "x"}'))).toThrow(InputError);
    expect(() => resolveSyntax(JSON.parse('{"bogusOp": "x"}'))).toThrow("Unknown syntax entry 'bogusOp'.");
  });

  it('rejects empty literals', () => {
    expect(() => resolveSyntax({ projectOp: ' ' })).toThrow("Syntax entry 'projectOp' must not be empty.");
  });

  it('rejects a literal shared by two entries', () => {
    expect(() => resolveSyntax({ projectOp: '\\select' })).toThrow(
      "Syntax entries 'projectOp' and 'selectOp' share the literal '\\select'."
    );
  });

  it('compares literals case-insensitively', () => {
    expect(() => resolveSyntax({ projectOp: '\\SELECT' })).toThrow(InputError);
  });

  it('only checks the entries the dialect uses', () => {
    expect(resolveSyntax({ pkOp: 'and' }, 'extended').pkOp).toBe('and');
    expect(() => resolveSyntax({ pkOp: 'and' }, 'dependency')).toThrow(InputError);
  });
});

describe('dialects', () => {
  it('core has no extended operators', () => {
    const keys = activeSyntaxKeys('core');
    expect(keys).toContain('projectOp');
    expect(keys).not.toContain('naturalJoinOp');
    expect(keys).not.toContain('intersectOp');
    expect(keys).not.toContain('definedOp');
    expect(keys).not.toContain('pkOp');
  });

  it('three-valued logic adds defined to core', () => {
    const keys = activeSyntaxKeys('threeValued');
    expect(keys).toContain('definedOp');
    expect(keys).not.toContain('intersectOp');
    expect(dialectFeatures('threeValued')).toEqual({
      extendedJoins: false,
      intersect: false,
      defined: true,
      dependencies: false,
    });
  });

  it('dependency extends extended', () => {
    const extended = activeSyntaxKeys('extended');
    const dependency = activeSyntaxKeys('dependency');
    expect(dependency.slice(0, extended.length)).toEqual(extended);
    expect(dependency.slice(extended.length)).toEqual(['pkOp', 'mvdOp', 'fdOp', 'incEquivOp', 'incSubsetOp']);
  });
});
