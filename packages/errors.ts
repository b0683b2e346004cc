/**
 * Error types raised while compiling relational algebra.
 *
 * Everything except TranslationError describes malformed input; a
 * TranslationError means a translator has no arm for a node it was given.
 */

export class RelalgError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RelalgError';
  }
}

export interface SourcePosition {
  line: number;
  column: number;
}

/** The grammar could not consume the whole input */
export class RelalgSyntaxError extends RelalgError {
  readonly position: SourcePosition | null;

  constructor(message: string, position: SourcePosition | null = null) {
    super(position ? `${message} (line ${position.line}, column ${position.column})` : message);
    this.name = 'RelalgSyntaxError';
    this.position = position;
  }
}

/** Unknown relation, duplicate relation name, or ambiguous relation reference */
export class RelationReferenceError extends RelalgError {
  constructor(message: string) {
    super(message);
    this.name = 'RelationReferenceError';
  }
}

/** Unknown or ambiguous attribute reference */
export class AttributeReferenceError extends RelalgError {
  constructor(message: string) {
    super(message);
    this.name = 'AttributeReferenceError';
  }
}

/** Structurally valid input that breaks a rule of the algebra */
export class InputError extends RelalgError {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export class TranslationError extends RelalgError {
  constructor(message: string) {
    super(message);
    this.name = 'TranslationError';
  }
}

/** True for errors caused by the input rather than by a translator gap */
export function isUserError(error: unknown): error is RelalgError {
  return error instanceof RelalgError && !(error instanceof TranslationError);
}
