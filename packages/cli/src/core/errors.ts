export type AnalyzerErrorKind = 'MalformedInput' | 'ParseError' | 'InvalidThreshold';

/**
 * Base class for errors raised by the analysis pipeline
 */
export class AnalyzerError extends Error {
  readonly kind: AnalyzerErrorKind;

  constructor(kind: AnalyzerErrorKind, message: string) {
    super(message);
    this.name = 'AnalyzerError';
    this.kind = kind;
  }
}

/**
 * CSS source that cannot be split into rules: unbalanced braces,
 * unterminated strings or comments
 */
export class MalformedInputError extends AnalyzerError {
  readonly offset: number;
  readonly line: number;
  readonly column: number;

  constructor(reason: string, offset: number, line: number, column: number) {
    super('MalformedInput', `${reason} at line ${line}, column ${column}`);
    this.name = 'MalformedInputError';
    this.offset = offset;
    this.line = line;
    this.column = column;
  }
}

/**
 * A selector that does not follow selector grammar
 */
export class SelectorParseError extends AnalyzerError {
  readonly reason: string;
  /** Offset of the problem inside the text handed to the parser */
  readonly offset: number;
  readonly fragment: string;

  constructor(reason: string, offset: number, fragment: string) {
    super('ParseError', `${reason} at offset ${offset} near "${fragment}"`);
    this.name = 'SelectorParseError';
    this.reason = reason;
    this.offset = offset;
    this.fragment = fragment;
  }
}

export class InvalidThresholdError extends AnalyzerError {
  constructor(message: string) {
    super('InvalidThreshold', message);
    this.name = 'InvalidThresholdError';
  }
}
