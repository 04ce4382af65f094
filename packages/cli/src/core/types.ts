/**
 * Specificity as the ordered tuple (inline, ids, classes, elements)
 */
export interface Specificity {
  inline: number;
  ids: number;
  classes: number;
  elements: number;
}

/**
 * Specificity in the `[a, b, c, d]` form used by JSON output
 */
export type SpecificityTuple = [number, number, number, number];

export type Combinator =
  | 'descendant'
  | 'child'
  | 'next-sibling'
  | 'subsequent-sibling'
  | 'column';

export type AttributeOperator = '=' | '~=' | '|=' | '^=' | '$=' | '*=';

export interface AttributeMatcher {
  operator: AttributeOperator;
  value: string;
  /** Quote character the value was written with, if any */
  quote?: '"' | "'";
  modifier?: 'i' | 's';
}

export interface TypeSelector {
  type: 'type';
  name: string;
  namespace?: string;
}

export interface UniversalSelector {
  type: 'universal';
  namespace?: string;
}

export interface IdSelector {
  type: 'id';
  name: string;
}

export interface ClassSelector {
  type: 'class';
  name: string;
}

export interface AttributeSelector {
  type: 'attribute';
  name: string;
  namespace?: string;
  matcher?: AttributeMatcher;
}

export interface PseudoClassSelector {
  type: 'pseudo-class';
  name: string;
  /** Raw text between the parentheses of a functional pseudo-class */
  argument?: string;
  /** Nested selector list, present when the argument takes part in specificity */
  args?: SelectorList;
}

export interface PseudoElementSelector {
  type: 'pseudo-element';
  name: string;
  argument?: string;
  /** Written with a single colon (`:before`) */
  legacy?: boolean;
}

export type SimpleSelector =
  | TypeSelector
  | UniversalSelector
  | IdSelector
  | ClassSelector
  | AttributeSelector
  | PseudoClassSelector
  | PseudoElementSelector;

export type CompoundSelector = SimpleSelector[];

/**
 * One combinator-separated segment of a complex selector.
 * `combinator` is null on the first segment, except for relative
 * selectors such as the `> img` in `:has(> img)`.
 */
export interface SelectorSegment {
  combinator: Combinator | null;
  compound: CompoundSelector;
}

export type Selector = SelectorSegment[];

export type SelectorList = Selector[];

export interface TextPosition {
  offset: number;
  line: number;
  column: number;
}

/**
 * A raw selector list found in CSS source, with where it starts
 */
export interface ExtractedSelectorList extends TextPosition {
  text: string;
  /** Source position of each character of `text` */
  positions: TextPosition[];
}

/**
 * A single selector split out of a selector list
 */
export interface SelectorPiece {
  text: string;
  offset: number;
}

/**
 * Where a selector came from
 */
export interface SourceLocation {
  file?: string;
  line?: number;
  column?: number;
}

export type ResultStatus = 'pass' | 'violation' | 'error';

export interface PassResult {
  status: 'pass';
  selector: string;
  specificity: Specificity;
  location: SourceLocation;
}

/**
 * A selector whose specificity is above the threshold
 */
export interface Violation {
  status: 'violation';
  selector: string;
  specificity: Specificity;
  threshold: Specificity;
  location: SourceLocation;
}

export interface SelectorErrorResult {
  status: 'error';
  selector: string;
  reason: string;
  /** Character offset inside the selector text */
  offset: number;
  fragment: string;
  location: SourceLocation;
}

export type SelectorResult = PassResult | Violation | SelectorErrorResult;

export type FileErrorKind = 'MalformedInput' | 'ReadError';

export interface FileError {
  kind: FileErrorKind;
  message: string;
  offset?: number;
  line?: number;
  column?: number;
}

/**
 * Results for one input (a file, inline CSS or a single selector)
 */
export interface FileReport {
  file: string;
  results: SelectorResult[];
  error?: FileError;
}

export interface ReportSummary {
  totalFiles: number;
  totalSelectors: number;
  passed: number;
  violations: number;
  parseErrors: number;
  fileErrors: number;
}

export type ExitCode = 0 | 1 | 2;

/**
 * The complete report output
 */
export interface Report {
  version: string;
  timestamp: string;
  threshold: Specificity;
  files: FileReport[];
  summary: ReportSummary;
  exitCode: ExitCode;
}

/**
 * One row of the JSON output
 */
export interface JSONResult {
  selector: string;
  specificity: SpecificityTuple | null;
  status: ResultStatus;
  message?: string;
  file?: string;
  line?: number;
  column?: number;
}

export type OutputFormat = 'text' | 'json';

/**
 * Configuration options for the analyzer
 */
export interface AnalyzerConfig {
  include?: string[];
  exclude?: string[];
  /** `a,b,c,d` or a 4-number array */
  threshold?: string | number[];
  format?: OutputFormat;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Required<AnalyzerConfig> = {
  include: ['**/*.css'],
  exclude: ['**/node_modules/**', '**/dist/**', '**/vendor/**'],
  threshold: '0,1,3,3',
  format: 'text',
};

/**
 * Input for analysis - a file path, CSS content or a single selector list
 */
export type AnalysisInput =
  | { type: 'file'; path: string }
  | { type: 'content'; content: string; filename?: string }
  | { type: 'selector'; selector: string };
