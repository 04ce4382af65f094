// Types
export type {
  Specificity,
  SpecificityTuple,
  Combinator,
  AttributeOperator,
  AttributeMatcher,
  TypeSelector,
  UniversalSelector,
  IdSelector,
  ClassSelector,
  AttributeSelector,
  PseudoClassSelector,
  PseudoElementSelector,
  SimpleSelector,
  CompoundSelector,
  SelectorSegment,
  Selector,
  SelectorList,
  TextPosition,
  ExtractedSelectorList,
  SelectorPiece,
  SourceLocation,
  ResultStatus,
  PassResult,
  Violation,
  SelectorErrorResult,
  SelectorResult,
  FileErrorKind,
  FileError,
  FileReport,
  ReportSummary,
  ExitCode,
  Report,
  JSONResult,
  OutputFormat,
  AnalyzerConfig,
  AnalysisInput,
} from './types.js';

export { DEFAULT_CONFIG } from './types.js';

// Errors
export type { AnalyzerErrorKind } from './errors.js';
export {
  AnalyzerError,
  MalformedInputError,
  SelectorParseError,
  InvalidThresholdError,
} from './errors.js';

// Extractor
export { SKIPPED_AT_RULES, getAtRuleName, extractSelectors, extractAllSelectors } from './extractor.js';

// Parser
export {
  LEGACY_PSEUDO_ELEMENTS,
  SELECTOR_LIST_PSEUDO_CLASSES,
  NTH_PSEUDO_CLASSES,
  NTH_OF_PSEUDO_CLASSES,
  MAX_NESTING_DEPTH,
  splitSelectorList,
  parseSelector,
  parseSelectorList,
  serializeSimpleSelector,
  serializeSelector,
  serializeSelectorList,
} from './parser.js';

// Specificity
export {
  FORWARDING_PSEUDO_CLASSES,
  ZERO_SPECIFICITY_PSEUDO_CLASSES,
  ZERO_SPECIFICITY,
  addSpecificity,
  compareSpecificity,
  exceedsThreshold,
  maxSpecificity,
  calculateSpecificity,
  calculateSelectorSpecificity,
  formatSpecificity,
  specificityToTuple,
  parseThreshold,
} from './specificity.js';

// Analyzer
export {
  VERSION,
  SELECTOR_INPUT_LABEL,
  mergeConfig,
  findCSSFiles,
  resolveInputPaths,
  analyzeSelectorList,
  analyzeCSS,
  analyzeFile,
  analyzeFiles,
  summarize,
  determineExitCode,
  generateReport,
  analyze,
  analyzePaths,
  analyzeSelector,
  collectViolations,
  toJSONResults,
  formatReportAsJSON,
} from './analyzer.js';
