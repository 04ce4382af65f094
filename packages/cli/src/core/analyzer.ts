import * as fs from 'fs/promises';
import * as path from 'path';
import { glob, hasMagic } from 'glob';
import type {
  AnalysisInput,
  AnalyzerConfig,
  ExitCode,
  FileReport,
  JSONResult,
  Report,
  ReportSummary,
  SelectorResult,
  SourceLocation,
  Specificity,
  Violation,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { MalformedInputError, SelectorParseError } from './errors.js';
import { extractSelectors } from './extractor.js';
import { parseSelector, splitSelectorList } from './parser.js';
import {
  calculateSpecificity,
  exceedsThreshold,
  formatSpecificity,
  parseThreshold,
  specificityToTuple,
} from './specificity.js';

export const VERSION = '0.1.0';

/**
 * Label used for the report entry of a `--selector` run
 */
export const SELECTOR_INPUT_LABEL = '<selector>';

/**
 * Merge user config with defaults
 */
export function mergeConfig(userConfig: AnalyzerConfig = {}): Required<AnalyzerConfig> {
  return {
    include: userConfig.include ?? DEFAULT_CONFIG.include,
    exclude: userConfig.exclude ?? DEFAULT_CONFIG.exclude,
    threshold: userConfig.threshold ?? DEFAULT_CONFIG.threshold,
    format: userConfig.format ?? DEFAULT_CONFIG.format,
  };
}

/**
 * Find CSS files based on include/exclude patterns
 */
export async function findCSSFiles(
  basePath: string,
  config: Required<AnalyzerConfig>
): Promise<string[]> {
  const files: string[] = [];
  const absoluteBase = path.resolve(basePath);

  for (const pattern of config.include) {
    const matches = await glob(pattern, {
      cwd: absoluteBase,
      absolute: true,
      ignore: config.exclude,
      nodir: true,
    });
    files.push(...matches.sort());
  }

  return [...new Set(files)];
}

/**
 * Expand CLI paths into a file list: directories are searched with the
 * include/exclude patterns, glob patterns are expanded, plain paths are kept
 * as given so that a missing file is reported as a read error.
 */
export async function resolveInputPaths(
  inputPaths: string[],
  config: AnalyzerConfig = {}
): Promise<string[]> {
  const mergedConfig = mergeConfig(config);
  const files: string[] = [];

  for (const inputPath of inputPaths) {
    const absolutePath = path.resolve(inputPath);
    const stat = await fs.stat(absolutePath).catch(() => null);

    if (stat?.isDirectory()) {
      files.push(...(await findCSSFiles(absolutePath, mergedConfig)));
    } else if (!stat && hasMagic(inputPath)) {
      const matches = await glob(inputPath, {
        absolute: true,
        ignore: mergedConfig.exclude,
        nodir: true,
      });
      files.push(...matches.sort());
    } else {
      files.push(absolutePath);
    }
  }

  return [...new Set(files)];
}

function classify(
  selector: string,
  specificity: Specificity,
  threshold: Specificity,
  location: SourceLocation
): SelectorResult {
  if (exceedsThreshold(specificity, threshold)) {
    return { status: 'violation', selector, specificity, threshold, location };
  }
  return { status: 'pass', selector, specificity, location };
}

/**
 * Split, parse and classify every selector of a raw selector list.
 * A malformed selector becomes an error result; its siblings are still analyzed.
 * `locate` maps a selector's offset within `raw` to its source location.
 */
export function analyzeSelectorList(
  raw: string,
  threshold: Specificity,
  locate: (offset: number) => SourceLocation = () => ({})
): SelectorResult[] {
  return splitSelectorList(raw).map((piece): SelectorResult => {
    const location = locate(piece.offset);
    try {
      const specificity = calculateSpecificity(parseSelector(piece.text));
      return classify(piece.text, specificity, threshold, location);
    } catch (error) {
      if (error instanceof SelectorParseError) {
        return {
          status: 'error',
          selector: piece.text,
          reason: error.reason,
          offset: error.offset,
          fragment: error.fragment,
          location,
        };
      }
      throw error;
    }
  });
}

/**
 * Analyze CSS content directly
 */
export function analyzeCSS(
  css: string,
  options: { threshold: Specificity; file?: string }
): FileReport {
  const file = options.file ?? 'input.css';
  const results: SelectorResult[] = [];

  try {
    for (const list of extractSelectors(css)) {
      results.push(
        ...analyzeSelectorList(list.text, options.threshold, (offset) => {
          const start = list.positions[offset] ?? list;
          return { file, line: start.line, column: start.column };
        })
      );
    }
  } catch (error) {
    if (error instanceof MalformedInputError) {
      return {
        file,
        results,
        error: {
          kind: 'MalformedInput',
          message: error.message,
          offset: error.offset,
          line: error.line,
          column: error.column,
        },
      };
    }
    throw error;
  }

  return { file, results };
}

/**
 * Read and analyze one CSS file. A read failure is recorded on the report.
 */
export async function analyzeFile(filePath: string, threshold: Specificity): Promise<FileReport> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      file: filePath,
      results: [],
      error: { kind: 'ReadError', message: `Failed to read file: ${message}` },
    };
  }
  return analyzeCSS(content, { threshold, file: filePath });
}

/**
 * Analyze files concurrently; reports keep the order of `filePaths`
 */
export async function analyzeFiles(filePaths: string[], threshold: Specificity): Promise<FileReport[]> {
  return Promise.all(filePaths.map((filePath) => analyzeFile(filePath, threshold)));
}

export function summarize(files: FileReport[]): ReportSummary {
  const summary: ReportSummary = {
    totalFiles: files.length,
    totalSelectors: 0,
    passed: 0,
    violations: 0,
    parseErrors: 0,
    fileErrors: 0,
  };

  for (const file of files) {
    if (file.error) {
      summary.fileErrors++;
    }
    for (const result of file.results) {
      summary.totalSelectors++;
      if (result.status === 'pass') summary.passed++;
      else if (result.status === 'violation') summary.violations++;
      else summary.parseErrors++;
    }
  }

  return summary;
}

/**
 * 2 when anything failed to read, extract or parse, 1 when a selector
 * exceeds the threshold, 0 otherwise
 */
export function determineExitCode(summary: ReportSummary): ExitCode {
  if (summary.parseErrors > 0 || summary.fileErrors > 0) return 2;
  if (summary.violations > 0) return 1;
  return 0;
}

/**
 * Generate the complete report
 */
export function generateReport(files: FileReport[], threshold: Specificity): Report {
  const summary = summarize(files);
  return {
    version: VERSION,
    timestamp: new Date().toISOString(),
    threshold,
    files,
    summary,
    exitCode: determineExitCode(summary),
  };
}

/**
 * Analyze CSS from various inputs and generate a report
 */
export async function analyze(inputs: AnalysisInput[], config: AnalyzerConfig = {}): Promise<Report> {
  const mergedConfig = mergeConfig(config);
  const threshold = parseThreshold(mergedConfig.threshold);

  const files = await Promise.all(
    inputs.map(async (input): Promise<FileReport> => {
      switch (input.type) {
        case 'file':
          return analyzeFile(input.path, threshold);
        case 'content':
          return analyzeCSS(input.content, { threshold, file: input.filename });
        case 'selector':
          return { file: SELECTOR_INPUT_LABEL, results: analyzeSelectorList(input.selector, threshold) };
      }
    })
  );

  return generateReport(files, threshold);
}

/**
 * Analyze files, directories or glob patterns
 */
export async function analyzePaths(inputPaths: string[], config: AnalyzerConfig = {}): Promise<Report> {
  const threshold = parseThreshold(mergeConfig(config).threshold);
  const files = await resolveInputPaths(inputPaths, config);
  return generateReport(await analyzeFiles(files, threshold), threshold);
}

/**
 * Analyze a single selector list
 */
export async function analyzeSelector(selector: string, config: AnalyzerConfig = {}): Promise<Report> {
  return analyze([{ type: 'selector', selector }], config);
}

/**
 * All violations of a report, in input then source order
 */
export function collectViolations(report: Report): Violation[] {
  const violations: Violation[] = [];
  for (const file of report.files) {
    for (const result of file.results) {
      if (result.status === 'violation') {
        violations.push(result);
      }
    }
  }
  return violations;
}

function toJSONResult(result: SelectorResult): JSONResult {
  const entry: JSONResult = {
    selector: result.selector,
    specificity: result.status === 'error' ? null : specificityToTuple(result.specificity),
    status: result.status,
  };

  if (result.status === 'violation') {
    entry.message = `Specificity ${formatSpecificity(result.specificity)} exceeds threshold ${formatSpecificity(result.threshold)}`;
  } else if (result.status === 'error') {
    entry.message = `${result.reason} at offset ${result.offset}`;
  }

  if (result.location.file !== undefined) entry.file = result.location.file;
  if (result.location.line !== undefined) entry.line = result.location.line;
  if (result.location.column !== undefined) entry.column = result.location.column;

  return entry;
}

/**
 * Flatten a report into JSON output rows. File-level failures become an
 * error row with an empty selector.
 */
export function toJSONResults(report: Report): JSONResult[] {
  const rows: JSONResult[] = [];

  for (const file of report.files) {
    rows.push(...file.results.map(toJSONResult));
    if (file.error) {
      const row: JSONResult = {
        selector: '',
        specificity: null,
        status: 'error',
        message: `${file.error.kind}: ${file.error.message}`,
        file: file.file,
      };
      if (file.error.line !== undefined) row.line = file.error.line;
      if (file.error.column !== undefined) row.column = file.error.column;
      rows.push(row);
    }
  }

  return rows;
}

export function formatReportAsJSON(report: Report): string {
  return JSON.stringify(toJSONResults(report), null, 2);
}
