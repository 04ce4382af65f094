import pc from 'picocolors';
import type {
  FileError,
  FileReport,
  OutputFormat,
  PassResult,
  Report,
  ReportSummary,
  ResultStatus,
  SelectorErrorResult,
  SourceLocation,
  Violation,
} from './core/index.js';
import { formatReportAsJSON, formatSpecificity } from './core/index.js';

const RULE = '═══════════════════════════════════════════════════════════════';
const DIVIDER = '───────────────────────────────────────────────────────────────';

/**
 * Format a result status with color, padded to a fixed width
 */
export function formatStatus(status: ResultStatus): string {
  switch (status) {
    case 'pass':
      return pc.green('PASS'.padEnd(9));
    case 'violation':
      return pc.red(pc.bold('VIOLATION'));
    case 'error':
      return pc.red('ERROR'.padEnd(9));
  }
}

/**
 * Format a source location as " (line 3, column 5)"
 */
export function formatLocation(location: SourceLocation): string {
  if (location.line === undefined) {
    return '';
  }
  const column = location.column === undefined ? '' : `, column ${location.column}`;
  return pc.dim(` (line ${location.line}${column})`);
}

/**
 * Format one analyzed selector: specificity, status, selector text
 */
export function formatResultRow(result: PassResult | Violation): string {
  const spec = pc.yellow(formatSpecificity(result.specificity).padEnd(10));
  const exceeded =
    result.status === 'violation'
      ? ` ${pc.red(`> threshold ${formatSpecificity(result.threshold)}`)}`
      : '';
  return `  ${spec} ${formatStatus(result.status)} ${pc.cyan(result.selector)}${exceeded}${formatLocation(result.location)}`;
}

/**
 * Format a selector that failed to parse
 */
export function formatErrorRow(result: SelectorErrorResult): string {
  const selector = result.selector ? pc.cyan(result.selector) : pc.dim('(empty selector)');
  return (
    `  ${selector}${formatLocation(result.location)}\n` +
    `     ${result.reason} at offset ${result.offset}` +
    (result.fragment ? pc.dim(` near "${result.fragment}"`) : '')
  );
}

export function formatFileError(error: FileError): string {
  return `  ${pc.red(pc.bold(error.kind))} ${error.message}`;
}

/**
 * Format the rows of one file
 */
export function formatFileReport(file: FileReport): string {
  const lines: string[] = [];

  lines.push(pc.bold(DIVIDER));
  lines.push(pc.bold(`  ${file.file}`));
  lines.push(pc.bold(DIVIDER));
  lines.push('');

  const errors: SelectorErrorResult[] = [];
  for (const result of file.results) {
    if (result.status === 'error') {
      errors.push(result);
    } else {
      lines.push(formatResultRow(result));
    }
  }

  if (file.results.length === errors.length && !file.error) {
    lines.push(pc.dim('  No selectors found'));
  }

  if (errors.length > 0) {
    lines.push('');
    lines.push(pc.bold(`  Malformed selectors (${errors.length}):`));
    for (const error of errors) {
      lines.push(formatErrorRow(error));
    }
  }

  if (file.error) {
    lines.push('');
    lines.push(formatFileError(file.error));
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * Format the totals section
 */
export function formatSummary(summary: ReportSummary, threshold: string): string {
  const lines: string[] = [];

  lines.push(pc.bold(DIVIDER));
  lines.push(pc.bold('  SUMMARY'));
  lines.push(pc.bold(DIVIDER));
  lines.push('');
  lines.push(`  Threshold:   ${threshold}`);
  lines.push(`  Files:       ${summary.totalFiles}`);
  lines.push(`  Selectors:   ${summary.totalSelectors}`);
  lines.push(`  Passed:      ${pc.green(String(summary.passed))}`);
  lines.push(`  Violations:  ${summary.violations > 0 ? pc.red(String(summary.violations)) : '0'}`);
  lines.push(
    `  Errors:      ${summary.parseErrors + summary.fileErrors > 0 ? pc.red(String(summary.parseErrors + summary.fileErrors)) : '0'}`
  );
  lines.push('');

  return lines.join('\n');
}

/**
 * Format check result
 */
export function formatCheckResult(report: Report): string {
  const { summary } = report;

  switch (report.exitCode) {
    case 0:
      return pc.green(pc.bold('✓ All selectors are within the specificity threshold'));
    case 1:
      return pc.red(
        pc.bold(`✗ ${summary.violations} selector(s) exceed the specificity threshold`)
      );
    case 2:
      return pc.red(
        pc.bold(
          `✗ ${summary.parseErrors} selector(s) failed to parse, ${summary.fileErrors} file(s) could not be analyzed`
        )
      );
  }
}

/**
 * Format the complete report for console output
 */
export function formatReport(report: Report, options: { silent?: boolean } = {}): string {
  if (options.silent) {
    return '';
  }

  const lines: string[] = [];

  lines.push('');
  lines.push(pc.bold(RULE));
  lines.push(pc.bold('                  CSS SPECIFICITY REPORT                       '));
  lines.push(pc.bold(RULE));
  lines.push('');

  for (const file of report.files) {
    lines.push(formatFileReport(file));
  }

  lines.push(formatSummary(report.summary, formatSpecificity(report.threshold)));
  lines.push(`  ${formatCheckResult(report)}`);
  lines.push('');
  lines.push(pc.bold(RULE));

  return lines.join('\n');
}

/**
 * Render a report in the requested output format
 */
export function formatOutput(report: Report, format: OutputFormat): string {
  return format === 'json' ? formatReportAsJSON(report) : formatReport(report);
}
