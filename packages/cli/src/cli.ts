#!/usr/bin/env node

import { Command, CommanderError, Option } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  analyzePaths,
  analyzeSelector,
  mergeConfig,
  VERSION,
  type AnalyzerConfig,
  type OutputFormat,
} from './core/index.js';
import { formatOutput } from './formatter.js';
import { findConfig, writeConfigFile } from './config.js';

interface CheckOptions {
  selector?: string;
  threshold?: string;
  format?: OutputFormat;
  include?: string[];
  exclude?: string[];
  out?: string;
  silent?: boolean;
  config: boolean;
}

const program = new Command();

program
  .name('specificity-check')
  .description('Compute CSS selector specificity and flag selectors above a threshold')
  .version(VERSION)
  .exitOverride()
  .argument('[paths...]', 'CSS files, directories or glob patterns to analyze')
  .option('--selector <text>', 'Analyze a single selector (or selector list) instead of files')
  .option('-t, --threshold <a,b,c,d>', 'Maximum allowed specificity as inline,id,class,type (default: 0,1,3,3)')
  .addOption(
    new Option('-f, --format <type>', 'Output format (default: text)').choices(['text', 'json'])
  )
  .option('-i, --include <patterns...>', 'Glob patterns to include when a directory is given')
  .option('-e, --exclude <patterns...>', 'Glob patterns to exclude')
  .option('-o, --out <file>', 'Write report to file')
  .option('-s, --silent', 'Suppress console output (only exit code)')
  .option('--no-config', 'Ignore config files')
  .action(async (inputPaths: string[], options: CheckOptions) => {
    if (!options.selector && inputPaths.length === 0) {
      program.help({ error: true });
    }

    try {
      // Load config
      let config: AnalyzerConfig = {};
      if (options.config) {
        const foundConfig = await findConfig(process.cwd());
        if (foundConfig) {
          config = foundConfig;
        }
      }

      // Override with CLI options
      if (options.threshold) config.threshold = options.threshold;
      if (options.format) config.format = options.format;
      if (options.include) config.include = options.include;
      if (options.exclude) config.exclude = options.exclude;

      const report = options.selector
        ? await analyzeSelector(options.selector, config)
        : await analyzePaths(inputPaths, config);

      const output = formatOutput(report, mergeConfig(config).format);
      if (options.out) {
        await fs.writeFile(options.out, output, 'utf-8');
        if (!options.silent) {
          console.log(`Report written to ${options.out}`);
        }
      } else if (!options.silent) {
        console.log(output);
      }

      process.exit(report.exitCode);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });

// Init command
program
  .command('init')
  .description('Generate a .specificityrc.json config file')
  .argument('[path]', 'Directory to create config in', '.')
  .action(async (inputPath: string) => {
    try {
      const targetPath = path.resolve(inputPath);
      const configPath = await writeConfigFile(targetPath);
      console.log(`Created config file: ${configPath}`);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  // Usage errors exit with 2 like any other failed run; commander already printed them
  if (error instanceof CommanderError) {
    process.exit(error.exitCode === 0 ? 0 : 2);
  }
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(2);
});
