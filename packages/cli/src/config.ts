import * as fs from 'fs/promises';
import * as path from 'path';
import type { AnalyzerConfig, OutputFormat } from './core/index.js';
import { DEFAULT_CONFIG } from './core/index.js';

/**
 * Supported config file names
 */
export const CONFIG_FILES = [
  '.specificityrc',
  '.specificityrc.json',
  'specificity.config.json',
  '.specificityrc.yaml',
  '.specificityrc.yml',
];

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

/**
 * Keep the known keys of a parsed config object, dropping values of the wrong type.
 * The threshold itself is validated when the analysis starts.
 */
export function normalizeConfig(raw: unknown): AnalyzerConfig {
  const config: AnalyzerConfig = {};
  if (typeof raw !== 'object' || raw === null) {
    return config;
  }

  const include: unknown = Reflect.get(raw, 'include');
  const exclude: unknown = Reflect.get(raw, 'exclude');
  const threshold: unknown = Reflect.get(raw, 'threshold');
  const format: unknown = Reflect.get(raw, 'format');

  if (isStringArray(include)) config.include = include;
  if (isStringArray(exclude)) config.exclude = exclude;
  if (typeof threshold === 'string' || isNumberArray(threshold)) config.threshold = threshold;
  if (isOutputFormat(format)) config.format = format;

  return config;
}

/**
 * Load configuration from a file
 */
export async function loadConfigFile(filePath: string): Promise<AnalyzerConfig> {
  const content = await fs.readFile(filePath, 'utf-8');
  const ext = path.extname(filePath).toLowerCase();

  if (ext === '.yaml' || ext === '.yml') {
    // Simple YAML parsing for flat configs
    return parseSimpleYaml(content);
  }

  const parsed: unknown = JSON.parse(content);
  return normalizeConfig(parsed);
}

function unquote(value: string): string {
  return value.replace(/^['"]|['"]$/g, '');
}

/**
 * Simple YAML parser for the flat config structure:
 * scalar `threshold` and `format`, list-valued `include` and `exclude`
 */
export function parseSimpleYaml(content: string): AnalyzerConfig {
  const config: AnalyzerConfig = {};
  const lines = content.split('\n');
  let currentKey: string | null = null;
  let currentArray: string[] | null = null;

  const finishArray = () => {
    if (currentArray && currentKey) {
      if (currentKey === 'include') config.include = currentArray;
      else if (currentKey === 'exclude') config.exclude = currentArray;
    }
    currentArray = null;
    currentKey = null;
  };

  for (const line of lines) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    if (trimmed.startsWith('- ')) {
      if (currentArray) {
        currentArray.push(unquote(trimmed.substring(2).trim()));
      }
      continue;
    }

    const colonIndex = trimmed.indexOf(':');
    if (colonIndex <= 0) {
      continue;
    }

    finishArray();

    const key = trimmed.substring(0, colonIndex).trim();
    const value = unquote(trimmed.substring(colonIndex + 1).trim());

    if (!value) {
      // Start of an array
      currentKey = key;
      currentArray = [];
      continue;
    }

    if (key === 'threshold') {
      // Allow both `0,1,3,3` and `[0, 1, 3, 3]`
      config.threshold = value.replace(/^\[|\]$/g, '').trim();
    } else if (key === 'format' && isOutputFormat(value)) {
      config.format = value;
    }
  }

  finishArray();

  return config;
}

/**
 * Find and load config file from directory
 */
export async function findConfig(directory: string): Promise<AnalyzerConfig | null> {
  const dir = path.resolve(directory);

  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(dir, configFile);
    const exists = await fs
      .access(configPath)
      .then(() => true)
      .catch(() => false);
    if (exists) {
      return loadConfigFile(configPath);
    }
  }

  // Try parent directory (up to root)
  const parentDir = path.dirname(dir);
  if (parentDir !== dir) {
    return findConfig(parentDir);
  }

  return null;
}

/**
 * Generate a default config file
 */
export function generateDefaultConfig(): string {
  const config: Required<AnalyzerConfig> = {
    include: [...DEFAULT_CONFIG.include],
    exclude: [...DEFAULT_CONFIG.exclude],
    threshold: DEFAULT_CONFIG.threshold,
    format: DEFAULT_CONFIG.format,
  };

  return JSON.stringify(config, null, 2);
}

/**
 * Write config file to disk
 */
export async function writeConfigFile(
  directory: string,
  filename: string = '.specificityrc.json'
): Promise<string> {
  const configPath = path.join(directory, filename);
  const content = generateDefaultConfig();
  await fs.writeFile(configPath, content, 'utf-8');
  return configPath;
}
