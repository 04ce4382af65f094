// Re-export core functionality
export * from './core/index.js';

// Export CLI utilities
export {
  formatReport,
  formatCheckResult,
  formatStatus,
  formatLocation,
  formatResultRow,
  formatErrorRow,
  formatFileError,
  formatFileReport,
  formatSummary,
  formatOutput,
} from './formatter.js';
export {
  CONFIG_FILES,
  normalizeConfig,
  findConfig,
  loadConfigFile,
  generateDefaultConfig,
  writeConfigFile,
  parseSimpleYaml,
} from './config.js';
