/**
 * Utils Module Exports
 */

// Configuration
export {
  ConfigManager,
  type CredentialCheck,
  DEFAULT_CONFIG_FILE,
  deepFreeze,
  deepMerge,
  getConfigManager,
  resetConfigManager,
} from './config-manager';
// File Utilities
export { ensureDirExists, isMissingFile, readJsonFile, sanitizeSegment, writeJsonFile } from './fileutils';
// Logging
export {
  closeLogger,
  createEnhancedLogger,
  createModuleLogger,
  EnhancedLogger,
  LOG_LEVELS,
  type LogContext,
  logger,
  type ModuleLogger,
  setLogLevel,
} from './logger';
// Retry
export * from './retry';
export * from './time';
// Validation
export * from './validation';
