/**
 * @fileclassify/core
 *
 * Core package containing:
 * - Error handling
 * - Shared classification types
 * - External tool resolution
 */

// Errors
export {
  FileClassifyError,
  ValidationError,
  NotFoundError,
  CommandExecutionError,
  ManifestError,
  ArtifactMissingError,
  ExecutableFormatError,
  ParseError,
  UnsupportedFileTypeError,
  LlmError,
  isNodeErrorWithCode,
  errorMessage,
} from './errors/index.js';

// Types
export {
  CLASSIFICATION_FIELDS,
  UNKNOWN_VALUE,
} from './types/classification.js';

export type {
  ClassificationField,
  ClassificationResult,
  ParsedRule,
} from './types/classification.js';

// Tools
export {
  resolveToolPath,
  TOOL_ENV_VARS,
  type ToolConfig,
  type ToolName,
} from './config/tools.js';
