/**
 * Custom Error Classes
 */

/**
 * Base error class for all fileclassify errors
 */
export class FileClassifyError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FileClassifyError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends FileClassifyError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      1,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Not found error for missing files and folders
 */
export class NotFoundError extends FileClassifyError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      1,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * External command error
 *
 * Carries the tool's own exit code so the process can exit with it.
 */
export class CommandExecutionError extends FileClassifyError {
  public readonly command: string;
  public readonly stderr: string;

  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    const excerpt = stderr.trim().split(/\r?\n/).slice(-5).join('\n');
    super(
      `Command failed with exit code ${exitCode}: ${command}${excerpt ? `\n${excerpt}` : ''}`,
      'COMMAND_EXECUTION_ERROR',
      exitCode,
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
    this.command = command;
    this.stderr = stderr;
  }
}

/**
 * Dependency manifest could not be read or has the wrong shape
 */
export class ManifestError extends FileClassifyError {
  constructor(manifestPath: string, reason: string) {
    super(
      `Invalid manifest ${manifestPath}: ${reason}`,
      'MANIFEST_ERROR',
      1,
      { manifestPath, reason }
    );
    this.name = 'ManifestError';
  }
}

/**
 * Packaging tool exited cleanly but produced nothing at the expected path
 */
export class ArtifactMissingError extends FileClassifyError {
  constructor(artifactPath: string) {
    super(
      `Packaging finished but no executable was written to ${artifactPath}`,
      'ARTIFACT_MISSING',
      1,
      { artifactPath }
    );
    this.name = 'ArtifactMissingError';
  }
}

/**
 * Produced executable is not in the format a post-processing step expects
 */
export class ExecutableFormatError extends FileClassifyError {
  constructor(artifactPath: string, reason: string) {
    super(
      `Not a Windows executable: ${artifactPath} (${reason})`,
      'EXECUTABLE_FORMAT',
      1,
      { artifactPath, reason }
    );
    this.name = 'ExecutableFormatError';
  }
}

/**
 * No content parser is registered for a file extension
 */
export class UnsupportedFileTypeError extends FileClassifyError {
  constructor(extension: string) {
    super(
      `No parser available for file extension: ${extension || '(none)'}`,
      'UNSUPPORTED_FILE_TYPE',
      1,
      { extension }
    );
    this.name = 'UnsupportedFileTypeError';
  }
}

/**
 * A parser could not read a document's content
 */
export class ParseError extends FileClassifyError {
  constructor(format: string, filePath: string, reason: string) {
    super(
      `Could not read ${format} content from ${filePath}: ${reason}`,
      'PARSE_ERROR',
      1,
      { format, filePath, reason }
    );
    this.name = 'ParseError';
  }
}

/**
 * Language model request or response failure
 */
export class LlmError extends FileClassifyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', 1, details);
    this.name = 'LlmError';
  }
}

export function isNodeErrorWithCode(
  error: unknown,
  code: string
): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error as NodeJS.ErrnoException).code === code
  );
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
