import { describe, it, expect } from 'vitest';
import {
  FileClassifyError,
  CommandExecutionError,
  NotFoundError,
  ValidationError,
  UnsupportedFileTypeError,
  errorMessage,
  isNodeErrorWithCode,
} from '@fileclassify/core';

describe('errors', () => {
  it('should carry the tool exit code on command failures', () => {
    const error = new CommandExecutionError('npm install', 3, 'line 1\nline 2');

    expect(error).toBeInstanceOf(FileClassifyError);
    expect(error.exitCode).toBe(3);
    expect(error.code).toBe('COMMAND_EXECUTION_ERROR');
    expect(error.message).toBe('Command failed with exit code 3: npm install\nline 1\nline 2');
  });

  it('should keep only the last five stderr lines in the message', () => {
    const stderr = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].join('\n');
    const error = new CommandExecutionError('pkg', 2, stderr);

    expect(error.message).toBe('Command failed with exit code 2: pkg\nc\nd\ne\nf\ng');
    expect(error.stderr).toBe(stderr);
  });

  it('should format not found and validation messages', () => {
    expect(new NotFoundError('Entry point', '/app/main.js').message).toBe('Entry point not found: /app/main.js');
    expect(new ValidationError('rule', 'empty').message).toBe('Validation failed for rule: empty');
  });

  it('should name a missing extension', () => {
    expect(new UnsupportedFileTypeError('').message).toBe('No parser available for file extension: (none)');
  });

  it('should extract messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });

  it('should recognise node error codes', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });

    expect(isNodeErrorWithCode(error, 'ENOENT')).toBe(true);
    expect(isNodeErrorWithCode(error, 'EACCES')).toBe(false);
    expect(isNodeErrorWithCode('ENOENT', 'ENOENT')).toBe(false);
  });
});
