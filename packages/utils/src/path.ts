/**
 * Path Utilities
 */

import { relative } from 'node:path';

/**
 * Sanitize a filename to be safe for filesystem
 */
export function sanitizeFilename(filename: string): string {
  return filename
    // Remove null bytes
    .replace(/\0/g, '')
    // Replace Windows reserved characters
    .replace(/[<>:"/\\|?*]/g, '_')
    // Replace control characters
    .replace(/[\x00-\x1f\x80-\x9f]/g, '')
    // Trim whitespace and dots
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .substring(0, 200);
}

/**
 * Name of an executable for a target platform
 */
export function executableName(name: string, platform: NodeJS.Platform): string {
  return platform === 'win32' ? `${name}.exe` : name;
}

/**
 * Path relative to the working directory, prefixed with ./ when inside it
 */
export function formatDisplayPath(targetPath: string, cwd: string = process.cwd()): string {
  const rel = relative(cwd, targetPath);
  if (!rel) {
    return '.';
  }
  if (!rel.startsWith('.') && !rel.startsWith('..') && !/^[a-zA-Z]:/.test(rel) && !rel.startsWith('/')) {
    return `./${rel}`;
  }
  return rel;
}
