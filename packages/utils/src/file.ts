/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  writeFile,
  stat,
  rename,
  rm,
  access,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { constants as fsConstants, createReadStream } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, typeof content === 'string' ? 'utf8' : undefined);
}

/**
 * Check whether a path exists
 */
export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await access(targetPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove a file if present; missing files are not an error
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Calculate the hash of a file
 */
export async function calculateFileHash(
  filePath: string,
  algorithm: 'md5' | 'sha1' | 'sha256' = 'sha256'
): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(algorithm);
    const stream = createReadStream(filePath);

    stream.on('data', (data) => hash.update(data));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Human-readable byte count
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}

/**
 * Move a file to a new location, never replacing an existing file
 *
 * Falls back to copy + delete when the destination is on another device.
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  if (await pathExists(destination)) {
    throw new Error(`Destination already exists: ${destination}`);
  }
  try {
    await rename(source, destination);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EXDEV') {
      throw error;
    }
    await fsCopyFile(source, destination, fsConstants.COPYFILE_EXCL);
    await rm(source);
  }
}
