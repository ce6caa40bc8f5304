/**
 * Folder Counter
 *
 * Counts every folder and file below a root folder. Unreadable
 * subfolders are skipped with a warning; aborting stops the walk.
 */

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { NotFoundError, ValidationError, isNodeErrorWithCode } from '@fileclassify/core';
import { createLogger } from '@fileclassify/utils';

const log = createLogger({ component: 'counter' });

export interface FolderCounts {
  folders: number;
  files: number;
}

export interface CountOptions {
  signal?: AbortSignal;
}

async function assertDirectory(folderPath: string): Promise<void> {
  try {
    const stats = await stat(folderPath);
    if (!stats.isDirectory()) {
      throw new ValidationError('folder', `${folderPath} is not a directory`);
    }
  } catch (error) {
    if (isNodeErrorWithCode(error, 'ENOENT')) {
      throw new NotFoundError('Folder', folderPath);
    }
    throw error;
  }
}

export async function countFolderContents(
  folderPath: string,
  options: CountOptions = {}
): Promise<FolderCounts> {
  const { signal } = options;
  await assertDirectory(folderPath);

  const counts: FolderCounts = { folders: 0, files: 0 };
  const pending: string[] = [folderPath];

  while (pending.length > 0) {
    signal?.throwIfAborted();
    const current = pending.pop();
    if (current === undefined) {
      break;
    }

    let entries: Dirent[];
    try {
      entries = await readdir(current, { withFileTypes: true });
    } catch (error) {
      if (current === folderPath) {
        throw error;
      }
      log.warn({ folder: current, err: error }, 'Skipping unreadable folder');
      continue;
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        counts.folders += 1;
        pending.push(join(current, entry.name));
      } else if (entry.isFile()) {
        counts.files += 1;
      }
    }
  }

  return counts;
}
