/**
 * Count Command
 */

import ora from 'ora';
import { resolve } from 'node:path';
import { countFolderContents } from '@fileclassify/classifier';
import { errorMessage } from '@fileclassify/core';
import { printError, printKeyValue } from '../lib/output.js';

export async function countCommand(folder: string): Promise<void> {
  const target = resolve(folder);
  const spinner = ora(`Counting ${target}...`).start();

  try {
    const counts = await countFolderContents(target);
    spinner.succeed(`Counted ${target}`);
    printKeyValue('Folders', counts.folders);
    printKeyValue('Files', counts.files);
  } catch (error) {
    spinner.fail('Count failed');
    printError(errorMessage(error));
    process.exitCode = 1;
  }
}
