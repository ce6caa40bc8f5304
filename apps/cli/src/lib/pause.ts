/**
 * Exit Pause
 *
 * Keeps a double-clicked console window open until the user has read the
 * report.
 */

import { createInterface } from 'node:readline/promises';

export const PAUSE_PROMPT = 'Press Enter to exit...';

export interface PauseOptions {
  enabled: boolean;
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
}

/**
 * Whether the pause should happen at all
 */
export function shouldPause(enabled: boolean, isTTY: boolean | undefined): boolean {
  return enabled && isTTY === true;
}

export async function pauseBeforeExit(options: PauseOptions): Promise<boolean> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  if (!shouldPause(options.enabled, input.isTTY)) {
    return false;
  }

  const rl = createInterface({ input, output });
  try {
    await rl.question(PAUSE_PROMPT);
  } finally {
    rl.close();
  }
  return true;
}
