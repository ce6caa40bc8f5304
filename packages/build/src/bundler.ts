/**
 * Entry Bundler
 *
 * Runs the project's bundle command so the packager receives one
 * self-contained JavaScript entry point.
 */

import { createLogger, executeCommand, formatCommandLine, type CommandRunner } from '@fileclassify/utils';
import { runTool } from './tool.js';

const log = createLogger({ component: 'bundler' });

export interface BundleOptions {
  cwd: string;
  command?: string;
  args: string[];
  timeout?: number;
  echo?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface BundleResult {
  commandLine: string;
  duration: number;
}

export class EntryBundler {
  constructor(private readonly runner: CommandRunner = executeCommand) {}

  async bundle(options: BundleOptions): Promise<BundleResult> {
    const command = options.command ?? 'npm';
    const commandLine = formatCommandLine(command, options.args);

    log.info({ cwd: options.cwd, command: commandLine }, 'Bundling entry point');

    const result = await runTool(this.runner, command, options.args, {
      cwd: options.cwd,
      timeout: options.timeout,
      echo: options.echo,
      env: options.env,
    });

    log.info({ duration: result.duration }, 'Entry point bundled');

    return { commandLine, duration: result.duration };
  }
}
