/**
 * Dependency Installer
 *
 * Ensures every dependency listed in a manifest is present by running the
 * package manager in the manifest's directory. No retries, no rollback.
 */

import { dirname } from 'node:path';
import { createLogger, executeCommand, formatCommandLine, type CommandRunner } from '@fileclassify/utils';
import { readDependencyManifest, type DependencyManifest } from './manifest.js';
import { runTool } from './tool.js';

const log = createLogger({ component: 'installer' });

export interface InstallOptions {
  manifestPath: string;
  command?: string;
  args?: string[];
  timeout?: number;
  /** Stream the package manager's own output to the terminal */
  echo?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface InstallResult {
  manifest: DependencyManifest;
  commandLine: string;
  duration: number;
}

export const DEFAULT_INSTALL_ARGS = ['install', '--no-audit', '--no-fund'];

export class DependencyInstaller {
  constructor(private readonly runner: CommandRunner = executeCommand) {}

  /**
   * Install the manifest's dependencies
   */
  async install(options: InstallOptions): Promise<InstallResult> {
    const manifest = await readDependencyManifest(options.manifestPath);
    const command = options.command ?? 'npm';
    const args = options.args ?? DEFAULT_INSTALL_ARGS;
    const commandLine = formatCommandLine(command, args);

    log.info(
      { manifest: manifest.path, dependencies: manifest.dependencies.length, command: commandLine },
      'Installing dependencies'
    );

    const result = await runTool(this.runner, command, args, {
      cwd: dirname(manifest.path),
      timeout: options.timeout,
      echo: options.echo,
      env: options.env,
    });

    log.info({ duration: result.duration }, 'Dependencies installed');

    return {
      manifest,
      commandLine,
      duration: result.duration,
    };
  }
}
