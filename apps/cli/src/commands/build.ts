/**
 * Build Command
 *
 * Installs dependencies, packages the executable and prints the
 * completion report. The process exit code is the report's.
 */

import { resolve } from 'node:path';
import chalk from 'chalk';
import { loadBuildConfig, runBuild, formatBuildReport } from '@fileclassify/build';
import { errorMessage } from '@fileclassify/core';
import { loadCliConfig } from '../config/index.js';
import { printError, printInfo, printLines } from '../lib/output.js';
import { pauseBeforeExit } from '../lib/pause.js';

interface BuildOptions {
  config?: string;
  pause: boolean;
}

export async function buildCommand(options: BuildOptions): Promise<void> {
  try {
    const configPath = resolve(options.config ?? loadCliConfig().buildConfig);
    const buildConfig = await loadBuildConfig(configPath);

    printInfo(`Building from ${chalk.cyan(buildConfig.manifestPath)}`);
    const report = await runBuild(buildConfig, { echo: true });

    console.log();
    const [headline, ...details] = formatBuildReport(report);
    if (headline !== undefined) {
      console.log(report.success ? chalk.green(headline) : chalk.red(headline));
    }
    printLines(details);
    process.exitCode = report.exitCode;
  } catch (error) {
    printError(errorMessage(error));
    process.exitCode = 1;
  }

  await pauseBeforeExit({ enabled: options.pause });
}
