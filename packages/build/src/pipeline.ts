/**
 * Build Pipeline
 *
 * install → bundle → package → report, strictly in sequence. The bundle
 * step runs only when the config names one. The first failing step halts
 * the run; its exit code becomes the report's exit code.
 */

import { dirname } from 'node:path';
import {
  createLogger,
  executeCommand,
  formatBytes,
  formatDisplayPath,
  formatDuration,
  formatTimestamp,
  type CommandRunner,
} from '@fileclassify/utils';
import {
  FileClassifyError,
  ValidationError,
  errorMessage,
  resolveToolPath,
} from '@fileclassify/core';
import type { ResolvedBuildConfig } from './config.js';
import { DependencyInstaller } from './installer.js';
import { EntryBundler, type BundleResult } from './bundler.js';
import { ExecutablePackager, type PackageOutcome } from './packager.js';
import { FlagPackagerTool, PkgTool, type PackagerTool } from './packagerTools.js';

const log = createLogger({ component: 'build' });

export type BuildStage = 'install' | 'bundle' | 'package';

export interface BuildReport {
  success: boolean;
  exitCode: number;
  failedStage?: BuildStage;
  error?: string;
  manifest?: {
    path: string;
    dependencyCount: number;
  };
  bundle?: BundleResult;
  artifact?: PackageOutcome;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

export interface BuildDependencies {
  runner?: CommandRunner;
  echo?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Pick the packaging tool named in the config
 */
export function createPackagerTool(
  config: ResolvedBuildConfig['package'],
  env: NodeJS.ProcessEnv = process.env
): PackagerTool {
  switch (config.tool) {
    case 'pkg': {
      const command = resolveToolPath('packager', 'pkg', config.command, env).resolvedPath;
      return new PkgTool(command, config.nodeTarget, config.arch);
    }
    case 'flags': {
      const resolved = resolveToolPath('packager', '', config.command, env);
      if (!resolved.resolvedPath) {
        throw new ValidationError('package.command', 'required when package.tool is "flags"');
      }
      return new FlagPackagerTool(resolved.resolvedPath, config.flags);
    }
  }
}

function failureExitCode(error: unknown): number {
  if (error instanceof FileClassifyError && error.exitCode !== 0) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Run the whole build
 */
export async function runBuild(
  config: ResolvedBuildConfig,
  deps: BuildDependencies = {}
): Promise<BuildReport> {
  const runner = deps.runner ?? executeCommand;
  const env = deps.env ?? process.env;
  const startedAt = new Date();

  const finish = (fields: Omit<BuildReport, 'startedAt' | 'finishedAt' | 'durationMs'>): BuildReport => {
    const finishedAt = new Date();
    return {
      ...fields,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };
  };

  // 1. Install
  let manifest: BuildReport['manifest'];
  try {
    const installer = new DependencyInstaller(runner);
    const installed = await installer.install({
      manifestPath: config.manifestPath,
      command: resolveToolPath('npm', 'npm', config.install.command, env).resolvedPath,
      args: config.install.args,
      timeout: config.install.timeout,
      echo: deps.echo,
      env,
    });
    manifest = {
      path: installed.manifest.path,
      dependencyCount: installed.manifest.dependencies.length,
    };
  } catch (error) {
    log.error({ err: error }, 'Dependency installation failed');
    return finish({
      success: false,
      exitCode: failureExitCode(error),
      failedStage: 'install',
      error: errorMessage(error),
    });
  }

  // 2. Bundle
  let bundle: BundleResult | undefined;
  if (config.bundle) {
    try {
      bundle = await new EntryBundler(runner).bundle({
        cwd: dirname(config.manifestPath),
        command: resolveToolPath('npm', 'npm', config.bundle.command, env).resolvedPath,
        args: config.bundle.args,
        timeout: config.bundle.timeout,
        echo: deps.echo,
        env,
      });
    } catch (error) {
      log.error({ err: error }, 'Bundling failed');
      return finish({
        success: false,
        exitCode: failureExitCode(error),
        failedStage: 'bundle',
        error: errorMessage(error),
        manifest,
      });
    }
  }

  // 3. Package
  try {
    const packager = new ExecutablePackager(createPackagerTool(config.package, env), runner);
    const artifact = await packager.package({
      entryPoint: config.package.entryPoint,
      outputName: config.package.name,
      windowed: config.package.windowed,
      singleFile: config.package.singleFile,
      outDir: config.package.outDir,
      platform: config.package.platform,
      extraArgs: config.package.extraArgs,
      timeout: config.package.timeout,
      echo: deps.echo,
      env,
    });

    // 4. Report
    return finish({ success: true, exitCode: 0, manifest, bundle, artifact });
  } catch (error) {
    log.error({ err: error }, 'Packaging failed');
    return finish({
      success: false,
      exitCode: failureExitCode(error),
      failedStage: 'package',
      error: errorMessage(error),
      manifest,
      bundle,
    });
  }
}

/**
 * Completion report, one entry per output line
 */
export function formatBuildReport(report: BuildReport, cwd: string = process.cwd()): string[] {
  const lines: string[] = [];

  if (report.success) {
    lines.push(`build succeeded in ${formatDuration(report.durationMs)}`);
  } else {
    lines.push(`build failed at ${report.failedStage ?? 'unknown'} (exit code ${report.exitCode})`);
  }

  if (report.manifest) {
    lines.push(`  dependencies: ${report.manifest.dependencyCount} (${formatDisplayPath(report.manifest.path, cwd)})`);
  }

  if (report.bundle) {
    lines.push(`  bundled by:   ${report.bundle.commandLine}`);
  }

  if (report.artifact) {
    lines.push(`  executable:   ${formatDisplayPath(report.artifact.artifactPath, cwd)} (${formatBytes(report.artifact.size)})`);
    lines.push(`  sha256:       ${report.artifact.sha256}`);
  }

  if (report.error) {
    for (const line of report.error.split(/\r?\n/)) {
      lines.push(`  ${line}`);
    }
  }

  lines.push(`completed: ${formatTimestamp(report.finishedAt)}`);
  return lines;
}
