/**
 * Executable Packager
 *
 * Invokes the packaging tool against a single entry point and checks that
 * exactly one executable appears at the expected location.
 */

import {
  calculateFileHash,
  createLogger,
  ensureDir,
  executeCommand,
  formatCommandLine,
  getFileSizeBytes,
  pathExists,
  removeFile,
  type CommandRunner,
} from '@fileclassify/utils';
import { ArtifactMissingError, NotFoundError, ValidationError } from '@fileclassify/core';
import type { PackagerRequest, PackagerTool } from './packagerTools.js';
import { runTool } from './tool.js';

const log = createLogger({ component: 'packager' });

export interface PackageOptions extends PackagerRequest {
  timeout?: number;
  echo?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface PackageOutcome {
  artifactPath: string;
  size: number;
  sha256: string;
  commandLine: string;
  duration: number;
}

export class ExecutablePackager {
  constructor(
    private readonly tool: PackagerTool,
    private readonly runner: CommandRunner = executeCommand
  ) {}

  /**
   * Package the entry point into an executable
   */
  async package(options: PackageOptions): Promise<PackageOutcome> {
    const { timeout, echo, env, ...request } = options;

    // Contents are the application's business; only existence is checked
    if (!(await pathExists(request.entryPoint))) {
      throw new NotFoundError('Entry point', request.entryPoint);
    }

    const problems = this.tool.unsupported(request);
    if (problems.length > 0) {
      throw new ValidationError(`package options for ${this.tool.id}`, problems.join('; '));
    }

    const artifactPath = this.tool.artifactPath(request);
    const args = this.tool.buildArgs(request);
    const commandLine = formatCommandLine(this.tool.command, args);

    await ensureDir(request.outDir);
    // A failed run must not leave the previous executable behind
    await removeFile(artifactPath);

    log.info({ tool: this.tool.id, entry: request.entryPoint, command: commandLine }, 'Packaging executable');

    const result = await runTool(this.runner, this.tool.command, args, {
      timeout,
      echo,
      env,
    });

    if (!(await pathExists(artifactPath))) {
      throw new ArtifactMissingError(artifactPath);
    }

    await this.tool.finalize?.(artifactPath, request);

    const size = await getFileSizeBytes(artifactPath);
    const sha256 = await calculateFileHash(artifactPath, 'sha256');

    log.info({ artifact: artifactPath, size, duration: result.duration }, 'Executable packaged');

    return {
      artifactPath,
      size,
      sha256,
      commandLine,
      duration: result.duration,
    };
  }
}
