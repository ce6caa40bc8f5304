/**
 * Packaging Tools
 *
 * Each tool knows how to turn the fixed packaging request (output name,
 * windowed, single file) into its own command line, and where the
 * executable lands afterwards.
 */

import { join } from 'node:path';
import { executableName } from '@fileclassify/utils';
import type { PackagerFlags } from './config.js';
import { setWindowsSubsystem } from './peSubsystem.js';

export interface PackagerRequest {
  entryPoint: string;
  outputName: string;
  /** No console window attached to the executable */
  windowed: boolean;
  /** One self-contained file instead of a directory of assets */
  singleFile: boolean;
  outDir: string;
  platform: NodeJS.Platform;
  extraArgs?: string[];
}

export interface PackagerTool {
  readonly id: string;
  readonly command: string;
  buildArgs(request: PackagerRequest): string[];
  artifactPath(request: PackagerRequest): string;
  /** Parts of the request this tool cannot honour; any entry stops the build */
  unsupported(request: PackagerRequest): string[];
  /** Post-process the artifact once the tool has written it */
  finalize?(artifactPath: string, request: PackagerRequest): Promise<void>;
}

const PKG_PLATFORMS: Partial<Record<NodeJS.Platform, string>> = {
  win32: 'win',
  linux: 'linux',
  darwin: 'macos',
};

/**
 * @yao-pkg/pkg: bundles a Node entry point with a Node runtime
 *
 * pkg has no switch for a console-less executable; the windowed request is
 * applied afterwards by marking the Windows executable as a GUI program.
 */
export class PkgTool implements PackagerTool {
  readonly id = 'pkg';

  constructor(
    readonly command: string = 'pkg',
    private readonly nodeTarget: string = 'node20',
    private readonly arch: string = 'x64'
  ) {}

  target(platform: NodeJS.Platform): string {
    const pkgPlatform = PKG_PLATFORMS[platform] ?? 'linux';
    return `${this.nodeTarget}-${pkgPlatform}-${this.arch}`;
  }

  buildArgs(request: PackagerRequest): string[] {
    return [
      request.entryPoint,
      '--targets',
      this.target(request.platform),
      '--output',
      this.artifactPath(request),
      ...(request.extraArgs ?? []),
    ];
  }

  artifactPath(request: PackagerRequest): string {
    return join(request.outDir, executableName(request.outputName, request.platform));
  }

  unsupported(request: PackagerRequest): string[] {
    const problems: string[] = [];
    if (request.windowed && request.platform !== 'win32') {
      problems.push(`pkg can only drop the console window for win32 targets, not ${request.platform}`);
    }
    if (!request.singleFile) {
      problems.push('pkg always produces a single file; use the flags tool for a folder layout');
    }
    return problems;
  }

  async finalize(artifactPath: string, request: PackagerRequest): Promise<void> {
    if (request.windowed) {
      await setWindowsSubsystem(artifactPath, 'gui');
    }
  }
}

/**
 * A packager driven purely by command-line switches
 */
export class FlagPackagerTool implements PackagerTool {
  readonly id = 'flags';

  constructor(
    readonly command: string,
    private readonly flags: PackagerFlags
  ) {}

  buildArgs(request: PackagerRequest): string[] {
    const args = [this.flags.name, request.outputName];
    if (request.windowed) {
      args.push(this.flags.windowed);
    }
    if (request.singleFile) {
      args.push(this.flags.singleFile);
    }
    args.push(this.flags.outDir, request.outDir);
    args.push(...(request.extraArgs ?? []));
    args.push(request.entryPoint);
    return args;
  }

  artifactPath(request: PackagerRequest): string {
    const fileName = executableName(request.outputName, request.platform);
    return request.singleFile
      ? join(request.outDir, fileName)
      : join(request.outDir, request.outputName, fileName);
  }

  unsupported(): string[] {
    return [];
  }
}
