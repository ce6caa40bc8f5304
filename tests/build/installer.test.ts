import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DependencyInstaller } from '@fileclassify/build';
import { CommandExecutionError, NotFoundError } from '@fileclassify/core';
import type { CommandRunner } from '@fileclassify/utils';
import { createFakeToolchain } from './fakeToolchain.js';

describe('DependencyInstaller', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fileclassify-install-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeManifest(dependencies: Record<string, string>): Promise<string> {
    const path = join(dir, 'package.json');
    await writeFile(path, JSON.stringify({ name: 'demo', dependencies }));
    return path;
  }

  it('should run the package manager beside the manifest', async () => {
    const manifestPath = await writeManifest({ 'left-pad': '^1.3.0' });
    const { runner, calls } = createFakeToolchain();

    const result = await new DependencyInstaller(runner).install({ manifestPath });

    expect(calls).toEqual([{ command: 'npm', args: ['install', '--no-audit', '--no-fund'], cwd: dir }]);
    expect(result.commandLine).toBe('npm install --no-audit --no-fund');
    expect(result.manifest.dependencies).toEqual([{ name: 'left-pad', version: '^1.3.0', kind: 'runtime' }]);
  });

  it('should fail with the package manager exit code for an unknown package', async () => {
    const manifestPath = await writeManifest({ 'definitely-not-published': '^1.0.0' });
    const { runner } = createFakeToolchain({ installFailureCode: 3 });

    const error = await new DependencyInstaller(runner).install({ manifestPath }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandExecutionError);
    expect(error).toMatchObject({
      exitCode: 3,
      stderr: "npm ERR! 404 'definitely-not-published' is not in this registry.",
    });
  });

  it('should not run anything when the manifest is missing', async () => {
    const { runner, calls } = createFakeToolchain();

    await expect(
      new DependencyInstaller(runner).install({ manifestPath: join(dir, 'package.json') })
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(calls).toHaveLength(0);
  });

  it('should report a tool that cannot be started', async () => {
    const manifestPath = await writeManifest({});
    const runner: CommandRunner = async () => {
      throw new Error('spawn npm ENOENT');
    };

    await expect(new DependencyInstaller(runner).install({ manifestPath })).rejects.toMatchObject({
      exitCode: 127,
      message: 'Command failed with exit code 127: npm install --no-audit --no-fund\nspawn npm ENOENT',
    });
  });

  it('should treat a timeout as a failure', async () => {
    const manifestPath = await writeManifest({});
    const runner: CommandRunner = async (command, args) => ({
      command,
      args,
      exitCode: 143,
      stdout: '',
      stderr: '',
      duration: 50,
      timedOut: true,
    });

    await expect(
      new DependencyInstaller(runner).install({ manifestPath, timeout: 50 })
    ).rejects.toMatchObject({ exitCode: 143, stderr: 'timed out after 50ms\n' });
  });
});
