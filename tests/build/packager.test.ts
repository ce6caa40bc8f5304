import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import {
  ExecutablePackager,
  PkgTool,
  readWindowsSubsystem,
  WINDOWS_SUBSYSTEM,
  type PackageOptions,
} from '@fileclassify/build';
import {
  ArtifactMissingError,
  CommandExecutionError,
  ExecutableFormatError,
  NotFoundError,
  ValidationError,
} from '@fileclassify/core';
import { pathExists, safeWriteFile } from '@fileclassify/utils';
import { createFakeToolchain } from './fakeToolchain.js';

describe('ExecutablePackager', () => {
  let dir: string;
  let options: PackageOptions;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fileclassify-package-'));
    const entryPoint = join(dir, 'main.js');
    await writeFile(entryPoint, 'console.log("hi");');
    options = {
      entryPoint,
      outputName: 'FileClassify',
      windowed: false,
      singleFile: true,
      outDir: join(dir, 'release'),
      platform: 'win32',
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should report the artifact the tool wrote', async () => {
    const { runner } = createFakeToolchain();
    const outcome = await new ExecutablePackager(new PkgTool(), runner).package(options);

    const expected = join(dir, 'release', 'FileClassify.exe');
    expect(outcome.artifactPath).toBe(expected);
    expect(await readFile(expected, 'utf8')).toBe('executable build 1');
    expect(outcome.size).toBe('executable build 1'.length);
    expect(outcome.sha256).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should refuse a missing entry point before running the tool', async () => {
    const { runner, calls } = createFakeToolchain();

    await expect(
      new ExecutablePackager(new PkgTool(), runner).package({ ...options, entryPoint: join(dir, 'gone.js') })
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(calls).toHaveLength(0);
  });

  it('should propagate the tool exit code and remove the stale artifact', async () => {
    const stale = join(dir, 'release', 'FileClassify.exe');
    await safeWriteFile(stale, 'old build');
    const { runner } = createFakeToolchain({ packagerExitCode: 2 });

    const error = await new ExecutablePackager(new PkgTool(), runner).package(options).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandExecutionError);
    expect(error).toMatchObject({ exitCode: 2, stderr: 'Error! Entry file could not be bundled' });
    expect(await pathExists(stale)).toBe(false);
  });

  it('should fail when the tool exits cleanly without an artifact', async () => {
    const { runner } = createFakeToolchain({ packagerWritesNothing: true });

    await expect(new ExecutablePackager(new PkgTool(), runner).package(options)).rejects.toBeInstanceOf(
      ArtifactMissingError
    );
  });

  it('should mark a windowed win32 executable as a GUI program', async () => {
    const { runner } = createFakeToolchain({ packagerWritesPe: true });
    const outcome = await new ExecutablePackager(new PkgTool(), runner).package({ ...options, windowed: true });

    expect(await readWindowsSubsystem(outcome.artifactPath)).toBe(WINDOWS_SUBSYSTEM.gui);
    expect(outcome.sha256).toBe(createHash('sha256').update(await readFile(outcome.artifactPath)).digest('hex'));
  });

  it('should leave the console subsystem alone when not windowed', async () => {
    const { runner } = createFakeToolchain({ packagerWritesPe: true });
    const outcome = await new ExecutablePackager(new PkgTool(), runner).package(options);

    expect(await readWindowsSubsystem(outcome.artifactPath)).toBe(WINDOWS_SUBSYSTEM.console);
  });

  it('should fail when a windowed artifact is not a Windows executable', async () => {
    const { runner } = createFakeToolchain();

    await expect(
      new ExecutablePackager(new PkgTool(), runner).package({ ...options, windowed: true })
    ).rejects.toBeInstanceOf(ExecutableFormatError);
  });

  it('should refuse options the tool cannot honour before running it', async () => {
    const { runner, calls } = createFakeToolchain();

    await expect(
      new ExecutablePackager(new PkgTool(), runner).package({ ...options, windowed: true, platform: 'linux' })
    ).rejects.toThrow(
      'Validation failed for package options for pkg: pkg can only drop the console window for win32 targets, not linux'
    );
    await expect(
      new ExecutablePackager(new PkgTool(), runner).package({ ...options, singleFile: false })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(calls).toHaveLength(0);
  });
});
