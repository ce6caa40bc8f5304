/**
 * Build Configuration
 *
 * Reads build.config.json. Relative paths are resolved against the
 * directory holding the config file.
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { NotFoundError, ValidationError, isNodeErrorWithCode, errorMessage } from '@fileclassify/core';

const installSchema = z.object({
  command: z.string().min(1).optional(),
  args: z.array(z.string()).default(['install', '--no-audit', '--no-fund']),
  timeout: z.number().int().positive().default(30 * 60 * 1000),
});

const bundleSchema = z.object({
  command: z.string().min(1).optional(),
  args: z.array(z.string()).min(1),
  timeout: z.number().int().positive().default(10 * 60 * 1000),
});

const flagsSchema = z.object({
  name: z.string().default('--name'),
  windowed: z.string().default('--windowed'),
  singleFile: z.string().default('--onefile'),
  outDir: z.string().default('--distpath'),
});

const packageSchema = z.object({
  tool: z.enum(['pkg', 'flags']).default('pkg'),
  command: z.string().min(1).optional(),
  entry: z.string().min(1),
  name: z.string().min(1).default('FileClassify'),
  windowed: z.boolean().default(true),
  singleFile: z.boolean().default(true),
  outDir: z.string().min(1).default('release'),
  platform: z.enum(['win32', 'linux', 'darwin']).default('win32'),
  nodeTarget: z.string().default('node20'),
  arch: z.enum(['x64', 'arm64']).default('x64'),
  flags: flagsSchema.default({}),
  extraArgs: z.array(z.string()).default([]),
  timeout: z.number().int().positive().default(30 * 60 * 1000),
});

export const buildConfigSchema = z.object({
  manifest: z.string().min(1).default('package.json'),
  install: installSchema.default({}),
  bundle: bundleSchema.optional(),
  package: packageSchema,
});

export type BuildConfigFile = z.infer<typeof buildConfigSchema>;
export type PackagerFlags = z.infer<typeof flagsSchema>;

/**
 * Build configuration with every path made absolute
 */
export interface ResolvedBuildConfig {
  rootDir: string;
  manifestPath: string;
  install: BuildConfigFile['install'];
  bundle?: BuildConfigFile['bundle'];
  package: Omit<BuildConfigFile['package'], 'entry' | 'outDir'> & {
    entryPoint: string;
    outDir: string;
  };
}

function resolveFrom(baseDir: string, target: string): string {
  return isAbsolute(target) ? target : resolve(baseDir, target);
}

/**
 * Validate raw config data and resolve its paths
 */
export function parseBuildConfig(raw: unknown, baseDir: string): ResolvedBuildConfig {
  const parsed = buildConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError('build config', issues);
  }

  const { manifest, install, bundle, package: pkg } = parsed.data;
  const { entry, outDir, ...rest } = pkg;

  return {
    rootDir: baseDir,
    manifestPath: resolveFrom(baseDir, manifest),
    install,
    bundle,
    package: {
      ...rest,
      entryPoint: resolveFrom(baseDir, entry),
      outDir: resolveFrom(baseDir, outDir),
    },
  };
}

/**
 * Load and validate a build.config.json file
 */
export async function loadBuildConfig(configPath: string): Promise<ResolvedBuildConfig> {
  const absolutePath = resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf8');
  } catch (error) {
    if (isNodeErrorWithCode(error, 'ENOENT')) {
      throw new NotFoundError('Build config', absolutePath);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError('build config', `not valid JSON (${errorMessage(error)})`);
  }

  return parseBuildConfig(raw, dirname(absolutePath));
}
