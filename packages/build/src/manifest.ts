/**
 * Dependency Manifest
 *
 * The manifest is an npm package.json. Its dependency maps are flattened
 * into one unordered list of names with optional version ranges.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ManifestError, NotFoundError, isNodeErrorWithCode, errorMessage } from '@fileclassify/core';

const dependencyMapSchema = z.record(z.string());

const manifestSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  dependencies: dependencyMapSchema.optional(),
  devDependencies: dependencyMapSchema.optional(),
  optionalDependencies: dependencyMapSchema.optional(),
}).passthrough();

export type DependencyKind = 'runtime' | 'dev' | 'optional';

export interface DependencySpec {
  name: string;
  version?: string;
  kind: DependencyKind;
}

export interface DependencyManifest {
  path: string;
  name?: string;
  dependencies: DependencySpec[];
}

function toSpecs(map: Record<string, string> | undefined, kind: DependencyKind): DependencySpec[] {
  if (!map) {
    return [];
  }
  return Object.entries(map).map(([name, version]) => {
    const trimmed = version.trim();
    return trimmed ? { name, version: trimmed, kind } : { name, kind };
  });
}

/**
 * Parse manifest content already read from disk
 */
export function parseDependencyManifest(content: string, manifestPath: string): DependencyManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ManifestError(manifestPath, `not valid JSON (${errorMessage(error)})`);
  }

  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ManifestError(manifestPath, `${where}: ${issue?.message ?? 'invalid shape'}`);
  }

  const data = parsed.data;
  return {
    path: manifestPath,
    name: data.name,
    dependencies: [
      ...toSpecs(data.dependencies, 'runtime'),
      ...toSpecs(data.devDependencies, 'dev'),
      ...toSpecs(data.optionalDependencies, 'optional'),
    ],
  };
}

/**
 * Read and validate a dependency manifest
 */
export async function readDependencyManifest(manifestPath: string): Promise<DependencyManifest> {
  const absolutePath = resolve(manifestPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf8');
  } catch (error) {
    if (isNodeErrorWithCode(error, 'ENOENT')) {
      throw new NotFoundError('Dependency manifest', absolutePath);
    }
    throw error;
  }

  return parseDependencyManifest(content, absolutePath);
}
