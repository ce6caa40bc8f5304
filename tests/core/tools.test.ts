import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveToolPath } from '@fileclassify/core';

describe('resolveToolPath', () => {
  it('should prefer an existing path from the environment', () => {
    const existing = tmpdir();
    const tool = resolveToolPath('npm', 'npm', 'custom-npm', { FILECLASSIFY_NPM_PATH: existing });

    expect(tool).toEqual({
      name: 'npm',
      envVar: 'FILECLASSIFY_NPM_PATH',
      resolvedPath: existing,
      source: 'env',
    });
  });

  it('should ignore an environment path that does not exist', () => {
    const tool = resolveToolPath('packager', 'pkg', ' ./bin/pkg ', {
      FILECLASSIFY_PACKAGER_PATH: join(tmpdir(), 'no-such-packager-binary'),
    });

    expect(tool.source).toBe('config');
    expect(tool.resolvedPath).toBe('./bin/pkg');
  });

  it('should fall back to the bare command name', () => {
    const tool = resolveToolPath('packager', 'pkg', undefined, {});

    expect(tool.source).toBe('path');
    expect(tool.resolvedPath).toBe('pkg');
  });
});
