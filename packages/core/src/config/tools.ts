/**
 * External Tool Configuration
 *
 * Resolves the commands used by the build pipeline.
 *
 * Priority order:
 * 1. Environment variables (e.g., FILECLASSIFY_NPM_PATH)
 * 2. Command configured in build.config.json
 * 3. Bare tool name on the system PATH
 */

import { existsSync } from 'node:fs';

export interface ToolConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: 'env' | 'config' | 'path';
}

export const TOOL_ENV_VARS = {
  npm: 'FILECLASSIFY_NPM_PATH',
  packager: 'FILECLASSIFY_PACKAGER_PATH',
} as const;

export type ToolName = keyof typeof TOOL_ENV_VARS;

/**
 * Resolve a tool's command
 */
export function resolveToolPath(
  name: ToolName,
  defaultCommand: string,
  configured?: string,
  env: NodeJS.ProcessEnv = process.env
): ToolConfig {
  const envVar = TOOL_ENV_VARS[name];

  // 1. Environment variable, only if it points at something real
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  // 2. Configured command
  if (configured && configured.trim()) {
    return { name, envVar, resolvedPath: configured.trim(), source: 'config' };
  }

  // 3. Let the system PATH resolve it
  return { name, envVar, resolvedPath: defaultCommand, source: 'path' };
}
