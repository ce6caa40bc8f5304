/**
 * CLI Configuration
 *
 * Environment (and .env in the working directory) overrides
 * ~/.fileclassify/config.json.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { ValidationError, errorMessage } from '@fileclassify/core';
import { setLogLevel } from '@fileclassify/utils';

// Config file location
export const CONFIG_DIR = join(homedir(), '.fileclassify');
export const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

// Environment schema
const envSchema = z.object({
  FILECLASSIFY_LLM_URL: z.string().url().optional(),
  FILECLASSIFY_LLM_MODEL: z.string().min(1).optional(),
  FILECLASSIFY_LLM_API_KEY: z.string().optional(),
  FILECLASSIFY_DEBUG: z.string().optional(),
});

// Config file schema
const configFileSchema = z.object({
  llmUrl: z.string().url().optional(),
  llmModel: z.string().min(1).optional(),
  llmApiKey: z.string().optional(),
  llmTimeout: z.number().int().positive().default(60000),
  defaultRule: z.string().default('类型 >> 年份 >> 月份'),
  buildConfig: z.string().default('build.config.json'),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface CliConfig {
  llmUrl?: string;
  llmModel?: string;
  llmApiKey?: string;
  llmTimeout: number;
  defaultRule: string;
  buildConfig: string;
  debug: boolean;
  configFile: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Read the config file; a missing file means defaults
 */
export function loadConfigFile(filePath: string = CONFIG_FILE): unknown {
  if (!existsSync(filePath)) {
    return {};
  }
  const content = readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ValidationError('config file', `${filePath} is not valid JSON (${errorMessage(error)})`);
  }
}

/**
 * Merge environment over file settings
 */
export function resolveCliConfig(
  env: NodeJS.ProcessEnv,
  fileContent: unknown,
  configFile: string = CONFIG_FILE
): CliConfig {
  const envResult = envSchema.safeParse(env);
  if (!envResult.success) {
    throw new ValidationError('environment', formatIssues(envResult.error));
  }

  const fileResult = configFileSchema.safeParse(fileContent);
  if (!fileResult.success) {
    throw new ValidationError('config file', formatIssues(fileResult.error));
  }

  const fromEnv = envResult.data;
  const fromFile = fileResult.data;

  return {
    llmUrl: fromEnv.FILECLASSIFY_LLM_URL ?? fromFile.llmUrl,
    llmModel: fromEnv.FILECLASSIFY_LLM_MODEL ?? fromFile.llmModel,
    llmApiKey: fromEnv.FILECLASSIFY_LLM_API_KEY ?? fromFile.llmApiKey,
    llmTimeout: fromFile.llmTimeout,
    defaultRule: fromFile.defaultRule,
    buildConfig: fromFile.buildConfig,
    debug: fromEnv.FILECLASSIFY_DEBUG === 'true',
    configFile,
  };
}

/**
 * Load .env, then the config file, then resolve
 */
export function loadCliConfig(): CliConfig {
  dotenvConfig({ path: resolve(process.cwd(), '.env') });
  const config = resolveCliConfig(process.env, loadConfigFile(CONFIG_FILE), CONFIG_FILE);
  if (config.debug) {
    setLogLevel('debug');
  }
  return config;
}

/**
 * Merge updates into the config file
 *
 * The stored file is read without validation so that a bad value can be
 * overwritten; the merged result must pass the schema before it is written.
 */
export function saveConfig(updates: Partial<ConfigFile>, filePath: string = CONFIG_FILE): void {
  const current = loadConfigFile(filePath);
  const base = typeof current === 'object' && current !== null ? current : {};
  const merged = { ...base, ...updates };

  const result = configFileSchema.safeParse(merged);
  if (!result.success) {
    throw new ValidationError('config file', formatIssues(result.error));
  }

  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(merged, null, 2));
}
