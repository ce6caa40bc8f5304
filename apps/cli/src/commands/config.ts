/**
 * Config Command
 *
 * View and manage CLI configuration.
 */

import chalk from 'chalk';
import { errorMessage } from '@fileclassify/core';
import { loadCliConfig, saveConfig, type CliConfig, type ConfigFile } from '../config/index.js';
import { printError, printHeader, printSuccess } from '../lib/output.js';

const configKeys = ['llmUrl', 'llmModel', 'llmApiKey', 'llmTimeout', 'defaultRule', 'buildConfig'] as const;
type ConfigKey = typeof configKeys[number];

const configDescriptions: Record<ConfigKey, string> = {
  llmUrl: 'Base URL of the local chat-completions server',
  llmModel: 'Model name sent with each request',
  llmApiKey: 'Bearer token for the model server',
  llmTimeout: 'Model request timeout in milliseconds',
  defaultRule: 'Rule used when classify is run without --rule',
  buildConfig: 'Build configuration used by the build command',
};

function isConfigKey(key: string): key is ConfigKey {
  return configKeys.some((name) => name === key);
}

function displayValue(key: ConfigKey, config: CliConfig): string {
  const value = config[key];
  if (value === undefined) {
    return chalk.gray('not set');
  }
  if (key === 'llmApiKey') {
    return '****';
  }
  return String(value);
}

function toUpdate(key: ConfigKey, value: string): Partial<ConfigFile> {
  if (key === 'llmTimeout') {
    const timeout = Number.parseInt(value, 10);
    if (Number.isNaN(timeout) || timeout <= 0) {
      throw new Error('llmTimeout must be a positive number');
    }
    return { llmTimeout: timeout };
  }
  switch (key) {
    case 'llmUrl':
      return { llmUrl: value };
    case 'llmModel':
      return { llmModel: value };
    case 'llmApiKey':
      return { llmApiKey: value };
    case 'defaultRule':
      return { defaultRule: value };
    case 'buildConfig':
      return { buildConfig: value };
  }
}

export function configCommand(key?: string, value?: string): void {
  try {
    if (key === undefined) {
      const config = loadCliConfig();
      printHeader('CLI Configuration');
      for (const name of configKeys) {
        console.log(`${chalk.cyan(name)}: ${displayValue(name, config)}`);
        console.log(`  ${chalk.gray(configDescriptions[name])}`);
      }
      console.log();
      console.log(chalk.gray(`Stored in ${config.configFile}; FILECLASSIFY_* environment variables take precedence`));
      return;
    }

    if (!isConfigKey(key)) {
      printError(`Unknown config key: ${key}`);
      console.log(chalk.gray(`Valid keys: ${configKeys.join(', ')}`));
      process.exitCode = 1;
      return;
    }

    // Setting a value must work even while the stored file is invalid
    if (value !== undefined) {
      saveConfig(toUpdate(key, value));
      printSuccess(`Set ${key} = ${key === 'llmApiKey' ? '****' : value}`);
      return;
    }

    console.log(displayValue(key, loadCliConfig()));
  } catch (error) {
    printError(errorMessage(error));
    process.exitCode = 1;
  }
}
