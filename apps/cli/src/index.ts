#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for fileclassify.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@fileclassify/core';
import { printError } from './lib/output.js';

// Commands
import { buildCommand } from './commands/build.js';
import { countCommand } from './commands/count.js';
import { ruleCommand } from './commands/rule.js';
import { inspectCommand } from './commands/inspect.js';
import { classifyCommand } from './commands/classify.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('fileclassify')
  .description('Rule-based file organiser and its release build')
  .version('1.0.0');

// ============================================
// BUILD
// ============================================

program
  .command('build')
  .description('Install dependencies and package the windowed executable')
  .option('-c, --config <path>', 'Build configuration file')
  .option('--no-pause', 'Exit without waiting for Enter')
  .action(buildCommand);

// ============================================
// FILE COMMANDS
// ============================================

program
  .command('count <folder>')
  .description('Count folders and files below a folder')
  .action(countCommand);

program
  .command('rule <rule>')
  .description('Show how a classification rule is parsed')
  .action(ruleCommand);

program
  .command('inspect <file>')
  .description('Show file info, metadata and a content summary')
  .option('-l, --length <chars>', 'Summary length', '500')
  .action(inspectCommand);

program
  .command('classify <source>')
  .description('Suggest (or apply) a destination for every file in a folder')
  .requiredOption('-t, --target <dir>', 'Folder the classified tree is built under')
  .option('-r, --rule <rule>', 'Classification rule, e.g. "类型 >> 年份"')
  .option('--apply', 'Move the files instead of previewing')
  .option('--no-content', 'Classify by file name only')
  .option('--no-recursive', 'Only look at the top level of the source folder')
  .action(classifyCommand);

program
  .command('config [key] [value]')
  .description('View or modify CLI configuration')
  .action(configCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('fileclassify --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  printError(errorMessage(error));
  process.exit(1);
});
