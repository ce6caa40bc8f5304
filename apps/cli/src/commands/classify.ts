/**
 * Classify Command
 *
 * Previews where each file of a folder would be moved; --apply moves them.
 */

import ora from 'ora';
import chalk from 'chalk';
import { planMoves, applyMovePlan, formatMovePlan } from '@fileclassify/classifier';
import { errorMessage } from '@fileclassify/core';
import { loadCliConfig } from '../config/index.js';
import { createLlmClient } from '../lib/llm.js';
import { printError, printHeader, printInfo, printLines, printSuccess, printWarning } from '../lib/output.js';

interface ClassifyOptions {
  target: string;
  rule?: string;
  apply?: boolean;
  content: boolean;
  recursive: boolean;
}

export async function classifyCommand(source: string, options: ClassifyOptions): Promise<void> {
  const spinner = ora('Classifying files...').start();

  try {
    const config = loadCliConfig();
    const llm = createLlmClient(config);
    const rule = options.rule ?? config.defaultRule;

    const plan = await planMoves({
      sourceDir: source,
      targetDir: options.target,
      rule,
      llm,
      useContent: options.content,
      recursive: options.recursive,
      onProgress: (done, total) => {
        spinner.text = `Classifying files... ${done}/${total}`;
      },
    });
    spinner.succeed(`Classified with rule ${chalk.cyan(rule)}`);

    for (const warning of plan.warnings) {
      printWarning(warning);
    }

    if (plan.moves.length === 0) {
      printInfo('Nothing to move');
      return;
    }

    printHeader(`Suggested moves (${plan.moves.length})`);
    printLines(formatMovePlan(plan));

    if (!options.apply) {
      console.log();
      printInfo('Preview only; run again with --apply to move the files');
      return;
    }

    const result = await applyMovePlan(plan);
    console.log();
    printSuccess(`Moved ${result.moved} file(s)`);
    for (const failure of result.failed) {
      printError(`${failure.source}: ${failure.error}`);
    }
    if (result.failed.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail('Classification failed');
    printError(errorMessage(error));
    process.exitCode = 1;
  }
}
