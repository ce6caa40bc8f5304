/**
 * Rule Command
 *
 * Shows how a classification rule is read and what it asks of the model.
 */

import chalk from 'chalk';
import { parseRuleString, generateTargetPath } from '@fileclassify/rules';
import { buildConstraint } from '@fileclassify/classifier';
import { UNKNOWN_VALUE } from '@fileclassify/core';
import { printHeader, printKeyValue, printWarning } from '../lib/output.js';

export function ruleCommand(rule: string): void {
  const rules = parseRuleString(rule);

  if (rules.length === 0) {
    printWarning('The rule has no fields; every file would go to "Unknown"');
    return;
  }

  printHeader('Rule Fields');
  for (const [index, { key, options }] of rules.entries()) {
    printKeyValue(`${index + 1}. ${key}`, options ? options.join(', ') : chalk.gray('any value'));
  }

  const sample = Object.fromEntries(rules.map(({ key, options }) => [key, options?.[0] ?? `<${key}>`]));
  console.log();
  printKeyValue('Example path', generateTargetPath(rule, sample));
  printKeyValue('Fallback', UNKNOWN_VALUE);

  const constraints = rules.filter(({ options }) => options && options.length > 0);
  if (constraints.length > 0) {
    printHeader('Model Constraints');
    for (const { key, options } of constraints) {
      console.log(chalk.gray(buildConstraint(key, options ?? []).trim()));
      console.log();
    }
  }
}
