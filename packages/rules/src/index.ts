/**
 * @fileclassify/rules
 *
 * Rule strings and the folder layout they describe.
 */

export { parseRuleString, formatRule, RULE_SEPARATOR } from './ruleParser.js';
export { generateTargetPath } from './targetPath.js';
export { FIELD_ALIASES, resolveFieldKey } from './fieldAliases.js';
