/**
 * @fileclassify/classifier
 *
 * Model-backed file classification, folder counting and move planning.
 */

export {
  SYSTEM_PROMPT,
  getSystemPrompt,
  buildConstraint,
  buildDynamicPrompt,
  buildUserPrompt,
} from './prompt.js';

export type { GenerateOptions, ModelInfo, LlmClient } from './llm/types.js';
export { BaseLlm, matchOption, extractJsonObject } from './llm/base.js';
export { LocalLlamaClient, type LocalLlamaConfig } from './llm/localLlama.js';

export {
  classifyFile,
  placeholderClassification,
  normalizeClassification,
  coerceToOption,
  type ClassifyOptions,
} from './classifier.js';

export { countFolderContents, type FolderCounts, type CountOptions } from './counter.js';

export {
  planMoves,
  applyMovePlan,
  formatMovePlan,
  type PlanOptions,
  type PlannedMove,
  type MovePlan,
  type ApplyResult,
} from './planner.js';
