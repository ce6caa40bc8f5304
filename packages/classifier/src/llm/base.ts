/**
 * Base LLM
 *
 * Implements classification and JSON extraction on top of a single
 * generate() that concrete clients provide.
 */

import { LlmError, ValidationError, errorMessage } from '@fileclassify/core';
import { isObject } from '@fileclassify/utils';
import type { GenerateOptions, LlmClient, ModelInfo } from './types.js';

/**
 * First option mentioned in a reply (case-insensitive), else the first option
 */
export function matchOption(reply: string, options: string[]): string {
  const [first] = options;
  if (first === undefined) {
    throw new ValidationError('options', 'at least one option is required');
  }

  const normalized = reply.trim().toLowerCase();
  return options.find((option) => normalized.includes(option.toLowerCase())) ?? first;
}

/**
 * Outermost {...} block of a reply, parsed
 */
export function extractJsonObject(reply: string): Record<string, unknown> {
  const match = /\{[\s\S]*\}/.exec(reply);
  if (!match) {
    throw new LlmError('No JSON object found in response');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(match[0]);
  } catch (error) {
    throw new LlmError(`Invalid JSON in response: ${errorMessage(error)}`);
  }

  if (!isObject(parsed)) {
    throw new LlmError('Response JSON is not an object');
  }
  return parsed;
}

export abstract class BaseLlm implements LlmClient {
  abstract readonly name: string;

  abstract generate(prompt: string, options?: GenerateOptions): Promise<string>;

  async classify(text: string, options: string[], systemPrompt?: string): Promise<string> {
    if (options.length === 0) {
      throw new ValidationError('options', 'at least one option is required');
    }

    const prompt = [
      `Classify the following text into exactly one of these categories: ${options.join(', ')}`,
      '',
      `Text: ${text}`,
      '',
      'Respond with the category only, without any explanation or extra text.',
      '',
      'Category:',
    ].join('\n');

    const reply = await this.generate(prompt, { systemPrompt, temperature: 0.3, maxTokens: 50 });
    return matchOption(reply, options);
  }

  async extractJson(prompt: string, systemPrompt?: string): Promise<Record<string, unknown>> {
    const jsonPrompt = [
      prompt,
      '',
      'Respond with valid JSON only, without any explanation or text outside the JSON object.',
      '',
      'JSON:',
    ].join('\n');

    const reply = await this.generate(jsonPrompt, { systemPrompt, temperature: 0.3, maxTokens: 512 });
    return extractJsonObject(reply);
  }

  isAvailable(): boolean {
    return true;
  }

  getModelInfo(): ModelInfo {
    return { name: this.name, status: 'ready' };
  }
}
