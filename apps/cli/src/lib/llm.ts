/**
 * Model client built from the CLI configuration
 */

import { LocalLlamaClient } from '@fileclassify/classifier';
import type { CliConfig } from '../config/index.js';

export function createLlmClient(config: CliConfig): LocalLlamaClient {
  return new LocalLlamaClient({
    baseUrl: config.llmUrl,
    model: config.llmModel,
    apiKey: config.llmApiKey,
    timeoutMs: config.llmTimeout,
  });
}
