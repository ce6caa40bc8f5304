/**
 * LLM Client Contract
 */

export interface GenerateOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  stop?: string[];
}

export interface ModelInfo {
  name: string;
  status: 'ready' | 'configured' | 'not_configured';
  model?: string;
  endpoint?: string;
  contextSize?: number;
}

export interface LlmClient {
  readonly name: string;

  /** Free-form completion for a prompt */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;

  /** One of the given options for a piece of text */
  classify(text: string, options: string[], systemPrompt?: string): Promise<string>;

  /** Structured JSON object extracted from the model's reply */
  extractJson(prompt: string, systemPrompt?: string): Promise<Record<string, unknown>>;

  isAvailable(): boolean;

  getModelInfo(): ModelInfo;
}
