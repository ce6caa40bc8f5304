/**
 * Local Llama Client
 *
 * Talks to a locally hosted model through the OpenAI-compatible chat
 * completions endpoint that llama.cpp's server (and most local runners)
 * expose. Rate-limit and server errors are retried with backoff.
 */

import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { LlmError, errorMessage } from '@fileclassify/core';
import { createLogger, retry } from '@fileclassify/utils';
import { BaseLlm } from './base.js';
import type { GenerateOptions, ModelInfo } from './types.js';

const log = createLogger({ component: 'local-llama' });

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export interface LocalLlamaConfig {
  baseUrl?: string;
  model?: string;
  apiKey?: string;
  contextSize?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  /** Custom undici dispatcher (proxies, tests) */
  dispatcher?: Dispatcher;
}

const chatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    })
  ).min(1),
});

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export class LocalLlamaClient extends BaseLlm {
  readonly name = 'local-llama';

  private readonly baseUrl: string | undefined;
  private readonly model: string;
  private readonly apiKey?: string;
  private readonly contextSize: number;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(config: LocalLlamaConfig = {}) {
    super();
    this.baseUrl = config.baseUrl?.trim().replace(/\/+$/, '') || undefined;
    this.model = config.model ?? 'local-model';
    this.apiKey = config.apiKey;
    this.contextSize = config.contextSize ?? 2048;
    this.timeoutMs = config.timeoutMs ?? 60000;
    this.maxAttempts = config.maxAttempts ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.dispatcher = config.dispatcher;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const baseUrl = this.baseUrl;
    if (!baseUrl) {
      throw new LlmError('No model endpoint configured');
    }

    const messages: ChatMessage[] = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const body = JSON.stringify({
      model: this.model,
      messages,
      temperature: options.temperature ?? 0.7,
      max_tokens: options.maxTokens ?? 512,
      top_p: options.topP ?? 0.95,
      stop: options.stop,
    });

    return retry(() => this.send(`${baseUrl}/v1/chat/completions`, body), {
      maxAttempts: this.maxAttempts,
      initialDelay: this.retryDelayMs,
      retryIf: (error) => {
        if (!(error instanceof LlmError)) {
          return false;
        }
        const status = error.details?.['status'];
        return typeof status === 'number' && RETRYABLE_STATUSES.has(status);
      },
      onRetry: (error, attempt) => {
        log.warn({ attempt, err: error }, 'Model request failed, retrying');
      },
    });
  }

  private async send(url: string, body: string): Promise<string> {
    const headers: Record<string, string> = {
      'content-type': 'application/json',
    };
    if (this.apiKey) {
      headers['authorization'] = `Bearer ${this.apiKey}`;
    }

    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, {
        method: 'POST',
        headers,
        body,
        dispatcher: this.dispatcher,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
    } catch (error) {
      throw new LlmError(`Model endpoint unreachable: ${errorMessage(error)}`, { url });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      const text = await response.body.text();
      throw new LlmError(`Model request failed with status ${response.statusCode}`, {
        status: response.statusCode,
        body: text.substring(0, 500),
      });
    }

    const parsed = chatCompletionSchema.safeParse(await response.body.json());
    if (!parsed.success) {
      throw new LlmError('Unexpected chat completion response shape');
    }

    const [choice] = parsed.data.choices;
    return choice?.message.content ?? '';
  }

  isAvailable(): boolean {
    return this.baseUrl !== undefined;
  }

  getModelInfo(): ModelInfo {
    return {
      name: this.name,
      status: this.baseUrl ? 'configured' : 'not_configured',
      model: this.model,
      endpoint: this.baseUrl,
      contextSize: this.contextSize,
    };
  }
}
