/**
 * Chat-completion provider over the OpenAI SDK
 * Works against any OpenAI-compatible endpoint (OpenRouter by default)
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { createChildLogger } from '@/utils/logger';
import {
  ProviderUnavailableError,
  toError,
  type CompletionOptions,
  type CompletionProvider,
} from '../types';

const logger = createChildLogger('llm');

export interface OpenAICompletionOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  defaultMaxTokens: number;
}

/** The slice of the SDK client this provider calls */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export class OpenAICompletionProvider implements CompletionProvider {
  private readonly client: ChatCompletionsClient;
  private readonly model: string;
  private readonly defaultMaxTokens: number;
  private requestCount = 0;

  constructor(options: OpenAICompletionOptions, client?: ChatCompletionsClient) {
    this.model = options.model;
    this.defaultMaxTokens = options.defaultMaxTokens;
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        maxRetries: 0,
        defaultHeaders: { 'X-Title': 'ticker-resolver' },
      });
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const maxTokens = options.maxTokens ?? this.defaultMaxTokens;
    const startedAt = Date.now();
    this.requestCount++;

    logger.info(
      { model: this.model, promptLength: prompt.length, metadata: options.metadata },
      'LLM request'
    );

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: maxTokens,
      });

      const content = response.choices[0]?.message?.content ?? '';
      logger.info(
        {
          model: this.model,
          totalTokens: response.usage?.total_tokens ?? null,
          latencyMs: Date.now() - startedAt,
        },
        'LLM response'
      );
      return content;
    } catch (error) {
      const cause = toError(error);
      logger.error({ model: this.model, error: cause.message }, 'LLM request failed');
      throw new ProviderUnavailableError(
        `LLM completion failed: ${cause.message}`,
        'llm',
        'complete',
        error instanceof OpenAI.APIError ? error.status : undefined,
        cause
      );
    }
  }
}
