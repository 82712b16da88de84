/**
 * OpenAI Text Generator
 *
 * Chat-completions adapter for the TextGenerator port. One user message per
 * request, no streaming.
 */

import { err, ok, type Result } from 'neverthrow';
import OpenAI from 'openai';

import { describeError } from '@/common/types/errors.js';

import { createTextGenerationError, type TextGenerationError } from '../../core/errors.js';

import type { TextGenerationRequest, TextGenerator } from '../../core/ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The part of the OpenAI client this adapter calls. An `OpenAI` instance satisfies it.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        max_tokens: number;
        messages: { role: 'user'; content: string }[];
      }): Promise<{
        choices: { message: { content: string | null } }[];
        usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
      }>;
    };
  };
}

export interface OpenAITextGeneratorConfig {
  apiKey: string;
  model: string;
  /** Applied when a request sets no limit of its own */
  defaultMaxTokens: number;
  logger: Logger;
  /** Prebuilt client, mainly for tests */
  client?: ChatCompletionClient;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Mapping
// ─────────────────────────────────────────────────────────────────────────────

const mapOpenAIError = (error: unknown): TextGenerationError => {
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const retryable = status === undefined || status === 429 || status >= 500;
    return createTextGenerationError(
      `OpenAI request failed${status !== undefined ? ` (${String(status)})` : ''}: ${error.message}`,
      retryable,
      error
    );
  }

  return createTextGenerationError(`OpenAI request failed: ${describeError(error)}`, true, error);
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeOpenAITextGenerator = (config: OpenAITextGeneratorConfig): TextGenerator => {
  const { apiKey, model, defaultMaxTokens, logger } = config;
  const log = logger.child({ component: 'OpenAITextGenerator', model });
  const client: ChatCompletionClient = config.client ?? new OpenAI({ apiKey });

  return {
    async generate(request: TextGenerationRequest): Promise<Result<string, TextGenerationError>> {
      const maxTokens = request.maxTokens ?? defaultMaxTokens;
      log.debug({ promptLength: request.prompt.length, maxTokens }, 'Requesting completion');

      try {
        const response = await client.chat.completions.create({
          model,
          max_tokens: maxTokens,
          messages: [{ role: 'user', content: request.prompt }],
        });

        if (response.usage !== undefined) {
          log.info(
            {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            },
            'Completion token usage'
          );
        }

        const content = response.choices[0]?.message.content ?? '';
        if (content === '') {
          return err(createTextGenerationError('OpenAI returned an empty completion'));
        }

        return ok(content);
      } catch (error) {
        const mapped = mapOpenAIError(error);
        log.error({ error: mapped.message, retryable: mapped.retryable }, 'Completion failed');
        return err(mapped);
      }
    },
  };
};
