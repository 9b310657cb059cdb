/**
 * OpenAI translator - chat completions through the official SDK.
 *
 * Also serves OpenAI-compatible servers (Ollama's /v1 endpoint, vLLM, ...)
 * through `baseUrl`. SDK-level retries are disabled: the agent owns retries.
 */

import OpenAI from 'openai';
import type {
  ITranslator,
  TranslatorConfig,
  TranslatorRequest,
  TranslatorResponse,
} from '../interfaces/translator.js';
import { FatalTranslatorError, TransportError, TranslationError } from '../errors.js';
import { TRANSLATOR_SYSTEM_PROMPT, createTranslationPrompt } from '../prompts/translator.js';

export interface OpenAITranslatorConfig extends TranslatorConfig {
  /** Registry-facing name, e.g. 'openai' or 'ollama' */
  name?: string;
  maxTokens?: number;
}

/**
 * Map SDK errors onto the translation error taxonomy
 */
export function classifyOpenAIError(error: unknown): TranslationError {
  if (error instanceof TranslationError) {
    return error;
  }
  if (
    error instanceof OpenAI.AuthenticationError ||
    error instanceof OpenAI.PermissionDeniedError ||
    error instanceof OpenAI.NotFoundError ||
    error instanceof OpenAI.BadRequestError
  ) {
    return new FatalTranslatorError(`OpenAI request rejected: ${error.message}`, { cause: error });
  }
  if (error instanceof Error) {
    return new TransportError(`OpenAI request failed: ${error.message}`, { cause: error });
  }
  return new TransportError(`OpenAI request failed: ${String(error)}`);
}

export class OpenAITranslator implements ITranslator {
  readonly name: string;
  readonly model: string;

  private client: OpenAI;
  private config: OpenAITranslatorConfig;

  constructor(config: OpenAITranslatorConfig) {
    this.config = config;
    this.name = config.name ?? 'openai';
    this.model = config.model ?? 'gpt-4o-mini';

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  async translate(request: TranslatorRequest, signal?: AbortSignal): Promise<TranslatorResponse> {
    const prompt = createTranslationPrompt(request.text, request.sourceLang, request.targetLang);

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: TRANSLATOR_SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
          temperature: this.config.temperature ?? 0.3,
          max_tokens: this.config.maxTokens ?? 1024,
        },
        { signal }
      );

      const choice = response.choices[0];

      return {
        text: choice?.message.content ?? '',
        metadata: {
          model: response.model,
          promptLength: prompt.length,
          finishReason: choice?.finish_reason ?? 'error',
          tokensUsed: response.usage?.total_tokens ?? 0,
        },
      };
    } catch (error) {
      throw classifyOpenAIError(error);
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (error) {
      console.warn(`[${this.name}] Not available: ${classifyOpenAIError(error).message}`);
      return false;
    }
  }
}
