/**
 * Translation Agent - one validated, observed, retried translation call
 *
 * Validation failures (empty text, unsupported or identical languages) are
 * thrown immediately. Transient failures (timeout, transport, empty output)
 * are retried up to `maxAttempts`; afterwards the agent throws
 * TranslationFailedError.
 */

import type { ITranslator, TranslatorResponse } from '../interfaces/translator.js';
import type { AgentSettings, Language } from '../types/common.js';
import type { TranslationCall, TranslationOutcome } from '../types/translation.js';
import { DEFAULT_AGENT_SETTINGS, SUPPORTED_LANGUAGES, isSupportedLanguage } from '../types/common.js';
import {
  EmptyInputError,
  EmptyOutputError,
  IdenticalLanguageError,
  TranslationError,
  TranslationFailedError,
  UnsupportedLanguageError,
  ValidationError,
  toError,
} from '../errors.js';
import { notifyHooks, type AgentHooks } from './hooks.js';
import { withRetry, withTimeout, type Sleep } from '../utils/retry.js';

export interface TranslationAgentOptions {
  id: string;
  translator: ITranslator;
  settings?: Partial<AgentSettings>;
  hooks?: AgentHooks[];
  sleep?: Sleep;
}

/**
 * Validate call arguments; returns the narrowed language pair
 */
export function validateTranslationInput(
  text: string,
  sourceLang: string,
  targetLang: string
): { sourceLang: Language; targetLang: Language } {
  if (!text || text.trim().length === 0) {
    throw new EmptyInputError();
  }
  if (!isSupportedLanguage(sourceLang)) {
    throw new UnsupportedLanguageError(sourceLang, SUPPORTED_LANGUAGES);
  }
  if (!isSupportedLanguage(targetLang)) {
    throw new UnsupportedLanguageError(targetLang, SUPPORTED_LANGUAGES);
  }
  if (sourceLang === targetLang) {
    throw new IdenticalLanguageError(sourceLang);
  }
  return { sourceLang, targetLang };
}

function isRetryable(error: Error): boolean {
  if (error instanceof TranslationError) {
    return error.transient;
  }
  // Unclassified backend errors are treated as transport failures
  return !(error instanceof ValidationError);
}

export class TranslationAgent {
  readonly id: string;
  readonly translator: ITranslator;
  readonly settings: AgentSettings;

  private hooks: AgentHooks[];
  private sleep?: Sleep;

  constructor(options: TranslationAgentOptions) {
    this.id = options.id;
    this.translator = options.translator;
    this.settings = { ...DEFAULT_AGENT_SETTINGS, ...options.settings };
    this.hooks = [...(options.hooks ?? [])];
    this.sleep = options.sleep;
  }

  addHooks(hooks: AgentHooks): void {
    this.hooks.push(hooks);
  }

  async translate(
    text: string,
    sourceLang: string,
    targetLang: string
  ): Promise<TranslationOutcome> {
    const call: TranslationCall = Object.freeze({ agentId: this.id, text, sourceLang, targetLang });

    let languages: { sourceLang: Language; targetLang: Language };
    try {
      languages = validateTranslationInput(text, sourceLang, targetLang);
    } catch (error) {
      const failure = toError(error);
      notifyHooks(this.hooks, 'onFailure', (h) => h.onFailure?.(failure, call));
      throw failure;
    }

    notifyHooks(this.hooks, 'beforeCall', (h) => h.beforeCall?.(call));

    const request = { text, ...languages };
    const startTime = Date.now();

    try {
      const { value: response, attempts } = await withRetry(
        () => withTimeout((signal) => this.attemptOnce(request, signal), this.settings.timeoutMs),
        {
          policy: this.settings,
          isRetryable,
          escalate: (lastError, attemptCount) => new TranslationFailedError(attemptCount, lastError),
          onRetry: (error, failedAttempt, delayMs) => {
            console.warn(
              `[Agent:${this.id}] ⚠️ Attempt ${failedAttempt}/${this.settings.maxAttempts} failed (${error.message}), retrying in ${delayMs}ms`
            );
          },
          sleep: this.sleep,
        }
      );

      const outcome: TranslationOutcome = Object.freeze({
        inputText: text,
        outputText: response.text,
        sourceLang: languages.sourceLang,
        targetLang: languages.targetLang,
        agentId: this.id,
        duration: Date.now() - startTime,
        success: true,
        attempts,
        metadata: Object.freeze({ translator: this.translator.name, ...response.metadata }),
        timestamp: new Date().toISOString(),
      });

      notifyHooks(this.hooks, 'afterCall', (h) => h.afterCall?.(outcome));
      return outcome;
    } catch (error) {
      const failure = toError(error);
      notifyHooks(this.hooks, 'onFailure', (h) => h.onFailure?.(failure, call));
      throw failure;
    }
  }

  private async attemptOnce(
    request: { text: string; sourceLang: Language; targetLang: Language },
    signal: AbortSignal
  ): Promise<TranslatorResponse> {
    const response = await this.translator.translate(request, signal);
    const translated = response.text.trim();
    if (translated.length === 0) {
      throw new EmptyOutputError();
    }
    return { ...response, text: translated };
  }
}
