/**
 * Translator interface - abstraction over external translation backends
 * (chat-completion APIs, local model servers, command-line tools)
 */

import type { Language } from '../types/common.js';

export interface TranslatorRequest {
  text: string;
  sourceLang: Language;
  targetLang: Language;
}

export interface TranslatorResponse {
  text: string;
  metadata?: Record<string, unknown>;
}

export interface ITranslator {
  readonly name: string;

  /**
   * Translate once. No retries here: the agent owns retry and timeout.
   * Implementations should abort promptly when `signal` fires and throw
   * TranslationError subclasses to classify failures.
   */
  translate(request: TranslatorRequest, signal?: AbortSignal): Promise<TranslatorResponse>;

  /**
   * Check if the backend is reachable and configured
   */
  isAvailable(): Promise<boolean>;
}

export interface TranslatorConfig {
  model?: string;
  baseUrl?: string;
  apiKey?: string;
  temperature?: number;
}
