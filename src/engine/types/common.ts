/**
 * Common types used across the drift engine
 */

export const SUPPORTED_LANGUAGES = ['en', 'fr', 'he', 'de', 'es', 'ru'] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export const LANGUAGE_NAMES: Record<Language, string> = {
  en: 'English',
  fr: 'French',
  he: 'Hebrew',
  de: 'German',
  es: 'Spanish',
  ru: 'Russian',
};

export function isSupportedLanguage(code: string): code is Language {
  return (SUPPORTED_LANGUAGES as readonly string[]).includes(code);
}

/** Three-language route: source → intermediate₁ → intermediate₂ → source */
export type ChainRoute = readonly [Language, Language, Language];

export const DEFAULT_ROUTE: ChainRoute = ['en', 'fr', 'he'];

export type BackoffStrategy = 'fixed' | 'linear' | 'exponential';

export interface RetryPolicy {
  maxAttempts: number;
  retryDelayMs: number;
  backoff: BackoffStrategy;
}

export interface AgentSettings extends RetryPolicy {
  timeoutMs: number;
}

export const DEFAULT_AGENT_SETTINGS: AgentSettings = {
  timeoutMs: 30000,
  maxAttempts: 3,
  retryDelayMs: 2000,
  backoff: 'linear',
};

/** Uniform float in [0, 1) */
export type RandomSource = () => number;
