/**
 * Configuration management for the drift lab
 *
 * Read once from the environment and passed by reference; nothing here
 * keeps global state.
 */

import type { AgentSettings, BackoffStrategy } from './engine/types/common.js';
import { DEFAULT_AGENT_SETTINGS } from './engine/types/common.js';

export type EmbeddingProviderKind = 'openai' | 'hashing';

export interface AppConfig {
  // Server
  port: number;

  // AI Providers
  openai: {
    apiKey: string;
    model: string;
    baseUrl?: string;
  };
  ollama: {
    baseUrl: string;
    model: string;
  };
  cli: {
    claude: string;
    gemini: string;
    cursor: string;
  };

  // Embeddings
  embeddings: {
    provider: EmbeddingProviderKind;
    model: string;
    dimensions: number;
  };

  // Agent call settings
  agent: AgentSettings;

  // Experiment
  experiment: {
    errorRates: number[];         // fractions in [0, 1]
    agents: string[];
    chainLanguages: string[];
    chainAttempts: number;
    seed?: number;
    preservePunctuation: boolean;
    preserveCapitalization: boolean;
  };

  // Storage
  storage: {
    dataDir: string;
    sentencesFile: string;
    sentenceCount: number;
  };
}

export const DEFAULT_ERROR_RATES_PERCENT = [0, 10, 25, 35, 50];

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * "0,10,25" → [0, 0.1, 0.25]
 */
export function parseRatesPercent(value: string): number[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
    .map((item) => parseFloat(item) / 100);
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return parseInt(value, 10);
}

function parseBackoff(value: string | undefined): BackoffStrategy {
  if (value === 'fixed' || value === 'linear' || value === 'exponential') {
    return value;
  }
  return DEFAULT_AGENT_SETTINGS.backoff;
}

function parseEmbeddingProvider(value: string | undefined, hasKey: boolean): EmbeddingProviderKind {
  if (value === 'openai' || value === 'hashing') return value;
  return hasKey ? 'openai' : 'hashing';
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiKey = env.OPENAI_API_KEY ?? '';

  return {
    port: parseInt(env.PORT ?? '3000', 10),

    openai: {
      apiKey,
      model: env.OPENAI_MODEL ?? 'gpt-4o-mini',
      baseUrl: env.OPENAI_BASE_URL || undefined,
    },

    ollama: {
      baseUrl: env.OLLAMA_BASE_URL ?? 'http://localhost:11434/v1',
      model: env.OLLAMA_MODEL ?? 'llama3.2',
    },

    cli: {
      claude: env.CLAUDE_COMMAND ?? 'claude',
      gemini: env.GEMINI_COMMAND ?? 'gemini',
      cursor: env.CURSOR_COMMAND ?? 'cursor-agent',
    },

    embeddings: {
      provider: parseEmbeddingProvider(env.EMBEDDING_PROVIDER, Boolean(apiKey)),
      model: env.EMBEDDING_MODEL ?? 'text-embedding-3-small',
      dimensions: parseInt(env.EMBEDDING_DIMENSIONS ?? '256', 10),
    },

    agent: {
      timeoutMs: parseInt(env.AGENT_TIMEOUT_MS ?? String(DEFAULT_AGENT_SETTINGS.timeoutMs), 10),
      maxAttempts: parseInt(env.AGENT_MAX_ATTEMPTS ?? String(DEFAULT_AGENT_SETTINGS.maxAttempts), 10),
      retryDelayMs: parseInt(env.AGENT_RETRY_DELAY_MS ?? String(DEFAULT_AGENT_SETTINGS.retryDelayMs), 10),
      backoff: parseBackoff(env.AGENT_BACKOFF),
    },

    experiment: {
      errorRates: parseRatesPercent(env.ERROR_RATES ?? DEFAULT_ERROR_RATES_PERCENT.join(',')),
      agents: parseList(env.AGENTS) ?? [apiKey ? 'openai' : 'echo'],
      chainLanguages: parseList(env.CHAIN_LANGUAGES) ?? ['en', 'fr', 'he'],
      chainAttempts: parseInt(env.CHAIN_ATTEMPTS ?? '1', 10),
      seed: parseOptionalInt(env.EXPERIMENT_SEED),
      preservePunctuation: parseBoolean(env.PRESERVE_PUNCTUATION, true),
      preserveCapitalization: parseBoolean(env.PRESERVE_CAPITALIZATION, true),
    },

    storage: {
      dataDir: env.DATA_DIR ?? './data',
      sentencesFile: env.SENTENCES_FILE ?? './data/sentences.json',
      sentenceCount: parseInt(env.SENTENCE_COUNT ?? '10', 10),
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push(`PORT must be an integer between 0 and 65535, got ${config.port}`);
  }

  if (config.embeddings.provider === 'openai' && !config.openai.apiKey) {
    errors.push('EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY');
  }

  if (!Number.isInteger(config.embeddings.dimensions) || config.embeddings.dimensions < 1) {
    errors.push('EMBEDDING_DIMENSIONS must be a positive integer');
  }

  if (!Number.isInteger(config.agent.maxAttempts) || config.agent.maxAttempts < 1) {
    errors.push('AGENT_MAX_ATTEMPTS must be a positive integer');
  }

  if (!Number.isFinite(config.agent.timeoutMs) || config.agent.timeoutMs <= 0) {
    errors.push('AGENT_TIMEOUT_MS must be positive');
  }

  if (!Number.isFinite(config.agent.retryDelayMs) || config.agent.retryDelayMs < 0) {
    errors.push('AGENT_RETRY_DELAY_MS must not be negative');
  }

  if (config.experiment.errorRates.length === 0) {
    errors.push('ERROR_RATES must list at least one rate');
  }
  for (const rate of config.experiment.errorRates) {
    if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
      errors.push(`Error rates must be between 0 and 100 percent, got ${rate * 100}`);
    }
  }

  if (config.experiment.agents.length === 0) {
    errors.push('AGENTS must list at least one agent');
  }

  if (config.experiment.chainLanguages.length !== 3) {
    errors.push('CHAIN_LANGUAGES must list exactly 3 languages');
  }

  if (!Number.isInteger(config.experiment.chainAttempts) || config.experiment.chainAttempts < 1) {
    errors.push('CHAIN_ATTEMPTS must be a positive integer');
  }

  if (config.experiment.seed !== undefined && !Number.isInteger(config.experiment.seed)) {
    errors.push('EXPERIMENT_SEED must be an integer');
  }

  if (!Number.isInteger(config.storage.sentenceCount) || config.storage.sentenceCount < 1) {
    errors.push('SENTENCE_COUNT must be a positive integer');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if a hosted AI provider is configured
 */
export function hasAIProvider(config: AppConfig): boolean {
  return Boolean(config.openai.apiKey);
}
