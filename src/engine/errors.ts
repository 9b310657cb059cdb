/**
 * Error taxonomy for the drift engine
 *
 * - Validation errors: deterministic, never retried
 * - Translation errors: carry a kind; transient ones are retried by the agent
 * - Configuration errors: abort a whole sweep
 */

import type { TranslationErrorKind } from './types/translation.js';

export class DriftError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// ============ Validation ============

export class ValidationError extends DriftError {}

export class InvalidRateError extends ValidationError {
  readonly rate: number;

  constructor(rate: number) {
    super('INVALID_RATE', `Error rate must be between 0 and 1, got ${rate}`);
    this.rate = rate;
  }
}

export class EmptyInputError extends ValidationError {
  constructor(message = 'Text cannot be empty') {
    super('EMPTY_INPUT', message);
  }
}

export class IdenticalLanguageError extends ValidationError {
  constructor(lang: string) {
    super('IDENTICAL_LANGUAGE', `Source and target languages must be different (both "${lang}")`);
  }
}

export class UnsupportedLanguageError extends ValidationError {
  readonly language: string;

  constructor(language: string, supported: readonly string[]) {
    super(
      'UNSUPPORTED_LANGUAGE',
      `Unsupported language: "${language}". Supported: ${supported.join(', ')}`
    );
    this.language = language;
  }
}

export class ChainValidationError extends ValidationError {
  constructor(message: string) {
    super('CHAIN_VALIDATION', message);
  }
}

export class DimensionMismatchError extends ValidationError {
  constructor(left: number, right: number) {
    super('DIMENSION_MISMATCH', `Vector dimensions must match: ${left} vs ${right}`);
  }
}

// ============ Translation ============

export class TranslationError extends DriftError {
  readonly kind: TranslationErrorKind;

  constructor(
    kind: TranslationErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`TRANSLATION_${kind.toUpperCase()}`, message, options);
    this.kind = kind;
  }

  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

const TRANSIENT_KINDS: ReadonlySet<TranslationErrorKind> = new Set([
  'timeout',
  'transport',
  'empty_output',
]);

export class TranslationTimeoutError extends TranslationError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('timeout', `Translation timeout after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class TransportError extends TranslationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', message, options);
  }
}

export class EmptyOutputError extends TranslationError {
  constructor(message = 'Empty translation received') {
    super('empty_output', message);
  }
}

/** The translator cannot work at all (missing binary, bad credentials) */
export class FatalTranslatorError extends TranslationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('fatal', message, options);
  }
}

export class TranslationFailedError extends TranslationError {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(
      lastError instanceof TranslationError ? lastError.kind : 'transport',
      `Translation failed after ${attempts} attempt(s): ${lastError.message}`,
      { cause: lastError }
    );
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

// ============ Configuration / state ============

export class ConfigurationError extends DriftError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export class UnknownAgentError extends ConfigurationError {
  readonly agentId: string;

  constructor(agentId: string, known: readonly string[]) {
    super(`Unsupported agent type: ${agentId}. Supported types: ${known.join(', ')}`);
    this.agentId = agentId;
  }
}

export class ChainStateError extends DriftError {
  constructor(from: string, to: string) {
    super('CHAIN_STATE', `Illegal chain transition ${from} → ${to}`);
  }
}

export class StorageError extends DriftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE', message, options);
  }
}

// ============ Helpers ============

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
