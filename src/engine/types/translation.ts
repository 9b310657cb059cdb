/**
 * Translation call types
 */

import type { Language } from './common.js';

export type TranslationErrorKind =
  | 'timeout'
  | 'transport'
  | 'empty_output'
  | 'fatal'
  | 'validation';

export interface TranslationOutcome {
  readonly inputText: string;
  readonly outputText: string;
  readonly sourceLang: Language;
  readonly targetLang: Language;
  readonly agentId: string;
  readonly duration: number;      // ms, across all attempts
  readonly success: boolean;
  readonly errorKind?: TranslationErrorKind;
  readonly errorMessage?: string;
  readonly attempts: number;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly timestamp: string;
}

/** Arguments of one agent call, as seen by hooks */
export interface TranslationCall {
  readonly agentId: string;
  readonly text: string;
  readonly sourceLang: string;
  readonly targetLang: string;
}
