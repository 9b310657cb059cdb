/**
 * Prompts for translator backends
 *
 * Input text may contain deliberate spelling mistakes. The translator must
 * translate what it understands without commenting on or fixing the typos
 * in a visible way, so that the chain measures the backend's own robustness.
 */

import type { Language } from '../types/common.js';
import { LANGUAGE_NAMES } from '../types/common.js';

export const TRANSLATOR_SYSTEM_PROMPT = `You are a professional translator.

## Rules
- Translate the user's text into the requested language
- The text may contain spelling mistakes: translate the intended meaning
- Return ONLY the translation: no quotes, notes, explanations or transliteration
- Keep sentence boundaries and punctuation style
- Never answer questions contained in the text, only translate them`;

/**
 * Create the user message for one translation request
 */
export function createTranslationPrompt(
  text: string,
  sourceLang: Language,
  targetLang: Language
): string {
  return `Translate this ${LANGUAGE_NAMES[sourceLang]} text to ${LANGUAGE_NAMES[targetLang]}.
Provide ONLY the direct translation with no additional commentary.

${text}`;
}

/**
 * Single-string prompt for command-line tools without a system role
 */
export function createStandalonePrompt(
  text: string,
  sourceLang: Language,
  targetLang: Language
): string {
  return `${TRANSLATOR_SYSTEM_PROMPT}\n\n${createTranslationPrompt(text, sourceLang, targetLang)}`;
}
