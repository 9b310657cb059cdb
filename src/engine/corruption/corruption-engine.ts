/**
 * Corruption Engine - injects controlled spelling errors into text
 *
 * Word selection: round(wordCount × rate) with exact halves rounding down,
 * capped at the number of words that can be mutated at all. Each selected
 * word receives exactly one mutation (swap / delete / insert / substitute)
 * in its interior. With a random seed the result is fully deterministic.
 */

import type { CorruptionResult, CorruptionSpec, WordEdit } from '../types/corruption.js';
import type { RandomSource } from '../types/common.js';
import { InvalidRateError } from '../errors.js';
import { createSeededRandom, randomChoice, sampleWithoutReplacement } from '../utils/random.js';
import { applicableKinds, mutate, restoreCase, type CoreBounds } from './mutations.js';

const LETTER = /\p{L}/u;
const RATE_EPSILON = 1e-9;

interface WordSpan {
  leading: string;
  core: string[];
  trailing: string;
}

export interface CorruptionEngineOptions {
  /** Used when a spec carries no seed. Owned by the caller. */
  random?: RandomSource;
}

/**
 * Split a token into leading non-letters, letter core, trailing non-letters
 */
export function splitAffixes(token: string): WordSpan {
  const chars = Array.from(token);
  let start = 0;
  while (start < chars.length && !LETTER.test(chars[start])) start++;

  let end = chars.length;
  while (end > start && !LETTER.test(chars[end - 1])) end--;

  return {
    leading: chars.slice(0, start).join(''),
    core: chars.slice(start, end),
    trailing: chars.slice(end).join(''),
  };
}

/**
 * Number of words to corrupt: nearest integer, exact halves round down
 */
export function wordsToCorrupt(wordCount: number, rate: number): number {
  const exact = wordCount * rate;
  return Math.max(0, Math.ceil(exact - 0.5 - RATE_EPSILON));
}

export function assertValidRate(rate: number): void {
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new InvalidRateError(rate);
  }
}

/**
 * Fraction of words that differ between two texts (word-by-word).
 * Missing or extra words count as differing.
 */
export function measureErrorRate(original: string, corrupted: string): number {
  const a = original.split(/\s+/).filter(Boolean);
  const b = corrupted.split(/\s+/).filter(Boolean);
  if (a.length === 0) return 0;

  let differing = Math.abs(a.length - b.length);
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    if (a[i] !== b[i]) differing++;
  }
  return Math.min(1, differing / a.length);
}

export class CorruptionEngine {
  private random: RandomSource;

  constructor(options: CorruptionEngineOptions = {}) {
    this.random = options.random ?? Math.random;
  }

  corrupt(text: string, spec: CorruptionSpec, random?: RandomSource): CorruptionResult {
    assertValidRate(spec.targetRate);

    // Whitespace runs are kept as separators so untouched text round-trips exactly
    const parts = text.split(/(\s+)/);
    const wordParts: number[] = [];
    parts.forEach((part, i) => {
      if (part.length > 0 && !/^\s+$/.test(part)) wordParts.push(i);
    });

    const wordCount = wordParts.length;
    const target = wordsToCorrupt(wordCount, spec.targetRate);

    if (target === 0) {
      return {
        originalText: text,
        corruptedText: text,
        targetRate: spec.targetRate,
        actualRate: 0,
        wordCount,
        edits: [],
      };
    }

    const source =
      spec.randomSeed !== undefined ? createSeededRandom(spec.randomSeed) : random ?? this.random;

    // Eligibility always comes from the alphabetic core, whatever the flags say
    const spans = wordParts.map((partIndex) => splitAffixes(parts[partIndex]));
    const candidates = spans
      .map((span, wordIndex) => ({ span, wordIndex }))
      .filter(({ span }) => applicableKinds(span.core).length > 0)
      .map(({ wordIndex }) => wordIndex);

    const selected = sampleWithoutReplacement(source, candidates, target).sort((a, b) => a - b);

    const edits: WordEdit[] = [];
    for (const wordIndex of selected) {
      const partIndex = wordParts[wordIndex];
      const original = parts[partIndex];
      const { chars, bounds } = this.mutableChars(spans[wordIndex], original, spec);

      const kind = randomChoice(source, applicableKinds(chars, bounds));
      const mutation = mutate(kind, chars, source, bounds);
      const mutated = spec.preserveCapitalization ? restoreCase(chars, mutation) : mutation.chars;

      const span = spans[wordIndex];
      const corrupted = spec.preservePunctuation
        ? span.leading + mutated.join('') + span.trailing
        : mutated.join('');
      parts[partIndex] = corrupted;

      edits.push({ index: wordIndex, original, corrupted, kind, position: mutation.position });
    }

    return {
      originalText: text,
      corruptedText: parts.join(''),
      targetRate: spec.targetRate,
      actualRate: wordCount === 0 ? 0 : edits.length / wordCount,
      wordCount,
      edits,
    };
  }

  /**
   * Characters handed to the mutation: the stripped core, or the whole token
   * with the core located inside it
   */
  private mutableChars(
    span: WordSpan,
    token: string,
    spec: CorruptionSpec
  ): { chars: string[]; bounds: CoreBounds } {
    if (spec.preservePunctuation) {
      return { chars: span.core, bounds: { start: 0, end: span.core.length } };
    }
    const start = Array.from(span.leading).length;
    return { chars: Array.from(token), bounds: { start, end: start + span.core.length } };
  }
}
