/**
 * Character-level mutations applied to a single word.
 *
 * Every mutation touches the interior of the alphabetic core only: the
 * core's first and last letters, and anything outside the core, are never
 * moved, removed or replaced.
 */

import type { MutationKind } from '../types/corruption.js';
import type { RandomSource } from '../types/common.js';
import { randomChoice, randomInt } from '../utils/random.js';

export const MUTATION_KINDS: readonly MutationKind[] = ['swap', 'delete', 'insert', 'substitute'];

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz'.split('');

export interface Mutation {
  kind: MutationKind;
  chars: string[];
  position: number;
  /** Output positions holding a moved or new character */
  touched: number[];
}

/**
 * Where the alphabetic core sits inside the mutated characters: [start, end).
 * Defaults to the whole array.
 */
export interface CoreBounds {
  start: number;
  end: number;
}

function boundsOf(chars: readonly string[], core?: CoreBounds): CoreBounds {
  return core ?? { start: 0, end: chars.length };
}

/** Interior swap positions whose neighbours differ (a same-letter swap is a no-op) */
function swapPositions(chars: readonly string[], core: CoreBounds): number[] {
  const positions: number[] = [];
  for (let i = core.start + 1; i + 1 < core.end - 1; i++) {
    if (chars[i].toLowerCase() !== chars[i + 1].toLowerCase()) {
      positions.push(i);
    }
  }
  return positions;
}

/**
 * Mutation kinds that can change this span without touching its ends
 */
export function applicableKinds(chars: readonly string[], core?: CoreBounds): MutationKind[] {
  const bounds = boundsOf(chars, core);
  const length = bounds.end - bounds.start;
  const kinds: MutationKind[] = [];
  if (swapPositions(chars, bounds).length > 0) kinds.push('swap');
  if (length >= 3) kinds.push('delete');
  if (length >= 2) kinds.push('insert');
  if (length >= 3) kinds.push('substitute');
  return kinds;
}

export function mutate(
  kind: MutationKind,
  chars: readonly string[],
  random: RandomSource,
  core?: CoreBounds
): Mutation {
  const { start, end } = boundsOf(chars, core);
  const out = [...chars];

  switch (kind) {
    case 'swap': {
      const position = randomChoice(random, swapPositions(chars, { start, end }));
      [out[position], out[position + 1]] = [out[position + 1], out[position]];
      return { kind, chars: out, position, touched: [position, position + 1] };
    }
    case 'delete': {
      const position = randomInt(random, start + 1, end - 2);
      out.splice(position, 1);
      return { kind, chars: out, position, touched: [] };
    }
    case 'insert': {
      const position = randomInt(random, start + 1, end - 1);
      out.splice(position, 0, randomChoice(random, ALPHABET));
      return { kind, chars: out, position, touched: [position] };
    }
    case 'substitute': {
      const position = randomInt(random, start + 1, end - 2);
      const current = chars[position].toLowerCase();
      out[position] = randomChoice(
        random,
        ALPHABET.filter((letter) => letter !== current)
      );
      return { kind, chars: out, position, touched: [position] };
    }
  }
}

function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function isLower(ch: string): boolean {
  return ch !== ch.toUpperCase() && ch === ch.toLowerCase();
}

function matchCase(ch: string, reference: string): string {
  const converted = isUpper(reference)
    ? ch.toUpperCase()
    : isLower(reference)
      ? ch.toLowerCase()
      : ch;
  // Some letters expand when case-mapped (ß → SS); keep the span length stable
  return Array.from(converted).length === 1 ? converted : ch;
}

/**
 * Index in the original span whose case an output position inherits.
 * Equal lengths map one to one; an inserted letter takes the case of the
 * character it pushed right.
 */
function caseSourceIndex(mutation: Mutation, outputIndex: number): number {
  if (mutation.kind === 'insert') {
    return outputIndex > mutation.position ? outputIndex - 1 : outputIndex;
  }
  if (mutation.kind === 'delete') {
    return outputIndex >= mutation.position ? outputIndex + 1 : outputIndex;
  }
  return outputIndex;
}

/**
 * Re-apply the original case pattern to the positions a mutation touched
 */
export function restoreCase(original: readonly string[], mutation: Mutation): string[] {
  const out = [...mutation.chars];
  for (const index of mutation.touched) {
    const reference = original[Math.min(caseSourceIndex(mutation, index), original.length - 1)];
    out[index] = matchCase(out[index], reference);
  }
  return out;
}
