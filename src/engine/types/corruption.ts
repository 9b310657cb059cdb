/**
 * Corruption types
 */

export type MutationKind = 'swap' | 'delete' | 'insert' | 'substitute';

export interface CorruptionSpec {
  targetRate: number;             // fraction of words to misspell, [0, 1]
  preservePunctuation: boolean;
  preserveCapitalization: boolean;
  randomSeed?: number;
}

export interface WordEdit {
  index: number;                  // word index in the sentence
  original: string;
  corrupted: string;
  kind: MutationKind;
  position: number;               // character offset inside the mutated span
}

export interface CorruptionResult {
  originalText: string;
  corruptedText: string;
  targetRate: number;
  actualRate: number;             // edits.length / wordCount
  wordCount: number;
  edits: WordEdit[];
}
