/**
 * Experiment / trial types
 */

import type { ChainResult } from './chain.js';

export interface DistanceSet {
  cosine: number;
  euclidean: number;
  manhattan: number;
}

export interface TrialRecord {
  readonly sentenceId: string;
  readonly sentenceText: string;
  readonly agentId: string;
  readonly errorRateRequested: number;
  readonly errorRateActual?: number;
  readonly chainResult?: ChainResult;
  readonly originalEmbedding?: readonly number[];
  readonly finalEmbedding?: readonly number[];
  readonly distances?: Readonly<DistanceSet>;
  readonly success: boolean;
  readonly errorMessage?: string;
  readonly chainAttempts: number;
  readonly createdAt: string;
}

export interface StoredTrial extends TrialRecord {
  readonly id: string;
}

export interface SentenceRecord {
  id: string;
  text: string;
  wordCount: number;
  createdAt: string;
}

export interface SweepSummary {
  total: number;
  succeeded: number;
  failed: number;
  persisted: number;
  persistFailures: number;
  cancelled: boolean;
  trialIds: string[];
  duration: number;
}

export interface SweepProgress {
  index: number;                  // 1-based combination number
  total: number;
  trialId?: string;
}
