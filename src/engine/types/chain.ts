/**
 * Translation chain types
 */

import type { CorruptionResult } from './corruption.js';
import type { TranslationOutcome } from './translation.js';

export type ChainState =
  | 'PENDING'
  | 'CORRUPTING'
  | 'STAGE_1'
  | 'STAGE_2'
  | 'STAGE_3'
  | 'DONE'
  | 'FAILED';

export type StageIndex = 0 | 1 | 2;

export interface ChainResult {
  readonly agentId: string;
  readonly originalText: string;
  readonly corruptedText: string;
  readonly corruption: CorruptionResult;
  readonly stageOutputs: readonly TranslationOutcome[];
  readonly success: boolean;
  readonly failureStage?: StageIndex;
  readonly finalText?: string;
  readonly stateTrace: readonly ChainState[];
  readonly totalDuration: number;
}
