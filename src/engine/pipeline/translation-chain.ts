/**
 * Translation Chain - corrupts a sentence, then round-trips it through three
 * translation stages:
 *
 *   PENDING → CORRUPTING → STAGE_1 → STAGE_2 → STAGE_3 → DONE
 *                 └──────────┴─────────┴─────────┴──→ FAILED
 *
 * Stage 1: source → intermediate₁
 * Stage 2: intermediate₁ → intermediate₂
 * Stage 3: intermediate₂ → source
 *
 * A failing stage stops the chain; outputs collected so far are kept.
 * The chain never retries: retries live inside the agent, and a fresh
 * attempt of the whole chain is the caller's decision.
 */

import type { ChainRoute, Language } from '../types/common.js';
import type { CorruptionResult, CorruptionSpec } from '../types/corruption.js';
import type { ChainResult, ChainState, StageIndex } from '../types/chain.js';
import type { TranslationErrorKind, TranslationOutcome } from '../types/translation.js';
import { DEFAULT_ROUTE, SUPPORTED_LANGUAGES, isSupportedLanguage } from '../types/common.js';
import {
  ChainStateError,
  ChainValidationError,
  ConfigurationError,
  TranslationError,
  TranslationFailedError,
  UnsupportedLanguageError,
  ValidationError,
  toError,
} from '../errors.js';
import { CorruptionEngine } from '../corruption/corruption-engine.js';

/** What the chain needs from an agent */
export interface ChainAgent {
  readonly id: string;
  translate(text: string, sourceLang: string, targetLang: string): Promise<TranslationOutcome>;
}

export interface TranslationChainConfig {
  route?: readonly string[];
  engine?: CorruptionEngine;
}

export interface ChainExecuteOptions {
  onTransition?: (from: ChainState, to: ChainState) => void;
}

const TRANSITIONS: Record<ChainState, readonly ChainState[]> = {
  PENDING: ['CORRUPTING'],
  CORRUPTING: ['STAGE_1', 'FAILED'],
  STAGE_1: ['STAGE_2', 'FAILED'],
  STAGE_2: ['STAGE_3', 'FAILED'],
  STAGE_3: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

const STAGE_STATES = ['STAGE_1', 'STAGE_2', 'STAGE_3'] as const;
const STAGE_INDICES: readonly StageIndex[] = [0, 1, 2];

/**
 * Tracks the current state and rejects transitions the table does not allow
 */
export class ChainStateMachine {
  private current: ChainState = 'PENDING';
  private trace: ChainState[] = ['PENDING'];
  private onTransition?: (from: ChainState, to: ChainState) => void;

  constructor(onTransition?: (from: ChainState, to: ChainState) => void) {
    this.onTransition = onTransition;
  }

  get state(): ChainState {
    return this.current;
  }

  get history(): readonly ChainState[] {
    return [...this.trace];
  }

  to(next: ChainState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new ChainStateError(this.current, next);
    }
    const previous = this.current;
    this.current = next;
    this.trace.push(next);
    this.onTransition?.(previous, next);
  }
}

function isLanguageRoute(route: readonly string[]): route is ChainRoute {
  return route.length === 3 && route.every(isSupportedLanguage);
}

/**
 * Validate a three-language route; adjacent legs must change language
 */
export function validateRoute(route: readonly string[]): ChainRoute {
  if (!isLanguageRoute(route)) {
    if (route.length !== 3) {
      throw new ConfigurationError(
        `Chain route needs exactly 3 languages (source, intermediate, intermediate), got ${route.length}`
      );
    }
    const unsupported = route.find((code) => !isSupportedLanguage(code)) ?? route.join(',');
    throw new UnsupportedLanguageError(unsupported, SUPPORTED_LANGUAGES);
  }
  const [source, first, second] = route;
  if (source === first || first === second || second === source) {
    throw new ConfigurationError(`Chain route has a leg without a language change: ${route.join(' → ')}`);
  }
  return [source, first, second];
}

function errorKindOf(error: Error): TranslationErrorKind {
  if (error instanceof TranslationError) return error.kind;
  if (error instanceof ValidationError) return 'validation';
  return 'transport';
}

export class TranslationChain {
  readonly route: ChainRoute;

  private engine: CorruptionEngine;

  constructor(config: TranslationChainConfig = {}) {
    this.route = validateRoute(config.route ?? DEFAULT_ROUTE);
    this.engine = config.engine ?? new CorruptionEngine();
  }

  /** Language pair of every stage, in execution order */
  get legs(): ReadonlyArray<readonly [Language, Language]> {
    const [source, first, second] = this.route;
    return [
      [source, first],
      [first, second],
      [second, source],
    ];
  }

  async execute(
    text: string,
    spec: CorruptionSpec,
    agent: ChainAgent,
    options: ChainExecuteOptions = {}
  ): Promise<ChainResult> {
    const startTime = Date.now();
    const machine = new ChainStateMachine(options.onTransition);

    if (!text || text.trim().length === 0) {
      throw new ChainValidationError('Chain input text cannot be empty');
    }

    // ============ CORRUPTION ============
    machine.to('CORRUPTING');
    let corruption: CorruptionResult;
    try {
      corruption = this.engine.corrupt(text, spec);
    } catch (error) {
      machine.to('FAILED');
      throw error;
    }

    if (corruption.corruptedText.trim().length === 0) {
      machine.to('FAILED');
      throw new ChainValidationError('Corruption produced an empty string');
    }

    // ============ STAGES ============
    const stageOutputs: TranslationOutcome[] = [];
    let currentText = corruption.corruptedText;

    const finish = (success: boolean, failureStage?: StageIndex): ChainResult =>
      Object.freeze({
        agentId: agent.id,
        originalText: text,
        corruptedText: corruption.corruptedText,
        corruption,
        stageOutputs: Object.freeze([...stageOutputs]),
        success,
        failureStage,
        finalText: success ? currentText : undefined,
        stateTrace: machine.history,
        totalDuration: Date.now() - startTime,
      });

    for (const index of STAGE_INDICES) {
      const [from, to] = this.legs[index];
      machine.to(STAGE_STATES[index]);

      const outcome = await this.runStage(agent, currentText, from, to);
      stageOutputs.push(outcome);

      if (!outcome.success) {
        console.warn(
          `[Chain] ❌ Stage ${index + 1} (${from} → ${to}) failed for agent ${agent.id}: ${outcome.errorMessage ?? 'unknown error'}`
        );
        machine.to('FAILED');
        return finish(false, index);
      }

      currentText = outcome.outputText;
    }

    machine.to('DONE');
    return finish(true);
  }

  /**
   * Run one stage; a thrown agent error becomes a failed outcome
   */
  private async runStage(
    agent: ChainAgent,
    text: string,
    from: Language,
    to: Language
  ): Promise<TranslationOutcome> {
    const startTime = Date.now();
    try {
      return await agent.translate(text, from, to);
    } catch (caught) {
      const error = toError(caught);
      return Object.freeze({
        inputText: text,
        outputText: '',
        sourceLang: from,
        targetLang: to,
        agentId: agent.id,
        duration: Date.now() - startTime,
        success: false,
        errorKind: errorKindOf(error),
        errorMessage: error.message,
        attempts: error instanceof TranslationFailedError ? error.attempts : error instanceof ValidationError ? 0 : 1,
        metadata: Object.freeze({ errorName: error.name }),
        timestamp: new Date().toISOString(),
      });
    }
  }
}
