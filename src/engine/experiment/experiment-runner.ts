/**
 * Experiment Runner - sweeps error rates × sentences × agents
 *
 * Each combination is one trial: corrupt, run the chain, embed original and
 * final text, measure distances, persist one record. Trials are isolated:
 * a failing trial is recorded as failed and the sweep moves on. Only
 * configuration problems (unknown agent, bad rate, empty lists) abort the
 * sweep, and they do so before the first trial runs.
 */

import type { ChainResult } from '../types/chain.js';
import type { RandomSource } from '../types/common.js';
import type {
  DistanceSet,
  SweepProgress,
  SweepSummary,
  TrialRecord,
} from '../types/experiment.js';
import type { IEmbeddingProvider } from '../interfaces/embedding-provider.js';
import type { ITrialStore } from '../interfaces/trial-store.js';
import type { AgentRegistry } from '../agents/agent-registry.js';
import type { TranslationAgent } from '../agents/translation-agent.js';
import type { TranslationChain } from '../pipeline/translation-chain.js';
import { allDistances } from '../analysis/distance.js';
import { assertValidRate } from '../corruption/corruption-engine.js';
import { createSeededRandom, nextSeed } from '../utils/random.js';
import { ConfigurationError, errorMessage } from '../errors.js';

export interface ExperimentRunnerConfig {
  registry: AgentRegistry;
  chain: TranslationChain;
  embeddings: IEmbeddingProvider;
  store: ITrialStore;
  /** Seeds the per-sweep random source; omitted means a random seed */
  seed?: number;
  preservePunctuation?: boolean;
  preserveCapitalization?: boolean;
  /** Chain executions per trial until one succeeds */
  chainAttempts?: number;
}

export interface SweepOptions {
  signal?: AbortSignal;
  onTrial?: (record: TrialRecord, progress: SweepProgress) => void;
}

export interface SingleTrialResult {
  record: TrialRecord;
  trialId?: string;
}

type TrialDraft = Omit<TrialRecord, 'sentenceId'>;

function formatRate(rate: number): string {
  return `${Math.round(rate * 1000) / 10}%`;
}

function chainFailureMessage(result: ChainResult): string {
  const failed = result.stageOutputs[result.stageOutputs.length - 1];
  const stage = result.failureStage === undefined ? '?' : String(result.failureStage + 1);
  return `Chain failed at stage ${stage}: ${failed?.errorMessage ?? 'unknown error'}`;
}

export class ExperimentRunner {
  private registry: AgentRegistry;
  private chain: TranslationChain;
  private embeddings: IEmbeddingProvider;
  private store: ITrialStore;
  private seed?: number;
  private preservePunctuation: boolean;
  private preserveCapitalization: boolean;
  private chainAttempts: number;

  constructor(config: ExperimentRunnerConfig) {
    if (config.chainAttempts !== undefined && (!Number.isInteger(config.chainAttempts) || config.chainAttempts < 1)) {
      throw new ConfigurationError(`chainAttempts must be a positive integer, got ${config.chainAttempts}`);
    }
    this.registry = config.registry;
    this.chain = config.chain;
    this.embeddings = config.embeddings;
    this.store = config.store;
    this.seed = config.seed;
    this.preservePunctuation = config.preservePunctuation ?? true;
    this.preserveCapitalization = config.preserveCapitalization ?? true;
    this.chainAttempts = config.chainAttempts ?? 1;
  }

  async runSweep(
    sentences: readonly string[],
    errorRates: readonly number[],
    agentIds: readonly string[],
    options: SweepOptions = {}
  ): Promise<SweepSummary> {
    this.assertSweepConfig(sentences, errorRates, agentIds);

    const startTime = Date.now();
    const random = this.createRandom();
    const agents = new Map<string, TranslationAgent>(agentIds.map((id) => [id, this.registry.create(id)]));
    const embeddingCache = new Map<string, number[]>();

    const total = errorRates.length * sentences.length * agentIds.length;
    const summary: SweepSummary = {
      total,
      succeeded: 0,
      failed: 0,
      persisted: 0,
      persistFailures: 0,
      cancelled: false,
      trialIds: [],
      duration: 0,
    };

    console.log(
      `[Runner] 🚀 Sweep started: ${errorRates.length} rate(s) × ${sentences.length} sentence(s) × ${agentIds.length} agent(s) = ${total} trials`
    );

    let index = 0;
    sweep: for (const rate of errorRates) {
      for (const sentence of sentences) {
        for (const agentId of agentIds) {
          if (options.signal?.aborted) {
            summary.cancelled = true;
            console.warn(`[Runner] ⏹️ Sweep cancelled after ${index}/${total} trials`);
            break sweep;
          }

          index++;
          const agent = agents.get(agentId);
          if (!agent) {
            // assertSweepConfig guarantees every agent exists
            throw new ConfigurationError(`Agent ${agentId} was not created`);
          }

          console.log(`[Runner] 🧪 Trial ${index}/${total}: agent=${agent.id} rate=${formatRate(rate)}`);

          const draft = await this.runTrial(sentence, rate, agent, nextSeed(random), embeddingCache);
          const { record, trialId } = await this.persist(sentence, draft);

          if (record.success) {
            summary.succeeded++;
          } else {
            summary.failed++;
          }
          if (trialId) {
            summary.persisted++;
            summary.trialIds.push(trialId);
          } else {
            summary.persistFailures++;
          }

          this.notifyTrial(options, record, { index, total, trialId });
        }
      }
    }

    summary.duration = Date.now() - startTime;
    console.log(
      `[Runner] 🏁 Sweep finished in ${summary.duration}ms: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.persistFailures} not persisted`
    );
    return summary;
  }

  /**
   * Run one combination through the same path as a sweep
   */
  async runSingle(sentence: string, errorRate: number, agentId: string): Promise<SingleTrialResult> {
    this.assertSweepConfig([sentence], [errorRate], [agentId]);
    const agent = this.registry.create(agentId);
    const draft = await this.runTrial(sentence, errorRate, agent, nextSeed(this.createRandom()), new Map());
    return this.persist(sentence, draft);
  }

  /**
   * Throws ConfigurationError / InvalidRateError / UnknownAgentError for a
   * sweep that could not start. `runSweep` calls it first; callers that
   * start sweeps in the background call it up front.
   */
  assertSweepConfig(
    sentences: readonly string[],
    errorRates: readonly number[],
    agentIds: readonly string[]
  ): void {
    if (sentences.length === 0) {
      throw new ConfigurationError('No sentences to run');
    }
    if (errorRates.length === 0) {
      throw new ConfigurationError('No error rates to run');
    }
    if (agentIds.length === 0) {
      throw new ConfigurationError('No agents to run');
    }
    errorRates.forEach(assertValidRate);
    this.registry.assertKnown(agentIds);
  }

  private createRandom(): RandomSource {
    return createSeededRandom(this.seed ?? Math.floor(Math.random() * 4294967296));
  }

  /**
   * Never throws: anything that goes wrong becomes a failed draft
   */
  private async runTrial(
    sentence: string,
    rate: number,
    agent: TranslationAgent,
    seed: number,
    embeddingCache: Map<string, number[]>
  ): Promise<TrialDraft> {
    const createdAt = new Date().toISOString();
    const spec = {
      targetRate: rate,
      preservePunctuation: this.preservePunctuation,
      preserveCapitalization: this.preserveCapitalization,
      randomSeed: seed,
    };

    let chainResult: ChainResult | undefined;
    let chainAttempts = 0;

    try {
      while (chainAttempts < this.chainAttempts) {
        chainAttempts++;
        chainResult = await this.chain.execute(sentence, spec, agent);
        if (chainResult.success) break;
      }

      if (!chainResult || !chainResult.success || chainResult.finalText === undefined) {
        return Object.freeze({
          sentenceText: sentence,
          agentId: agent.id,
          errorRateRequested: rate,
          errorRateActual: chainResult?.corruption.actualRate,
          chainResult,
          success: false,
          errorMessage: chainResult ? chainFailureMessage(chainResult) : 'Chain did not run',
          chainAttempts,
          createdAt,
        });
      }

      const originalEmbedding = await this.embed(sentence, embeddingCache);
      const finalEmbedding = await this.embeddings.embed(chainResult.finalText);
      const distances: DistanceSet = allDistances(originalEmbedding, finalEmbedding);

      return Object.freeze({
        sentenceText: sentence,
        agentId: agent.id,
        errorRateRequested: rate,
        errorRateActual: chainResult.corruption.actualRate,
        chainResult,
        originalEmbedding,
        finalEmbedding,
        distances: Object.freeze(distances),
        success: true,
        chainAttempts,
        createdAt,
      });
    } catch (error) {
      console.error(`[Runner] ❌ Trial failed (agent=${agent.id}, rate=${formatRate(rate)}): ${errorMessage(error)}`);
      return Object.freeze({
        sentenceText: sentence,
        agentId: agent.id,
        errorRateRequested: rate,
        errorRateActual: chainResult?.corruption.actualRate,
        chainResult,
        success: false,
        errorMessage: errorMessage(error),
        chainAttempts,
        createdAt,
      });
    }
  }

  private async embed(text: string, cache: Map<string, number[]>): Promise<number[]> {
    const cached = cache.get(text);
    if (cached) return cached;
    const vector = await this.embeddings.embed(text);
    cache.set(text, vector);
    return vector;
  }

  /**
   * Resolve the sentence id and write the record once. Storage failures are
   * logged and reported through a missing trialId.
   */
  private async persist(sentence: string, draft: TrialDraft): Promise<SingleTrialResult> {
    let sentenceId = '';
    try {
      sentenceId = await this.store.getOrCreateSentence(sentence);
      const record: TrialRecord = Object.freeze({ sentenceId, ...draft });
      const trialId = await this.store.write(record);
      return { record, trialId };
    } catch (error) {
      console.error(`[Runner] 💾 Failed to persist trial (agent=${draft.agentId}): ${errorMessage(error)}`);
      return { record: Object.freeze({ sentenceId, ...draft }) };
    }
  }

  private notifyTrial(options: SweepOptions, record: TrialRecord, progress: SweepProgress): void {
    if (!options.onTrial) return;
    try {
      options.onTrial(record, progress);
    } catch (error) {
      console.warn(`[Runner] onTrial observer threw, ignoring: ${errorMessage(error)}`);
    }
  }
}
