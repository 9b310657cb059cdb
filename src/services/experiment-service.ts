/**
 * Experiment service - wires configuration into the engine
 *
 * Without an OpenAI key the lab runs offline: the echo agent and hashing
 * embeddings stand in for hosted models.
 */

import type { AppConfig } from '../config.js';
import { hasAIProvider } from '../config.js';
import type { ITrialStore } from '../engine/interfaces/trial-store.js';
import type { IEmbeddingProvider } from '../engine/interfaces/embedding-provider.js';
import type { SweepProgress, SweepSummary, TrialRecord } from '../engine/types/experiment.js';
import type { Sleep } from '../engine/utils/retry.js';
import { AgentRegistry } from '../engine/agents/agent-registry.js';
import { createLoggingHooks, type AgentHooks } from '../engine/agents/hooks.js';
import { CorruptionEngine } from '../engine/corruption/corruption-engine.js';
import { TranslationChain } from '../engine/pipeline/translation-chain.js';
import { ExperimentRunner } from '../engine/experiment/experiment-runner.js';
import { OpenAITranslator } from '../engine/providers/openai.js';
import { CliTranslator } from '../engine/providers/cli.js';
import { EchoTranslator } from '../engine/providers/echo.js';
import { OpenAIEmbeddingProvider } from '../engine/providers/openai-embeddings.js';
import { HashingEmbeddingProvider } from '../engine/providers/hashing-embeddings.js';
import { errorMessage } from '../engine/errors.js';

export interface RegistryOptions {
  hooks?: AgentHooks[];
  sleep?: Sleep;
}

/**
 * Register every agent type the configuration can serve.
 * `openai` needs an API key; the CLI agents fail at call time when their
 * binary is missing.
 */
export function createAgentRegistry(config: AppConfig, options: RegistryOptions = {}): AgentRegistry {
  const registry = new AgentRegistry({
    defaults: config.agent,
    hooks: options.hooks ?? [createLoggingHooks()],
    sleep: options.sleep,
  });

  registry.register('echo', () => new EchoTranslator(), { maxAttempts: 1, retryDelayMs: 0 });

  if (hasAIProvider(config)) {
    registry.register('openai', () =>
      new OpenAITranslator({
        apiKey: config.openai.apiKey,
        model: config.openai.model,
        baseUrl: config.openai.baseUrl,
      })
    );
  }

  registry.register('ollama', () =>
    new OpenAITranslator({
      name: 'ollama',
      // Ollama ignores the key but the SDK requires one
      apiKey: 'ollama',
      model: config.ollama.model,
      baseUrl: config.ollama.baseUrl,
    })
  );

  registry.register('claude', () => new CliTranslator({ name: 'claude', command: config.cli.claude, args: ['-p'] }));
  registry.register('gemini', () => new CliTranslator({ name: 'gemini', command: config.cli.gemini, args: ['-p'] }));
  registry.register('cursor', () => new CliTranslator({ name: 'cursor', command: config.cli.cursor, args: ['-p'] }));

  return registry;
}

export function createEmbeddingProvider(config: AppConfig): IEmbeddingProvider {
  if (config.embeddings.provider === 'openai') {
    return new OpenAIEmbeddingProvider({
      apiKey: config.openai.apiKey,
      model: config.embeddings.model,
      baseUrl: config.openai.baseUrl,
      dimensions: config.embeddings.dimensions,
    });
  }
  return new HashingEmbeddingProvider(config.embeddings.dimensions);
}

export interface ExperimentServiceOverrides extends RegistryOptions {
  registry?: AgentRegistry;
  embeddings?: IEmbeddingProvider;
}

export function createExperimentRunner(
  config: AppConfig,
  store: ITrialStore,
  overrides: ExperimentServiceOverrides = {}
): ExperimentRunner {
  const chain = new TranslationChain({
    route: config.experiment.chainLanguages,
    engine: new CorruptionEngine(),
  });

  return new ExperimentRunner({
    registry: overrides.registry ?? createAgentRegistry(config, overrides),
    chain,
    embeddings: overrides.embeddings ?? createEmbeddingProvider(config),
    store,
    seed: config.experiment.seed,
    preservePunctuation: config.experiment.preservePunctuation,
    preserveCapitalization: config.experiment.preserveCapitalization,
    chainAttempts: config.experiment.chainAttempts,
  });
}

// ============ Background sweeps ============

export type SweepStatus = 'running' | 'completed' | 'cancelled' | 'failed';

export interface SweepState {
  id: number;
  status: SweepStatus;
  startedAt: string;
  finishedAt?: string;
  progress: { index: number; total: number; succeeded: number; failed: number };
  summary?: SweepSummary;
  error?: string;
}

export type SweepJob = (
  signal: AbortSignal,
  onTrial: (record: TrialRecord, progress: SweepProgress) => void
) => Promise<SweepSummary>;

/**
 * Runs at most one sweep at a time in the background and exposes its state
 */
export class SweepTracker {
  private state: SweepState | null = null;
  private controller: AbortController | null = null;
  private pending: Promise<void> = Promise.resolve();
  private nextId = 1;

  get current(): SweepState | null {
    return this.state ? { ...this.state, progress: { ...this.state.progress } } : null;
  }

  get isRunning(): boolean {
    return this.state?.status === 'running';
  }

  /**
   * Start a sweep; returns null while another one is running
   */
  start(job: SweepJob): SweepState | null {
    if (this.isRunning) return null;

    const controller = new AbortController();
    const state: SweepState = {
      id: this.nextId++,
      status: 'running',
      startedAt: new Date().toISOString(),
      progress: { index: 0, total: 0, succeeded: 0, failed: 0 },
    };
    this.state = state;
    this.controller = controller;

    const onTrial = (record: TrialRecord, progress: SweepProgress): void => {
      state.progress.index = progress.index;
      state.progress.total = progress.total;
      if (record.success) {
        state.progress.succeeded++;
      } else {
        state.progress.failed++;
      }
    };

    this.pending = job(controller.signal, onTrial).then(
      (summary) => {
        state.summary = summary;
        state.status = summary.cancelled ? 'cancelled' : 'completed';
        state.finishedAt = new Date().toISOString();
      },
      (error: unknown) => {
        state.error = errorMessage(error);
        state.status = 'failed';
        state.finishedAt = new Date().toISOString();
        console.error(`[Sweep] ❌ Sweep ${state.id} failed: ${state.error}`);
      }
    );

    console.log(`[Sweep] 🚀 Sweep ${state.id} started`);
    return this.current;
  }

  /**
   * Request cooperative cancellation; false when nothing is running
   */
  cancel(): boolean {
    if (!this.isRunning || !this.controller) return false;
    this.controller.abort();
    console.log(`[Sweep] ⏹️ Cancellation requested for sweep ${this.state?.id}`);
    return true;
  }

  /** Resolves when the current sweep has settled */
  wait(): Promise<void> {
    return this.pending;
  }
}
