/**
 * Drift Engine - measures semantic drift of misspelled sentences
 *
 * A sentence is corrupted to a target misspelling rate, translated through
 * a three-language round trip and compared with the original in embedding
 * space:
 * 1. Corrupt: deterministic, seeded misspellings
 * 2. Chain: source → intermediate → intermediate → source
 * 3. Measure: cosine / euclidean / manhattan distance
 *
 * @module drift-engine
 */

// Types
export type {
  Language,
  ChainRoute,
  BackoffStrategy,
  RetryPolicy,
  AgentSettings,
  RandomSource,
} from './types/common.js';
export type { MutationKind, CorruptionSpec, WordEdit, CorruptionResult } from './types/corruption.js';
export type { TranslationErrorKind, TranslationOutcome, TranslationCall } from './types/translation.js';
export type { ChainState, StageIndex, ChainResult } from './types/chain.js';
export type {
  DistanceSet,
  TrialRecord,
  StoredTrial,
  SentenceRecord,
  SweepSummary,
  SweepProgress,
} from './types/experiment.js';
export {
  SUPPORTED_LANGUAGES,
  LANGUAGE_NAMES,
  DEFAULT_ROUTE,
  DEFAULT_AGENT_SETTINGS,
  isSupportedLanguage,
} from './types/common.js';

// Interfaces
export type {
  ITranslator,
  TranslatorConfig,
  TranslatorRequest,
  TranslatorResponse,
} from './interfaces/translator.js';
export type { IEmbeddingProvider } from './interfaces/embedding-provider.js';
export type { ITrialStore } from './interfaces/trial-store.js';

// Errors
export * from './errors.js';

// Corruption
export {
  CorruptionEngine,
  assertValidRate,
  measureErrorRate,
  splitAffixes,
  wordsToCorrupt,
  type CorruptionEngineOptions,
} from './corruption/corruption-engine.js';
export { MUTATION_KINDS, applicableKinds, mutate } from './corruption/mutations.js';

// Providers
export { OpenAITranslator, classifyOpenAIError, type OpenAITranslatorConfig } from './providers/openai.js';
export { CliTranslator, type CliTranslatorConfig } from './providers/cli.js';
export { EchoTranslator } from './providers/echo.js';
export { OpenAIEmbeddingProvider } from './providers/openai-embeddings.js';
export { HashingEmbeddingProvider } from './providers/hashing-embeddings.js';

// Agents
export { TranslationAgent, validateTranslationInput, type TranslationAgentOptions } from './agents/translation-agent.js';
export { AgentRegistry, type TranslatorFactory, type AgentRegistryOptions } from './agents/agent-registry.js';
export { createLoggingHooks, notifyHooks, type AgentHooks, type HookName } from './agents/hooks.js';

// Chain
export {
  TranslationChain,
  ChainStateMachine,
  validateRoute,
  type ChainAgent,
  type TranslationChainConfig,
  type ChainExecuteOptions,
} from './pipeline/translation-chain.js';

// Analysis
export {
  DistanceMetrics,
  cosineDistance,
  euclideanDistance,
  manhattanDistance,
  allDistances,
  type DistanceMetric,
} from './analysis/distance.js';
export {
  descriptiveStats,
  groupValues,
  groupStatistics,
  pearson,
  spearman,
  linearRegression,
  cohensD,
  type DescriptiveStats,
  type GroupStats,
  type RegressionResult,
} from './analysis/statistics.js';
export {
  SIGNIFICANCE_LEVEL,
  confidenceInterval,
  tTestIndependent,
  anovaOneWay,
  leveneTest,
  correlationTest,
  sensitivityAnalysis,
  type ConfidenceInterval,
  type TestResult,
  type TTestResult,
  type AnovaResult,
  type CorrelationTest,
  type CorrelationMethod,
  type SensitivityEntry,
} from './analysis/inference.js';
export {
  analyzeTrials,
  type GroupSummary,
  type RateContrast,
  type TrialAnalysis,
} from './analysis/trial-analysis.js';

// Experiment
export {
  ExperimentRunner,
  type ExperimentRunnerConfig,
  type SweepOptions,
  type SingleTrialResult,
} from './experiment/experiment-runner.js';

// Utils
export { createSeededRandom, nextSeed, randomInt, randomChoice, sampleWithoutReplacement } from './utils/random.js';
export { withRetry, withTimeout, retryDelay, sleep } from './utils/retry.js';

// Prompts
export { TRANSLATOR_SYSTEM_PROMPT, createTranslationPrompt, createStandalonePrompt } from './prompts/translator.js';
