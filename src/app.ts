/**
 * Drift Lab API - Express application
 *
 * JSON only: status, stored trials, statistics, analysis, the sentence
 * corpus and background sweeps.
 */

import express from 'express';
import cors from 'cors';
import type { Request, Response } from 'express';
import type { AppConfig } from './config.js';
import { hasAIProvider } from './config.js';
import type { TrialDatabase, TrialFilters } from './storage/database.js';
import type { AgentRegistry } from './engine/agents/agent-registry.js';
import type { ExperimentRunner } from './engine/experiment/experiment-runner.js';
import type { DistanceMetric } from './engine/analysis/distance.js';
import type { SentenceCorpus } from './services/sentences.js';
import { SweepTracker } from './services/experiment-service.js';
import { analyzeTrials } from './engine/analysis/trial-analysis.js';
import { ConfigurationError, ValidationError, errorMessage } from './engine/errors.js';

export interface AppDependencies {
  config: AppConfig;
  store: TrialDatabase;
  registry: AgentRegistry;
  runner: ExperimentRunner;
  corpus: SentenceCorpus;
  tracker?: SweepTracker;
}

interface ExperimentRequest {
  agents: string[];
  rates: number[];
  sentences: string[];
}

const METRICS: readonly DistanceMetric[] = ['cosine', 'euclidean', 'manhattan'];

function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof ValidationError || error instanceof ConfigurationError) {
    res.status(400).json({ error: error.message });
    return;
  }
  console.error(`[API] ${fallback}:`, error);
  res.status(500).json({ error: errorMessage(error) || fallback });
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Parse trial filters from the query string; rate is a fraction (0.25)
 */
export function parseTrialFilters(req: Request): TrialFilters {
  const filters: TrialFilters = {};
  const agent = queryString(req, 'agent');
  const rate = queryString(req, 'rate');
  const success = queryString(req, 'success');

  if (agent) filters.agentId = agent;
  if (rate !== undefined) {
    const parsed = Number(rate);
    if (!Number.isFinite(parsed)) {
      throw new ValidationError('INVALID_FILTER', `Invalid rate filter: ${rate}`);
    }
    filters.errorRate = parsed;
  }
  if (success !== undefined) {
    if (success !== 'true' && success !== 'false') {
      throw new ValidationError('INVALID_FILTER', `success must be "true" or "false", got ${success}`);
    }
    filters.success = success === 'true';
  }
  return filters;
}

/**
 * Body: { agents?: string[], rates?: number[] (percent), count?: number }
 */
function parseExperimentRequest(body: unknown, deps: AppDependencies): ExperimentRequest {
  const input: Record<string, unknown> = typeof body === 'object' && body !== null ? { ...body } : {};

  let agents = deps.config.experiment.agents;
  if (input.agents !== undefined) {
    if (!isStringArray(input.agents)) {
      throw new ValidationError('INVALID_REQUEST', 'agents must be an array of strings');
    }
    agents = input.agents;
  }

  let rates = deps.config.experiment.errorRates;
  if (input.rates !== undefined) {
    if (!isNumberArray(input.rates)) {
      throw new ValidationError('INVALID_REQUEST', 'rates must be an array of percentages');
    }
    rates = input.rates.map((rate) => rate / 100);
  }

  let count = deps.config.storage.sentenceCount;
  if (input.count !== undefined) {
    if (typeof input.count !== 'number' || !Number.isInteger(input.count) || input.count < 1) {
      throw new ValidationError('INVALID_REQUEST', 'count must be a positive integer');
    }
    count = input.count;
  }

  const sentences = deps.corpus.getSentences(count);
  deps.runner.assertSweepConfig(sentences, rates, agents);

  return { agents, rates, sentences };
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const tracker = deps.tracker ?? new SweepTracker();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // ============ Status ============

  app.get('/api/status', (_req, res) => {
    res.json({
      status: 'ok',
      offline: !hasAIProvider(deps.config),
      agents: deps.registry.ids(),
      embeddings: deps.config.embeddings.provider,
      chainLanguages: deps.config.experiment.chainLanguages,
      sweepRunning: tracker.isRunning,
    });
  });

  // Availability of every backend (or of the comma-separated `ids`): CLI agents run
  // `--version`, OpenAI-compatible ones list models
  app.get('/api/agents', async (req, res) => {
    try {
      const ids = queryString(req, 'ids')
        ?.split(',')
        .map((id) => id.trim())
        .filter(Boolean);
      res.json({ agents: await deps.registry.checkAvailability(ids) });
    } catch (error) {
      sendError(res, error, 'Failed to check agents');
    }
  });

  // ============ Trials ============

  app.get('/api/trials', async (req, res) => {
    try {
      const trials = await deps.store.queryTrials(parseTrialFilters(req));
      res.json({ count: trials.length, trials });
    } catch (error) {
      sendError(res, error, 'Failed to query trials');
    }
  });

  app.get('/api/trials/:id', async (req, res) => {
    try {
      const trial = await deps.store.getTrial(req.params.id);
      if (!trial) {
        res.status(404).json({ error: 'Trial not found' });
        return;
      }
      res.json(trial);
    } catch (error) {
      sendError(res, error, 'Failed to get trial');
    }
  });

  app.delete('/api/trials/:id', async (req, res) => {
    try {
      const deleted = await deps.store.deleteTrial(req.params.id);
      if (!deleted) {
        res.status(404).json({ error: 'Trial not found' });
        return;
      }
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, 'Failed to delete trial');
    }
  });

  // ============ Statistics ============

  app.get('/api/stats', async (_req, res) => {
    try {
      res.json(await deps.store.getStatistics());
    } catch (error) {
      sendError(res, error, 'Failed to compute statistics');
    }
  });

  app.get('/api/analysis', async (req, res) => {
    try {
      const requested = queryString(req, 'metric') ?? 'cosine';
      const metric = METRICS.find((m) => m === requested);
      if (!metric) {
        res.status(400).json({ error: `Unknown metric: ${requested}. Use ${METRICS.join(', ')}` });
        return;
      }
      res.json(analyzeTrials(await deps.store.readAll(), metric));
    } catch (error) {
      sendError(res, error, 'Failed to analyze trials');
    }
  });

  // ============ Sentences ============

  app.get('/api/sentences', (_req, res) => {
    res.json({
      sentences: deps.corpus.getSentences(),
      statistics: deps.corpus.getStatistics(),
    });
  });

  // ============ Experiments ============

  app.post('/api/experiments', (req, res) => {
    let request: ExperimentRequest;
    try {
      request = parseExperimentRequest(req.body, deps);
    } catch (error) {
      sendError(res, error, 'Invalid experiment request');
      return;
    }

    const state = tracker.start((signal, onTrial) =>
      deps.runner.runSweep(request.sentences, request.rates, request.agents, { signal, onTrial })
    );
    if (!state) {
      res.status(409).json({ error: 'A sweep is already running' });
      return;
    }
    res.status(202).json(state);
  });

  app.get('/api/experiments/current', (_req, res) => {
    const state = tracker.current;
    if (!state) {
      res.status(404).json({ error: 'No sweep has been started' });
      return;
    }
    res.json(state);
  });

  app.post('/api/experiments/current/cancel', (_req, res) => {
    if (!tracker.cancel()) {
      res.status(409).json({ error: 'No sweep is running' });
      return;
    }
    res.json({ cancelling: true });
  });

  return app;
}
