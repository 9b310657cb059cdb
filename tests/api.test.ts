import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { SentenceCorpus } from '../src/services/sentences.js';
import { SweepTracker, createAgentRegistry, createExperimentRunner } from '../src/services/experiment-service.js';
import { createMemoryDatabase, type TrialDatabase } from '../src/storage/database.js';

const SENTENCES = [
  'The small bakery on the corner sells fresh bread every morning before most people in town wake up',
  'Several volunteers cleaned the river bank on Sunday and collected more rubbish than anyone had expected',
];

describe('Drift Lab API', () => {
  let server: Server;
  let baseUrl: string;
  let store: TrialDatabase;
  const tracker = new SweepTracker();

  beforeAll(async () => {
    const config = loadConfig({ EXPERIMENT_SEED: '11', ERROR_RATES: '0,25' });
    store = await createMemoryDatabase();
    const registry = createAgentRegistry(config, { hooks: [] });
    const runner = createExperimentRunner(config, store, { registry });
    const app = createApp({ config, store, registry, runner, corpus: new SentenceCorpus(SENTENCES), tracker });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await tracker.wait();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('reports status in offline mode', async () => {
    const res = await fetch(`${baseUrl}/api/status`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      offline: true,
      embeddings: 'hashing',
      chainLanguages: ['en', 'fr', 'he'],
      sweepRunning: false,
    });
  });

  it('reports agent availability for the requested ids', async () => {
    const res = await fetch(`${baseUrl}/api/agents?ids=echo`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ agents: { echo: true } });
    expect((await fetch(`${baseUrl}/api/agents?ids=echo,nope`)).status).toBe(400);
  });

  it('returns 404 for an unknown trial and before any sweep', async () => {
    expect((await fetch(`${baseUrl}/api/trials/missing`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/api/experiments/current`)).status).toBe(404);
    expect((await post('/api/experiments/current/cancel', {})).status).toBe(409);
  });

  it('validates sweep requests before starting', async () => {
    const unknown = await post('/api/experiments', { agents: ['nope'] });
    expect(unknown.status).toBe(400);
    expect(await unknown.json()).toEqual({
      error: 'Unsupported agent type: nope. Supported types: echo, ollama, claude, gemini, cursor',
    });

    expect((await post('/api/experiments', { rates: [10, 150] })).status).toBe(400);
    expect((await post('/api/experiments', { count: 0 })).status).toBe(400);
    expect((await post('/api/experiments', { agents: 'echo' })).status).toBe(400);

    const noRates = await post('/api/experiments', { rates: [] });
    expect(noRates.status).toBe(400);
    expect(await noRates.json()).toEqual({ error: 'No error rates to run' });
  });

  it('runs a sweep in the background and serves its trials', async () => {
    const started = await post('/api/experiments', { agents: ['echo'], rates: [0, 50], count: 2 });
    expect(started.status).toBe(202);
    expect(await started.json()).toMatchObject({ id: 1, status: 'running' });

    await tracker.wait();

    const current = await fetch(`${baseUrl}/api/experiments/current`);
    expect(await current.json()).toMatchObject({
      status: 'completed',
      progress: { index: 4, total: 4, succeeded: 4, failed: 0 },
    });

    const trials = await fetch(`${baseUrl}/api/trials?rate=0.5`);
    const body: unknown = await trials.json();
    expect(body).toMatchObject({ count: 2 });

    const stats = await fetch(`${baseUrl}/api/stats`);
    expect(await stats.json()).toMatchObject({ totalTrials: 4, successful: 4, errorRates: [0, 0.5] });

    const analysis = await fetch(`${baseUrl}/api/analysis?metric=euclidean`);
    const report: unknown = await analysis.json();
    expect(report).toMatchObject({
      totalTrials: 4,
      metric: 'euclidean',
      byErrorRate: [{ group: '0%', count: 2 }, { group: '50%', count: 2 }],
      rateContrast: { lowest: '0%', highest: '50%', tTest: { df: 2 } },
      rateEffect: { dfBetween: 1, dfWithin: 2 },
    });
    expect(report).toHaveProperty('sensitivity.length', 3);
  });

  it('rejects bad filters and metrics', async () => {
    expect((await fetch(`${baseUrl}/api/trials?success=maybe`)).status).toBe(400);
    expect((await fetch(`${baseUrl}/api/trials?rate=abc`)).status).toBe(400);
    expect((await fetch(`${baseUrl}/api/analysis?metric=jaccard`)).status).toBe(400);
  });

  it('deletes a stored trial', async () => {
    const [first] = await store.readAll();

    const res = await fetch(`${baseUrl}/api/trials/${first.id}`, { method: 'DELETE' });

    expect(res.status).toBe(200);
    expect(await store.getTrial(first.id)).toBeNull();
    expect((await fetch(`${baseUrl}/api/trials/${first.id}`, { method: 'DELETE' })).status).toBe(404);
  });

  it('lists the sentence corpus', async () => {
    const res = await fetch(`${baseUrl}/api/sentences`);

    expect(await res.json()).toMatchObject({ sentences: SENTENCES, statistics: { totalSentences: 2 } });
  });
});
