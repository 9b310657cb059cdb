import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Adapter } from 'lowdb';
import {
  DB_FILENAME,
  createMemoryDatabase,
  initDatabase,
  type DatabaseSchema,
  type TrialDatabase,
} from '../src/storage/database.js';
import { StorageError } from '../src/engine/errors.js';
import type { TrialRecord } from '../src/engine/types/experiment.js';

function record(overrides: Partial<TrialRecord> = {}): TrialRecord {
  return {
    sentenceId: 's1',
    sentenceText: 'A short placeholder sentence for storage tests.',
    agentId: 'echo',
    errorRateRequested: 0.25,
    errorRateActual: 0.25,
    success: true,
    distances: { cosine: 0.1, euclidean: 0.4, manhattan: 1.2 },
    chainAttempts: 1,
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/**
 * In-memory adapter whose writes can be switched to fail
 */
class FlakyAdapter implements Adapter<DatabaseSchema> {
  failWrites = false;
  saved: DatabaseSchema | null = null;

  async read(): Promise<DatabaseSchema | null> {
    return this.saved;
  }

  async write(data: DatabaseSchema): Promise<void> {
    if (this.failWrites) {
      throw new Error('EIO: i/o error');
    }
    this.saved = JSON.parse(JSON.stringify(data));
  }
}

describe('TrialDatabase', () => {
  let db: TrialDatabase;

  beforeEach(async () => {
    db = await createMemoryDatabase();
  });

  it('writes trials and assigns ids', async () => {
    const id = await db.write(record());

    const all = await db.readAll();
    expect(all).toHaveLength(1);
    expect(all[0].id).toBe(id);
    expect(all[0].agentId).toBe('echo');
    expect(await db.getTrial(id)).toEqual(all[0]);
    expect(await db.getTrial('missing')).toBeNull();
  });

  it('maps the same sentence text to the same id', async () => {
    const first = await db.getOrCreateSentence('one two three');
    const second = await db.getOrCreateSentence('one two three');
    const other = await db.getOrCreateSentence('four five');

    expect(second).toBe(first);
    expect(other).not.toBe(first);
    const sentences = await db.getSentences();
    expect(sentences.map((s) => [s.text, s.wordCount])).toEqual([
      ['one two three', 3],
      ['four five', 2],
    ]);
  });

  it('queries by agent, rate and success', async () => {
    await db.write(record({ agentId: 'echo', errorRateRequested: 0 }));
    await db.write(record({ agentId: 'openai', errorRateRequested: 0.25 }));
    await db.write(record({ agentId: 'openai', errorRateRequested: 0.5, success: false }));

    expect(await db.getTrialsByAgent('openai')).toHaveLength(2);
    expect((await db.getTrialsByErrorRate(0.252)).map((t) => t.agentId)).toEqual(['openai']);
    expect(await db.queryTrials({ agentId: 'openai', success: true })).toHaveLength(1);
    expect(await db.countByAgent()).toEqual({ echo: 1, openai: 2 });
  });

  it('reports statistics', async () => {
    await db.getOrCreateSentence('one two three');
    await db.write(record({ errorRateRequested: 0.5 }));
    await db.write(record({ errorRateRequested: 0, success: false }));

    expect(await db.getStatistics()).toEqual({
      totalTrials: 2,
      successful: 1,
      failed: 1,
      totalSentences: 1,
      trialsByAgent: { echo: 2 },
      errorRates: [0, 0.5],
    });
  });

  it('deletes single trials and clears everything', async () => {
    const keep = await db.write(record());
    const drop = await db.write(record());

    expect(await db.deleteTrial(drop)).toBe(true);
    expect(await db.deleteTrial(drop)).toBe(false);
    expect((await db.readAll()).map((t) => t.id)).toEqual([keep]);

    vi.spyOn(console, 'log').mockImplementation(() => {});
    await db.clearAll();
    expect(await db.readAll()).toEqual([]);
    expect(await db.getSentences()).toEqual([]);
    vi.restoreAllMocks();
  });

  it('rolls back a trial whose write fails', async () => {
    const adapter = new FlakyAdapter();
    const flaky = await createMemoryDatabase(adapter);
    await flaky.write(record({ agentId: 'first' }));

    adapter.failWrites = true;
    await expect(flaky.write(record({ agentId: 'second' }))).rejects.toThrow(StorageError);

    expect((await flaky.readAll()).map((t) => t.agentId)).toEqual(['first']);
    expect(adapter.saved?.trials.map((t) => t.agentId)).toEqual(['first']);

    adapter.failWrites = false;
    await flaky.write(record({ agentId: 'third' }));
    expect((await flaky.readAll()).map((t) => t.agentId)).toEqual(['first', 'third']);
  });

  it('rolls back a sentence whose write fails', async () => {
    const adapter = new FlakyAdapter();
    const flaky = await createMemoryDatabase(adapter);

    adapter.failWrites = true;
    await expect(flaky.getOrCreateSentence('never stored')).rejects.toThrow(StorageError);
    expect(await flaky.getSentences()).toEqual([]);
  });
});

describe('initDatabase', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'drift-db-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('persists trials to a JSON file', async () => {
    const db = await initDatabase(dir);
    const id = await db.write(record());

    const reopened = await initDatabase(dir);
    expect((await reopened.readAll()).map((t) => t.id)).toEqual([id]);

    const onDisk: unknown = JSON.parse(fs.readFileSync(path.join(dir, DB_FILENAME), 'utf-8'));
    expect(onDisk).toMatchObject({ trials: [{ id, agentId: 'echo' }] });
  });

  it('creates a missing data directory', async () => {
    const nested = path.join(dir, 'nested', 'data');

    await initDatabase(nested);

    expect(fs.existsSync(nested)).toBe(true);
  });
});
