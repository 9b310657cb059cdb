/**
 * Database layer using LowDB
 *
 * Trials and sentences live in one JSON document. The JSONFile adapter
 * writes through a temp file and a rename, so a trial is either fully on
 * disk or absent. Writes are queued, and the in-memory document is rolled
 * back when a write fails.
 */

import { Low, Memory } from 'lowdb';
import type { Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { randomUUID } from 'crypto';
import path from 'path';
import fs from 'fs';
import type { ITrialStore } from '../engine/interfaces/trial-store.js';
import type { SentenceRecord, StoredTrial, TrialRecord } from '../engine/types/experiment.js';
import { StorageError, errorMessage } from '../engine/errors.js';

export interface DatabaseSchema {
  sentences: SentenceRecord[];
  trials: StoredTrial[];
}

export interface TrialFilters {
  agentId?: string;
  errorRate?: number;
  success?: boolean;
  sentenceId?: string;
}

export interface StoreStatistics {
  totalTrials: number;
  successful: number;
  failed: number;
  totalSentences: number;
  trialsByAgent: Record<string, number>;
  errorRates: number[];
}

/** Requested rates are compared with this tolerance (0.25 vs 0.2500001) */
const RATE_TOLERANCE = 0.005;

export const DB_FILENAME = 'drift-db.json';

function defaultData(): DatabaseSchema {
  return { sentences: [], trials: [] };
}

function countWords(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

export function generateId(): string {
  return randomUUID();
}

export class TrialDatabase implements ITrialStore {
  private db: Low<DatabaseSchema>;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(adapter: Adapter<DatabaseSchema>) {
    this.db = new Low(adapter, defaultData());
  }

  async load(): Promise<void> {
    await this.db.read();
    this.db.data ||= defaultData();
    this.db.data.sentences ||= [];
    this.db.data.trials ||= [];
  }

  /**
   * Run a mutation after every earlier one has settled
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  // ============ Trial Operations ============

  write(record: TrialRecord): Promise<string> {
    return this.serialize(async () => {
      const stored: StoredTrial = { ...record, id: generateId() };
      this.db.data.trials.push(stored);
      try {
        await this.db.write();
      } catch (error) {
        const index = this.db.data.trials.indexOf(stored);
        if (index !== -1) this.db.data.trials.splice(index, 1);
        throw new StorageError(`Failed to write trial: ${errorMessage(error)}`, { cause: error });
      }
      return stored.id;
    });
  }

  async readAll(): Promise<StoredTrial[]> {
    return [...this.db.data.trials];
  }

  async getTrial(id: string): Promise<StoredTrial | null> {
    return this.db.data.trials.find((t) => t.id === id) ?? null;
  }

  async queryTrials(filters: TrialFilters = {}): Promise<StoredTrial[]> {
    return this.db.data.trials.filter((t) => {
      if (filters.agentId !== undefined && t.agentId !== filters.agentId) return false;
      if (filters.sentenceId !== undefined && t.sentenceId !== filters.sentenceId) return false;
      if (filters.success !== undefined && t.success !== filters.success) return false;
      if (
        filters.errorRate !== undefined &&
        Math.abs(t.errorRateRequested - filters.errorRate) > RATE_TOLERANCE
      ) {
        return false;
      }
      return true;
    });
  }

  getTrialsByAgent(agentId: string): Promise<StoredTrial[]> {
    return this.queryTrials({ agentId });
  }

  getTrialsByErrorRate(errorRate: number): Promise<StoredTrial[]> {
    return this.queryTrials({ errorRate });
  }

  async countByAgent(): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const trial of this.db.data.trials) {
      counts[trial.agentId] = (counts[trial.agentId] ?? 0) + 1;
    }
    return counts;
  }

  async getStatistics(): Promise<StoreStatistics> {
    const trials = this.db.data.trials;
    const successful = trials.filter((t) => t.success).length;
    const rates = new Set(trials.map((t) => t.errorRateRequested));
    return {
      totalTrials: trials.length,
      successful,
      failed: trials.length - successful,
      totalSentences: this.db.data.sentences.length,
      trialsByAgent: await this.countByAgent(),
      errorRates: [...rates].sort((a, b) => a - b),
    };
  }

  deleteTrial(id: string): Promise<boolean> {
    return this.serialize(async () => {
      const index = this.db.data.trials.findIndex((t) => t.id === id);
      if (index === -1) return false;
      const [removed] = this.db.data.trials.splice(index, 1);
      try {
        await this.db.write();
      } catch (error) {
        this.db.data.trials.splice(index, 0, removed);
        throw new StorageError(`Failed to delete trial: ${errorMessage(error)}`, { cause: error });
      }
      return true;
    });
  }

  clearAll(): Promise<void> {
    return this.serialize(async () => {
      const previous = this.db.data;
      this.db.data = defaultData();
      try {
        await this.db.write();
      } catch (error) {
        this.db.data = previous;
        throw new StorageError(`Failed to clear database: ${errorMessage(error)}`, { cause: error });
      }
      console.log('[Storage] 🗑️ All trials and sentences cleared');
    });
  }

  // ============ Sentence Operations ============

  getOrCreateSentence(text: string): Promise<string> {
    return this.serialize(async () => {
      const existing = this.db.data.sentences.find((s) => s.text === text);
      if (existing) return existing.id;

      const sentence: SentenceRecord = {
        id: generateId(),
        text,
        wordCount: countWords(text),
        createdAt: new Date().toISOString(),
      };
      this.db.data.sentences.push(sentence);
      try {
        await this.db.write();
      } catch (error) {
        const index = this.db.data.sentences.indexOf(sentence);
        if (index !== -1) this.db.data.sentences.splice(index, 1);
        throw new StorageError(`Failed to write sentence: ${errorMessage(error)}`, { cause: error });
      }
      return sentence.id;
    });
  }

  async getSentences(): Promise<SentenceRecord[]> {
    return [...this.db.data.sentences];
  }
}

/**
 * Initialize the file-backed database
 */
export async function initDatabase(dataDir: string = './data'): Promise<TrialDatabase> {
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  const dbPath = path.join(dataDir, DB_FILENAME);
  const store = new TrialDatabase(new JSONFile<DatabaseSchema>(dbPath));
  await store.load();

  const stats = await store.getStatistics();
  console.log(`📦 Database initialized: ${dbPath}`);
  console.log(`   Trials: ${stats.totalTrials}, sentences: ${stats.totalSentences}`);

  return store;
}

/**
 * In-memory database (tests, dry runs)
 */
export async function createMemoryDatabase(adapter: Adapter<DatabaseSchema> = new Memory<DatabaseSchema>()): Promise<TrialDatabase> {
  const store = new TrialDatabase(adapter);
  await store.load();
  return store;
}
