/**
 * Trial store interface - the persistence boundary of the experiment runner
 */

import type { StoredTrial, TrialRecord } from '../types/experiment.js';

export interface ITrialStore {
  /**
   * Persist one trial atomically and return its id.
   * A failed write must leave no trace of the record.
   */
  write(record: TrialRecord): Promise<string>;

  readAll(): Promise<StoredTrial[]>;

  /** Idempotent: the same text always maps to the same sentence id */
  getOrCreateSentence(text: string): Promise<string>;
}
