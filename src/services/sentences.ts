/**
 * Sentence corpus - the English sentences an experiment runs on
 *
 * File format: { "sentences": [{ "text": "...", "wordCount": 17 }, ...] }
 * (plain strings in the array are accepted too).
 */

import fs from 'fs/promises';
import path from 'path';
import { ValidationError } from '../engine/errors.js';

export const MIN_WORDS = 15;

export interface SentenceValidation {
  valid: boolean;
  wordCount: number;
  charCount: number;
  message: string;
}

export interface CorpusStatistics {
  totalSentences: number;
  wordCount: { min: number; max: number; avg: number };
  charCount: { min: number; max: number; avg: number };
}

interface CorpusFile {
  sentences: Array<{ text: string; wordCount: number }>;
}

export function countWords(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

function summarize(values: number[]): { min: number; max: number; avg: number } {
  if (values.length === 0) return { min: 0, max: 0, avg: 0 };
  return {
    min: Math.min(...values),
    max: Math.max(...values),
    avg: values.reduce((sum, v) => sum + v, 0) / values.length,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull sentence texts out of a parsed corpus file
 */
export function parseCorpus(data: unknown): string[] {
  const items: unknown = isRecord(data) ? data.sentences : undefined;
  if (!Array.isArray(items)) {
    throw new ValidationError('INVALID_CORPUS', "Invalid corpus file: missing 'sentences' array");
  }

  const list: unknown[] = items;
  const texts: string[] = [];
  for (const item of list) {
    if (typeof item === 'string') {
      texts.push(item);
    } else if (isRecord(item) && typeof item.text === 'string') {
      texts.push(item.text);
    }
  }
  return texts;
}

export class SentenceCorpus {
  private sentences: string[];

  constructor(sentences: readonly string[] = []) {
    const tooShort = sentences.filter((s) => countWords(s) < MIN_WORDS);
    if (tooShort.length > 0) {
      throw new ValidationError(
        'SENTENCE_TOO_SHORT',
        `Found ${tooShort.length} sentence(s) with less than ${MIN_WORDS} words`
      );
    }
    this.sentences = [...sentences];
  }

  static async fromFile(filePath: string): Promise<SentenceCorpus> {
    const corpus = new SentenceCorpus();
    await corpus.loadFromFile(filePath);
    return corpus;
  }

  get size(): number {
    return this.sentences.length;
  }

  /**
   * First `count` sentences (all when omitted)
   */
  getSentences(count?: number): string[] {
    if (count === undefined) return [...this.sentences];
    return this.sentences.slice(0, Math.max(0, count));
  }

  validate(sentence: string): SentenceValidation {
    const wordCount = countWords(sentence);
    const valid = wordCount >= MIN_WORDS;
    return {
      valid,
      wordCount,
      charCount: sentence.length,
      message: valid ? 'Valid' : `Too short: ${wordCount} words (minimum ${MIN_WORDS})`,
    };
  }

  add(sentence: string): void {
    const validation = this.validate(sentence);
    if (!validation.valid) {
      throw new ValidationError(
        'SENTENCE_TOO_SHORT',
        `Sentence must have at least ${MIN_WORDS} words, got ${validation.wordCount}`
      );
    }
    this.sentences.push(sentence);
  }

  async loadFromFile(filePath: string): Promise<void> {
    const raw = await fs.readFile(filePath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError('INVALID_CORPUS', `Invalid JSON in ${filePath}`, { cause: error });
    }

    const texts = parseCorpus(parsed);
    const tooShort = texts.filter((s) => countWords(s) < MIN_WORDS);
    if (tooShort.length > 0) {
      throw new ValidationError(
        'SENTENCE_TOO_SHORT',
        `Found ${tooShort.length} sentence(s) with less than ${MIN_WORDS} words`
      );
    }
    this.sentences = texts;
  }

  async saveToFile(filePath: string): Promise<void> {
    const data: CorpusFile = {
      sentences: this.sentences.map((text) => ({ text, wordCount: countWords(text) })),
    };
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  }

  getStatistics(): CorpusStatistics {
    return {
      totalSentences: this.sentences.length,
      wordCount: summarize(this.sentences.map(countWords)),
      charCount: summarize(this.sentences.map((s) => s.length)),
    };
  }
}
