/**
 * Hashing embeddings - offline, deterministic text vectors.
 *
 * Character trigrams of the lower-cased text are hashed (FNV-1a) into a
 * fixed number of signed buckets and the result is L2-normalised. Similar
 * spellings land close together, which is enough for dry runs and tests.
 */

import type { IEmbeddingProvider } from '../interfaces/embedding-provider.js';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function fnv1a(input: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class HashingEmbeddingProvider implements IEmbeddingProvider {
  readonly name = 'hashing';
  readonly model: string;
  readonly dimensions: number;

  constructor(dimensions = 256) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.model = `char-trigram-${dimensions}`;
  }

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const normalized = ` ${text.toLowerCase().replace(/\s+/g, ' ').trim()} `;
    const chars = Array.from(normalized);

    for (let i = 0; i + 3 <= chars.length; i++) {
      const hash = fnv1a(chars.slice(i, i + 3).join(''));
      const bucket = hash % this.dimensions;
      const sign = (hash >>> 31) === 1 ? -1 : 1;
      vector[bucket] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}
