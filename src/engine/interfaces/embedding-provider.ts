/**
 * Embedding provider interface - text → fixed-dimensionality vector
 */

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;

  embed(text: string): Promise<number[]>;
}
