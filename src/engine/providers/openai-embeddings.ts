/**
 * OpenAI embeddings provider
 */

import OpenAI from 'openai';
import type { IEmbeddingProvider } from '../interfaces/embedding-provider.js';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  dimensions?: number;
  timeout?: number;
  maxRetries?: number;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;

  private client: OpenAI;
  private dimensions?: number;

  constructor(config: OpenAIEmbeddingConfig) {
    this.model = config.model ?? 'text-embedding-3-small';
    this.dimensions = config.dimensions;

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeout ?? 60000,
      maxRetries: config.maxRetries ?? 3,
    });
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: text,
      ...(this.dimensions ? { dimensions: this.dimensions } : {}),
    });

    const item = response.data[0];
    if (!item) {
      throw new Error(`Embedding response for model ${this.model} contained no vectors`);
    }
    return item.embedding;
  }
}
