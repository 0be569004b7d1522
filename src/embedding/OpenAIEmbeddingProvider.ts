import OpenAI from 'openai';
import type { EmbeddingProvider } from './EmbeddingProvider.js';
import type { Vector } from '../types/Reflection.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedding.openai');

export interface OpenAIEmbeddingOptions {
  apiKey?: string;
  model: string;
  dimension: number;
  timeoutMs: number;
  client?: OpenAI;
}

/**
 * text-embedding-3 models accept a `dimensions` parameter, which keeps the
 * vectors at the process-wide dimension instead of the model's native size.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  private readonly model: string;
  private readonly client: OpenAI | null;

  constructor(opts: OpenAIEmbeddingOptions) {
    this.model = opts.model;
    this.dimension = opts.dimension;
    this.name = `openai:${opts.model}`;
    if (opts.client) {
      this.client = opts.client;
    } else if (opts.apiKey) {
      this.client = new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs, maxRetries: 1 });
    } else {
      log.warn('No OpenAI API key configured; embeddings disabled');
      this.client = null;
    }
  }

  async embedText(text: string): Promise<Vector | null> {
    if (!this.client) return null;
    const startedAt = Date.now();
    const response = await this.client.embeddings.create({
      model: this.model,
      input: text,
      dimensions: this.dimension,
    });
    const first = response.data[0];
    if (!first || !Array.isArray(first.embedding)) {
      throw new Error('Embedding API returned no vector');
    }
    log.debug('Embedded text', { durationMs: Date.now() - startedAt, inputLength: text.length });
    return first.embedding;
  }
}
