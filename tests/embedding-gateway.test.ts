import { describe, it, expect, jest } from '@jest/globals';
import OpenAI from 'openai';
import { EmbeddingGateway } from '../src/embedding/EmbeddingGateway.js';
import { OpenAIEmbeddingProvider } from '../src/embedding/OpenAIEmbeddingProvider.js';
import type { EmbeddingProvider } from '../src/embedding/EmbeddingProvider.js';
import type { Vector } from '../src/types/Reflection.js';
import { sleep } from '../src/utils/concurrency.js';
import { KeywordEmbeddingProvider } from './helpers.js';

class FixedProvider implements EmbeddingProvider {
  readonly name = 'fixed';
  readonly dimension = 3;

  constructor(private readonly answer: () => Promise<Vector | null>) {}

  embedText(): Promise<Vector | null> {
    return this.answer();
  }
}

describe('EmbeddingGateway', () => {
  it('should return the provider vector', async () => {
    const gateway = new EmbeddingGateway(new KeywordEmbeddingProvider(), { dimension: 3, timeoutMs: 1000 });
    expect(await gateway.embed('database network')).toEqual({ ok: true, vector: [1, 1, 0] });
    expect(gateway.stats()).toEqual({ calls: 1, failures: 0, lastFailure: null });
  });

  it('should refuse blank input without asking the provider', async () => {
    const provider = new KeywordEmbeddingProvider();
    const gateway = new EmbeddingGateway(provider, { dimension: 3, timeoutMs: 1000 });
    expect(await gateway.embed('  \n ')).toEqual({ ok: false, error: { reason: 'empty_input' } });
    expect(provider.calls).toBe(0);
  });

  it('should give up on a provider slower than the timeout', async () => {
    const provider = new KeywordEmbeddingProvider();
    provider.delayMs = 50;
    const gateway = new EmbeddingGateway(provider, { dimension: 3, timeoutMs: 10 });
    expect(await gateway.embed('database')).toEqual({ ok: false, error: { reason: 'timeout', detail: '10ms' } });
    expect(gateway.stats().lastFailure).toBe('timeout');
    await sleep(60);
  });

  it('should absorb a provider that fails after the timeout', async () => {
    const gateway = new EmbeddingGateway(
      new FixedProvider(async () => {
        await sleep(30);
        throw new Error('socket hang up');
      }),
      { dimension: 3, timeoutMs: 5 },
    );
    expect(await gateway.embed('database')).toMatchObject({ ok: false, error: { reason: 'timeout' } });
    await sleep(50);
  });

  it('should report a provider error with its message', async () => {
    const gateway = new EmbeddingGateway(
      new FixedProvider(async () => {
        throw new Error('quota exceeded');
      }),
      { dimension: 3, timeoutMs: 1000 },
    );
    expect(await gateway.embed('database')).toEqual({
      ok: false,
      error: { reason: 'provider_error', detail: 'quota exceeded' },
    });
  });

  it('should reject vectors of the wrong size or with non-finite values', async () => {
    const wide = new EmbeddingGateway(new KeywordEmbeddingProvider(), { dimension: 4, timeoutMs: 1000 });
    expect(await wide.embed('database')).toEqual({
      ok: false,
      error: { reason: 'dimension_mismatch', detail: 'expected 4, got 3' },
    });

    const broken = new EmbeddingGateway(new FixedProvider(async () => [Number.NaN, 0, 1]), { dimension: 3, timeoutMs: 1000 });
    expect(await broken.embed('database')).toEqual({
      ok: false,
      error: { reason: 'dimension_mismatch', detail: 'expected 3, got 3' },
    });
  });

  it('should count failures and clear the last reason once the provider recovers', async () => {
    const provider = new KeywordEmbeddingProvider();
    const gateway = new EmbeddingGateway(provider, { dimension: 3, timeoutMs: 1000 });
    provider.available = false;
    expect(await gateway.embed('database')).toEqual({
      ok: false,
      error: { reason: 'provider_unavailable', detail: 'keywords' },
    });
    expect(gateway.stats()).toEqual({ calls: 1, failures: 1, lastFailure: 'provider_unavailable' });

    provider.available = true;
    expect((await gateway.embed('database')).ok).toBe(true);
    expect(gateway.stats()).toEqual({ calls: 2, failures: 1, lastFailure: null });
  });
});

describe('OpenAIEmbeddingProvider', () => {
  const MODEL = 'text-embedding-3-small';

  function clientReturning(data: Array<{ embedding: number[] }>) {
    const client = new OpenAI({ apiKey: 'test-secret' });
    const create = jest.spyOn(client.embeddings, 'create').mockResolvedValue({
      object: 'list',
      model: MODEL,
      data: data.map((d, index) => ({ object: 'embedding' as const, index, embedding: d.embedding })),
      usage: { prompt_tokens: 2, total_tokens: 2 },
    });
    return { client, create };
  }

  it('should request vectors at the configured dimension', async () => {
    const { client, create } = clientReturning([{ embedding: [0.1, 0.2, 0.3] }]);
    const provider = new OpenAIEmbeddingProvider({ model: MODEL, dimension: 3, timeoutMs: 1000, client });
    expect(provider.name).toBe('openai:text-embedding-3-small');
    expect(await provider.embedText('database pool')).toEqual([0.1, 0.2, 0.3]);
    expect(create).toHaveBeenCalledWith({ model: MODEL, input: 'database pool', dimensions: 3 });
  });

  it('should fail when the response carries no vector', async () => {
    const { client } = clientReturning([]);
    const provider = new OpenAIEmbeddingProvider({ model: MODEL, dimension: 3, timeoutMs: 1000, client });
    const gateway = new EmbeddingGateway(provider, { dimension: 3, timeoutMs: 1000 });
    expect(await gateway.embed('database pool')).toEqual({
      ok: false,
      error: { reason: 'provider_error', detail: 'Embedding API returned no vector' },
    });
  });

  it('should stay unavailable without an API key', async () => {
    const provider = new OpenAIEmbeddingProvider({ model: MODEL, dimension: 3, timeoutMs: 1000 });
    expect(await provider.embedText('database pool')).toBeNull();
  });
});
