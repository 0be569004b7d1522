import type { EmbeddingProvider } from './EmbeddingProvider.js';
import type { Vector } from '../types/Reflection.js';
import { errorMessage } from '../errors.js';
import { withTimeout } from '../utils/concurrency.js';
import { isFiniteVector } from '../utils/vector.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type EmbeddingUnavailableReason =
  | 'provider_unavailable'
  | 'provider_error'
  | 'empty_input'
  | 'dimension_mismatch'
  | 'timeout';

export interface EmbeddingUnavailable {
  reason: EmbeddingUnavailableReason;
  detail?: string;
}

export type EmbeddingResult = { ok: true; vector: Vector } | { ok: false; error: EmbeddingUnavailable };

export interface EmbeddingGatewayOptions {
  dimension: number;
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Thin adapter over an EmbeddingProvider. Never throws and never caches:
 * every failure comes back as `{ ok: false }` so callers fall back to
 * text-only paths. Query-embedding caching belongs to QueryCache.
 */
export class EmbeddingGateway {
  readonly dimension: number;
  private readonly provider: EmbeddingProvider;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private lastReason: EmbeddingUnavailableReason | null = null;
  private calls = 0;
  private failures = 0;

  constructor(provider: EmbeddingProvider, opts: EmbeddingGatewayOptions) {
    this.provider = provider;
    this.dimension = opts.dimension;
    this.timeoutMs = opts.timeoutMs;
    this.log = opts.logger ?? createLogger('embedding');
    if (provider.dimension !== opts.dimension) {
      this.log.warn('Provider dimension differs from configured dimension', {
        provider: provider.name,
        providerDimension: provider.dimension,
        dimension: opts.dimension,
      });
    }
  }

  get providerName(): string {
    return this.provider.name;
  }

  stats(): { calls: number; failures: number; lastFailure: EmbeddingUnavailableReason | null } {
    return { calls: this.calls, failures: this.failures, lastFailure: this.lastReason };
  }

  async embed(text: string): Promise<EmbeddingResult> {
    this.calls++;
    if (!text.trim()) return this.unavailable({ reason: 'empty_input' });

    let vector: Vector | null;
    try {
      const timed = await withTimeout(this.provider.embedText(text), this.timeoutMs, (error) =>
        this.log.debug('Embedding finished after timeout with an error', { error: errorMessage(error) }),
      );
      if (timed.timedOut) return this.unavailable({ reason: 'timeout', detail: `${this.timeoutMs}ms` });
      vector = timed.value;
    } catch (error) {
      return this.unavailable({ reason: 'provider_error', detail: errorMessage(error) });
    }

    if (vector === null) return this.unavailable({ reason: 'provider_unavailable', detail: this.provider.name });
    if (vector.length !== this.dimension || !isFiniteVector(vector)) {
      return this.unavailable({
        reason: 'dimension_mismatch',
        detail: `expected ${this.dimension}, got ${vector.length}`,
      });
    }
    if (this.lastReason !== null) {
      this.log.info('Embedding provider recovered', { provider: this.provider.name });
      this.lastReason = null;
    }
    return { ok: true, vector };
  }

  private unavailable(error: EmbeddingUnavailable): EmbeddingResult {
    this.failures++;
    // Log transitions only; a disabled provider would otherwise log on every call
    if (error.reason !== 'empty_input' && error.reason !== this.lastReason) {
      this.log.warn('Embedding unavailable, falling back to text-only paths', { ...error });
      this.lastReason = error.reason;
    }
    return { ok: false, error };
  }
}
