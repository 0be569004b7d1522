import type { Vector } from '../types/Reflection.js';

/**
 * Boundary to whatever turns text into vectors. `null` means the provider
 * cannot serve right now (not loaded, no credentials); a thrown error is a
 * runtime failure. The gateway treats both as degradable.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  embedText(text: string): Promise<Vector | null>;
}

/** Used when no provider is configured; every call reports unavailable. */
export class DisabledEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'disabled';
  readonly dimension: number;

  constructor(dimension: number) {
    this.dimension = dimension;
  }

  async embedText(): Promise<Vector | null> {
    return null;
  }
}
