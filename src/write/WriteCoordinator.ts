import { MinHasher, encodeSignature, isSentinel, type Signature } from '../fingerprint/MinHash.js';
import { FingerprintIndex } from '../fingerprint/FingerprintIndex.js';
import { EmbeddingGateway } from '../embedding/EmbeddingGateway.js';
import { CategoryClusterer } from '../clustering/CategoryClusterer.js';
import { QueryCache } from '../cache/QueryCache.js';
import { errorMessage } from '../errors.js';
import { guardedStore } from '../storage/guardedStore.js';
import { KeyedMutex } from '../utils/concurrency.js';
import { redactSecrets } from '../utils/secretFilter.js';
import { normalizeText, uniqueTokens } from '../utils/tokenize.js';
import { ulid } from '../utils/ulid.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { RecordStore } from '../storage/StorageAdapter.js';
import type { DuplicatePolicy } from '../types/Config.js';
import type {
  CategoryId,
  DegradationReason,
  Reflection,
  ReflectionId,
  StoreMetadata,
  StoreOutcome,
  Vector,
} from '../types/Reflection.js';

export interface WriteCoordinatorDeps {
  store: RecordStore;
  hasher: MinHasher;
  index: FingerprintIndex;
  gateway: EmbeddingGateway;
  clusterer: CategoryClusterer;
  cache: QueryCache;
  locks?: KeyedMutex;
  now?: () => number;
  logger?: Logger;
  // Called after every committed write
  onCommitted?: (outcome: StoreOutcome) => void;
}

export interface WriteSettings {
  duplicateThreshold: number;
  duplicatePolicy: DuplicatePolicy;
}

export function normalizeTags(tags: readonly string[] | undefined): string[] {
  return Array.from(new Set((tags ?? []).map((t) => t.trim().toLowerCase()).filter(Boolean))).sort();
}

/**
 * Owns the insert path: fingerprint, dedup, embed, categorize, persist,
 * index, invalidate. Only persistence can fail a write.
 *
 * Writers take locks on the project-qualified LSH band keys of their
 * signature. Identical content shares every band and near-duplicates above
 * the LSH floor almost always share one, so racing duplicates serialize
 * while unrelated writes run in parallel.
 */
export class WriteCoordinator {
  private readonly deps: WriteCoordinatorDeps;
  private readonly records: RecordStore;
  private readonly settings: WriteSettings;
  private readonly locks: KeyedMutex;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(deps: WriteCoordinatorDeps, settings: WriteSettings) {
    this.deps = deps;
    this.records = guardedStore(deps.store);
    this.settings = settings;
    this.locks = deps.locks ?? new KeyedMutex();
    this.now = deps.now ?? Date.now;
    this.log = deps.logger ?? createLogger('write');
  }

  async store(rawContent: string, metadata: StoreMetadata): Promise<StoreOutcome> {
    const { text: content, refs } = redactSecrets(rawContent);
    if (refs.length > 0) this.log.warn('Redacted secrets from reflection content', { count: refs.length });
    const tags = normalizeTags(metadata.tags);
    const reasons: DegradationReason[] = [];

    const signature = this.fingerprint(content, reasons);
    const keys = this.lockKeys(signature, metadata.project, content);

    return this.locks.runExclusive(keys, async () => {
      const duplicate = await this.checkDuplicate(signature, metadata.project, tags, reasons);
      if (duplicate) return duplicate;
      return this.create(content, metadata.project, tags, signature, reasons);
    });
  }

  private fingerprint(content: string, reasons: DegradationReason[]): Signature {
    let signature: Signature;
    try {
      signature = this.deps.hasher.compute(content);
    } catch (error) {
      this.log.warn('Fingerprint computation failed; storing without dedup', { error: errorMessage(error) });
      signature = this.deps.hasher.sentinel();
    }
    if (isSentinel(signature)) reasons.push('fingerprint_failed');
    return signature;
  }

  private lockKeys(signature: Signature, project: string, content: string): string[] {
    if (isSentinel(signature)) return [`${project}|sentinel|${normalizeText(content)}`];
    return this.deps.index.bandKeys(signature).map((band) => `${project}|${band}`);
  }

  private async checkDuplicate(
    signature: Signature,
    project: string,
    tags: string[],
    reasons: DegradationReason[],
  ): Promise<StoreOutcome | null> {
    const { index } = this.deps;
    const store = this.records;
    const [match] = index.findNearDuplicates(signature, this.settings.duplicateThreshold, 1, { project });
    if (!match) return null;

    const existing = await store.fetchById(match.reflectionId);
    if (!existing) {
      // The record went away behind our back; its fingerprint should too
      index.remove(match.reflectionId);
      this.log.warn('Dropped fingerprint of a missing reflection', { id: match.reflectionId });
      return null;
    }

    if (this.settings.duplicatePolicy === 'reject') {
      this.log.debug('Rejected near-duplicate write', { duplicateOf: existing.id, similarity: match.similarity });
      return {
        id: existing.id,
        status: 'duplicate',
        duplicateOf: existing.id,
        similarity: match.similarity,
        categoryId: existing.categoryId,
        degradedReasons: reasons,
      };
    }

    const added = tags.filter((t) => !existing.tags.includes(t));
    if (added.length > 0) {
      await store.update(existing.id, { tags: [...existing.tags, ...added] });
      this.deps.cache.invalidate({
        project,
        categories: existing.categoryId ? [existing.categoryId] : [],
        tags: added,
        terms: added.flatMap((t) => uniqueTokens(t)),
        embedded: false,
        broad: false,
      });
    }
    const outcome: StoreOutcome = {
      id: existing.id,
      status: 'merged',
      duplicateOf: existing.id,
      similarity: match.similarity,
      categoryId: existing.categoryId,
      degradedReasons: reasons,
    };
    this.deps.onCommitted?.(outcome);
    return outcome;
  }

  private async create(
    content: string,
    project: string,
    tags: string[],
    signature: Signature,
    reasons: DegradationReason[],
  ): Promise<StoreOutcome> {
    const { gateway, clusterer, index, cache } = this.deps;

    let embedding: Vector | null = null;
    const embedded = await gateway.embed(content);
    if (embedded.ok) embedding = embedded.vector;
    else reasons.push('embedding_unavailable');

    const reflectionId = ulid(this.now());
    const { categoryId: assigned, created } = clusterer.assignDetailed(embedding, content, reflectionId);

    const reflection: Reflection = {
      id: reflectionId,
      content,
      embedding,
      fingerprint: encodeSignature(signature),
      categoryId: assigned,
      tags,
      project,
      createdAt: new Date(this.now()).toISOString(),
    };
    let id: ReflectionId;
    try {
      id = await this.records.persist(reflection);
    } catch (error) {
      clusterer.unassign(reflectionId, embedding);
      throw error;
    }

    const categoryId = await this.followRecluster(id, assigned);
    clusterer.settle(reflectionId);

    try {
      index.insert(id, signature, project);
    } catch (error) {
      this.log.warn('Fingerprint index insert failed', { id, error: errorMessage(error) });
      if (!reasons.includes('fingerprint_failed')) reasons.push('fingerprint_failed');
    }

    const invalidated = cache.invalidate({
      project,
      categories: [categoryId],
      tags,
      terms: uniqueTokens([content, ...tags].join(' ')),
      embedded: embedding !== null,
      broad: created && embedding !== null,
    });
    this.log.debug('Stored reflection', { id, project, categoryId, invalidated });

    const outcome: StoreOutcome = { id, status: 'created', categoryId, degradedReasons: reasons };
    this.deps.onCommitted?.(outcome);
    return outcome;
  }

  /**
   * A recluster published while the record was being persisted may have
   * merged its category away; point the record at the survivor.
   */
  private async followRecluster(id: ReflectionId, assigned: CategoryId): Promise<CategoryId> {
    const live = this.deps.clusterer.resolve(assigned);
    if (live === null || live === assigned) return assigned;
    try {
      await this.records.update(id, { categoryId: live });
    } catch (error) {
      this.log.warn('Could not move reflection to its merged category', { id, categoryId: live, error: errorMessage(error) });
      return assigned;
    }
    this.log.debug('Moved reflection to its merged category', { id, from: assigned, to: live });
    return live;
  }
}
