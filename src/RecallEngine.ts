import * as path from 'node:path';
import { QueryCache } from './cache/QueryCache.js';
import { FileL2CacheStore, MemoryL2CacheStore, type L2CacheStore } from './cache/L2CacheStore.js';
import { CategoryClusterer } from './clustering/CategoryClusterer.js';
import { EmbeddingGateway } from './embedding/EmbeddingGateway.js';
import { DisabledEmbeddingProvider, type EmbeddingProvider } from './embedding/EmbeddingProvider.js';
import { OpenAIEmbeddingProvider } from './embedding/OpenAIEmbeddingProvider.js';
import { FingerprintIndex } from './fingerprint/FingerprintIndex.js';
import { MinHasher, decodeSignature } from './fingerprint/MinHash.js';
import { ProgressiveSearchEngine, type TierCounters } from './search/ProgressiveSearchEngine.js';
import type { QueryRewriter } from './search/QueryRewriter.js';
import type { SearchTier } from './search/tiers.js';
import { LocalRecordStore } from './storage/LocalRecordStore.js';
import { readJsonIfExists, writeJsonAtomic } from './storage/jsonFile.js';
import type { RecordStore } from './storage/StorageAdapter.js';
import { WriteCoordinator } from './write/WriteCoordinator.js';
import { RecallError, errorMessage } from './errors.js';
import { guardedStore } from './storage/guardedStore.js';
import { configureLogging, createLogger, type Logger } from './utils/logger.js';
import type { RecallConfig } from './types/Config.js';
import type {
  CacheStats,
  CategoryCentroid,
  CategoryClusterReport,
  Reflection,
  ReflectionId,
  RankedResults,
  SearchOptions,
  StoreMetadata,
  StoreOutcome,
} from './types/Reflection.js';

export interface RecallEngineDeps {
  store?: RecordStore;
  provider?: EmbeddingProvider;
  l2?: L2CacheStore;
  rewriter?: QueryRewriter;
  tiers?: SearchTier[];
  now?: () => number;
  logger?: Logger;
}

export interface FindDuplicatesOptions {
  threshold?: number;
  limit?: number;
  project?: string;
}

export interface DuplicateMatch {
  reflection: Reflection;
  similarity: number;
}

export interface EngineStats {
  cache: CacheStats;
  search: TierCounters;
  fingerprints: number;
  categories: number;
  embedding: ReturnType<EmbeddingGateway['stats']> & { provider: string };
}

const DEFAULT_DUPLICATE_LOOKUP_THRESHOLD = 0.85;

/**
 * Library-level entry point. Wires the cache, fingerprint index, gateway,
 * clusterer, search engine and write path around one record store, and owns
 * their lifecycle: `init` before use, `shutdown` to drain and persist.
 */
export class RecallEngine {
  readonly config: RecallConfig;
  private readonly records: RecordStore;
  private readonly hasher: MinHasher;
  private readonly index: FingerprintIndex;
  private readonly gateway: EmbeddingGateway;
  private readonly clusterer: CategoryClusterer;
  private readonly cache: QueryCache;
  private readonly searchEngine: ProgressiveSearchEngine;
  private readonly writer: WriteCoordinator;
  private readonly categoriesFile: string | undefined;
  private readonly log: Logger;
  private reclusterTimer: NodeJS.Timeout | null = null;
  private writesSinceRecluster = 0;
  private background: Promise<unknown> | null = null;
  private reclusterRun: Promise<CategoryClusterReport> | null = null;
  private state: 'new' | 'ready' | 'closed' = 'new';

  constructor(config: RecallConfig, deps: RecallEngineDeps = {}) {
    this.config = config;
    this.log = deps.logger ?? createLogger('engine');
    const dataDir = config.storage.dataDir;
    const now = deps.now ?? Date.now;

    this.records = guardedStore(
      deps.store ??
        new LocalRecordStore({
          file: dataDir ? path.join(dataDir, 'reflections.json') : undefined,
          dimension: config.embedding.dimension,
        }),
    );
    this.categoriesFile = dataDir ? path.join(dataDir, 'categories.json') : undefined;

    this.hasher = new MinHasher({ numHashes: config.fingerprint.numHashes, shingleSize: config.fingerprint.shingleSize });
    this.index = new FingerprintIndex({
      numHashes: config.fingerprint.numHashes,
      bands: config.fingerprint.bands,
      lshMinThreshold: config.fingerprint.lshMinThreshold,
    });

    const provider = deps.provider ?? RecallEngine.createProvider(config);
    this.gateway = new EmbeddingGateway(provider, {
      dimension: config.embedding.dimension,
      timeoutMs: config.embedding.timeoutMs,
    });

    this.clusterer = new CategoryClusterer({ ...config.clustering, now });

    const l2 =
      deps.l2 ??
      (dataDir
        ? new FileL2CacheStore(path.join(dataDir, 'cache', 'l2.json'), config.cache.l2Capacity, {
            flushMs: config.cache.l2FlushMs,
          })
        : new MemoryL2CacheStore(config.cache.l2Capacity));
    this.cache = new QueryCache({
      l1Capacity: config.cache.l1Capacity,
      ttlMs: config.cache.ttlMs,
      embeddingCapacity: config.cache.embeddingCapacity,
      sweepIntervalMs: config.cache.sweepIntervalMs,
      graceMs: config.cache.graceMs,
      l2,
      now,
    });

    this.searchEngine = new ProgressiveSearchEngine(
      {
        store: this.records,
        cache: this.cache,
        gateway: this.gateway,
        clusterer: this.clusterer,
        rewriter: deps.rewriter,
        tiers: deps.tiers,
        now,
      },
      { ...config.search, degradedTtlMs: config.cache.degradedTtlMs },
    );

    this.writer = new WriteCoordinator(
      {
        store: this.records,
        hasher: this.hasher,
        index: this.index,
        gateway: this.gateway,
        clusterer: this.clusterer,
        cache: this.cache,
        now,
        onCommitted: () => this.noteWrite(),
      },
      {
        duplicateThreshold: config.fingerprint.duplicateThreshold,
        duplicatePolicy: config.fingerprint.duplicatePolicy,
      },
    );
  }

  static createProvider(config: RecallConfig): EmbeddingProvider {
    if (config.embedding.provider === 'openai') {
      return new OpenAIEmbeddingProvider({
        apiKey: config.embedding.apiKey,
        model: config.embedding.model,
        dimension: config.embedding.dimension,
        timeoutMs: config.embedding.timeoutMs,
      });
    }
    return new DisabledEmbeddingProvider(config.embedding.dimension);
  }

  /**
   * Loads persisted state and rebuilds the fingerprint index from the
   * record store. A stored fingerprint that does not decode aborts startup.
   */
  async init(): Promise<void> {
    if (this.state !== 'new') return;
    configureLogging({ level: this.config.logLevel });
    await this.records.initialize?.();

    if (this.categoriesFile) {
      const saved = await readJsonIfExists(this.categoriesFile);
      if (saved !== undefined) this.clusterer.importState(saved);
    }

    const all = await this.records.listAll();
    for (const r of all) {
      const signature = decodeSignature(r.fingerprint, this.config.fingerprint.numHashes);
      this.index.insert(r.id, signature, r.project);
    }

    await this.cache.init();

    const interval = this.config.clustering.reclusterIntervalMs;
    if (interval > 0) {
      this.reclusterTimer = setInterval(() => this.runInBackground('interval'), interval);
      this.reclusterTimer.unref();
    }
    this.state = 'ready';
    this.log.info('Recall engine ready', {
      reflections: all.length,
      categories: this.clusterer.size,
      provider: this.gateway.providerName,
    });
  }

  async search(query: string, options: SearchOptions): Promise<RankedResults> {
    this.assertReady();
    return this.searchEngine.search(query, options);
  }

  async store(content: string, metadata: StoreMetadata): Promise<ReflectionId> {
    const outcome = await this.storeDetailed(content, metadata);
    return outcome.id;
  }

  async storeDetailed(content: string, metadata: StoreMetadata): Promise<StoreOutcome> {
    this.assertReady();
    return this.writer.store(content, metadata);
  }

  async getReflection(id: ReflectionId): Promise<Reflection | null> {
    this.assertReady();
    return this.records.fetchById(id);
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  stats(): EngineStats {
    return {
      cache: this.cache.stats(),
      search: this.searchEngine.stats(),
      fingerprints: this.index.size,
      categories: this.clusterer.size,
      embedding: { ...this.gateway.stats(), provider: this.gateway.providerName },
    };
  }

  listCategories(): CategoryCentroid[] {
    return this.clusterer.list();
  }

  /** Near-duplicates of arbitrary text among stored reflections, most similar first. */
  async findDuplicates(content: string, opts: FindDuplicatesOptions = {}): Promise<DuplicateMatch[]> {
    this.assertReady();
    const signature = this.hasher.compute(content);
    const matches = this.index.findNearDuplicates(
      signature,
      opts.threshold ?? DEFAULT_DUPLICATE_LOOKUP_THRESHOLD,
      opts.limit ?? 10,
      { project: opts.project },
    );
    const out: DuplicateMatch[] = [];
    for (const m of matches) {
      const reflection = await this.records.fetchById(m.reflectionId);
      if (reflection) out.push({ reflection, similarity: m.similarity });
    }
    return out;
  }

  /**
   * Runs a recluster pass now, writes new category ids back to the record
   * store and drops the query cache if the layout changed. A call while a
   * pass is in flight, write-back included, joins it.
   */
  async triggerRecluster(): Promise<CategoryClusterReport> {
    this.assertReady();
    if (this.reclusterRun) return this.reclusterRun;
    const run = this.recluster().finally(() => {
      this.reclusterRun = null;
    });
    this.reclusterRun = run;
    return run;
  }

  private async recluster(): Promise<CategoryClusterReport> {
    this.writesSinceRecluster = 0;
    const report = await this.clusterer.recluster(async () => {
      const all = await this.records.listAll();
      return all.map((r) => ({ id: r.id, embedding: r.embedding, categoryId: r.categoryId, content: r.content }));
    });

    // The layout is already published: attempt every write-back, then clear and save regardless
    const failures: unknown[] = [];
    for (const [id, categoryId] of Object.entries(report.reassigned)) {
      try {
        await this.records.update(id, { categoryId });
      } catch (error) {
        failures.push(error);
      }
    }
    const changed =
      report.merged.length > 0 ||
      report.split.length > 0 ||
      report.removed.length > 0 ||
      Object.keys(report.reassigned).length > 0;
    if (changed) this.cache.clear();
    await this.saveCategories();

    if (failures.length > 0) {
      this.log.error('Recluster could not write back every category change', {
        failed: failures.length,
        reassigned: Object.keys(report.reassigned).length,
      });
      throw failures[0];
    }
    return report;
  }

  /** Stops timers, waits for background work, drains the cache and persists state. */
  async shutdown(): Promise<void> {
    if (this.state === 'closed') return;
    const wasReady = this.state === 'ready';
    this.state = 'closed';
    if (this.reclusterTimer) {
      clearInterval(this.reclusterTimer);
      this.reclusterTimer = null;
    }
    if (this.background) await this.background;
    if (this.reclusterRun) {
      await this.reclusterRun.catch((error: unknown) => {
        this.log.warn('Recluster in flight at shutdown failed', { error: errorMessage(error) });
      });
    }
    await this.cache.shutdown();
    if (wasReady) await this.saveCategories();
    await this.records.close?.();
    this.log.info('Recall engine stopped');
  }

  private noteWrite(): void {
    this.writesSinceRecluster++;
    const every = this.config.clustering.reclusterEveryWrites;
    if (every > 0 && this.writesSinceRecluster >= every) this.runInBackground('write-count');
  }

  private runInBackground(trigger: string): void {
    if (this.state !== 'ready' || this.background) return;
    this.log.debug('Starting background recluster', { trigger });
    this.background = this.triggerRecluster()
      .catch((error: unknown) => {
        this.log.error('Background recluster failed', { trigger, error: errorMessage(error) });
      })
      .finally(() => {
        this.background = null;
      });
  }

  private async saveCategories(): Promise<void> {
    if (!this.categoriesFile) return;
    await writeJsonAtomic(this.categoriesFile, this.clusterer.exportState());
  }

  private assertReady(): void {
    if (this.state === 'new') throw new RecallError('NOT_INITIALIZED', 'RecallEngine.init() must be called first');
    if (this.state === 'closed') throw new RecallError('SHUT_DOWN', 'RecallEngine has been shut down');
  }
}
