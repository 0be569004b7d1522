export type DuplicatePolicy = 'reject' | 'merge';
export type EmbeddingProviderKind = 'openai' | 'disabled';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RecallConfig {
  storage: {
    // When unset, everything lives in memory for the process lifetime
    dataDir?: string;
  };
  fingerprint: {
    shingleSize: number;
    numHashes: number;
    bands: number;
    duplicateThreshold: number;
    duplicatePolicy: DuplicatePolicy;
    // Below this threshold LSH recall is poor; fall back to a full scan
    lshMinThreshold: number;
  };
  embedding: {
    provider: EmbeddingProviderKind;
    model: string;
    dimension: number;
    timeoutMs: number;
    apiKey?: string;
  };
  cache: {
    l1Capacity: number;
    l2Capacity: number;
    embeddingCapacity: number;
    ttlMs: number;
    degradedTtlMs: number;
    sweepIntervalMs: number;
    graceMs: number;
    l2FlushMs: number;
  };
  clustering: {
    // All thresholds are cosine distances (1 - cosine similarity)
    assignmentThreshold: number;
    parentThreshold: number;
    mergeThreshold: number;
    splitThreshold: number;
    minSplitMembers: number;
    decayWindowMs: number;
    reclusterIntervalMs: number;
    reclusterEveryWrites: number;
  };
  search: {
    defaultLimit: number;
    minResults: number;
    tier0Threshold: number;
    tier1Threshold: number;
    tier2Threshold: number;
    tierTimeoutMs: number;
    searchTimeoutMs: number;
    maxVariants: number;
    candidateMultiplier: number;
  };
  logLevel: LogLevel;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type RecallConfigOverrides = DeepPartial<RecallConfig>;
