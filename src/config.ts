import fs from 'fs-extra';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigError } from './errors.js';
import { createLogger, parseLevel } from './utils/logger.js';
import type { RecallConfig, RecallConfigOverrides } from './types/Config.js';

const log = createLogger('config');

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_CONFIG: RecallConfig = {
  storage: {},
  fingerprint: {
    shingleSize: 5,
    numHashes: 64,
    bands: 16,
    duplicateThreshold: 0.9,
    duplicatePolicy: 'reject',
    lshMinThreshold: 0.8,
  },
  embedding: {
    provider: 'disabled',
    model: 'text-embedding-3-small',
    dimension: 384,
    timeoutMs: 5000,
  },
  cache: {
    l1Capacity: 1000,
    l2Capacity: 50000,
    embeddingCapacity: 500,
    ttlMs: 10 * 60 * 1000,
    degradedTtlMs: 30 * 1000,
    sweepIntervalMs: 60 * 1000,
    graceMs: 100,
    l2FlushMs: 2000,
  },
  clustering: {
    assignmentThreshold: 0.25,
    parentThreshold: 0.5,
    mergeThreshold: 0.1,
    splitThreshold: 0.35,
    minSplitMembers: 6,
    decayWindowMs: 90 * DAY_MS,
    reclusterIntervalMs: 30 * 60 * 1000,
    reclusterEveryWrites: 200,
  },
  search: {
    defaultLimit: 10,
    minResults: 3,
    tier0Threshold: 0.6,
    tier1Threshold: 0.7,
    tier2Threshold: 0.5,
    tierTimeoutMs: 1500,
    searchTimeoutMs: 4000,
    maxVariants: 3,
    candidateMultiplier: 3,
  },
  logLevel: 'info',
};

export const CONFIG_DIR_NAME = '.recall-engine';

export function defaultConfigPaths(cwd: string = process.cwd()): string[] {
  return [
    path.join(os.homedir(), CONFIG_DIR_NAME, 'config.json'),
    path.join(cwd, CONFIG_DIR_NAME, 'config.json'),
    path.join(cwd, 'recall.config.json'),
  ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeSection<T extends object>(base: T, patch: Partial<T> | undefined): T {
  const out = { ...base };
  if (!patch) return out;
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) Reflect.set(out, key, value);
  }
  return out;
}

/** Applies overrides section by section; undefined fields keep the base value. */
export function mergeConfig(base: RecallConfig, patch: RecallConfigOverrides): RecallConfig {
  return {
    storage: mergeSection(base.storage, patch.storage),
    fingerprint: mergeSection(base.fingerprint, patch.fingerprint),
    embedding: mergeSection(base.embedding, patch.embedding),
    cache: mergeSection(base.cache, patch.cache),
    clustering: mergeSection(base.clustering, patch.clustering),
    search: mergeSection(base.search, patch.search),
    logLevel: patch.logLevel ?? base.logLevel,
  };
}

function pickKnown<T extends object>(
  section: string,
  defaults: T,
  raw: unknown,
  problems: string[],
  optionalStrings: string[] = [],
): Partial<T> {
  const out: Partial<T> = {};
  if (raw === undefined) return out;
  if (!isRecord(raw)) {
    problems.push(`${section} must be an object`);
    return out;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (optionalStrings.includes(key)) {
      if (typeof value === 'string') Reflect.set(out, key, value);
      else problems.push(`${section}.${key} must be a string`);
      continue;
    }
    if (!(key in defaults)) {
      problems.push(`${section}.${key} is not a known setting`);
      continue;
    }
    if (typeof Reflect.get(defaults, key) !== typeof value) {
      problems.push(`${section}.${key} has the wrong type`);
      continue;
    }
    Reflect.set(out, key, value);
  }
  return out;
}

/** Turns a parsed config file into overrides, collecting type problems. */
export function parseConfigFile(raw: Record<string, unknown>, problems: string[]): RecallConfigOverrides {
  const overrides: RecallConfigOverrides = {
    storage: pickKnown('storage', DEFAULT_CONFIG.storage, raw.storage, problems, ['dataDir']),
    fingerprint: pickKnown('fingerprint', DEFAULT_CONFIG.fingerprint, raw.fingerprint, problems),
    embedding: pickKnown('embedding', DEFAULT_CONFIG.embedding, raw.embedding, problems, ['apiKey']),
    cache: pickKnown('cache', DEFAULT_CONFIG.cache, raw.cache, problems),
    clustering: pickKnown('clustering', DEFAULT_CONFIG.clustering, raw.clustering, problems),
    search: pickKnown('search', DEFAULT_CONFIG.search, raw.search, problems),
  };
  if (raw.logLevel !== undefined) {
    const level = typeof raw.logLevel === 'string' ? parseLevel(raw.logLevel) : undefined;
    if (level) overrides.logLevel = level;
    else problems.push('logLevel must be one of debug, info, warn, error');
  }
  return overrides;
}

function envOverrides(env: NodeJS.ProcessEnv): RecallConfigOverrides {
  const overrides: RecallConfigOverrides = {};
  if (env.RECALL_DATA_DIR) overrides.storage = { dataDir: env.RECALL_DATA_DIR };
  const embedding: NonNullable<RecallConfigOverrides['embedding']> = {};
  if (env.RECALL_EMBEDDING_PROVIDER === 'openai' || env.RECALL_EMBEDDING_PROVIDER === 'disabled') {
    embedding.provider = env.RECALL_EMBEDDING_PROVIDER;
  }
  if (env.RECALL_EMBEDDING_MODEL) embedding.model = env.RECALL_EMBEDDING_MODEL;
  if (env.OPENAI_API_KEY) embedding.apiKey = env.OPENAI_API_KEY;
  if (Object.keys(embedding).length > 0) overrides.embedding = embedding;
  const level = parseLevel(env.RECALL_LOG_LEVEL);
  if (level) overrides.logLevel = level;
  return overrides;
}

export function validateConfig(cfg: RecallConfig): string[] {
  const errors: string[] = [];
  const unit = (name: string, v: number) => {
    if (!(v >= 0 && v <= 1)) errors.push(`${name} must be between 0 and 1`);
  };
  const positive = (name: string, v: number) => {
    if (!Number.isInteger(v) || v < 1) errors.push(`${name} must be a positive integer`);
  };

  positive('fingerprint.shingleSize', cfg.fingerprint.shingleSize);
  positive('fingerprint.numHashes', cfg.fingerprint.numHashes);
  positive('fingerprint.bands', cfg.fingerprint.bands);
  if (cfg.fingerprint.numHashes % cfg.fingerprint.bands !== 0) {
    errors.push('fingerprint.numHashes must be divisible by fingerprint.bands');
  }
  unit('fingerprint.duplicateThreshold', cfg.fingerprint.duplicateThreshold);
  unit('fingerprint.lshMinThreshold', cfg.fingerprint.lshMinThreshold);
  if (cfg.fingerprint.duplicatePolicy !== 'reject' && cfg.fingerprint.duplicatePolicy !== 'merge') {
    errors.push(`fingerprint.duplicatePolicy must be 'reject' or 'merge'`);
  }

  positive('embedding.dimension', cfg.embedding.dimension);
  if (cfg.embedding.provider !== 'openai' && cfg.embedding.provider !== 'disabled') {
    errors.push(`embedding.provider must be 'openai' or 'disabled'`);
  }

  positive('cache.l1Capacity', cfg.cache.l1Capacity);
  positive('cache.l2Capacity', cfg.cache.l2Capacity);
  if (cfg.cache.l2Capacity < cfg.cache.l1Capacity) errors.push('cache.l2Capacity must be >= cache.l1Capacity');
  if (cfg.cache.ttlMs <= 0) errors.push('cache.ttlMs must be > 0');
  if (cfg.cache.graceMs < 0) errors.push('cache.graceMs must be >= 0');

  unit('clustering.assignmentThreshold', cfg.clustering.assignmentThreshold);
  unit('clustering.parentThreshold', cfg.clustering.parentThreshold);
  unit('clustering.mergeThreshold', cfg.clustering.mergeThreshold);
  if (cfg.clustering.mergeThreshold > cfg.clustering.assignmentThreshold) {
    errors.push('clustering.mergeThreshold cannot exceed clustering.assignmentThreshold');
  }
  if (cfg.clustering.minSplitMembers < 2) errors.push('clustering.minSplitMembers must be >= 2');

  positive('search.defaultLimit', cfg.search.defaultLimit);
  positive('search.minResults', cfg.search.minResults);
  positive('search.maxVariants', cfg.search.maxVariants);
  unit('search.tier0Threshold', cfg.search.tier0Threshold);
  unit('search.tier1Threshold', cfg.search.tier1Threshold);
  unit('search.tier2Threshold', cfg.search.tier2Threshold);
  if (cfg.search.tier2Threshold > cfg.search.tier1Threshold) {
    errors.push('search.tier2Threshold cannot exceed search.tier1Threshold');
  }
  if (cfg.search.tierTimeoutMs <= 0 || cfg.search.searchTimeoutMs <= 0) {
    errors.push('search timeouts must be > 0');
  }
  return errors;
}

export interface LoadConfigOptions {
  cwd?: string;
  paths?: string[];
  env?: NodeJS.ProcessEnv;
  overrides?: RecallConfigOverrides;
}

/**
 * Defaults, then the first config file found, then environment, then
 * explicit overrides. Throws ConfigError when the result does not validate.
 */
export function loadConfig(opts: LoadConfigOptions = {}): RecallConfig {
  let cfg = DEFAULT_CONFIG;
  let source: string | undefined;
  for (const candidate of opts.paths ?? defaultConfigPaths(opts.cwd)) {
    if (!fs.pathExistsSync(candidate)) continue;
    let parsed: unknown;
    try {
      parsed = fs.readJsonSync(candidate);
    } catch (error) {
      throw new ConfigError([`unreadable JSON: ${error instanceof Error ? error.message : String(error)}`], candidate);
    }
    if (!isRecord(parsed)) throw new ConfigError(['top-level value must be an object'], candidate);
    const fileProblems: string[] = [];
    const fromFile = parseConfigFile(parsed, fileProblems);
    if (fileProblems.length > 0) throw new ConfigError(fileProblems, candidate);
    cfg = mergeConfig(cfg, fromFile);
    source = candidate;
    log.debug('Loaded configuration file', { path: candidate });
    break;
  }
  cfg = mergeConfig(cfg, envOverrides(opts.env ?? process.env));
  if (opts.overrides) cfg = mergeConfig(cfg, opts.overrides);

  const problems = validateConfig(cfg);
  if (problems.length > 0) throw new ConfigError(problems, source);
  return cfg;
}
