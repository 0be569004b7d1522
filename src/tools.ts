import { RecallError } from './errors.js';
import type { RecallEngine } from './RecallEngine.js';
import type { RankedResults, Reflection } from './types/Reflection.js';

/** Raised for malformed tool arguments; the server maps it to InvalidParams. */
export class ToolInputError extends RecallError {
  constructor(message: string) {
    super('INVALID_ARGUMENTS', message);
  }
}

export class UnknownToolError extends RecallError {
  constructor(readonly tool: string) {
    super('UNKNOWN_TOOL', `Unknown tool: ${tool}`);
  }
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
    additionalProperties?: boolean;
  };
}

export interface ResourceDefinition {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export type RecallApi = Pick<
  RecallEngine,
  'search' | 'storeDetailed' | 'getReflection' | 'findDuplicates' | 'cacheStats' | 'triggerRecluster' | 'listCategories' | 'stats'
>;

const stringArray = { type: 'array', items: { type: 'string' } };

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'reflection.store',
    description: 'Store a reflection; near-duplicates of existing content return the existing id',
    inputSchema: {
      type: 'object',
      properties: {
        content: { type: 'string' },
        project: { type: 'string' },
        tags: stringArray,
      },
      required: ['content', 'project'],
      additionalProperties: false,
    },
  },
  {
    name: 'reflection.search',
    description: 'Search stored reflections, cheapest strategy first',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string' },
        project: { type: 'string' },
        tags: stringArray,
        limit: { type: 'number', minimum: 1 },
        minScore: { type: 'number', minimum: 0, maximum: 1 },
      },
      required: ['query', 'project'],
      additionalProperties: false,
    },
  },
  {
    name: 'reflection.get',
    description: 'Fetch one reflection by id',
    inputSchema: {
      type: 'object',
      properties: { id: { type: 'string' } },
      required: ['id'],
      additionalProperties: false,
    },
  },
  {
    name: 'fingerprint.find_duplicates',
    description: 'Find stored reflections whose content nearly matches the given text',
    inputSchema: {
      type: 'object',
      properties: {
        content: { type: 'string' },
        project: { type: 'string' },
        threshold: { type: 'number', minimum: 0, maximum: 1 },
        limit: { type: 'number', minimum: 1 },
      },
      required: ['content'],
      additionalProperties: false,
    },
  },
  {
    name: 'cache.stats',
    description: 'Query cache hit rates and size',
    inputSchema: { type: 'object', properties: {}, additionalProperties: false },
  },
  {
    name: 'categories.recluster',
    description: 'Run a category merge/split/decay pass now',
    inputSchema: { type: 'object', properties: {}, additionalProperties: false },
  },
  {
    name: 'categories.list',
    description: 'List categories with keywords and member counts',
    inputSchema: { type: 'object', properties: {}, additionalProperties: false },
  },
];

export const RESOURCE_DEFINITIONS: ResourceDefinition[] = [
  {
    uri: 'recall://stats',
    name: 'Engine statistics',
    description: 'Cache, search tier, fingerprint and embedding counters',
    mimeType: 'application/json',
  },
  {
    uri: 'recall://categories',
    name: 'Categories',
    description: 'Current category tree',
    mimeType: 'application/json',
  },
];

function requireString(args: Record<string, unknown>, key: string): string {
  const v = args[key];
  if (typeof v !== 'string' || v.length === 0) throw new ToolInputError(`'${key}' must be a non-empty string`);
  return v;
}

function optionalString(args: Record<string, unknown>, key: string): string | undefined {
  const v = args[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string') throw new ToolInputError(`'${key}' must be a string`);
  return v;
}

function optionalNumber(args: Record<string, unknown>, key: string, min: number, max = Infinity): number | undefined {
  const v = args[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'number' || !Number.isFinite(v) || v < min || v > max) {
    throw new ToolInputError(`'${key}' must be a number between ${min} and ${max}`);
  }
  return v;
}

function optionalStringArray(args: Record<string, unknown>, key: string): string[] | undefined {
  const v = args[key];
  if (v === undefined) return undefined;
  if (!Array.isArray(v) || !v.every((x) => typeof x === 'string')) {
    throw new ToolInputError(`'${key}' must be an array of strings`);
  }
  return v.map(String);
}

/** Reflection without its embedding, for tool output. */
export function presentReflection(r: Reflection) {
  return {
    id: r.id,
    content: r.content,
    tags: r.tags,
    project: r.project,
    categoryId: r.categoryId,
    createdAt: r.createdAt,
    embedded: r.embedding !== null,
  };
}

export function presentResults(res: RankedResults) {
  return {
    query: res.query,
    variants: res.variants,
    tierReached: res.tierReached,
    cacheHit: res.cacheHit,
    degraded: res.degraded,
    degradedReasons: res.degradedReasons,
    tookMs: res.tookMs,
    results: res.results.map((r) => ({ ...presentReflection(r.reflection), score: r.score, tier: r.tier })),
  };
}

/** Runs one tool and returns its JSON result. Independent of any transport. */
export async function callTool(api: RecallApi, name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  switch (name) {
    case 'reflection.store': {
      const content = requireString(args, 'content');
      return api.storeDetailed(content, {
        project: requireString(args, 'project'),
        tags: optionalStringArray(args, 'tags'),
      });
    }

    case 'reflection.search': {
      const res = await api.search(requireString(args, 'query'), {
        project: requireString(args, 'project'),
        tags: optionalStringArray(args, 'tags'),
        limit: optionalNumber(args, 'limit', 1),
        minScore: optionalNumber(args, 'minScore', 0, 1),
      });
      return presentResults(res);
    }

    case 'reflection.get': {
      const id = requireString(args, 'id');
      const r = await api.getReflection(id);
      if (!r) throw new ToolInputError(`Reflection ${id} not found`);
      return presentReflection(r);
    }

    case 'fingerprint.find_duplicates': {
      const matches = await api.findDuplicates(requireString(args, 'content'), {
        project: optionalString(args, 'project'),
        threshold: optionalNumber(args, 'threshold', 0, 1),
        limit: optionalNumber(args, 'limit', 1),
      });
      return {
        count: matches.length,
        duplicates: matches.map((m) => ({ ...presentReflection(m.reflection), similarity: m.similarity })),
      };
    }

    case 'cache.stats':
      return api.cacheStats();

    case 'categories.recluster':
      return api.triggerRecluster();

    case 'categories.list':
      return {
        categories: api.listCategories().map((c) => ({
          categoryId: c.categoryId,
          parentId: c.parentId,
          memberCount: c.memberCount,
          keywords: c.keywords,
          decayed: c.decayed,
          lastReclusteredAt: c.lastReclusteredAt,
        })),
      };

    default:
      throw new UnknownToolError(name);
  }
}

/** JSON body of a resource, or null for an unknown uri. */
export function readResource(api: RecallApi, uri: string): string | null {
  if (uri === 'recall://stats') return JSON.stringify(api.stats(), null, 2);
  if (uri === 'recall://categories') return JSON.stringify(api.listCategories(), null, 2);
  return null;
}
