import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs-extra';
import { CommanderError } from 'commander';
import { createProgram } from '../src/cli/recall-cli.js';
import { RecallEngine } from '../src/RecallEngine.js';
import { ToolInputError } from '../src/tools.js';
import { configureLogging } from '../src/utils/logger.js';
import { KeywordEmbeddingProvider, makeTempDir, testConfig } from './helpers.js';

describe('recall-cli', () => {
  let dir: string;
  let out: string[];
  let errors: string[];
  let created: number;
  let stopped: number;

  beforeEach(async () => {
    dir = await makeTempDir();
    out = [];
    errors = [];
    created = 0;
    stopped = 0;
  });

  afterEach(async () => {
    configureLogging({ format: 'text' });
    await fs.remove(dir);
  });

  async function run(...args: string[]): Promise<string[]> {
    out = [];
    const program = createProgram({
      createEngine: async (opts) => {
        const engine = new RecallEngine(testConfig({ storage: { dataDir: opts.dataDir } }), {
          provider: new KeywordEmbeddingProvider(),
        });
        await engine.init();
        created++;
        const shutdown = engine.shutdown.bind(engine);
        engine.shutdown = async () => {
          stopped++;
          await shutdown();
        };
        return engine;
      },
      out: (line) => out.push(line),
      err: (line) => errors.push(line),
      exitOverride: true,
    });
    await program.parseAsync(['node', 'recall-cli', '-d', dir, ...args]);
    return out;
  }

  it('should store a reflection and print a one-line summary', async () => {
    const lines = await run('store', 'Database pool sizing', '-p', 'demo', '-t', 'db, perf');
    expect(created).toBe(1);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^created: \S+ \(category \S+\)$/);
    expect(stopped).toBe(created);
  });

  it('should print tool results as JSON when asked', async () => {
    const [json] = await run('--json', 'store', 'Database pool sizing', '-p', 'demo', '-t', 'db,perf');
    const outcome: unknown = JSON.parse(json);
    expect(outcome).toMatchObject({ status: 'created', degradedReasons: [] });
  });

  it('should search across invocations sharing a data directory', async () => {
    const [stored] = await run('--format', 'json', 'store', 'Database pool sizing', '-p', 'demo');
    const parsed: unknown = JSON.parse(stored);
    const id = typeof parsed === 'object' && parsed !== null && 'id' in parsed ? String(parsed.id) : '';

    expect(await run('search', 'pool sizing', '-p', 'demo')).toEqual(['tier 2', `1.000  ${id}  Database pool sizing`]);
    expect(await run('search', 'pool sizing', '-p', 'demo')).toEqual(['tier 2, cached', `1.000  ${id}  Database pool sizing`]);
    expect(await run('search', 'kubernetes', '-p', 'demo')).toEqual(['tier 2', '(no results)']);
    expect(await run('duplicates', 'database POOL sizing')).toEqual([`1.000  ${id}  Database pool sizing`]);
    expect(await run('duplicates', 'something else entirely')).toEqual(['(no duplicates)']);
    expect(created).toBe(6);
    expect(stopped).toBe(created);
  });

  it('should shut the engine down when a tool fails', async () => {
    await expect(run('get', 'missing-id')).rejects.toBeInstanceOf(ToolInputError);
    expect(stopped).toBe(created);
  });

  it('should reject a search without a project', async () => {
    await expect(run('search', 'anything')).rejects.toBeInstanceOf(CommanderError);
    expect(errors).toEqual(["error: required option '-p, --project <project>' not specified"]);
    expect(created).toBe(0);
  });
});
