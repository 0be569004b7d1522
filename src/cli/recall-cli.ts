#!/usr/bin/env node

import { Command } from 'commander';
import { RecallEngine } from '../RecallEngine.js';
import { loadConfig } from '../config.js';
import { ConfigError, errorMessage } from '../errors.js';
import { callTool, type RecallApi } from '../tools.js';
import { configureLogging } from '../utils/logger.js';

type OutputFormat = 'text' | 'json';

interface GlobalOptions {
  config?: string;
  dataDir?: string;
  format: OutputFormat;
}

export interface CliEngine extends RecallApi {
  shutdown(): Promise<void>;
}

export interface CliDeps {
  createEngine(opts: GlobalOptions): Promise<CliEngine>;
  out(line: string): void;
  err(line: string): void;
  // Throw CommanderError instead of calling process.exit
  exitOverride?: boolean;
}

async function defaultEngine(opts: GlobalOptions): Promise<CliEngine> {
  const config = loadConfig({
    paths: opts.config ? [opts.config] : undefined,
    overrides: opts.dataDir ? { storage: { dataDir: opts.dataDir } } : undefined,
  });
  const engine = new RecallEngine(config);
  await engine.init();
  return engine;
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new Error(`not a number: ${value}`);
  return n;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Short human-readable rendering; JSON mode prints the tool result as is. */
function renderText(tool: string, result: unknown): string[] {
  if (!isRecord(result)) return [String(result)];
  if (tool === 'reflection.store') {
    return [`${String(result.status)}: ${String(result.id)}${result.categoryId ? ` (category ${String(result.categoryId)})` : ''}`];
  }
  if (tool === 'reflection.search' && Array.isArray(result.results)) {
    const header = `tier ${String(result.tierReached)}${result.cacheHit ? ', cached' : ''}${result.degraded ? ', degraded' : ''}`;
    const lines = result.results.map((r: unknown) =>
      isRecord(r) ? `${Number(r.score).toFixed(3)}  ${String(r.id)}  ${String(r.content)}` : String(r),
    );
    return [header, ...(lines.length > 0 ? lines : ['(no results)'])];
  }
  if (tool === 'fingerprint.find_duplicates' && Array.isArray(result.duplicates)) {
    const lines = result.duplicates.map((d: unknown) =>
      isRecord(d) ? `${Number(d.similarity).toFixed(3)}  ${String(d.id)}  ${String(d.content)}` : String(d),
    );
    return lines.length > 0 ? lines : ['(no duplicates)'];
  }
  return Object.entries(result).map(([k, v]) => `${k}: ${typeof v === 'object' ? JSON.stringify(v) : String(v)}`);
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command();
  // Subcommands copy these settings when they are created, so set them first
  program.configureOutput({ writeErr: (str) => deps.err(str.trimEnd()) });
  if (deps.exitOverride) program.exitOverride();

  program
    .name('recall-cli')
    .description('Store and search reflections from the command line')
    .version('0.1.0')
    .option('-c, --config <file>', 'Configuration file path')
    .option('-d, --data-dir <dir>', 'Data directory (overrides configuration)')
    .option('-f, --format <format>', 'Output format: text or json', 'text')
    .option('--json', 'Shorthand for --format json')
    .hook('preAction', () => {
      configureLogging({ format: program.opts().json || program.opts().format === 'json' ? 'json' : 'text' });
    });

  const globals = (): GlobalOptions => {
    const o = program.opts();
    return {
      config: typeof o.config === 'string' ? o.config : undefined,
      dataDir: typeof o.dataDir === 'string' ? o.dataDir : undefined,
      format: o.json === true || o.format === 'json' ? 'json' : 'text',
    };
  };

  const run = async (tool: string, args: Record<string, unknown>) => {
    const opts = globals();
    const engine = await deps.createEngine(opts);
    try {
      const result = await callTool(engine, tool, args);
      if (opts.format === 'json') deps.out(JSON.stringify(result, null, 2));
      else for (const line of renderText(tool, result)) deps.out(line);
    } finally {
      await engine.shutdown();
    }
  };

  program
    .command('store')
    .description('Store a reflection')
    .argument('<content>', 'Reflection text')
    .requiredOption('-p, --project <project>', 'Project name')
    .option('-t, --tags <tags>', 'Tags (comma-separated)')
    .action(async (content: string, options: { project: string; tags?: string }) => {
      await run('reflection.store', { content, project: options.project, tags: splitList(options.tags) });
    });

  program
    .command('search')
    .description('Search reflections')
    .argument('<query>', 'Search text')
    .requiredOption('-p, --project <project>', 'Project name')
    .option('-t, --tags <tags>', 'Only reflections with one of these tags (comma-separated)')
    .option('-l, --limit <n>', 'Maximum results', parseNumber)
    .option('-m, --min-score <score>', 'Minimum score (0..1)', parseNumber)
    .action(async (query: string, options: { project: string; tags?: string; limit?: number; minScore?: number }) => {
      await run('reflection.search', {
        query,
        project: options.project,
        tags: splitList(options.tags),
        limit: options.limit,
        minScore: options.minScore,
      });
    });

  program
    .command('get')
    .description('Show one reflection')
    .argument('<id>', 'Reflection id')
    .action(async (id: string) => {
      await run('reflection.get', { id });
    });

  program
    .command('duplicates')
    .description('Find stored near-duplicates of some text')
    .argument('<content>', 'Text to compare')
    .option('-p, --project <project>', 'Restrict to one project')
    .option('--threshold <t>', 'Minimum similarity (0..1)', parseNumber)
    .option('-l, --limit <n>', 'Maximum matches', parseNumber)
    .action(async (content: string, options: { project?: string; threshold?: number; limit?: number }) => {
      await run('fingerprint.find_duplicates', {
        content,
        project: options.project,
        threshold: options.threshold,
        limit: options.limit,
      });
    });

  program
    .command('stats')
    .description('Show query cache statistics')
    .action(async () => {
      await run('cache.stats', {});
    });

  program
    .command('recluster')
    .description('Run a category recluster pass')
    .action(async () => {
      await run('categories.recluster', {});
    });

  program
    .command('categories')
    .description('List categories')
    .action(async () => {
      await run('categories.list', {});
    });

  program.addHelpText(
    'after',
    `
Configuration is read from the first of:
- ~/.recall-engine/config.json
- .recall-engine/config.json
- ./recall.config.json
`,
  );

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const deps: CliDeps = {
    createEngine: defaultEngine,
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  };
  try {
    await createProgram(deps).parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) for (const p of error.problems) deps.err(`config: ${p}`);
    else deps.err(`error: ${errorMessage(error)}`);
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(errorMessage(error));
      process.exitCode = 1;
    },
  );
}
