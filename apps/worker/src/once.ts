import { createDatabase, type Database } from '@digestline/db';
import {
  createDigest,
  readRequiredEnv,
  runSources,
  type DigestConfig,
  type DigestRuntimeOptions,
  type ClassificationRules,
  type RunSummary,
} from '@digestline/pipeline';
import type { Logger } from 'pino';
import { createPipelineLogger } from './observability/pipeline-logger.js';
import { createSourceCatalog, type SourceCatalogOptions } from './sources/catalog.js';

export interface RunOnceArgs {
  /** Keep cache, ledger and archive in memory instead of Postgres. */
  memory: boolean;
  /** Only these sources; all enabled sources when empty. */
  sourceIds: string[];
}

export function parseRunOnceArgs(argv: readonly string[]): RunOnceArgs {
  const args: RunOnceArgs = { memory: false, sourceIds: [] };

  for (const arg of argv) {
    if (arg === '--memory') {
      args.memory = true;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      args.sourceIds.push(arg);
    }
  }

  return args;
}

export interface RunOnceOptions extends SourceCatalogOptions {
  config: DigestConfig;
  rules: ClassificationRules;
  args: RunOnceArgs;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  /** Replaces the Postgres connection; tests and `--memory` leave it out. */
  db?: Database;
  runtime?: Pick<DigestRuntimeOptions, 'completionClient' | 'sink' | 'clock' | 'sleep'>;
}

/**
 * Run every selected source once in this process and return the run summary.
 */
export async function runOnce(options: RunOnceOptions): Promise<RunSummary> {
  const { config, rules, args, logger } = options;
  const env = options.env ?? process.env;
  const catalog = createSourceCatalog(config.sources, options);
  const sources = args.sourceIds.length > 0 ? args.sourceIds.map((id) => catalog.get(id)) : catalog.all();

  let db = options.db;
  let ownsDb = false;
  if (!db && !args.memory) {
    db = createDatabase(readRequiredEnv('DATABASE_URL', env));
    ownsDb = true;
  }

  try {
    const pipelineLogger = createPipelineLogger(logger);
    const digest = createDigest(config, rules, { ...options.runtime, db, env, logger: pipelineLogger });
    await digest.ledger.open();

    return await runSources(sources, {
      pipeline: digest.pipeline,
      cache: digest.cache,
      ledger: digest.ledger,
      logger: pipelineLogger,
      signal: options.signal,
    });
  } finally {
    if (db && ownsDb) {
      await db.$client.end();
    }
  }
}
