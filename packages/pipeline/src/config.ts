import { readFile } from 'node:fs/promises';
import { sourceConfigSchema } from '@digestline/source-sdk';
import { z } from 'zod';
import { parseClassificationRules, type ClassificationRules } from './classify.js';
import { readBoolEnv, readIntEnv, readOptionalEnv, type Env } from './env.js';
import { ConfigError, errorMessage } from './errors.js';
import { DEFAULT_MIN_CONTENT_LENGTH, DEFAULT_MIN_QUALITY_SCORE } from './quality.js';
import { DEFAULT_RANK_LABELS, DEFAULT_RANKING_WEIGHTS } from './ranking.js';
import { DEFAULT_RETRY_POLICY } from './retry.js';

export const DEFAULT_CONFIG_PATH = 'config/digest.json';
export const DEFAULT_RULES_PATH = 'config/rules.json';

const budgetSchema = z
  .object({
    dailyLimitUsd: z.number().nonnegative().default(5),
    monthlyBudgetUsd: z.number().nonnegative().default(50),
  })
  .refine((budget) => budget.dailyLimitUsd <= budget.monthlyBudgetUsd, {
    message: 'dailyLimitUsd must not exceed monthlyBudgetUsd',
  });

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).default(DEFAULT_RETRY_POLICY.maxAttempts),
  backoffFactor: z.number().min(1).default(DEFAULT_RETRY_POLICY.backoffFactor),
  baseDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
  maxDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
  jitterMs: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.jitterMs),
});

const priceSchema = z.object({
  inputPerMillionUsd: z.number().nonnegative(),
  outputPerMillionUsd: z.number().nonnegative(),
});

const webhookNotifierSchema = z.object({
  type: z.literal('webhook'),
  name: z.string().min(1).optional(),
  url: z.string().url(),
  /** Name of the environment variable holding the signing secret. */
  secretEnv: z.string().min(1).optional(),
  minPriority: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(10_000),
});

export const digestConfigSchema = z.object({
  budget: budgetSchema.default({}),
  retry: retrySchema.default({}),
  cache: z.object({ ttlDays: z.number().positive().default(30) }).default({}),
  dedup: z
    .object({
      ttlDays: z.number().positive().default(30),
      includeTitle: z.boolean().default(false),
      semantic: z
        .object({
          enabled: z.boolean().default(false),
          threshold: z.number().gt(0).max(1).default(0.85),
        })
        .default({}),
    })
    .default({}),
  pipeline: z
    .object({
      mode: z.enum(['sequential', 'concurrent']).default('concurrent'),
      concurrency: z.number().int().min(1).default(5),
      sinkTimeoutMs: z.number().int().positive().default(15_000),
    })
    .default({}),
  cleaning: z.object({ maxBodyLength: z.number().int().positive().default(5000) }).default({}),
  quality: z
    .object({
      enabled: z.boolean().default(true),
      minScore: z.number().min(0).max(1).default(DEFAULT_MIN_QUALITY_SCORE),
      minContentLength: z.number().int().nonnegative().default(DEFAULT_MIN_CONTENT_LENGTH),
      sourceWhitelist: z.array(z.string().trim().min(1)).default([]),
      sourceBlacklist: z.array(z.string().trim().min(1)).default([]),
    })
    .default({}),
  ranking: z
    .object({
      enabled: z.boolean().default(true),
      weights: z
        .object({
          quality: z.number().nonnegative().default(DEFAULT_RANKING_WEIGHTS.quality),
          relevance: z.number().nonnegative().default(DEFAULT_RANKING_WEIGHTS.relevance),
          timeliness: z.number().nonnegative().default(DEFAULT_RANKING_WEIGHTS.timeliness),
          source: z.number().nonnegative().default(DEFAULT_RANKING_WEIGHTS.source),
        })
        .default({}),
      /** Labels for high, medium and low scores. */
      labels: z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)]).default(DEFAULT_RANK_LABELS),
    })
    .default({}),
  llm: z
    .object({
      enabled: z.boolean().default(false),
      provider: z.string().min(1).default('openai'),
      model: z.string().min(1).optional(),
      baseUrl: z.string().url().optional(),
      callTimeoutMs: z.number().int().positive().default(30_000),
      maxTokens: z
        .object({
          summary: z.number().int().positive().default(300),
          translation: z.number().int().positive().default(1000),
          classification: z.number().int().positive().default(150),
        })
        .default({}),
      prices: z.record(z.string(), priceSchema).default({}),
    })
    .default({}),
  features: z
    .object({
      summarization: z.boolean().default(true),
      translation: z.boolean().default(false),
      classification: z.boolean().default(true),
      targetLanguages: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  sources: z.array(sourceConfigSchema).default([]),
  notifiers: z.array(webhookNotifierSchema).default([]),
});

export type DigestConfig = z.infer<typeof digestConfigSchema>;
export type WebhookNotifierConfig = z.infer<typeof webhookNotifierSchema>;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate a config object and apply environment overrides
 * (`PIPELINE_CONCURRENCY`, `LLM_ENABLED`). LLM features switch on by themselves
 * when `OPENAI_API_KEY` or `LLM_BASE_URL` is set and `LLM_ENABLED` is not.
 */
export function parseDigestConfig(input: unknown, env: Env = process.env): DigestConfig {
  const result = digestConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError('Invalid digest configuration', issuesOf(result.error));
  }

  const config = result.data;
  const ids = new Set<string>();
  for (const source of config.sources) {
    if (ids.has(source.id)) {
      throw new ConfigError('Invalid digest configuration', [`sources: duplicate source id "${source.id}"`]);
    }
    ids.add(source.id);
  }

  const hasEndpoint = Boolean(readOptionalEnv('OPENAI_API_KEY', env) ?? readOptionalEnv('LLM_BASE_URL', env));

  return {
    ...config,
    pipeline: {
      ...config.pipeline,
      concurrency: readIntEnv('PIPELINE_CONCURRENCY', config.pipeline.concurrency, env),
    },
    llm: {
      ...config.llm,
      enabled: readBoolEnv('LLM_ENABLED', config.llm.enabled || hasEndpoint, env),
    },
  };
}

async function readJsonFile(path: string, what: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read ${what} at ${path}`, [errorMessage(error)]);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${what} at ${path}`, [errorMessage(error)]);
  }
}

export interface LoadedConfig {
  config: DigestConfig;
  rules: ClassificationRules;
}

/**
 * Load `DIGEST_CONFIG` (default config/digest.json) and `DIGEST_RULES`
 * (default config/rules.json). Every failure is a ConfigError.
 */
export async function loadDigestConfig(
  options: { configPath?: string; rulesPath?: string; env?: Env } = {},
): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? readOptionalEnv('DIGEST_CONFIG', env) ?? DEFAULT_CONFIG_PATH;
  const rulesPath = options.rulesPath ?? readOptionalEnv('DIGEST_RULES', env) ?? DEFAULT_RULES_PATH;

  const config = parseDigestConfig(await readJsonFile(configPath, 'digest config'), env);
  const rules = parseClassificationRules(await readJsonFile(rulesPath, 'classification rules'));
  return { config, rules };
}
