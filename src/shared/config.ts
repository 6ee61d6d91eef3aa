import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const TitleRulesSchema = {
  exact_allow: z.array(z.string()).default([]),
  prefix_allow: z.array(z.string()).default([]),
  include_suffixes: z.array(z.string()).default([]),
  exclude_phrases: z.array(z.string()).default([]),
};

export const CrawlerConfigSchema = z.object({
  name: z.string().min(1),
  source: z.string().min(1).default('web'),
  enabled: z.boolean().default(true),
  seeds: z.array(z.string().url()).default([]),
  max_pages: z.number().int().positive().default(100),
  delay_ms: z.number().int().nonnegative().default(600),
  allowed_prefixes: z.array(z.string()).default([]),
  exclude_url_regex: z.array(z.string()).default([]),
  skip_save_title_regex: z.array(z.string()).default([]),
  skip_save_url_regex: z.array(z.string()).default([]),
  extra: z.record(z.string()).default({}),
});

export const FeedConfigSchema = z.object({
  name: z.string().min(1),
  source: z.string().min(1).default('feed'),
  url: z.string().url(),
  enabled: z.boolean().default(true),
  max_items: z.number().int().positive().default(100),
});

export const ConfigSchema = z.object({
  http: z
    .object({
      timeout_ms: z.number().int().positive().default(30000),
      user_agent: z.string().default('ragsync/0.1'),
      max_retries: z.number().int().nonnegative().default(2),
    })
    .default({}),

  collect: z
    .object({
      concurrency: z.number().int().positive().default(3),
    })
    .default({}),

  sources: z
    .object({
      statute: z
        .object({
          enabled: z.boolean().default(false),
          source: z.string().min(1).default('statute'),
          base_url: z.string().default('https://elaws.e-gov.go.jp/api/1'),
          law_url_base: z.string().default('https://laws.e-gov.go.jp/law'),
          category: z.number().int().default(1),
          keywords: z.array(z.string()).default([]),
          max_laws: z.number().int().positive().default(500),
          delay_ms: z.number().int().nonnegative().default(300),
          ...TitleRulesSchema,
        })
        .default({}),
      crawlers: z.array(CrawlerConfigSchema).default([]),
      listing: z
        .object({
          enabled: z.boolean().default(false),
          source: z.string().min(1).default('caselaw'),
          start_url: z.string().default(''),
          list_link_text: z.string().default(''),
          item_link_text: z.string().default(''),
          exclude_link_text: z.string().default(''),
          include_excluded: z.boolean().default(false),
          max_items: z.number().int().nonnegative().default(0),
          delay_ms: z.number().int().nonnegative().default(1200),
          min_content_chars: z.number().int().nonnegative().default(2000),
          require_any_keywords: z.array(z.string()).default([]),
          exclude_titles: z.array(z.string()).default([]),
          exclude_url_regex: z.array(z.string()).default([]),
          index_max_lines: z.number().int().nonnegative().default(8),
          index_max_chars: z.number().int().nonnegative().default(800),
        })
        .default({}),
      feeds: z.array(FeedConfigSchema).default([]),
    })
    .default({}),

  normalize: z
    .object({
      min_content_chars: z.number().int().nonnegative().default(80),
      duplicate_policy: z.enum(['last_wins', 'first_wins']).default('last_wins'),
    })
    .default({}),

  chunking: z
    .object({
      max_chars: z.number().int().positive().default(1200),
      overlap_chars: z.number().int().nonnegative().default(200),
    })
    .default({})
    .refine((c) => c.overlap_chars < c.max_chars, {
      message: 'overlap_chars must be smaller than max_chars',
      path: ['overlap_chars'],
    }),

  embedding: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('text-embedding-3-small'),
      normalize: z.boolean().default(true),
      batch_size: z.number().int().positive().default(64),
      max_concurrent: z.number().int().positive().default(2),
      timeout_ms: z.number().int().positive().default(60000),
    })
    .default({}),

  diff: z
    .object({
      enabled: z.boolean().default(true),
      deactivate_missing: z.boolean().default(false),
    })
    .default({}),

  sync: z
    .object({
      batch_docs: z.number().int().positive().default(50),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type CrawlerConfig = z.infer<typeof CrawlerConfigSchema>;
export type FeedConfig = z.infer<typeof FeedConfigSchema>;

export const CONFIG_FILE_NAME = 'ragsync.config.yaml';
export const DATABASE_URL_ENV = 'RAGSYNC_DATABASE_URL';

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  const defaults = generateDefaultConfig();
  return yamlStringify(defaults);
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('ragsync', {
    searchPlaces: [
      'ragsync.config.yaml',
      'ragsync.config.yml',
      '.ragsyncrc.yaml',
      '.ragsyncrc.yml',
    ],
  });

  const envConfigPath = process.env['RAGSYNC_CONFIG'];

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else {
    const result = await explorer.search();
    if (result) {
      logger.debug({ path: result.filepath }, 'Config file loaded');
      rawConfig = asRecord(result.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  applyEnvOverrides(rawConfig);

  cachedConfig = parseConfig(rawConfig);
  return cachedConfig;
}

export function parseConfig(rawConfig: unknown): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data;
}

function applyEnvOverrides(rawConfig: Record<string, unknown>): void {
  // Embedding credentials usually come from the environment rather than the YAML file
  const envApiKey = process.env['RAGSYNC_EMBEDDING_API_KEY'];
  const envBaseUrl = process.env['RAGSYNC_EMBEDDING_BASE_URL'];
  const envModel = process.env['RAGSYNC_EMBEDDING_MODEL'];

  if (envApiKey || envBaseUrl || envModel) {
    const embedding = asRecord(rawConfig['embedding']);
    if (envApiKey) embedding['api_key'] = envApiKey;
    if (envBaseUrl) embedding['base_url'] = envBaseUrl;
    if (envModel) embedding['model'] = envModel;
    rawConfig['embedding'] = embedding;
  }
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

/**
 * Read the store connection string. Its absence is a fatal pre-flight error.
 */
export function requireDatabaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  const url = env[DATABASE_URL_ENV]?.trim();
  if (!url) {
    throw new ConfigError(`Missing ${DATABASE_URL_ENV} environment variable`);
  }
  return url;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
