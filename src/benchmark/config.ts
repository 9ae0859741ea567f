/**
 * Configuration management for benchmark runs.
 *
 * The config is a YAML file with camelCase keys. Every field has a default,
 * numeric fields are range-checked and unknown keys are rejected, so a typo
 * fails the run before any work starts instead of silently using a default.
 */
import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { resolve } from 'path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, CorruptStateError } from '../utils/errors.js';
import { errorMessage, logger } from '../utils/logger.js';
import type { RetryPolicy } from '../utils/retry.js';
import { DEFAULT_OPENAI_BASE_URL } from './llm/LLMClient.js';

export const DEFAULT_CONFIG_PATH = 'benchmark.config.yaml';

export const RERANKERS = ['cross_encoder', 'rrf', 'mmr'] as const;
export const DATASETS = ['locomo', 'longmemeval'] as const;

const RerankerSchema = z.enum(RERANKERS);

const GraphParamsSchema = z
  .object({
    edgeLimit: z.number().int().min(1).max(100).default(20),
    edgeReranker: RerankerSchema.default('cross_encoder'),
    nodeLimit: z.number().int().min(0).max(100).default(20),
    nodeReranker: RerankerSchema.default('rrf'),
    episodeLimit: z.number().int().min(0).max(50).default(0),
    episodeReranker: RerankerSchema.default('rrf'),
  })
  .strict();

const ModelsSchema = z
  .object({
    responseModel: z.string().min(1).default('gpt-4o-mini'),
    responseTemperature: z.number().min(0).max(2).default(0),
    graderModel: z.string().min(1).default('gpt-4o-mini'),
    graderTemperature: z.number().min(0).max(2).default(0),
    maxTokens: z.number().int().min(1).optional(),
  })
  .strict();

const ContextSchema = z
  .object({
    maxTokens: z.number().int().min(1).default(8000),
  })
  .strict();

const IngestionSchema = z
  .object({
    maxChunkChars: z.number().int().min(100).max(100000).default(8500),
    chunkOverlapChars: z.number().int().min(0).default(200),
    maxItemsPerBatch: z.number().int().min(1).max(50).default(15),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.chunkOverlapChars >= value.maxChunkChars) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunkOverlapChars'],
        message: `must be less than maxChunkChars (${value.maxChunkChars})`,
      });
    }
  });

const RetrySchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(3),
    baseDelayMs: z.number().int().min(0).max(60000).default(250),
    maxDelayMs: z.number().int().min(0).max(300000).default(10000),
    multiplier: z.number().min(1).max(10).default(2),
    jitterFactor: z.number().min(0).max(1).default(0.1),
  })
  .strict();

const DatasetSchema = z
  .object({
    name: z.enum(DATASETS).default('locomo'),
    path: z.string().min(1).optional(),
    numUsers: z.number().int().min(1).default(10),
    maxSessionCount: z.number().int().min(1).default(35),
    userPrefix: z.string().min(1).regex(/^[A-Za-z0-9_-]+$/).default('bench'),
  })
  .strict();

export const BenchmarkConfigSchema = z
  .object({
    evaluationConcurrency: z.number().int().min(1).max(50).default(10),
    ingestionConcurrency: z.number().int().min(1).max(20).default(5),
    requestTimeoutMs: z.number().int().min(1).max(600000).default(60000),
    /** Grade whether the retrieved context alone could answer each question. */
    contextCompleteness: z.boolean().default(true),
    graphParams: GraphParamsSchema.default({}),
    models: ModelsSchema.default({}),
    context: ContextSchema.default({}),
    ingestion: IngestionSchema.default({}),
    retry: RetrySchema.default({}),
    dataset: DatasetSchema.default({}),
  })
  .strict();

export type BenchmarkConfigInput = z.input<typeof BenchmarkConfigSchema>;

type DeepReadonly<T> = { readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K] };

/** Validated run configuration. Frozen for the lifetime of a run. */
export type BenchmarkConfig = DeepReadonly<z.output<typeof BenchmarkConfigSchema>>;
export type GraphParams = BenchmarkConfig['graphParams'];
export type Reranker = (typeof RERANKERS)[number];
export type DatasetName = (typeof DATASETS)[number];

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Build a config from partial input, filling defaults.
 * @throws ConfigurationError listing every invalid field
 */
export function createConfig(input: unknown = {}): BenchmarkConfig {
  const result = BenchmarkConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration:\n' + formatIssues(result.error), {
      cause: result.error,
    });
  }
  return deepFreeze(result.data);
}

export function parseConfigYaml(text: string, source: string = '<inline>'): BenchmarkConfig {
  let data: unknown;
  try {
    data = parse(text);
  } catch (error) {
    const corrupt = new CorruptStateError(source, errorMessage(error), { cause: error });
    throw new ConfigurationError(`Configuration file ${source} is not valid YAML`, { cause: corrupt });
  }
  if (data !== null && data !== undefined && (typeof data !== 'object' || Array.isArray(data))) {
    throw new ConfigurationError(`Configuration file ${source} must contain a mapping at the top level`);
  }
  return createConfig(data ?? {});
}

export function configToYaml(config: BenchmarkConfig): string {
  return stringify(config);
}

export interface LoadedConfig {
  config: BenchmarkConfig;
  /** Absolute path of the file the config came from; undefined when defaults were used. */
  sourcePath?: string;
}

/**
 * Load benchmark configuration from file.
 * A missing file at the default location yields the defaults; a missing file
 * that was asked for explicitly is an error.
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  const absolutePath = resolve(process.cwd(), configPath ?? DEFAULT_CONFIG_PATH);

  if (!existsSync(absolutePath)) {
    if (configPath !== undefined) {
      throw new ConfigurationError(`Configuration file not found: ${configPath}`);
    }
    logger.info('No configuration file found, using defaults', { path: absolutePath });
    return { config: createConfig() };
  }

  const content = await readFile(absolutePath, 'utf-8');
  return { config: parseConfigYaml(content, absolutePath), sourcePath: absolutePath };
}

export async function saveConfig(config: BenchmarkConfig, outputPath: string): Promise<void> {
  await writeFile(outputPath, configToYaml(config), 'utf-8');
}

export function retryPolicyFrom(config: BenchmarkConfig): RetryPolicy {
  return { ...config.retry };
}

export function getDatasetPath(config: BenchmarkConfig): string {
  const fallback = config.dataset.name === 'locomo' ? 'data/locomo10.json' : 'data/longmemeval_s.json';
  return resolve(process.cwd(), config.dataset.path ?? fallback);
}

export interface ServiceCredentials {
  memoryApiKey: string;
  memoryApiUrl: string;
  openaiApiKey: string;
  openaiBaseUrl: string;
}

const DEFAULT_MEMORY_API_URL = 'https://api.getzep.com/api/v2';

/**
 * Read API credentials from the environment.
 * @throws ConfigurationError naming the first missing variable
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): ServiceCredentials {
  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      throw new ConfigurationError(`Missing required environment variable ${name}`);
    }
    return value;
  };

  return {
    memoryApiKey: required('MEMORY_API_KEY'),
    memoryApiUrl: env.MEMORY_API_URL?.trim() || DEFAULT_MEMORY_API_URL,
    openaiApiKey: required('OPENAI_API_KEY'),
    openaiBaseUrl: env.OPENAI_BASE_URL?.trim() || DEFAULT_OPENAI_BASE_URL,
  };
}
