/**
 * Run directories under the experiments root:
 *   run_YYYYMMDD_HHMMSS[_n]/{results.json, config.yaml, report.md}
 */
import type { Dirent } from 'fs';
import { copyFile, mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { z } from 'zod';
import { configToYaml, createConfig, DATASETS, type BenchmarkConfig } from '../config.js';
import { COMPLETENESS_GRADES, type AggregateReport, type ApiStats, type EvaluationResult, type RunRecord } from '../types.js';
import { CorruptStateError } from '../../utils/errors.js';
import { errorMessage, logger } from '../../utils/logger.js';
import { ReportGenerator } from './ReportGenerator.js';

export const DEFAULT_EXPERIMENTS_DIR = 'experiments';
export const RESULTS_FILE = 'results.json';
export const CONFIG_FILE = 'config.yaml';
export const REPORT_FILE = 'report.md';

const RUN_ID_PATTERN = /^run_(\d{8}_\d{6})(?:_(\d+))?$/;

const nullableNumber = z.number().nullable();

const LatencyStatsSchema = z.object({
  count: z.number(),
  median: nullableNumber,
  mean: nullableNumber,
  stdDev: nullableNumber,
  p50: nullableNumber,
  p90: nullableNumber,
  p95: nullableNumber,
  p99: nullableNumber,
  min: nullableNumber,
  max: nullableNumber,
});

const TokenStatsSchema = z.object({
  count: z.number(),
  median: nullableNumber,
  mean: nullableNumber,
  p95: nullableNumber,
  p99: nullableNumber,
  min: nullableNumber,
  max: nullableNumber,
});

const GroupMetricsSchema = z.object({
  key: z.string(),
  accuracy: nullableNumber,
  correctCount: z.number(),
  gradedCount: z.number(),
  totalCount: z.number(),
});

const CompletenessMetricsSchema = z.object({
  assessedCount: z.number(),
  completeCount: z.number(),
  partialCount: z.number(),
  insufficientCount: z.number(),
  completeRate: nullableNumber,
  partialRate: nullableNumber,
  insufficientRate: nullableNumber,
  accuracyWithCompleteContext: nullableNumber,
});

const ApiStatsSchema = z.object({
  memoryRequests: z.number(),
  llmRequests: z.number(),
  llmFailedRequests: z.number(),
  llmTokens: z.number(),
});

const EvaluationResultSchema = z.object({
  userId: z.string(),
  questionId: z.string(),
  category: z.string(),
  difficulty: z.string(),
  question: z.string(),
  goldAnswer: z.string(),
  hypothesis: z.string(),
  context: z.string(),
  contextTokens: z.number(),
  contextChars: z.number(),
  contextTruncated: z.boolean(),
  retrievalDuration: z.number(),
  responseDuration: z.number(),
  totalDuration: z.number(),
  grade: z.boolean().nullable(),
  gradeReasoning: z.string().nullable(),
  completeness: z
    .object({
      grade: z.enum(COMPLETENESS_GRADES),
      reasoning: z.string(),
      missingElements: z.array(z.string()),
      presentElements: z.array(z.string()),
    })
    .nullable(),
  completenessError: z.string().optional(),
  failure: z
    .object({
      stage: z.enum(['retrieval', 'response', 'grading']),
      attempts: z.number(),
      message: z.string(),
    })
    .optional(),
});

const RunFileSchema = z.object({
  runId: z.string(),
  timestamp: z.string(),
  dataset: z.enum(DATASETS),
  config: z.unknown(),
  metrics: z.object({
    accuracy: nullableNumber,
    correctCount: z.number(),
    gradedCount: z.number(),
    totalCount: z.number(),
    excludedCount: z.number(),
    meanRetrievalDuration: nullableNumber,
    meanResponseDuration: nullableNumber,
    byCategory: z.array(GroupMetricsSchema),
    byDifficulty: z.array(GroupMetricsSchema),
    completeness: CompletenessMetricsSchema,
  }),
  latency: z.object({
    retrieval: LatencyStatsSchema,
    response: LatencyStatsSchema,
    total: LatencyStatsSchema,
  }),
  tokens: z.object({
    contextTokens: TokenStatsSchema,
    contextChars: TokenStatsSchema,
  }),
  apiStats: ApiStatsSchema.nullable(),
  results: z.array(EvaluationResultSchema),
});

const pad = (value: number): string => String(value).padStart(2, '0');

/** `run_YYYYMMDD_HHMMSS` in local time. */
export function formatRunId(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `run_${day}_${time}`;
}

function compareRunIdsNewestFirst(a: string, b: string): number {
  const [, stampA, suffixA] = RUN_ID_PATTERN.exec(a) ?? [];
  const [, stampB, suffixB] = RUN_ID_PATTERN.exec(b) ?? [];
  if (stampA !== stampB) {
    return (stampB ?? '').localeCompare(stampA ?? '');
  }
  return Number(suffixB ?? 1) - Number(suffixA ?? 1);
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface RunPersistenceOptions {
  experimentsDir?: string;
  now?: () => Date;
}

export interface SaveRunOptions {
  /** Config file to copy verbatim; the config is serialized when omitted. */
  configSourcePath?: string;
  apiStats?: ApiStats | null;
}

export interface SavedRun {
  runId: string;
  runDir: string;
  record: RunRecord;
}

export class RunPersistence {
  readonly experimentsDir: string;
  private readonly now: () => Date;
  private readonly reports = new ReportGenerator();

  constructor(options: RunPersistenceOptions = {}) {
    this.experimentsDir = resolve(options.experimentsDir ?? DEFAULT_EXPERIMENTS_DIR);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Write results.json, config.yaml and report.md into a new run directory.
   */
  async saveRun(
    config: BenchmarkConfig,
    report: AggregateReport,
    results: EvaluationResult[],
    options: SaveRunOptions = {}
  ): Promise<SavedRun> {
    const { configSourcePath, apiStats = null } = options;
    const savedAt = this.now();
    const { runId, runDir } = await this.createRunDirectory(formatRunId(savedAt));

    const record: RunRecord = {
      runId,
      timestamp: savedAt.toISOString(),
      dataset: config.dataset.name,
      config,
      metrics: report.metrics,
      latency: report.latency,
      tokens: report.tokens,
      apiStats,
      results,
    };

    await writeFile(join(runDir, RESULTS_FILE), JSON.stringify(record, null, 2), 'utf-8');
    if (configSourcePath) {
      await copyFile(configSourcePath, join(runDir, CONFIG_FILE));
    } else {
      await writeFile(join(runDir, CONFIG_FILE), configToYaml(config), 'utf-8');
    }
    await writeFile(join(runDir, REPORT_FILE), this.reports.generateMarkdown(record), 'utf-8');

    logger.info('Run saved', { runId, runDir, results: results.length });
    return { runId, runDir, record };
  }

  /**
   * Create `base`, or the first free `base_n`. Creation is exclusive, so two
   * runs saved in the same second never share a directory.
   */
  private async createRunDirectory(base: string): Promise<{ runId: string; runDir: string }> {
    await mkdir(this.experimentsDir, { recursive: true });
    for (let n = 1; ; n++) {
      const runId = n === 1 ? base : `${base}_${n}`;
      const runDir = join(this.experimentsDir, runId);
      try {
        await mkdir(runDir);
        return { runId, runDir };
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
      }
    }
  }

  /**
   * Read a saved run back. The stored config is validated again.
   * @throws CorruptStateError when results.json is unreadable or malformed
   */
  async loadRun(runId: string): Promise<RunRecord> {
    const path = join(this.experimentsDir, runId, RESULTS_FILE);
    let data: unknown;
    try {
      data = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new CorruptStateError(path, errorMessage(error), { cause: error });
    }

    const parsed = RunFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new CorruptStateError(path, parsed.error.issues[0]?.message ?? 'unexpected shape', {
        cause: parsed.error,
      });
    }
    return { ...parsed.data, config: createConfig(parsed.data.config) };
  }

  /** Run ids under the experiments directory, newest first. */
  async listRuns(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.experimentsDir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
    return entries
      .filter((entry) => entry.isDirectory() && RUN_ID_PATTERN.test(entry.name))
      .map((entry) => entry.name)
      .sort(compareRunIdsNewestFirst);
  }
}
