/**
 * Run driver: wires services, phases and persistence for one benchmark mode.
 * Services are passed in so tests can substitute in-process fakes.
 */
import { CheckpointStore } from './checkpoint/CheckpointStore.js';
import type { BenchmarkConfig, ServiceCredentials } from './config.js';
import { createTiktokenCounter, type TokenCounter } from './context/ContextComposer.js';
import { LLMClient, type ChatModel } from './llm/LLMClient.js';
import { MemoryClient, type MemoryService } from './memory/MemoryClient.js';
import { EvaluationPhase } from './phases/EvaluationPhase.js';
import { IngestPhase } from './phases/IngestPhase.js';
import { aggregate } from './report/aggregate.js';
import { RunPersistence, type SavedRun } from './report/RunPersistence.js';
import type { AggregateReport, ApiStats, EvaluationResult, IngestResult, Question, Transcript } from './types.js';

export interface BenchmarkServices {
  memory: MemoryService;
  model: ChatModel;
  countTokens: TokenCounter;
  /** Running totals of service calls; absent when the services keep none. */
  apiStats?: () => ApiStats;
}

export function createServices(credentials: ServiceCredentials, config: BenchmarkConfig): BenchmarkServices {
  const memory = new MemoryClient({ baseUrl: credentials.memoryApiUrl, apiKey: credentials.memoryApiKey });
  const model = new LLMClient({ baseUrl: credentials.openaiBaseUrl, apiKey: credentials.openaiApiKey });
  return {
    memory,
    model,
    countTokens: createTiktokenCounter(config.models.responseModel),
    apiStats: () => {
      const llm = model.getStats();
      return {
        memoryRequests: memory.requestCount,
        llmRequests: llm.totalRequests,
        llmFailedRequests: llm.failedRequests,
        llmTokens: llm.totalTokens,
      };
    },
  };
}

/** Calls made between two readings of the same counters. */
export function apiStatsSince(before: ApiStats, after: ApiStats): ApiStats {
  return {
    memoryRequests: after.memoryRequests - before.memoryRequests,
    llmRequests: after.llmRequests - before.llmRequests,
    llmFailedRequests: after.llmFailedRequests - before.llmFailedRequests,
    llmTokens: after.llmTokens - before.llmTokens,
  };
}

export function defaultCheckpointPath(config: BenchmarkConfig): string {
  return `${config.dataset.name}.checkpoint.json`;
}

export interface IngestionRun {
  config: BenchmarkConfig;
  transcripts: Transcript[];
  memory: MemoryService;
  checkpointPath: string;
}

/** Ingest every transcript not yet marked done in the checkpoint. */
export async function runIngestion(run: IngestionRun): Promise<IngestResult> {
  const checkpoint = await CheckpointStore.open(run.checkpointPath);
  const phase = new IngestPhase(run.memory, checkpoint, run.config);
  const result = await phase.run(run.transcripts);
  await checkpoint.flush();
  return result;
}

export interface EvaluationRun {
  config: BenchmarkConfig;
  questions: Question[];
  services: BenchmarkServices;
  persistence: RunPersistence;
  /** Config file copied into the run directory, when there was one. */
  configSourcePath?: string;
  onResult?: (result: EvaluationResult) => void;
}

export interface EvaluationOutcome {
  results: EvaluationResult[];
  report: AggregateReport;
  saved: SavedRun;
}

/**
 * Evaluate all questions, aggregate and save the run directory. API usage is
 * counted from the start of evaluation, so ingestion calls made earlier by the
 * same services are left out.
 */
export async function runEvaluation(run: EvaluationRun): Promise<EvaluationOutcome> {
  const { memory, model, countTokens, apiStats } = run.services;
  const before = apiStats?.();
  const phase = new EvaluationPhase(memory, model, run.config, countTokens);
  const results = await phase.run(run.questions, run.onResult);
  const report = aggregate(results);
  const saved = await run.persistence.saveRun(run.config, report, results, {
    configSourcePath: run.configSourcePath,
    apiStats: apiStats && before ? apiStatsSince(before, apiStats()) : null,
  });
  return { results, report, saved };
}

/**
 * Process exit code for a finished phase: 1 when work was attempted and
 * none of it succeeded, otherwise 0.
 */
export function exitCodeFor(succeeded: number, attempted: number): number {
  return attempted > 0 && succeeded === 0 ? 1 : 0;
}

export function ingestionExitCode(result: IngestResult): number {
  return exitCodeFor(result.unitsSucceeded, result.unitsSucceeded + result.unitsFailed);
}

export function evaluationExitCode(results: readonly EvaluationResult[]): number {
  const succeeded = results.filter((result) => result.failure === undefined).length;
  return exitCodeFor(succeeded, results.length);
}
