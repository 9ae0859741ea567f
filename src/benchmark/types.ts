/**
 * Type definitions for the benchmark system
 */
import type { FailureStage } from '../utils/errors.js';
import type { BenchmarkConfig, DatasetName } from './config.js';

export type Role = 'user' | 'assistant';

export interface TranscriptMessage {
  speaker: string;
  role: Role;
  content: string;
}

/**
 * One session of one user's conversation. The unit of ingestion.
 */
export interface Transcript {
  userId: string;
  /** Position of the session within the user's history, e.g. "session_3". */
  sessionKey: string;
  /** ISO-8601 time the session took place. */
  createdAt?: string;
  messages: TranscriptMessage[];
}

export interface Question {
  userId: string;
  questionId: string;
  question: string;
  goldAnswer: string;
  /** LOCOMO category or LongMemEval question type. */
  category: string;
  difficulty: string;
}

export interface TextChunk {
  index: number;
  /** Leading characters repeated from the previous chunk. */
  overlapChars: number;
  text: string;
}

export interface Episode {
  data: string;
  createdAt?: string;
}

export interface IngestionUnit {
  unitId: string;
  transcript: Transcript;
  chunks: TextChunk[];
  batches: Episode[][];
}

export interface UnitFailureRecord {
  unitId: string;
  stage: FailureStage;
  attempts: number;
  message: string;
}

export interface IngestResult {
  unitsTotal: number;
  unitsSkipped: number;
  unitsSucceeded: number;
  unitsFailed: number;
  chunksCreated: number;
  batchesSubmitted: number;
  failures: UnitFailureRecord[];
  duration: number;
}

export interface GraphEdge {
  fact: string;
  validAt?: string | null;
  invalidAt?: string | null;
}

export interface GraphNode {
  name: string;
  summary: string;
  labels?: string[];
}

export interface GraphEpisode {
  content: string;
  createdAt?: string | null;
}

export interface RetrievedContext {
  edges: GraphEdge[];
  nodes: GraphNode[];
  episodes: GraphEpisode[];
}

export type Verdict = 'CORRECT' | 'WRONG';

export interface Grade {
  verdict: Verdict;
  isCorrect: boolean;
  reasoning: string;
}

export const COMPLETENESS_GRADES = ['COMPLETE', 'PARTIAL', 'INSUFFICIENT'] as const;
export type CompletenessGrade = (typeof COMPLETENESS_GRADES)[number];

/** Whether the retrieved context alone held what the gold answer needs. */
export interface ContextCompleteness {
  grade: CompletenessGrade;
  reasoning: string;
  missingElements: string[];
  presentElements: string[];
}

export interface EvaluationFailure {
  stage: Exclude<FailureStage, 'ingestion'>;
  attempts: number;
  message: string;
}

export interface EvaluationResult {
  userId: string;
  questionId: string;
  category: string;
  difficulty: string;
  question: string;
  goldAnswer: string;
  hypothesis: string;
  context: string;
  contextTokens: number;
  contextChars: number;
  contextTruncated: boolean;
  /** Seconds. */
  retrievalDuration: number;
  /** Seconds. */
  responseDuration: number;
  /** retrievalDuration + responseDuration; grading time is not included. */
  totalDuration: number;
  /** null when the question failed before a grade was produced. */
  grade: boolean | null;
  gradeReasoning: string | null;
  /** null when completeness grading is disabled, failed, or never ran. */
  completeness: ContextCompleteness | null;
  /** Set when completeness grading failed; the question itself still counts. */
  completenessError?: string;
  failure?: EvaluationFailure;
}

export interface LatencyStats {
  count: number;
  median: number | null;
  mean: number | null;
  stdDev: number | null;
  p50: number | null;
  p90: number | null;
  p95: number | null;
  p99: number | null;
  min: number | null;
  max: number | null;
}

export interface TokenStats {
  count: number;
  median: number | null;
  mean: number | null;
  p95: number | null;
  p99: number | null;
  min: number | null;
  max: number | null;
}

export interface GroupMetrics {
  key: string;
  accuracy: number | null;
  correctCount: number;
  gradedCount: number;
  totalCount: number;
}

export interface CompletenessMetrics {
  /** Results carrying a completeness grade. Rates are over this count. */
  assessedCount: number;
  completeCount: number;
  partialCount: number;
  insufficientCount: number;
  completeRate: number | null;
  partialRate: number | null;
  insufficientRate: number | null;
  /** Accuracy over graded results whose context was COMPLETE. */
  accuracyWithCompleteContext: number | null;
}

export interface BenchmarkMetrics {
  /** correctCount / gradedCount; null when nothing was graded. */
  accuracy: number | null;
  correctCount: number;
  gradedCount: number;
  totalCount: number;
  /** Results without a grade, left out of accuracy. */
  excludedCount: number;
  meanRetrievalDuration: number | null;
  meanResponseDuration: number | null;
  byCategory: GroupMetrics[];
  byDifficulty: GroupMetrics[];
  completeness: CompletenessMetrics;
}

export interface AggregateReport {
  metrics: BenchmarkMetrics;
  latency: {
    retrieval: LatencyStats;
    response: LatencyStats;
    total: LatencyStats;
  };
  tokens: {
    contextTokens: TokenStats;
    contextChars: TokenStats;
  };
}

/** Service calls made while a run was evaluated. */
export interface ApiStats {
  memoryRequests: number;
  llmRequests: number;
  llmFailedRequests: number;
  llmTokens: number;
}

/** Contents of a run's results.json. */
export interface RunRecord {
  runId: string;
  /** ISO-8601 time the run was saved. */
  timestamp: string;
  dataset: DatasetName;
  config: BenchmarkConfig;
  metrics: BenchmarkMetrics;
  latency: AggregateReport['latency'];
  tokens: AggregateReport['tokens'];
  /** null when the services kept no counters, as with in-process stand-ins. */
  apiStats: ApiStats | null;
  results: EvaluationResult[];
}
