/**
 * Summary statistics over evaluation results. Pure functions only.
 */
import type {
  AggregateReport,
  BenchmarkMetrics,
  CompletenessGrade,
  CompletenessMetrics,
  EvaluationResult,
  GroupMetrics,
  LatencyStats,
  TokenStats,
} from '../types.js';

const ascending = (a: number, b: number): number => a - b;

/**
 * Nearest-rank percentile of an ascending-sorted sample:
 * rank = ceil(p/100 · n), value = sorted[rank - 1].
 */
export function percentile(sorted: readonly number[], p: number): number | null {
  if (sorted.length === 0) {
    return null;
  }
  const rank = Math.max(1, Math.ceil((p / 100) * sorted.length));
  return sorted[Math.min(rank, sorted.length) - 1];
}

export function median(sorted: readonly number[]): number | null {
  const n = sorted.length;
  if (n === 0) {
    return null;
  }
  const mid = Math.floor(n / 2);
  return n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Sample standard deviation; 0 for a single value. */
export function stdDev(values: readonly number[]): number | null {
  const average = mean(values);
  if (average === null) {
    return null;
  }
  if (values.length === 1) {
    return 0;
  }
  const squares = values.reduce((sum, value) => sum + (value - average) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function latencyStats(values: readonly number[]): LatencyStats {
  const sorted = [...values].sort(ascending);
  return {
    count: sorted.length,
    median: median(sorted),
    mean: mean(sorted),
    stdDev: stdDev(sorted),
    p50: percentile(sorted, 50),
    p90: percentile(sorted, 90),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    min: sorted.length > 0 ? sorted[0] : null,
    max: sorted.length > 0 ? sorted[sorted.length - 1] : null,
  };
}

export function tokenStats(values: readonly number[]): TokenStats {
  const sorted = [...values].sort(ascending);
  return {
    count: sorted.length,
    median: median(sorted),
    mean: mean(sorted),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    min: sorted.length > 0 ? sorted[0] : null,
    max: sorted.length > 0 ? sorted[sorted.length - 1] : null,
  };
}

function accuracyOf(results: readonly EvaluationResult[]): Omit<GroupMetrics, 'key'> {
  const graded = results.filter((result) => result.grade !== null);
  const correctCount = graded.filter((result) => result.grade === true).length;
  return {
    accuracy: graded.length > 0 ? correctCount / graded.length : null,
    correctCount,
    gradedCount: graded.length,
    totalCount: results.length,
  };
}

function groupBy(results: readonly EvaluationResult[], keyOf: (result: EvaluationResult) => string): GroupMetrics[] {
  const groups = new Map<string, EvaluationResult[]>();
  for (const result of results) {
    const key = keyOf(result);
    const group = groups.get(key);
    if (group) {
      group.push(result);
    } else {
      groups.set(key, [result]);
    }
  }
  return [...groups.keys()]
    .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }))
    .map((key) => ({ key, ...accuracyOf(groups.get(key) ?? []) }));
}

const rateOf = (count: number, total: number): number | null => (total > 0 ? count / total : null);

/** Completeness breakdown over the results that carry a completeness grade. */
export function completenessMetrics(results: readonly EvaluationResult[]): CompletenessMetrics {
  const assessed = results.filter((result) => result.completeness !== null);
  const countOf = (grade: CompletenessGrade): number =>
    assessed.filter((result) => result.completeness?.grade === grade).length;
  const completeCount = countOf('COMPLETE');
  const partialCount = countOf('PARTIAL');
  const insufficientCount = countOf('INSUFFICIENT');
  const withCompleteContext = accuracyOf(assessed.filter((result) => result.completeness?.grade === 'COMPLETE'));

  return {
    assessedCount: assessed.length,
    completeCount,
    partialCount,
    insufficientCount,
    completeRate: rateOf(completeCount, assessed.length),
    partialRate: rateOf(partialCount, assessed.length),
    insufficientRate: rateOf(insufficientCount, assessed.length),
    accuracyWithCompleteContext: withCompleteContext.accuracy,
  };
}

export function computeMetrics(results: readonly EvaluationResult[]): BenchmarkMetrics {
  const overall = accuracyOf(results);
  // Timings of failed questions are partial; only completed questions count.
  const completed = results.filter((result) => result.failure === undefined);
  return {
    accuracy: overall.accuracy,
    correctCount: overall.correctCount,
    gradedCount: overall.gradedCount,
    totalCount: overall.totalCount,
    excludedCount: overall.totalCount - overall.gradedCount,
    meanRetrievalDuration: mean(completed.map((result) => result.retrievalDuration)),
    meanResponseDuration: mean(completed.map((result) => result.responseDuration)),
    byCategory: groupBy(results, (result) => result.category),
    byDifficulty: groupBy(results, (result) => result.difficulty),
    completeness: completenessMetrics(results),
  };
}

export function aggregate(results: readonly EvaluationResult[]): AggregateReport {
  const completed = results.filter((result) => result.failure === undefined);
  return {
    metrics: computeMetrics(results),
    latency: {
      retrieval: latencyStats(completed.map((result) => result.retrievalDuration)),
      response: latencyStats(completed.map((result) => result.responseDuration)),
      total: latencyStats(completed.map((result) => result.totalDuration)),
    },
    tokens: {
      contextTokens: tokenStats(completed.map((result) => result.contextTokens)),
      contextChars: tokenStats(completed.map((result) => result.contextChars)),
    },
  };
}
