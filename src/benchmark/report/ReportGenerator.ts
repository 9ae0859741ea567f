/**
 * Report Generator
 * Render a saved run as Markdown and print the console summary
 */
import type { ApiStats, CompletenessMetrics, GroupMetrics, IngestResult, LatencyStats, RunRecord } from '../types.js';

const formatPercent = (value: number | null): string => (value === null ? 'n/a' : `${(value * 100).toFixed(2)}%`);
const formatSeconds = (value: number | null): string => (value === null ? 'n/a' : `${value.toFixed(3)}s`);
const formatNumber = (value: number | null): string => (value === null ? 'n/a' : value.toFixed(0));

export class ReportGenerator {
  /**
   * Generate Markdown report
   */
  generateMarkdown(record: RunRecord): string {
    const { metrics, latency, tokens, config } = record;
    const lines: string[] = [];

    lines.push(`# Benchmark Report: ${record.runId}`);
    lines.push('');
    lines.push(`**Timestamp:** ${record.timestamp}`);
    lines.push(`**Dataset:** ${record.dataset}`);
    lines.push(`**Response model:** ${config.models.responseModel}`);
    lines.push(`**Grader model:** ${config.models.graderModel}`);
    lines.push('');

    lines.push('## Summary');
    lines.push('');
    lines.push('| Metric | Value |');
    lines.push('|--------|-------|');
    lines.push(`| Accuracy | ${formatPercent(metrics.accuracy)} |`);
    lines.push(`| Correct | ${metrics.correctCount}/${metrics.gradedCount} |`);
    lines.push(`| Questions | ${metrics.totalCount} |`);
    lines.push(`| Excluded (no grade) | ${metrics.excludedCount} |`);
    lines.push(`| Mean retrieval | ${formatSeconds(metrics.meanRetrievalDuration)} |`);
    lines.push(`| Mean response | ${formatSeconds(metrics.meanResponseDuration)} |`);
    lines.push('');

    lines.push('## Latency');
    lines.push('');
    lines.push('| Stage | Median | Mean | p90 | p95 | p99 | Max |');
    lines.push('|-------|--------|------|-----|-----|-----|-----|');
    lines.push(this.latencyRow('Retrieval', latency.retrieval));
    lines.push(this.latencyRow('Response', latency.response));
    lines.push(this.latencyRow('Total', latency.total));
    lines.push('');

    lines.push('## Context Size');
    lines.push('');
    lines.push('| Measure | Median | Mean | p95 | Max |');
    lines.push('|---------|--------|------|-----|-----|');
    lines.push(
      `| Tokens | ${formatNumber(tokens.contextTokens.median)} | ${formatNumber(tokens.contextTokens.mean)} | ` +
        `${formatNumber(tokens.contextTokens.p95)} | ${formatNumber(tokens.contextTokens.max)} |`
    );
    lines.push(
      `| Characters | ${formatNumber(tokens.contextChars.median)} | ${formatNumber(tokens.contextChars.mean)} | ` +
        `${formatNumber(tokens.contextChars.p95)} | ${formatNumber(tokens.contextChars.max)} |`
    );
    lines.push('');

    this.pushCompleteness(lines, metrics.completeness, metrics.totalCount);
    this.pushGroups(lines, 'By Category', metrics.byCategory);
    this.pushGroups(lines, 'By Difficulty', metrics.byDifficulty);
    if (record.apiStats) {
      this.pushApiStats(lines, record.apiStats);
    }

    const failures = record.results.filter((result) => result.failure !== undefined);
    if (failures.length > 0) {
      lines.push('## Failed Questions');
      lines.push('');
      failures.forEach((result, i) => {
        lines.push(`${i + 1}. ${result.questionId} (${result.failure?.stage}): ${result.failure?.message}`);
      });
      lines.push('');
    }

    return lines.join('\n');
  }

  private latencyRow(label: string, stats: LatencyStats): string {
    return (
      `| ${label} | ${formatSeconds(stats.median)} | ${formatSeconds(stats.mean)} | ${formatSeconds(stats.p90)} | ` +
      `${formatSeconds(stats.p95)} | ${formatSeconds(stats.p99)} | ${formatSeconds(stats.max)} |`
    );
  }

  private pushCompleteness(lines: string[], completeness: CompletenessMetrics, totalCount: number): void {
    if (completeness.assessedCount === 0) {
      return;
    }
    const row = (grade: string, rate: number | null, count: number): string =>
      `| ${grade} | ${formatPercent(rate)} | ${count}/${completeness.assessedCount} |`;

    lines.push('## Context Completeness');
    lines.push('');
    lines.push(`Assessed ${completeness.assessedCount} of ${totalCount} questions.`);
    lines.push('');
    lines.push('| Grade | Share | Count |');
    lines.push('|-------|-------|-------|');
    lines.push(row('COMPLETE', completeness.completeRate, completeness.completeCount));
    lines.push(row('PARTIAL', completeness.partialRate, completeness.partialCount));
    lines.push(row('INSUFFICIENT', completeness.insufficientRate, completeness.insufficientCount));
    lines.push('');
    lines.push(`**Accuracy with complete context:** ${formatPercent(completeness.accuracyWithCompleteContext)}`);
    lines.push('');
  }

  private pushApiStats(lines: string[], stats: ApiStats): void {
    lines.push('## API Usage');
    lines.push('');
    lines.push('| Metric | Value |');
    lines.push('|--------|-------|');
    lines.push(`| Memory requests | ${stats.memoryRequests} |`);
    lines.push(`| LLM requests | ${stats.llmRequests} |`);
    lines.push(`| LLM failed requests | ${stats.llmFailedRequests} |`);
    lines.push(`| LLM tokens | ${stats.llmTokens} |`);
    lines.push('');
  }

  private pushGroups(lines: string[], title: string, groups: GroupMetrics[]): void {
    if (groups.length === 0) {
      return;
    }
    lines.push(`## ${title}`);
    lines.push('');
    lines.push('| Group | Accuracy | Correct | Graded | Total |');
    lines.push('|-------|----------|---------|--------|-------|');
    for (const group of groups) {
      lines.push(
        `| ${group.key} | ${formatPercent(group.accuracy)} | ${group.correctCount} | ${group.gradedCount} | ${group.totalCount} |`
      );
    }
    lines.push('');
  }

  /**
   * Print ingestion summary to console
   */
  printIngestSummary(result: IngestResult): void {
    console.log('\n' + '='.repeat(80));
    console.log('INGESTION SUMMARY');
    console.log('='.repeat(80));
    console.log(`Units: ${result.unitsTotal} total, ${result.unitsSkipped} skipped (already done)`);
    console.log(`  - Succeeded: ${result.unitsSucceeded}`);
    console.log(`  - Failed:    ${result.unitsFailed}`);
    console.log(`Chunks: ${result.chunksCreated}, batches submitted: ${result.batchesSubmitted}`);
    console.log(`Duration: ${(result.duration / 1000).toFixed(2)}s`);
    console.log('='.repeat(80));
  }

  /**
   * Print evaluation summary to console
   */
  printSummary(record: RunRecord, runDir: string): void {
    const { metrics, latency } = record;
    const failed = record.results.filter((result) => result.failure !== undefined).length;

    console.log('\n' + '='.repeat(80));
    console.log('BENCHMARK SUMMARY');
    console.log('='.repeat(80));
    console.log(`Run: ${record.runId} (${record.dataset})`);
    console.log(`Model: ${record.config.models.responseModel}`);
    console.log('');
    console.log(`Accuracy: ${formatPercent(metrics.accuracy)} (${metrics.correctCount}/${metrics.gradedCount})`);
    console.log(`Questions: ${metrics.totalCount} total, ${metrics.totalCount - failed} succeeded, ${failed} failed`);
    if (metrics.completeness.assessedCount > 0) {
      const { completeness } = metrics;
      console.log(
        `Context: ${formatPercent(completeness.completeRate)} complete, ${formatPercent(completeness.partialRate)} partial, ` +
          `${formatPercent(completeness.insufficientRate)} insufficient (${completeness.assessedCount} assessed)`
      );
    }
    console.log('');
    console.log(`Retrieval: median ${formatSeconds(latency.retrieval.median)}, p95 ${formatSeconds(latency.retrieval.p95)}`);
    console.log(`Response:  median ${formatSeconds(latency.response.median)}, p95 ${formatSeconds(latency.response.p95)}`);
    if (record.apiStats) {
      const stats = record.apiStats;
      console.log(
        `API: ${stats.memoryRequests} memory requests, ${stats.llmRequests} LLM requests ` +
          `(${stats.llmFailedRequests} failed, ${stats.llmTokens} tokens)`
      );
    }
    console.log('');
    console.log(`Results saved to ${runDir}`);
    console.log('='.repeat(80));
  }
}
