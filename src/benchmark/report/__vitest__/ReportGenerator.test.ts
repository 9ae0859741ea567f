import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ApiStats, CompletenessGrade, ContextCompleteness, RunRecord } from '../../types.js';
import { makeResult, testConfig } from '../../__vitest__/fakes.js';
import { aggregate } from '../aggregate.js';
import { ReportGenerator } from '../ReportGenerator.js';

function recordOf(results: RunRecord['results'], apiStats: ApiStats | null = null): RunRecord {
  const report = aggregate(results);
  return {
    runId: 'run_20240305_090703',
    timestamp: '2024-03-05T09:07:03.000Z',
    dataset: 'locomo',
    config: testConfig(),
    metrics: report.metrics,
    latency: report.latency,
    tokens: report.tokens,
    apiStats,
    results,
  };
}

describe('ReportGenerator', () => {
  const generator = new ReportGenerator();

  it('renders the summary and latency tables', () => {
    const markdown = generator.generateMarkdown(
      recordOf([makeResult(0), makeResult(1, { grade: false }), makeResult(2), makeResult(3)])
    );

    expect(markdown.split('\n')).toEqual(
      expect.arrayContaining([
        '# Benchmark Report: run_20240305_090703',
        '**Dataset:** locomo',
        '**Response model:** gpt-4o-mini',
        '| Accuracy | 75.00% |',
        '| Correct | 3/4 |',
        '| Excluded (no grade) | 0 |',
        '| Retrieval | 1.000s | 1.000s | 1.000s | 1.000s | 1.000s | 1.000s |',
        '| Tokens | 100 | 100 | 100 | 100 |',
        '| 1 | 75.00% | 3 | 4 | 4 |',
      ])
    );
    expect(markdown).not.toContain('## Failed Questions');
    expect(markdown).not.toContain('## Context Completeness');
    expect(markdown).not.toContain('## API Usage');
  });

  it('renders the context completeness breakdown', () => {
    const assessed = (grade: CompletenessGrade): ContextCompleteness => ({
      grade,
      reasoning: '',
      missingElements: [],
      presentElements: [],
    });

    const markdown = generator.generateMarkdown(
      recordOf([
        makeResult(0, { completeness: assessed('COMPLETE') }),
        makeResult(1, { completeness: assessed('COMPLETE'), grade: false }),
        makeResult(2, { completeness: assessed('PARTIAL') }),
        makeResult(3, { completeness: assessed('INSUFFICIENT') }),
        makeResult(4),
      ])
    );

    expect(markdown).toContain(
      [
        '## Context Completeness',
        '',
        'Assessed 4 of 5 questions.',
        '',
        '| Grade | Share | Count |',
        '|-------|-------|-------|',
        '| COMPLETE | 50.00% | 2/4 |',
        '| PARTIAL | 25.00% | 1/4 |',
        '| INSUFFICIENT | 25.00% | 1/4 |',
        '',
        '**Accuracy with complete context:** 50.00%',
      ].join('\n')
    );
  });

  it('renders API usage when the run counted it', () => {
    const markdown = generator.generateMarkdown(
      recordOf([makeResult(0)], { memoryRequests: 12, llmRequests: 3, llmFailedRequests: 0, llmTokens: 450 })
    );

    expect(markdown).toContain(
      [
        '## API Usage',
        '',
        '| Metric | Value |',
        '|--------|-------|',
        '| Memory requests | 12 |',
        '| LLM requests | 3 |',
        '| LLM failed requests | 0 |',
        '| LLM tokens | 450 |',
      ].join('\n')
    );
  });

  it('lists failed questions and shows missing values as n/a', () => {
    const markdown = generator.generateMarkdown(
      recordOf([
        makeResult(0, {
          grade: null,
          gradeReasoning: null,
          failure: { stage: 'retrieval', attempts: 3, message: 'service unavailable' },
        }),
      ])
    );

    expect(markdown).toContain('| Accuracy | n/a |');
    expect(markdown).toContain('| Retrieval | n/a | n/a | n/a | n/a | n/a | n/a |');
    expect(markdown).toContain('## Failed Questions\n\n1. q0 (retrieval): service unavailable');
  });

  describe('printSummary', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('prints context completeness and API usage', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const record = recordOf(
        [
          makeResult(0, {
            completeness: { grade: 'COMPLETE', reasoning: '', missingElements: [], presentElements: [] },
          }),
          makeResult(1, {
            completeness: { grade: 'PARTIAL', reasoning: '', missingElements: [], presentElements: [] },
          }),
        ],
        { memoryRequests: 4, llmRequests: 6, llmFailedRequests: 1, llmTokens: 60 }
      );

      generator.printSummary(record, '/tmp/run');

      const printed = log.mock.calls.map((call) => call[0]);
      expect(printed).toContain('Context: 50.00% complete, 50.00% partial, 0.00% insufficient (2 assessed)');
      expect(printed).toContain('API: 4 memory requests, 6 LLM requests (1 failed, 60 tokens)');
    });
  });
});
