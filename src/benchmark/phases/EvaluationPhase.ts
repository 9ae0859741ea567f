/**
 * Phase 2: Evaluation
 * Retrieve context for each question, answer it with the response model,
 * grade the answer against the gold answer and grade the context itself
 */
import { z } from 'zod';
import { retryPolicyFrom, type BenchmarkConfig, type Reranker } from '../config.js';
import { composeContext, type ComposedContext, type TokenCounter } from '../context/ContextComposer.js';
import type { ChatModel } from '../llm/LLMClient.js';
import type { MemoryService, SearchScope } from '../memory/MemoryClient.js';
import {
  buildCompletenessPrompt,
  buildGradingPrompt,
  buildResponsePrompt,
  COMPLETENESS_SYSTEM_PROMPT,
  GRADER_SYSTEM_PROMPT,
  RESPONSE_SYSTEM_PROMPT,
} from '../prompts.js';
import {
  COMPLETENESS_GRADES,
  type ContextCompleteness,
  type EvaluationFailure,
  type EvaluationResult,
  type Grade,
  type Question,
  type RetrievedContext,
} from '../types.js';
import { asFatalError, BenchmarkError } from '../../utils/errors.js';
import { errorMessage, logger } from '../../utils/logger.js';
import { unwrapRetryError, withRetry, type RetryPolicy } from '../../utils/retry.js';
import { Semaphore } from '../../utils/Semaphore.js';

const GradeResponseSchema = z.object({
  verdict: z.union([z.string(), z.boolean()]).optional(),
  is_correct: z.union([z.string(), z.boolean()]).optional(),
  reasoning: z.string().optional(),
});

const POSITIVE_VERDICTS = new Set(['correct', 'yes', 'true']);
const NEGATIVE_VERDICTS = new Set(['wrong', 'incorrect', 'no', 'false']);

/** Pull the first JSON object out of a model reply. */
function extractJson(content: string, source: string): unknown {
  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new BenchmarkError(`No JSON found in ${source} response`);
  }
  try {
    return JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new BenchmarkError(`Invalid JSON in ${source} response: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Parse the grader's JSON reply. Verdicts may come as CORRECT/WRONG, yes/no
 * or a boolean, under `verdict` or `is_correct`.
 */
export function parseGrade(content: string): Grade {
  const raw = extractJson(content, 'grader');
  const parsed = GradeResponseSchema.parse(raw);
  const value = parsed.verdict ?? parsed.is_correct;
  const normalized = String(value).trim().toLowerCase();

  let isCorrect: boolean;
  if (POSITIVE_VERDICTS.has(normalized)) {
    isCorrect = true;
  } else if (NEGATIVE_VERDICTS.has(normalized)) {
    isCorrect = false;
  } else {
    throw new BenchmarkError(`Unrecognised grader verdict: ${String(value)}`);
  }

  return {
    verdict: isCorrect ? 'CORRECT' : 'WRONG',
    isCorrect,
    reasoning: parsed.reasoning ?? '',
  };
}

const CompletenessResponseSchema = z.object({
  completeness: z.string(),
  reasoning: z.string().optional(),
  missing_elements: z.array(z.string()).optional(),
  present_elements: z.array(z.string()).optional(),
});

export function parseCompleteness(content: string): ContextCompleteness {
  const parsed = CompletenessResponseSchema.parse(extractJson(content, 'completeness grader'));
  const normalized = parsed.completeness.trim().toUpperCase();
  const grade = COMPLETENESS_GRADES.find((known) => known === normalized);
  if (grade === undefined) {
    throw new BenchmarkError(`Unrecognised completeness grade: ${parsed.completeness}`);
  }
  return {
    grade,
    reasoning: parsed.reasoning ?? '',
    missingElements: parsed.missing_elements ?? [],
    presentElements: parsed.present_elements ?? [],
  };
}

interface CompletenessOutcome {
  completeness: ContextCompleteness | null;
  error?: string;
}

/** A failure tagged with the evaluation stage it happened in. */
class StageError extends BenchmarkError {
  constructor(
    readonly stage: EvaluationFailure['stage'],
    cause: unknown
  ) {
    super(`${stage} failed: ${errorMessage(cause)}`, { cause });
  }
}

const elapsedSeconds = (start: number): number => (performance.now() - start) / 1000;

export class EvaluationPhase {
  private readonly memory: MemoryService;
  private readonly model: ChatModel;
  private readonly config: BenchmarkConfig;
  private readonly countTokens: TokenCounter;
  private readonly policy: RetryPolicy;

  constructor(memory: MemoryService, model: ChatModel, config: BenchmarkConfig, countTokens: TokenCounter) {
    this.memory = memory;
    this.model = model;
    this.config = config;
    this.countTokens = countTokens;
    this.policy = retryPolicyFrom(config);
  }

  /**
   * Run the evaluation phase
   * @param onResult Called as each question finishes
   * @returns One result per question, in completion order
   * @throws ConfigurationError when a service rejects the credentials
   */
  async run(questions: Question[], onResult?: (result: EvaluationResult) => void): Promise<EvaluationResult[]> {
    const results: EvaluationResult[] = [];
    const gate = new Semaphore(this.config.evaluationConcurrency);

    logger.info('[Evaluation Phase] Starting evaluation', {
      questions: questions.length,
      concurrency: this.config.evaluationConcurrency,
    });

    const outcomes = await Promise.allSettled(
      questions.map((question) =>
        gate.run(async () => {
          const result = await this.evaluateQuestion(question);
          results.push(result);
          onResult?.(result);
        })
      )
    );

    const fatal = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (fatal) {
      throw fatal.reason;
    }

    const failed = results.filter((result) => result.failure !== undefined).length;
    logger.info('[Evaluation Phase] Completed', { evaluated: results.length, failed });
    return results;
  }

  /**
   * Evaluate one question. Failures come back as a result with `grade: null`;
   * only critical errors are thrown.
   */
  async evaluateQuestion(question: Question): Promise<EvaluationResult> {
    const result: EvaluationResult = {
      userId: question.userId,
      questionId: question.questionId,
      category: question.category,
      difficulty: question.difficulty,
      question: question.question,
      goldAnswer: question.goldAnswer,
      hypothesis: '',
      context: '',
      contextTokens: 0,
      contextChars: 0,
      contextTruncated: false,
      retrievalDuration: 0,
      responseDuration: 0,
      totalDuration: 0,
      grade: null,
      gradeReasoning: null,
      completeness: null,
    };

    try {
      const retrievalStart = performance.now();
      const composed: ComposedContext = await this.stage('retrieval', async () =>
        composeContext(await this.retrieve(question), {
          maxTokens: this.config.context.maxTokens,
          countTokens: this.countTokens,
        })
      );
      result.retrievalDuration = elapsedSeconds(retrievalStart);
      result.context = composed.context;
      result.contextTokens = composed.tokens;
      result.contextChars = composed.chars;
      result.contextTruncated = composed.truncated;
      if (composed.truncated) {
        logger.debug('Context truncated to token budget', {
          questionId: question.questionId,
          tokens: composed.tokens,
        });
      }

      // Context completeness is judged alongside the answer, from the same context.
      const responseStart = performance.now();
      const [hypothesis, outcome] = await Promise.all([
        this.stage('response', () => this.respond(question, composed.context)),
        this.assessCompleteness(question, composed.context),
      ]);
      result.responseDuration = elapsedSeconds(responseStart);
      result.hypothesis = hypothesis;
      result.completeness = outcome.completeness;
      if (outcome.error !== undefined) {
        result.completenessError = outcome.error;
      }
      result.totalDuration = result.retrievalDuration + result.responseDuration;

      const grade = await this.stage('grading', () => this.grade(question, result.hypothesis));
      result.grade = grade.isCorrect;
      result.gradeReasoning = grade.reasoning;

      logger.debug(`[Evaluation Phase] ${grade.isCorrect ? '✓' : '✗'} ${question.questionId}`, {
        verdict: grade.verdict,
      });
      return result;
    } catch (error) {
      if (!(error instanceof StageError)) {
        throw error;
      }
      const { cause, attempts } = unwrapRetryError(error.cause);
      const fatal = asFatalError(cause);
      if (fatal) {
        throw fatal;
      }

      result.totalDuration = result.retrievalDuration + result.responseDuration;
      result.failure = { stage: error.stage, attempts, message: errorMessage(cause) };
      logger.error('[Evaluation Phase] ✗ Question failed', {
        questionId: question.questionId,
        stage: error.stage,
        attempts,
        error: result.failure.message,
      });
      return result;
    }
  }

  private async stage<T>(stage: EvaluationFailure['stage'], operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new StageError(stage, error);
    }
  }

  private async retrieve(question: Question): Promise<RetrievedContext> {
    const params = this.config.graphParams;
    const search = (scope: SearchScope, limit: number, reranker: Reranker) =>
      withRetry(
        (signal) => this.memory.search(question.userId, { query: question.question, scope, limit, reranker }, signal),
        {
          label: `Search ${scope} for ${question.questionId}`,
          policy: this.policy,
          timeoutMs: this.config.requestTimeoutMs,
        }
      );

    const [edges, nodes, episodes] = await Promise.all([
      search('edges', params.edgeLimit, params.edgeReranker).then((found) => found.edges),
      params.nodeLimit > 0
        ? search('nodes', params.nodeLimit, params.nodeReranker).then((found) => found.nodes)
        : Promise.resolve([]),
      params.episodeLimit > 0
        ? search('episodes', params.episodeLimit, params.episodeReranker).then((found) => found.episodes)
        : Promise.resolve([]),
    ]);

    return { edges, nodes, episodes };
  }

  private async respond(question: Question, context: string): Promise<string> {
    const { models } = this.config;
    const response = await withRetry(
      (signal) =>
        this.model.complete(
          {
            model: models.responseModel,
            temperature: models.responseTemperature,
            maxTokens: models.maxTokens,
            messages: [
              { role: 'system', content: RESPONSE_SYSTEM_PROMPT },
              { role: 'user', content: buildResponsePrompt(context, question.question) },
            ],
          },
          signal
        ),
      {
        label: `Answer ${question.questionId}`,
        policy: this.policy,
        timeoutMs: this.config.requestTimeoutMs,
      }
    );
    return response.content;
  }

  /**
   * Grade the retrieved context on its own. A failure here is recorded on the
   * result and does not fail the question; rejected credentials still abort.
   */
  private async assessCompleteness(question: Question, context: string): Promise<CompletenessOutcome> {
    if (!this.config.contextCompleteness) {
      return { completeness: null };
    }

    const { models } = this.config;
    const prompt = buildCompletenessPrompt(question.question, question.goldAnswer, context);
    try {
      const completeness = await withRetry(
        async (signal) => {
          const response = await this.model.complete(
            {
              model: models.graderModel,
              temperature: models.graderTemperature,
              jsonResponse: true,
              messages: [
                { role: 'system', content: COMPLETENESS_SYSTEM_PROMPT },
                { role: 'user', content: prompt },
              ],
            },
            signal
          );
          return parseCompleteness(response.content);
        },
        {
          label: `Assess context for ${question.questionId}`,
          policy: this.policy,
          timeoutMs: this.config.requestTimeoutMs,
        }
      );
      return { completeness };
    } catch (error) {
      const { cause, attempts } = unwrapRetryError(error);
      const fatal = asFatalError(cause);
      if (fatal) {
        throw fatal;
      }
      const message = errorMessage(cause);
      logger.warn('[Evaluation Phase] Context completeness grading failed', {
        questionId: question.questionId,
        attempts,
        error: message,
      });
      return { completeness: null, error: message };
    }
  }

  private async grade(question: Question, hypothesis: string): Promise<Grade> {
    const { models } = this.config;
    const prompt = buildGradingPrompt(question.category, question.question, question.goldAnswer, hypothesis);
    return withRetry(
      async (signal) => {
        const response = await this.model.complete(
          {
            model: models.graderModel,
            temperature: models.graderTemperature,
            jsonResponse: true,
            messages: [
              { role: 'system', content: GRADER_SYSTEM_PROMPT },
              { role: 'user', content: prompt },
            ],
          },
          signal
        );
        return parseGrade(response.content);
      },
      {
        label: `Grade ${question.questionId}`,
        policy: this.policy,
        timeoutMs: this.config.requestTimeoutMs,
      }
    );
  }
}
