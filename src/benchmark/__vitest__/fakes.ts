/**
 * In-process stand-ins for the memory and model services.
 */
import { AxiosError, type AxiosAdapter, type AxiosResponse } from 'axios';
import { createConfig, type BenchmarkConfig, type BenchmarkConfigInput } from '../config.js';
import type { TokenCounter } from '../context/ContextComposer.js';
import type { ChatModel, CompletionRequest, LLMResponse } from '../llm/LLMClient.js';
import type { MemoryService, SearchRequest, SearchResults } from '../memory/MemoryClient.js';
import { COMPLETENESS_SYSTEM_PROMPT, GRADER_SYSTEM_PROMPT, RESPONSE_SYSTEM_PROMPT } from '../prompts.js';
import type { Episode, EvaluationResult, Question, Transcript } from '../types.js';

export function testConfig(input: BenchmarkConfigInput = {}): BenchmarkConfig {
  return createConfig({
    requestTimeoutMs: 2000,
    ...input,
    retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5, jitterFactor: 0, ...input.retry },
  });
}

export const countChars: TokenCounter = (text) => Math.ceil(text.length / 4);

export function transientError(message = 'connection reset'): Error {
  return Object.assign(new Error(message), { code: 'ECONNRESET' });
}

export class FakeMemoryService implements MemoryService {
  readonly users: string[] = [];
  readonly added: Array<{ userId: string; episodes: Episode[] }> = [];
  readonly searches: Array<{ userId: string; request: SearchRequest }> = [];
  addAttempts = 0;

  /** Return an error to fail an addEpisodes attempt. */
  failAdd: (userId: string, episodes: Episode[], attempt: number) => Error | undefined = () => undefined;
  failSearch: (userId: string, request: SearchRequest) => Error | undefined = () => undefined;
  results: SearchResults = {
    edges: [{ fact: 'Caroline attended a support group', validAt: '2023-05-07T00:00:00Z' }],
    nodes: [{ name: 'Caroline', summary: 'Friend of Melanie' }],
    episodes: [{ content: 'Caroline: I went to a support group yesterday.' }],
  };

  async ensureUser(userId: string): Promise<void> {
    if (!this.users.includes(userId)) {
      this.users.push(userId);
    }
  }

  async addEpisodes(userId: string, episodes: Episode[]): Promise<void> {
    this.addAttempts++;
    const error = this.failAdd(userId, episodes, this.addAttempts);
    if (error) {
      throw error;
    }
    this.added.push({ userId, episodes });
  }

  async search(userId: string, request: SearchRequest): Promise<SearchResults> {
    this.searches.push({ userId, request });
    const error = this.failSearch(userId, request);
    if (error) {
      throw error;
    }
    return {
      edges: request.scope === 'edges' ? this.results.edges.slice(0, request.limit) : [],
      nodes: request.scope === 'nodes' ? this.results.nodes.slice(0, request.limit) : [],
      episodes: request.scope === 'episodes' ? this.results.episodes.slice(0, request.limit) : [],
    };
  }
}

export class FakeChatModel implements ChatModel {
  readonly requests: CompletionRequest[] = [];

  answer: (request: CompletionRequest) => string = () => 'She went to a support group.';
  verdict: (request: CompletionRequest) => string = () => '{"verdict": "CORRECT", "reasoning": "Same event."}';
  completeness: (request: CompletionRequest) => string = () =>
    '{"completeness": "COMPLETE", "reasoning": "The support group is mentioned.", "missing_elements": [], "present_elements": ["support group"]}';

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const content = this.reply(request);
    return { content, tokensUsed: 10 };
  }

  private reply(request: CompletionRequest): string {
    switch (request.messages[0]?.content) {
      case GRADER_SYSTEM_PROMPT:
        return this.verdict(request);
      case COMPLETENESS_SYSTEM_PROMPT:
        return this.completeness(request);
      default:
        return this.answer(request);
    }
  }

  private withSystemPrompt(prompt: string): CompletionRequest[] {
    return this.requests.filter((request) => request.messages[0]?.content === prompt);
  }

  get responseRequests(): CompletionRequest[] {
    return this.withSystemPrompt(RESPONSE_SYSTEM_PROMPT);
  }

  get gradingRequests(): CompletionRequest[] {
    return this.withSystemPrompt(GRADER_SYSTEM_PROMPT);
  }

  get completenessRequests(): CompletionRequest[] {
    return this.withSystemPrompt(COMPLETENESS_SYSTEM_PROMPT);
  }
}

export function makeTranscript(userId: string, session: number, content: string): Transcript {
  return {
    userId,
    sessionKey: `session_${session}`,
    createdAt: `2023-05-0${session}T10:00:00.000Z`,
    messages: [
      { speaker: 'Caroline', role: 'assistant', content },
      { speaker: 'User', role: 'user', content: `Tell me more about ${session}.` },
    ],
  };
}

export function makeQuestion(index: number, overrides: Partial<Question> = {}): Question {
  return {
    userId: 'bench_experiment_user_0',
    questionId: `q${index}`,
    question: `Question ${index}?`,
    goldAnswer: `Answer ${index}`,
    category: '1',
    difficulty: 'unknown',
    ...overrides,
  };
}

export interface RecordedRequest {
  method?: string;
  url?: string;
  authorization: unknown;
  body: unknown;
}

/**
 * Axios adapter answering from `reply` without touching the network.
 * Statuses of 400 and above are rejected the way axios' own adapters do.
 */
export function fakeAdapter(
  reply: (request: RecordedRequest) => { status: number; data?: unknown },
  log: RecordedRequest[] = []
): AxiosAdapter {
  return async (config) => {
    const request: RecordedRequest = {
      method: config.method,
      url: config.url,
      authorization: config.headers.get('Authorization'),
      body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
    };
    log.push(request);
    const { status, data } = reply(request);
    const response: AxiosResponse = { status, statusText: '', headers: {}, config, data: data ?? {} };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, undefined, response);
    }
    return response;
  };
}

export function makeResult(index: number, overrides: Partial<EvaluationResult> = {}): EvaluationResult {
  return {
    userId: 'bench_experiment_user_0',
    questionId: `q${index}`,
    category: '1',
    difficulty: 'unknown',
    question: `Question ${index}?`,
    goldAnswer: `Answer ${index}`,
    hypothesis: `Hypothesis ${index}`,
    context: 'FACTS',
    contextTokens: 100,
    contextChars: 400,
    contextTruncated: false,
    retrievalDuration: 1,
    responseDuration: 2,
    totalDuration: 3,
    grade: true,
    gradeReasoning: 'Matches.',
    completeness: null,
    ...overrides,
  };
}
