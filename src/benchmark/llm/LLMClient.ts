/**
 * Chat client for OpenAI-compatible completion endpoints.
 * Retries and timeouts are applied by the caller through withRetry.
 */
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: LLMMessage[];
  temperature: number;
  maxTokens?: number;
  /** Ask the model for a JSON object response. */
  jsonResponse?: boolean;
}

export interface LLMResponse {
  content: string;
  tokensUsed: number;
}

export interface LLMStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalTokens: number;
}

export interface ChatModel {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<LLMResponse>;
}

const CompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      total_tokens: z.number().int().nonnegative(),
    })
    .nullish(),
});

export interface LLMClientOptions {
  apiKey: string;
  baseUrl?: string;
  adapter?: AxiosAdapter;
}

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';

export class LLMClient implements ChatModel {
  private readonly http: AxiosInstance;
  private stats: LLMStats = {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    totalTokens: 0,
  };

  constructor(options: LLMClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl ?? DEFAULT_OPENAI_BASE_URL,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      adapter: options.adapter,
    });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<LLMResponse> {
    this.stats.totalRequests++;

    const body: Record<string, unknown> = {
      model: request.model,
      messages: request.messages,
      temperature: request.temperature,
    };
    if (request.maxTokens !== undefined) {
      body.max_tokens = request.maxTokens;
    }
    if (request.jsonResponse) {
      body.response_format = { type: 'json_object' };
    }

    try {
      const response = await this.http.post('/chat/completions', body, { signal });
      const parsed = CompletionResponseSchema.parse(response.data);
      const content = parsed.choices[0].message.content ?? '';

      // Estimate when the endpoint omits usage: 1 token ≈ 4 characters
      const tokensUsed = parsed.usage?.total_tokens ?? Math.ceil(content.length / 4);

      this.stats.successfulRequests++;
      this.stats.totalTokens += tokensUsed;
      return { content: content.trim(), tokensUsed };
    } catch (error) {
      this.stats.failedRequests++;
      throw error;
    }
  }

  /**
   * Get current statistics
   */
  getStats(): LLMStats {
    return { ...this.stats };
  }
}
