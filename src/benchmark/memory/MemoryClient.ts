/**
 * HTTP client for the hosted graph memory service.
 * Transport only: retries and timeouts are applied by the caller through
 * withRetry, which hands each attempt an AbortSignal.
 */
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Reranker } from '../config.js';
import type { Episode, GraphEdge, GraphEpisode, GraphNode } from '../types.js';

export type SearchScope = 'edges' | 'nodes' | 'episodes';

export interface SearchRequest {
  query: string;
  scope: SearchScope;
  limit: number;
  reranker: Reranker;
}

export interface SearchResults {
  edges: GraphEdge[];
  nodes: GraphNode[];
  episodes: GraphEpisode[];
}

export interface MemoryService {
  /** Create the user if needed. An existing user is not an error. */
  ensureUser(userId: string, signal?: AbortSignal): Promise<void>;
  addEpisodes(userId: string, episodes: Episode[], signal?: AbortSignal): Promise<void>;
  search(userId: string, request: SearchRequest, signal?: AbortSignal): Promise<SearchResults>;
}

const SearchResponseSchema = z.object({
  edges: z
    .array(
      z.object({
        fact: z.string(),
        valid_at: z.string().nullish(),
        invalid_at: z.string().nullish(),
      })
    )
    .nullish(),
  nodes: z
    .array(
      z.object({
        name: z.string(),
        summary: z.string().nullish(),
        labels: z.array(z.string()).nullish(),
      })
    )
    .nullish(),
  episodes: z
    .array(
      z.object({
        content: z.string(),
        created_at: z.string().nullish(),
      })
    )
    .nullish(),
});

export interface MemoryClientOptions {
  baseUrl: string;
  apiKey: string;
  /** Transport override; defaults to axios' HTTP adapter. */
  adapter?: AxiosAdapter;
}

export class MemoryClient implements MemoryService {
  private readonly http: AxiosInstance;
  private requests = 0;

  constructor(options: MemoryClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Api-Key ${options.apiKey}`,
      },
      adapter: options.adapter,
    });
  }

  async ensureUser(userId: string, signal?: AbortSignal): Promise<void> {
    this.requests++;
    try {
      await this.http.post('/users', { user_id: userId }, { signal });
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 409) {
        return;
      }
      throw error;
    }
  }

  async addEpisodes(userId: string, episodes: Episode[], signal?: AbortSignal): Promise<void> {
    this.requests++;
    await this.http.post(
      '/graph-batch',
      {
        user_id: userId,
        episodes: episodes.map((episode) => ({
          data: episode.data,
          type: 'text',
          created_at: episode.createdAt,
        })),
      },
      { signal }
    );
  }

  async search(userId: string, request: SearchRequest, signal?: AbortSignal): Promise<SearchResults> {
    this.requests++;
    const response = await this.http.post(
      '/graph/search',
      {
        user_id: userId,
        query: request.query,
        scope: request.scope,
        limit: request.limit,
        reranker: request.reranker,
      },
      { signal }
    );

    const body = SearchResponseSchema.parse(response.data);
    return {
      edges: (body.edges ?? []).map((edge) => ({
        fact: edge.fact,
        validAt: edge.valid_at ?? null,
        invalidAt: edge.invalid_at ?? null,
      })),
      nodes: (body.nodes ?? []).map((node) => ({
        name: node.name,
        summary: node.summary ?? '',
        labels: node.labels ?? [],
      })),
      episodes: (body.episodes ?? []).map((episode) => ({
        content: episode.content,
        createdAt: episode.created_at ?? null,
      })),
    };
  }

  get requestCount(): number {
    return this.requests;
  }
}
