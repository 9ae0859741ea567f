/**
 * Turns retrieved graph results into the context string handed to the
 * response model, trimmed to the configured token budget.
 */
import { get_encoding, type Tiktoken, type TiktokenEncoding } from 'tiktoken';
import { renderContext } from '../prompts.js';
import type { GraphEdge, GraphEpisode, GraphNode, RetrievedContext } from '../types.js';

export type TokenCounter = (text: string) => number;

const encoders = new Map<TiktokenEncoding, Tiktoken>();

function encodingForModel(model: string): TiktokenEncoding {
  return /^(gpt-4o|gpt-4\.1|o\d)/.test(model) ? 'o200k_base' : 'cl100k_base';
}

/**
 * Token counter backed by tiktoken. Encoders are cached per encoding
 * until freeTokenizers() is called.
 */
export function createTiktokenCounter(model: string): TokenCounter {
  const encoding = encodingForModel(model);
  return (text: string): number => {
    let encoder = encoders.get(encoding);
    if (!encoder) {
      encoder = get_encoding(encoding);
      encoders.set(encoding, encoder);
    }
    // Retrieved text may contain strings such as <|endoftext|>; count them as plain text.
    return encoder.encode(text, [], []).length;
  };
}

export function freeTokenizers(): void {
  for (const encoder of encoders.values()) {
    encoder.free();
  }
  encoders.clear();
}

export interface ComposeOptions {
  maxTokens: number;
  countTokens: TokenCounter;
}

export interface ComposedContext {
  context: string;
  tokens: number;
  chars: number;
  truncated: boolean;
}

export function formatEdge(edge: GraphEdge): string {
  const validAt = edge.validAt ?? 'date unknown';
  const invalidAt = edge.invalidAt ?? 'present';
  return `  - ${edge.fact} (event_time: ${validAt} - ${invalidAt})`;
}

export function formatNode(node: GraphNode): string {
  return node.summary ? `  - ${node.name}: ${node.summary}` : `  - ${node.name}`;
}

export function formatEpisode(episode: GraphEpisode): string {
  return episode.createdAt ? `  - (${episode.createdAt}) ${episode.content}` : `  - ${episode.content}`;
}

/**
 * Render retrieved items in relevance order. While the result is over budget,
 * the last remaining item is dropped: episodes go first, then entities, then facts.
 */
export function composeContext(retrieved: RetrievedContext, options: ComposeOptions): ComposedContext {
  const facts = retrieved.edges.map(formatEdge);
  const entities = retrieved.nodes.map(formatNode);
  const episodes = retrieved.episodes.map(formatEpisode);

  let context = renderContext(facts, entities, episodes);
  let tokens = options.countTokens(context);
  let truncated = false;

  while (tokens > options.maxTokens) {
    if (episodes.length > 0) {
      episodes.pop();
    } else if (entities.length > 0) {
      entities.pop();
    } else if (facts.length > 0) {
      facts.pop();
    } else {
      break;
    }
    truncated = true;
    context = renderContext(facts, entities, episodes);
    tokens = options.countTokens(context);
  }

  return { context, tokens, chars: context.length, truncated };
}
