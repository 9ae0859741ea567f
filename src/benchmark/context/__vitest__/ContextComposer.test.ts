import { afterAll, describe, expect, it } from 'vitest';
import type { RetrievedContext } from '../../types.js';
import {
  composeContext,
  createTiktokenCounter,
  formatEdge,
  formatEpisode,
  formatNode,
  freeTokenizers,
  type TokenCounter,
} from '../ContextComposer.js';

/** One "token" per rendered item. */
const countItems: TokenCounter = (text) => text.split('\n').filter((line) => line.startsWith('  - ')).length;

const retrieved: RetrievedContext = {
  edges: [
    { fact: 'Caroline attended a support group', validAt: '2023-05-07T00:00:00Z' },
    { fact: 'Melanie ran a charity race', validAt: '2023-05-20T00:00:00Z', invalidAt: '2023-05-21T00:00:00Z' },
  ],
  nodes: [
    { name: 'Caroline', summary: 'Friend of Melanie' },
    { name: 'Melanie', summary: '' },
  ],
  episodes: [
    { content: 'Caroline: I went to a support group yesterday.', createdAt: '2023-05-08T13:56:00Z' },
    { content: 'Melanie: The race went well.' },
  ],
};

describe('formatting', () => {
  it('formats facts with their event window', () => {
    expect(formatEdge(retrieved.edges[1])).toBe(
      '  - Melanie ran a charity race (event_time: 2023-05-20T00:00:00Z - 2023-05-21T00:00:00Z)'
    );
    expect(formatEdge({ fact: 'Caroline likes pottery' })).toBe(
      '  - Caroline likes pottery (event_time: date unknown - present)'
    );
  });

  it('formats entities and episodes', () => {
    expect(formatNode(retrieved.nodes[0])).toBe('  - Caroline: Friend of Melanie');
    expect(formatNode(retrieved.nodes[1])).toBe('  - Melanie');
    expect(formatEpisode(retrieved.episodes[0])).toBe(
      '  - (2023-05-08T13:56:00Z) Caroline: I went to a support group yesterday.'
    );
    expect(formatEpisode(retrieved.episodes[1])).toBe('  - Melanie: The race went well.');
  });
});

describe('composeContext', () => {
  it('keeps everything within budget', () => {
    const composed = composeContext(retrieved, { maxTokens: 6, countTokens: countItems });

    expect(composed.truncated).toBe(false);
    expect(composed.tokens).toBe(6);
    expect(composed.chars).toBe(composed.context.length);
    expect(composed.context).toContain('<MESSAGES>\n  - (2023-05-08T13:56:00Z)');
  });

  it('drops episodes before entities', () => {
    const composed = composeContext(retrieved, { maxTokens: 3, countTokens: countItems });

    expect(composed.truncated).toBe(true);
    expect(composed.tokens).toBe(3);
    expect(composed.context).not.toContain('<MESSAGES>');
    expect(composed.context).toContain('<ENTITIES>\n  - Caroline: Friend of Melanie\n</ENTITIES>');
    expect(composed.context).toContain('  - Melanie ran a charity race');
  });

  it('drops facts last, from the end', () => {
    const composed = composeContext(retrieved, { maxTokens: 1, countTokens: countItems });

    expect(composed.context).toContain(
      '<FACTS>\n  - Caroline attended a support group (event_time: 2023-05-07T00:00:00Z - present)\n</FACTS>'
    );
    expect(composed.context).toContain('<ENTITIES>\n\n</ENTITIES>');
  });

  it('stops when nothing is left to drop', () => {
    const composed = composeContext(retrieved, { maxTokens: 0, countTokens: () => 10 });

    expect(composed.truncated).toBe(true);
    expect(composed.tokens).toBe(10);
    expect(composed.context).toContain('<FACTS>\n\n</FACTS>');
  });
});

describe('createTiktokenCounter', () => {
  afterAll(() => {
    freeTokenizers();
  });

  it('counts tokens with the model encoding', () => {
    const count = createTiktokenCounter('gpt-4o-mini');

    expect(count('')).toBe(0);
    expect(count('hello world')).toBe(2);
  });

  it('counts special-token markers in retrieved text as plain text', () => {
    const count = createTiktokenCounter('gpt-4o-mini');

    expect(() => count('Caroline typed <|endoftext|> into the chat')).not.toThrow();
    // As a special token the marker would be a single token.
    expect(count('<|endoftext|>')).toBeGreaterThan(1);
  });
});
