/**
 * Transcript rendering, chunking and batching for ingestion.
 *
 * A transcript is rendered one line per dialogue turn. Chunks break between
 * lines; a single line longer than the chunk budget is hard-split at the
 * budget, which is the only case where a turn spans two chunks. Each chunk
 * after the first starts with the tail of the previous chunk's body so that
 * context crossing a boundary reaches the memory service twice.
 */
import { createHash } from 'crypto';
import type { Episode, IngestionUnit, TextChunk, Transcript, TranscriptMessage } from '../types.js';

export interface ChunkOptions {
  maxChunkChars: number;
  chunkOverlapChars: number;
}

export interface BatchOptions extends ChunkOptions {
  maxItemsPerBatch: number;
}

export function renderMessage(message: TranscriptMessage): string {
  return `${message.speaker} (${message.role}): ${message.content}\n`;
}

export function renderTranscript(transcript: Transcript): string {
  return transcript.messages.map(renderMessage).join('');
}

/**
 * Split lines into chunks of at most `maxChunkChars` characters, overlap included.
 * A line that fits the budget always stays within one chunk body; the overlap
 * carried in front of it is shortened when both do not fit. Joining
 * `chunk.text.slice(chunk.overlapChars)` over all chunks gives back
 * `lines.join('')`.
 */
export function chunkLines(lines: readonly string[], options: ChunkOptions): TextChunk[] {
  const { maxChunkChars, chunkOverlapChars } = options;
  if (!Number.isInteger(maxChunkChars) || maxChunkChars < 1) {
    throw new RangeError(`maxChunkChars must be a positive integer, got ${maxChunkChars}`);
  }
  if (!Number.isInteger(chunkOverlapChars) || chunkOverlapChars < 0 || chunkOverlapChars >= maxChunkChars) {
    throw new RangeError(`chunkOverlapChars must be in [0, ${maxChunkChars - 1}], got ${chunkOverlapChars}`);
  }

  const chunks: TextChunk[] = [];
  let overlap = '';
  let body = '';

  const room = (): number => maxChunkChars - overlap.length;
  const close = (): void => {
    chunks.push({ index: chunks.length, overlapChars: overlap.length, text: overlap + body });
    overlap = chunkOverlapChars > 0 ? body.slice(-chunkOverlapChars) : '';
    body = '';
  };

  for (const line of lines) {
    if (line.length === 0) {
      continue;
    }
    if (body.length + line.length <= room()) {
      body += line;
      continue;
    }
    if (body.length > 0) {
      close();
    }

    if (line.length <= maxChunkChars) {
      // The turn fits a chunk on its own; shorten the carried overlap instead of splitting it.
      if (line.length > room()) {
        overlap = overlap.slice(overlap.length - (maxChunkChars - line.length));
      }
      body = line;
      continue;
    }

    // Oversized turn: hard split.
    let rest = line;
    while (rest.length > room()) {
      body = rest.slice(0, room());
      rest = rest.slice(body.length);
      close();
    }
    body = rest;
  }

  if (body.length > 0) {
    close();
  }
  return chunks;
}

export function chunkTranscript(transcript: Transcript, options: ChunkOptions): TextChunk[] {
  return chunkLines(transcript.messages.map(renderMessage), options);
}

/** Restore the rendered transcript from its chunks. */
export function joinChunks(chunks: readonly TextChunk[]): string {
  return chunks.map((chunk) => chunk.text.slice(chunk.overlapChars)).join('');
}

export function batchItems<T>(items: readonly T[], maxItems: number): T[][] {
  if (!Number.isInteger(maxItems) || maxItems < 1) {
    throw new RangeError(`maxItems must be a positive integer, got ${maxItems}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += maxItems) {
    batches.push(items.slice(i, i + maxItems));
  }
  return batches;
}

/**
 * Stable id for a transcript: its position plus a digest of its content and
 * the chunking settings, so changing either produces a new unit.
 */
export function deriveUnitId(transcript: Transcript, options: BatchOptions): string {
  const digest = createHash('sha256')
    .update(JSON.stringify([options.maxChunkChars, options.chunkOverlapChars, options.maxItemsPerBatch]))
    .update(transcript.createdAt ?? '')
    .update(renderTranscript(transcript))
    .digest('hex')
    .slice(0, 12);
  return `${transcript.userId}:${transcript.sessionKey}:${digest}`;
}

export function batchKey(unitId: string, batchIndex: number): string {
  return `${unitId}#${batchIndex}`;
}

export function buildIngestionUnit(transcript: Transcript, options: BatchOptions): IngestionUnit {
  const chunks = chunkTranscript(transcript, options);
  const episodes: Episode[] = chunks.map((chunk) => ({
    data: chunk.text,
    createdAt: transcript.createdAt,
  }));
  return {
    unitId: deriveUnitId(transcript, options),
    transcript,
    chunks,
    batches: batchItems(episodes, options.maxItemsPerBatch),
  };
}
