/**
 * LOCOMO loader: each conversation becomes one user, each session one transcript.
 */
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import type { Question, Transcript, TranscriptMessage } from '../types.js';
import { parseLocomoDate } from './dates.js';
import type { DatasetOptions, LoadedDataset } from './types.js';

/** Adversarial questions ship without gold answers. */
const UNANSWERABLE_CATEGORY = 5;

const LocomoMessageSchema = z.object({
  speaker: z.string(),
  text: z.string(),
  blip_caption: z.string().nullish(),
  blip_captions: z.string().nullish(),
});

const LocomoQaSchema = z.object({
  question: z.string(),
  answer: z.union([z.string(), z.number()]).nullish(),
  category: z.union([z.number(), z.string()]),
  difficulty: z.union([z.string(), z.number()]).nullish(),
});

const LocomoSampleSchema = z.object({
  qa: z.array(LocomoQaSchema),
  conversation: z.record(z.string(), z.unknown()),
});

export const LocomoDatasetSchema = z.array(LocomoSampleSchema);

const SessionSchema = z.array(LocomoMessageSchema);
const SESSION_KEY = /^session_(\d+)$/;

export function locomoUserId(prefix: string, index: number): string {
  return `${prefix}_experiment_user_${index}`;
}

function toMessage(raw: z.infer<typeof LocomoMessageSchema>): TranscriptMessage {
  const caption = raw.blip_caption ?? raw.blip_captions;
  const content = caption ? `${raw.text} (description of attached image: ${caption})` : raw.text;
  return {
    speaker: raw.speaker,
    role: raw.speaker === 'User' ? 'user' : 'assistant',
    content,
  };
}

function sessionTranscripts(
  userId: string,
  conversation: Record<string, unknown>,
  maxSessionCount: number
): Transcript[] {
  const sessionNumbers = Object.keys(conversation)
    .map((key) => SESSION_KEY.exec(key))
    .filter((match): match is RegExpExecArray => match !== null)
    .map((match) => Number(match[1]))
    .sort((a, b) => a - b)
    .slice(0, maxSessionCount);

  const transcripts: Transcript[] = [];
  for (const sessionNumber of sessionNumbers) {
    const sessionKey = `session_${sessionNumber}`;
    const messages = SessionSchema.parse(conversation[sessionKey]).map(toMessage);
    if (messages.length === 0) {
      continue;
    }

    const rawDate = conversation[`${sessionKey}_date_time`];
    const createdAt = typeof rawDate === 'string' ? parseLocomoDate(rawDate) : undefined;
    if (createdAt === undefined) {
      logger.warn('Session has no usable timestamp', { userId, sessionKey, value: rawDate });
    }

    transcripts.push({ userId, sessionKey, createdAt, messages });
  }
  return transcripts;
}

export function parseLocomo(data: unknown, options: DatasetOptions): LoadedDataset {
  const samples = LocomoDatasetSchema.parse(data).slice(0, options.numUsers);
  const transcripts: Transcript[] = [];
  const questions: Question[] = [];

  samples.forEach((sample, sampleIndex) => {
    const userId = locomoUserId(options.userPrefix, sampleIndex);
    transcripts.push(...sessionTranscripts(userId, sample.conversation, options.maxSessionCount));

    sample.qa.forEach((qa, qaIndex) => {
      if (Number(qa.category) === UNANSWERABLE_CATEGORY) {
        return;
      }
      questions.push({
        userId,
        questionId: `${userId}_qa_${qaIndex}`,
        question: qa.question,
        goldAnswer: String(qa.answer ?? ''),
        category: String(qa.category),
        difficulty: qa.difficulty === undefined || qa.difficulty === null ? 'unknown' : String(qa.difficulty),
      });
    });
  });

  return { transcripts, questions };
}
