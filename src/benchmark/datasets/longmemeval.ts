/**
 * LongMemEval loader: each row is one user with a haystack of sessions and a
 * single question.
 */
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import type { Question, Transcript } from '../types.js';
import { parseLongMemEvalDate } from './dates.js';
import type { DatasetOptions, LoadedDataset } from './types.js';

const LongMemEvalMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

const LongMemEvalRowSchema = z
  .object({
    question_id: z.union([z.string(), z.number()]),
    question_type: z.string(),
    question: z.string(),
    question_date: z.string(),
    answer: z.union([z.string(), z.number()]),
    haystack_dates: z.array(z.string()),
    haystack_sessions: z.array(z.array(LongMemEvalMessageSchema)),
  })
  .refine((row) => row.haystack_dates.length >= row.haystack_sessions.length, {
    message: 'haystack_dates must have an entry for every session',
    path: ['haystack_dates'],
  });

export const LongMemEvalDatasetSchema = z.array(LongMemEvalRowSchema);

export function longMemEvalUserId(prefix: string, index: number): string {
  return `${prefix}_experiment_user_${index}`;
}

export function parseLongMemEval(data: unknown, options: DatasetOptions): LoadedDataset {
  const rows = LongMemEvalDatasetSchema.parse(data).slice(0, options.numUsers);
  const transcripts: Transcript[] = [];
  const questions: Question[] = [];

  rows.forEach((row, rowIndex) => {
    const userId = longMemEvalUserId(options.userPrefix, rowIndex);

    row.haystack_sessions.slice(0, options.maxSessionCount).forEach((session, sessionIndex) => {
      if (session.length === 0) {
        return;
      }
      const sessionKey = `session_${sessionIndex}`;
      const createdAt = parseLongMemEvalDate(row.haystack_dates[sessionIndex]);
      if (createdAt === undefined) {
        logger.warn('Session has no usable timestamp', {
          userId,
          sessionKey,
          value: row.haystack_dates[sessionIndex],
        });
      }
      transcripts.push({
        userId,
        sessionKey,
        createdAt,
        messages: session.map((message) => ({
          speaker: message.role === 'user' ? 'User' : 'Assistant',
          role: message.role,
          content: message.content,
        })),
      });
    });

    questions.push({
      userId,
      questionId: String(row.question_id),
      question: `(date: ${row.question_date}) ${row.question}`,
      goldAnswer: String(row.answer),
      category: row.question_type,
      difficulty: 'unknown',
    });
  });

  return { transcripts, questions };
}
