import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../../utils/errors.js';
import { parseLocomoDate, parseLongMemEvalDate } from '../dates.js';
import { loadDataset, parseDataset } from '../index.js';
import { parseLocomo } from '../locomo.js';
import { parseLongMemEval } from '../longmemeval.js';

const options = { numUsers: 10, maxSessionCount: 35, userPrefix: 'bench' };

const locomoSample = {
  qa: [
    { question: 'When did Caroline go to the support group?', answer: '7 May 2023', category: 2 },
    { question: 'What did Melanie paint?', answer: 'A sunset', category: 5 },
    { question: 'How many children does Melanie have?', answer: 3, category: 1, difficulty: 'hard' },
  ],
  conversation: {
    speaker_a: 'Caroline',
    speaker_b: 'Melanie',
    session_2_date_time: '8:10 am on 20 May, 2023',
    session_2: [{ speaker: 'Melanie', text: 'I ran a charity race.' }],
    session_10_date_time: 'sometime in June',
    session_10: [{ speaker: 'User', text: 'Look at this.', blip_caption: 'a photo of a lake' }],
    session_1_date_time: '1:56 pm on 8 May, 2023',
    session_1: [
      { speaker: 'Caroline', text: 'I went to a support group yesterday.' },
      { speaker: 'Melanie', text: 'That sounds meaningful!' },
    ],
    session_3: [],
  },
};

const longMemEvalRow = {
  question_id: 'e47becba',
  question_type: 'temporal-reasoning',
  question: 'How many days ago did I buy the bike?',
  question_date: '2023/05/30 (Tue) 23:40',
  answer: 10,
  haystack_dates: ['2023/05/20 (Sat) 02:21', 'not a date', '2023/05/22 (Mon) 09:00'],
  haystack_sessions: [
    [
      { role: 'user', content: 'I bought a bike today.' },
      { role: 'assistant', content: 'Congratulations!' },
    ],
    [{ role: 'user', content: 'Any tips for a first ride?' }],
    [],
  ],
};

describe('dates', () => {
  it('parses LOCOMO session times as UTC', () => {
    expect(parseLocomoDate('1:56 pm on 8 May, 2023')).toBe('2023-05-08T13:56:00.000Z');
    expect(parseLocomoDate('12:05 am on 1 January, 2024')).toBe('2024-01-01T00:05:00.000Z');
    expect(parseLocomoDate('12:30 pm on 15 July 2023')).toBe('2023-07-15T12:30:00.000Z');
  });

  it('rejects impossible LOCOMO times', () => {
    expect(parseLocomoDate('13:00 pm on 8 May, 2023')).toBeUndefined();
    expect(parseLocomoDate('1:75 pm on 8 May, 2023')).toBeUndefined();
    expect(parseLocomoDate('1:00 pm on 31 February, 2023')).toBeUndefined();
    expect(parseLocomoDate('1:00 pm on 8 Smarch, 2023')).toBeUndefined();
    expect(parseLocomoDate('yesterday')).toBeUndefined();
  });

  it('parses LongMemEval session times as UTC', () => {
    expect(parseLongMemEvalDate('2023/05/20 (Sat) 02:21')).toBe('2023-05-20T02:21:00.000Z');
    expect(parseLongMemEvalDate('2023/02/30 (Thu) 02:21')).toBeUndefined();
    expect(parseLongMemEvalDate('2023/05/20 (Sat) 24:00')).toBeUndefined();
    expect(parseLongMemEvalDate('2023-05-20 02:21')).toBeUndefined();
  });
});

describe('parseLocomo', () => {
  it('turns each session into a transcript in session order', () => {
    const { transcripts } = parseLocomo([locomoSample], options);

    expect(transcripts.map((transcript) => transcript.sessionKey)).toEqual(['session_1', 'session_2', 'session_10']);
    expect(transcripts[0]).toEqual({
      userId: 'bench_experiment_user_0',
      sessionKey: 'session_1',
      createdAt: '2023-05-08T13:56:00.000Z',
      messages: [
        { speaker: 'Caroline', role: 'assistant', content: 'I went to a support group yesterday.' },
        { speaker: 'Melanie', role: 'assistant', content: 'That sounds meaningful!' },
      ],
    });
  });

  it('keeps sessions without a usable time and appends image captions', () => {
    const { transcripts } = parseLocomo([locomoSample], options);

    expect(transcripts[2].createdAt).toBeUndefined();
    expect(transcripts[2].messages).toEqual([
      { speaker: 'User', role: 'user', content: 'Look at this. (description of attached image: a photo of a lake)' },
    ]);
  });

  it('limits sessions per user', () => {
    const { transcripts } = parseLocomo([locomoSample], { ...options, maxSessionCount: 2 });

    expect(transcripts.map((transcript) => transcript.sessionKey)).toEqual(['session_1', 'session_2']);
  });

  it('skips unanswerable questions and keeps their numbering', () => {
    const { questions } = parseLocomo([locomoSample], options);

    expect(questions).toEqual([
      {
        userId: 'bench_experiment_user_0',
        questionId: 'bench_experiment_user_0_qa_0',
        question: 'When did Caroline go to the support group?',
        goldAnswer: '7 May 2023',
        category: '2',
        difficulty: 'unknown',
      },
      {
        userId: 'bench_experiment_user_0',
        questionId: 'bench_experiment_user_0_qa_2',
        question: 'How many children does Melanie have?',
        goldAnswer: '3',
        category: '1',
        difficulty: 'hard',
      },
    ]);
  });

  it('limits the number of users', () => {
    const { questions } = parseLocomo([locomoSample, locomoSample, locomoSample], { ...options, numUsers: 2 });

    expect(new Set(questions.map((question) => question.userId))).toEqual(
      new Set(['bench_experiment_user_0', 'bench_experiment_user_1'])
    );
  });
});

describe('parseLongMemEval', () => {
  it('builds one user per row with its haystack sessions', () => {
    const { transcripts, questions } = parseLongMemEval([longMemEvalRow], options);

    expect(transcripts).toEqual([
      {
        userId: 'bench_experiment_user_0',
        sessionKey: 'session_0',
        createdAt: '2023-05-20T02:21:00.000Z',
        messages: [
          { speaker: 'User', role: 'user', content: 'I bought a bike today.' },
          { speaker: 'Assistant', role: 'assistant', content: 'Congratulations!' },
        ],
      },
      {
        userId: 'bench_experiment_user_0',
        sessionKey: 'session_1',
        createdAt: undefined,
        messages: [{ speaker: 'User', role: 'user', content: 'Any tips for a first ride?' }],
      },
    ]);
    expect(questions).toEqual([
      {
        userId: 'bench_experiment_user_0',
        questionId: 'e47becba',
        question: '(date: 2023/05/30 (Tue) 23:40) How many days ago did I buy the bike?',
        goldAnswer: '10',
        category: 'temporal-reasoning',
        difficulty: 'unknown',
      },
    ]);
  });

  it('requires a date for every session', () => {
    const row = { ...longMemEvalRow, haystack_dates: ['2023/05/20 (Sat) 02:21'] };

    expect(() => parseLongMemEval([row], options)).toThrow('haystack_dates must have an entry for every session');
  });
});

describe('loadDataset', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bench-dataset-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a dataset file', async () => {
    const path = join(dir, 'locomo.json');
    await writeFile(path, JSON.stringify([locomoSample]));

    const dataset = await loadDataset('locomo', path, options);

    expect(dataset.transcripts).toHaveLength(3);
    expect(dataset.questions).toHaveLength(2);
  });

  it('reports missing and malformed files as configuration errors', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '[{');

    await expect(loadDataset('locomo', join(dir, 'missing.json'), options)).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(loadDataset('locomo', path, options)).rejects.toThrow(`Dataset ${path} is not valid JSON`);
  });

  it('lists where the data does not match the format', () => {
    expect(() => parseDataset('longmemeval', [{ question_id: 'x' }], options)).toThrow(ConfigurationError);
    expect(() => parseDataset('locomo', { qa: [] }, options)).toThrow(
      'Dataset does not match the locomo format:\n  - (root): Expected array, received object'
    );
  });
});
