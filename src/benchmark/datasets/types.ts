import type { Question, Transcript } from '../types.js';

export interface DatasetOptions {
  numUsers: number;
  maxSessionCount: number;
  userPrefix: string;
}

export interface LoadedDataset {
  transcripts: Transcript[];
  questions: Question[];
}
