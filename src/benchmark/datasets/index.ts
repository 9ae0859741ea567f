import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { DatasetName } from '../config.js';
import { ConfigurationError } from '../../utils/errors.js';
import { errorMessage, logger } from '../../utils/logger.js';
import { parseLocomo } from './locomo.js';
import { parseLongMemEval } from './longmemeval.js';
import type { DatasetOptions, LoadedDataset } from './types.js';

export type { DatasetOptions, LoadedDataset } from './types.js';

const PARSERS: Record<DatasetName, (data: unknown, options: DatasetOptions) => LoadedDataset> = {
  locomo: parseLocomo,
  longmemeval: parseLongMemEval,
};

export function parseDataset(name: DatasetName, data: unknown, options: DatasetOptions): LoadedDataset {
  try {
    return PARSERS[name](data, options);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .slice(0, 5)
        .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n');
      throw new ConfigurationError(`Dataset does not match the ${name} format:\n${issues}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Read and parse a dataset file.
 * @throws ConfigurationError when the file is missing, is not JSON, or has the wrong shape
 */
export async function loadDataset(name: DatasetName, path: string, options: DatasetOptions): Promise<LoadedDataset> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read dataset ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Dataset ${path} is not valid JSON`, { cause: error });
  }

  const dataset = parseDataset(name, data, options);
  logger.info('Dataset loaded', {
    dataset: name,
    path,
    transcripts: dataset.transcripts.length,
    questions: dataset.questions.length,
  });
  return dataset;
}
