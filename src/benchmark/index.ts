#!/usr/bin/env node
/**
 * Graph memory benchmark - Main Entry Point
 * Ingest a conversational QA dataset into the memory service and evaluate answers built from its retrieval
 */
import 'dotenv/config';
import { parseArgs } from 'util';
import { ConfigurationError } from '../utils/errors.js';
import { errorMessage, isLogLevel, logger } from '../utils/logger.js';
import { createConfig, getDatasetPath, loadConfig, loadCredentials, type LoadedConfig } from './config.js';
import { freeTokenizers } from './context/ContextComposer.js';
import { loadDataset } from './datasets/index.js';
import { ReportGenerator } from './report/ReportGenerator.js';
import { RunPersistence } from './report/RunPersistence.js';
import {
  createServices,
  defaultCheckpointPath,
  evaluationExitCode,
  ingestionExitCode,
  runEvaluation,
  runIngestion,
} from './runner.js';

const USAGE = `Usage: graph-memory-bench [--ingest | --eval | --all] [options]

Modes (default --all):
  --ingest                 ingest the dataset into the memory service
  --eval                   evaluate questions against ingested memory
  --all                    ingest, then evaluate

Options:
  --config <path>          YAML config file (default benchmark.config.yaml)
  --dataset-path <path>    dataset JSON file
  --num-users <n>          number of users/conversations to use
  --checkpoint <path>      ingestion checkpoint file
  --experiments-dir <dir>  where run directories are written (default experiments)
  --log-level <level>      debug | info | warn | error
  --help                   show this message`;

function parseCli(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      ingest: { type: 'boolean', default: false },
      eval: { type: 'boolean', default: false },
      all: { type: 'boolean', default: false },
      config: { type: 'string' },
      'dataset-path': { type: 'string' },
      'num-users': { type: 'string' },
      checkpoint: { type: 'string' },
      'experiments-dir': { type: 'string' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });
  return values;
}

/** Apply command-line overrides, revalidating the result. */
function applyOverrides(loaded: LoadedConfig, datasetPath?: string, numUsers?: string): LoadedConfig {
  if (datasetPath === undefined && numUsers === undefined) {
    return loaded;
  }
  const { config } = loaded;
  const overridden = createConfig({
    ...config,
    dataset: {
      ...config.dataset,
      ...(datasetPath !== undefined ? { path: datasetPath } : {}),
      ...(numUsers !== undefined ? { numUsers: Number(numUsers) } : {}),
    },
  });
  // The file on disk no longer describes the run; save the effective config instead.
  return { config: overridden };
}

async function main(): Promise<number> {
  let args: ReturnType<typeof parseCli>;
  try {
    args = parseCli(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 1;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const logLevel = args['log-level'];
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(`Unknown log level: ${logLevel}`);
    }
    logger.setLevel(logLevel);
  }

  const all = args.all || (!args.ingest && !args.eval);
  const doIngest = all || args.ingest;
  const doEval = all || args.eval;

  console.log('[1/4] Loading configuration...');
  const { config, sourcePath } = applyOverrides(
    await loadConfig(args.config),
    args['dataset-path'],
    args['num-users']
  );
  const credentials = loadCredentials();
  console.log(`✓ Configuration loaded (dataset: ${config.dataset.name}, model: ${config.models.responseModel})`);

  console.log('\n[2/4] Loading dataset...');
  const dataset = await loadDataset(config.dataset.name, getDatasetPath(config), config.dataset);
  console.log(`✓ Loaded ${dataset.transcripts.length} sessions and ${dataset.questions.length} questions`);

  const services = createServices(credentials, config);
  const reports = new ReportGenerator();
  let exitCode = 0;

  try {
    if (doIngest) {
      console.log('\n[3/4] Ingesting sessions...');
      const ingest = await runIngestion({
        config,
        transcripts: dataset.transcripts,
        memory: services.memory,
        checkpointPath: args.checkpoint ?? defaultCheckpointPath(config),
      });
      reports.printIngestSummary(ingest);
      if (ingest.unitsFailed > 0) {
        logger.warn('Some units failed to ingest; rerun to retry them', { failed: ingest.unitsFailed });
      }
      exitCode = Math.max(exitCode, ingestionExitCode(ingest));
    }

    if (doEval) {
      console.log('\n[4/4] Evaluating questions...');
      let done = 0;
      const outcome = await runEvaluation({
        config,
        questions: dataset.questions,
        services,
        persistence: new RunPersistence({ experimentsDir: args['experiments-dir'] }),
        configSourcePath: sourcePath,
        onResult: () => {
          done++;
          if (done % 10 === 0 || done === dataset.questions.length) {
            logger.info(`[Evaluation Phase] Progress ${done}/${dataset.questions.length}`);
          }
        },
      });
      reports.printSummary(outcome.saved.record, outcome.saved.runDir);
      if (outcome.report.metrics.excludedCount > 0) {
        logger.warn('Some questions failed and were excluded from accuracy', {
          excluded: outcome.report.metrics.excludedCount,
        });
      }
      exitCode = Math.max(exitCode, evaluationExitCode(outcome.results));
    }
  } finally {
    freeTokenizers();
  }

  return exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`\n✗ ${error.message}`);
    } else {
      logger.error('Benchmark failed', { error: errorMessage(error) });
    }
    process.exitCode = 1;
  });
