/**
 * Phase 1: Ingest
 * Chunk transcripts and store them in the memory service, resuming from the checkpoint
 */
import type { CheckpointStore } from '../checkpoint/CheckpointStore.js';
import { retryPolicyFrom, type BenchmarkConfig } from '../config.js';
import { batchKey, buildIngestionUnit } from '../ingest/chunking.js';
import type { MemoryService } from '../memory/MemoryClient.js';
import type { IngestionUnit, IngestResult, Transcript } from '../types.js';
import { asFatalError, UnitFailure } from '../../utils/errors.js';
import { errorMessage, logger } from '../../utils/logger.js';
import { unwrapRetryError, withRetry, type RetryPolicy } from '../../utils/retry.js';
import { Semaphore } from '../../utils/Semaphore.js';

export class IngestPhase {
  private readonly memory: MemoryService;
  private readonly checkpoint: CheckpointStore;
  private readonly config: BenchmarkConfig;
  private readonly policy: RetryPolicy;
  private readonly users = new Map<string, Promise<void>>();

  constructor(memory: MemoryService, checkpoint: CheckpointStore, config: BenchmarkConfig) {
    this.memory = memory;
    this.checkpoint = checkpoint;
    this.config = config;
    this.policy = retryPolicyFrom(config);
  }

  /**
   * Run the ingest phase
   * @param transcripts Sessions to ingest; units already marked done are skipped
   * @throws ConfigurationError when the memory service rejects the credentials
   */
  async run(transcripts: Transcript[]): Promise<IngestResult> {
    const startTime = Date.now();
    const units = transcripts.map((transcript) => buildIngestionUnit(transcript, this.config.ingestion));
    const pending = units.filter((unit) => !this.checkpoint.isDone(unit.unitId));

    const result: IngestResult = {
      unitsTotal: units.length,
      unitsSkipped: units.length - pending.length,
      unitsSucceeded: 0,
      unitsFailed: 0,
      chunksCreated: pending.reduce((sum, unit) => sum + unit.chunks.length, 0),
      batchesSubmitted: 0,
      failures: [],
      duration: 0,
    };

    logger.info('[Ingest Phase] Starting ingest', {
      units: units.length,
      pending: pending.length,
      skipped: result.unitsSkipped,
      concurrency: this.config.ingestionConcurrency,
    });

    const gate = new Semaphore(this.config.ingestionConcurrency);
    const outcomes = await Promise.allSettled(
      pending.map((unit) => gate.run(() => this.processUnit(unit, result)))
    );

    result.duration = Date.now() - startTime;

    const fatal = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (fatal) {
      throw fatal.reason;
    }

    logger.info('[Ingest Phase] Completed', {
      seconds: Number((result.duration / 1000).toFixed(2)),
      succeeded: result.unitsSucceeded,
      failed: result.unitsFailed,
      skipped: result.unitsSkipped,
      batches: result.batchesSubmitted,
    });
    return result;
  }

  /**
   * Submit every batch of one unit. Failures are recorded on the result;
   * only critical errors escape.
   */
  private async processUnit(unit: IngestionUnit, result: IngestResult): Promise<void> {
    const { userId } = unit.transcript;
    try {
      await this.ensureUser(userId);

      for (let i = 0; i < unit.batches.length; i++) {
        const key = batchKey(unit.unitId, i);
        if (this.checkpoint.isDone(key)) {
          continue;
        }
        const episodes = unit.batches[i];
        await withRetry((signal) => this.memory.addEpisodes(userId, episodes, signal), {
          label: `Ingest ${key}`,
          policy: this.policy,
          timeoutMs: this.config.requestTimeoutMs,
        });
        result.batchesSubmitted++;
        await this.checkpoint.markDone(key);
      }

      await this.checkpoint.markDone(unit.unitId);
      result.unitsSucceeded++;
      logger.debug('[Ingest Phase] ✓ Unit ingested', { unitId: unit.unitId, batches: unit.batches.length });
    } catch (error) {
      const { cause, attempts } = unwrapRetryError(error);
      const fatal = asFatalError(cause);
      if (fatal) {
        throw fatal;
      }

      const failure = new UnitFailure(unit.unitId, 'ingestion', attempts, cause);
      result.unitsFailed++;
      result.failures.push({
        unitId: failure.unitId,
        stage: failure.stage,
        attempts: failure.attempts,
        message: errorMessage(cause),
      });
      logger.error('[Ingest Phase] ✗ Unit failed', { unitId: unit.unitId, attempts, error: failure.message });
      await this.checkpoint.markFailed(unit.unitId);
    }
  }

  /** Creates each user once per run; units of the same user share the call. */
  private ensureUser(userId: string): Promise<void> {
    let pending = this.users.get(userId);
    if (!pending) {
      pending = withRetry((signal) => this.memory.ensureUser(userId, signal), {
        label: `Create user ${userId}`,
        policy: this.policy,
        timeoutMs: this.config.requestTimeoutMs,
      });
      this.users.set(userId, pending);
    }
    return pending;
  }
}
