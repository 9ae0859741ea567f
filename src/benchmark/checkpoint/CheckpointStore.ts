/**
 * Ingestion checkpoint persisted as a JSON object of unit id -> completed.
 *
 * Each mark updates memory first, then the whole mapping is written to a
 * temp file beside the checkpoint and renamed over it. Writes are chained so
 * only one is in flight; marks arriving while a write is queued ride along
 * with it.
 */
import { mkdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { z } from 'zod';
import { CorruptStateError } from '../../utils/errors.js';
import { errorMessage, logger } from '../../utils/logger.js';

const CheckpointFileSchema = z.record(z.string(), z.boolean());

export class CheckpointStore {
  private readonly entries = new Map<string, boolean>();
  private writeChain: Promise<void> = Promise.resolve();
  private queuedFlush: Promise<void> | null = null;
  private tempCounter = 0;
  private writes = 0;

  constructor(readonly filePath: string) {}

  static async open(filePath: string): Promise<CheckpointStore> {
    const store = new CheckpointStore(filePath);
    await store.load();
    return store;
  }

  /**
   * Read the checkpoint file into memory.
   * A missing file is an empty checkpoint; so is a corrupt one, with a warning.
   */
  async load(): Promise<Record<string, boolean>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.info('No checkpoint found, starting fresh', { path: this.filePath });
        this.entries.clear();
        return {};
      }
      throw error;
    }

    const parsed = this.parse(raw);
    this.entries.clear();
    for (const [unitId, done] of Object.entries(parsed)) {
      this.entries.set(unitId, done);
    }
    return this.snapshot();
  }

  private parse(raw: string): Record<string, boolean> {
    try {
      const result = CheckpointFileSchema.safeParse(JSON.parse(raw));
      if (result.success) {
        return result.data;
      }
      this.warnCorrupt(new CorruptStateError(this.filePath, 'expected an object of booleans'));
    } catch (error) {
      this.warnCorrupt(new CorruptStateError(this.filePath, errorMessage(error), { cause: error }));
    }
    return {};
  }

  private warnCorrupt(error: CorruptStateError): void {
    logger.warn('Ignoring corrupt checkpoint; all units will be processed', {
      path: error.path,
      error: error.message,
    });
  }

  isDone(unitId: string): boolean {
    return this.entries.get(unitId) === true;
  }

  async markDone(unitId: string): Promise<void> {
    this.entries.set(unitId, true);
    await this.flush();
  }

  /** Records a permanent failure. A completed unit stays completed. */
  async markFailed(unitId: string): Promise<void> {
    if (this.isDone(unitId)) {
      return;
    }
    this.entries.set(unitId, false);
    await this.flush();
  }

  completedIds(): string[] {
    return [...this.entries].filter(([, done]) => done).map(([unitId]) => unitId);
  }

  snapshot(): Record<string, boolean> {
    return Object.fromEntries(this.entries);
  }

  /** Number of file writes performed so far. */
  get writeCount(): number {
    return this.writes;
  }

  /**
   * Persist the current mapping. Resolves once a write that started after
   * this call has reached disk.
   */
  flush(): Promise<void> {
    if (this.queuedFlush) {
      return this.queuedFlush;
    }

    const flush = this.writeChain.then(() => {
      this.queuedFlush = null;
      return this.writeSnapshot();
    });
    this.queuedFlush = flush;
    this.writeChain = flush.catch((error: unknown) => {
      logger.error('Checkpoint write failed', { path: this.filePath, error: errorMessage(error) });
    });
    return flush;
  }

  private async writeSnapshot(): Promise<void> {
    const content = JSON.stringify(this.snapshot(), null, 2);
    const directory = dirname(this.filePath);
    const tempPath = join(directory, `.${basename(this.filePath)}.${process.pid}.${this.tempCounter++}.tmp`);

    await mkdir(directory, { recursive: true });
    try {
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, this.filePath);
      this.writes++;
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        logger.debug('Could not remove checkpoint temp file', { path: tempPath, error: errorMessage(cleanupError) });
      });
      throw error;
    }
  }
}
