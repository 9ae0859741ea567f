import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CheckpointStore } from '../CheckpointStore.js';

describe('CheckpointStore', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bench-checkpoint-'));
    path = join(dir, 'ingest.checkpoint.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const readPersisted = async (): Promise<Record<string, boolean>> => JSON.parse(await readFile(path, 'utf-8'));

  it('starts empty when the file does not exist', async () => {
    const store = new CheckpointStore(path);
    expect(await store.load()).toEqual({});
    expect(store.completedIds()).toEqual([]);
  });

  it('starts empty when the file is not JSON', async () => {
    await writeFile(path, '{"unit-a": tru', 'utf-8');
    const store = await CheckpointStore.open(path);
    expect(store.snapshot()).toEqual({});
  });

  it('starts empty when the file has the wrong shape', async () => {
    await writeFile(path, JSON.stringify({ 'unit-a': 'yes' }), 'utf-8');
    const store = await CheckpointStore.open(path);
    expect(store.snapshot()).toEqual({});
  });

  it('loads completed and failed units', async () => {
    await writeFile(path, JSON.stringify({ 'unit-a': true, 'unit-b': false }), 'utf-8');
    const store = await CheckpointStore.open(path);

    expect(store.isDone('unit-a')).toBe(true);
    expect(store.isDone('unit-b')).toBe(false);
    expect(store.isDone('unit-c')).toBe(false);
    expect(store.completedIds()).toEqual(['unit-a']);
  });

  it('persists marks so a new store sees them', async () => {
    const store = await CheckpointStore.open(path);
    await store.markDone('unit-a');
    await store.markFailed('unit-b');

    expect(await readPersisted()).toEqual({ 'unit-a': true, 'unit-b': false });

    const reopened = await CheckpointStore.open(path);
    expect(reopened.completedIds()).toEqual(['unit-a']);
  });

  it('never downgrades a completed unit', async () => {
    const store = await CheckpointStore.open(path);
    await store.markDone('unit-a');
    await store.markFailed('unit-a');

    expect(store.isDone('unit-a')).toBe(true);
    expect(await readPersisted()).toEqual({ 'unit-a': true });
  });

  it('upgrades a failed unit once it completes', async () => {
    await writeFile(path, JSON.stringify({ 'unit-a': false }), 'utf-8');
    const store = await CheckpointStore.open(path);
    await store.markDone('unit-a');

    expect(await readPersisted()).toEqual({ 'unit-a': true });
  });

  it('loses no marks under heavy concurrency, duplicates included', async () => {
    const store = await CheckpointStore.open(path);
    const ids = Array.from({ length: 200 }, (_, i) => `unit-${i}`);

    await Promise.all([...ids, ...ids.slice(0, 50)].map((id) => store.markDone(id)));

    const persisted = await readPersisted();
    expect(Object.keys(persisted)).toHaveLength(200);
    expect(Object.values(persisted).every((done) => done)).toBe(true);
    // Queued marks share a write
    expect(store.writeCount).toBeLessThan(250);
  });

  it('leaves no temp files behind', async () => {
    const store = await CheckpointStore.open(path);
    await Promise.all(['a', 'b', 'c'].map((id) => store.markDone(id)));

    expect(await readdir(dir)).toEqual(['ingest.checkpoint.json']);
  });

  it('creates missing parent directories', async () => {
    const nested = join(dir, 'nested', 'deeper', 'cp.json');
    const store = await CheckpointStore.open(nested);
    await store.markDone('unit-a');

    expect(JSON.parse(await readFile(nested, 'utf-8'))).toEqual({ 'unit-a': true });
  });
});
