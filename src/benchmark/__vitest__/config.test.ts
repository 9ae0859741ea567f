import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  configToYaml,
  createConfig,
  loadConfig,
  loadCredentials,
  parseConfigYaml,
  retryPolicyFrom,
  saveConfig,
} from '../config.js';
import { ConfigurationError, CorruptStateError } from '../../utils/errors.js';

describe('createConfig', () => {
  it('fills every default', () => {
    const config = createConfig();

    expect(config.evaluationConcurrency).toBe(10);
    expect(config.ingestionConcurrency).toBe(5);
    expect(config.requestTimeoutMs).toBe(60000);
    expect(config.graphParams).toEqual({
      edgeLimit: 20,
      edgeReranker: 'cross_encoder',
      nodeLimit: 20,
      nodeReranker: 'rrf',
      episodeLimit: 0,
      episodeReranker: 'rrf',
    });
    expect(config.ingestion).toEqual({ maxChunkChars: 8500, chunkOverlapChars: 200, maxItemsPerBatch: 15 });
    expect(config.dataset.name).toBe('locomo');
  });

  it('is frozen', () => {
    const config = createConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.graphParams)).toBe(true);
  });

  it('rejects out-of-range values instead of clamping them', () => {
    expect(() => createConfig({ graphParams: { edgeLimit: 0 } })).toThrow(ConfigurationError);
    expect(() => createConfig({ evaluationConcurrency: 51 })).toThrow(ConfigurationError);
    expect(() => createConfig({ graphParams: { episodeLimit: 51 } })).toThrow(ConfigurationError);
  });

  it('accepts the range boundaries', () => {
    const config = createConfig({ graphParams: { edgeLimit: 100, nodeLimit: 0, episodeLimit: 50 } });
    expect(config.graphParams.edgeLimit).toBe(100);
    expect(config.graphParams.nodeLimit).toBe(0);
  });

  it('rejects unknown keys at any level', () => {
    expect(() => createConfig({ concurrency: 3 })).toThrow(ConfigurationError);
    expect(() => createConfig({ graphParams: { edgeLimt: 3 } })).toThrow(/graphParams/);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => createConfig({ ingestion: { maxChunkChars: 1000, chunkOverlapChars: 1000 } })).toThrow(
      'ingestion.chunkOverlapChars: must be less than maxChunkChars (1000)'
    );
  });

  it('lists every invalid field', () => {
    try {
      createConfig({ evaluationConcurrency: 0, graphParams: { edgeReranker: 'bm25' } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      const message = error instanceof Error ? error.message : '';
      expect(message).toContain('  - evaluationConcurrency:');
      expect(message).toContain('  - graphParams.edgeReranker:');
    }
  });

  it('derives the retry policy', () => {
    expect(retryPolicyFrom(createConfig({ retry: { maxAttempts: 5 } }))).toEqual({
      maxAttempts: 5,
      baseDelayMs: 250,
      maxDelayMs: 10000,
      multiplier: 2,
      jitterFactor: 0.1,
    });
  });
});

describe('YAML round trip', () => {
  it('parses back to an equal config', () => {
    const config = createConfig({
      evaluationConcurrency: 3,
      graphParams: { edgeLimit: 7, edgeReranker: 'mmr', episodeLimit: 5 },
      models: { responseModel: 'gpt-4.1-mini', maxTokens: 512 },
      dataset: { name: 'longmemeval', numUsers: 2, userPrefix: 'lme' },
    });

    expect(parseConfigYaml(configToYaml(config))).toEqual(config);
  });

  it('uses camelCase keys in YAML', () => {
    const config = parseConfigYaml('graphParams:\n  edgeLimit: 12\nrequestTimeoutMs: 500\n');
    expect(config.graphParams.edgeLimit).toBe(12);
    expect(config.requestTimeoutMs).toBe(500);
  });

  it('treats an empty document as all defaults', () => {
    expect(parseConfigYaml('')).toEqual(createConfig());
  });

  it('reports malformed YAML as a configuration error', () => {
    try {
      parseConfigYaml('graphParams: [unclosed', 'broken.yaml');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toHaveProperty('message', 'Configuration file broken.yaml is not valid YAML');
      expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(CorruptStateError);
    }
  });

  it('rejects a top level that is not a mapping', () => {
    expect(() => parseConfigYaml('- 1\n- 2\n', 'list.yaml')).toThrow(
      'Configuration file list.yaml must contain a mapping at the top level'
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bench-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a file and reports its absolute path', async () => {
    const path = join(dir, 'bench.yaml');
    await writeFile(path, 'ingestionConcurrency: 2\n', 'utf-8');

    const loaded = await loadConfig(path);

    expect(loaded.config.ingestionConcurrency).toBe(2);
    expect(loaded.sourcePath).toBe(path);
  });

  it('fails when an explicit file is missing', async () => {
    await expect(loadConfig(join(dir, 'absent.yaml'))).rejects.toThrow(ConfigurationError);
  });

  it('saves a config that loads back unchanged', async () => {
    const path = join(dir, 'saved.yaml');
    const config = createConfig({ context: { maxTokens: 1234 } });

    await saveConfig(config, path);

    expect(parseConfigYaml(await readFile(path, 'utf-8'))).toEqual(config);
  });
});

describe('loadCredentials', () => {
  it('reads keys and applies URL defaults', () => {
    const credentials = loadCredentials({ MEMORY_API_KEY: 'test-memory-key', OPENAI_API_KEY: 'test-secret' });

    expect(credentials).toEqual({
      memoryApiKey: 'test-memory-key',
      memoryApiUrl: 'https://api.getzep.com/api/v2',
      openaiApiKey: 'test-secret',
      openaiBaseUrl: 'https://api.openai.com/v1',
    });
  });

  it('names the missing variable', () => {
    expect(() => loadCredentials({ OPENAI_API_KEY: 'test-secret' })).toThrow(
      'Missing required environment variable MEMORY_API_KEY'
    );
    expect(() => loadCredentials({ MEMORY_API_KEY: 'test-memory-key', OPENAI_API_KEY: '  ' })).toThrow(
      'Missing required environment variable OPENAI_API_KEY'
    );
  });
});
