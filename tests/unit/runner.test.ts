/**
 * Unit tests for the Runner Module
 */

import { describe, test, expect } from '@jest/globals';
import type { TaskConfig } from '../../src/config/index.js';
import { silentLogger } from '../../src/logger/index.js';
import { runCrawlTask } from '../../src/runner/index.js';
import { MemoryStorageAdapter, type ArtifactMetadata } from '../../src/storage/index.js';
import { FakeFetcher, FakeGateway, FakeListingDriver, type ScoreRule } from '../helpers/fakes.js';

const ORIGIN = 'https://shop.example.com';
const ROOT = `${ORIGIN}/`;
const OUTPUT = 'output/ai_crawl_results_shop_example_com.json';
const CLEANED = 'output/ai_crawl_results_shop_example_com_cleaned.json';

function taskConfig(overrides: Partial<TaskConfig> = {}): TaskConfig {
  return {
    url: ROOT,
    domain: 'shop.example.com',
    delay: 0,
    maxPages: 10,
    output: OUTPUT,
    enableDynamicLoading: false,
    aiProvider: 'anthropic',
    aiModel: 'fake-model',
    apiKey: 'test-secret',
    maxDurationSeconds: null,
    fetchTimeoutMs: 1000,
    aiTimeoutMs: 1000,
    waitTimeoutMs: 200,
    maxFetchAttempts: 1,
    browserExecutablePath: null,
    ...overrides,
  };
}

const SITE = {
  [ROOT]: ['/products', '/p/widget', '/p/widget?utm_source=mail'],
  [`${ORIGIN}/products`]: ['/p/gadget'],
};

const RULES: Record<string, ScoreRule> = {
  '/products': 6,
  '/p/widget': { score: 9.5, productName: 'Widget' },
  '/p/widget?utm_source=mail': { score: 9.5, productName: 'Widget' },
  '/p/gadget': { score: 9.8, productName: 'Gadget' },
};

class FailingStorage extends MemoryStorageAdapter {
  override async save(location: string): Promise<ArtifactMetadata> {
    throw new Error(`EACCES: permission denied, open '${location}'`);
  }
}

async function loadJson(storage: MemoryStorageAdapter, location: string): Promise<unknown> {
  const { content } = await storage.load(location);
  return JSON.parse(content);
}

describe('Runner Module', () => {
  test('should crawl and write raw and cleaned results', async () => {
    const storage = new MemoryStorageAdapter();

    const result = await runCrawlTask(taskConfig(), {
      gateway: new FakeGateway(RULES),
      fetcher: new FakeFetcher(SITE),
      storage,
      logger: silentLogger,
    });

    expect(result.success).toBe(true);
    expect(result.metadata.module).toBe('runner');
    expect(result.metadata.sessionId).toMatch(/^crawl_[0-9a-f]{12}$/);
    expect(result.data?.rawLocation).toBe(OUTPUT);
    expect(result.data?.finalLocation).toBe(CLEANED);
    expect(result.data?.stopReason).toBe('exhausted');

    expect(await loadJson(storage, OUTPUT)).toEqual({
      products: [
        { productName: 'Widget', url: `${ORIGIN}/p/widget` },
        { productName: 'Widget', url: `${ORIGIN}/p/widget?utm_source=mail` },
        { productName: 'Gadget', url: `${ORIGIN}/p/gadget` },
      ],
      pages_processed: 2,
      total_nodes: 5,
      base_url: ROOT,
      domain: 'shop.example.com',
    });
    expect(await loadJson(storage, CLEANED)).toEqual({
      products: [
        { productName: 'Widget', url: `${ORIGIN}/p/widget` },
        { productName: 'Gadget', url: `${ORIGIN}/p/gadget` },
      ],
      pages_processed: 2,
      total_nodes: 5,
      base_url: ROOT,
      domain: 'shop.example.com',
    });
  });

  test('should return the summary and the rendered tree', async () => {
    const result = await runCrawlTask(taskConfig(), {
      gateway: new FakeGateway(RULES),
      fetcher: new FakeFetcher(SITE),
      storage: new MemoryStorageAdapter(),
      logger: silentLogger,
    });

    expect(result.data?.summary).toMatchObject({
      pagesProcessed: 2,
      totalNodes: 5,
      productsFound: 3,
      productsAfterDedup: 2,
      aiCalls: 2,
    });
    expect(result.data?.tree.split('\n')[0]).toBe('✓ https://shop.example.com/ [3/3]');
  });

  test('should write partial raw results when the provider fails mid-crawl', async () => {
    const storage = new MemoryStorageAdapter();

    const result = await runCrawlTask(taskConfig(), {
      gateway: new FakeGateway(RULES, undefined, `${ORIGIN}/products`),
      fetcher: new FakeFetcher(SITE),
      storage,
      logger: silentLogger,
    });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('AI_PROVIDER_ERROR');
    expect(storage.keys()).toEqual([OUTPUT]);
    expect(await loadJson(storage, OUTPUT)).toMatchObject({ pages_processed: 2, total_nodes: 4 });
  });

  test('should write nothing when the provider fails before any node completes', async () => {
    const storage = new MemoryStorageAdapter();

    const result = await runCrawlTask(taskConfig(), {
      gateway: new FakeGateway(RULES, undefined, ROOT),
      fetcher: new FakeFetcher(SITE),
      storage,
      logger: silentLogger,
    });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('AI_PROVIDER_ERROR');
    expect(storage.keys()).toEqual([]);
  });

  test('should report a storage failure', async () => {
    const result = await runCrawlTask(taskConfig(), {
      gateway: new FakeGateway(RULES),
      fetcher: new FakeFetcher(SITE),
      storage: new FailingStorage(),
      logger: silentLogger,
    });

    expect(result.success).toBe(false);
    expect(result.error).toMatchObject({
      code: 'STORAGE_ERROR',
      message: `EACCES: permission denied, open '${OUTPUT}'`,
    });
  });

  test('should fail fast without an API key', async () => {
    const result = await runCrawlTask(taskConfig({ apiKey: '' }), {
      fetcher: new FakeFetcher(SITE),
      storage: new MemoryStorageAdapter(),
      logger: silentLogger,
    });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('CONFIG_ERROR');
    expect(result.metadata.sessionId).toBe('');
  });

  test('should drive the browser when dynamic loading is enabled', async () => {
    const driver = new FakeListingDriver([['/p/widget']]);

    const result = await runCrawlTask(taskConfig({ enableDynamicLoading: true }), {
      gateway: new FakeGateway(RULES),
      fetcher: new FakeFetcher(SITE),
      createDriver: () => driver,
      storage: new MemoryStorageAdapter(),
      logger: silentLogger,
    });

    expect(result.success).toBe(true);
    expect(driver.opened).toEqual([ROOT, `${ORIGIN}/products`]);
    expect(driver.closed).toBe(true);
  });
});
