/**
 * Unit tests for the Exploration Engine Module
 * Crawls run against an in-process site, gateway and browser
 */

import { jest, describe, test, expect } from '@jest/globals';
import { DynamicContentExplorer } from '../../src/dynamic/index.js';
import { ExplorationEngine, createSessionId, type EngineOptions } from '../../src/engine/index.js';
import { AIProviderError } from '../../src/errors/index.js';
import { silentLogger, type Logger } from '../../src/logger/index.js';
import type { LinkInfo, RawLink } from '../../src/types/index.js';
import { FakeFetcher, FakeGateway, FakeListingDriver, type ScoreRule } from '../helpers/fakes.js';

const ORIGIN = 'https://shop.example.com';
const ROOT = `${ORIGIN}/`;

function engineFor(
  site: Record<string, string[] | string>,
  rules: Record<string, ScoreRule>,
  options: EngineOptions = {},
  gateway = new FakeGateway(rules)
) {
  const fetcher = new FakeFetcher(site);
  const engine = new ExplorationEngine(
    ROOT,
    { gateway, fetcher },
    { delaySeconds: 0, logger: silentLogger, ...options }
  );
  return { engine, fetcher, gateway };
}

class UnclosableDriver extends FakeListingDriver {
  override async close(): Promise<void> {
    throw new Error('Target page, context or browser has been closed');
  }
}

function raw(absoluteUrl: string, relativePath = ''): RawLink {
  return { absoluteUrl, relativePath, anchorText: '', tagContext: 'a' };
}

describe('Exploration Engine Module', () => {
  describe('createSessionId()', () => {
    test('should derive a stable short id', () => {
      const id = createSessionId(ROOT, 1700000000000);
      expect(id).toMatch(/^crawl_[0-9a-f]{12}$/);
      expect(createSessionId(ROOT, 1700000000000)).toBe(id);
      expect(createSessionId(ROOT, 1700000000001)).not.toBe(id);
    });
  });

  describe('crawl()', () => {
    const site = {
      [ROOT]: ['/products', '/p/widget', '/login', 'https://partner.example.org/x'],
      [`${ORIGIN}/products`]: ['/', '/p/widget', '/p/gadget'],
    };
    const rules: Record<string, ScoreRule> = {
      '/products': 7,
      '/p/widget': { score: 9.5, productName: 'Widget' },
      '/login': 0.5,
      '/p/gadget': { score: 9.2, productName: 'Gadget' },
    };

    test('should find products best-first and complete the whole tree', async () => {
      const { engine, fetcher, gateway } = engineFor(site, rules);

      const session = await engine.crawl();

      expect(session.products).toEqual([
        { productName: 'Widget', url: `${ORIGIN}/p/widget` },
        { productName: 'Gadget', url: `${ORIGIN}/p/gadget` },
      ]);
      expect(fetcher.fetched).toEqual([ROOT, `${ORIGIN}/products`]);
      expect(session.stopReason).toBe('exhausted');
      expect(session.tree.size).toBe(5);
      expect(session.tree.root.state).toBe('CompletelyExplored');
      expect(session.counters).toEqual({
        pagesProcessed: 2,
        duplicateEncounters: 2,
        fetchFailures: 0,
        offDomainRejected: 1,
        invalidRejected: 0,
      });
      expect(gateway.scoredBatches).toEqual([
        { url: ROOT, paths: ['/products', '/p/widget', '/login'] },
        { url: `${ORIGIN}/products`, paths: ['/p/gadget'] },
      ]);
      expect(gateway.detections).toEqual([]);
    });

    test('should stop each branch at a product or a low score', async () => {
      const { engine, fetcher } = engineFor(
        { [ROOT]: ['/b', '/c'], [`${ORIGIN}/c`]: ['/d'] },
        { '/b': { score: 9.5, productName: 'Widget' }, '/c': 5.0, '/d': 0.3 }
      );

      const session = await engine.crawl();

      expect(session.products).toEqual([{ productName: 'Widget', url: `${ORIGIN}/b` }]);
      expect(fetcher.fetched).toEqual([ROOT, `${ORIGIN}/c`]);
      expect(session.counters.pagesProcessed).toBe(2);
      const d = session.tree.findByUrl(`${ORIGIN}/d`);
      expect(d?.state).toBe('CompletelyExplored');
      expect(d?.childIds).toEqual([]);
      expect(session.tree.root.state).toBe('CompletelyExplored');
    });

    test('should treat a bare origin and its root path as one node', async () => {
      const fetcher = new FakeFetcher({ [ROOT]: ['/', '/cat'] });
      const engine = new ExplorationEngine(
        ORIGIN,
        { gateway: new FakeGateway({ '/cat': 0.5 }), fetcher },
        { delaySeconds: 0, logger: silentLogger }
      );

      const session = await engine.crawl();

      expect(session.baseUrl).toBe(ROOT);
      expect(fetcher.fetched).toEqual([ROOT]);
      expect(session.tree.size).toBe(2);
      expect(session.counters.duplicateEncounters).toBe(1);
    });

    test('should not follow a redirect that leaves the domain', async () => {
      const fetcher = new FakeFetcher(
        { [ROOT]: ['/go'], 'https://partner.example.org/landing': ['/p/1'] },
        { [`${ORIGIN}/go`]: 'https://partner.example.org/landing' }
      );
      const gateway = new FakeGateway({ '/go': 5, '/p/1': { score: 9.5, productName: 'Foreign' } });
      const engine = new ExplorationEngine(ROOT, { gateway, fetcher }, { delaySeconds: 0, logger: silentLogger });

      const session = await engine.crawl();

      expect(session.products).toEqual([]);
      expect(gateway.scoredBatches).toEqual([{ url: ROOT, paths: ['/go'] }]);
      expect(session.counters.offDomainRejected).toBe(1);
      expect(session.tree.findByUrl(`${ORIGIN}/go`)?.state).toBe('CompletelyExplored');
    });

    test('should never fetch skipped or product children', async () => {
      const { engine, fetcher } = engineFor(site, rules);

      const session = await engine.crawl();

      expect(fetcher.fetched).not.toContain(`${ORIGIN}/login`);
      expect(fetcher.fetched).not.toContain(`${ORIGIN}/p/widget`);
      const login = session.tree.findByUrl(`${ORIGIN}/login`);
      expect(login?.state).toBe('CompletelyExplored');
      expect(login?.ownScore).toBe(0.5);
    });

    test('should report a summary of the session', async () => {
      const { engine } = engineFor(site, rules);

      await engine.crawl();

      expect(engine.summary()).toMatchObject({
        pagesProcessed: 2,
        totalNodes: 5,
        productsFound: 2,
        productsAfterDedup: 2,
        duplicateEncounters: 2,
        fetchFailures: 0,
        aiCalls: 2,
      });
    });

    test('should apply the thresholds at their boundaries', async () => {
      const { engine, fetcher } = engineFor(
        { [ROOT]: ['/a', '/b', '/c', '/d'] },
        { '/a': 0.99, '/b': 1.0, '/c': 9.0, '/d': { score: 9.01, productName: 'Edge' } }
      );

      const session = await engine.crawl();

      expect(session.products).toEqual([{ productName: 'Edge', url: `${ORIGIN}/d` }]);
      expect(fetcher.fetched).toEqual([ROOT, `${ORIGIN}/c`, `${ORIGIN}/b`]);
      expect(session.tree.findByUrl(`${ORIGIN}/c`)?.productName).toBeNull();
      expect(session.counters.fetchFailures).toBe(2);
      expect(session.tree.root.state).toBe('CompletelyExplored');
    });

    test('should name a product by its anchor text when the model gives none', async () => {
      const { engine } = engineFor(
        { [ROOT]: '<html><body><a href="/p/roller">Deluxe   Roller</a></body></html>' },
        { '/p/roller': 9.5 }
      );

      const session = await engine.crawl();

      expect(session.products).toEqual([{ productName: 'Deluxe Roller', url: `${ORIGIN}/p/roller` }]);
    });

    test('should treat a fetch failure as a dead end', async () => {
      const { engine, gateway } = engineFor({}, {});

      const session = await engine.crawl();

      expect(session.counters.pagesProcessed).toBe(1);
      expect(session.counters.fetchFailures).toBe(1);
      expect(session.tree.root.state).toBe('CompletelyExplored');
      expect(session.products).toEqual([]);
      expect(gateway.callCount).toBe(0);
    });

    test('should stop at maxPages', async () => {
      const { engine, fetcher } = engineFor(
        {
          [ROOT]: ['/l1'],
          [`${ORIGIN}/l1`]: ['/l2'],
          [`${ORIGIN}/l2`]: ['/l3'],
        },
        { '/l1': 5, '/l2': 5, '/l3': 5 },
        { maxPages: 2 }
      );

      const session = await engine.crawl();

      expect(session.stopReason).toBe('max_pages');
      expect(fetcher.fetched).toEqual([ROOT, `${ORIGIN}/l1`]);
      expect(session.tree.findByUrl(`${ORIGIN}/l2`)?.state).toBe('Unexplored');
      expect(session.tree.root.state).toBe('Explored');
    });

    test('should stop when the time budget is spent', async () => {
      let clock = 0;
      const { engine, fetcher } = engineFor({ [ROOT]: ['/a'] }, { '/a': 5 }, { maxDurationSeconds: 1, now: () => clock });
      clock = 5000;

      const session = await engine.crawl();

      expect(session.stopReason).toBe('time_budget');
      expect(fetcher.fetched).toEqual([]);
    });

    test('should pause between iterations while work remains', async () => {
      const sleep = jest.fn(async (_ms: number) => undefined);
      const { engine } = engineFor(site, rules, { delaySeconds: 0.5, sleep });

      await engine.crawl();

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(500);
    });

    test('should abort on a provider failure and keep partial results', async () => {
      const gateway = new FakeGateway(rules, undefined, `${ORIGIN}/products`);
      const { engine } = engineFor(site, rules, {}, gateway);

      await expect(engine.crawl()).rejects.toBeInstanceOf(AIProviderError);
      expect(engine.session.products).toEqual([{ productName: 'Widget', url: `${ORIGIN}/p/widget` }]);
      expect(engine.session.counters.pagesProcessed).toBe(2);
    });
  });

  describe('admit()', () => {
    test('should filter, deduplicate and number a batch', () => {
      const { engine } = engineFor({}, {});

      const batch = engine.admit([
        raw(`${ORIGIN}/x#top`, '/x'),
        raw(`${ORIGIN}/x`, '/x'),
        raw('https://blog.shop.example.com/', '/'),
        raw('not a url'),
        raw(ROOT, '/'),
        raw(`${ORIGIN}/y`, '/y'),
      ]);

      expect(batch).toEqual([
        { absoluteUrl: `${ORIGIN}/x`, relativePath: '/x', anchorText: '', tagContext: 'a', id: 0, score: null },
        { absoluteUrl: `${ORIGIN}/y`, relativePath: '/y', anchorText: '', tagContext: 'a', id: 1, score: null },
      ]);
      expect(engine.session.counters).toMatchObject({
        duplicateEncounters: 2,
        offDomainRejected: 1,
        invalidRejected: 1,
      });
    });
  });

  describe('dynamic loading', () => {
    const rootHtml =
      '<html><body><a href="/p/a">A</a><a href="/p/b">B</a><a href="/catalog/next">Next</a></body></html>';
    const rules: Record<string, ScoreRule> = {
      '/p/a': { score: 9.5, productName: 'Product A' },
      '/p/b': { score: 9.5, productName: 'Product B' },
      '/p/c': { score: 9.5, productName: 'Product C' },
      '/p/d': { score: 9.5, productName: 'Product D' },
      '/p/e': { score: 9.5, productName: 'Product E' },
      '/catalog/next': 3,
    };
    const pointAtNext = (candidates: readonly LinkInfo[]) => {
      const next = candidates.find((c) => c.relativePath === '/catalog/next');
      return next ? { id: next.id, triggerType: 'Pagination' as const } : { id: -1 as const };
    };

    test('should score links revealed by pagination', async () => {
      const driver = new FakeListingDriver([['/p/a', '/p/b'], ['/p/c', '/p/d'], ['/p/e']]);
      const dynamic = new DynamicContentExplorer(() => driver, {
        waitTimeoutMs: 200,
        settleTimeoutMs: 20,
        pollIntervalMs: 1,
        logger: silentLogger,
      });
      const gateway = new FakeGateway(rules, pointAtNext);
      const fetcher = new FakeFetcher({ [ROOT]: rootHtml });
      const engine = new ExplorationEngine(
        ROOT,
        { gateway, fetcher, dynamic },
        { delaySeconds: 0, enableDynamicLoading: true, logger: silentLogger }
      );

      const session = await engine.crawl();

      expect(session.products.map((p) => p.productName)).toEqual([
        'Product A',
        'Product B',
        'Product C',
        'Product D',
        'Product E',
      ]);
      expect(gateway.detections).toEqual([ROOT]);
      expect(gateway.scoredBatches[1]).toEqual({ url: ROOT, paths: ['/p/c', '/p/d', '/p/e'] });
      expect(session.tree.size).toBe(7);
      expect(session.counters.duplicateEncounters).toBe(3);
      expect(session.tree.root.state).toBe('CompletelyExplored');
      expect(driver.clicks).toBe(2);
      expect(driver.closed).toBe(true);
    });

    test('should admit only new in-scope links from revealed pages', async () => {
      const driver = new FakeListingDriver([
        [],
        ['/p/c1', '/p/c2', '/p/c3', 'https://partner.example.org/1', '/p/a'],
        ['/p/d1', '/p/d2', '/p/d3', '/p/d4', 'https://other.example.net/2'],
      ]);
      const dynamic = new DynamicContentExplorer(() => driver, {
        waitTimeoutMs: 200,
        settleTimeoutMs: 20,
        pollIntervalMs: 1,
        logger: silentLogger,
      });
      const gateway = new FakeGateway(rules, pointAtNext);
      const fetcher = new FakeFetcher({
        [ROOT]: '<html><body><a href="/p/a">A</a><a href="/catalog/next">Next</a></body></html>',
      });
      const engine = new ExplorationEngine(
        ROOT,
        { gateway, fetcher, dynamic },
        { delaySeconds: 0, enableDynamicLoading: true, logger: silentLogger }
      );

      const session = await engine.crawl();

      expect(gateway.scoredBatches[1]).toEqual({
        url: ROOT,
        paths: ['/p/c1', '/p/c2', '/p/c3', '/p/d1', '/p/d2', '/p/d3', '/p/d4'],
      });
      expect(session.tree.size).toBe(3 + 7);
      expect(session.counters.offDomainRejected).toBe(2);
      expect(session.counters.duplicateEncounters).toBe(2);
      expect(session.tree.root.state).toBe('CompletelyExplored');
    });

    test('should keep the provider failure when the browser cannot be closed', async () => {
      const error = jest.fn<Logger['error']>();
      const logger: Logger = { ...silentLogger, error };
      const dynamic = new DynamicContentExplorer(() => new UnclosableDriver([['/p/a']]), {
        waitTimeoutMs: 20,
        pollIntervalMs: 1,
        logger: silentLogger,
      });
      const gateway = new FakeGateway(
        { '/p/a': { score: 9.5, productName: 'Product A' }, '/cat': 5 },
        undefined,
        `${ORIGIN}/cat`
      );
      const fetcher = new FakeFetcher({ [ROOT]: ['/p/a', '/cat'], [`${ORIGIN}/cat`]: ['/p/z'] });
      const engine = new ExplorationEngine(
        ROOT,
        { gateway, fetcher, dynamic },
        { delaySeconds: 0, enableDynamicLoading: true, logger }
      );

      await expect(engine.crawl()).rejects.toBeInstanceOf(AIProviderError);
      expect(error).toHaveBeenCalledWith('Could not close browser session', {
        error: 'Target page, context or browser has been closed',
      });
    });

    test('should skip detection when no product was found', async () => {
      const driver = new FakeListingDriver([['/p/a']]);
      const dynamic = new DynamicContentExplorer(() => driver, { logger: silentLogger });
      const gateway = new FakeGateway({ '/p/a': 5 }, pointAtNext);
      const fetcher = new FakeFetcher({ [ROOT]: ['/p/a'] });
      const engine = new ExplorationEngine(
        ROOT,
        { gateway, fetcher, dynamic },
        { delaySeconds: 0, enableDynamicLoading: true, logger: silentLogger }
      );

      await engine.crawl();

      expect(gateway.detections).toEqual([]);
      expect(driver.opened).toEqual([]);
    });
  });
});
