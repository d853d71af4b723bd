/**
 * Runner Module
 *
 * Wires a resolved TaskConfig into a crawl: gateway, fetcher, optional
 * browser session, engine, then writes the raw and cleaned result documents.
 *
 * Usage:
 * ```typescript
 * const config = await loadTaskConfig('task.json');
 * const result = await runCrawlTask(config);
 * if (!result.success) console.error(result.error?.message);
 * ```
 */

import type { TaskConfig } from '../config/index.js';
import { DynamicContentExplorer, PlaywrightDriver, type AutomationDriver } from '../dynamic/index.js';
import { ExplorationEngine, type StopReason } from '../engine/index.js';
import { ExplorerError, toError } from '../errors/index.js';
import { createScoringGateway, type ScoringGateway } from '../gateway/index.js';
import { createLogger, defaultMetrics, type Logger, type Metrics } from '../logger/index.js';
import { buildResultDocuments, cleanedOutputPath } from '../results/index.js';
import { createStorageAdapter, type StorageAdapter } from '../storage/index.js';
import { HttpPageFetcher, type PageFetcher, type PageParser } from '../transport/index.js';
import { renderTree } from '../tree/index.js';
import type { CrawlResults, CrawlSummary, ModuleResult } from '../types/index.js';

export interface CrawlTaskOutput {
  sessionId: string;
  stopReason: StopReason | null;
  results: CrawlResults;
  summary: CrawlSummary;
  rawLocation: string;
  finalLocation: string;
  /** Text view of the explored tree */
  tree: string;
}

/**
 * Collaborators that default to the production implementations
 */
export interface CrawlTaskOverrides {
  gateway?: ScoringGateway;
  fetcher?: PageFetcher;
  parser?: PageParser;
  createDriver?: () => AutomationDriver;
  storage?: StorageAdapter;
  logger?: Logger;
  metrics?: Metrics;
  sleep?: (ms: number) => Promise<void>;
}

const MODULE = 'runner';

function serialize(document: CrawlResults): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Run one crawl task end to end.
 *
 * Fatal errors (provider failure, bad configuration) produce a failed
 * result; the raw document is still written when any node completed.
 */
export async function runCrawlTask(
  config: TaskConfig,
  overrides: CrawlTaskOverrides = {}
): Promise<ModuleResult<CrawlTaskOutput>> {
  const startTime = Date.now();
  const logger = overrides.logger ?? createLogger(MODULE);
  const metrics = overrides.metrics ?? defaultMetrics;
  const storage = overrides.storage ?? createStorageAdapter(config.output);
  const rawLocation = config.output;
  const finalLocation = cleanedOutputPath(config.output);

  const failure = (code: string, message: string, sessionId = '', details?: unknown): ModuleResult<CrawlTaskOutput> => ({
    success: false,
    error: { code, message, details },
    metadata: {
      sessionId,
      module: MODULE,
      timestamp: new Date().toISOString(),
      duration: Date.now() - startTime,
    },
  });

  let gateway: ScoringGateway;
  try {
    gateway =
      overrides.gateway ??
      createScoringGateway(
        { provider: config.aiProvider, apiKey: config.apiKey, model: config.aiModel, timeoutMs: config.aiTimeoutMs },
        { logger: overrides.logger ?? createLogger('gateway'), metrics }
      );
  } catch (error) {
    const err = toError(error);
    logger.error('Gateway setup failed', { error: err.message });
    return failure(err instanceof ExplorerError ? err.code : 'CONFIG_ERROR', err.message);
  }

  const fetcher =
    overrides.fetcher ??
    new HttpPageFetcher(
      { timeoutMs: config.fetchTimeoutMs, maxAttempts: config.maxFetchAttempts },
      overrides.logger ?? createLogger('transport')
    );

  const createDriver =
    overrides.createDriver ??
    (() =>
      new PlaywrightDriver({
        executablePath: config.browserExecutablePath ?? undefined,
        navigationTimeoutMs: config.fetchTimeoutMs,
        actionTimeoutMs: config.waitTimeoutMs,
      }));
  const dynamic = config.enableDynamicLoading
    ? new DynamicContentExplorer(createDriver, {
        waitTimeoutMs: config.waitTimeoutMs,
        logger: overrides.logger ?? createLogger('dynamic'),
      })
    : null;

  const engine = new ExplorationEngine(
    config.url,
    { gateway, fetcher, parser: overrides.parser, dynamic },
    {
      maxPages: config.maxPages,
      delaySeconds: config.delay,
      maxDurationSeconds: config.maxDurationSeconds,
      enableDynamicLoading: config.enableDynamicLoading,
      logger: overrides.logger ?? createLogger('engine'),
      metrics,
      sleep: overrides.sleep,
    }
  );
  const { session } = engine;

  let fatal: Error | null = null;
  try {
    await engine.crawl();
  } catch (error) {
    fatal = toError(error);
    logger.error('Crawl aborted', { sessionId: session.id, error: fatal.message });
  }

  const documents = buildResultDocuments({
    products: session.products,
    pagesProcessed: session.counters.pagesProcessed,
    totalNodes: session.tree.size,
    baseUrl: session.baseUrl,
    domain: session.domain,
  });
  const summary = engine.summary();

  if (fatal) {
    const code = fatal instanceof ExplorerError ? fatal.code : 'CRAWL_FAILED';
    if (session.tree.countByState().CompletelyExplored > 0) {
      try {
        await storage.save(rawLocation, serialize(documents.raw));
        logger.info('Partial raw results written', { location: rawLocation, products: documents.raw.products.length });
      } catch (error) {
        logger.error('Could not write partial raw results', { location: rawLocation, error: toError(error).message });
      }
    }
    return failure(code, fatal.message, session.id, { summary });
  }

  try {
    await storage.save(rawLocation, serialize(documents.raw));
    await storage.save(finalLocation, serialize(documents.final));
  } catch (error) {
    const err = toError(error);
    logger.error('Could not write results', { location: rawLocation, error: err.message });
    return failure('STORAGE_ERROR', err.message, session.id, { summary });
  }

  logger.info('Results written', {
    raw: rawLocation,
    final: finalLocation,
    products: documents.final.products.length,
    duplicatesRemoved: documents.duplicatesRemoved,
  });
  metrics.gauge('runner.products', documents.final.products.length);

  return {
    success: true,
    data: {
      sessionId: session.id,
      stopReason: session.stopReason,
      results: documents.final,
      summary,
      rawLocation,
      finalLocation,
      tree: renderTree(session.tree),
    },
    metadata: {
      sessionId: session.id,
      module: MODULE,
      timestamp: new Date().toISOString(),
      duration: Date.now() - startTime,
    },
  };
}
