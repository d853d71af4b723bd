/**
 * Exploration Engine Module
 *
 * Best-first crawl over a website tree. Each iteration pops the node with the
 * highest average ancestral score, fetches it, has the gateway score its
 * links, and applies policy per child:
 *
 * - score < 1: child created and completed, never fetched
 * - score > 9: child recorded as a product and completed, never fetched
 * - otherwise: child enqueued with its score
 *
 * Nodes whose children include a product optionally go through dynamic
 * exhaustion; revealed links take the same admission and scoring path.
 *
 * All crawl state lives on one CrawlSession. AIProviderError aborts the crawl
 * and leaves the session intact for partial output.
 */

import { createHash } from 'crypto';
import { DomainViolationError, FetchError, toError } from '../errors/index.js';
import { createLogger, defaultMetrics, type Logger, type Metrics } from '../logger/index.js';
import type { DynamicContentExplorer } from '../dynamic/index.js';
import type { ScoringGateway } from '../gateway/index.js';
import { OpenSet } from '../scheduler/index.js';
import { canonicalUrl, cheerioPageParser, type PageFetcher, type PageParser } from '../transport/index.js';
import {
  PRODUCT_THRESHOLD,
  SKIP_THRESHOLD,
  WebsiteTree,
  hostnameOf,
  isSameDomain,
  type WebsiteNode,
} from '../tree/index.js';
import { deduplicateProducts } from '../results/index.js';
import type {
  CrawlSummary,
  LinkInfo,
  LinkScore,
  NodeContext,
  ProductRecord,
  RawLink,
  SessionId,
} from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface EngineOptions {
  /** Stop once this many nodes have been processed (default: 50) */
  maxPages?: number;
  /** Pause between iterations, in seconds (default: 1.0) */
  delaySeconds?: number;
  /** Optional wall-clock budget for the whole crawl */
  maxDurationSeconds?: number | null;
  enableDynamicLoading?: boolean;
  logger?: Logger;
  metrics?: Metrics;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface EngineDependencies {
  gateway: ScoringGateway;
  fetcher: PageFetcher;
  parser?: PageParser;
  /** Required when dynamic loading is enabled */
  dynamic?: DynamicContentExplorer | null;
}

export interface CrawlCounters {
  pagesProcessed: number;
  duplicateEncounters: number;
  fetchFailures: number;
  offDomainRejected: number;
  invalidRejected: number;
}

export type StopReason = 'exhausted' | 'max_pages' | 'time_budget';

/**
 * Everything one crawl mutates
 */
export class CrawlSession {
  readonly id: SessionId;
  readonly tree: WebsiteTree;
  readonly openSet: OpenSet;
  readonly products: ProductRecord[] = [];
  readonly counters: CrawlCounters = {
    pagesProcessed: 0,
    duplicateEncounters: 0,
    fetchFailures: 0,
    offDomainRejected: 0,
    invalidRejected: 0,
  };
  readonly startedAt: number;
  finishedAt: number | null = null;
  stopReason: StopReason | null = null;

  constructor(rootUrl: string, startedAt: number) {
    this.tree = new WebsiteTree(canonicalUrl(rootUrl) ?? rootUrl);
    this.openSet = new OpenSet(this.tree);
    this.startedAt = startedAt;
    this.id = createSessionId(rootUrl, startedAt);
  }

  get baseUrl(): string {
    return this.tree.root.url;
  }

  get domain(): string {
    return this.tree.domain;
  }
}

/**
 * Session identifier: crawl_<first 12 hex of sha256(url|start)>
 */
export function createSessionId(rootUrl: string, startedAt: number): SessionId {
  const hash = createHash('sha256').update(`${rootUrl}|${startedAt}`).digest('hex').slice(0, 12);
  return `crawl_${hash}`;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Engine
// ============================================================================

export class ExplorationEngine {
  readonly session: CrawlSession;

  private readonly gateway: ScoringGateway;
  private readonly fetcher: PageFetcher;
  private readonly parser: PageParser;
  private readonly dynamic: DynamicContentExplorer | null;
  private readonly maxPages: number;
  private readonly delayMs: number;
  private readonly maxDurationMs: number | null;
  private readonly enableDynamicLoading: boolean;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(rootUrl: string, deps: EngineDependencies, options: EngineOptions = {}) {
    this.gateway = deps.gateway;
    this.fetcher = deps.fetcher;
    this.parser = deps.parser ?? cheerioPageParser;
    this.dynamic = deps.dynamic ?? null;
    this.maxPages = options.maxPages ?? 50;
    this.delayMs = Math.max(0, options.delaySeconds ?? 1.0) * 1000;
    this.maxDurationMs =
      options.maxDurationSeconds !== undefined && options.maxDurationSeconds !== null
        ? options.maxDurationSeconds * 1000
        : null;
    this.enableDynamicLoading = options.enableDynamicLoading ?? false;
    this.logger = options.logger ?? createLogger('engine');
    this.metrics = options.metrics ?? defaultMetrics;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;

    this.session = new CrawlSession(rootUrl, this.now());
    this.session.openSet.insert(this.session.tree.root);
  }

  /**
   * Run until the frontier is empty or a budget is exhausted.
   * The browser session, if one was opened, is closed on every exit path.
   *
   * @throws AIProviderError when the scoring provider fails
   */
  async crawl(): Promise<CrawlSession> {
    const { session } = this;
    this.logger.info('Crawl started', {
      sessionId: session.id,
      url: session.baseUrl,
      domain: session.domain,
      maxPages: this.maxPages,
      provider: this.gateway.provider,
      model: this.gateway.model,
    });

    try {
      for (;;) {
        const budgetStop = this.budgetExhausted();
        if (budgetStop) {
          session.stopReason = budgetStop;
          break;
        }

        const node = session.openSet.popMax();
        if (!node) {
          session.stopReason = 'exhausted';
          break;
        }

        await this.processNode(node);

        if (this.delayMs > 0 && !session.openSet.isEmpty() && this.budgetExhausted() === null) {
          await this.sleep(this.delayMs);
        }
      }
    } finally {
      session.finishedAt = this.now();
      if (this.dynamic) {
        try {
          await this.dynamic.close();
        } catch (error) {
          this.logger.error('Could not close browser session', { error: toError(error).message });
        }
      }
    }

    const summary = this.summary();
    this.logger.info('Crawl finished', { sessionId: session.id, stopReason: session.stopReason, ...summary });
    this.metrics.timing('engine.crawl_duration', summary.durationMs);
    return session;
  }

  /**
   * One iteration for a popped node
   */
  async processNode(node: WebsiteNode): Promise<void> {
    const { session } = this;
    const startTime = this.now();
    session.counters.pagesProcessed++;
    this.metrics.increment('engine.pages_processed');

    this.logger.info('Processing node', {
      url: node.url,
      depth: node.depth,
      ownScore: node.ownScore,
      pagesProcessed: session.counters.pagesProcessed,
      frontier: session.openSet.size,
    });

    let html: string;
    let pageUrl: string;
    try {
      const page = await this.fetcher.fetch(node.url);
      html = page.html;
      pageUrl = page.url;
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      session.counters.fetchFailures++;
      this.metrics.increment('engine.fetch_failures');
      this.logger.warn('Fetch failed, treating node as a dead end', {
        url: node.url,
        status: error.status,
        error: error.message,
      });
      session.tree.advance(node, 'Explored');
      this.complete(node);
      return;
    }

    if (!isSameDomain(pageUrl, session.domain)) {
      session.counters.offDomainRejected++;
      this.logger.warn('Page redirected outside crawl scope, treating node as a dead end', {
        url: node.url,
        finalUrl: pageUrl,
      });
      session.tree.advance(node, 'Explored');
      this.complete(node);
      return;
    }

    const parsed = this.parser.parse(html, pageUrl);
    node.title = parsed.title;
    node.description = parsed.description;
    const context: NodeContext = { url: node.url, title: parsed.title, description: parsed.description };

    const batch = this.admit(parsed.links);
    const products = await this.scoreAndApply(node, context, batch);

    if (products > 0 && this.enableDynamicLoading && this.dynamic) {
      await this.exhaustDynamicContent(node, context, batch);
    }

    session.tree.advance(node, 'Explored');
    if (session.tree.isCompletionSatisfied(node)) {
      this.complete(node);
    }

    this.metrics.timing('engine.node_duration', this.now() - startTime);
  }

  /**
   * Admission pipeline: drop invalid, out-of-domain and already-visited
   * URLs, claim the rest in the visited set and number them for one batch
   */
  admit(links: readonly RawLink[]): LinkInfo[] {
    const { session } = this;
    const batch: LinkInfo[] = [];

    for (const link of links) {
      const url = canonicalUrl(link.absoluteUrl);
      if (url === null || hostnameOf(url) === null) {
        session.counters.invalidRejected++;
        continue;
      }
      if (!isSameDomain(url, session.domain)) {
        session.counters.offDomainRejected++;
        this.logger.debug(new DomainViolationError(url, session.domain).message);
        continue;
      }
      if (!session.tree.claim(url)) {
        session.counters.duplicateEncounters++;
        continue;
      }
      batch.push({ ...link, absoluteUrl: url, id: batch.length, score: null });
    }
    return batch;
  }

  summary(): CrawlSummary {
    const { session } = this;
    return {
      pagesProcessed: session.counters.pagesProcessed,
      totalNodes: session.tree.size,
      productsFound: session.products.length,
      productsAfterDedup: deduplicateProducts(session.products).products.length,
      duplicateEncounters: session.counters.duplicateEncounters,
      fetchFailures: session.counters.fetchFailures,
      aiCalls: this.gateway.callCount,
      durationMs: (session.finishedAt ?? this.now()) - session.startedAt,
    };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private budgetExhausted(): StopReason | null {
    if (this.session.counters.pagesProcessed >= this.maxPages) return 'max_pages';
    if (this.maxDurationMs !== null && this.now() - this.session.startedAt >= this.maxDurationMs) {
      return 'time_budget';
    }
    return null;
  }

  /**
   * Score a batch and create its children
   * @returns number of product children created
   */
  private async scoreAndApply(parent: WebsiteNode, context: NodeContext, batch: LinkInfo[]): Promise<number> {
    if (batch.length === 0) return 0;

    const scores = await this.gateway.scoreLinks(context, batch);
    const byId = new Map<number, LinkScore>(scores.map((s) => [s.id, s]));

    let products = 0;
    for (const candidate of batch) {
      const result = byId.get(candidate.id);
      const score = result?.score ?? 0;
      candidate.score = score;

      if (score < SKIP_THRESHOLD) {
        const child = this.session.tree.addChild(parent, {
          url: candidate.absoluteUrl,
          score,
          relativePath: candidate.relativePath,
          anchorText: candidate.anchorText,
        });
        this.complete(child);
        continue;
      }

      if (score > PRODUCT_THRESHOLD) {
        const productName = result?.productName || candidate.anchorText || candidate.absoluteUrl;
        candidate.productName = productName;
        const child = this.session.tree.addChild(parent, {
          url: candidate.absoluteUrl,
          score,
          relativePath: candidate.relativePath,
          anchorText: candidate.anchorText,
          productName,
        });
        this.session.products.push({ productName, url: candidate.absoluteUrl });
        this.metrics.increment('engine.products_found');
        this.logger.info('Product found', { productName, url: candidate.absoluteUrl, score });
        this.complete(child);
        products++;
        continue;
      }

      const child = this.session.tree.addChild(parent, {
        url: candidate.absoluteUrl,
        score,
        relativePath: candidate.relativePath,
        anchorText: candidate.anchorText,
      });
      this.session.openSet.insert(child);
    }

    this.logger.debug('Batch scored', { url: parent.url, candidates: batch.length, products });
    return products;
  }

  private async exhaustDynamicContent(node: WebsiteNode, context: NodeContext, batch: LinkInfo[]): Promise<void> {
    if (!this.dynamic) return;

    const verdict = await this.gateway.detectDynamicLoading(context, batch);
    const target = 'triggerType' in verdict ? batch.find((c) => c.id === verdict.id) ?? null : null;
    this.logger.info('Dynamic loading verdict', {
      url: node.url,
      trigger: 'triggerType' in verdict ? verdict.triggerType : 'none',
      id: verdict.id,
    });

    let revealed: RawLink[];
    try {
      revealed = await this.dynamic.exhaust(node.url, verdict, target);
    } catch (error) {
      this.logger.warn('Dynamic exhaustion failed', { url: node.url, error: toError(error).message });
      return;
    }

    const extra = this.admit(revealed);
    this.logger.info('Dynamic content admitted', { url: node.url, revealed: revealed.length, admitted: extra.length });
    await this.scoreAndApply(node, context, extra);
  }

  private complete(node: WebsiteNode): void {
    for (const completed of this.session.tree.markCompleteAndPropagate(node)) {
      this.session.openSet.invalidate(completed.id);
    }
  }
}
