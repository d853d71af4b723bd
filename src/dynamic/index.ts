/**
 * Dynamic Content Module
 *
 * Responsibilities:
 * - Own the single browser session shared by every node of a crawl
 * - Dispatch the trigger the gateway detected to its handler
 * - Always try infinite scroll
 * - Return the raw links revealed; admission happens in the engine
 *
 * A timed-out wait ends only the handler it occurred in. A page that cannot be
 * opened skips dynamic exhaustion for that node.
 */

import { AutomationTimeoutError, toError } from '../errors/index.js';
import { createLogger, type Logger } from '../logger/index.js';
import type { DynamicLoadingVerdict, RawLink, TriggerType } from '../types/index.js';
import { LinkCollector, type AutomationDriver, type ControlTarget } from './driver.js';
import { TRIGGER_HANDLERS, type HandlerContext } from './handlers.js';

export {
  LinkCollector,
  linkSignature,
  snapshotLinks,
  waitUntil,
  type AutomationDriver,
  type ControlHandle,
  type ControlTarget,
  type WaitOptions,
} from './driver.js';
export {
  LOAD_MORE_CEILING,
  PAGINATION_CEILING,
  SCROLL_CEILING,
  TRIGGER_HANDLERS,
  handleAccordions,
  handleExpanders,
  handleInfiniteScroll,
  handleLoadMore,
  handlePagination,
  handleTabs,
  type HandlerContext,
  type TriggerHandler,
} from './handlers.js';
export { PlaywrightDriver, type PlaywrightDriverOptions } from './playwright.js';

export interface DynamicExplorerOptions {
  /** Ceiling for each required wait (default: 10000) */
  waitTimeoutMs?: number;
  /** Ceiling for growth checks (default: 2000, capped at waitTimeoutMs) */
  settleTimeoutMs?: number;
  /** Polling interval for waits (default: 250) */
  pollIntervalMs?: number;
  logger?: Logger;
}

export class DynamicContentExplorer {
  private driver: AutomationDriver | null = null;
  private readonly waitTimeoutMs: number;
  private readonly settleTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly createDriver: () => AutomationDriver,
    options: DynamicExplorerOptions = {}
  ) {
    this.waitTimeoutMs = options.waitTimeoutMs ?? 10000;
    this.settleTimeoutMs = Math.min(options.settleTimeoutMs ?? 2000, this.waitTimeoutMs);
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
    this.logger = options.logger ?? createLogger('dynamic');
  }

  /**
   * Exhaust dynamic content on url: the detected trigger first (if any), then
   * infinite scroll.
   *
   * @param target - control the verdict points at; required for a trigger to run
   */
  async exhaust(url: string, verdict: DynamicLoadingVerdict, target: ControlTarget | null): Promise<RawLink[]> {
    const driver = this.session();
    try {
      await driver.open(url);
    } catch (error) {
      this.logger.warn('Could not open page for dynamic exhaustion', {
        url,
        error: toError(error).message,
      });
      return [];
    }

    const collector = new LinkCollector();
    if ('triggerType' in verdict) {
      if (target) {
        await this.run(verdict.triggerType, url, { driver, collector, target });
      } else {
        this.logger.warn('Detected trigger has no matching candidate', { url, id: verdict.id });
      }
    }
    await this.run('InfiniteScroll', url, { driver, collector, target: null });

    const links = collector.links();
    this.logger.info('Dynamic exhaustion finished', { url, revealed: links.length });
    return links;
  }

  async close(): Promise<void> {
    const driver = this.driver;
    this.driver = null;
    if (driver) {
      await driver.close();
    }
  }

  private session(): AutomationDriver {
    if (!this.driver) {
      this.driver = this.createDriver();
    }
    return this.driver;
  }

  private async run(
    trigger: TriggerType,
    url: string,
    parts: Pick<HandlerContext, 'driver' | 'collector' | 'target'>
  ): Promise<void> {
    const before = parts.collector.size;
    try {
      await TRIGGER_HANDLERS[trigger]({
        ...parts,
        waitTimeoutMs: this.waitTimeoutMs,
        settleTimeoutMs: this.settleTimeoutMs,
        pollIntervalMs: this.pollIntervalMs,
        logger: this.logger,
      });
    } catch (error) {
      if (error instanceof AutomationTimeoutError) {
        this.logger.warn('Dynamic handler wait timed out', {
          url,
          trigger,
          wait: error.waitName,
          timeoutMs: error.timeoutMs,
        });
      } else {
        this.logger.warn('Dynamic handler failed', {
          url,
          trigger,
          error: toError(error).message,
        });
      }
    }
    this.logger.debug('Dynamic handler finished', {
      url,
      trigger,
      collected: parts.collector.size - before,
    });
  }
}
