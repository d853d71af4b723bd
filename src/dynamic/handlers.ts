/**
 * Trigger handlers. Each drives the shared automation session, pushing every
 * link it sees into the collector, so the links gathered before a wait times
 * out survive the AutomationTimeoutError that ends the handler.
 */

import { AutomationTimeoutError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { TriggerType } from '../types/index.js';
import {
  linkSignature,
  snapshotLinks,
  waitUntil,
  type AutomationDriver,
  type ControlHandle,
  type ControlTarget,
  type LinkCollector,
} from './driver.js';

export const PAGINATION_CEILING = 10;
export const LOAD_MORE_CEILING = 20;
export const SCROLL_CEILING = 10;

const LOADING_SELECTOR = '[aria-busy="true"], .loading, .spinner, .is-loading';
const TAB_SELECTOR = '[role="tab"]';
const ACCORDION_SELECTOR = '[aria-expanded="false"], details:not([open]) > summary';
const EXPANDER_SELECTOR = '[aria-expanded="false"], .show-more, .read-more, .expand-toggle';
const ACTIVE_CLASS = /(^|\s)(active|selected|is-active|is-selected|current)(\s|$)/;

export interface HandlerContext {
  driver: AutomationDriver;
  collector: LinkCollector;
  /** Control reported by the gateway; absent for InfiniteScroll */
  target: ControlTarget | null;
  /** Ceiling for waits a handler cannot proceed without */
  waitTimeoutMs: number;
  /** Ceiling for growth checks whose expiry just means "nothing more" */
  settleTimeoutMs: number;
  pollIntervalMs: number;
  logger: Logger;
}

export type TriggerHandler = (ctx: HandlerContext) => Promise<void>;

async function collect(ctx: HandlerContext): Promise<number> {
  return ctx.collector.add(await snapshotLinks(ctx.driver));
}

async function findVisibleTarget(ctx: HandlerContext): Promise<ControlHandle | null> {
  if (!ctx.target) return null;
  const control = await ctx.driver.locateControl(ctx.target);
  if (!control || !(await control.isVisible())) return null;
  return control;
}

/**
 * Wait for a growth check that may legitimately never succeed.
 * @returns false when settleTimeoutMs elapsed
 */
async function settles(ctx: HandlerContext, name: string, check: () => Promise<boolean>): Promise<boolean> {
  try {
    await waitUntil(name, check, { timeoutMs: ctx.settleTimeoutMs, intervalMs: ctx.pollIntervalMs });
    return true;
  } catch (error) {
    if (error instanceof AutomationTimeoutError) return false;
    throw error;
  }
}

/**
 * Wait until two consecutive link counts agree
 */
async function waitForStableLinkCount(ctx: HandlerContext, name: string): Promise<void> {
  let previous = -1;
  await waitUntil(
    name,
    async () => {
      const count = await ctx.driver.linkCount();
      const stable = count === previous;
      previous = count;
      return stable;
    },
    { timeoutMs: ctx.waitTimeoutMs, intervalMs: ctx.pollIntervalMs }
  );
}

async function waitForStableHeight(ctx: HandlerContext, name: string): Promise<void> {
  let previous = -1;
  await waitUntil(
    name,
    async () => {
      const height = await ctx.driver.scrollHeight();
      const stable = height === previous;
      previous = height;
      return stable;
    },
    { timeoutMs: ctx.waitTimeoutMs, intervalMs: ctx.pollIntervalMs }
  );
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Follow the "next" control until the distinct link count stops growing or
 * the page ceiling is reached
 */
export const handlePagination: TriggerHandler = async (ctx) => {
  await collect(ctx);

  for (let page = 0; page < PAGINATION_CEILING; page++) {
    const control = await findVisibleTarget(ctx);
    if (!control) break;

    const before = linkSignature(await snapshotLinks(ctx.driver));
    await control.click();
    await waitUntil(
      'pagination content refresh',
      async () => linkSignature(await snapshotLinks(ctx.driver)) !== before,
      { timeoutMs: ctx.waitTimeoutMs, intervalMs: ctx.pollIntervalMs }
    );
    await waitForStableLinkCount(ctx, 'pagination link count settle');

    const added = await collect(ctx);
    ctx.logger.debug('Pagination page collected', { page: page + 1, added });
    if (added === 0) break;
  }
};

/**
 * Click "load more" until a click reveals nothing new or the click ceiling
 * is reached
 */
export const handleLoadMore: TriggerHandler = async (ctx) => {
  await collect(ctx);

  for (let click = 0; click < LOAD_MORE_CEILING; click++) {
    const control = await findVisibleTarget(ctx);
    if (!control) break;

    const countBefore = await ctx.driver.linkCount();
    await control.click();
    await waitUntil(
      'load more indicator hidden',
      async () => !(await ctx.driver.exists(LOADING_SELECTOR)),
      { timeoutMs: ctx.waitTimeoutMs, intervalMs: ctx.pollIntervalMs }
    );
    const grew = await settles(ctx, 'load more new items', async () => (await ctx.driver.linkCount()) > countBefore);
    if (!grew) break;

    const added = await collect(ctx);
    ctx.logger.debug('Load more click collected', { click: click + 1, added });
    if (added === 0) break;
  }
};

async function isTabActive(ctx: HandlerContext, tab: ControlHandle): Promise<boolean> {
  if ((await tab.attribute('aria-selected')) === 'true') return true;
  if (ACTIVE_CLASS.test((await tab.attribute('class')) ?? '')) return true;
  const panelId = await tab.attribute('aria-controls');
  if (panelId && /^[A-Za-z][\w-]*$/.test(panelId)) {
    return ctx.driver.exists(`#${panelId}`);
  }
  return false;
}

/**
 * Activate each tab in turn and collect its panel's links
 */
export const handleTabs: TriggerHandler = async (ctx) => {
  await collect(ctx);

  let tabs = await ctx.driver.locateAll(TAB_SELECTOR);
  if (tabs.length === 0) {
    const control = await findVisibleTarget(ctx);
    tabs = control ? [control] : [];
  }

  for (const tab of tabs) {
    if (!(await tab.isVisible())) continue;
    await tab.click();
    await waitUntil('tab active', () => isTabActive(ctx, tab), {
      timeoutMs: ctx.waitTimeoutMs,
      intervalMs: ctx.pollIntervalMs,
    });
    await collect(ctx);
  }
};

function expandSections(selector: string, label: string): TriggerHandler {
  return async (ctx) => {
    await collect(ctx);

    let sections = await ctx.driver.locateAll(selector);
    if (sections.length === 0) {
      const control = await findVisibleTarget(ctx);
      sections = control ? [control] : [];
    }

    for (const section of sections) {
      if (!(await section.isVisible())) continue;
      const hasState = (await section.attribute('aria-expanded')) !== null;
      await section.click();
      if (hasState) {
        await waitUntil(`${label} expanded`, async () => (await section.attribute('aria-expanded')) === 'true', {
          timeoutMs: ctx.waitTimeoutMs,
          intervalMs: ctx.pollIntervalMs,
        });
      }
      await waitForStableHeight(ctx, `${label} height settle`);
      await collect(ctx);
    }
  };
}

export const handleAccordions: TriggerHandler = expandSections(ACCORDION_SELECTOR, 'accordion');

export const handleExpanders: TriggerHandler = expandSections(EXPANDER_SELECTOR, 'expander');

/**
 * Scroll to the bottom until the page stops growing or the scroll ceiling
 * is reached
 */
export const handleInfiniteScroll: TriggerHandler = async (ctx) => {
  await collect(ctx);

  let height = await ctx.driver.scrollHeight();
  for (let scroll = 0; scroll < SCROLL_CEILING; scroll++) {
    await ctx.driver.scrollToBottom();
    const previous = height;
    const grew = await settles(ctx, 'infinite scroll growth', async () => {
      height = await ctx.driver.scrollHeight();
      return height > previous;
    });
    if (!grew) break;
    await collect(ctx);
  }
};

export const TRIGGER_HANDLERS: Record<TriggerType, TriggerHandler> = {
  Pagination: handlePagination,
  LoadMore: handleLoadMore,
  Tabs: handleTabs,
  Accordions: handleAccordions,
  Expanders: handleExpanders,
  InfiniteScroll: handleInfiniteScroll,
};
