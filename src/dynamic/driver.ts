import { load } from 'cheerio';
import { AutomationTimeoutError } from '../errors/index.js';
import { extractLinks } from '../transport/parser.js';
import type { RawLink } from '../types/index.js';

/**
 * One interactive element on the automated page
 */
export interface ControlHandle {
  isVisible(): Promise<boolean>;
  click(): Promise<void>;
  attribute(name: string): Promise<string | null>;
}

/**
 * What the gateway pointed at: the control is found again on the live page
 * by its anchor text, then by its href
 */
export interface ControlTarget {
  relativePath: string;
  anchorText: string;
}

/**
 * Browser automation seam used by the dynamic-content handlers
 */
export interface AutomationDriver {
  open(url: string): Promise<void>;
  currentUrl(): string;
  html(): Promise<string>;
  linkCount(): Promise<number>;
  scrollHeight(): Promise<number>;
  scrollToBottom(): Promise<void>;
  locateControl(target: ControlTarget): Promise<ControlHandle | null>;
  /** Handles stay bound to the elements matched at call time */
  locateAll(selector: string): Promise<ControlHandle[]>;
  /** Whether a visible element matches selector */
  exists(selector: string): Promise<boolean>;
  close(): Promise<void>;
}

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll check until it returns true
 *
 * @throws AutomationTimeoutError when timeoutMs elapses first
 */
export async function waitUntil(
  name: string,
  check: () => Promise<boolean>,
  options: WaitOptions
): Promise<void> {
  const deadline = Date.now() + options.timeoutMs;
  for (;;) {
    if (await check()) return;
    if (Date.now() >= deadline) {
      throw new AutomationTimeoutError(name, options.timeoutMs);
    }
    await sleep(options.intervalMs);
  }
}

/**
 * Links currently rendered on the driver's page
 */
export async function snapshotLinks(driver: AutomationDriver): Promise<RawLink[]> {
  return extractLinks(load(await driver.html()), driver.currentUrl());
}

/**
 * Order-sensitive fingerprint of a link list; changes when a container
 * re-renders with different content
 */
export function linkSignature(links: readonly RawLink[]): string {
  return links.map((l) => l.absoluteUrl).join('\n');
}

/**
 * Accumulates revealed links, first occurrence wins
 */
export class LinkCollector {
  private readonly byUrl = new Map<string, RawLink>();

  get size(): number {
    return this.byUrl.size;
  }

  /**
   * @returns number of links not seen before
   */
  add(links: readonly RawLink[]): number {
    let added = 0;
    for (const link of links) {
      if (!this.byUrl.has(link.absoluteUrl)) {
        this.byUrl.set(link.absoluteUrl, link);
        added++;
      }
    }
    return added;
  }

  links(): RawLink[] {
    return Array.from(this.byUrl.values());
  }
}
