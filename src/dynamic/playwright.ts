import { chromium, type Browser, type ElementHandle, type Locator, type Page } from 'playwright-core';
import type { AutomationDriver, ControlHandle, ControlTarget } from './driver.js';

export interface PlaywrightDriverOptions {
  headless?: boolean;
  /** Chromium binary; playwright-core ships none */
  executablePath?: string;
  /** Browser channel such as "chrome" when no executable path is given */
  channel?: string;
  navigationTimeoutMs?: number;
  actionTimeoutMs?: number;
}

/** Path fragments this short match too many unrelated links */
const MIN_PATH_PART_LENGTH = 4;

function cssString(value: string): string {
  return JSON.stringify(value);
}

/**
 * Chromium session driven through playwright-core. The browser launches on
 * the first `open` and is reused until `close`.
 */
export class PlaywrightDriver implements AutomationDriver {
  private browser: Browser | null = null;
  private page: Page | null = null;

  constructor(private readonly options: PlaywrightDriverOptions = {}) {}

  async open(url: string): Promise<void> {
    const page = await this.ensurePage();
    await page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.options.navigationTimeoutMs ?? 30000,
    });
  }

  currentUrl(): string {
    return this.requirePage().url();
  }

  async html(): Promise<string> {
    return this.requirePage().content();
  }

  async linkCount(): Promise<number> {
    return this.requirePage().locator('a[href]').count();
  }

  async scrollHeight(): Promise<number> {
    return this.requirePage().evaluate(() => document.body.scrollHeight);
  }

  async scrollToBottom(): Promise<void> {
    await this.requirePage().evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  /**
   * Find the control by exact link text, then by href, then by any
   * meaningful fragment of the href path
   */
  async locateControl(target: ControlTarget): Promise<ControlHandle | null> {
    const page = this.requirePage();
    const candidates: Locator[] = [];

    if (target.anchorText) {
      candidates.push(page.getByText(target.anchorText, { exact: true }));
    }
    if (target.relativePath) {
      candidates.push(page.locator(`a[href*=${cssString(target.relativePath)}]`));
      for (const part of target.relativePath.split(/[/?&=]/)) {
        if (part.length >= MIN_PATH_PART_LENGTH) {
          candidates.push(page.locator(`a[href*=${cssString(part)}]`));
        }
      }
    }

    for (const locator of candidates) {
      if ((await locator.count()) > 0) {
        return this.handleFor(locator.first());
      }
    }
    return null;
  }

  /**
   * Bound element handles. An `nth()` locator re-resolves its selector on
   * every call and drifts once an expanded section stops matching.
   */
  async locateAll(selector: string): Promise<ControlHandle[]> {
    const elements = await this.requirePage().locator(selector).elementHandles();
    return elements.map((element) => this.handleForElement(element));
  }

  async exists(selector: string): Promise<boolean> {
    return this.requirePage().locator(selector).first().isVisible();
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.page = null;
    this.browser = null;
    if (browser) {
      await browser.close();
    }
  }

  private handleFor(locator: Locator): ControlHandle {
    const timeout = this.options.actionTimeoutMs ?? 10000;
    return {
      isVisible: () => locator.isVisible(),
      click: () => locator.click({ timeout }),
      attribute: (name) => locator.getAttribute(name, { timeout }),
    };
  }

  private handleForElement<T extends Node>(element: ElementHandle<T>): ControlHandle {
    const timeout = this.options.actionTimeoutMs ?? 10000;
    return {
      isVisible: () => element.isVisible(),
      click: () => element.click({ timeout }),
      attribute: (name) => element.getAttribute(name),
    };
  }

  private async ensurePage(): Promise<Page> {
    if (this.page) return this.page;
    if (!this.browser) {
      this.browser = await chromium.launch({
        headless: this.options.headless ?? true,
        executablePath: this.options.executablePath,
        channel: this.options.executablePath ? undefined : this.options.channel,
      });
    }
    this.page = await this.browser.newPage();
    return this.page;
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error('Automation session is not open');
    }
    return this.page;
  }
}
