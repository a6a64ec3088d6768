import { errors } from 'playwright';
import type { Locator, Page } from 'playwright';

import type { BrowserDriver, DriverAction, ElementHandle, SelectorQuery } from './driver.js';
import { MalformedSelectorError, attributeSelector, describeQuery } from './driver.js';

// ── Handle ───────────────────────────────────────────────────

export interface PlaywrightHandle extends ElementHandle {
  readonly locator: Locator;
}

// ── Query translation ────────────────────────────────────────

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Playwright selector string for every query kind except `label`,
 * which has no selector-engine form and goes through getByLabel.
 */
export function toPlaywrightSelector(query: Exclude<SelectorQuery, { kind: 'label' }>): string {
  switch (query.kind) {
    case 'css':
      return query.selector;
    case 'attribute':
      return attributeSelector(query);
    case 'text':
      return query.within !== undefined
        ? `${query.within}:has-text(${JSON.stringify(query.text)})`
        : `text=/^\\s*${escapeRegex(query.text)}\\s*$/i`;
  }
}

export function locatorFor(page: Pick<Page, 'locator' | 'getByLabel'>, query: SelectorQuery): Locator {
  if (query.kind === 'label') return page.getByLabel(query.text);
  return page.locator(toPlaywrightSelector(query));
}

// ── Error mapping ────────────────────────────────────────────

const MALFORMED_PATTERNS = [/is not a valid selector/i, /unexpected token/i, /unknown engine/i];

function isMalformed(err: unknown): err is Error {
  return err instanceof Error && MALFORMED_PATTERNS.some((p) => p.test(err.message));
}

function isTimeout(err: unknown): boolean {
  return err instanceof errors.TimeoutError;
}

// ── Driver ───────────────────────────────────────────────────

export class PlaywrightDriver implements BrowserDriver<PlaywrightHandle> {
  constructor(readonly page: Page) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const response = await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'load' });
    if (response && response.status() >= 400) {
      throw new Error(`HTTP ${String(response.status())} ${response.statusText()}`);
    }
  }

  async readyState(): Promise<string> {
    return this.page.evaluate<string>('document.readyState');
  }

  currentUrl(): string {
    return this.page.url();
  }

  async locate(query: SelectorQuery, timeoutMs: number): Promise<PlaywrightHandle | null> {
    const locator = locatorFor(this.page, query).first();
    try {
      await locator.waitFor({ state: 'attached', timeout: timeoutMs });
    } catch (err) {
      if (isTimeout(err)) return null;
      if (isMalformed(err)) throw new MalformedSelectorError(describeQuery(query), err.message);
      throw err;
    }
    return { locator, description: describeQuery(query) };
  }

  async count(query: SelectorQuery): Promise<number> {
    try {
      return await locatorFor(this.page, query).count();
    } catch (err) {
      if (isMalformed(err)) throw new MalformedSelectorError(describeQuery(query), err.message);
      throw err;
    }
  }

  async waitVisible(handle: PlaywrightHandle, timeoutMs: number): Promise<boolean> {
    try {
      await handle.locator.waitFor({ state: 'visible', timeout: timeoutMs });
      return true;
    } catch (err) {
      if (isTimeout(err)) return false;
      throw err;
    }
  }

  async isInteractable(handle: PlaywrightHandle): Promise<boolean> {
    return (await handle.locator.isVisible()) && (await handle.locator.isEnabled());
  }

  async textContent(handle: PlaywrightHandle): Promise<string> {
    return (await handle.locator.textContent()) ?? '';
  }

  async act(handle: PlaywrightHandle, action: DriverAction, timeoutMs: number): Promise<void> {
    const { locator } = handle;
    const options = { timeout: timeoutMs };

    switch (action.kind) {
      case 'click':
        await locator.click(options);
        break;
      case 'hover':
        await locator.hover(options);
        break;
      case 'fill':
        await locator.fill(action.text, options);
        break;
      case 'select':
        await locator.selectOption({ label: action.label }, options);
        break;
      case 'scroll-into-view':
        await locator.scrollIntoViewIfNeeded(options);
        break;
    }
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }

  async evaluateScript(script: string): Promise<unknown> {
    return this.page.evaluate<unknown>(script);
  }
}
