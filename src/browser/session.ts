import { mkdir } from 'node:fs/promises';

import { chromium, firefox, webkit } from 'playwright';
import type { BrowserType, Page } from 'playwright';

import type { BrowserName } from '../schema/index.js';
import { PlaywrightDriver } from './playwrightDriver.js';

// ── Public types ─────────────────────────────────────────────

export interface SessionConfig {
  browser: BrowserName;
  headless: boolean;
  viewport: { width: number; height: number };
  screenshotDir: string;
}

export interface BrowserSession {
  readonly page: Page;
  readonly driver: PlaywrightDriver;
  close(): Promise<void>;
}

const BROWSER_TYPES: Readonly<Record<BrowserName, BrowserType>> = {
  chromium,
  firefox,
  webkit,
};

// ── Session launcher ─────────────────────────────────────────

export async function launchSession(config: SessionConfig): Promise<BrowserSession> {
  await mkdir(config.screenshotDir, { recursive: true });

  const browser = await BROWSER_TYPES[config.browser].launch({ headless: config.headless });
  const context = await browser.newContext({ viewport: config.viewport });
  const page = await context.newPage();

  return {
    page,
    driver: new PlaywrightDriver(page),

    async close(): Promise<void> {
      await browser.close();
    },
  };
}
