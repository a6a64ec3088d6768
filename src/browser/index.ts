/**
 * Browser module.
 * The BrowserDriver port plus its Playwright adapter, session launcher
 * and page-structure analyzer.
 */

export { MalformedSelectorError, attributeSelector, describeQuery } from './driver.js';
export type {
  AttributeMatch,
  BrowserDriver,
  DriverAction,
  ElementHandle,
  SelectorQuery,
} from './driver.js';
export { PlaywrightDriver, locatorFor, toPlaywrightSelector } from './playwrightDriver.js';
export type { PlaywrightHandle } from './playwrightDriver.js';
export { launchSession } from './session.js';
export type { BrowserSession, SessionConfig } from './session.js';
export { PageStructureAnalyzer } from './analyzer.js';
