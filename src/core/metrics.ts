import type { BrowserDriver, ElementHandle } from '../browser/driver.js';
import type { PageMetrics } from '../schema/index.js';
import { pageMetricsSchema } from '../schema/index.js';

// ── Performance timing ───────────────────────────────────────

/**
 * Evaluated in the page after navigation. Yields null when the
 * browser has no navigation entry (about:blank, some redirects).
 */
export const PAGE_METRICS_SCRIPT = `(() => {
  const nav = performance.getEntriesByType('navigation')[0];
  if (!nav) return null;
  const paint = performance.getEntriesByType('paint');
  const at = (name) => Math.round(paint.find((p) => p.name === name)?.startTime ?? 0);
  return {
    pageLoadMs: Math.max(0, Math.round(nav.loadEventEnd - nav.startTime)),
    domContentLoadedMs: Math.max(0, Math.round(nav.domContentLoadedEventEnd - nav.startTime)),
    firstPaintMs: at('first-paint'),
    firstContentfulPaintMs: at('first-contentful-paint'),
  };
})()`;

/** Read navigation and paint timings; undefined when the page reports none. */
export async function readPageMetrics<H extends ElementHandle>(
  driver: BrowserDriver<H>,
): Promise<PageMetrics | undefined> {
  const parsed = pageMetricsSchema.safeParse(await driver.evaluateScript(PAGE_METRICS_SCRIPT));
  return parsed.success ? parsed.data : undefined;
}
