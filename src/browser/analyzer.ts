import type { Page } from 'playwright';

import type { StructureAnalysis, StructureHintProvider } from '../schema/index.js';
import { EMPTY_ANALYSIS, structureAnalysisSchema } from '../schema/index.js';

// ── Public API ───────────────────────────────────────────────

/**
 * Reads forms, load-more controls and the scrolling container from
 * the page. A page the session already loaded is not navigated again,
 * so redirects are analysed where they landed.
 */
export class PageStructureAnalyzer implements StructureHintProvider {
  constructor(private readonly page: Page) {}

  async analyze(url: string): Promise<StructureAnalysis> {
    if (this.page.url() === 'about:blank') {
      await this.page.goto(url, { waitUntil: 'domcontentloaded' });
    }
    const extracted: unknown = await this.page.evaluate(extractStructure);
    const parsed = structureAnalysisSchema.safeParse(extracted);
    return parsed.success ? parsed.data : EMPTY_ANALYSIS;
  }
}

// ── Browser-context extraction ───────────────────────────────
// This function is serialized and executed inside the browser.
// It must NOT reference any outer-scope variables.

export function extractStructure(): StructureAnalysis {
  function selectorOf(el: Element): string | undefined {
    const id = el.getAttribute('id');
    if (id) return `#${CSS.escape(id)}`;

    const name = el.getAttribute('name');
    if (name) return `${el.tagName.toLowerCase()}[name="${CSS.escape(name)}"]`;

    const testId = el.getAttribute('data-testid');
    if (testId) return `[data-testid="${CSS.escape(testId)}"]`;

    return undefined;
  }

  function keywordOf(el: Element): string | undefined {
    return (
      el.getAttribute('name') ??
      el.getAttribute('id') ??
      el.getAttribute('aria-label') ??
      el.getAttribute('placeholder') ??
      undefined
    );
  }

  // Forms and their inputs
  const forms: StructureAnalysis['forms'] = [];
  document.querySelectorAll('form').forEach((form, index) => {
    const inputs: Record<string, string> = {};
    form.querySelectorAll('input, select, textarea').forEach((el) => {
      const keyword = keywordOf(el);
      const selector = selectorOf(el);
      if (keyword && selector) inputs[keyword] = selector;
    });
    forms.push({ selector: selectorOf(form) ?? `form:nth-of-type(${String(index + 1)})`, inputs });
  });

  // Load-more controls
  let loadMoreSelector: string | undefined;
  for (const el of Array.from(document.querySelectorAll('button, a, [role="button"]'))) {
    const text = el.textContent?.trim().toLowerCase() ?? '';
    if (text.includes('load more') || text.includes('show more')) {
      loadMoreSelector = selectorOf(el);
      if (loadMoreSelector) break;
    }
  }

  // Scrolling container: the tallest element that scrolls on its own
  let scrollContainer: string | undefined;
  let tallest = 0;
  for (const el of Array.from(document.querySelectorAll('main, section, div, ul'))) {
    const style = getComputedStyle(el);
    const scrolls = style.overflowY === 'auto' || style.overflowY === 'scroll';
    if (scrolls && el.scrollHeight > el.clientHeight && el.scrollHeight > tallest) {
      const selector = selectorOf(el);
      if (selector) {
        scrollContainer = selector;
        tallest = el.scrollHeight;
      }
    }
  }

  // Suggested selectors for labelled controls outside forms
  const suggestedSelectors: Record<string, string> = {};
  document.querySelectorAll('button, a[href], [role="button"]').forEach((el) => {
    const label = el.getAttribute('aria-label') ?? el.textContent?.trim();
    const selector = selectorOf(el);
    if (label && selector && label.length <= 40 && !(label in suggestedSelectors)) {
      suggestedSelectors[label] = selector;
    }
  });

  return {
    forms,
    dynamicContent: {
      infiniteScroll: scrollContainer !== undefined || document.body.scrollHeight > window.innerHeight,
      loadMore: loadMoreSelector !== undefined,
      ...(scrollContainer !== undefined ? { scrollContainer } : {}),
      ...(loadMoreSelector !== undefined ? { loadMoreSelector } : {}),
    },
    suggestedSelectors,
  };
}
