/**
 * Browser Automation Driver port.
 *
 * The core (parser, resolver, executor) talks only to this interface.
 * Each automation backend supplies one adapter; Playwright's lives in
 * ./playwrightDriver.ts.
 */

// ── Selector queries ─────────────────────────────────────────

export type AttributeMatch = 'equals' | 'contains' | 'word';

/**
 * Backend-neutral description of where to look for an element.
 * Attribute and text comparisons are case-insensitive.
 */
export type SelectorQuery =
  | { kind: 'css'; selector: string }
  | {
      kind: 'attribute';
      attribute: string;
      value: string;
      match: AttributeMatch;
      tag?: string | undefined;
    }
  /** Exact text when `within` is absent; otherwise a `within` element containing the text. */
  | { kind: 'text'; text: string; within?: string | undefined }
  /** Form control associated with a label whose text matches. */
  | { kind: 'label'; text: string };

const ATTRIBUTE_OPERATORS: Readonly<Record<AttributeMatch, string>> = {
  equals: '=',
  contains: '*=',
  word: '~=',
};

function quoteCss(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** CSS for an attribute query, using the case-insensitive flag. */
export function attributeSelector(query: Extract<SelectorQuery, { kind: 'attribute' }>): string {
  const op = ATTRIBUTE_OPERATORS[query.match];
  return `${query.tag ?? ''}[${query.attribute}${op}${quoteCss(query.value)} i]`;
}

/** Human-readable one-liner describing the query for diagnostics. */
export function describeQuery(query: SelectorQuery): string {
  switch (query.kind) {
    case 'css':
      return query.selector;
    case 'attribute':
      return attributeSelector(query);
    case 'text':
      return query.within !== undefined
        ? `${query.within}:has-text(${quoteCss(query.text)})`
        : `text=${quoteCss(query.text)}`;
    case 'label':
      return `label=${quoteCss(query.text)}`;
  }
}

// ── Actions ──────────────────────────────────────────────────

export type DriverAction =
  | { kind: 'click' }
  | { kind: 'hover' }
  | { kind: 'fill'; text: string }
  | { kind: 'select'; label: string }
  | { kind: 'scroll-into-view' };

// ── Driver ───────────────────────────────────────────────────

export interface ElementHandle {
  /** Query the handle was resolved from, for diagnostics. */
  readonly description: string;
}

export interface BrowserDriver<H extends ElementHandle = ElementHandle> {
  navigate(url: string, timeoutMs: number): Promise<void>;
  readyState(): Promise<string>;
  currentUrl(): string;

  /**
   * Wait up to `timeoutMs` for the first element matching `query`.
   * Resolves `null` when nothing appears; rejects only on real faults
   * (disconnected browser, MalformedSelectorError).
   */
  locate(query: SelectorQuery, timeoutMs: number): Promise<H | null>;
  count(query: SelectorQuery): Promise<number>;

  waitVisible(handle: H, timeoutMs: number): Promise<boolean>;
  /** Visible and enabled right now. */
  isInteractable(handle: H): Promise<boolean>;
  textContent(handle: H): Promise<string>;
  act(handle: H, action: DriverAction, timeoutMs: number): Promise<void>;

  screenshot(filePath: string): Promise<void>;
  evaluateScript(script: string): Promise<unknown>;
}

// ── Errors ───────────────────────────────────────────────────

export class MalformedSelectorError extends Error {
  readonly selector: string;

  constructor(selector: string, reason: string) {
    super(`Malformed selector ${selector}: ${reason}`);
    this.name = 'MalformedSelectorError';
    this.selector = selector;
  }
}
