import type { SelectorQuery } from '../browser/driver.js';
import type { StructureHint } from '../schema/index.js';

// ── Candidate types ──────────────────────────────────────────

export type CandidateTier = 'explicit' | 'hint' | 'semantic' | 'generic';

export interface SelectorCandidate {
  readonly tier: CandidateTier;
  readonly query: SelectorQuery;
  /** The target tried verbatim as CSS; a malformed one is skipped. */
  readonly speculative?: boolean;
}

export interface CandidateSources {
  hints?: readonly StructureHint[] | undefined;
  explicitSelector?: string | undefined;
}

// ── Target variants ──────────────────────────────────────────

const CONTROL_NOUNS = [
  'button',
  'field',
  'box',
  'input',
  'link',
  'dropdown',
  'menu',
  'icon',
  'message',
];

const TAG_LIKE = /^[a-z][a-z0-9]*(?:-[a-z0-9]+)*$/;
const LANDMARKS = ['nav', 'header', 'footer'];

function hyphenate(text: string): string {
  return text.replace(/\s+/g, '-');
}

function stripControlNoun(target: string): string {
  const words = target.split(' ');
  const last = words[words.length - 1];
  if (words.length > 1 && last !== undefined && CONTROL_NOUNS.includes(last)) {
    return words.slice(0, -1).join(' ');
  }
  return target;
}

/**
 * Spellings under which a page may name the target:
 * "submit button" → submit button, submit-button, submit.
 */
export function targetVariants(target: string): string[] {
  const stripped = stripControlNoun(target);
  return [...new Set([target, hyphenate(target), stripped, hyphenate(stripped)])];
}

// ── Hints ────────────────────────────────────────────────────

export function hintMatches(target: string, keyword: string): boolean {
  const t = target.toLowerCase();
  const k = keyword.toLowerCase();
  return t.includes(k) || k.includes(t);
}

function significantWords(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[\s_-]+/)
      .filter((w) => w.length > 0 && !CONTROL_NOUNS.includes(w)),
  );
}

/** Selector of the first hint sharing a word with the target. */
export function suggestSelector(target: string, hints: readonly StructureHint[]): string | undefined {
  const words = significantWords(target);
  for (const hint of hints) {
    for (const word of significantWords(hint.keyword)) {
      if (words.has(word)) return hint.selector;
    }
  }
  return undefined;
}

// ── Tiers ────────────────────────────────────────────────────

export function* explicitCandidates(selector: string | undefined): Generator<SelectorCandidate> {
  if (selector) yield { tier: 'explicit', query: { kind: 'css', selector } };
}

export function* hintCandidates(
  target: string,
  hints: readonly StructureHint[],
): Generator<SelectorCandidate> {
  for (const hint of hints) {
    if (hintMatches(target, hint.keyword)) {
      yield { tier: 'hint', query: { kind: 'css', selector: hint.selector } };
    }
  }
}

export function* semanticCandidates(target: string): Generator<SelectorCandidate> {
  yield { tier: 'semantic', query: { kind: 'attribute', attribute: 'role', value: target, match: 'equals' } };
  yield {
    tier: 'semantic',
    query: { kind: 'attribute', attribute: 'aria-label', value: target, match: 'contains' },
  };
  if (TAG_LIKE.test(target)) {
    yield { tier: 'semantic', query: { kind: 'css', selector: target } };
  }
  for (const within of LANDMARKS) {
    yield { tier: 'semantic', query: { kind: 'text', text: target, within } };
  }
}

export function* genericCandidates(target: string): Generator<SelectorCandidate> {
  const variants = targetVariants(target);
  const generic = (query: SelectorQuery): SelectorCandidate => ({ tier: 'generic', query });
  const attr = (attribute: string, value: string, tag?: string): SelectorQuery => ({
    kind: 'attribute',
    attribute,
    value,
    match: 'equals',
    ...(tag !== undefined ? { tag } : {}),
  });

  for (const v of variants) yield generic(attr('id', v));
  for (const v of variants) yield generic(attr('name', v));
  for (const v of variants) {
    if (!v.includes(' ')) {
      yield generic({ kind: 'attribute', attribute: 'class', value: v, match: 'word' });
    }
  }

  yield { tier: 'generic', query: { kind: 'css', selector: target }, speculative: true };

  for (const v of variants) yield generic({ kind: 'text', text: v });
  for (const v of variants) {
    yield generic({ kind: 'text', text: v, within: 'button' });
    yield generic(attr('aria-label', v, 'button'));
  }
  for (const v of variants) {
    yield generic(attr('placeholder', v, 'input'));
    yield generic(attr('aria-label', v, 'input'));
  }
  for (const v of variants) yield generic({ kind: 'label', text: v });
  for (const v of variants) {
    yield generic({ kind: 'text', text: v, within: 'a' });
    yield generic(attr('aria-label', v, 'a'));
  }
}

/** Every candidate for `target`, tiers in fixed order. */
export function* candidateChain(target: string, sources: CandidateSources = {}): Generator<SelectorCandidate> {
  yield* explicitCandidates(sources.explicitSelector);
  yield* hintCandidates(target, sources.hints ?? []);
  yield* semanticCandidates(target);
  yield* genericCandidates(target);
}
