import { describe, it, expect } from 'vitest';

import {
  candidateChain,
  genericCandidates,
  hintMatches,
  semanticCandidates,
  suggestSelector,
  targetVariants,
} from '../../src/core/strategies.js';
import type { StructureHint } from '../../src/schema/index.js';

const hint = (keyword: string, selector: string): StructureHint => ({
  keyword,
  selector,
  category: 'other',
});

describe('targetVariants', () => {
  it('adds hyphenated and noun-stripped spellings', () => {
    expect(targetVariants('submit button')).toEqual(['submit button', 'submit-button', 'submit']);
    expect(targetVariants('success message')).toEqual([
      'success message',
      'success-message',
      'success',
    ]);
  });

  it('strips the noun and hyphenates what remains', () => {
    expect(targetVariants('first name field')).toEqual([
      'first name field',
      'first-name-field',
      'first name',
      'first-name',
    ]);
  });

  it('leaves a lone control noun alone', () => {
    expect(targetVariants('button')).toEqual(['button']);
  });
});

describe('hintMatches', () => {
  it('matches in both directions', () => {
    expect(hintMatches('username field', 'username')).toBe(true);
    expect(hintMatches('user', 'username')).toBe(true);
    expect(hintMatches('email', 'password')).toBe(false);
  });
});

describe('suggestSelector', () => {
  it('ignores shared control nouns', () => {
    const hints = [hint('password field', '#pw'), hint('email address', '#mail')];
    expect(suggestSelector('email field', hints)).toBe('#mail');
  });

  it('returns undefined without a shared word', () => {
    expect(suggestSelector('email', [hint('search', '#q')])).toBeUndefined();
  });
});

describe('candidate tiers', () => {
  it('orders explicit, hint, semantic, then generic', () => {
    const chain = [
      ...candidateChain('submit button', {
        explicitSelector: '#go',
        hints: [hint('submit', '#send'), hint('cancel', '#c')],
      }),
    ];

    expect(chain[0]).toEqual({ tier: 'explicit', query: { kind: 'css', selector: '#go' } });
    expect(chain[1]).toEqual({ tier: 'hint', query: { kind: 'css', selector: '#send' } });
    expect(chain.slice(2, 7).every((c) => c.tier === 'semantic')).toBe(true);
    expect(chain.slice(7).every((c) => c.tier === 'generic')).toBe(true);
  });

  it('only tries a tag selector for tag-like targets', () => {
    const tagLike = [...semanticCandidates('form')].map((c) => c.query);
    expect(tagLike).toContainEqual({ kind: 'css', selector: 'form' });

    const phrase = [...semanticCandidates('main menu')].map((c) => c.query);
    expect(phrase.some((q) => q.kind === 'css')).toBe(false);
  });

  it('scopes text to landmarks', () => {
    const queries = [...semanticCandidates('pricing')].map((c) => c.query);
    expect(queries.slice(-3)).toEqual([
      { kind: 'text', text: 'pricing', within: 'nav' },
      { kind: 'text', text: 'pricing', within: 'header' },
      { kind: 'text', text: 'pricing', within: 'footer' },
    ]);
  });

  it('tries ids, names and classes before the raw selector guess', () => {
    const generic = [...genericCandidates('email field')];

    expect(generic[0]?.query).toEqual({
      kind: 'attribute',
      attribute: 'id',
      value: 'email field',
      match: 'equals',
    });
    expect(generic[2]?.query).toMatchObject({ attribute: 'id', value: 'email' });
    expect(generic[3]?.query).toMatchObject({ attribute: 'name', value: 'email field' });
    expect(generic[6]?.query).toEqual({
      kind: 'attribute',
      attribute: 'class',
      value: 'email-field',
      match: 'word',
    });
    expect(generic[8]).toEqual({
      tier: 'generic',
      query: { kind: 'css', selector: 'email field' },
      speculative: true,
    });
    expect(generic[9]?.query).toEqual({ kind: 'text', text: 'email field' });
  });

  it('ends with link candidates', () => {
    const generic = [...genericCandidates('help')];
    expect(generic.at(-1)?.query).toEqual({
      kind: 'attribute',
      attribute: 'aria-label',
      value: 'help',
      match: 'equals',
      tag: 'a',
    });
  });
});
