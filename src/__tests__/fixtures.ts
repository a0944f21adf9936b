import { createTaxonomy } from '../lib/taxonomy';
import type { TaxonomyInput } from '../lib/taxonomy';
import type { Entry, Taxonomy } from '../lib/types';

/** A small fruit-named taxonomy so expected tags are easy to trace by hand. */
export function rawTaxonomy(): TaxonomyInput {
  return {
    themes: [
      { id: 'alpha', patterns: ['apple', 'apricot'] },
      { id: 'beta', patterns: ['banana', 'blueberry'] },
      { id: 'gamma', patterns: ['grape', 'guava'] },
      { id: 'justice', patterns: ['court'] },
      { id: 'government', patterns: ['federal'] },
    ],
    keywords: [
      { id: 'k1', patterns: ['apple'] },
      { id: 'k2', patterns: ['banana', 'split'] },
      { id: 'k3', patterns: ['grape'] },
      { id: 'k4', patterns: ['guava'] },
    ],
    themeInfo: {
      alpha: { title: 'Alpha Policy', priority: 2, description: 'Apple Programs and orchards', color: '#111111' },
      beta: { title: 'Beta Policy', priority: 1, description: 'Banana imports', color: '#222222' },
      gamma: { title: 'Gamma Policy', priority: 3, description: 'Grape harvests', color: '#333333' },
      justice: { title: 'Courts', priority: 4, description: 'Judicial matters', color: '#444444' },
      government: { title: 'Government', priority: 5, description: 'Federal operations', color: '#555555' },
    },
    fallback: {
      judiciaryMarkers: ['supreme', 'scotus'],
      judiciaryTheme: 'justice',
      governmentMarkers: ['.gov', 'whitehouse'],
      governmentTheme: 'government',
      defaultTheme: 'government',
    },
  };
}

export function fruitTaxonomy(): Taxonomy {
  return createTaxonomy(rawTaxonomy());
}

export function makeEntry(overrides: Partial<Entry> & Pick<Entry, 'id'>): Entry {
  return {
    url: `https://news.example/${overrides.id}`,
    title: '',
    date: null,
    themes: [],
    keywords: [],
    content_snippet: null,
    ...overrides,
  };
}

export function postPage(text: string): string {
  return `<html><body><div data-testid="postText">${text}</div></body></html>`;
}
