import { describe, it, expect } from 'vitest';
import { TaxonomyError } from '../lib/errors';
import { createTaxonomy, getThemeMeta, keywordIds, loadTaxonomy, themeIds } from '../lib/taxonomy';
import { rawTaxonomy } from './fixtures';

describe('loadTaxonomy', () => {
  const taxonomy = loadTaxonomy();

  it('loads the shipped themes and keywords in declaration order', () => {
    expect(themeIds(taxonomy)).toEqual([
      'science', 'health', 'education', 'environment', 'civil-society', 'human-rights',
      'government', 'justice', 'immigration', 'trade', 'economy', 'foreign-affairs',
    ]);
    expect(keywordIds(taxonomy)).toHaveLength(29);
    expect(keywordIds(taxonomy).slice(0, 3)).toEqual(['doge', 'fbi', 'ice']);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(taxonomy)).toBe(true);
    expect(Object.isFrozen(taxonomy.themes)).toBe(true);
    expect(Object.isFrozen(taxonomy.themes[0].patterns)).toBe(true);
    expect(Object.isFrozen(taxonomy.themeInfo.science)).toBe(true);
  });

  it('keeps significant whitespace in patterns', () => {
    const veterans = taxonomy.keywords.find(k => k.id === 'veterans');
    expect(veterans?.patterns).toEqual(['veteran', 'va ']);
  });

  it('fails on an unreadable file', () => {
    expect(() => loadTaxonomy('/nonexistent/taxonomy.json')).toThrow(TaxonomyError);
  });
});

describe('createTaxonomy', () => {
  it('rejects duplicate theme ids', () => {
    const raw = rawTaxonomy();
    raw.themes.push({ id: 'alpha', patterns: ['again'] });
    expect(() => createTaxonomy(raw)).toThrow('Duplicate theme id "alpha"');
  });

  it('rejects duplicate keyword ids', () => {
    const raw = rawTaxonomy();
    raw.keywords.push({ id: 'k1', patterns: ['again'] });
    expect(() => createTaxonomy(raw)).toThrow('Duplicate keyword id "k1"');
  });

  it('rejects a theme without display metadata', () => {
    const raw = rawTaxonomy();
    raw.themes.push({ id: 'delta', patterns: ['date'] });
    expect(() => createTaxonomy(raw)).toThrow('Theme "delta" has no themeInfo entry');
  });

  it('rejects metadata for an unknown theme', () => {
    const raw = rawTaxonomy();
    raw.themeInfo.delta = { title: 'Delta', priority: 6, description: 'Dates', color: '#666666' };
    expect(() => createTaxonomy(raw)).toThrow('themeInfo references unknown theme "delta"');
  });

  it('rejects a fallback to an unknown theme', () => {
    const raw = rawTaxonomy();
    raw.fallback.defaultTheme = 'misc';
    expect(() => createTaxonomy(raw)).toThrow('Fallback references unknown theme "misc"');
  });

  it('rejects empty pattern lists', () => {
    const raw = rawTaxonomy();
    raw.themes[0].patterns = [];
    expect(() => createTaxonomy(raw)).toThrow(/^Invalid taxonomy: themes\.0\.patterns/);
  });

  it('throws TaxonomyError for an unknown theme lookup', () => {
    expect(() => getThemeMeta(createTaxonomy(rawTaxonomy()), 'delta')).toThrow(TaxonomyError);
  });
});
