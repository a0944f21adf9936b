import { describe, it, expect } from 'vitest';
import { Classifier } from '../lib/classifier';
import { loadTaxonomy } from '../lib/taxonomy';
import { fruitTaxonomy, makeEntry } from './fixtures';

describe('Classifier', () => {
  const classifier = new Classifier(fruitTaxonomy());

  describe('tag', () => {
    it('scores themes and flags keywords from URL and title', () => {
      expect(classifier.tag({ url: 'https://news.example/x', title: 'Apple and banana' })).toEqual({
        themes: ['alpha', 'beta'],
        keywords: ['k1', 'k2'],
      });
    });

    it('orders themes by descending score', () => {
      expect(classifier.tag({ url: 'https://news.example/x', title: 'grape guava apple' }).themes)
        .toEqual(['gamma', 'alpha']);
    });

    it('breaks ties by taxonomy order and keeps two themes', () => {
      expect(classifier.tag({ url: 'https://news.example/x', title: 'grape banana apple' }).themes)
        .toEqual(['alpha', 'beta']);
    });

    it('counts each pattern once however often it occurs', () => {
      expect(classifier.tag({ url: 'https://news.example/x', title: 'apple apple apple banana blueberry' }).themes)
        .toEqual(['beta', 'alpha']);
    });

    it('caps keywords at three in taxonomy order', () => {
      expect(classifier.tag({ url: 'https://news.example/x', title: 'guava grape banana apple' }).keywords)
        .toEqual(['k1', 'k2', 'k3']);
    });

    it('matches case-insensitively', () => {
      expect(classifier.tag({ url: 'https://news.example/x', title: 'GRAPE' }).themes).toEqual(['gamma']);
    });

    it('is idempotent', () => {
      const entry = { url: 'https://news.example/x', title: 'Banana split with grapes' };
      expect(classifier.tag(entry)).toEqual(classifier.tag(entry));
    });
  });

  describe('fallback', () => {
    it('uses justice for judiciary domains', () => {
      expect(classifier.tag({ url: 'https://scotus.example/x', title: 'Opinion released' }).themes)
        .toEqual(['justice']);
    });

    it('uses government for government domains', () => {
      expect(classifier.tag({ url: 'https://agency.gov/x', title: 'Statement' }).themes).toEqual(['government']);
    });

    it('uses government for any other domain', () => {
      expect(classifier.tag({ url: 'https://blog.example/x', title: 'Nothing relevant' }).themes)
        .toEqual(['government']);
    });

    it('treats an unparseable URL as having no domain', () => {
      expect(classifier.fallbackTheme('not a url')).toBe('government');
    });
  });

  describe('tagWithContent', () => {
    it('weighs patterns found in fetched content double', () => {
      const entry = { url: 'https://bsky.app/profile/a/post/1', title: 'Post about apple' };
      // alpha scores 1 from the title, beta 2 from the content
      expect(classifier.tagWithContent(entry, 'Banana news')).toEqual({
        themes: ['beta', 'alpha'],
        keywords: ['k1', 'k2'],
      });
    });

    it('falls back when neither text nor content match', () => {
      expect(classifier.tagWithContent({ url: 'https://bsky.app/profile/a/post/1', title: 'Daily post' }, 'hello'))
        .toEqual({ themes: ['government'], keywords: [] });
    });
  });

  describe('apply', () => {
    it('replaces tags rather than merging them', () => {
      const entry = makeEntry({ id: 1, themes: ['alpha'], keywords: ['k1'] });
      classifier.apply(entry, { themes: ['beta'], keywords: ['k2'] });
      expect(entry.themes).toEqual(['beta']);
      expect(entry.keywords).toEqual(['k2']);
    });
  });

  it('tags the NSF example with the shipped taxonomy', () => {
    const shipped = new Classifier(loadTaxonomy());
    const tags = shipped.tag({
      url: 'https://example.gov/2025/01/15/nsf-budget-cuts',
      title: 'NSF budget cuts announced',
    });
    expect(tags).toEqual({ themes: ['science', 'economy'], keywords: ['nsf'] });
  });
});
