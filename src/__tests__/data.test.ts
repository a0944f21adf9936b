import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { gunzipSync } from 'node:zlib';
import { buildDataset, loadDataset, saveDataset } from '../lib/data';
import { DatasetError } from '../lib/errors';
import { computeStats, formatRunReport, formatStats } from '../lib/stats';
import { fruitTaxonomy, makeEntry } from './fixtures';

const NOW = new Date('2025-02-01T00:00:00Z');

const entries = () => [
  makeEntry({ id: 1, title: 'Apple', date: '2025-01-02', themes: ['alpha', 'beta'], keywords: ['k1'] }),
  makeEntry({ id: 2, title: 'Banana', themes: ['beta'], keywords: ['k1', 'k2'] }),
  makeEntry({ id: 4, url: 'https://bsky.app/profile/a/post/4', themes: ['gamma'], content_snippet: 'grape' }),
];

describe('buildDataset', () => {
  it('records metadata from the taxonomy', () => {
    const dataset = buildDataset(entries(), fruitTaxonomy(), NOW);
    expect(dataset.metadata).toEqual({
      generated: '2025-02-01T00:00:00.000Z',
      total_entries: 3,
      themes: ['alpha', 'beta', 'gamma', 'justice', 'government'],
      keywords: ['k1', 'k2', 'k3', 'k4'],
    });
  });

  it('copies entries so later changes do not leak in', () => {
    const source = entries();
    const dataset = buildDataset(source, fruitTaxonomy(), NOW);
    source[0].themes.push('gamma');
    expect(dataset.entries[0].themes).toEqual(['alpha', 'beta']);
  });

  it('serializes entries with the published field names', () => {
    const dataset = buildDataset(entries(), fruitTaxonomy(), NOW);
    const parsed: unknown = JSON.parse(JSON.stringify(dataset.entries[1]));
    expect(parsed).toEqual({
      id: 2,
      url: 'https://news.example/2',
      title: 'Banana',
      date: null,
      themes: ['beta'],
      keywords: ['k1', 'k2'],
      content_snippet: null,
    });
  });
});

describe('saveDataset / loadDataset', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tracker-data-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes plain and gzipped copies of the same dataset', async () => {
    const dataset = buildDataset(entries(), fruitTaxonomy(), NOW);
    const { jsonPath, gzPath } = await saveDataset(dataset, dir);

    expect(jsonPath).toBe(join(dir, 'diary_data.json'));
    expect(gzPath).toBe(join(dir, 'diary_data.json.gz'));
    expect(JSON.parse(gunzipSync(await readFile(gzPath)).toString('utf-8'))).toEqual(dataset);
    expect(loadDataset(jsonPath)).toEqual(dataset);
    expect(loadDataset(gzPath)).toEqual(dataset);
  });

  it('rejects a missing file', () => {
    expect(() => loadDataset(join(dir, 'nope.json'))).toThrow(DatasetError);
  });

  it('rejects a document of the wrong shape', async () => {
    const file = join(dir, 'bad.json');
    await writeFile(file, JSON.stringify({ metadata: {}, entries: [] }));
    expect(() => loadDataset(file)).toThrow(/invalid dataset at metadata\.generated/);
  });

  it('rejects entries with too many themes', async () => {
    const dataset = buildDataset(entries(), fruitTaxonomy(), NOW);
    dataset.entries[0].themes = ['alpha', 'beta', 'gamma'];
    const file = join(dir, 'bad.json');
    await writeFile(file, JSON.stringify(dataset));
    expect(() => loadDataset(file)).toThrow(/entries\.0\.themes/);
  });
});

describe('stats', () => {
  it('counts dates, posts and tag frequencies', () => {
    const source = entries();
    source[1].themes = ['beta', 'alpha'];
    expect(computeStats(source)).toEqual({
      total: 3,
      withDate: 1,
      contentPosts: 1,
      themeCounts: [['alpha', 2], ['beta', 2], ['gamma', 1]],
      keywordCounts: [['k1', 2], ['k2', 1]],
    });
  });

  it('formats the operator summary', () => {
    const text = formatStats(computeStats(entries()), 1);
    expect(text).toBe([
      '=== Processing Statistics ===',
      'Total entries: 3',
      'Entries with dates: 1',
      'Bluesky entries: 1',
      '',
      '=== Theme Distribution ===',
      '  beta: 2',
      '  alpha: 1',
      '  gamma: 1',
      '',
      '=== Top Keywords ===',
      '  k1: 2',
    ].join('\n'));
  });

  it('reports skipped lines and failed enrichments', () => {
    const text = formatRunReport({
      parsed: 10,
      skippedLines: 2,
      enrichment: { eligible: 4, enriched: 3, failed: 1, results: [] },
    });
    expect(text).toBe([
      '=== Run Report ===',
      'Entries parsed: 10',
      'Lines skipped: 2',
      'Enrichments: 3/4 succeeded, 1 failed',
    ].join('\n'));
  });
});
