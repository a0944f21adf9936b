import { isContentHost } from './enrich';
import type { EnrichmentReport } from './enrich';
import type { Entry } from './types';

export interface DatasetStats {
  total: number;
  withDate: number;
  contentPosts: number;
  themeCounts: Array<[string, number]>;
  keywordCounts: Array<[string, number]>;
}

function histogram(values: Iterable<string>): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  // stable: equal counts stay in first-seen order
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

export function computeStats(entries: readonly Entry[], hostMarker?: string): DatasetStats {
  return {
    total: entries.length,
    withDate: entries.filter(e => e.date !== null).length,
    contentPosts: entries.filter(e => isContentHost(e.url, hostMarker)).length,
    themeCounts: histogram(entries.flatMap(e => e.themes)),
    keywordCounts: histogram(entries.flatMap(e => e.keywords)),
  };
}

export function formatStats(stats: DatasetStats, topKeywords = 15): string {
  const lines = [
    '=== Processing Statistics ===',
    `Total entries: ${stats.total}`,
    `Entries with dates: ${stats.withDate}`,
    `Bluesky entries: ${stats.contentPosts}`,
    '',
    '=== Theme Distribution ===',
    ...stats.themeCounts.map(([theme, n]) => `  ${theme}: ${n}`),
    '',
    '=== Top Keywords ===',
    ...stats.keywordCounts.slice(0, topKeywords).map(([kw, n]) => `  ${kw}: ${n}`),
  ];
  return lines.join('\n');
}

export interface RunReport {
  parsed: number;
  skippedLines: number;
  enrichment: EnrichmentReport;
}

/** Completeness summary for the operator; the run never halts on these. */
export function formatRunReport(report: RunReport): string {
  return [
    '=== Run Report ===',
    `Entries parsed: ${report.parsed}`,
    `Lines skipped: ${report.skippedLines}`,
    `Enrichments: ${report.enrichment.enriched}/${report.enrichment.eligible} succeeded, ${report.enrichment.failed} failed`,
  ].join('\n');
}
