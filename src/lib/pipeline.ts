import { writeFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { createSummarizer, summarizeThemes } from './ai';
import type { ThemeSummarizer } from './ai';
import { Classifier } from './classifier';
import type { TrackerConfig } from './config';
import { buildDataset, saveDataset } from './data';
import { ContentEnricher } from './enrich';
import type { EnrichmentReport } from './enrich';
import { readEntriesFile } from './parser';
import { renderIndexPage, renderSummaryPage } from './render';
import { computeStats, formatRunReport, formatStats } from './stats';
import type { RunReport } from './stats';
import { loadTaxonomy } from './taxonomy';
import type { Dataset, Taxonomy } from './types';

export interface PipelineDeps {
  taxonomy?: Taxonomy;
  fetch?: typeof fetch;
  summarizer?: ThemeSummarizer;
  now?: () => Date;
}

export interface PipelineResult {
  dataset: Dataset;
  report: RunReport;
  files: string[];
}

const NO_ENRICHMENT: EnrichmentReport = { eligible: 0, enriched: 0, failed: 0, results: [] };

export async function writeSummaryPage(
  dataset: Dataset,
  taxonomy: Taxonomy,
  summarizer: ThemeSummarizer,
  outDir: string,
  now: Date = new Date(),
): Promise<string> {
  const summaries = await summarizeThemes(dataset, taxonomy, summarizer);
  const file = path.join(outDir, 'summary.html');
  await mkdir(outDir, { recursive: true });
  await writeFile(file, renderSummaryPage(dataset, taxonomy, summaries, now), 'utf-8');
  console.log(`[track] Written ${file}`);
  return file;
}

/** parse -> tag -> enrich -> dataset -> pages */
export async function runPipeline(config: TrackerConfig, deps: PipelineDeps = {}): Promise<PipelineResult> {
  const now = deps.now ?? (() => new Date());
  // Taxonomy problems are fatal and surface here, before any input is read
  const taxonomy = deps.taxonomy ?? loadTaxonomy();
  const classifier = new Classifier(taxonomy);
  const summarizer = deps.summarizer ?? createSummarizer(taxonomy, config);

  console.log('[track] Step 1/4: Parsing entries...');
  const { entries, skipped } = await readEntriesFile(config.input);

  console.log('[track] Step 2/4: Tagging entries...');
  for (const entry of entries) {
    classifier.apply(entry, classifier.tag(entry));
  }

  let enrichment = NO_ENRICHMENT;
  if (config.enrich) {
    console.log('[track] Step 3/4: Enriching social posts...');
    const enricher = new ContentEnricher(classifier, {
      concurrency: config.concurrency,
      timeoutMs: config.timeoutMs,
      fetch: deps.fetch,
    });
    enrichment = await enricher.enrichAll(entries);
  } else {
    console.log('[track] Step 3/4: Enrichment disabled, skipping');
  }

  console.log('[track] Step 4/4: Writing dataset and pages...');
  const dataset = buildDataset(entries, taxonomy, now());
  const { jsonPath, gzPath } = await saveDataset(dataset, config.outDir);

  const indexPath = path.join(config.outDir, 'index.html');
  await writeFile(indexPath, renderIndexPage(dataset, taxonomy), 'utf-8');
  console.log(`[track] Written ${indexPath}`);

  const summaryPath = await writeSummaryPage(dataset, taxonomy, summarizer, config.outDir, now());

  const report: RunReport = { parsed: entries.length, skippedLines: skipped.length, enrichment };
  console.log(`\n${formatStats(computeStats(dataset.entries))}\n`);
  console.log(formatRunReport(report));

  return { dataset, report, files: [jsonPath, gzPath, indexPath, summaryPath] };
}
