import 'dotenv/config';
import { createSummarizer } from '../src/lib/ai';
import { loadConfig } from '../src/lib/config';
import { loadDataset } from '../src/lib/data';
import { writeSummaryPage } from '../src/lib/pipeline';
import { loadTaxonomy } from '../src/lib/taxonomy';

/** Regenerate summary.html from an existing dataset (json or json.gz). */
async function main() {
  const config = loadConfig(process.argv.slice(2));
  const taxonomy = loadTaxonomy();
  const dataset = loadDataset(config.input);
  console.log(`[summary] Loaded ${dataset.entries.length} entries from ${config.input}`);

  await writeSummaryPage(dataset, taxonomy, createSummarizer(taxonomy, config), config.outDir);
}

main().catch(err => {
  console.error(`[summary] Fatal: ${err instanceof Error ? err.message : err}`);
  process.exit(1);
});
