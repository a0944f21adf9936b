import 'dotenv/config';
import { loadConfig } from '../src/lib/config';
import { runPipeline } from '../src/lib/pipeline';

async function main() {
  const config = loadConfig(process.argv.slice(2));
  console.log(`[track] === Policy Tracker — ${config.input} ===`);

  const { files } = await runPipeline(config);

  console.log(`\n[track] Done! Generated files in ${config.outDir}:`);
  for (const file of files) console.log(`  - ${file}`);
}

main().catch(err => {
  console.error(`[track] Fatal: ${err instanceof Error ? err.message : err}`);
  process.exit(1);
});
