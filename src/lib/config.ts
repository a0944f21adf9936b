import path from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { DEFAULT_MODEL_ID, DEFAULT_REGION } from './ai';
import { CONTENT_CONCURRENCY, CONTENT_FETCH_TIMEOUT_MS } from './enrich';
import { ConfigError } from './errors';

export const DEFAULT_OUT_DIR = 'output';

const ConfigSchema = z.object({
  input: z.string().min(1),
  outDir: z.string().min(1),
  summarizer: z.enum(['local', 'bedrock']),
  concurrency: z.coerce.number().int().min(1).max(64),
  timeoutMs: z.coerce.number().int().min(100),
  enrich: z.boolean(),
  modelId: z.string().min(1),
  region: z.string().min(1),
});

export type TrackerConfig = z.infer<typeof ConfigSchema>;

export const USAGE = `Usage: track <input-file> [options]

Options:
  --out <dir>            output directory (default: ${DEFAULT_OUT_DIR}, env TRACKER_OUT_DIR)
  --summarizer <kind>    local | bedrock (default: local, env TRACKER_SUMMARIZER)
  --concurrency <n>      parallel content fetches (default: ${CONTENT_CONCURRENCY}, env TRACKER_CONCURRENCY)
  --timeout <ms>         per-fetch timeout (default: ${CONTENT_FETCH_TIMEOUT_MS}, env TRACKER_TIMEOUT_MS)
  --no-enrich            skip fetching post content
  --use-ai               shorthand for --summarizer bedrock`;

/**
 * Resolve run configuration: CLI flags win over environment, environment
 * over built-in defaults.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (error) {
    throw new ConfigError(`${error instanceof Error ? error.message : error}\n\n${USAGE}`);
  }
  const { values, positionals } = parsed;

  if (positionals.length !== 1) {
    throw new ConfigError(`Expected exactly one input file, got ${positionals.length}\n\n${USAGE}`);
  }

  const result = ConfigSchema.safeParse({
    input: positionals[0],
    outDir: path.resolve(values.out ?? env.TRACKER_OUT_DIR ?? DEFAULT_OUT_DIR),
    summarizer: values['use-ai'] ? 'bedrock' : (values.summarizer ?? env.TRACKER_SUMMARIZER ?? 'local'),
    concurrency: values.concurrency ?? env.TRACKER_CONCURRENCY ?? CONTENT_CONCURRENCY,
    timeoutMs: values.timeout ?? env.TRACKER_TIMEOUT_MS ?? CONTENT_FETCH_TIMEOUT_MS,
    enrich: !values['no-enrich'],
    modelId: env.BEDROCK_MODEL_ID ?? DEFAULT_MODEL_ID,
    region: env.AWS_REGION ?? DEFAULT_REGION,
  });
  if (!result.success) {
    const detail = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      out: { type: 'string' },
      summarizer: { type: 'string' },
      concurrency: { type: 'string' },
      timeout: { type: 'string' },
      'no-enrich': { type: 'boolean' },
      'use-ai': { type: 'boolean' },
    },
  });
}
