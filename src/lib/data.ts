import fs from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { gunzipSync, gzipSync } from 'node:zlib';
import { z } from 'zod';
import { DatasetError } from './errors';
import { keywordIds, themeIds } from './taxonomy';
import type { Dataset, Entry, Taxonomy } from './types';

export const DATASET_FILENAME = 'diary_data.json';

const EntrySchema = z.object({
  id: z.number().int().positive(),
  url: z.string().min(1),
  title: z.string(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullable(),
  themes: z.array(z.string()).max(2),
  keywords: z.array(z.string()).max(3),
  content_snippet: z.string().nullable(),
});

const DatasetSchema = z.object({
  metadata: z.object({
    generated: z.string(),
    total_entries: z.number().int().nonnegative(),
    themes: z.array(z.string()),
    keywords: z.array(z.string()),
  }),
  entries: z.array(EntrySchema),
});

/** Snapshot the tagged entries; the result shares nothing with the pipeline's entries. */
export function buildDataset(entries: readonly Entry[], taxonomy: Taxonomy, now: Date = new Date()): Dataset {
  return {
    metadata: {
      generated: now.toISOString(),
      total_entries: entries.length,
      themes: themeIds(taxonomy),
      keywords: keywordIds(taxonomy),
    },
    entries: entries.map(e => ({
      id: e.id,
      url: e.url,
      title: e.title,
      date: e.date,
      themes: [...e.themes],
      keywords: [...e.keywords],
      content_snippet: e.content_snippet,
    })),
  };
}

/** Write pretty JSON for development and a gzipped compact copy for serving */
export async function saveDataset(
  dataset: Dataset,
  outDir: string,
  filename: string = DATASET_FILENAME,
): Promise<{ jsonPath: string; gzPath: string }> {
  await mkdir(outDir, { recursive: true });
  const jsonPath = path.join(outDir, filename);
  const gzPath = `${jsonPath}.gz`;

  await writeFile(jsonPath, JSON.stringify(dataset, null, 2), 'utf-8');
  await writeFile(gzPath, gzipSync(JSON.stringify(dataset)));
  console.log(`[data] Written ${jsonPath} and ${gzPath}`);
  return { jsonPath, gzPath };
}

/** Load a dataset written by saveDataset, plain or gzipped */
export function loadDataset(file: string): Dataset {
  if (!fs.existsSync(file)) throw new DatasetError('file not found', file);

  let raw: unknown;
  try {
    const buf = fs.readFileSync(file);
    const text = file.endsWith('.gz') ? gunzipSync(buf).toString('utf-8') : buf.toString('utf-8');
    raw = JSON.parse(text);
  } catch (error) {
    throw new DatasetError(error instanceof Error ? error.message : String(error), file);
  }

  const result = DatasetSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new DatasetError(`invalid dataset at ${issue.path.join('.') || '(root)'}: ${issue.message}`, file);
  }
  return result.data;
}
