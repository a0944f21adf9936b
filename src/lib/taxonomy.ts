import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { TaxonomyError } from './errors';
import type { PatternGroup, Taxonomy, ThemeId, ThemeMeta } from './types';

const PatternGroupSchema = z.object({
  id: z.string().min(1),
  patterns: z.array(z.string().min(1)).min(1),
});

const ThemeMetaSchema = z.object({
  title: z.string().min(1),
  priority: z.number().int(),
  description: z.string().min(1),
  color: z.string().regex(/^#[0-9a-fA-F]{3,8}$/),
});

const TaxonomySchema = z.object({
  themes: z.array(PatternGroupSchema).min(1),
  keywords: z.array(PatternGroupSchema),
  themeInfo: z.record(ThemeMetaSchema),
  fallback: z.object({
    judiciaryMarkers: z.array(z.string().min(1)),
    judiciaryTheme: z.string(),
    governmentMarkers: z.array(z.string().min(1)),
    governmentTheme: z.string(),
    defaultTheme: z.string(),
  }),
});

export type TaxonomyInput = z.input<typeof TaxonomySchema>;

function assertUnique(groups: readonly PatternGroup[], kind: string): void {
  const seen = new Set<string>();
  for (const g of groups) {
    if (seen.has(g.id)) throw new TaxonomyError(`Duplicate ${kind} id "${g.id}"`);
    seen.add(g.id);
  }
}

function freezeGroups(groups: PatternGroup[]): readonly PatternGroup[] {
  return Object.freeze(groups.map(g => Object.freeze({
    id: g.id,
    patterns: Object.freeze(g.patterns.map(p => p.toLowerCase())),
  })));
}

/**
 * Validate raw taxonomy data and return a deeply frozen copy.
 * Any inconsistency is a broken static configuration and throws TaxonomyError.
 */
export function createTaxonomy(raw: unknown): Taxonomy {
  const result = TaxonomySchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new TaxonomyError(`Invalid taxonomy: ${detail}`);
  }
  const data = result.data;

  assertUnique(data.themes, 'theme');
  assertUnique(data.keywords, 'keyword');

  const themeIds = new Set(data.themes.map(t => t.id));
  for (const id of themeIds) {
    if (!data.themeInfo[id]) throw new TaxonomyError(`Theme "${id}" has no themeInfo entry`);
  }
  for (const id of Object.keys(data.themeInfo)) {
    if (!themeIds.has(id)) throw new TaxonomyError(`themeInfo references unknown theme "${id}"`);
  }
  const { judiciaryTheme, governmentTheme, defaultTheme } = data.fallback;
  for (const id of [judiciaryTheme, governmentTheme, defaultTheme]) {
    if (!themeIds.has(id)) throw new TaxonomyError(`Fallback references unknown theme "${id}"`);
  }

  const themeInfo: Record<ThemeId, Readonly<ThemeMeta>> = {};
  for (const [id, meta] of Object.entries(data.themeInfo)) {
    themeInfo[id] = Object.freeze({ ...meta });
  }

  return Object.freeze({
    themes: freezeGroups(data.themes),
    keywords: freezeGroups(data.keywords),
    themeInfo: Object.freeze(themeInfo),
    fallback: Object.freeze({
      judiciaryMarkers: Object.freeze([...data.fallback.judiciaryMarkers]),
      judiciaryTheme,
      governmentMarkers: Object.freeze([...data.fallback.governmentMarkers]),
      governmentTheme,
      defaultTheme,
    }),
  });
}

export function loadTaxonomy(file: string | URL = new URL('./taxonomy.json', import.meta.url)): Taxonomy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new TaxonomyError(`Cannot read taxonomy ${String(file)}: ${error instanceof Error ? error.message : error}`);
  }
  return createTaxonomy(raw);
}

/** Look up theme metadata; an unknown id means the static tables disagree. */
export function getThemeMeta(taxonomy: Taxonomy, theme: ThemeId): Readonly<ThemeMeta> {
  const meta = taxonomy.themeInfo[theme];
  if (!meta) throw new TaxonomyError(`Unknown theme "${theme}"`);
  return meta;
}

export function themeIds(taxonomy: Taxonomy): ThemeId[] {
  return taxonomy.themes.map(t => t.id);
}

export function keywordIds(taxonomy: Taxonomy): string[] {
  return taxonomy.keywords.map(k => k.id);
}
