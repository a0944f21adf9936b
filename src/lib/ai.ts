import { createAmazonBedrock } from '@ai-sdk/amazon-bedrock';
import { generateText } from 'ai';
import { escapeHtml } from './html';
import { getThemeMeta } from './taxonomy';
import type { Dataset, Entry, Taxonomy, ThemeId } from './types';

export const DEFAULT_MODEL_ID = 'anthropic.claude-3-haiku-20240307-v1:0';
export const DEFAULT_REGION = 'us-east-1';
const MAX_PROMPT_ENTRIES = 20;
const SUMMARY_TIMEOUT_MS = 60_000;
const SAMPLE_LINKS = 5;

export type SummarizerKind = 'local' | 'bedrock';

/** Produces the prose (HTML paragraphs) shown for one theme on the summary page. */
export interface ThemeSummarizer {
  readonly id: SummarizerKind;
  summarize(theme: ThemeId, entries: readonly Entry[]): Promise<string>;
}

/** Deterministic summary built from the entries themselves; needs no network. */
export class LocalSummarizer implements ThemeSummarizer {
  readonly id = 'local';

  constructor(private readonly taxonomy: Taxonomy) {}

  async summarize(theme: ThemeId, entries: readonly Entry[]): Promise<string> {
    return this.render(theme, entries);
  }

  render(theme: ThemeId, entries: readonly Entry[]): string {
    const meta = getThemeMeta(this.taxonomy, theme);

    const keywordGroups = new Map<string, number>();
    for (const entry of entries) {
      for (const kw of entry.keywords) keywordGroups.set(kw, (keywordGroups.get(kw) ?? 0) + 1);
    }

    let summary = `<p>The administration implemented significant changes in ${escapeHtml(meta.description.toLowerCase())}. `;
    summary += `This section documents ${entries.length} articles tracking these developments.</p>\n\n`;

    if (keywordGroups.size > 0) {
      const top = [...keywordGroups.entries()].sort((a, b) => b[1] - a[1]).slice(0, 3);
      summary += '<p>Key areas of focus included ';
      summary += top.map(([kw, n]) => `${escapeHtml(kw)} (${n} articles)`).join(', ');
      summary += '.</p>\n\n';
    }

    const links = entries.slice(0, SAMPLE_LINKS)
      .map(e => `<a href="${escapeHtml(e.url)}">${escapeHtml(e.title)}</a>`);
    summary += `<p>Notable developments included: ${links.join('; ')}.</p>`;
    return summary;
  }
}

export interface BedrockSummarizerOptions {
  modelId?: string;
  region?: string;
  maxEntries?: number;
  timeoutMs?: number;
}

function buildSummaryPrompt(title: string, description: string, entries: readonly Entry[]): string {
  const articleList = entries.map(e => `- ${e.title} (${e.url})`).join('\n');

  return `You are creating a summary for a historical archive of federal policy developments.

Theme: ${title}
Description: ${description}

Based on these news articles about this theme, write 2-3 paragraphs summarizing the key developments and their significance. Be factual, precise, and cite specific examples from the articles. Each paragraph should be 3-4 sentences.

Articles:
${articleList}

IMPORTANT:
- Be completely factual and accurate
- Reference specific articles when making claims
- Avoid speculation or editorializing
- Focus on documenting what happened according to the sources
- Write in past tense as this is a historical record`;
}

/**
 * Summaries written by a Bedrock-hosted model. Any failure (credentials,
 * HTTP error, timeout, empty reply) falls back to the local summary.
 */
export class BedrockSummarizer implements ThemeSummarizer {
  readonly id = 'bedrock';
  private readonly bedrock: ReturnType<typeof createAmazonBedrock>;
  private readonly modelId: string;
  private readonly maxEntries: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly taxonomy: Taxonomy,
    options: BedrockSummarizerOptions = {},
    private readonly fallback: LocalSummarizer = new LocalSummarizer(taxonomy),
  ) {
    this.bedrock = createAmazonBedrock({ region: options.region ?? DEFAULT_REGION });
    this.modelId = options.modelId ?? DEFAULT_MODEL_ID;
    this.maxEntries = options.maxEntries ?? MAX_PROMPT_ENTRIES;
    this.timeoutMs = options.timeoutMs ?? SUMMARY_TIMEOUT_MS;
  }

  async summarize(theme: ThemeId, entries: readonly Entry[]): Promise<string> {
    const meta = getThemeMeta(this.taxonomy, theme);
    const prompt = buildSummaryPrompt(meta.title, meta.description, entries.slice(0, this.maxEntries));

    try {
      const { text } = await generateText({
        model: this.bedrock(this.modelId),
        prompt,
        maxOutputTokens: 500,
        temperature: 0.3,
        maxRetries: 1,
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!text.trim()) throw new Error('empty response');
      return text;
    } catch (error) {
      console.warn(`[ai] Summary for ${theme} failed, using fallback: ${error instanceof Error ? error.message : error}`);
      return this.fallback.render(theme, entries);
    }
  }
}

export interface SummarizerConfig {
  summarizer: SummarizerKind;
  modelId?: string;
  region?: string;
}

function hasAwsCredentials(env: NodeJS.ProcessEnv): boolean {
  return Boolean((env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) || env.AWS_BEARER_TOKEN_BEDROCK);
}

/** Pick the summarizer once, from configuration. */
export function createSummarizer(
  taxonomy: Taxonomy,
  config: SummarizerConfig,
  env: NodeJS.ProcessEnv = process.env,
): ThemeSummarizer {
  if (config.summarizer === 'bedrock') {
    if (hasAwsCredentials(env)) {
      return new BedrockSummarizer(taxonomy, { modelId: config.modelId, region: config.region });
    }
    console.warn('[ai] Bedrock summaries requested but no AWS credentials found, using local summaries');
  }
  return new LocalSummarizer(taxonomy);
}

/** Entries grouped under their first (highest scoring) theme, input order kept. */
export function groupByPrimaryTheme(entries: readonly Entry[]): Map<ThemeId, Entry[]> {
  const groups = new Map<ThemeId, Entry[]>();
  for (const entry of entries) {
    const primary = entry.themes[0];
    if (primary === undefined) continue;
    const list = groups.get(primary);
    if (list) list.push(entry);
    else groups.set(primary, [entry]);
  }
  return groups;
}

/** Themes in the taxonomy's summary priority order that have at least one entry */
export function orderedThemes(taxonomy: Taxonomy, groups: Map<ThemeId, Entry[]>): ThemeId[] {
  for (const theme of groups.keys()) getThemeMeta(taxonomy, theme);
  return Object.entries(taxonomy.themeInfo)
    .filter(([theme]) => groups.has(theme))
    .sort((a, b) => a[1].priority - b[1].priority)
    .map(([theme]) => theme);
}

export async function summarizeThemes(
  dataset: Dataset,
  taxonomy: Taxonomy,
  summarizer: ThemeSummarizer,
): Promise<Map<ThemeId, string>> {
  const groups = groupByPrimaryTheme(dataset.entries);
  const summaries = new Map<ThemeId, string>();

  for (const theme of orderedThemes(taxonomy, groups)) {
    const entries = groups.get(theme) ?? [];
    console.log(`[ai] Summarizing ${theme} (${entries.length} entries, ${summarizer.id})...`);
    summaries.set(theme, await summarizer.summarize(theme, entries));
  }
  return summaries;
}
