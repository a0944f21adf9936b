import * as cheerio from 'cheerio';
import pLimit from 'p-limit';
import type { Classifier } from './classifier';
import type { Entry } from './types';

export const CONTENT_HOST_MARKER = 'bsky.app';
export const CONTENT_FETCH_TIMEOUT_MS = 10_000;
export const CONTENT_CONCURRENCY = 8;
export const SNIPPET_MAX_LENGTH = 500;

interface ContentStrategy {
  selector: string;
  /** Read this attribute instead of the element's text */
  attribute?: string;
}

// Tried in order; the first one yielding text wins
const CONTENT_STRATEGIES: ContentStrategy[] = [
  { selector: 'div[data-testid="postText"]' },
  { selector: 'div.post-content' },
  { selector: 'div[class*="post"]' },
  { selector: 'meta[property="og:description"]', attribute: 'content' },
];

// Elements whose text would otherwise run into the next block's
const BLOCK_ELEMENTS = 'p, li, pre, blockquote, div, h1, h2, h3, h4, h5, h6, tr';

function toPlainText(html: string): string {
  const $ = cheerio.load(html, null, false);
  $('script, style, noscript').remove();
  $('br').replaceWith(' ');
  $(BLOCK_ELEMENTS).after(' ');
  return collapse($.root().text());
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** First `max` characters, counted in code points so no surrogate pair is split. */
function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? chars.slice(0, max).join('') : text;
}

/** Pull post text out of a fetched page, or null when no strategy finds any. */
export function extractContent(html: string): string | null {
  const $ = cheerio.load(html);
  for (const strategy of CONTENT_STRATEGIES) {
    const el = $(strategy.selector).first();
    if (el.length === 0) continue;

    const text = strategy.attribute
      ? collapse(el.attr(strategy.attribute) ?? '')
      : toPlainText(el.html() ?? '');
    if (text) return truncate(text, SNIPPET_MAX_LENGTH);
  }
  return null;
}

export function isContentHost(url: string, hostMarker: string = CONTENT_HOST_MARKER): boolean {
  try {
    return new URL(url).hostname.includes(hostMarker);
  } catch {
    return false;
  }
}

export interface ContentEnricherOptions {
  hostMarker?: string;
  timeoutMs?: number;
  concurrency?: number;
  fetch?: typeof fetch;
}

interface FetchOutcome {
  content: string | null;
  error?: string;
}

export interface EnrichmentResult {
  id: number;
  url: string;
  ok: boolean;
  error?: string;
}

export interface EnrichmentReport {
  eligible: number;
  enriched: number;
  failed: number;
  results: EnrichmentResult[];
}

/**
 * Fetches post content for social-platform entries and re-tags them with it.
 * Fetch failures are logged and reported, never thrown.
 */
export class ContentEnricher {
  private readonly hostMarker: string;
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly fetchImpl: typeof fetch;
  // One promise per URL, stored before it settles so concurrent callers share it
  private readonly cache = new Map<string, Promise<FetchOutcome>>();

  constructor(private readonly classifier: Classifier, options: ContentEnricherOptions = {}) {
    this.hostMarker = options.hostMarker ?? CONTENT_HOST_MARKER;
    this.timeoutMs = options.timeoutMs ?? CONTENT_FETCH_TIMEOUT_MS;
    this.concurrency = options.concurrency ?? CONTENT_CONCURRENCY;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${this.concurrency}`);
    }
  }

  isEligible(entry: Pick<Entry, 'url'>): boolean {
    return isContentHost(entry.url, this.hostMarker);
  }

  async fetchContent(url: string): Promise<string | null> {
    return (await this.fetchOnce(url)).content;
  }

  async enrichAll(entries: Entry[]): Promise<EnrichmentReport> {
    const eligible = entries.filter(e => this.isEligible(e));
    if (eligible.length === 0) {
      return { eligible: 0, enriched: 0, failed: 0, results: [] };
    }

    console.log(`[enrich] Fetching content for ${eligible.length} posts (concurrency ${this.concurrency})...`);
    const limit = pLimit(this.concurrency);
    const settled = await Promise.allSettled(
      eligible.map(entry => limit(() => this.fetchOnce(entry.url))),
    );

    const results: EnrichmentResult[] = [];
    settled.forEach((outcome, i) => {
      const entry = eligible[i];
      if (outcome.status === 'fulfilled' && outcome.value.content !== null) {
        const content = outcome.value.content;
        entry.content_snippet = content;
        this.classifier.apply(entry, this.classifier.tagWithContent(entry, content));
        results.push({ id: entry.id, url: entry.url, ok: true });
      } else {
        const error = outcome.status === 'rejected'
          ? (outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason))
          : (outcome.value.error ?? 'no content');
        results.push({ id: entry.id, url: entry.url, ok: false, error });
      }
    });

    const enriched = results.filter(r => r.ok).length;
    const failed = results.length - enriched;
    console.log(`[enrich] Enriched ${enriched}/${eligible.length} posts (${failed} failed)`);
    return { eligible: eligible.length, enriched, failed, results };
  }

  private fetchOnce(url: string): Promise<FetchOutcome> {
    let pending = this.cache.get(url);
    if (!pending) {
      pending = this.download(url);
      this.cache.set(url, pending);
    }
    return pending;
  }

  private async download(url: string): Promise<FetchOutcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': 'PolicyTracker/1.0 (+content snippet fetcher)',
          'Accept': 'text/html,application/xhtml+xml,*/*',
        },
      });
      if (!response.ok) throw new Error(`HTTP ${response.status}`);

      const content = extractContent(await response.text());
      if (content === null) {
        console.warn(`[enrich] x ${url}: no post content found`);
        return { content: null, error: 'no content' };
      }
      return { content };
    } catch (error) {
      const msg = controller.signal.aborted
        ? 'timeout'
        : (error instanceof Error ? error.message : String(error));
      console.warn(`[enrich] x ${url}: ${msg}`);
      return { content: null, error: msg };
    } finally {
      clearTimeout(timeout);
    }
  }
}
