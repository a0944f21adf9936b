import type { Entry, KeywordId, Tags, Taxonomy, ThemeId } from './types';

export const MAX_THEMES = 2;
export const MAX_KEYWORDS = 3;

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Substring-pattern tagger over a fixed taxonomy.
 *
 * Themes are scored by how many of their patterns occur in the text (each
 * pattern counts once) and the two best are kept; ties keep declaration
 * order. Keywords are flagged by their first matching pattern and capped at
 * three, also in declaration order.
 */
export class Classifier {
  constructor(readonly taxonomy: Taxonomy) {}

  /** Tag from URL and title only. */
  tag(entry: Pick<Entry, 'url' | 'title'>): Tags {
    const text = `${entry.url} ${entry.title}`.toLowerCase();
    return this.finish(entry.url, this.scoreThemes(text), this.matchKeywords(text));
  }

  /**
   * Tag from URL, title and fetched page content. A theme pattern found in
   * the content itself weighs 2, one found only in URL/title weighs 1.
   */
  tagWithContent(entry: Pick<Entry, 'url' | 'title'>, content: string): Tags {
    const text = `${entry.url} ${entry.title} ${content}`.toLowerCase();
    const themes = this.scoreThemes(text, content.toLowerCase());
    return this.finish(entry.url, themes, this.matchKeywords(text));
  }

  /** Overwrite the entry's tags; never merged with what was there. */
  apply(entry: Entry, tags: Tags): void {
    entry.themes = [...tags.themes];
    entry.keywords = [...tags.keywords];
  }

  scoreThemes(text: string, content?: string): ThemeId[] {
    const scored: Array<{ theme: ThemeId; score: number }> = [];
    for (const { id, patterns } of this.taxonomy.themes) {
      let score = 0;
      for (const pattern of patterns) {
        if (!text.includes(pattern)) continue;
        score += content !== undefined && content.includes(pattern) ? 2 : 1;
      }
      if (score > 0) scored.push({ theme: id, score });
    }
    // Array.prototype.sort is stable, so equal scores keep taxonomy order
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, MAX_THEMES).map(s => s.theme);
  }

  matchKeywords(text: string): KeywordId[] {
    const matched: KeywordId[] = [];
    for (const { id, patterns } of this.taxonomy.keywords) {
      if (patterns.some(p => text.includes(p)) && !matched.includes(id)) {
        matched.push(id);
      }
    }
    return matched.slice(0, MAX_KEYWORDS);
  }

  /**
   * Theme for entries nothing matched. The government-marker branch and the
   * default currently resolve to the same theme; both are kept as configured.
   */
  fallbackTheme(url: string): ThemeId {
    const domain = hostnameOf(url);
    const rules = this.taxonomy.fallback;
    if (rules.judiciaryMarkers.some(m => domain.includes(m))) return rules.judiciaryTheme;
    if (rules.governmentMarkers.some(m => domain.includes(m))) return rules.governmentTheme;
    return rules.defaultTheme;
  }

  private finish(url: string, themes: ThemeId[], keywords: KeywordId[]): Tags {
    return {
      themes: themes.length > 0 ? themes : [this.fallbackTheme(url)],
      keywords,
    };
  }
}
