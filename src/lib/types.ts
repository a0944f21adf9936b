export type ThemeId = string;
export type KeywordId = string;

export interface ThemeMeta {
  title: string;
  priority: number;
  description: string;
  color: string;
}

export interface PatternGroup {
  readonly id: string;
  readonly patterns: readonly string[];
}

export interface FallbackRules {
  readonly judiciaryMarkers: readonly string[];
  readonly judiciaryTheme: ThemeId;
  readonly governmentMarkers: readonly string[];
  readonly governmentTheme: ThemeId;
  readonly defaultTheme: ThemeId;
}

export interface Taxonomy {
  readonly themes: readonly PatternGroup[];
  readonly keywords: readonly PatternGroup[];
  readonly themeInfo: Readonly<Record<ThemeId, Readonly<ThemeMeta>>>;
  readonly fallback: FallbackRules;
}

/** One numbered line of the input diary. Field names are the dataset contract. */
export interface Entry {
  readonly id: number;
  readonly url: string;
  readonly title: string;
  readonly date: string | null;
  themes: ThemeId[];
  keywords: KeywordId[];
  content_snippet: string | null;
}

export interface Tags {
  themes: ThemeId[];
  keywords: KeywordId[];
}

export interface DatasetMetadata {
  generated: string;
  total_entries: number;
  themes: ThemeId[];
  keywords: KeywordId[];
}

export interface Dataset {
  metadata: DatasetMetadata;
  entries: Entry[];
}
