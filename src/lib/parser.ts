import { readFile } from 'node:fs/promises';
import * as cheerio from 'cheerio';
import { extractDate } from './date';
import type { Entry } from './types';

// "<n>. <a href="...">Title</a>"; the anchor text may not contain markup
const LINE_PATTERN = /^\d+\.\s*(<a\s[^>]*>[^<]*<\/a>)/;

export interface SkippedLine {
  line: number;
  text: string;
}

export interface ParseResult {
  entries: Entry[];
  skipped: SkippedLine[];
  /** Blank lines, ignored without a warning */
  blank: number;
}

function readAnchor(markup: string): { href: string; text: string } | null {
  const anchor = cheerio.load(markup, null, false)('a').first();
  const href = anchor.attr('href')?.trim();
  if (!href) return null;
  return { href, text: anchor.text().trim() };
}

/** Parse one input line; `id` is the 1-based line number. */
export function parseLine(line: string, id: number): Entry | null {
  const match = LINE_PATTERN.exec(line.trim());
  if (!match) return null;

  const anchor = readAnchor(match[1]);
  if (!anchor) return null;

  return {
    id,
    url: anchor.href,
    title: anchor.text,
    date: extractDate(anchor.href),
    themes: [],
    keywords: [],
    content_snippet: null,
  };
}

export function parseEntries(text: string): ParseResult {
  const entries: Entry[] = [];
  const skipped: SkippedLine[] = [];
  let blank = 0;
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim() === '') {
      blank++;
      return;
    }
    const lineNumber = index + 1;
    const entry = parseLine(line, lineNumber);
    if (entry) {
      entries.push(entry);
    } else {
      console.warn(`[parse] Could not parse line ${lineNumber}: ${line.slice(0, 100)}`);
      skipped.push({ line: lineNumber, text: line });
    }
  });

  console.log(`[parse] Parsed ${entries.length} entries (${skipped.length} lines skipped, ${blank} blank)`);
  return { entries, skipped, blank };
}

export async function readEntriesFile(file: string): Promise<ParseResult> {
  return parseEntries(await readFile(file, 'utf-8'));
}
