const DATE_PATTERNS = [
  /\/(\d{4})\/(\d{1,2})\/(\d{1,2})\//, // /YYYY/MM/DD/
  /\/(\d{4})-(\d{2})-(\d{2})/,         // /YYYY-MM-DD
  /(\d{4})(\d{2})(\d{2})/,             // YYYYMMDD
];

const MIN_YEAR = 2024;
const MAX_YEAR = 2026;

/**
 * Best-effort publication date from a URL path, as YYYY-MM-DD.
 * Only a plausibility check is applied (day 31 is accepted for any month).
 */
export function extractDate(url: string): string | null {
  for (const pattern of DATE_PATTERNS) {
    const match = pattern.exec(url);
    if (!match) continue;

    const year = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);
    if (year >= MIN_YEAR && year <= MAX_YEAR && month >= 1 && month <= 12 && day >= 1 && day <= 31) {
      return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
    }
  }
  return null;
}
