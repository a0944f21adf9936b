import { escapeHtml } from './html';
import { getThemeMeta } from './taxonomy';
import type { Dataset, Entry, Taxonomy, ThemeId } from './types';

export const SITE_TITLE = 'Administration Policy Tracker';

const BASE_STYLE = `
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif; background: #f8f9fa; color: #333; line-height: 1.6; }
    a { color: #2980b9; text-decoration: none; }
    a:hover { text-decoration: underline; }
    .container { max-width: 1100px; margin: 0 auto; padding: 0 20px; }
    .header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: #fff; padding: 2rem 0; }
    .header h1 { font-size: 2rem; }
    .subtitle { opacity: 0.9; }
    .nav-tabs { background: #fff; box-shadow: 0 2px 4px rgba(0,0,0,0.1); position: sticky; top: 0; z-index: 100; }
    .nav-tabs .container { display: flex; gap: 2rem; }
    .nav-tab { padding: 1rem 0; border-bottom: 3px solid transparent; font-weight: 500; color: #666; }
    .nav-tab.active { color: #667eea; border-bottom-color: #667eea; }
    .footer { text-align: center; padding: 2rem 0; font-size: 0.85em; color: #999; }`;

function pageShell(title: string, active: 'index' | 'summary', style: string, body: string, script = ''): string {
  const tab = (key: 'index' | 'summary', label: string, href: string) =>
    key === active
      ? `<span class="nav-tab active">${label}</span>`
      : `<a class="nav-tab" href="${href}">${label}</a>`;

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${escapeHtml(title)}</title>
  <style>${BASE_STYLE}${style}
  </style>
</head>
<body>
  <div class="header">
    <div class="container">
      <h1>${SITE_TITLE}</h1>
      <div class="subtitle">${escapeHtml(title)}</div>
    </div>
  </div>
  <nav class="nav-tabs">
    <div class="container">
      ${tab('summary', 'Thematic Summary', 'summary.html')}
      ${tab('index', 'Chronology', 'index.html')}
    </div>
  </nav>
${body}
${script}
</body>
</html>
`;
}

function themeColor(taxonomy: Taxonomy, theme: ThemeId): string {
  return getThemeMeta(taxonomy, theme).color;
}

function renderEntry(entry: Entry, taxonomy: Taxonomy): string {
  const themeTags = entry.themes.map(t =>
    `<span class="entry-tag theme" style="--color:${themeColor(taxonomy, t)}">${escapeHtml(t)}</span>`);
  const keywordTags = entry.keywords.map(k => `<span class="entry-tag keyword">${escapeHtml(k)}</span>`);
  const date = entry.date ? `<span class="entry-date">${entry.date}</span>` : '';
  const snippet = entry.content_snippet
    ? `\n        <div class="entry-snippet">${escapeHtml(entry.content_snippet)}</div>`
    : '';

  return `      <li class="entry" data-themes="${escapeHtml(entry.themes.join(' '))}" data-keywords="${escapeHtml(entry.keywords.join(' '))}">
        <div class="entry-header">
          <span class="entry-number">#${entry.id}</span>
          <span class="entry-title"><a href="${escapeHtml(entry.url)}" target="_blank" rel="noopener noreferrer">${escapeHtml(entry.title || entry.url)}</a></span>
          ${date}
        </div>${snippet}
        <div class="entry-tags">${[...themeTags, ...keywordTags].join('')}</div>
      </li>`;
}

const INDEX_STYLE = `
    .controls { background: #fff; margin: 1.5rem 0; padding: 1rem 1.5rem; border-radius: 8px; }
    .controls h3 { font-size: 0.95rem; margin: 0.5rem 0; color: #555; }
    .tag { display: inline-block; margin: 0 6px 6px 0; padding: 2px 10px; border-radius: 12px; border: 1px solid var(--color, #999); color: var(--color, #555); cursor: pointer; font-size: 0.85em; }
    .tag.selected { background: var(--color, #999); color: #fff; }
    .stats { font-size: 0.85em; color: #888; margin-bottom: 1rem; }
    .entries { list-style: none; }
    .entry { background: #fff; margin-bottom: 8px; padding: 10px 14px; border-radius: 6px; }
    .entry.hidden { display: none; }
    .entry-number { color: #999; margin-right: 8px; font-size: 0.85em; }
    .entry-date { color: #888; font-size: 0.8em; margin-left: 8px; }
    .entry-snippet { color: #555; font-size: 0.88em; margin: 4px 0; }
    .entry-tag { display: inline-block; font-size: 0.75em; padding: 1px 8px; margin: 4px 4px 0 0; border-radius: 3px; background: #f0f0f0; color: #666; }
    .entry-tag.theme { background: var(--color, #666); color: #fff; }`;

// Filters entries by ?themes=a,b&keywords=c, keeping the selection in the URL
const INDEX_SCRIPT = `<script>
  (function () {
    var params = new URLSearchParams(window.location.search);
    var selected = { theme: null, keyword: null };
    if (params.has('themes')) selected.theme = new Set(params.get('themes').split(',').filter(Boolean));
    if (params.has('keywords')) selected.keyword = new Set(params.get('keywords').split(',').filter(Boolean));

    function all(type) {
      return Array.prototype.map.call(document.querySelectorAll('.tag.' + type), function (el) { return el.dataset.value; });
    }
    function current(type) { return selected[type] || new Set(all(type)); }

    function render() {
      var themes = current('theme');
      var keywords = current('keyword');
      var visible = 0;
      document.querySelectorAll('.entry').forEach(function (el) {
        var t = el.dataset.themes.split(' ').filter(Boolean);
        var k = el.dataset.keywords.split(' ').filter(Boolean);
        var show = t.some(function (x) { return themes.has(x); }) &&
          (k.length === 0 || k.some(function (x) { return keywords.has(x); }));
        el.classList.toggle('hidden', !show);
        if (show) visible++;
      });
      document.querySelectorAll('.tag').forEach(function (el) {
        var type = el.classList.contains('theme') ? 'theme' : 'keyword';
        el.classList.toggle('selected', current(type).has(el.dataset.value));
      });
      document.getElementById('visible-count').textContent = String(visible);
    }

    function updateURL() {
      var next = new URLSearchParams();
      if (selected.theme) next.set('themes', Array.from(selected.theme).join(','));
      if (selected.keyword) next.set('keywords', Array.from(selected.keyword).join(','));
      var qs = next.toString();
      window.history.replaceState({}, '', qs ? '?' + qs : window.location.pathname);
    }

    document.querySelectorAll('.tag').forEach(function (el) {
      el.addEventListener('click', function () {
        var type = el.classList.contains('theme') ? 'theme' : 'keyword';
        var set = new Set(current(type));
        if (set.has(el.dataset.value)) set.delete(el.dataset.value); else set.add(el.dataset.value);
        selected[type] = set.size === all(type).length ? null : set;
        updateURL();
        render();
      });
    });
    render();
  })();
</script>`;

/** Chronological view: every entry in input order, with client-side theme/keyword filters. */
export function renderIndexPage(dataset: Dataset, taxonomy: Taxonomy): string {
  const themeChips = dataset.metadata.themes.map(t =>
    `<span class="tag theme" data-value="${escapeHtml(t)}" style="--color:${themeColor(taxonomy, t)}">${escapeHtml(t)}</span>`).join('');
  const keywordChips = dataset.metadata.keywords.map(k =>
    `<span class="tag keyword" data-value="${escapeHtml(k)}">${escapeHtml(k)}</span>`).join('');
  const entries = [...dataset.entries].sort((a, b) => a.id - b.id);

  const body = `  <main class="container">
    <section class="controls">
      <h3>Themes</h3>
      <div id="themes-container">${themeChips}</div>
      <h3>Keywords</h3>
      <div id="keywords-container">${keywordChips}</div>
    </section>
    <div class="stats">Showing <span id="visible-count">${entries.length}</span> of <span id="total-count">${dataset.metadata.total_entries}</span> entries</div>
    <ol class="entries" id="entries-container">
${entries.map(e => renderEntry(e, taxonomy)).join('\n')}
    </ol>
  </main>`;

  return pageShell('Chronology', 'index', INDEX_STYLE, body, INDEX_SCRIPT);
}

const SUMMARY_STYLE = `
    .intro, .toc, .theme-section { background: #fff; padding: 2rem; margin: 2rem 0; border-radius: 8px; }
    .intro { border-left: 4px solid #667eea; }
    .toc ul { list-style: none; }
    .theme-section { font-family: Georgia, "Times New Roman", serif; line-height: 1.8; }
    .theme-section h2 { border-bottom: 2px solid var(--color, #667eea); margin-bottom: 0.5rem; }
    .theme-section p { margin-bottom: 1rem; }
    .view-all { display: inline-block; padding: 0.5rem 1rem; background: #667eea; color: #fff; border-radius: 4px; }`;

/**
 * Thematic view. Summary text is inserted as-is (it is HTML from a summarizer);
 * themes are listed in priority order.
 */
export function renderSummaryPage(
  dataset: Dataset,
  taxonomy: Taxonomy,
  summaries: Map<ThemeId, string>,
  generatedAt: Date = new Date(),
): string {
  const counts = new Map<ThemeId, number>();
  for (const e of dataset.entries) {
    const primary = e.themes[0];
    if (primary !== undefined) counts.set(primary, (counts.get(primary) ?? 0) + 1);
  }

  const themes = [...summaries.keys()]
    .map(theme => ({ theme, meta: getThemeMeta(taxonomy, theme) }))
    .sort((a, b) => a.meta.priority - b.meta.priority);

  const toc = themes.map(({ theme, meta }) =>
    `        <li><a href="#${escapeHtml(theme)}">${escapeHtml(meta.title)}</a></li>`).join('\n');

  const sections = themes.map(({ theme, meta }) => `    <section class="theme-section" id="${escapeHtml(theme)}" style="--color:${meta.color}">
      <h2>${escapeHtml(meta.title)}</h2>
      ${summaries.get(theme) ?? ''}
      <a href="index.html?themes=${encodeURIComponent(theme)}" class="view-all">View all ${counts.get(theme) ?? 0} articles in this category &rarr;</a>
    </section>`).join('\n');

  const generated = generatedAt.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: 'numeric', timeZone: 'UTC' });

  const body = `  <main class="container">
    <div class="intro">
      <p>The following thematic analysis organizes ${dataset.metadata.total_entries} news articles into key policy areas. Each section provides context and links to primary sources.</p>
      <p><em>This is a historical record based on contemporary news reporting. All claims are linked to their original sources for verification.</em></p>
    </div>
    <div class="toc">
      <h2>Contents</h2>
      <ul>
${toc}
      </ul>
    </div>
${sections}
  </main>
  <div class="footer">
    <p>Generated: ${generated}</p>
  </div>`;

  return pageShell('Thematic Summary', 'summary', SUMMARY_STYLE, body);
}
