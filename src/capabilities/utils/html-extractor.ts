import * as cheerio from 'cheerio';
import { filterLinks, normalizePath } from './link-filter';

export interface ExtractedPage {
  title: string | null;
  text: string;
  /** Absolute same-site URLs of candidate sub-pages */
  links: string[];
}

const STRIPPED = 'script, style, noscript, nav, footer, header, svg, iframe';

/**
 * Reads the readable text and internal links of an HTML page. Text comes
 * from `main`, then `article`, then `body`, one line per block, cut to
 * `charLimit` characters.
 */
export function extractPage(
  html: string,
  pageUrl: string,
  charLimit: number,
): ExtractedPage {
  const $ = cheerio.load(html);

  const hrefs: string[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (href) hrefs.push(href);
  });

  const title = $('title').first().text().trim() || null;
  $(STRIPPED).remove();

  const root = $('main').first().length
    ? $('main').first()
    : $('article').first().length
      ? $('article').first()
      : $('body');

  const lines: string[] = [];
  root.find('h1, h2, h3, h4, p, li, td, blockquote').each((_, el) => {
    const line = $(el).text().replace(/\s+/g, ' ').trim();
    if (line) lines.push(line);
  });
  if (lines.length === 0) {
    const fallback = root.text().replace(/\s+/g, ' ').trim();
    if (fallback) lines.push(fallback);
  }

  let text = dedupeAdjacent(lines).join('\n');
  if (text.length > charLimit) {
    text = `${text.slice(0, charLimit)}...`;
  }

  const pagePath = normalizePath(safePath(pageUrl));
  const links = filterLinks(hrefs, pageUrl)
    .filter((path) => path !== '/' && path !== pagePath)
    .map((path) => new URL(path, pageUrl).toString());

  return { title, text, links };
}

function dedupeAdjacent(lines: string[]): string[] {
  return lines.filter((line, index) => index === 0 || lines[index - 1] !== line);
}

function safePath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return '/';
  }
}
