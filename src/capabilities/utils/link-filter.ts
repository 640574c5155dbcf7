const SKIP_PATTERNS = [
  '/wp-admin',
  '/admin',
  '/login',
  '/register',
  '/cart',
  '/checkout',
  '/account',
  '/profile',
  '/search',
  '/contact',
  '/privacy',
  '/terms',
  '.pdf',
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.zip',
  '#',
  '?',
  'javascript:',
  'mailto:',
  'tel:',
];

/** Strips a trailing slash from every path but the root. */
export function normalizePath(path: string): string {
  if (path !== '/' && path.endsWith('/')) {
    return path.slice(0, -1) || '/';
  }
  return path || '/';
}

/**
 * Reduces raw hrefs to same-site content paths, in first-seen order.
 * Absolute links on another host, non-content pages, media files, fragments
 * and query strings are dropped.
 */
export function filterLinks(hrefs: readonly string[], baseUrl: string): string[] {
  const baseHost = hostOf(baseUrl);
  const paths: string[] = [];

  for (const raw of hrefs) {
    const href = raw.trim();
    if (!href) continue;

    let path: string;
    if (href.startsWith('/') && !href.startsWith('//')) {
      path = href;
    } else if (/^https?:\/\//i.test(href)) {
      let parsed: URL;
      try {
        parsed = new URL(href);
      } catch {
        continue;
      }
      if (parsed.host !== baseHost) continue;
      if (parsed.search || parsed.hash) continue;
      path = parsed.pathname;
    } else {
      continue;
    }

    const lower = path.toLowerCase();
    if (SKIP_PATTERNS.some((pattern) => lower.includes(pattern))) continue;

    const normalized = normalizePath(path);
    if (!paths.includes(normalized)) paths.push(normalized);
  }

  return paths;
}

export function hostOf(url: string): string | null {
  try {
    return new URL(url).host;
  } catch {
    return null;
  }
}
