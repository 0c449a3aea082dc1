// Attribute names must follow whitespace so data-src and data-href are not read as links.
const URL_ATTRIBUTE = /(?:^|\s)(?:href|src|action)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+))/gi;
const META_TAG = /<meta\b[^>]*>/gi;
const HTTP_EQUIV_REFRESH = /(?:^|\s)http-equiv\s*=\s*["']?refresh["']?/i;
const META_CONTENT = /(?:^|\s)content\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+))/i;
const REFRESH_URL = /url\s*=\s*(.+)$/i;

export type LinkSource = 'attribute' | 'meta-refresh';

export type ExtractionErrorHandler = (source: LinkSource, error: unknown) => void;

interface Located {
  index: number;
  url: string;
}

/**
 * Pulls every literal URL out of href/src/action attributes and meta refresh
 * directives. Returns raw values in document order, deduplicated by exact
 * string equality.
 */
export function extractLinks(html: string, onError?: ExtractionErrorHandler): string[] {
  const located: Located[] = [
    ...collect('attribute', () => extractAttributeUrls(html), onError),
    ...collect('meta-refresh', () => extractMetaRefreshUrls(html), onError),
  ];

  located.sort((a, b) => a.index - b.index);
  return [...new Set(located.map(entry => entry.url))];
}

export function normalizeUrl(url: string): string {
  return url
    .trim()
    .replace(/&amp;/g, '&')
    .replace(/&#38;/g, '&')
    .replace(/&#x26;/gi, '&');
}

function collect(
  source: LinkSource,
  extract: () => Located[],
  onError?: ExtractionErrorHandler
): Located[] {
  try {
    return extract();
  } catch (error) {
    onError?.(source, error);
    return [];
  }
}

function extractAttributeUrls(html: string): Located[] {
  const found: Located[] = [];
  for (const match of html.matchAll(URL_ATTRIBUTE)) {
    const value = match[1] ?? match[2] ?? match[3] ?? '';
    if (value.length > 0) {
      found.push({ index: match.index ?? 0, url: value });
    }
  }
  return found;
}

function extractMetaRefreshUrls(html: string): Located[] {
  const found: Located[] = [];
  for (const match of html.matchAll(META_TAG)) {
    const tag = match[0];
    if (!HTTP_EQUIV_REFRESH.test(tag)) continue;

    const content = META_CONTENT.exec(tag);
    const directive = content ? content[1] ?? content[2] ?? content[3] ?? '' : '';
    const target = REFRESH_URL.exec(directive);
    if (!target) continue;

    const url = target[1].trim().replace(/^['"]|['"]$/g, '');
    if (url.length > 0) {
      found.push({ index: match.index ?? 0, url });
    }
  }
  return found;
}
