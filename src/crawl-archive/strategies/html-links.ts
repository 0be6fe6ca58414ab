import { JSDOM } from 'jsdom';

import type { UrlString } from '~/models/common';
import { ParseError } from '~/models/errors';
import { collapseWhitespace } from '~/utils/string';

export type PageLink = {
  /** Absolute http(s) URL without query or fragment. */
  url: UrlString;
  /** First non-empty anchor text seen for the URL. */
  text?: string;
};

/**
 * Collect the anchors of an HTML page in document order, one entry per URL.
 * @throws ParseError when the payload is not HTML or `containerSelector` matches nothing
 */
export function collectPageLinks(
  html: string,
  pageUrl: UrlString,
  containerSelector?: string,
): PageLink[] {
  if (!/<[a-z!]/i.test(html)) {
    throw new ParseError(pageUrl, 'Archive page is not an HTML document');
  }

  const { document } = new JSDOM(html, { url: pageUrl }).window;
  const container = containerSelector
    ? document.querySelector(containerSelector)
    : document;
  if (!container) {
    throw new ParseError(
      pageUrl,
      `Archive container "${containerSelector}" not found`,
    );
  }

  const links = new Map<UrlString, PageLink>();
  container.querySelectorAll('a[href]').forEach((anchor) => {
    const url = normalizeLink(anchor.getAttribute('href') ?? '', pageUrl);
    if (!url) return;

    const text = collapseWhitespace(anchor.textContent ?? '') || undefined;
    const existing = links.get(url);
    if (!existing) {
      links.set(url, { url, text });
    } else if (!existing.text && text) {
      existing.text = text;
    }
  });

  return [...links.values()];
}

/**
 * Resolve `href` against the page and drop query and fragment.
 * @returns null for non-http(s) or unparsable links
 */
export function normalizeLink(href: string, pageUrl: UrlString): UrlString | null {
  const trimmed = href.trim();
  if (trimmed === '' || trimmed.startsWith('#')) return null;

  let url: URL;
  try {
    url = new URL(trimmed, pageUrl);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

  url.search = '';
  url.hash = '';
  return url.toString();
}
