import DOMPurify from 'dompurify';
import { JSDOM } from 'jsdom';

import { collapseWhitespace } from '~/utils/string';

const NOISE_ELEMENTS = 'nav, header, footer, aside, form, iframe, noscript, button, figure';

const BLOCK_ELEMENTS = 'p, li, blockquote, h2, h3, h4';

/** class/id tokens marking ad, promo, social and related-content containers. */
const NOISE_TOKENS = new Set([
  'ad',
  'ads',
  'advert',
  'advertisement',
  'promo',
  'promotion',
  'social',
  'share',
  'sharing',
  'related',
  'newsletter',
  'subscribe',
  'breadcrumb',
  'comments',
]);

const BOILERPLATE_PHRASES = [
  'advertisement',
  'also read',
  'read more',
  'read also',
  'subscribe',
  'follow us',
  'download app',
  'click here',
  'sign up',
];

const LEADING_PHRASES = BOILERPLATE_PHRASES.map(
  (phrase) => new RegExp(`^${phrase}\\b`),
);

const CONTAINED_PHRASES = BOILERPLATE_PHRASES.map(
  (phrase) => new RegExp(`\\b${phrase}\\b`),
);

/** Blocks shorter than this are dropped when they mention a boilerplate phrase anywhere. */
const SHORT_BLOCK_LENGTH = 80;

/** Fragments this short are captions, bylines or buttons. */
const MIN_BLOCK_LENGTH = 16;

let purifier: ReturnType<typeof DOMPurify> | null = null;

const getPurifier = () => {
  purifier ??= DOMPurify(new JSDOM('').window);
  return purifier;
};

/**
 * Reduce article HTML (or plain text) to clean body text.
 * Paragraph-level blocks are kept in document order, joined by blank lines,
 * with repeated blocks and boilerplate removed. Never throws.
 */
export function sanitizeContent(raw: string): string {
  if (raw.trim() === '') {
    return '';
  }

  try {
    const root = getPurifier().sanitize(raw, { RETURN_DOM: true });
    removeNoise(root);

    const blocks = collectBlocks(root);
    const texts =
      blocks.length > 0 ? blocks : (root.textContent ?? '').split(/\n+/);

    return joinBlocks(texts);
  } catch {
    // Tag stripping keeps the text usable when the DOM pass fails.
    return stripTags(raw);
  }
}

export function isBoilerplate(text: string): boolean {
  const lower = text.toLowerCase();
  if (LEADING_PHRASES.some((pattern) => pattern.test(lower))) {
    return true;
  }
  return (
    lower.length < SHORT_BLOCK_LENGTH &&
    CONTAINED_PHRASES.some((pattern) => pattern.test(lower))
  );
}

function removeNoise(root: HTMLElement) {
  root.querySelectorAll(NOISE_ELEMENTS).forEach((element) => element.remove());

  root.querySelectorAll('[class], [id]').forEach((element) => {
    const tokens = `${element.getAttribute('class') ?? ''} ${element.id}`
      .toLowerCase()
      .split(/[^a-z0-9]+/);
    if (tokens.some((token) => NOISE_TOKENS.has(token))) {
      element.remove();
    }
  });
}

function collectBlocks(root: HTMLElement): string[] {
  return Array.from(root.querySelectorAll(BLOCK_ELEMENTS))
    .filter((element) => element.querySelector(BLOCK_ELEMENTS) === null)
    .map((element) => element.textContent ?? '');
}

function joinBlocks(texts: string[]): string {
  const seen = new Set<string>();
  const kept: string[] = [];

  for (const text of texts) {
    const block = collapseWhitespace(text);
    if (block.length < MIN_BLOCK_LENGTH || isBoilerplate(block) || seen.has(block)) {
      continue;
    }
    seen.add(block);
    kept.push(block);
  }

  return kept.join('\n\n');
}

function stripTags(raw: string): string {
  return collapseWhitespace(
    raw
      .replace(/<(script|style|noscript)\b[\s\S]*?<\/\1>/gi, ' ')
      .replace(/<[^>]*>/g, ' ')
      .replace(/&nbsp;/g, ' '),
  );
}
