/**
 * Next-page detection for multi-page articles, by scoring every link in
 * the document. Used when no rule-set selector names the next page.
 */
import { NEGATIVE_CLASS_HINTS, POSITIVE_CLASS_HINTS } from './scoring.js';
import { normalizeSpaces, readAttribute, resolveUrl } from './utils.js';
import { logger } from '../logger.js';

const PAGE_IN_HREF = /(page|paging|(p(a|g|ag)?(e|enum|ewanted|ing|ination)))?(=|\/)([0-9]{1,3})/i;
const PAGE_IN_HREF_GLOBAL = new RegExp(PAGE_IN_HREF.source, 'gi');
const EXTRANEOUS_LINK_HINTS =
  /print|archive|comment|discuss|e-mail|email|share|reply|all|login|sign|single|adx|entry-unrelated/i;
const NEXT_LINK_TEXT = /(next|weiter|continue|>([^|]|$)|»([^|]|$))/i;
const CAP_LINK_TEXT = /(first|last|end)/i;
const PREV_LINK_TEXT = /(prev|earl|old|new|<|«)/i;
const PAGE_HINT = /pag(e|ing|inat)/i;

const MAX_LINK_TEXT_LENGTH = 25;
const MAX_PAGE_NUMBER = 100;
const MAX_PARENT_DEPTH = 4;
/** Links scoring below this are never taken as the next page */
export const MIN_NEXT_PAGE_SCORE = 50;

export interface NextPageOptions {
  /** Base for relative hrefs; defaults to the article URL */
  baseUrl?: string;
  /** Pages already collected, never offered again */
  previousUrls?: readonly string[];
}

interface ScoredLink {
  href: string;
  text: string;
  score: number;
}

function removeAnchor(url: string): string {
  const hash = url.indexOf('#');
  return hash === -1 ? url : url.slice(0, hash);
}

/** Page number in a URL such as ?page=2 or /p/3, below 100. */
export function pageNumFromUrl(url: string): number | null {
  const match = PAGE_IN_HREF.exec(url);
  if (!match?.[6]) return null;
  const pageNum = Number.parseInt(match[6], 10);
  return pageNum < MAX_PAGE_NUMBER ? pageNum : null;
}

function isGoodSegment(segment: string, index: number, firstHasLetters: boolean): boolean {
  if (index === 0 && segment.toLowerCase() === 'index') return false;
  if (index < 2 && segment.length < 3 && !firstHasLetters) return false;
  return true;
}

/**
 * The URL with query, fragment and trailing pagination removed, so that
 * the pages of one article share it.
 */
export function articleBaseUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (e) {
    logger.debug({ url, error: String(e) }, 'Unparseable article URL');
    return url;
  }

  const origin = `${parsed.protocol}//${parsed.host}`;
  const segments = parsed.pathname.split('/').filter(Boolean).reverse();
  let firstHasLetters = false;
  const kept: string[] = [];

  segments.forEach((raw, index) => {
    let segment = raw;
    const parts = segment.split('.');
    if (parts.length === 2 && /^[a-z]+$/i.test(parts[1] ?? '')) {
      segment = parts[0] ?? '';
    }
    if (index < 2) segment = segment.replace(PAGE_IN_HREF_GLOBAL, '');
    if (index === 0) firstHasLetters = /[a-z]/i.test(segment);
    if (segment && isGoodSegment(segment, index, firstHasLetters)) kept.push(segment);
  });

  return kept.length ? `${origin}/${kept.reverse().join('/')}` : origin;
}

export function isWordpress(document: Document): boolean {
  const generator = document.querySelector('meta[name="generator"]');
  const value = generator ? readAttribute(generator, 'value') : null;
  if (value?.toLowerCase().includes('wordpress')) return true;
  return document.querySelector('[class*="wp-"]') !== null;
}

/** Character-position similarity of two strings, from 0 to 1. */
function similarity(a: string, b: string): number {
  if (a === b) return 1;
  if (!a || !b) return 0;
  let matches = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    if (a[i] === b[i]) matches++;
  }
  return (2 * matches) / (a.length + b.length);
}

function scoreParents(link: Element): number {
  let score = 0;
  let paging = false;
  let extraneous = false;
  let parent = link.parentElement;

  for (let depth = 0; parent && depth < MAX_PARENT_DEPTH; depth++) {
    const data = `${parent.getAttribute('class') ?? ''} ${parent.getAttribute('id') ?? ''}`;
    if (!paging && PAGE_HINT.test(data)) {
      paging = true;
      score += 25;
    }
    if (
      !extraneous &&
      NEGATIVE_CLASS_HINTS.test(data) &&
      EXTRANEOUS_LINK_HINTS.test(data) &&
      !POSITIVE_CLASS_HINTS.test(data)
    ) {
      extraneous = true;
      score -= 25;
    }
    parent = parent.parentElement;
  }
  return score;
}

function scoreLinkText(text: string, pageNum: number | null): number {
  if (!/^\d+$/.test(text)) return 0;
  const linkNum = Number.parseInt(text, 10);
  let score = linkNum < 2 ? -30 : Math.max(0, 10 - linkNum);
  if (pageNum !== null && pageNum > 0 && pageNum >= linkNum) score -= 50;
  return score;
}

function scoreLink(
  link: Element,
  href: string,
  text: string,
  articleUrl: string,
  baseUrl: string,
  wordpress: boolean
): number {
  const data = `${text} ${link.getAttribute('class') ?? ''} ${link.getAttribute('id') ?? ''}`;
  const pageNum = pageNumFromUrl(href);
  let score = 0;

  if (!href.toLowerCase().startsWith(baseUrl.toLowerCase())) score -= 25;
  if (NEXT_LINK_TEXT.test(data)) score += 50;
  if (CAP_LINK_TEXT.test(data) && !NEXT_LINK_TEXT.test(data)) score -= 65;
  if (PREV_LINK_TEXT.test(data)) score -= 200;
  score += scoreParents(link);
  if (EXTRANEOUS_LINK_HINTS.test(href)) score -= 25;
  if (pageNum !== null && pageNum > 0 && !wordpress) score += 50;
  score += scoreLinkText(text, pageNum);

  if (score > 0) {
    // near-identical URLs are the likeliest siblings of this page
    score -= 250 * (1 - similarity(articleUrl, href) - 0.2);
  }
  return score;
}

/**
 * Best-scoring link to the article's next page, or null when no link
 * reaches MIN_NEXT_PAGE_SCORE.
 */
export function nextPageFromLinks(
  document: Document,
  url: string,
  options: NextPageOptions = {}
): string | null {
  const articleUrl = removeAnchor(url);
  let host: string;
  try {
    host = new URL(articleUrl).host;
  } catch (e) {
    logger.debug({ url, error: String(e) }, 'Unparseable article URL');
    return null;
  }
  const baseUrl = articleBaseUrl(articleUrl);
  const previous = new Set(options.previousUrls ?? []);
  const wordpress = isWordpress(document);
  const scored = new Map<string, ScoredLink>();

  for (const link of document.querySelectorAll('a[href]')) {
    const resolved = resolveUrl(link.getAttribute('href') ?? '', options.baseUrl ?? articleUrl);
    if (!resolved) continue;
    const href = removeAnchor(resolved);
    const text = normalizeSpaces(link.textContent ?? '');

    if (previous.has(href) || href === articleUrl || href === baseUrl) continue;
    if (new URL(href).host !== host) continue;
    if (!/\d/.test(href.replace(baseUrl, ''))) continue;
    if (EXTRANEOUS_LINK_HINTS.test(text) || text.length > MAX_LINK_TEXT_LENGTH) continue;

    const existing = scored.get(href);
    const entry = {
      href,
      text: existing ? `${existing.text}|${text}` : text,
      score: scoreLink(link, href, text, articleUrl, baseUrl, wordpress),
    };
    scored.set(href, entry);
  }

  let top: ScoredLink | null = null;
  for (const link of scored.values()) {
    if (!top || link.score > top.score) top = link;
  }
  if (!top || top.score < MIN_NEXT_PAGE_SCORE) return null;

  logger.debug({ url, href: top.href, score: top.score, text: top.text }, 'Next page link scored');
  return top.href;
}
