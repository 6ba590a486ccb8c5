/**
 * Utility functions for the extract module
 */
import { parseHTML } from 'linkedom';

import { logger } from '../logger.js';

const TEXT_NODE = 3;

/** Collapse whitespace runs to a single space and trim. */
export function normalizeSpaces(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Length of an element's whitespace-normalized text. */
export function textLength(el: Element): number {
  return normalizeSpaces(el.textContent ?? '').length;
}

/** Text held directly by an element, ignoring its child elements. */
export function directText(el: Element): string {
  let text = '';
  for (const child of el.childNodes) {
    if (child.nodeType === TEXT_NODE) text += ` ${child.textContent ?? ''}`;
  }
  return normalizeSpaces(text);
}

/** Ratio of anchor text to total text, 0 for elements without text. */
export function linkDensity(el: Element): number {
  const total = textLength(el);
  if (total === 0) return 0;
  if (el.tagName.toLowerCase() === 'a') return 1;

  let linked = 0;
  for (const a of el.querySelectorAll('a')) {
    linked += textLength(a);
  }
  return Math.min(1, linked / total);
}

/** Regex matching CJK characters (CJK Unified, Hiragana, Katakana, Hangul, fullwidth forms). */
const CJK_CHAR =
  /[\u3000-\u303f\u3040-\u309f\u30a0-\u30ff\u4e00-\u9fff\uac00-\ud7af\uff00-\uffef]/g;

/**
 * Count words in text. CJK characters are counted individually since
 * CJK scripts do not use whitespace to delimit words.
 */
export function countWords(text: string | null): number {
  if (!text) return 0;
  const spaced = text.replace(CJK_CHAR, ' $& ');
  return spaced.trim().split(/\s+/).filter(Boolean).length;
}

export type QueryResult = { ok: true; nodes: Element[] } | { ok: false; error: string };

/**
 * querySelectorAll that reports a selector the parser rejects instead of throwing.
 */
export function safeQueryAll(root: ParentNode, selector: string): QueryResult {
  try {
    return { ok: true, nodes: [...root.querySelectorAll(selector)] };
  } catch (e) {
    return { ok: false, error: String(e) };
  }
}

/** Element.matches returning null for a selector the parser rejects. */
export function safeMatches(el: Element, selector: string): boolean | null {
  try {
    return el.matches(selector);
  } catch (e) {
    logger.debug({ selector, error: String(e) }, 'Selector rejected by matcher');
    return null;
  }
}

/**
 * Read an attribute, treating `value` and `content` as interchangeable on
 * meta tags so rules can address either spelling.
 */
export function readAttribute(el: Element, name: string): string | null {
  const direct = el.getAttribute(name);
  if (direct) return direct;

  if (el.tagName.toLowerCase() === 'meta') {
    const lower = name.toLowerCase();
    if (lower === 'value') return el.getAttribute('content') || null;
    if (lower === 'content') return el.getAttribute('value') || null;
  }
  return null;
}

/**
 * Resolve a possibly-relative URL against a base.
 * Returns null for unparseable input.
 */
export function resolveUrl(url: string, base: string): string | null {
  try {
    return new URL(url, base).href;
  } catch (e) {
    logger.debug({ url, base, error: String(e) }, 'Failed to resolve URL');
    return null;
  }
}

/** Hostname of a URL, lower-cased, or null when the URL does not parse. */
export function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase() || null;
  } catch {
    return null;
  }
}

/** Strip HTML tags and return plain text content. */
export function htmlToText(html: string): string {
  const { document } = parseHTML(`<!DOCTYPE html><html><body><div>${html}</div></body></html>`);
  return normalizeSpaces(document.querySelector('div')?.textContent ?? '');
}
