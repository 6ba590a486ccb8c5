/**
 * Generic cleanup pass for extracted content.
 * Runs last in the content pipeline, after rule-set transforms and clean lists:
 * strips non-content nodes and unsafe attributes, non-article UI text and
 * duplicate paragraphs, prunes empty nodes, collapses whitespace and makes
 * links absolute. Running it on its own output changes nothing.
 */
import { resolveUrl } from './utils.js';

const STRIP_SELECTORS = [
  'script',
  'style',
  'noscript',
  'link',
  'meta',
  'title',
  'template',
  'object',
  'embed',
  'applet',
  'form',
  'button',
];

const VIDEO_IFRAME_SOURCES = [
  /^https?:\/\/(www\.)?youtube(-nocookie)?\.com\//i,
  /^https?:\/\/player\.vimeo\.com\//i,
  /^https?:\/\/(www\.)?redditmedia\.com\//i,
];

const BOILERPLATE_PATTERNS = [
  /^thank you for your patience/i,
  /^already a subscriber/i,
  /^skip advertisement$/i,
  /^advertisement$/i,
  /^subscribe for all/i,
  /^log in$/i,
];

const MAX_BOILERPLATE_LENGTH = 200;
const MIN_DEDUP_LENGTH = 80;

const STRIPPED_ATTRIBUTES = new Set(['style', 'align', 'bgcolor', 'formaction']);
const UNSAFE_URI = /^(javascript|vbscript):/i;
const URL_ATTRIBUTES = ['href', 'src', 'poster'];

/** Elements that legitimately have no text. */
const KEEP_EMPTY_TAGS = new Set([
  'br',
  'hr',
  'img',
  'picture',
  'source',
  'track',
  'video',
  'audio',
  'iframe',
  'svg',
  'canvas',
  'math',
  'td',
  'th',
  'col',
  'colgroup',
  'wbr',
]);
const MEDIA_SELECTOR = 'img, picture, video, audio, iframe, svg, canvas, math';

const PRESERVE_WHITESPACE_TAGS = new Set(['pre', 'code', 'textarea']);
const TEXT_NODE = 3;

export interface CleanupOptions {
  /** Base URL for resolving relative links */
  url: string;
}

function stripNonContent(container: Element): void {
  for (const el of container.querySelectorAll(STRIP_SELECTORS.join(', '))) {
    el.remove();
  }
  for (const iframe of container.querySelectorAll('iframe')) {
    const src = iframe.getAttribute('src') ?? '';
    if (!VIDEO_IFRAME_SOURCES.some((p) => p.test(src))) {
      iframe.remove();
    }
  }
}

function stripAttributes(container: Element): void {
  for (const el of container.querySelectorAll('*')) {
    for (const attr of [...el.attributes]) {
      const name = attr.name.toLowerCase();
      if (
        /^on/.test(name) ||
        STRIPPED_ATTRIBUTES.has(name) ||
        UNSAFE_URI.test(attr.value.replace(/\s/g, ''))
      ) {
        el.removeAttribute(attr.name);
      }
    }
  }
}

export function isBoilerplate(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed || trimmed.length > MAX_BOILERPLATE_LENGTH) return false;
  return BOILERPLATE_PATTERNS.some((p) => p.test(trimmed));
}

function stripBoilerplate(container: Element): void {
  for (const el of container.querySelectorAll('p, span')) {
    if (isBoilerplate(el.textContent ?? '')) {
      el.remove();
    }
  }
}

/** Remove duplicate long paragraphs, keeping the later (article body) occurrence. */
function deduplicateParagraphs(container: Element): void {
  const seen = new Map<string, Element>();
  const toRemove: Element[] = [];

  for (const p of container.querySelectorAll('p')) {
    const text = (p.textContent ?? '').trim().replace(/\s+/g, ' ');
    if (text.length < MIN_DEDUP_LENGTH) continue;

    const prev = seen.get(text);
    if (prev) toRemove.push(prev);
    seen.set(text, p);
  }

  for (const el of toRemove) {
    el.remove();
  }
}

/** Post-order removal so a parent emptied by its children's removal goes too. */
function removeEmptyNodes(container: Element): void {
  const elements = [...container.querySelectorAll('*')].reverse();
  for (const el of elements) {
    if (KEEP_EMPTY_TAGS.has(el.tagName.toLowerCase())) continue;
    if ((el.textContent ?? '').trim() !== '') continue;
    if (el.querySelector(MEDIA_SELECTOR)) continue;
    el.remove();
  }
}

function collapseWhitespace(node: Node): void {
  for (const child of [...node.childNodes]) {
    if (child.nodeType === TEXT_NODE) {
      const text = child.textContent ?? '';
      const collapsed = text.replace(/\s+/g, ' ');
      if (collapsed !== text) child.textContent = collapsed;
    } else if (!PRESERVE_WHITESPACE_TAGS.has(child.nodeName.toLowerCase())) {
      collapseWhitespace(child);
    }
  }
}

function absolutizeSrcset(srcset: string, base: string): string {
  return srcset
    .split(',')
    .map((candidate) => {
      const [url, ...descriptor] = candidate.trim().split(/\s+/);
      if (!url) return '';
      const resolved = resolveUrl(url, base) ?? url;
      return [resolved, ...descriptor].join(' ');
    })
    .filter(Boolean)
    .join(', ');
}

function absolutizeLinks(container: Element, base: string): void {
  for (const el of container.querySelectorAll('[href], [src], [poster], [srcset]')) {
    for (const name of URL_ATTRIBUTES) {
      const value = el.getAttribute(name);
      if (!value || value.startsWith('#') || value.startsWith('data:')) continue;
      const resolved = resolveUrl(value.trim(), base);
      if (resolved && resolved !== value) el.setAttribute(name, resolved);
    }
    const srcset = el.getAttribute('srcset');
    if (srcset) {
      const resolved = absolutizeSrcset(srcset, base);
      if (resolved !== srcset) el.setAttribute('srcset', resolved);
    }
  }
}

/** Run the cleanup pass on the children of `container` (mutates in place). */
export function cleanContent(container: Element, options: CleanupOptions): void {
  stripNonContent(container);
  stripAttributes(container);
  stripBoilerplate(container);
  deduplicateParagraphs(container);
  removeEmptyNodes(container);
  collapseWhitespace(container);
  absolutizeLinks(container, options.url);
}
