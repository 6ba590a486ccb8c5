/**
 * Derived metadata: excerpt, text direction, date from URL, lead image from content.
 */
import { createFragmentContainer } from './document.js';
import { DEFAULT_EXCERPT_LENGTH, type TextDirection } from './types.js';
import { normalizeSpaces, resolveUrl } from './utils.js';

/**
 * Generate excerpt from text content if not already provided
 */
export function generateExcerpt(excerpt: string | null, textContent: string | null): string | null {
  if (excerpt) return excerpt;
  if (!textContent) return null;

  const trimmed = normalizeSpaces(textContent);
  if (!trimmed) return null;

  // code points, so a surrogate pair is never split
  const chars = [...trimmed];
  return chars.length > DEFAULT_EXCERPT_LENGTH
    ? chars.slice(0, DEFAULT_EXCERPT_LENGTH).join('') + '...'
    : trimmed;
}

/** Hebrew, Arabic, Syriac, Thaana, NKo, Tifinagh and the RTL presentation forms. */
const RTL_CHARS =
  /[\u0590-\u05ff\u0600-\u06ff\u0700-\u074f\u0750-\u077f\u0780-\u07bf\u07c0-\u07ff\u08a0-\u08ff\u2d30-\u2d7f\ufb1d-\ufdff\ufe70-\ufeff]/;
const RTL_CHARS_GLOBAL = new RegExp(RTL_CHARS.source, 'g');
const LETTER = /\p{L}/u;

/**
 * Writing direction of a string: 'rtl', 'ltr', 'bidi' when both occur,
 * or '' when it holds no letters.
 */
export function detectDirection(text: string): TextDirection {
  const hasRtl = RTL_CHARS.test(text);
  const hasLtr = LETTER.test(text.replace(RTL_CHARS_GLOBAL, ''));
  if (hasRtl && hasLtr) return 'bidi';
  if (hasRtl) return 'rtl';
  if (hasLtr) return 'ltr';
  return '';
}

const DATE_PATH_SLASHED = /\/(20\d{2})\/(\d{2})\/(\d{2})\//;
const DATE_PATH_DASHED = /(20\d{2}-[01]\d-[0-3]\d)/;

/**
 * Publication date embedded in a URL path, as YYYY-MM-DD.
 */
export function dateFromUrl(url: string): string | null {
  const slashed = DATE_PATH_SLASHED.exec(url);
  if (slashed) return `${slashed[1]}-${slashed[2]}-${slashed[3]}`;

  const dashed = DATE_PATH_DASHED.exec(url);
  return dashed ? dashed[1] : null;
}

const POSITIVE_IMAGE_HINTS = /upload|wp-content|large|photo|wp-image/i;
const NEGATIVE_IMAGE_HINTS =
  /spacer|sprite|blank|throbber|gradient|tile|bg|background|icon|social|header|hdr|advert|spinner|loader|loading|default|rating|share|facebook|twitter|theme|promo|ads|wp-includes/i;

export function scoreImageUrl(src: string): number {
  let score = 0;
  if (POSITIVE_IMAGE_HINTS.test(src)) score += 20;
  if (NEGATIVE_IMAGE_HINTS.test(src)) score -= 20;
  if (/\.gif(\?.*)?$/i.test(src)) score -= 10;
  if (/\.jpe?g(\?.*)?$/i.test(src)) score += 10;
  return score;
}

const PHOTO_HINTS = /figure|photo|image|caption/i;

function signature(el: Element | null): string {
  return el ? `${el.getAttribute('class') ?? ''} ${el.getAttribute('id') ?? ''}` : '';
}

/** Figure ancestry, photo-like parent classes and a caption right after the image. */
function scoreImageContext(img: Element): number {
  let score = img.hasAttribute('alt') ? 5 : 0;
  if (img.closest('figure')) score += 25;

  const parent = img.parentElement;
  if (PHOTO_HINTS.test(signature(parent))) score += 15;
  if (PHOTO_HINTS.test(signature(parent?.parentElement ?? null))) score += 15;

  const sibling = img.nextElementSibling;
  if (sibling?.tagName.toLowerCase() === 'figcaption') score += 25;
  if (PHOTO_HINTS.test(signature(sibling))) score += 15;
  return score;
}

/** Small or thin images are icons or spacers; large ones earn a point per 1000px². */
function scoreImageDimensions(img: Element, src: string): number {
  const width = Number(img.getAttribute('width') ?? NaN);
  const height = Number(img.getAttribute('height') ?? NaN);
  if (!Number.isFinite(width) || !Number.isFinite(height)) return 0;

  let score = 0;
  if (width <= 50) score -= 50;
  if (height <= 50) score -= 50;
  if (width > 0 && height > 0 && !src.includes('sprite')) {
    const area = width * height;
    score += area < 5000 ? -100 : Math.round(area / 1000);
  }
  return score;
}

/**
 * Best image in the extracted content, by URL, context, size and position.
 * Earliest wins on ties; images with a negative score never qualify.
 */
export function leadImageFromContent(contentHtml: string, url: string): string | null {
  const { container } = createFragmentContainer(contentHtml);
  const images = [...container.querySelectorAll('img')];
  let best: { src: string; score: number } | null = null;

  for (const [index, img] of images.entries()) {
    const raw = img.getAttribute('src') ?? img.getAttribute('data-src');
    if (!raw || raw.startsWith('data:')) continue;
    const src = resolveUrl(raw.trim(), url);
    if (!src) continue;

    const score =
      scoreImageUrl(src) +
      scoreImageContext(img) +
      scoreImageDimensions(img, src) +
      (images.length / 2 - index);
    if (score >= 0 && (best === null || score > best.score)) {
      best = { src, score };
    }
  }
  return best?.src ?? null;
}
