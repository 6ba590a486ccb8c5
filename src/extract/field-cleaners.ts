/**
 * Per-field post-cleaning of selected values.
 */
import { generateExcerpt } from './metadata-extractors.js';
import { hostnameOf, htmlToText, normalizeSpaces, resolveUrl } from './utils.js';

const TITLE_SEPARATOR = /\s+(?:\||-|–|—|::)\s+/;
const AUTHOR_PREFIX = /^\s*(?:posted\s+|written\s+)?by\b\s*:?\s*/i;
const DATE_PREFIX = /^\s*(?:published|updated|posted)(?:\s+on)?\s*:?\s*/i;
const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_LOCAL_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;
const HAS_ZONE = /(?:\dZ|[+-]\d{2}:?\d{2}|\b(?:UTC|GMT|[ECMP][SD]T))$/i;
const DEK_MIN_LENGTH = 5;
const DEK_MAX_LENGTH = 1000;

function toText(value: string): string {
  return value.includes('<') ? htmlToText(value) : normalizeSpaces(value);
}

function slug(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Normalize a title and drop a leading or trailing segment naming the site,
 * as in "Story headline | Example".
 */
export function cleanTitle(title: string, url: string): string | null {
  const text = toText(title);
  if (!text) return null;

  const hostname = hostnameOf(url)?.replace(/^www\./, '');
  const parts = text.split(TITLE_SEPARATOR);
  if (!hostname || parts.length < 2) return text;

  const siteSlugs = new Set([slug(hostname.split('.')[0] ?? ''), slug(hostname)]);
  const first = parts[0] ?? '';
  const last = parts[parts.length - 1] ?? '';
  if (siteSlugs.has(slug(last))) {
    return text.slice(0, text.lastIndexOf(last)).replace(TITLE_SEPARATOR, '').trim() || text;
  }
  if (siteSlugs.has(slug(first))) {
    return text.slice(first.length).replace(TITLE_SEPARATOR, '').trim() || text;
  }
  return text;
}

export function cleanAuthor(author: string): string | null {
  const text = toText(author).replace(AUTHOR_PREFIX, '').trim();
  return text || null;
}

/** Dates without a zone are read as UTC, never in the host's zone. */
function parseDate(text: string): number {
  const local = ISO_LOCAL_TIME.exec(text);
  if (local) return Date.parse(`${local[1]}T${local[2]}Z`);
  if (ISO_DATE_ONLY.test(text) || HAS_ZONE.test(text)) return Date.parse(text);

  const utc = Date.parse(`${text} UTC`);
  return Number.isNaN(utc) ? Date.parse(text) : utc;
}

/**
 * Parse a date string or Unix timestamp (seconds or milliseconds) into ISO-8601.
 */
export function cleanDatePublished(value: string): string | null {
  const text = normalizeSpaces(value).replace(DATE_PREFIX, '');
  if (!text) return null;

  let time: number;
  if (/^\d{13}$/.test(text)) {
    time = Number(text);
  } else if (/^\d{10}$/.test(text)) {
    time = Number(text) * 1000;
  } else {
    time = parseDate(text);
  }
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

/** Absolute http(s) URL, or null. */
export function cleanUrl(value: string, base: string): string | null {
  const resolved = resolveUrl(value.trim(), base);
  if (!resolved) return null;
  return /^https?:\/\//i.test(resolved) ? resolved : null;
}

function leadingWords(text: string, count: number): string {
  return text.split(' ').slice(0, count).join(' ');
}

/**
 * A dek is rejected when it is implausibly short or long, or merely repeats
 * the start of the excerpt.
 */
export function cleanDek(dek: string, excerpt: string | null): string | null {
  const text = toText(dek);
  if (text.length < DEK_MIN_LENGTH || text.length > DEK_MAX_LENGTH) return null;
  if (excerpt && leadingWords(toText(excerpt), 10) === leadingWords(text, 10)) return null;
  return text;
}

export function cleanExcerpt(excerpt: string): string | null {
  return generateExcerpt(null, toText(excerpt));
}
