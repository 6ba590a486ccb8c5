/**
 * Document construction on top of linkedom.
 *
 * Every extraction call works on documents produced here: a parse of the
 * caller's HTML with meta tags normalized, and private clones of it for the
 * passes that mutate the tree.
 */
import { parseHTML } from 'linkedom';

import { MAX_HTML_SIZE_BYTES } from './types.js';
import { logger } from '../logger.js';

const FULL_DOCUMENT = /^\s*(<!doctype[^>]*>\s*)?(<!--[\s\S]*?-->\s*)*<html[\s>]/i;

/**
 * Copy `property` to `name` and `content` to `value` on meta tags, so that
 * `meta[name="og:image"]` with the `value` attribute reaches Open Graph tags too.
 */
export function normalizeMetaTags(document: Document): void {
  for (const meta of document.querySelectorAll('meta')) {
    const property = meta.getAttribute('property');
    if (property && !meta.hasAttribute('name')) {
      meta.setAttribute('name', property);
    }
    const content = meta.getAttribute('content');
    if (content !== null && !meta.hasAttribute('value')) {
      meta.setAttribute('value', content);
    }
  }
}

/**
 * Parse HTML into a document. Fragments are wrapped in a document shell;
 * input beyond the size limit is truncated.
 */
export function parseDocument(html: string): Document {
  let source = html;
  if (source.length > MAX_HTML_SIZE_BYTES) {
    logger.warn({ size: source.length }, 'HTML exceeds size limit, truncating');
    source = source.slice(0, MAX_HTML_SIZE_BYTES);
  }

  const markup = FULL_DOCUMENT.test(source)
    ? source
    : `<!DOCTYPE html><html><head></head><body>${source}</body></html>`;
  const { document } = parseHTML(markup);
  normalizeMetaTags(document);
  return document;
}

/** Independent copy of a document; mutations on it never reach the original. */
export function cloneDocument(document: Document): Document {
  const { document: copy } = parseHTML(`<!DOCTYPE html>${document.documentElement.outerHTML}`);
  return copy;
}

/**
 * Fresh document holding `html` inside a single container element.
 * The container's children are the subtree content passes operate on.
 */
export function createFragmentContainer(html: string): { document: Document; container: Element } {
  const { document } = parseHTML(
    `<!DOCTYPE html><html><head></head><body><div id="folio-root">${html}</div></body></html>`
  );
  const container = document.getElementById('folio-root') ?? document.body;
  return { document, container };
}
