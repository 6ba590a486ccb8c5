/**
 * Content pipeline: rule-set transforms, then clean-list removal, then the
 * generic cleanup pass. The order is fixed.
 */
import { cleanContent } from './content-cleanup.js';
import { createFragmentContainer } from './document.js';
import type { IssueReporter, Transform, TransformContext } from './types.js';
import { safeQueryAll } from './utils.js';
import { logger } from '../logger.js';

const TAG_NAME = /^[a-z][a-z0-9-]*$/i;

export interface PipelineOptions {
  transforms?: Readonly<Record<string, Transform>>;
  clean?: readonly string[];
  /** Default: true */
  defaultCleaner?: boolean;
  /** Base URL handed to transforms and used to absolutize links */
  url: string;
  report?: IssueReporter;
}

/**
 * Replace `node` with a `tag` element carrying the same attributes and children.
 */
export function renameElement(node: Element, tag: string): Element {
  if (!TAG_NAME.test(tag)) {
    throw new Error(`Invalid tag name: ${tag}`);
  }
  if (node.tagName.toLowerCase() === tag.toLowerCase()) return node;

  const replacement = node.ownerDocument.createElement(tag);
  for (const attr of [...node.attributes]) {
    replacement.setAttribute(attr.name, attr.value);
  }
  while (node.firstChild) {
    replacement.appendChild(node.firstChild);
  }
  node.replaceWith(replacement);
  return replacement;
}

function transformLabel(transform: Transform): string {
  return transform.kind === 'rename'
    ? `rename:${transform.tag}`
    : `custom:${transform.name ?? 'anonymous'}`;
}

function applyTransform(node: Element, transform: Transform, context: TransformContext): void {
  if (transform.kind === 'rename') {
    renameElement(node, transform.tag);
    return;
  }
  const tag = transform.mutate(node, context);
  if (typeof tag === 'string' && tag && node.parentNode) {
    renameElement(node, tag);
  }
}

function reportSelector(options: PipelineOptions, selector: string, error: string): void {
  logger.warn({ selector, error }, 'Skipping malformed content selector');
  options.report?.({ kind: 'malformed_selector', field: 'content', selector, message: error });
}

function runTransforms(container: Element, options: PipelineOptions): void {
  if (!options.transforms) return;
  const context: TransformContext = { document: container.ownerDocument, url: options.url };

  for (const [selector, transform] of Object.entries(options.transforms)) {
    // re-query so earlier transforms can expose or hide matches
    const result = safeQueryAll(container, selector);
    if (!result.ok) {
      reportSelector(options, selector, result.error);
      continue;
    }

    for (const node of result.nodes) {
      if (!container.contains(node)) continue;
      try {
        applyTransform(node, transform, context);
      } catch (e) {
        logger.debug(
          { selector, transform: transformLabel(transform), error: String(e) },
          'Transform failed, leaving node unchanged'
        );
        options.report?.({
          kind: 'transform_failure',
          field: 'content',
          selector,
          message: `${transformLabel(transform)}: ${String(e)}`,
        });
      }
    }
  }
}

function runCleanList(container: Element, options: PipelineOptions): void {
  for (const selector of options.clean ?? []) {
    const result = safeQueryAll(container, selector);
    if (!result.ok) {
      reportSelector(options, selector, result.error);
      continue;
    }
    for (const node of result.nodes) {
      node.remove();
    }
  }
}

/**
 * Process the children of `container` in place and return it.
 */
export function processContent(container: Element, options: PipelineOptions): Element {
  runTransforms(container, options);
  runCleanList(container, options);
  if (options.defaultCleaner ?? true) {
    cleanContent(container, { url: options.url });
  }
  return container;
}

/**
 * Process an HTML fragment in a fresh document and return the resulting HTML.
 */
export function processContentHtml(html: string, options: PipelineOptions): string {
  const { container } = createFragmentContainer(html);
  return processContent(container, options).innerHTML;
}
