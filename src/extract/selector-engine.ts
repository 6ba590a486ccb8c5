/**
 * Resolves a declarative FieldSpec against a document.
 *
 * Alternatives are tried in declared order; the first one producing a
 * non-empty, length-valid value wins. Within the winning alternative only the
 * first match is used unless the FieldSpec allows multiple values, in which case
 * every match is collected in document order.
 */
import type {
  FieldSpec,
  FieldValue,
  IssueReporter,
  SelectorAlternative,
} from './types.js';
import { normalizeSpaces, readAttribute, safeQueryAll } from './utils.js';
import { logger } from '../logger.js';

export interface SelectOptions {
  /** Serialize matches as outer HTML instead of normalized text */
  extractHTML?: boolean;
  /** Field name used when reporting issues */
  field?: string;
  report?: IssueReporter;
}

type Resolved = FieldValue | null;

function isLengthValid(value: string, spec: FieldSpec): boolean {
  if (!value) return false;
  if (spec.minLength !== undefined && value.length < spec.minLength) return false;
  if (spec.maxLength !== undefined && value.length > spec.maxLength) return false;
  return true;
}

function query(root: ParentNode, selector: string, options: SelectOptions): Element[] | null {
  const result = safeQueryAll(root, selector);
  if (result.ok) return result.nodes;

  logger.warn({ field: options.field, selector, error: result.error }, 'Skipping malformed selector');
  options.report?.({
    kind: 'malformed_selector',
    field: options.field,
    selector,
    message: result.error,
  });
  return null;
}

function serialize(node: Element, extractHTML: boolean): string {
  return extractHTML ? node.outerHTML : normalizeSpaces(node.textContent ?? '');
}

/** First valid value, or every valid value when multiple are allowed. */
function collect(values: string[], spec: FieldSpec): Resolved {
  if (spec.allowMultiple) {
    const valid = values.filter((v) => isLengthValid(v, spec));
    return valid.length > 0 ? valid : null;
  }
  const first = values[0];
  return first !== undefined && isLengthValid(first, spec) ? first : null;
}

function trySimple(
  root: ParentNode,
  alternative: Extract<SelectorAlternative, { kind: 'simple' }>,
  spec: FieldSpec,
  options: SelectOptions
): Resolved {
  const nodes = query(root, alternative.selector, options);
  if (!nodes || nodes.length === 0) return null;

  const extractHTML = options.extractHTML ?? false;
  const { pattern } = alternative;
  // the pattern picks among the matches before the first one is taken
  const matching = pattern ? nodes.filter((node) => pattern.test(node.textContent ?? '')) : nodes;
  const candidates = spec.allowMultiple ? matching : matching.slice(0, 1);
  return collect(
    candidates.map((node) => serialize(node, extractHTML)),
    spec
  );
}

function tryAttribute(
  root: ParentNode,
  alternative: Extract<SelectorAlternative, { kind: 'attribute' }>,
  spec: FieldSpec,
  options: SelectOptions
): Resolved {
  const nodes = query(root, alternative.selector, options);
  if (!nodes || nodes.length === 0) return null;

  const candidates = spec.allowMultiple ? nodes : nodes.slice(0, 1);
  const values: string[] = [];
  for (const node of candidates) {
    const value = readAttribute(node, alternative.attribute);
    if (value) values.push(value.trim());
  }
  return collect(values, spec);
}

function tryAllOf(
  root: ParentNode,
  alternative: Extract<SelectorAlternative, { kind: 'allOf' }>,
  spec: FieldSpec,
  options: SelectOptions
): Resolved {
  if (alternative.selectors.length === 0) return null;

  const extractHTML = options.extractHTML ?? false;
  const parts: string[] = [];
  for (const selector of alternative.selectors) {
    const nodes = query(root, selector, options);
    // one missing member discards the whole group
    if (!nodes || nodes.length === 0) return null;
    const taken = spec.allowMultiple ? nodes : nodes.slice(0, 1);
    parts.push(...taken.map((node) => serialize(node, extractHTML)));
  }

  const joined = extractHTML ? parts.join('') : normalizeSpaces(parts.join(' '));
  return isLengthValid(joined, spec) ? joined : null;
}

function tryAlternative(
  root: ParentNode,
  alternative: SelectorAlternative,
  spec: FieldSpec,
  options: SelectOptions
): Resolved {
  switch (alternative.kind) {
    case 'literal':
      return alternative.value || null;
    case 'simple':
      return trySimple(root, alternative, spec, options);
    case 'attribute':
      return tryAttribute(root, alternative, spec, options);
    case 'allOf':
      return tryAllOf(root, alternative, spec, options);
  }
}

/**
 * Select one field. Returns null only when every alternative fails.
 */
export function selectField(
  root: ParentNode,
  spec: FieldSpec,
  options: SelectOptions = {}
): FieldValue | null {
  for (const alternative of spec.selectors) {
    const value = tryAlternative(root, alternative, spec, options);
    if (value !== null) return value;
  }
  return null;
}

/** Flatten a field value to one string, joining multiple values with `separator`. */
export function joinFieldValue(value: FieldValue | null, separator: string): string | null {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  return value.length > 0 ? value.join(separator) : null;
}
