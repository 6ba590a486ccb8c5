/**
 * Builders for writing rule sets in code.
 *
 * @example
 * const title = field(select('h1.headline'), attr('meta[name="og:title"]', 'value'));
 */
import type {
  ContentFieldSpec,
  FieldSpec,
  NodeMutator,
  SelectorAlternative,
  Transform,
} from '../extract/types.js';

export function literal(value: string): SelectorAlternative {
  return { kind: 'literal', value };
}

export function select(selector: string, pattern?: RegExp): SelectorAlternative {
  return pattern ? { kind: 'simple', selector, pattern } : { kind: 'simple', selector };
}

export function attr(selector: string, attribute: string): SelectorAlternative {
  return { kind: 'attribute', selector, attribute };
}

export function allOf(...selectors: string[]): SelectorAlternative {
  return { kind: 'allOf', selectors };
}

/** Shorthand for a meta tag's value, e.g. meta('og:title'). */
export function meta(name: string): SelectorAlternative {
  return attr(`meta[name="${name}"]`, 'value');
}

type Alternatives = SelectorAlternative | string;

function toAlternative(alternative: Alternatives): SelectorAlternative {
  return typeof alternative === 'string' ? select(alternative) : alternative;
}

export function field(...selectors: Alternatives[]): FieldSpec {
  return { selectors: selectors.map(toAlternative) };
}

export function multiple(spec: FieldSpec): FieldSpec {
  return { ...spec, allowMultiple: true };
}

export function content(
  selectors: Alternatives[],
  options: Omit<ContentFieldSpec, 'selectors'> = {}
): ContentFieldSpec {
  return { ...options, selectors: selectors.map(toAlternative) };
}

export function renameTo(tag: string): Transform {
  return { kind: 'rename', tag };
}

export function mutate(name: string, mutator: NodeMutator): Transform {
  return { kind: 'custom', name, mutate: mutator };
}
