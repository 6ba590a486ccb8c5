/**
 * JSON form of rule sets, validated with zod.
 *
 * Selector alternatives in JSON:
 *   "h1.title"                            simple selector
 *   { "selector": ".byline", "pattern": "^By" }   simple selector with a text pattern
 *   { "attr": ["meta[name=\"og:image\"]", "value"] }
 *   { "allOf": ["figure.hero", ".body"] }
 *   { "literal": "Staff" }
 *
 * Transforms are renames only ("h1": "h2"); custom mutators need code.
 */
import { z } from 'zod';

import type {
  ContentFieldSpec,
  FieldSpec,
  SelectorAlternative,
  Transform,
} from '../extract/types.js';
import { ARTICLE_FIELDS } from '../extract/types.js';
import type { Detector, RuleSet } from './types.js';

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

const SelectorString = z.string().trim().min(1);

const AlternativeJsonSchema = z.union([
  SelectorString,
  z.object({ literal: z.string().min(1) }).strict(),
  z.object({ attr: z.tuple([SelectorString, z.string().trim().min(1)]) }).strict(),
  z.object({ allOf: z.array(SelectorString).min(1) }).strict(),
  z
    .object({
      selector: SelectorString,
      pattern: z.string().refine(isValidRegex, 'Invalid regular expression').optional(),
    })
    .strict(),
]);

const FieldSpecObjectSchema = z
  .object({
    selectors: z.array(AlternativeJsonSchema),
    allowMultiple: z.boolean().optional(),
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().positive().optional(),
  })
  .strict();

const FieldSpecJsonSchema = z.union([z.array(AlternativeJsonSchema), FieldSpecObjectSchema]);

const ContentSpecJsonSchema = FieldSpecObjectSchema.extend({
  clean: z.array(SelectorString).optional(),
  transforms: z.record(SelectorString, z.string().regex(/^[a-z][a-z0-9-]*$/i)).optional(),
  defaultCleaner: z.boolean().optional(),
}).strict();

export const RuleSetJsonSchema = z
  .object({
    domain: z.string().trim().min(1),
    supportedDomains: z.array(z.string().trim().min(1)).optional(),
    title: FieldSpecJsonSchema.optional(),
    author: FieldSpecJsonSchema.optional(),
    date_published: FieldSpecJsonSchema.optional(),
    lead_image_url: FieldSpecJsonSchema.optional(),
    dek: FieldSpecJsonSchema.optional(),
    next_page_url: FieldSpecJsonSchema.optional(),
    excerpt: FieldSpecJsonSchema.optional(),
    content: z.union([z.array(AlternativeJsonSchema), ContentSpecJsonSchema]).optional(),
    extend: z.record(z.string().min(1), FieldSpecJsonSchema).optional(),
    /** Probe selectors that select this rule set by document content */
    detect: z.array(SelectorString).optional(),
    notes: z.string().optional(),
  })
  .strict();

export type RuleSetJson = z.infer<typeof RuleSetJsonSchema>;
type AlternativeJson = z.infer<typeof AlternativeJsonSchema>;
type FieldSpecJson = z.infer<typeof FieldSpecJsonSchema>;

function toAlternative(json: AlternativeJson): SelectorAlternative {
  if (typeof json === 'string') return { kind: 'simple', selector: json };
  if ('literal' in json) return { kind: 'literal', value: json.literal };
  if ('attr' in json) {
    const [selector, attribute] = json.attr;
    return { kind: 'attribute', selector, attribute };
  }
  if ('allOf' in json) return { kind: 'allOf', selectors: json.allOf };
  return json.pattern
    ? { kind: 'simple', selector: json.selector, pattern: new RegExp(json.pattern, 'i') }
    : { kind: 'simple', selector: json.selector };
}

function toFieldSpec(json: FieldSpecJson): FieldSpec {
  if (Array.isArray(json)) return { selectors: json.map(toAlternative) };
  const spec: FieldSpec = { selectors: json.selectors.map(toAlternative) };
  if (json.allowMultiple !== undefined) spec.allowMultiple = json.allowMultiple;
  if (json.minLength !== undefined) spec.minLength = json.minLength;
  if (json.maxLength !== undefined) spec.maxLength = json.maxLength;
  return spec;
}

function toContentSpec(json: NonNullable<RuleSetJson['content']>): ContentFieldSpec {
  if (Array.isArray(json)) return { selectors: json.map(toAlternative) };

  const spec: ContentFieldSpec = toFieldSpec(json);
  if (json.clean) spec.clean = json.clean;
  if (json.defaultCleaner !== undefined) spec.defaultCleaner = json.defaultCleaner;
  if (json.transforms) {
    const transforms: Record<string, Transform> = {};
    for (const [selector, tag] of Object.entries(json.transforms)) {
      transforms[selector] = { kind: 'rename', tag };
    }
    spec.transforms = transforms;
  }
  return spec;
}

/** Convert a validated JSON rule set into its runtime form. */
export function toRuleSet(json: RuleSetJson): RuleSet {
  const ruleSet: RuleSet = { domain: json.domain };
  if (json.supportedDomains) ruleSet.supportedDomains = json.supportedDomains;

  for (const field of ARTICLE_FIELDS) {
    const spec = json[field];
    if (spec) ruleSet[field] = toFieldSpec(spec);
  }
  if (json.content) ruleSet.content = toContentSpec(json.content);

  if (json.extend) {
    const extend: Record<string, FieldSpec> = {};
    for (const [name, spec] of Object.entries(json.extend)) {
      extend[name] = toFieldSpec(spec);
    }
    ruleSet.extend = extend;
  }
  return ruleSet;
}

export interface ParsedRuleSets {
  ruleSets: RuleSet[];
  /** Probe selector -> rule set, in file order */
  detectors: Detector[];
  /** One message per rejected entry */
  errors: string[];
}

/**
 * Validate a JSON array of rule sets entry by entry; invalid entries are
 * reported and skipped.
 */
export function parseRuleSetJson(raw: unknown): ParsedRuleSets {
  const parsed: ParsedRuleSets = { ruleSets: [], detectors: [], errors: [] };
  if (!Array.isArray(raw)) {
    parsed.errors.push('Rule set file must contain a JSON array');
    return parsed;
  }

  raw.forEach((entry: unknown, index) => {
    const result = RuleSetJsonSchema.safeParse(entry);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      parsed.errors.push(`entry ${index}: ${issues.join('; ')}`);
      return;
    }
    const ruleSet = toRuleSet(result.data);
    parsed.ruleSets.push(ruleSet);
    for (const selector of result.data.detect ?? []) {
      parsed.detectors.push({ selector, ruleSet });
    }
  });
  return parsed;
}
