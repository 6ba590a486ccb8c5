/**
 * Built-in generic rule set.
 *
 * Fallback for every field a site rule set leaves empty, and the rule set
 * used outright for unknown sites. It has no content selectors: content
 * always comes from scoring.
 */
import {
  AUTHOR_MAX_LENGTH,
  AUTHOR_META_TAGS,
  AUTHOR_SELECTORS,
  BYLINE_PATTERN,
  BYLINE_SELECTORS,
  DATE_PUBLISHED_META_TAGS,
  DATE_PUBLISHED_SELECTORS,
  EXCERPT_META_TAGS,
  LEAD_IMAGE_META_TAGS,
  TITLE_META_STRONG,
  TITLE_META_WEAK,
  TITLE_SELECTORS_STRONG,
  TITLE_SELECTORS_WEAK,
} from './constants.js';
import { attr, meta, select } from './dsl.js';
import type { RuleSet } from './types.js';

export const GENERIC_DOMAIN = '*';

export const GENERIC_RULE_SET: RuleSet = {
  domain: GENERIC_DOMAIN,

  title: {
    selectors: [
      ...TITLE_META_STRONG.map(meta),
      ...TITLE_SELECTORS_STRONG.map((s) => select(s)),
      ...TITLE_META_WEAK.map(meta),
      ...TITLE_SELECTORS_WEAK.map((s) => select(s)),
    ],
  },

  author: {
    selectors: [
      ...AUTHOR_META_TAGS.map(meta),
      ...AUTHOR_SELECTORS.map((s) => select(s)),
      // a byline reading "By ..." beats one that doesn't
      ...BYLINE_SELECTORS.map((s) => select(s, BYLINE_PATTERN)),
      ...BYLINE_SELECTORS.map((s) => select(s)),
    ],
    maxLength: AUTHOR_MAX_LENGTH,
  },

  date_published: {
    selectors: [
      ...DATE_PUBLISHED_META_TAGS.map(meta),
      attr('time[datetime]', 'datetime'),
      ...DATE_PUBLISHED_SELECTORS.map((s) => select(s)),
    ],
  },

  lead_image_url: {
    selectors: [...LEAD_IMAGE_META_TAGS.map(meta), attr('link[rel="image_src"]', 'href')],
  },

  dek: { selectors: [] },

  next_page_url: {
    selectors: [attr('link[rel="next"]', 'href')],
  },

  excerpt: {
    selectors: EXCERPT_META_TAGS.map(meta),
  },

  content: {
    selectors: [],
    defaultCleaner: true,
  },
};

export function isGenericRuleSet(ruleSet: RuleSet): boolean {
  return ruleSet === GENERIC_RULE_SET || ruleSet.domain === GENERIC_DOMAIN;
}
