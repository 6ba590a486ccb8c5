/**
 * Built-in example rule sets
 *
 * These are small examples of the rule-set format. Site rules for production
 * use belong in config/rulesets.json (or the file named by FOLIO_RULESETS).
 */
import { attr, content, field, meta, mutate, renameTo } from './dsl.js';
import type { Detector, RuleSet } from './types.js';

// Blogger keeps the rendered post inside <noscript>
export const BLOGGER_RULE_SET: RuleSet = {
  domain: 'blogspot.com',
  supportedDomains: ['www.blogspot.com', 'blogspot.co.uk', 'blogspot.ca'],
  title: field('.post h2.title'),
  author: field('.post-author-name'),
  date_published: field('span.publishdate'),
  content: content(['.post-content noscript'], {
    transforms: { noscript: renameTo('div') },
  }),
};

export const MEDIUM_RULE_SET: RuleSet = {
  domain: 'medium.com',
  title: field('h1', meta('og:title')),
  author: field(meta('author')),
  date_published: field(meta('article:published_time')),
  lead_image_url: field(meta('og:image')),
  content: content(['article'], {
    transforms: {
      section: renameTo('div'),
      figure: mutate('drop-empty-figure', (node) => {
        if (!node.querySelector('img, picture, iframe')) node.remove();
      }),
    },
    clean: ['span a', 'svg'],
  }),
};

// Example: lazy-loaded images and a site-specific extended field
export const EXAMPLE_NEWS_RULE_SET: RuleSet = {
  domain: 'news.example.com',
  title: field('h1.headline', 'h1'),
  author: field('.byline__name'),
  date_published: field(attr('time[datetime]', 'datetime')),
  dek: field('.standfirst'),
  content: content(['.story-body'], {
    transforms: {
      'img[data-src]': mutate('lazy-image', (node) => {
        const src = node.getAttribute('data-src');
        if (!src) return;
        node.setAttribute('src', src);
        node.removeAttribute('data-src');
      }),
      '.pullquote': renameTo('blockquote'),
    },
    clean: ['.related-links', '.newsletter-signup'],
  }),
  extend: {
    section: field(meta('article:section')),
  },
};

export const MINIMAL_DEFAULTS: readonly RuleSet[] = [
  BLOGGER_RULE_SET,
  MEDIUM_RULE_SET,
  EXAMPLE_NEWS_RULE_SET,
];

export const DEFAULT_DETECTORS: readonly Detector[] = [
  { selector: 'meta[name="al:ios:app_name"][value="Medium"]', ruleSet: MEDIUM_RULE_SET },
  { selector: 'meta[name="generator"][value="blogger"]', ruleSet: BLOGGER_RULE_SET },
];
