import { describe, it, expect, vi } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import {
  ArticleExtractor,
  extractArticle,
  extractFromHtml,
} from '../extract/article-extractor.js';
import { parseDocument } from '../extract/document.js';
import { field, multiple } from '../sites/dsl.js';
import { EXAMPLE_NEWS_RULE_SET } from '../sites/minimal-defaults.js';
import { createDefaultRegistry } from '../sites/site-config.js';
import type { RuleSet } from '../sites/types.js';

const LONG_A = 'A'.repeat(30);
const ARTICLE_PAGE = `<html><body><article><h1>T</h1><p>${LONG_A}</p><nav><a>x</a><a>y</a></nav></article></body></html>`;

const NEWS_URL = 'https://news.example.com/world/big-news';
const NEWS_PAGE =
  '<html><head><meta property="article:section" content="World"></head><body>' +
  '<h1 class="headline">Big News</h1>' +
  '<span class="byline__name">By Ada Writer</span>' +
  '<time datetime="2024-03-05T10:00:00Z">March 5</time>' +
  '<p class="standfirst">What happened at the summit, and why</p>' +
  '<div class="story-body"><p>First paragraph of the story.</p>' +
  '<div class="pullquote">Quote here</div>' +
  '<div class="related-links"><a href="/other">Other</a></div>' +
  '<img data-src="/images/photo.jpg"></div>' +
  '</body></html>';

const NEWS_CONTENT =
  '<div class="story-body"><p>First paragraph of the story.</p>' +
  '<blockquote class="pullquote">Quote here</blockquote>' +
  '<img src="https://news.example.com/images/photo.jpg"></div>';
const NEWS_TEXT = 'First paragraph of the story.Quote here';

const registry = createDefaultRegistry({ path: null });
const extractor = new ArticleExtractor(registry);

describe('extractFromHtml', () => {
  it('scores unknown pages for content', () => {
    const result = extractFromHtml(ARTICLE_PAGE, 'https://example.com/story');

    expect(result).toEqual({
      title: 'T',
      content: `<article><h1>T</h1><p>${LONG_A}</p></article>`,
      author: null,
      date_published: null,
      lead_image_url: null,
      dek: null,
      next_page_url: null,
      url: 'https://example.com/story',
      domain: 'example.com',
      excerpt: `T${LONG_A}`,
      word_count: 1,
      direction: 'ltr',
      extended: {},
      rule_set: '*',
      content_source: 'scoring',
      issues: [],
    });
  });

  it('reports a scoring timeout and leaves content empty', () => {
    const result = extractFromHtml(ARTICLE_PAGE, 'https://example.com/story', {
      scoring: { deadlineMs: 0 },
    });

    expect(result.content).toBeNull();
    expect(result.content_source).toBeNull();
    expect(result.word_count).toBe(0);
    expect(result.title).toBe('T');
    expect(result.issues).toEqual([
      { kind: 'timeout', field: 'content', message: 'Content scoring exceeded its 0ms budget' },
    ]);
  });

  it('reports pages without plausible content', () => {
    const result = extractFromHtml('<html><body><p>tiny</p></body></html>', 'https://example.com/');

    expect(result.content).toBeNull();
    expect(result.direction).toBeNull();
    expect(result.issues).toEqual([
      { kind: 'not_found', field: 'content', message: 'No plausible content found' },
    ]);
  });

  it('takes the publication date from the URL when the page has none', () => {
    const result = extractFromHtml(ARTICLE_PAGE, 'https://example.com/2024/03/05/story');
    expect(result.date_published).toBe('2024-03-05T00:00:00.000Z');
  });

  it('returns paragraphs held directly by body inside a div', () => {
    const first = 'First paragraph, with commas, and enough text to score.';
    const second = 'Second paragraph, also with commas, to join the first.';

    const result = extractFromHtml(
      `<html><body><p>${first}</p><p>${second}</p></body></html>`,
      'https://example.com/plain'
    );

    expect(result.content).toBe(`<div><p>${first}</p><p>${second}</p></div>`);
  });

  it('reads a zone-less page date as UTC', () => {
    const html = `<html><body><span class="entry-date">March 5, 2024</span><article><p>${LONG_A}</p></article></body></html>`;
    expect(extractFromHtml(html, 'https://example.com/story').date_published).toBe(
      '2024-03-05T00:00:00.000Z'
    );
  });

  it('keeps the date markup when the date is requested as HTML', () => {
    const html = `<html><body><span class="entry-date">March 5, 2024</span><article><p>${LONG_A}</p></article></body></html>`;

    const result = extractFromHtml(html, 'https://example.com/story', {
      extractHTML: { date_published: true },
    });

    expect(result.date_published).toBe('<span class="entry-date">March 5, 2024</span>');
  });

  it('takes the author from the byline that reads "By"', () => {
    const html = `<html><body><div class="byline">Updated</div><div class="byline">By Jane</div><article><p>${LONG_A}</p></article></body></html>`;
    expect(extractFromHtml(html, 'https://example.com/story').author).toBe('Jane');
  });

  describe('next page from links', () => {
    const STORY_URL = 'https://example.com/story/1';
    const PAGED =
      `<html><body><article><p>${LONG_A}</p></article>` +
      '<div class="pagination"><a href="/story/2">Next</a></div></body></html>';

    it('scores the pagination link', () => {
      expect(extractFromHtml(PAGED, STORY_URL).next_page_url).toBe('https://example.com/story/2');
    });

    it('skips pages already collected', () => {
      const result = extractFromHtml(PAGED, STORY_URL, {
        previousUrls: ['https://example.com/story/2'],
      });
      expect(result.next_page_url).toBeNull();
    });

    it('is skipped in content-only mode', () => {
      expect(extractFromHtml(PAGED, STORY_URL, { contentOnly: true }).next_page_url).toBeNull();
    });
  });

  it('uses the supplied registry', () => {
    const result = extractFromHtml(NEWS_PAGE, NEWS_URL, { registry });
    expect(result.rule_set).toBe('news.example.com');
  });
});

describe('ArticleExtractor.extract', () => {
  it('extracts every field with the site rule set', () => {
    const result = extractor.extract(NEWS_PAGE, NEWS_URL);

    expect(result).toEqual({
      title: 'Big News',
      content: NEWS_CONTENT,
      author: 'Ada Writer',
      date_published: '2024-03-05T10:00:00.000Z',
      lead_image_url: 'https://news.example.com/images/photo.jpg',
      dek: 'What happened at the summit, and why',
      next_page_url: null,
      url: NEWS_URL,
      domain: 'news.example.com',
      excerpt: NEWS_TEXT,
      word_count: 6,
      direction: 'ltr',
      extended: { section: 'World' },
      rule_set: 'news.example.com',
      content_source: 'rule-set',
      issues: [],
    });
  });

  it('falls back to generic rules for fields the site leaves empty', () => {
    const html =
      '<html><body><h1 class="headline">Big News</h1><div class="byline">By Sam Smith</div>' +
      '<div class="story-body"><p>Body text.</p></div></body></html>';

    expect(extractor.extract(html, NEWS_URL).author).toBe('Sam Smith');
    expect(extractor.extract(html, NEWS_URL, { fallback: false }).author).toBeNull();
  });

  it('reports declared extended fields that match nothing as null', () => {
    const html = '<html><body><div class="story-body"><p>Body text.</p></div></body></html>';
    expect(extractor.extract(html, NEWS_URL).extended).toEqual({ section: null });
  });

  it('scores the page when the content selectors miss', () => {
    const html = `<html><body><h1 class="headline">Big News</h1><article><p>${LONG_A}</p></article></body></html>`;

    const result = extractor.extract(html, NEWS_URL);

    expect(result.content_source).toBe('scoring');
    expect(result.content).toBe(`<article><p>${LONG_A}</p></article>`);
  });

  it('leaves content empty when fallback is disabled and the selectors miss', () => {
    const html = `<html><body><article><p>${LONG_A}</p></article></body></html>`;

    const result = extractor.extract(html, NEWS_URL, { fallback: false });

    expect(result.content).toBeNull();
    expect(result.content_source).toBeNull();
    expect(result.issues).toEqual([
      { kind: 'not_found', field: 'content', message: 'Content selectors matched nothing' },
    ]);
  });

  it('scores the page when fallback is forced', () => {
    expect(extractor.extract(NEWS_PAGE, NEWS_URL, { forceFallback: true }).content_source).toBe(
      'scoring'
    );
  });

  it('extracts only content and derived fields in content-only mode', () => {
    const result = extractor.extract(NEWS_PAGE, NEWS_URL, { contentOnly: true });

    expect(result.content).toBe(NEWS_CONTENT);
    expect(result.title).toBeNull();
    expect(result.author).toBeNull();
    expect(result.date_published).toBeNull();
    expect(result.dek).toBeNull();
    expect(result.extended).toEqual({});
    expect(result.excerpt).toBe(NEWS_TEXT);
    expect(result.lead_image_url).toBe('https://news.example.com/images/photo.jpg');
    expect(result.word_count).toBe(6);
  });

  it('serializes fields as HTML or text on request', () => {
    const result = extractor.extract(NEWS_PAGE, NEWS_URL, {
      extractHTML: { title: true, content: false },
    });

    expect(result.title).toBe('<h1 class="headline">Big News</h1>');
    expect(result.content).toBe(NEWS_TEXT);
  });

  it('resolves relative links against <base href>', () => {
    const html =
      '<html><head><base href="https://cdn.example.com/assets/"></head><body>' +
      '<div class="story-body"><p>Text here.</p><a href="page.html">Link</a></div></body></html>';

    expect(extractor.extract(html, NEWS_URL).content).toBe(
      '<div class="story-body"><p>Text here.</p><a href="https://cdn.example.com/assets/page.html">Link</a></div>'
    );
  });
});

describe('extractArticle', () => {
  it('leaves the caller document untouched', () => {
    const document = parseDocument(NEWS_PAGE);

    extractArticle(document, NEWS_URL, EXAMPLE_NEWS_RULE_SET);

    expect(document.querySelector('.related-links')).not.toBeNull();
    expect(document.querySelector('.pullquote')?.tagName.toLowerCase()).toBe('div');
    expect(document.querySelector('img')?.getAttribute('data-src')).toBe('/images/photo.jpg');
  });

  it('skips malformed selectors and reports them', () => {
    const ruleSet: RuleSet = { domain: 'bad.example.com', title: field('h1:bogus-pseudo', 'h1') };

    const result = extractArticle(
      parseDocument(ARTICLE_PAGE),
      'https://bad.example.com/a',
      ruleSet
    );

    expect(result.title).toBe('T');
    expect(result.content_source).toBe('scoring');
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      kind: 'malformed_selector',
      field: 'title',
      selector: 'h1:bogus-pseudo',
    });
  });

  it('joins multiple authors', () => {
    const ruleSet: RuleSet = {
      domain: 'team.example.com',
      author: multiple(field('.author-name')),
    };
    const document = parseDocument(
      '<span class="author-name">Ann Lee</span><span class="author-name">Bo Chen</span>'
    );

    expect(extractArticle(document, 'https://team.example.com/', ruleSet).author).toBe(
      'Ann Lee, Bo Chen'
    );
  });
});

describe('rule sets from the bundled config', () => {
  const configured = new ArticleExtractor(createDefaultRegistry());

  const BLOG_URL = 'https://www.blog.example.org/2024/03/05/post';
  const blogPage = (thumbnail: string) =>
    '<html><body><header class="entry-header"><h1 class="entry-title">Post</h1></header>' +
    thumbnail +
    '<div class="entry-content"><h1>Section</h1><p>Body.</p><div class="sharedaddy">Share</div></div>' +
    '<span class="tags-links"><a href="/t/one">one</a><a href="/t/two">two</a></span></body></html>';

  it('applies content selectors, clean lists and transforms through an alias', () => {
    const result = configured.extract(blogPage(''), BLOG_URL);

    expect(result.rule_set).toBe('blog.example.org');
    expect(result.title).toBe('Post');
    expect(result.content).toBe(
      '<div class="entry-content"><h2>Section</h2><p>Body.</p></div>'
    );
    expect(result.extended).toEqual({ tags: ['one', 'two'] });
  });

  it('prefers the combined thumbnail and body when both exist', () => {
    const result = configured.extract(
      blogPage('<div class="post-thumbnail"><img src="/wp-content/hero.jpg"></div>'),
      BLOG_URL
    );

    expect(result.content).toBe(
      '<div class="post-thumbnail"><img src="https://www.blog.example.org/wp-content/hero.jpg"></div>' +
        '<div class="entry-content"><h2>Section</h2><p>Body.</p></div>'
    );
    expect(result.lead_image_url).toBe('https://www.blog.example.org/wp-content/hero.jpg');
  });

  const SYNDICATED_URL = 'https://partner.example.io/story';
  const SYNDICATED_PAGE =
    '<html><head><meta name="generator" content="ExampleCMS"></head><body>' +
    '<h1 class="article__title">Syndicated</h1>' +
    '<div class="article__body"><p>Copy of the story.</p><div class="ad-slot">Ad</div>' +
    '<aside class="callout">Note</aside></div></body></html>';
  const SYNDICATED_CONTENT =
    '<div class="article__body"><p>Copy of the story.</p><blockquote class="callout">Note</blockquote></div>';

  it('detects a rule set from the document', () => {
    const result = configured.extract(SYNDICATED_PAGE, SYNDICATED_URL);

    expect(result.rule_set).toBe('magazine.example.net');
    expect(result.title).toBe('Syndicated');
    expect(result.content).toBe(SYNDICATED_CONTENT);
  });

  it('detects the same rule set through the concurrent resolver', async () => {
    const result = await configured.extractAsync(SYNDICATED_PAGE, SYNDICATED_URL, {
      resolve: { timeoutMs: 1000 },
    });

    expect(result.rule_set).toBe('magazine.example.net');
    expect(result.content).toBe(SYNDICATED_CONTENT);
  });
});
