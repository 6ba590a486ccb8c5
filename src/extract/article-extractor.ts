/**
 * Field extraction orchestrator.
 *
 * Every field goes through the same two steps: the resolved rule set's spec,
 * then (unless disabled) the generic rule set's spec. Content is different
 * only in its second step, which is the scoring engine. All read-only field
 * selections run before the content pass, and the content pass works on
 * detached copies, so no field sees another field's mutations.
 */
import { cloneDocument, normalizeMetaTags, parseDocument } from './document.js';
import {
  cleanAuthor,
  cleanDatePublished,
  cleanDek,
  cleanExcerpt,
  cleanTitle,
  cleanUrl,
} from './field-cleaners.js';
import {
  dateFromUrl,
  detectDirection,
  generateExcerpt,
  leadImageFromContent,
} from './metadata-extractors.js';
import { nextPageFromLinks } from './next-page.js';
import { extractMainContent, ScoringTimeoutError } from './scoring.js';
import type { ScoringConfig } from './scoring-config.js';
import { joinFieldValue, selectField } from './selector-engine.js';
import { processContentHtml } from './transform-pipeline.js';
import {
  ARTICLE_FIELDS,
  type ArticleField,
  type ContentSource,
  type ExtractionIssue,
  type ExtractionResult,
  type FieldValue,
  type IssueReporter,
} from './types.js';
import { countWords, hostnameOf, htmlToText, resolveUrl } from './utils.js';
import { GENERIC_RULE_SET, isGenericRuleSet } from '../sites/generic.js';
import { Registry } from '../sites/registry.js';
import { ExtractorResolver, type ConcurrentResolveOptions } from '../sites/resolver.js';
import type { RuleSet, RuleSetRegistry } from '../sites/types.js';
import { logger } from '../logger.js';

export interface ExtractOptions {
  /** Extract only content and the fields derived from it */
  contentOnly?: boolean;
  /** Use the scoring engine even when the rule set's content selectors match */
  forceFallback?: boolean;
  /** Fall back to generic rules for fields the rule set leaves empty (default: true) */
  fallback?: boolean;
  /** Per field: serialize as HTML (content defaults to true, everything else to false) */
  extractHTML?: Readonly<Record<string, boolean>>;
  /** Overrides for the scoring constants */
  scoring?: Partial<ScoringConfig>;
  /** Pages of this article already collected; never returned as next_page_url */
  previousUrls?: readonly string[];
}

interface ContentOutcome {
  html: string;
  source: ContentSource;
}

interface ExtractionContext {
  document: Document;
  url: string;
  /** Base for relative links: the document's <base href> if any, else the URL */
  baseUrl: string;
  ruleSet: RuleSet;
  options: ExtractOptions;
  report: IssueReporter;
}

function wantsHtml(options: ExtractOptions, field: string): boolean {
  return options.extractHTML?.[field] ?? field === 'content';
}

function documentBaseUrl(document: Document, url: string): string {
  const href = document.querySelector('base[href]')?.getAttribute('href');
  return (href && resolveUrl(href, url)) || url;
}

function selectArticleField(context: ExtractionContext, field: ArticleField): FieldValue | null {
  const { document, ruleSet, options, report } = context;
  const selectOptions = { extractHTML: wantsHtml(options, field), field, report };

  const siteSpec = ruleSet[field];
  const fromRuleSet = siteSpec ? selectField(document, siteSpec, selectOptions) : null;
  if (fromRuleSet !== null || isGenericRuleSet(ruleSet) || options.fallback === false) {
    return fromRuleSet;
  }

  const genericSpec = GENERIC_RULE_SET[field];
  return genericSpec ? selectField(document, genericSpec, selectOptions) : null;
}

/** Single string for a fixed field: authors are joined, other fields take the first value. */
/** Link-scored next page, when generic rules apply to the page. */
function scoredNextPage(context: ExtractionContext): string | null {
  const { document, url, baseUrl, ruleSet, options } = context;
  if (options.contentOnly) return null;
  if (!isGenericRuleSet(ruleSet) && options.fallback === false) return null;
  return nextPageFromLinks(document, url, { baseUrl, previousUrls: options.previousUrls });
}

function flatten(field: ArticleField, value: FieldValue | null): string | null {
  if (typeof value !== 'object' || value === null) return value;
  return field === 'author' ? joinFieldValue(value, ', ') : (value[0] ?? null);
}

function hasContent(html: string): boolean {
  return htmlToText(html) !== '' || /<(img|picture|video|audio|iframe)\b/i.test(html);
}

function contentTables(ruleSet: RuleSet) {
  const spec = ruleSet.content ?? GENERIC_RULE_SET.content;
  return {
    transforms: spec?.transforms,
    clean: spec?.clean,
    defaultCleaner: spec?.defaultCleaner ?? true,
  };
}

function contentFromRuleSet(context: ExtractionContext): ContentOutcome | null {
  const { document, ruleSet, baseUrl, report } = context;
  const spec = ruleSet.content;
  if (!spec || spec.selectors.length === 0) return null;

  const selected = joinFieldValue(
    selectField(document, spec, { extractHTML: true, field: 'content', report }),
    ''
  );
  if (!selected) return null;

  const html = processContentHtml(selected, { ...contentTables(ruleSet), url: baseUrl, report });
  return hasContent(html) ? { html, source: 'rule-set' } : null;
}

function contentFromScoring(context: ExtractionContext): ContentOutcome | null {
  const { document, url, ruleSet, baseUrl, options, report } = context;

  let candidateHtml: string | null = null;
  try {
    candidateHtml = extractMainContent(document, options.scoring)?.content.outerHTML ?? null;
  } catch (e) {
    if (e instanceof ScoringTimeoutError) {
      logger.warn({ url, budgetMs: e.budgetMs }, 'Content scoring timed out');
      report({ kind: 'timeout', field: 'content', message: e.message });
    } else {
      logger.error({ url, error: String(e) }, 'Content scoring failed');
      report({ kind: 'not_found', field: 'content', message: String(e) });
    }
    return null;
  }

  const html = candidateHtml
    ? processContentHtml(candidateHtml, { ...contentTables(ruleSet), url: baseUrl, report })
    : '';
  if (!hasContent(html)) {
    report({ kind: 'not_found', field: 'content', message: 'No plausible content found' });
    return null;
  }
  return { html, source: 'scoring' };
}

function extractContent(context: ExtractionContext): ContentOutcome | null {
  const { ruleSet, options } = context;
  const generic = isGenericRuleSet(ruleSet);

  if (!generic && !options.forceFallback) {
    const selected = contentFromRuleSet(context);
    if (selected) return selected;
    if (options.fallback === false) {
      context.report({
        kind: 'not_found',
        field: 'content',
        message: 'Content selectors matched nothing',
      });
      return null;
    }
  }
  return contentFromScoring(context);
}

/**
 * Extract every article field from a document with the given rule set.
 * Always returns the full field set; problems are listed in `issues`.
 */
export function extractArticle(
  document: Document,
  url: string,
  ruleSet: RuleSet,
  options: ExtractOptions = {}
): ExtractionResult {
  const issues: ExtractionIssue[] = [];
  const working = cloneDocument(document);
  normalizeMetaTags(working);

  const context: ExtractionContext = {
    document: working,
    url,
    baseUrl: documentBaseUrl(working, url),
    ruleSet,
    options,
    report: (issue) => issues.push(issue),
  };

  const raw = new Map<ArticleField, string | null>();
  const extended: Record<string, FieldValue | null> = {};

  if (!options.contentOnly) {
    for (const field of ARTICLE_FIELDS) {
      raw.set(field, flatten(field, selectArticleField(context, field)));
    }
    for (const [name, spec] of Object.entries(ruleSet.extend ?? {})) {
      extended[name] = selectField(working, spec, {
        extractHTML: wantsHtml(options, name),
        field: name,
        report: context.report,
      });
    }
  }

  const content = extractContent(context);
  const contentText = content ? htmlToText(content.html) : null;

  const clean = (field: ArticleField, cleaner: (value: string) => string | null) => {
    const value = raw.get(field) ?? null;
    if (value === null) return null;
    return wantsHtml(options, field) ? value : cleaner(value);
  };

  const title = clean('title', (v) => cleanTitle(v, url));
  const excerpt = clean('excerpt', cleanExcerpt) ?? generateExcerpt(null, contentText);
  const rawDate = raw.get('date_published') ?? (options.contentOnly ? null : dateFromUrl(url));
  const directionSource = title ?? contentText;

  const result: ExtractionResult = {
    title,
    content: content ? (wantsHtml(options, 'content') ? content.html : contentText) : null,
    author: clean('author', cleanAuthor),
    date_published:
      rawDate && !wantsHtml(options, 'date_published') ? cleanDatePublished(rawDate) : rawDate,
    lead_image_url:
      clean('lead_image_url', (v) => cleanUrl(v, context.baseUrl)) ??
      (content ? leadImageFromContent(content.html, context.baseUrl) : null),
    dek: clean('dek', (v) => cleanDek(v, excerpt)),
    next_page_url:
      clean('next_page_url', (v) => cleanUrl(v, context.baseUrl)) ?? scoredNextPage(context),
    url,
    domain: hostnameOf(url),
    excerpt,
    word_count: countWords(contentText),
    direction: directionSource ? detectDirection(directionSource) : null,
    extended,
    rule_set: ruleSet.domain,
    content_source: content?.source ?? null,
    issues,
  };

  logger.debug(
    {
      url,
      ruleSet: ruleSet.domain,
      contentSource: result.content_source,
      wordCount: result.word_count,
      issues: issues.length,
    },
    'Extraction finished'
  );
  return result;
}

export interface ExtractAsyncOptions extends ExtractOptions {
  resolve?: ConcurrentResolveOptions;
}

/**
 * Parse, resolve and extract in one call, against an explicitly supplied registry.
 */
export class ArticleExtractor {
  readonly resolver: ExtractorResolver;

  constructor(registry: RuleSetRegistry = new Registry()) {
    this.resolver = new ExtractorResolver(registry);
  }

  extractDocument(document: Document, url: string, options: ExtractOptions = {}): ExtractionResult {
    const ref = this.resolver.resolveUrl(url, document);
    logger.debug({ url, ruleSet: ref.ruleSet.domain, source: ref.source }, 'Rule set resolved');
    return extractArticle(document, url, ref.ruleSet, options);
  }

  extract(html: string, url: string, options: ExtractOptions = {}): ExtractionResult {
    return this.extractDocument(parseDocument(html), url, options);
  }

  /** As extract(), resolving through the concurrent probe pool. */
  async extractAsync(
    html: string,
    url: string,
    options: ExtractAsyncOptions = {}
  ): Promise<ExtractionResult> {
    const document = parseDocument(html);
    const ref = await this.resolver.resolveConcurrent(
      hostnameOf(url) ?? '',
      document,
      options.resolve
    );
    logger.debug({ url, ruleSet: ref.ruleSet.domain, source: ref.source }, 'Rule set resolved');
    return extractArticle(document, url, ref.ruleSet, options);
  }
}

/**
 * Extract an article from raw HTML. Without a registry only the generic
 * rule set applies.
 */
export function extractFromHtml(
  html: string,
  url: string,
  options: ExtractOptions & { registry?: RuleSetRegistry } = {}
): ExtractionResult {
  const { registry, ...extractOptions } = options;
  return new ArticleExtractor(registry).extract(html, url, extractOptions);
}
