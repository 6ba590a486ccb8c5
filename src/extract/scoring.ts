/**
 * Generic main-content detection by node scoring.
 *
 * Used when a rule set has no content selector that matches. Works on a
 * private clone of the document:
 *   1. strip unlikely, link-heavy nodes
 *   2. seed scores on paragraph-like nodes
 *   3. propagate to parent and grandparent
 *   4. pick the top candidate (earliest in document order on ties)
 *   5. merge qualifying siblings
 *   6. sweep link-heavy blocks from the merged subtree
 *
 * A pass whose content text comes up short is retried with stripping,
 * class weighting and the sweep switched off in turn.
 */
import { cloneDocument } from './document.js';
import { resolveScoringConfig, type ScoringConfig } from './scoring-config.js';
import { renameElement } from './transform-pipeline.js';
import { directText, linkDensity, normalizeSpaces, textLength } from './utils.js';
import { logger } from '../logger.js';

export interface ScoredNode {
  element: Element;
  baseScore: number;
  contentScore: number;
  linkDensity: number;
}

export interface ScoringPass {
  stripUnlikely: boolean;
  weightNodes: boolean;
  cleanConditionally: boolean;
}

export interface Candidate {
  top: ScoredNode;
  /** The top node alone, or a div wrapping it and its merged siblings */
  content: Element;
  mergedSiblings: number;
  /** Options of the pass that produced this candidate */
  pass: ScoringPass;
}

/** Strictest first; each later pass drops one more step. */
export const SCORING_PASSES: readonly ScoringPass[] = [
  { stripUnlikely: true, weightNodes: true, cleanConditionally: true },
  { stripUnlikely: false, weightNodes: true, cleanConditionally: true },
  { stripUnlikely: false, weightNodes: false, cleanConditionally: true },
  { stripUnlikely: false, weightNodes: false, cleanConditionally: false },
];

export class ScoringTimeoutError extends Error {
  constructor(readonly budgetMs: number) {
    super(`Content scoring exceeded its ${budgetMs}ms budget`);
    this.name = 'ScoringTimeoutError';
  }
}

const UNLIKELY_CANDIDATES = new RegExp(
  [
    'ad-break',
    'ad-banner',
    'adbox',
    'advert',
    'addthis',
    'agegate',
    'aux',
    'blogger-labels',
    'combx',
    'comment',
    'conversation',
    'disqus',
    'entry-unrelated',
    'extra',
    'foot',
    'header',
    'hidden',
    'loader',
    'login',
    'menu',
    'meta',
    'nav',
    'outbrain',
    'pager',
    'pagination',
    'predicta',
    'popup',
    'printfriendly',
    'related',
    'remove',
    'remark',
    'rss',
    'share',
    'shoutbox',
    'sidebar',
    'sociable',
    'sponsor',
    'taboola',
    'tools',
  ].join('|'),
  'i'
);

const LIKELY_CANDIDATES = new RegExp(
  [
    'and',
    'article',
    'body',
    'blogindex',
    'column',
    'content',
    'entry-content-asset',
    'format',
    'hfeed',
    'hentry',
    'hatom',
    'main',
    'page',
    'posts',
    'shadow',
  ].join('|'),
  'i'
);

export const POSITIVE_CLASS_HINTS =
  /article|articlecontent|instapaper_body|blog|body|content|entry-content-asset|entry|hentry|main|Normal|page|pagination|permalink|post|story|text|[-_]copy|\Bcopy/i;
export const NEGATIVE_CLASS_HINTS =
  /adbox|advert|author|bio|bookmark|bottom|byline|clear|com-|combx|comment|comment\B|contact|copy|credit|crumb|date|deck|excerpt|featured|foot|footer|footnote|graf|head|info|infotext|instapaper_ignore|jump|linebreak|link|masthead|media|meta|modal|outbrain|promo|pr_|related|respond|roundcontent|scroll|secondary|share|shopping|shoutbox|side|sidebar|sponsor|stamp|sub|summary|tags|tools|widget/i;
const PHOTO_HINTS = /figure|photo|image|caption/i;
const READABILITY_ASSET = /entry-content-asset/i;
const CLASS_WEIGHT = 25;
const PHOTO_WEIGHT = 10;

const NON_CONTENT_SELECTOR = 'script, style, noscript, template';
const PARAGRAPH_TAGS = new Set(['p', 'pre', 'td']);
const BLOCK_TAGS = new Set([
  'div',
  'section',
  'article',
  'main',
  'blockquote',
  'li',
  'dd',
  'figure',
  'center',
]);
const SWEEP_SELECTOR = 'div, section, aside, nav, header, footer, form, ul, ol, dl, table, p';
const MEDIA_SELECTOR = 'img, picture, video';

class Deadline {
  private readonly expiresAt: number;

  constructor(private readonly budgetMs: number) {
    this.expiresAt = Date.now() + budgetMs;
  }

  check(): void {
    if (Date.now() >= this.expiresAt) {
      throw new ScoringTimeoutError(this.budgetMs);
    }
  }
}

/**
 * Base score of a paragraph-like node:
 * 1 + commas + length bonus, scaled down by its link density.
 */
export function scoreParagraph(
  text: string,
  density: number,
  config: ScoringConfig = resolveScoringConfig()
): number {
  const commas = (text.match(/,/g) ?? []).length;
  const lengthBonus = Math.min(
    config.maxLengthBonus,
    Math.floor(text.length / config.charsPerLengthPoint)
  );
  return (1 + commas + lengthBonus) * (1 - density);
}

/** Whether tag, class or id look like page chrome rather than article body. */
export function isUnlikelyCandidate(el: Element): boolean {
  const signature = [el.tagName.toLowerCase(), el.getAttribute('class'), el.getAttribute('id')]
    .filter(Boolean)
    .join(' ');
  return UNLIKELY_CANDIDATES.test(signature) && !LIKELY_CANDIDATES.test(signature);
}

/**
 * Score adjustment from an element's id and class. The id decides first;
 * the class only counts when the id said nothing.
 */
export function classWeight(el: Element): number {
  let score = 0;
  const id = el.getAttribute('id');
  if (id) {
    if (POSITIVE_CLASS_HINTS.test(id)) score += CLASS_WEIGHT;
    if (NEGATIVE_CLASS_HINTS.test(id)) score -= CLASS_WEIGHT;
  }

  const className = el.getAttribute('class');
  if (className) {
    if (score === 0) {
      if (POSITIVE_CLASS_HINTS.test(className)) score += CLASS_WEIGHT;
      if (NEGATIVE_CLASS_HINTS.test(className)) score -= CLASS_WEIGHT;
    }
    if (PHOTO_HINTS.test(className)) score += PHOTO_WEIGHT;
    if (READABILITY_ASSET.test(className)) score += CLASS_WEIGHT;
  }
  return score;
}

function stripUnlikely(body: Element, config: ScoringConfig, deadline: Deadline): void {
  for (const el of [...body.querySelectorAll('*')]) {
    deadline.check();
    if (!body.contains(el)) continue;
    if (isUnlikelyCandidate(el) && linkDensity(el) > config.unlikelyLinkDensity) {
      el.remove();
    }
  }
}

class ScoreTable {
  private readonly nodes = new Map<Element, ScoredNode>();

  constructor(private readonly weightNodes: boolean) {}

  entry(element: Element): ScoredNode {
    let node = this.nodes.get(element);
    if (!node) {
      node = {
        element,
        baseScore: 0,
        contentScore: this.weightNodes ? classWeight(element) : 0,
        linkDensity: linkDensity(element),
      };
      this.nodes.set(element, node);
    }
    return node;
  }

  get(element: Element): ScoredNode | undefined {
    return this.nodes.get(element);
  }

  get size(): number {
    return this.nodes.size;
  }
}

function seedText(el: Element, config: ScoringConfig): string | null {
  const tag = el.tagName.toLowerCase();
  if (PARAGRAPH_TAGS.has(tag)) {
    const text = normalizeSpaces(el.textContent ?? '');
    return text.length >= config.minParagraphLength ? text : null;
  }
  if (BLOCK_TAGS.has(tag)) {
    const text = directText(el);
    return text.length >= config.minParagraphLength ? text : null;
  }
  return null;
}

function seedAndPropagate(
  body: Element,
  table: ScoreTable,
  config: ScoringConfig,
  deadline: Deadline
): void {
  for (const el of body.querySelectorAll('*')) {
    deadline.check();
    const text = seedText(el, config);
    if (text === null) continue;

    const node = table.entry(el);
    const base = scoreParagraph(text, node.linkDensity, config);
    node.baseScore = base;
    node.contentScore += base;

    const parent = el.parentElement;
    if (!parent || parent.tagName.toLowerCase() === 'html') continue;
    table.entry(parent).contentScore += base * config.parentWeight;

    const grandparent = parent.parentElement;
    if (!grandparent || grandparent.tagName.toLowerCase() === 'html') continue;
    table.entry(grandparent).contentScore += base * config.grandparentWeight;
  }
}

function findTopCandidate(body: Element, table: ScoreTable): ScoredNode | null {
  let top: ScoredNode | null = null;
  for (const el of [body, ...body.querySelectorAll('*')]) {
    const node = table.get(el);
    // strict comparison keeps the earliest node on ties
    if (node && node.contentScore > (top?.contentScore ?? 0)) {
      top = node;
    }
  }
  return top;
}

function isSubstantialParagraph(el: Element, config: ScoringConfig): boolean {
  return (
    el.tagName.toLowerCase() === 'p' &&
    textLength(el) > config.substantialParagraphLength &&
    linkDensity(el) < config.substantialParagraphLinkDensity
  );
}

function mergeSiblings(
  top: ScoredNode,
  table: ScoreTable,
  config: ScoringConfig
): { content: Element; merged: number } {
  const parent = top.element.parentElement;
  if (!parent || top.element.tagName.toLowerCase() === 'body') {
    return { content: top.element, merged: 0 };
  }

  const threshold = top.contentScore * config.siblingScoreRatio;
  const kept = [...parent.children].filter((sibling) => {
    if (sibling === top.element) return true;
    const score = table.get(sibling)?.contentScore ?? 0;
    return (score > 0 && score >= threshold) || isSubstantialParagraph(sibling, config);
  });

  if (kept.length === 1) {
    return { content: top.element, merged: 0 };
  }

  const wrapper = top.element.ownerDocument.createElement('div');
  for (const el of kept) {
    wrapper.appendChild(el);
  }
  return { content: wrapper, merged: kept.length - 1 };
}

function isCaption(el: Element, config: ScoringConfig): boolean {
  const inFigure = el.tagName.toLowerCase() === 'figcaption' || el.closest('figure') !== null;
  return inFigure && textLength(el) < config.captionMaxLength;
}

function sweepLinkHeavy(content: Element, config: ScoringConfig, deadline: Deadline): void {
  for (const el of [...content.querySelectorAll(SWEEP_SELECTOR)]) {
    deadline.check();
    if (!content.contains(el)) continue;
    if (linkDensity(el) <= config.sweepLinkDensity) continue;
    if (el.querySelector(MEDIA_SELECTOR) || isCaption(el, config)) continue;
    el.remove();
  }
}

function scorePass(
  document: Document,
  pass: ScoringPass,
  config: ScoringConfig,
  deadline: Deadline
): Candidate | null {
  const working = cloneDocument(document);
  const body = working.body;
  if (!body) return null;

  for (const el of working.querySelectorAll(NON_CONTENT_SELECTOR)) {
    el.remove();
  }

  if (pass.stripUnlikely) stripUnlikely(body, config, deadline);

  const table = new ScoreTable(pass.weightNodes);
  seedAndPropagate(body, table, config, deadline);

  const top = findTopCandidate(body, table);
  if (!top) {
    logger.debug({ scored: table.size, pass }, 'No content candidate found');
    return null;
  }

  const merge = mergeSiblings(top, table, config);
  let content = merge.content;
  if (content === body) {
    // the page body itself comes back as a div
    content = renameElement(body, 'div');
    top.element = content;
  }
  if (pass.cleanConditionally) sweepLinkHeavy(content, config, deadline);

  return { top, content, mergedSiblings: merge.merged, pass };
}

/**
 * Locate the main content of a document. Returns null when nothing scores.
 * Throws ScoringTimeoutError when the configured budget runs out.
 *
 * Passes run strictest first. The first whose content text reaches
 * `minContentLength` wins; when none does, the strictest pass that found
 * anything is kept.
 */
export function extractMainContent(
  document: Document,
  overrides?: Partial<ScoringConfig>
): Candidate | null {
  const config = resolveScoringConfig(overrides);
  const deadline = new Deadline(config.deadlineMs);

  let fallback: Candidate | null = null;
  for (const pass of SCORING_PASSES) {
    const candidate = scorePass(document, pass, config, deadline);
    if (!candidate) continue;
    if (!fallback) fallback = candidate;
    if (textLength(candidate.content) >= config.minContentLength) {
      return selected(candidate);
    }
  }
  return fallback ? selected(fallback) : null;
}

function selected(candidate: Candidate): Candidate {
  logger.debug(
    {
      tag: candidate.top.element.tagName.toLowerCase(),
      score: candidate.top.contentScore,
      merged: candidate.mergedSiblings,
      pass: candidate.pass,
    },
    'Selected content candidate'
  );
  return candidate;
}
