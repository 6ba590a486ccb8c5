/**
 * folio-extract - Article extraction from HTML with per-site rule sets and
 * a content-scoring fallback.
 *
 * @module folio-extract
 */
export {
  ArticleExtractor,
  extractArticle,
  extractFromHtml,
} from './extract/article-extractor.js';
export { parseDocument } from './extract/document.js';
export { selectField } from './extract/selector-engine.js';
export { processContent, processContentHtml } from './extract/transform-pipeline.js';
export { extractMainContent, SCORING_PASSES, ScoringTimeoutError } from './extract/scoring.js';
export { nextPageFromLinks } from './extract/next-page.js';
export { DEFAULT_SCORING_CONFIG, resolveScoringConfig } from './extract/scoring-config.js';
export { Registry, RegistryError } from './sites/registry.js';
export { ExtractorResolver } from './sites/resolver.js';
export { GENERIC_RULE_SET } from './sites/generic.js';
export { createDefaultRegistry, loadJsonRuleSets } from './sites/site-config.js';
export { parseRuleSetJson } from './sites/rule-set-schema.js';
export {
  allOf,
  attr,
  content,
  field,
  literal,
  meta,
  multiple,
  mutate,
  renameTo,
  select,
} from './sites/dsl.js';
export type { ExtractOptions, ExtractAsyncOptions } from './extract/article-extractor.js';
export type { Candidate, ScoringPass } from './extract/scoring.js';
export type { NextPageOptions } from './extract/next-page.js';
export type { ScoringConfig } from './extract/scoring-config.js';
export type { ConcurrentResolveOptions } from './sites/resolver.js';
export type { RegistryOptions } from './sites/site-config.js';
export type {
  ContentFieldSpec,
  ExtractionIssue,
  ExtractionResult,
  FieldSpec,
  FieldValue,
  SelectorAlternative,
  Transform,
} from './extract/types.js';
export type { Detector, RuleSet, RuleSetRef, RuleSetRegistry } from './sites/types.js';
