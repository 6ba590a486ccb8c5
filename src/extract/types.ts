/**
 * Shared types, interfaces, and constants for the extract module
 */

export const DEFAULT_EXCERPT_LENGTH = 200;
export const MAX_HTML_SIZE_BYTES = 10 * 1024 * 1024; // 10MB limit to prevent memory exhaustion

/**
 * One way of producing a field value. Alternatives of a FieldSpec are tried
 * in declared order and the first one yielding a valid value wins.
 */
export type SelectorAlternative =
  | { kind: 'literal'; value: string }
  | { kind: 'simple'; selector: string; pattern?: RegExp }
  | { kind: 'attribute'; selector: string; attribute: string }
  | { kind: 'allOf'; selectors: readonly string[] };

export interface FieldSpec {
  selectors: readonly SelectorAlternative[];
  /** Collect every match of the winning alternative, in document order */
  allowMultiple?: boolean;
  minLength?: number;
  maxLength?: number;
}

export interface TransformContext {
  document: Document;
  url: string;
}

/** Mutates a matched node in place. Returning a tag name renames the node. */
export type NodeMutator = (node: Element, context: TransformContext) => string | void;

export type Transform =
  | { kind: 'rename'; tag: string }
  | { kind: 'custom'; name?: string; mutate: NodeMutator };

export interface ContentFieldSpec extends FieldSpec {
  /** Selectors removed from the content after transforms ran */
  clean?: readonly string[];
  /** Applied in declaration order, selector -> transform */
  transforms?: Readonly<Record<string, Transform>>;
  /** Run the generic cleanup pass last (default: true) */
  defaultCleaner?: boolean;
}

export type FieldValue = string | string[];

export type IssueKind =
  | 'empty_field'
  | 'not_found'
  | 'timeout'
  | 'malformed_selector'
  | 'transform_failure';

export interface ExtractionIssue {
  kind: IssueKind;
  field?: string;
  selector?: string;
  message: string;
}

export type IssueReporter = (issue: ExtractionIssue) => void;

export type TextDirection = 'ltr' | 'rtl' | 'bidi' | '';

export const ARTICLE_FIELDS = [
  'title',
  'author',
  'date_published',
  'lead_image_url',
  'dek',
  'next_page_url',
  'excerpt',
] as const;

export type ArticleField = (typeof ARTICLE_FIELDS)[number];

export type ContentSource = 'rule-set' | 'scoring';

export interface ExtractionResult {
  title: string | null;
  content: string | null;
  author: string | null;
  date_published: string | null;
  lead_image_url: string | null;
  dek: string | null;
  next_page_url: string | null;
  url: string;
  domain: string | null;
  excerpt: string | null;
  word_count: number;
  direction: TextDirection | null;
  extended: Record<string, FieldValue | null>;

  /** Domain key of the rule set that drove extraction ('*' for generic) */
  rule_set: string;
  content_source: ContentSource | null;
  issues: ExtractionIssue[];
}
