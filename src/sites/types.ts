/**
 * Rule-set types shared by the registry, resolver and loaders
 */
import type { ArticleField, ContentFieldSpec, FieldSpec } from '../extract/types.js';

/**
 * Declarative extraction rules for one site. `domain` is the registry key;
 * `supportedDomains` are aliases resolving to the same object.
 */
export type RuleSet = {
  domain: string;
  supportedDomains?: readonly string[];
  content?: ContentFieldSpec;
  /** Site-specific fields reported under `extended` */
  extend?: Readonly<Record<string, FieldSpec>>;
} & { [F in ArticleField]?: FieldSpec };

/** Content-sniffing probe: the rule set applies when `selector` matches the document. */
export interface Detector {
  selector: string;
  ruleSet: RuleSet;
}

export interface RuleSetRegistry {
  lookup(hostname: string): RuleSet | null;
  /** Probes in registration order */
  detectors(): readonly Detector[];
}

export type ResolutionSource = 'hostname' | 'base-domain' | 'detector' | 'generic';

export interface RuleSetRef {
  ruleSet: RuleSet;
  source: ResolutionSource;
  /** Hostname, base domain or probe selector that matched; '*' for generic */
  key: string;
}
