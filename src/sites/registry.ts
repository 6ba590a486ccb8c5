/**
 * Explicitly constructed rule-set registry.
 *
 * Built once (see createDefaultRegistry) and handed to the resolver; there is
 * no module-level registry.
 */
import type { Detector, RuleSet, RuleSetRegistry } from './types.js';

export class RegistryError extends Error {
  constructor(
    message: string,
    readonly domain: string
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

export function normalizeHostname(hostname: string): string {
  return hostname.trim().toLowerCase().replace(/\.$/, '');
}

export class Registry implements RuleSetRegistry {
  private readonly byDomain = new Map<string, RuleSet>();
  private readonly probes: Detector[] = [];

  constructor(ruleSets: Iterable<RuleSet> = []) {
    for (const ruleSet of ruleSets) {
      this.register(ruleSet);
    }
  }

  /**
   * Register a rule set under its domain and every supported domain.
   * Throws RegistryError when a key already belongs to another rule set;
   * registering the same object twice is a no-op.
   */
  register(ruleSet: RuleSet): this {
    const keys = [ruleSet.domain, ...(ruleSet.supportedDomains ?? [])].map(normalizeHostname);

    for (const key of keys) {
      if (!key) {
        throw new RegistryError('Rule set domain must not be empty', ruleSet.domain);
      }
      const existing = this.byDomain.get(key);
      if (existing && existing !== ruleSet) {
        throw new RegistryError(
          `Domain ${key} is already registered by rule set ${existing.domain}`,
          key
        );
      }
    }

    for (const key of keys) {
      this.byDomain.set(key, ruleSet);
    }
    return this;
  }

  addDetector(selector: string, ruleSet: RuleSet): this {
    this.probes.push({ selector, ruleSet });
    return this;
  }

  lookup(hostname: string): RuleSet | null {
    return this.byDomain.get(normalizeHostname(hostname)) ?? null;
  }

  detectors(): readonly Detector[] {
    return this.probes;
  }

  /** Distinct rule sets, in registration order. */
  ruleSets(): RuleSet[] {
    return [...new Set(this.byDomain.values())];
  }

  /** Registered keys, aliases included. */
  domains(): string[] {
    return [...this.byDomain.keys()];
  }

  stats(): { ruleSets: number; domains: number; detectors: number } {
    return {
      ruleSets: this.ruleSets().length,
      domains: this.byDomain.size,
      detectors: this.probes.length,
    };
  }
}
