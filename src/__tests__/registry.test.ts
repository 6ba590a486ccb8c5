import { describe, it, expect } from 'vitest';
import { normalizeHostname, Registry, RegistryError } from '../sites/registry.js';
import type { RuleSet } from '../sites/types.js';

const blog: RuleSet = {
  domain: 'blog.example.org',
  supportedDomains: ['www.blog.example.org'],
};
const shop: RuleSet = { domain: 'shop.example.net' };

describe('normalizeHostname', () => {
  it('trims, lower-cases and drops a trailing dot', () => {
    expect(normalizeHostname(' Example.COM. ')).toBe('example.com');
  });
});

describe('Registry', () => {
  it('looks up rule sets by domain and alias', () => {
    const registry = new Registry([blog, shop]);
    expect(registry.lookup('blog.example.org')).toBe(blog);
    expect(registry.lookup('WWW.Blog.Example.org.')).toBe(blog);
    expect(registry.lookup('shop.example.net')).toBe(shop);
  });

  it('returns null for unknown hosts', () => {
    expect(new Registry([blog]).lookup('other.example.com')).toBeNull();
  });

  it('throws when two rule sets claim one domain', () => {
    const registry = new Registry([blog]);
    const clash: RuleSet = { domain: 'other.example.org', supportedDomains: ['www.blog.example.org'] };

    expect(() => registry.register(clash)).toThrow(RegistryError);
    try {
      registry.register(clash);
    } catch (e) {
      expect(e).toBeInstanceOf(RegistryError);
      if (e instanceof RegistryError) expect(e.domain).toBe('www.blog.example.org');
    }
    // nothing of the rejected rule set was registered
    expect(registry.lookup('other.example.org')).toBeNull();
  });

  it('accepts the same rule set twice', () => {
    const registry = new Registry([blog]);
    expect(() => registry.register(blog)).not.toThrow();
    expect(registry.stats()).toEqual({ ruleSets: 1, domains: 2, detectors: 0 });
  });

  it('rejects an empty domain', () => {
    expect(() => new Registry([{ domain: '  ' }])).toThrow('Rule set domain must not be empty');
  });

  it('keeps detectors in registration order', () => {
    const registry = new Registry([blog, shop])
      .addDetector('meta[name="generator"][value="A"]', blog)
      .addDetector('meta[name="generator"][value="B"]', shop);

    expect(registry.detectors().map((d) => d.ruleSet)).toEqual([blog, shop]);
  });

  it('lists distinct rule sets and every key', () => {
    const registry = new Registry([blog, shop]);
    expect(registry.ruleSets()).toEqual([blog, shop]);
    expect(registry.domains()).toEqual([
      'blog.example.org',
      'www.blog.example.org',
      'shop.example.net',
    ]);
  });
});
