/**
 * Rule-set resolution.
 *
 * Priority, first hit wins:
 *   1. exact hostname in the registry
 *   2. base domain (last two labels) in the registry
 *   3. content-sniffing detectors, in registration order
 *   4. the generic rule set
 *
 * Resolution never fails; malformed detector selectors are skipped.
 */
import { GENERIC_DOMAIN, GENERIC_RULE_SET } from './generic.js';
import { MAX_PROBE_CONCURRENCY, runPriorityProbes, type Probe } from './probe-pool.js';
import { normalizeHostname } from './registry.js';
import type { Detector, RuleSet, RuleSetRef, RuleSetRegistry } from './types.js';
import { hostnameOf, safeMatches } from '../extract/utils.js';
import { logger } from '../logger.js';

export const DEFAULT_RESOLVE_TIMEOUT_MS = 1000;

/** Nodes a detector probe visits between yields to the event loop */
const PROBE_YIELD_INTERVAL = 250;

export interface ConcurrentResolveOptions {
  timeoutMs?: number;
  /** Capped at MAX_PROBE_CONCURRENCY */
  concurrency?: number;
  signal?: AbortSignal;
}

/** Last two labels of a hostname, e.g. news.example.com -> example.com */
export function baseDomain(hostname: string): string {
  return normalizeHostname(hostname).split('.').slice(-2).join('.');
}

function detectorMatches(document: Document, detector: Detector): boolean {
  try {
    return document.querySelector(detector.selector) !== null;
  } catch (e) {
    logger.warn(
      { selector: detector.selector, ruleSet: detector.ruleSet.domain, error: String(e) },
      'Skipping detector with malformed selector'
    );
    return false;
  }
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Walk the document checking the detector against each element.
 * Checks cancellation between node visits.
 */
async function probeDetector(
  document: Document,
  detector: Detector,
  signal: AbortSignal
): Promise<RuleSet | null> {
  let visited = 0;
  for (const el of document.querySelectorAll('*')) {
    if (signal.aborted) return null;
    const matched = safeMatches(el, detector.selector);
    if (matched === null) {
      logger.warn(
        { selector: detector.selector, ruleSet: detector.ruleSet.domain },
        'Skipping detector with malformed selector'
      );
      return null;
    }
    if (matched) return detector.ruleSet;
    if (++visited % PROBE_YIELD_INTERVAL === 0) await yieldToEventLoop();
  }
  return null;
}

export class ExtractorResolver {
  constructor(
    private readonly registry: RuleSetRegistry,
    private readonly generic: RuleSet = GENERIC_RULE_SET
  ) {}

  private genericRef(): RuleSetRef {
    return { ruleSet: this.generic, source: 'generic', key: GENERIC_DOMAIN };
  }

  /**
   * Resolve a hostname (and optionally the parsed document) to a rule set.
   */
  resolve(hostname: string, document?: Document | null): RuleSetRef {
    const host = normalizeHostname(hostname);

    if (host) {
      const exact = this.registry.lookup(host);
      if (exact) return { ruleSet: exact, source: 'hostname', key: host };

      const base = baseDomain(host);
      const byBase = base !== host ? this.registry.lookup(base) : null;
      if (byBase) return { ruleSet: byBase, source: 'base-domain', key: base };
    }

    if (document) {
      for (const detector of this.registry.detectors()) {
        if (detectorMatches(document, detector)) {
          logger.debug(
            { hostname: host, selector: detector.selector, ruleSet: detector.ruleSet.domain },
            'Rule set detected from document'
          );
          return { ruleSet: detector.ruleSet, source: 'detector', key: detector.selector };
        }
      }
    }

    return this.genericRef();
  }

  /** Resolve from a full URL; unparseable URLs get the generic rule set. */
  resolveUrl(url: string, document?: Document | null): RuleSetRef {
    const hostname = hostnameOf(url);
    return this.resolve(hostname ?? '', document);
  }

  /**
   * Same priority chain as resolve(), with the tiers probed in a bounded
   * pool under a shared deadline. On timeout the best settled hit wins,
   * otherwise the generic rule set.
   */
  async resolveConcurrent(
    hostname: string,
    document: Document | null,
    options: ConcurrentResolveOptions = {}
  ): Promise<RuleSetRef> {
    const host = normalizeHostname(hostname);
    const base = baseDomain(host);
    const probes: Probe<RuleSetRef>[] = [];

    if (host) {
      probes.push({
        label: `hostname:${host}`,
        run: async () => {
          const ruleSet = this.registry.lookup(host);
          return ruleSet ? { ruleSet, source: 'hostname', key: host } : null;
        },
      });
      if (base !== host) {
        probes.push({
          label: `base-domain:${base}`,
          run: async () => {
            const ruleSet = this.registry.lookup(base);
            return ruleSet ? { ruleSet, source: 'base-domain', key: base } : null;
          },
        });
      }
    }

    if (document) {
      for (const detector of this.registry.detectors()) {
        probes.push({
          label: `detector:${detector.selector}`,
          run: async (signal) => {
            const ruleSet = await probeDetector(document, detector, signal);
            return ruleSet ? { ruleSet, source: 'detector', key: detector.selector } : null;
          },
        });
      }
    }

    const outcome = await runPriorityProbes(probes, {
      concurrency: Math.min(options.concurrency ?? MAX_PROBE_CONCURRENCY, MAX_PROBE_CONCURRENCY),
      timeoutMs: options.timeoutMs ?? DEFAULT_RESOLVE_TIMEOUT_MS,
      signal: options.signal,
    });

    if (outcome.timedOut || outcome.aborted) {
      logger.warn(
        {
          hostname: host,
          settled: outcome.settled,
          probes: probes.length,
          winner: outcome.winner?.label ?? null,
          aborted: outcome.aborted,
        },
        'Rule set resolution stopped early'
      );
    }

    return outcome.winner?.value ?? this.genericRef();
  }
}
