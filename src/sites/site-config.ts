/**
 * Rule-set configuration: JSON rule sets plus the built-in examples, assembled
 * into a Registry.
 *
 * JSON rule sets are read from config/rulesets.json, or from the file named
 * by the FOLIO_RULESETS environment variable.
 */
import { readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

import { DEFAULT_DETECTORS, MINIMAL_DEFAULTS } from './minimal-defaults.js';
import { Registry, RegistryError } from './registry.js';
import { parseRuleSetJson, type ParsedRuleSets } from './rule-set-schema.js';
import type { RuleSet } from './types.js';
import { logger } from '../logger.js';

export const RULESETS_ENV_VAR = 'FOLIO_RULESETS';

/** Path of the JSON rule-set file: env override, else the bundled config. */
export function resolveRuleSetsPath(): string {
  const fromEnv = process.env[RULESETS_ENV_VAR];
  if (fromEnv) return resolve(fromEnv);

  const __dirname = dirname(fileURLToPath(import.meta.url));
  return join(__dirname, '..', '..', 'config', 'rulesets.json');
}

function emptyRuleSets(): ParsedRuleSets {
  return { ruleSets: [], detectors: [], errors: [] };
}

/**
 * Load and validate JSON rule sets. A missing or unparseable file yields no
 * rule sets; invalid entries are logged and skipped.
 */
export function loadJsonRuleSets(path: string = resolveRuleSetsPath()): ParsedRuleSets {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    logger.debug({ path, error: String(e) }, 'No JSON rule sets loaded');
    return emptyRuleSets();
  }

  const parsed = parseRuleSetJson(raw);
  for (const error of parsed.errors) {
    logger.warn({ path, error }, 'Skipping invalid rule set');
  }
  return parsed;
}

export interface RegistryOptions {
  /** JSON rule-set file; defaults to resolveRuleSetsPath(). Pass null to skip. */
  path?: string | null;
  /** Register the built-in example rule sets and detectors (default: true) */
  includeDefaults?: boolean;
  /** Extra rule sets registered after the JSON ones */
  ruleSets?: readonly RuleSet[];
}

function registerSafely(registry: Registry, ruleSet: RuleSet): boolean {
  try {
    registry.register(ruleSet);
    return true;
  } catch (e) {
    if (!(e instanceof RegistryError)) throw e;
    logger.warn({ domain: e.domain, ruleSet: ruleSet.domain }, e.message);
    return false;
  }
}

/**
 * Build the registry used at process start. Built-in examples are registered
 * first; a later rule set claiming an already-registered domain is skipped.
 */
export function createDefaultRegistry(options: RegistryOptions = {}): Registry {
  const registry = new Registry();

  if (options.includeDefaults ?? true) {
    for (const ruleSet of MINIMAL_DEFAULTS) registerSafely(registry, ruleSet);
    for (const { selector, ruleSet } of DEFAULT_DETECTORS) registry.addDetector(selector, ruleSet);
  }

  const json = options.path === null ? emptyRuleSets() : loadJsonRuleSets(options.path);
  const accepted = new Set(json.ruleSets.filter((ruleSet) => registerSafely(registry, ruleSet)));
  for (const { selector, ruleSet } of json.detectors) {
    if (accepted.has(ruleSet)) registry.addDetector(selector, ruleSet);
  }

  for (const ruleSet of options.ruleSets ?? []) registerSafely(registry, ruleSet);

  logger.debug(registry.stats(), 'Rule-set registry ready');
  return registry;
}
