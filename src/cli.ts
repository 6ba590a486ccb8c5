#!/usr/bin/env node
/**
 * CLI entry point for folio-extract
 */
import { fileURLToPath } from 'url';
import { existsSync, readFileSync, realpathSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { ArticleExtractor, type ExtractOptions } from './extract/article-extractor.js';
import { createDefaultRegistry } from './sites/site-config.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return typeof pkg.version === 'string' ? pkg.version : 'unknown';
    }
    return 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export interface CliOptions {
  file: string;
  url: string;
  contentOnly: boolean;
  forceFallback: boolean;
  fallback: boolean;
  /** Alternate rule-set JSON file */
  rulesets?: string;
  /** Resolve through the concurrent probe pool with this deadline */
  timeout?: number;
  /** Fields to return as HTML instead of text */
  html: string[];
  /** Fields to return as text instead of HTML */
  text: string[];
}

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  let url: string | undefined;
  let contentOnly = false;
  let forceFallback = false;
  let fallback = true;
  let rulesets: string | undefined;
  let timeout: number | undefined;
  const html: string[] = [];
  const text: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--url':
        if (i + 1 >= args.length) return { kind: 'error', message: '--url requires a value' };
        url = args[++i];
        break;
      case '--content-only':
        contentOnly = true;
        break;
      case '--force-fallback':
        forceFallback = true;
        break;
      case '--no-fallback':
        fallback = false;
        break;
      case '--rulesets':
        if (i + 1 >= args.length) return { kind: 'error', message: '--rulesets requires a value' };
        rulesets = args[++i];
        break;
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--timeout requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--timeout must be a positive integer (milliseconds)' };
        timeout = v;
        break;
      }
      case '--html':
        if (i + 1 >= args.length) return { kind: 'error', message: '--html requires a value' };
        html.push(...splitList(args[++i]));
        break;
      case '--text':
        if (i + 1 >= args.length) return { kind: 'error', message: '--text requires a value' };
        text.push(...splitList(args[++i]));
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <file> argument' };
  }
  if (!url) {
    return { kind: 'error', message: 'Missing required --url <url>' };
  }
  if (!/^https?:\/\//i.test(url)) {
    return { kind: 'error', message: 'URL must start with http:// or https://' };
  }

  return {
    kind: 'ok',
    opts: {
      file: positional[0],
      url,
      contentOnly,
      forceFallback,
      fallback,
      rulesets,
      timeout,
      html,
      text,
    },
    warnings,
  };
}

/** Map CLI flags onto extraction options. */
export function toExtractOptions(opts: CliOptions): ExtractOptions {
  const extractHTML: Record<string, boolean> = {};
  for (const field of opts.html) extractHTML[field] = true;
  for (const field of opts.text) extractHTML[field] = false;

  return {
    contentOnly: opts.contentOnly,
    forceFallback: opts.forceFallback,
    fallback: opts.fallback,
    extractHTML,
  };
}

function printUsage(): void {
  console.log(`Usage: folio-extract <file.html> --url <url> [options]

Extracts article fields from a saved HTML page and prints them as JSON.

Options:
  --url <url>         URL the page was fetched from (required; picks the rule set)
  --content-only      Extract content and the fields derived from it only
  --force-fallback    Score the page for content even when site rules match
  --no-fallback       Do not fall back to generic rules for empty fields
  --rulesets <path>   Rule-set JSON file (env: FOLIO_RULESETS)
  --timeout <ms>      Resolve the rule set concurrently with this deadline
  --html <fields>     Return these fields as HTML (comma-separated)
  --text <fields>     Return these fields as text (comma-separated, e.g. content)
  -v, --version       Show version number
  -h, --help          Show this help message`);
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const result = parseArgs(args);

  switch (result.kind) {
    case 'version':
      console.log(`folio-extract ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  const filePath = resolve(opts.file);
  if (!existsSync(filePath)) {
    console.error(`Error: File not found: ${filePath}`);
    return 1;
  }

  const html = readFileSync(filePath, 'utf-8');
  const registry = createDefaultRegistry(opts.rulesets ? { path: resolve(opts.rulesets) } : {});
  const extractor = new ArticleExtractor(registry);
  const extractOptions = toExtractOptions(opts);

  const article =
    opts.timeout !== undefined
      ? await extractor.extractAsync(html, opts.url, {
          ...extractOptions,
          resolve: { timeoutMs: opts.timeout },
        })
      : extractor.extract(html, opts.url, extractOptions);

  console.log(JSON.stringify(article, null, 2));
  return article.content === null ? 1 : 0;
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
