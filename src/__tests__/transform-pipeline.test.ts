import { describe, it, expect, vi } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { createFragmentContainer } from '../extract/document.js';
import {
  processContent,
  processContentHtml,
  renameElement,
} from '../extract/transform-pipeline.js';
import type { ExtractionIssue, TransformContext } from '../extract/types.js';
import { mutate, renameTo } from '../sites/dsl.js';

const URL = 'https://example.com/post';

describe('renameElement', () => {
  it('keeps attributes and children', () => {
    const { container } = createFragmentContainer('<p class="a" id="b">t <em>x</em></p>');
    const p = container.querySelector('p');
    if (!p) throw new Error('fixture missing');

    renameElement(p, 'div');

    expect(container.innerHTML).toBe('<div class="a" id="b">t <em>x</em></div>');
  });

  it('rejects invalid tag names', () => {
    const { container } = createFragmentContainer('<p>t</p>');
    const p = container.querySelector('p');
    if (!p) throw new Error('fixture missing');
    expect(() => renameElement(p, '1bad')).toThrow('Invalid tag name: 1bad');
  });
});

describe('processContentHtml', () => {
  it('applies transforms before the clean list', () => {
    const html = processContentHtml('<div class="c"><h1>X</h1><div class="ad">Y</div></div>', {
      clean: ['.ad'],
      transforms: { h1: renameTo('h2') },
      defaultCleaner: false,
      url: URL,
    });
    expect(html).toBe('<div class="c"><h2>X</h2></div>');
  });

  it('runs transforms in declaration order, re-querying each time', () => {
    const html = processContentHtml('<h1>a</h1><h2>b</h2>', {
      transforms: { h1: renameTo('h2'), h2: renameTo('h3') },
      defaultCleaner: false,
      url: URL,
    });
    expect(html).toBe('<h3>a</h3><h3>b</h3>');
  });

  it('renames a node when a custom transform returns a tag', () => {
    const html = processContentHtml('<div class="q">t</div>', {
      transforms: { '.q': mutate('to-section', () => 'section') },
      defaultCleaner: false,
      url: URL,
    });
    expect(html).toBe('<section class="q">t</section>');
  });

  it('skips nodes detached by an earlier mutation', () => {
    const drop = vi.fn((node: Element) => {
      node.remove();
    });
    const html = processContentHtml('<div class="outer"><div class="inner">x</div></div>', {
      transforms: { div: mutate('drop', drop) },
      defaultCleaner: false,
      url: URL,
    });
    expect(drop).toHaveBeenCalledTimes(1);
    expect(html).toBe('');
  });

  it('hands the base URL and document to custom transforms', () => {
    const seen: TransformContext[] = [];
    processContentHtml('<p>t</p>', {
      transforms: {
        p: mutate('record', (_node, context) => {
          seen.push(context);
        }),
      },
      url: URL,
    });
    expect(seen).toHaveLength(1);
    expect(seen[0]?.url).toBe(URL);
  });

  it('reports a failing transform and leaves the node unchanged', () => {
    const issues: ExtractionIssue[] = [];
    const html = processContentHtml('<p>t</p>', {
      transforms: { p: renameTo('1bad') },
      defaultCleaner: false,
      url: URL,
      report: (issue) => issues.push(issue),
    });

    expect(html).toBe('<p>t</p>');
    expect(issues).toEqual([
      {
        kind: 'transform_failure',
        field: 'content',
        selector: 'p',
        message: 'rename:1bad: Error: Invalid tag name: 1bad',
      },
    ]);
  });

  it('reports a throwing custom transform by name', () => {
    const issues: ExtractionIssue[] = [];
    processContentHtml('<p>t</p>', {
      transforms: {
        p: mutate('boom', () => {
          throw new Error('nope');
        }),
      },
      url: URL,
      report: (issue) => issues.push(issue),
    });
    expect(issues[0]?.message).toBe('custom:boom: Error: nope');
  });

  it('skips malformed clean selectors and applies the rest', () => {
    const issues: ExtractionIssue[] = [];
    const html = processContentHtml('<p>keep</p><div class="ad">drop</div>', {
      clean: ['p:bogus-pseudo', '.ad'],
      defaultCleaner: false,
      url: URL,
      report: (issue) => issues.push(issue),
    });

    expect(html).toBe('<p>keep</p>');
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ kind: 'malformed_selector', selector: 'p:bogus-pseudo' });
  });

  it('runs the default cleaner last unless disabled', () => {
    const input = '<p>Keep</p><script>track()</script>';
    expect(processContentHtml(input, { url: URL })).toBe('<p>Keep</p>');
    expect(processContentHtml(input, { url: URL, defaultCleaner: false })).toBe(input);
  });

  it('is idempotent', () => {
    const options = { transforms: { h1: renameTo('h2') }, clean: ['.ad'], url: URL };
    const once = processContentHtml(
      '<div><h1>Head</h1><p>Hello   world</p><a href="/x">link</a><span class="ad">ad</span></div>',
      options
    );

    expect(once).toBe(
      '<div><h2>Head</h2><p>Hello world</p><a href="https://example.com/x">link</a></div>'
    );
    expect(processContentHtml(once, options)).toBe(once);
  });
});

describe('processContent', () => {
  it('mutates and returns the container it was given', () => {
    const { container } = createFragmentContainer('<h1>t</h1>');
    const result = processContent(container, {
      transforms: { h1: renameTo('h2') },
      url: URL,
    });
    expect(result).toBe(container);
    expect(container.innerHTML).toBe('<h2>t</h2>');
  });
});
