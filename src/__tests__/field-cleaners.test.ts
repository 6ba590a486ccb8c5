import { describe, it, expect } from 'vitest';
import {
  cleanAuthor,
  cleanDatePublished,
  cleanDek,
  cleanExcerpt,
  cleanTitle,
  cleanUrl,
} from '../extract/field-cleaners.js';

const URL = 'https://example.com/news/story';
const ISO = '2024-03-05T10:00:00.000Z';

describe('cleanTitle', () => {
  it('drops a trailing site name', () => {
    expect(cleanTitle('Story headline | Example', URL)).toBe('Story headline');
  });

  it('drops a leading site name', () => {
    expect(cleanTitle('Example - Story headline', URL)).toBe('Story headline');
  });

  it('keeps separators that do not name the site', () => {
    expect(cleanTitle('Before - After', URL)).toBe('Before - After');
  });

  it('strips markup and whitespace', () => {
    expect(cleanTitle('<b>Bold</b>   title', URL)).toBe('Bold title');
  });

  it('returns null for empty titles', () => {
    expect(cleanTitle('   ', URL)).toBeNull();
  });
});

describe('cleanAuthor', () => {
  it('strips a by-line prefix', () => {
    expect(cleanAuthor('By Jane Doe')).toBe('Jane Doe');
    expect(cleanAuthor('Posted by: Sam Smith')).toBe('Sam Smith');
  });

  it('leaves names that merely start with "by"', () => {
    expect(cleanAuthor('Byron Kay')).toBe('Byron Kay');
  });

  it('returns null when only the prefix remains', () => {
    expect(cleanAuthor('By ')).toBeNull();
  });
});

describe('cleanDatePublished', () => {
  it('normalizes ISO strings', () => {
    expect(cleanDatePublished('2024-03-05T10:00:00Z')).toBe(ISO);
  });

  it('reads Unix timestamps in seconds and milliseconds', () => {
    expect(cleanDatePublished('1709632800')).toBe(ISO);
    expect(cleanDatePublished('1709632800000')).toBe(ISO);
  });

  it('reads date-times without a zone as UTC', () => {
    expect(cleanDatePublished('2024-03-05 10:00')).toBe(ISO);
    expect(cleanDatePublished('2024-03-05T10:00:00')).toBe(ISO);
    expect(cleanDatePublished('March 5, 2024 10:00')).toBe(ISO);
  });

  it('applies an explicit offset', () => {
    expect(cleanDatePublished('2024-03-05T12:00:00+02:00')).toBe(ISO);
  });

  it('strips a leading label', () => {
    expect(cleanDatePublished('Published: 2024-03-05T10:00:00Z')).toBe(ISO);
  });

  it('returns null for unparseable values', () => {
    expect(cleanDatePublished('not a date')).toBeNull();
  });
});

describe('cleanUrl', () => {
  it('resolves relative URLs', () => {
    expect(cleanUrl(' /next ', 'https://example.com/a/')).toBe('https://example.com/next');
  });

  it('rejects non-http URLs', () => {
    expect(cleanUrl('mailto:desk@example.com', URL)).toBeNull();
  });
});

describe('cleanDek', () => {
  it('rejects implausibly short deks', () => {
    expect(cleanDek('Hi', null)).toBeNull();
  });

  it('rejects a dek that repeats the excerpt opening', () => {
    expect(
      cleanDek(
        'One two three four five six seven eight nine ten eleven',
        'One two three four five six seven eight nine ten and more besides'
      )
    ).toBeNull();
  });

  it('keeps a distinct dek', () => {
    expect(cleanDek('What happened, and why', 'The council met on Tuesday')).toBe(
      'What happened, and why'
    );
  });
});

describe('cleanExcerpt', () => {
  it('strips markup and normalizes whitespace', () => {
    expect(cleanExcerpt('<p>Some   text</p>')).toBe('Some text');
  });
});
