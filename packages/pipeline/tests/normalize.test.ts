import { describe, it, expect } from 'vitest';
import {
  clean,
  decodeHtmlEntities,
  extractSummary,
  normalizeWhitespace,
  stripHtml,
  truncateText,
} from '../src/normalize.js';
import { rawItem } from './helpers.js';

describe('normalizeWhitespace', () => {
  it('trims and collapses spaces', () => {
    expect(normalizeWhitespace('  hello   world  ')).toBe('hello world');
  });

  it('collapses newlines and tabs', () => {
    expect(normalizeWhitespace('hello\n\n\tworld')).toBe('hello world');
  });
});

describe('decodeHtmlEntities', () => {
  it('decodes named, decimal and hex entities', () => {
    expect(decodeHtmlEntities('Tom &amp; Jerry&#39;s &#x41;')).toBe("Tom & Jerry's A");
  });

  it('leaves unknown entities alone', () => {
    expect(decodeHtmlEntities('a &bogus; b')).toBe('a &bogus; b');
  });
});

describe('stripHtml', () => {
  it('turns block closings into line breaks', () => {
    expect(stripHtml('<p>Hello <b>world</b></p><p>Second</p>')).toBe('Hello world\nSecond');
  });

  it('drops scripts, styles and comments', () => {
    expect(stripHtml('<style>p{}</style><script>alert(1)</script>Text<!-- hidden -->')).toBe('Text');
  });

  it('converts br tags', () => {
    expect(stripHtml('one<br/>two<br>three')).toBe('one\ntwo\nthree');
  });
});

describe('truncateText', () => {
  it('returns short text unchanged', () => {
    expect(truncateText('short', 10)).toBe('short');
  });

  it('cuts long text and appends an ellipsis', () => {
    expect(truncateText('one two three four', 10)).toBe('one two...');
  });
});

describe('extractSummary', () => {
  it('keeps the first sentences', () => {
    expect(extractSummary('First. Second! Third? Fourth.', 2)).toBe('First. Second!');
  });
});

describe('clean', () => {
  it('strips markup from title and body', () => {
    const cleaned = clean(
      rawItem({
        url: '  https://example.com/a  ',
        title: '<b>Hello</b>  &amp; bye',
        body: '<p>Para</p>',
        sourceName: ' Example   Blog ',
      }),
    );

    expect(cleaned.url).toBe('https://example.com/a');
    expect(cleaned.title).toBe('Hello & bye');
    expect(cleaned.body).toBe('Para');
    expect(cleaned.sourceName).toBe('Example Blog');
    expect(cleaned._cleaned).toBe(true);
  });

  it('caps the body length', () => {
    const cleaned = clean(rawItem({ body: 'aaaa bbbb cccc' }), { maxBodyLength: 10 });
    expect(cleaned.body).toBe('aaaa...');
  });
});
