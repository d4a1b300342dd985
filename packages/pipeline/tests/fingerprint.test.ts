import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import { computeFingerprint, fingerprintItem, normalizeTitle, normalizeUrl } from '../src/fingerprint.js';
import { clean } from '../src/normalize.js';
import { rawItem } from './helpers.js';

describe('normalizeUrl', () => {
  it('canonicalizes scheme, host, query and trailing slash', () => {
    expect(normalizeUrl('HTTP://WWW.Example.com/Path/?utm_source=x&b=2&a=1#frag')).toBe('https://example.com/Path?a=1&b=2');
  });

  it('defaults a missing scheme to https', () => {
    expect(normalizeUrl('a.com/1')).toBe('https://a.com/1');
  });

  it('drops a bare root path', () => {
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
  });

  it('removes click ids', () => {
    expect(normalizeUrl('https://a.com/1?fbclid=abc&gclid=def&ref=feed')).toBe('https://a.com/1');
  });
});

describe('computeFingerprint', () => {
  it('is the sha256 of the normalized url', () => {
    const expected = createHash('sha256').update('https://a.com/1').digest('hex');
    expect(computeFingerprint('a.com/1')).toBe(expected);
  });

  it('matches urls that differ only in form', () => {
    expect(computeFingerprint('a.com/1')).toBe(computeFingerprint('https://www.a.com/1/?fbclid=zzz#top'));
  });

  it('keeps path case significant', () => {
    expect(computeFingerprint('https://a.com/Post')).not.toBe(computeFingerprint('https://a.com/post'));
  });

  it('mixes in the normalized title when given', () => {
    const expected = createHash('sha256').update('https://a.com/1|hello world').digest('hex');
    expect(computeFingerprint('a.com/1', '  Hello   World ')).toBe(expected);
    expect(normalizeTitle('  Hello   World ')).toBe('hello world');
  });
});

describe('fingerprintItem', () => {
  it('ignores the title unless asked', () => {
    const first = clean(rawItem({ url: 'a.com/1', title: 'First title' }));
    const second = clean(rawItem({ url: 'a.com/1', title: 'Second title' }));

    expect(fingerprintItem(first).fingerprint).toBe(fingerprintItem(second).fingerprint);
    expect(fingerprintItem(first, { includeTitle: true }).fingerprint).not.toBe(
      fingerprintItem(second, { includeTitle: true }).fingerprint,
    );
  });
});
