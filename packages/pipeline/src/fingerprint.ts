import { createHash } from 'node:crypto';
import type { CleanItem, FingerprintedItem } from './types.js';

const TRACKING_PARAMS = new Set(['fbclid', 'gclid', 'ref', 'ref_src', 'mc_cid', 'mc_eid', 'igshid']);

function isTrackingParam(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.startsWith('utm_') || TRACKING_PARAMS.has(lower);
}

/**
 * Canonical form of an origin URL: https scheme, lower-case host without `www.`,
 * no fragment, no tracking parameters, sorted query, no trailing slash.
 * Path case is kept since many hosts treat it as significant.
 */
export function normalizeUrl(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return trimmed.toLowerCase();
  }

  const host = url.host.replace(/^www\./, '');
  const params = [...url.searchParams.entries()]
    .filter(([name]) => !isTrackingParam(name))
    .sort(([a, aValue], [b, bValue]) => (a === b ? aValue.localeCompare(bValue) : a.localeCompare(b)));
  const query = new URLSearchParams(params).toString();

  let path = url.pathname;
  if (path.length > 1 && path.endsWith('/')) {
    path = path.replace(/\/+$/, '');
  }
  if (path === '/') {
    path = '';
  }

  return `https://${host}${path}${query ? `?${query}` : ''}`;
}

export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Compute a SHA-256 fingerprint from the normalized URL, optionally joined
 * with the normalized title.
 */
export function computeFingerprint(url: string, title?: string): string {
  const parts = [normalizeUrl(url)];
  if (title !== undefined) {
    parts.push(normalizeTitle(title));
  }

  return createHash('sha256').update(parts.join('|')).digest('hex');
}

export interface FingerprintOptions {
  includeTitle?: boolean;
}

/**
 * Add fingerprint to a cleaned item.
 */
export function fingerprintItem(item: CleanItem, options: FingerprintOptions = {}): FingerprintedItem {
  return {
    item,
    fingerprint: computeFingerprint(item.url, options.includeTitle ? item.title : undefined),
  };
}
