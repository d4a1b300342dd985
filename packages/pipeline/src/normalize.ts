import type { ValidatedRawItem } from '@digestline/source-sdk';
import type { CleanItem } from './types.js';

export const DEFAULT_MAX_BODY_LENGTH = 5000;
const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  colon: ':',
  hellip: '…',
  mdash: '—',
  ndash: '–',
  rsquo: '’',
  lsquo: '‘',
  rdquo: '”',
  ldquo: '“',
};

export interface CleaningOptions {
  maxBodyLength?: number;
}

/**
 * Trim whitespace and collapse multiple spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Decode named, decimal and hex HTML entities. Unknown names are left as-is.
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return safeFromCodePoint(parseInt(entity.slice(2), 16)) ?? match;
    }

    if (entity.startsWith('#')) {
      return safeFromCodePoint(parseInt(entity.slice(1), 10)) ?? match;
    }

    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function safeFromCodePoint(codePoint: number): string | undefined {
  if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
    return undefined;
  }

  return String.fromCodePoint(codePoint);
}

/**
 * Strip HTML tags from a string. Block-level closings become newlines,
 * script/style bodies and comments are dropped, entities are decoded.
 */
export function stripHtml(html: string): string {
  let text = html;

  text = text.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<!--[\s\S]*?-->/g, '');

  // Preserve block-level breaks
  text = text.replace(/<br\s*\/?>/gi, '\n');
  text = text.replace(/<\/(p|li|div|h[1-6]|blockquote|pre|tr)>/gi, '\n');

  text = text.replace(/<[^>]+>/g, '');
  text = decodeHtmlEntities(text);

  // Collapse excessive newlines (3+ → 2)
  text = text.replace(/\n{3,}/g, '\n\n');

  return text
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v]+/g, ' ').trim())
    .join('\n')
    .trim();
}

/**
 * Cut text to at most `maxLength` characters at a word boundary, appending `...`.
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const room = Math.max(0, maxLength - 3);
  const cut = text.slice(0, room);
  const lastSpace = cut.lastIndexOf(' ');
  const head = lastSpace > room / 2 ? cut.slice(0, lastSpace) : cut;
  return `${head.trimEnd()}...`;
}

/**
 * First `maxSentences` sentences of plain text, capped at `maxLength`.
 */
export function extractSummary(text: string, maxSentences = 3, maxLength = 500): string {
  const flat = normalizeWhitespace(text);
  const sentences = flat.match(/[^.!?。！？]+[.!?。！？]+(\s|$)|[^.!?。！？]+$/g) ?? [];
  const head = sentences
    .slice(0, maxSentences)
    .map((sentence) => sentence.trim())
    .join(' ');

  return truncateText(head, maxLength);
}

/**
 * Apply all cleaning to a validated raw item.
 * Pure function: no side effects, no store access.
 */
export function clean(item: ValidatedRawItem, options: CleaningOptions = {}): CleanItem {
  const maxBodyLength = options.maxBodyLength ?? DEFAULT_MAX_BODY_LENGTH;
  const body = stripHtml(item.body);

  return {
    ...item,
    url: item.url.trim(),
    title: normalizeWhitespace(stripHtml(item.title)),
    body: truncateText(body, maxBodyLength),
    sourceName: item.sourceName ? normalizeWhitespace(item.sourceName) : undefined,
    _cleaned: true as const,
  };
}
