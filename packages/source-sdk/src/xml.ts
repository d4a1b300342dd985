import { XMLParser } from 'fast-xml-parser';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Text content of an element that may carry attributes (`{ '#text': ..., '@_type': ... }`).
 */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }

  if (isRecord(value)) {
    return asString(value['#text']);
  }

  return undefined;
}

export function toArray(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }

  return value === undefined || value === null ? [] : [value];
}

export function parseDate(dateRaw: string | undefined): Date | undefined {
  if (!dateRaw) {
    return undefined;
  }

  const parsed = new Date(dateRaw);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

export function parseXml(xml: string): unknown {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
  });

  return parser.parse(xml);
}
