import {
  asString,
  defineSource,
  fetchFeedText,
  isRecord,
  parseDate,
  parseXml,
  textOf,
  toArray,
  type FetchResult,
  type RawItem,
  type RssSourceConfig,
  type Source,
} from '@digestline/source-sdk';

export interface RssSourceOptions {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

interface FeedEntry {
  id: string;
  title: string;
  link: string;
  body: string;
  published?: string;
  raw: Record<string, unknown>;
}

function pickAtomLink(value: unknown): string | undefined {
  const links = toArray(value).filter(isRecord);
  const alternate = links.find((link) => link['@_rel'] === undefined || link['@_rel'] === 'alternate');
  return asString((alternate ?? links[0])?.['@_href']);
}

function toRssEntry(value: unknown): FeedEntry | null {
  if (!isRecord(value)) {
    return null;
  }

  const title = textOf(value.title)?.trim();
  const guid = textOf(value.guid)?.trim();
  const link = textOf(value.link)?.trim() || guid;
  if (!title || !link) {
    return null;
  }

  return {
    id: guid || link,
    title,
    link,
    body: textOf(value['content:encoded']) ?? textOf(value.description) ?? '',
    published: textOf(value.pubDate) ?? textOf(value['dc:date']),
    raw: value,
  };
}

function toAtomEntry(value: unknown): FeedEntry | null {
  if (!isRecord(value)) {
    return null;
  }

  const title = textOf(value.title)?.trim();
  const link = pickAtomLink(value.link)?.trim();
  if (!title || !link) {
    return null;
  }

  return {
    id: textOf(value.id)?.trim() || link,
    title,
    link,
    body: textOf(value.content) ?? textOf(value.summary) ?? '',
    published: textOf(value.published) ?? textOf(value.updated),
    raw: value,
  };
}

/**
 * Entries of an RSS 2.0 or Atom document, in document order.
 */
export function parseFeedEntries(xml: string): FeedEntry[] {
  const doc = parseXml(xml);
  if (!isRecord(doc)) {
    return [];
  }

  if (isRecord(doc.rss) && isRecord(doc.rss.channel)) {
    return toArray(doc.rss.channel.item)
      .map(toRssEntry)
      .filter((entry): entry is FeedEntry => entry !== null);
  }

  if (isRecord(doc.feed)) {
    return toArray(doc.feed.entry)
      .map(toAtomEntry)
      .filter((entry): entry is FeedEntry => entry !== null);
  }

  return [];
}

function toRawItem(entry: FeedEntry, config: RssSourceConfig): RawItem {
  return {
    sourceId: config.id,
    externalId: `${config.id}:${entry.id}`,
    url: entry.link,
    title: entry.title,
    body: entry.body,
    sourceType: 'feed',
    publishedAt: parseDate(entry.published),
    sourceName: config.name,
    category: config.category,
    raw: entry.raw,
  };
}

export function createRssSource(config: RssSourceConfig, options: RssSourceOptions = {}): Source {
  return defineSource({
    manifest: {
      id: config.id,
      name: config.name,
      version: '0.1.0',
      schedule: config.schedule,
      type: 'feed',
    },
    async fetch(): Promise<FetchResult> {
      const xml = await fetchFeedText(config.url, {
        sourceId: config.id,
        fetchImpl: options.fetchImpl,
        sleep: options.sleep,
      });

      const items = parseFeedEntries(xml)
        .slice(0, config.maxEntries)
        .map((entry) => toRawItem(entry, config));

      return { items };
    },
  });
}
