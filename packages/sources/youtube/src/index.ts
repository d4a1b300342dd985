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
  type Source,
  type YoutubeSourceConfig,
} from '@digestline/source-sdk';

const FEED_BASE_URL = 'https://www.youtube.com/feeds/videos.xml';
const WATCH_BASE_URL = 'https://www.youtube.com/watch?v=';

export interface YoutubeSourceOptions {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface YoutubeVideo {
  videoId: string;
  title: string;
  url: string;
  description: string;
  channelTitle?: string;
  published?: string;
  raw: Record<string, unknown>;
}

export function buildYoutubeFeedUrl(config: Pick<YoutubeSourceConfig, 'channelId' | 'username'>): string {
  if (config.channelId) {
    return `${FEED_BASE_URL}?channel_id=${encodeURIComponent(config.channelId)}`;
  }

  if (config.username) {
    return `${FEED_BASE_URL}?user=${encodeURIComponent(config.username)}`;
  }

  throw new Error('YouTube source needs a channelId or a username');
}

function toVideo(value: unknown, channelTitle: string | undefined): YoutubeVideo | null {
  if (!isRecord(value)) {
    return null;
  }

  const videoId = textOf(value['yt:videoId'])?.trim();
  const title = textOf(value.title)?.trim();
  if (!videoId || !title) {
    return null;
  }

  const link = toArray(value.link).find(isRecord);
  const mediaGroup = isRecord(value['media:group']) ? value['media:group'] : undefined;
  const author = isRecord(value.author) ? textOf(value.author.name) : undefined;

  return {
    videoId,
    title,
    url: asString(link?.['@_href']) ?? `${WATCH_BASE_URL}${videoId}`,
    description: textOf(mediaGroup?.['media:description']) ?? '',
    channelTitle: author ?? channelTitle,
    published: textOf(value.published) ?? textOf(value.updated),
    raw: value,
  };
}

export function parseVideoFeed(xml: string): YoutubeVideo[] {
  const doc = parseXml(xml);
  if (!isRecord(doc) || !isRecord(doc.feed)) {
    return [];
  }

  const channelTitle = textOf(doc.feed.title);
  return toArray(doc.feed.entry)
    .map((entry) => toVideo(entry, channelTitle))
    .filter((video): video is YoutubeVideo => video !== null);
}

function toRawItem(video: YoutubeVideo, config: YoutubeSourceConfig): RawItem {
  return {
    sourceId: config.id,
    externalId: `youtube:${video.videoId}`,
    url: video.url,
    title: video.title,
    body: video.description,
    sourceType: 'video',
    publishedAt: parseDate(video.published),
    sourceName: video.channelTitle ?? config.name,
    category: config.category ?? 'video',
    raw: video.raw,
  };
}

export function createYoutubeSource(config: YoutubeSourceConfig, options: YoutubeSourceOptions = {}): Source {
  const feedUrl = buildYoutubeFeedUrl(config);

  return defineSource({
    manifest: {
      id: config.id,
      name: config.name,
      version: '0.1.0',
      schedule: config.schedule,
      type: 'video',
    },
    async fetch(): Promise<FetchResult> {
      const xml = await fetchFeedText(feedUrl, {
        sourceId: config.id,
        fetchImpl: options.fetchImpl,
        sleep: options.sleep,
      });

      const items = parseVideoFeed(xml)
        .slice(0, config.maxEntries)
        .map((video) => toRawItem(video, config));

      return { items };
    },
  });
}
