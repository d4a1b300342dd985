import { parseDigestConfig } from '@digestline/pipeline';
import type { Source } from '@digestline/source-sdk';
import { describe, expect, it, vi } from 'vitest';
import { buildSourceMap, createSourceCatalog } from '../src/sources/catalog.js';
import { feedFetch } from './test-helpers.js';

const config = parseDigestConfig(
  {
    sources: [
      { id: 'blog', type: 'rss', name: 'Blog', url: 'https://blog.example.com/feed.xml', schedule: '0 * * * *' },
      { id: 'talks', type: 'youtube', name: 'Talks', channelId: 'UC-test-channel' },
      { id: 'paused', type: 'rss', name: 'Paused', url: 'https://paused.example.com/feed.xml', enabled: false },
    ],
  },
  {},
);

describe('source catalog', () => {
  it('builds a collector per enabled source in configuration order', () => {
    const catalog = createSourceCatalog(config.sources);

    expect(catalog.all().map((source) => [source.manifest.id, source.manifest.type, source.manifest.schedule])).toEqual([
      ['blog', 'feed', '0 * * * *'],
      ['talks', 'video', '0 */2 * * *'],
    ]);
    expect(catalog.has('paused')).toBe(false);
  });

  it('resolves by id and hands the fetch implementation to the collector', async () => {
    const fetchImpl = feedFetch();
    const catalog = createSourceCatalog(config.sources, { fetchImpl });

    const result = await catalog.get('blog').fetch();

    expect(fetchImpl.mock.calls[0]![0]).toBe('https://blog.example.com/feed.xml');
    expect(result.items.map((item) => item.externalId)).toEqual(['blog:gpt-5', 'blog:weekly']);
  });

  it('throws for unknown source id', () => {
    expect(() => createSourceCatalog(config.sources).get('unknown')).toThrow('Unknown source id: unknown');
  });

  it('rejects duplicate ids', () => {
    const source = (id: string): Source => ({
      manifest: { id, name: id, version: '0.1.0', schedule: '0 * * * *', type: 'feed' },
      fetch: vi.fn(),
    });

    expect(() => buildSourceMap([source('a'), source('b'), source('a')])).toThrow('Duplicate source id: a');
  });
});
