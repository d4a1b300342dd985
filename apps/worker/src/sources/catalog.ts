import { createRssSource } from '@digestline/source-rss';
import type { Source, SourceConfig } from '@digestline/source-sdk';
import { createYoutubeSource } from '@digestline/source-youtube';

export interface SourceCatalogOptions {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface SourceCatalog {
  /** Enabled sources in configuration order. */
  all(): Source[];
  get(sourceId: string): Source;
  has(sourceId: string): boolean;
}

export function createSource(config: SourceConfig, options: SourceCatalogOptions = {}): Source {
  switch (config.type) {
    case 'rss':
      return createRssSource(config, options);
    case 'youtube':
      return createYoutubeSource(config, options);
  }
}

export function buildSourceMap(sources: Source[]): Map<string, Source> {
  const sourceMap = new Map<string, Source>();

  for (const source of sources) {
    if (sourceMap.has(source.manifest.id)) {
      throw new Error(`Duplicate source id: ${source.manifest.id}`);
    }

    sourceMap.set(source.manifest.id, source);
  }

  return sourceMap;
}

export function createSourceCatalog(configs: readonly SourceConfig[], options: SourceCatalogOptions = {}): SourceCatalog {
  const sources = configs.filter((config) => config.enabled).map((config) => createSource(config, options));
  const sourceMap = buildSourceMap(sources);

  return {
    all: () => [...sources],
    has: (sourceId) => sourceMap.has(sourceId),
    get(sourceId) {
      const source = sourceMap.get(sourceId);
      if (!source) {
        throw new Error(`Unknown source id: ${sourceId}`);
      }

      return source;
    },
  };
}
