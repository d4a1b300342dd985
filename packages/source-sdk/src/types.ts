export type SourceType = 'feed' | 'video';

export interface RawItem {
  sourceId: string;
  externalId: string;
  url: string;
  title: string;
  body: string;
  sourceType: SourceType;
  publishedAt?: Date;
  sourceName?: string;
  category?: string;
  raw?: Record<string, unknown>;
}

export interface SourceManifest {
  id: string;
  name: string;
  version: string;
  schedule: string;
  type: SourceType;
}

export interface FetchResult {
  items: RawItem[];
}

export interface Source {
  manifest: SourceManifest;
  fetch(): Promise<FetchResult>;
}
