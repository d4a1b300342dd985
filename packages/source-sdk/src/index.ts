export type { RawItem, SourceManifest, SourceType, FetchResult, Source } from './types.js';
export { rawItemSchema, validateRawItems, formatIssues } from './schema.js';
export type { ValidatedRawItem, ValidateRawItemsOptions } from './schema.js';
export { sourceConfigSchema, rssSourceConfigSchema, youtubeSourceConfigSchema } from './config.js';
export type { SourceConfig, RssSourceConfig, YoutubeSourceConfig } from './config.js';
export { TransientSourceError } from './errors.js';
export { defineSource } from './define-source.js';
export { fetchFeedText, DEFAULT_USER_AGENT } from './fetch-feed.js';
export type { FetchFeedOptions } from './fetch-feed.js';
export { isRecord, asString, textOf, toArray, parseDate, parseXml } from './xml.js';
export type { JsonRecord } from './xml.js';
