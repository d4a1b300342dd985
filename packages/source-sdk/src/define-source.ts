import type { Source } from './types.js';

/**
 * Typed helper for source definitions.
 * Keeps collector declarations consistent without runtime overhead.
 */
export function defineSource<T extends Source>(source: T): T {
  return source;
}
