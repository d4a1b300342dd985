export { createDatabase } from './client.js';
export type { Database } from './client.js';
export { archivedItems, cacheEntries, costLedgerDays } from './schema.js';
