import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { createDatabase } from './client.js';

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const db = createDatabase(databaseUrl);

  try {
    const currentDir = dirname(fileURLToPath(import.meta.url));
    // Written by `drizzle-kit generate` from src/schema.ts.
    const migrationsFolder = join(currentDir, '../drizzle');

    await migrate(db, { migrationsFolder });
    console.log('migrations applied successfully');
  } finally {
    await db.$client.end();
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
