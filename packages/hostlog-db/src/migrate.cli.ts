#!/usr/bin/env node
import { config } from 'dotenv';
import { createDb, databaseUrlFromEnv } from './db.js';
import { migrate } from './migrate.js';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

// Load .env from the workspace root, then the package directory
config({ path: join(process.cwd(), '.env') });
config({ path: join(process.cwd(), '..', '..', '.env') });

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

async function main() {
  const db = createDb(databaseUrlFromEnv());

  console.log('Running migrations from:', MIGRATIONS_DIR);
  try {
    const applied = await migrate(db, MIGRATIONS_DIR);
    if (applied.length === 0) {
      console.log('No new migrations to apply.');
    } else {
      console.log('Applied migrations:', applied.join(', '));
    }
  } finally {
    await db.$pool.end();
  }
}

main().catch(e => {
  console.error(e);
  process.exit(1);
});
