import pgPromise from 'pg-promise';
import { z } from 'zod';

const pgp = pgPromise();

export const DatabaseUrlSchema = z
  .string()
  .regex(/^postgres(ql)?:\/\//, 'Expected a postgres:// connection string');

/** Connect to a URL that has already passed DatabaseUrlSchema. */
export function createDb(databaseUrl: string) {
  return pgp(databaseUrl);
}

export type Db = ReturnType<typeof createDb>;

/**
 * DATABASE_URL for tools that run without the gateway's environment, such as
 * the migration runner.
 */
export function databaseUrlFromEnv(source: NodeJS.ProcessEnv = process.env): string {
  const parsed = DatabaseUrlSchema.safeParse(source.DATABASE_URL);
  if (!parsed.success) {
    const msg = parsed.error.issues.map(i => i.message).join(', ');
    throw new Error(`Invalid environment:\nDATABASE_URL: ${msg}`);
  }
  return parsed.data;
}
