import { neon } from '@neondatabase/serverless';

/**
 * Tagged-template query function. The neon client satisfies it; tests pass a fake.
 */
export type SqlClient = (strings: TemplateStringsArray, ...values: unknown[]) => Promise<Record<string, unknown>[]>;

export function createSqlClient(databaseUrl: string): SqlClient {
  if (!databaseUrl) {
    throw new Error('DATABASE_URL is not configured');
  }
  return neon(databaseUrl);
}

