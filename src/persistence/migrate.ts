import { readFile } from 'fs/promises';
import path from 'path';
import { logger } from '../observability/logger';
import { Database } from './database';

export const SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'sql', 'schema.sql');

/** Apply the idempotent schema script in one transaction */
export async function runMigrations(db: Database, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, 'utf-8');
  await db.transaction('migrate', async (client) => {
    await client.query(sql);
  });
  logger.info({ schemaPath }, 'Database schema applied');
}
