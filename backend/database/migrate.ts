/**
 * Schema migration
 *
 * Applies schema.sql to DATABASE_URL. Every statement is idempotent, so the
 * whole file is sent as one multi-statement query.
 *
 * Usage: tsx backend/database/migrate.ts
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { db } from '../src/db';
import { dbLogger } from '../src/logger';

export const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

export async function applySchema(database: Pick<typeof db, 'query'> = db): Promise<void> {
  const schemaSQL = readFileSync(SCHEMA_PATH, 'utf-8');
  dbLogger.info({ file: SCHEMA_PATH, sizeKb: (schemaSQL.length / 1024).toFixed(2) }, 'Applying schema');
  await database.query(schemaSQL);
  dbLogger.info('Schema applied');
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  applySchema()
    .then(() => db.close())
    .catch(async (err) => {
      dbLogger.fatal({ err }, 'Schema migration failed');
      await db.close();
      process.exit(1);
    });
}
