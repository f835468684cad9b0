import '../src/config/loadEnv.js';
import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { createPool } from '../src/lib/db.js';
import { errorMessage, logger } from '../src/utils/logger.js';

const schemaPath = fileURLToPath(new URL('../db/schema.sql', import.meta.url));

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL must be set');
  }
  const sql = await fs.readFile(schemaPath, 'utf8');
  const pool = createPool(databaseUrl);
  try {
    await pool.query(sql);
    logger.info('db.schema.applied', { schemaPath });
  } finally {
    await pool.end();
  }
}

main().catch((e: unknown) => {
  logger.error('db.schema.failed', { errorMessage: errorMessage(e) });
  process.exitCode = 1;
});
