import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import type { Database } from './database.js';

const SCHEMA_PATH = fileURLToPath(new URL('../sql/schema.sql', import.meta.url));

export async function ensureSchema(db: Database): Promise<void> {
  const sql = await readFile(SCHEMA_PATH, 'utf8');
  await db.query(sql);
}
