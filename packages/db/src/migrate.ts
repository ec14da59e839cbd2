import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { createPool, getDatabaseUrl } from './connection.js';

const SCHEMA_PATH = fileURLToPath(new URL('../schema.sql', import.meta.url));

async function main() {
  const pool = createPool(getDatabaseUrl());
  try {
    const sql = await readFile(SCHEMA_PATH, 'utf8');
    await pool.query(sql);
    console.log(`Applied ${SCHEMA_PATH}`);
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
