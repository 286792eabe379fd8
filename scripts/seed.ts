import 'dotenv/config';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { seedDemoDatabase } from '../apps/api/src/db.service';

const dataDir = path.resolve(process.env.DEMO_DATA_DIR || './db');
const dbPath = path.resolve(process.env.DEMO_DB_PATH || './db/demo.db');

try {
  // Start from an empty file so re-running never duplicates rows.
  fs.rmSync(dbPath, { force: true });
  const db = new Database(dbPath);
  seedDemoDatabase(db, dataDir);

  console.log(`Demo database seeded at: ${dbPath}`);
  for (const table of ['employees', 'products', 'sales']) {
    const count = db.prepare(`SELECT COUNT(*) FROM ${table}`).pluck().get();
    console.log(`${table}: ${String(count)}`);
  }

  db.close();
} catch (error) {
  console.error('Error seeding database:', error);
  process.exit(1);
}
