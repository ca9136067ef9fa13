import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import fs from 'fs';
import path from 'path';

let db: Database | null = null;

/**
 * Get or create the process-wide database connection
 */
export async function getDatabase(dbPath: string = process.env.DATABASE_PATH || path.join(process.cwd(), 'data', 'issue-radar.db')): Promise<Database> {
  if (db) {
    return db;
  }

  if (dbPath !== ':memory:') {
    // Ensure directory exists
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  db = await open({
    filename: dbPath,
    driver: sqlite3.Database
  });

  await db.exec('PRAGMA foreign_keys = ON');
  // Let concurrent writers wait instead of failing with SQLITE_BUSY
  await db.exec('PRAGMA busy_timeout = 5000');

  console.log(`[DB] Connected to ${dbPath}`);
  return db;
}

/**
 * Close database connection
 */
export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.close();
    db = null;
  }
}
