import { Database } from 'sqlite';

/**
 * Database migration scripts for SQLite schema creation
 */

export interface Migration {
  version: number;
  name: string;
  up: (db: Database) => Promise<void>;
}

export const migrations: Migration[] = [
  {
    version: 1,
    name: 'create_migration_history_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS migration_history (
          version INTEGER PRIMARY KEY,
          name TEXT NOT NULL,
          applied_at TEXT NOT NULL
        );
      `);
    }
  },
  {
    version: 2,
    name: 'create_subscriptions_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS subscriptions (
          id TEXT PRIMARY KEY,
          email TEXT NOT NULL,
          keywords TEXT NOT NULL,
          sources TEXT NOT NULL,
          detail TEXT NOT NULL DEFAULT '',
          date_start TEXT,
          date_end TEXT,
          notification_time TEXT NOT NULL,
          last_run TEXT,
          created_at TEXT NOT NULL,
          CONSTRAINT notification_time_format CHECK (notification_time GLOB '[0-2][0-9]:[0-5][0-9]')
        );
      `);

      // Lookup is by email, the scheduler scans by time of day
      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_subscriptions_email ON subscriptions(email);
        CREATE INDEX IF NOT EXISTS idx_subscriptions_notification_time ON subscriptions(notification_time);
      `);
    }
  },
  {
    version: 3,
    name: 'create_subscription_runs_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS subscription_runs (
          id TEXT PRIMARY KEY,
          subscription_id TEXT NOT NULL,
          email TEXT NOT NULL,
          started_at TEXT NOT NULL,
          finished_at TEXT NOT NULL,
          status TEXT NOT NULL CHECK (status IN ('delivered', 'delivery_failed', 'failed')),
          total_count INTEGER NOT NULL DEFAULT 0,
          error TEXT,
          FOREIGN KEY (subscription_id) REFERENCES subscriptions(id) ON DELETE CASCADE
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_subscription_runs_subscription ON subscription_runs(subscription_id, started_at);
      `);
    }
  }
];

export async function runMigrations(db: Database): Promise<void> {
  console.log('🔄 Running database migrations...');

  // Ensure migration history table exists first
  await migrations[0].up(db);

  const currentVersionResult = await db.get<{ version: number | null }>(
    'SELECT MAX(version) as version FROM migration_history'
  );
  const currentVersion = currentVersionResult?.version ?? 0;

  for (const migration of migrations) {
    if (migration.version > currentVersion) {
      console.log(`🔄 Running migration ${migration.version}: ${migration.name}`);

      try {
        await db.exec('BEGIN TRANSACTION;');
        await migration.up(db);

        await db.run(
          'INSERT INTO migration_history (version, name, applied_at) VALUES (?, ?, ?)',
          [migration.version, migration.name, new Date().toISOString()]
        );

        await db.exec('COMMIT;');
      } catch (error) {
        await db.exec('ROLLBACK;');
        console.error(`❌ Migration ${migration.version} failed:`, error);
        throw error;
      }
    }
  }

  console.log('✅ All migrations completed successfully');
}
