import { Database } from 'sqlite';
import { Subscription, SubscriptionRow, SubscriptionRun, SubscriptionRunRow } from '../../types/models';
import { StorageUnavailableError, errorMessage } from '../../models/errors';
import {
  runModelToRow, runRowToModel, subscriptionModelToRow, subscriptionRowToModel
} from '../../models/transformers';
import { SubscriptionStore, localTimeOfDay, startOfLocalDay } from './SubscriptionStore';

/**
 * SubscriptionStore on SQLite. Timestamps are stored as UTC ISO strings,
 * so "before the start of today" is a plain string comparison.
 */
export class SqliteSubscriptionStore implements SubscriptionStore {
  constructor(private db: Database) {}

  async get(email: string): Promise<Subscription[]> {
    return this.guard('get', async () => {
      const rows = await this.db.all<SubscriptionRow[]>(
        'SELECT * FROM subscriptions WHERE email = ? ORDER BY created_at, id',
        [email]
      );
      return rows.map(subscriptionRowToModel);
    });
  }

  async getOne(email: string, id: string): Promise<Subscription | null> {
    return this.guard('getOne', async () => {
      const row = await this.db.get<SubscriptionRow>(
        'SELECT * FROM subscriptions WHERE email = ? AND id = ?',
        [email, id]
      );
      return row ? subscriptionRowToModel(row) : null;
    });
  }

  async put(subscription: Subscription): Promise<void> {
    const row = subscriptionModelToRow(subscription);
    await this.guard('put', () => this.db.run(
      `INSERT INTO subscriptions (
        id, email, keywords, sources, detail, date_start, date_end, notification_time, last_run, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        email = excluded.email,
        keywords = excluded.keywords,
        sources = excluded.sources,
        detail = excluded.detail,
        date_start = excluded.date_start,
        date_end = excluded.date_end,
        notification_time = excluded.notification_time,
        last_run = excluded.last_run`,
      [
        row.id, row.email, row.keywords, row.sources, row.detail,
        row.date_start, row.date_end, row.notification_time, row.last_run, row.created_at
      ]
    ));
  }

  async delete(email: string, id: string): Promise<boolean> {
    return this.guard('delete', async () => {
      const result = await this.db.run('DELETE FROM subscriptions WHERE email = ? AND id = ?', [email, id]);
      return (result.changes ?? 0) > 0;
    });
  }

  async listDue(now: Date): Promise<Subscription[]> {
    return this.guard('listDue', async () => {
      const rows = await this.db.all<SubscriptionRow[]>(
        `SELECT * FROM subscriptions
         WHERE notification_time = ? AND (last_run IS NULL OR last_run < ?)
         ORDER BY created_at, id`,
        [localTimeOfDay(now), startOfLocalDay(now).toISOString()]
      );
      return rows.map(subscriptionRowToModel);
    });
  }

  async claimDue(email: string, id: string, now: Date): Promise<boolean> {
    return this.guard('claimDue', async () => {
      // Single conditional UPDATE: only one of two racing ticks sees changes > 0
      const result = await this.db.run(
        `UPDATE subscriptions SET last_run = ?
         WHERE email = ? AND id = ? AND (last_run IS NULL OR last_run < ?)`,
        [now.toISOString(), email, id, startOfLocalDay(now).toISOString()]
      );
      return (result.changes ?? 0) > 0;
    });
  }

  async markRun(email: string, id: string, at: Date): Promise<void> {
    await this.guard('markRun', () => this.db.run(
      'UPDATE subscriptions SET last_run = ? WHERE email = ? AND id = ?',
      [at.toISOString(), email, id]
    ));
  }

  async recordRun(run: SubscriptionRun): Promise<void> {
    const row = runModelToRow(run);
    await this.guard('recordRun', () => this.db.run(
      `INSERT INTO subscription_runs (
        id, subscription_id, email, started_at, finished_at, status, total_count, error
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [row.id, row.subscription_id, row.email, row.started_at, row.finished_at, row.status, row.total_count, row.error]
    ));
  }

  async listRuns(email: string, id: string, limit: number = 20): Promise<SubscriptionRun[]> {
    return this.guard('listRuns', async () => {
      const rows = await this.db.all<SubscriptionRunRow[]>(
        `SELECT * FROM subscription_runs
         WHERE email = ? AND subscription_id = ?
         ORDER BY started_at DESC
         LIMIT ?`,
        [email, id, limit]
      );
      return rows.map(runRowToModel);
    });
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      console.error(`[DB] Subscription store ${operation} failed:`, error);
      throw new StorageUnavailableError(operation, `Subscription storage ${operation} failed: ${errorMessage(error)}`);
    }
  }
}
