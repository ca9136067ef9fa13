import { Subscription, SubscriptionRun } from '../../types/models';

/**
 * Durable subscription storage, partitioned by email.
 * Driver failures surface as StorageUnavailableError.
 */
export interface SubscriptionStore {
  get(email: string): Promise<Subscription[]>;
  getOne(email: string, id: string): Promise<Subscription | null>;
  put(subscription: Subscription): Promise<void>;
  /** @returns whether a subscription was removed */
  delete(email: string, id: string): Promise<boolean>;
  /** Subscriptions whose time of day is `now` and that have not run yet on `now`'s local day */
  listDue(now: Date): Promise<Subscription[]>;
  /**
   * Atomically mark a due subscription as started. Returns false when another
   * tick already claimed it today, so a due window fires at most once.
   */
  claimDue(email: string, id: string, now: Date): Promise<boolean>;
  markRun(email: string, id: string, at: Date): Promise<void>;
  recordRun(run: SubscriptionRun): Promise<void>;
  listRuns(email: string, id: string, limit?: number): Promise<SubscriptionRun[]>;
}

export function localTimeOfDay(date: Date): string {
  return `${String(date.getHours()).padStart(2, '0')}:${String(date.getMinutes()).padStart(2, '0')}`;
}

export function startOfLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}
