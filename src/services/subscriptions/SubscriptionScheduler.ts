import cron, { ScheduledTask } from 'node-cron';
import { Subscription } from '../../types/models';
import { errorMessage } from '../../models/errors';
import { SubscriptionStore, localTimeOfDay } from './SubscriptionStore';
import { SubscriptionRunner } from './SubscriptionRunner';

export interface SchedulerOptions {
  cron: string;
  timezone?: string;
}

/**
 * Checks for due subscriptions on a fixed tick and launches their runs.
 * Runs are not awaited by the tick, so one slow subscription never holds up the others.
 */
export class SubscriptionScheduler {
  private task: ScheduledTask | null = null;
  private inFlight = new Set<Promise<void>>();
  private ticking = false;

  constructor(
    private store: SubscriptionStore,
    private runner: SubscriptionRunner,
    private options: SchedulerOptions = { cron: '* * * * *' },
    private clock: () => Date = () => new Date()
  ) {}

  start(): void {
    if (this.task) {
      return;
    }
    if (!cron.validate(this.options.cron)) {
      throw new Error(`Invalid scheduler cron expression: ${this.options.cron}`);
    }

    this.task = cron.schedule(this.options.cron, () => {
      this.evaluateTick().catch(error => console.error('[SCHEDULER] Tick failed:', error));
    }, this.options.timezone ? { timezone: this.options.timezone } : {});
    console.log(`[SCHEDULER] ⏰ Started (${this.options.cron})`);
  }

  /**
   * Stop ticking and wait for runs that are already in progress
   */
  async stop(): Promise<void> {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log('[SCHEDULER] Stopped');
    }
    await this.waitForIdle();
  }

  get isRunning(): boolean {
    return this.task !== null;
  }

  get activeRuns(): number {
    return this.inFlight.size;
  }

  async waitForIdle(): Promise<void> {
    await Promise.allSettled(Array.from(this.inFlight));
  }

  /**
   * Claim and launch every subscription due at `now`. Returns the launched ids.
   * A tick that starts while the previous one is still listing is skipped.
   */
  async evaluateTick(now: Date = this.clock()): Promise<string[]> {
    if (this.ticking) {
      console.warn('[SCHEDULER] Previous tick still running, skipping');
      return [];
    }
    this.ticking = true;

    try {
      const due = await this.store.listDue(now);
      const launched: string[] = [];

      for (const subscription of due) {
        let claimed: boolean;
        try {
          claimed = await this.store.claimDue(subscription.email, subscription.id, now);
        } catch (error) {
          console.error(`[SCHEDULER] Could not claim ${subscription.id}:`, errorMessage(error));
          continue;
        }
        if (!claimed) {
          continue;
        }

        this.launch(subscription);
        launched.push(subscription.id);
      }

      if (launched.length > 0) {
        console.log(`[SCHEDULER] ${localTimeOfDay(now)}: launched ${launched.length} run(s)`);
      }
      return launched;
    } catch (error) {
      console.error('[SCHEDULER] Could not list due subscriptions:', errorMessage(error));
      return [];
    } finally {
      this.ticking = false;
    }
  }

  private launch(subscription: Subscription): void {
    const job: Promise<void> = this.runner.run(subscription)
      .then(
        () => undefined,
        error => console.error(`[SCHEDULER] Run of ${subscription.id} failed:`, errorMessage(error))
      )
      .finally(() => {
        this.inFlight.delete(job);
      });
    this.inFlight.add(job);
  }
}
