import { Database } from 'sqlite';
import { SubscriptionScheduler } from '../../../services/subscriptions/SubscriptionScheduler';
import { SubscriptionRunner } from '../../../services/subscriptions/SubscriptionRunner';
import { SqliteSubscriptionStore } from '../../../services/subscriptions/SqliteSubscriptionStore';
import { createTestDatabase } from '../../helpers/database';
import { createFakeDelivery, createSearchStack, makeSubscription } from '../../helpers/services';

describe('SubscriptionScheduler', () => {
  let db: Database;
  let store: SqliteSubscriptionStore;
  let delivery: ReturnType<typeof createFakeDelivery>;
  let runner: SubscriptionRunner;
  let now: Date;
  const clock = () => now;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    db = await createTestDatabase();
    store = new SqliteSubscriptionStore(db);
    delivery = createFakeDelivery(true);
    runner = new SubscriptionRunner(store, createSearchStack().searchService, delivery, clock);
    await store.put(makeSubscription({ notificationTime: '09:00' }));
  });

  afterEach(async () => {
    await db.close();
    jest.restoreAllMocks();
  });

  async function tickAt(scheduler: SubscriptionScheduler, at: Date): Promise<string[]> {
    now = at;
    const launched = await scheduler.evaluateTick(at);
    await scheduler.waitForIdle();
    return launched;
  }

  it('should fire a subscription once inside its due minute', async () => {
    const scheduler = new SubscriptionScheduler(store, runner, { cron: '* * * * *' }, clock);

    expect(await tickAt(scheduler, new Date(2024, 2, 5, 8, 59))).toEqual([]);
    expect(await tickAt(scheduler, new Date(2024, 2, 5, 9, 0, 0))).toEqual(['sub-1']);
    expect(await tickAt(scheduler, new Date(2024, 2, 5, 9, 0, 30))).toEqual([]);
    expect(await tickAt(scheduler, new Date(2024, 2, 5, 9, 1))).toEqual([]);

    expect(delivery.send).toHaveBeenCalledTimes(1);
    const runs = await store.listRuns('dev@example.com', 'sub-1');
    expect(runs.map(run => run.status)).toEqual(['delivered']);
  });

  it('should fire again on the next day', async () => {
    const scheduler = new SubscriptionScheduler(store, runner, { cron: '* * * * *' }, clock);

    await tickAt(scheduler, new Date(2024, 2, 5, 9, 0));
    expect(await tickAt(scheduler, new Date(2024, 2, 6, 9, 0))).toEqual(['sub-1']);

    expect(delivery.send).toHaveBeenCalledTimes(2);
  });

  it('should not double-fire when two schedulers tick the same minute', async () => {
    now = new Date(2024, 2, 5, 9, 0);
    const first = new SubscriptionScheduler(store, runner, { cron: '* * * * *' }, clock);
    const second = new SubscriptionScheduler(store, runner, { cron: '* * * * *' }, clock);

    const launched = await Promise.all([first.evaluateTick(now), second.evaluateTick(now)]);
    await Promise.all([first.waitForIdle(), second.waitForIdle()]);

    expect(launched.flat()).toEqual(['sub-1']);
    expect(delivery.send).toHaveBeenCalledTimes(1);
  });

  it('should skip a tick that overlaps the previous one', async () => {
    now = new Date(2024, 2, 5, 9, 0);
    const scheduler = new SubscriptionScheduler(store, runner, { cron: '* * * * *' }, clock);

    const [a, b] = await Promise.all([scheduler.evaluateTick(now), scheduler.evaluateTick(now)]);
    await scheduler.waitForIdle();

    expect(a).toEqual(['sub-1']);
    expect(b).toEqual([]);
  });

  it('should keep ticking when listing due subscriptions fails', async () => {
    const scheduler = new SubscriptionScheduler(store, runner, { cron: '* * * * *' }, clock);
    jest.spyOn(store, 'listDue').mockRejectedValueOnce(new Error('database is locked'));

    expect(await tickAt(scheduler, new Date(2024, 2, 5, 9, 0))).toEqual([]);
    expect(await tickAt(scheduler, new Date(2024, 2, 5, 9, 0, 20))).toEqual(['sub-1']);
  });

  it('should not let a failing run affect other subscriptions', async () => {
    await store.put(makeSubscription({ id: 'sub-2', email: 'ops@example.com' }));
    const scheduler = new SubscriptionScheduler(store, runner, { cron: '* * * * *' }, clock);
    const realRun = runner.run.bind(runner);
    jest.spyOn(runner, 'run').mockImplementation(async subscription => {
      if (subscription.id === 'sub-1') throw new Error('storage went away');
      return realRun(subscription);
    });

    const launched = await tickAt(scheduler, new Date(2024, 2, 5, 9, 0));

    expect(launched.sort()).toEqual(['sub-1', 'sub-2']);
    expect(delivery.send).toHaveBeenCalledTimes(1);
    expect(delivery.send.mock.calls[0][0]).toBe('ops@example.com');
    expect(scheduler.activeRuns).toBe(0);
  });

  it('should start and stop its cron task', async () => {
    const scheduler = new SubscriptionScheduler(store, runner, { cron: '0 * * * *' }, clock);

    scheduler.start();
    expect(scheduler.isRunning).toBe(true);

    await scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
  });

  it('should reject an invalid cron expression', () => {
    const scheduler = new SubscriptionScheduler(store, runner, { cron: 'every minute' }, clock);

    expect(() => scheduler.start()).toThrow('Invalid scheduler cron expression: every minute');
    expect(scheduler.isRunning).toBe(false);
  });
});
