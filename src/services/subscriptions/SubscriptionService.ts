import { v4 as uuidv4 } from 'uuid';
import { FilteredResult, Subscription, SubscriptionRun } from '../../types/models';
import { NotFoundError, RequestValidationError, errorMessage } from '../../models/errors';
import { buildQuery, normalizeEmail, validateSubscriptionRequest } from '../../models/validation';
import { AdapterRegistry } from '../agents/AdapterRegistry';
import { SubscriptionStore } from './SubscriptionStore';
import { SubscriptionRunner } from './SubscriptionRunner';

/**
 * User-facing subscription management. Validation and storage failures are thrown to the caller.
 */
export class SubscriptionService {
  constructor(
    private store: SubscriptionStore,
    private registry: AdapterRegistry,
    private runner: SubscriptionRunner,
    private clock: () => Date = () => new Date()
  ) {}

  async create(payload: unknown): Promise<Subscription> {
    const body = validateSubscriptionRequest(payload);
    const query = buildQuery(body);
    // Unknown sources fail here rather than on every scheduled run
    this.registry.resolveAll(query.sources);

    const subscription: Subscription = {
      id: uuidv4(),
      email: body.email,
      query,
      notificationTime: body.notification_time,
      lastRun: null,
      createdAt: this.clock()
    };

    await this.store.put(subscription);
    console.log(`[SUBSCRIPTIONS] Created ${subscription.id} for ${subscription.email} at ${subscription.notificationTime}`);
    return subscription;
  }

  async list(email: unknown): Promise<Subscription[]> {
    return this.store.get(normalizeEmail(email));
  }

  async get(email: unknown, id: string): Promise<Subscription> {
    const subscription = await this.store.getOne(normalizeEmail(email), id);
    if (!subscription) {
      throw new NotFoundError(`Subscription ${id} not found`);
    }
    return subscription;
  }

  async delete(email: unknown, id: string): Promise<void> {
    const removed = await this.store.delete(normalizeEmail(email), id);
    if (!removed) {
      throw new NotFoundError(`Subscription ${id} not found`);
    }
    console.log(`[SUBSCRIPTIONS] Deleted ${id}`);
  }

  /**
   * Run a subscription now, outside its schedule. Completes like a scheduled run
   * (delivery, last_run, run record) and returns the result.
   */
  async trigger(email: unknown, id: string): Promise<FilteredResult> {
    const subscription = await this.get(email, id);
    console.log(`[SUBSCRIPTIONS] Manual trigger of ${id}`);

    const outcome = await this.runner.run(subscription);
    if (outcome.searchError !== undefined) {
      if (outcome.searchError instanceof RequestValidationError) {
        throw outcome.searchError;
      }
      throw new Error(`Search failed: ${errorMessage(outcome.searchError)}`);
    }
    if (!outcome.result) {
      throw new Error('Search produced no result');
    }
    return outcome.result;
  }

  async history(email: unknown, id: string, limit?: number): Promise<SubscriptionRun[]> {
    const subscription = await this.get(email, id);
    return this.store.listRuns(subscription.email, subscription.id, limit);
  }
}
