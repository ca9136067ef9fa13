import { v4 as uuidv4 } from 'uuid';
import { FilteredResult, Query, RunStatus, Subscription, SubscriptionRun } from '../../types/models';
import { DeliveryFailureError, errorMessage } from '../../models/errors';
import { IssueSearchService } from '../search/IssueSearchService';
import { DeliveryChannel } from '../email/EmailDeliveryService';
import { SubscriptionStore } from './SubscriptionStore';

export interface RunOutcome {
  run: SubscriptionRun;
  result: FilteredResult | null;
  /** Set when the search itself failed; no delivery was attempted */
  searchError?: unknown;
}

export function buildSubject(query: Query, totalCount: number): string {
  return `🤖 ${totalCount} new issue${totalCount === 1 ? '' : 's'} found - ${query.keywords.join(', ')}`;
}

/**
 * One subscription run: search, deliver, then advance last_run and record the outcome.
 * last_run moves forward whether or not delivery succeeded. Only storage failures are thrown.
 */
export class SubscriptionRunner {
  constructor(
    private store: SubscriptionStore,
    private search: IssueSearchService,
    private delivery: DeliveryChannel,
    private clock: () => Date = () => new Date()
  ) {}

  async run(subscription: Subscription): Promise<RunOutcome> {
    const startedAt = this.clock();
    let result: FilteredResult | null = null;
    let status: RunStatus = 'failed';
    let error: string | undefined;
    let searchError: unknown;

    try {
      result = await this.search.search(subscription.query);
    } catch (failure) {
      searchError = failure;
      error = errorMessage(failure);
      console.error(`[SUBSCRIPTIONS] Search failed for ${subscription.id}:`, error);
    }

    if (result) {
      try {
        const subject = buildSubject(subscription.query, result.totalCount);
        if (await this.delivery.send(subscription.email, subject, result)) {
          status = 'delivered';
        } else {
          throw new DeliveryFailureError(subscription.email, `Delivery to ${subscription.email} failed`);
        }
      } catch (deliveryError) {
        status = 'delivery_failed';
        error = errorMessage(deliveryError);
        console.error(`[SUBSCRIPTIONS] Delivery failed for ${subscription.id}:`, error);
      }
    }

    const finishedAt = this.clock();
    await this.store.markRun(subscription.email, subscription.id, finishedAt);

    const run: SubscriptionRun = {
      id: uuidv4(),
      subscriptionId: subscription.id,
      email: subscription.email,
      startedAt,
      finishedAt,
      status,
      totalCount: result ? result.totalCount : 0,
      ...(error !== undefined && { error })
    };
    await this.store.recordRun(run);

    console.log(`[SUBSCRIPTIONS] Run of ${subscription.id} finished: ${status} (${run.totalCount} results)`);
    return { run, result, ...(searchError !== undefined && { searchError }) };
  }
}
