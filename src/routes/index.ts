import { Router } from 'express';
import { SearchController } from '../controllers/SearchController';
import { SubscriptionController } from '../controllers/SubscriptionController';
import { SourceController } from '../controllers/SourceController';
import { IssueSearchService } from '../services/search/IssueSearchService';
import { SubscriptionService } from '../services/subscriptions/SubscriptionService';
import { AdapterRegistry } from '../services/agents/AdapterRegistry';

export interface RouteDependencies {
  searchService: IssueSearchService;
  subscriptionService: SubscriptionService;
  registry: AdapterRegistry;
}

/**
 * Configure all API routes
 */
export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();

  // Initialize controllers
  const searchController = new SearchController(deps.searchService);
  const subscriptionController = new SubscriptionController(deps.subscriptionService);
  const sourceController = new SourceController(deps.registry);

  // Search routes
  router.post('/search', searchController.search.bind(searchController));

  // Subscription routes
  router.post('/subscriptions', subscriptionController.create.bind(subscriptionController));
  router.get('/subscriptions', subscriptionController.list.bind(subscriptionController));
  router.delete('/subscriptions/:id', subscriptionController.remove.bind(subscriptionController));
  router.post('/subscriptions/:id/trigger', subscriptionController.trigger.bind(subscriptionController));
  router.get('/subscriptions/:id/runs', subscriptionController.runs.bind(subscriptionController));

  // Source routes
  router.get('/sources', sourceController.list.bind(sourceController));
  router.post('/sources', sourceController.register.bind(sourceController));

  return router;
}
