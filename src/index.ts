import dotenv from 'dotenv';
import { loadSettings } from './config/settings';
import { getDatabase, closeDatabase } from './config/database';
import { runMigrations } from './database/migrations';
import { createApp } from './app';
import { createDefaultRegistry } from './services/agents/AdapterRegistry';
import { Orchestrator } from './services/orchestration/Orchestrator';
import { createRelevanceLlm } from './services/llm/FallbackRelevanceLlm';
import { RelevanceFilterPipeline } from './services/filtering/RelevanceFilterPipeline';
import { IssueSearchService } from './services/search/IssueSearchService';
import { EmailDeliveryService } from './services/email/EmailDeliveryService';
import { SqliteSubscriptionStore } from './services/subscriptions/SqliteSubscriptionStore';
import { SubscriptionRunner } from './services/subscriptions/SubscriptionRunner';
import { SubscriptionService } from './services/subscriptions/SubscriptionService';
import { SubscriptionScheduler } from './services/subscriptions/SubscriptionScheduler';

// Load environment variables
dotenv.config();

async function startServer(): Promise<void> {
  console.log('🔧 Initializing services...');
  const settings = loadSettings();

  // Initialize database and run migrations
  console.log('📊 Setting up database...');
  const db = await getDatabase(settings.database.path);
  await runMigrations(db);

  const registry = createDefaultRegistry(settings);
  const orchestrator = new Orchestrator(registry, settings.orchestrator);
  const pipeline = new RelevanceFilterPipeline(createRelevanceLlm(settings.llm), settings.pipeline);
  const searchService = new IssueSearchService(orchestrator, pipeline);

  const delivery = new EmailDeliveryService(settings.email);
  const store = new SqliteSubscriptionStore(db);
  const runner = new SubscriptionRunner(store, searchService, delivery);
  const subscriptionService = new SubscriptionService(store, registry, runner);
  const scheduler = new SubscriptionScheduler(store, runner, {
    cron: settings.scheduler.cron,
    timezone: settings.scheduler.timezone
  });

  const app = createApp({ searchService, subscriptionService, registry }, { frontendUrl: settings.server.frontendUrl });
  const server = app.listen(settings.server.port, () => {
    console.log(`🚀 Server running on port ${settings.server.port}`);
    console.log('📡 Issue Radar API');
    console.log(`🏥 Health check: http://localhost:${settings.server.port}/health`);
    console.log(`📚 API endpoints: http://localhost:${settings.server.port}/api`);
  });

  await delivery.verifyTransport();

  if (settings.scheduler.enabled) {
    scheduler.start();
  } else {
    console.log('⏸️  Subscription scheduler disabled');
  }

  const shutdown = async (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down...`);
    server.close();
    await scheduler.stop();
    await closeDatabase();
    process.exit(0);
  };
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(error => {
      console.error('❌ Shutdown failed:', error);
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(error => {
      console.error('❌ Shutdown failed:', error);
      process.exit(1);
    });
  });
}

// Start the server
startServer().catch(error => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
