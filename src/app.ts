import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createRoutes, RouteDependencies } from './routes';

export interface AppOptions {
  frontendUrl?: string;
}

/**
 * Build the Express application around already-constructed services
 */
export function createApp(deps: RouteDependencies, options: AppOptions = {}): express.Application {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: options.frontendUrl || ['http://localhost:3000', 'http://localhost:3005'],
    credentials: true
  }));
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'issue-radar',
      version: '1.0.0'
    });
  });

  app.use('/api', createRoutes(deps));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      availableRoutes: {
        health: 'GET /health',
        search: 'POST /api/search',
        subscriptions: 'GET|POST /api/subscriptions',
        sources: 'GET|POST /api/sources'
      }
    });
  });

  // Error handler (malformed JSON bodies land here)
  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Validation error', message: 'Request body is not valid JSON' });
      return;
    }
    console.error('❌ Unhandled error:', error);
    res.status(500).json({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred'
    });
  });

  return app;
}
