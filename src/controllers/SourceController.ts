import { Request, Response } from 'express';
import { AdapterRegistry } from '../services/agents/AdapterRegistry';
import { validateSelectorSource } from '../models/validation';
import { sendError } from './errorResponse';

/**
 * SourceController lists sources and registers selector-based ones at runtime
 */
export class SourceController {
  constructor(private registry: AdapterRegistry) {}

  /**
   * GET /api/sources
   */
  async list(req: Request, res: Response): Promise<void> {
    res.json({ sources: this.registry.list() });
  }

  /**
   * POST /api/sources - Register a source described by CSS selectors
   */
  async register(req: Request, res: Response): Promise<void> {
    try {
      const config = validateSelectorSource(req.body);
      const adapter = this.registry.registerSelectorSource(config);
      res.status(201).json({ id: adapter.id, domains: [...adapter.domains] });
    } catch (error) {
      sendError(res, error, 'Failed to register source');
    }
  }
}
