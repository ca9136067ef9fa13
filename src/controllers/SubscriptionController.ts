import { Request, Response } from 'express';
import { SubscriptionService } from '../services/subscriptions/SubscriptionService';
import { filteredResultToJson, runToJson, subscriptionToJson } from '../models/transformers';
import { sendError } from './errorResponse';

/**
 * SubscriptionController handles recurring search subscriptions.
 * Subscriptions are looked up by the owner's email (`?email=`).
 */
export class SubscriptionController {
  constructor(private subscriptionService: SubscriptionService) {}

  /**
   * POST /api/subscriptions - Create a daily subscription
   */
  async create(req: Request, res: Response): Promise<void> {
    try {
      const subscription = await this.subscriptionService.create(req.body);
      res.status(201).json({ id: subscription.id, subscription: subscriptionToJson(subscription) });
    } catch (error) {
      sendError(res, error, 'Failed to create subscription');
    }
  }

  /**
   * GET /api/subscriptions?email= - List an email's subscriptions
   */
  async list(req: Request, res: Response): Promise<void> {
    try {
      const subscriptions = await this.subscriptionService.list(req.query.email);
      res.json({ subscriptions: subscriptions.map(subscriptionToJson) });
    } catch (error) {
      sendError(res, error, 'Failed to list subscriptions');
    }
  }

  /**
   * DELETE /api/subscriptions/:id?email=
   */
  async remove(req: Request, res: Response): Promise<void> {
    try {
      await this.subscriptionService.delete(req.query.email, req.params.id);
      res.status(204).send();
    } catch (error) {
      sendError(res, error, 'Failed to delete subscription');
    }
  }

  /**
   * POST /api/subscriptions/:id/trigger?email= - Run now and deliver
   */
  async trigger(req: Request, res: Response): Promise<void> {
    try {
      const result = await this.subscriptionService.trigger(req.query.email, req.params.id);
      res.json(filteredResultToJson(result));
    } catch (error) {
      sendError(res, error, 'Failed to trigger subscription');
    }
  }

  /**
   * GET /api/subscriptions/:id/runs?email= - Recent run records
   */
  async runs(req: Request, res: Response): Promise<void> {
    try {
      const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : undefined;
      const runs = await this.subscriptionService.history(
        req.query.email,
        req.params.id,
        limit !== undefined && Number.isFinite(limit) && limit > 0 ? Math.min(limit, 100) : undefined
      );
      res.json({ runs: runs.map(runToJson) });
    } catch (error) {
      sendError(res, error, 'Failed to list subscription runs');
    }
  }
}
