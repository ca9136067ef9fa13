import { Request, Response } from 'express';
import { IssueSearchService } from '../services/search/IssueSearchService';
import { filteredResultToJson } from '../models/transformers';
import { sendError } from './errorResponse';

/**
 * SearchController handles on-demand issue searches
 */
export class SearchController {
  constructor(private searchService: IssueSearchService) {}

  /**
   * POST /api/search - Crawl the requested sources and return the filtered result
   */
  async search(req: Request, res: Response): Promise<void> {
    try {
      const result = await this.searchService.searchRequest(req.body);
      res.json(filteredResultToJson(result));
    } catch (error) {
      sendError(res, error, 'Failed to run search');
    }
  }
}
