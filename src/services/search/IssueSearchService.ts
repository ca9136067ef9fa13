import { FilteredResult, Query } from '../../types/models';
import { parseSearchRequest } from '../../models/validation';
import { Orchestrator, RunOptions } from '../orchestration/Orchestrator';
import { RelevanceFilterPipeline } from '../filtering/RelevanceFilterPipeline';

/**
 * Runs a query end to end: crawl every source, then filter the merged bundle.
 * RequestValidationError is the only error it raises.
 */
export class IssueSearchService {
  constructor(
    private orchestrator: Orchestrator,
    private pipeline: RelevanceFilterPipeline
  ) {}

  /**
   * Validate a raw request body and search
   */
  async searchRequest(payload: unknown, options: RunOptions = {}): Promise<FilteredResult> {
    return this.search(parseSearchRequest(payload), options);
  }

  async search(query: Query, options: RunOptions = {}): Promise<FilteredResult> {
    const bundle = await this.orchestrator.run(query, options);
    return this.pipeline.process(bundle);
  }
}
