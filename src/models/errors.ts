import { ErrorReport } from '../types/models';

/**
 * Error taxonomy shared by the orchestrator, the filter pipeline and the
 * subscription layer. Only RequestValidationError and StorageUnavailableError
 * are meant to reach callers; the rest are contained and reported.
 */

export class RequestValidationError extends Error {
  readonly code = 'request_validation';

  constructor(message: string, public readonly details: string[] = [message]) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export type SourceFailureReason = 'network' | 'auth' | 'timeout' | 'deadline' | 'http' | 'parse';

export class SourceUnavailableError extends Error {
  readonly code = 'source_unavailable';

  constructor(
    public readonly source: string,
    public readonly reason: SourceFailureReason,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'SourceUnavailableError';
  }

  /**
   * Network failures, 429 and 5xx responses may be retried. Auth, parse,
   * other HTTP statuses, timeouts and deadline expiry are terminal.
   */
  get transient(): boolean {
    if (this.reason === 'network') return true;
    if (this.reason !== 'http' || this.status === undefined) return false;
    return this.status === 429 || this.status >= 500;
  }
}

export class LlmCallError extends Error {
  readonly code = 'llm_call';

  constructor(
    public readonly backend: string,
    message: string,
    public readonly transient: boolean,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'LlmCallError';
  }
}

export class ScoringUnavailableError extends Error {
  readonly code = 'scoring_unavailable';

  constructor(message: string) {
    super(message);
    this.name = 'ScoringUnavailableError';
  }
}

export class SummarizationUnavailableError extends Error {
  readonly code = 'summarization_unavailable';

  constructor(message: string) {
    super(message);
    this.name = 'SummarizationUnavailableError';
  }
}

export class DeliveryFailureError extends Error {
  readonly code = 'delivery_failure';

  constructor(public readonly recipient: string, message: string) {
    super(message);
    this.name = 'DeliveryFailureError';
  }
}

export class StorageUnavailableError extends Error {
  readonly code = 'storage_unavailable';

  constructor(public readonly operation: string, message: string) {
    super(message);
    this.name = 'StorageUnavailableError';
  }
}

export class NotFoundError extends Error {
  readonly code = 'not_found';

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends Error {
  readonly code = 'conflict';

  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

function hasCode(error: Error): error is Error & { code: string } {
  return 'code' in error && typeof error.code === 'string';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Flatten any thrown value into the structured form stored on bundles and run records
 */
export function toErrorReport(error: unknown): ErrorReport {
  if (error instanceof Error) {
    return {
      code: hasCode(error) ? error.code : 'unexpected',
      message: error.message
    };
  }
  return { code: 'unexpected', message: String(error) };
}
