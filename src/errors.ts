import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'MonitorError';
  }
}

/** Network/API failure or missing credentials in an acquisition collaborator. */
export class FetchError extends MonitorError {
  constructor(
    message: string,
    public readonly source: string,
    details?: unknown,
  ) {
    super(message, ErrorCode.InternalError, details);
    this.name = 'FetchError';
  }
}

/** A valid response that carried zero records. */
export class EmptyDataError extends MonitorError {
  constructor(message: string) {
    super(message, ErrorCode.InternalError);
    this.name = 'EmptyDataError';
  }
}

export class InsufficientHistoryError extends MonitorError {
  constructor(
    public readonly length: number,
    public readonly minimum: number,
  ) {
    super(`Series has ${length} buckets; at least ${minimum} are needed for rolling statistics`, ErrorCode.InternalError);
    this.name = 'InsufficientHistoryError';
  }
}

export class SummarizationError extends MonitorError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.InternalError, details);
    this.name = 'SummarizationError';
  }
}

export class ResultNotFoundError extends MonitorError {
  constructor(public readonly country: string) {
    super(`No results found for ${country}`, ErrorCode.InvalidRequest);
    this.name = 'ResultNotFoundError';
  }
}

export class UnknownCountryError extends MonitorError {
  constructor(public readonly country: string) {
    super(`Invalid country: ${country}`, ErrorCode.InvalidParams);
    this.name = 'UnknownCountryError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
