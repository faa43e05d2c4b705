import { ApiError } from './types/common';

/**
 * Base class for errors thrown by this client
 */
export class TeamsUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TeamsUsageError';
  }
}

/**
 * Malformed or contradictory arguments. Thrown before any request is made.
 */
export class InvalidArgumentError extends TeamsUsageError {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}

/**
 * A page request failed or returned something that is not a page.
 * Aborts the record sequence.
 */
export class FetchError extends TeamsUsageError {
  readonly apiError: ApiError;
  readonly url: string;

  constructor(apiError: ApiError, url: string) {
    super(`Failed to fetch call records: ${apiError.message}`);
    this.name = 'FetchError';
    this.apiError = apiError;
    this.url = url;
  }
}
