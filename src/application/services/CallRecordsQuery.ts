import {
  CallRecord,
  CallRecordFunction,
  CallRecordFunctions,
  CallRecordsQueryParams,
  ICallRecordsFetcher,
  ICallRecordsQuery,
} from '../types/index';
import { InvalidArgumentError } from '../errors';
import { CallRecordsFetcher } from './CallRecordsFetcher';
import { config } from '../../config/index';
import { logger } from '../../infrastructure/logging/Logger';

/**
 * Graph only serves the last 90 days of usage
 */
export const MIN_DAYS = 1;
export const MAX_DAYS = 90;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type Clock = () => Date;

/**
 * Format a Date as YYYY-MM-DD in UTC
 */
export function formatUtcDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * [from, to) covering the last `days` days including today (UTC).
 */
export function trailingDateRange(days: number, now: Date): { startDate: string; endDate: string } {
  const tomorrow = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1);
  return {
    startDate: formatUtcDate(new Date(tomorrow - days * MS_PER_DAY)),
    endDate: formatUtcDate(new Date(tomorrow)),
  };
}

/**
 * Shared query logic for the callRecords usage functions.
 */
export class CallRecordsQuery implements ICallRecordsQuery {
  private readonly fn: CallRecordFunction;
  private readonly fetcher: ICallRecordsFetcher;
  private readonly clock: Clock;
  private readonly apiBaseUrl: string;

  constructor(fn: CallRecordFunction, fetcher?: ICallRecordsFetcher, clock?: Clock, apiBaseUrl?: string) {
    this.fn = fn;
    this.fetcher = fetcher || new CallRecordsFetcher();
    this.clock = clock || (() => new Date());
    this.apiBaseUrl = apiBaseUrl || config.graph.apiBaseUrl;
  }

  /**
   * Resolve params to a date pair. Explicit dates are used verbatim and
   * are not checked against the 90-day window.
   */
  resolveDateRange(params: CallRecordsQueryParams): { startDate: string; endDate: string } {
    const { startDate, endDate, days } = params;
    const hasRange = startDate !== undefined || endDate !== undefined;

    if (days !== undefined) {
      if (hasRange) {
        throw new InvalidArgumentError('days', 'Specify either startDate/endDate or days, not both');
      }
      if (!Number.isInteger(days) || days < MIN_DAYS || days > MAX_DAYS) {
        throw new InvalidArgumentError('days', `days must be an integer between ${MIN_DAYS} and ${MAX_DAYS}, got ${days}`);
      }
      return trailingDateRange(days, this.clock());
    }

    if (!hasRange) {
      throw new InvalidArgumentError('days', 'Specify either startDate/endDate or days');
    }
    if (startDate === undefined) {
      throw new InvalidArgumentError('startDate', 'startDate and endDate must be supplied together');
    }
    if (endDate === undefined) {
      throw new InvalidArgumentError('endDate', 'startDate and endDate must be supplied together');
    }

    return { startDate, endDate };
  }

  buildUrl(params: CallRecordsQueryParams): string {
    const { startDate, endDate } = this.resolveDateRange(params);
    return `${this.apiBaseUrl}/communications/callRecords/${this.fn}(fromDateTime=${startDate},toDateTime=${endDate})`;
  }

  /**
   * Validate params and start the paged fetch. Invalid params throw here,
   * before any request is made.
   */
  run(accessToken: string, params: CallRecordsQueryParams): AsyncGenerator<CallRecord, void, unknown> {
    const url = this.buildUrl(params);
    logger.info('Querying call records', { function: this.fn, url });
    return this.fetcher.fetchAll(url, accessToken);
  }
}

/**
 * Calling-plan (PSTN) usage records
 */
export class PstnCallsQuery extends CallRecordsQuery {
  constructor(fetcher?: ICallRecordsFetcher, clock?: Clock, apiBaseUrl?: string) {
    super(CallRecordFunctions.PSTN, fetcher, clock, apiBaseUrl);
  }
}

/**
 * Direct routing usage records
 */
export class DirectRoutingCallsQuery extends CallRecordsQuery {
  constructor(fetcher?: ICallRecordsFetcher, clock?: Clock, apiBaseUrl?: string) {
    super(CallRecordFunctions.DIRECT_ROUTING, fetcher, clock, apiBaseUrl);
  }
}
