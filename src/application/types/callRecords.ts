/**
 * A usage record as returned by Graph. Fields such as duration, charge,
 * callType and licenseCapability pass through untouched.
 */
export type CallRecord = Record<string, unknown>;

/**
 * One page of a callRecords function response
 */
export interface CallRecordsPage {
  value: CallRecord[];
  '@odata.nextLink'?: string | null;
  '@odata.NextLink'?: string | null;
}

/**
 * Query input. Either startDate + endDate (YYYY-MM-DD, end exclusive)
 * or days (1-90, counted back from the end of today UTC).
 */
export interface CallRecordsQueryParams {
  startDate?: string;
  endDate?: string;
  days?: number;
}

/**
 * Graph callRecords functions backing each query
 */
export const CallRecordFunctions = {
  PSTN: 'getPstnCalls',
  DIRECT_ROUTING: 'getDirectRoutingCalls',
} as const;

export type CallRecordFunction = (typeof CallRecordFunctions)[keyof typeof CallRecordFunctions];

/**
 * Paged fetcher interface
 */
export interface ICallRecordsFetcher {
  fetchAll(initialUrl: string, accessToken: string): AsyncGenerator<CallRecord, void, unknown>;
}

/**
 * Call records query interface
 */
export interface ICallRecordsQuery {
  buildUrl(params: CallRecordsQueryParams): string;
  run(accessToken: string, params: CallRecordsQueryParams): AsyncGenerator<CallRecord, void, unknown>;
}
