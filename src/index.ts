/**
 * Teams PSTN usage client
 *
 * Library entry point. The CLI lives in presentation/cli:
 *
 *   teams-pstn-usage token --tenant-id <guid>
 *   teams-pstn-usage pstn-calls --days 7
 *   teams-pstn-usage direct-routing-calls --start-date 2020-04-01 --end-date 2020-04-08
 */

export * from './application/types/index';
export * from './application/errors';
export { TokenExchanger, GRAPH_DEFAULT_SCOPE, isTenantId } from './application/services/TokenExchanger';
export { CallRecordsFetcher } from './application/services/CallRecordsFetcher';
export {
  CallRecordsQuery,
  PstnCallsQuery,
  DirectRoutingCallsQuery,
  trailingDateRange,
  formatUtcDate,
  MIN_DAYS,
  MAX_DAYS,
} from './application/services/CallRecordsQuery';
export type { Clock } from './application/services/CallRecordsQuery';
export { HttpClient } from './infrastructure/http/HttpClient';
export type { IHttpClient, HttpClientConfig } from './infrastructure/http/HttpClient';
export { EnvCredentialProvider } from './infrastructure/credentials/EnvCredentialProvider';
export { ConsoleCredentialProvider } from './infrastructure/credentials/ConsoleCredentialProvider';
export { ChainCredentialProvider } from './infrastructure/credentials/ChainCredentialProvider';
export { toCsv, toJson } from './presentation/cli/formatters';
