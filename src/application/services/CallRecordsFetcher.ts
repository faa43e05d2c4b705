import { ApiError, CallRecord, CallRecordsPage, ICallRecordsFetcher, Result } from '../types/index';
import { FetchError, InvalidArgumentError } from '../errors';
import { HttpClient, IHttpClient } from '../../infrastructure/http/HttpClient';
import { logger } from '../../infrastructure/logging/Logger';

function isLink(value: unknown): boolean {
  return value === undefined || value === null || typeof value === 'string';
}

function isCallRecordsPage(data: unknown): data is CallRecordsPage {
  if (typeof data !== 'object' || data === null || !('value' in data) || !Array.isArray(data.value)) {
    return false;
  }
  if ('@odata.nextLink' in data && !isLink(data['@odata.nextLink'])) {
    return false;
  }
  if ('@odata.NextLink' in data && !isLink(data['@odata.NextLink'])) {
    return false;
  }
  return true;
}

/**
 * Graph documents `@odata.nextLink`; some callRecords responses capitalise it.
 */
function nextLinkOf(page: CallRecordsPage): string | undefined {
  return page['@odata.nextLink'] || page['@odata.NextLink'] || undefined;
}

/**
 * Follows a callRecords function result through its @odata.nextLink chain.
 */
export class CallRecordsFetcher implements ICallRecordsFetcher {
  private readonly httpClient: IHttpClient;

  constructor(httpClient?: IHttpClient) {
    this.httpClient = httpClient || new HttpClient();
  }

  /**
   * Yield every record of every page, in page order. Arguments are checked
   * here, before the first request; a failing page aborts the sequence with
   * FetchError.
   */
  fetchAll(initialUrl: string, accessToken: string): AsyncGenerator<CallRecord, void, unknown> {
    if (!initialUrl) {
      throw new InvalidArgumentError('initialUrl', 'Initial URL must not be empty');
    }
    if (!accessToken) {
      throw new InvalidArgumentError('accessToken', 'Access token must not be empty');
    }

    return this.iteratePages(initialUrl, accessToken);
  }

  private async *iteratePages(initialUrl: string, accessToken: string): AsyncGenerator<CallRecord, void, unknown> {
    logger.info('Starting paginated call records fetch', { url: initialUrl });

    let url: string | undefined = initialUrl;
    let pageCount = 0;
    let recordCount = 0;

    while (url) {
      // Graph expects the raw token here, not "Bearer <token>".
      const result: Result<unknown, ApiError> = await this.httpClient.get<unknown>(url, {
        headers: { Authorization: accessToken },
      });

      if (!result.success) {
        logger.error('Failed to fetch call records page', undefined, {
          pageCount,
          url,
          error: result.error,
        });
        throw new FetchError(result.error, url);
      }

      const page: unknown = result.data;
      if (!isCallRecordsPage(page)) {
        throw new FetchError(
          { type: 'INVALID_RESPONSE', message: 'Response is not a call records page' },
          url
        );
      }

      pageCount++;
      recordCount += page.value.length;

      for (const record of page.value) {
        yield record;
      }

      url = nextLinkOf(page);
    }

    logger.info('Completed paginated call records fetch', { pageCount, recordCount });
  }
}
