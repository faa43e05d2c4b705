import { CallRecordsFetcher } from '../../../src/application/services/CallRecordsFetcher';
import { FetchError, InvalidArgumentError } from '../../../src/application/errors';
import { IHttpClient } from '../../../src/infrastructure/http/HttpClient';
import { CallRecord } from '../../../src/application/types';

// Mock config
jest.mock('../../../src/config/index', () => ({
  config: {
    auth: { tenantId: '', clientId: '', clientSecret: '', accessToken: '' },
    graph: {
      apiBaseUrl: 'https://graph.microsoft.com/beta',
      loginBaseUrl: 'https://login.microsoftonline.com',
    },
    http: { timeoutMs: 30000 },
    logging: { level: 'error' },
    storage: { exportOutputDir: './exports' },
  },
}));

// Mock logger
jest.mock('../../../src/infrastructure/logging/Logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const FIRST_URL =
  'https://graph.microsoft.com/beta/communications/callRecords/getPstnCalls(fromDateTime=2020-04-02,toDateTime=2020-04-09)';
const SECOND_URL = `${FIRST_URL}?$skip=2`;

describe('CallRecordsFetcher', () => {
  let fetcher: CallRecordsFetcher;
  let mockHttpClient: jest.Mocked<IHttpClient>;

  const pstnCall = (id: string): CallRecord => ({
    id,
    callType: 'ucap_out',
    duration: 60,
    charge: 0.04,
    licenseCapability: 'MCOPSTN1',
  });

  async function collect(url: string, token: string): Promise<CallRecord[]> {
    const result: CallRecord[] = [];
    for await (const record of fetcher.fetchAll(url, token)) {
      result.push(record);
    }
    return result;
  }

  beforeEach(() => {
    jest.clearAllMocks();

    mockHttpClient = {
      get: jest.fn(),
      post: jest.fn(),
    } as unknown as jest.Mocked<IHttpClient>;

    fetcher = new CallRecordsFetcher(mockHttpClient);
  });

  it('should follow NextLink and yield records in page order', async () => {
    mockHttpClient.get.mockResolvedValueOnce({
      success: true,
      data: {
        value: [pstnCall('call-1'), pstnCall('call-2')],
        '@odata.NextLink': SECOND_URL,
      },
    });
    mockHttpClient.get.mockResolvedValueOnce({
      success: true,
      data: { value: [pstnCall('call-3')] },
    });

    const result = await collect(FIRST_URL, 'test-token');

    expect(result.map(record => record.id)).toEqual(['call-1', 'call-2', 'call-3']);
    expect(mockHttpClient.get).toHaveBeenCalledTimes(2);
    expect(mockHttpClient.get).toHaveBeenNthCalledWith(1, FIRST_URL, {
      headers: { Authorization: 'test-token' },
    });
    expect(mockHttpClient.get).toHaveBeenNthCalledWith(2, SECOND_URL, {
      headers: { Authorization: 'test-token' },
    });
  });

  it('should pass records through untouched', async () => {
    const record = { id: 'call-1', nested: { a: [1, 2] }, extra: null };
    mockHttpClient.get.mockResolvedValueOnce({
      success: true,
      data: { value: [record] },
    });

    const result = await collect(FIRST_URL, 'test-token');

    expect(result).toEqual([record]);
  });

  it('should stop after a single page without NextLink', async () => {
    mockHttpClient.get.mockResolvedValueOnce({
      success: true,
      data: { value: [pstnCall('call-1')] },
    });

    const result = await collect(FIRST_URL, 'test-token');

    expect(result).toHaveLength(1);
    expect(mockHttpClient.get).toHaveBeenCalledTimes(1);
  });

  it('should treat an empty NextLink as the last page', async () => {
    mockHttpClient.get.mockResolvedValueOnce({
      success: true,
      data: { value: [], '@odata.NextLink': '' },
    });

    const result = await collect(FIRST_URL, 'test-token');

    expect(result).toEqual([]);
    expect(mockHttpClient.get).toHaveBeenCalledTimes(1);
  });

  it('should follow the lowercase nextLink Graph documents', async () => {
    mockHttpClient.get
      .mockResolvedValueOnce({
        success: true,
        data: { value: [pstnCall('call-1'), pstnCall('call-2')], '@odata.nextLink': SECOND_URL },
      })
      .mockResolvedValueOnce({
        success: true,
        data: { value: [pstnCall('call-3')] },
      });

    const result = await collect(FIRST_URL, 'test-token');

    expect(result.map((record) => record.id)).toEqual(['call-1', 'call-2', 'call-3']);
    expect(mockHttpClient.get).toHaveBeenCalledTimes(2);
    expect(mockHttpClient.get.mock.calls[1][0]).toBe(SECOND_URL);
  });

  it('should reject a page whose nextLink is not a string', async () => {
    mockHttpClient.get.mockResolvedValueOnce({
      success: true,
      data: { value: [pstnCall('call-1')], '@odata.NextLink': 42 },
    });

    await expect(collect(FIRST_URL, 'test-token')).rejects.toMatchObject({
      name: 'FetchError',
      apiError: { type: 'INVALID_RESPONSE' },
    });
    expect(mockHttpClient.get).toHaveBeenCalledTimes(1);
  });

  it('should not request the next page until the current one is consumed', async () => {
    mockHttpClient.get.mockResolvedValueOnce({
      success: true,
      data: { value: [pstnCall('call-1')], '@odata.NextLink': SECOND_URL },
    });

    const generator = fetcher.fetchAll(FIRST_URL, 'test-token');
    expect(mockHttpClient.get).not.toHaveBeenCalled();

    const first = await generator.next();

    expect(first.value).toEqual(pstnCall('call-1'));
    expect(mockHttpClient.get).toHaveBeenCalledTimes(1);

    await generator.return();
  });

  it('should abort without repeating earlier records when a page fails', async () => {
    mockHttpClient.get.mockResolvedValueOnce({
      success: true,
      data: { value: [pstnCall('call-1'), pstnCall('call-2')], '@odata.NextLink': SECOND_URL },
    });
    mockHttpClient.get.mockResolvedValueOnce({
      success: false,
      error: { type: 'SERVER_ERROR', message: 'Service unavailable', statusCode: 503 },
    });

    const seen: CallRecord[] = [];
    let thrown: unknown;
    try {
      for await (const record of fetcher.fetchAll(FIRST_URL, 'test-token')) {
        seen.push(record);
      }
    } catch (error) {
      thrown = error;
    }

    expect(seen.map(record => record.id)).toEqual(['call-1', 'call-2']);
    expect(thrown).toBeInstanceOf(FetchError);
    if (thrown instanceof FetchError) {
      expect(thrown.url).toBe(SECOND_URL);
      expect(thrown.apiError.type).toBe('SERVER_ERROR');
      expect(thrown.message).toBe('Failed to fetch call records: Service unavailable');
    }
    expect(mockHttpClient.get).toHaveBeenCalledTimes(2);
  });

  it('should fail on a response that is not a page', async () => {
    mockHttpClient.get.mockResolvedValueOnce({
      success: true,
      data: '<html>Bad Gateway</html>',
    });

    await expect(collect(FIRST_URL, 'test-token')).rejects.toMatchObject({
      name: 'FetchError',
      apiError: { type: 'INVALID_RESPONSE' },
    });
  });

  it('should reject an empty token before any request', () => {
    expect(() => fetcher.fetchAll(FIRST_URL, '')).toThrow(InvalidArgumentError);
    expect(mockHttpClient.get).not.toHaveBeenCalled();
  });

  it('should reject an empty initial URL before any request', () => {
    expect(() => fetcher.fetchAll('', 'test-token')).toThrow(InvalidArgumentError);
    expect(mockHttpClient.get).not.toHaveBeenCalled();
  });
});
