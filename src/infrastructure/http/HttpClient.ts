import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse, AxiosError } from 'axios';
import { Result, ApiError, ok, err } from '../../application/types/index';
import { config } from '../../config/index';
import { logger } from '../logging/Logger';

/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  timeout: number;
  adapter?: AxiosAdapter;
}

/**
 * HTTP client interface
 */
export interface IHttpClient {
  get<T>(url: string, config?: AxiosRequestConfig): Promise<Result<T, ApiError>>;
  post<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<Result<T, ApiError>>;
}

const DEFAULT_CONFIG: HttpClientConfig = {
  timeout: config.http.timeoutMs,
};

/**
 * Pull a human-readable message out of an error body.
 * Graph sends { error: { code, message } }, the identity platform
 * sends { error, error_description }.
 */
function extractErrorMessage(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }

  if ('error_description' in data && typeof data.error_description === 'string') {
    return data.error_description;
  }

  if ('error' in data) {
    const { error } = data;
    if (typeof error === 'string') {
      return error;
    }
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }

  if ('message' in data && typeof data.message === 'string') {
    return data.message;
  }

  return undefined;
}

/**
 * Convert axios error to API error
 */
export function axiosErrorToApiError(error: AxiosError): ApiError {
  if (error.response) {
    const status = error.response.status;
    const message = extractErrorMessage(error.response.data) || error.message;

    switch (status) {
      case 400:
        return { type: 'BAD_REQUEST', message };
      case 401:
        return { type: 'AUTH_ERROR', message };
      case 403:
        return { type: 'PERMISSION_ERROR', message };
      case 404:
        return { type: 'NOT_FOUND', message, url: error.config?.url };
      case 429: {
        const retryAfter = parseInt(String(error.response.headers['retry-after'] ?? '0'), 10);
        return {
          type: 'RATE_LIMITED',
          message: 'Rate limit exceeded',
          retryAfter: isNaN(retryAfter) ? 0 : retryAfter,
        };
      }
      default:
        return {
          type: 'SERVER_ERROR',
          message,
          statusCode: status,
        };
    }
  }

  return {
    type: 'NETWORK_ERROR',
    message: error.message || 'Network error occurred',
    cause: error,
  };
}

/**
 * HTTP client. Requests are sent once and failures come back as ApiError
 * results. Holds no auth state; callers pass headers per request.
 */
export class HttpClient implements IHttpClient {
  private readonly client: AxiosInstance;

  constructor(httpConfig?: Partial<HttpClientConfig>) {
    const { timeout, adapter } = { ...DEFAULT_CONFIG, ...httpConfig };

    this.client = axios.create({ timeout, adapter });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.client.interceptors.request.use((requestConfig) => {
      logger.debug('HTTP Request', {
        method: requestConfig.method?.toUpperCase(),
        url: requestConfig.url,
      });
      return requestConfig;
    });

    this.client.interceptors.response.use(
      (response) => {
        logger.debug('HTTP Response', {
          status: response.status,
          url: response.config.url,
        });
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          logger.debug('HTTP Error', {
            status: error.response?.status,
            url: error.config?.url,
            code: error.code,
          });
        }
        return Promise.reject(error);
      }
    );
  }

  private async execute<T>(requestFn: () => Promise<AxiosResponse<T>>): Promise<Result<T, ApiError>> {
    try {
      const response = await requestFn();
      return ok(response.data);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        return err(axiosErrorToApiError(error));
      }

      return err({
        type: 'NETWORK_ERROR',
        message: error instanceof Error ? error.message : 'Unknown error occurred',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * GET request
   */
  async get<T>(url: string, requestConfig?: AxiosRequestConfig): Promise<Result<T, ApiError>> {
    return this.execute(() => this.client.get<T>(url, requestConfig));
  }

  /**
   * POST request
   */
  async post<T>(url: string, data?: unknown, requestConfig?: AxiosRequestConfig): Promise<Result<T, ApiError>> {
    return this.execute(() => this.client.post<T>(url, data, requestConfig));
  }
}
