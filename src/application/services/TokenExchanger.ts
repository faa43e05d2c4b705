import {
  Result,
  Credential,
  AuthError,
  ICredentialProvider,
  ITokenExchanger,
  TokenResponse,
  ok,
  err,
} from '../types/index';
import { InvalidArgumentError } from '../errors';
import { HttpClient, IHttpClient } from '../../infrastructure/http/HttpClient';
import { config } from '../../config/index';
import { logger } from '../../infrastructure/logging/Logger';

/**
 * Application permission scope for Microsoft Graph
 */
export const GRAPH_DEFAULT_SCOPE = 'https://graph.microsoft.com/.default';

const TENANT_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isTenantId(value: string): boolean {
  return TENANT_ID_PATTERN.test(value);
}

function isTokenResponse(data: unknown): data is TokenResponse {
  return (
    typeof data === 'object' &&
    data !== null &&
    'access_token' in data &&
    typeof data.access_token === 'string' &&
    data.access_token.length > 0
  );
}

/**
 * Exchanges an application credential for a Graph access token using the
 * OAuth2 client-credentials grant. Tokens are neither cached nor refreshed.
 */
export class TokenExchanger implements ITokenExchanger {
  private readonly httpClient: IHttpClient;
  private readonly credentialProvider: ICredentialProvider | undefined;
  private readonly loginBaseUrl: string;

  constructor(httpClient?: IHttpClient, credentialProvider?: ICredentialProvider, loginBaseUrl?: string) {
    this.httpClient = httpClient || new HttpClient();
    this.credentialProvider = credentialProvider;
    this.loginBaseUrl = loginBaseUrl || config.graph.loginBaseUrl;
  }

  getTokenUrl(tenantId: string): string {
    return `${this.loginBaseUrl}/${tenantId}/oauth2/v2.0/token`;
  }

  /**
   * Exchange a credential for an access token. When no credential is passed
   * the injected provider is asked; if it has none, no request is made.
   */
  async exchange(tenantId: string, credential?: Credential): Promise<Result<string, AuthError>> {
    if (!isTenantId(tenantId)) {
      throw new InvalidArgumentError('tenantId', `Tenant ID must be a GUID, got "${tenantId}"`);
    }

    const resolved = credential ?? (await this.credentialProvider?.get()) ?? null;

    if (!resolved || !resolved.clientId || !resolved.clientSecret) {
      logger.warn('No application credential available, skipping token request', { tenantId });
      return err({
        type: 'MISSING_CREDENTIAL',
        message: 'Client ID and client secret are required to request a token',
      });
    }

    logger.info('Requesting access token', { tenantId, clientId: resolved.clientId });

    const body = new URLSearchParams({
      client_id: resolved.clientId,
      client_secret: resolved.clientSecret,
      scope: GRAPH_DEFAULT_SCOPE,
      grant_type: 'client_credentials',
    });

    const result = await this.httpClient.post<unknown>(this.getTokenUrl(tenantId), body.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });

    if (!result.success) {
      logger.warn('Token request failed', { tenantId, error: result.error.type });
      return err({
        type: 'TOKEN_REQUEST_FAILED',
        message: `Failed to obtain access token: ${result.error.message}`,
        cause: result.error,
      });
    }

    if (!isTokenResponse(result.data)) {
      return err({
        type: 'INVALID_RESPONSE',
        message: 'Token endpoint response did not contain an access_token',
      });
    }

    logger.info('Access token obtained', { expiresIn: result.data.expires_in });

    return ok(result.data.access_token);
  }
}
