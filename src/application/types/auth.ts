import { ApiError, Result } from './common';

/**
 * Application credential for the client-credentials grant
 */
export interface Credential {
  clientId: string;
  clientSecret: string;
}

/**
 * Source of a credential pair. Resolves null when none is available
 * (e.g. the user declined the prompt).
 */
export interface ICredentialProvider {
  get(): Promise<Credential | null>;
}

/**
 * Token endpoint response body
 */
export interface TokenResponse {
  token_type?: string;
  expires_in?: number;
  access_token: string;
}

/**
 * Authentication error types
 */
export type AuthError =
  | { type: 'MISSING_CREDENTIAL'; message: string }
  | { type: 'TOKEN_REQUEST_FAILED'; message: string; cause: ApiError }
  | { type: 'INVALID_RESPONSE'; message: string };

/**
 * Token exchanger interface
 */
export interface ITokenExchanger {
  exchange(tenantId: string, credential?: Credential): Promise<Result<string, AuthError>>;
}
